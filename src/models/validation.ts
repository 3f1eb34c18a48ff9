// Validation helpers for inbound data and cached documents
import { ApplicationStatus } from '../types/Application';
import { ConversationFlow, ConversationSession, ConversationStep } from '../types/Conversation';
import { RegistrationState, UserRole } from '../types/User';

export class ValidationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ValidationError';
    }
}

export const APPLICATION_STATUSES: readonly ApplicationStatus[] = ['pending', 'accepted', 'transferred', 'completed', 'cancelled'];
export const USER_ROLES: readonly UserRole[] = ['none', 'admin', 'super_admin'];
export const REGISTRATION_STATES: readonly RegistrationState[] = ['started', 'awaiting_name', 'awaiting_phone', 'completed'];

export const emptyStatusCounts = (): Record<ApplicationStatus, number> => ({
    pending: 0,
    accepted: 0,
    transferred: 0,
    completed: 0,
    cancelled: 0
});

const CONVERSATION_FLOWS: readonly ConversationFlow[] = ['registration', 'submit_application', 'none'];
const CONVERSATION_STEPS: readonly ConversationStep[] = ['started', 'awaiting_phone', 'awaiting_sport', 'awaiting_confirmation', 'idle'];

export const NAME_MIN_LENGTH = 2;
export const NAME_MAX_LENGTH = 64;

export const isValidApplicationStatus = (status: unknown): status is ApplicationStatus => {
    return APPLICATION_STATUSES.some(candidate => candidate === status);
};

export const isValidUserRole = (role: unknown): role is UserRole => {
    return USER_ROLES.some(candidate => candidate === role);
};

const isConversationFlow = (flow: unknown): flow is ConversationFlow => {
    return CONVERSATION_FLOWS.some(candidate => candidate === flow);
};

const isConversationStep = (step: unknown): step is ConversationStep => {
    return CONVERSATION_STEPS.some(candidate => candidate === step);
};

/**
 * Returns the trimmed display name, or null when the text cannot be a name
 * (too short, too long, or a bot command).
 */
export const validateDisplayName = (text: string | undefined): string | null => {
    if (!text) {
        return null;
    }
    const trimmed = text.trim();
    if (trimmed.startsWith('/')) {
        return null;
    }
    if (trimmed.length < NAME_MIN_LENGTH || trimmed.length > NAME_MAX_LENGTH) {
        return null;
    }
    return trimmed;
};

/**
 * Normalizes a typed phone number to +7XXXXXXXXXX.
 * Accepts 10 digits starting with 9, or 11 digits starting with 7 or 8.
 */
export const normalizePhone = (phone: string | undefined): string | null => {
    if (!phone) {
        return null;
    }
    const digits = phone.replace(/\D/g, '');

    if (digits.length === 10 && digits.startsWith('9')) {
        return `+7${digits}`;
    }
    if (digits.length === 11 && digits.startsWith('7')) {
        return `+${digits}`;
    }
    if (digits.length === 11 && digits.startsWith('8')) {
        return `+7${digits.slice(1)}`;
    }
    return null;
};

// Contacts shared through the messenger are already verified by it; only the format is normalized
export const normalizeContactPhone = (phone: string | undefined): string | null => {
    if (!phone) {
        return null;
    }
    const digits = phone.replace(/\D/g, '');
    if (digits.length < 7 || digits.length > 15) {
        return null;
    }
    return `+${digits}`;
};

const isStringRecord = (value: unknown): value is Record<string, string> => {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        return false;
    }
    return Object.values(value).every(entry => typeof entry === 'string');
};

/**
 * Parses a conversation session read back from the shared cache.
 * Throws ValidationError when the stored document is malformed.
 */
export const parseConversationSession = (raw: string): ConversationSession => {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        throw new ValidationError('Conversation session is not valid JSON');
    }

    if (typeof parsed !== 'object' || parsed === null) {
        throw new ValidationError('Conversation session must be an object');
    }

    const record: Record<string, unknown> = { ...parsed };
    const { userId, flow, step, scratch, expiresAt } = record;

    if (typeof userId !== 'string' || userId.length === 0) {
        throw new ValidationError('Conversation session must have a userId');
    }
    if (!isConversationFlow(flow)) {
        throw new ValidationError('Conversation session has an unknown flow');
    }
    if (!isConversationStep(step)) {
        throw new ValidationError('Conversation session has an unknown step');
    }
    if (!isStringRecord(scratch)) {
        throw new ValidationError('Conversation session scratch must map strings to strings');
    }
    if (typeof expiresAt !== 'string' || Number.isNaN(Date.parse(expiresAt))) {
        throw new ValidationError('Conversation session must have an ISO expiresAt');
    }

    return { userId, flow, step, scratch, expiresAt: new Date(expiresAt) };
};
