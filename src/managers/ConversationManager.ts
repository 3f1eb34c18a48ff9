import { ConversationStore } from '../cache/ConversationStore';
import { FacilityCatalog, UserStore } from '../database/Stores';
import { ConversationSession, ConversationStep } from '../types/Conversation';
import { Facility } from '../types/Facility';
import { InboundEvent, Reply } from '../types/InboundEvent';
import { User } from '../types/User';
import { BlockedError, NotFoundError, UnregisteredError, isEngineError } from '../models/errors';
import { normalizeContactPhone, normalizePhone, validateDisplayName } from '../models/validation';
import {
    MESSAGES,
    applicationSubmitted,
    askSport,
    confirmApplication,
    invalidSport,
    registrationComplete
} from '../texts/messages';
import { ApplicationLifecycleManager } from './ApplicationLifecycleManager';
import { createLogger } from '../utils/logger';

const log = createLogger('conversation');

const CONFIRM_WORDS = ['yes', 'y', 'confirm', 'да'];
const ABORT_WORDS = ['no', 'n', 'cancel', 'нет'];

export interface ConversationOptions {
    ttlMinutes: number;
}

/**
 * Per-user dialog state machine. Every step reads and writes the session through the
 * shared cache, so consecutive messages may be served by different replicas.
 */
export class ConversationManager {
    private sessions: ConversationStore;
    private users: UserStore;
    private facilities: FacilityCatalog;
    private lifecycle: ApplicationLifecycleManager;
    private ttlMs: number;

    constructor(
        sessions: ConversationStore,
        users: UserStore,
        facilities: FacilityCatalog,
        lifecycle: ApplicationLifecycleManager,
        options: ConversationOptions
    ) {
        this.sessions = sessions;
        this.users = users;
        this.facilities = facilities;
        this.lifecycle = lifecycle;
        this.ttlMs = options.ttlMinutes * 60 * 1000;
    }

    /**
     * Drive registration for a user who has not completed it yet.
     *
     * An expired session, or a user stuck at awaiting_phone whose session the cache has
     * already evicted, restarts at the name step. The triggering event is not read as input.
     */
    async handleRegistration(user: User, event: InboundEvent, now: Date): Promise<Reply[]> {
        if (user.registrationState === 'completed') {
            return [{ text: MESSAGES.alreadyRegistered }];
        }

        const lookup = await this.sessions.load(user.id, now);
        const evicted = lookup.state === 'absent' && user.registrationState === 'awaiting_phone';
        if (lookup.state === 'expired' || evicted) {
            log.info('Registration session expired, restarting', { userId: user.id });
            await this.users.setRegistrationState(user.id, 'started');
            await this.saveSession(user.id, 'registration', 'started', {}, now);
            return [{ text: MESSAGES.registrationRestarted, keyboard: { kind: 'remove' } }];
        }

        const session = lookup.state === 'active' && lookup.session.flow === 'registration' ? lookup.session : null;
        const step: ConversationStep = session ? session.step : 'started';

        if (step === 'awaiting_phone') {
            return this.handlePhone(user, event, session?.scratch ?? {}, now);
        }
        return this.handleName(user, event, now);
    }

    async startApplication(user: User, facilityId: string, now: Date): Promise<Reply[]> {
        if (user.registrationState !== 'completed') {
            throw new UnregisteredError(user.id);
        }
        if (user.blocked) {
            throw new BlockedError(user.id);
        }

        const facility = await this.requireFacility(facilityId);
        await this.saveSession(user.id, 'submit_application', 'awaiting_sport', { facilityId: facility.id }, now);
        return [askSport(facility)];
    }

    /**
     * Feed an event to the user's active flow. Returns null when no flow is in progress,
     * leaving the event to the caller.
     */
    async handleFlowInput(user: User, event: InboundEvent, now: Date): Promise<Reply[] | null> {
        const lookup = await this.sessions.load(user.id, now);
        if (lookup.state === 'absent') {
            return null;
        }
        if (lookup.state === 'expired') {
            return lookup.session.flow === 'submit_application' ? [{ text: MESSAGES.sessionExpired }] : null;
        }

        const session = lookup.session;
        if (session.flow !== 'submit_application') {
            await this.sessions.delete(user.id);
            return null;
        }

        if (this.isAbort(event)) {
            return this.abort(user.id);
        }

        switch (session.step) {
            case 'awaiting_sport':
                return this.handleSport(user, session, event, now);
            case 'awaiting_confirmation':
                return this.handleConfirmation(user, session, event);
            default:
                await this.sessions.delete(user.id);
                return null;
        }
    }

    async abort(userId: string): Promise<Reply[]> {
        await this.sessions.delete(userId);
        return [{ text: MESSAGES.applicationAborted }];
    }

    private async handleName(user: User, event: InboundEvent, now: Date): Promise<Reply[]> {
        const name = event.type === 'text' ? validateDisplayName(event.text) : null;
        if (!name) {
            await this.saveSession(user.id, 'registration', 'started', {}, now);
            const isStart = event.type === 'command' && event.command === 'start';
            return [{ text: isStart ? MESSAGES.welcome : MESSAGES.askName }];
        }

        await this.saveSession(user.id, 'registration', 'awaiting_phone', { displayName: name }, now);
        await this.users.setRegistrationState(user.id, 'awaiting_phone');
        return [{ text: MESSAGES.askPhone, keyboard: { kind: 'request_contact' } }];
    }

    private async handlePhone(user: User, event: InboundEvent, scratch: Record<string, string>, now: Date): Promise<Reply[]> {
        const displayName = scratch.displayName;
        if (!displayName) {
            log.warn('Registration session lost the collected name, restarting', { userId: user.id });
            await this.users.setRegistrationState(user.id, 'started');
            await this.saveSession(user.id, 'registration', 'started', {}, now);
            return [{ text: MESSAGES.registrationRestarted, keyboard: { kind: 'remove' } }];
        }

        let phone: string | null = null;
        if (event.type === 'contact') {
            phone = normalizeContactPhone(event.phone);
        } else if (event.type === 'text') {
            phone = normalizePhone(event.text);
        }

        if (!phone) {
            await this.saveSession(user.id, 'registration', 'awaiting_phone', scratch, now);
            return [{ text: MESSAGES.invalidPhone, keyboard: { kind: 'request_contact' } }];
        }

        const completed = await this.users.completeRegistration(user.id, displayName, phone);
        await this.sessions.delete(user.id);

        if (!completed) {
            return [{ text: MESSAGES.alreadyRegistered, keyboard: { kind: 'remove' } }];
        }

        log.info('Registration completed', { userId: user.id });
        return [{ text: registrationComplete(completed), keyboard: { kind: 'remove' } }];
    }

    private async handleSport(user: User, session: ConversationSession, event: InboundEvent, now: Date): Promise<Reply[]> {
        const facility = await this.requireFacility(session.scratch.facilityId ?? '');

        let requested: string | undefined;
        if (event.type === 'text') {
            requested = event.text;
        } else if (event.type === 'callback' && event.data?.startsWith('sport:')) {
            requested = event.data.slice('sport:'.length);
        }

        const wanted = requested?.trim().toLowerCase();
        const sport = wanted ? facility.sports.find(offered => offered.toLowerCase() === wanted) : undefined;
        if (!sport) {
            return [{ text: invalidSport(facility) }, askSport(facility)];
        }

        await this.saveSession(user.id, 'submit_application', 'awaiting_confirmation', { facilityId: facility.id, sport }, now);
        return [confirmApplication(facility, sport)];
    }

    private async handleConfirmation(user: User, session: ConversationSession, event: InboundEvent): Promise<Reply[]> {
        if (!this.isConfirm(event)) {
            return [{ text: MESSAGES.askConfirmation }];
        }

        const { facilityId, sport } = session.scratch;
        if (!facilityId || !sport) {
            await this.sessions.delete(user.id);
            return [{ text: MESSAGES.sessionExpired }];
        }

        try {
            const application = await this.lifecycle.create(user.id, facilityId, sport);
            await this.sessions.delete(user.id);
            return [{ text: applicationSubmitted(application) }];
        } catch (error) {
            // Keep the draft only when repeating the confirmation could succeed
            if (isEngineError(error) && !error.retryable) {
                await this.sessions.delete(user.id);
            }
            log.debug('Application submission failed', { userId: user.id, facilityId });
            throw error;
        }
    }

    private isConfirm(event: InboundEvent): boolean {
        if (event.type === 'callback') {
            return event.data === 'flow:confirm';
        }
        return event.type === 'text' && CONFIRM_WORDS.includes((event.text ?? '').trim().toLowerCase());
    }

    private isAbort(event: InboundEvent): boolean {
        if (event.type === 'callback') {
            return event.data === 'flow:abort';
        }
        return event.type === 'text' && ABORT_WORDS.includes((event.text ?? '').trim().toLowerCase());
    }

    private async requireFacility(facilityId: string): Promise<Facility> {
        const facility = await this.facilities.findById(facilityId);
        if (!facility) {
            throw new NotFoundError('Facility', facilityId);
        }
        return facility;
    }

    private async saveSession(
        userId: string,
        flow: ConversationSession['flow'],
        step: ConversationStep,
        scratch: Record<string, string>,
        now: Date
    ): Promise<void> {
        await this.sessions.save(
            { userId, flow, step, scratch, expiresAt: new Date(now.getTime() + this.ttlMs) },
            now
        );
    }
}
