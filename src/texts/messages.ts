import { Application, ApplicationStatus, Page } from '../types/Application';
import { Facility } from '../types/Facility';
import { Reply } from '../types/InboundEvent';
import { User, UserRole } from '../types/User';
import { EngineError, InvalidTransitionError, ThrottledError } from '../models/errors';
import { APPLICATION_STATUSES, NAME_MAX_LENGTH, NAME_MIN_LENGTH } from '../models/validation';
import { shortApplicationRef } from '../models/utils';
import { STATUS_LABELS } from './labels';

export const MESSAGES = {
    welcome: '👋 Welcome! This bot takes applications for sports facilities.\n\nTo get started, please tell us your full name.',
    askName: `Please send your full name (${NAME_MIN_LENGTH}–${NAME_MAX_LENGTH} characters).`,
    askPhone: '📱 Thanks! Now share your phone number with the button below, or type it in (e.g. +7 900 123 45 67).',
    invalidPhone: '❌ That does not look like a phone number. Please share your contact or type a number like +7 900 123 45 67.',
    registrationRestarted: '⌛ Your registration session expired, so let\'s start over.\n\nPlease tell us your full name.',
    alreadyRegistered: 'You are already registered. Send /help to see what you can do.',
    askConfirmation: 'Please confirm with the buttons below, or reply "yes" or "no".',
    applicationAborted: 'Application discarded. Nothing was submitted.',
    sessionExpired: '⌛ That application draft expired. Start again with /apply.',
    nothingInProgress: 'There is nothing in progress to confirm or cancel.',
    unknownCommand: 'Unknown command. Send /help to see the available commands.',
    noApplications: 'You have no applications yet.',
    noApplicationsWithStatus: 'No applications with this status.',
    genericError: '😔 Something went wrong. Please try again later.',
    retryLater: '⏳ The service is temporarily unavailable. Please try again in a moment.',
    unsupportedInput: 'Sorry, I can only handle text messages and commands here. Send /help for options.'
} as const;

export const usage = {
    apply: 'Usage: /apply <facilityId>',
    cancel: 'Usage: /cancel <applicationId>',
    applications: 'Usage: /applications <pending|accepted|transferred|completed|cancelled> [page]',
    transition: (command: string) => `Usage: /${command} <applicationId> [version]`,
    userTarget: (command: string) => `Usage: /${command} <userId>`
};

export const registrationComplete = (user: User): string =>
    `✅ Registration complete, ${user.displayName}!\n\nUse /apply <facilityId> to submit an application, or /help for all commands.`;

export const helpText = (role: UserRole): string => {
    const lines = [
        '📖 Commands',
        '',
        '/apply <facilityId> - apply to a facility',
        '/my_applications [page] - your applications',
        '/cancel <applicationId> - withdraw a pending application',
        '/help - this message'
    ];

    if (role !== 'none') {
        lines.push(
            '',
            '🛠 Admin',
            '/applications <status> [page] - list applications by status',
            '/accept, /transfer, /complete, /decline <applicationId> [version]',
            '/stats - application counts by status',
            '/block <userId>, /unblock <userId>',
            '/audit_log [limit] - recent admin actions'
        );
    }

    if (role === 'super_admin') {
        lines.push('', '👑 Super admin', '/grant_admin <userId>, /revoke_admin <userId>');
    }

    return lines.join('\n');
};

export const askSport = (facility: Facility): Reply => ({
    text: `🏢 ${facility.name} (${facility.district})\n📍 ${facility.address}\n\nWhich sport are you applying for?`,
    keyboard: {
        kind: 'inline',
        buttons: facility.sports.map(sport => [{ text: sport, data: `sport:${sport}` }])
    }
});

export const invalidSport = (facility: Facility): string =>
    `${facility.name} offers: ${facility.sports.join(', ')}. Please pick one of these.`;

export const confirmApplication = (facility: Facility, sport: string): Reply => ({
    text: `Please confirm your application:\n\n🏢 ${facility.name}\n📍 ${facility.district}\n🏅 ${sport}`,
    keyboard: {
        kind: 'inline',
        buttons: [[
            { text: '✅ Submit', data: 'flow:confirm' },
            { text: '✖️ Discard', data: 'flow:abort' }
        ]]
    }
});

export const applicationSubmitted = (application: Application): string =>
    `📨 Application ${shortApplicationRef(application.id)} submitted!\n\n` +
    `🏢 ${application.facilityName}\n🏅 ${application.sport}\n📊 ${STATUS_LABELS[application.status]}\n\n` +
    'You will be notified when its status changes.';

export const applicationCard = (application: Application): string => [
    `📋 ${shortApplicationRef(application.id)} · ${STATUS_LABELS[application.status]}`,
    `🏢 ${application.facilityName} (${application.facilityDistrict})`,
    `🏅 ${application.sport}`,
    `📅 ${application.createdAt.toISOString().slice(0, 10)}`
].join('\n');

export const adminApplicationCard = (application: Application): string => [
    applicationCard(application),
    `👤 ${application.applicantName} (${application.applicantPhone})`,
    `🆔 ${application.id} · v${application.version}`
].join('\n');

export const pageHeader = (title: string, page: Page<Application>): string => {
    const pages = Math.max(1, Math.ceil(page.total / page.pageSize));
    return `${title} (page ${page.page}/${pages}, ${page.total} total)`;
};

export const applicationPage = (
    title: string,
    page: Page<Application>,
    render: (application: Application) => string
): string => [pageHeader(title, page), ...page.items.map(render)].join('\n\n');

export const transitionDone = (application: Application): string =>
    `Application ${shortApplicationRef(application.id)} is now ${STATUS_LABELS[application.status]}.`;

export const statsText = (counts: Record<ApplicationStatus, number>): string => {
    const total = Object.values(counts).reduce((sum, count) => sum + count, 0);
    const lines = APPLICATION_STATUSES.map(status => `${STATUS_LABELS[status]}: ${counts[status]}`);
    return ['📊 Applications', '', ...lines, '', `Total: ${total}`].join('\n');
};

export const cooldownNotice = (retryAfterSeconds: number): string =>
    `⏳ You are sending messages too quickly. Please wait ${retryAfterSeconds}s.`;

/**
 * User-facing wording for an engine error.
 */
export const errorMessage = (error: EngineError): string => {
    switch (error.code) {
        case 'UNREGISTERED':
            return 'Please finish registration first. Send /start to begin.';
        case 'BLOCKED':
            return '🚫 Your account is blocked. Please contact the administration.';
        case 'INVALID_TRANSITION':
            return error instanceof InvalidTransitionError
                ? `This application cannot move from "${STATUS_LABELS[error.from]}" to "${STATUS_LABELS[error.to]}".`
                : 'This status change is not allowed.';
        case 'FORBIDDEN':
            return '🔒 You do not have permission to do that.';
        case 'CONFLICT':
            return '🔄 This application was changed by someone else. Please reload it and try again.';
        case 'THROTTLED':
            return cooldownNotice(error instanceof ThrottledError ? error.retryAfterSeconds : 60);
        case 'STORAGE_UNAVAILABLE':
            return MESSAGES.retryLater;
        case 'NOT_FOUND':
            return '🔍 Not found. Please check the id and try again.';
        case 'INVALID_INPUT':
            return `❌ ${error.message}`;
    }
};
