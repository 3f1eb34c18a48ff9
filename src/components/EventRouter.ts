import { Application, ApplicationStatus } from '../types/Application';
import { InboundEvent, Reply } from '../types/InboundEvent';
import { User } from '../types/User';
import { InvalidInputError, ThrottledError, isEngineError } from '../models/errors';
import { isValidApplicationStatus } from '../models/validation';
import { shortApplicationRef } from '../models/utils';
import { ACTION_LABELS, STATUS_LABELS } from '../texts/labels';
import {
    MESSAGES,
    adminApplicationCard,
    applicationCard,
    applicationPage,
    errorMessage,
    helpText,
    pageHeader,
    statsText,
    transitionDone,
    usage
} from '../texts/messages';
import {
    AdminAuthorization,
    ALLOWED_TRANSITIONS,
    ApplicationLifecycleManager,
    AuditLogManager,
    ConversationManager,
    RateLimiter,
    UserManager
} from '../managers';
import { createLogger } from '../utils/logger';

const log = createLogger('router');

// Keeps the rendered log under Telegram's message size limit
export const AUDIT_LOG_MAX_ENTRIES = 50;

const TRANSITION_COMMANDS = new Map<string, ApplicationStatus>([
    ['accept', 'accepted'],
    ['transfer', 'transferred'],
    ['complete', 'completed'],
    ['decline', 'cancelled']
]);

const parseCount = (value: string | undefined): number | undefined => {
    if (value === undefined) {
        return undefined;
    }
    if (!/^\d+$/.test(value)) {
        throw new InvalidInputError(`Expected a number, got "${value}"`);
    }
    return parseInt(value, 10);
};

export interface EventRouterDependencies {
    rateLimiter: RateLimiter;
    users: UserManager;
    conversations: ConversationManager;
    lifecycle: ApplicationLifecycleManager;
    authorization: AdminAuthorization;
    audit: AuditLogManager;
}

/**
 * Routes one inbound event to completion and returns the replies to send back.
 * Knows nothing about the transport; the bot handler converts updates and replies.
 */
export class EventRouter {
    private deps: EventRouterDependencies;

    constructor(deps: EventRouterDependencies) {
        this.deps = deps;
    }

    async handle(event: InboundEvent): Promise<Reply[]> {
        try {
            await this.deps.rateLimiter.assertAdmitted(event.userId, event.timestamp);
        } catch (error) {
            if (error instanceof ThrottledError) {
                return error.notify ? [{ text: errorMessage(error) }] : [];
            }
            throw error;
        }

        try {
            const user = await this.deps.users.ensureUser(
                { id: event.userId, telegramChatId: event.chatId, displayName: event.displayName },
                event.timestamp
            );

            if (user.registrationState !== 'completed') {
                return await this.deps.conversations.handleRegistration(user, event, event.timestamp);
            }

            switch (event.type) {
                case 'command':
                    return await this.handleCommand(user, event);
                case 'callback':
                    return await this.handleCallback(user, event);
                case 'text':
                case 'contact': {
                    const replies = await this.deps.conversations.handleFlowInput(user, event, event.timestamp);
                    return replies ?? [{ text: MESSAGES.unsupportedInput }];
                }
                default:
                    return [{ text: MESSAGES.unsupportedInput }];
            }
        } catch (error) {
            if (!isEngineError(error)) {
                throw error;
            }
            if (error.code === 'STORAGE_UNAVAILABLE') {
                log.error('Storage unavailable while handling event', { userId: event.userId, error: error.message });
            } else {
                log.info('Request rejected', { userId: event.userId, code: error.code, error: error.message });
            }
            return [{ text: errorMessage(error) }];
        }
    }

    private async handleCommand(user: User, event: InboundEvent): Promise<Reply[]> {
        const command = event.command ?? '';
        const args = event.args ?? [];
        const { lifecycle, authorization, conversations, users, audit } = this.deps;

        const transitionTarget = TRANSITION_COMMANDS.get(command);
        if (transitionTarget) {
            const [applicationId] = args;
            if (!applicationId) {
                return [{ text: usage.transition(command) }];
            }
            await authorization.assertCan(user.id, 'application.transition');
            const updated = await lifecycle.transition(applicationId, transitionTarget, user.id, parseCount(args[1]));
            return [{ text: transitionDone(updated) }];
        }

        switch (command) {
            case 'start':
                return [{ text: MESSAGES.alreadyRegistered }];

            case 'help':
                return [{ text: helpText(await authorization.roleOf(user.id)) }];

            case 'apply': {
                const [facilityId] = args;
                if (!facilityId) {
                    return [{ text: usage.apply }];
                }
                return conversations.startApplication(user, facilityId, event.timestamp);
            }

            case 'my_applications': {
                const page = await lifecycle.listByUser(user.id, parseCount(args[0]));
                if (page.total === 0) {
                    return [{ text: MESSAGES.noApplications }];
                }
                const reply: Reply = { text: applicationPage('📋 Your applications', page, applicationCard) };
                const cancellable = page.items.filter(application => application.status === 'pending');
                if (cancellable.length > 0) {
                    reply.keyboard = {
                        kind: 'inline',
                        buttons: cancellable.map(application => [{
                            text: `Cancel ${shortApplicationRef(application.id)}`,
                            data: `app:cancelled:${application.id}:${application.version}`
                        }])
                    };
                }
                return [reply];
            }

            case 'cancel': {
                const [applicationId] = args;
                if (!applicationId) {
                    return [{ text: usage.cancel }];
                }
                const updated = await lifecycle.transition(applicationId, 'cancelled', user.id);
                return [{ text: transitionDone(updated) }];
            }

            case 'applications': {
                const [status] = args;
                if (!isValidApplicationStatus(status)) {
                    return [{ text: usage.applications }];
                }
                await authorization.assertCan(user.id, 'application.list_all');
                const page = await lifecycle.listByStatus(status, parseCount(args[1]));
                if (page.total === 0) {
                    return [{ text: MESSAGES.noApplicationsWithStatus }];
                }
                return [
                    { text: pageHeader(`🗂 ${STATUS_LABELS[status]}`, page) },
                    ...page.items.map(application => this.adminCard(application))
                ];
            }

            case 'stats':
                await authorization.assertCan(user.id, 'application.stats');
                return [{ text: statsText(await lifecycle.statusCounts()) }];

            case 'audit_log': {
                await authorization.assertCan(user.id, 'audit.read');
                const limit = Math.min(Math.max(parseCount(args[0]) ?? 10, 1), AUDIT_LOG_MAX_ENTRIES);
                const entries = await audit.getRecentAdminActions(limit);
                if (entries.length === 0) {
                    return [{ text: 'No admin actions recorded yet.' }];
                }
                const lines = entries.map(entry =>
                    `${entry.timestamp.toISOString()} ${entry.adminId} ${entry.action}${entry.targetId ? ` ${entry.targetId}` : ''}`
                );
                return [{ text: ['🧾 Recent admin actions', '', ...lines].join('\n') }];
            }

            case 'block':
            case 'unblock': {
                const [targetId] = args;
                if (!targetId) {
                    return [{ text: usage.userTarget(command) }];
                }
                const updated = command === 'block'
                    ? await users.block(user.id, targetId)
                    : await users.unblock(user.id, targetId);
                return [{ text: `User ${updated.id} is now ${updated.blocked ? 'blocked' : 'unblocked'}.` }];
            }

            case 'grant_admin':
            case 'revoke_admin': {
                const [targetId] = args;
                if (!targetId) {
                    return [{ text: usage.userTarget(command) }];
                }
                const updated = command === 'grant_admin'
                    ? await authorization.grantAdmin(user.id, targetId)
                    : await authorization.revokeAdmin(user.id, targetId);
                return [{ text: `User ${updated.id} now has role ${updated.role}.` }];
            }

            default:
                return [{ text: MESSAGES.unknownCommand }];
        }
    }

    private async handleCallback(user: User, event: InboundEvent): Promise<Reply[]> {
        const data = event.data ?? '';
        const { conversations, lifecycle } = this.deps;

        if (data.startsWith('apply:')) {
            return conversations.startApplication(user, data.slice('apply:'.length), event.timestamp);
        }

        if (data.startsWith('sport:') || data.startsWith('flow:')) {
            const replies = await conversations.handleFlowInput(user, event, event.timestamp);
            return replies ?? [{ text: MESSAGES.nothingInProgress }];
        }

        if (data.startsWith('app:')) {
            const [, status, applicationId, version] = data.split(':');
            if (!isValidApplicationStatus(status) || !applicationId || version === undefined) {
                throw new InvalidInputError('Malformed application action');
            }
            const updated = await lifecycle.transition(applicationId, status, user.id, parseCount(version));
            return [{ text: transitionDone(updated) }];
        }

        log.warn('Unknown callback data', { userId: user.id, data });
        return [{ text: MESSAGES.unknownCommand }];
    }

    private adminCard(application: Application): Reply {
        const actions = ALLOWED_TRANSITIONS[application.status];
        if (actions.length === 0) {
            return { text: adminApplicationCard(application) };
        }
        return {
            text: adminApplicationCard(application),
            keyboard: {
                kind: 'inline',
                buttons: [actions.map(status => ({
                    text: ACTION_LABELS[status],
                    data: `app:${status}:${application.id}:${application.version}`
                }))]
            }
        };
    }
}
