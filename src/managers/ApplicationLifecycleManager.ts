import { ApplicationStore, FacilityCatalog, UserStore } from '../database/Stores';
import { Application, ApplicationStatus, Page } from '../types/Application';
import { Notification } from '../types/Notification';
import { UserRole } from '../types/User';
import {
    BlockedError,
    ConflictError,
    ForbiddenError,
    InvalidInputError,
    InvalidTransitionError,
    NotFoundError,
    UnregisteredError
} from '../models/errors';
import { generateApplicationId, normalizePage, shortApplicationRef } from '../models/utils';
import { AdminAuthorization, hasCapability } from './AdminAuthorization';
import { AuditLogManager } from './AuditLogManager';
import { NotificationDispatcher, buildNotification } from './NotificationDispatcher';
import { createLogger, errorMeta } from '../utils/logger';

const log = createLogger('application-lifecycle');

export const ALLOWED_TRANSITIONS: Record<ApplicationStatus, readonly ApplicationStatus[]> = {
    pending: ['accepted', 'cancelled'],
    accepted: ['transferred', 'completed', 'cancelled'],
    transferred: ['completed', 'cancelled'],
    completed: [],
    cancelled: []
};

export const isAllowedTransition = (from: ApplicationStatus, to: ApplicationStatus): boolean => {
    return ALLOWED_TRANSITIONS[from].includes(to);
};

export const isTerminalStatus = (status: ApplicationStatus): boolean => ALLOWED_TRANSITIONS[status].length === 0;

export interface ApplicationLifecycleOptions {
    maxTransitionAttempts: number;
    pageSize: number;
    clock?: () => Date;
}

export interface ApplicationLifecycleDependencies {
    applications: ApplicationStore;
    users: UserStore;
    facilities: FacilityCatalog;
    authorization: AdminAuthorization;
    dispatcher: NotificationDispatcher;
    audit: AuditLogManager;
}

/**
 * Owns the Application entity: idempotent creation, role-gated status transitions
 * written as a compare-and-swap on `version`, and the notifications those produce.
 *
 * Notifications are written into the application's outbox in the same single-document
 * write as the state change, then flushed to the dispatcher. Anything left in the outbox
 * (queue down, crash between write and flush) is picked up by the OutboxRelay.
 */
export class ApplicationLifecycleManager {
    private applications: ApplicationStore;
    private users: UserStore;
    private facilities: FacilityCatalog;
    private authorization: AdminAuthorization;
    private dispatcher: NotificationDispatcher;
    private audit: AuditLogManager;
    private maxTransitionAttempts: number;
    private pageSize: number;
    private clock: () => Date;

    constructor(dependencies: ApplicationLifecycleDependencies, options: ApplicationLifecycleOptions) {
        if (options.maxTransitionAttempts < 1) {
            throw new Error('maxTransitionAttempts must be at least 1');
        }
        this.applications = dependencies.applications;
        this.users = dependencies.users;
        this.facilities = dependencies.facilities;
        this.authorization = dependencies.authorization;
        this.dispatcher = dependencies.dispatcher;
        this.audit = dependencies.audit;
        this.maxTransitionAttempts = options.maxTransitionAttempts;
        this.pageSize = options.pageSize;
        this.clock = options.clock ?? (() => new Date());
    }

    /**
     * Submit an application. Repeating the call while an identical application is still
     * pending returns that application without creating another or notifying again.
     */
    async create(userId: string, facilityId: string, sport: string): Promise<Application> {
        const user = await this.users.findById(userId);
        if (!user || user.registrationState !== 'completed') {
            throw new UnregisteredError(userId);
        }
        if (user.blocked) {
            throw new BlockedError(userId);
        }

        const facility = await this.facilities.findById(facilityId);
        if (!facility) {
            throw new NotFoundError('Facility', facilityId);
        }

        const requested = sport.trim().toLowerCase();
        const canonicalSport = facility.sports.find(offered => offered.toLowerCase() === requested);
        if (!canonicalSport) {
            throw new InvalidInputError(`${facility.name} does not offer ${sport.trim()}`);
        }

        const existing = await this.applications.findPending(userId, facilityId, canonicalSport);
        if (existing) {
            log.info('Duplicate application submission, returning existing', { applicationId: existing.id, userId });
            await this.syncApplicationCount(userId);
            return existing;
        }

        const now = this.clock();
        const id = generateApplicationId();
        const application: Application = {
            id,
            userId,
            facilityId,
            sport: canonicalSport,
            status: 'pending',
            createdAt: now,
            updatedAt: now,
            statusHistory: [],
            version: 0,
            outbox: [],
            applicantName: user.displayName,
            applicantChatId: user.telegramChatId,
            applicantPhone: user.phone ?? '',
            facilityName: facility.name,
            facilityDistrict: facility.district
        };
        application.outbox.push(
            buildNotification({ kind: 'admins' }, 'application.created', {
                applicationId: id,
                applicationRef: shortApplicationRef(id),
                applicantName: application.applicantName,
                applicantPhone: application.applicantPhone,
                facilityName: application.facilityName,
                facilityDistrict: application.facilityDistrict,
                sport: canonicalSport
            }, now)
        );

        const result = await this.applications.insert(application);
        if (!result.inserted) {
            log.info('Concurrent duplicate application rejected by index', { applicationId: result.application.id, userId });
            await this.syncApplicationCount(userId);
            return result.application;
        }

        // A failure here leaves the created notification in the outbox for the relay
        await this.syncApplicationCount(userId);

        log.info('Application created', { applicationId: id, userId, facilityId, sport: canonicalSport });
        return this.flushOutbox(result.application);
    }

    /**
     * Move an application to targetStatus on behalf of actorId.
     *
     * Without expectedVersion the read-modify-write is retried on a lost race, re-validating
     * against the fresh state each time. With expectedVersion the caller is acting on a
     * specific snapshot, so any version mismatch is reported as a conflict immediately.
     */
    async transition(
        applicationId: string,
        targetStatus: ApplicationStatus,
        actorId: string,
        expectedVersion?: number
    ): Promise<Application> {
        const actorRole = await this.authorization.roleOf(actorId);

        for (let attempt = 1; attempt <= this.maxTransitionAttempts; attempt++) {
            const current = await this.applications.findById(applicationId);
            if (!current) {
                throw new NotFoundError('Application', applicationId);
            }
            if (expectedVersion !== undefined && current.version !== expectedVersion) {
                throw new ConflictError(applicationId);
            }

            this.authorizeTransition(current, targetStatus, actorId, actorRole);

            const now = this.clock();
            const updated = await this.applications.compareAndSwap(applicationId, current.version, {
                status: targetStatus,
                historyEntry: { status: targetStatus, actor: actorId, timestamp: now },
                notifications: this.transitionNotifications(current, targetStatus, actorId, now),
                updatedAt: now
            });

            if (updated) {
                log.info('Application transitioned', {
                    applicationId,
                    from: current.status,
                    to: targetStatus,
                    actorId,
                    version: updated.version
                });
                if (hasCapability(actorRole, 'application.transition')) {
                    await this.audit.recordAdminAction(actorId, 'application.transition', applicationId, {
                        from: current.status,
                        to: targetStatus
                    });
                }
                return this.flushOutbox(updated);
            }

            if (expectedVersion !== undefined) {
                throw new ConflictError(applicationId);
            }
            log.debug('Lost transition race, retrying', { applicationId, attempt });
        }

        log.warn('Transition retries exhausted', { applicationId, targetStatus, actorId });
        throw new ConflictError(applicationId);
    }

    async get(applicationId: string): Promise<Application> {
        const application = await this.applications.findById(applicationId);
        if (!application) {
            throw new NotFoundError('Application', applicationId);
        }
        return application;
    }

    async listByUser(userId: string, page?: number): Promise<Page<Application>> {
        const request = normalizePage(page, this.pageSize);
        const result = await this.applications.listByUser(userId, request);
        return { ...result, page: request.page, pageSize: request.limit };
    }

    async listByStatus(status: ApplicationStatus, page?: number): Promise<Page<Application>> {
        const request = normalizePage(page, this.pageSize);
        const result = await this.applications.listByStatus(status, request);
        return { ...result, page: request.page, pageSize: request.limit };
    }

    async statusCounts(): Promise<Record<ApplicationStatus, number>> {
        return this.applications.countByStatus();
    }

    /**
     * Hand every outbox notification to the dispatcher and drop the accepted ones from
     * the outbox. Returns the application as it stands after the flush.
     */
    async flushOutbox(application: Application): Promise<Application> {
        if (application.outbox.length === 0) {
            return application;
        }

        const accepted: string[] = [];
        for (const notification of application.outbox) {
            try {
                await this.dispatcher.enqueue(notification);
                accepted.push(notification.id);
            } catch (error) {
                log.warn('Notification left in outbox for relay', {
                    applicationId: application.id,
                    notificationId: notification.id,
                    ...errorMeta(error)
                });
            }
        }

        if (accepted.length === 0) {
            return application;
        }

        try {
            await this.applications.removeFromOutbox(application.id, accepted);
        } catch (error) {
            // The relay re-enqueues these; job ids de-duplicate on notification id
            log.warn('Failed to clear outbox after enqueue', { applicationId: application.id, ...errorMeta(error) });
            return application;
        }

        return { ...application, outbox: application.outbox.filter(entry => !accepted.includes(entry.id)) };
    }

    // Recounted rather than incremented so a retried create repairs a missed write
    private async syncApplicationCount(userId: string): Promise<void> {
        const total = await this.applications.countByUser(userId);
        await this.users.setApplicationCount(userId, total);
    }

    private authorizeTransition(
        application: Application,
        targetStatus: ApplicationStatus,
        actorId: string,
        actorRole: UserRole
    ): void {
        const isAdmin = hasCapability(actorRole, 'application.transition');
        const isOwner = application.userId === actorId;

        if (!isAdmin && !isOwner) {
            throw new ForbiddenError('Only admins or the applicant may change this application');
        }

        if (!isAllowedTransition(application.status, targetStatus)) {
            throw new InvalidTransitionError(application.status, targetStatus);
        }

        // Applicants may only withdraw an application nobody has picked up yet
        if (!isAdmin && !(application.status === 'pending' && targetStatus === 'cancelled')) {
            throw new ForbiddenError('Applicants may only cancel pending applications');
        }
    }

    private transitionNotifications(
        application: Application,
        targetStatus: ApplicationStatus,
        actorId: string,
        now: Date
    ): Notification[] {
        const ref = shortApplicationRef(application.id);
        const notifications = [
            buildNotification(
                { kind: 'user', userId: application.userId, chatId: application.applicantChatId },
                'application.status_changed',
                {
                    applicationId: application.id,
                    applicationRef: ref,
                    previousStatus: application.status,
                    status: targetStatus,
                    facilityName: application.facilityName
                },
                now
            )
        ];

        if (targetStatus === 'cancelled' && actorId === application.userId) {
            notifications.push(
                buildNotification({ kind: 'admins' }, 'application.cancelled_by_user', {
                    applicationId: application.id,
                    applicationRef: ref,
                    applicantName: application.applicantName,
                    facilityName: application.facilityName,
                    facilityDistrict: application.facilityDistrict
                }, now)
            );
        }

        return notifications;
    }
}
