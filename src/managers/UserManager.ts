import { UserStore } from '../database/Stores';
import { User, UserProfile } from '../types/User';
import { ForbiddenError, NotFoundError } from '../models/errors';
import { AdminAuthorization } from './AdminAuthorization';
import { AuditLogManager } from './AuditLogManager';
import { createLogger } from '../utils/logger';

const log = createLogger('user-manager');

export class UserManager {
    private users: UserStore;
    private authorization: AdminAuthorization;
    private audit: AuditLogManager;

    constructor(users: UserStore, authorization: AdminAuthorization, audit: AuditLogManager) {
        this.users = users;
        this.authorization = authorization;
        this.audit = audit;
    }

    /**
     * Get the user behind an inbound event, creating the record on first contact.
     */
    async ensureUser(profile: UserProfile, now: Date): Promise<User> {
        const user = await this.users.getOrCreate(profile, now);
        if (user.createdAt.getTime() === now.getTime()) {
            log.info('Created new user', { userId: user.id });
        }
        return user;
    }

    async getUser(userId: string): Promise<User | null> {
        return this.users.findById(userId);
    }

    async block(adminId: string, userId: string): Promise<User> {
        return this.setBlocked(adminId, userId, true);
    }

    async unblock(adminId: string, userId: string): Promise<User> {
        return this.setBlocked(adminId, userId, false);
    }

    private async setBlocked(adminId: string, userId: string, blocked: boolean): Promise<User> {
        await this.authorization.assertCan(adminId, 'user.block');

        if (blocked && (await this.authorization.roleOf(userId)) !== 'none') {
            throw new ForbiddenError('Admins cannot be blocked; revoke the role first');
        }

        const updated = await this.users.setBlocked(userId, blocked);
        if (!updated) {
            throw new NotFoundError('User', userId);
        }

        await this.audit.recordAdminAction(adminId, blocked ? 'user.block' : 'user.unblock', userId);
        return updated;
    }
}
