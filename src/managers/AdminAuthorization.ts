import { UserStore } from '../database/Stores';
import { User, UserRole } from '../types/User';
import { ForbiddenError, NotFoundError, UnregisteredError } from '../models/errors';
import { AuditLogManager } from './AuditLogManager';
import { createLogger } from '../utils/logger';

const log = createLogger('authorization');

export type Capability =
    | 'application.transition'
    | 'application.list_all'
    | 'application.stats'
    | 'user.block'
    | 'audit.read'
    | 'role.grant';

const ADMIN_CAPABILITIES: readonly Capability[] = [
    'application.transition',
    'application.list_all',
    'application.stats',
    'user.block',
    'audit.read'
];

// Roles are data: what a role may do is looked up here, never inferred from a type
export const ROLE_CAPABILITIES: Record<UserRole, readonly Capability[]> = {
    none: [],
    admin: ADMIN_CAPABILITIES,
    super_admin: [...ADMIN_CAPABILITIES, 'role.grant']
};

export const hasCapability = (role: UserRole, capability: Capability): boolean => {
    return ROLE_CAPABILITIES[role].includes(capability);
};

export class AdminAuthorization {
    private users: UserStore;
    private audit: AuditLogManager;
    private configuredSuperAdmins: Set<string>;

    constructor(users: UserStore, audit: AuditLogManager, superAdminIds: number[] = []) {
        this.users = users;
        this.audit = audit;
        this.configuredSuperAdmins = new Set(superAdminIds.map(id => id.toString()));
    }

    /**
     * Resolve a caller's role. Identities listed in SUPER_ADMIN_IDS are always super admins.
     */
    async roleOf(userId: string): Promise<UserRole> {
        if (this.configuredSuperAdmins.has(userId)) {
            return 'super_admin';
        }
        const user = await this.users.findById(userId);
        return user?.role ?? 'none';
    }

    async can(userId: string, capability: Capability): Promise<boolean> {
        return hasCapability(await this.roleOf(userId), capability);
    }

    async assertCan(userId: string, capability: Capability): Promise<UserRole> {
        const role = await this.roleOf(userId);
        if (!hasCapability(role, capability)) {
            log.warn('Authorization denied', { userId, role, capability });
            throw new ForbiddenError(`Role ${role} may not perform ${capability}`);
        }
        return role;
    }

    async grantAdmin(actorId: string, targetId: string): Promise<User> {
        await this.assertCan(actorId, 'role.grant');

        const target = await this.requireUser(targetId);
        if (target.role === 'super_admin') {
            return target;
        }
        if (target.registrationState !== 'completed') {
            throw new UnregisteredError(targetId);
        }

        const updated = await this.users.setRole(targetId, 'admin');
        if (!updated) {
            throw new UnregisteredError(targetId);
        }

        await this.audit.recordAdminAction(actorId, 'role.grant', targetId, { role: 'admin' });
        return updated;
    }

    async revokeAdmin(actorId: string, targetId: string): Promise<User> {
        await this.assertCan(actorId, 'role.grant');

        const target = await this.requireUser(targetId);
        if (target.role === 'super_admin' || this.configuredSuperAdmins.has(targetId)) {
            throw new ForbiddenError('Super admin roles cannot be revoked from the bot');
        }

        const updated = await this.users.setRole(targetId, 'none');
        if (!updated) {
            throw new NotFoundError('User', targetId);
        }

        await this.audit.recordAdminAction(actorId, 'role.revoke', targetId, { previousRole: target.role });
        return updated;
    }

    /** Chat ids of everyone who should receive admin-channel notifications. */
    async adminChatIds(): Promise<number[]> {
        const admins = await this.users.findByRoles(['admin', 'super_admin']);
        const chatIds = new Set<number>(admins.map(admin => admin.telegramChatId));
        for (const id of this.configuredSuperAdmins) {
            chatIds.add(parseInt(id, 10));
        }
        return Array.from(chatIds);
    }

    private async requireUser(userId: string): Promise<User> {
        const user = await this.users.findById(userId);
        if (!user) {
            throw new NotFoundError('User', userId);
        }
        return user;
    }
}
