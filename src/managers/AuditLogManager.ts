import { AuditLogStore } from '../database/Stores';
import { AuditAction, AuditLog } from '../types/AuditLog';
import { generateAuditLogId } from '../models/utils';
import { createLogger, errorMeta } from '../utils/logger';

const log = createLogger('audit-log');

export class AuditLogManager {
    private store: AuditLogStore;

    constructor(store: AuditLogStore) {
        this.store = store;
    }

    /**
     * Record an administrative action. The action itself has already been committed,
     * so a failed audit write is logged and reported as null instead of thrown.
     */
    async recordAdminAction(
        adminId: string,
        action: AuditAction,
        targetId?: string,
        details?: Record<string, unknown>
    ): Promise<AuditLog | null> {
        const entry: AuditLog = {
            logId: generateAuditLogId(),
            adminId,
            action,
            timestamp: new Date(),
            ...(targetId !== undefined ? { targetId } : {}),
            ...(details !== undefined ? { details } : {})
        };

        try {
            await this.store.insert(entry);
            return entry;
        } catch (error) {
            log.error('Failed to record admin action', { adminId, action, targetId, ...errorMeta(error) });
            return null;
        }
    }

    async getRecentAdminActions(limit = 25): Promise<AuditLog[]> {
        return this.store.recent(Math.max(1, limit));
    }
}
