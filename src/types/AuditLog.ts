export type AuditAction =
    | 'application.transition'
    | 'role.grant'
    | 'role.revoke'
    | 'user.block'
    | 'user.unblock';

export interface AuditLog {
    logId: string;
    adminId: string;
    action: AuditAction;
    targetId?: string;
    timestamp: Date;
    details?: Record<string, unknown>;
}
