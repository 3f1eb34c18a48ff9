// Utility functions for ID generation and paging
import { v4 as uuidv4 } from 'uuid';

export const generateApplicationId = (): string => {
    return `app_${uuidv4()}`;
};

export const generateNotificationId = (): string => {
    return `ntf_${uuidv4()}`;
};

export const generateAuditLogId = (): string => {
    return `audit_${uuidv4()}`;
};

// Short reference shown to people, e.g. "#3f9a1c"
export const shortApplicationRef = (applicationId: string): string => {
    return `#${applicationId.slice(-6)}`;
};

export const normalizePage = (page: number | undefined, pageSize: number): { page: number; skip: number; limit: number } => {
    const safePage = Number.isInteger(page) && page !== undefined && page > 0 ? page : 1;
    const safePageSize = Math.max(1, pageSize);
    return { page: safePage, skip: (safePage - 1) * safePageSize, limit: safePageSize };
};

// Collection name constants for MongoDB
export const COLLECTIONS = {
    USERS: 'users',
    FACILITIES: 'facilities',
    APPLICATIONS: 'applications',
    AUDIT_LOGS: 'audit_logs',
    NOTIFICATION_FAILURES: 'notification_failures'
} as const;

export type CollectionName = typeof COLLECTIONS[keyof typeof COLLECTIONS];
