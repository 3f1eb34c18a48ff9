import { ConnectionOptions, Queue } from 'bullmq';
import { NOTIFICATION_QUEUE_NAME, NotificationJobData, NotificationQueue, toJobData } from './NotificationQueue';
import { Notification } from '../types/Notification';
import { createLogger } from '../utils/logger';

const log = createLogger('notification-queue');

export const BACKOFF_BASE_DELAY_MS = 5000;

/**
 * Builds BullMQ connection options from a redis:// or rediss:// URL.
 */
export const connectionFromUrl = (redisUrl: string): ConnectionOptions => {
    const url = new URL(redisUrl);
    const db = url.pathname.replace(/^\//, '');
    return {
        host: url.hostname,
        port: Number(url.port) || 6379,
        username: url.username || undefined,
        password: url.password || undefined,
        db: db ? parseInt(db, 10) : 0,
        tls: url.protocol === 'rediss:' ? {} : undefined,
        maxRetriesPerRequest: null
    };
};

export class BullNotificationQueue implements NotificationQueue {
    private queue: Queue<NotificationJobData>;
    private maxAttempts: number;

    constructor(connection: ConnectionOptions, maxAttempts: number) {
        this.queue = new Queue<NotificationJobData>(NOTIFICATION_QUEUE_NAME, { connection });
        this.maxAttempts = maxAttempts;
    }

    async add(notification: Notification): Promise<void> {
        // jobId doubles as the dedup key: re-enqueueing an outbox entry after a crash is a no-op
        await this.queue.add(notification.templateId, toJobData(notification), {
            jobId: notification.id,
            attempts: this.maxAttempts,
            backoff: { type: 'exponential', delay: BACKOFF_BASE_DELAY_MS },
            removeOnComplete: { count: 1000 },
            removeOnFail: { count: 5000 }
        });
        log.debug('Notification queued', { notificationId: notification.id, templateId: notification.templateId });
    }

    async close(): Promise<void> {
        await this.queue.close();
    }
}
