import { NotificationQueue } from '../queue/NotificationQueue';
import { Notification } from '../types/Notification';

/**
 * Records accepted notifications, de-duplicating on id the way queue job ids do.
 */
export class InMemoryNotificationQueue implements NotificationQueue {
    readonly jobs = new Map<string, Notification>();
    addCalls = 0;
    failWith: Error | null = null;

    async add(notification: Notification): Promise<void> {
        this.addCalls++;
        if (this.failWith) {
            throw this.failWith;
        }
        if (!this.jobs.has(notification.id)) {
            this.jobs.set(notification.id, structuredClone(notification));
        }
    }

    get notifications(): Notification[] {
        return Array.from(this.jobs.values());
    }
}
