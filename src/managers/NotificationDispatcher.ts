import { NotificationQueue } from '../queue/NotificationQueue';
import { Notification, NotificationTarget, NotificationTemplateId } from '../types/Notification';
import { StorageUnavailableError } from '../models/errors';
import { generateNotificationId } from '../models/utils';

export type EnqueueResult = 'accepted';

export const buildNotification = (
    target: NotificationTarget,
    templateId: NotificationTemplateId,
    params: Record<string, string>,
    createdAt: Date
): Notification => ({
    id: generateNotificationId(),
    target,
    templateId,
    params,
    createdAt
});

/**
 * Hands notifications to the external task queue. Delivery, retries and dead-lettering
 * belong to the queue's workers; this only reports that the work was accepted.
 */
export class NotificationDispatcher {
    private queue: NotificationQueue;

    constructor(queue: NotificationQueue) {
        this.queue = queue;
    }

    async enqueue(notification: Notification): Promise<EnqueueResult> {
        try {
            await this.queue.add(notification);
        } catch (error) {
            throw new StorageUnavailableError('notification enqueue', error);
        }
        return 'accepted';
    }
}
