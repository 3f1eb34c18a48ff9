import { Notification, NotificationTarget, NotificationTemplateId } from '../types/Notification';

export const NOTIFICATION_QUEUE_NAME = 'notifications';

/** Wire shape of a queued notification; dates travel as ISO strings. */
export interface NotificationJobData {
    id: string;
    target: NotificationTarget;
    templateId: NotificationTemplateId;
    params: Record<string, string>;
    createdAt: string;
}

/** External task queue as seen by the engine: accepted for delivery, nothing more. */
export interface NotificationQueue {
    add(notification: Notification): Promise<void>;
}

export const toJobData = (notification: Notification): NotificationJobData => ({
    id: notification.id,
    target: notification.target,
    templateId: notification.templateId,
    params: notification.params,
    createdAt: notification.createdAt.toISOString()
});

export const fromJobData = (data: NotificationJobData): Notification => ({
    id: data.id,
    target: data.target,
    templateId: data.templateId,
    params: data.params,
    createdAt: new Date(data.createdAt)
});
