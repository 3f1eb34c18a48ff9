import { NotificationFailureStore } from '../database/Stores';
import { Notification } from '../types/Notification';
import { renderNotification } from '../texts/notifications';
import { AdminAuthorization } from './AdminAuthorization';
import { createLogger, errorMeta } from '../utils/logger';

const log = createLogger('notification-delivery');

export interface MessageSender {
    sendMessage(chatId: number, text: string): Promise<void>;
}

export class NotificationDelivery {
    private sender: MessageSender;
    private authorization: AdminAuthorization;
    private failures: NotificationFailureStore;
    private adminChatId: number | null;

    constructor(
        sender: MessageSender,
        authorization: AdminAuthorization,
        failures: NotificationFailureStore,
        adminChatId: number | null
    ) {
        this.sender = sender;
        this.authorization = authorization;
        this.failures = failures;
        this.adminChatId = adminChatId;
    }

    async resolveRecipients(notification: Notification): Promise<number[]> {
        if (notification.target.kind === 'user') {
            return [notification.target.chatId];
        }

        const chatIds = new Set(await this.authorization.adminChatIds());
        if (this.adminChatId !== null) {
            chatIds.add(this.adminChatId);
        }
        return Array.from(chatIds);
    }

    /**
     * Send a notification to every recipient. Throws when nothing was delivered so the
     * queue retries; a partial admin broadcast counts as delivered.
     */
    async deliver(notification: Notification): Promise<number> {
        const recipients = await this.resolveRecipients(notification);
        if (recipients.length === 0) {
            log.warn('Notification has no recipients', { notificationId: notification.id, templateId: notification.templateId });
            return 0;
        }

        const text = renderNotification(notification);
        const errors: unknown[] = [];
        let delivered = 0;

        for (const chatId of recipients) {
            try {
                await this.sender.sendMessage(chatId, text);
                delivered++;
            } catch (error) {
                errors.push(error);
                log.warn('Failed to send notification', { notificationId: notification.id, chatId, ...errorMeta(error) });
            }
        }

        if (delivered === 0) {
            const [first] = errors;
            throw first instanceof Error ? first : new Error(`Notification ${notification.id} could not be delivered`);
        }

        log.debug('Notification delivered', { notificationId: notification.id, delivered, failed: errors.length });
        return delivered;
    }

    async recordFailure(notification: Notification, error: Error, attempts: number): Promise<void> {
        log.error('Notification delivery abandoned', {
            notificationId: notification.id,
            templateId: notification.templateId,
            attempts,
            error: error.message
        });

        await this.failures.record({
            notificationId: notification.id,
            templateId: notification.templateId,
            target: notification.target,
            error: error.message,
            attempts,
            failedAt: new Date()
        });
    }
}
