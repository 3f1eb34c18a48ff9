export type NotificationTemplateId =
    | 'application.created'
    | 'application.status_changed'
    | 'application.cancelled_by_user';

export type NotificationTarget =
    | { kind: 'user'; userId: string; chatId: number }
    | { kind: 'admins' };

export interface Notification {
    id: string;
    target: NotificationTarget;
    templateId: NotificationTemplateId;
    params: Record<string, string>;
    createdAt: Date;
}

export interface NotificationFailure {
    notificationId: string;
    templateId: NotificationTemplateId;
    target: NotificationTarget;
    error: string;
    attempts: number;
    failedAt: Date;
}
