import { Notification } from '../types/Notification';
import { ApplicationStatus } from '../types/Application';
import { isValidApplicationStatus } from '../models/validation';
import { STATUS_CHANGE_MESSAGES, STATUS_LABELS } from './labels';

const param = (notification: Notification, key: string): string => notification.params[key] ?? '—';

const statusParam = (notification: Notification): ApplicationStatus | null => {
    const status = notification.params.status;
    return isValidApplicationStatus(status) ? status : null;
};

/**
 * Renders the text delivered for a queued notification.
 */
export const renderNotification = (notification: Notification): string => {
    switch (notification.templateId) {
        case 'application.created':
            return [
                `🆕 New application ${param(notification, 'applicationRef')}`,
                '',
                `👤 ${param(notification, 'applicantName')} (${param(notification, 'applicantPhone')})`,
                `🏢 ${param(notification, 'facilityName')}`,
                `📍 ${param(notification, 'facilityDistrict')}`,
                `🏅 ${param(notification, 'sport')}`
            ].join('\n');

        case 'application.status_changed': {
            const status = statusParam(notification);
            const headline = status ? STATUS_CHANGE_MESSAGES[status] : `Status changed to ${param(notification, 'status')}.`;
            return [
                `📋 Application ${param(notification, 'applicationRef')} update`,
                '',
                headline,
                '',
                `🏢 ${param(notification, 'facilityName')}`,
                `📊 ${status ? STATUS_LABELS[status] : param(notification, 'status')}`,
                '',
                'See /my_applications for details.'
            ].join('\n');
        }

        case 'application.cancelled_by_user':
            return [
                `❌ Application ${param(notification, 'applicationRef')} cancelled by the applicant`,
                '',
                `👤 ${param(notification, 'applicantName')}`,
                `🏢 ${param(notification, 'facilityName')}`,
                `📍 ${param(notification, 'facilityDistrict')}`
            ].join('\n');
    }
};
