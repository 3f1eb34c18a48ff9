import { ApplicationStatus } from '../types/Application';

export const STATUS_LABELS: Record<ApplicationStatus, string> = {
    pending: '⏳ Pending review',
    accepted: '✅ Accepted',
    transferred: '📤 Transferred to the facility',
    completed: '🎉 Completed',
    cancelled: '❌ Cancelled'
};

// Wording the applicant sees when their application moves to a new status
export const STATUS_CHANGE_MESSAGES: Record<ApplicationStatus, string> = {
    pending: 'Your application is waiting for review.',
    accepted: 'Your application has been accepted!',
    transferred: 'Your application has been passed to the facility for processing.',
    completed: 'Your application is complete. You are welcome to visit the facility!',
    cancelled: 'Your application has been cancelled.'
};

// Inline button captions for moving an application to each status
export const ACTION_LABELS: Record<ApplicationStatus, string> = {
    pending: 'Reopen',
    accepted: '✅ Accept',
    transferred: '📤 Transfer',
    completed: '🎉 Complete',
    cancelled: '❌ Decline'
};
