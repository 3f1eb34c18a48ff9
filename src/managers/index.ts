// Export all manager components
export { RateLimiter } from './RateLimiter';
export { UserManager } from './UserManager';
export { AdminAuthorization, ROLE_CAPABILITIES, hasCapability } from './AdminAuthorization';
export { ApplicationLifecycleManager, ALLOWED_TRANSITIONS, isAllowedTransition, isTerminalStatus } from './ApplicationLifecycleManager';
export { ConversationManager } from './ConversationManager';
export { NotificationDispatcher, buildNotification } from './NotificationDispatcher';
export { NotificationDelivery } from './NotificationDelivery';
export { OutboxRelay } from './OutboxRelay';
export { AuditLogManager } from './AuditLogManager';

export type { AdmissionResult, RateLimiterOptions } from './RateLimiter';
export type { Capability } from './AdminAuthorization';
export type { ApplicationLifecycleOptions, ApplicationLifecycleDependencies } from './ApplicationLifecycleManager';
export type { ConversationOptions } from './ConversationManager';
export type { MessageSender } from './NotificationDelivery';
export type { RelayResult } from './OutboxRelay';
