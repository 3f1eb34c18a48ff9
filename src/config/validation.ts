import { AppConfig } from './Config';

const requireAtLeast = (value: number, min: number, name: string): void => {
    if (!Number.isInteger(value) || value < min) {
        throw new Error(`${name} must be an integer of at least ${min}`);
    }
};

export function validateConfig(config: AppConfig): void {
    // Telegram bot tokens look like <numeric bot id>:<secret>
    if (!/^\d+:[A-Za-z0-9_-]+$/.test(config.botToken)) {
        throw new Error('Invalid BOT_TOKEN format. Expected <bot id>:<secret>');
    }

    if (!config.mongodbUri.startsWith('mongodb://') && !config.mongodbUri.startsWith('mongodb+srv://')) {
        throw new Error('Invalid MONGODB_URI format. Must start with mongodb:// or mongodb+srv://');
    }

    if (!config.redisUrl.startsWith('redis://') && !config.redisUrl.startsWith('rediss://')) {
        throw new Error('Invalid REDIS_URL format. Must start with redis:// or rediss://');
    }

    requireAtLeast(config.rateLimitRequests, 1, 'RATE_LIMIT_REQUESTS');
    requireAtLeast(config.rateLimitWindowSeconds, 1, 'RATE_LIMIT_WINDOW');
    requireAtLeast(config.conversationTtlMinutes, 1, 'CONVERSATION_TTL_MINUTES');
    requireAtLeast(config.transitionMaxAttempts, 1, 'TRANSITION_MAX_ATTEMPTS');
    requireAtLeast(config.notificationMaxAttempts, 1, 'NOTIFICATION_MAX_ATTEMPTS');
    requireAtLeast(config.outboxRelayIntervalSeconds, 1, 'OUTBOX_RELAY_INTERVAL_SECONDS');
    requireAtLeast(config.maxItemsPerPage, 1, 'MAX_ITEMS_PER_PAGE');

    if (config.adminChatId === 0) {
        throw new Error('ADMIN_CHAT_ID must be a non-zero integer');
    }

    for (const adminId of config.superAdminIds) {
        if (!Number.isInteger(adminId) || adminId <= 0) {
            throw new Error('All SUPER_ADMIN_IDS must be positive integers');
        }
    }
}
