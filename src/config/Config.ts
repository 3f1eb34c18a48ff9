import dotenv from 'dotenv';
import { LogLevel } from '../utils/logger';
import { validateConfig } from './validation';

// Load environment variables
dotenv.config();

export interface AppConfig {
    botToken: string;
    mongodbUri: string;
    mongodbDbName: string;
    redisUrl: string;
    nodeEnv: string;
    rateLimitRequests: number;
    rateLimitWindowSeconds: number;
    conversationTtlMinutes: number;
    transitionMaxAttempts: number;
    notificationMaxAttempts: number;
    outboxRelayIntervalSeconds: number;
    maxItemsPerPage: number;
    adminChatId: number | null;
    superAdminIds: number[];
    logLevel: LogLevel;
}

const parseIdList = (raw: string | undefined): number[] => {
    if (!raw) {
        return [];
    }
    return raw
        .split(',')
        .map(id => id.trim())
        .filter(id => /^\d+$/.test(id))
        .map(id => parseInt(id, 10));
};

const readRequired = (env: NodeJS.ProcessEnv, name: string): string => {
    const value = env[name];
    if (!value) {
        throw new Error(`Required environment variable ${name} is not set`);
    }
    return value;
};

export class Config {
    private static instance: AppConfig | undefined;

    public static getInstance(): AppConfig {
        if (!Config.instance) {
            Config.instance = Config.loadConfig();
        }
        return Config.instance;
    }

    public static reset(): void {
        Config.instance = undefined;
    }

    public static loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
        const botToken = readRequired(env, 'BOT_TOKEN');
        const mongodbUri = readRequired(env, 'MONGODB_URI');

        const dbNameFromUri = (() => {
            try {
                const url = new URL(mongodbUri);
                const name = url.pathname?.replace(/^\//, '');
                return name || undefined;
            } catch {
                return undefined;
            }
        })();

        const rawDbName = env.MONGODB_DB_NAME;
        const normalizedDbName = rawDbName?.includes('/')
            ? rawDbName.split('/').pop()
            : rawDbName;

        const adminChatId = env.ADMIN_CHAT_ID ? parseInt(env.ADMIN_CHAT_ID, 10) : NaN;

        const config: AppConfig = {
            botToken,
            mongodbUri,
            mongodbDbName: normalizedDbName || dbNameFromUri || 'facility_bot',
            redisUrl: env.REDIS_URL || 'redis://localhost:6379/0',
            nodeEnv: env.NODE_ENV || 'development',
            rateLimitRequests: parseInt(env.RATE_LIMIT_REQUESTS || '30', 10),
            rateLimitWindowSeconds: parseInt(env.RATE_LIMIT_WINDOW || '60', 10),
            conversationTtlMinutes: parseInt(env.CONVERSATION_TTL_MINUTES || '30', 10),
            transitionMaxAttempts: parseInt(env.TRANSITION_MAX_ATTEMPTS || '3', 10),
            notificationMaxAttempts: parseInt(env.NOTIFICATION_MAX_ATTEMPTS || '3', 10),
            outboxRelayIntervalSeconds: parseInt(env.OUTBOX_RELAY_INTERVAL_SECONDS || '60', 10),
            maxItemsPerPage: parseInt(env.MAX_ITEMS_PER_PAGE || '10', 10),
            adminChatId: Number.isNaN(adminChatId) ? null : adminChatId,
            superAdminIds: parseIdList(env.SUPER_ADMIN_IDS),
            logLevel: parseLogLevel(env.LOG_LEVEL)
        };

        validateConfig(config);
        return config;
    }
}

const parseLogLevel = (raw: string | undefined): LogLevel => {
    const level = (raw || 'info').toLowerCase();
    if (level === 'error' || level === 'warn' || level === 'info' || level === 'debug') {
        return level;
    }
    throw new Error('LOG_LEVEL must be one of: error, warn, info, debug');
};

// Re-export validateConfig for convenience
export { validateConfig };
