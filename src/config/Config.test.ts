import { AppConfig, Config } from './Config';
import { validateConfig } from './validation';

describe('Config', () => {
    const env = {
        BOT_TOKEN: '123:test-token',
        MONGODB_URI: 'mongodb://localhost:27017/facility_test'
    };

    test('applies defaults for optional settings', () => {
        expect(Config.loadConfig(env)).toEqual({
            botToken: '123:test-token',
            mongodbUri: 'mongodb://localhost:27017/facility_test',
            mongodbDbName: 'facility_test',
            redisUrl: 'redis://localhost:6379/0',
            nodeEnv: 'development',
            rateLimitRequests: 30,
            rateLimitWindowSeconds: 60,
            conversationTtlMinutes: 30,
            transitionMaxAttempts: 3,
            notificationMaxAttempts: 3,
            outboxRelayIntervalSeconds: 60,
            maxItemsPerPage: 10,
            adminChatId: null,
            superAdminIds: [],
            logLevel: 'info'
        });
    });

    test('reads explicit settings', () => {
        const config = Config.loadConfig({
            ...env,
            MONGODB_DB_NAME: 'cluster0/facilities',
            SUPER_ADMIN_IDS: '900, 901,abc',
            ADMIN_CHAT_ID: '-1001',
            RATE_LIMIT_REQUESTS: '5',
            LOG_LEVEL: 'DEBUG'
        });

        expect(config.mongodbDbName).toBe('facilities');
        expect(config.superAdminIds).toEqual([900, 901]);
        expect(config.adminChatId).toBe(-1001);
        expect(config.rateLimitRequests).toBe(5);
        expect(config.logLevel).toBe('debug');
    });

    test('requires the bot token and database URI', () => {
        expect(() => Config.loadConfig({ MONGODB_URI: env.MONGODB_URI })).toThrow('BOT_TOKEN is not set');
        expect(() => Config.loadConfig({ BOT_TOKEN: env.BOT_TOKEN })).toThrow('MONGODB_URI is not set');
    });

    test('rejects an unknown log level', () => {
        expect(() => Config.loadConfig({ ...env, LOG_LEVEL: 'verbose' })).toThrow('LOG_LEVEL must be one of');
    });

    describe('validateConfig', () => {
        let valid: AppConfig;

        beforeEach(() => {
            valid = Config.loadConfig(env);
        });

        test.each<[Partial<AppConfig>, string]>([
            [{ botToken: 'not-a-token' }, 'Invalid BOT_TOKEN format'],
            [{ mongodbUri: 'postgres://localhost' }, 'Invalid MONGODB_URI format'],
            [{ redisUrl: 'localhost:6379' }, 'Invalid REDIS_URL format'],
            [{ rateLimitRequests: 0 }, 'RATE_LIMIT_REQUESTS must be an integer of at least 1'],
            [{ transitionMaxAttempts: Number.NaN }, 'TRANSITION_MAX_ATTEMPTS must be an integer of at least 1'],
            [{ adminChatId: 0 }, 'ADMIN_CHAT_ID must be a non-zero integer'],
            [{ superAdminIds: [0] }, 'All SUPER_ADMIN_IDS must be positive integers']
        ])('rejects %o', (override, message) => {
            expect(() => validateConfig({ ...valid, ...override })).toThrow(message);
        });
    });
});
