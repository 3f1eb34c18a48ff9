import Redis from 'ioredis';
import { createLogger } from '../utils/logger';

const log = createLogger('redis');

/**
 * Creates the shared Redis client. Commands fail fast instead of queueing while
 * disconnected so the rate limiter can fail open.
 */
export const createRedisClient = (redisUrl: string): Redis => {
    const client = new Redis(redisUrl, {
        maxRetriesPerRequest: 1,
        enableOfflineQueue: false,
        lazyConnect: true,
        retryStrategy: times => Math.min(times * 200, 5000)
    });

    client.on('connect', () => {
        log.info('Redis connected');
    });

    client.on('error', (error: Error) => {
        log.error('Redis connection error', { error: error.message });
    });

    client.on('close', () => {
        log.warn('Redis connection closed');
    });

    return client;
};

export const connectRedis = async (client: Redis): Promise<void> => {
    await client.connect();
    await client.ping();
};
