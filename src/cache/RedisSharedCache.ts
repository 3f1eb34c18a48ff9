import Redis from 'ioredis';
import { SharedCache } from './SharedCache';
import { StorageUnavailableError } from '../models/errors';

export class RedisSharedCache implements SharedCache {
    private client: Redis;
    private keyPrefix: string;

    constructor(client: Redis, keyPrefix = 'facility-bot:') {
        this.client = client;
        this.keyPrefix = keyPrefix;
    }

    async incrementWithExpiry(key: string, ttlSeconds: number): Promise<number> {
        const results = await this.client
            .multi()
            .incr(this.prefixed(key))
            .expire(this.prefixed(key), ttlSeconds)
            .exec();

        if (!results) {
            throw new StorageUnavailableError('cache increment');
        }

        const [incrError, count] = results[0];
        if (incrError) {
            throw new StorageUnavailableError('cache increment', incrError);
        }
        if (typeof count !== 'number') {
            throw new StorageUnavailableError('cache increment');
        }
        return count;
    }

    async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
        const result = await this.client.set(this.prefixed(key), value, 'EX', ttlSeconds, 'NX');
        return result === 'OK';
    }

    async get(key: string): Promise<string | null> {
        return this.client.get(this.prefixed(key));
    }

    async set(key: string, value: string, ttlMs: number): Promise<void> {
        await this.client.set(this.prefixed(key), value, 'PX', Math.max(1, Math.ceil(ttlMs)));
    }

    async delete(key: string): Promise<void> {
        await this.client.del(this.prefixed(key));
    }

    private prefixed(key: string): string {
        return `${this.keyPrefix}${key}`;
    }
}
