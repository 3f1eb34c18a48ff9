import { SharedCache } from '../cache/SharedCache';
import { ThrottledError } from '../models/errors';
import { createLogger, errorMeta } from '../utils/logger';

const log = createLogger('rate-limiter');

export type AdmissionResult =
    | { allowed: true }
    | { allowed: false; retryAfterSeconds: number; notify: boolean };

export interface RateLimiterOptions {
    limit: number;
    windowSeconds: number;
}

/**
 * Fixed-window rate limiter shared by every replica through the cache.
 * The count for (user, window) is incremented atomically in the cache; nothing is held in memory.
 */
export class RateLimiter {
    private cache: SharedCache;
    private limit: number;
    private windowSeconds: number;

    constructor(cache: SharedCache, options: RateLimiterOptions) {
        if (options.limit < 1 || options.windowSeconds < 1) {
            throw new Error('Rate limit and window must be at least 1');
        }
        this.cache = cache;
        this.limit = options.limit;
        this.windowSeconds = options.windowSeconds;
    }

    async admit(userId: string, now: Date): Promise<AdmissionResult> {
        const windowMs = this.windowSeconds * 1000;
        const windowStart = Math.floor(now.getTime() / windowMs);
        const key = `rate_limit:${userId}:${windowStart}`;

        let count: number;
        try {
            count = await this.cache.incrementWithExpiry(key, this.windowSeconds);
        } catch (error) {
            log.warn('rate_limiter.fail_open', { userId, ...errorMeta(error) });
            return { allowed: true };
        }

        if (count <= this.limit) {
            return { allowed: true };
        }

        const windowEndMs = (windowStart + 1) * windowMs;
        const retryAfterSeconds = Math.max(1, Math.ceil((windowEndMs - now.getTime()) / 1000));

        let notify = false;
        try {
            notify = await this.cache.setIfAbsent(`${key}:warned`, '1', this.windowSeconds);
        } catch (error) {
            log.warn('rate_limiter.warn_marker_unavailable', { userId, ...errorMeta(error) });
        }

        if (notify) {
            log.warn('Rate limit exceeded', { userId, count, limit: this.limit });
        }

        return { allowed: false, retryAfterSeconds, notify };
    }

    async assertAdmitted(userId: string, now: Date): Promise<void> {
        const admission = await this.admit(userId, now);
        if (!admission.allowed) {
            throw new ThrottledError(admission.retryAfterSeconds, admission.notify);
        }
    }
}
