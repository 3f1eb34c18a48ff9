import { SharedCache } from './SharedCache';
import { ConversationSession } from '../types/Conversation';
import { parseConversationSession, ValidationError } from '../models/validation';
import { StorageUnavailableError } from '../models/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('conversation-store');

export type SessionLookup =
    | { state: 'absent' }
    | { state: 'expired'; session: ConversationSession }
    | { state: 'active'; session: ConversationSession };

/**
 * Keeps each user's dialog cursor in the shared cache so any replica can pick up
 * the next message. Entries carry their own expiry and are also TTL'd in the cache.
 */
export class ConversationStore {
    private cache: SharedCache;

    constructor(cache: SharedCache) {
        this.cache = cache;
    }

    async load(userId: string, now: Date): Promise<SessionLookup> {
        const raw = await this.guard('conversation read', () => this.cache.get(this.key(userId)));
        if (raw === null) {
            return { state: 'absent' };
        }

        let session: ConversationSession;
        try {
            session = parseConversationSession(raw);
        } catch (error) {
            if (!(error instanceof ValidationError)) {
                throw error;
            }
            log.warn('Discarding malformed conversation session', { userId, error: error.message });
            await this.delete(userId);
            return { state: 'absent' };
        }

        if (session.expiresAt.getTime() <= now.getTime()) {
            await this.delete(userId);
            return { state: 'expired', session };
        }

        return { state: 'active', session };
    }

    async save(session: ConversationSession, now: Date): Promise<void> {
        const ttlMs = session.expiresAt.getTime() - now.getTime();
        if (ttlMs <= 0) {
            await this.delete(session.userId);
            return;
        }

        const payload = JSON.stringify({ ...session, expiresAt: session.expiresAt.toISOString() });
        await this.guard('conversation write', () => this.cache.set(this.key(session.userId), payload, ttlMs));
    }

    async delete(userId: string): Promise<void> {
        await this.guard('conversation delete', () => this.cache.delete(this.key(userId)));
    }

    private key(userId: string): string {
        return `conversation:${userId}`;
    }

    private async guard<T>(operation: string, run: () => Promise<T>): Promise<T> {
        try {
            return await run();
        } catch (error) {
            if (error instanceof StorageUnavailableError) {
                throw error;
            }
            throw new StorageUnavailableError(operation, error);
        }
    }
}
