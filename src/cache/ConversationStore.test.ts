import { ConversationStore } from './ConversationStore';
import { InMemorySharedCache } from '../testing/InMemorySharedCache';
import { StorageUnavailableError } from '../models/errors';
import { ConversationSession } from '../types/Conversation';

describe('ConversationStore', () => {
    const start = new Date('2024-03-01T10:00:00.000Z').getTime();
    let clock: number;
    let cache: InMemorySharedCache;
    let store: ConversationStore;

    const session = (minutes: number): ConversationSession => ({
        userId: '42',
        flow: 'submit_application',
        step: 'awaiting_sport',
        scratch: { facilityId: 'fok-north' },
        expiresAt: new Date(start + minutes * 60_000)
    });

    beforeEach(() => {
        jest.clearAllMocks();
        clock = start;
        cache = new InMemorySharedCache(() => clock);
        store = new ConversationStore(cache);
    });

    test('saves and loads an active session', async () => {
        await store.save(session(30), new Date(clock));

        await expect(store.load('42', new Date(clock))).resolves.toEqual({ state: 'active', session: session(30) });
    });

    test('reports absent when nothing is stored', async () => {
        await expect(store.load('42', new Date(clock))).resolves.toEqual({ state: 'absent' });
    });

    test('a session past its expiry is reported once and removed', async () => {
        cache.seed('conversation:42', JSON.stringify({ ...session(30), expiresAt: session(30).expiresAt.toISOString() }));
        const later = new Date(start + 31 * 60_000);

        await expect(store.load('42', later)).resolves.toEqual({ state: 'expired', session: session(30) });
        expect(cache.has('conversation:42')).toBe(false);
        await expect(store.load('42', later)).resolves.toEqual({ state: 'absent' });
    });

    test('the cache TTL follows the session expiry', async () => {
        await store.save(session(30), new Date(clock));

        clock = start + 30 * 60_000;
        expect(cache.has('conversation:42')).toBe(false);
    });

    test('saving an already expired session deletes it', async () => {
        await store.save(session(30), new Date(clock));
        await store.save(session(-1), new Date(clock));

        expect(cache.has('conversation:42')).toBe(false);
    });

    test('malformed entries are discarded', async () => {
        cache.seed('conversation:42', '{"userId":"42"}');

        await expect(store.load('42', new Date(clock))).resolves.toEqual({ state: 'absent' });
        expect(cache.has('conversation:42')).toBe(false);
        expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('Discarding malformed conversation session'));
    });

    test('cache failures surface as StorageUnavailableError', async () => {
        cache.failWith = new Error('connection refused');

        await expect(store.load('42', new Date(clock))).rejects.toBeInstanceOf(StorageUnavailableError);
        await expect(store.save(session(30), new Date(clock))).rejects.toBeInstanceOf(StorageUnavailableError);
    });
});
