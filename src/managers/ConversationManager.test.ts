import { Harness, TEST_FACILITY, createHarness } from '../testing/harness';
import { InboundEvent } from '../types/InboundEvent';
import { User } from '../types/User';
import { BlockedError, NotFoundError, StorageUnavailableError } from '../models/errors';
import { MESSAGES, askSport, confirmApplication, invalidSport } from '../texts/messages';

const USER_ID = '500';

describe('ConversationManager', () => {
    let h: Harness;

    const event = (partial: Partial<InboundEvent>): InboundEvent => ({
        userId: USER_ID,
        chatId: 500,
        displayName: 'tg name',
        type: 'text',
        timestamp: h.now(),
        ...partial
    });

    const text = (value: string) => event({ type: 'text', text: value });

    const currentUser = async (): Promise<User> => {
        const user = await h.users.findById(USER_ID);
        if (!user) {
            throw new Error('test user missing');
        }
        return user;
    };

    const register = async (input: InboundEvent) =>
        h.conversations.handleRegistration(await currentUser(), input, h.now());

    const flow = async (input: InboundEvent) =>
        h.conversations.handleFlowInput(await currentUser(), input, h.now());

    beforeEach(async () => {
        jest.clearAllMocks();
        h = createHarness();
        await h.users.getOrCreate({ id: USER_ID, telegramChatId: 500, displayName: 'tg name' }, h.now());
    });

    describe('registration', () => {
        test('walks from name to phone to completed', async () => {
            await expect(register(event({ type: 'command', command: 'start', args: [] }))).resolves.toEqual([
                { text: MESSAGES.welcome }
            ]);
            expect((await currentUser()).registrationState).toBe('started');

            await expect(register(text('  Anna Petrova '))).resolves.toEqual([
                { text: MESSAGES.askPhone, keyboard: { kind: 'request_contact' } }
            ]);
            expect((await currentUser()).registrationState).toBe('awaiting_phone');

            const replies = await register(text('8 (900) 123-45-67'));
            expect(replies).toEqual([{
                text: '✅ Registration complete, Anna Petrova!\n\nUse /apply <facilityId> to submit an application, or /help for all commands.',
                keyboard: { kind: 'remove' }
            }]);

            const user = await currentUser();
            expect(user).toMatchObject({ registrationState: 'completed', displayName: 'Anna Petrova', phone: '+79001234567' });
            expect(h.cache.has(`conversation:${USER_ID}`)).toBe(false);
        });

        test('re-prompts for an invalid name without advancing', async () => {
            await expect(register(text('A'))).resolves.toEqual([{ text: MESSAGES.askName }]);
            await expect(register(text('/apply fok-north'))).resolves.toEqual([{ text: MESSAGES.askName }]);
            await expect(register(event({ type: 'contact', phone: '+79001234567' }))).resolves.toEqual([{ text: MESSAGES.askName }]);

            expect((await currentUser()).registrationState).toBe('started');
        });

        test('an invalid phone re-prompts and leaves the user untouched', async () => {
            await register(text('Anna'));

            await expect(register(text('12345'))).resolves.toEqual([
                { text: MESSAGES.invalidPhone, keyboard: { kind: 'request_contact' } }
            ]);

            const user = await currentUser();
            expect(user.registrationState).toBe('awaiting_phone');
            expect(user.phone).toBeUndefined();
            expect(user.displayName).toBe('tg name');
        });

        test('accepts a shared contact', async () => {
            await register(text('Anna'));

            await register(event({ type: 'contact', phone: '+44 20 7946 0000' }));

            expect(await currentUser()).toMatchObject({ registrationState: 'completed', phone: '+442079460000' });
        });

        test('a contact without a phone is rejected', async () => {
            await register(text('Anna'));

            await expect(register(event({ type: 'contact' }))).resolves.toEqual([
                { text: MESSAGES.invalidPhone, keyboard: { kind: 'request_contact' } }
            ]);
        });

        test('restarts from the name step once the session has expired', async () => {
            await register(text('Anna'));
            h.advance(31 * 60 * 1000);

            await expect(register(text('+79001234567'))).resolves.toEqual([
                { text: MESSAGES.registrationRestarted, keyboard: { kind: 'remove' } }
            ]);

            const user = await currentUser();
            expect(user.registrationState).toBe('started');
            expect(user.phone).toBeUndefined();

            // The restarted flow expects a name again
            await expect(register(text('Boris'))).resolves.toEqual([
                { text: MESSAGES.askPhone, keyboard: { kind: 'request_contact' } }
            ]);
        });

        test('a stored session past its expiresAt is not resumed', async () => {
            await h.users.setRegistrationState(USER_ID, 'awaiting_phone');
            h.cache.seed(`conversation:${USER_ID}`, JSON.stringify({
                userId: USER_ID,
                flow: 'registration',
                step: 'awaiting_phone',
                scratch: { displayName: 'Stale Name' },
                expiresAt: new Date(h.now().getTime() - 1000).toISOString()
            }));

            await expect(register(text('+79001234567'))).resolves.toEqual([
                { text: MESSAGES.registrationRestarted, keyboard: { kind: 'remove' } }
            ]);
            expect((await currentUser()).registrationState).toBe('started');
        });

        test('a malformed session is discarded', async () => {
            h.cache.seed(`conversation:${USER_ID}`, '{"userId":"500","flow":"dancing"}');

            await expect(register(text('Anna'))).resolves.toEqual([
                { text: MESSAGES.askPhone, keyboard: { kind: 'request_contact' } }
            ]);
        });

        test('treats awaiting_name like started', async () => {
            await h.users.setRegistrationState(USER_ID, 'awaiting_name');

            await expect(register(text('Anna'))).resolves.toEqual([
                { text: MESSAGES.askPhone, keyboard: { kind: 'request_contact' } }
            ]);
        });
    });

    describe('submit application', () => {
        beforeEach(async () => {
            await h.users.completeRegistration(USER_ID, 'Anna Petrova', '+79001234567');
        });

        test('sport, confirmation, then a created application', async () => {
            await expect(h.conversations.startApplication(await currentUser(), TEST_FACILITY.id, h.now()))
                .resolves.toEqual([askSport(TEST_FACILITY)]);

            await expect(flow(event({ type: 'callback', data: 'sport:volleyball' })))
                .resolves.toEqual([confirmApplication(TEST_FACILITY, 'Volleyball')]);

            const replies = await flow(text('Yes'));
            expect(replies).toHaveLength(1);
            expect(replies?.[0].text).toContain('submitted!');

            const [application] = Array.from(h.applications.applications.values());
            expect(application).toMatchObject({ userId: USER_ID, facilityId: TEST_FACILITY.id, sport: 'Volleyball' });
            expect(h.cache.has(`conversation:${USER_ID}`)).toBe(false);
        });

        test('an unknown sport re-prompts without advancing', async () => {
            await h.conversations.startApplication(await currentUser(), TEST_FACILITY.id, h.now());

            await expect(flow(text('Curling'))).resolves.toEqual([
                { text: invalidSport(TEST_FACILITY) },
                askSport(TEST_FACILITY)
            ]);
            await expect(flow(text('flow:confirm'))).resolves.toEqual([
                { text: invalidSport(TEST_FACILITY) },
                askSport(TEST_FACILITY)
            ]);
            expect(h.applications.applications.size).toBe(0);
        });

        test('anything but a confirmation re-asks', async () => {
            await h.conversations.startApplication(await currentUser(), TEST_FACILITY.id, h.now());
            await flow(text('Swimming'));

            await expect(flow(text('maybe'))).resolves.toEqual([{ text: MESSAGES.askConfirmation }]);
            expect(h.applications.applications.size).toBe(0);
        });

        test('aborting discards the draft', async () => {
            await h.conversations.startApplication(await currentUser(), TEST_FACILITY.id, h.now());
            await flow(text('Swimming'));

            await expect(flow(event({ type: 'callback', data: 'flow:abort' }))).resolves.toEqual([
                { text: MESSAGES.applicationAborted }
            ]);
            expect(h.cache.has(`conversation:${USER_ID}`)).toBe(false);
            expect(h.applications.applications.size).toBe(0);
        });

        test('returns null when no flow is active', async () => {
            await expect(flow(text('hello'))).resolves.toBeNull();
        });

        test('an expired draft is reported', async () => {
            await h.conversations.startApplication(await currentUser(), TEST_FACILITY.id, h.now());
            h.cache.seed(`conversation:${USER_ID}`, JSON.stringify({
                userId: USER_ID,
                flow: 'submit_application',
                step: 'awaiting_confirmation',
                scratch: { facilityId: TEST_FACILITY.id, sport: 'Swimming' },
                expiresAt: new Date(h.now().getTime() - 1).toISOString()
            }));

            await expect(flow(text('yes'))).resolves.toEqual([{ text: MESSAGES.sessionExpired }]);
            expect(h.applications.applications.size).toBe(0);
        });

        test('cannot start for an unknown facility or a blocked user', async () => {
            await expect(h.conversations.startApplication(await currentUser(), 'fok-missing', h.now()))
                .rejects.toBeInstanceOf(NotFoundError);

            await h.users.setBlocked(USER_ID, true);
            await expect(h.conversations.startApplication(await currentUser(), TEST_FACILITY.id, h.now()))
                .rejects.toBeInstanceOf(BlockedError);
        });

        test('a caller error on submit drops the draft', async () => {
            await h.conversations.startApplication(await currentUser(), TEST_FACILITY.id, h.now());
            await flow(text('Swimming'));
            await h.users.setBlocked(USER_ID, true);

            await expect(flow(text('yes'))).rejects.toBeInstanceOf(BlockedError);
            expect(h.cache.has(`conversation:${USER_ID}`)).toBe(false);
        });

        test('a storage error on submit keeps the draft for a retry', async () => {
            await h.conversations.startApplication(await currentUser(), TEST_FACILITY.id, h.now());
            await flow(text('Swimming'));
            jest.spyOn(h.lifecycle, 'create').mockRejectedValueOnce(new StorageUnavailableError('application insert'));

            await expect(flow(text('yes'))).rejects.toBeInstanceOf(StorageUnavailableError);
            expect(h.cache.has(`conversation:${USER_ID}`)).toBe(true);

            const replies = await flow(text('yes'));
            expect(replies?.[0].text).toContain('submitted!');
        });
    });
});
