import { contactEvent, displayNameOf, isPrivateChat, parseCommand, textEvent } from './BotHandler';

describe('BotHandler update mapping', () => {
    const from = { id: 42, first_name: 'Anna', last_name: 'Petrova', username: 'anna_p' };
    const at = new Date('2024-03-01T10:00:00.000Z');

    test('parseCommand strips the bot mention and lowercases the command', () => {
        expect(parseCommand('/Apply@facility_bot fok-north')).toEqual({ command: 'apply', args: ['fok-north'] });
        expect(parseCommand('  /accept  abc   2 ')).toEqual({ command: 'accept', args: ['abc', '2'] });
        expect(parseCommand('hello')).toBeNull();
        expect(parseCommand('/')).toBeNull();
    });

    test('only private chats are served', () => {
        expect(isPrivateChat({ type: 'private' })).toBe(true);
        expect(isPrivateChat({ type: 'group' })).toBe(false);
        expect(isPrivateChat({ type: 'supergroup' })).toBe(false);
        expect(isPrivateChat({ type: 'channel' })).toBe(false);
        expect(isPrivateChat(undefined)).toBe(false);
    });

    test('displayNameOf falls back to username and then the id', () => {
        expect(displayNameOf(from)).toBe('Anna Petrova');
        expect(displayNameOf({ id: 42, first_name: '', username: 'anna_p' })).toBe('anna_p');
        expect(displayNameOf({ id: 42, first_name: '' })).toBe('user42');
    });

    test('textEvent distinguishes commands from plain text', () => {
        expect(textEvent(from, 42, '/start', at)).toEqual({
            userId: '42',
            chatId: 42,
            displayName: 'Anna Petrova',
            timestamp: at,
            type: 'command',
            text: '/start',
            command: 'start',
            args: []
        });
        expect(textEvent(from, 42, 'Swimming', at)).toMatchObject({ type: 'text', text: 'Swimming' });
    });

    test('contactEvent keeps the phone only for the sender\'s own contact', () => {
        expect(contactEvent(from, 42, { phone_number: '+79001234567', user_id: 42 }, at).phone).toBe('+79001234567');
        expect(contactEvent(from, 42, { phone_number: '+79001234567', user_id: 7 }, at).phone).toBeUndefined();
        expect(contactEvent(from, 42, { phone_number: '+79001234567' }, at).phone).toBeUndefined();
    });
});
