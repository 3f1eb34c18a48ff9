import {
    BlockedError,
    ConflictError,
    EngineError,
    InvalidTransitionError,
    StorageUnavailableError,
    ThrottledError,
    isEngineError
} from '../models/errors';
import { MESSAGES, cooldownNotice, errorMessage, helpText } from './messages';

describe('errorMessage', () => {
    test('maps engine errors to user-facing text', () => {
        expect(errorMessage(new BlockedError('42'))).toBe('🚫 Your account is blocked. Please contact the administration.');
        expect(errorMessage(new ThrottledError(12))).toBe(cooldownNotice(12));
        expect(errorMessage(new StorageUnavailableError('user read', new Error('timeout')))).toBe(MESSAGES.retryLater);
        expect(errorMessage(new InvalidTransitionError('cancelled', 'accepted'))).toBe(
            'This application cannot move from "❌ Cancelled" to "✅ Accepted".'
        );
    });

    test('retryable flags follow the error kind', () => {
        expect(new StorageUnavailableError('user read').retryable).toBe(true);
        expect(new ThrottledError(5).retryable).toBe(true);
        expect(new ConflictError('app-1').retryable).toBe(false);
        expect(new StorageUnavailableError('user read', new Error('timeout')).message).toBe(
            'Storage unavailable during user read: timeout'
        );
    });

    test('isEngineError only matches engine errors', () => {
        expect(isEngineError(new ConflictError('app-1'))).toBe(true);
        expect(isEngineError(new EngineError('NOT_FOUND', 'missing'))).toBe(true);
        expect(isEngineError(new Error('boom'))).toBe(false);
    });
});

describe('helpText', () => {
    test('shows admin and super admin sections by role', () => {
        expect(helpText('none')).not.toContain('🛠 Admin');
        expect(helpText('admin')).toContain('🛠 Admin');
        expect(helpText('super_admin')).toContain('/grant_admin');
        expect(helpText('admin')).not.toContain('/grant_admin');
    });
});
