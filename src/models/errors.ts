import { ApplicationStatus } from '../types/Application';

export type EngineErrorCode =
    | 'UNREGISTERED'
    | 'BLOCKED'
    | 'INVALID_TRANSITION'
    | 'FORBIDDEN'
    | 'CONFLICT'
    | 'THROTTLED'
    | 'STORAGE_UNAVAILABLE'
    | 'NOT_FOUND'
    | 'INVALID_INPUT';

/**
 * Base class for every failure the engine reports to its callers.
 * `retryable` tells the caller whether repeating the same call may succeed.
 */
export class EngineError extends Error {
    readonly code: EngineErrorCode;
    readonly retryable: boolean;

    constructor(code: EngineErrorCode, message: string, retryable = false) {
        super(message);
        this.name = 'EngineError';
        this.code = code;
        this.retryable = retryable;
    }
}

export class UnregisteredError extends EngineError {
    constructor(userId: string) {
        super('UNREGISTERED', `User ${userId} has not completed registration`);
        this.name = 'UnregisteredError';
    }
}

export class BlockedError extends EngineError {
    constructor(userId: string) {
        super('BLOCKED', `User ${userId} is blocked`);
        this.name = 'BlockedError';
    }
}

export class InvalidTransitionError extends EngineError {
    readonly from: ApplicationStatus;
    readonly to: ApplicationStatus;

    constructor(from: ApplicationStatus, to: ApplicationStatus) {
        super('INVALID_TRANSITION', `Cannot move an application from ${from} to ${to}`);
        this.name = 'InvalidTransitionError';
        this.from = from;
        this.to = to;
    }
}

export class ForbiddenError extends EngineError {
    constructor(message: string) {
        super('FORBIDDEN', message);
        this.name = 'ForbiddenError';
    }
}

export class ConflictError extends EngineError {
    constructor(applicationId: string) {
        super('CONFLICT', `Application ${applicationId} was modified concurrently`);
        this.name = 'ConflictError';
    }
}

export class ThrottledError extends EngineError {
    readonly retryAfterSeconds: number;
    /** True for the first throttled call in a window, which gets the cooldown notice. */
    readonly notify: boolean;

    constructor(retryAfterSeconds: number, notify = true) {
        super('THROTTLED', `Too many requests, retry in ${retryAfterSeconds}s`, true);
        this.name = 'ThrottledError';
        this.retryAfterSeconds = retryAfterSeconds;
        this.notify = notify;
    }
}

export class StorageUnavailableError extends EngineError {
    constructor(operation: string, cause?: unknown) {
        const reason = cause instanceof Error ? `: ${cause.message}` : '';
        super('STORAGE_UNAVAILABLE', `Storage unavailable during ${operation}${reason}`, true);
        this.name = 'StorageUnavailableError';
    }
}

export class NotFoundError extends EngineError {
    constructor(entity: string, id: string) {
        super('NOT_FOUND', `${entity} not found: ${id}`);
        this.name = 'NotFoundError';
    }
}

export class InvalidInputError extends EngineError {
    constructor(message: string) {
        super('INVALID_INPUT', message);
        this.name = 'InvalidInputError';
    }
}

export const isEngineError = (error: unknown): error is EngineError => error instanceof EngineError;
