export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type LogMeta = Record<string, unknown>;

export interface Logger {
    info(message: string, meta?: LogMeta): void;
    warn(message: string, meta?: LogMeta): void;
    error(message: string, meta?: LogMeta): void;
    debug(message: string, meta?: LogMeta): void;
}

const levels: Record<LogLevel, number> = {
    error: 0,
    warn: 1,
    info: 2,
    debug: 3
};

let currentLevel: LogLevel = 'info';

const formatMessage = (scope: string | undefined, message: string, meta?: LogMeta): string => {
    const prefixed = scope ? `[${scope}] ${message}` : message;
    if (!meta || Object.keys(meta).length === 0) {
        return prefixed;
    }
    return `${prefixed} | ${JSON.stringify(meta)}`;
};

const isEnabled = (level: LogLevel): boolean => levels[currentLevel] >= levels[level];

/**
 * Scoped logger; every component gets its own so replica logs can be grepped by scope.
 */
export const createLogger = (scope?: string): Logger => ({
    info: (message, meta) => {
        if (isEnabled('info')) {
            console.log(formatMessage(scope, message, meta));
        }
    },
    warn: (message, meta) => {
        if (isEnabled('warn')) {
            console.warn(formatMessage(scope, message, meta));
        }
    },
    error: (message, meta) => {
        console.error(formatMessage(scope, message, meta));
    },
    debug: (message, meta) => {
        if (isEnabled('debug')) {
            console.debug(formatMessage(scope, message, meta));
        }
    }
});

export const logger = {
    ...createLogger(),
    setLevel: (level: LogLevel) => {
        currentLevel = level;
    },
    getLevel: (): LogLevel => currentLevel
};

export const errorMeta = (error: unknown): LogMeta => {
    if (error instanceof Error) {
        return { error: error.message, name: error.name };
    }
    return { error: String(error) };
};
