export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

const levels: Record<LogLevel, number> = {
    error: 0,
    warn: 1,
    info: 2,
    debug: 3
};

let currentLevel: LogLevel = 'info';

type LogMeta = Record<string, unknown>;

export interface Logger {
    info: (message: string, meta?: LogMeta) => void;
    warn: (message: string, meta?: LogMeta) => void;
    error: (message: string, meta?: LogMeta) => void;
    debug: (message: string, meta?: LogMeta) => void;
}

const formatMessage = (scope: string | undefined, message: string, meta?: LogMeta): string => {
    const prefix = scope ? `[${scope}] ${message}` : message;
    if (!meta || Object.keys(meta).length === 0) {
        return prefix;
    }
    return `${prefix} | ${JSON.stringify(meta, errorReplacer)}`;
};

// Errors serialize to {} by default
function errorReplacer(_key: string, value: unknown): unknown {
    if (value instanceof Error) {
        return { name: value.name, message: value.message };
    }
    return value;
}

const enabled = (level: LogLevel): boolean => levels[currentLevel] >= levels[level];

const createLogger = (scope?: string): Logger => ({
    info: (message, meta) => {
        if (enabled('info')) {
            console.log(formatMessage(scope, message, meta));
        }
    },
    warn: (message, meta) => {
        if (enabled('warn')) {
            console.warn(formatMessage(scope, message, meta));
        }
    },
    error: (message, meta) => {
        console.error(formatMessage(scope, message, meta));
    },
    debug: (message, meta) => {
        if (enabled('debug')) {
            console.debug(formatMessage(scope, message, meta));
        }
    }
});

export const logger = {
    ...createLogger(),
    setLevel: (level: LogLevel) => {
        currentLevel = level;
    },
    child: (scope: string): Logger => createLogger(scope)
};
