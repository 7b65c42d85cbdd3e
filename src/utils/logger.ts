import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger };

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LoggerSettings {
    level: LogLevel | 'silent';
    format: 'json' | 'pretty';
    redactSensitive: boolean;
}

const REDACTED_PATHS = [
    'req.headers.authorization',
    'req.headers.cookie',
    'password',
    'client_secret',
    '*.password',
    '*.client_secret',
    '*.clientSecret',
];

/**
 * Builds the process logger. The same instance is handed to Fastify and,
 * as child loggers, to the core services.
 */
export function createLogger(settings: LoggerSettings): Logger {
    const options: LoggerOptions = {
        level: settings.level,
        ...(settings.redactSensitive && {
            redact: { paths: REDACTED_PATHS, censor: '***REDACTED***' },
        }),
    };

    if (settings.format === 'pretty') {
        return pino({
            ...options,
            transport: {
                target: 'pino-pretty',
                options: { colorize: true, translateTime: 'SYS:standard' },
            },
        });
    }

    return pino(options);
}

function envLevel(): LoggerSettings['level'] {
    const level = process.env.LOG_LEVEL;
    switch (level) {
        case 'trace':
        case 'debug':
        case 'info':
        case 'warn':
        case 'error':
        case 'fatal':
        case 'silent':
            return level;
        default:
            return 'info';
    }
}

/** Default logger for modules constructed without one. */
export const logger = createLogger({
    level: envLevel(),
    format: 'json',
    redactSensitive: true,
});
