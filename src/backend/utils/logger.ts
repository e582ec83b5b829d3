/**
 * Structured console logger.
 *
 * Each event is written as one JSON line so logs from the server, the CLI and
 * background ingestion can be filtered by component.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

export interface LogFields {
    [key: string]: unknown;
}

export interface Logger {
    debug(event: string, fields?: LogFields): void;
    info(event: string, fields?: LogFields): void;
    warn(event: string, fields?: LogFields): void;
    error(event: string, fields?: LogFields): void;
}

let defaultLevel: LogLevel = 'info';

/**
 * Sets the level used by loggers created without an explicit one.
 */
export function setDefaultLogLevel(level: LogLevel): void {
    defaultLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(component: string, level?: LogLevel): Logger {
    function shouldLog(target: LogLevel): boolean {
        return LEVEL_ORDER[target] >= LEVEL_ORDER[level ?? defaultLevel];
    }

    function write(target: LogLevel, event: string, fields: LogFields = {}): void {
        if (!shouldLog(target)) {
            return;
        }

        const payload = {
            ts: new Date().toISOString(),
            level: target,
            component,
            event,
            ...fields,
        };

        const line = JSON.stringify(payload);
        if (target === 'error' || target === 'warn') {
            console.error(line);
        } else {
            console.log(line);
        }
    }

    return {
        debug: (event, fields) => write('debug', event, fields),
        info: (event, fields) => write('info', event, fields),
        warn: (event, fields) => write('warn', event, fields),
        error: (event, fields) => write('error', event, fields),
    };
}

/**
 * Log-friendly view of an error (message and name, no stack).
 */
export function errorFields(error: unknown): LogFields {
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        return { error: error.message, errorName: 'name' in error ? String(error.name) : 'Error' };
    }
    return { error: String(error) };
}
