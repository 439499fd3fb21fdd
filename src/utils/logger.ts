// src/utils/logger.ts

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
    threshold = level;
}

export interface Logger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

function write(level: LogLevel, scope: string, message: string, data?: Record<string, unknown>) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
    const line = JSON.stringify({ time: new Date().toISOString(), level, scope, message, ...data });
    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);
}

export function createLogger(scope: string): Logger {
    return {
        debug: (message, data) => write('debug', scope, message, data),
        info: (message, data) => write('info', scope, message, data),
        warn: (message, data) => write('warn', scope, message, data),
        error: (message, data) => write('error', scope, message, data),
    };
}
