// src/utils/logger.ts

export type LogLevel = 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
    info: 0,
    warn: 1,
    error: 2,
    silent: 3
};

function isLogLevel(value: string | undefined): value is LogLevel {
    return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Level named by a raw setting, or 'info' when it names none
 */
export function parseLogLevel(value: string | undefined): LogLevel {
    return isLogLevel(value) ? value : 'info';
}

let currentLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

export function getLogLevel(): LogLevel {
    return currentLevel;
}

function enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function stamp(message: string): string {
    return `[${new Date().toISOString()}] ${message}`;
}

/**
 * Console logger with ISO timestamp prefix
 */
export const logger = {
    info(message: string, ...meta: unknown[]): void {
        if (enabled('info')) {
            console.log(stamp(message), ...meta);
        }
    },
    warn(message: string, ...meta: unknown[]): void {
        if (enabled('warn')) {
            console.warn(stamp(message), ...meta);
        }
    },
    error(message: string, ...meta: unknown[]): void {
        if (enabled('error')) {
            console.error(stamp(message), ...meta);
        }
    }
};
