/**
 * @fileoverview Structured Logging Module
 * Provides configurable logging with log levels and production safety.
 * In production mode, DEBUG and INFO logs are suppressed.
 */

import { ENV_KEYS } from './constants.js';

/**
 * Log levels in order of severity
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    NONE = 4,
}

/**
 * Log level names for display
 */
const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
    [LogLevel.DEBUG]: 'DEBUG',
    [LogLevel.INFO]: 'INFO',
    [LogLevel.WARN]: 'WARN',
    [LogLevel.ERROR]: 'ERROR',
    [LogLevel.NONE]: 'NONE',
};

/**
 * Logger configuration
 */
interface LoggerConfig {
    /** Minimum log level to output */
    minLevel: LogLevel;
    /** Whether to include timestamps in output */
    timestamps: boolean;
    /** Whether to include the module name in output */
    showModule: boolean;
}

/**
 * Resolves a level name such as "warn" to a LogLevel.
 */
export function parseLogLevel(name: string | undefined): LogLevel | null {
    switch (name?.trim().toUpperCase()) {
        case 'DEBUG':
            return LogLevel.DEBUG;
        case 'INFO':
            return LogLevel.INFO;
        case 'WARN':
            return LogLevel.WARN;
        case 'ERROR':
            return LogLevel.ERROR;
        case 'NONE':
            return LogLevel.NONE;
        default:
            return null;
    }
}

/**
 * Default configuration based on environment
 */
const getDefaultConfig = (): LoggerConfig => {
    const isDebug = process.env[ENV_KEYS.DEBUG] === 'true';
    const isProduction = process.env.NODE_ENV === 'production';
    const explicitLevel = parseLogLevel(process.env[ENV_KEYS.LOG_LEVEL]);

    let minLevel = isProduction ? LogLevel.WARN : LogLevel.INFO;
    if (explicitLevel !== null) minLevel = explicitLevel;
    if (isDebug) minLevel = LogLevel.DEBUG;

    return {
        minLevel,
        timestamps: true,
        showModule: true,
    };
};

/**
 * Global logger configuration
 */
let config: LoggerConfig = getDefaultConfig();

/**
 * Configure the logger
 */
export function configureLogger(newConfig: Partial<LoggerConfig>): void {
    config = { ...config, ...newConfig };
}

/**
 * Set the minimum log level
 */
export function setLogLevel(level: LogLevel): void {
    config.minLevel = level;
}

/**
 * Check if debug mode is enabled
 */
export function isDebugEnabled(): boolean {
    return config.minLevel <= LogLevel.DEBUG;
}

/**
 * Format a log message with metadata
 */
export function formatMessage(level: LogLevel, module: string | undefined, message: string): string {
    const parts: string[] = [];

    if (config.timestamps) {
        parts.push(`[${new Date().toISOString()}]`);
    }

    parts.push(`[${LOG_LEVEL_NAMES[level]}]`);

    if (config.showModule && module) {
        parts.push(`[${module}]`);
    }

    parts.push(message);

    return parts.join(' ');
}

/**
 * Sanitize data to remove sensitive information before logging
 * Removes tokens, emails, and other PII
 */
export function sanitize(data: unknown): unknown {
    if (data === null || data === undefined) {
        return data;
    }

    if (typeof data === 'string') {
        // Mask potential tokens (long alphanumeric strings)
        return data.replace(/[a-zA-Z0-9]{32,}/g, '[REDACTED]');
    }

    if (Array.isArray(data)) {
        return data.map(sanitize);
    }

    if (data instanceof Set) {
        return Array.from(data, sanitize);
    }

    if (data instanceof Error) {
        return data;
    }

    if (typeof data === 'object') {
        const sanitized: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(data)) {
            const lowerKey = key.toLowerCase();
            if (
                lowerKey.includes('token') ||
                lowerKey.includes('password') ||
                lowerKey.includes('secret') ||
                lowerKey.includes('email') ||
                lowerKey === 'dsn' ||
                lowerKey === 'authorization'
            ) {
                sanitized[key] = '[REDACTED]';
            } else {
                sanitized[key] = sanitize(value);
            }
        }
        return sanitized;
    }

    return data;
}

/**
 * Core log function
 */
function log(level: LogLevel, module: string | undefined, message: string, ...data: unknown[]): void {
    if (level < config.minLevel) {
        return;
    }

    const formattedMessage = formatMessage(level, module, message);
    const sanitizedData = data.map(sanitize);

    switch (level) {
        case LogLevel.DEBUG:
        case LogLevel.INFO:
            console.log(formattedMessage, ...sanitizedData);
            break;
        case LogLevel.WARN:
            console.warn(formattedMessage, ...sanitizedData);
            break;
        case LogLevel.ERROR:
            console.error(formattedMessage, ...sanitizedData);
            break;
    }
}

/**
 * Scoped logger returned by createLogger
 */
export interface Logger {
    debug: (message: string, ...data: unknown[]) => void;
    info: (message: string, ...data: unknown[]) => void;
    warn: (message: string, ...data: unknown[]) => void;
    error: (message: string, ...data: unknown[]) => void;
    log: (level: LogLevel, message: string, ...data: unknown[]) => void;
}

/**
 * Create a scoped logger for a specific module
 */
export function createLogger(module: string): Logger {
    return {
        debug: (message, ...data) => log(LogLevel.DEBUG, module, message, ...data),
        info: (message, ...data) => log(LogLevel.INFO, module, message, ...data),
        warn: (message, ...data) => log(LogLevel.WARN, module, message, ...data),
        error: (message, ...data) => log(LogLevel.ERROR, module, message, ...data),
        log: (level, message, ...data) => log(level, module, message, ...data),
    };
}
