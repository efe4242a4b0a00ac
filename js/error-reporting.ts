/**
 * @fileoverview Error Reporting Module
 * Provides centralized error tracking and reporting using Sentry.
 * Handles initialization, error capture, and sensitive data scrubbing.
 */

import * as Sentry from '@sentry/node';
import { createLogger } from './logger.js';

const log = createLogger('ErrorReporting');

// ==================== TYPES ====================

/**
 * Sentry configuration options
 */
export interface SentryConfig {
    /** Sentry DSN (Data Source Name) */
    dsn: string;
    /** Environment name (e.g., 'production', 'development') */
    environment: string;
    /** Application version */
    release: string;
    /** Whether to enable debug mode */
    debug?: boolean;
    /** Sample rate for error events (0.0 to 1.0) */
    sampleRate?: number;
}

/**
 * Error context for reporting
 */
export interface ErrorContext {
    /** Module where error occurred */
    module?: string;
    /** Function or operation name */
    operation?: string;
    /** Additional metadata */
    metadata?: Record<string, unknown>;
    /** User-facing error message */
    userMessage?: string;
    /** Error severity level */
    level?: 'fatal' | 'error' | 'warning' | 'info';
}

// ==================== STATE ====================

let sentryInitialized = false;
let configTag: string | null = null;

// ==================== SENSITIVE DATA PATTERNS ====================

/**
 * Patterns to redact from error reports
 */
const SENSITIVE_PATTERNS = [
    /Bearer\s+[^\s]*/gi,
    /token["\s:=]+[^"'\s,}]*/gi,
    /password["\s:=]+[^"'\s,}]*/gi,
    /secret["\s:=]+[^"'\s,}]*/gi,
    /api[_-]?key["\s:=]+[^"'\s,}]*/gi,
    /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, // Email addresses
    /\/(?:Users|home)\/[^/\s]+/g, // Home directories in file paths
];

/**
 * Scrubs sensitive data from a string
 */
export function scrubSensitiveData(text: string): string {
    let scrubbed = text;
    for (const pattern of SENSITIVE_PATTERNS) {
        scrubbed = scrubbed.replace(pattern, '[REDACTED]');
    }
    return scrubbed;
}

/**
 * Scrubs sensitive data from a value recursively
 */
function scrubValue(value: unknown): unknown {
    if (typeof value === 'string') {
        return scrubSensitiveData(value);
    }
    if (Array.isArray(value)) {
        return value.map(scrubValue);
    }
    if (typeof value === 'object' && value !== null) {
        return scrubRecord(Object.fromEntries(Object.entries(value)));
    }
    return value;
}

/**
 * Scrubs sensitive keys and values from a record
 */
export function scrubRecord(obj: Record<string, unknown>): Record<string, unknown> {
    const scrubbed: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
        // Redact sensitive keys entirely
        const lowerKey = key.toLowerCase();
        if (
            lowerKey.includes('token') ||
            lowerKey.includes('password') ||
            lowerKey.includes('secret') ||
            lowerKey.includes('key') ||
            lowerKey.includes('email')
        ) {
            scrubbed[key] = '[REDACTED]';
        } else {
            scrubbed[key] = scrubValue(value);
        }
    }
    return scrubbed;
}

// ==================== INITIALIZATION ====================

/**
 * Initializes Sentry error reporting.
 * Safe to call multiple times - subsequent calls are no-ops.
 *
 * @returns Whether reporting is enabled after the call
 */
export function initErrorReporting(config: SentryConfig): boolean {
    if (sentryInitialized) {
        return true;
    }

    if (!config.dsn) {
        log.debug('Sentry DSN not configured, error reporting disabled');
        return false;
    }

    try {
        Sentry.init({
            dsn: config.dsn,
            environment: config.environment,
            release: config.release,
            debug: config.debug ?? false,
            sampleRate: config.sampleRate ?? 1.0,

            beforeSend(event) {
                if (event.exception?.values) {
                    for (const exception of event.exception.values) {
                        if (exception.value) {
                            exception.value = scrubSensitiveData(exception.value);
                        }
                        if (exception.stacktrace?.frames) {
                            for (const frame of exception.stacktrace.frames) {
                                if (frame.filename) {
                                    frame.filename = scrubSensitiveData(frame.filename);
                                }
                            }
                        }
                    }
                }

                if (event.breadcrumbs) {
                    for (const breadcrumb of event.breadcrumbs) {
                        if (breadcrumb.message) {
                            breadcrumb.message = scrubSensitiveData(breadcrumb.message);
                        }
                        if (breadcrumb.data) {
                            breadcrumb.data = scrubRecord(breadcrumb.data);
                        }
                    }
                }

                if (event.extra) {
                    event.extra = scrubRecord(event.extra);
                }

                return event;
            },

            beforeBreadcrumb(breadcrumb) {
                // Console debug output is too noisy to keep
                if (breadcrumb.category === 'console' && breadcrumb.level === 'debug') {
                    return null;
                }
                return breadcrumb;
            },
        });

        sentryInitialized = true;
        log.info('Sentry initialized');
        return true;
    } catch (error) {
        log.warn('Failed to initialize Sentry:', error);
        return false;
    }
}

// ==================== ERROR REPORTING ====================

/**
 * Reports an error to Sentry with optional context.
 * Safe to call even if Sentry is not initialized.
 */
export function reportError(error: Error | string, context?: ErrorContext): void {
    const errorObj = typeof error === 'string' ? new Error(error) : error;

    // Always log locally
    createLogger(context?.module || 'App').error(`${context?.operation || 'Error'}:`, errorObj);

    if (!sentryInitialized) {
        return;
    }

    try {
        Sentry.withScope((scope) => {
            if (context?.level) {
                scope.setLevel(context.level);
            }
            if (context?.module) {
                scope.setTag('module', context.module);
            }
            if (context?.operation) {
                scope.setTag('operation', context.operation);
            }
            if (configTag) {
                scope.setTag('config_id', configTag);
            }
            if (context?.metadata) {
                scope.setExtras(scrubRecord(context.metadata));
            }
            if (context?.userMessage) {
                scope.setExtra('user_message', context.userMessage);
            }

            Sentry.captureException(errorObj);
        });
    } catch (sentryError) {
        log.warn('Failed to report error to Sentry:', sentryError);
    }
}

/**
 * Reports a message to Sentry (for non-error events).
 */
export function reportMessage(
    message: string,
    level: 'fatal' | 'error' | 'warning' | 'info' = 'info',
    context?: Omit<ErrorContext, 'level'>
): void {
    const scoped = createLogger(context?.module || 'App');
    if (level === 'error' || level === 'fatal') {
        scoped.error(message);
    } else {
        scoped.warn(message);
    }

    if (!sentryInitialized) {
        return;
    }

    try {
        Sentry.withScope((scope) => {
            scope.setLevel(level);

            if (context?.module) {
                scope.setTag('module', context.module);
            }
            if (context?.operation) {
                scope.setTag('operation', context.operation);
            }
            if (configTag) {
                scope.setTag('config_id', configTag);
            }
            if (context?.metadata) {
                scope.setExtras(scrubRecord(context.metadata));
            }

            Sentry.captureMessage(scrubSensitiveData(message));
        });
    } catch (sentryError) {
        log.warn('Failed to report message to Sentry:', sentryError);
    }
}

/**
 * Tags subsequent reports with a hash of the rule configuration in use.
 * The path itself is never sent.
 */
export function setConfigContext(configPath: string | null): void {
    configTag = configPath ? hashString(configPath) : null;
}

/**
 * Adds a breadcrumb to the error trail.
 */
export function addBreadcrumb(
    category: string,
    message: string,
    data?: Record<string, unknown>
): void {
    if (!sentryInitialized) {
        return;
    }

    Sentry.addBreadcrumb({
        category,
        message: scrubSensitiveData(message),
        data: data ? scrubRecord(data) : undefined,
        level: 'info',
    });
}

// ==================== HELPERS ====================

/**
 * Simple hash function for strings (FNV-1a)
 */
export function hashString(str: string): string {
    let hash = 2166136261;
    for (let i = 0; i < str.length; i++) {
        hash ^= str.charCodeAt(i);
        hash = Math.imul(hash, 16777619);
    }
    return (hash >>> 0).toString(16);
}

/**
 * Gets Sentry initialization status
 */
export function isErrorReportingEnabled(): boolean {
    return sentryInitialized;
}

/**
 * Flushes pending error reports before the process exits
 */
export async function flushErrorReports(timeout = 2000): Promise<boolean> {
    if (!sentryInitialized) {
        return true;
    }

    try {
        return await Sentry.flush(timeout);
    } catch (error) {
        log.warn('Failed to flush error reports:', error);
        return false;
    }
}
