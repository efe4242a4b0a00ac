/**
 * @fileoverview Application Constants
 * Reserved ids, category sets, configuration defaults and error messages
 * shared across the engine.
 */

import type { DetectionField, FriendlyError } from './types.js';

// ==================== ERROR TRACKING ====================

/**
 * Sentry DSN for error tracking, read from the environment.
 * Leave unset to disable error reporting.
 */
export const SENTRY_DSN = process.env.SENTRY_DSN ?? '';

/**
 * Environment variables read by the logger and the batch runner.
 */
export const ENV_KEYS = {
    /** Forces DEBUG logging when "true". */
    DEBUG: 'ATTRIBUTION_DEBUG',
    /** Minimum log level by name (debug, info, warn, error, none). */
    LOG_LEVEL: 'LOG_LEVEL',
} as const;

// ==================== ATTRIBUTION CONSTANTS ====================

export const CONSTANTS = {
    /** Id of the fallback client. */
    DEFAULT_CLIENT_ID: 'personal',
    /** Day-level sentinel when more than one billable client has time. */
    MULTIPLE_CLIENTS_ID: 'multiple',
    /** Decimal places for hour totals. */
    HOURS_DECIMALS: 1,
    /** Current configuration document version. */
    CONFIG_VERSION: '1.0.0',
    /** Color given to clients added without one. */
    DEFAULT_CLIENT_COLOR: '#4ECDC4',
} as const;

/**
 * Categories the engine classifies. Everything else passes through untouched.
 */
export const ATTRIBUTABLE_CATEGORIES: ReadonlySet<string> = new Set(['client_work', 'meeting']);

/**
 * Categories written by the category rewrite.
 */
export const ATTRIBUTED_CATEGORIES = {
    CLIENT: 'client_work',
    DEFAULT: 'side_project',
} as const;

/**
 * Order in which a rule's detection fields are tested.
 */
export const DETECTION_FIELD_ORDER: readonly DetectionField[] = [
    'projectNames',
    'folderSubstrings',
    'ticketPrefixes',
    'tags',
];

/**
 * Client ids: lowercase, starting with a letter or digit.
 */
export const CLIENT_ID_PATTERN = /^[a-z0-9][a-z0-9_-]*$/;

/**
 * Mapping between rule fields and the configuration document's detection keys.
 */
export const DETECTION_DOCUMENT_KEYS: Record<DetectionField, string> = {
    projectNames: 'projects',
    folderSubstrings: 'folders',
    ticketPrefixes: 'ticketPrefixes',
    tags: 'tags',
};

/**
 * Tags given to the default client in a fresh configuration.
 */
export const DEFAULT_PERSONAL_TAGS = ['personal', 'side-project', 'non-billable'];

// ==================== ERROR CONSTANTS ====================

/**
 * Classification of error types.
 */
export const ERROR_TYPES = {
    CONFIG: 'CONFIG_ERROR',
    VALIDATION: 'VALIDATION_ERROR',
    IO: 'IO_ERROR',
    UNKNOWN: 'UNKNOWN_ERROR',
} as const;

export type ErrorType = typeof ERROR_TYPES[keyof typeof ERROR_TYPES];

/**
 * Error message configuration
 */
export interface ErrorMessageConfig {
    title: string;
    message: string;
    action: FriendlyError['action'];
}

/**
 * User-facing messages and actions for each error type.
 */
export const ERROR_MESSAGES: Record<ErrorType, ErrorMessageConfig> = {
    [ERROR_TYPES.CONFIG]: {
        title: 'Configuration Error',
        message: 'The client configuration is invalid. Fix the client rules and run again.',
        action: 'fix-config',
    },
    [ERROR_TYPES.VALIDATION]: {
        title: 'Validation Error',
        message: 'The daily record is malformed and was left unchanged.',
        action: 'fix-input',
    },
    [ERROR_TYPES.IO]: {
        title: 'File Error',
        message: 'A file could not be read or written. Check the path and permissions.',
        action: 'retry',
    },
    [ERROR_TYPES.UNKNOWN]: {
        title: 'Unexpected Error',
        message: 'An unexpected error occurred while attributing activity.',
        action: 'none',
    },
};

// Re-export types for convenience
export type { FriendlyError };
