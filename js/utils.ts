/**
 * @fileoverview Utility Functions
 * Generic helpers for validation, error handling, rounding and formatting.
 * These functions are pure and stateless.
 */

import { CONSTANTS, ERROR_MESSAGES, ERROR_TYPES, type ErrorType, type FriendlyError } from './constants.js';

// ==================== ERRORS ====================

/**
 * Error raised by the engine and its collaborators. Carries an ERROR_TYPES value.
 */
export class AttributionError extends Error {
    readonly type: ErrorType;

    constructor(type: ErrorType, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'AttributionError';
        this.type = type;
    }
}

/**
 * Creates a configuration error.
 * @param message - The error message.
 */
export function createConfigError(message: string): AttributionError {
    return new AttributionError(ERROR_TYPES.CONFIG, message);
}

/**
 * Creates a validation error.
 * @param message - The error message.
 */
export function createValidationError(message: string): AttributionError {
    return new AttributionError(ERROR_TYPES.VALIDATION, message);
}

// ==================== TYPE VALIDATION ====================

/**
 * Narrows a value to a plain object record.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates that a value is a non-empty string.
 * @param value - Value to validate.
 * @param field - Field name for error messages.
 * @returns The trimmed string.
 * @throws AttributionError with VALIDATION type if invalid.
 */
export function validateString(value: unknown, field: string): string {
    if (typeof value !== 'string') {
        throw createValidationError(`${field} must be a non-empty string`);
    }
    const trimmed = value.trim();
    if (trimmed === '') {
        throw createValidationError(`${field} cannot be empty`);
    }
    return trimmed;
}

/**
 * Validates an optional string field. Absent values pass through as undefined.
 */
export function validateOptionalString(value: unknown, field: string): string | undefined {
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') {
        throw createValidationError(`${field} must be a string`);
    }
    return value;
}

/**
 * Validates that a value is a finite number.
 * @throws AttributionError with VALIDATION type if invalid.
 */
export function validateNumber(value: unknown, field: string): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw createValidationError(`${field} must be a number`);
    }
    return value;
}

/**
 * Validates that a value is an array of strings.
 * @throws AttributionError with VALIDATION type if invalid.
 */
export function validateStringArray(value: unknown, field: string): string[] {
    if (!Array.isArray(value)) {
        throw createValidationError(`${field} must be an array`);
    }
    value.forEach((item, index) => {
        if (typeof item !== 'string') {
            throw createValidationError(`${field} at index ${index} must be a string`);
        }
    });
    return value;
}

/**
 * Validates a YYYY-MM-DD date string.
 * @throws AttributionError with VALIDATION type if invalid.
 */
export function validateISODateString(value: unknown, field: string): string {
    const str = validateString(value, field);

    if (!/^\d{4}-\d{2}-\d{2}$/.test(str)) {
        throw createValidationError(`${field} must be in ISO format (YYYY-MM-DD)`);
    }

    const date = new Date(`${str}T00:00:00Z`);
    if (isNaN(date.getTime()) || date.toISOString().slice(0, 10) !== str) {
        throw createValidationError(`${field} is not a valid ISO date`);
    }

    return str;
}

// ==================== ERROR CLASSIFICATION ====================

/**
 * Classifies an error object into a predefined category.
 *
 * @param error - The error object to classify.
 * @returns One of the ERROR_TYPES constants.
 */
export function classifyError(error: unknown): ErrorType {
    if (!error) return ERROR_TYPES.UNKNOWN;

    if (error instanceof AttributionError) {
        return error.type;
    }

    // Node filesystem errors carry a string code such as ENOENT or EACCES
    if (typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
        if (/^E[A-Z]+$/.test(error.code)) {
            return ERROR_TYPES.IO;
        }
    }

    if (error instanceof SyntaxError) {
        return ERROR_TYPES.CONFIG;
    }

    return ERROR_TYPES.UNKNOWN;
}

/**
 * Creates a structured, user-friendly error object from a raw error.
 *
 * @param error - The raw error or error message.
 * @param type - Optional explicit error type override.
 */
export function createUserFriendlyError(error: Error | string, type?: ErrorType): FriendlyError {
    const errorType = type || classifyError(error);
    const errorMessage = ERROR_MESSAGES[errorType];
    const err = typeof error === 'string' ? new Error(error) : error;

    return {
        type: errorType,
        title: errorMessage.title,
        message: errorMessage.message,
        action: errorMessage.action,
        originalError: err,
        timestamp: new Date().toISOString(),
        stack: err.stack,
    };
}

// ==================== GENERIC HELPERS ====================

/**
 * Rounds half away from zero to a number of decimal places.
 * EPSILON keeps values like 1.25 from landing on 12.4999... after scaling.
 *
 * @param num - The number to round.
 * @param decimals - Number of decimal places.
 */
export function round(num: number, decimals = 1): number {
    if (!Number.isFinite(num)) return 0;
    const factor = Math.pow(10, decimals);
    const magnitude = Math.round((Math.abs(num) + Number.EPSILON) * factor) / factor;
    return num < 0 ? -magnitude : magnitude;
}

/**
 * Converts minutes to hours rounded to one decimal.
 */
export function minutesToHours(minutes: number): number {
    return round(minutes / 60, CONSTANTS.HOURS_DECIMALS);
}

/**
 * Escapes a value for inclusion in a CSV file.
 * Values containing quotes, commas or newlines are wrapped in double quotes.
 *
 * @param str - The value to escape.
 */
export function escapeCsv(str: unknown): string {
    if (str === null || str === undefined) return '';
    const stringValue = String(str);
    if (/[",\n\r]/.test(stringValue)) {
        return '"' + stringValue.replace(/"/g, '""') + '"';
    }
    return stringValue;
}

/**
 * Formats minutes into a readable string (e.g., "1h 30m").
 */
export function formatMinutes(minutes: number | null | undefined): string {
    if (minutes == null || !Number.isFinite(minutes) || minutes <= 0) return '0m';
    const whole = Math.floor(minutes / 60);
    const mins = Math.round(minutes - whole * 60);
    if (whole === 0) return `${mins}m`;
    return mins === 0 ? `${whole}h` : `${whole}h ${mins}m`;
}

/**
 * Parses an HH:MM clock time into minutes after midnight.
 *
 * @returns Minutes, or null when the string is not a valid clock time.
 */
export function parseClockTime(value: string | null | undefined): number | null {
    if (!value) return null;
    const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
    if (!match) return null;
    const hours = parseInt(match[1], 10);
    const minutes = parseInt(match[2], 10);
    if (hours > 23 || minutes > 59) return null;
    return hours * 60 + minutes;
}

/**
 * Minutes between two HH:MM clock times. An end before the start wraps past midnight.
 *
 * @returns Span in minutes, or null when either time is invalid.
 */
export function clockSpanMinutes(startTime: string, endTime: string): number | null {
    const start = parseClockTime(startTime);
    const end = parseClockTime(endTime);
    if (start === null || end === null) return null;
    return end >= start ? end - start : end + 24 * 60 - start;
}
