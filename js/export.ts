/**
 * @fileoverview Export Module
 * Shapes attribution results for the collaborators that consume them:
 * the updated day document for the import pipeline, a batch manifest,
 * and a per-client CSV with protection against CSV injection.
 */

import { escapeCsv, formatMinutes, isRecord, minutesToHours } from './utils.js';
import type {
    AttributionWarning,
    BatchResult,
    ClientSummary,
    DailyRecord,
    DayAttribution,
    RuleSet,
} from './types.js';

// ==================== DOCUMENT TYPES ====================

/**
 * Per-client entry of a day document's clientSummary.
 */
export interface ClientSummaryDocument {
    hours: number;
    minutes: number;
    projects: string[];
    tickets: string[];
}

/**
 * Day time summary after attribution. Keys the engine does not compute
 * (total duration, break time, ...) are carried over from the input.
 */
export interface DayTimeSummary {
    [key: string]: unknown;
    billableHours: number;
    sideProjectHours: number;
    clientHours: Record<string, number>;
}

/**
 * Day document handed to the import pipeline: the input day with its phases,
 * client fields and time summary patched.
 */
export interface UpdatedDayDocument extends DailyRecord {
    [key: string]: unknown;
    /** Sole billable client, the default id, or "multiple" */
    clientId: string;
    clientSummary: Record<string, ClientSummaryDocument>;
    timeSummary: DayTimeSummary;
    warnings: AttributionWarning[];
}

/**
 * Summary of a batch run.
 */
export interface BatchManifest {
    updates: { date: string; clientId: string; clientSummary: Record<string, ClientSummaryDocument> }[];
    failed: { index: number; date: string | null; type: string; reason: string }[];
    total: number;
}

// ==================== DOCUMENTS ====================

/**
 * Converts a ClientSummary to its document form. Sets become sorted arrays.
 */
export function toClientSummaryDocument(summary: ClientSummary): ClientSummaryDocument {
    return {
        hours: minutesToHours(summary.totalMinutes),
        minutes: summary.totalMinutes,
        projects: [...summary.projects].sort(),
        tickets: [...summary.tickets].sort(),
    };
}

function toClientSummaryMap(attribution: DayAttribution): Record<string, ClientSummaryDocument> {
    const result: Record<string, ClientSummaryDocument> = {};
    for (const [clientId, summary] of attribution.summaries) {
        result[clientId] = toClientSummaryDocument(summary);
    }
    return result;
}

/**
 * Builds the day document for the import pipeline.
 *
 * Every field of the attributed record is kept. `clientId`, `clientSummary`
 * and `warnings` are set, and the three attribution keys of `timeSummary` are
 * overwritten. The document is a deep copy and does not alias the record.
 */
export function toUpdatedDayDocument(attribution: DayAttribution): UpdatedDayDocument {
    const source = structuredClone(attribution.record);
    const previous = isRecord(source) && isRecord(source.timeSummary) ? source.timeSummary : {};

    return {
        ...source,
        clientId: attribution.primaryClientId,
        clientSummary: toClientSummaryMap(attribution),
        timeSummary: {
            ...previous,
            billableHours: attribution.billableHours,
            sideProjectHours: attribution.sideProjectHours,
            clientHours: { ...attribution.clientHours },
        },
        warnings: attribution.warnings.map((warning) => ({ ...warning })),
    };
}

/**
 * Summarizes a batch: one update per attributed day, one entry per failure.
 */
export function buildBatchManifest(result: BatchResult): BatchManifest {
    return {
        updates: result.attributions.map((attribution) => ({
            date: attribution.record.date,
            clientId: attribution.primaryClientId,
            clientSummary: toClientSummaryMap(attribution),
        })),
        failed: result.failures.map((failure) => ({
            index: failure.index,
            date: failure.date,
            type: failure.error.type,
            reason: failure.error.originalError?.message ?? failure.error.message,
        })),
        total: result.attributions.length,
    };
}

// ==================== CSV ====================

/**
 * Sanitizes a string to prevent CSV formula injection.
 * If a field starts with =, +, -, @, tab, or carriage return, spreadsheets may execute it,
 * so a single quote is prepended to force it to text.
 */
export function sanitizeFormulaInjection(str: string | null | undefined): string {
    if (!str) return '';
    const value = String(str);
    if (/^[=+\-@\t\r]/.test(value)) {
        return "'" + value;
    }
    return value;
}

export const CSV_HEADERS = [
    'Date',
    'ClientId',
    'Client',
    'Billable',
    'Minutes',
    'Hours',
    'Duration',
    'Projects',
    'Tickets',
] as const;

/**
 * Generates a CSV with one row per day and client, in the order given.
 *
 * @param attributions - Attributed days
 * @param rules - Rule set used to resolve display names
 */
export function clientSummaryCsv(attributions: readonly DayAttribution[], rules: RuleSet): string {
    const names = new Map(rules.rules.map((rule) => [rule.id, rule.displayName]));
    const rows: string[] = [];

    for (const attribution of attributions) {
        for (const [clientId, summary] of attribution.summaries) {
            const doc = toClientSummaryDocument(summary);
            const row = [
                attribution.record.date,
                sanitizeFormulaInjection(clientId),
                sanitizeFormulaInjection(names.get(clientId) ?? clientId),
                clientId === rules.defaultClientId ? 'No' : 'Yes',
                summary.totalMinutes,
                doc.hours.toFixed(1),
                formatMinutes(summary.totalMinutes),
                sanitizeFormulaInjection(doc.projects.join('; ')),
                sanitizeFormulaInjection(doc.tickets.join('; ')),
            ].map(escapeCsv);

            rows.push(row.join(','));
        }
    }

    return [CSV_HEADERS.join(','), ...rows].join('\n');
}
