/**
 * @fileoverview TypeScript Type Definitions
 * Centralized type definitions shared across the attribution engine.
 */

// ==================== RULE TYPES ====================

/**
 * The four detection fields, in the order the classifier tests them.
 */
export type DetectionField = 'projectNames' | 'folderSubstrings' | 'ticketPrefixes' | 'tags';

/**
 * Detection patterns for a client. Each field is a true set.
 */
export interface DetectionPatterns {
    /** Case-insensitive substrings of the phase's project label */
    projectNames: Set<string>;
    /** Case-insensitive substrings of the phase's free-text description */
    folderSubstrings: Set<string>;
    /** Case-sensitive prefixes of the phase's ticket reference */
    ticketPrefixes: Set<string>;
    /** Exact tag names */
    tags: Set<string>;
}

/**
 * A client definition held by the rule store.
 */
export interface ClientRule {
    /** Unique lowercase token */
    id: string;
    /** Full name, e.g. "ACME Corporation" */
    displayName: string;
    /** Short label, e.g. "ACME" */
    shortName: string;
    /** Hex color used by report renderers */
    color: string;
    /** True for the single fallback client */
    isDefault: boolean;
    detectionPatterns: DetectionPatterns;
    /**
     * Repository path prefixes kept for the configuration editor.
     * Not consulted by the classifier.
     */
    gitlabPrefixes?: Set<string>;
}

/**
 * Input shape for adding a client. Pattern fields may be given as arrays.
 */
export interface ClientRuleInput {
    id: string;
    displayName?: string;
    shortName?: string;
    color?: string;
    isDefault?: boolean;
    detectionPatterns?: Partial<Record<DetectionField, Iterable<string>>>;
    gitlabPrefixes?: Iterable<string>;
}

/**
 * Frozen view of a rule store handed to the engine.
 */
export interface RuleSet {
    /** Rules in priority order, default rule last */
    readonly rules: readonly ClientRule[];
    /** Id of the default ("personal") rule */
    readonly defaultClientId: string;
}

// ==================== ACTIVITY TYPES ====================

/**
 * Known phase categories. The set is open: any other string is accepted.
 */
export type KnownPhaseCategory =
    | 'client_work'
    | 'side_project'
    | 'meeting'
    | 'break'
    | 'planning'
    | 'health';

export type PhaseCategory = KnownPhaseCategory | (string & {});

/**
 * A contiguous block of recorded activity within a day.
 */
export interface ActivityPhase {
    title: string;
    /** Local time, HH:MM */
    startTime: string;
    /** Local time, HH:MM */
    endTime: string;
    durationMinutes: number;
    category: PhaseCategory;
    projectName?: string;
    description?: string;
    ticketReference?: string;
    tags?: string[];
    /** Written by the engine */
    assignedClientId?: string;
}

/**
 * Externally sourced commit activity for the day.
 */
export interface DayActivity {
    projectsWorkedOn?: string[];
}

/**
 * One day's activity record.
 */
export interface DailyRecord {
    /** YYYY-MM-DD */
    date: string;
    /** IANA timezone name */
    timezone?: string;
    phases: ActivityPhase[];
    /** Secondary signal; only confirms attributions made from phase fields */
    activity?: DayActivity;
}

// ==================== ATTRIBUTION RESULT TYPES ====================

/**
 * Per-client rollup for one day.
 */
export interface ClientSummary {
    clientId: string;
    totalMinutes: number;
    projects: Set<string>;
    tickets: Set<string>;
}

/**
 * Aggregated totals for a day.
 */
export interface DayAttributionSummary {
    /** Keyed by client id; only clients with nonzero minutes */
    summaries: Map<string, ClientSummary>;
    billableHours: number;
    sideProjectHours: number;
    /** Sole billable client, the default id, or "multiple" */
    primaryClientId: string;
    /** Hours per non-default client; the default client alone when there are none */
    clientHours: Record<string, number>;
}

/**
 * Data-quality issue found while attributing a day.
 */
export interface AttributionWarning {
    /** Index of the phase in the record */
    phaseIndex: number;
    code: 'NON_POSITIVE_DURATION' | 'DURATION_MISMATCH';
    message: string;
}

/**
 * Full result of attributing one day.
 */
export interface DayAttribution extends DayAttributionSummary {
    record: DailyRecord;
    warnings: AttributionWarning[];
    /** Indexes of attributed phases whose client the day's commit activity confirms */
    confirmedPhases: number[];
}

/**
 * Outcome of attributing several days.
 */
export interface BatchResult {
    attributions: DayAttribution[];
    /** Records that were rejected, by position in the input */
    failures: { index: number; date: string | null; error: FriendlyError }[];
}

// ==================== ERROR TYPES ====================

/**
 * Structured, user-facing error.
 */
export interface FriendlyError {
    type: string;
    title: string;
    message: string;
    action: 'fix-config' | 'fix-input' | 'retry' | 'none';
    originalError?: Error;
    timestamp: string;
    stack?: string;
}
