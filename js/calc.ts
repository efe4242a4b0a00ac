/**
 * @fileoverview Attribution Engine - Pure Client Classification & Aggregation
 *
 * This module decides, for each recorded activity phase in a day, which client
 * it belongs to, and rolls those decisions up into per-client minutes, projects
 * and tickets plus day-level billable/side-project totals.
 * It is side-effect free apart from logging: no file access, no network calls.
 * Same rule set and record in, same attribution out.
 *
 * ## Module Responsibility
 * - Validate a day's record before touching any phase (all-or-nothing)
 * - Classify eligible phases against the rule set in priority order
 * - Rewrite the category of classified phases to match the attribution
 * - Aggregate per-client summaries and the day's derived totals
 *
 * ## Data Flow
 * Input: RuleSet (frozen snapshot from RuleStore), DailyRecord
 * Processing:
 *   1. Validate the rule set and the record
 *   2. For each `client_work` / `meeting` phase: classify, write `assignedClientId`,
 *      rewrite `category`
 *   3. Collect previously attributed phases as they are
 *   4. Note which attributions the day's commit activity confirms
 *   5. Aggregate minutes, projects and tickets per client
 *   6. Derive billableHours, sideProjectHours, primaryClientId, clientHours
 * Output: DayAttribution (the same record, mutated, plus summaries and totals)
 *
 * ## Business Rules
 *
 * ### Classification
 * Non-default rules are tested in priority order. Within a rule the fields are
 * tested in a fixed order, first hit wins:
 *   1. `projectNames`     - case-insensitive substring of `phase.projectName`
 *   2. `folderSubstrings` - case-insensitive substring of `phase.description`
 *   3. `ticketPrefixes`   - `phase.ticketReference` starts with the pattern (case-sensitive)
 *   4. `tags`             - `phase.tags` contains the tag
 * Earlier rules win ties between clients; earlier fields carry stronger intent.
 *
 * ### Secondary Signal
 * The day's `activity.projectsWorkedOn` list never picks a client. After a phase
 * has been attributed to a non-default client on its own fields, the list may
 * confirm that same rule: one of the day's projects equals one of the rule's
 * `projectNames` (case-insensitive). Confirmed phases are reported in
 * `confirmedPhases`; the attribution is the same either way.
 *
 * ### Category Rewrite
 * - Attributed to the default client → `side_project`
 * - Attributed to any other client → `client_work`
 *
 * ### Aggregation
 * - Non-positive durations contribute 0 minutes and raise a warning
 * - `billableHours` = non-default minutes / 60, one decimal, half away from zero
 * - `sideProjectHours` = default minutes / 60, same rounding
 * - `primaryClientId` = default id | sole billable client | "multiple"
 *
 * @see attributeDay - Main entry point for one day
 */

import {
    ATTRIBUTABLE_CATEGORIES,
    ATTRIBUTED_CATEGORIES,
    CONSTANTS,
    DETECTION_FIELD_ORDER,
} from './constants.js';
import {
    clockSpanMinutes,
    createConfigError,
    createUserFriendlyError,
    createValidationError,
    isRecord,
    minutesToHours,
    validateISODateString,
    validateNumber,
    validateOptionalString,
    validateString,
    validateStringArray,
} from './utils.js';
import { createLogger, isDebugEnabled } from './logger.js';
import type {
    ActivityPhase,
    AttributionWarning,
    BatchResult,
    ClientRule,
    ClientSummary,
    DailyRecord,
    DayAttribution,
    DayActivity,
    DayAttributionSummary,
    DetectionField,
    RuleSet,
} from './types.js';

const log = createLogger('Calc');

// ============================================================================
// RULE SET VALIDATION
// ============================================================================

/**
 * Checks that a rule set has exactly one default rule, in last position,
 * matching `defaultClientId`.
 *
 * RuleStore snapshots always pass; this guards hand-built rule sets.
 *
 * @throws AttributionError with CONFIG type.
 */
export function assertValidRuleSet(rules: RuleSet): void {
    const defaults = rules.rules.filter((rule) => rule.isDefault);
    if (defaults.length !== 1) {
        throw createConfigError(
            `Rule set must contain exactly one default rule, found ${defaults.length}`
        );
    }
    const last = rules.rules[rules.rules.length - 1];
    if (!last.isDefault || last.id !== rules.defaultClientId) {
        throw createConfigError(
            `Default rule "${rules.defaultClientId}" must be the last rule in priority order`
        );
    }
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

/**
 * Tests a single detection field of a rule against a phase.
 */
export function matchesField(rule: ClientRule, field: DetectionField, phase: ActivityPhase): boolean {
    const patterns = rule.detectionPatterns[field];
    if (patterns.size === 0) return false;

    switch (field) {
        case 'projectNames': {
            const projectName = phase.projectName?.toLowerCase();
            if (!projectName) return false;
            for (const pattern of patterns) {
                if (projectName.includes(pattern.toLowerCase())) return true;
            }
            return false;
        }
        case 'folderSubstrings': {
            const description = phase.description?.toLowerCase();
            if (!description) return false;
            for (const pattern of patterns) {
                if (description.includes(pattern.toLowerCase())) return true;
            }
            return false;
        }
        case 'ticketPrefixes': {
            const ticket = phase.ticketReference;
            if (!ticket) return false;
            for (const prefix of patterns) {
                if (ticket.startsWith(prefix)) return true;
            }
            return false;
        }
        case 'tags':
            return (phase.tags ?? []).some((tag) => patterns.has(tag));
    }
}

/**
 * Returns the first detection field of a rule that matches the phase, if any.
 */
export function findMatchingField(rule: ClientRule, phase: ActivityPhase): DetectionField | null {
    for (const field of DETECTION_FIELD_ORDER) {
        if (matchesField(rule, field, phase)) return field;
    }
    return null;
}

/**
 * Tests the day's commit projects against a rule's project names.
 */
export function matchesActivitySignal(rule: ClientRule, projectsWorkedOn: readonly string[]): boolean {
    if (projectsWorkedOn.length === 0 || rule.detectionPatterns.projectNames.size === 0) {
        return false;
    }
    const ruleProjects = new Set(
        Array.from(rule.detectionPatterns.projectNames, (name) => name.toLowerCase())
    );
    return projectsWorkedOn.some((project) => ruleProjects.has(project.toLowerCase()));
}

/**
 * Decides which client a phase belongs to, from the phase's own fields.
 *
 * Does not look at the phase's category; callers decide eligibility.
 *
 * @param phase - The phase to classify
 * @param rules - Rule set in priority order, default last
 * @returns The matching client id, or the default client id
 *
 * @example
 * // rules: acme { projectNames: ["Acme App"] }, personal (default)
 * classifyPhase({ projectName: "Acme App Redesign", ... }, rules) // → "acme"
 * classifyPhase({ projectName: "", description: "side project" }, rules) // → "personal"
 */
export function classifyPhase(phase: ActivityPhase, rules: RuleSet): string {
    for (const rule of rules.rules) {
        if (rule.isDefault) continue;
        const field = findMatchingField(rule, phase);
        if (field) {
            if (isDebugEnabled()) {
                log.debug(`"${phase.title}" matched "${rule.id}" by ${field}`);
            }
            return rule.id;
        }
    }
    return rules.defaultClientId;
}

/**
 * Whether the day's commit activity confirms an attribution to `clientId`.
 * Attributions to the default client are never confirmed.
 */
export function isConfirmedByActivity(
    clientId: string,
    rules: RuleSet,
    activity: DayActivity | undefined
): boolean {
    const projectsWorkedOn = activity?.projectsWorkedOn ?? [];
    if (clientId === rules.defaultClientId || projectsWorkedOn.length === 0) return false;
    const rule = rules.rules.find((candidate) => candidate.id === clientId);
    return rule !== undefined && matchesActivitySignal(rule, projectsWorkedOn);
}

/**
 * Whether a phase's category takes part in attribution.
 */
export function isAttributable(phase: ActivityPhase): boolean {
    return ATTRIBUTABLE_CATEGORIES.has(phase.category);
}

/**
 * The category an attributed phase should carry.
 */
export function attributedCategory(clientId: string, defaultClientId: string): string {
    return clientId === defaultClientId ? ATTRIBUTED_CATEGORIES.DEFAULT : ATTRIBUTED_CATEGORIES.CLIENT;
}

/**
 * Writes the attribution and the matching category onto a phase.
 */
export function applyAttribution(phase: ActivityPhase, clientId: string, defaultClientId: string): void {
    phase.assignedClientId = clientId;
    phase.category = attributedCategory(clientId, defaultClientId);
}

/**
 * Whether a phase already carries an engine attribution that is consistent
 * with the rule set. Such phases are aggregated without reclassification.
 */
export function isPreviouslyAttributed(phase: ActivityPhase, rules: RuleSet): boolean {
    const clientId = phase.assignedClientId;
    if (!clientId || !rules.rules.some((rule) => rule.id === clientId)) return false;
    return phase.category === attributedCategory(clientId, rules.defaultClientId);
}

// ============================================================================
// RECORD VALIDATION
// ============================================================================

/**
 * Validates the structure of a day's record without modifying it.
 *
 * @throws AttributionError with VALIDATION type naming the first problem
 */
export function assertDailyRecord(value: unknown): asserts value is DailyRecord {
    if (!isRecord(value)) {
        throw createValidationError('Daily record must be an object');
    }

    validateISODateString(value.date, 'Daily record date');
    validateOptionalString(value.timezone, 'Daily record timezone');

    if (!Array.isArray(value.phases)) {
        throw createValidationError('Daily record phases must be an array');
    }

    value.phases.forEach((phase: unknown, index: number) => {
        const label = `Phase ${index}`;
        if (!isRecord(phase)) {
            throw createValidationError(`${label} must be an object`);
        }
        validateOptionalString(phase.title, `${label} title`);
        validateOptionalString(phase.startTime, `${label} startTime`);
        validateOptionalString(phase.endTime, `${label} endTime`);
        validateNumber(phase.durationMinutes, `${label} durationMinutes`);
        validateString(phase.category, `${label} category`);
        validateOptionalString(phase.projectName, `${label} projectName`);
        validateOptionalString(phase.description, `${label} description`);
        validateOptionalString(phase.ticketReference, `${label} ticketReference`);
        validateOptionalString(phase.assignedClientId, `${label} assignedClientId`);
        if (phase.tags !== undefined) {
            validateStringArray(phase.tags, `${label} tags`);
        }
    });

    if (value.activity !== undefined) {
        if (!isRecord(value.activity)) {
            throw createValidationError('Daily record activity must be an object');
        }
        if (value.activity.projectsWorkedOn !== undefined) {
            validateStringArray(value.activity.projectsWorkedOn, 'activity.projectsWorkedOn');
        }
    }
}

/**
 * Collects data-quality warnings for a record's phases.
 */
export function collectWarnings(record: DailyRecord): AttributionWarning[] {
    const warnings: AttributionWarning[] = [];

    record.phases.forEach((phase, phaseIndex) => {
        if (phase.durationMinutes <= 0) {
            warnings.push({
                phaseIndex,
                code: 'NON_POSITIVE_DURATION',
                message: `"${phase.title}" has duration ${phase.durationMinutes}m and counts as 0`,
            });
            return;
        }

        const span = clockSpanMinutes(phase.startTime, phase.endTime);
        if (span !== null && span !== phase.durationMinutes) {
            warnings.push({
                phaseIndex,
                code: 'DURATION_MISMATCH',
                message: `"${phase.title}" lasts ${phase.durationMinutes}m but spans ${span}m (${phase.startTime}-${phase.endTime})`,
            });
        }
    });

    return warnings;
}

// ============================================================================
// AGGREGATION
// ============================================================================

/**
 * Rolls attributed phases up into per-client summaries and day totals.
 *
 * Phases without `assignedClientId` are ignored.
 *
 * @example
 * // acme 90m + personal 60m
 * aggregateAttribution(phases, rules)
 * // → { billableHours: 1.5, sideProjectHours: 1.0, primaryClientId: "acme", ... }
 */
export function aggregateAttribution(
    phases: readonly ActivityPhase[],
    rules: RuleSet
): DayAttributionSummary {
    const defaultId = rules.defaultClientId;
    const accumulators = new Map<string, ClientSummary>();

    for (const phase of phases) {
        const clientId = phase.assignedClientId;
        if (!clientId) continue;

        let summary = accumulators.get(clientId);
        if (!summary) {
            summary = { clientId, totalMinutes: 0, projects: new Set(), tickets: new Set() };
            accumulators.set(clientId, summary);
        }

        summary.totalMinutes += Math.max(0, phase.durationMinutes);
        if (phase.projectName) summary.projects.add(phase.projectName);
        if (phase.ticketReference) summary.tickets.add(phase.ticketReference);
    }

    // Summaries in rule priority order, clients with time only
    const summaries = new Map<string, ClientSummary>();
    for (const rule of rules.rules) {
        const summary = accumulators.get(rule.id);
        if (summary && summary.totalMinutes > 0) summaries.set(rule.id, summary);
    }

    let billableMinutes = 0;
    let defaultMinutes = 0;
    const clientHours: Record<string, number> = {};
    const billableClients: string[] = [];

    for (const [clientId, summary] of summaries) {
        if (clientId === defaultId) {
            defaultMinutes += summary.totalMinutes;
        } else {
            billableMinutes += summary.totalMinutes;
            billableClients.push(clientId);
            clientHours[clientId] = minutesToHours(summary.totalMinutes);
        }
    }

    const sideProjectHours = minutesToHours(defaultMinutes);
    if (billableClients.length === 0) {
        clientHours[defaultId] = sideProjectHours;
    }

    let primaryClientId: string;
    if (billableClients.length === 0) {
        primaryClientId = defaultId;
    } else if (billableClients.length === 1) {
        primaryClientId = billableClients[0];
    } else {
        primaryClientId = CONSTANTS.MULTIPLE_CLIENTS_ID;
    }

    return {
        summaries,
        billableHours: minutesToHours(billableMinutes),
        sideProjectHours,
        primaryClientId,
        clientHours,
    };
}

// ============================================================================
// MAIN ENTRY POINTS
// ============================================================================

/**
 * Attributes one day's phases to clients.
 *
 * The record is validated first; if validation fails nothing is modified.
 * Eligible phases are then classified and rewritten in place.
 *
 * @param record - The day's record (mutated in place)
 * @param rules - Frozen rule set, e.g. from `RuleStore.snapshot()`
 * @throws AttributionError with CONFIG or VALIDATION type
 */
export function attributeDay(record: DailyRecord, rules: RuleSet): DayAttribution {
    assertValidRuleSet(rules);
    assertDailyRecord(record);

    const warnings = collectWarnings(record);
    for (const warning of warnings) {
        log.warn(`${record.date}: ${warning.message}`);
    }

    const attributed: ActivityPhase[] = [];
    const confirmedPhases: number[] = [];
    record.phases.forEach((phase, index) => {
        if (isAttributable(phase)) {
            applyAttribution(phase, classifyPhase(phase, rules), rules.defaultClientId);
        } else if (!isPreviouslyAttributed(phase, rules)) {
            return;
        }
        attributed.push(phase);
        if (phase.assignedClientId && isConfirmedByActivity(phase.assignedClientId, rules, record.activity)) {
            confirmedPhases.push(index);
        }
    });

    const summary = aggregateAttribution(attributed, rules);
    log.debug(
        `${record.date}: ${attributed.length} phase(s) attributed, primary client "${summary.primaryClientId}"`
    );

    return { ...summary, record, warnings, confirmedPhases };
}

/**
 * Attributes several days against one rule set.
 *
 * A day that fails validation is reported in `failures` and left unchanged;
 * the other days are still attributed.
 */
export function attributeDays(records: readonly unknown[], rules: RuleSet): BatchResult {
    assertValidRuleSet(rules);

    const result: BatchResult = { attributions: [], failures: [] };

    records.forEach((raw, index) => {
        const date = isRecord(raw) && typeof raw.date === 'string' ? raw.date : null;
        try {
            assertDailyRecord(raw);
            result.attributions.push(attributeDay(raw, rules));
        } catch (error) {
            const err = error instanceof Error ? error : new Error(String(error));
            log.warn(`Skipping day ${date ?? '(unknown date)'}: ${err.message}`);
            result.failures.push({ index, date, error: createUserFriendlyError(err) });
        }
    });

    return result;
}
