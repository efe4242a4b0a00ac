/**
 * @fileoverview Rule Store
 *
 * Ordered collection of client detection rules plus exactly one default rule.
 * The store is the only place rules are edited; the attribution engine works
 * from a frozen snapshot and never writes back.
 *
 * ## Ordering
 *
 * Non-default rules keep a caller-visible priority order. The default rule is
 * always evaluated last no matter where it appeared in the source document.
 * A new client goes immediately before the default rule (i.e. at the end of the
 * non-default list) unless the caller names a client to insert before.
 *
 * ## Validation
 *
 * Every mutation is validated before anything changes, so a rejected edit
 * leaves the store as it was:
 * - exactly one default rule
 * - ids are lowercase tokens and unique
 * - "personal" is reserved for the default rule, "multiple" for the day-level sentinel
 * - pattern fields are sets; appending an existing value is a no-op
 */

import { CLIENT_ID_PATTERN, CONSTANTS, DETECTION_FIELD_ORDER } from './constants.js';
import { createConfigError } from './utils.js';
import { createLogger } from './logger.js';
import type {
    ClientRule,
    ClientRuleInput,
    DetectionField,
    DetectionPatterns,
    RuleSet,
} from './types.js';

const log = createLogger('RuleStore');

/**
 * Where addClient places a new rule.
 */
export interface InsertPosition {
    /** Insert immediately before this client. Defaults to the default rule. */
    before?: string;
}

/**
 * Trims values and drops empty ones.
 */
function cleanPatterns(values: Iterable<string>): string[] {
    const cleaned: string[] = [];
    for (const value of values) {
        const trimmed = value.trim();
        if (trimmed) cleaned.push(trimmed);
    }
    return cleaned;
}

/**
 * Builds an empty pattern record.
 */
export function createEmptyPatterns(): DetectionPatterns {
    return {
        projectNames: new Set(),
        folderSubstrings: new Set(),
        ticketPrefixes: new Set(),
        tags: new Set(),
    };
}

/**
 * Normalizes rule input into a ClientRule with set-valued pattern fields.
 */
export function toClientRule(input: ClientRuleInput): ClientRule {
    const patterns = createEmptyPatterns();
    for (const field of DETECTION_FIELD_ORDER) {
        const values = input.detectionPatterns?.[field];
        if (values) {
            for (const value of cleanPatterns(values)) patterns[field].add(value);
        }
    }

    const rule: ClientRule = {
        id: input.id,
        displayName: input.displayName ?? input.shortName ?? input.id,
        shortName: input.shortName ?? input.displayName ?? input.id,
        color: input.color || CONSTANTS.DEFAULT_CLIENT_COLOR,
        isDefault: input.isDefault === true,
        detectionPatterns: patterns,
    };
    if (input.gitlabPrefixes) {
        rule.gitlabPrefixes = new Set(cleanPatterns(input.gitlabPrefixes));
    }
    return rule;
}

/**
 * Deep-copies a rule so the copy shares no sets with the original.
 */
function cloneRule(rule: ClientRule): ClientRule {
    const copy: ClientRule = {
        ...rule,
        detectionPatterns: {
            projectNames: new Set(rule.detectionPatterns.projectNames),
            folderSubstrings: new Set(rule.detectionPatterns.folderSubstrings),
            ticketPrefixes: new Set(rule.detectionPatterns.ticketPrefixes),
            tags: new Set(rule.detectionPatterns.tags),
        },
    };
    if (rule.gitlabPrefixes) copy.gitlabPrefixes = new Set(rule.gitlabPrefixes);
    return copy;
}

/**
 * Checks the shape of a client id.
 * @throws AttributionError with CONFIG type.
 */
function assertValidId(id: unknown): asserts id is string {
    if (typeof id !== 'string' || !CLIENT_ID_PATTERN.test(id)) {
        throw createConfigError(
            `Invalid client id ${JSON.stringify(id)}: use lowercase letters, digits, '-' or '_'`
        );
    }
    if (id === CONSTANTS.MULTIPLE_CLIENTS_ID) {
        throw createConfigError(`Client id "${id}" is reserved`);
    }
}

/**
 * Ordered client rules with exactly one default.
 */
export class RuleStore {
    /** Rules keyed by id. */
    private readonly rules: Map<string, ClientRule> = new Map();
    /** Non-default ids in priority order. */
    private order: string[] = [];
    /** Id of the default rule. */
    private defaultId: string;

    /**
     * @param inputs - Rules in priority order. The default rule may appear anywhere.
     * @throws AttributionError with CONFIG type if the rules are malformed.
     */
    constructor(inputs: readonly (ClientRuleInput | ClientRule)[]) {
        const defaults = inputs.filter((input) => input.isDefault === true);
        if (defaults.length !== 1) {
            throw createConfigError(
                `Rule store must contain exactly one default rule, found ${defaults.length}`
            );
        }

        for (const input of inputs) {
            assertValidId(input.id);
            if (this.rules.has(input.id)) {
                throw createConfigError(`Duplicate client id "${input.id}"`);
            }
            if (input.id === CONSTANTS.DEFAULT_CLIENT_ID && input.isDefault !== true) {
                throw createConfigError(
                    `Client id "${CONSTANTS.DEFAULT_CLIENT_ID}" is reserved for the default rule`
                );
            }

            const rule = toClientRule(input);
            this.rules.set(rule.id, rule);
            if (!rule.isDefault) this.order.push(rule.id);
        }

        this.defaultId = defaults[0].id;
        log.debug(`Loaded ${this.rules.size} client rules`, { order: this.order });
    }

    /**
     * Creates a store holding only the default "personal" rule.
     */
    static withDefaultOnly(tags: Iterable<string> = []): RuleStore {
        return new RuleStore([
            {
                id: CONSTANTS.DEFAULT_CLIENT_ID,
                shortName: 'Personal',
                displayName: 'Personal/Side Projects',
                color: '#95E1D3',
                isDefault: true,
                detectionPatterns: { tags },
            },
        ]);
    }

    /** Id of the default rule. */
    get defaultClientId(): string {
        return this.defaultId;
    }

    /** Number of rules including the default. */
    get size(): number {
        return this.rules.size;
    }

    /**
     * Rules in evaluation order, default last. Edits go through the store's
     * methods only, so the returned rules are frozen copies.
     */
    rulesInPriorityOrder(): readonly ClientRule[] {
        return this.snapshot().rules;
    }

    /**
     * Non-default ids in priority order.
     */
    priorityOrder(): string[] {
        return [...this.order];
    }

    has(id: string): boolean {
        return this.rules.has(id);
    }

    /** Frozen copy of one rule. */
    getRule(id: string): ClientRule | undefined {
        const rule = this.rules.get(id);
        return rule ? Object.freeze(cloneRule(rule)) : undefined;
    }

    /**
     * Adds a non-default client.
     *
     * @param input - The new client's definition.
     * @param position - Client to insert before; defaults to the default rule.
     * @returns A frozen copy of the stored rule.
     * @throws AttributionError with CONFIG type on a duplicate, reserved or default rule.
     */
    addClient(input: ClientRuleInput, position: InsertPosition = {}): ClientRule {
        assertValidId(input.id);
        if (input.id === CONSTANTS.DEFAULT_CLIENT_ID) {
            throw createConfigError(
                `Client id "${CONSTANTS.DEFAULT_CLIENT_ID}" is reserved for the default rule`
            );
        }
        if (this.rules.has(input.id)) {
            throw createConfigError(`Duplicate client id "${input.id}"`);
        }
        if (input.isDefault === true) {
            throw createConfigError('Rule store already has a default rule');
        }

        let index = this.order.length;
        if (position.before !== undefined && position.before !== this.defaultId) {
            index = this.order.indexOf(position.before);
            if (index === -1) {
                throw createConfigError(`Unknown client "${position.before}"`);
            }
        }

        const rule = toClientRule(input);
        this.rules.set(rule.id, rule);
        this.order.splice(index, 0, rule.id);
        log.info(`Added client "${rule.id}" at priority ${index + 1}`);
        return Object.freeze(cloneRule(rule));
    }

    /**
     * Appends patterns to one of a client's detection fields.
     * Values are trimmed; empty and already present values are skipped.
     *
     * @returns Number of values actually added.
     * @throws AttributionError with CONFIG type for an unknown client.
     */
    appendPatterns(clientId: string, field: DetectionField, values: Iterable<string>): number {
        const rule = this.rules.get(clientId);
        if (!rule) {
            throw createConfigError(`Unknown client "${clientId}"`);
        }

        const target = rule.detectionPatterns[field];
        let added = 0;
        for (const value of cleanPatterns(values)) {
            if (!target.has(value)) {
                target.add(value);
                added++;
            }
        }
        log.debug(`Appended ${added} ${field} pattern(s) to "${clientId}"`);
        return added;
    }

    /**
     * Replaces the priority order of the non-default rules.
     *
     * @param ids - Every non-default id exactly once. The default id may be
     *   included; it is ignored because the default always goes last.
     * @throws AttributionError with CONFIG type if ids is not a permutation.
     */
    reorder(ids: readonly string[]): void {
        const next = ids.filter((id) => id !== this.defaultId);
        const seen = new Set<string>();
        for (const id of next) {
            if (!this.rules.has(id)) {
                throw createConfigError(`Unknown client "${id}"`);
            }
            if (seen.has(id)) {
                throw createConfigError(`Client "${id}" listed twice`);
            }
            seen.add(id);
        }
        if (seen.size !== this.order.length) {
            const missing = this.order.filter((id) => !seen.has(id));
            throw createConfigError(`Priority order is missing: ${missing.join(', ')}`);
        }
        this.order = next;
    }

    /**
     * Frozen copy of the rules for the engine. Later edits do not affect it.
     */
    snapshot(): RuleSet {
        const ordered = [...this.order, this.defaultId].map((id) => this.requireRule(id));
        const rules = ordered.map((rule) => Object.freeze(cloneRule(rule)));
        return Object.freeze({
            rules: Object.freeze(rules),
            defaultClientId: this.defaultId,
        });
    }

    private requireRule(id: string): ClientRule {
        const rule = this.rules.get(id);
        if (!rule) {
            throw createConfigError(`Unknown client "${id}"`);
        }
        return rule;
    }
}
