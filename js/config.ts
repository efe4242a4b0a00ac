/**
 * @fileoverview Rule Configuration Document
 *
 * Reads and writes the multi-client configuration JSON maintained by the
 * configuration editor, and converts it to and from a RuleStore.
 *
 * ## Document Layout
 *
 * ```json
 * {
 *   "version": "1.0.0",
 *   "lastUpdated": "2025-06-30",
 *   "clients": {
 *     "acme": {
 *       "name": "ACME", "displayName": "ACME Corporation", "color": "#FF6B6B",
 *       "detection": { "projects": [], "folders": [], "ticketPrefixes": [], "tags": [], "gitlabPrefixes": [] }
 *     },
 *     "personal": { "...": "...", "isDefault": true }
 *   },
 *   "detectionPriority": ["acme", "personal"],
 *   "settings": { "defaultClient": "personal" }
 * }
 * ```
 *
 * Parsed values are validated field by field; corrupted documents are rejected
 * with a CONFIG error rather than silently defaulted.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { CONSTANTS, DEFAULT_PERSONAL_TAGS, DETECTION_DOCUMENT_KEYS, DETECTION_FIELD_ORDER, ERROR_TYPES } from './constants.js';
import { RuleStore } from './rule-store.js';
import { AttributionError, createConfigError, isRecord } from './utils.js';
import { createLogger } from './logger.js';
import type { ClientRuleInput, DetectionField } from './types.js';

const log = createLogger('Config');

// ==================== TYPES ====================

/**
 * Detection block of a client in the document.
 */
export interface ClientDetectionDocument {
    projects: string[];
    folders: string[];
    ticketPrefixes: string[];
    tags: string[];
    gitlabPrefixes: string[];
}

/**
 * A client entry in the document.
 */
export interface ClientDocument {
    name: string;
    displayName: string;
    color: string;
    isDefault?: boolean;
    detection: ClientDetectionDocument;
}

/**
 * Settings maintained by the configuration editor.
 * Only `defaultClient` is interpreted here; the rest round-trips unchanged.
 */
export interface RuleConfigSettings {
    defaultClient: string;
    allowMultipleClientsPerDay?: boolean;
    minimumBillableMinutes?: number;
    roundBillableToNearest?: number;
}

/**
 * The whole configuration document.
 */
export interface RuleConfigDocument {
    version: string;
    lastUpdated: string;
    clients: Record<string, ClientDocument>;
    detectionPriority: string[];
    settings: RuleConfigSettings;
}

/**
 * A loaded configuration.
 */
export interface LoadedRuleConfig {
    store: RuleStore;
    settings: RuleConfigSettings;
    version: string;
    /** True when no file existed and a default configuration was created */
    created: boolean;
}

// ==================== HELPERS ====================

/**
 * Formats a date as YYYY-MM-DD in UTC.
 */
function toISODate(date: Date): string {
    const y = date.getUTCFullYear();
    const m = String(date.getUTCMonth() + 1).padStart(2, '0');
    const d = String(date.getUTCDate()).padStart(2, '0');
    return `${y}-${m}-${d}`;
}

/**
 * Reads an optional string array from a document object.
 */
function readStringList(source: Record<string, unknown>, key: string, context: string): string[] {
    const value = source[key];
    if (value === undefined || value === null) return [];
    if (!Array.isArray(value)) {
        throw createConfigError(`${context}.${key} must be an array`);
    }
    return value.map((item: unknown, index: number) => {
        if (typeof item !== 'string') {
            throw createConfigError(`${context}.${key}[${index}] must be a string`);
        }
        return item;
    });
}

function readOptionalString(source: Record<string, unknown>, key: string, context: string): string | undefined {
    const value = source[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') {
        throw createConfigError(`${context}.${key} must be a string`);
    }
    return value;
}

function readSettings(value: unknown): RuleConfigSettings {
    if (!isRecord(value)) {
        throw createConfigError('settings must be an object');
    }
    const defaultClient = readOptionalString(value, 'defaultClient', 'settings');
    if (!defaultClient) {
        throw createConfigError('settings.defaultClient is required');
    }

    const settings: RuleConfigSettings = { defaultClient };
    if (typeof value.allowMultipleClientsPerDay === 'boolean') {
        settings.allowMultipleClientsPerDay = value.allowMultipleClientsPerDay;
    }
    if (typeof value.minimumBillableMinutes === 'number' && value.minimumBillableMinutes >= 0) {
        settings.minimumBillableMinutes = value.minimumBillableMinutes;
    }
    if (typeof value.roundBillableToNearest === 'number' && value.roundBillableToNearest >= 0) {
        settings.roundBillableToNearest = value.roundBillableToNearest;
    }
    return settings;
}

function readClient(id: string, value: unknown, defaultClient: string): ClientRuleInput {
    const context = `clients.${id}`;
    if (!isRecord(value)) {
        throw createConfigError(`${context} must be an object`);
    }

    const detection = value.detection ?? {};
    if (!isRecord(detection)) {
        throw createConfigError(`${context}.detection must be an object`);
    }

    if (value.isDefault !== undefined && typeof value.isDefault !== 'boolean') {
        throw createConfigError(`${context}.isDefault must be a boolean`);
    }
    if (value.isDefault === true && id !== defaultClient) {
        throw createConfigError(
            `${context} is marked default but settings.defaultClient is "${defaultClient}"`
        );
    }

    const detectionPatterns: Partial<Record<DetectionField, string[]>> = {};
    for (const field of DETECTION_FIELD_ORDER) {
        detectionPatterns[field] = readStringList(detection, DETECTION_DOCUMENT_KEYS[field], `${context}.detection`);
    }

    return {
        id,
        shortName: readOptionalString(value, 'name', context),
        displayName: readOptionalString(value, 'displayName', context),
        color: readOptionalString(value, 'color', context),
        isDefault: id === defaultClient,
        detectionPatterns,
        gitlabPrefixes: readStringList(detection, 'gitlabPrefixes', `${context}.detection`),
    };
}

// ==================== PARSING ====================

/**
 * Builds a RuleStore from a parsed configuration document.
 *
 * Rules follow `detectionPriority`; clients missing from it are appended in
 * document order.
 *
 * @throws AttributionError with CONFIG type if the document is malformed.
 */
export function ruleStoreFromDocument(doc: unknown): Omit<LoadedRuleConfig, 'created'> {
    if (!isRecord(doc)) {
        throw createConfigError('Configuration must be a JSON object');
    }
    if (!isRecord(doc.clients)) {
        throw createConfigError('clients must be an object');
    }

    const settings = readSettings(doc.settings);
    const clients = doc.clients;
    if (!(settings.defaultClient in clients)) {
        throw createConfigError(`settings.defaultClient "${settings.defaultClient}" is not a configured client`);
    }

    const priority = readStringList(doc, 'detectionPriority', 'configuration');
    const ordered: string[] = [];
    for (const id of priority) {
        if (!(id in clients)) {
            throw createConfigError(`detectionPriority names unknown client "${id}"`);
        }
        if (ordered.includes(id)) {
            throw createConfigError(`detectionPriority lists "${id}" twice`);
        }
        ordered.push(id);
    }
    for (const id of Object.keys(clients)) {
        if (!ordered.includes(id)) {
            log.warn(`Client "${id}" is missing from detectionPriority; evaluating it after the listed clients`);
            ordered.push(id);
        }
    }

    const inputs = ordered.map((id) => readClient(id, clients[id], settings.defaultClient));
    const version = readOptionalString(doc, 'version', 'configuration') ?? CONSTANTS.CONFIG_VERSION;

    return { store: new RuleStore(inputs), settings, version };
}

/**
 * Parses configuration JSON text into a RuleStore.
 *
 * @throws AttributionError with CONFIG type on invalid JSON or content.
 */
export function parseRuleConfig(text: string): Omit<LoadedRuleConfig, 'created'> {
    let doc: unknown;
    try {
        doc = JSON.parse(text);
    } catch (error) {
        throw new AttributionError(ERROR_TYPES.CONFIG, 'Configuration is not valid JSON', { cause: error });
    }
    return ruleStoreFromDocument(doc);
}

// ==================== SERIALIZATION ====================

/**
 * Serializes a RuleStore back into the document layout.
 *
 * @param store - Rules to write
 * @param settings - Editor settings; `defaultClient` is overwritten with the store's default
 * @param now - Date stamped into `lastUpdated`
 */
export function ruleStoreToDocument(
    store: RuleStore,
    settings: Partial<RuleConfigSettings> = {},
    now: Date = new Date()
): RuleConfigDocument {
    const clients: Record<string, ClientDocument> = {};
    const detectionPriority: string[] = [];

    for (const rule of store.rulesInPriorityOrder()) {
        const patterns = rule.detectionPatterns;
        const client: ClientDocument = {
            name: rule.shortName,
            displayName: rule.displayName,
            color: rule.color,
            detection: {
                folders: [...patterns.folderSubstrings],
                projects: [...patterns.projectNames],
                gitlabPrefixes: [...(rule.gitlabPrefixes ?? [])],
                ticketPrefixes: [...patterns.ticketPrefixes],
                tags: [...patterns.tags],
            },
        };
        if (rule.isDefault) client.isDefault = true;

        clients[rule.id] = client;
        detectionPriority.push(rule.id);
    }

    return {
        version: CONSTANTS.CONFIG_VERSION,
        lastUpdated: toISODate(now),
        clients,
        detectionPriority,
        settings: { ...settings, defaultClient: store.defaultClientId },
    };
}

/**
 * A fresh configuration containing only the default "personal" client.
 */
export function createDefaultDocument(now: Date = new Date()): RuleConfigDocument {
    return ruleStoreToDocument(
        RuleStore.withDefaultOnly(DEFAULT_PERSONAL_TAGS),
        {
            allowMultipleClientsPerDay: true,
            minimumBillableMinutes: 15,
            roundBillableToNearest: 15,
        },
        now
    );
}

// ==================== FILES ====================

function isMissingFile(error: unknown): boolean {
    // fs errors may come from another realm, so no instanceof
    return isRecord(error) && error.code === 'ENOENT';
}

/**
 * Loads a configuration file. A missing file yields the default configuration.
 *
 * @throws AttributionError with IO type when the file cannot be read,
 *   or CONFIG type when its content is invalid.
 */
export async function loadRuleConfig(path: string): Promise<LoadedRuleConfig> {
    let text: string;
    try {
        text = await readFile(path, 'utf8');
    } catch (error) {
        if (isMissingFile(error)) {
            log.info(`No configuration at ${path}, using defaults`);
            return { ...ruleStoreFromDocument(createDefaultDocument()), created: true };
        }
        throw new AttributionError(ERROR_TYPES.IO, `Cannot read configuration ${path}`, { cause: error });
    }

    const loaded = parseRuleConfig(text);
    log.info(`Loaded ${loaded.store.size} client(s) from ${path}`);
    return { ...loaded, created: false };
}

/**
 * Writes a RuleStore to a configuration file.
 *
 * @throws AttributionError with IO type when the file cannot be written.
 */
export async function saveRuleConfig(
    path: string,
    store: RuleStore,
    settings: Partial<RuleConfigSettings> = {}
): Promise<RuleConfigDocument> {
    const doc = ruleStoreToDocument(store, settings);
    try {
        await writeFile(path, JSON.stringify(doc, null, 2) + '\n', 'utf8');
    } catch (error) {
        throw new AttributionError(ERROR_TYPES.IO, `Cannot write configuration ${path}`, { cause: error });
    }
    log.info(`Configuration saved to ${path}`);
    return doc;
}
