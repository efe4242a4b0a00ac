import { describe, it, expect, beforeAll, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
    createDefaultDocument,
    loadRuleConfig,
    parseRuleConfig,
    ruleStoreFromDocument,
    ruleStoreToDocument,
    saveRuleConfig,
} from '../../js/config.js';
import { AttributionError } from '../../js/utils.js';
import { LogLevel, setLogLevel } from '../../js/logger.js';

function sampleDocument() {
    return {
        version: '1.0.0',
        lastUpdated: '2025-06-30',
        clients: {
            personal: {
                name: 'Personal',
                displayName: 'Personal/Side Projects',
                color: '#95E1D3',
                isDefault: true,
                detection: { projects: [], folders: [], ticketPrefixes: [], tags: ['personal'], gitlabPrefixes: [] },
            },
            acme: {
                name: 'ACME',
                displayName: 'ACME Corporation',
                color: '#FF6B6B',
                detection: {
                    projects: ['Acme App'],
                    folders: ['acme-repo'],
                    ticketPrefixes: ['ACME-'],
                    tags: [],
                    gitlabPrefixes: ['acme/'],
                },
            },
            globex: {
                name: 'Globex',
                displayName: 'Globex',
                color: '#1A535C',
                detection: { projects: ['Globex'], folders: [], ticketPrefixes: [], tags: [], gitlabPrefixes: [] },
            },
        },
        detectionPriority: ['globex', 'acme', 'personal'],
        settings: {
            defaultClient: 'personal',
            allowMultipleClientsPerDay: true,
            minimumBillableMinutes: 15,
            roundBillableToNearest: 15,
        },
    };
}

function captureError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    throw new Error('Expected function to throw');
}

describe('Rule configuration', () => {
    beforeAll(() => {
        setLogLevel(LogLevel.NONE);
    });

    describe('ruleStoreFromDocument', () => {
        it('builds the store in detectionPriority order', () => {
            const { store, settings, version } = ruleStoreFromDocument(sampleDocument());

            expect(store.rulesInPriorityOrder().map((rule) => rule.id)).toEqual(['globex', 'acme', 'personal']);
            expect(store.defaultClientId).toBe('personal');
            expect(settings).toEqual(sampleDocument().settings);
            expect(version).toBe('1.0.0');
        });

        it('maps detection keys onto rule fields', () => {
            const acme = ruleStoreFromDocument(sampleDocument()).store.getRule('acme');

            expect(acme?.shortName).toBe('ACME');
            expect(acme?.displayName).toBe('ACME Corporation');
            expect([...(acme?.detectionPatterns.projectNames ?? [])]).toEqual(['Acme App']);
            expect([...(acme?.detectionPatterns.folderSubstrings ?? [])]).toEqual(['acme-repo']);
            expect([...(acme?.detectionPatterns.ticketPrefixes ?? [])]).toEqual(['ACME-']);
            expect([...(acme?.gitlabPrefixes ?? [])]).toEqual(['acme/']);
        });

        it('appends clients missing from detectionPriority in document order', () => {
            const doc = { ...sampleDocument(), detectionPriority: ['acme'] };
            const { store } = ruleStoreFromDocument(doc);
            expect(store.priorityOrder()).toEqual(['acme', 'globex']);
        });

        it('rejects unknown and repeated priority entries', () => {
            expect(() =>
                ruleStoreFromDocument({ ...sampleDocument(), detectionPriority: ['initech', 'acme'] })
            ).toThrow('detectionPriority names unknown client "initech"');
            expect(() =>
                ruleStoreFromDocument({ ...sampleDocument(), detectionPriority: ['acme', 'acme'] })
            ).toThrow('detectionPriority lists "acme" twice');
        });

        it('requires settings.defaultClient to name a configured client', () => {
            const doc = sampleDocument();
            const error = captureError(() =>
                ruleStoreFromDocument({ ...doc, settings: { ...doc.settings, defaultClient: 'home' } })
            );
            expect(error).toBeInstanceOf(AttributionError);
            expect(error).toMatchObject({
                type: 'CONFIG_ERROR',
                message: 'settings.defaultClient "home" is not a configured client',
            });
        });

        it('rejects a second client marked as default', () => {
            const doc = sampleDocument();
            const clients = { ...doc.clients, acme: { ...doc.clients.acme, isDefault: true } };
            expect(() => ruleStoreFromDocument({ ...doc, clients })).toThrow(
                'clients.acme is marked default but settings.defaultClient is "personal"'
            );
        });

        it('rejects detection lists that are not arrays', () => {
            const doc = sampleDocument();
            const acme = { ...doc.clients.acme, detection: { ...doc.clients.acme.detection, projects: 'Acme App' } };
            expect(() => ruleStoreFromDocument({ ...doc, clients: { ...doc.clients, acme } })).toThrow(
                'clients.acme.detection.projects must be an array'
            );
        });
    });

    describe('parseRuleConfig', () => {
        it('wraps invalid JSON in a CONFIG error', () => {
            const error = captureError(() => parseRuleConfig('{ "clients": '));
            expect(error).toBeInstanceOf(AttributionError);
            expect(error).toMatchObject({ type: 'CONFIG_ERROR', message: 'Configuration is not valid JSON' });
        });

        it('rejects a document that is not an object', () => {
            expect(() => parseRuleConfig('[]')).toThrow('Configuration must be a JSON object');
        });
    });

    describe('ruleStoreToDocument', () => {
        it('round-trips a document', () => {
            const original = sampleDocument();
            const { store, settings } = ruleStoreFromDocument(original);

            const doc = ruleStoreToDocument(store, settings, new Date('2025-07-01T12:00:00Z'));

            expect(doc).toEqual({ ...original, lastUpdated: '2025-07-01' });
        });

        it('writes the default client last after reordering', () => {
            const { store } = ruleStoreFromDocument(sampleDocument());
            store.reorder(['acme', 'globex']);

            const doc = ruleStoreToDocument(store);

            expect(doc.detectionPriority).toEqual(['acme', 'globex', 'personal']);
            expect(doc.settings).toEqual({ defaultClient: 'personal' });
            expect(doc.clients.acme.isDefault).toBeUndefined();
            expect(doc.clients.personal.isDefault).toBe(true);
        });
    });

    describe('createDefaultDocument', () => {
        it('contains only the personal client', () => {
            expect(createDefaultDocument(new Date('2025-01-15T00:00:00Z'))).toEqual({
                version: '1.0.0',
                lastUpdated: '2025-01-15',
                clients: {
                    personal: {
                        name: 'Personal',
                        displayName: 'Personal/Side Projects',
                        color: '#95E1D3',
                        isDefault: true,
                        detection: {
                            projects: [],
                            folders: [],
                            ticketPrefixes: [],
                            tags: ['personal', 'side-project', 'non-billable'],
                            gitlabPrefixes: [],
                        },
                    },
                },
                detectionPriority: ['personal'],
                settings: {
                    defaultClient: 'personal',
                    allowMultipleClientsPerDay: true,
                    minimumBillableMinutes: 15,
                    roundBillableToNearest: 15,
                },
            });
        });
    });

    describe('files', () => {
        let dir: string;

        beforeEach(async () => {
            dir = await mkdtemp(join(tmpdir(), 'attribution-config-'));
        });

        afterEach(async () => {
            await rm(dir, { recursive: true, force: true });
        });

        it('falls back to the default configuration when the file is missing', async () => {
            const loaded = await loadRuleConfig(join(dir, 'missing.json'));

            expect(loaded.created).toBe(true);
            expect(loaded.store.size).toBe(1);
            expect(loaded.store.defaultClientId).toBe('personal');
            expect(loaded.settings.defaultClient).toBe('personal');
        });

        it('saves and reloads a configuration', async () => {
            const path = join(dir, 'multi-client-config.json');
            const { store, settings } = ruleStoreFromDocument(sampleDocument());
            store.addClient({ id: 'initech', displayName: 'Initech', detectionPatterns: { ticketPrefixes: ['INI-'] } });

            await saveRuleConfig(path, store, settings);
            const text = await readFile(path, 'utf8');
            const loaded = await loadRuleConfig(path);

            expect(text.endsWith('}\n')).toBe(true);
            expect(loaded.created).toBe(false);
            expect(loaded.store.priorityOrder()).toEqual(['globex', 'acme', 'initech']);
            expect(loaded.settings).toEqual(settings);
            expect([...(loaded.store.getRule('initech')?.detectionPatterns.ticketPrefixes ?? [])]).toEqual(['INI-']);
        });

        it('reports unreadable files as IO errors', async () => {
            await expect(loadRuleConfig(dir)).rejects.toMatchObject({ type: 'IO_ERROR' });
        });
    });
});
