import { describe, it, expect, beforeAll } from '@jest/globals';
import { attributeDay, attributeDays } from '../../js/calc.js';
import {
    buildBatchManifest,
    clientSummaryCsv,
    sanitizeFormulaInjection,
    toUpdatedDayDocument,
} from '../../js/export.js';
import { RuleStore } from '../../js/rule-store.js';
import { LogLevel, setLogLevel } from '../../js/logger.js';
import type { DailyRecord, RuleSet } from '../../js/types.js';

function buildRules(acmeName = 'ACME Corporation'): RuleSet {
    return new RuleStore([
        {
            id: 'acme',
            displayName: acmeName,
            detectionPatterns: { projectNames: ['Acme App'], ticketPrefixes: ['ACME-'] },
        },
        { id: 'personal', displayName: 'Personal', isDefault: true },
    ]).snapshot();
}

function sampleDay(): DailyRecord {
    return {
        date: '2025-03-03',
        timezone: 'Europe/Berlin',
        phases: [
            {
                title: 'Standup',
                startTime: '09:00',
                endTime: '09:30',
                durationMinutes: 30,
                category: 'meeting',
                projectName: 'Acme App',
                ticketReference: 'ACME-7',
            },
            {
                title: 'Feature',
                startTime: '09:30',
                endTime: '11:00',
                durationMinutes: 90,
                category: 'client_work',
                projectName: 'Acme App Redesign',
                ticketReference: 'ACME-3',
                tags: ['focus'],
            },
            { title: 'Lunch', startTime: '12:00', endTime: '13:00', durationMinutes: 60, category: 'break' },
            {
                title: 'Blog',
                startTime: '13:00',
                endTime: '13:45',
                durationMinutes: 45,
                category: 'client_work',
                description: 'personal blog',
            },
        ],
    };
}

describe('Export', () => {
    beforeAll(() => {
        setLogLevel(LogLevel.NONE);
    });

    describe('toUpdatedDayDocument', () => {
        it('builds the day document with summaries and totals', () => {
            const attribution = attributeDay(sampleDay(), buildRules());
            const doc = toUpdatedDayDocument(attribution);

            expect(doc.date).toBe('2025-03-03');
            expect(doc.timezone).toBe('Europe/Berlin');
            expect(doc.clientId).toBe('acme');
            expect(doc.clientSummary).toEqual({
                acme: {
                    hours: 2,
                    minutes: 120,
                    projects: ['Acme App', 'Acme App Redesign'],
                    tickets: ['ACME-3', 'ACME-7'],
                },
                personal: { hours: 0.8, minutes: 45, projects: [], tickets: [] },
            });
            expect(doc.timeSummary).toEqual({
                billableHours: 2,
                sideProjectHours: 0.8,
                clientHours: { acme: 2 },
            });
            expect(doc.warnings).toEqual([]);
        });

        it('copies the attributed phases', () => {
            const attribution = attributeDay(sampleDay(), buildRules());
            const doc = toUpdatedDayDocument(attribution);

            expect(doc.phases.map((phase) => [phase.title, phase.category, phase.assignedClientId])).toEqual([
                ['Standup', 'client_work', 'acme'],
                ['Feature', 'client_work', 'acme'],
                ['Lunch', 'break', undefined],
                ['Blog', 'side_project', 'personal'],
            ]);
            expect(doc.phases).not.toBe(attribution.record.phases);
            expect(doc.phases[1].tags).toEqual(['focus']);
            expect(doc.phases[1].tags).not.toBe(attribution.record.phases[1].tags);
        });

        it('keeps the other fields of the input day and patches its time summary', () => {
            const raw = {
                ...sampleDay(),
                timeSummary: { totalDurationMinutes: 225, breakTimeMinutes: 60, billableHours: 9 },
                achievements: ['Shipped ACME-3'],
                metrics: { commits: 4 },
            };
            const doc = toUpdatedDayDocument(attributeDay(raw, buildRules()));

            expect(doc.timeSummary).toEqual({
                totalDurationMinutes: 225,
                breakTimeMinutes: 60,
                billableHours: 2,
                sideProjectHours: 0.8,
                clientHours: { acme: 2 },
            });
            expect(doc.achievements).toEqual(['Shipped ACME-3']);
            expect(doc.metrics).toEqual({ commits: 4 });
            expect(doc.metrics).not.toBe(raw.metrics);
        });

        it('omits the timezone when the record has none', () => {
            const record = sampleDay();
            delete record.timezone;
            const doc = toUpdatedDayDocument(attributeDay(record, buildRules()));

            expect('timezone' in doc).toBe(false);
        });
    });

    describe('buildBatchManifest', () => {
        it('lists updated days and failures', () => {
            const result = attributeDays([sampleDay(), { date: 'yesterday', phases: [] }], buildRules());
            const manifest = buildBatchManifest(result);

            expect(manifest.total).toBe(1);
            expect(manifest.updates).toEqual([
                {
                    date: '2025-03-03',
                    clientId: 'acme',
                    clientSummary: {
                        acme: {
                            hours: 2,
                            minutes: 120,
                            projects: ['Acme App', 'Acme App Redesign'],
                            tickets: ['ACME-3', 'ACME-7'],
                        },
                        personal: { hours: 0.8, minutes: 45, projects: [], tickets: [] },
                    },
                },
            ]);
            expect(manifest.failed).toEqual([
                {
                    index: 1,
                    date: 'yesterday',
                    type: 'VALIDATION_ERROR',
                    reason: 'Daily record date must be in ISO format (YYYY-MM-DD)',
                },
            ]);
        });
    });

    describe('clientSummaryCsv', () => {
        it('writes one row per day and client', () => {
            const rules = buildRules();
            const csv = clientSummaryCsv([attributeDay(sampleDay(), rules)], rules);

            expect(csv.split('\n')).toEqual([
                'Date,ClientId,Client,Billable,Minutes,Hours,Duration,Projects,Tickets',
                '2025-03-03,acme,ACME Corporation,Yes,120,2.0,2h,Acme App; Acme App Redesign,ACME-3; ACME-7',
                '2025-03-03,personal,Personal,No,45,0.8,45m,,',
            ]);
        });

        it('quotes values containing commas', () => {
            const rules = buildRules('Acme, Inc.');
            const csv = clientSummaryCsv([attributeDay(sampleDay(), rules)], rules);

            expect(csv.split('\n')[1]).toBe(
                '2025-03-03,acme,"Acme, Inc.",Yes,120,2.0,2h,Acme App; Acme App Redesign,ACME-3; ACME-7'
            );
        });

        it('neutralizes formula-like client names', () => {
            const rules = buildRules('=HYPERLINK("x")');
            const csv = clientSummaryCsv([attributeDay(sampleDay(), rules)], rules);

            expect(csv.split('\n')[1]).toBe(
                '2025-03-03,acme,"\'=HYPERLINK(""x"")",Yes,120,2.0,2h,Acme App; Acme App Redesign,ACME-3; ACME-7'
            );
        });

        it('returns only the header for no days', () => {
            expect(clientSummaryCsv([], buildRules())).toBe(
                'Date,ClientId,Client,Billable,Minutes,Hours,Duration,Projects,Tickets'
            );
        });
    });

    describe('sanitizeFormulaInjection', () => {
        it('prefixes values that spreadsheets would evaluate', () => {
            expect(sanitizeFormulaInjection('=SUM(A1)')).toBe("'=SUM(A1)");
            expect(sanitizeFormulaInjection('+1')).toBe("'+1");
            expect(sanitizeFormulaInjection('-5')).toBe("'-5");
            expect(sanitizeFormulaInjection('@cmd')).toBe("'@cmd");
            expect(sanitizeFormulaInjection('Acme App')).toBe('Acme App');
            expect(sanitizeFormulaInjection(null)).toBe('');
        });
    });
});
