#!/usr/bin/env node
/**
 * @fileoverview Main Entry Point / Batch Runner
 * Loads the rule configuration and a list of day files, attributes every day,
 * and writes the updated day documents plus a batch manifest.
 *
 * ## Data Flow
 *
 * ```
 *  --config ──► loadRuleConfig() ──► store.snapshot() ──┐
 *                                                        ▼
 *  day files ──► readFile + JSON.parse ──► attributeDays(records, rules)
 *                                                        │
 *                 ┌──────────────────────────────────────┤
 *                 ▼                                      ▼
 *   <out>/<date>-updated.json              <out>/multi-client-updates.json
 * ```
 *
 * A day that cannot be read or fails validation is listed under `failed` in the
 * manifest; the remaining days are still written.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parseArgs } from 'node:util';
import { attributeDays } from './calc.js';
import { loadRuleConfig } from './config.js';
import { buildBatchManifest, clientSummaryCsv, toUpdatedDayDocument } from './export.js';
import type { BatchManifest } from './export.js';
import {
    addBreadcrumb,
    flushErrorReports,
    initErrorReporting,
    isErrorReportingEnabled,
    reportError,
    reportMessage,
    setConfigContext,
} from './error-reporting.js';
import { createLogger, isDebugEnabled } from './logger.js';
import { ERROR_TYPES, SENTRY_DSN } from './constants.js';
import { AttributionError, createUserFriendlyError } from './utils.js';
import type { BatchResult } from './types.js';

const log = createLogger('Main');

export const DEFAULT_CONFIG_PATH = 'multi-client-config.json';
export const MANIFEST_FILE = 'multi-client-updates.json';

export const EXIT_CODES = {
    OK: 0,
    FATAL: 1,
    PARTIAL: 2,
} as const;

const USAGE = `Usage: client-attribution [options] <day.json>...

Options:
  -c, --config <path>       Rule configuration (default: ${DEFAULT_CONFIG_PATH})
  -o, --out <dir>           Output directory (default: .)
      --csv <path>          Also write a per-client CSV
  -h, --help                Show this help`;

// --- Options ---

export interface RunOptions {
    configPath: string;
    outDir: string;
    files: string[];
    csvPath?: string;
}

/**
 * Parses command-line arguments.
 *
 * @returns Run options, or null when help was requested
 * @throws TypeError from parseArgs on an unknown option
 */
export function parseCliArgs(argv: string[]): RunOptions | null {
    const { values, positionals } = parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
            config: { type: 'string', short: 'c', default: DEFAULT_CONFIG_PATH },
            out: { type: 'string', short: 'o', default: '.' },
            csv: { type: 'string' },
            help: { type: 'boolean', short: 'h', default: false },
        },
    });

    if (values.help) return null;

    const options: RunOptions = {
        configPath: values.config ?? DEFAULT_CONFIG_PATH,
        outDir: values.out ?? '.',
        files: positionals,
    };
    if (values.csv) options.csvPath = values.csv;
    return options;
}

// --- Run ---

interface LoadedDay {
    fileIndex: number;
    value: unknown;
}

export interface RunSummary {
    manifest: BatchManifest;
    written: string[];
}

async function readDayFiles(files: readonly string[]): Promise<{ days: LoadedDay[]; failures: BatchResult['failures'] }> {
    const days: LoadedDay[] = [];
    const failures: BatchResult['failures'] = [];

    for (const [fileIndex, file] of files.entries()) {
        try {
            const text = await readFile(file, 'utf8');
            days.push({ fileIndex, value: JSON.parse(text) });
        } catch (error) {
            const type = error instanceof SyntaxError ? ERROR_TYPES.VALIDATION : ERROR_TYPES.IO;
            const err = new AttributionError(type, `Cannot load day file ${file}`, { cause: error });
            log.warn(err.message);
            failures.push({ index: fileIndex, date: null, error: createUserFriendlyError(err) });
        }
    }

    return { days, failures };
}

async function writeJson(path: string, value: unknown): Promise<void> {
    try {
        await writeFile(path, JSON.stringify(value, null, 2) + '\n', 'utf8');
    } catch (error) {
        throw new AttributionError(ERROR_TYPES.IO, `Cannot write ${path}`, { cause: error });
    }
}

/**
 * Attributes the given day files and writes the results.
 * Failure indexes in the manifest refer to positions in `options.files`.
 *
 * @throws AttributionError with CONFIG type for a bad configuration, IO type when output cannot be written
 */
export async function run(options: RunOptions): Promise<RunSummary> {
    const { store, created } = await loadRuleConfig(options.configPath);
    setConfigContext(options.configPath);
    const rules = store.snapshot();
    addBreadcrumb('config', `Loaded ${rules.rules.length} client rule(s)`, { created });

    const { days, failures: readFailures } = await readDayFiles(options.files);
    const batch = attributeDays(days.map((day) => day.value), rules);

    const result: BatchResult = {
        attributions: batch.attributions,
        failures: [
            ...readFailures,
            ...batch.failures.map((failure) => ({ ...failure, index: days[failure.index].fileIndex })),
        ].sort((a, b) => a.index - b.index),
    };

    await mkdir(options.outDir, { recursive: true });

    const written: string[] = [];
    for (const attribution of result.attributions) {
        const { date } = attribution.record;
        const path = join(options.outDir, `${date}-updated.json`);
        await writeJson(path, toUpdatedDayDocument(attribution));
        written.push(path);
        log.info(
            `${date}: ${attribution.primaryClientId} ` +
                `(billable ${attribution.billableHours}h, side ${attribution.sideProjectHours}h, ` +
                `${attribution.confirmedPhases.length} confirmed by day activity)`
        );
        addBreadcrumb('attribution', `Attributed ${date}`, {
            primaryClientId: attribution.primaryClientId,
            billableHours: attribution.billableHours,
        });

        if (attribution.warnings.length > 0) {
            reportMessage(`${date}: ${attribution.warnings.length} data-quality warning(s)`, 'warning', {
                module: 'calc',
                operation: 'attributeDay',
                metadata: { codes: attribution.warnings.map((warning) => warning.code) },
            });
        }
    }

    const manifest = buildBatchManifest(result);
    const manifestPath = join(options.outDir, MANIFEST_FILE);
    await writeJson(manifestPath, manifest);
    written.push(manifestPath);

    if (options.csvPath) {
        try {
            await writeFile(options.csvPath, clientSummaryCsv(result.attributions, rules) + '\n', 'utf8');
        } catch (error) {
            throw new AttributionError(ERROR_TYPES.IO, `Cannot write ${options.csvPath}`, { cause: error });
        }
        written.push(options.csvPath);
    }

    for (const failure of result.failures) {
        reportError(failure.error.originalError ?? failure.error.message, {
            module: 'main',
            operation: 'attributeDays',
            level: 'warning',
            metadata: { index: failure.index, date: failure.date, type: failure.error.type },
        });
    }

    log.info(`Attributed ${manifest.total} day(s), ${manifest.failed.length} failed`);
    if (isDebugEnabled()) {
        log.debug('Manifest', manifest);
    }

    return { manifest, written };
}

/**
 * CLI entry point.
 *
 * @returns Process exit code
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
    initErrorReporting({
        dsn: SENTRY_DSN,
        environment: process.env.NODE_ENV === 'production' ? 'production' : 'development',
        release: 'client-attribution@1.0.0',
        sampleRate: 1.0,
    });
    if (!isErrorReportingEnabled()) {
        log.debug('Error reporting disabled, failures are logged locally only');
    }

    let options: RunOptions | null;
    try {
        options = parseCliArgs(argv);
    } catch (error) {
        log.error(error instanceof Error ? error.message : String(error));
        console.error(USAGE);
        return EXIT_CODES.FATAL;
    }

    if (!options) {
        console.log(USAGE);
        return EXIT_CODES.OK;
    }
    if (options.files.length === 0) {
        console.error(USAGE);
        return EXIT_CODES.FATAL;
    }

    try {
        const { manifest } = await run(options);
        return manifest.failed.length > 0 ? EXIT_CODES.PARTIAL : EXIT_CODES.OK;
    } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        const friendly = createUserFriendlyError(err);
        log.error(`${friendly.title}: ${err.message}`);
        reportError(err, { module: 'main', operation: 'run', level: 'error' });
        return EXIT_CODES.FATAL;
    } finally {
        await flushErrorReports();
    }
}

if (require.main === module) {
    main().then(
        (code) => {
            process.exitCode = code;
        },
        (error: unknown) => {
            console.error(error);
            process.exitCode = EXIT_CODES.FATAL;
        }
    );
}
