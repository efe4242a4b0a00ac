/**
 * @fileoverview Public API of the attribution engine.
 */

export * from './types.js';
export {
    CONSTANTS,
    ATTRIBUTABLE_CATEGORIES,
    ATTRIBUTED_CATEGORIES,
    DETECTION_FIELD_ORDER,
    ERROR_TYPES,
    type ErrorType,
} from './constants.js';
export { RuleStore, toClientRule, createEmptyPatterns, type InsertPosition } from './rule-store.js';
export {
    attributeDay,
    attributeDays,
    classifyPhase,
    aggregateAttribution,
    assertDailyRecord,
    assertValidRuleSet,
    collectWarnings,
    isConfirmedByActivity,
} from './calc.js';
export {
    parseRuleConfig,
    ruleStoreFromDocument,
    ruleStoreToDocument,
    createDefaultDocument,
    loadRuleConfig,
    saveRuleConfig,
    type RuleConfigDocument,
    type RuleConfigSettings,
    type ClientDocument,
    type ClientDetectionDocument,
    type LoadedRuleConfig,
} from './config.js';
export {
    toUpdatedDayDocument,
    toClientSummaryDocument,
    buildBatchManifest,
    clientSummaryCsv,
    type UpdatedDayDocument,
    type ClientSummaryDocument,
    type BatchManifest,
} from './export.js';
export { AttributionError, createUserFriendlyError, classifyError } from './utils.js';
export { createLogger, LogLevel, setLogLevel, configureLogger } from './logger.js';
export { initErrorReporting, reportError, flushErrorReports } from './error-reporting.js';
