/**
 * fundmetrics public API.
 */
export * from './types/index.js';
export { mapHeaders, normalizeSource, type HeaderMapping, type NormalizedSource } from './schema/header-normalizer.js';
export { tokenize } from './schema/tokenizer.js';
export { extractYear } from './extract/year-extractor.js';
export { parseAmount, parseCount, sumCurrencyMentions, type ParseOptions } from './extract/value-parser.js';
export { applyAliasTable } from './resolver/alias-table.js';
export { resolveEntities, type ResolutionResult } from './resolver/entity-resolver.js';
export {
    aggregateMetrics,
    classifyOutcome,
    compareTracks,
    computeBreakdown,
    type MetricsConfig,
} from './metrics/aggregator.js';
export { matchesTrack, resolveTrack } from './metrics/tracks.js';
export { validateQuality, type QualityInput } from './quality/validator.js';
export { runPipeline, type PipelineOptions, type PipelineResult } from './pipeline/run-pipeline.js';
export { loadCsvSource, loadJsonSource, loadSource, type LoadOptions } from './io/source-loader.js';
export { RunLedger, type RunInput, type RunSummary, type StoredRun } from './storage/run-ledger.js';
export { exportReport, renderReport, type ReportData, type ReportFormat } from './exporters/export.js';
export {
    compileConfig,
    loadDefaultConfig,
    mergeConfig,
    resolveConfig,
    type PartialFundMetricsConfig,
} from './utils/config.js';
export { ConfigurationError, SourceLoadError } from './utils/errors.js';
export { initLogger, getLogger } from './utils/logger.js';
