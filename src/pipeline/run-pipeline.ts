import type {
    AggregateMetrics,
    Breakdown,
    CompiledConfig,
    DataQualityReport,
    EmptyDenominatorIssue,
    PeriodWindow,
    PipelineIssue,
    ProjectEntity,
    RawRecord,
    SourceTable,
    UnmappedHeaderIssue,
} from '../types/index.js';
import { normalizeSource } from '../schema/header-normalizer.js';
import { resolveEntities } from '../resolver/entity-resolver.js';
import { aggregateMetrics, computeBreakdown } from '../metrics/aggregator.js';
import { validateQuality } from '../quality/validator.js';
import { ConfigurationError } from '../utils/errors.js';
import { windowLabel } from '../utils/config.js';
import { stageLogger } from '../utils/logger.js';

export interface PipelineOptions {
    /** Windows to aggregate; the configured defaults when omitted */
    windows?: readonly PeriodWindow[];

    /** Tracks to aggregate each window for; unfiltered only when omitted */
    tracks?: readonly string[];

    /** Fields to break each window (and track) down by; the configured list when omitted */
    breakdowns?: readonly string[];
}

export interface PipelineResult {
    entities: ProjectEntity[];
    metrics: AggregateMetrics[];

    /** Window × track × field, in that order */
    breakdowns: Breakdown[];
    quality: DataQualityReport;

    /** Every flagged condition, in stage order */
    issues: PipelineIssue[];
}

function checkRequest(options: PipelineOptions, config: CompiledConfig): void {
    const problems: string[] = [];
    for (const window of options.windows ?? []) {
        if (window.startYear > window.endYear) {
            problems.push(`window ${windowLabel(window)}: startYear ${window.startYear} is after endYear ${window.endYear}`);
        }
    }
    for (const track of options.tracks ?? []) {
        if (!config.tracks.has(track)) {
            problems.push(`unknown track "${track}"`);
        }
    }
    for (const field of options.breakdowns ?? []) {
        if (!config.fields.has(field)) {
            problems.push(`unknown breakdown field "${field}"`);
        }
    }
    if (problems.length > 0) {
        throw new ConfigurationError('Invalid pipeline request', problems);
    }
}

/**
 * Run the full pipeline over already-loaded sources:
 *
 * 1. Normalize each source's headers onto canonical fields
 * 2. Resolve raw records into one entity per key
 * 3. Aggregate metrics and field breakdowns per window (and track)
 * 4. Validate data quality
 *
 * Malformed data never throws; it is reported in `issues` and `quality`.
 * Bad windows, track names or breakdown fields raise `ConfigurationError` before any work.
 */
export function runPipeline(
    sources: readonly SourceTable[],
    config: CompiledConfig,
    options: PipelineOptions = {}
): PipelineResult {
    checkRequest(options, config);
    const log = stageLogger('pipeline');
    const startTime = Date.now();

    // ──────────────────────────────────────────────────
    // Step 1: Schema normalization
    // ──────────────────────────────────────────────────
    const records: RawRecord[] = [];
    const unmappedHeaders: UnmappedHeaderIssue[] = [];
    for (const table of sources) {
        const normalized = normalizeSource(table, config);
        records.push(...normalized.records);
        unmappedHeaders.push(...normalized.mapping.issues);
    }
    log.info({ sources: sources.length, records: records.length, unmappedHeaders: unmappedHeaders.length }, 'Sources normalized');

    // ──────────────────────────────────────────────────
    // Step 2: Entity resolution
    // ──────────────────────────────────────────────────
    const resolution = resolveEntities(records, config);
    log.info(
        { records: resolution.keyedRecordCount, entities: resolution.entities.length },
        'Entities resolved'
    );

    // ──────────────────────────────────────────────────
    // Step 3: Window metrics
    // ──────────────────────────────────────────────────
    const windows = options.windows ?? config.windows;
    const tracks: Array<string | undefined> = options.tracks?.length ? [...options.tracks] : [undefined];

    const breakdownFields = options.breakdowns ?? config.breakdowns;

    const metrics: AggregateMetrics[] = [];
    const breakdowns: Breakdown[] = [];
    for (const window of windows) {
        for (const track of tracks) {
            metrics.push(aggregateMetrics(resolution.entities, window, config, track));
            for (const field of breakdownFields) {
                breakdowns.push(computeBreakdown(resolution.entities, window, field, config, track));
            }
        }
    }
    log.info(
        { windows: windows.length, tracks: tracks.length, metrics: metrics.length, breakdowns: breakdowns.length },
        'Metrics aggregated'
    );

    const emptyDenominators: EmptyDenominatorIssue[] = metrics.flatMap((m) =>
        m.emptyDenominators.map((ratio): EmptyDenominatorIssue => ({ kind: 'EmptyDenominator', window: m.window.label, ratio }))
    );

    // ──────────────────────────────────────────────────
    // Step 4: Data quality
    // ──────────────────────────────────────────────────
    const quality = validateQuality({
        entities: resolution.entities,
        keyedRecordCount: resolution.keyedRecordCount,
        recordsWithoutIdentifier: resolution.missingIdentifiers.length,
        unmappedHeaders,
        windows,
        fields: config.fields,
        metrics,
    });

    const issues: PipelineIssue[] = [
        ...unmappedHeaders,
        ...resolution.missingIdentifiers,
        ...resolution.unextractableIdentifiers,
        ...resolution.unparsedValues,
        ...resolution.inconsistencies,
        ...emptyDenominators,
    ];

    const elapsed = ((Date.now() - startTime) / 1000).toFixed(2);
    log.info(
        { entities: resolution.entities.length, duplicationFactor: quality.duplicationFactor, issues: issues.length, elapsed: `${elapsed}s` },
        'Pipeline complete'
    );

    return { entities: resolution.entities, metrics, breakdowns, quality, issues };
}
