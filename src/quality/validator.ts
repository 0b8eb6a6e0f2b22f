import type {
    AggregateMetrics,
    AmountProvenance,
    CanonicalField,
    DataQualityReport,
    FieldCompleteness,
    InconsistentIdentityFieldIssue,
    IssueKind,
    PeriodWindow,
    ProjectEntity,
    UnmappedHeaderIssue,
    WindowDuplication,
} from '../types/index.js';
import { inWindow } from '../metrics/aggregator.js';
import { windowLabel } from '../utils/config.js';
import { stageLogger } from '../utils/logger.js';

export interface QualityInput {
    entities: readonly ProjectEntity[];

    /** Raw records that carried an identifier */
    keyedRecordCount: number;
    recordsWithoutIdentifier: number;
    unmappedHeaders: readonly UnmappedHeaderIssue[];
    windows: readonly PeriodWindow[];
    fields: ReadonlyMap<string, CanonicalField>;

    /** Metrics computed in the same run, for empty-denominator counts */
    metrics?: readonly AggregateMetrics[];
}

function quotient(numerator: number, denominator: number): number {
    return denominator === 0 ? 0 : numerator / denominator;
}

function isPopulated(value: ProjectEntity['fields'][string] | undefined): boolean {
    if (value === null || value === undefined) return false;
    if (typeof value === 'number') return value !== 0;
    return value.trim() !== '';
}

function windowDuplication(entities: readonly ProjectEntity[], window: PeriodWindow): WindowDuplication {
    const scoped = entities.filter((entity) => inWindow(entity, window));
    const rawRecordCount = scoped.reduce((sum, entity) => sum + entity.recordCount, 0);
    return {
        window: { label: windowLabel(window), startYear: window.startYear, endYear: window.endYear },
        rawRecordCount,
        entityCount: scoped.length,
        duplicationFactor: quotient(rawRecordCount, scoped.length),
    };
}

/**
 * Build the data quality report for a run. Reads its input, never changes it.
 */
export function validateQuality(input: QualityInput): DataQualityReport {
    const { entities, fields } = input;
    const total = entities.length;

    const completeness: Record<string, FieldCompleteness> = {};
    for (const name of fields.keys()) {
        const populated = entities.filter((entity) => isPopulated(entity.fields[name])).length;
        completeness[name] = { populated, total, ratio: quotient(populated, total) };
    }

    const provenanceCounts: Record<string, Record<AmountProvenance, number>> = {};
    for (const field of fields.values()) {
        if (field.type !== 'currency') continue;
        const counts: Record<AmountProvenance, number> = {
            'direct': 0,
            'summed-from-text': 0,
            'recovered-from-swap': 0,
            'sentinel': 0,
            'absent': 0,
            'defaulted-to-zero': 0,
        };
        for (const entity of entities) {
            const provenance = entity.amountProvenance[field.name];
            if (provenance) counts[provenance]++;
        }
        provenanceCounts[field.name] = counts;
    }

    const inconsistentEntities = entities
        .filter((entity) => !entity.consistency)
        .map((entity) => ({
            key: entity.key,
            recordCount: entity.recordCount,
            conflicts: entity.conflicts
                .filter((conflict) => conflict.policy === 'IDENTITY')
                .map((conflict): InconsistentIdentityFieldIssue => ({ kind: 'InconsistentIdentityField', key: entity.key, ...conflict })),
        }));

    const unextractableIdentifiers = entities.filter((entity) => entity.year === null).map((entity) => entity.key);
    const unparsedValues = entities.flatMap((entity) => [...entity.parseIssues]);

    const issueCounts: Record<IssueKind, number> = {
        UnmappedHeader: input.unmappedHeaders.length,
        MissingIdentifier: input.recordsWithoutIdentifier,
        UnextractableIdentifier: unextractableIdentifiers.length,
        UnparsedValue: unparsedValues.length,
        InconsistentIdentityField: inconsistentEntities.reduce((sum, entry) => sum + entry.conflicts.length, 0),
        EmptyDenominator: (input.metrics ?? []).reduce((sum, m) => sum + m.emptyDenominators.length, 0),
    };

    const report: DataQualityReport = {
        rawRecordCount: input.keyedRecordCount,
        entityCount: total,
        duplicationFactor: quotient(input.keyedRecordCount, total),
        windows: input.windows.map((window) => windowDuplication(entities, window)),
        completeness,
        inconsistentEntities,
        unextractableIdentifiers,
        unmappedHeaders: [...input.unmappedHeaders],
        unparsedValues,
        recordsWithoutIdentifier: input.recordsWithoutIdentifier,
        provenanceCounts,
        issueCounts,
    };

    stageLogger('quality').info(
        { rawRecords: report.rawRecordCount, entities: report.entityCount, duplicationFactor: report.duplicationFactor, issues: issueCounts },
        'Data quality validated'
    );

    return report;
}
