/**
 * Barrel export for all shared types.
 */
export type { CellValue, SourceTable, RawRecord, RecordProvenance } from './record.js';
export { isAbsent, present } from './record.js';
export { AGGREGATION_POLICIES, AMOUNT_PROVENANCES } from './field.js';
export type {
    FieldType,
    AggregationPolicy,
    FieldDefinition,
    CanonicalField,
    AmountProvenance,
    ParsedAmount,
} from './field.js';
export type { FieldValue, ProjectEntity } from './entity.js';
export { ISSUE_KINDS } from './issues.js';
export type {
    IssueKind,
    PipelineIssue,
    UnmappedHeaderIssue,
    MissingIdentifierIssue,
    UnextractableIdentifierIssue,
    UnparsedValueIssue,
    IdentityConflict,
    InconsistentIdentityFieldIssue,
    EmptyDenominatorIssue,
} from './issues.js';
export type {
    PeriodWindow,
    TraineeCounts,
    EfficiencyMetrics,
    AggregateMetrics,
    BreakdownRow,
    Breakdown,
    TrackComparison,
} from './metrics.js';
export type { DataQualityReport, WindowDuplication, FieldCompleteness } from './quality.js';
export type {
    LogLevel,
    YearPatternRule,
    MetricSelectors,
    OutcomeCategory,
    TrackDefinition,
    FundMetricsConfig,
    CompiledYearRule,
    CompiledConfig,
} from './config.js';
