import type { AggregationPolicy } from './field.js';
import type { CellValue, RecordProvenance } from './record.js';

/**
 * Flagged, recoverable conditions. Malformed data never throws; it
 * produces one of these and the pipeline carries on.
 */
export type IssueKind =
    | 'UnmappedHeader'
    | 'MissingIdentifier'
    | 'UnextractableIdentifier'
    | 'UnparsedValue'
    | 'InconsistentIdentityField'
    | 'EmptyDenominator';

export const ISSUE_KINDS: readonly IssueKind[] = [
    'UnmappedHeader',
    'MissingIdentifier',
    'UnextractableIdentifier',
    'UnparsedValue',
    'InconsistentIdentityField',
    'EmptyDenominator',
];

export interface UnmappedHeaderIssue {
    kind: 'UnmappedHeader';
    source: string;
    header: string;
    column: number;
    reason: 'no-match' | 'duplicate-field' | 'blank';
    /** Field the header would have mapped to, for duplicates */
    field?: string;
}

export interface MissingIdentifierIssue {
    kind: 'MissingIdentifier';
    provenance: RecordProvenance;
}

export interface UnextractableIdentifierIssue {
    kind: 'UnextractableIdentifier';
    key: string;
}

export interface UnparsedValueIssue {
    kind: 'UnparsedValue';
    key: string;
    field: string;
    raw: CellValue;
    provenance: RecordProvenance;
}

export interface IdentityConflict {
    field: string;
    policy: AggregationPolicy;
    /** Distinct values in record order; the first is the one kept */
    values: string[];
}

export interface InconsistentIdentityFieldIssue extends IdentityConflict {
    kind: 'InconsistentIdentityField';
    key: string;
}

export interface EmptyDenominatorIssue {
    kind: 'EmptyDenominator';
    /** Window label the ratio was computed for */
    window: string;
    ratio: string;
}

export type PipelineIssue =
    | UnmappedHeaderIssue
    | MissingIdentifierIssue
    | UnextractableIdentifierIssue
    | UnparsedValueIssue
    | InconsistentIdentityFieldIssue
    | EmptyDenominatorIssue;
