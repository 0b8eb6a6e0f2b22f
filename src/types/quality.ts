import type { AmountProvenance } from './field.js';
import type {
    InconsistentIdentityFieldIssue,
    IssueKind,
    UnmappedHeaderIssue,
    UnparsedValueIssue,
} from './issues.js';
import type { PeriodWindow } from './metrics.js';

export interface WindowDuplication {
    window: Required<PeriodWindow>;
    rawRecordCount: number;
    entityCount: number;
    duplicationFactor: number;
}

export interface FieldCompleteness {
    populated: number;
    total: number;
    ratio: number;
}

/**
 * Read-only diagnostics produced alongside every metrics run.
 */
export interface DataQualityReport {
    /** Raw records that carried an identifier */
    rawRecordCount: number;
    entityCount: number;

    /** rawRecordCount / entityCount; above 1 means multi-row-per-project sources */
    duplicationFactor: number;
    windows: WindowDuplication[];

    completeness: Record<string, FieldCompleteness>;

    inconsistentEntities: Array<{
        key: string;
        recordCount: number;
        conflicts: InconsistentIdentityFieldIssue[];
    }>;

    unextractableIdentifiers: string[];
    unmappedHeaders: UnmappedHeaderIssue[];
    unparsedValues: UnparsedValueIssue[];
    recordsWithoutIdentifier: number;

    /** Per currency field, how many entities got their amount each way */
    provenanceCounts: Record<string, Record<AmountProvenance, number>>;

    issueCounts: Record<IssueKind, number>;
}
