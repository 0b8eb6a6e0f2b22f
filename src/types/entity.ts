import type { AmountProvenance } from './field.js';
import type { IdentityConflict, UnparsedValueIssue } from './issues.js';

/**
 * A resolved field value. Strings for `string` fields, numbers for
 * `currency` and `count` fields, `null` when no record carried a value.
 */
export type FieldValue = string | number | null;

/**
 * The canonical, deduplicated representation of one funded project,
 * built from every raw record that shares its identifier.
 */
export interface ProjectEntity {
    /** Trimmed identifier value (e.g. "2020IL103AIS") */
    readonly key: string;

    /** Year recovered from the identifier, or null when unextractable */
    readonly year: number | null;

    /** One resolved value per canonical field */
    readonly fields: Readonly<Record<string, FieldValue>>;

    /** Distinct values seen for each UNION field, first one is the display value */
    readonly variants: Readonly<Record<string, readonly string[]>>;

    /** Where each currency field's canonical amount came from */
    readonly amountProvenance: Readonly<Record<string, AmountProvenance>>;

    /** Number of raw records that shared this key */
    readonly recordCount: number;

    /** False when any IDENTITY field disagreed across records */
    readonly consistency: boolean;

    /** Disagreements found while resolving (IDENTITY and SUM_SAFE fields) */
    readonly conflicts: readonly IdentityConflict[];

    /** Values that could not be parsed and defaulted to zero */
    readonly parseIssues: readonly UnparsedValueIssue[];
}
