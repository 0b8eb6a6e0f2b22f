/**
 * Value type of a canonical field.
 */
export type FieldType = 'string' | 'currency' | 'count';

/**
 * How a field's value is derived when several raw records share an entity key.
 *
 *   IDENTITY       must agree across records; the first value is kept
 *   SUM_SAFE       one representative value per entity; summed across entities only
 *   MAX_OF_PARSED  largest amount parsed from any record (echoed free-text amounts)
 *   UNION          distinct values, after controlled-vocabulary aliasing
 */
export type AggregationPolicy = 'IDENTITY' | 'SUM_SAFE' | 'MAX_OF_PARSED' | 'UNION';

export const AGGREGATION_POLICIES: readonly AggregationPolicy[] = [
    'IDENTITY',
    'SUM_SAFE',
    'MAX_OF_PARSED',
    'UNION',
];

/**
 * Entry of the policy table.
 */
export interface FieldDefinition {
    type: FieldType;
    policy: AggregationPolicy;

    /** Field consulted when this one yields nothing (swapped-column recovery) */
    adjacentField?: string;

    /** Free-text fields scanned in order for currency amounts after the adjacent field */
    textFallbackFields?: string[];

    /** Name of an alias table applied to values before grouping (UNION fields) */
    aliasTable?: string;
}

/**
 * A canonical field with its name attached, as held by the compiled config.
 */
export interface CanonicalField extends FieldDefinition {
    name: string;
}

/**
 * Where a currency amount came from.
 */
export type AmountProvenance =
    | 'direct'
    | 'summed-from-text'
    | 'recovered-from-swap'
    | 'sentinel'
    | 'absent'
    | 'defaulted-to-zero';

export const AMOUNT_PROVENANCES: readonly AmountProvenance[] = [
    'direct',
    'summed-from-text',
    'recovered-from-swap',
    'sentinel',
    'absent',
    'defaulted-to-zero',
];

/**
 * Result of the structured-value parser. `amount` is never negative.
 */
export interface ParsedAmount {
    amount: number;
    provenance: AmountProvenance;
}
