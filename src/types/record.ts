/**
 * A single cell as delivered by a source loader.
 * `null`, empty strings and whitespace-only strings all count as absent.
 */
export type CellValue = string | number | null;

/**
 * One tabular extract before header normalization.
 * Produced by the source loaders (CSV, JSON) or supplied directly by callers.
 */
export interface SourceTable {
    /** Source file or vintage tag (e.g. "FY23_reporting_IL.csv") */
    source: string;

    /** Literal header strings, exactly as they appear in the extract */
    headers: string[];

    /** Data rows, positionally aligned with `headers` */
    rows: CellValue[][];
}

/**
 * Where a raw record came from. `row` is the 1-based data row number
 * within its source, counted after the effective header row.
 */
export interface RecordProvenance {
    source: string;
    row: number;
}

/**
 * One row of a source extract, renamed onto canonical fields.
 * Frozen once created by the schema normalizer.
 */
export interface RawRecord {
    readonly values: Readonly<Record<string, CellValue>>;
    readonly provenance: Readonly<RecordProvenance>;
}

/**
 * Returns the cell unchanged, or null when it carries no value.
 */
export function present(value: CellValue | undefined): string | number | null {
    if (value === null || value === undefined) return null;
    if (typeof value === 'number') return Number.isNaN(value) ? null : value;
    return value.trim() === '' ? null : value;
}

export function isAbsent(value: CellValue | undefined): boolean {
    return present(value) === null;
}
