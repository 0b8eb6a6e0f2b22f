import type {
    CellValue,
    CompiledConfig,
    RawRecord,
    SourceTable,
    UnmappedHeaderIssue,
} from '../types/index.js';
import { present } from '../types/index.js';
import { stageLogger } from '../utils/logger.js';
import { normalizeLabel } from '../utils/text.js';
import { sharedWordCount } from './tokenizer.js';

/** Shared significant words required before a fuzzy header match is accepted */
const MIN_SHARED_WORDS = 2;

export type HeaderConfig = Pick<CompiledConfig, 'headerAliases' | 'headerStopwords'>;

/**
 * Result of matching one source's headers onto the canonical fields.
 */
export interface HeaderMapping {
    /** Canonical field per column, or null for columns that are dropped */
    columns: Array<string | null>;

    /** Canonical field → column index, in column order */
    fields: Map<string, number>;

    issues: UnmappedHeaderIssue[];
}

export interface NormalizedSource {
    source: string;
    records: RawRecord[];
    mapping: HeaderMapping;

    /** Rows dropped because every cell was empty or the row repeated the header */
    skippedRows: number;
}

/**
 * Map literal headers onto canonical fields.
 *
 * Exact (normalized) alias matches are taken first, in column order. Remaining
 * headers are matched by shared significant words against the aliases of the
 * fields still unclaimed; the best overlap wins and ties go to the field
 * declared first.
 */
export function mapHeaders(
    headers: readonly string[],
    config: HeaderConfig,
    source = ''
): HeaderMapping {
    const columns: Array<string | null> = headers.map(() => null);
    const claimed = new Map<string, number>();
    const issues: UnmappedHeaderIssue[] = [];
    const pending: number[] = [];

    const unmapped = (column: number, reason: UnmappedHeaderIssue['reason'], field?: string) => {
        const issue: UnmappedHeaderIssue = {
            kind: 'UnmappedHeader',
            source,
            header: headers[column] ?? '',
            column,
            reason,
        };
        if (field !== undefined) issue.field = field;
        issues.push(issue);
    };

    // Pass 1: exact alias matches
    headers.forEach((header, column) => {
        const normalized = normalizeLabel(header);
        if (normalized === '') {
            unmapped(column, 'blank');
            return;
        }

        let exact: string | null = null;
        for (const [field, aliases] of config.headerAliases) {
            if (aliases.includes(normalized)) {
                exact = field;
                break;
            }
        }

        if (exact === null) {
            pending.push(column);
        } else if (claimed.has(exact)) {
            unmapped(column, 'duplicate-field', exact);
        } else {
            claimed.set(exact, column);
            columns[column] = exact;
        }
    });

    // Pass 2: token overlap against fields nobody has claimed yet
    for (const column of pending) {
        const header = headers[column] ?? '';
        let bestField: string | null = null;
        let bestOverlap = 0;

        for (const [field, aliases] of config.headerAliases) {
            if (claimed.has(field)) continue;
            for (const alias of aliases) {
                const overlap = sharedWordCount(header, alias, config.headerStopwords);
                if (overlap > bestOverlap) {
                    bestOverlap = overlap;
                    bestField = field;
                }
            }
        }

        if (bestField !== null && bestOverlap >= MIN_SHARED_WORDS) {
            claimed.set(bestField, column);
            columns[column] = bestField;
        } else {
            unmapped(column, 'no-match');
        }
    }

    const fields = new Map(
        [...claimed.entries()].sort((a, b) => a[1] - b[1])
    );

    return { columns, fields, issues };
}

function isRepeatedHeader(row: readonly CellValue[], headers: readonly string[]): boolean {
    let compared = 0;
    for (let i = 0; i < row.length; i++) {
        const cell = present(row[i]);
        if (cell === null) continue;
        if (normalizeLabel(String(cell)) !== normalizeLabel(headers[i] ?? '')) return false;
        compared++;
    }
    return compared > 0;
}

/**
 * Rename one source's rows onto canonical fields and freeze them as raw records.
 * Empty rows and rows repeating the header line are skipped.
 */
export function normalizeSource(table: SourceTable, config: HeaderConfig): NormalizedSource {
    const log = stageLogger('schema');
    const mapping = mapHeaders(table.headers, config, table.source);

    for (const issue of mapping.issues) {
        log.warn(
            { source: table.source, header: issue.header, column: issue.column, reason: issue.reason, field: issue.field },
            'Unmapped header'
        );
    }

    const records: RawRecord[] = [];
    let skippedRows = 0;

    table.rows.forEach((row, index) => {
        if (row.every((cell) => present(cell) === null) || isRepeatedHeader(row, table.headers)) {
            skippedRows++;
            return;
        }

        const values: Record<string, CellValue> = {};
        for (const [field, column] of mapping.fields) {
            values[field] = row[column] ?? null;
        }

        records.push(Object.freeze({
            values: Object.freeze(values),
            provenance: Object.freeze({ source: table.source, row: index + 1 }),
        }));
    });

    log.info(
        { source: table.source, mapped: mapping.fields.size, unmapped: mapping.issues.length, records: records.length, skippedRows },
        'Source normalized'
    );

    return { source: table.source, records, mapping, skippedRows };
}
