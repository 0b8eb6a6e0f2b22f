import { createReadStream } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import csv from 'csv-parser';
import type { CellValue, SourceTable } from '../types/index.js';
import { SourceLoadError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export interface LoadOptions {
    /**
     * 0-based index of the row holding the effective header. Rows above it
     * (banner titles, grouped super-headers) are discarded.
     */
    headerRow?: number;

    /** Provenance tag for the records; the file name when omitted */
    source?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toCell(value: unknown): CellValue {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string' || typeof value === 'number') return value;
    if (typeof value === 'boolean') return String(value);
    return JSON.stringify(value);
}

/**
 * csv-parser with `headers: false` emits objects keyed "0", "1", ...
 */
function positionalRow(row: Record<string, unknown>): string[] {
    const cells: string[] = [];
    for (const [key, value] of Object.entries(row)) {
        const index = Number.parseInt(key, 10);
        if (Number.isNaN(index)) continue;
        cells[index] = typeof value === 'string' ? value : '';
    }
    return Array.from(cells, (cell) => cell ?? '');
}

/**
 * Load a CSV extract. The row at `headerRow` becomes the header line.
 */
export async function loadCsvSource(path: string, options: LoadOptions = {}): Promise<SourceTable> {
    const headerRow = options.headerRow ?? 0;
    const source = options.source ?? basename(path);
    const lines: string[][] = [];

    try {
        const stream = createReadStream(path).pipe(csv({ headers: false }));
        for await (const row of stream) {
            const value: unknown = row;
            if (isRecord(value)) lines.push(positionalRow(value));
        }
    } catch (error) {
        throw new SourceLoadError(`Cannot read CSV source (${errorMessage(error)})`, path, error);
    }

    const header = lines[headerRow];
    if (!header) {
        throw new SourceLoadError(`CSV source has no row ${headerRow} to use as header`, path);
    }

    const headers = header.map((cell, index) => (index === 0 ? cell.replace(/^\uFEFF/, '') : cell));
    const rows: CellValue[][] = lines.slice(headerRow + 1);

    getLogger().debug({ path, source, headerRow, columns: headers.length, rows: rows.length }, 'CSV source loaded');
    return { source, headers, rows };
}

/**
 * Load a JSON array of row objects. Headers are the union of keys, in first-seen order.
 */
export async function loadJsonSource(path: string, options: LoadOptions = {}): Promise<SourceTable> {
    const source = options.source ?? basename(path);

    let parsed: unknown;
    try {
        parsed = JSON.parse(await readFile(path, 'utf-8'));
    } catch (error) {
        throw new SourceLoadError(`Cannot read JSON source (${errorMessage(error)})`, path, error);
    }

    if (!Array.isArray(parsed)) {
        throw new SourceLoadError('JSON source must be an array of row objects', path);
    }

    const objects = parsed.filter(isRecord);
    if (objects.length !== parsed.length) {
        getLogger().warn({ path, skipped: parsed.length - objects.length }, 'Skipped JSON entries that are not objects');
    }

    const headers: string[] = [];
    const seen = new Set<string>();
    for (const object of objects) {
        for (const key of Object.keys(object)) {
            if (!seen.has(key)) {
                seen.add(key);
                headers.push(key);
            }
        }
    }

    const rows = objects.map((object) => headers.map((header) => toCell(object[header])));

    getLogger().debug({ path, source, columns: headers.length, rows: rows.length }, 'JSON source loaded');
    return { source, headers, rows };
}

/**
 * Load a source by file extension (.csv or .json).
 */
export async function loadSource(path: string, options: LoadOptions = {}): Promise<SourceTable> {
    const extension = extname(path).toLowerCase();
    switch (extension) {
        case '.csv':
            return loadCsvSource(path, options);
        case '.json':
            return loadJsonSource(path, options);
        default:
            throw new SourceLoadError(`Unsupported source format "${extension || '(none)'}"`, path);
    }
}
