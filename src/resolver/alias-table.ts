import { collapseWhitespace, normalizeLabel } from '../utils/text.js';

/**
 * Map a controlled-vocabulary variant onto its canonical label.
 * Lookup ignores case and whitespace; unknown values pass through collapsed.
 *
 * "Univ. of Illinois\nUrbana-Champaign" → "University of Illinois at Urbana-Champaign"
 */
export function applyAliasTable(
    value: string,
    table: ReadonlyMap<string, string> | undefined
): string {
    const collapsed = collapseWhitespace(value);
    return table?.get(normalizeLabel(collapsed)) ?? collapsed;
}

/**
 * Distinct values in first-seen order, compared case- and whitespace-insensitively.
 * The first spelling of each value is kept.
 */
export function distinctLabels(values: Iterable<string>): string[] {
    const seen = new Set<string>();
    const result: string[] = [];
    for (const value of values) {
        const key = normalizeLabel(value);
        if (seen.has(key)) continue;
        seen.add(key);
        result.push(value);
    }
    return result;
}
