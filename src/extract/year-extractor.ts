import type { CellValue, CompiledYearRule } from '../types/index.js';
import { present } from '../types/index.js';

/**
 * Recover a year from an identifier such as "2020IL103AIS" or "FY23-017".
 *
 * Rules are tried in order. Within a rule, matches are scanned left to right
 * and the first whose year falls inside the rule's range wins. Capture group 1
 * is used when the pattern has one, otherwise the whole match.
 *
 * Returns null when nothing matches (the identifier is unextractable).
 */
export function extractYear(
    identifier: CellValue | undefined,
    rules: readonly CompiledYearRule[]
): number | null {
    const value = present(identifier);
    if (value === null) return null;

    const text = String(value);
    for (const rule of rules) {
        for (const match of text.matchAll(rule.regex)) {
            const digits = match[1] ?? match[0];
            const parsed = Number.parseInt(digits, 10);
            if (Number.isNaN(parsed)) continue;

            const year = parsed + (rule.century ?? 0);
            if (year >= rule.minYear && year <= rule.maxYear) {
                return year;
            }
        }
    }

    return null;
}
