import type { CellValue, ParsedAmount } from '../types/index.js';
import { present } from '../types/index.js';

export interface ParseOptions {
    /** Upper-cased sentinel strings that mean "no value" */
    sentinels: ReadonlySet<string>;

    /** Value of the designated adjacent field in the same record */
    adjacent?: CellValue;

    /** Free-text cells scanned in order for currency amounts when nothing else yields one */
    fallbackTexts?: readonly (CellValue | undefined)[];
}

// ─── Patterns ────────────────────────────────────────────

/** One number: optional sign and `$`, grouped thousands or plain digits, optional decimals */
const BARE_NUMBER = /^(-?)\$?\s*(\d{1,3}(?:,\d{3})+|\d+)(\.\d+)?$/;

/**
 * Currency amounts inside prose. Either `$`-prefixed ("$1,000", "$2.5 million",
 * "$40K") or followed by a currency word ("15,000 dollars", "5000 USD").
 * A `$` amount followed by a currency word is matched once. The single-letter
 * suffixes only count when attached to the digits and not part of a word
 * ("$3,000 K-12" is 3000).
 */
const CURRENCY_AMOUNT =
    /\$\s*(\d[\d,]*(?:\.\d+)?)(?:\s*(million|thousand)\b|([km])(?![\w.-]))?(?:\s*(?:usd|dollars)\b)?|(\d[\d,]*(?:\.\d+)?)(?:\s*(million|thousand)|([km]))?\s*(?:usd|dollars)\b/gi;

const MULTIPLIERS: Record<string, number> = {
    k: 1_000,
    thousand: 1_000,
    m: 1_000_000,
    million: 1_000_000,
};

// ─── Helpers ─────────────────────────────────────────────

function roundCents(amount: number): number {
    return Math.round(amount * 100) / 100;
}

/**
 * Parse a value that is a number on its own, allowing `$`, thousands
 * separators and surrounding whitespace. Returns null for anything else.
 */
function parseBareNumber(value: string | number): number | null {
    if (typeof value === 'number') return value;
    const match = BARE_NUMBER.exec(value.trim());
    if (!match) return null;
    const [, sign = '', digits = '', decimals = ''] = match;
    return Number.parseFloat(`${sign}${digits.replace(/,/g, '')}${decimals}`);
}

/**
 * Sum every currency amount mentioned in a piece of text.
 * Returns null when the text mentions none.
 */
export function sumCurrencyMentions(text: string): number | null {
    let total = 0;
    let found = false;

    for (const match of text.matchAll(CURRENCY_AMOUNT)) {
        const digits = match[1] ?? match[4];
        if (digits === undefined) continue;

        const base = Number.parseFloat(digits.replace(/,/g, ''));
        if (!Number.isFinite(base)) continue;

        const unit = (match[2] ?? match[3] ?? match[5] ?? match[6] ?? '').toLowerCase();
        total += base * (MULTIPLIERS[unit] ?? 1);
        found = true;
    }

    return found ? roundCents(total) : null;
}

function isSentinel(value: string, sentinels: ReadonlySet<string>): boolean {
    return sentinels.has(value.trim().toUpperCase());
}

function direct(amount: number): ParsedAmount {
    if (!Number.isFinite(amount) || amount < 0) {
        return { amount: 0, provenance: 'defaulted-to-zero' };
    }
    return { amount, provenance: 'direct' };
}

// ─── Parsers ─────────────────────────────────────────────

/**
 * Extract a currency amount from a mixed numeric/free-text cell.
 *
 * 1. direct number (one number, optionally `$`-prefixed with grouped thousands)
 * 2. sentinel ("NA", "N/A", "None", ...) → 0
 * 3. sum of currency amounts found in the text
 * 4. the adjacent field, if it holds a bare number (swapped columns)
 * 5. currency amounts in the fallback text fields, first that mentions any
 * 6. 0, flagged as `defaulted-to-zero` when text was present, `absent` otherwise
 */
export function parseAmount(value: CellValue | undefined, options: ParseOptions): ParsedAmount {
    const cell = present(value);

    if (cell !== null) {
        const number = parseBareNumber(cell);
        if (number !== null) return direct(number);

        if (typeof cell === 'string') {
            if (isSentinel(cell, options.sentinels)) {
                return { amount: 0, provenance: 'sentinel' };
            }

            const mentioned = sumCurrencyMentions(cell);
            if (mentioned !== null) {
                return { amount: mentioned, provenance: 'summed-from-text' };
            }
        }
    }

    const adjacent = present(options.adjacent);
    if (adjacent !== null) {
        const swapped = parseBareNumber(adjacent);
        if (swapped !== null && Number.isFinite(swapped) && swapped >= 0) {
            return { amount: swapped, provenance: 'recovered-from-swap' };
        }
    }

    for (const text of options.fallbackTexts ?? []) {
        const fallback = present(text);
        if (typeof fallback !== 'string') continue;
        const mentioned = sumCurrencyMentions(fallback);
        if (mentioned !== null && mentioned > 0) {
            return { amount: mentioned, provenance: 'summed-from-text' };
        }
    }

    return { amount: 0, provenance: cell === null ? 'absent' : 'defaulted-to-zero' };
}

/**
 * Extract a count (trainees, ...). Only direct numbers and sentinels are
 * recognized; fractional counts are kept as given.
 */
export function parseCount(value: CellValue | undefined, options: ParseOptions): ParsedAmount {
    const cell = present(value);
    if (cell === null) return { amount: 0, provenance: 'absent' };

    const number = parseBareNumber(cell);
    if (number !== null) return direct(number);

    if (typeof cell === 'string' && isSentinel(cell, options.sentinels)) {
        return { amount: 0, provenance: 'sentinel' };
    }

    return { amount: 0, provenance: 'defaulted-to-zero' };
}
