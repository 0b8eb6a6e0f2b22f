/**
 * Collapse newlines, tabs and repeated spaces into single spaces and trim.
 * Source headers wrap across lines and often carry trailing spaces.
 */
export function collapseWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

/**
 * Normalize a label for case- and whitespace-insensitive comparison.
 * "Project ID \n" → "project id"
 */
export function normalizeLabel(text: string): string {
    return collapseWhitespace(text).toLowerCase();
}

/**
 * Stable string form of a cell or resolved value, used for comparisons
 * and sort keys. Numbers keep their JS representation.
 */
export function cellText(value: string | number): string {
    return typeof value === 'number' ? String(value) : collapseWhitespace(value);
}
