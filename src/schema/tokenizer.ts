/**
 * Split a column header into its significant words.
 * - Lowercase
 * - Split on whitespace and punctuation
 * - Remove stopwords
 * - Remove single-character tokens
 * - Remove pure numbers
 */
export function tokenize(text: string, stopwords: ReadonlySet<string>): string[] {
    if (!text) return [];

    return text
        .toLowerCase()
        .replace(/[^a-z0-9\s]/g, ' ')
        .split(/\s+/)
        .filter((token) =>
            token.length > 1 &&
            !stopwords.has(token) &&
            !/^\d+$/.test(token)
        );
}

/**
 * Number of distinct significant words two labels share.
 */
export function sharedWordCount(
    left: string,
    right: string,
    stopwords: ReadonlySet<string>
): number {
    const leftWords = new Set(tokenize(left, stopwords));
    let shared = 0;
    for (const word of new Set(tokenize(right, stopwords))) {
        if (leftWords.has(word)) shared++;
    }
    return shared;
}
