import { normalizeField } from './normalizer.js';

/**
 * Split normalized text into lowercase tokens. No dictionary lookups,
 * no stemming.
 */
export function tokenize(text: string): string[] {
    if (!text) return [];

    return text
        .toLowerCase()
        .split(/\s+/)
        .filter((token) => token.length > 0);
}

/**
 * Drop single-letter tokens and stop words, preserving order.
 * Length is counted in code points so `ä` stays one letter.
 */
export function filterStopWords(tokens: readonly string[], stopwords: ReadonlySet<string>): string[] {
    return tokens.filter((token) =>
        Array.from(token).length >= 2 &&
        !stopwords.has(token.toLowerCase())
    );
}

/**
 * Normalize, tokenize and filter a single raw field in one pass.
 */
export function extractTokens(raw: string, stopwords: ReadonlySet<string>): string[] {
    return filterStopWords(tokenize(normalizeField(raw)), stopwords);
}
