import { STOPWORDS } from './stopwords.js';

/**
 * Tokenize text into lowercase content words.
 * - Split on whitespace and punctuation (hyphens kept inside words)
 * - Drop stopwords, single characters and pure numbers
 * - No stemming (deterministic)
 */
export function tokenize(text: string): string[] {
    if (!text) return [];

    return text
        .toLowerCase()
        .replace(/[^a-z0-9\s-]/g, ' ')
        .split(/\s+/)
        .map((token) => token.replace(/^-+|-+$/g, ''))
        .filter((token) =>
            token.length > 1 &&
            !STOPWORDS.has(token) &&
            !/^\d+$/.test(token)
        );
}
