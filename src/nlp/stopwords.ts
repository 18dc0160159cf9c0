import words from './stopwords.json' with { type: 'json' };

/**
 * English stopwords plus generic academic filler ("propose", "results", ...).
 * No stemming: tokenization stays deterministic.
 */
export const STOPWORDS: ReadonlySet<string> = new Set(words);
