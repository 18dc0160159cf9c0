import { existsSync, readFileSync } from 'node:fs';
import type { AuthorFitConfig, EmbeddingProvider, Query } from '../types/index.js';
import { ConfigurationError, describeError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import type { RetryPolicy } from '../utils/retry.js';

const logger = getLogger();

/**
 * One entry of a query file: plain text, or a paper-like `{ title, abstract }`.
 */
export type QueryEntry = string | { title: string; abstract: string };

/**
 * Load the list of queries from a JSON array file.
 * @throws ConfigurationError when the file is missing or malformed
 */
export function loadQueries(path: string): QueryEntry[] {
    if (!existsSync(path)) {
        throw new ConfigurationError(`Query file not found: ${path}`);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
        throw new ConfigurationError(`Invalid JSON in ${path}: ${describeError(error)}`);
    }

    if (!Array.isArray(raw)) {
        throw new ConfigurationError(`Expected a JSON array of queries in ${path}`);
    }

    return raw.map((entry, index) => {
        if (typeof entry === 'string') return entry;
        if (typeof entry === 'object' && entry !== null) {
            const title: unknown = 'title' in entry ? entry.title : undefined;
            const abstract: unknown = 'abstract' in entry ? entry.abstract : undefined;
            if (typeof title === 'string' || typeof abstract === 'string') {
                return {
                    title: typeof title === 'string' ? title : '',
                    abstract: typeof abstract === 'string' ? abstract : '',
                };
            }
        }
        throw new ConfigurationError(`Query #${index} in ${path} is neither a string nor { title, abstract }`);
    });
}

/**
 * Query text for an entry. Paper-like entries read as title, blank line, abstract.
 */
export function queryText(entry: QueryEntry): string {
    if (typeof entry === 'string') return entry.trim();

    const title = entry.title.trim();
    const abstract = entry.abstract.trim();
    if (!abstract) return title;
    if (!title) return abstract;
    return `${title}\n\n${abstract}`;
}

/**
 * Pick the run's query: literal text wins over an index into the query file.
 * @throws ConfigurationError when neither selector is usable
 */
export function selectQuery(config: Pick<AuthorFitConfig, 'queryFile' | 'queryIndex' | 'queryText'>): Query {
    if (config.queryText !== undefined) {
        const text = config.queryText.trim();
        if (!text) throw new ConfigurationError('Query text is empty');
        return { id: 'text', text };
    }

    if (config.queryIndex === undefined) {
        throw new ConfigurationError('Provide a query with --query-index or --query-text');
    }

    const queries = loadQueries(config.queryFile);
    const index = config.queryIndex;
    const entry = queries[index];
    if (!Number.isInteger(index) || index < 0 || entry === undefined) {
        throw new ConfigurationError(
            `Query index ${index} is out of range; ${config.queryFile} holds ${queries.length} queries`
        );
    }

    const text = queryText(entry);
    if (!text) throw new ConfigurationError(`Query #${index} in ${config.queryFile} is empty`);

    const query: Query = { id: String(index), text };
    if (typeof entry !== 'string') {
        query.title = entry.title;
        query.abstract = entry.abstract;
    }
    return query;
}

/**
 * Embed the query once for the run. Failures propagate: a run without a
 * query vector has nothing to rank against.
 */
export async function resolveQueryEmbedding(
    query: Query,
    embedder: EmbeddingProvider,
    retry: RetryPolicy
): Promise<number[]> {
    if (query.embedding) return query.embedding;

    const embedding = await retry.execute(`embed query ${query.id}`, () => embedder.embed(query.text));
    query.embedding = embedding;
    logger.debug({ query: query.id, dimensions: embedding.length }, 'Query embedded');
    return embedding;
}
