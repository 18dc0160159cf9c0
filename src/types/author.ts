/**
 * Author and publication records, the data model of a corpus.
 * Persisted as a JSON array; field names match the on-disk format.
 */

/**
 * A single publication. Only `title` and `abstract` contribute text.
 */
export interface Publication {
    title: string;
    /** May be empty, in which case only the title is used */
    abstract: string;
    url?: string;
}

/**
 * How an author embedding is derived from the corpus.
 * - `aggregate`: mean of per-publication embeddings
 * - `summarize`: embedding of an LLM-written research summary
 */
export type EmbeddingStrategy = 'aggregate' | 'summarize';

export const EMBEDDING_STRATEGIES: readonly EmbeddingStrategy[] = ['aggregate', 'summarize'];

/**
 * An author record. Mutated in place by the batch driver, never deleted.
 */
export interface Author {
    name: string;
    publications: Publication[];

    /** LLM-generated research summary (summarize strategy / summary workflow) */
    summary?: string;

    /** Author vector, once computed */
    embedding?: number[];

    /** Strategy that produced `embedding` */
    embedding_strategy?: EmbeddingStrategy;

    /** `provider:model` that produced `embedding` */
    embedding_model?: string;

    /** Cause of the last terminal failure; cleared on success */
    error?: string;

    /** Fields of the source record this tool does not interpret */
    extra?: Record<string, unknown>;
}

/**
 * A query resolved from the query file or the command line.
 */
export interface Query {
    /** Identifier used in output file names (the query index, or `text`) */
    id: string;
    text: string;
    /** Present when the query came from a `{ title, abstract }` entry */
    title?: string;
    abstract?: string;
    embedding?: number[];
}

/**
 * A ranked author. Derived every run, never persisted as state.
 */
export interface FitnessResult {
    author_name: string;
    /** Position of the author in the corpus */
    index: number;
    score: number;
    /** 1-based; a total order over the run */
    rank: number;
}

/**
 * Why an author does not appear in the ranking.
 * - `degenerate`: no usable publication text
 * - `failed`: the last attempt ended in an unrecoverable error
 * - `pending`: never embedded under this run's strategy and model
 * - `stale`: embedded under a different strategy or model
 */
export type ExclusionReason = 'degenerate' | 'failed' | 'pending' | 'stale';

export interface ExcludedAuthor {
    author_name: string;
    index: number;
    reason: ExclusionReason;
    detail?: string;
}
