import { isComplete, type CompletionTarget } from '../batch/completion.js';
import { hasUsableText } from '../corpus/corpus.js';
import { cosineSimilarity } from '../embedding/vector.js';
import type { Author, EmbeddingStrategy, ExcludedAuthor, FitnessResult } from '../types/index.js';

export interface RankingOptions {
    strategy: EmbeddingStrategy;
    /** `provider:model` of the run's embedder */
    model: string;
}

export interface Ranking {
    results: FitnessResult[];
    excluded: ExcludedAuthor[];
}

/**
 * Score every author embedded under the run's strategy and model against
 * the query, highest first. Equal scores keep corpus order. Authors without
 * a usable embedding are listed in `excluded` with the reason.
 */
export function rankAuthors(authors: readonly Author[], queryVector: readonly number[], options: RankingOptions): Ranking {
    const target: CompletionTarget = { kind: 'embedding', strategy: options.strategy, model: options.model };
    const scored: Omit<FitnessResult, 'rank'>[] = [];
    const excluded: ExcludedAuthor[] = [];

    authors.forEach((author, index) => {
        const exclusion = exclusionOf(author, index, target, queryVector.length);
        if (exclusion) {
            excluded.push(exclusion);
            return;
        }
        scored.push({
            author_name: author.name,
            index,
            score: cosineSimilarity(queryVector, author.embedding ?? []),
        });
    });

    // Array.prototype.sort is stable, so ties stay in corpus order
    scored.sort((a, b) => b.score - a.score);

    return {
        results: scored.map((entry, i) => ({ ...entry, rank: i + 1 })),
        excluded,
    };
}

function exclusionOf(
    author: Author,
    index: number,
    target: CompletionTarget,
    dimensions: number
): ExcludedAuthor | null {
    const base = { author_name: author.name, index };

    if (!hasUsableText(author)) {
        return { ...base, reason: 'degenerate', detail: 'no usable publication text' };
    }

    if (isComplete(author, target)) {
        const actual = author.embedding?.length ?? 0;
        if (actual === dimensions) return null;
        return { ...base, reason: 'stale', detail: `embedding has ${actual} dimensions, query has ${dimensions}` };
    }

    if (author.error !== undefined) {
        return { ...base, reason: 'failed', detail: author.error };
    }

    if (author.embedding && author.embedding.length > 0) {
        return {
            ...base,
            reason: 'stale',
            detail: `embedded with ${author.embedding_strategy ?? 'unknown strategy'} / ${author.embedding_model ?? 'unknown model'}`,
        };
    }

    return { ...base, reason: 'pending' };
}
