import type { Author, EmbeddingStrategy } from '../types/index.js';

/**
 * What a batch run produces for each author.
 */
export type CompletionTarget =
    | { kind: 'summary' }
    | { kind: 'embedding'; strategy: EmbeddingStrategy; model: string };

/**
 * Whether the author already carries the target's output. Pure: reads only
 * the author record, so the same record always gets the same answer.
 */
export function isComplete(author: Author, target: CompletionTarget): boolean {
    switch (target.kind) {
        case 'summary':
            return Boolean(author.summary?.trim());
        case 'embedding':
            return (
                author.embedding !== undefined &&
                author.embedding.length > 0 &&
                author.embedding_strategy === target.strategy &&
                author.embedding_model === target.model
            );
    }
}
