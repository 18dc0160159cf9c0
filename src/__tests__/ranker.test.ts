import { describe, it, expect } from 'vitest';
import { rankAuthors } from '../scoring/ranker.js';
import type { Author } from '../types/index.js';
import { author, pub } from './helpers.js';

const OPTIONS = { strategy: 'aggregate', model: 'fake:keywords' } as const;

function embedded(name: string, embedding: number[]): Author {
    return {
        ...author(name, [pub(`${name} paper`)]),
        embedding,
        embedding_strategy: 'aggregate',
        embedding_model: 'fake:keywords',
    };
}

describe('rankAuthors', () => {
    it('should rank by descending cosine similarity starting at 1', () => {
        const { results } = rankAuthors(
            [embedded('Low', [0, 1, 0]), embedded('High', [1, 0, 0]), embedded('Mid', [1, 1, 0])],
            [1, 0, 0],
            OPTIONS
        );

        expect(results.map((r) => [r.rank, r.author_name])).toEqual([
            [1, 'High'],
            [2, 'Mid'],
            [3, 'Low'],
        ]);
        expect(results[0]?.score).toBe(1);
        expect(results[1]?.score).toBeCloseTo(Math.SQRT1_2, 10);
        expect(results[2]?.score).toBe(0);
        expect(results.map((r) => r.index)).toEqual([1, 2, 0]);
    });

    it('should break ties by corpus order', () => {
        const { results } = rankAuthors(
            [embedded('First', [1, 0]), embedded('Other', [0, 1]), embedded('Second', [3, 0]), embedded('Third', [0.5, 0])],
            [1, 0],
            OPTIONS
        );

        expect(results.map((r) => r.author_name)).toEqual(['First', 'Second', 'Third', 'Other']);
        expect(results.map((r) => r.rank)).toEqual([1, 2, 3, 4]);
    });

    it('should exclude authors without a usable embedding and say why', () => {
        const authors: Author[] = [
            embedded('Ranked', [1, 0, 0]),
            author('NoPubs'),
            { ...author('Broken', [pub('x')]), error: 'boom' },
            author('Waiting', [pub('x')]),
            { ...embedded('Summarized', [1, 0, 0]), embedding_strategy: 'summarize' },
            embedded('Short', [1, 0]),
        ];

        const { results, excluded } = rankAuthors(authors, [1, 0, 0], OPTIONS);

        expect(results.map((r) => r.author_name)).toEqual(['Ranked']);
        expect(excluded).toEqual([
            { author_name: 'NoPubs', index: 1, reason: 'degenerate', detail: 'no usable publication text' },
            { author_name: 'Broken', index: 2, reason: 'failed', detail: 'boom' },
            { author_name: 'Waiting', index: 3, reason: 'pending' },
            { author_name: 'Summarized', index: 4, reason: 'stale', detail: 'embedded with summarize / fake:keywords' },
            { author_name: 'Short', index: 5, reason: 'stale', detail: 'embedding has 2 dimensions, query has 3' },
        ]);
    });

    it('should never score a degenerate author, even with a leftover embedding', () => {
        const leftover: Author = { ...embedded('Ghost', [1, 0]), publications: [] };
        const { results, excluded } = rankAuthors([leftover], [1, 0], OPTIONS);

        expect(results).toEqual([]);
        expect(excluded[0]?.reason).toBe('degenerate');
    });

    it('should treat an embedding from a different model as stale', () => {
        const { excluded } = rankAuthors([{ ...embedded('Old', [1, 0]), embedding_model: 'fake:v1' }], [1, 0], OPTIONS);
        expect(excluded[0]?.reason).toBe('stale');
    });
});
