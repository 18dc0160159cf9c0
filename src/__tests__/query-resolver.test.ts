import { describe, it, expect } from 'vitest';
import path from 'node:path';
import { loadQueries, queryText, resolveQueryEmbedding, selectQuery } from '../embedding/query-resolver.js';
import { ConfigurationError } from '../utils/errors.js';
import { RetryPolicy } from '../utils/retry.js';
import { KeywordEmbedder, makeTmpDir, noSleep, transientError, writeJson } from './helpers.js';

function queryFile(entries: unknown): string {
    const file = path.join(makeTmpDir(), 'query.json');
    writeJson(file, entries);
    return file;
}

describe('query resolver', () => {
    it('should read string and paper-like entries', () => {
        const file = queryFile(['graphs', { title: 'Title', abstract: 'Abstract' }, { title: 'Only title' }]);

        expect(loadQueries(file)).toEqual([
            'graphs',
            { title: 'Title', abstract: 'Abstract' },
            { title: 'Only title', abstract: '' },
        ]);
    });

    it('should reject entries of another shape', () => {
        expect(() => loadQueries(queryFile([42]))).toThrow('Query #0');
        expect(() => loadQueries(queryFile({ q: 'x' }))).toThrow(ConfigurationError);
        expect(() => loadQueries('/nonexistent/query.json')).toThrow('Query file not found');
    });

    it('should join title and abstract with a blank line', () => {
        expect(queryText({ title: ' Title ', abstract: 'Abstract ' })).toBe('Title\n\nAbstract');
        expect(queryText({ title: 'Title', abstract: '' })).toBe('Title');
        expect(queryText('  plain  ')).toBe('plain');
    });

    it('should select by index and keep the paper parts', () => {
        const file = queryFile(['first', { title: 'T', abstract: 'A' }]);

        expect(selectQuery({ queryFile: file, queryIndex: 0 })).toEqual({ id: '0', text: 'first' });
        expect(selectQuery({ queryFile: file, queryIndex: 1 })).toEqual({
            id: '1',
            text: 'T\n\nA',
            title: 'T',
            abstract: 'A',
        });
    });

    it('should prefer literal text over an index', () => {
        expect(selectQuery({ queryFile: '/unused.json', queryIndex: 3, queryText: ' graphs ' })).toEqual({
            id: 'text',
            text: 'graphs',
        });
    });

    it('should reject a missing selector, an out-of-range index and an empty query', () => {
        const file = queryFile(['only', '   ']);

        expect(() => selectQuery({ queryFile: file })).toThrow('--query-index or --query-text');
        expect(() => selectQuery({ queryFile: file, queryIndex: 2 })).toThrow('Query index 2 is out of range');
        expect(() => selectQuery({ queryFile: file, queryIndex: 1 })).toThrow('is empty');
        expect(() => selectQuery({ queryFile: file, queryText: ' ' })).toThrow('Query text is empty');
    });

    it('should embed the query once under the retry policy', async () => {
        const embedder = new KeywordEmbedder(['graph'], 'keywords', (_text, call) =>
            call === 1 ? transientError() : undefined
        );
        const query = { id: '0', text: 'graph graph' };
        const retry = new RetryPolicy({ sleep: noSleep });

        expect(await resolveQueryEmbedding(query, embedder, retry)).toEqual([2]);
        expect(await resolveQueryEmbedding(query, embedder, retry)).toEqual([2]);
        expect(embedder.calls).toHaveLength(2);
    });
});
