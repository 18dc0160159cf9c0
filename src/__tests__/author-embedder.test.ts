import { describe, it, expect } from 'vitest';
import {
    AggregateEmbedder,
    SummarizeEmbedder,
    createAuthorEmbedder,
    modelKeyOf,
} from '../embedding/author-embedder.js';
import type { EmbeddingProvider } from '../types/index.js';
import { ConfigurationError, DegenerateInputWarning, ProviderError } from '../utils/errors.js';
import { RetryPolicy } from '../utils/retry.js';
import { FakeLlm, KeywordEmbedder, author, noSleep, pub, transientError } from './helpers.js';

const VOCABULARY = ['graph', 'protein', 'neural'];

function retry(): RetryPolicy {
    return new RetryPolicy({ sleep: noSleep });
}

describe('AggregateEmbedder', () => {
    it('should average one embedding per publication', async () => {
        const embedder = new KeywordEmbedder(VOCABULARY);
        const subject = author('Ada', [pub('Graph Neural'), pub('Protein graph')]);

        await new AggregateEmbedder(embedder, retry()).embed(subject, 0);

        expect(embedder.calls).toEqual(['Graph Neural', 'Protein graph']);
        expect(subject.embedding).toEqual([1, 0.5, 0.5]);
        expect(subject.embedding_strategy).toBe('aggregate');
        expect(subject.embedding_model).toBe('fake:keywords');
        expect(subject.summary).toBeUndefined();
    });

    it('should produce vectors of the model dimensionality', async () => {
        const subject = author('Ada', [pub('a'), pub('b'), pub('c')]);
        await new AggregateEmbedder(new KeywordEmbedder(VOCABULARY), retry()).embed(subject, 0);
        expect(subject.embedding).toHaveLength(VOCABULARY.length);
    });

    it('should skip publications without text', async () => {
        const embedder = new KeywordEmbedder(VOCABULARY);
        const subject = author('Ada', [pub('', ''), pub('graph')]);

        await new AggregateEmbedder(embedder, retry()).embed(subject, 0);

        expect(embedder.calls).toEqual(['graph']);
        expect(subject.embedding).toEqual([1, 0, 0]);
    });

    it('should flag an author whose publications are all empty without calling the provider', async () => {
        const embedder = new KeywordEmbedder(VOCABULARY);
        const subject = author('Ada', [pub(' ', '')]);

        await expect(new AggregateEmbedder(embedder, retry()).embed(subject, 4)).rejects.toBeInstanceOf(
            DegenerateInputWarning
        );
        expect(embedder.calls).toEqual([]);
        expect(subject.embedding).toBeUndefined();
    });

    it('should retry transient failures per publication', async () => {
        const embedder = new KeywordEmbedder(VOCABULARY, 'keywords', (_text, call) =>
            call <= 2 ? transientError() : undefined
        );
        const subject = author('Ada', [pub('neural')]);

        await new AggregateEmbedder(embedder, retry()).embed(subject, 0);

        expect(embedder.calls).toHaveLength(3);
        expect(subject.embedding).toEqual([0, 0, 1]);
    });

    it('should treat mixed dimensionalities as a permanent provider fault', async () => {
        let call = 0;
        const inconsistent: EmbeddingProvider = {
            name: 'odd',
            model: 'm',
            embed: async () => (++call === 1 ? [1, 2] : [1, 2, 3]),
        };
        const subject = author('Ada', [pub('one'), pub('two')]);

        const error = await new AggregateEmbedder(inconsistent, retry()).embed(subject, 0).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ProviderError);
        if (error instanceof ProviderError) expect(error.retryable).toBe(false);
        expect(call).toBe(2);
        expect(subject.embedding).toBeUndefined();
    });
});

describe('SummarizeEmbedder', () => {
    it('should summarize once and embed the summary once', async () => {
        const embedder = new KeywordEmbedder(VOCABULARY);
        const llm = new FakeLlm();
        const subject = author('Ada', [pub('Graph Neural', 'Abstract.')]);

        await new SummarizeEmbedder(embedder, llm, retry(), 100000).embed(subject, 0);

        expect(llm.prompts).toHaveLength(1);
        expect(subject.summary).toBe('Research on Graph Neural');
        expect(embedder.calls).toEqual(['Research on Graph Neural']);
        expect(subject.embedding).toEqual([1, 0, 1]);
        expect(subject.embedding_strategy).toBe('summarize');
    });

    it('should reuse an existing summary', async () => {
        const embedder = new KeywordEmbedder(VOCABULARY);
        const llm = new FakeLlm();
        const subject = { ...author('Ada', [pub('Graph Neural')]), summary: 'protein folding' };

        await new SummarizeEmbedder(embedder, llm, retry(), 100000).embed(subject, 0);

        expect(llm.prompts).toEqual([]);
        expect(subject.embedding).toEqual([0, 1, 0]);
    });

    it('should flag an author without publications before calling the LLM', async () => {
        const llm = new FakeLlm();
        await expect(
            new SummarizeEmbedder(new KeywordEmbedder(VOCABULARY), llm, retry(), 100000).embed(author('Ada'), 1)
        ).rejects.toBeInstanceOf(DegenerateInputWarning);
        expect(llm.prompts).toEqual([]);
    });

    it('should retry an empty summary', async () => {
        const llm = new FakeLlm((_prompt, call) => (call === 1 ? '   ' : 'graph theory'));
        const subject = author('Ada', [pub('Anything')]);

        await new SummarizeEmbedder(new KeywordEmbedder(VOCABULARY), llm, retry(), 100000).embed(subject, 0);

        expect(llm.prompts).toHaveLength(2);
        expect(subject.summary).toBe('graph theory');
    });
});

describe('createAuthorEmbedder', () => {
    it('should pick the embedder for the strategy', () => {
        const embedder = new KeywordEmbedder(VOCABULARY);
        expect(createAuthorEmbedder('aggregate', { embedder, retry: retry() })).toBeInstanceOf(AggregateEmbedder);
        expect(createAuthorEmbedder('summarize', { embedder, retry: retry(), llm: new FakeLlm() })).toBeInstanceOf(
            SummarizeEmbedder
        );
    });

    it('should require an LLM for the summarize strategy', () => {
        expect(() =>
            createAuthorEmbedder('summarize', { embedder: new KeywordEmbedder(VOCABULARY), retry: retry() })
        ).toThrow(ConfigurationError);
    });

    it('should key models by provider and model name', () => {
        expect(modelKeyOf(new KeywordEmbedder(VOCABULARY, 'v2'))).toBe('fake:v2');
    });
});
