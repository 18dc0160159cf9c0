import type { Author, EmbeddingProvider, EmbeddingStrategy, LlmProvider } from '../types/index.js';
import { hasUsableText, publicationText } from '../corpus/corpus.js';
import { summarizeAuthor } from '../summarize/summarizer.js';
import { ConfigurationError, DegenerateInputWarning, ProviderError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import type { RetryPolicy } from '../utils/retry.js';
import { meanVector } from './vector.js';

const logger = getLogger();

/**
 * Derives one vector per author. One instance serves a whole run, so every
 * author of the run is embedded with the same strategy.
 */
export interface AuthorEmbedder {
    readonly strategy: EmbeddingStrategy;
    /** `provider:model` recorded on every embedded author */
    readonly modelKey: string;

    /**
     * Compute and store the author's embedding (and summary, when summarizing).
     * @throws DegenerateInputWarning when the author has no usable text
     * @throws RetryExhaustedError or ProviderError when a provider call fails
     */
    embed(author: Author, index: number): Promise<void>;
}

export interface AuthorEmbedderDeps {
    embedder: EmbeddingProvider;
    retry: RetryPolicy;
    /** Required by the summarize strategy */
    llm?: LlmProvider;
    /** Token budget for summary prompts */
    maxContextTokens?: number;
}

export function modelKeyOf(provider: EmbeddingProvider): string {
    return `${provider.name}:${provider.model}`;
}

/**
 * Pick the embedder for the run's strategy.
 * @throws ConfigurationError when `summarize` is requested without an LLM
 */
export function createAuthorEmbedder(strategy: EmbeddingStrategy, deps: AuthorEmbedderDeps): AuthorEmbedder {
    switch (strategy) {
        case 'aggregate':
            return new AggregateEmbedder(deps.embedder, deps.retry);
        case 'summarize':
            if (!deps.llm) {
                throw new ConfigurationError('The summarize strategy needs an LLM provider');
            }
            return new SummarizeEmbedder(deps.embedder, deps.llm, deps.retry, deps.maxContextTokens ?? 100000);
    }
}

/**
 * Mean of per-publication embeddings. Publications without text are skipped.
 */
export class AggregateEmbedder implements AuthorEmbedder {
    readonly strategy = 'aggregate' as const;
    readonly modelKey: string;

    constructor(
        private readonly embedder: EmbeddingProvider,
        private readonly retry: RetryPolicy
    ) {
        this.modelKey = modelKeyOf(embedder);
    }

    async embed(author: Author, index: number): Promise<void> {
        const texts = author.publications.map(publicationText).filter((text) => text.length > 0);
        if (texts.length === 0) throw new DegenerateInputWarning(author.name, index);

        const skipped = author.publications.length - texts.length;
        if (skipped > 0) {
            logger.debug({ author: author.name, skipped }, 'Skipping publications without text');
        }

        const vectors: number[][] = [];
        for (const [i, text] of texts.entries()) {
            const vector = await this.retry.execute(
                `embed publication ${i + 1}/${texts.length} of ${author.name}`,
                () => this.embedder.embed(text)
            );
            const expected = vectors[0]?.length;
            if (expected !== undefined && vector.length !== expected) {
                throw new ProviderError(
                    `${this.embedder.name} returned ${vector.length} dimensions, expected ${expected}`,
                    this.embedder.name,
                    false
                );
            }
            vectors.push(vector);
        }

        assignEmbedding(author, meanVector(vectors), this.strategy, this.modelKey);
    }
}

/**
 * Embedding of an LLM-written research summary. An existing summary is reused,
 * so only the embedding call is made for authors summarized earlier.
 */
export class SummarizeEmbedder implements AuthorEmbedder {
    readonly strategy = 'summarize' as const;
    readonly modelKey: string;

    constructor(
        private readonly embedder: EmbeddingProvider,
        private readonly llm: LlmProvider,
        private readonly retry: RetryPolicy,
        private readonly maxContextTokens: number
    ) {
        this.modelKey = modelKeyOf(embedder);
    }

    async embed(author: Author, index: number): Promise<void> {
        if (!hasUsableText(author)) throw new DegenerateInputWarning(author.name, index);

        let summary = author.summary?.trim();
        if (!summary) {
            summary = await summarizeAuthor(author, this.llm, this.retry, this.maxContextTokens);
            author.summary = summary;
        }

        const text = summary;
        const vector = await this.retry.execute(`embed summary of ${author.name}`, () => this.embedder.embed(text));
        assignEmbedding(author, vector, this.strategy, this.modelKey);
    }
}

function assignEmbedding(author: Author, vector: number[], strategy: EmbeddingStrategy, modelKey: string): void {
    author.embedding = vector;
    author.embedding_strategy = strategy;
    author.embedding_model = modelKey;
}
