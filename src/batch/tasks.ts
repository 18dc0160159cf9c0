import { hasUsableText } from '../corpus/corpus.js';
import type { AuthorEmbedder } from '../embedding/author-embedder.js';
import { summarizeAuthor } from '../summarize/summarizer.js';
import type { Author, LlmProvider } from '../types/index.js';
import type { RetryPolicy } from '../utils/retry.js';
import type { CompletionTarget } from './completion.js';

/**
 * Unit of work the batch driver applies to each pending author.
 */
export interface AuthorTask {
    /** Shown in log lines */
    readonly label: string;
    readonly target: CompletionTarget;
    /** Authors for which this returns false make no provider call */
    hasInput(author: Author): boolean;
    run(author: Author, index: number): Promise<void>;
}

/**
 * Build (or rebuild) the author's embedding with the run's embedder.
 */
export class EmbeddingTask implements AuthorTask {
    readonly label: string;
    readonly target: CompletionTarget;

    constructor(private readonly embedder: AuthorEmbedder) {
        this.label = `embed:${embedder.strategy}`;
        this.target = { kind: 'embedding', strategy: embedder.strategy, model: embedder.modelKey };
    }

    hasInput(author: Author): boolean {
        return hasUsableText(author);
    }

    run(author: Author, index: number): Promise<void> {
        return this.embedder.embed(author, index);
    }
}

/**
 * Generate a research summary without embedding it.
 */
export class SummaryTask implements AuthorTask {
    readonly label = 'summarize';
    readonly target: CompletionTarget = { kind: 'summary' };

    constructor(
        private readonly llm: LlmProvider,
        private readonly retry: RetryPolicy,
        private readonly maxContextTokens: number
    ) {}

    hasInput(author: Author): boolean {
        return hasUsableText(author);
    }

    async run(author: Author): Promise<void> {
        author.summary = await summarizeAuthor(author, this.llm, this.retry, this.maxContextTokens);

        // An embedding derived from a previous summary no longer matches it
        if (author.embedding_strategy === 'summarize') {
            delete author.embedding;
            delete author.embedding_strategy;
            delete author.embedding_model;
        }
    }
}
