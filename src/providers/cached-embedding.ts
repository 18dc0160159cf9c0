import type { EmbeddingProvider } from '../types/index.js';
import type { EmbeddingStore } from '../storage/embedding-store.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

export interface CacheStats {
    hits: number;
    misses: number;
}

/**
 * Wraps an embedding provider with the SQLite embedding cache.
 * Reports the wrapped provider's name and model, so cached and uncached
 * vectors are interchangeable.
 */
export class CachedEmbeddingProvider implements EmbeddingProvider {
    readonly name: string;
    readonly model: string;
    private hits = 0;
    private misses = 0;

    constructor(
        private readonly inner: EmbeddingProvider,
        private readonly store: EmbeddingStore
    ) {
        this.name = inner.name;
        this.model = inner.model;
    }

    async embed(text: string): Promise<number[]> {
        const cached = this.store.getEmbedding(this.name, this.model, text);
        if (cached) {
            this.hits++;
            logger.debug({ provider: this.name, model: this.model }, 'Embedding cache hit');
            return cached;
        }

        this.misses++;
        const vector = await this.inner.embed(text);
        this.store.putEmbedding(this.name, this.model, text, vector);
        return vector;
    }

    getStats(): CacheStats {
        return { hits: this.hits, misses: this.misses };
    }
}
