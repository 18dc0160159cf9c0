import {
    CachedEmbeddingProvider,
    createEmbeddingProvider,
    createLlmProvider,
    type CacheStats,
} from '../providers/index.js';
import { EmbeddingStore } from '../storage/embedding-store.js';
import type { AuthorFitConfig, EmbeddingProvider, LlmProvider } from '../types/index.js';
import { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { RetryPolicy, sleep as defaultSleep } from '../utils/retry.js';

export const VERSION = '1.0.0';

/**
 * Everything a run talks to, built once and passed explicitly.
 * Providers are created on first use, so a workflow that never embeds
 * (or never calls an LLM) needs no credentials for it.
 */
export interface RunContext {
    config: AuthorFitConfig;
    /** @throws ConfigurationError when the embedding provider cannot be configured */
    embedder(): EmbeddingProvider;
    /** @throws ConfigurationError when the LLM provider cannot be configured */
    llm(): LlmProvider;
    retry: RetryPolicy;
    sleep: (ms: number) => Promise<void>;
    /** Open once the embedder is built, unless the cache is disabled */
    store(): EmbeddingStore | undefined;
    /** Hits and misses so far; undefined while no cached embedder exists */
    cacheStats(): CacheStats | undefined;
    close(): void;
}

export interface RunContextOverrides {
    embedder?: EmbeddingProvider;
    llm?: LlmProvider;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Build the run's collaborators from configuration. Tests pass fakes
 * through `overrides`; a fake embedder is still wrapped by the cache.
 */
export function createRunContext(config: AuthorFitConfig, overrides: RunContextOverrides = {}): RunContext {
    const httpClient = new HttpClient({ version: VERSION });
    const sleep = overrides.sleep ?? defaultSleep;

    let embedder: EmbeddingProvider | undefined;
    let llm = overrides.llm;
    let store: EmbeddingStore | undefined;
    let cached: CachedEmbeddingProvider | undefined;

    const retry = new RetryPolicy({
        maxAttempts: config.retry.maxAttempts,
        delayMs: config.retry.delayMs,
        backoff: config.retry.backoff,
        sleep,
    });

    return {
        config,
        embedder() {
            if (embedder) return embedder;

            let provider = overrides.embedder ?? createEmbeddingProvider(config.embedding, httpClient);
            if (!config.noCache) {
                store = new EmbeddingStore(config.cache);
                cached = new CachedEmbeddingProvider(provider, store);
                provider = cached;
            }
            getLogger().debug(
                { embedder: `${provider.name}:${provider.model}`, cache: store ? config.cache : 'disabled' },
                'Embedding provider ready'
            );
            embedder = provider;
            return provider;
        },
        llm() {
            llm ??= createLlmProvider(config.llm, httpClient);
            return llm;
        },
        retry,
        sleep,
        store: () => store,
        cacheStats: () => cached?.getStats(),
        close() {
            store?.close();
        },
    };
}
