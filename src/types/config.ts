import type { EmbeddingStrategy } from './author.js';
import type { ComputeDevice } from './embedding-provider.js';

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

export type EmbeddingProviderName = 'openai' | 'ollama' | 'hash';

export type LlmProviderName = 'openai' | 'ollama';

/**
 * Embedding model configuration.
 */
export interface EmbeddingConfig {
    provider: EmbeddingProviderName;
    model: string;
    baseUrl?: string;
    device: ComputeDevice;
}

/**
 * LLM configuration (summaries and justifications).
 */
export interface LlmConfig {
    provider: LlmProviderName;
    model: string;
    baseUrl?: string;
    /** Token budget for publications in a summary prompt */
    maxContextTokens: number;
}

/**
 * Retry policy applied at every provider call site.
 */
export interface RetryConfig {
    maxAttempts: number;
    delayMs: number;
    backoff: 'fixed' | 'exponential';
}

/**
 * Batch range and pacing.
 */
export interface BatchConfig {
    /** Inclusive start index */
    start?: number;
    /** Exclusive end index */
    end?: number;
    /** Pause after each successfully processed author */
    authorDelayMs: number;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface AuthorFitConfig {
    // Input
    input: string;
    queryFile: string;
    queryIndex?: number;
    queryText?: string;

    // Output
    /** Updated corpus path; derived from logDir and strategy when omitted */
    output?: string;
    logDir: string;
    /** Number of top-ranked authors to explain with the LLM (0 = none) */
    explain: number;

    strategy: EmbeddingStrategy;

    // Cache
    cache: string;
    noCache: boolean;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    embedding: EmbeddingConfig;
    llm: LlmConfig;
    retry: RetryConfig;
    batch: BatchConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AuthorFitConfig = {
    input: './log/author_profile.json',
    queryFile: './query.json',
    logDir: './log',
    explain: 0,
    strategy: 'aggregate',
    cache: './.authorfit-cache.db',
    noCache: false,
    logLevel: 'info',
    jsonLogs: false,
    embedding: {
        provider: 'openai',
        model: 'text-embedding-3-small',
        device: 'auto',
    },
    llm: {
        provider: 'openai',
        model: 'gpt-4o-mini-2024-07-18',
        maxContextTokens: 100000,
    },
    retry: {
        maxAttempts: 10,
        delayMs: 1000,
        backoff: 'fixed',
    },
    batch: {
        authorDelayMs: 2000,
    },
};

/**
 * Run metadata stored in the SQLite `runs` table.
 */
export interface RunRecord {
    run_id?: number;
    created_at: string;
    authorfit_version: string;
    config_json: string;
    strategy: string;
    query_id: string;
    stats_json: string;
}
