/**
 * Barrel export for all shared types.
 */
export { EMBEDDING_STRATEGIES } from './author.js';
export type {
    Publication,
    Author,
    EmbeddingStrategy,
    Query,
    FitnessResult,
    ExclusionReason,
    ExcludedAuthor,
} from './author.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    AuthorFitConfig,
    LogLevel,
    EmbeddingProviderName,
    LlmProviderName,
    EmbeddingConfig,
    LlmConfig,
    RetryConfig,
    BatchConfig,
    RunRecord,
} from './config.js';
export type {
    EmbeddingProvider,
    EmbeddingProviderOptions,
    ComputeDevice,
} from './embedding-provider.js';
export type {
    LlmProvider,
    LlmCompletionParams,
    LlmCompletionResult,
    LlmProviderOptions,
} from './llm-provider.js';
