import type { EmbeddingConfig, EmbeddingProvider, LlmConfig, LlmProvider } from '../types/index.js';
import { getApiKey } from '../utils/config.js';
import { ConfigurationError } from '../utils/errors.js';
import type { HttpClient } from '../utils/http-client.js';
import { HashEmbeddingProvider } from './hash-embedding.js';
import { OllamaEmbeddingProvider } from './ollama-embedding.js';
import { OllamaLlmProvider } from './ollama-llm.js';
import { OpenAiEmbeddingProvider } from './openai-embedding.js';
import { OpenAiLlmProvider } from './openai-llm.js';

export { CachedEmbeddingProvider, type CacheStats } from './cached-embedding.js';
export { HashEmbeddingProvider } from './hash-embedding.js';

/**
 * Create the embedding provider named by the configuration.
 * @throws ConfigurationError when a remote provider has no API key
 */
export function createEmbeddingProvider(config: EmbeddingConfig, httpClient: HttpClient): EmbeddingProvider {
    switch (config.provider) {
        case 'openai': {
            const apiKey = getApiKey('EMBEDDING_API_KEY', 'OPENAI_API_KEY');
            if (!apiKey) {
                throw new ConfigurationError('The openai embedding provider needs EMBEDDING_API_KEY or OPENAI_API_KEY');
            }
            return new OpenAiEmbeddingProvider(httpClient, { model: config.model, apiKey, baseUrl: config.baseUrl });
        }
        case 'ollama':
            return new OllamaEmbeddingProvider(httpClient, {
                model: config.model,
                baseUrl: config.baseUrl,
                device: config.device,
            });
        case 'hash':
            return new HashEmbeddingProvider(config.model);
    }
}

/**
 * Create the LLM provider named by the configuration.
 * @throws ConfigurationError when a remote provider has no API key
 */
export function createLlmProvider(config: LlmConfig, httpClient: HttpClient): LlmProvider {
    switch (config.provider) {
        case 'openai': {
            const apiKey = getApiKey('LLM_API_KEY', 'OPENAI_API_KEY');
            if (!apiKey) {
                throw new ConfigurationError('The openai LLM provider needs LLM_API_KEY or OPENAI_API_KEY');
            }
            return new OpenAiLlmProvider(httpClient, { model: config.model, apiKey, baseUrl: config.baseUrl });
        }
        case 'ollama':
            return new OllamaLlmProvider(httpClient, { model: config.model, baseUrl: config.baseUrl });
    }
}
