import type { EmbeddingProvider, EmbeddingProviderOptions } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { isNumberArray, isRecord, joinUrl, malformedResponse, toProviderError } from './utils.js';

const logger = getLogger();

const OPENAI_BASE = 'https://api.openai.com/v1';

/**
 * Embeddings through an OpenAI-compatible `/embeddings` endpoint.
 *
 * @see https://platform.openai.com/docs/api-reference/embeddings
 */
export class OpenAiEmbeddingProvider implements EmbeddingProvider {
    readonly name = 'openai';
    readonly model: string;
    private readonly apiKey: string;
    private readonly baseUrl: string;

    constructor(
        private readonly httpClient: HttpClient,
        options: EmbeddingProviderOptions & { apiKey: string }
    ) {
        this.model = options.model;
        this.apiKey = options.apiKey;
        this.baseUrl = options.baseUrl ?? OPENAI_BASE;
    }

    async embed(text: string): Promise<number[]> {
        const url = joinUrl(this.baseUrl, 'embeddings');
        logger.debug({ model: this.model, chars: text.length }, 'OpenAI embedding request');

        let data: unknown;
        try {
            const response = await this.httpClient.post(
                url,
                { model: this.model, input: text },
                { source: 'openai', headers: { Authorization: `Bearer ${this.apiKey}` } }
            );
            data = response.data;
        } catch (error) {
            throw toProviderError(error, this.name, 'embedding');
        }

        const items = isRecord(data) ? data['data'] : undefined;
        if (!Array.isArray(items)) {
            throw malformedResponse(this.name, 'embedding', 'missing data array');
        }
        const first: unknown = items[0];
        const embedding = isRecord(first) ? first['embedding'] : undefined;
        if (!isNumberArray(embedding) || embedding.length === 0) {
            throw malformedResponse(this.name, 'embedding', 'missing embedding vector');
        }

        return embedding;
    }
}
