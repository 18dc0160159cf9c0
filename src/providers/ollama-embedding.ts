import type { ComputeDevice, EmbeddingProvider, EmbeddingProviderOptions } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { isNumberArray, isRecord, joinUrl, malformedResponse, toProviderError } from './utils.js';

const logger = getLogger();

export const OLLAMA_BASE = 'http://localhost:11434';

/**
 * Embeddings from a local Ollama server (`/api/embed`).
 * The compute device is forwarded as a runtime option: `cpu` disables GPU offload.
 *
 * @see https://github.com/ollama/ollama/blob/main/docs/api.md
 */
export class OllamaEmbeddingProvider implements EmbeddingProvider {
    readonly name = 'ollama';
    readonly model: string;
    private readonly baseUrl: string;
    private readonly device: ComputeDevice;

    constructor(
        private readonly httpClient: HttpClient,
        options: EmbeddingProviderOptions
    ) {
        this.model = options.model;
        this.baseUrl = options.baseUrl ?? OLLAMA_BASE;
        this.device = options.device ?? 'auto';
    }

    async embed(text: string): Promise<number[]> {
        const url = joinUrl(this.baseUrl, 'api/embed');
        logger.debug({ model: this.model, device: this.device, chars: text.length }, 'Ollama embedding request');

        let data: unknown;
        try {
            const response = await this.httpClient.post(url, this.requestBody(text), { source: 'ollama' });
            data = response.data;
        } catch (error) {
            throw toProviderError(error, this.name, 'embedding');
        }

        const embeddings = isRecord(data) ? data['embeddings'] : undefined;
        if (!Array.isArray(embeddings)) {
            throw malformedResponse(this.name, 'embedding', 'missing embeddings array');
        }
        const first: unknown = embeddings[0];
        if (!isNumberArray(first) || first.length === 0) {
            throw malformedResponse(this.name, 'embedding', 'missing embedding vector');
        }

        return first;
    }

    /**
     * Request payload; exposed for tests.
     */
    requestBody(text: string): Record<string, unknown> {
        const body: Record<string, unknown> = { model: this.model, input: text };
        if (this.device === 'cpu') {
            body['options'] = { num_gpu: 0 };
        }
        return body;
    }
}
