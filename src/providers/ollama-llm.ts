import type { LlmCompletionParams, LlmCompletionResult, LlmProvider, LlmProviderOptions } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { OLLAMA_BASE } from './ollama-embedding.js';
import { isRecord, joinUrl, malformedResponse, numberOr, toProviderError } from './utils.js';

const logger = getLogger();

/**
 * Chat completions from a local Ollama server (`/api/chat`, non-streaming).
 */
export class OllamaLlmProvider implements LlmProvider {
    readonly name = 'ollama';
    readonly model: string;
    private readonly baseUrl: string;

    constructor(
        private readonly httpClient: HttpClient,
        options: LlmProviderOptions
    ) {
        this.model = options.model;
        this.baseUrl = options.baseUrl ?? OLLAMA_BASE;
    }

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        const model = params.model ?? this.model;
        const messages: Array<{ role: 'system' | 'user'; content: string }> = [];
        if (params.systemPrompt) messages.push({ role: 'system', content: params.systemPrompt });
        messages.push({ role: 'user', content: prompt });

        const options: Record<string, number> = { temperature: params.temperature ?? 0 };
        if (params.maxTokens !== undefined) options['num_predict'] = params.maxTokens;

        logger.debug({ model, promptChars: prompt.length }, 'Ollama chat request');

        let data: unknown;
        try {
            const response = await this.httpClient.post(
                joinUrl(this.baseUrl, 'api/chat'),
                { model, messages, stream: false, options },
                { source: 'ollama' }
            );
            data = response.data;
        } catch (error) {
            throw toProviderError(error, this.name, 'completion');
        }

        const message = isRecord(data) ? data['message'] : undefined;
        const content = isRecord(message) ? message['content'] : undefined;
        if (typeof content !== 'string') {
            throw malformedResponse(this.name, 'completion', 'missing message content');
        }

        const promptTokens = numberOr(isRecord(data) ? data['prompt_eval_count'] : undefined, 0);
        const completionTokens = numberOr(isRecord(data) ? data['eval_count'] : undefined, 0);

        return {
            text: content,
            usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
            model,
            provider: this.name,
        };
    }
}
