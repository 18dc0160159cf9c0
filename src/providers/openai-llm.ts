import type { LlmCompletionParams, LlmCompletionResult, LlmProvider, LlmProviderOptions } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { isRecord, joinUrl, malformedResponse, numberOr, stringOr, toProviderError } from './utils.js';

const logger = getLogger();

const OPENAI_BASE = 'https://api.openai.com/v1';

/**
 * Chat completions through an OpenAI-compatible endpoint. Any service that
 * speaks the same protocol (e.g. a Qwen compatible-mode endpoint) works via `baseUrl`.
 */
export class OpenAiLlmProvider implements LlmProvider {
    readonly name = 'openai';
    readonly model: string;
    private readonly apiKey: string;
    private readonly baseUrl: string;

    constructor(
        private readonly httpClient: HttpClient,
        options: LlmProviderOptions & { apiKey: string }
    ) {
        this.model = options.model;
        this.apiKey = options.apiKey;
        this.baseUrl = options.baseUrl ?? OPENAI_BASE;
    }

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        const model = params.model ?? this.model;
        const messages: Array<{ role: 'system' | 'user'; content: string }> = [];
        if (params.systemPrompt) messages.push({ role: 'system', content: params.systemPrompt });
        messages.push({ role: 'user', content: prompt });

        const body: Record<string, unknown> = {
            model,
            messages,
            temperature: params.temperature ?? 0,
        };
        if (params.maxTokens !== undefined) body['max_tokens'] = params.maxTokens;

        logger.debug({ model, promptChars: prompt.length }, 'OpenAI chat completion request');

        let data: unknown;
        try {
            const response = await this.httpClient.post(joinUrl(this.baseUrl, 'chat/completions'), body, {
                source: 'openai',
                headers: { Authorization: `Bearer ${this.apiKey}` },
            });
            data = response.data;
        } catch (error) {
            throw toProviderError(error, this.name, 'completion');
        }

        const choices = isRecord(data) ? data['choices'] : undefined;
        const first: unknown = Array.isArray(choices) ? choices[0] : undefined;
        const message = isRecord(first) ? first['message'] : undefined;
        const content = isRecord(message) ? message['content'] : undefined;
        if (typeof content !== 'string') {
            throw malformedResponse(this.name, 'completion', 'missing message content');
        }

        const rawUsage = isRecord(data) ? data['usage'] : undefined;
        const usage: Record<string, unknown> = isRecord(rawUsage) ? rawUsage : {};
        return {
            text: content,
            usage: {
                promptTokens: numberOr(usage['prompt_tokens'], 0),
                completionTokens: numberOr(usage['completion_tokens'], 0),
                totalTokens: numberOr(usage['total_tokens'], 0),
            },
            model: stringOr(isRecord(data) ? data['model'] : undefined, model),
            provider: this.name,
        };
    }
}
