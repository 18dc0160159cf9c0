/**
 * Interface for LLM provider adapters (OpenAI-compatible, Ollama).
 */
export interface LlmProvider {
    /** Provider name */
    readonly name: string;

    /** Default model */
    readonly model: string;

    /**
     * Send a completion request to the LLM.
     * @param prompt - The user prompt to send
     * @param params - Additional parameters (temperature, max_tokens, etc.)
     * @throws ProviderError when the request fails
     */
    complete(prompt: string, params?: LlmCompletionParams): Promise<LlmCompletionResult>;
}

/**
 * Parameters for LLM completion requests.
 */
export interface LlmCompletionParams {
    /** Model to use (overrides default) */
    model?: string;
    /** Temperature (0.0 to 2.0) */
    temperature?: number;
    /** Maximum tokens in response */
    maxTokens?: number;
    /** System prompt */
    systemPrompt?: string;
}

/**
 * Result from an LLM completion request.
 */
export interface LlmCompletionResult {
    /** Raw response text */
    text: string;
    /** Token usage, when the provider reports it */
    usage: {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
    };
    /** Model used */
    model: string;
    /** Provider name */
    provider: string;
}

/**
 * LLM provider initialization options.
 */
export interface LlmProviderOptions {
    /** API key (for cloud providers) */
    apiKey?: string;
    /** Base URL (for Ollama or OpenAI-compatible endpoints) */
    baseUrl?: string;
    /** Default model */
    model: string;
}
