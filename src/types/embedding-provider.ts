/**
 * Interface for embedding model adapters (OpenAI, Ollama, local hash).
 * Implementations are deterministic for identical input and model.
 */
export interface EmbeddingProvider {
    /** Provider name, e.g. 'openai' */
    readonly name: string;

    /** Model identifier, e.g. 'text-embedding-3-small' */
    readonly model: string;

    /**
     * Embed a single text.
     * @throws ProviderError on network, auth or rate-limit failure
     */
    embed(text: string): Promise<number[]>;
}

/**
 * Embedding provider initialization options.
 */
export interface EmbeddingProviderOptions {
    /** API key (for cloud providers like OpenAI) */
    apiKey?: string;
    /** Base URL (for Ollama or compatible endpoints) */
    baseUrl?: string;
    /** Model to use */
    model: string;
    /** Compute device hint for local runtimes */
    device?: ComputeDevice;
}

/**
 * Compute device selector. Only local runtimes honour anything but `auto`.
 */
export type ComputeDevice = 'auto' | 'cpu' | 'gpu';
