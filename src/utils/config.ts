import { cosmiconfig } from 'cosmiconfig';
import {
    DEFAULT_CONFIG,
    EMBEDDING_STRATEGIES,
    type AuthorFitConfig,
    type BatchConfig,
    type EmbeddingConfig,
    type LlmConfig,
    type RetryConfig,
} from '../types/index.js';
import { ConfigurationError } from './errors.js';
import { getLogger } from './logger.js';

/**
 * Partial configuration as supplied by CLI flags or a config file.
 */
export type ConfigOverrides = Partial<Omit<AuthorFitConfig, 'embedding' | 'llm' | 'retry' | 'batch'>> & {
    embedding?: Partial<EmbeddingConfig>;
    llm?: Partial<LlmConfig>;
    retry?: Partial<RetryConfig>;
    batch?: Partial<BatchConfig>;
};

/**
 * Load configuration from authorfit.config.json using cosmiconfig.
 * Returns null if no config file is found; defaults apply.
 */
async function loadConfigFile(searchFrom?: string): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('authorfit', {
        searchPlaces: ['authorfit.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return result.config as ConfigOverrides;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 * API keys are accessed directly where needed (not stored in config).
 */
function loadEnvVars(): ConfigOverrides {
    const env: ConfigOverrides = {};

    const embeddingBaseUrl = process.env['EMBEDDING_BASE_URL'];
    if (embeddingBaseUrl) env.embedding = { baseUrl: embeddingBaseUrl };

    const llmBaseUrl = process.env['LLM_BASE_URL'];
    if (llmBaseUrl) env.llm = { baseUrl: llmBaseUrl };

    return env;
}

/**
 * Merge configuration from multiple sources and validate the result.
 * Precedence: CLI flags > environment variables > config file > defaults
 *
 * @throws ConfigurationError when the merged configuration is invalid
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    options: { searchFrom?: string } = {}
): Promise<AuthorFitConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars();

    const merged: AuthorFitConfig = {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...stripUndefined(cliFlags),
        // Deep merge nested objects
        embedding: {
            ...DEFAULT_CONFIG.embedding,
            ...fileConfig?.embedding,
            ...envConfig.embedding,
            ...stripUndefined(cliFlags.embedding ?? {}),
        },
        llm: {
            ...DEFAULT_CONFIG.llm,
            ...fileConfig?.llm,
            ...envConfig.llm,
            ...stripUndefined(cliFlags.llm ?? {}),
        },
        retry: {
            ...DEFAULT_CONFIG.retry,
            ...fileConfig?.retry,
            ...stripUndefined(cliFlags.retry ?? {}),
        },
        batch: {
            ...DEFAULT_CONFIG.batch,
            ...fileConfig?.batch,
            ...stripUndefined(cliFlags.batch ?? {}),
        },
    };

    validateConfig(merged);
    return merged;
}

/**
 * Check every run-level precondition that does not need the file system.
 * @throws ConfigurationError on the first violation
 */
export function validateConfig(config: AuthorFitConfig): void {
    if (!EMBEDDING_STRATEGIES.includes(config.strategy)) {
        throw new ConfigurationError(
            `Unknown embedding strategy "${config.strategy}". Valid: ${EMBEDDING_STRATEGIES.join(', ')}`
        );
    }

    if (!['openai', 'ollama', 'hash'].includes(config.embedding.provider)) {
        throw new ConfigurationError(
            `Unknown embedding provider "${config.embedding.provider}". Valid: openai, ollama, hash`
        );
    }

    if (!['auto', 'cpu', 'gpu'].includes(config.embedding.device)) {
        throw new ConfigurationError(`Unknown device "${config.embedding.device}". Valid: auto, cpu, gpu`);
    }

    if (config.embedding.device !== 'auto' && config.embedding.provider === 'openai') {
        throw new ConfigurationError(
            `Device "${config.embedding.device}" cannot be selected for the remote openai embedding provider`
        );
    }

    if (!['openai', 'ollama'].includes(config.llm.provider)) {
        throw new ConfigurationError(`Unknown LLM provider "${config.llm.provider}". Valid: openai, ollama`);
    }

    requireInteger('retry.maxAttempts', config.retry.maxAttempts, 1);
    requireInteger('retry.delayMs', config.retry.delayMs, 0);
    requireInteger('batch.authorDelayMs', config.batch.authorDelayMs, 0);
    requireInteger('explain', config.explain, 0);
    requireInteger('llm.maxContextTokens', config.llm.maxContextTokens, 1);

    if (config.queryIndex !== undefined) requireInteger('queryIndex', config.queryIndex, 0);
    if (config.batch.start !== undefined) requireInteger('start', config.batch.start, 0);
    if (config.batch.end !== undefined) requireInteger('end', config.batch.end, 0);

    if (
        config.batch.start !== undefined &&
        config.batch.end !== undefined &&
        config.batch.start > config.batch.end
    ) {
        throw new ConfigurationError(
            `Invalid index range: start (${config.batch.start}) is greater than end (${config.batch.end})`
        );
    }
}

/**
 * Get API key from environment variables, first match wins.
 * @param names - Environment variable names in order of preference
 * @returns The API key or undefined
 */
export function getApiKey(...names: string[]): string | undefined {
    for (const name of names) {
        const value = process.env[name];
        if (value) return value;
    }
    return undefined;
}

function requireInteger(name: string, value: number, min: number): void {
    if (!Number.isInteger(value) || value < min) {
        throw new ConfigurationError(`Invalid ${name}: expected an integer >= ${min}, got ${value}`);
    }
}

/**
 * Drop keys whose value is undefined so they do not shadow lower-precedence sources.
 */
function stripUndefined<T extends object>(value: T): Partial<T> {
    const result: Partial<T> = {};
    for (const key of Object.keys(value) as Array<keyof T>) {
        if (value[key] !== undefined) result[key] = value[key];
    }
    return result;
}
