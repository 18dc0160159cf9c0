import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type {
    Author,
    AuthorFitConfig,
    EmbeddingProvider,
    LlmCompletionParams,
    LlmCompletionResult,
    LlmProvider,
    Publication,
} from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { ProviderError } from '../utils/errors.js';

/**
 * Embeds text as keyword counts: one dimension per vocabulary entry, where an
 * entry is a word or a group of words counted together.
 * `failWith` may return an error to throw for a given call.
 */
export class KeywordEmbedder implements EmbeddingProvider {
    readonly name = 'fake';
    readonly calls: string[] = [];

    constructor(
        private readonly vocabulary: readonly (string | readonly string[])[],
        readonly model = 'keywords',
        private readonly failWith?: (text: string, call: number) => Error | undefined
    ) {}

    async embed(text: string): Promise<number[]> {
        this.calls.push(text);
        const error = this.failWith?.(text, this.calls.length);
        if (error) throw error;

        const words = text.toLowerCase().split(/[^a-z]+/);
        return this.vocabulary.map((entry) => {
            const group: readonly string[] = typeof entry === 'string' ? [entry] : entry;
            return words.filter((word) => group.includes(word)).length;
        });
    }
}

/**
 * LLM stand-in. The default reply echoes the publication titles found in
 * a summary prompt, so summaries stay on topic.
 */
export class FakeLlm implements LlmProvider {
    readonly name = 'fake-llm';
    readonly model = 'fake-chat';
    readonly prompts: string[] = [];

    constructor(private readonly reply: (prompt: string, call: number) => string | Error = echoTitles) {}

    async complete(prompt: string, _params?: LlmCompletionParams): Promise<LlmCompletionResult> {
        this.prompts.push(prompt);
        const reply = this.reply(prompt, this.prompts.length);
        if (reply instanceof Error) throw reply;
        return {
            text: reply,
            usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
            model: this.model,
            provider: this.name,
        };
    }
}

function echoTitles(prompt: string): string {
    const titles = [...prompt.matchAll(/Title: (.*)/g)].map((match) => match[1] ?? '');
    return `Research on ${titles.join(' and ')}`;
}

export function transientError(): ProviderError {
    return new ProviderError('fake outage', 'fake', true, 503);
}

export function pub(title: string, abstract = ''): Publication {
    return { title, abstract };
}

export function author(name: string, publications: Publication[] = []): Author {
    return { name, publications };
}

export function makeTmpDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'authorfit-test-'));
}

export function writeJson(file: string, value: unknown): void {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, JSON.stringify(value, null, 2), 'utf-8');
}

/**
 * Configuration for a run confined to `dir`, with no pauses and no cache.
 */
export function testConfig(dir: string, overrides: Partial<AuthorFitConfig> = {}): AuthorFitConfig {
    return {
        ...DEFAULT_CONFIG,
        input: path.join(dir, 'authors.json'),
        queryFile: path.join(dir, 'query.json'),
        logDir: path.join(dir, 'log'),
        noCache: true,
        logLevel: 'silent',
        retry: { maxAttempts: 10, delayMs: 0, backoff: 'fixed' },
        batch: { authorDelayMs: 0 },
        ...overrides,
    };
}

export const noSleep = async (_ms: number): Promise<void> => {};
