import { Command, InvalidArgumentError, Option } from 'commander';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { ConfigurationError, describeError } from '../utils/errors.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { runAction } from './run-action.js';
import {
    DEFAULT_CONFIG,
    EMBEDDING_STRATEGIES,
    type AuthorFitConfig,
    type ComputeDevice,
    type EmbeddingProviderName,
    type EmbeddingStrategy,
    type LlmProviderName,
    type LogLevel,
} from '../types/index.js';

// Modules that hold a logger are imported after initLogger() has run

const VERSION = '1.0.0';

const program = new Command();

program
    .name('authorfit')
    .description('Rank authors against a query by comparing embeddings of their publications.')
    .version(VERSION);

// ─── Shared options ───────────────────────────────────────

interface RunOptions {
    input?: string;
    out?: string;
    logDir?: string;
    start?: number;
    end?: number;
    authorDelay?: number;
    embeddingProvider?: EmbeddingProviderName;
    embeddingModel?: string;
    embeddingBaseUrl?: string;
    device?: ComputeDevice;
    llmProvider?: LlmProviderName;
    llmModel?: string;
    llmBaseUrl?: string;
    maxContextTokens?: number;
    retryAttempts?: number;
    retryDelay?: number;
    backoff?: 'fixed' | 'exponential';
    cacheDb?: string;
    cache: boolean;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

interface ScoreOptions extends RunOptions {
    queryFile?: string;
    queryIndex?: number;
    queryText?: string;
    strategy?: EmbeddingStrategy;
    explain?: number;
}

function parseIndex(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new InvalidArgumentError('Expected a non-negative integer.');
    }
    return parsed;
}

function addRunOptions(command: Command): Command {
    return command
        .option('-i, --input <path>', 'Author collection (JSON array)')
        .option('-o, --out <path>', 'Updated collection path')
        .option('--log-dir <dir>', 'Directory for outputs')
        .option('--start <n>', 'First author index (inclusive)', parseIndex)
        .option('--end <n>', 'Last author index (exclusive)', parseIndex)
        .option('--author-delay <ms>', 'Pause after each processed author', parseIndex)
        .addOption(
            new Option('--embedding-provider <name>', 'Embedding provider').choices(['openai', 'ollama', 'hash'])
        )
        .option('--embedding-model <model>', 'Embedding model identifier')
        .option('--embedding-base-url <url>', 'Embedding endpoint base URL')
        .addOption(new Option('--device <device>', 'Compute device for local models').choices(['auto', 'cpu', 'gpu']))
        .addOption(new Option('--llm-provider <name>', 'LLM provider').choices(['openai', 'ollama']))
        .option('--llm-model <model>', 'LLM model identifier')
        .option('--llm-base-url <url>', 'LLM endpoint base URL')
        .option('--max-context-tokens <n>', 'Token budget for summary prompts', parseIndex)
        .option('--retry-attempts <n>', 'Attempts per provider call', parseIndex)
        .option('--retry-delay <ms>', 'Delay between attempts', parseIndex)
        .addOption(new Option('--backoff <kind>', 'Delay growth between attempts').choices(['fixed', 'exponential']))
        .option('--cache-db <path>', 'Embedding cache database')
        .option('--no-cache', 'Disable the embedding cache')
        .addOption(
            new Option('--log-level <level>', 'Log level').choices(['debug', 'info', 'warn', 'error', 'silent'])
        )
        .option('--json-logs', 'Output JSON logs');
}

function runOverrides(opts: RunOptions): ConfigOverrides {
    return {
        input: opts.input,
        output: opts.out,
        logDir: opts.logDir,
        cache: opts.cacheDb,
        noCache: !opts.cache,
        logLevel: opts.logLevel,
        jsonLogs: opts.jsonLogs,
        embedding: {
            provider: opts.embeddingProvider,
            model: opts.embeddingModel,
            baseUrl: opts.embeddingBaseUrl,
            device: opts.device,
        },
        llm: {
            provider: opts.llmProvider,
            model: opts.llmModel,
            baseUrl: opts.llmBaseUrl,
            maxContextTokens: opts.maxContextTokens,
        },
        retry: {
            maxAttempts: opts.retryAttempts,
            delayMs: opts.retryDelay,
            backoff: opts.backoff,
        },
        batch: {
            start: opts.start,
            end: opts.end,
            authorDelayMs: opts.authorDelay,
        },
    };
}

/**
 * Resolve configuration, start logging, run the action, and map run-level
 * failures to exit code 1. Per-author failures never reach here.
 */
async function runWithConfig(
    overrides: ConfigOverrides,
    action: (config: AuthorFitConfig) => Promise<void>
): Promise<void> {
    let config: AuthorFitConfig;
    try {
        config = await resolveConfig(overrides);
    } catch (error) {
        initLogger({ level: 'info' });
        getLogger().error({ error: describeError(error) }, 'Invalid configuration');
        process.exit(1);
    }

    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

    const code = await runAction(() => action(config));
    if (code !== 0) process.exit(code);
}

// ─── SCORE command ────────────────────────────────────────

addRunOptions(
    program
        .command('score')
        .description('Embed authors, embed the query, and rank authors by fitness')
        .option('-q, --query-file <path>', 'Query file (JSON array)')
        .option('--query-index <n>', 'Index of the query in the query file', parseIndex)
        .option('--query-text <text>', 'Literal query text')
        .addOption(new Option('-s, --strategy <strategy>', 'Author embedding strategy').choices(EMBEDDING_STRATEGIES))
        .option('--explain <k>', 'Explain the top-k authors with the LLM', parseIndex)
).action(async (opts: ScoreOptions) => {
    const overrides: ConfigOverrides = {
        ...runOverrides(opts),
        queryFile: opts.queryFile,
        queryIndex: opts.queryIndex,
        queryText: opts.queryText,
        strategy: opts.strategy,
        explain: opts.explain,
    };

    await runWithConfig(overrides, async (config) => {
        const { createRunContext } = await import('../pipeline/run-context.js');
        const { runScore } = await import('../pipeline/score.js');

        const ctx = createRunContext(config);
        try {
            const result = await runScore(ctx);
            console.log(`\nRanked ${result.ranking.results.length} authors, excluded ${result.ranking.excluded.length}`);
            for (const top of result.ranking.results.slice(0, 5)) {
                console.log(`  ${top.rank}. ${top.author_name} (${top.score.toFixed(4)})`);
            }
            console.log(`\n  ${result.files.csv}\n  ${result.files.text}`);
            if (result.explained) console.log(`  ${result.explained}`);
            console.log('');
        } finally {
            ctx.close();
        }
    });
});

// ─── SUMMARIZE command ────────────────────────────────────

addRunOptions(
    program.command('summarize').description('Generate research summaries for a range of authors (resumable)')
).action(async (opts: RunOptions) => {
    await runWithConfig(runOverrides(opts), async (config) => {
        const { createRunContext } = await import('../pipeline/run-context.js');
        const { runSummarize } = await import('../pipeline/summarize.js');

        const ctx = createRunContext(config);
        try {
            const { outputPath, report } = await runSummarize(ctx);
            console.log(
                `\nSummaries: ${report.done} done, ${report.failed} failed, ` +
                    `${report.skipped} skipped, ${report.degenerate} degenerate\n  ${outputPath}\n`
            );
        } finally {
            ctx.close();
        }
    });
});

// ─── PREP command ─────────────────────────────────────────

program
    .command('prep')
    .description('Build an author collection from a directory of publication-list files')
    .requiredOption('-d, --publist-dir <dir>', 'Directory of per-author publication lists')
    .option('-o, --out <path>', 'Output collection path', DEFAULT_CONFIG.input)
    .action(async (opts: { publistDir: string; out: string }) => {
        await runWithConfig({}, async () => {
            const { buildCorpusFromPublists } = await import('../corpus/publist.js');
            const { saveCorpus } = await import('../corpus/corpus.js');

            const authors = buildCorpusFromPublists(opts.publistDir);
            saveCorpus(opts.out, authors);
            console.log(`Wrote ${authors.length} authors to ${opts.out}`);
        });
    });

// ─── AGREEMENT command ────────────────────────────────────

program
    .command('agreement')
    .description('Top-N overlap between the ranked outputs of several systems')
    .requiredOption('--docs <ids...>', 'Query ids to compare')
    .option('--systems <names...>', 'System directories under the log dir', ['summarize', 'aggregate'])
    .option('--dir <dir>', 'Log directory', DEFAULT_CONFIG.logDir)
    .option('--top <n>', 'Names compared per system', parseIndex, 10)
    .action(async (opts: { docs: string[]; systems: string[]; dir: string; top: number }) => {
        await runWithConfig({}, async () => {
            const { writeAgreement } = await import('../exporters/agreement.js');
            const path = await writeAgreement({ dir: opts.dir, systems: opts.systems, docIds: opts.docs, topN: opts.top });
            console.log(`Agreement written to ${path}`);
        });
    });

// ─── CACHE command ────────────────────────────────────────

program
    .command('cache')
    .description('Manage the embedding cache')
    .argument('<action>', 'Action: clear | stats')
    .option('--cache-db <path>', 'Embedding cache database')
    .action(async (action: string, opts: { cacheDb?: string }) => {
        await runWithConfig({ cache: opts.cacheDb }, async (config) => {
            const { EmbeddingStore } = await import('../storage/embedding-store.js');

            const store = new EmbeddingStore(config.cache);
            try {
                switch (action) {
                    case 'clear': {
                        const removed = store.clearEmbeddings();
                        console.log(`Cache cleared (${removed} embeddings).`);
                        break;
                    }
                    case 'stats': {
                        const stats = store.getStats();
                        console.log(`\nEmbedding cache: ${config.cache}\n`);
                        console.log(`  Embeddings: ${stats.embeddings}`);
                        for (const [model, count] of Object.entries(stats.embeddingsByModel)) {
                            console.log(`    ${model}: ${count}`);
                        }
                        console.log(`  Runs:       ${stats.runs}`);
                        const last = store.getRuns().at(-1);
                        if (last) {
                            console.log(`    last: ${last.created_at} ${last.strategy} query ${last.query_id}`);
                        }
                        console.log('');
                        break;
                    }
                    default:
                        throw new ConfigurationError(`Unknown cache action: ${action}. Valid: clear, stats`);
                }
            } finally {
                store.close();
            }
        });
    });

await program.parseAsync();
