import { join } from 'node:path';
import { runBatch, resolveRange, type BatchReport } from '../batch/batch-driver.js';
import { SummaryTask } from '../batch/tasks.js';
import { loadResumeState } from '../corpus/corpus.js';
import type { AuthorFitConfig } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import type { RunContext } from './run-context.js';

export interface SummarizeResult {
    outputPath: string;
    report: BatchReport;
}

export function defaultSummaryOutput(config: Pick<AuthorFitConfig, 'logDir' | 'output'>): string {
    return config.output ?? join(config.logDir, 'author_profile_updated.json');
}

/**
 * Generate research summaries for every author in range. Resumable: authors
 * that already have a summary are skipped.
 */
export async function runSummarize(ctx: RunContext): Promise<SummarizeResult> {
    const { config } = ctx;
    const outputPath = defaultSummaryOutput(config);
    const { authors, resumed } = loadResumeState(config.input, outputPath);
    resolveRange(authors.length, config.batch.start, config.batch.end);

    const llm = ctx.llm();
    getLogger().info({ llm: `${llm.name}:${llm.model}`, authors: authors.length, resumed }, 'Summary run started');

    const report = await runBatch(authors, new SummaryTask(llm, ctx.retry, config.llm.maxContextTokens), {
        start: config.batch.start,
        end: config.batch.end,
        authorDelayMs: config.batch.authorDelayMs,
        outputPath,
        sleep: ctx.sleep,
    });

    return { outputPath, report };
}
