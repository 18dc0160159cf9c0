import { join } from 'node:path';
import { runBatch, resolveRange, type BatchReport } from '../batch/batch-driver.js';
import { EmbeddingTask } from '../batch/tasks.js';
import { loadResumeState } from '../corpus/corpus.js';
import { createAuthorEmbedder } from '../embedding/author-embedder.js';
import { resolveQueryEmbedding, selectQuery } from '../embedding/query-resolver.js';
import {
    writeConsolidatedCsv,
    writeRankingOutputs,
    type ExplainedResult,
    type RankingOutputPaths,
} from '../exporters/export.js';
import type { CacheStats } from '../providers/index.js';
import { rankAuthors, type Ranking } from '../scoring/ranker.js';
import { generateJustification } from '../summarize/summarizer.js';
import type { Author, AuthorFitConfig, Query } from '../types/index.js';
import { describeError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { VERSION, type RunContext } from './run-context.js';

export interface ScoreResult {
    query: Query;
    /** Updated corpus path */
    outputPath: string;
    report: BatchReport;
    ranking: Ranking;
    files: RankingOutputPaths;
    /** Consolidated explanations, when requested */
    explained?: string;
    /** Embedding cache use during this run, unless the cache is disabled */
    cache?: CacheStats;
}

export function defaultScoreOutput(config: Pick<AuthorFitConfig, 'logDir' | 'strategy' | 'output'>): string {
    return config.output ?? join(config.logDir, `author_profile_${config.strategy}.json`);
}

/**
 * Embed (or resume embedding) every author in range, embed the query,
 * rank and export. Configuration problems surface before any provider call.
 */
export async function runScore(ctx: RunContext): Promise<ScoreResult> {
    const { config } = ctx;
    const logger = getLogger();

    const query = selectQuery(config);
    const outputPath = defaultScoreOutput(config);
    const { authors, resumed } = loadResumeState(config.input, outputPath);
    resolveRange(authors.length, config.batch.start, config.batch.end);

    const embedder = createAuthorEmbedder(config.strategy, {
        embedder: ctx.embedder(),
        retry: ctx.retry,
        llm: config.strategy === 'summarize' ? ctx.llm() : undefined,
        maxContextTokens: config.llm.maxContextTokens,
    });

    logger.info(
        { query: query.id, strategy: config.strategy, model: embedder.modelKey, authors: authors.length, resumed },
        'Scoring run started'
    );

    const queryVector = await resolveQueryEmbedding(query, ctx.embedder(), ctx.retry);

    const report = await runBatch(authors, new EmbeddingTask(embedder), {
        start: config.batch.start,
        end: config.batch.end,
        authorDelayMs: config.batch.authorDelayMs,
        outputPath,
        sleep: ctx.sleep,
    });

    const ranking = rankAuthors(authors, queryVector, { strategy: config.strategy, model: embedder.modelKey });
    const files = writeRankingOutputs(config.logDir, {
        query,
        strategy: config.strategy,
        model: embedder.modelKey,
        ranking,
    });

    const result: ScoreResult = { query, outputPath, report, ranking, files };

    if (config.explain > 0 && ranking.results.length > 0) {
        const rows = await explainTop(ctx, query, authors, ranking, config.explain);
        result.explained = writeConsolidatedCsv(config.logDir, config.strategy, query.id, rows);
    }

    const cache = ctx.cacheStats();
    if (cache) result.cache = cache;

    ctx.store()?.insertRun({
        created_at: new Date().toISOString(),
        authorfit_version: VERSION,
        config_json: JSON.stringify(config),
        strategy: config.strategy,
        query_id: query.id,
        stats_json: JSON.stringify({
            done: report.done,
            failed: report.failed,
            skipped: report.skipped,
            degenerate: report.degenerate,
            ranked: ranking.results.length,
            excluded: ranking.excluded.length,
            cache,
        }),
    });

    logger.info(
        {
            done: report.done,
            failed: report.failed,
            skipped: report.skipped,
            degenerate: report.degenerate,
            ranked: ranking.results.length,
            excluded: ranking.excluded.length,
            top: ranking.results[0]?.author_name,
            cacheHits: cache?.hits,
            cacheMisses: cache?.misses,
        },
        'Scoring run complete'
    );

    return result;
}

async function explainTop(
    ctx: RunContext,
    query: Query,
    authors: readonly Author[],
    ranking: Ranking,
    k: number
): Promise<ExplainedResult[]> {
    const llm = ctx.llm();
    const rows: ExplainedResult[] = [];

    for (const result of ranking.results.slice(0, k)) {
        const author = authors[result.index];
        if (!author) continue;

        let rationale = '';
        try {
            rationale = await generateJustification(query, author, result.score, llm, ctx.retry);
        } catch (error) {
            getLogger().error({ author: author.name, error: describeError(error) }, 'Justification failed');
        }
        rows.push({ result, rationale });
    }

    return rows;
}
