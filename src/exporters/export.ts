import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { EmbeddingStrategy, ExcludedAuthor, FitnessResult, Query } from '../types/index.js';
import type { Ranking } from '../scoring/ranker.js';
import { getLogger } from '../utils/logger.js';
import { toCsvLine } from './csv.js';

const logger = getLogger();

// ─── Types ───────────────────────────────────────────────

export interface RankingExport {
    query: Query;
    strategy: EmbeddingStrategy;
    /** `provider:model` of the embedder */
    model: string;
    ranking: Ranking;
}

/**
 * One explained author in the consolidated CSV.
 */
export interface ExplainedResult {
    result: FitnessResult;
    rationale: string;
}

export interface RankingOutputPaths {
    csv: string;
    text: string;
}

// ─── File Names ──────────────────────────────────────────

export function rankingCsvName(strategy: EmbeddingStrategy, queryId: string): string {
    return `fitness_scores_${strategy}_query_${queryId}.csv`;
}

export function rankingTextName(strategy: EmbeddingStrategy, queryId: string): string {
    return `output_${strategy}_query_${queryId}.txt`;
}

export function consolidatedCsvPath(dir: string, strategy: string, queryId: string): string {
    return join(dir, strategy, `${queryId}.csv`);
}

// ─── Formatters ──────────────────────────────────────────

/**
 * `Rank,Author Name,Fitness Score`, one row per ranked author.
 */
export function formatRankingCsv(results: readonly FitnessResult[]): string {
    const lines = ['Rank,Author Name,Fitness Score'];
    for (const result of results) {
        lines.push(toCsvLine([result.rank, result.author_name, result.score.toFixed(6)]));
    }
    return lines.join('\n') + '\n';
}

/**
 * Human-readable listing. Every author of the corpus appears either in the
 * ranking or in the Excluded section.
 */
export function formatRankingText(data: RankingExport): string {
    const { query, strategy, model, ranking } = data;
    const lines: string[] = [
        `Query ${query.id} (strategy: ${strategy}, model: ${model})`,
        query.text,
        '',
        `Ranked authors (${ranking.results.length})`,
    ];

    const width = String(ranking.results.length).length;
    for (const result of ranking.results) {
        lines.push(`${String(result.rank).padStart(width)}. ${result.score.toFixed(4)}  ${result.author_name}`);
    }

    lines.push('', `Excluded (${ranking.excluded.length})`);
    for (const excluded of ranking.excluded) {
        lines.push(`- ${describeExclusion(excluded)}`);
    }

    return lines.join('\n') + '\n';
}

export function describeExclusion(excluded: ExcludedAuthor): string {
    const detail = excluded.detail ? `: ${excluded.detail}` : '';
    return `${excluded.author_name} (#${excluded.index}) ${excluded.reason}${detail}`;
}

/**
 * `index,name,fitness_score,rationale` with every field quoted, the
 * rationale on a single line and scores at two decimals.
 */
export function formatConsolidatedCsv(rows: readonly ExplainedResult[]): string {
    const lines = [toCsvLine(['index', 'name', 'fitness_score', 'rationale'], true)];
    for (const { result, rationale } of rows) {
        lines.push(
            toCsvLine([result.rank, result.author_name, result.score.toFixed(2), collapseWhitespace(rationale)], true)
        );
    }
    return lines.join('\n') + '\n';
}

export function collapseWhitespace(text: string): string {
    return text.split(/\s+/).filter(Boolean).join(' ');
}

// ─── Writers ─────────────────────────────────────────────

/**
 * Write the ranking CSV and text listing into `dir`.
 */
export function writeRankingOutputs(dir: string, data: RankingExport): RankingOutputPaths {
    mkdirSync(dir, { recursive: true });

    const paths: RankingOutputPaths = {
        csv: join(dir, rankingCsvName(data.strategy, data.query.id)),
        text: join(dir, rankingTextName(data.strategy, data.query.id)),
    };

    writeFileSync(paths.csv, formatRankingCsv(data.ranking.results), 'utf-8');
    writeFileSync(paths.text, formatRankingText(data), 'utf-8');

    logger.info(
        { csv: paths.csv, text: paths.text, ranked: data.ranking.results.length, excluded: data.ranking.excluded.length },
        'Ranking exported'
    );
    return paths;
}

export function writeConsolidatedCsv(
    dir: string,
    strategy: EmbeddingStrategy,
    queryId: string,
    rows: readonly ExplainedResult[]
): string {
    const path = consolidatedCsvPath(dir, strategy, queryId);
    mkdirSync(join(dir, strategy), { recursive: true });
    writeFileSync(path, formatConsolidatedCsv(rows), 'utf-8');
    logger.info({ path, authors: rows.length }, 'Explanations exported');
    return path;
}
