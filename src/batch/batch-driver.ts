import { saveCorpus } from '../corpus/corpus.js';
import type { Author } from '../types/index.js';
import { ConfigurationError, DegenerateInputWarning, ProcessingFailure, describeError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { RetryExhaustedError, sleep as defaultSleep } from '../utils/retry.js';
import { isComplete } from './completion.js';
import type { AuthorTask } from './tasks.js';

const logger = getLogger();

export type AuthorStatus = 'done' | 'failed' | 'skipped' | 'degenerate';

export interface AuthorOutcome {
    index: number;
    name: string;
    status: AuthorStatus;
    /** Set for failed authors */
    failure?: ProcessingFailure;
}

export interface BatchReport {
    start: number;
    end: number;
    outcomes: AuthorOutcome[];
    done: number;
    failed: number;
    skipped: number;
    degenerate: number;
}

export interface BatchOptions {
    /** Inclusive; defaults to 0 */
    start?: number;
    /** Exclusive; defaults to the collection length */
    end?: number;
    /** Pause after each successfully processed author */
    authorDelayMs: number;
    /** Checkpoint file; nothing is written when omitted */
    outputPath?: string;
    /** Injected for tests */
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Validate and clamp a `[start, end)` range to a collection of `length` authors.
 * An omitted `end` means the end of the collection, so a `start` past it
 * yields an empty range.
 * @throws ConfigurationError for negative or fractional bounds, or when both
 * bounds are given and `start` exceeds `end`
 */
export function resolveRange(length: number, start?: number, end?: number): { start: number; end: number } {
    for (const [label, value] of [['start', start], ['end', end]] as const) {
        if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
            throw new ConfigurationError(`Invalid ${label} index: ${value}`);
        }
    }

    if (start !== undefined && end !== undefined && start > end) {
        throw new ConfigurationError(`Start index ${start} is greater than end index ${end}`);
    }

    return { start: Math.min(start ?? 0, length), end: Math.min(end ?? length, length) };
}

/**
 * Apply `task` to every author in the range, one at a time.
 *
 * Complete and degenerate authors are passed over without provider calls.
 * A failing author is recorded and the batch moves on. The collection is
 * checkpointed after each processed author and once more at the end, always
 * whole and in its original order.
 */
export async function runBatch(authors: Author[], task: AuthorTask, options: BatchOptions): Promise<BatchReport> {
    const { start, end } = resolveRange(authors.length, options.start, options.end);
    const sleep = options.sleep ?? defaultSleep;
    const report: BatchReport = { start, end, outcomes: [], done: 0, failed: 0, skipped: 0, degenerate: 0 };

    const checkpoint = (): void => {
        if (options.outputPath) saveCorpus(options.outputPath, authors);
    };

    logger.info({ task: task.label, start, end, total: authors.length }, 'Batch started');

    for (let index = start; index < end; index++) {
        const author = authors[index];
        if (!author) continue;

        const outcome = await processAuthor(author, index, task);
        report.outcomes.push(outcome);
        report[outcome.status]++;

        if (outcome.status === 'done' || outcome.status === 'failed') checkpoint();
        if (outcome.status === 'done') await sleep(options.authorDelayMs);
    }

    checkpoint();

    logger.info(
        {
            task: task.label,
            done: report.done,
            failed: report.failed,
            skipped: report.skipped,
            degenerate: report.degenerate,
        },
        'Batch finished'
    );

    return report;
}

async function processAuthor(author: Author, index: number, task: AuthorTask): Promise<AuthorOutcome> {
    const base = { index, name: author.name };

    if (isComplete(author, task.target)) {
        logger.debug(base, 'Already complete, skipping');
        return { ...base, status: 'skipped' };
    }

    if (!task.hasInput(author)) {
        logger.warn({ ...base, warning: new DegenerateInputWarning(author.name, index).message }, 'Degenerate author');
        return { ...base, status: 'degenerate' };
    }

    try {
        await task.run(author, index);
        delete author.error;
        logger.info(base, 'Author processed');
        return { ...base, status: 'done' };
    } catch (error) {
        if (error instanceof DegenerateInputWarning) {
            logger.warn({ ...base, warning: error.message }, 'Degenerate author');
            return { ...base, status: 'degenerate' };
        }

        const attempts = error instanceof RetryExhaustedError ? error.attempts : 1;
        const failure = new ProcessingFailure(author.name, index, attempts, error);
        author.error = describeError(error);
        logger.error({ ...base, attempts, err: failure }, 'Author failed');
        return { ...base, status: 'failed', failure };
    }
}
