import type { Author, LlmProvider, Query } from '../types/index.js';
import { ProviderError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import type { RetryPolicy } from '../utils/retry.js';
import {
    JUSTIFICATION_SYSTEM_PROMPT,
    SUMMARY_SYSTEM_PROMPT,
    buildJustificationPrompt,
    buildSummaryPrompt,
    truncatePublicationsForContext,
} from './prompt.js';

const logger = getLogger();

/**
 * Ask the LLM for a research summary of one author. One logical call,
 * retried under the given policy.
 *
 * @param maxContextTokens - Token budget for the publication list
 */
export async function summarizeAuthor(
    author: Author,
    llm: LlmProvider,
    retry: RetryPolicy,
    maxContextTokens: number
): Promise<string> {
    const publications = truncatePublicationsForContext(author.publications, maxContextTokens);
    if (publications.length < author.publications.length) {
        logger.info(
            { author: author.name, kept: publications.length, total: author.publications.length },
            'Publications truncated to fit the context window'
        );
    }

    const prompt = buildSummaryPrompt(author.name, publications);

    return retry.execute(`summarize ${author.name}`, async () => {
        const result = await llm.complete(prompt, { systemPrompt: SUMMARY_SYSTEM_PROMPT, temperature: 0 });
        const summary = result.text.trim();
        if (!summary) {
            // Sampling can produce an empty message; another attempt may not
            throw new ProviderError(`${llm.name} returned an empty summary`, llm.name, true);
        }
        logger.debug({ author: author.name, tokens: result.usage.totalTokens }, 'Summary generated');
        return summary;
    });
}

/**
 * Ask the LLM to explain an author's fitness for a query.
 * @param score - Cosine similarity in [-1, 1]; shown to the LLM out of 100
 */
export async function generateJustification(
    query: Query,
    author: Author,
    score: number,
    llm: LlmProvider,
    retry: RetryPolicy
): Promise<string> {
    const prompt = buildJustificationPrompt(query, describeAuthor(author), Math.round(score * 100));

    return retry.execute(`justify ${author.name}`, async () => {
        const result = await llm.complete(prompt, { systemPrompt: JUSTIFICATION_SYSTEM_PROMPT, temperature: 0 });
        return result.text.trim();
    });
}

/**
 * The author's summary, or their publication titles when no summary exists.
 */
export function describeAuthor(author: Author): string {
    if (author.summary?.trim()) return author.summary.trim();

    const titles = author.publications.map((publication) => publication.title).filter(Boolean);
    return `Publications: ${titles.join('; ')}`;
}
