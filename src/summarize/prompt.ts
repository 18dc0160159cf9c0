import type { Publication, Query } from '../types/index.js';

/**
 * Prompts for author summaries and fitness justifications.
 */

export const SUMMARY_SYSTEM_PROMPT = `You are an academic expert specializing in research analysis. Your task is to analyze an author's publications and provide a comprehensive summary of their research contributions, expertise areas, and main research directions.

Please focus on:
1. Identifying the main research themes and areas of expertise
2. Highlighting key methodologies and approaches used
3. Summarizing significant contributions and findings
4. Describing the evolution of their research interests
5. Identifying potential applications and impact of their work

Provide a clear, concise summary that would be useful for understanding this researcher's expertise and contributions to their field. Make it maximum 250 words.`;

export const JUSTIFICATION_SYSTEM_PROMPT =
    'You are an academic chair of a conference. Given the information of a paper (title and abstract) and a reviewer, explain why the reviewer is a good or bad fit to review the paper according to the provided fitness score.';

/** Rough token estimate: ~4 characters per token for English text */
const CHARS_PER_TOKEN = 4;

/** Abstracts are not shortened below this many characters */
const MIN_ABSTRACT_CHARS = 100;

/** Single-sentence abstracts are cut to this many words */
const MAX_FALLBACK_WORDS = 20;

export function estimateTokens(text: string): number {
    return Math.floor(text.length / CHARS_PER_TOKEN);
}

function publicationTokens(publication: Publication): number {
    return estimateTokens(publication.title + publication.abstract);
}

/**
 * Fit publications into a token budget without mutating the input.
 *
 * Publications are dropped from the end while over budget (at least one is
 * kept); if still over, abstracts are shortened a sentence at a time, and
 * single-sentence abstracts cut to their first 20 words.
 */
export function truncatePublicationsForContext(
    publications: readonly Publication[],
    maxTokens: number
): Publication[] {
    const selected = publications.map((publication) => ({ ...publication }));
    let total = selected.reduce((sum, publication) => sum + publicationTokens(publication), 0);

    if (total <= maxTokens) return selected;

    while (total > maxTokens && selected.length > 1) {
        const removed = selected.pop();
        if (removed) total -= publicationTokens(removed);
    }

    for (const publication of selected) {
        if (total <= maxTokens) break;

        let abstract = publication.abstract;
        while (total > maxTokens && abstract.length > MIN_ABSTRACT_CHARS) {
            const before = publicationTokens({ ...publication, abstract });
            const sentences = abstract.split('. ');
            if (sentences.length > 1) {
                abstract = sentences.slice(0, -1).join('. ') + '.';
            } else {
                const words = abstract.split(/\s+/);
                if (words.length <= MAX_FALLBACK_WORDS) break;
                abstract = words.slice(0, MAX_FALLBACK_WORDS).join(' ') + '...';
            }
            total += publicationTokens({ ...publication, abstract }) - before;
        }
        publication.abstract = abstract;
    }

    return selected;
}

/**
 * User prompt asking for a summary of one author's research.
 * Publications without any text are left out.
 */
export function buildSummaryPrompt(authorName: string, publications: readonly Publication[]): string {
    let prompt = `Author: ${authorName}\n\n`;
    prompt += 'Publications:\n\n';

    publications
        .filter((publication) => publication.title.trim() || publication.abstract.trim())
        .forEach((publication, i) => {
            prompt += `${i + 1}. Title: ${publication.title}\n`;
            prompt += `   Abstract: ${publication.abstract}\n\n`;
        });

    prompt +=
        "Please provide a comprehensive summary of this author's research contributions, expertise areas, and main research directions based on their publications. Focus on identifying patterns, methodologies, and key research themes. Make it maximum 250 words.";

    return prompt;
}

/**
 * User prompt asking why an author fits (or does not fit) a query.
 * @param authorInfo - Summary of the author's research
 * @param score - Fitness score out of 100
 */
export function buildJustificationPrompt(query: Query, authorInfo: string, score: number): string {
    const title = query.title ?? query.text;
    const abstract = query.abstract ?? '';

    return [
        `Paper Title: ${title}`,
        `Paper Abstract: ${abstract}`,
        `Summary of Research by the Reviewer: ${authorInfo}`,
        `Fitness Score (out of 100): ${score}`,
        '',
        'Explain whether the reviewer is a good fit to review the paper based on the given fitness score:',
    ].join('\n');
}
