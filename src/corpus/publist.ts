import { existsSync, readdirSync, readFileSync, statSync } from 'node:fs';
import { join } from 'node:path';
import type { Author, Publication } from '../types/index.js';
import { ConfigurationError, describeError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/**
 * Build one author from a publication-list file:
 * `{ "author": "...", "results": [{ "title", "abstract", "url" }] }`.
 * @returns null when the file names no author
 */
export function authorFromPublist(path: string): Author | null {
    const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        throw new Error('Expected a JSON object');
    }

    const name = 'author' in raw && typeof raw.author === 'string' ? raw.author.trim() : '';
    if (!name) return null;

    const results: unknown = 'results' in raw ? raw.results : [];
    const publications: Publication[] = [];
    if (Array.isArray(results)) {
        for (const item of results) {
            if (typeof item !== 'object' || item === null) continue;
            const publication: Publication = {
                title: textOf(item, 'title'),
                abstract: textOf(item, 'abstract'),
            };
            const url = textOf(item, 'url');
            if (url) publication.url = url;
            publications.push(publication);
        }
    }

    return { name, publications };
}

/**
 * Build an author collection from every `*.json` file of a directory, in
 * file-name order. Nameless authors are skipped and an unreadable file is
 * logged without stopping the others.
 * @throws ConfigurationError when the directory does not exist
 */
export function buildCorpusFromPublists(dir: string): Author[] {
    if (!existsSync(dir) || !statSync(dir).isDirectory()) {
        throw new ConfigurationError(`Publication list directory not found: ${dir}`);
    }

    const files = readdirSync(dir)
        .filter((file) => file.toLowerCase().endsWith('.json'))
        .sort();

    const authors: Author[] = [];
    for (const file of files) {
        const path = join(dir, file);
        try {
            const author = authorFromPublist(path);
            if (author) {
                authors.push(author);
            } else {
                logger.warn({ path }, 'No author name, skipping');
            }
        } catch (error) {
            logger.error({ path, error: describeError(error) }, 'Failed to read publication list');
        }
    }

    logger.info({ dir, files: files.length, authors: authors.length }, 'Publication lists loaded');
    return authors;
}

function textOf(item: object, key: string): string {
    const value: unknown = Object.getOwnPropertyDescriptor(item, key)?.value;
    return typeof value === 'string' ? value.trim() : '';
}
