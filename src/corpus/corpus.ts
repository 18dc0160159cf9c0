import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { EMBEDDING_STRATEGIES, type Author, type EmbeddingStrategy, type Publication } from '../types/index.js';
import { ConfigurationError, describeError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/** Keys this module interprets; everything else is carried through untouched */
const KNOWN_KEYS = new Set([
    'name',
    'publications',
    'list_of_pubs',
    'summary',
    'embedding',
    'embedding_strategy',
    'embedding_model',
    'error',
]);

// ─── Text helpers ────────────────────────────────────────

/**
 * Text that represents a publication: the title, then the abstract when present.
 * Empty when both are blank.
 */
export function publicationText(publication: Publication): string {
    const title = publication.title.trim();
    const abstract = publication.abstract.trim();
    if (!abstract) return title;
    if (!title) return abstract;
    return `${title}\n${abstract}`;
}

/**
 * Whether any publication of the author carries text.
 * Authors without usable text are degenerate and never embedded.
 */
export function hasUsableText(author: Author): boolean {
    return author.publications.some((publication) => publicationText(publication).length > 0);
}

// ─── Loading ─────────────────────────────────────────────

/**
 * Load an author collection from a JSON array file.
 * @throws ConfigurationError when the file is missing or not a valid collection
 */
export function loadCorpus(path: string): Author[] {
    if (!existsSync(path)) {
        throw new ConfigurationError(`Input file not found: ${path}`);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
        throw new ConfigurationError(`Invalid JSON in ${path}: ${describeError(error)}`);
    }

    if (!Array.isArray(raw)) {
        throw new ConfigurationError(`Expected a JSON array of authors in ${path}`);
    }

    return raw.map((record, index) => parseAuthorRecord(record, index, path));
}

/**
 * Normalize one raw record. Publications may sit under `publications`
 * or the legacy `list_of_pubs` key.
 */
export function parseAuthorRecord(record: unknown, index: number, source = 'input'): Author {
    if (!isRecord(record)) {
        throw new ConfigurationError(`Author #${index} in ${source} is not an object`);
    }

    const name = record['name'];
    if (typeof name !== 'string') {
        throw new ConfigurationError(`Author #${index} in ${source} has no name`);
    }

    const rawPublications = record['publications'] ?? record['list_of_pubs'] ?? [];
    if (!Array.isArray(rawPublications)) {
        throw new ConfigurationError(`Publications of author "${name}" in ${source} are not a list`);
    }

    const author: Author = {
        name,
        publications: rawPublications.map((pub, pubIndex) => parsePublication(pub, name, pubIndex, source)),
    };

    const summary = record['summary'];
    if (typeof summary === 'string') author.summary = summary;

    const embedding = record['embedding'];
    if (Array.isArray(embedding) && embedding.every((v): v is number => typeof v === 'number')) {
        author.embedding = embedding;
    }

    const strategy = record['embedding_strategy'];
    if (isStrategy(strategy)) author.embedding_strategy = strategy;

    const model = record['embedding_model'];
    if (typeof model === 'string') author.embedding_model = model;

    const error = record['error'];
    if (typeof error === 'string') author.error = error;

    const extra: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(record)) {
        if (!KNOWN_KEYS.has(key)) extra[key] = value;
    }
    if (Object.keys(extra).length > 0) author.extra = extra;

    return author;
}

function parsePublication(raw: unknown, authorName: string, index: number, source: string): Publication {
    if (!isRecord(raw)) {
        throw new ConfigurationError(`Publication #${index} of "${authorName}" in ${source} is not an object`);
    }

    const publication: Publication = {
        title: stringField(raw['title']),
        abstract: stringField(raw['abstract']),
    };
    const url = raw['url'];
    if (typeof url === 'string' && url.trim()) publication.url = url.trim();
    return publication;
}

// ─── Saving ──────────────────────────────────────────────

/**
 * Serialize an author back to its on-disk shape with a stable key order.
 */
export function serializeAuthor(author: Author): Record<string, unknown> {
    const record: Record<string, unknown> = { name: author.name, ...author.extra };
    record['publications'] = author.publications.map((pub) =>
        pub.url === undefined ? { title: pub.title, abstract: pub.abstract } : { title: pub.title, abstract: pub.abstract, url: pub.url }
    );
    if (author.summary !== undefined) record['summary'] = author.summary;
    if (author.embedding !== undefined) record['embedding'] = author.embedding;
    if (author.embedding_strategy !== undefined) record['embedding_strategy'] = author.embedding_strategy;
    if (author.embedding_model !== undefined) record['embedding_model'] = author.embedding_model;
    if (author.error !== undefined) record['error'] = author.error;
    return record;
}

export function formatCorpus(authors: readonly Author[]): string {
    return JSON.stringify(authors.map(serializeAuthor), null, 2) + '\n';
}

/**
 * Write the whole collection, in order. The file is replaced atomically so an
 * interrupted write never leaves a truncated corpus behind.
 */
export function saveCorpus(path: string, authors: readonly Author[]): void {
    mkdirSync(dirname(path), { recursive: true });
    const tmpPath = `${path}.tmp`;
    writeFileSync(tmpPath, formatCorpus(authors), 'utf-8');
    renameSync(tmpPath, path);
    logger.debug({ path, authors: authors.length }, 'Corpus saved');
}

// ─── Resume ──────────────────────────────────────────────

/**
 * Pick the state to work on: the existing output when it holds the same
 * authors in the same order as the input (a previous partial run), else the input.
 * Authors match on name and publication count; edited publication text with
 * the same count is not detected.
 */
export function loadResumeState(inputPath: string, outputPath: string): { authors: Author[]; resumed: boolean } {
    const input = loadCorpus(inputPath);
    if (inputPath === outputPath || !existsSync(outputPath)) {
        return { authors: input, resumed: false };
    }

    let output: Author[];
    try {
        output = loadCorpus(outputPath);
    } catch (error) {
        logger.warn({ outputPath, error: describeError(error) }, 'Ignoring unreadable output file, starting from input');
        return { authors: input, resumed: false };
    }

    const sameAuthors =
        output.length === input.length &&
        output.every(
            (author, i) =>
                author.name === input[i]?.name && author.publications.length === input[i]?.publications.length
        );

    if (!sameAuthors) {
        logger.warn(
            { outputPath, inputAuthors: input.length, outputAuthors: output.length },
            'Output file holds a different author list, starting from input'
        );
        return { authors: input, resumed: false };
    }

    logger.info({ outputPath }, 'Resuming from existing output');
    return { authors: output, resumed: true };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStrategy(value: unknown): value is EmbeddingStrategy {
    return EMBEDDING_STRATEGIES.some((strategy) => strategy === value);
}

function stringField(value: unknown): string {
    return typeof value === 'string' ? value.trim() : '';
}
