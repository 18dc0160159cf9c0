import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { parseString } from 'fast-csv';
import { getLogger } from '../utils/logger.js';
import { toCsvLine } from './csv.js';
import { consolidatedCsvPath } from './export.js';

const logger = getLogger();

export interface AgreementOptions {
    /** Directory holding `{system}/{docId}.csv` */
    dir: string;
    systems: readonly string[];
    docIds: readonly string[];
    /** Names compared per system */
    topN?: number;
}

export interface AgreementRow {
    docId: string;
    /** Overlap count per pair label */
    overlaps: Record<string, number>;
}

/**
 * Short column label for a pair of systems, e.g. `sum-agg`.
 */
export function pairLabel(a: string, b: string): string {
    return `${a.slice(0, 3)}-${b.slice(0, 3)}`;
}

/**
 * Every unordered pair, in the order the systems are listed.
 */
export function systemPairs(systems: readonly string[]): [string, string][] {
    const pairs: [string, string][] = [];
    systems.forEach((a, i) => {
        for (const b of systems.slice(i + 1)) pairs.push([a, b]);
    });
    return pairs;
}

type CsvRecord = Record<string, string>;

/**
 * Parse CSV text with a header row into records keyed by trimmed column name.
 */
export function parseCsvRecords(text: string): Promise<CsvRecord[]> {
    return new Promise((resolve, reject) => {
        const records: CsvRecord[] = [];
        parseString<CsvRecord, CsvRecord>(text, {
            headers: (headers) => headers.map((header) => header?.trim()),
            ignoreEmpty: true,
        })
            .on('error', (error: Error) => reject(error))
            .on('data', (record: CsvRecord) => records.push(record))
            .on('end', () => resolve(records));
    });
}

/**
 * First `topN` names of a ranked CSV with a `name` column. A missing file
 * yields no names.
 */
export async function readTopNames(path: string, topN: number): Promise<string[]> {
    if (!existsSync(path)) {
        logger.warn({ path }, 'Ranked file not found');
        return [];
    }

    const records = await parseCsvRecords(readFileSync(path, 'utf-8'));
    return records
        .map((record) => (record['name'] ?? '').trim())
        .filter(Boolean)
        .slice(0, topN);
}

export function overlapCount(a: readonly string[], b: readonly string[]): number {
    const other = new Set(b);
    return new Set(a.filter((name) => other.has(name))).size;
}

export async function computeAgreement(options: AgreementOptions): Promise<AgreementRow[]> {
    const topN = options.topN ?? 10;
    const pairs = systemPairs(options.systems);
    const rows: AgreementRow[] = [];

    for (const docId of options.docIds) {
        const names = new Map<string, string[]>();
        for (const system of options.systems) {
            names.set(system, await readTopNames(consolidatedCsvPath(options.dir, system, docId), topN));
        }

        const overlaps: Record<string, number> = {};
        for (const [a, b] of pairs) {
            overlaps[pairLabel(a, b)] = overlapCount(names.get(a) ?? [], names.get(b) ?? []);
        }
        rows.push({ docId, overlaps });
    }

    return rows;
}

export function formatAgreementCsv(systems: readonly string[], rows: readonly AgreementRow[]): string {
    const labels = systemPairs(systems).map(([a, b]) => pairLabel(a, b));
    const lines = [toCsvLine(['docID', ...labels])];
    for (const row of rows) {
        lines.push(toCsvLine([row.docId, ...labels.map((label) => row.overlaps[label] ?? 0)]));
    }
    return lines.join('\n') + '\n';
}

/**
 * Compute pairwise top-N overlap and write `agreement.csv` into `dir`.
 * @returns The written path
 */
export async function writeAgreement(options: AgreementOptions): Promise<string> {
    const rows = await computeAgreement(options);
    const path = join(options.dir, 'agreement.csv');
    writeFileSync(path, formatAgreementCsv(options.systems, rows), 'utf-8');

    for (const [a, b] of systemPairs(options.systems)) {
        const label = pairLabel(a, b);
        const mean = rows.length === 0 ? 0 : rows.reduce((sum, row) => sum + (row.overlaps[label] ?? 0), 0) / rows.length;
        logger.info({ pair: label, mean: Number(mean.toFixed(2)), topN: options.topN ?? 10 }, 'Mean agreement');
    }

    logger.info({ path, documents: rows.length }, 'Agreement written');
    return path;
}
