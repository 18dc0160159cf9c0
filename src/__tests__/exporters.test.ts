import { describe, it, expect } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { escapeCsvField, toCsvLine } from '../exporters/csv.js';
import {
    collapseWhitespace,
    formatConsolidatedCsv,
    formatRankingCsv,
    writeConsolidatedCsv,
} from '../exporters/export.js';
import {
    computeAgreement,
    formatAgreementCsv,
    overlapCount,
    pairLabel,
    parseCsvRecords,
    readTopNames,
    systemPairs,
    writeAgreement,
} from '../exporters/agreement.js';
import type { EmbeddingStrategy, FitnessResult } from '../types/index.js';
import { makeTmpDir } from './helpers.js';

function result(rank: number, name: string, score: number): FitnessResult {
    return { rank, author_name: name, score, index: rank - 1 };
}

describe('csv helpers', () => {
    it('should quote only fields that need it', () => {
        expect(escapeCsvField('plain')).toBe('plain');
        expect(escapeCsvField('Smith, J.')).toBe('"Smith, J."');
        expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
        expect(toCsvLine([1, 'a,b', 0.5])).toBe('1,"a,b",0.5');
        expect(toCsvLine([1, 'a'], true)).toBe('"1","a"');
    });
});

describe('ranking export', () => {
    it('should format the ranking CSV', () => {
        expect(formatRankingCsv([result(1, 'Ada', 0.91234567), result(2, 'Lee, Bo', -0.5)])).toBe(
            'Rank,Author Name,Fitness Score\n1,Ada,0.912346\n2,"Lee, Bo",-0.500000\n'
        );
    });

    it('should quote every consolidated field and flatten rationales', () => {
        expect(
            formatConsolidatedCsv([
                { result: result(1, 'Ada', 0.876), rationale: 'Strong fit.\n\n  Works on "graphs".\t' },
            ])
        ).toBe('"index","name","fitness_score","rationale"\n"1","Ada","0.88","Strong fit. Works on ""graphs""."\n');
    });

    it('should collapse all whitespace runs', () => {
        expect(collapseWhitespace('  a\r\n\tb \f c\v ')).toBe('a b c');
    });

    it('should write the consolidated CSV under the strategy directory', () => {
        const dir = makeTmpDir();
        const file = writeConsolidatedCsv(dir, 'summarize', '2', [{ result: result(1, 'Ada', 0.5), rationale: 'ok' }]);

        expect(file).toBe(path.join(dir, 'summarize', '2.csv'));
        expect(fs.readFileSync(file, 'utf-8')).toBe('"index","name","fitness_score","rationale"\n"1","Ada","0.50","ok"\n');
    });
});

describe('agreement', () => {
    function writeRanked(dir: string, system: EmbeddingStrategy, docId: string, names: string[]): void {
        writeConsolidatedCsv(
            dir,
            system,
            docId,
            names.map((name, i) => ({ result: result(i + 1, name, 1 - i / 10), rationale: '' }))
        );
    }

    it('should label and enumerate system pairs', () => {
        expect(pairLabel('gemini', 'summarize')).toBe('gem-sum');
        expect(systemPairs(['gpt', 'gemini', 'summarize'])).toEqual([
            ['gpt', 'gemini'],
            ['gpt', 'summarize'],
            ['gemini', 'summarize'],
        ]);
    });

    it('should count shared names once', () => {
        expect(overlapCount(['a', 'b', 'b', 'c'], ['b', 'c', 'd'])).toBe(2);
    });

    it('should key records by trimmed header names and unquote fields', async () => {
        await expect(parseCsvRecords(' index , name\n"1","Lee, ""Bo"""\n\n2,Ada\n')).resolves.toEqual([
            { index: '1', name: 'Lee, "Bo"' },
            { index: '2', name: 'Ada' },
        ]);
    });

    it('should read only the first N names and tolerate missing files', async () => {
        const dir = makeTmpDir();
        writeRanked(dir, 'aggregate', '0', ['Lee, Bo', 'B', 'C']);

        await expect(readTopNames(path.join(dir, 'aggregate', '0.csv'), 2)).resolves.toEqual(['Lee, Bo', 'B']);
        await expect(readTopNames(path.join(dir, 'missing', '0.csv'), 2)).resolves.toEqual([]);
    });

    it('should compute top-N overlap per document and write agreement.csv', async () => {
        const dir = makeTmpDir();
        writeRanked(dir, 'summarize', '0', ['A', 'B', 'C', 'D']);
        writeRanked(dir, 'aggregate', '0', ['C', 'A', 'E', 'B']);
        writeRanked(dir, 'summarize', '1', ['X', 'Y']);
        writeRanked(dir, 'aggregate', '1', ['Z', 'W']);

        const options = { dir, systems: ['summarize', 'aggregate'], docIds: ['0', '1'], topN: 3 };
        const rows = await computeAgreement(options);

        expect(rows).toEqual([
            { docId: '0', overlaps: { 'sum-agg': 2 } },
            { docId: '1', overlaps: { 'sum-agg': 0 } },
        ]);
        expect(formatAgreementCsv(options.systems, rows)).toBe('docID,sum-agg\n0,2\n1,0\n');

        const file = await writeAgreement(options);
        expect(file).toBe(path.join(dir, 'agreement.csv'));
        expect(fs.readFileSync(file, 'utf-8')).toBe('docID,sum-agg\n0,2\n1,0\n');
    });
});
