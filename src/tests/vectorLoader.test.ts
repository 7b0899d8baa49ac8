import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
    loadVectorFile,
    loadVectorsFromLines,
    loadVectorsFromSource,
    VectorTableBuilder
} from '../services/vectorLoader.js';
import { rankSimilar } from '../services/similarityRanker.js';
import { SkipReason } from '../types/vector.js';
import { logger, LogLevel } from '../utils/logger.js';

describe('Vector loader', () => {
    beforeAll(() => {
        logger.setLevel(LogLevel.ERROR);
    });

    afterAll(() => {
        logger.setLevel(LogLevel.INFO);
    });

    it('should keep only lines matching the first dimension', () => {
        const result = loadVectorsFromLines(['cat 1.0 2.0 3.0', 'dog 4.0 5.0']);
        if (!result.ok) throw new Error(result.error.message);

        expect(result.table.size).toBe(1);
        expect(result.table.dimension).toBe(3);
        expect(result.table.has('cat')).toBe(true);
        expect(result.table.has('dog')).toBe(false);
        expect(Array.from(result.table.get('cat') ?? [])).toEqual([1, 2, 3]);
        expect(result.stats.skipped[SkipReason.DimensionMismatch]).toBe(1);
    });

    it('should signal a fatal condition when nothing loads', () => {
        const result = loadVectorsFromLines(['', 'lonely', 'bad 1.0 x']);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.kind).toBe('empty-table');
        expect(result.error.message).toBe('No word vectors were loaded. Check the vector file.');
    });

    it('should treat an empty source as fatal', () => {
        const result = loadVectorsFromLines([]);
        expect(result.ok).toBe(false);
    });

    it('should skip a line when any component is not a number', () => {
        const builder = new VectorTableBuilder();
        expect(builder.addLine('one 1.5 -2e-3')).toBeUndefined();
        expect(builder.addLine('two 1.5 abc')).toBe(SkipReason.InvalidNumber);
        expect(builder.addLine('three 1.5 NaN')).toBe(SkipReason.InvalidNumber);
        expect(builder.addLine('four 0x10 1')).toBe(SkipReason.InvalidNumber);
        expect(builder.addLine('five')).toBe(SkipReason.TooFewTokens);

        const result = builder.build();
        if (!result.ok) throw new Error(result.error.message);
        expect(result.table.size).toBe(1);
        expect(result.stats).toEqual({
            linesRead: 5,
            entriesLoaded: 1,
            duplicatesOverwritten: 0,
            skipped: {
                [SkipReason.TooFewTokens]: 1,
                [SkipReason.InvalidNumber]: 3,
                [SkipReason.DimensionMismatch]: 0
            }
        });
    });

    it('should keep large components exact and skip ones that overflow', () => {
        const result = loadVectorsFromLines(['a 1 0', 'big 1e39 1e39', 'huge 1e400 1', 'b 0 1']);
        if (!result.ok) throw new Error(result.error.message);

        expect(Array.from(result.table.get('big') ?? [])).toEqual([1e39, 1e39]);
        expect(result.table.has('huge')).toBe(false);
        expect(result.stats.skipped[SkipReason.InvalidNumber]).toBe(1);

        const ranked = rankSimilar(result.table, [1, 1], [], 3);
        expect(ranked[0].word).toBe('big');
        expect(ranked[0].similarity).toBeCloseTo(1, 10);
    });

    it('should fix the dimension from the first parsed line, not the first line', () => {
        const result = loadVectorsFromLines(['broken 1.0 oops', 'pair 1 2', 'triple 1 2 3']);
        if (!result.ok) throw new Error(result.error.message);
        expect(result.table.dimension).toBe(2);
        expect(result.table.has('pair')).toBe(true);
        expect(result.table.has('triple')).toBe(false);
    });

    it('should lowercase words and let the last occurrence win', () => {
        const result = loadVectorsFromLines(['Apple 1 0', 'apple 0 1', 'apple 5 5 5']);
        if (!result.ok) throw new Error(result.error.message);
        expect(result.table.size).toBe(1);
        expect(Array.from(result.table.get('APPLE') ?? [])).toEqual([0, 1]);
        expect(result.stats.duplicatesOverwritten).toBe(1);
    });

    it('should accept tabs and repeated spaces between tokens', () => {
        const result = loadVectorsFromLines(['tab\t0.5\t0.25  ', '  spaced   2    4']);
        if (!result.ok) throw new Error(result.error.message);
        expect(Array.from(result.table.get('tab') ?? [])).toEqual([0.5, 0.25]);
        expect(Array.from(result.table.get('spaced') ?? [])).toEqual([2, 4]);
    });

    it('should load from an async source', async () => {
        async function* lines() {
            yield 'sun 1 1';
            yield 'moon 1 -1';
        }
        const result = await loadVectorsFromSource(lines());
        if (!result.ok) throw new Error(result.error.message);
        expect(result.table.size).toBe(2);
    });

    describe('loadVectorFile', () => {
        let dir: string;

        beforeEach(() => {
            dir = mkdtempSync(path.join(os.tmpdir(), 'vectors-'));
        });

        afterEach(() => {
            rmSync(dir, { recursive: true, force: true });
        });

        it('should load a vector file from disk', async () => {
            const filePath = path.join(dir, 'vectors.txt');
            writeFileSync(filePath, 'red 1 0 0\r\ngreen 0 1 0\nblue 0 0 1\n');

            const result = await loadVectorFile(filePath);
            if (!result.ok) throw new Error(result.error.message);
            expect(result.table.size).toBe(3);
            expect(result.table.dimension).toBe(3);
            expect(Array.from(result.table.get('green') ?? [])).toEqual([0, 1, 0]);
        });

        it('should report a missing file as fatal', async () => {
            const filePath = path.join(dir, 'absent.txt');
            const result = await loadVectorFile(filePath);
            expect(result).toEqual({
                ok: false,
                error: {
                    kind: 'file-missing',
                    path: filePath,
                    message: `Vector file not found at ${filePath}. Please ensure it's downloaded and extracted.`
                }
            });
        });

        it('should report a file without usable lines as fatal', async () => {
            const filePath = path.join(dir, 'empty.txt');
            writeFileSync(filePath, 'header\n\n');
            const result = await loadVectorFile(filePath);
            expect(result.ok).toBe(false);
            if (result.ok) return;
            expect(result.error.kind).toBe('empty-table');
        });
    });
});
