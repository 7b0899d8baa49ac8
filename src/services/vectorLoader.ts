import { createReadStream } from 'fs';
import { access } from 'fs/promises';
import { createInterface } from 'readline';
import { LoadError, LoadStats, SkipReason } from '../types/vector.js';
import { logger } from '../utils/logger.js';
import { VectorTable } from './vectorTable.js';

export type LoadResult =
    | { ok: true; table: VectorTable; stats: LoadStats }
    | { ok: false; error: LoadError };

const PROGRESS_INTERVAL = 500_000;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

function parseComponents(tokens: string[]): Float64Array | undefined {
    const vector = new Float64Array(tokens.length);
    for (let i = 0; i < tokens.length; i++) {
        if (!FLOAT_PATTERN.test(tokens[i])) {
            return undefined;
        }
        const value = Number(tokens[i]);
        // e.g. 1e400 overflows to Infinity
        if (!Number.isFinite(value)) {
            return undefined;
        }
        vector[i] = value;
    }
    return vector;
}

/**
 * Accumulates vector file lines into a table. The first accepted line fixes
 * the dimension; every line that cannot be used is counted and dropped.
 */
export class VectorTableBuilder {
    private readonly vectors = new Map<string, Float64Array>();
    private dimension: number | undefined;
    private accepted = 0;
    private readonly stats: LoadStats = {
        linesRead: 0,
        entriesLoaded: 0,
        duplicatesOverwritten: 0,
        skipped: {
            [SkipReason.TooFewTokens]: 0,
            [SkipReason.InvalidNumber]: 0,
            [SkipReason.DimensionMismatch]: 0
        }
    };

    addLine(line: string): SkipReason | undefined {
        this.stats.linesRead++;
        const reason = this.accept(line);
        if (reason) {
            this.stats.skipped[reason]++;
        }
        return reason;
    }

    private accept(line: string): SkipReason | undefined {
        const tokens = line.trim().split(/\s+/);
        if (tokens.length < 2) {
            return SkipReason.TooFewTokens;
        }

        const vector = parseComponents(tokens.slice(1));
        if (!vector) {
            return SkipReason.InvalidNumber;
        }

        if (this.dimension === undefined) {
            this.dimension = vector.length;
        } else if (vector.length !== this.dimension) {
            return SkipReason.DimensionMismatch;
        }

        const word = tokens[0].toLowerCase();
        if (this.vectors.has(word)) {
            this.stats.duplicatesOverwritten++;
        }
        this.vectors.set(word, vector);

        this.accepted++;
        if (this.accepted % PROGRESS_INTERVAL === 0) {
            logger.info(`Loaded ${this.accepted} vectors...`);
        }
        return undefined;
    }

    build(): LoadResult {
        const stats = { ...this.stats, entriesLoaded: this.vectors.size };
        if (this.dimension === undefined || this.vectors.size === 0) {
            return {
                ok: false,
                error: {
                    kind: 'empty-table',
                    message: 'No word vectors were loaded. Check the vector file.',
                    stats
                }
            };
        }
        return { ok: true, table: new VectorTable(this.vectors, this.dimension), stats };
    }
}

export function loadVectorsFromLines(lines: Iterable<string>): LoadResult {
    const builder = new VectorTableBuilder();
    for (const line of lines) {
        builder.addLine(line);
    }
    return builder.build();
}

export async function loadVectorsFromSource(lines: AsyncIterable<string>): Promise<LoadResult> {
    const builder = new VectorTableBuilder();
    for await (const line of lines) {
        builder.addLine(line);
    }
    return builder.build();
}

export async function loadVectorFile(filePath: string): Promise<LoadResult> {
    try {
        await access(filePath);
    } catch {
        return {
            ok: false,
            error: {
                kind: 'file-missing',
                path: filePath,
                message: `Vector file not found at ${filePath}. Please ensure it's downloaded and extracted.`
            }
        };
    }

    logger.info(`Loading word vectors from ${filePath}...`);
    const input = createReadStream(filePath, { encoding: 'utf8' });
    const lines = createInterface({ input, crlfDelay: Infinity });

    let result: LoadResult;
    try {
        result = await loadVectorsFromSource(lines);
    } catch (error) {
        return {
            ok: false,
            error: {
                kind: 'read-failed',
                path: filePath,
                message: `Error loading word vectors from ${filePath}: ${error instanceof Error ? error.message : String(error)}`
            }
        };
    } finally {
        lines.close();
        input.destroy();
    }

    if (result.ok) {
        logger.info(
            `Finished loading ${result.table.size} word vectors with dimension ${result.table.dimension}`,
            result.stats.skipped
        );
    }
    return result;
}
