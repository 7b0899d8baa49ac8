/**
 * Exhaustive cosine-similarity scan over a vector table.
 *
 * Every entry is scored against the target; excluded words are skipped.
 * Degenerate pairs (a zero-norm vector, or any non-finite result) score 0,
 * as if orthogonal, instead of raising.
 */

import { RankedResult, Vector } from '../types/vector.js';
import { VectorTable } from './vectorTable.js';

/** Distance assigned to pairs whose cosine is undefined: similarity 0. */
export const DEGENERATE_COSINE_DISTANCE = 1;

const DEADLINE_CHECK_INTERVAL = 4096;

export class ScanTimeoutError extends Error {
    constructor(public readonly scanned: number) {
        super(`Similarity scan abandoned after ${scanned} entries: deadline exceeded`);
        this.name = 'ScanTimeoutError';
    }
}

export interface RankOptions {
    /** Epoch milliseconds after which the scan is abandoned. */
    deadline?: number;
}

function norm(vector: Vector): number {
    let sum = 0;
    for (let i = 0; i < vector.length; i++) {
        sum += vector[i] * vector[i];
    }
    return Math.sqrt(sum);
}

function dot(a: Vector, b: Vector): number {
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
        sum += a[i] * b[i];
    }
    return sum;
}

function distanceFromNorms(a: Vector, normA: number, b: Vector, normB: number): number {
    if (normA === 0 || normB === 0) {
        return DEGENERATE_COSINE_DISTANCE;
    }
    const distance = 1 - dot(a, b) / (normA * normB);
    return Number.isFinite(distance) ? distance : DEGENERATE_COSINE_DISTANCE;
}

/**
 * Cosine distance `1 - a·b / (|a||b|)`, in [0, 2].
 * Zero-norm inputs and non-finite results yield distance 1.
 */
export function cosineDistance(a: Vector, b: Vector): number {
    if (a.length !== b.length) {
        throw new RangeError(`Vector length mismatch: ${a.length} vs ${b.length}`);
    }
    return distanceFromNorms(a, norm(a), b, norm(b));
}

export function cosineSimilarity(a: Vector, b: Vector): number {
    return 1 - cosineDistance(a, b);
}

// Descending similarity, then ascending word so equal scores come out in a fixed order
export function compareRanked(a: RankedResult, b: RankedResult): number {
    if (a.similarity !== b.similarity) {
        return b.similarity - a.similarity;
    }
    if (a.word === b.word) return 0;
    return a.word < b.word ? -1 : 1;
}

/**
 * Return the `topN` table words most similar to `target`, best first.
 *
 * @param exclude - words to leave out of the scan, matched case-insensitively
 */
export function rankSimilar(
    table: VectorTable,
    target: Vector,
    exclude: Iterable<string>,
    topN: number,
    options: RankOptions = {}
): RankedResult[] {
    if (!Number.isInteger(topN) || topN <= 0) {
        throw new RangeError(`topN must be a positive integer, got ${topN}`);
    }
    if (target.length !== table.dimension) {
        throw new RangeError(
            `Target vector has ${target.length} components, table dimension is ${table.dimension}`
        );
    }

    const excluded = new Set<string>();
    for (const word of exclude) {
        excluded.add(word.toLowerCase());
    }

    const targetNorm = norm(target);
    const candidates: RankedResult[] = [];
    let scanned = 0;

    for (const [word, vector] of table) {
        scanned++;
        if (
            options.deadline !== undefined &&
            scanned % DEADLINE_CHECK_INTERVAL === 0 &&
            Date.now() > options.deadline
        ) {
            throw new ScanTimeoutError(scanned);
        }
        if (excluded.has(word)) continue;

        const distance = distanceFromNorms(target, targetNorm, vector, norm(vector));
        candidates.push({ word, similarity: 1 - distance });
    }

    candidates.sort(compareRanked);
    return candidates.slice(0, Math.min(topN, candidates.length));
}
