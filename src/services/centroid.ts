import { CentroidResult } from '../types/vector.js';
import { VectorTable } from './vectorTable.js';

/**
 * Average the vectors of the given words component-wise.
 *
 * Lookups are case-insensitive and repeated words are counted once per
 * occurrence. When no word is in the vocabulary the result is a no-match,
 * never a zero vector.
 */
export function computeCentroid(table: VectorTable, words: readonly string[]): CentroidResult {
    const sum = new Float64Array(table.dimension);
    const matchedWords: string[] = [];
    const missingWords: string[] = [];

    for (const word of words) {
        const vector = table.get(word);
        if (!vector) {
            missingWords.push(word);
            continue;
        }
        matchedWords.push(word);
        for (let i = 0; i < sum.length; i++) {
            sum[i] += vector[i];
        }
    }

    if (matchedWords.length === 0) {
        return { kind: 'no-match', missingWords };
    }

    for (let i = 0; i < sum.length; i++) {
        sum[i] /= matchedWords.length;
    }
    return { kind: 'centroid', vector: sum, matchedWords, missingWords };
}
