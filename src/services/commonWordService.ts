import { CommonWordResponse, VocabularyInfo } from '../types/commonWord.js';
import { RankedResult } from '../types/vector.js';
import { AppError } from '../utils/errorHandler.js';
import { logger } from '../utils/logger.js';
import { computeCentroid } from './centroid.js';
import { rankSimilar, ScanTimeoutError } from './similarityRanker.js';
import { VectorTable } from './vectorTable.js';

const MAX_MISSING_SHOWN = 10;

export interface CommonWordServiceOptions {
    // 0 disables the deadline
    scanTimeoutMs?: number;
}

export function describeMissingWords(missingWords: string[]): string {
    let message = 'None of the provided words were found in the vocabulary.';
    if (missingWords.length > 0) {
        const shown = missingWords.slice(0, MAX_MISSING_SHOWN);
        if (missingWords.length > MAX_MISSING_SHOWN) {
            shown.push('...');
        }
        message += ` Missing words (${missingWords.length} total): ${shown.join(', ')}`;
    }
    return message;
}

export const NO_RELATED_WORDS_MESSAGE =
    'Could not find any related words in the vocabulary (excluding input words). ' +
    'This might happen if input words are very specific, cover a concept poorly represented, ' +
    'or if the vocabulary is small.';

/**
 * Finds the vocabulary words that best describe a group of words: the
 * nearest neighbours of the group's centroid, the group itself excluded.
 */
export class CommonWordService {
    private readonly scanTimeoutMs: number;

    constructor(private readonly table: VectorTable, options: CommonWordServiceOptions = {}) {
        this.scanTimeoutMs = options.scanTimeoutMs ?? 0;
    }

    getVocabularyInfo(): VocabularyInfo {
        return { vocabularySize: this.table.size, dimension: this.table.dimension };
    }

    findCommonWords(words: string[], topN: number): CommonWordResponse {
        const centroid = computeCentroid(this.table, words);
        if (centroid.kind === 'no-match') {
            throw new AppError(describeMissingWords(centroid.missingWords), 400, 'WORDS_NOT_FOUND', {
                missingWords: centroid.missingWords
            });
        }
        if (centroid.missingWords.length > 0) {
            logger.debug('Some input words are not in the vocabulary', centroid.missingWords);
        }

        const deadline = this.scanTimeoutMs > 0 ? Date.now() + this.scanTimeoutMs : undefined;
        let ranked: RankedResult[];
        try {
            ranked = rankSimilar(this.table, centroid.vector, words, topN, { deadline });
        } catch (error) {
            if (error instanceof ScanTimeoutError) {
                throw new AppError('Similarity search timed out, please retry', 503, 'SCAN_TIMEOUT');
            }
            throw error;
        }

        if (ranked.length === 0) {
            throw new AppError(NO_RELATED_WORDS_MESSAGE, 400, 'NO_RELATED_WORDS');
        }

        return {
            input_words: words,
            top_n_requested: topN,
            common_words: ranked.map((result) => ({
                word: result.word,
                similarity_score: result.similarity
            }))
        };
    }
}
