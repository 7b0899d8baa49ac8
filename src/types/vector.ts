// Word embedding types shared by the loader, the centroid calculator and the ranker

export type Vector = ArrayLike<number>;

export interface RankedResult {
    word: string;
    similarity: number;
}

export interface Centroid {
    kind: 'centroid';
    vector: Float64Array;
    matchedWords: string[];
    missingWords: string[];
}

export interface NoMatch {
    kind: 'no-match';
    missingWords: string[];
}

export type CentroidResult = Centroid | NoMatch;

export enum SkipReason {
    TooFewTokens = 'too-few-tokens',
    InvalidNumber = 'invalid-number',
    DimensionMismatch = 'dimension-mismatch'
}

export interface LoadStats {
    linesRead: number;
    entriesLoaded: number;
    duplicatesOverwritten: number;
    skipped: Record<SkipReason, number>;
}

export type LoadError =
    | { kind: 'file-missing'; path: string; message: string }
    | { kind: 'read-failed'; path: string; message: string }
    | { kind: 'empty-table'; message: string; stats: LoadStats };
