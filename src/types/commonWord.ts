export interface CommonWordResult {
    word: string;
    similarity_score: number;
}

export interface CommonWordResponse {
    input_words: string[];
    top_n_requested: number;
    common_words: CommonWordResult[];
}

export interface VocabularyInfo {
    vocabularySize: number;
    dimension: number;
}
