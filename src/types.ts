export interface Lexicon {
    readonly stopwords: ReadonlySet<string>;
    readonly positiveWords: ReadonlySet<string>;
    readonly negativeWords: ReadonlySet<string>;
}

export interface TextDocument {
    urlId: string;
    url: string;
    text: string;
}

/** Document as handed over by acquisition; text is null when nothing was acquired */
export interface BatchDocument {
    urlId: string;
    url: string;
    text: string | null;
}

export interface InputEntry {
    urlId: string;
    url: string;
}

export interface TokenCounts {
    sentenceCount: number;
    rawWordCount: number;
}

export interface SentimentScores {
    positiveScore: number;
    negativeScore: number;
    polarityScore: number; // [-1, 1]
    subjectivityScore: number; // [0, 1]
}

export interface ReadabilityScores {
    avgSentenceLength: number;
    percentageOfComplexWords: number; // 0-1 fraction
    fogIndex: number;
    avgWordsPerSentence: number;
    complexWordCount: number;
    wordCount: number;
    syllablesPerWord: number;
    avgWordLength: number;
}

export interface TextMetrics extends SentimentScores, ReadabilityScores {
    personalPronouns: number;
}

export interface MetricRecord extends TextMetrics {
    urlId: string;
    url: string;
}

export type MetricKey = keyof TextMetrics;
