import type { Lexicon, MetricRecord, TextDocument, TextMetrics } from "./types";
import { cleanText } from "./preprocessing/clean";
import { tokenize } from "./preprocessing/tokenize";
import { scoreSentiment } from "./scoring/sentiment";
import { scoreReadability } from "./scoring/readability";
import { countPersonalPronouns } from "./scoring/pronouns";
import Logger from "./utils/logger";

/**
 * Metrics of an empty document
 */
export function zeroMetrics(): TextMetrics {
    return {
        positiveScore: 0,
        negativeScore: 0,
        polarityScore: 0,
        subjectivityScore: 0,
        avgSentenceLength: 0,
        percentageOfComplexWords: 0,
        fogIndex: 0,
        avgWordsPerSentence: 0,
        complexWordCount: 0,
        wordCount: 0,
        syllablesPerWord: 0,
        personalPronouns: 0,
        avgWordLength: 0,
    };
}

/**
 * Compute the thirteen metrics for a text.
 * Pure and synchronous; never throws for string input.
 */
export function analyzeText(text: string, lexicon: Lexicon): TextMetrics {
    const logger = Logger.getInstance();

    // Step 1: Cleaned word stream (lowercase, stopwords removed)
    const cleaned = logger.time("1. Clean text", () => cleanText(text, lexicon.stopwords));

    // Step 2: Sentence and raw word counts (stopwords included)
    const counts = logger.time("2. Tokenize", () => tokenize(text));

    // Step 3: Sentiment
    const sentiment = logger.time("3. Score sentiment", () => scoreSentiment(cleaned, lexicon));

    // Step 4: Readability
    const readability = logger.time("4. Score readability", () => scoreReadability(cleaned, counts));

    // Step 5: Personal pronouns, on the raw case-preserving text
    const personalPronouns = logger.time("5. Count pronouns", () => countPersonalPronouns(text));

    return {
        ...sentiment,
        ...readability,
        personalPronouns,
    };
}

/**
 * Analyze one document into its metric record
 */
export function analyze(document: TextDocument, lexicon: Lexicon): MetricRecord {
    return {
        urlId: document.urlId,
        url: document.url,
        ...analyzeText(document.text, lexicon),
    };
}
