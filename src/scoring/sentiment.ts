/**
 * Lexicon-based sentiment scoring over a cleaned word stream
 */

import type { Lexicon, SentimentScores } from "../types";
import { clamp } from "../utils/shared";

/** Keeps polarity and subjectivity finite when there is nothing to divide by */
export const EPSILON = 0.000001;

/**
 * Count tokens that belong to a word set
 */
export function countMatches(words: readonly string[], set: ReadonlySet<string>): number {
    let count = 0;
    for (const word of words) {
        if (set.has(word)) count++;
    }
    return count;
}

/**
 * Polarity: (P - N) / (P + N + ε), in [-1, 1]
 */
export function polarity(positive: number, negative: number): number {
    return (positive - negative) / (positive + negative + EPSILON);
}

/**
 * Subjectivity: (P + N) / (wordCount + ε), in [0, 1].
 * Clamped because a word listed as both positive and negative counts twice.
 */
export function subjectivity(positive: number, negative: number, wordCount: number): number {
    if (wordCount === 0) return 0;
    return clamp((positive + negative) / (wordCount + EPSILON), 0, 1);
}

/**
 * Score a cleaned (lowercased, stopword-free) word stream against the lexicon.
 * The negative score is the plain count of negative words, never a negative number.
 */
export function scoreSentiment(cleaned: readonly string[], lexicon: Lexicon): SentimentScores {
    const positiveScore = countMatches(cleaned, lexicon.positiveWords);
    const negativeScore = countMatches(cleaned, lexicon.negativeWords);

    return {
        positiveScore,
        negativeScore,
        polarityScore: polarity(positiveScore, negativeScore),
        subjectivityScore: subjectivity(positiveScore, negativeScore, cleaned.length),
    };
}
