/**
 * Readability metrics: sentence length, complex words, Gunning Fog,
 * syllables and characters per word
 */

import type { ReadabilityScores, TokenCounts } from "../types";
import { safeDivide } from "../utils/shared";
import { syllablesOf } from "./syllables";

/** Gunning Fog scale factor */
const FOG_FACTOR = 0.4;

/**
 * Gunning Fog index. The complex word share is a 0-1 fraction and is
 * scaled to a percentage inside the formula.
 */
export function fogIndex(avgSentenceLength: number, complexFraction: number): number {
    return FOG_FACTOR * (avgSentenceLength + complexFraction * 100);
}

/**
 * Compute readability scores.
 *
 * Sentence length uses the raw word count (stopwords included); every
 * per-word figure uses the cleaned stream.
 */
export function scoreReadability(cleaned: readonly string[], counts: TokenCounts): ReadabilityScores {
    const wordCount = cleaned.length;

    let complexWordCount = 0;
    let totalSyllables = 0;
    let totalCharacters = 0;

    for (const word of cleaned) {
        const syllables = syllablesOf(word);
        totalSyllables += syllables;
        totalCharacters += word.length;
        if (syllables > 2) complexWordCount++;
    }

    const avgSentenceLength = safeDivide(counts.rawWordCount, counts.sentenceCount);
    const percentageOfComplexWords = safeDivide(complexWordCount, wordCount);

    return {
        avgSentenceLength,
        percentageOfComplexWords,
        fogIndex: fogIndex(avgSentenceLength, percentageOfComplexWords),
        avgWordsPerSentence: avgSentenceLength,
        complexWordCount,
        wordCount,
        syllablesPerWord: safeDivide(totalSyllables, wordCount),
        avgWordLength: safeDivide(totalCharacters, wordCount),
    };
}
