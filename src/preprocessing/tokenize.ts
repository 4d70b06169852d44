import type { TokenCounts } from "../types";
import { splitIntoSentences } from "./segment";

/**
 * A word is a run of letters, optionally joined by internal apostrophes
 * ("don't", "o'clock"). Digits, punctuation and whitespace separate words.
 */
const WORD_PATTERN = /\p{L}+(?:['’]\p{L}+)*/gu;

/**
 * Extract word tokens from raw text, preserving case.
 * Text is NFC-normalized and typographic apostrophes become "'".
 */
export function extractWords(text: string): string[] {
    // Compose "e" + combining accent into one letter first
    const matches = text.normalize("NFC").match(WORD_PATTERN);
    if (matches === null) return [];
    return matches.map(word => word.replace(/’/g, "'"));
}

/**
 * Count sentences and words (stopwords included).
 * Sentence count is at least 1 for any non-blank text.
 */
export function tokenize(text: string): TokenCounts {
    if (text.trim().length === 0) {
        return { sentenceCount: 0, rawWordCount: 0 };
    }

    const sentences = splitIntoSentences(text);

    return {
        sentenceCount: Math.max(sentences.length, 1),
        rawWordCount: extractWords(text).length,
    };
}
