/**
 * Rule-based syllable estimation.
 * An approximation, applied identically to every word.
 */

const VOWELS = new Set(["a", "e", "i", "o", "u", "y"]);

/** Endings that usually do not add a syllable ("closed", "makes") */
const SILENT_SUFFIXES = ["es", "ed"];

/**
 * Estimate the syllable count of a single word (always >= 1)
 */
export function syllablesOf(word: string): number {
    const lower = word.toLowerCase();

    // Count vowel groups
    let count = 0;
    let previousWasVowel = false;
    for (const char of lower) {
        const isVowel = VOWELS.has(char);
        if (isVowel && !previousWasVowel) {
            count++;
        }
        previousWasVowel = isVowel;
    }

    if (SILENT_SUFFIXES.some(suffix => lower.endsWith(suffix))) {
        count--;
    }

    return Math.max(count, 1);
}

/**
 * Total syllables over a word stream
 */
export function countSyllables(words: readonly string[]): number {
    let total = 0;
    for (const word of words) {
        total += syllablesOf(word);
    }
    return total;
}
