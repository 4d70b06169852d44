import type { Lexicon } from "../types";

export interface LexiconSource {
    stopwords?: Iterable<string>;
    positiveWords?: Iterable<string>;
    negativeWords?: Iterable<string>;
}

function toLowerSet(words: Iterable<string> | undefined): ReadonlySet<string> {
    const set = new Set<string>();
    if (words === undefined) return set;
    for (const word of words) {
        const normalized = word.trim().toLowerCase();
        if (normalized.length > 0) set.add(normalized);
    }
    return set;
}

/**
 * Build a lexicon from word lists. Entries are trimmed and lowercased so
 * membership tests against lowercased tokens are case-insensitive.
 */
export function createLexicon(source: LexiconSource = {}): Lexicon {
    return Object.freeze({
        stopwords: toLowerSet(source.stopwords),
        positiveWords: toLowerSet(source.positiveWords),
        negativeWords: toLowerSet(source.negativeWords),
    });
}
