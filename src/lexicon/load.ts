/**
 * Lexicon file loading.
 *
 * Stopwords: every *.txt file in a directory, one word per line.
 * Sentiment words: positive-words.txt and negative-words.txt in the
 * dictionary directory. Lines starting with ";" are comments, and
 * "WORD | note" lines keep only the word.
 */

import * as fs from "fs";
import * as path from "path";
import type { Lexicon } from "../types";
import { LexiconLoadError } from "../errors";
import { createLexicon } from "./lexicon";

export const POSITIVE_WORDS_FILE = "positive-words.txt";
export const NEGATIVE_WORDS_FILE = "negative-words.txt";

const COMMENT_PREFIX = ";";
const NOTE_SEPARATOR = "|";

export interface LexiconPaths {
    stopwordsDir: string;
    dictionaryDir: string;
}

/**
 * Parse a word list file into lowercase entries
 */
export function parseWordList(content: string): string[] {
    const words: string[] = [];
    const lines = content.replace(/^\uFEFF/, "").split(/\r?\n/);

    for (const line of lines) {
        const trimmed = line.trim();
        if (trimmed.length === 0 || trimmed.startsWith(COMMENT_PREFIX)) continue;

        const word = (trimmed.split(NOTE_SEPARATOR)[0] ?? "").trim().toLowerCase();
        if (word.length > 0) {
            words.push(word);
        }
    }

    return words;
}

function readWordFile(filePath: string): string[] {
    let content: string;
    try {
        content = fs.readFileSync(filePath, "utf8");
    } catch (err) {
        throw new LexiconLoadError("Cannot read word list", filePath, { cause: err });
    }
    return parseWordList(content);
}

function assertDirectory(dir: string, what: string): void {
    let stat: fs.Stats;
    try {
        stat = fs.statSync(dir);
    } catch (err) {
        throw new LexiconLoadError(`${what} directory not found`, dir, { cause: err });
    }
    if (!stat.isDirectory()) {
        throw new LexiconLoadError(`${what} path is not a directory`, dir);
    }
}

/**
 * Load the union of all stopword files in a directory
 */
export function loadStopwords(dir: string): Set<string> {
    assertDirectory(dir, "Stopwords");

    const files = fs.readdirSync(dir)
        .filter(name => name.toLowerCase().endsWith(".txt"))
        .sort();

    if (files.length === 0) {
        throw new LexiconLoadError("No stopword files (*.txt) found", dir);
    }

    const stopwords = new Set<string>();
    for (const file of files) {
        for (const word of readWordFile(path.join(dir, file))) {
            stopwords.add(word);
        }
    }
    return stopwords;
}

/**
 * Load positive and negative word lists, leaving out stopwords
 * (a stopword never survives cleaning, so it could never match)
 */
export function loadSentimentWords(
    dir: string,
    stopwords: ReadonlySet<string> = new Set()
): { positiveWords: Set<string>; negativeWords: Set<string> } {
    assertDirectory(dir, "Dictionary");

    const load = (fileName: string): Set<string> => {
        const filePath = path.join(dir, fileName);
        if (!fs.existsSync(filePath)) {
            throw new LexiconLoadError("Sentiment word list not found", filePath);
        }
        return new Set(readWordFile(filePath).filter(word => !stopwords.has(word)));
    };

    return {
        positiveWords: load(POSITIVE_WORDS_FILE),
        negativeWords: load(NEGATIVE_WORDS_FILE),
    };
}

/**
 * Load the full lexicon. Throws LexiconLoadError when any source is missing.
 */
export function loadLexicon(paths: LexiconPaths): Lexicon {
    const stopwords = loadStopwords(paths.stopwordsDir);
    const { positiveWords, negativeWords } = loadSentimentWords(paths.dictionaryDir, stopwords);

    return createLexicon({ stopwords, positiveWords, negativeWords });
}
