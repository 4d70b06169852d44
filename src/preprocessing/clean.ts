import { extractWords } from "./tokenize";

/**
 * Normalize raw text into the cleaned word stream:
 * lowercase word tokens with stopwords removed, in document order.
 */
export function cleanText(text: string, stopwords: ReadonlySet<string>): string[] {
    const cleaned: string[] = [];
    for (const word of extractWords(text)) {
        const lower = word.toLowerCase();
        if (!stopwords.has(lower)) {
            cleaned.push(lower);
        }
    }
    return cleaned;
}

/**
 * Blank text is analyzed as all-zero metrics and reported as degenerate input
 */
export function isDegenerateText(text: string): boolean {
    return text.trim().length === 0;
}
