const SENTENCE_TERMINATORS = new Set([".", "!", "?"]);

function isTerminator(char: string | undefined): boolean {
    return char !== undefined && SENTENCE_TERMINATORS.has(char);
}

function isWhitespace(char: string): boolean {
    return /\s/.test(char);
}

/**
 * Split text into sentences.
 *
 * A boundary is a run of ".", "!" or "?" followed by whitespace or the end of
 * the text; "?!" and "..." end a single sentence. Terminators followed by
 * anything else ("3.14", "example.com") do not split. Empty segments are dropped.
 */
export function splitIntoSentences(text: string): string[] {
    if (text.length === 0) return [];

    const sentences: string[] = [];
    let current = "";
    let i = 0;

    while (i < text.length) {
        const char = text[i] ?? "";
        current += char;

        if (isTerminator(char)) {
            // Absorb the rest of the terminator run
            while (isTerminator(text[i + 1])) {
                current += text[i + 1] ?? "";
                i++;
            }

            const nextChar = text[i + 1];
            if (nextChar === undefined || isWhitespace(nextChar)) {
                pushSentence(sentences, current);
                current = "";
            }
        }

        i++;
    }

    // Trailing text without a terminator
    pushSentence(sentences, current);

    return sentences;
}

function pushSentence(sentences: string[], raw: string): void {
    const trimmed = raw.replace(/\s+/g, " ").trim();
    if (trimmed.length === 0) return;
    // A segment made only of terminators ("...") is not a sentence
    if ([...trimmed].every(isTerminator)) return;
    sentences.push(trimmed);
}
