// Whole words: no letter, digit or underscore on either side, so "I'm" and "we're" match
const PRONOUN_PATTERN = /(?<![\p{L}\p{N}_])(?:I|we|my|ours|us)(?![\p{L}\p{N}_])/giu;

// Uppercase "US" is the country, not the pronoun
const COUNTRY_TOKEN = "US";

/**
 * Count personal pronouns (I, we, my, ours, us) as whole words in raw text.
 * "I" must be uppercase; the others match in any case.
 */
export function countPersonalPronouns(text: string): number {
    let count = 0;
    for (const match of text.normalize("NFC").matchAll(PRONOUN_PATTERN)) {
        const word = match[0];
        if (word === COUNTRY_TOKEN) continue;
        if (word === "i") continue;
        count++;
    }
    return count;
}
