import { describe, it, expect } from "vitest";
import { cleanText, isDegenerateText } from "../clean";

const STOPWORDS = new Set(["the", "and", "it", "is"]);

describe("cleanText", () => {
    it("lowercases words and removes stopwords", () => {
        expect(cleanText("The Fox and THE Hound", STOPWORDS)).toEqual(["fox", "hound"]);
    });

    it("removes punctuation and keeps document order", () => {
        const cleaned = cleanText("The quick brown fox jumps. It is happy and bad.", STOPWORDS);

        expect(cleaned).toEqual(["quick", "brown", "fox", "jumps", "happy", "bad"]);
    });

    it("keeps contractions as one word", () => {
        expect(cleanText("It’s fine", new Set())).toEqual(["it's", "fine"]);
    });

    it("returns an empty stream for empty text", () => {
        expect(cleanText("", STOPWORDS)).toEqual([]);
        expect(cleanText("the and it", STOPWORDS)).toEqual([]);
    });
});

describe("isDegenerateText", () => {
    it("detects empty and whitespace-only text", () => {
        expect(isDegenerateText("")).toBe(true);
        expect(isDegenerateText(" \n\t")).toBe(true);
    });

    it("accepts any non-blank text", () => {
        expect(isDegenerateText("a")).toBe(false);
        expect(isDegenerateText("...")).toBe(false);
    });
});
