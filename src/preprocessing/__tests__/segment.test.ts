import { describe, it, expect } from "vitest";
import { splitIntoSentences } from "../segment";

describe("splitIntoSentences", () => {
    it("splits on period followed by whitespace", () => {
        const sentences = splitIntoSentences("First sentence. Second sentence.");

        expect(sentences).toEqual(["First sentence.", "Second sentence."]);
    });

    it("treats a run of terminators as one boundary", () => {
        const sentences = splitIntoSentences("Wait?! Really...");

        expect(sentences).toEqual(["Wait?!", "Really..."]);
    });

    it("does not split when a terminator is followed by a non-space", () => {
        const sentences = splitIntoSentences("Pi is 3.14 today. Visit example.com now.");

        expect(sentences).toEqual(["Pi is 3.14 today.", "Visit example.com now."]);
    });

    it("keeps trailing text without a terminator", () => {
        expect(splitIntoSentences("No terminator here")).toEqual(["No terminator here"]);
    });

    it("collapses whitespace inside a sentence", () => {
        const sentences = splitIntoSentences("One.\n\nTwo\nlines.");

        expect(sentences).toEqual(["One.", "Two lines."]);
    });

    it("drops segments made only of terminators", () => {
        expect(splitIntoSentences("... !!!")).toEqual([]);
    });

    it("returns nothing for empty text", () => {
        expect(splitIntoSentences("")).toEqual([]);
        expect(splitIntoSentences("   ")).toEqual([]);
    });
});
