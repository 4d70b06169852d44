import { describe, it, expect } from "vitest";
import { countSyllables, syllablesOf } from "../syllables";

describe("syllablesOf", () => {
    it("counts vowel groups", () => {
        expect(syllablesOf("cat")).toBe(1);
        expect(syllablesOf("beautiful")).toBe(3);
        expect(syllablesOf("education")).toBe(4);
        expect(syllablesOf("queue")).toBe(1);
    });

    it("treats y as a vowel", () => {
        expect(syllablesOf("happy")).toBe(2);
        expect(syllablesOf("rhythm")).toBe(1);
    });

    it("subtracts one for es and ed endings", () => {
        expect(syllablesOf("closed")).toBe(1);
        expect(syllablesOf("makes")).toBe(1);
    });

    it("never returns less than one", () => {
        expect(syllablesOf("bed")).toBe(1);
        expect(syllablesOf("hmm")).toBe(1);
    });

    it("ignores case", () => {
        expect(syllablesOf("ACADEMY")).toBe(4);
    });
});

describe("countSyllables", () => {
    it("sums syllables over a word stream", () => {
        expect(countSyllables(["cat", "happy", "beautiful"])).toBe(6);
    });

    it("returns 0 for an empty stream", () => {
        expect(countSyllables([])).toBe(0);
    });
});
