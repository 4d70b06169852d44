import { describe, it, expect } from "vitest";
import {
    ConfigError,
    errorMessage,
    InputListError,
    LexiconLoadError,
    LexmetricsError,
    MissingDocumentError,
} from "../errors";

describe("error classes", () => {
    it("share the base class and keep their names", () => {
        const errors = [
            new MissingDocumentError("a", "https://example.com/a"),
            new LexiconLoadError("Cannot read word list", "words.txt"),
            new InputListError("bad row", "list.csv", 3),
            new ConfigError("bad value"),
        ];

        expect(errors.every(e => e instanceof LexmetricsError)).toBe(true);
        expect(errors.map(e => e.name)).toEqual([
            "MissingDocumentError",
            "LexiconLoadError",
            "InputListError",
            "ConfigError",
        ]);
    });

    it("build messages from their fields", () => {
        expect(new MissingDocumentError("a", "https://example.com/a").message)
            .toBe("No text acquired for document a (https://example.com/a)");
        expect(new LexiconLoadError("Cannot read word list", "words.txt").message)
            .toBe("Cannot read word list: words.txt");
        expect(new LexiconLoadError("No lexicon").message).toBe("No lexicon");
        expect(new InputListError("bad row", "list.csv", 3).message).toBe("list.csv (row 3): bad row");
        expect(new InputListError("Invalid JSON", "list.json").message).toBe("list.json: Invalid JSON");
    });

    it("keep the cause", () => {
        const cause = new Error("ENOENT");

        expect(new LexiconLoadError("Cannot read word list", "words.txt", { cause }).cause).toBe(cause);
    });
});

describe("errorMessage", () => {
    it("reads messages from errors and stringifies anything else", () => {
        expect(errorMessage(new Error("boom"))).toBe("boom");
        expect(errorMessage("plain")).toBe("plain");
        expect(errorMessage(42)).toBe("42");
    });
});
