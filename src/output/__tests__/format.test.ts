import { describe, it, expect } from "vitest";
import { formatMetrics, formatNumber, formatSummary, summarizeBatch } from "../format";
import { zeroMetrics } from "../../analysis";
import { MissingDocumentError } from "../../errors";
import type { BatchResult } from "../../batch";
import type { MetricRecord } from "../../types";

function makeRecord(urlId: string, overrides: Partial<MetricRecord> = {}): MetricRecord {
    return {
        urlId,
        url: `https://example.com/${urlId}`,
        ...zeroMetrics(),
        ...overrides,
    };
}

describe("formatNumber", () => {
    it("prints integers as is and other numbers with four decimals", () => {
        expect(formatNumber(3)).toBe("3");
        expect(formatNumber(0.5)).toBe("0.5000");
        expect(formatNumber(2 / 3)).toBe("0.6667");
    });
});

describe("formatMetrics", () => {
    it("prints identifiers and one aligned line per metric", () => {
        const lines = formatMetrics(makeRecord("a", { positiveScore: 2, avgWordLength: 4.25 })).split("\n");

        expect(lines).toHaveLength(16);
        expect(lines[0]).toBe("URL_ID: a");
        expect(lines[1]).toBe("URL: https://example.com/a");
        expect(lines[2]).toBe("");
        expect(lines[3]).toBe("POSITIVE SCORE:" + " ".repeat(19) + "2");
        expect(lines[10]).toBe("AVG NUMBER OF WORDS PER SENTENCE: 0");
        expect(lines[15]).toBe("AVG WORD LENGTH:" + " ".repeat(18) + "4.2500");
    });
});

describe("summarizeBatch", () => {
    it("leaves records of failed documents out of the averages", () => {
        const result: BatchResult = {
            records: [
                makeRecord("a", { wordCount: 4, positiveScore: 1 }),
                makeRecord("b", { wordCount: 8, positiveScore: 2 }),
                makeRecord("c"),
            ],
            failures: [{ urlId: "c", url: "https://example.com/c", error: new MissingDocumentError("c", "https://example.com/c") }],
            warnings: [],
        };

        const summary = summarizeBatch(result);

        expect(summary.total).toBe(3);
        expect(summary.analyzed).toBe(2);
        expect(summary.failed).toBe(1);
        expect(summary.degenerate).toBe(0);
        expect(summary.averages.wordCount).toBe(6);
        expect(summary.averages.positiveScore).toBe(1.5);
    });

    it("returns zero averages for an empty batch", () => {
        const summary = summarizeBatch({ records: [], failures: [], warnings: [] });

        expect(summary.total).toBe(0);
        expect(summary.averages).toEqual(zeroMetrics());
    });
});

describe("formatSummary", () => {
    it("prints totals and averages", () => {
        const summary = summarizeBatch({
            records: [makeRecord("a", { wordCount: 4 })],
            failures: [],
            warnings: [{ urlId: "a", url: "https://example.com/a", reason: "empty_text" }],
        });

        const lines = formatSummary(summary).split("\n");

        expect(lines[0]).toBe("=".repeat(70));
        expect(lines[1]).toBe("ANALYSIS COMPLETE");
        expect(lines[3]).toBe("Total documents:   1");
        expect(lines[4]).toBe("Analyzed:          1");
        expect(lines[5]).toBe("Empty text:        1");
        expect(lines[6]).toBe("Failed:            0");
        expect(lines[8]).toBe("Averages:");
        expect(lines).toContain("  WORD COUNT:" + " ".repeat(23) + "4");
    });

    it("omits averages when nothing was analyzed", () => {
        const summary = summarizeBatch({ records: [], failures: [], warnings: [] });

        expect(formatSummary(summary)).not.toContain("Averages:");
    });
});
