import type { MetricRecord, TextMetrics } from "../types";
import type { BatchResult } from "../batch";
import { zeroMetrics } from "../analysis";
import { mean } from "../utils/shared";
import { OUTPUT_COLUMNS } from "./report";

export interface BatchSummary {
    total: number;
    analyzed: number;
    degenerate: number;
    failed: number;
    /** Mean of each metric over the documents that were analyzed */
    averages: TextMetrics;
}

const METRIC_COLUMNS = OUTPUT_COLUMNS.filter(
    (c): c is { header: string; key: keyof TextMetrics } => c.key !== "urlId" && c.key !== "url"
);

const LABEL_WIDTH = Math.max(...METRIC_COLUMNS.map(c => c.header.length)) + 2;

/**
 * Integers as is, other numbers with four decimals
 */
export function formatNumber(value: number): string {
    return Number.isInteger(value) ? String(value) : value.toFixed(4);
}

/**
 * Summarize a batch. Records filled in for failed documents are left out of the averages.
 */
export function summarizeBatch(result: BatchResult): BatchSummary {
    const failedIds = new Set(result.failures.map(f => f.urlId));
    const analyzed = result.records.filter(r => !failedIds.has(r.urlId));

    const averages = zeroMetrics();
    for (const column of METRIC_COLUMNS) {
        averages[column.key] = mean(analyzed.map(r => r[column.key]));
    }

    return {
        total: analyzed.length + result.failures.length,
        analyzed: analyzed.length,
        degenerate: result.warnings.length,
        failed: result.failures.length,
        averages,
    };
}

/**
 * Metric block for one document
 */
export function formatMetrics(record: MetricRecord): string {
    const lines = [`URL_ID: ${record.urlId}`, `URL: ${record.url}`, ""];
    for (const column of METRIC_COLUMNS) {
        lines.push(`${`${column.header}:`.padEnd(LABEL_WIDTH)}${formatNumber(record[column.key])}`);
    }
    return lines.join("\n");
}

export function formatSummary(summary: BatchSummary): string {
    const lines: string[] = [];

    lines.push("=".repeat(70));
    lines.push("ANALYSIS COMPLETE");
    lines.push("=".repeat(70));
    lines.push(`Total documents:   ${summary.total}`);
    lines.push(`Analyzed:          ${summary.analyzed}`);
    lines.push(`Empty text:        ${summary.degenerate}`);
    lines.push(`Failed:            ${summary.failed}`);

    if (summary.analyzed > 0) {
        lines.push("");
        lines.push("Averages:");
        for (const column of METRIC_COLUMNS) {
            lines.push(`  ${`${column.header}:`.padEnd(LABEL_WIDTH)}${formatNumber(summary.averages[column.key])}`);
        }
    }

    lines.push("=".repeat(70));
    return lines.join("\n");
}
