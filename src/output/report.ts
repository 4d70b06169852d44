/**
 * Report writing: metric records in the fixed output column order
 */

import * as fs from "fs";
import * as path from "path";
import ExcelJS from "exceljs";
import type { Workbook } from "exceljs";
import type { MetricRecord } from "../types";

export interface ReportColumn {
    header: string;
    key: keyof MetricRecord;
}

/** Column order of the output table */
export const OUTPUT_COLUMNS: readonly ReportColumn[] = [
    { header: "URL_ID", key: "urlId" },
    { header: "URL", key: "url" },
    { header: "POSITIVE SCORE", key: "positiveScore" },
    { header: "NEGATIVE SCORE", key: "negativeScore" },
    { header: "POLARITY SCORE", key: "polarityScore" },
    { header: "SUBJECTIVITY SCORE", key: "subjectivityScore" },
    { header: "AVG SENTENCE LENGTH", key: "avgSentenceLength" },
    { header: "PERCENTAGE OF COMPLEX WORDS", key: "percentageOfComplexWords" },
    { header: "FOG INDEX", key: "fogIndex" },
    { header: "AVG NUMBER OF WORDS PER SENTENCE", key: "avgWordsPerSentence" },
    { header: "COMPLEX WORD COUNT", key: "complexWordCount" },
    { header: "WORD COUNT", key: "wordCount" },
    { header: "SYLLABLE PER WORD", key: "syllablesPerWord" },
    { header: "PERSONAL PRONOUNS", key: "personalPronouns" },
    { header: "AVG WORD LENGTH", key: "avgWordLength" },
];

export type ReportRow = Record<string, string | number>;

/**
 * Record as an object keyed by column header, in column order
 */
export function recordToRow(record: MetricRecord): ReportRow {
    const row: ReportRow = {};
    for (const column of OUTPUT_COLUMNS) {
        row[column.header] = record[column.key];
    }
    return row;
}

/**
 * Quote a CSV field when it contains a delimiter, quote or line break
 */
export function escapeCsvField(value: string | number): string {
    const text = String(value);
    if (/[",\r\n]/.test(text)) {
        return `"${text.replace(/"/g, "\"\"")}"`;
    }
    return text;
}

export function formatCsv(records: readonly MetricRecord[]): string {
    const lines = [OUTPUT_COLUMNS.map(c => escapeCsvField(c.header)).join(",")];
    for (const record of records) {
        lines.push(OUTPUT_COLUMNS.map(c => escapeCsvField(record[c.key])).join(","));
    }
    return lines.join("\n") + "\n";
}

export function formatJson(records: readonly MetricRecord[]): string {
    return JSON.stringify(records.map(recordToRow), null, 2) + "\n";
}

/**
 * Workbook with one "Output" sheet: a header row, then one row per record
 */
export function buildWorkbook(records: readonly MetricRecord[]): Workbook {
    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet("Output");

    sheet.addRow(OUTPUT_COLUMNS.map(c => c.header));
    for (const record of records) {
        sheet.addRow(OUTPUT_COLUMNS.map(c => record[c.key]));
    }
    return workbook;
}

/**
 * Write the report; ".xlsx" writes a workbook, ".json" JSON, anything else CSV.
 * Parent directories are created.
 */
export async function writeReport(filePath: string, records: readonly MetricRecord[]): Promise<void> {
    const extension = path.extname(filePath).toLowerCase();
    fs.mkdirSync(path.dirname(filePath), { recursive: true });

    if (extension === ".xlsx") {
        await buildWorkbook(records).xlsx.writeFile(filePath);
        return;
    }

    const content = extension === ".json" ? formatJson(records) : formatCsv(records);
    fs.writeFileSync(filePath, content, "utf8");
}
