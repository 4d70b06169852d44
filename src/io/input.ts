/**
 * Input list loading: URL_ID / URL pairs from CSV, JSON or an Excel workbook
 */

import * as fs from "fs";
import * as path from "path";
import ExcelJS from "exceljs";
import { z } from "zod";
import type { InputEntry } from "../types";
import { InputListError } from "../errors";

export const InputRowSchema = z.object({
    URL_ID: z.union([z.string().trim().min(1), z.number()])
        .transform(String)
        // The identifier names a file inside the articles directory
        .refine(id => !/[\\/]/.test(id) && !id.includes(".."), {
            message: "must not contain \"/\", \"\\\" or \"..\"",
        }),
    URL: z.string().trim().url(),
});

/** A table row with its 1-based row number in the source */
interface TableRow {
    number: number;
    fields: string[];
}

/**
 * Parse CSV text into rows of fields (RFC 4180 quoting, CRLF or LF)
 */
export function parseCsv(content: string): string[][] {
    const rows: string[][] = [];
    let row: string[] = [];
    let field = "";
    let inQuotes = false;
    const text = content.replace(/^\uFEFF/, "");

    for (let i = 0; i < text.length; i++) {
        const char = text[i] ?? "";

        if (inQuotes) {
            if (char === "\"") {
                if (text[i + 1] === "\"") {
                    field += "\"";
                    i++;
                } else {
                    inQuotes = false;
                }
            } else {
                field += char;
            }
            continue;
        }

        if (char === "\"") {
            inQuotes = true;
        } else if (char === ",") {
            row.push(field);
            field = "";
        } else if (char === "\n" || char === "\r") {
            if (char === "\r" && text[i + 1] === "\n") i++;
            row.push(field);
            rows.push(row);
            row = [];
            field = "";
        } else {
            field += char;
        }
    }

    if (field.length > 0 || row.length > 0) {
        row.push(field);
        rows.push(row);
    }

    // Drop blank lines
    return rows.filter(r => r.some(f => f.trim().length > 0));
}

function validateRow(raw: unknown, sourcePath: string, rowNumber: number): InputEntry {
    const parsed = InputRowSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid row";
        throw new InputListError(where, sourcePath, rowNumber);
    }
    return { urlId: parsed.data.URL_ID, url: parsed.data.URL };
}

/**
 * Entries from a table whose first row is a header naming URL_ID and URL
 * (any order, extra columns ignored)
 */
function entriesFromTable(rows: TableRow[], sourcePath: string): InputEntry[] {
    const [header, ...data] = rows;
    if (header === undefined) return [];

    const columns = header.fields.map(h => h.trim());
    const idIndex = columns.indexOf("URL_ID");
    const urlIndex = columns.indexOf("URL");
    if (idIndex === -1 || urlIndex === -1) {
        throw new InputListError("Header must contain URL_ID and URL columns", sourcePath, header.number);
    }

    return data.map(row => validateRow(
        { URL_ID: row.fields[idIndex] ?? "", URL: row.fields[urlIndex] ?? "" },
        sourcePath,
        row.number
    ));
}

/**
 * Read entries from CSV text with a header naming URL_ID and URL
 */
export function parseInputCsv(content: string, sourcePath: string): InputEntry[] {
    // Row numbers are 1-based and count the header
    const rows = parseCsv(content).map((fields, i) => ({ number: i + 1, fields }));
    return entriesFromTable(rows, sourcePath);
}

/**
 * Read entries from a JSON array of { URL_ID, URL } objects
 */
export function parseInputJson(content: string, sourcePath: string): InputEntry[] {
    let data: unknown;
    try {
        data = JSON.parse(content);
    } catch (err) {
        throw new InputListError("Invalid JSON", sourcePath, undefined, { cause: err });
    }
    if (!Array.isArray(data)) {
        throw new InputListError("Expected an array of { URL_ID, URL } objects", sourcePath);
    }
    return data.map((raw, i) => validateRow(raw, sourcePath, i + 1));
}

/**
 * Read entries from the first worksheet of an .xlsx workbook.
 * Cells are read as their displayed text; blank rows are skipped.
 */
export async function parseInputXlsx(filePath: string): Promise<InputEntry[]> {
    const workbook = new ExcelJS.Workbook();
    try {
        await workbook.xlsx.readFile(filePath);
    } catch (err) {
        throw new InputListError("Cannot read input list", filePath, undefined, { cause: err });
    }

    const sheet = workbook.worksheets[0];
    if (sheet === undefined) return [];

    const rows: TableRow[] = [];
    sheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
        const fields: string[] = [];
        for (let col = 1; col <= row.cellCount; col++) {
            fields.push(row.getCell(col).text);
        }
        if (fields.some(f => f.trim().length > 0)) {
            rows.push({ number: rowNumber, fields });
        }
    });

    return entriesFromTable(rows, filePath);
}

/**
 * Load the input list; the format follows the file extension
 * (.xlsx, .json, anything else CSV)
 */
export async function loadInputList(filePath: string): Promise<InputEntry[]> {
    const extension = path.extname(filePath).toLowerCase();
    let entries: InputEntry[];

    if (extension === ".xlsx") {
        entries = await parseInputXlsx(filePath);
    } else {
        let content: string;
        try {
            content = fs.readFileSync(filePath, "utf8");
        } catch (err) {
            throw new InputListError("Cannot read input list", filePath, undefined, { cause: err });
        }
        entries = extension === ".json"
            ? parseInputJson(content, filePath)
            : parseInputCsv(content, filePath);
    }

    const seen = new Set<string>();
    entries.forEach((entry, i) => {
        if (seen.has(entry.urlId)) {
            throw new InputListError(`Duplicate URL_ID "${entry.urlId}" (entry ${i + 1})`, filePath);
        }
        seen.add(entry.urlId);
    });

    return entries;
}
