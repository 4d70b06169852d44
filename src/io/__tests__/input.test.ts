import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import ExcelJS from "exceljs";
import { loadInputList, parseCsv, parseInputCsv, parseInputJson } from "../input";
import { InputListError } from "../../errors";

describe("parseCsv", () => {
    it("handles quoted fields, escaped quotes and CRLF", () => {
        const rows = parseCsv("a,b\r\n\"x, y\",\"say \"\"hi\"\"\"\n\n");

        expect(rows).toEqual([["a", "b"], ["x, y", "say \"hi\""]]);
    });

    it("keeps line breaks inside quotes", () => {
        expect(parseCsv("\"line1\nline2\",z")).toEqual([["line1\nline2", "z"]]);
    });

    it("strips a BOM", () => {
        expect(parseCsv("\uFEFFURL_ID,URL")).toEqual([["URL_ID", "URL"]]);
    });
});

describe("parseInputCsv", () => {
    it("finds columns by header name and ignores extra columns", () => {
        const entries = parseInputCsv("URL,NOTE,URL_ID\nhttps://example.com/a,x,a1\n", "list.csv");

        expect(entries).toEqual([{ urlId: "a1", url: "https://example.com/a" }]);
    });

    it("returns nothing for an empty file", () => {
        expect(parseInputCsv("", "list.csv")).toEqual([]);
    });

    it("rejects a header without URL_ID and URL", () => {
        expect(() => parseInputCsv("ID,LINK\n1,https://example.com\n", "list.csv"))
            .toThrow("list.csv (row 1): Header must contain URL_ID and URL columns");
    });

    it("names the row of an invalid URL", () => {
        const content = "URL_ID,URL\na,https://example.com/a\nb,not-a-url\n";

        expect(() => parseInputCsv(content, "list.csv")).toThrow(InputListError);
        expect(() => parseInputCsv(content, "list.csv")).toThrow("list.csv (row 3): URL");
    });

    it("rejects identifiers that leave the articles directory", () => {
        expect(() => parseInputCsv("URL_ID,URL\n../x,https://example.com\n", "list.csv"))
            .toThrow("list.csv (row 2): URL_ID: must not contain");
        expect(() => parseInputCsv("URL_ID,URL\nok,https://example.com\na/b,https://example.com\n", "list.csv"))
            .toThrow("list.csv (row 3): URL_ID: must not contain");
        expect(() => parseInputCsv("URL_ID,URL\na\\b,https://example.com\n", "list.csv"))
            .toThrow("list.csv (row 2): URL_ID: must not contain");
    });

    it("accepts dots that do not form \"..\"", () => {
        expect(parseInputCsv("URL_ID,URL\nv1.2,https://example.com\n", "list.csv"))
            .toEqual([{ urlId: "v1.2", url: "https://example.com" }]);
    });

    it("rejects an empty URL_ID", () => {
        expect(() => parseInputCsv("URL_ID,URL\n ,https://example.com\n", "list.csv"))
            .toThrow("list.csv (row 2): URL_ID");
    });
});

describe("parseInputJson", () => {
    it("accepts numeric identifiers", () => {
        const entries = parseInputJson("[{\"URL_ID\": 7, \"URL\": \"https://example.com/7\"}]", "list.json");

        expect(entries).toEqual([{ urlId: "7", url: "https://example.com/7" }]);
    });

    it("rejects invalid JSON", () => {
        expect(() => parseInputJson("[{", "list.json")).toThrow("list.json: Invalid JSON");
    });

    it("rejects a non-array document", () => {
        expect(() => parseInputJson("{}", "list.json"))
            .toThrow("list.json: Expected an array of { URL_ID, URL } objects");
    });
});

describe("loadInputList", () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), "lexmetrics-input-"));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it("loads the fixture list in order", async () => {
        const entries = await loadInputList(join(process.cwd(), "test-fixtures", "input.csv"));

        expect(entries.map(e => e.urlId)).toEqual(["doc-1", "doc-2", "doc-3"]);
        expect(entries[0]?.url).toBe("https://example.com/doc-1");
    });

    it("reads JSON by extension", async () => {
        const file = join(dir, "list.json");
        writeFileSync(file, JSON.stringify([{ URL_ID: "x", URL: "https://example.com/x" }]));

        expect(await loadInputList(file)).toEqual([{ urlId: "x", url: "https://example.com/x" }]);
    });

    it("reads the first worksheet of an .xlsx workbook", async () => {
        const file = join(dir, "list.xlsx");
        const workbook = new ExcelJS.Workbook();
        const sheet = workbook.addWorksheet("Input");
        sheet.addRow(["URL", "URL_ID"]);
        sheet.addRow(["https://example.com/a", "a1"]);
        sheet.addRow([]);
        sheet.addRow(["https://example.com/7", 7]);
        await workbook.xlsx.writeFile(file);

        expect(await loadInputList(file)).toEqual([
            { urlId: "a1", url: "https://example.com/a" },
            { urlId: "7", url: "https://example.com/7" },
        ]);
    });

    it("names the worksheet row of an invalid .xlsx entry", async () => {
        const file = join(dir, "list.xlsx");
        const workbook = new ExcelJS.Workbook();
        const sheet = workbook.addWorksheet("Input");
        sheet.addRow(["URL_ID", "URL"]);
        sheet.addRow(["a", "https://example.com/a"]);
        sheet.addRow(["b", "not-a-url"]);
        await workbook.xlsx.writeFile(file);

        await expect(loadInputList(file)).rejects.toThrow(`${file} (row 3): URL`);
    });

    it("rejects a file that is not a workbook", async () => {
        const file = join(dir, "list.xlsx");
        writeFileSync(file, "URL_ID,URL\n");

        await expect(loadInputList(file)).rejects.toThrow(`${file}: Cannot read input list`);
    });

    it("rejects duplicate identifiers", async () => {
        const file = join(dir, "list.csv");
        writeFileSync(file, "URL_ID,URL\na,https://example.com/1\na,https://example.com/2\n");

        await expect(loadInputList(file)).rejects.toThrow(`${file}: Duplicate URL_ID "a" (entry 2)`);
    });

    it("rejects a missing file", async () => {
        const file = join(dir, "missing.csv");

        await expect(loadInputList(file)).rejects.toThrow(`${file}: Cannot read input list`);
    });
});
