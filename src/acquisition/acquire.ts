/**
 * Document acquisition: fetch every input URL, extract the article,
 * and write one <URL_ID>.txt file per document
 */

import * as fs from "fs";
import * as path from "path";
import type { InputEntry } from "../types";
import { scrapeUrls, type ScraperOptions } from "./scraper";
import { extractArticle, formatArticleText } from "./extract";
import { errorMessage } from "../errors";

export interface AcquisitionOptions extends ScraperOptions {
    outputDir: string;
    /** Called once per entry, in input order, after all pages are fetched */
    onResult?: (index: number, total: number, entry: InputEntry, error?: string) => void;
}

export interface AcquiredDocument {
    urlId: string;
    url: string;
    filePath: string;
}

export interface AcquisitionFailure {
    urlId: string;
    url: string;
    error: string;
}

export interface AcquisitionResult {
    saved: AcquiredDocument[];
    failed: AcquisitionFailure[];
}

/**
 * Path of the text file holding a document
 */
export function documentPath(articlesDir: string, urlId: string): string {
    return path.join(articlesDir, `${urlId}.txt`);
}

/**
 * Fetch, extract and store every entry
 */
export async function acquireDocuments(
    entries: readonly InputEntry[],
    options: AcquisitionOptions
): Promise<AcquisitionResult> {
    const { outputDir, onResult, ...scraperOptions } = options;

    fs.mkdirSync(outputDir, { recursive: true });

    const pages = await scrapeUrls(entries.map(e => e.url), scraperOptions);
    const saved: AcquiredDocument[] = [];
    const failed: AcquisitionFailure[] = [];

    entries.forEach((entry, index) => {
        const page = pages[index];
        let error: string | undefined;

        if (page === undefined || page.html === null) {
            error = page?.error ?? "Not fetched";
        } else {
            try {
                const filePath = documentPath(outputDir, entry.urlId);
                fs.writeFileSync(filePath, formatArticleText(extractArticle(page.html)), "utf8");
                saved.push({ urlId: entry.urlId, url: entry.url, filePath });
            } catch (err) {
                error = errorMessage(err);
            }
        }

        if (error !== undefined) {
            failed.push({ urlId: entry.urlId, url: entry.url, error });
        }
        onResult?.(index, entries.length, entry, error);
    });

    return { saved, failed };
}
