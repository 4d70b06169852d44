import { loadInputList } from "../io/input";
import { acquireDocuments, type AcquisitionResult } from "../acquisition/acquire";
import type { ScraperOptions } from "../acquisition/scraper";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

export interface ScrapeCommandOptions extends ScraperOptions {
    inputList: string;
    outputDir: string;
}

/**
 * Fetch every URL of the input list and store the article texts
 */
export async function runScrape(options: ScrapeCommandOptions): Promise<AcquisitionResult> {
    const { inputList, outputDir, ...scraperOptions } = options;

    logger.log(`Reading ${inputList}...`);
    const entries = await loadInputList(inputList);
    logger.log(`Found ${entries.length} URLs to scrape`);

    const result = await logger.timeAsync("Acquire documents", () =>
        acquireDocuments(entries, {
            ...scraperOptions,
            outputDir,
            onResult: (index, total, entry, error) => {
                const status = error === undefined ? "✓" : `✗ (${error})`;
                logger.log(`[${index + 1}/${total}] Extracting ${entry.urlId}... ${status}`);
            },
        })
    );

    console.log("\n" + "=".repeat(50));
    console.log("EXTRACTION COMPLETE");
    console.log("=".repeat(50));
    console.log(`Total URLs: ${entries.length}`);
    console.log(`Successful: ${result.saved.length}`);
    console.log(`Failed:     ${result.failed.length}`);
    console.log(`Saved to:   ${outputDir}`);
    console.log("=".repeat(50));

    return result;
}
