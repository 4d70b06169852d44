#!/usr/bin/env node

import { config as loadEnv } from "dotenv";
import { getConfig, type AppConfig } from "./config";
import { parseArgs, getString, getInt, hasFlag } from "./commands/args";
import { runAnalyze, type AnalyzeCommandOptions } from "./commands/analyze";
import { runScrape, type ScrapeCommandOptions } from "./commands/scrape";
import { runText } from "./commands/text";
import type { LexiconPaths } from "./lexicon/load";
import { errorMessage } from "./errors";
import Logger from "./utils/logger";

const logger = Logger.getInstance();

const HELP_TEXT = `
lexmetrics - Lexical, sentiment and readability metrics for article texts

Computes thirteen metrics per document (positive/negative score, polarity,
subjectivity, average sentence length, complex words, Fog index, word count,
syllables per word, personal pronouns, average word length) from stopword
lists and positive/negative word dictionaries.

COMMANDS:
  scrape [options]     Fetch every URL of the input list, save <URL_ID>.txt files
    --input, -i <file>   URL list, CSV, JSON or .xlsx with URL_ID and URL
    --out <dir>          Directory for article texts
    --concurrency <n>    Parallel fetches (default: 3)
    --delay <ms>         Pause after each fetch (default: 1000)
    --timeout <ms>       Per-page timeout (default: 10000)

  analyze [options]    Analyze the saved article texts and write the report
    --input, -i <file>   URL list
    --articles, -a <dir> Directory holding <URL_ID>.txt files
    --output, -o <file>  Report file, .csv, .json or .xlsx
    --stopwords <dir>    Stopword lists directory
    --dictionary <dir>   positive-words.txt / negative-words.txt directory
    --zero-fill          Keep a zero row for documents without text

  run [options]        scrape, then analyze (accepts both option sets)

  text [options]       Analyze a single text and print its metrics
    --file, -f <file>    Text file
    --text "<text>"      Inline text
    --json               Print as JSON

  mcp                  Start the MCP server (called by MCP clients)
  help, --help         Show this help message

  --timing, -t         Print a step timing summary (any command)

Defaults come from LEXMETRICS_* environment variables or a .env file.

EXAMPLES:
  lexmetrics scrape --input data/input/input.csv
  lexmetrics analyze --output data/output/output.json --zero-fill
  lexmetrics text --text "We were happy with the results."
`;

type Flags = Map<string, string | true>;

function lexiconPaths(flags: Flags, cfg: AppConfig): LexiconPaths {
    return {
        stopwordsDir: getString(flags, "--stopwords") ?? cfg.lexicon.stopwordsDir,
        dictionaryDir: getString(flags, "--dictionary") ?? cfg.lexicon.dictionaryDir,
    };
}

function scrapeOptions(flags: Flags, cfg: AppConfig): ScrapeCommandOptions {
    return {
        inputList: getString(flags, "--input", "-i") ?? cfg.paths.inputList,
        outputDir: getString(flags, "--out", "--articles", "-a") ?? cfg.paths.articlesDir,
        maxConcurrent: getInt(flags, "--concurrency") ?? cfg.scrape.maxConcurrent,
        delayMs: getInt(flags, "--delay") ?? cfg.scrape.delayMs,
        timeout: getInt(flags, "--timeout") ?? cfg.scrape.timeoutMs,
        userAgent: cfg.scrape.userAgent,
    };
}

function analyzeOptions(flags: Flags, cfg: AppConfig): AnalyzeCommandOptions {
    return {
        inputList: getString(flags, "--input", "-i") ?? cfg.paths.inputList,
        articlesDir: getString(flags, "--articles", "-a", "--out") ?? cfg.paths.articlesDir,
        report: getString(flags, "--output", "-o") ?? cfg.paths.report,
        lexicon: lexiconPaths(flags, cfg),
        fillMissing: hasFlag(flags, "--zero-fill"),
    };
}

async function main(): Promise<void> {
    const { command, flags } = parseArgs(process.argv.slice(2));

    if (command === undefined || command === "help" || hasFlag(flags, "--help", "-h")) {
        console.log(HELP_TEXT);
        return;
    }

    loadEnv();
    const cfg = getConfig();

    if (cfg.timing || hasFlag(flags, "--timing", "-t")) {
        logger.setTimingEnabled(true);
    }

    switch (command) {
        case "scrape": {
            await runScrape(scrapeOptions(flags, cfg));
            break;
        }

        case "analyze": {
            await runAnalyze(analyzeOptions(flags, cfg));
            break;
        }

        case "run": {
            await runScrape(scrapeOptions(flags, cfg));
            await runAnalyze(analyzeOptions(flags, cfg));
            break;
        }

        case "text": {
            const file = getString(flags, "--file", "-f");
            const text = getString(flags, "--text");
            runText({
                ...(file !== undefined && { file }),
                ...(text !== undefined && { text }),
                lexicon: lexiconPaths(flags, cfg),
                json: hasFlag(flags, "--json"),
            });
            break;
        }

        case "mcp": {
            // Dynamically import and run MCP server
            await import("./mcp/server");
            return;
        }

        default: {
            console.log(`Unknown command: ${command}`);
            console.log("Run 'lexmetrics --help' for usage.\n");
            process.exit(1);
        }
    }

    if (logger.isTimingEnabled()) {
        logger.printTimings();
    }
}

// Run main
main().catch((err) => {
    logger.error(errorMessage(err));
    process.exit(1);
});
