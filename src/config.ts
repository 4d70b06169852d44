/**
 * Configuration from environment variables.
 *
 * - LEXMETRICS_STOPWORDS_DIR      stopword lists directory
 * - LEXMETRICS_DICTIONARY_DIR     positive-words.txt / negative-words.txt directory
 * - LEXMETRICS_INPUT              URL list (CSV or JSON)
 * - LEXMETRICS_ARTICLES_DIR       one <URL_ID>.txt per document
 * - LEXMETRICS_REPORT             output table (.csv or .json)
 * - LEXMETRICS_SCRAPE_TIMEOUT_MS  per-page fetch timeout
 * - LEXMETRICS_SCRAPE_CONCURRENCY parallel fetches
 * - LEXMETRICS_SCRAPE_DELAY_MS    pause after each fetch
 * - LEXMETRICS_USER_AGENT         User-Agent header for fetches
 * - LEXMETRICS_TIMING=1|0         step timing summary
 */

import { z } from "zod";
import { ConfigError } from "./errors";
import { DEFAULT_USER_AGENT } from "./acquisition/scraper";

const booleanFlag = z
    .string()
    .trim()
    .toLowerCase()
    .refine(v => ["", "0", "1", "true", "false", "yes", "no"].includes(v), {
        message: "Expected 1/0, true/false or yes/no",
    })
    .transform(v => v === "1" || v === "true" || v === "yes");

const EnvSchema = z.object({
    LEXMETRICS_STOPWORDS_DIR: z.string().trim().min(1).default("resources/StopWords"),
    LEXMETRICS_DICTIONARY_DIR: z.string().trim().min(1).default("resources/MasterDictionary"),
    LEXMETRICS_INPUT: z.string().trim().min(1).default("data/input/input.csv"),
    LEXMETRICS_ARTICLES_DIR: z.string().trim().min(1).default("data/raw/extracted_articles"),
    LEXMETRICS_REPORT: z.string().trim().min(1).default("data/output/output.csv"),
    LEXMETRICS_SCRAPE_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
    LEXMETRICS_SCRAPE_CONCURRENCY: z.coerce.number().int().positive().default(3),
    LEXMETRICS_SCRAPE_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
    LEXMETRICS_USER_AGENT: z.string().trim().min(1).default(DEFAULT_USER_AGENT),
    LEXMETRICS_TIMING: booleanFlag.default("0"),
});

export interface AppConfig {
    lexicon: {
        stopwordsDir: string;
        dictionaryDir: string;
    };
    paths: {
        inputList: string;
        articlesDir: string;
        report: string;
    };
    scrape: {
        timeoutMs: number;
        maxConcurrent: number;
        delayMs: number;
        userAgent: string;
    };
    timing: boolean;
}

/**
 * Read and validate configuration. Throws ConfigError on invalid values.
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const details = parsed.error.issues
            .map(issue => `${issue.path.join(".")}: ${issue.message}`)
            .join("; ");
        throw new ConfigError(`Invalid configuration: ${details}`);
    }

    const e = parsed.data;
    return {
        lexicon: {
            stopwordsDir: e.LEXMETRICS_STOPWORDS_DIR,
            dictionaryDir: e.LEXMETRICS_DICTIONARY_DIR,
        },
        paths: {
            inputList: e.LEXMETRICS_INPUT,
            articlesDir: e.LEXMETRICS_ARTICLES_DIR,
            report: e.LEXMETRICS_REPORT,
        },
        scrape: {
            timeoutMs: e.LEXMETRICS_SCRAPE_TIMEOUT_MS,
            maxConcurrent: e.LEXMETRICS_SCRAPE_CONCURRENCY,
            delayMs: e.LEXMETRICS_SCRAPE_DELAY_MS,
            userAgent: e.LEXMETRICS_USER_AGENT,
        },
        timing: e.LEXMETRICS_TIMING,
    };
}
