import type { BatchDocument } from "../types";
import { loadLexicon, type LexiconPaths } from "../lexicon/load";
import { loadInputList } from "../io/input";
import { loadDocuments } from "../io/documents";
import { runAll, type BatchResult, type DocumentStatus } from "../batch";
import { writeReport } from "../output/report";
import { formatSummary, summarizeBatch, type BatchSummary } from "../output/format";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

export interface AnalyzeCommandOptions {
    inputList: string;
    articlesDir: string;
    report: string;
    lexicon: LexiconPaths;
    /** Keep a zero row in the report for documents that could not be analyzed */
    fillMissing?: boolean;
}

export interface AnalyzeCommandResult {
    result: BatchResult;
    summary: BatchSummary;
}

const STATUS_SYMBOL: Record<DocumentStatus, string> = {
    analyzed: "✓",
    degenerate: "✓ (empty text)",
    missing: "✗ (file not found)",
    failed: "✗ (error)",
};

function logProgress(index: number, total: number, document: BatchDocument, status: DocumentStatus): void {
    logger.log(`[${index + 1}/${total}] Analyzing ${document.urlId}... ${STATUS_SYMBOL[status]}`);
}

/**
 * Analyze every document of the input list and write the report.
 * Lexicon and input list errors are fatal and propagate.
 */
export async function runAnalyze(options: AnalyzeCommandOptions): Promise<AnalyzeCommandResult> {
    logger.log("Loading stopwords and sentiment dictionaries...");
    const lexicon = logger.time("Load lexicon", () => loadLexicon(options.lexicon));
    logger.log(
        `Loaded ${lexicon.stopwords.size} stopwords, ${lexicon.positiveWords.size} positive words, ` +
        `${lexicon.negativeWords.size} negative words`
    );

    logger.log(`Loading input from ${options.inputList}...`);
    const entries = await loadInputList(options.inputList);
    const documents = logger.time("Load documents", () => loadDocuments(entries, options.articlesDir));

    logger.log(`Analyzing ${documents.length} documents...`);
    const result = runAll(documents, lexicon, {
        fillMissing: options.fillMissing ?? false,
        onProgress: logProgress,
    });

    for (const failure of result.failures) {
        logger.warn(failure.error.message);
    }

    await writeReport(options.report, result.records);

    const summary = summarizeBatch(result);
    console.log("\n" + formatSummary(summary));
    console.log(`Results saved to: ${options.report}`);

    return { result, summary };
}
