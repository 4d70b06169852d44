export type {
    Lexicon,
    TextDocument,
    BatchDocument,
    InputEntry,
    TokenCounts,
    SentimentScores,
    ReadabilityScores,
    TextMetrics,
    MetricRecord,
    MetricKey,
} from "./types";

// Core
export { analyze, analyzeText, zeroMetrics } from "./analysis";
export { runAll, type BatchResult, type BatchFailure, type BatchOptions, type DocumentStatus } from "./batch";
export { cleanText, isDegenerateText } from "./preprocessing/clean";
export { tokenize, extractWords } from "./preprocessing/tokenize";
export { splitIntoSentences } from "./preprocessing/segment";
export { syllablesOf, countSyllables } from "./scoring/syllables";
export { scoreSentiment, polarity, subjectivity, EPSILON } from "./scoring/sentiment";
export { scoreReadability, fogIndex } from "./scoring/readability";
export { countPersonalPronouns } from "./scoring/pronouns";

// Lexicon
export { createLexicon, type LexiconSource } from "./lexicon/lexicon";
export { loadLexicon, loadStopwords, loadSentimentWords, parseWordList, type LexiconPaths } from "./lexicon/load";

// Collaborators
export { loadInputList, parseCsv, parseInputXlsx } from "./io/input";
export { loadDocuments } from "./io/documents";
export { extractArticle, formatArticleText, type ExtractedArticle } from "./acquisition/extract";
export { scrapeUrl, scrapeUrls, type ScrapeResult, type ScraperOptions } from "./acquisition/scraper";
export { acquireDocuments, type AcquisitionResult, type AcquisitionOptions } from "./acquisition/acquire";
export { OUTPUT_COLUMNS, recordToRow, formatCsv, formatJson, buildWorkbook, writeReport } from "./output/report";
export { summarizeBatch, formatMetrics, formatSummary, type BatchSummary } from "./output/format";
export { getConfig, type AppConfig } from "./config";

export {
    LexmetricsError,
    MissingDocumentError,
    LexiconLoadError,
    InputListError,
    ConfigError,
    type DegenerateInputWarning,
} from "./errors";
