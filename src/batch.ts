/**
 * Batch runner: analyze every document, collect failures instead of throwing
 */

import type { BatchDocument, Lexicon, MetricRecord } from "./types";
import { analyze, zeroMetrics } from "./analysis";
import { isDegenerateText } from "./preprocessing/clean";
import { MissingDocumentError, LexmetricsError, errorMessage, type DegenerateInputWarning } from "./errors";

export type DocumentStatus =
    | "analyzed"      // Metrics computed from text
    | "degenerate"    // Blank text, all-zero metrics
    | "missing"       // No text acquired
    | "failed";       // Analysis threw unexpectedly

export interface BatchFailure {
    urlId: string;
    url: string;
    error: Error;
}

export interface BatchResult {
    records: MetricRecord[];
    failures: BatchFailure[];
    warnings: DegenerateInputWarning[];
}

export interface BatchOptions {
    /** Emit an all-zero record for missing documents so every entry keeps a row */
    fillMissing?: boolean;
    /** Called after each document, in input order */
    onProgress?: (index: number, total: number, document: BatchDocument, status: DocumentStatus) => void;
}

/**
 * Analyze all documents in input order.
 * A missing document becomes a MissingDocumentError failure and is left out of
 * the records unless fillMissing is set.
 */
export function runAll(
    documents: readonly BatchDocument[],
    lexicon: Lexicon,
    options: BatchOptions = {}
): BatchResult {
    const { fillMissing = false, onProgress } = options;
    const records: MetricRecord[] = [];
    const failures: BatchFailure[] = [];
    const warnings: DegenerateInputWarning[] = [];

    documents.forEach((document, index) => {
        const { urlId, url, text } = document;
        let status: DocumentStatus;

        if (text === null) {
            failures.push({ urlId, url, error: new MissingDocumentError(urlId, url) });
            if (fillMissing) {
                records.push({ urlId, url, ...zeroMetrics() });
            }
            status = "missing";
        } else {
            try {
                records.push(analyze({ urlId, url, text }, lexicon));
                if (isDegenerateText(text)) {
                    warnings.push({ urlId, url, reason: "empty_text" });
                    status = "degenerate";
                } else {
                    status = "analyzed";
                }
            } catch (err) {
                const error = err instanceof Error
                    ? err
                    : new LexmetricsError(`Analysis failed for ${urlId}: ${errorMessage(err)}`);
                failures.push({ urlId, url, error });
                if (fillMissing) {
                    records.push({ urlId, url, ...zeroMetrics() });
                }
                status = "failed";
            }
        }

        onProgress?.(index, documents.length, document, status);
    });

    return { records, failures, warnings };
}
