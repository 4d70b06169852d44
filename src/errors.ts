/**
 * Error classes for lexicon loading, input handling and batch analysis
 */

/**
 * Base error class for lexmetrics errors
 */
export class LexmetricsError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "LexmetricsError";
        // Maintain proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, new.target);
        }
    }
}

/**
 * Acquisition produced no text for an expected document.
 * Collected in the batch failures, never fatal.
 */
export class MissingDocumentError extends LexmetricsError {
    constructor(
        public readonly urlId: string,
        public readonly url: string,
    ) {
        super(`No text acquired for document ${urlId} (${url})`);
        this.name = "MissingDocumentError";
    }
}

/**
 * A stopword or dictionary source is missing or unreadable.
 * Fatal: no document can be analyzed without lexicons.
 */
export class LexiconLoadError extends LexmetricsError {
    constructor(
        message: string,
        public readonly sourcePath?: string,
        options?: { cause?: unknown },
    ) {
        super(sourcePath ? `${message}: ${sourcePath}` : message, options);
        this.name = "LexiconLoadError";
    }
}

/**
 * The URL list is missing, malformed, or has an invalid row
 */
export class InputListError extends LexmetricsError {
    constructor(
        message: string,
        public readonly sourcePath: string,
        public readonly row?: number,
        options?: { cause?: unknown },
    ) {
        super(
            row !== undefined
                ? `${sourcePath} (row ${row}): ${message}`
                : `${sourcePath}: ${message}`,
            options,
        );
        this.name = "InputListError";
    }
}

export class ConfigError extends LexmetricsError {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

/**
 * Not an error: empty or whitespace-only text, analyzed as all-zero metrics
 */
export interface DegenerateInputWarning {
    urlId: string;
    url: string;
    reason: "empty_text";
}

/**
 * Get a printable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
