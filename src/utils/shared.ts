/**
 * Shared utility functions used across the codebase
 */

// =============================================================================
// Math utilities
// =============================================================================

/**
 * Divide, returning 0 when the denominator is 0
 */
export function safeDivide(numerator: number, denominator: number): number {
    if (denominator === 0) return 0;
    return numerator / denominator;
}

/**
 * Clamp a value into [min, max]
 */
export function clamp(value: number, min: number, max: number): number {
    return Math.min(max, Math.max(min, value));
}

/**
 * Arithmetic mean, 0 for an empty array
 */
export function mean(values: number[]): number {
    if (values.length === 0) return 0;
    return values.reduce((sum, v) => sum + v, 0) / values.length;
}

// =============================================================================
// String utilities
// =============================================================================

/**
 * Normalize whitespace in text: collapse multiple spaces to single, trim
 */
export function normalizeWhitespace(text: string): string {
    return text.replace(/\s+/g, " ").trim();
}

// =============================================================================
// Async utilities
// =============================================================================

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}
