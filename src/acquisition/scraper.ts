/**
 * Parallel page fetcher for article acquisition
 */

import { sleep } from "../utils/shared";

export interface ScrapeResult {
    url: string;
    html: string | null;
    error?: string;
}

export interface ScraperOptions {
    timeout?: number;
    userAgent?: string;
    maxConcurrent?: number;
    /** Pause after each request, per worker */
    delayMs?: number;
}

export const DEFAULT_USER_AGENT =
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36";
const DEFAULT_TIMEOUT_MS = 10000;
const DEFAULT_MAX_CONCURRENT = 3;

/**
 * Run async tasks with limited concurrency.
 * fn receives each item with its index in the input.
 */
async function runWithConcurrency<T>(
    items: readonly T[],
    fn: (item: T, index: number) => Promise<void>,
    maxConcurrent: number
): Promise<void> {
    let next = 0;
    const workers: Promise<void>[] = [];

    for (let i = 0; i < Math.min(Math.max(maxConcurrent, 1), items.length); i++) {
        workers.push((async () => {
            while (next < items.length) {
                const index = next++;
                const item = items[index];
                if (item !== undefined) {
                    await fn(item, index);
                }
            }
        })());
    }

    await Promise.all(workers);
}

/**
 * Fetch a single URL. Failures are returned, never thrown.
 */
export async function scrapeUrl(
    url: string,
    options: ScraperOptions = {}
): Promise<ScrapeResult> {
    const { timeout = DEFAULT_TIMEOUT_MS, userAgent = DEFAULT_USER_AGENT } = options;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
        const response = await fetch(url, {
            signal: controller.signal,
            headers: {
                "User-Agent": userAgent,
                "Accept": "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
                "Accept-Language": "en-US,en;q=0.5",
            },
            redirect: "follow",
        });

        if (!response.ok) {
            return {
                url,
                html: null,
                error: `HTTP ${response.status}: ${response.statusText}`,
            };
        }

        const contentType = response.headers.get("content-type") ?? "";
        if (!contentType.includes("text/html") && !contentType.includes("application/xhtml")) {
            return {
                url,
                html: null,
                error: `Non-HTML content type: ${contentType}`,
            };
        }

        const html = await response.text();
        return { url, html };
    } catch (error) {
        if (error instanceof Error) {
            if (error.name === "AbortError") {
                return {
                    url,
                    html: null,
                    error: `Timeout after ${timeout}ms`,
                };
            }
            return {
                url,
                html: null,
                error: error.message,
            };
        }
        return {
            url,
            html: null,
            error: "Unknown error",
        };
    } finally {
        clearTimeout(timeoutId);
    }
}

/**
 * Fetch multiple URLs with limited concurrency. Results keep input order.
 */
export async function scrapeUrls(
    urls: readonly string[],
    options: ScraperOptions = {}
): Promise<ScrapeResult[]> {
    const { maxConcurrent = DEFAULT_MAX_CONCURRENT, delayMs = 0 } = options;
    const results: ScrapeResult[] = new Array<ScrapeResult>(urls.length);

    await runWithConcurrency(
        urls,
        async (url, index) => {
            results[index] = await scrapeUrl(url, options);
            if (delayMs > 0) {
                await sleep(delayMs);
            }
        },
        maxConcurrent
    );

    return results;
}
