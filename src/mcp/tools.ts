/**
 * MCP tool handlers, kept apart from the transport so they can be tested
 */

import type { Lexicon } from "../types";
import { analyze } from "../analysis";
import { scrapeUrl, type ScraperOptions } from "../acquisition/scraper";
import { extractArticle, formatArticleText } from "../acquisition/extract";
import { isDegenerateText } from "../preprocessing/clean";
import { formatMetrics } from "../output/format";

export interface AnalyzeTextInput {
    text: string;
    urlId?: string;
    url?: string;
}

/**
 * Analyze an inline text and return the formatted metrics
 */
export function analyzeTextTool(input: AnalyzeTextInput, lexicon: Lexicon): string {
    const record = analyze(
        { urlId: input.urlId ?? "text", url: input.url ?? "", text: input.text },
        lexicon
    );

    const lines = [formatMetrics(record)];
    if (isDegenerateText(input.text)) {
        lines.push("", "Note: the text is empty; all metrics are zero.");
    }
    return lines.join("\n");
}

/**
 * Fetch a page, extract its article and return the formatted metrics.
 * Fetch failures are reported as text.
 */
export async function analyzeUrlTool(
    url: string,
    lexicon: Lexicon,
    options: ScraperOptions = {}
): Promise<string> {
    const page = await scrapeUrl(url, options);
    if (page.html === null) {
        return `Failed to fetch ${url}: ${page.error ?? "unknown error"}`;
    }

    const article = extractArticle(page.html);
    const header = article.title.length > 0 ? `# ${article.title}\n\n` : "";

    return header + analyzeTextTool({ text: formatArticleText(article), urlId: url, url }, lexicon);
}
