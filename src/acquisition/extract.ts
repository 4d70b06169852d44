/**
 * Article extraction: title and body paragraphs from an HTML page
 */

import * as cheerio from "cheerio";
import type { AnyNode } from "domhandler";
import { normalizeWhitespace } from "../utils/shared";

export interface ExtractedArticle {
    title: string;
    body: string;
}

// Title candidates, most specific first (WordPress / tagDiv themes, then generic)
const TITLE_SELECTORS = [
    "h1.entry-title",
    "h1.tdb-title-text",
    "h1",
    "title",
];

// Article body containers, most specific first
const CONTENT_SELECTORS = [
    "div.td-post-content",
    "div.tdb-block-inner",
    "article",
    "div.entry-content",
    "main",
];

// Elements that never hold article text
const REMOVE_ELEMENTS = [
    "script",
    "style",
    "noscript",
    "iframe",
    "svg",
    "canvas",
    "form",
    "button",
    "template",
];

// Page chrome removed from inside the content container
const BOILERPLATE_ELEMENTS = [
    "nav",
    "footer",
    "header",
    "aside",
];

const PARAGRAPH_SEPARATOR = "\n\n";

interface ContentCandidate {
    element: cheerio.Cheerio<AnyNode>;
    score: number;
    index: number;
}

function findTitle($: cheerio.CheerioAPI): string {
    for (const selector of TITLE_SELECTORS) {
        const text = normalizeWhitespace($(selector).first().text());
        if (text.length > 0) return text;
    }
    return "";
}

/**
 * Fall back to the body child with the most non-link text
 */
function findDensestBlock($: cheerio.CheerioAPI): cheerio.Cheerio<AnyNode> | null {
    const candidates: ContentCandidate[] = [];

    $("body").children().each((index, elem) => {
        if (BOILERPLATE_ELEMENTS.includes(elem.tagName.toLowerCase())) return;

        const $el = $(elem);
        const textLen = normalizeWhitespace($el.text()).length;
        let linkTextLen = 0;
        $el.find("a").each((_, link) => {
            linkTextLen += normalizeWhitespace($(link).text()).length;
        });

        // Penalize link-heavy sections
        candidates.push({ element: $el, score: textLen - 2 * linkTextLen, index });
    });

    // Highest score wins; earlier element on ties
    candidates.sort((a, b) => b.score - a.score || a.index - b.index);
    return candidates[0]?.element ?? null;
}

function findContentContainer($: cheerio.CheerioAPI): cheerio.Cheerio<AnyNode> | null {
    for (const selector of CONTENT_SELECTORS) {
        const $el = $(selector).first();
        if ($el.length > 0) return $el;
    }
    return findDensestBlock($);
}

function collectParagraphs(
    $: cheerio.CheerioAPI,
    $paragraphs: cheerio.Cheerio<AnyNode>
): string[] {
    const texts: string[] = [];
    $paragraphs.each((_, el) => {
        const text = normalizeWhitespace($(el).text());
        if (text.length > 0) {
            texts.push(text);
        }
    });
    return texts;
}

/**
 * Extract the article title and body text from HTML.
 *
 * The body is the non-empty paragraphs of the content container joined by a
 * blank line; when the container has none, every paragraph on the page is used.
 */
export function extractArticle(html: string): ExtractedArticle {
    const $ = cheerio.load(html);

    // Title first: it often lives in a <header> removed below
    const title = findTitle($);

    for (const selector of REMOVE_ELEMENTS) {
        $(selector).remove();
    }

    let paragraphs: string[] = [];
    const container = findContentContainer($);
    if (container !== null) {
        for (const selector of BOILERPLATE_ELEMENTS) {
            container.find(selector).remove();
        }
        paragraphs = collectParagraphs($, container.find("p"));
    }

    if (paragraphs.length === 0) {
        paragraphs = collectParagraphs($, $("p"));
    }

    return {
        title,
        body: paragraphs.join(PARAGRAPH_SEPARATOR),
    };
}

/**
 * Document text as stored on disk: title, blank line, body
 */
export function formatArticleText(article: ExtractedArticle): string {
    return `${article.title}${PARAGRAPH_SEPARATOR}${article.body}`;
}
