/**
 * MCP Server entry point
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { config as loadEnv } from "dotenv";
import { z } from "zod";
import type { Lexicon } from "../types";
import { getConfig, type AppConfig } from "../config";
import { loadLexicon } from "../lexicon/load";
import { analyzeTextTool, analyzeUrlTool } from "./tools";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

/**
 * Create the MCP server with its tools registered
 */
function createServer(lexicon: Lexicon, appConfig: AppConfig): McpServer {
    const server = new McpServer({
        name: "lexmetrics_mcp",
        version: "0.1.0",
    });

    server.tool(
        "lexmetrics_analyze_text",
        `Compute lexical, sentiment and readability metrics for a plain text.

RETURNS: positive/negative scores, polarity, subjectivity, average sentence length,
share of complex words, Gunning Fog index, word count, syllables per word,
personal pronoun count and average word length.`,
        {
            text: z.string().describe("The text to analyze (title and body)"),
            urlId: z.string().optional().describe("Identifier shown in the result"),
            url: z.string().optional().describe("Source URL shown in the result"),
        },
        async ({ text, urlId, url }) => {
            return {
                content: [
                    {
                        type: "text",
                        text: analyzeTextTool({
                            text,
                            ...(urlId !== undefined && { urlId }),
                            ...(url !== undefined && { url }),
                        }, lexicon),
                    },
                ],
            };
        }
    );

    server.tool(
        "lexmetrics_analyze_url",
        `Fetch an article page, extract its title and body, and compute the same metrics
as lexmetrics_analyze_text.`,
        {
            url: z.string().url().describe("The article URL"),
        },
        async ({ url }) => {
            const text = await analyzeUrlTool(url, lexicon, {
                timeout: appConfig.scrape.timeoutMs,
                userAgent: appConfig.scrape.userAgent,
            });

            return {
                content: [
                    {
                        type: "text",
                        text,
                    },
                ],
            };
        }
    );

    return server;
}

async function main() {
    loadEnv();
    const appConfig = getConfig();
    // Loaded once, shared read-only by every tool call
    const lexicon = loadLexicon(appConfig.lexicon);

    const server = createServer(lexicon, appConfig);
    const transport = new StdioServerTransport();
    await server.connect(transport);
}

main().catch((error) => {
    logger.error(`Fatal error: ${error}`);
    process.exit(1);
});
