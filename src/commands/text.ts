import * as fs from "fs";
import * as path from "path";
import type { MetricRecord } from "../types";
import { analyze } from "../analysis";
import { loadLexicon, type LexiconPaths } from "../lexicon/load";
import { formatMetrics } from "../output/format";
import { recordToRow } from "../output/report";
import { ConfigError } from "../errors";

export interface TextCommandOptions {
    file?: string;
    text?: string;
    lexicon: LexiconPaths;
    json?: boolean;
}

/**
 * Analyze a single text, given inline or as a file, and print its metrics
 */
export function runText(options: TextCommandOptions): MetricRecord {
    let text: string;
    let urlId: string;

    if (options.text !== undefined) {
        text = options.text;
        urlId = "text";
    } else if (options.file !== undefined) {
        if (!fs.existsSync(options.file)) {
            throw new ConfigError(`File not found: ${options.file}`);
        }
        text = fs.readFileSync(options.file, "utf8");
        urlId = path.basename(options.file, path.extname(options.file));
    } else {
        throw new ConfigError("text requires --file or --text");
    }

    const lexicon = loadLexicon(options.lexicon);
    const record = analyze({ urlId, url: options.file ?? "", text }, lexicon);

    if (options.json) {
        console.log(JSON.stringify(recordToRow(record), null, 2));
    } else {
        console.log(formatMetrics(record));
    }

    return record;
}
