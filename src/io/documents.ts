import * as fs from "fs";
import type { BatchDocument, InputEntry } from "../types";
import { documentPath } from "../acquisition/acquire";

/**
 * Read the stored text of every entry, in entry order.
 * A document with no file on disk gets null text.
 */
export function loadDocuments(entries: readonly InputEntry[], articlesDir: string): BatchDocument[] {
    return entries.map(({ urlId, url }) => {
        const filePath = documentPath(articlesDir, urlId);
        if (!fs.existsSync(filePath)) {
            return { urlId, url, text: null };
        }
        return { urlId, url, text: fs.readFileSync(filePath, "utf8") };
    });
}
