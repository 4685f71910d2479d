import fs from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import type { Document } from "../corpus/types";
import { errorMessage } from "../errors";
import { extractPdfText } from "./pdf";

type SourceReader = (filePath: string) => Promise<string>;

const readUtf8: SourceReader = (filePath) => fs.readFile(filePath, "utf8");

const SOURCE_READERS: Partial<Record<string, SourceReader>> = {
    ".txt": readUtf8,
    ".md": readUtf8,
    ".pdf": async (filePath) => extractPdfText(new Uint8Array(await fs.readFile(filePath))),
};

export const SUPPORTED_EXTENSIONS = Object.keys(SOURCE_READERS);

export const UNSUPPORTED_REASON = "unsupported file type";

export interface SkippedSource {
    sourceId: string;
    reason: string;
}

export interface LoadedDocuments {
    documents: Document[];
    skipped: SkippedSource[];
}

export interface LoadDocumentsOptions {
    logger?: Logger;
    /** Files in `dataDir` that are neither loaded nor reported, such as the catalog itself. */
    exclude?: string[];
}

/**
 * Reads the text of every file in `dataDir`: plain text and markdown as is,
 * PDFs through their text layer. Hidden files are ignored. Anything else, and
 * any file that cannot be read or holds no text, is logged and reported in
 * `skipped`.
 */
export async function loadDocuments(dataDir: string, options: LoadDocumentsOptions = {}): Promise<LoadedDocuments> {
    const { logger } = options;
    const excluded = new Set((options.exclude ?? []).map((filePath) => path.resolve(filePath)));

    const entries = await fs.readdir(dataDir, { withFileTypes: true });
    const files = entries
        .filter((entry) => entry.isFile() && !entry.name.startsWith("."))
        .map((entry) => entry.name)
        .filter((name) => !excluded.has(path.resolve(dataDir, name)))
        .sort();

    const documents: Document[] = [];
    const skipped: SkippedSource[] = [];

    for (const sourceId of files) {
        const extension = path.extname(sourceId).toLowerCase();
        const read = SOURCE_READERS[extension];
        if (!read) {
            skipped.push({ sourceId, reason: UNSUPPORTED_REASON });
            logger?.warn({ source: sourceId, extension }, `Unsupported file type. Expected one of ${SUPPORTED_EXTENSIONS.join(", ")}. Skipping.`);
            continue;
        }

        try {
            const rawText = (await read(path.join(dataDir, sourceId))).trim();
            if (!rawText) {
                skipped.push({ sourceId, reason: "empty" });
                logger?.warn({ source: sourceId }, "Source has no text. Skipping.");
                continue;
            }
            documents.push({ sourceId, rawText });
            logger?.info({ source: sourceId }, `Loaded ${sourceId}.`);
        } catch (error) {
            skipped.push({ sourceId, reason: errorMessage(error) });
            logger?.error({ err: error, source: sourceId }, "Failed to read source. Skipping.");
        }
    }

    return { documents, skipped };
}
