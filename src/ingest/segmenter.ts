import { ConfigurationError } from "../errors";
import type { Document, RawChunk } from "../corpus/types";

export interface SegmentOptions {
    chunkSize?: number;
    overlap?: number;
    /** Windows whose trimmed text is this long or shorter are dropped. */
    minChunkChars?: number;
}

export const DEFAULT_CHUNK_SIZE = 400;
export const DEFAULT_OVERLAP = 50;
export const DEFAULT_MIN_CHUNK_CHARS = 50;

export interface WordWindow {
    start: number;
    end: number;
    text: string;
}

export function assertWindowSettings(chunkSize: number, overlap: number): void {
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
        throw new ConfigurationError(`Chunk size must be a positive integer, got ${chunkSize}.`);
    }
    if (!Number.isInteger(overlap) || overlap < 0) {
        throw new ConfigurationError(`Overlap must be a non-negative integer, got ${overlap}.`);
    }
    if (chunkSize <= overlap) {
        throw new ConfigurationError(`Chunk size (${chunkSize}) must be greater than overlap (${overlap}); the window would never advance.`);
    }
}

export function tokenize(text: string): string[] {
    return text.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Token windows of `chunkSize` words, starting every `chunkSize - overlap`
 * words, before any length filtering. The window that reaches the last token
 * is the final one; a further window would lie wholly inside it.
 */
export function wordWindows(tokens: string[], chunkSize: number, overlap: number): WordWindow[] {
    assertWindowSettings(chunkSize, overlap);

    const stride = chunkSize - overlap;
    const windows: WordWindow[] = [];
    for (let start = 0; start < tokens.length; start += stride) {
        const end = Math.min(tokens.length, start + chunkSize);
        windows.push({ start, end, text: tokens.slice(start, end).join(" ") });
        if (end === tokens.length) {
            break;
        }
    }
    return windows;
}

export function segmentDocument(document: Document, options: SegmentOptions = {}): RawChunk[] {
    const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    const overlap = options.overlap ?? DEFAULT_OVERLAP;
    const minChunkChars = options.minChunkChars ?? DEFAULT_MIN_CHUNK_CHARS;

    return wordWindows(tokenize(document.rawText), chunkSize, overlap)
        .filter((window) => window.text.trim().length > minChunkChars)
        .map((window, sequenceIndex) => ({
            documentSource: document.sourceId,
            text: window.text,
            sequenceIndex,
        }));
}
