import { get_encoding, encoding_for_model, Tiktoken, type TiktokenModel } from "tiktoken";

const TOKENIZER_FALLBACK = "cl100k_base";
const encoderCache = new Map<string, Tiktoken>();

export function getEncoder(model?: string): Tiktoken {
    const key = (model ?? TOKENIZER_FALLBACK).toLocaleLowerCase();
    const cached = encoderCache.get(key);
    if (cached) {
        return cached;
    }

    let encoder: Tiktoken;
    try {
        encoder = encoding_for_model(key as TiktokenModel);
    } catch {
        encoder = get_encoding(TOKENIZER_FALLBACK);
    }

    encoderCache.set(key, encoder);
    return encoder;
}

export function countTokens(text: string, model?: string): number {
    if (!text) return 0;
    try {
        // Special tokens such as <|endoftext|> may appear in customer documents; count them as plain text.
        return getEncoder(model).encode(text, [], []).length;
    } catch {
        // Rough estimate: ~4 characters per token for English prose
        return Math.ceil(text.length / 4);
    }
}

export function countTokensInBatch(texts: string[], model?: string): number {
    return texts.reduce((sum, current) => sum + countTokens(current, model), 0);
}
