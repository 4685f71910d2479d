import type Bottleneck from "bottleneck";
import type { Logger } from "pino";
import { z } from "zod";
import type { ChatProvider } from "../llm/types";
import { buildEnrichmentPrompt } from "../llm/prompt";
import { parseCategory, type ChunkMetadata, type RawChunk } from "../corpus/types";
import { createPacedLimiter } from "../utils/rateLimiter";

export const FALLBACK_TITLE = "General Information";
export const FALLBACK_SUMMARY_LENGTH = 100;
export const FALLBACK_IMPORTANCE = 5;

const ENRICHMENT_TEMPERATURE = 0.2;

export const enrichmentSchema = z.object({
    title: z.string().trim().min(1),
    summary: z.string().trim(),
    keywords: z.array(z.string().trim()),
    category: z.string().transform((value, ctx) => {
        const category = parseCategory(value);
        if (!category) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown category "${value}".` });
            return z.NEVER;
        }
        return category;
    }),
    importance: z.coerce
        .number()
        .finite()
        .transform((value) => Math.min(10, Math.max(1, Math.round(value)))),
});

export interface ChunkEnricherOptions {
    chat: ChatProvider;
    companyName: string;
    delayMs?: number;
    concurrency?: number;
    maxTokens?: number;
    logger?: Logger;
}

export function fallbackMetadata(chunkText: string): ChunkMetadata {
    return {
        title: FALLBACK_TITLE,
        // Code points, so a surrogate pair is never cut in half.
        summary: Array.from(chunkText).slice(0, FALLBACK_SUMMARY_LENGTH).join(""),
        keywords: [],
        category: "General",
        importance: FALLBACK_IMPORTANCE,
    };
}

export function stripCodeFences(raw: string): string {
    return raw.trim().replace(/```json/g, "").replace(/```/g, "").trim();
}

/** Throws when the reply is not a JSON object with the five metadata fields. */
export function parseEnrichmentResponse(raw: string): ChunkMetadata {
    const parsed: unknown = JSON.parse(stripCodeFences(raw));
    return enrichmentSchema.parse(parsed);
}

/**
 * Derives title, summary, keywords, category and importance for one chunk.
 * Calls are paced through a shared limiter; failures never escape `enrich`.
 */
export class ChunkEnricher {
    private readonly limiter: Bottleneck;

    constructor(private readonly options: ChunkEnricherOptions) {
        this.limiter = createPacedLimiter(options.delayMs ?? 500, options.concurrency ?? 1);
    }

    async enrich(chunk: RawChunk): Promise<ChunkMetadata> {
        try {
            const reply = await this.limiter.schedule(() =>
                this.options.chat.generateText({
                    messages: [{ role: "user", content: buildEnrichmentPrompt(chunk.text, this.options.companyName) }],
                    maxTokens: this.options.maxTokens ?? 300,
                    temperature: ENRICHMENT_TEMPERATURE,
                })
            );
            return parseEnrichmentResponse(reply);
        } catch (error) {
            this.options.logger?.warn(
                { err: error, source: chunk.documentSource, sequenceIndex: chunk.sequenceIndex },
                "Enrichment failed; using fallback metadata."
            );
            return fallbackMetadata(chunk.text);
        }
    }
}
