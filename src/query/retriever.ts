import type { Logger } from "pino";
import type { ScoredEntry, VectorIndex } from "../database/types";
import type { EmbeddingProvider } from "../llm/types";
import { ConfigurationError } from "../errors";

export interface Query {
    text: string;
    topK: number;
    wantSources: boolean;
}

/** Ordered by descending similarity; empty when nothing matched. */
export type RetrievalResult = ScoredEntry[];

export interface Retriever {
    retrieve(query: Query): Promise<RetrievalResult>;
}

export interface VectorRetrieverOptions {
    embedding: EmbeddingProvider;
    index: VectorIndex;
    collection: string;
    logger?: Logger;
}

/**
 * Nearest-neighbour lookup against the current index generation. The
 * embedding provider must be the one the index was built with.
 */
export class VectorRetriever implements Retriever {
    constructor(private readonly options: VectorRetrieverOptions) {}

    async retrieve(query: Query): Promise<RetrievalResult> {
        if (!Number.isInteger(query.topK) || query.topK < 1) {
            throw new ConfigurationError(`top-K must be a positive integer, got ${query.topK}.`);
        }

        const { embedding, index, collection, logger } = this.options;

        logger?.debug({ question: query.text }, "Embedding query.");
        const vector = await embedding.embedQuery(query.text);

        const matches = await index.query(collection, vector, query.topK);
        logger?.info({ collection, topK: query.topK, matchCount: matches.length }, "Retrieved similar chunks.");
        return matches;
    }
}
