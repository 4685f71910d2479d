import type { Logger } from "pino";
import type { ChunkCatalog, EnrichedChunk } from "../corpus/types";
import type { IndexEntry, IndexPayload, VectorIndex } from "../database/types";
import type { EmbeddingProvider } from "../llm/types";
import { assertCatalogIntegrity } from "../catalog/catalog";
import { EmbeddingDimensionError, IndexIntegrityError } from "../errors";
import { batchChunks } from "../utils/batchChunks";

export interface LoadIndexOptions {
    embedding: EmbeddingProvider;
    index: VectorIndex;
    collection: string;
    dimension: number;
    batchSize?: number;
    logger?: Logger;
}

export interface IndexLoadResult {
    collection: string;
    entries: number;
    replacedPrevious: boolean;
}

/** Title and summary go first so the distilled signal leads the embedded text. */
export function composeEmbeddingText(chunk: EnrichedChunk): string {
    return `${chunk.title} ${chunk.summary} ${chunk.text}`;
}

export function toIndexPayload(chunk: EnrichedChunk): IndexPayload {
    return {
        source: chunk.source,
        text: chunk.text,
        title: chunk.title,
        summary: chunk.summary,
        keywords: [...chunk.keywords],
        category: chunk.category,
        importance: chunk.importance,
    };
}

/** The collection must hold exactly the catalog's ids. */
export async function verifyIndexIntegrity(catalog: ChunkCatalog, index: VectorIndex, collection: string): Promise<void> {
    const indexed = new Set(await index.listIds(collection));
    const catalogIds = new Set(catalog.map((chunk) => chunk.id));

    const missingIds = [...catalogIds].filter((id) => !indexed.has(id));
    const unexpectedIds = [...indexed].filter((id) => !catalogIds.has(id));

    if (missingIds.length > 0 || unexpectedIds.length > 0) {
        throw new IndexIntegrityError(
            `Collection "${collection}" is out of step with the catalog: ${missingIds.length} missing, ${unexpectedIds.length} unexpected.`,
            missingIds,
            unexpectedIds
        );
    }
}

/**
 * Replaces the whole collection with a fresh generation built from the
 * catalog. Queries issued while this runs may see a missing or partial index.
 * A dimension mismatch in a later batch still leaves a partial collection.
 */
export async function loadIndex(catalog: ChunkCatalog, options: LoadIndexOptions): Promise<IndexLoadResult> {
    const { embedding, index, collection, dimension, logger } = options;
    assertCatalogIntegrity(catalog);

    const embedBatch = async (batch: EnrichedChunk[]): Promise<IndexEntry[]> => {
        const vectors = await embedding.embedDocuments(batch.map(composeEmbeddingText));
        if (vectors.length !== batch.length) {
            throw new Error(`Embedding service returned ${vectors.length} vectors for ${batch.length} chunks.`);
        }

        return batch.map((chunk, position) => {
            const vector = vectors[position] ?? [];
            if (vector.length !== dimension) {
                throw new EmbeddingDimensionError(dimension, vector.length, `chunk ${chunk.id}`);
            }
            return { id: chunk.id, vector, payload: toIndexPayload(chunk) };
        });
    };

    // The first batch is embedded before the delete, so a model of the wrong
    // dimension fails while the previous generation is still in place.
    const batches = batchChunks(catalog, options.batchSize ?? 100);
    const firstEntries = batches.length > 0 ? await embedBatch(batches[0]) : [];

    const replacedPrevious = await index.deleteCollection(collection);
    if (replacedPrevious) {
        logger?.info({ collection }, "Deleted existing collection.");
    }

    await index.createCollection(collection, dimension, "cosine");
    logger?.info({ collection, dimension }, "Created collection.");

    let loaded = 0;
    for (const [position, batch] of batches.entries()) {
        const entries = position === 0 ? firstEntries : await embedBatch(batch);
        await index.upsert(collection, entries);
        loaded += entries.length;
        logger?.info({ collection, loaded, total: catalog.length }, "Upserted chunk batch.");
    }

    await verifyIndexIntegrity(catalog, index, collection);
    logger?.info({ collection, entries: loaded }, `Successfully ingested ${loaded} chunks.`);

    return { collection, entries: loaded, replacedPrevious };
}
