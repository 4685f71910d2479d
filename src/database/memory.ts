import { EmbeddingDimensionError } from "../errors";
import { assertCollectionName } from "./collectionName";
import { compareScored, cosineSimilarity } from "./similarity";
import type { CollectionInfo, IndexEntry, IndexPayload, ScoredEntry, SimilarityMetric, VectorIndex } from "./types";

interface MemoryCollection {
    dimension: number;
    metric: SimilarityMetric;
    entries: Map<number, IndexEntry>;
}

function copyPayload(payload: IndexPayload): IndexPayload {
    return { ...payload, keywords: [...payload.keywords] };
}

/** Exact-search index held in process memory. Used for tests and single-process deployments. */
export class InMemoryVectorIndex implements VectorIndex {
    private readonly collections = new Map<string, MemoryCollection>();

    async createCollection(name: string, dimension: number, metric: SimilarityMetric): Promise<void> {
        assertCollectionName(name);
        if (this.collections.has(name)) {
            throw new Error(`Collection "${name}" already exists.`);
        }
        if (!Number.isInteger(dimension) || dimension <= 0) {
            throw new RangeError(`Collection dimension must be a positive integer, got ${dimension}.`);
        }
        this.collections.set(name, { dimension, metric, entries: new Map() });
    }

    async deleteCollection(name: string): Promise<boolean> {
        return this.collections.delete(name);
    }

    async describeCollection(name: string): Promise<CollectionInfo | null> {
        const collection = this.collections.get(name);
        if (!collection) {
            return null;
        }
        return {
            name,
            dimension: collection.dimension,
            metric: collection.metric,
            count: collection.entries.size,
        };
    }

    async upsert(name: string, entries: IndexEntry[]): Promise<void> {
        const collection = this.requireCollection(name);
        for (const entry of entries) {
            if (entry.vector.length !== collection.dimension) {
                throw new EmbeddingDimensionError(collection.dimension, entry.vector.length, `entry ${entry.id} in "${name}"`);
            }
        }
        for (const entry of entries) {
            collection.entries.set(entry.id, {
                id: entry.id,
                vector: [...entry.vector],
                payload: copyPayload(entry.payload),
            });
        }
    }

    async query(name: string, vector: number[], topK: number): Promise<ScoredEntry[]> {
        const collection = this.collections.get(name);
        if (!collection || collection.entries.size === 0) {
            return [];
        }
        if (vector.length !== collection.dimension) {
            throw new EmbeddingDimensionError(collection.dimension, vector.length, `query against "${name}"`);
        }

        return Array.from(collection.entries.values())
            .map((entry) => ({
                id: entry.id,
                score: cosineSimilarity(vector, entry.vector),
                payload: copyPayload(entry.payload),
            }))
            .sort(compareScored)
            .slice(0, Math.max(0, topK));
    }

    async listIds(name: string): Promise<number[]> {
        const collection = this.requireCollection(name);
        return Array.from(collection.entries.keys()).sort((a, b) => a - b);
    }

    async close(): Promise<void> {
        this.collections.clear();
    }

    private requireCollection(name: string): MemoryCollection {
        const collection = this.collections.get(name);
        if (!collection) {
            throw new Error(`Collection "${name}" does not exist.`);
        }
        return collection;
    }
}
