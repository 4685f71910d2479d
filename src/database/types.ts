import type { ChunkCategory } from "../corpus/types";

export type SimilarityMetric = "cosine";

/** Denormalised copy of the catalog entry, stored beside the vector. */
export interface IndexPayload {
    source: string;
    text: string;
    title: string;
    summary: string;
    keywords: string[];
    category: ChunkCategory;
    importance: number;
}

export interface IndexEntry {
    id: number;
    vector: number[];
    payload: IndexPayload;
}

export interface ScoredEntry {
    id: number;
    score: number;
    payload: IndexPayload;
}

export interface CollectionInfo {
    name: string;
    dimension: number;
    metric: SimilarityMetric;
    count: number;
}

/**
 * Vector similarity index holding named collections. Implementations keep the
 * dimension fixed per collection and reject vectors of any other length.
 */
export interface VectorIndex {
    createCollection(name: string, dimension: number, metric: SimilarityMetric): Promise<void>;
    deleteCollection(name: string): Promise<boolean>;
    describeCollection(name: string): Promise<CollectionInfo | null>;
    upsert(name: string, entries: IndexEntry[]): Promise<void>;
    /** Ranked by descending score, ties by ascending id. Missing or empty collections yield []. */
    query(name: string, vector: number[], topK: number): Promise<ScoredEntry[]>;
    listIds(name: string): Promise<number[]>;
    close(): Promise<void>;
}
