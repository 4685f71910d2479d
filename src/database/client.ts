import type { Logger } from "pino";
import type { IndexConfig } from "../config/types";
import { ConfigurationError, EmbeddingDimensionError } from "../errors";
import { InMemoryVectorIndex } from "./memory";
import { createPostgresIndex } from "./postgres";
import type { CollectionInfo, VectorIndex } from "./types";

export function createVectorIndex(config: IndexConfig, logger?: Logger): VectorIndex {
    switch (config.backend) {
        case "postgres":
            if (!config.databaseUrl) {
                throw new ConfigurationError("The postgres index backend requires a database URL.");
            }
            return createPostgresIndex(config.databaseUrl, logger);
        case "memory":
            return new InMemoryVectorIndex();
        default:
            throw new ConfigurationError(`Index backend "${config.backend}" is not supported.`);
    }
}

/**
 * Fails when an existing collection was built for another embedding
 * dimension. Returns `null` when the collection does not exist yet.
 */
export async function assertCollectionDimension(
    index: VectorIndex,
    collection: string,
    dimension: number
): Promise<CollectionInfo | null> {
    const info = await index.describeCollection(collection);
    if (info && info.dimension !== dimension) {
        throw new EmbeddingDimensionError(dimension, info.dimension, `collection "${collection}"`);
    }
    return info;
}
