import { Pool, type QueryResultRow } from "pg";
import type { Logger } from "pino";
import { z } from "zod";
import { CHUNK_CATEGORIES } from "../corpus/types";
import { EmbeddingDimensionError } from "../errors";
import { getLogger } from "../utils/logger";
import { batchChunks } from "../utils/batchChunks";
import { assertCollectionName } from "./collectionName";
import type { CollectionInfo, IndexEntry, IndexPayload, ScoredEntry, SimilarityMetric, VectorIndex } from "./types";

export interface SqlClient {
    query(text: string, values?: unknown[]): Promise<{ rows: QueryResultRow[] }>;
    end(): Promise<void>;
}

const UPSERT_BATCH_SIZE = 100;

const payloadSchema = z.object({
    source: z.string(),
    text: z.string(),
    title: z.string(),
    summary: z.string(),
    keywords: z.array(z.string()),
    category: z.enum(CHUNK_CATEGORIES),
    importance: z.number(),
});

const scoredRowSchema = z.object({
    id: z.coerce.number().int(),
    score: z.coerce.number(),
    payload: payloadSchema,
});

function toVectorLiteral(vector: number[]): string {
    return `[${vector.join(",")}]`;
}

function parseDimension(type: unknown): number | null {
    if (typeof type !== "string") {
        return null;
    }
    const match = /^vector\((\d+)\)$/.exec(type);
    return match ? Number.parseInt(match[1] ?? "", 10) : null;
}

/**
 * pgvector-backed index: one table per collection holding `id`, the
 * `embedding` vector and a `payload` jsonb copy of the catalog entry.
 * Search is exact (no ANN index), so ranking is stable within a generation.
 */
export class PostgresVectorIndex implements VectorIndex {
    protected readonly logger: Logger;

    constructor(protected readonly client: SqlClient, logger?: Logger) {
        this.logger = logger ?? getLogger();
    }

    async createCollection(name: string, dimension: number, metric: SimilarityMetric): Promise<void> {
        assertCollectionName(name);
        if (!Number.isInteger(dimension) || dimension <= 0) {
            throw new RangeError(`Collection dimension must be a positive integer, got ${dimension}.`);
        }

        await this.client.query("CREATE EXTENSION IF NOT EXISTS vector");
        await this.client.query(
            `CREATE TABLE ${name} (id integer PRIMARY KEY, embedding vector(${dimension}) NOT NULL, payload jsonb NOT NULL)`
        );
        this.logger.info({ collection: name, dimension, metric }, "Created vector collection.");
    }

    async deleteCollection(name: string): Promise<boolean> {
        assertCollectionName(name);
        const existing = await this.client.query("SELECT to_regclass($1) IS NOT NULL AS exists", [name]);
        if (existing.rows[0]?.exists !== true) {
            return false;
        }

        await this.client.query(`DROP TABLE IF EXISTS ${name}`);
        this.logger.info({ collection: name }, "Deleted vector collection.");
        return true;
    }

    async describeCollection(name: string): Promise<CollectionInfo | null> {
        assertCollectionName(name);
        const columns = await this.client.query(
            `SELECT format_type(a.atttypid, a.atttypmod) AS type
             FROM pg_attribute a
             WHERE a.attrelid = to_regclass($1) AND a.attname = 'embedding'`,
            [name]
        );
        const dimension = parseDimension(columns.rows[0]?.type);
        if (dimension === null) {
            return null;
        }

        const counted = await this.client.query(`SELECT count(*)::int AS count FROM ${name}`);
        return {
            name,
            dimension,
            metric: "cosine",
            count: Number(counted.rows[0]?.count ?? 0),
        };
    }

    async upsert(name: string, entries: IndexEntry[]): Promise<void> {
        const info = await this.requireCollection(name);
        for (const entry of entries) {
            if (entry.vector.length !== info.dimension) {
                throw new EmbeddingDimensionError(info.dimension, entry.vector.length, `entry ${entry.id} in "${name}"`);
            }
        }

        for (const batch of batchChunks(entries, UPSERT_BATCH_SIZE)) {
            const values: unknown[] = [];
            const placeholders = batch.map((entry) => {
                values.push(entry.id, toVectorLiteral(entry.vector), JSON.stringify(entry.payload));
                const base = values.length - 3;
                return `($${base + 1}, $${base + 2}::vector, $${base + 3}::jsonb)`;
            });

            await this.client.query(
                `INSERT INTO ${name} (id, embedding, payload) VALUES ${placeholders.join(", ")}
                 ON CONFLICT (id) DO UPDATE SET embedding = EXCLUDED.embedding, payload = EXCLUDED.payload`,
                values
            );
        }
    }

    async query(name: string, vector: number[], topK: number): Promise<ScoredEntry[]> {
        const info = await this.describeCollection(name);
        if (!info || info.count === 0) {
            return [];
        }
        if (vector.length !== info.dimension) {
            throw new EmbeddingDimensionError(info.dimension, vector.length, `query against "${name}"`);
        }

        const result = await this.client.query(
            `SELECT id, payload, 1 - (embedding <=> $1::vector) AS score
             FROM ${name}
             ORDER BY embedding <=> $1::vector ASC, id ASC
             LIMIT $2`,
            [toVectorLiteral(vector), topK]
        );

        return result.rows.map((row) => {
            const parsed = scoredRowSchema.parse(row);
            const payload: IndexPayload = parsed.payload;
            return { id: parsed.id, score: parsed.score, payload };
        });
    }

    async listIds(name: string): Promise<number[]> {
        await this.requireCollection(name);
        const result = await this.client.query(`SELECT id FROM ${name} ORDER BY id ASC`);
        return result.rows.map((row) => Number(row.id));
    }

    async close(): Promise<void> {
        await this.client.end();
    }

    private async requireCollection(name: string): Promise<CollectionInfo> {
        const info = await this.describeCollection(name);
        if (!info) {
            throw new Error(`Collection "${name}" does not exist.`);
        }
        return info;
    }
}

export function createPostgresIndex(databaseUrl: string, logger?: Logger): PostgresVectorIndex {
    const activeLogger = logger ?? getLogger();
    const pool = new Pool({
        connectionString: databaseUrl,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
    });

    pool.on("error", (err) => {
        activeLogger.error({ err }, "Unexpected error on idle PostgreSQL client");
    });

    return new PostgresVectorIndex(
        {
            query: (text, values) => pool.query(text, values),
            end: () => pool.end(),
        },
        activeLogger
    );
}
