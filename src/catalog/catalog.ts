import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { CHUNK_CATEGORIES, type ChunkCatalog } from "../corpus/types";
import { CatalogIntegrityError, errorMessage } from "../errors";

const enrichedChunkSchema = z.object({
    id: z.number().int().nonnegative(),
    source: z.string(),
    text: z.string(),
    title: z.string(),
    summary: z.string(),
    keywords: z.array(z.string()),
    category: z.enum(CHUNK_CATEGORIES),
    importance: z.number().int().min(1).max(10),
});

export const catalogSchema = z.array(enrichedChunkSchema);

/** Ids must be unique and run 0..n-1 in catalog order. */
export function assertCatalogIntegrity(catalog: ChunkCatalog): void {
    catalog.forEach((entry, index) => {
        if (entry.id !== index) {
            throw new CatalogIntegrityError(
                `Catalog entry at position ${index} has id ${entry.id}; ids must be unique and contiguous from 0.`
            );
        }
    });
}

export function parseCatalog(value: unknown): ChunkCatalog {
    const result = catalogSchema.safeParse(value);
    if (!result.success) {
        const issue = result.error.issues[0];
        const location = issue ? issue.path.join(".") : "";
        throw new CatalogIntegrityError(`Catalog does not match the chunk schema at "${location}": ${issue?.message ?? "invalid"}`);
    }

    assertCatalogIntegrity(result.data);
    return result.data;
}

export async function readCatalog(catalogPath: string): Promise<ChunkCatalog> {
    let raw: string;
    try {
        raw = await fs.readFile(catalogPath, "utf8");
    } catch (error) {
        const err = error as NodeJS.ErrnoException;
        if (err.code === "ENOENT") {
            throw new CatalogIntegrityError(`Chunk catalog not found at "${catalogPath}". Run the ingest command first.`);
        }
        throw error;
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new CatalogIntegrityError(`Chunk catalog at "${catalogPath}" is not valid JSON: ${errorMessage(error)}`);
    }

    return parseCatalog(parsed);
}

export async function writeCatalog(catalogPath: string, catalog: ChunkCatalog): Promise<void> {
    assertCatalogIntegrity(catalog);
    await fs.mkdir(path.dirname(catalogPath), { recursive: true });
    await fs.writeFile(catalogPath, `${JSON.stringify(catalog, null, 2)}\n`, "utf8");
}
