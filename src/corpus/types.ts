export const CHUNK_CATEGORIES = ["BuildingProcess", "CostsFinance", "WhyUs", "FAQ", "General"] as const;

export type ChunkCategory = (typeof CHUNK_CATEGORIES)[number];

export const CATEGORY_LABELS: Record<ChunkCategory, string> = {
    BuildingProcess: "Building Process",
    CostsFinance: "Costs & Finance",
    WhyUs: "Why Us",
    FAQ: "FAQ",
    General: "General",
};

/** Plain text of one source file, as handed over by the extraction step. */
export interface Document {
    sourceId: string;
    rawText: string;
}

export interface RawChunk {
    documentSource: string;
    text: string;
    sequenceIndex: number;
}

export interface ChunkMetadata {
    title: string;
    summary: string;
    keywords: string[];
    category: ChunkCategory;
    importance: number;
}

export interface EnrichedChunk extends ChunkMetadata {
    id: number;
    source: string;
    text: string;
}

/** Ordered by id; ids are unique and contiguous from 0. */
export type ChunkCatalog = EnrichedChunk[];

function normalizeCategoryKey(value: string): string {
    return value.toLowerCase().replace(/[^a-z0-9]/g, "");
}

/**
 * Accepts either the enum value or its display label, ignoring case, spacing
 * and punctuation ("Costs & Finance", "costs_finance", "CostsFinance").
 */
export function parseCategory(value: string): ChunkCategory | undefined {
    const key = normalizeCategoryKey(value);
    return CHUNK_CATEGORIES.find(
        (category) => normalizeCategoryKey(category) === key || normalizeCategoryKey(CATEGORY_LABELS[category]) === key
    );
}
