import type { Logger } from "pino";
import type { ChunkCatalog, ChunkMetadata, Document, RawChunk } from "../corpus/types";
import { IdSequence } from "./idSequence";
import { segmentDocument, type SegmentOptions } from "./segmenter";

export interface MetadataEnricher {
    enrich(chunk: RawChunk): Promise<ChunkMetadata>;
}

export interface BuildCorpusOptions {
    enricher: MetadataEnricher;
    sequence?: IdSequence;
    segment?: SegmentOptions;
    logger?: Logger;
}

interface PlannedChunk {
    id: number;
    chunk: RawChunk;
}

function compareSourceIds(a: Document, b: Document): number {
    if (a.sourceId < b.sourceId) return -1;
    if (a.sourceId > b.sourceId) return 1;
    return 0;
}

/**
 * Segments and enriches every document into a catalog. Documents are numbered
 * in ordinal order of their source id, so an unchanged corpus always gets the
 * same ids. Ids are drawn before enrichment starts; completion order of the
 * enrichment calls cannot reorder them.
 */
export async function buildCorpus(documents: Document[], options: BuildCorpusOptions): Promise<ChunkCatalog> {
    const sequence = options.sequence ?? new IdSequence();
    const ordered = [...documents].sort(compareSourceIds);
    const planned: PlannedChunk[] = [];

    for (const document of ordered) {
        const chunks = segmentDocument(document, options.segment);
        options.logger?.info(
            { source: document.sourceId, chunks: chunks.length },
            `Segmented ${document.sourceId} into ${chunks.length} raw chunk${chunks.length === 1 ? "" : "s"}.`
        );

        for (const chunk of chunks) {
            planned.push({ id: sequence.next(), chunk });
        }
    }

    let completed = 0;
    const catalog = await Promise.all(
        planned.map(async ({ id, chunk }) => {
            const metadata = await options.enricher.enrich(chunk);
            completed += 1;
            options.logger?.debug({ id, source: chunk.documentSource }, `Enriched chunk ${completed}/${planned.length}.`);
            return {
                id,
                source: chunk.documentSource,
                text: chunk.text,
                ...metadata,
            };
        })
    );

    return catalog;
}
