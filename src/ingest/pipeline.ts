import type { Logger } from "pino";
import type { AppConfig } from "../config/types";
import type { ChunkCatalog } from "../corpus/types";
import type { ChatProvider } from "../llm/types";
import { writeCatalog } from "../catalog/catalog";
import { childLogger, getLogger } from "../utils/logger";
import { buildCorpus } from "./corpusBuilder";
import { loadDocuments } from "./documents";
import { ChunkEnricher } from "./enricher";
import { IdSequence } from "./idSequence";

export interface IngestionPipelineStats {
    loadedDocuments: number;
    skippedDocuments: number;
    catalogChunks: number;
}

export interface IngestionPipelineResult {
    catalog: ChunkCatalog;
    catalogPath: string;
    stats: IngestionPipelineStats;
}

export async function runIngestionPipeline(
    appConfig: AppConfig,
    chat: ChatProvider,
    logger?: Logger
): Promise<IngestionPipelineResult> {
    const ingestionLogger = childLogger(logger ?? getLogger(), { module: "ingest" });
    const { corpus, enrichment, assistant } = appConfig;

    const { documents, skipped } = await loadDocuments(corpus.dataDir, {
        logger: ingestionLogger,
        exclude: [corpus.catalogPath],
    });
    ingestionLogger.info(`Processing ${documents.length} document${documents.length === 1 ? "" : "s"}.`);

    const enricher = new ChunkEnricher({
        chat,
        companyName: assistant.companyName,
        delayMs: enrichment.delayMs,
        concurrency: enrichment.concurrency,
        maxTokens: enrichment.maxOutputTokens,
        logger: ingestionLogger,
    });

    const catalog = await buildCorpus(documents, {
        enricher,
        sequence: new IdSequence(),
        segment: {
            chunkSize: corpus.chunkSize,
            overlap: corpus.overlap,
            minChunkChars: corpus.minChunkChars,
        },
        logger: ingestionLogger,
    });

    await writeCatalog(corpus.catalogPath, catalog);
    ingestionLogger.info({ catalogPath: corpus.catalogPath }, `Saved ${catalog.length} enriched chunks.`);

    return {
        catalog,
        catalogPath: corpus.catalogPath,
        stats: {
            loadedDocuments: documents.length,
            skippedDocuments: skipped.length,
            catalogChunks: catalog.length,
        },
    };
}
