import { configureLogger, getLogger } from "../utils/logger";
import { createEmbeddingProvider } from "../llm/factory";
import { createVectorIndex } from "../database/client";
import { readCatalog } from "../catalog/catalog";
import { loadIndex } from "../ingest/indexLoader";
import { loadAppConfig } from "../config/loadConfig";
import { parseArgs, printHelp } from "./options";

async function main(): Promise<void> {
    const options = parseArgs(process.argv.slice(2));
    if (!options) {
        printHelp("load-index", "Rebuilds the vector collection from the chunk catalog.");
        return;
    }

    const config = await loadAppConfig(options.configPath);

    configureLogger(config.logging);
    const logger = getLogger();

    logger.info(`Loaded configuration from ${options.configPath}`);

    if (config.index.backend === "memory") {
        logger.warn("The memory index backend does not outlive this process; the server rebuilds it on start.");
    }

    const catalog = await readCatalog(config.corpus.catalogPath);
    logger.info({ catalogPath: config.corpus.catalogPath }, `Loaded ${catalog.length} catalog entries.`);

    const embedding = createEmbeddingProvider(config.llm.embedding, logger);
    const index = createVectorIndex(config.index, logger);

    try {
        const result = await loadIndex(catalog, {
            embedding,
            index,
            collection: config.index.collection,
            dimension: config.index.dimension,
            batchSize: config.index.upsertBatchSize,
            logger,
        });
        logger.info(
            { collection: result.collection, replacedPrevious: result.replacedPrevious },
            `Index rebuilt with ${result.entries} entries.`
        );
    } finally {
        await index.close();
    }
}

main().catch((error) => {
    const logger = getLogger();
    logger.error({ err: error }, "Index load failed.");
    process.exitCode = 1;
});
