import { configureLogger, getLogger } from "../utils/logger";
import { createChatProvider } from "../llm/factory";
import { runIngestionPipeline, type IngestionPipelineStats } from "../ingest/pipeline";
import { loadAppConfig } from "../config/loadConfig";
import { parseArgs, printHelp } from "./options";

function logStats(stats: IngestionPipelineStats): void {
    const logger = getLogger();
    logger.info(`Loaded documents: ${stats.loadedDocuments}`);
    logger.info(`Skipped documents: ${stats.skippedDocuments}`);
    logger.info(`Catalog chunks: ${stats.catalogChunks}`);
}

async function main(): Promise<void> {
    const options = parseArgs(process.argv.slice(2));
    if (!options) {
        printHelp("ingest", "Segments and enriches the documents in the data directory and writes the chunk catalog.");
        return;
    }

    const config = await loadAppConfig(options.configPath);

    configureLogger(config.logging);
    const logger = getLogger();

    logger.info(`Loaded configuration from ${options.configPath}`);

    const chat = createChatProvider(config.llm.chat, logger);

    logger.info("Starting ingestion pipeline.");

    const result = await runIngestionPipeline(config, chat, logger);

    logStats(result.stats);

    logger.info({ catalogPath: result.catalogPath }, "Ingestion pipeline completed.");
}

main().catch((error) => {
    const logger = getLogger();
    logger.error({ err: error }, "Ingestion pipeline failed.");
    process.exitCode = 1;
});
