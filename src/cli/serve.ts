import { getLogger } from "../utils/logger";
import { startServer } from "../server/server";
import { parseArgs, printHelp } from "./options";

async function main(): Promise<void> {
    const options = parseArgs(process.argv.slice(2));
    if (!options) {
        printHelp("serve", "Starts the customer assistant HTTP server.");
        return;
    }

    const running = await startServer({ configPath: options.configPath });

    const shutdown = (signal: NodeJS.Signals): void => {
        const logger = getLogger();
        logger.info({ signal }, "Shutting down server.");
        running.close().catch((error) => {
            logger.error({ err: error }, "Server shutdown failed.");
            process.exitCode = 1;
        });
    };

    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
}

main().catch((error) => {
    const logger = getLogger();
    logger.error({ err: error }, "Server failed to start.");
    process.exitCode = 1;
});
