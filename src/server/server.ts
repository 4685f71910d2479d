import type { Server } from "node:http";
import express, { type NextFunction, type Request, type Response } from "express";
import type { Logger } from "pino";
import { loadAppConfig } from "../config/loadConfig";
import type { AppConfig } from "../config/types";
import { childLogger, configureLogger, getLogger } from "../utils/logger";
import { createLLMClient } from "../llm/factory";
import type { LLMClientBundle } from "../llm/types";
import { assertCollectionDimension, createVectorIndex } from "../database/client";
import type { VectorIndex } from "../database/types";
import { readCatalog } from "../catalog/catalog";
import { loadIndex } from "../ingest/indexLoader";
import { errorMessage } from "../errors";
import { createApiRouter } from "./routers/api";
import { type ServerContext, createRouterContext } from "./utils/context";

export interface ServerOptions {
    configPath?: string;
    port?: number;
}

type ExpressApp = ReturnType<typeof express>;

export interface RunningServer {
    app: ExpressApp;
    port: number;
    close(): Promise<void>;
}

async function createContext(configPath?: string): Promise<ServerContext> {
    const config = await loadAppConfig(configPath);

    configureLogger(config.logging);
    const logger = getLogger();
    logger.info("Loaded server configuration.");

    const llm = createLLMClient(config.llm, logger);
    const index = createVectorIndex(config.index, logger);

    await prepareIndex(config, llm, index, logger);

    return { config, llm, index };
}

/**
 * Readies the index for queries. The memory backend is built from the catalog;
 * on postgres the stored collection must match the configured dimension. The
 * index is closed when preparation fails.
 */
export async function prepareIndex(config: AppConfig, llm: LLMClientBundle, index: VectorIndex, logger: Logger): Promise<void> {
    try {
        // The in-process backend starts empty, so it is filled from the catalog on boot.
        if (config.index.backend === "memory") {
            const catalog = await readCatalog(config.corpus.catalogPath);
            await loadIndex(catalog, {
                embedding: llm.embedding,
                index,
                collection: config.index.collection,
                dimension: config.index.dimension,
                batchSize: config.index.upsertBatchSize,
                logger,
            });
        } else {
            const info = await assertCollectionDimension(index, config.index.collection, config.index.dimension);
            if (!info) {
                logger.warn({ collection: config.index.collection }, "Collection does not exist yet; run load-index before asking questions.");
            }
        }
    } catch (error) {
        await index.close();
        throw error;
    }
}

function isPayloadTooLarge(error: unknown): boolean {
    return typeof error === "object" && error !== null && "type" in error && error.type === "entity.too.large";
}

function handleBodyErrors(logger: Logger, maxBodySize: string) {
    return (error: unknown, _req: Request, res: Response, next: NextFunction): void => {
        if (isPayloadTooLarge(error)) {
            logger.warn({ err: error, maxBodySize }, "Rejected oversized request body.");
            res.status(413).json({ status: "error", message: `Request body exceeds the ${maxBodySize} limit.` });
            return;
        }
        if (error instanceof SyntaxError) {
            logger.warn({ err: error }, "Rejected malformed JSON body.");
            res.status(400).json({ status: "error", message: `Malformed JSON body: ${errorMessage(error)}` });
            return;
        }
        next(error);
    };
}

export function createApp(context: ServerContext, logger: Logger = getLogger()): ExpressApp {
    const app = express();
    app.use(express.json({ limit: context.config.server.maxBodySize }));

    const queryLogger = childLogger(logger, { module: "query" });
    app.use(createApiRouter(createRouterContext(context, queryLogger), queryLogger));
    app.use(handleBodyErrors(logger, context.config.server.maxBodySize));

    return app;
}

export async function createServer(options: ServerOptions = {}): Promise<{ app: ExpressApp; context: ServerContext }> {
    const context = await createContext(options.configPath);
    return { app: createApp(context), context };
}

export async function listen(app: ExpressApp, port: number, onClose?: () => Promise<void>): Promise<RunningServer> {
    const server: Server = await new Promise((resolve, reject) => {
        const listener = app
            .listen(port, () => {
                listener.off("error", reject);
                resolve(listener);
            })
            .on("error", reject);
    });

    const address = server.address();
    const boundPort = address !== null && typeof address === "object" ? address.port : port;

    return {
        app,
        port: boundPort,
        close: async () => {
            await new Promise<void>((resolve, reject) => {
                server.close((error) => {
                    if (error) {
                        reject(error);
                    } else {
                        resolve();
                    }
                });
            });
            await onClose?.();
        },
    };
}

export async function startServer(options: ServerOptions = {}): Promise<RunningServer> {
    const { app, context } = await createServer(options);
    const logger = getLogger();
    const port = options.port ?? context.config.server.port;

    const running = await listen(app, port, () => context.index.close());
    logger.info({ port: running.port }, "Server listening.");

    return running;
}
