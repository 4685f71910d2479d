import type { Request, Response } from "express";
import type { Logger } from "pino";
import { errorMessage } from "../../errors";
import type { RouterContext } from "../utils/context";

export async function handleHealthRequest(
    _req: Request,
    res: Response,
    context: RouterContext,
    logger: Logger
): Promise<void> {
    const collection = context.config.index.collection;

    try {
        const info = await context.index.describeCollection(collection);
        res.json({ status: "ok", collection, entries: info?.count ?? 0 });
    } catch (error) {
        logger.error({ err: error }, "Health check failed.");
        res.status(503).json({ status: "error", message: errorMessage(error) });
    }
}
