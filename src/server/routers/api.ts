import { Router } from "express";
import type { Logger } from "pino";
import { handleChatRequest, handleClearRequest } from "../routes/chat";
import { handleHealthRequest } from "../routes/health";
import { handleSuggestionsRequest } from "../routes/suggestions";
import type { RouterContext } from "../utils/context";

export function createApiRouter(context: RouterContext, logger: Logger): Router {
    const router = Router();

    router.get("/health", async (req, res) => {
        await handleHealthRequest(req, res, context, logger);
    });

    router.get("/suggestions", (req, res) => {
        handleSuggestionsRequest(req, res, context);
    });

    router.post("/chat", async (req, res) => {
        await handleChatRequest(req, res, context, logger);
    });

    router.post("/chat/clear", (req, res) => {
        handleClearRequest(req, res);
    });

    return router;
}
