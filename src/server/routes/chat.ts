import type { Request, Response } from "express";
import type { Logger } from "pino";
import { z } from "zod";
import { answerQuestion } from "../../query/answer";
import { clearConversation } from "../../conversation/history";
import type { RouterContext } from "../utils/context";

const turnSchema = z.object({
    role: z.enum(["user", "assistant"]),
    content: z.string(),
});

function chatRequestSchema(defaultTopK: number, maxTopK: number) {
    return z.object({
        question: z.string().trim().min(1, "Request body must include a non-empty 'question' field."),
        history: z.array(turnSchema).default([]),
        topK: z.number().int().min(1).max(maxTopK).default(defaultTopK),
        showSources: z.boolean().default(true),
    });
}

function describeIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
        .join("; ");
}

export async function handleChatRequest(
    req: Request,
    res: Response,
    context: RouterContext,
    logger: Logger
): Promise<void> {
    const { defaultTopK, maxTopK } = context.config.retrieval;
    const parsed = chatRequestSchema(defaultTopK, maxTopK).safeParse(req.body ?? {});

    if (!parsed.success) {
        res.status(400).json({ status: "error", message: describeIssues(parsed.error) });
        return;
    }

    const { question, history, topK, showSources } = parsed.data;

    const view = await answerQuestion(
        {
            retriever: context.retriever,
            chat: context.llm.chat,
            persona: context.config.assistant,
            maxTokens: context.config.llm.chat.maxOutputTokens,
            temperature: context.config.llm.chat.temperature,
            logger,
        },
        { text: question, topK, wantSources: showSources },
        history
    );

    res.json(view);
}

export function handleClearRequest(_req: Request, res: Response): void {
    res.json(clearConversation());
}
