import type { Logger } from "pino";
import { CATEGORY_LABELS } from "../corpus/types";
import type { ScoredEntry } from "../database/types";
import type { ChatProvider } from "../llm/types";
import { buildAnswerPrompt, formatContextBlock, type PromptPersona } from "../llm/prompt";
import { appendExchange, type ConversationHistory, type ConversationView } from "../conversation/history";
import { errorMessage } from "../errors";
import type { Query, Retriever } from "./retriever";

export const DEFAULT_ANSWER_MAX_TOKENS = 400;
export const DEFAULT_ANSWER_TEMPERATURE = 0.2;

export interface AnswerDependencies {
    retriever: Retriever;
    chat: ChatProvider;
    persona: PromptPersona;
    maxTokens?: number;
    temperature?: number;
    logger?: Logger;
}

export function refusalMessage(contact: string): string {
    return `⚠️ No relevant information found. Please contact ${contact}.`;
}

export function errorTurnMessage(error: unknown): string {
    return `❌ Error: ${errorMessage(error)}`;
}

export function formatSourceSummary(entries: ScoredEntry[]): string {
    return entries
        .map(({ payload }) =>
            `📄 **${payload.title}**\n📂 ${payload.source} | 🏷️ ${CATEGORY_LABELS[payload.category]} | ⭐ ${payload.importance}/10`
        )
        .join("\n\n");
}

/**
 * Answers one user turn. Always resolves with a well-formed history: an empty
 * retrieval produces the refusal turn without a model call, and any failure
 * becomes a visible error turn.
 */
export async function answerQuestion(
    deps: AnswerDependencies,
    query: Query,
    history: ConversationHistory
): Promise<ConversationView> {
    const { retriever, chat, persona, logger } = deps;

    try {
        const matches = await retriever.retrieve(query);

        if (matches.length === 0) {
            logger?.warn({ question: query.text }, "No similar chunks found for query.");
            return {
                history: appendExchange(history, query.text, refusalMessage(persona.contact)),
                sources: "",
            };
        }

        const prompt = buildAnswerPrompt(persona, formatContextBlock(matches), query.text);

        logger?.info({ matchCount: matches.length }, "Generating answer with retrieved context.");
        const answer = await chat.generateText({
            messages: [{ role: "user", content: prompt }],
            maxTokens: deps.maxTokens ?? DEFAULT_ANSWER_MAX_TOKENS,
            temperature: deps.temperature ?? DEFAULT_ANSWER_TEMPERATURE,
        });

        return {
            history: appendExchange(history, query.text, answer.trim()),
            sources: query.wantSources ? formatSourceSummary(matches) : "",
        };
    } catch (error) {
        logger?.error({ err: error, question: query.text }, "Answering failed.");
        return {
            history: appendExchange(history, query.text, errorTurnMessage(error)),
            sources: "",
        };
    }
}
