import { CATEGORY_LABELS, CHUNK_CATEGORIES } from "../corpus/types";
import type { ScoredEntry } from "../database/types";

export interface PromptPersona {
    companyName: string;
    contact: string;
}

export function buildEnrichmentPrompt(chunkText: string, companyName: string): string {
    const categories = CHUNK_CATEGORIES.map((category) => CATEGORY_LABELS[category]).join(", ");

    return [
        `You are an intelligent document analyst for ${companyName}.`,
        "Analyze the following text chunk and return a JSON object with these exact fields:",
        "- title: A short descriptive title (max 10 words)",
        "- summary: A concise summary (max 50 words)",
        "- keywords: A list of 5 important keywords",
        `- category: One of [${categories}]`,
        "- importance: A score from 1-10 indicating usefulness for customer queries",
        "",
        "Text chunk:",
        chunkText,
        "",
        "Respond ONLY with a valid JSON object. No explanation, no markdown, no extra text.",
    ].join("\n");
}

export function formatContextBlock(entries: ScoredEntry[]): string {
    return entries
        .map(({ payload }) => `[${CATEGORY_LABELS[payload.category]}] ${payload.title}\n${payload.text}`)
        .join("\n\n");
}

export function notInContextMessage(contact: string): string {
    return `I don't have that information. Please contact ${contact}.`;
}

export function buildAnswerPrompt(persona: PromptPersona, context: string, question: string): string {
    return [
        `You are a friendly and professional AI assistant for ${persona.companyName}.`,
        "Answer the customer's question using ONLY the provided context.",
        "Be warm, helpful and concise. Use dot points where appropriate.",
        `If the answer is not in the context, say "${notInContextMessage(persona.contact)}"`,
        "",
        "CONTEXT:",
        context,
        "",
        "QUESTION:",
        question,
        "",
        "ANSWER:",
    ].join("\n");
}
