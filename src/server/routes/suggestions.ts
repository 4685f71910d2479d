import type { Request, Response } from "express";
import type { RouterContext } from "../utils/context";

export function quickQuestions(companyName: string): string[] {
    return [
        `What is the building process at ${companyName}?`,
        "What are the costs involved in building?",
        `Why should I choose ${companyName}?`,
        "What options are available for first home buyers?",
        `How long does it take to build a ${companyName} home?`,
        "What finance options are available?",
    ];
}

export function handleSuggestionsRequest(_req: Request, res: Response, context: RouterContext): void {
    res.json({ suggestions: quickQuestions(context.config.assistant.companyName) });
}
