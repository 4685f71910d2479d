export type ConversationRole = "user" | "assistant";

export interface ConversationTurn {
    role: ConversationRole;
    content: string;
}

export type ConversationHistory = readonly ConversationTurn[];

export interface ConversationView {
    history: ConversationHistory;
    sources: string;
}

/** Returns a new history with the question and its reply appended; the input is left untouched. */
export function appendExchange(history: ConversationHistory, question: string, answer: string): ConversationHistory {
    return [
        ...history,
        { role: "user", content: question },
        { role: "assistant", content: answer },
    ];
}

export function clearConversation(): ConversationView {
    return { history: [], sources: "" };
}
