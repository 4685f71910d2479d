import type { ChatModelConfig, EmbeddingModelConfig } from "../config/types";

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
    role: ChatRole;
    content: string;
}

export interface GenerateTextOptions {
    messages: ChatMessage[];
    temperature?: number;
    maxTokens?: number;
}

export interface EmbeddingProvider {
    readonly config: EmbeddingModelConfig;
    embedDocuments(texts: string[]): Promise<number[][]>;
    embedQuery(query: string): Promise<number[]>;
}

export interface ChatProvider {
    readonly config: ChatModelConfig;
    generateText(options: GenerateTextOptions): Promise<string>;
}

export interface LLMClientBundle {
    embedding: EmbeddingProvider;
    chat: ChatProvider;
}
