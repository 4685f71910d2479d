import type { Logger } from "pino";
import { createMistral } from "@ai-sdk/mistral";
import { embedMany, generateText } from "ai";
import { BaseChatProvider, BaseEmbeddingProvider } from "../base";
import type { ChatModelConfig, EmbeddingModelConfig } from "../../config/types";
import type { GenerateTextOptions } from "../types";
import { toCoreMessages } from "../messages";
import { resolveBaseUrl, mergeLimits } from "../../utils/providerUtils";

const MISTRAL_DEFAULT_BASE_URL = "https://api.mistral.ai/v1/";

export class MistralEmbeddingProvider extends BaseEmbeddingProvider {
    private readonly sdk: ReturnType<typeof createMistral>;

    constructor(config: EmbeddingModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new Error("Mistral API key is required for embeddings.");
        }

        super(
            config,
            mergeLimits(
                {
                    batchSize: 64,
                    concurrency: 3,
                    maxRequestsPerMinute: 600,
                    maxTokensPerMinute: 1_000_000,
                    retries: 5,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createMistral({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, MISTRAL_DEFAULT_BASE_URL),
        });
    }

    protected async sendEmbeddingRequest(texts: string[]): Promise<number[][]> {
        const model = this.sdk.embedding(this.config.model);
        const { embeddings } = await embedMany({
            model,
            values: texts,
        });

        return embeddings;
    }
}

export class MistralChatProvider extends BaseChatProvider {
    private readonly sdk: ReturnType<typeof createMistral>;

    constructor(config: ChatModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new Error("Mistral API key is required for chat completions.");
        }

        super(
            config,
            mergeLimits(
                {
                    concurrency: 3,
                    maxRequestsPerMinute: 300,
                    maxTokensPerMinute: 500_000,
                    retries: 5,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createMistral({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, MISTRAL_DEFAULT_BASE_URL),
        });
    }

    protected async complete(options: GenerateTextOptions): Promise<string> {
        const { text } = await generateText({
            model: this.sdk(this.config.model),
            messages: toCoreMessages(options.messages),
            temperature: options.temperature ?? this.config.temperature,
            maxTokens: options.maxTokens ?? this.config.maxOutputTokens,
        });

        return text;
    }
}
