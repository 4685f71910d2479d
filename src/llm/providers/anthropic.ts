import type { Logger } from "pino";
import { createAnthropic } from "@ai-sdk/anthropic";
import { generateText } from "ai";
import { BaseChatProvider } from "../base";
import type { ChatModelConfig } from "../../config/types";
import type { GenerateTextOptions } from "../types";
import { toCoreMessages } from "../messages";
import { resolveBaseUrl, mergeLimits } from "../../utils/providerUtils";

const ANTHROPIC_DEFAULT_BASE_URL = "https://api.anthropic.com/v1/";

export class AnthropicChatProvider extends BaseChatProvider {
    private readonly sdk: ReturnType<typeof createAnthropic>;

    constructor(config: ChatModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new Error("Anthropic API key is required for chat completions.");
        }

        super(
            config,
            mergeLimits(
                {
                    concurrency: 4,
                    maxRequestsPerMinute: 200,
                    maxTokensPerMinute: 200_000,
                    retries: 5,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createAnthropic({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, ANTHROPIC_DEFAULT_BASE_URL),
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
