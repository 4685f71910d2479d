import pLimit from "p-limit";
import pRetry from "p-retry";
import Bottleneck from "bottleneck";
import type { Logger } from "pino";
import type { ChatModelConfig, EmbeddingModelConfig } from "../config/types";
import { createRateLimiter } from "../utils/rateLimiter";
import { batchChunks } from "../utils/batchChunks";
import { countTokens, countTokensInBatch } from "../utils/tokenEncoder";
import type { ChatProvider, EmbeddingProvider, GenerateTextOptions } from "./types";

export interface ProviderRateLimits {
    batchSize?: number;
    concurrency?: number;
    maxRequestsPerMinute?: number;
    maxTokensPerMinute?: number;
    retries?: number;
}

/**
 * Shared scheduling for provider calls: a request limiter (requests per
 * minute), an optional token limiter (tokens per minute) and retries.
 */
abstract class RateLimitedProvider {
    protected readonly concurrencyLimit: number;
    protected readonly retries: number;

    private readonly requestLimiter: Bottleneck;
    private readonly tokenLimiter?: Bottleneck;

    protected constructor(limits: ProviderRateLimits, protected readonly logger?: Logger) {
        this.retries = limits.retries ?? 5;
        this.concurrencyLimit = Math.max(1, limits.concurrency ?? 5);

        this.requestLimiter = createRateLimiter(this.concurrencyLimit, limits.maxRequestsPerMinute);

        if (limits.maxTokensPerMinute && Number.isFinite(limits.maxTokensPerMinute)) {
            const tokenConcurrency = Math.max(
                this.concurrencyLimit,
                Math.ceil(limits.maxTokensPerMinute)
            );
            this.tokenLimiter = createRateLimiter(tokenConcurrency, limits.maxTokensPerMinute);
        }
    }

    protected async scheduleWithRateLimits<T>(tokens: number, task: () => Promise<T>, logPrefix: string): Promise<T> {
        await this.reserveTokens(tokens);
        return this.requestLimiter.schedule(() =>
            pRetry(
                task,
                {
                    retries: this.retries,
                    onFailedAttempt: (error: pRetry.FailedAttemptError) => {
                        this.logger?.warn(
                            {
                                attemptNumber: error.attemptNumber,
                                retriesLeft: error.retriesLeft,
                                error: error.message,
                            },
                            `${logPrefix} failed attempt`
                        );
                    },
                }
            )
        );
    }

    private async reserveTokens(tokens: number): Promise<void> {
        if (!this.tokenLimiter || tokens <= 0) {
            return;
        }

        const weight = Math.max(1, Math.ceil(tokens));
        await this.tokenLimiter.schedule({ weight }, async () => undefined);
    }
}

export abstract class BaseEmbeddingProvider extends RateLimitedProvider implements EmbeddingProvider {
    protected readonly batchSize: number;

    constructor(
        public readonly config: EmbeddingModelConfig,
        limits: ProviderRateLimits,
        logger?: Logger
    ) {
        super(limits, logger);
        this.batchSize = limits.batchSize ?? 50;
    }

    async embedDocuments(texts: string[]): Promise<number[][]> {
        if (texts.length === 0) {
            return [];
        }

        const batches = batchChunks(texts, this.batchSize)
            .map((batch, idx) => ({
                idx, batch, tokens: countTokensInBatch(batch, this.config.model)
            }));

        const limit = pLimit(this.concurrencyLimit);
        const logPrefix = `${this.config.provider}:embed`;
        const results = await Promise.all(
            batches.map(({ batch, idx, tokens }) =>
                limit(async () => {
                    const embeddings = await this.scheduleWithRateLimits(tokens, () => this.sendEmbeddingRequest(batch), logPrefix);
                    if (embeddings.length !== batch.length) {
                        throw new Error(`${logPrefix} returned ${embeddings.length} embeddings for ${batch.length} inputs.`);
                    }
                    return { idx, embeddings };
                })
            )
        );

        const ordered = results.sort((a, b) => a.idx - b.idx);
        return ordered.flatMap((entry) => entry.embeddings);
    }

    async embedQuery(query: string): Promise<number[]> {
        const [embedding] = await this.embedDocuments([query]);
        if (!embedding) {
            throw new Error(`${this.config.provider}:embed returned no embedding for the query.`);
        }
        return embedding;
    }

    protected abstract sendEmbeddingRequest(texts: string[]): Promise<number[][]>;
}

export abstract class BaseChatProvider extends RateLimitedProvider implements ChatProvider {
    constructor(
        public readonly config: ChatModelConfig,
        limits: ProviderRateLimits,
        logger?: Logger
    ) {
        super(limits, logger);
    }

    async generateText(options: GenerateTextOptions): Promise<string> {
        const tokens = this.estimateChatTokens(options);
        return this.scheduleWithRateLimits(tokens, () => this.complete(options), `${this.config.provider}:chat`);
    }

    protected estimateChatTokens(options: GenerateTextOptions): number {
        const model = this.config.model;
        const promptTokens = options.messages.reduce((sum, message) => sum + countTokens(message.content, model), 0);
        return promptTokens + (options.maxTokens ?? this.config.maxOutputTokens ?? 2000);
    }

    protected abstract complete(options: GenerateTextOptions): Promise<string>;
}
