export interface LoggingConfig {
    level: "fatal" | "error" | "warn" | "info" | "debug" | "trace";
    pretty: boolean;
}

export interface ServerConfig {
    port: number;
    /** Largest accepted JSON body, in the `bytes` notation express takes ("1mb", "512kb"). */
    maxBodySize: string;
}

export interface AssistantConfig {
    companyName: string;
    contact: string; // Human channel named in refusals, e.g. a phone number or URL
}

export interface CorpusConfig {
    dataDir: string;
    catalogPath: string;
    chunkSize: number;
    overlap: number;
    minChunkChars: number;
}

export interface EnrichmentConfig {
    delayMs: number;
    concurrency: number;
    maxOutputTokens: number;
}

export type IndexBackend = "postgres" | "memory";

export interface IndexConfig {
    backend: IndexBackend;
    databaseUrl?: string;
    collection: string;
    dimension: number;
    upsertBatchSize: number;
}

export interface RetrievalConfig {
    defaultTopK: number;
    maxTopK: number;
}

export type LLMProviderName =
    | "openai"
    | "google"
    | "anthropic"
    | "mistral"

export interface ProviderLimitsConfig {
    batchSize?: number;
    concurrency?: number;
    maxRequestsPerMinute?: number;
    maxTokensPerMinute?: number;
    retries?: number;
}

interface BaseModelConfig {
    provider: LLMProviderName;
    apiKey?: string;
    baseUrl?: string;
    limits?: ProviderLimitsConfig;
}

export interface EmbeddingModelConfig extends BaseModelConfig {
    model: string;
}

export interface ChatModelConfig extends BaseModelConfig {
    model: string;
    maxOutputTokens?: number;
    temperature: number;
}

export interface LLMConfig {
    embedding: EmbeddingModelConfig;
    chat: ChatModelConfig;
}

export interface AppConfig {
    logging: LoggingConfig;
    server: ServerConfig;
    assistant: AssistantConfig;
    corpus: CorpusConfig;
    enrichment: EnrichmentConfig;
    index: IndexConfig;
    retrieval: RetrievalConfig;
    llm: LLMConfig;
}
