import { config as loadDotenv } from "dotenv";
import path from "node:path";
import { ConfigurationError } from "../errors";
import type { AppConfig, IndexBackend, LLMProviderName, LoggingConfig, ProviderLimitsConfig } from "./types";

const PACKAGE_ROOT = path.resolve(__dirname, "..", "..");

const PROVIDERS: readonly LLMProviderName[] = ["openai", "google", "anthropic", "mistral"];
const BACKENDS: readonly IndexBackend[] = ["postgres", "memory"];
const LOG_LEVELS: readonly LoggingConfig["level"][] = ["fatal", "error", "warn", "info", "debug", "trace"];

type Env = Record<string, string | undefined>;

function getEnv(env: Env, key: string, required = true): string | undefined {
    const value = env[key]?.trim();
    if (required && !value) {
        throw new ConfigurationError(`Missing required environment variable: ${key}`);
    }
    return value || undefined;
}

function getEnvNumber(env: Env, key: string): number | undefined;
function getEnvNumber(env: Env, key: string, defaultValue: number): number;
function getEnvNumber(env: Env, key: string, defaultValue?: number): number | undefined {
    const value = env[key];
    if (!value) {
        return defaultValue;
    }
    const parsed = Number.parseFloat(value);
    if (Number.isNaN(parsed)) {
        throw new ConfigurationError(`Environment variable ${key} must be a valid number, got: ${value}`);
    }
    return parsed;
}

function getEnvBoolean(env: Env, key: string, defaultValue = false): boolean {
    const value = env[key];
    if (!value) {
        return defaultValue;
    }
    const lowered = value.toLowerCase().trim();
    return lowered === "true" || lowered === "1" || lowered === "yes";
}

function getEnvChoice<T extends string>(env: Env, key: string, choices: readonly T[], defaultValue?: T): T {
    const value = getEnv(env, key, defaultValue === undefined)?.toLowerCase() ?? defaultValue;
    const match = choices.find((choice) => choice === value);
    if (!match) {
        throw new ConfigurationError(`Environment variable ${key} must be one of ${choices.join(", ")}, got: ${value}`);
    }
    return match;
}

function getLimits(env: Env, prefix: string): ProviderLimitsConfig {
    return {
        batchSize: getEnvNumber(env, `${prefix}_LIMITS_BATCH_SIZE`),
        concurrency: getEnvNumber(env, `${prefix}_LIMITS_CONCURRENCY`),
        maxRequestsPerMinute: getEnvNumber(env, `${prefix}_LIMITS_MAX_REQUESTS_PER_MINUTE`),
        maxTokensPerMinute: getEnvNumber(env, `${prefix}_LIMITS_MAX_TOKENS_PER_MINUTE`),
        retries: getEnvNumber(env, `${prefix}_LIMITS_RETRIES`),
    };
}

export function resolveConfigPath(providedPath?: string): string {
    if (providedPath) {
        return path.resolve(process.cwd(), providedPath);
    }

    if (process.env.ASSISTANT_CONFIG_PATH) {
        return path.resolve(process.cwd(), process.env.ASSISTANT_CONFIG_PATH);
    }

    return path.join(PACKAGE_ROOT, ".env");
}

export function buildAppConfig(env: Env): AppConfig {
    const indexBackend = getEnvChoice(env, "ASSISTANT_INDEX_BACKEND", BACKENDS, "postgres");
    const databaseUrl = getEnv(env, "ASSISTANT_INDEX_DATABASE_URL", false);

    if (indexBackend === "postgres" && !databaseUrl) {
        throw new ConfigurationError("The postgres index backend requires ASSISTANT_INDEX_DATABASE_URL.");
    }

    const config: AppConfig = {
        logging: {
            level: getEnvChoice(env, "ASSISTANT_LOGGING_LEVEL", LOG_LEVELS, "info"),
            pretty: getEnvBoolean(env, "ASSISTANT_LOGGING_PRETTY", true),
        },
        server: {
            port: getEnvNumber(env, "ASSISTANT_SERVER_PORT", 7860),
            maxBodySize: getEnv(env, "ASSISTANT_SERVER_MAX_BODY", false) ?? "1mb",
        },
        assistant: {
            companyName: getEnv(env, "ASSISTANT_COMPANY_NAME", false) ?? "our company",
            contact: getEnv(env, "ASSISTANT_CONTACT", false) ?? "our customer care team",
        },
        corpus: {
            dataDir: path.resolve(PACKAGE_ROOT, getEnv(env, "ASSISTANT_CORPUS_DATA_DIR", false) ?? "./data"),
            catalogPath: path.resolve(
                PACKAGE_ROOT,
                getEnv(env, "ASSISTANT_CORPUS_CATALOG_PATH", false) ?? "./data/catalog.json"
            ),
            chunkSize: getEnvNumber(env, "ASSISTANT_CORPUS_CHUNK_SIZE", 400),
            overlap: getEnvNumber(env, "ASSISTANT_CORPUS_OVERLAP", 50),
            minChunkChars: getEnvNumber(env, "ASSISTANT_CORPUS_MIN_CHUNK_CHARS", 50),
        },
        enrichment: {
            delayMs: getEnvNumber(env, "ASSISTANT_ENRICHMENT_DELAY_MS", 500),
            concurrency: getEnvNumber(env, "ASSISTANT_ENRICHMENT_CONCURRENCY", 1),
            maxOutputTokens: getEnvNumber(env, "ASSISTANT_ENRICHMENT_MAX_OUTPUT_TOKENS", 300),
        },
        index: {
            backend: indexBackend,
            databaseUrl,
            collection: getEnv(env, "ASSISTANT_INDEX_COLLECTION", false) ?? "homebuilder_rag",
            dimension: getEnvNumber(env, "ASSISTANT_INDEX_DIMENSION", 1536),
            upsertBatchSize: getEnvNumber(env, "ASSISTANT_INDEX_UPSERT_BATCH_SIZE", 100),
        },
        retrieval: {
            defaultTopK: getEnvNumber(env, "ASSISTANT_RETRIEVAL_DEFAULT_TOP_K", 3),
            maxTopK: getEnvNumber(env, "ASSISTANT_RETRIEVAL_MAX_TOP_K", 7),
        },
        llm: {
            embedding: {
                provider: getEnvChoice(env, "ASSISTANT_LLM_EMBEDDING_PROVIDER", PROVIDERS),
                model: getEnv(env, "ASSISTANT_LLM_EMBEDDING_MODEL") ?? "",
                apiKey: getEnv(env, "ASSISTANT_LLM_EMBEDDING_API_KEY", false),
                baseUrl: getEnv(env, "ASSISTANT_LLM_EMBEDDING_BASE_URL", false),
                limits: getLimits(env, "ASSISTANT_LLM_EMBEDDING"),
            },
            chat: {
                provider: getEnvChoice(env, "ASSISTANT_LLM_CHAT_PROVIDER", PROVIDERS),
                model: getEnv(env, "ASSISTANT_LLM_CHAT_MODEL") ?? "",
                apiKey: getEnv(env, "ASSISTANT_LLM_CHAT_API_KEY", false),
                baseUrl: getEnv(env, "ASSISTANT_LLM_CHAT_BASE_URL", false),
                temperature: getEnvNumber(env, "ASSISTANT_LLM_CHAT_TEMPERATURE", 0.2),
                maxOutputTokens: getEnvNumber(env, "ASSISTANT_LLM_CHAT_MAX_OUTPUT_TOKENS", 400),
                limits: getLimits(env, "ASSISTANT_LLM_CHAT"),
            },
        },
    };

    assertConfigConsistency(config);
    return config;
}

function assertConfigConsistency(config: AppConfig): void {
    const { chunkSize, overlap } = config.corpus;
    if (!Number.isInteger(chunkSize) || chunkSize <= 0 || !Number.isInteger(overlap) || overlap < 0) {
        throw new ConfigurationError(`Chunk size and overlap must be non-negative integers, got ${chunkSize}/${overlap}.`);
    }
    if (chunkSize <= overlap) {
        throw new ConfigurationError(`Chunk size (${chunkSize}) must be greater than overlap (${overlap}).`);
    }

    if (!/^\d+(\.\d+)?\s*(b|kb|mb|gb)?$/i.test(config.server.maxBodySize)) {
        throw new ConfigurationError(`Server max body size must look like "1mb" or "512kb", got: ${config.server.maxBodySize}`);
    }

    if (!Number.isInteger(config.index.dimension) || config.index.dimension <= 0) {
        throw new ConfigurationError(`Index dimension must be a positive integer, got ${config.index.dimension}.`);
    }

    if (!Number.isInteger(config.index.upsertBatchSize) || config.index.upsertBatchSize <= 0) {
        throw new ConfigurationError(`Index upsert batch size must be a positive integer, got ${config.index.upsertBatchSize}.`);
    }

    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(config.index.collection)) {
        throw new ConfigurationError(`Index collection "${config.index.collection}" must be a plain identifier.`);
    }

    const { defaultTopK, maxTopK } = config.retrieval;
    if (!Number.isInteger(defaultTopK) || defaultTopK < 1 || defaultTopK > maxTopK) {
        throw new ConfigurationError(`Default top-K (${defaultTopK}) must be an integer between 1 and ${maxTopK}.`);
    }

    if (config.llm.embedding.provider === "anthropic") {
        throw new ConfigurationError("Anthropic does not offer an embedding model; pick another embedding provider.");
    }
}

export async function loadAppConfig(configPath?: string): Promise<AppConfig> {
    const envPath = configPath ?? resolveConfigPath();
    const result = loadDotenv({ path: envPath });

    if (result.error) {
        // Only fail if an explicit path was provided, otherwise env vars may already be loaded
        if (configPath) {
            throw new ConfigurationError(`Failed to load environment file from "${configPath}": ${result.error.message}`);
        }
    }

    return buildAppConfig(process.env);
}
