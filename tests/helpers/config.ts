import { buildAppConfig } from "../../src/config/loadConfig";
import type { AppConfig } from "../../src/config/types";

export const BASE_ENV: Record<string, string> = {
    ASSISTANT_INDEX_BACKEND: "memory",
    ASSISTANT_LLM_EMBEDDING_PROVIDER: "openai",
    ASSISTANT_LLM_EMBEDDING_MODEL: "text-embedding-3-small",
    ASSISTANT_LLM_CHAT_PROVIDER: "openai",
    ASSISTANT_LLM_CHAT_MODEL: "gpt-4o-mini",
    ASSISTANT_LLM_CHAT_API_KEY: "test-secret",
};

export function testConfig(overrides: Record<string, string> = {}): AppConfig {
    return buildAppConfig({ ...BASE_ENV, ...overrides });
}
