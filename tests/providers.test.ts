import { describe, it } from "mocha";
import { expect } from "chai";

import { BaseChatProvider, BaseEmbeddingProvider } from "../src/llm/base";
import { createChatProvider, createEmbeddingProvider } from "../src/llm/factory";
import type { GenerateTextOptions } from "../src/llm/types";
import { mergeLimits, resolveBaseUrl } from "../src/utils/providerUtils";
import { ConfigurationError } from "../src/errors";
import { captureRejection, silentLogger } from "./helpers/fakes";

class LengthEmbeddingProvider extends BaseEmbeddingProvider {
    readonly batches: string[][] = [];
    dropOne = false;

    protected async sendEmbeddingRequest(texts: string[]): Promise<number[][]> {
        this.batches.push(texts);
        const vectors = texts.map((text) => [text.length]);
        return this.dropOne ? vectors.slice(1) : vectors;
    }
}

class FlakyChatProvider extends BaseChatProvider {
    attempts = 0;

    constructor(private readonly failures: number) {
        super({ provider: "openai", model: "gpt-4o-mini", temperature: 0.2 }, { retries: 1 }, silentLogger());
    }

    protected async complete(options: GenerateTextOptions): Promise<string> {
        this.attempts += 1;
        if (this.attempts <= this.failures) {
            throw new Error("temporarily unavailable");
        }
        return `echo: ${options.messages[0]?.content ?? ""}`;
    }
}

describe("provider plumbing", () => {
    it("keeps provider defaults for limits left unset", () => {
        expect(mergeLimits({ batchSize: 50, retries: 5 }, { retries: 2, concurrency: undefined })).to.deep.equal({
            batchSize: 50,
            retries: 2,
        });
        expect(mergeLimits({ retries: 5 })).to.deep.equal({ retries: 5 });
    });

    it("normalises base URLs to end with a slash", () => {
        expect(resolveBaseUrl("https://llm.internal.test/v1", "https://default.test/")).to.equal("https://llm.internal.test/v1/");
        expect(resolveBaseUrl(undefined, "https://default.test/")).to.equal("https://default.test/");
    });

    it("embeds in batches and returns vectors in input order", async () => {
        const provider = new LengthEmbeddingProvider(
            { provider: "openai", model: "text-embedding-3-small" },
            { batchSize: 2, concurrency: 2, retries: 0 }
        );

        const vectors = await provider.embedDocuments(["a", "bb", "ccc", "dddd", "eeeee"]);

        expect(vectors).to.deep.equal([[1], [2], [3], [4], [5]]);
        expect(provider.batches.map((batch) => batch.length)).to.deep.equal([2, 2, 1]);
        expect(await provider.embedDocuments([])).to.deep.equal([]);
    });

    it("rejects a response with fewer vectors than inputs", async () => {
        const provider = new LengthEmbeddingProvider(
            { provider: "openai", model: "text-embedding-3-small" },
            { batchSize: 2, retries: 0 }
        );
        provider.dropOne = true;

        const error = await captureRejection(provider.embedDocuments(["a", "bb"]));
        expect(error instanceof Error ? error.message : "").to.equal("openai:embed returned 1 embeddings for 2 inputs.");
    });

    it("retries a failed chat call", async function () {
        this.timeout(5000);
        const provider = new FlakyChatProvider(1);

        const reply = await provider.generateText({ messages: [{ role: "user", content: "ping" }] });

        expect(reply).to.equal("echo: ping");
        expect(provider.attempts).to.equal(2);
    });

    it("embeds a query as a single-item batch", async () => {
        const provider = new LengthEmbeddingProvider(
            { provider: "openai", model: "text-embedding-3-small" },
            { batchSize: 2, retries: 0 }
        );

        expect(await provider.embedQuery("deposit")).to.deep.equal([7]);
        expect(provider.batches).to.deep.equal([["deposit"]]);
    });

    it("builds the configured providers and refuses unsupported ones", () => {
        const chat = createChatProvider(
            { provider: "anthropic", model: "claude-3-5-haiku-latest", apiKey: "test-secret", temperature: 0.2 },
            silentLogger()
        );
        expect(chat.config.provider).to.equal("anthropic");

        expect(() =>
            createEmbeddingProvider({ provider: "anthropic", model: "none", apiKey: "test-secret" }, silentLogger())
        ).to.throw(ConfigurationError);
    });
});
