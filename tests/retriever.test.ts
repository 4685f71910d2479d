import { describe, it } from "mocha";
import { expect } from "chai";

import { VectorRetriever } from "../src/query/retriever";
import { InMemoryVectorIndex } from "../src/database/memory";
import { loadIndex } from "../src/ingest/indexLoader";
import { ConfigurationError } from "../src/errors";
import { KeywordEmbeddingProvider, captureRejection, makeChunk } from "./helpers/fakes";

async function retrieverOver(chunkCount: number): Promise<VectorRetriever> {
    const embedding = new KeywordEmbeddingProvider();
    const index = new InMemoryVectorIndex();
    const catalog = [
        makeChunk(0, { title: "Finance", text: "Finance options and finance brokers." }),
        makeChunk(1, { title: "Deposit", text: "Deposit and finance approval." }),
    ].slice(0, chunkCount);
    await loadIndex(catalog, { embedding, index, collection: "rag", dimension: embedding.dimension });
    return new VectorRetriever({ embedding, index, collection: "rag" });
}

describe("vector retriever", () => {
    it("returns every entry, ranked, when top-K exceeds the index size", async () => {
        const retriever = await retrieverOver(2);

        const results = await retriever.retrieve({ text: "finance", topK: 3, wantSources: true });

        expect(results.map((result) => result.id)).to.deep.equal([0, 1]);
        expect(results[0]?.score).to.be.greaterThan(results[1]?.score ?? 1);
    });

    it("limits results to top-K", async () => {
        const retriever = await retrieverOver(2);
        const results = await retriever.retrieve({ text: "deposit", topK: 1, wantSources: false });
        expect(results.map((result) => result.id)).to.deep.equal([1]);
    });

    it("returns nothing when the collection has not been built", async () => {
        const retriever = new VectorRetriever({
            embedding: new KeywordEmbeddingProvider(),
            index: new InMemoryVectorIndex(),
            collection: "rag",
        });

        expect(await retriever.retrieve({ text: "finance", topK: 3, wantSources: true })).to.deep.equal([]);
    });

    it("rejects a top-K below one", async () => {
        const retriever = await retrieverOver(1);
        const error = await captureRejection(retriever.retrieve({ text: "finance", topK: 0, wantSources: true }));
        expect(error).to.be.instanceOf(ConfigurationError);
    });
});
