import { describe, it } from "mocha";
import { expect } from "chai";
import type { QueryResultRow } from "pg";

import { PostgresVectorIndex, type SqlClient } from "../src/database/postgres";
import type { IndexPayload } from "../src/database/types";
import { ConfigurationError, EmbeddingDimensionError } from "../src/errors";
import { captureRejection, silentLogger } from "./helpers/fakes";

interface Statement {
    text: string;
    values?: unknown[];
}

class RecordingSqlClient implements SqlClient {
    readonly statements: Statement[] = [];
    ended = false;

    constructor(private readonly respond: (text: string) => QueryResultRow[]) {}

    async query(text: string, values?: unknown[]): Promise<{ rows: QueryResultRow[] }> {
        this.statements.push({ text, values });
        return { rows: this.respond(text) };
    }

    async end(): Promise<void> {
        this.ended = true;
    }
}

const PAYLOAD: IndexPayload = {
    source: "costs.txt",
    text: "A 5% deposit secures your block.",
    title: "Deposit",
    summary: "Deposit terms.",
    keywords: ["deposit"],
    category: "CostsFinance",
    importance: 8,
};

function existingCollection(dimension: number, count: number, searchRows: QueryResultRow[] = []) {
    return (text: string): QueryResultRow[] => {
        if (text.includes("format_type")) return [{ type: `vector(${dimension})` }];
        if (text.includes("count(*)")) return [{ count }];
        if (text.includes("ORDER BY embedding")) return searchRows;
        return [];
    };
}

describe("postgres vector index", () => {
    it("runs an exact cosine search ordered by distance then id", async () => {
        const client = new RecordingSqlClient(
            existingCollection(3, 2, [{ id: "4", score: "0.9", payload: PAYLOAD }])
        );
        const index = new PostgresVectorIndex(client, silentLogger());

        const results = await index.query("homebuilder_rag", [1, 0, 0], 2);

        expect(results).to.deep.equal([{ id: 4, score: 0.9, payload: PAYLOAD }]);
        const search = client.statements[client.statements.length - 1];
        expect(search?.text).to.include("ORDER BY embedding <=> $1::vector ASC, id ASC");
        expect(search?.values).to.deep.equal(["[1,0,0]", 2]);
    });

    it("skips the search when the collection is missing", async () => {
        const client = new RecordingSqlClient(() => []);
        const index = new PostgresVectorIndex(client, silentLogger());

        expect(await index.query("homebuilder_rag", [1, 0, 0], 3)).to.deep.equal([]);
        expect(client.statements).to.have.length(1);
    });

    it("rejects query vectors of another dimension", async () => {
        const index = new PostgresVectorIndex(new RecordingSqlClient(existingCollection(3, 1)), silentLogger());
        expect(await captureRejection(index.query("homebuilder_rag", [1, 0], 1))).to.be.instanceOf(EmbeddingDimensionError);
    });

    it("upserts entries in one parameterised statement per batch", async () => {
        const client = new RecordingSqlClient(existingCollection(2, 0));
        const index = new PostgresVectorIndex(client, silentLogger());

        await index.upsert("homebuilder_rag", [
            { id: 0, vector: [1, 0], payload: PAYLOAD },
            { id: 1, vector: [0, 1], payload: PAYLOAD },
        ]);

        const insert = client.statements.find((statement) => statement.text.startsWith("INSERT INTO homebuilder_rag"));
        expect(insert?.text).to.include("VALUES ($1, $2::vector, $3::jsonb), ($4, $5::vector, $6::jsonb)");
        expect(insert?.values).to.deep.equal([0, "[1,0]", JSON.stringify(PAYLOAD), 1, "[0,1]", JSON.stringify(PAYLOAD)]);
    });

    it("creates the table with a fixed vector dimension", async () => {
        const client = new RecordingSqlClient(() => []);
        const index = new PostgresVectorIndex(client, silentLogger());

        await index.createCollection("homebuilder_rag", 1536, "cosine");

        expect(client.statements.map((statement) => statement.text)).to.deep.equal([
            "CREATE EXTENSION IF NOT EXISTS vector",
            "CREATE TABLE homebuilder_rag (id integer PRIMARY KEY, embedding vector(1536) NOT NULL, payload jsonb NOT NULL)",
        ]);
    });

    it("only drops tables that exist", async () => {
        const client = new RecordingSqlClient((text) => (text.includes("to_regclass") ? [{ exists: false }] : []));
        const index = new PostgresVectorIndex(client, silentLogger());

        expect(await index.deleteCollection("homebuilder_rag")).to.equal(false);
        expect(client.statements.some((statement) => statement.text.startsWith("DROP TABLE"))).to.equal(false);
    });

    it("refuses collection names that are not identifiers", async () => {
        const client = new RecordingSqlClient(() => []);
        const index = new PostgresVectorIndex(client, silentLogger());

        const error = await captureRejection(index.createCollection("rag; DROP TABLE users", 3, "cosine"));
        expect(error).to.be.instanceOf(ConfigurationError);
        expect(client.statements).to.have.length(0);
    });

    it("closes the underlying client", async () => {
        const client = new RecordingSqlClient(() => []);
        await new PostgresVectorIndex(client, silentLogger()).close();
        expect(client.ended).to.equal(true);
    });
});
