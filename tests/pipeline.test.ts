import { after, before, describe, it } from "mocha";
import { expect } from "chai";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { runIngestionPipeline } from "../src/ingest/pipeline";
import { UNSUPPORTED_REASON, loadDocuments } from "../src/ingest/documents";
import { readCatalog } from "../src/catalog/catalog";
import { ScriptedChatProvider, silentLogger } from "./helpers/fakes";
import { testConfig } from "./helpers/config";
import { buildTextPdf } from "./helpers/pdf";

const DISPLAY_TEXT = "Our display homes are open seven days a week for inspections.";
const SITE_TEXT = "Site start usually happens within eight weeks of finance approval.";
const HANDBOOK_TEXT = "Your site supervisor calls every Friday with a progress update.";

describe("ingestion pipeline", () => {
    let dataDir = "";

    before(async () => {
        dataDir = await fs.mkdtemp(path.join(os.tmpdir(), "ingest-test-"));
        await fs.writeFile(path.join(dataDir, "b.txt"), `\n${SITE_TEXT}\n`, "utf8");
        await fs.writeFile(path.join(dataDir, "a.md"), DISPLAY_TEXT, "utf8");
        await fs.writeFile(path.join(dataDir, "empty.txt"), "   \n", "utf8");
        await fs.writeFile(path.join(dataDir, "brochure.pdf"), "%PDF-1.4", "utf8");
        await fs.writeFile(path.join(dataDir, "handbook.pdf"), buildTextPdf([HANDBOOK_TEXT]));
        await fs.writeFile(path.join(dataDir, "notes.docx"), "binary", "utf8");
        await fs.writeFile(path.join(dataDir, ".DS_Store"), "", "utf8");
    });

    after(async () => {
        await fs.rm(dataDir, { recursive: true, force: true });
    });

    it("loads supported files in name order and reports the rest", async function () {
        this.timeout(10000);
        const { documents, skipped } = await loadDocuments(dataDir, { logger: silentLogger() });

        expect(documents).to.deep.equal([
            { sourceId: "a.md", rawText: DISPLAY_TEXT },
            { sourceId: "b.txt", rawText: SITE_TEXT },
            { sourceId: "handbook.pdf", rawText: HANDBOOK_TEXT },
        ]);
        expect(skipped.map((entry) => entry.sourceId)).to.deep.equal(["brochure.pdf", "empty.txt", "notes.docx"]);
        expect(skipped[0]?.reason).to.be.a("string").with.length.greaterThan(0);
        expect(skipped.slice(1)).to.deep.equal([
            { sourceId: "empty.txt", reason: "empty" },
            { sourceId: "notes.docx", reason: UNSUPPORTED_REASON },
        ]);
    });

    it("leaves excluded files out of both lists", async () => {
        const { skipped } = await loadDocuments(dataDir, {
            logger: silentLogger(),
            exclude: [path.join(dataDir, "notes.docx"), path.join(dataDir, "brochure.pdf")],
        });

        expect(skipped).to.deep.equal([{ sourceId: "empty.txt", reason: "empty" }]);
    });

    it("writes an enriched catalog even when every enrichment call fails", async function () {
        this.timeout(10000);
        const catalogPath = path.join(dataDir, "out", "catalog.json");
        const config = testConfig({
            ASSISTANT_CORPUS_DATA_DIR: dataDir,
            ASSISTANT_CORPUS_CATALOG_PATH: catalogPath,
            ASSISTANT_ENRICHMENT_DELAY_MS: "0",
        });
        const chat = new ScriptedChatProvider([
            new Error("quota exceeded"),
            new Error("quota exceeded"),
            new Error("quota exceeded"),
        ]);

        const result = await runIngestionPipeline(config, chat, silentLogger());

        expect(result.stats).to.deep.equal({ loadedDocuments: 3, skippedDocuments: 3, catalogChunks: 3 });
        expect(result.catalogPath).to.equal(catalogPath);
        expect(result.catalog.map((entry) => [entry.id, entry.source, entry.title])).to.deep.equal([
            [0, "a.md", "General Information"],
            [1, "b.txt", "General Information"],
            [2, "handbook.pdf", "General Information"],
        ]);
        expect(result.catalog[1]?.summary).to.equal(SITE_TEXT);
        expect(await readCatalog(catalogPath)).to.deep.equal(result.catalog);
    });
});
