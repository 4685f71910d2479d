import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { answerQuestion, formatSourceSummary } from "../src/query/answer";
import type { Retriever } from "../src/query/retriever";
import type { ScoredEntry } from "../src/database/types";
import type { ConversationHistory } from "../src/conversation/history";
import { ScriptedChatProvider, silentLogger } from "./helpers/fakes";

const persona = { companyName: "Harbour Homes", contact: "1800 000 000" };

const TIMELINE: ScoredEntry = {
    id: 0,
    score: 0.82,
    payload: {
        source: "timeline.txt",
        text: "Most homes take twelve months.",
        title: "Build Timeline",
        summary: "",
        keywords: [],
        category: "BuildingProcess",
        importance: 8,
    },
};

function retrieverReturning(entries: ScoredEntry[]): Retriever {
    return { retrieve: sinon.stub().resolves(entries) };
}

describe("answer composer", () => {
    const earlier: ConversationHistory = [
        { role: "user", content: "Hi" },
        { role: "assistant", content: "Hello! How can I help?" },
    ];

    it("refuses without calling the model when nothing is retrieved", async () => {
        const chat = new ScriptedChatProvider();

        const view = await answerQuestion(
            { retriever: retrieverReturning([]), chat, persona, logger: silentLogger() },
            { text: "Do you build in Antarctica?", topK: 3, wantSources: true },
            earlier
        );

        expect(chat.calls).to.have.length(0);
        expect(view).to.deep.equal({
            history: [
                ...earlier,
                { role: "user", content: "Do you build in Antarctica?" },
                { role: "assistant", content: "⚠️ No relevant information found. Please contact 1800 000 000." },
            ],
            sources: "",
        });
        expect(earlier).to.have.length(2);
    });

    it("grounds the model in the retrieved context", async () => {
        const chat = new ScriptedChatProvider(["  Around twelve months.  "]);

        const view = await answerQuestion(
            { retriever: retrieverReturning([TIMELINE]), chat, persona },
            { text: "How long does a build take?", topK: 3, wantSources: true },
            []
        );

        expect(chat.promptAt(0)).to.equal(
            [
                "You are a friendly and professional AI assistant for Harbour Homes.",
                "Answer the customer's question using ONLY the provided context.",
                "Be warm, helpful and concise. Use dot points where appropriate.",
                "If the answer is not in the context, say \"I don't have that information. Please contact 1800 000 000.\"",
                "",
                "CONTEXT:",
                "[Building Process] Build Timeline",
                "Most homes take twelve months.",
                "",
                "QUESTION:",
                "How long does a build take?",
                "",
                "ANSWER:",
            ].join("\n")
        );
        expect(chat.calls[0]?.maxTokens).to.equal(400);
        expect(chat.calls[0]?.temperature).to.equal(0.2);
        expect(view.history).to.deep.equal([
            { role: "user", content: "How long does a build take?" },
            { role: "assistant", content: "Around twelve months." },
        ]);
        expect(view.sources).to.equal("📄 **Build Timeline**\n📂 timeline.txt | 🏷️ Building Process | ⭐ 8/10");
    });

    it("joins several retrieved entries in rank order with a blank line between them", async () => {
        const deposit: ScoredEntry = {
            id: 4,
            score: 0.61,
            payload: {
                source: "costs.txt",
                text: "A 5% deposit secures your block.",
                title: "Deposit",
                summary: "",
                keywords: [],
                category: "CostsFinance",
                importance: 6,
            },
        };
        const chat = new ScriptedChatProvider(["Twelve months, with a 5% deposit."]);

        await answerQuestion(
            { retriever: retrieverReturning([TIMELINE, deposit]), chat, persona },
            { text: "How long and how much down?", topK: 2, wantSources: false },
            []
        );

        const prompt = chat.promptAt(0);
        const context = prompt.slice(prompt.indexOf("CONTEXT:\n"), prompt.indexOf("\n\nQUESTION:"));
        expect(context).to.equal(
            "CONTEXT:\n" +
                "[Building Process] Build Timeline\nMost homes take twelve months.\n\n" +
                "[Costs & Finance] Deposit\nA 5% deposit secures your block."
        );
    });

    it("omits sources unless asked for", async () => {
        const view = await answerQuestion(
            { retriever: retrieverReturning([TIMELINE]), chat: new ScriptedChatProvider(["Twelve months."]), persona },
            { text: "How long?", topK: 1, wantSources: false },
            []
        );

        expect(view.sources).to.equal("");
    });

    it("turns failures into an error turn", async () => {
        const retriever: Retriever = { retrieve: sinon.stub().rejects(new Error("index offline")) };

        const view = await answerQuestion(
            { retriever, chat: new ScriptedChatProvider(), persona, logger: silentLogger() },
            { text: "What finance options are available?", topK: 3, wantSources: true },
            earlier
        );

        expect(view.history.slice(2)).to.deep.equal([
            { role: "user", content: "What finance options are available?" },
            { role: "assistant", content: "❌ Error: index offline" },
        ]);
        expect(view.sources).to.equal("");
    });

    it("reports a failed model call the same way", async () => {
        const view = await answerQuestion(
            {
                retriever: retrieverReturning([TIMELINE]),
                chat: new ScriptedChatProvider([new Error("rate limited")]),
                persona,
                logger: silentLogger(),
            },
            { text: "How long?", topK: 1, wantSources: true },
            []
        );

        expect(view.history[1]).to.deep.equal({ role: "assistant", content: "❌ Error: rate limited" });
    });

    it("separates source blocks with a blank line", () => {
        const deposit: ScoredEntry = {
            id: 1,
            score: 0.5,
            payload: { ...TIMELINE.payload, source: "costs.txt", title: "Deposit", category: "CostsFinance", importance: 6 },
        };

        expect(formatSourceSummary([TIMELINE, deposit])).to.equal(
            "📄 **Build Timeline**\n📂 timeline.txt | 🏷️ Building Process | ⭐ 8/10\n\n" +
                "📄 **Deposit**\n📂 costs.txt | 🏷️ Costs & Finance | ⭐ 6/10"
        );
    });
});
