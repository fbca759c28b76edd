import { describe, expect, it, vi } from "vitest";
import { FakeBackend, FakeCompletionClient, makeAnalysisBody, makePaper } from "../../testing/fakes.js";
import { AcademicAnalysisSchema } from "../../types/zodSchemas.js";
import { NlpProcessor } from "../nlp/index.js";
import { AnalysisOrchestrator, createAnalysisOrchestrator } from "./orchestrator.js";

const paper = makePaper({
    title: "Fallthrough Paper",
    abstract: "We propose a speech model. It is evaluated on a dataset.",
    sections: [{ sectionType: "abstract", content: "We propose a speech model. It is evaluated on a dataset." }],
});

describe("AnalysisOrchestrator", () => {
    it("uses the remote model when it answers", async () => {
        const orchestrator = createAnalysisOrchestrator({
            completionClient: new FakeCompletionClient(async () => JSON.stringify(makeAnalysisBody())),
            nlp: new NlpProcessor(new FakeBackend()),
        });

        const outcome = await orchestrator.analyze(paper);

        expect(outcome.tier).toBe("remote-model");
        expect(outcome.failures).toEqual([]);
        expect(outcome.analysis.analysis_confidence).toBe("high");
    });

    it("falls through to the NLP tier when the remote call fails", async () => {
        const orchestrator = createAnalysisOrchestrator({
            completionClient: new FakeCompletionClient(async () => {
                throw new Error("invalid credential");
            }),
            nlp: new NlpProcessor(new FakeBackend()),
        });

        const outcome = await orchestrator.analyze(paper);

        expect(outcome.tier).toBe("local-nlp");
        expect(outcome.failures).toEqual([
            { tier: "remote-model", reason: "[remote-model] Completion request failed: invalid credential" },
        ]);
        expect(outcome.analysis.analysis_confidence).toBe("medium");
        expect(AcademicAnalysisSchema.safeParse(outcome.analysis).success).toBe(true);
    });

    it("falls through to templates when the reply is malformed and NLP is unavailable", async () => {
        const orchestrator = createAnalysisOrchestrator({
            completionClient: new FakeCompletionClient(async () => "not json"),
            nlp: null,
        });

        const outcome = await orchestrator.analyze(paper);

        expect(outcome.tier).toBe("template");
        expect(outcome.failures).toEqual([{ tier: "remote-model", reason: "[remote-model] Response is not valid JSON" }]);
        expect(outcome.analysis.analysis_confidence).toBe("low");
        expect(outcome.analysis.research_problem.problem_statement).toBe("We propose a speech model.");
    });

    it("starts at the local tiers without a completion client", () => {
        const orchestrator = createAnalysisOrchestrator({
            completionClient: null,
            nlp: new NlpProcessor(new FakeBackend()),
        });

        expect(orchestrator.tierNames).toEqual(["local-nlp", "template"]);
    });

    it("records the failure of every tier it tried", async () => {
        const failingTier = {
            name: "local-nlp" as const,
            analyze: vi.fn().mockRejectedValue(new Error("nlp exploded")),
        };
        const orchestrator = new AnalysisOrchestrator([failingTier]);

        const outcome = await orchestrator.analyze(paper);

        expect(failingTier.analyze).toHaveBeenCalledOnce();
        expect(outcome.tier).toBe("template");
        expect(outcome.failures).toEqual([{ tier: "local-nlp", reason: "nlp exploded" }]);
    });

    it("abandons only the remote call once the caller aborts", async () => {
        const client = new FakeCompletionClient(async () => JSON.stringify(makeAnalysisBody()));
        const orchestrator = createAnalysisOrchestrator({
            completionClient: client,
            nlp: new NlpProcessor(new FakeBackend()),
        });
        const controller = new AbortController();
        controller.abort();

        const outcome = await orchestrator.analyze(paper, { signal: controller.signal });

        expect(client.requests).toEqual([]);
        expect(outcome.tier).toBe("local-nlp");
        expect(outcome.analysis.analysis_confidence).toBe("medium");
        expect(outcome.failures).toEqual([
            {
                tier: "remote-model",
                reason: "[remote-model] Completion request failed: Remote analysis was aborted by the caller",
            },
        ]);
    });

    it("still answers from templates after an abort when NLP is unavailable", async () => {
        const client = new FakeCompletionClient(async () => JSON.stringify(makeAnalysisBody()));
        const orchestrator = createAnalysisOrchestrator({ completionClient: client, nlp: null });
        const controller = new AbortController();
        controller.abort();

        const outcome = await orchestrator.analyze(paper, { signal: controller.signal });

        expect(outcome.tier).toBe("template");
        expect(outcome.failures.map((f) => f.tier)).toEqual(["remote-model"]);
    });
});
