import { describe, expect, it } from "vitest";
import { makePaper } from "../../testing/fakes.js";
import { CONTRIBUTION_FILLERS, DEEPER_ANALYSIS, NOT_SPECIFIED } from "./shared.js";
import { TemplateTier, buildTemplateAnalysis } from "./templateTier.js";

describe("buildTemplateAnalysis", () => {
    it("fills every field from the abstract and placeholders", () => {
        const paper = makePaper({
            title: "A Portable Speech Aid",
            abstract: "We build a speech aid. It helps users.",
            sections: [{ sectionType: "abstract", content: "We build a speech aid. It helps users." }],
        });

        const analysis = buildTemplateAnalysis(paper);

        expect(analysis.research_problem).toEqual({
            problem_statement: "We build a speech aid.",
            domain_relevance: DEEPER_ANALYSIS,
            constraints: ["Methodology section not found"],
        });
        expect(analysis.methodology).toEqual({
            input_data: NOT_SPECIFIED,
            techniques: [NOT_SPECIFIED],
            pipeline: NOT_SPECIFIED,
            evaluation: NOT_SPECIFIED,
        });
        expect(analysis.main_contributions).toEqual([...CONTRIBUTION_FILLERS]);
        expect(analysis.limitations).toEqual(["Conclusion section not found"]);
        expect(analysis.key_concepts).toEqual({ "Concept Extraction": DEEPER_ANALYSIS });
        expect(analysis.thematic_tags).toEqual(["Speech Processing", "Embedded Systems"]);
        expect(analysis.analysis_confidence).toBe("low");
        expect(analysis.missing_information).toEqual([
            "DOI",
            "Authors",
            "Publication date",
            "Methodology section",
            "Results section",
        ]);
    });

    it("uses the placeholder when methodology and conclusion exist", () => {
        const paper = makePaper({
            sections: [
                { sectionType: "methodology", content: "We do things." },
                { sectionType: "conclusion", content: "It worked." },
            ],
        });

        const analysis = buildTemplateAnalysis(paper);

        expect(analysis.research_problem.problem_statement).toBe(
            "Problem statement not explicitly identified in abstract.",
        );
        expect(analysis.research_problem.constraints).toEqual([DEEPER_ANALYSIS]);
        expect(analysis.methodology.techniques).toEqual([DEEPER_ANALYSIS]);
        expect(analysis.limitations).toEqual([DEEPER_ANALYSIS]);
        expect(analysis.thematic_tags).toEqual(["General Research"]);
    });

    it("succeeds on a paper with no content", async () => {
        const analysis = await new TemplateTier().analyze(makePaper({ title: "Untitled Document" }));

        expect(analysis.paper_title).toBe("Untitled Document");
        expect(analysis.main_contributions).toHaveLength(2);
    });
});
