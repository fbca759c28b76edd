import type { Paper } from "../../types/domain.js";
import type { IAnalysisTier } from "../../types/interfaces/pipeline.js";
import type { AcademicAnalysis } from "../../types/zodSchemas.js";
import {
    CONTRIBUTION_FILLERS,
    DEEPER_ANALYSIS,
    NOT_SPECIFIED,
    finalizeAnalysis,
    missingInformation,
    sectionContent,
    simpleSentences,
    thematicTags,
} from "./shared.js";

export function firstAbstractSentence(abstract: string | undefined): string | undefined {
    return simpleSentences(abstract ?? "")[0];
}

/**
 * Deterministic heuristics with no external dependency; always succeeds.
 */
export function buildTemplateAnalysis(paper: Paper): AcademicAnalysis {
    const abstract = paper.abstract ?? "";
    const methodology = sectionContent(paper, "methodology");
    const conclusion = sectionContent(paper, "conclusion");
    const whenMethodology = (text: string) => (methodology ? text : NOT_SPECIFIED);

    return finalizeAnalysis(paper, {
        technical_summary:
            `This paper, titled "${paper.title}", addresses a research problem in its domain. ` +
            `The proposed approach is described in the abstract and introduction sections. ${DEEPER_ANALYSIS}`,
        research_problem: {
            problem_statement:
                firstAbstractSentence(abstract) ?? "Problem statement not explicitly identified in abstract.",
            domain_relevance: DEEPER_ANALYSIS,
            constraints: [methodology ? DEEPER_ANALYSIS : "Methodology section not found"],
        },
        methodology: {
            input_data: whenMethodology(DEEPER_ANALYSIS),
            techniques: [whenMethodology(DEEPER_ANALYSIS)],
            pipeline: whenMethodology(DEEPER_ANALYSIS),
            evaluation: whenMethodology(DEEPER_ANALYSIS),
        },
        main_contributions: [...CONTRIBUTION_FILLERS],
        limitations: [conclusion ? DEEPER_ANALYSIS : "Conclusion section not found"],
        key_concepts: { "Concept Extraction": DEEPER_ANALYSIS },
        thematic_tags: thematicTags(`${paper.title} ${abstract}`),
        sota_positioning: DEEPER_ANALYSIS,
        citation_summary:
            `The work titled "${paper.title}" presents a research contribution in its domain. ${DEEPER_ANALYSIS}`,
        analysis_confidence: "low",
        missing_information: missingInformation(paper),
    });
}

export class TemplateTier implements IAnalysisTier {
    name = "template" as const;

    async analyze(paper: Paper): Promise<AcademicAnalysis> {
        return buildTemplateAnalysis(paper);
    }
}
