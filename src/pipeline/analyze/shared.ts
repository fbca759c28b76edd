import { z } from "zod";
import lexiconData from "../../data/analysisLexicon.json" with { type: "json" };
import type { Paper, SectionType } from "../../types/domain.js";
import type { TierName } from "../../types/interfaces/pipeline.js";
import type { AcademicAnalysis, AnalysisBody } from "../../types/zodSchemas.js";

export const AnalysisLexiconSchema = z.object({
    thematicTags: z.array(z.object({ tag: z.string(), keywords: z.array(z.string()) })),
    defaultTag: z.string(),
    importanceWords: z.array(z.string()),
    dataKeywords: z.array(z.string()),
    evaluationKeywords: z.array(z.string()),
    claimIndicators: z.array(z.string()),
    limitationKeywords: z.array(z.string()),
    constraintKeywords: z.array(z.string()),
    comparisonKeywords: z.array(z.string()),
});

export type AnalysisLexicon = z.infer<typeof AnalysisLexiconSchema>;

export const LEXICON: AnalysisLexicon = AnalysisLexiconSchema.parse(lexiconData);

export const DEEPER_ANALYSIS = "Requires deeper analysis.";
export const NOT_SPECIFIED = "Not explicitly specified in the paper.";

export const CONTRIBUTION_FILLERS = [
    "Further contributions could not be identified automatically; requires deeper analysis.",
    "Additional contribution details require deeper analysis of the full text.",
] as const;

export const MIN_CONTRIBUTIONS = 2;
export const MAX_CONTRIBUTIONS = 5;
export const MAX_LIMITATIONS = 5;

/**
 * Raised by a tier that cannot produce an analysis.
 * The orchestrator catches it and moves to the next tier.
 */
export class TierFailureError extends Error {
    constructor(
        public tier: TierName,
        public reason: string,
        options?: { cause?: unknown },
    ) {
        super(`[${tier}] ${reason}`, options);
        this.name = "TierFailureError";
    }
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Case-insensitive keyword test anchored at a word start ("limitation" matches "limitations"). */
export function mentions(text: string, keyword: string): boolean {
    return new RegExp(`\\b${escapeRegExp(keyword)}`, "i").test(text);
}

export function mentionsAny(text: string, keywords: readonly string[]): boolean {
    return keywords.some((keyword) => mentions(text, keyword));
}

/** Content of every section of the given type, in document order. */
export function sectionContent(paper: Paper, sectionType: SectionType): string {
    return paper.sections
        .filter((section) => section.sectionType === sectionType)
        .map((section) => section.content)
        .join("\n")
        .trim();
}

/** Dependency-free sentence split used where no linguistic backend is available. */
export function simpleSentences(text: string): string[] {
    return text
        .replace(/\s+/g, " ")
        .split(/(?<=[.!?])\s+/)
        .map((sentence) => sentence.trim())
        .filter((sentence) => sentence.length > 0);
}

export function thematicTags(text: string, lexicon: AnalysisLexicon = LEXICON): string[] {
    const tags = lexicon.thematicTags
        .filter((entry) => mentionsAny(text, entry.keywords))
        .map((entry) => entry.tag);
    return tags.length > 0 ? tags : [lexicon.defaultTag];
}

export function missingInformation(paper: Paper): string[] {
    const missing: string[] = [];
    if (!paper.abstract) missing.push("Abstract");
    if (!paper.identifiers.doi) missing.push("DOI");
    if (paper.authors.length === 0) missing.push("Authors");
    if (!paper.publicationDate) missing.push("Publication date");

    const types = new Set(paper.sections.map((section) => section.sectionType));
    if (!types.has("methodology")) missing.push("Methodology section");
    if (!types.has("results")) missing.push("Results section");
    return missing;
}

export function uniqueStrings(values: readonly string[]): string[] {
    const seen = new Set<string>();
    const result: string[] = [];
    for (const value of values) {
        const text = value.trim();
        const key = text.toLowerCase();
        if (!text || seen.has(key)) continue;
        seen.add(key);
        result.push(text);
    }
    return result;
}

/** Pads with fillers up to the minimum and truncates to the maximum. */
export function boundContributions(contributions: readonly string[]): string[] {
    const bounded = uniqueStrings(contributions).slice(0, MAX_CONTRIBUTIONS);
    for (const filler of CONTRIBUTION_FILLERS) {
        if (bounded.length >= MIN_CONTRIBUTIONS) break;
        if (!bounded.includes(filler)) bounded.push(filler);
    }
    return bounded;
}

/**
 * Stamps the paper reference onto a tier's output and enforces the invariants
 * every AcademicAnalysis carries, whichever tier produced it.
 */
export function finalizeAnalysis(paper: Paper, body: AnalysisBody): AcademicAnalysis {
    const keyConcepts: Record<string, string> = {};
    for (const [concept, definition] of Object.entries(body.key_concepts)) {
        const key = concept.trim();
        if (key && !Object.hasOwn(keyConcepts, key)) keyConcepts[key] = definition.trim();
    }

    const tags = uniqueStrings(body.thematic_tags);

    const analysis: AcademicAnalysis = {
        paper_title: paper.title,
        technical_summary: body.technical_summary.trim(),
        research_problem: {
            problem_statement: body.research_problem.problem_statement.trim(),
            domain_relevance: body.research_problem.domain_relevance.trim(),
            constraints: uniqueStrings(body.research_problem.constraints),
        },
        methodology: {
            input_data: body.methodology.input_data.trim(),
            techniques: uniqueStrings(body.methodology.techniques),
            pipeline: body.methodology.pipeline.trim(),
            evaluation: body.methodology.evaluation.trim(),
        },
        main_contributions: boundContributions(body.main_contributions),
        limitations: uniqueStrings(body.limitations).slice(0, MAX_LIMITATIONS),
        key_concepts: keyConcepts,
        thematic_tags: tags.length > 0 ? tags : [LEXICON.defaultTag],
        sota_positioning: body.sota_positioning.trim(),
        citation_summary: body.citation_summary.trim(),
        analysis_confidence: body.analysis_confidence,
        missing_information: uniqueStrings(body.missing_information),
    };
    if (paper.identifiers.doi) analysis.paper_doi = paper.identifiers.doi;
    return analysis;
}
