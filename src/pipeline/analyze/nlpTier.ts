import {
    ENTITY_TYPES,
    type AnnotatedSentence,
    type KeyPhrase,
    type Paper,
    type ScientificEntity,
    type SectionType,
} from "../../types/domain.js";
import type { IAnalysisTier } from "../../types/interfaces/pipeline.js";
import type { AcademicAnalysis } from "../../types/zodSchemas.js";
import { deduplicateEntities, type NlpProcessor } from "../nlp/index.js";
import {
    DEEPER_ANALYSIS,
    LEXICON,
    NOT_SPECIFIED,
    TierFailureError,
    finalizeAnalysis,
    mentionsAny,
    missingInformation,
    sectionContent,
    thematicTags,
    uniqueStrings,
} from "./shared.js";

const ANALYZED_SECTIONS: readonly SectionType[] = ["abstract", "introduction", "methodology", "conclusion"];

const MAX_TECHNIQUES = 5;
const MAX_CONSTRAINTS = 3;
const MAX_PIPELINE_SENTENCES = 3;
const MAX_SOTA_SENTENCES = 2;
const CONCEPTS_PER_TYPE = 2;
const MAX_CONCEPTS = 10;
const MAX_KEY_PHRASE_CONCEPTS = 5;

interface SectionReading {
    sectionType: SectionType;
    discourse: AnnotatedSentence[];
    entities: ScientificEntity[];
    keyPhrases: KeyPhrase[];
}

function byConfidence(entities: ScientificEntity[]): ScientificEntity[] {
    return [...entities].sort((a, b) => b.confidence - a.confidence);
}

function entityTexts(entities: ScientificEntity[], entityType: ScientificEntity["entityType"]): string[] {
    return uniqueStrings(byConfidence(entities.filter((e) => e.entityType === entityType)).map((e) => e.text));
}

function firstMentioning(sentences: AnnotatedSentence[], keywords: readonly string[]): string | undefined {
    return sentences.find((s) => mentionsAny(s.text, keywords))?.text;
}

/** Top entities per type keyed by text, then the strongest key phrases not already present. */
export function buildKeyConcepts(entities: ScientificEntity[], keyPhrases: KeyPhrase[]): Record<string, string> {
    const concepts: Record<string, string> = {};
    let count = 0;

    for (const entityType of ENTITY_TYPES) {
        const top = byConfidence(entities.filter((e) => e.entityType === entityType)).slice(0, CONCEPTS_PER_TYPE);
        for (const entity of top) {
            if (count >= MAX_CONCEPTS) break;
            if (Object.hasOwn(concepts, entity.text)) continue;
            concepts[entity.text] = entity.context || DEEPER_ANALYSIS;
            count++;
        }
    }

    const present = new Set(Object.keys(concepts).map((key) => key.toLowerCase()));
    const phrases = keyPhrases.filter((kp) => !present.has(kp.phrase)).slice(0, MAX_KEY_PHRASE_CONCEPTS);
    for (const { phrase, score } of phrases) {
        concepts[phrase] = `Recurring phrase (${score} occurrence${score === 1 ? "" : "s"}).`;
    }
    return concepts;
}

/** Merges per-section key phrases, summing scores; ties keep first-seen order. */
function mergeKeyPhrases(readings: SectionReading[]): KeyPhrase[] {
    const scores = new Map<string, number>();
    for (const reading of readings) {
        for (const { phrase, score } of reading.keyPhrases) {
            scores.set(phrase, (scores.get(phrase) ?? 0) + score);
        }
    }
    return [...scores.entries()]
        .map(([phrase, score]) => ({ phrase, score }))
        .sort((a, b) => b.score - a.score);
}

/**
 * Local-NLP tier: discourse roles, typed entities and key phrases
 * from the abstract, introduction, methodology and conclusion, mapped field by field.
 */
export class NlpTier implements IAnalysisTier {
    name = "local-nlp" as const;

    constructor(private nlp: NlpProcessor) {}

    read(paper: Paper): SectionReading[] {
        return ANALYZED_SECTIONS.map((sectionType) => {
            const text = sectionType === "abstract" ? paper.abstract ?? "" : sectionContent(paper, sectionType);
            return { sectionType, ...this.nlp.process(text, sectionType) };
        });
    }

    async analyze(paper: Paper): Promise<AcademicAnalysis> {
        let readings: SectionReading[];
        try {
            readings = this.read(paper);
        } catch (error) {
            throw new TierFailureError(
                this.name,
                `NLP processing failed: ${error instanceof Error ? error.message : String(error)}`,
                { cause: error },
            );
        }
        return this.compose(paper, readings);
    }

    compose(paper: Paper, readings: SectionReading[]): AcademicAnalysis {
        const sentences = readings.flatMap((r) => r.discourse);
        const sentencesOf = (sectionType: SectionType) =>
            readings.find((r) => r.sectionType === sectionType)?.discourse ?? [];
        const entities = deduplicateEntities(readings.flatMap((r) => r.entities));

        const problem =
            sentences.find((s) => s.function === "objective")?.text ??
            sentencesOf("abstract")[0]?.text ??
            "Problem statement not explicitly identified in abstract.";

        const domainRelevance =
            sentences.find((s) => s.function === "background" && mentionsAny(s.text, LEXICON.importanceWords))?.text ??
            DEEPER_ANALYSIS;

        const techniques = entityTexts(entities, "method").slice(0, MAX_TECHNIQUES);
        const materials = entityTexts(entities, "material");
        const metrics = entityTexts(entities, "metric");

        const inputData =
            materials.length > 0
                ? materials.join(", ")
                : firstMentioning(sentences, LEXICON.dataKeywords) ?? NOT_SPECIFIED;
        const evaluation =
            metrics.length > 0
                ? metrics.join(", ")
                : firstMentioning(sentences, LEXICON.evaluationKeywords) ?? NOT_SPECIFIED;

        const contributions = sentences
            .filter((s) => s.function === "result" || s.function === "conclusion")
            .filter((s) => mentionsAny(s.text, LEXICON.claimIndicators))
            .map((s) => s.text);

        const limitations = sentences
            .filter((s) => s.function === "limitation" || mentionsAny(s.text, LEXICON.limitationKeywords))
            .map((s) => s.text);

        const constraints = uniqueStrings(
            sentences.filter((s) => mentionsAny(s.text, LEXICON.constraintKeywords)).map((s) => s.text),
        ).slice(0, MAX_CONSTRAINTS);

        const pipelineSentences = sentencesOf("methodology")
            .filter((s) => s.function === "method")
            .slice(0, MAX_PIPELINE_SENTENCES)
            .map((s) => s.text);

        const sotaSentences = uniqueStrings(
            sentences.filter((s) => mentionsAny(s.text, LEXICON.comparisonKeywords)).map((s) => s.text),
        ).slice(0, MAX_SOTA_SENTENCES);

        const taskTags = entityTexts(entities, "task").filter((text) => text.includes(" "));
        const lexiconTags = thematicTags(`${paper.title} ${paper.abstract ?? ""}`).filter(
            (tag) => tag !== LEXICON.defaultTag,
        );

        const approach = pipelineSentences[0] ?? (techniques.length > 0 ? `The approach relies on ${techniques.join(", ")}.` : "");
        const technicalSummary = [problem, approach, contributions[0] ?? ""].filter(Boolean).join(" ");
        const citationSummary = [
            `"${paper.title}" addresses the following problem: ${problem}`,
            techniques.length > 0 ? `Key techniques include ${techniques.join(", ")}.` : "",
        ]
            .filter(Boolean)
            .join(" ");

        const analysis = finalizeAnalysis(paper, {
            technical_summary: technicalSummary,
            research_problem: {
                problem_statement: problem,
                domain_relevance: domainRelevance,
                constraints: constraints.length > 0 ? constraints : [NOT_SPECIFIED],
            },
            methodology: {
                input_data: inputData,
                techniques: techniques.length > 0 ? techniques : [NOT_SPECIFIED],
                pipeline: pipelineSentences.length > 0 ? pipelineSentences.join(" ") : NOT_SPECIFIED,
                evaluation,
            },
            main_contributions: contributions,
            limitations,
            key_concepts: buildKeyConcepts(entities, mergeKeyPhrases(readings)),
            thematic_tags: [...lexiconTags, ...taskTags],
            sota_positioning: sotaSentences.length > 0 ? sotaSentences.join(" ") : DEEPER_ANALYSIS,
            citation_summary: citationSummary,
            analysis_confidence: "medium",
            missing_information: missingInformation(paper),
        });

        console.log(
            `[NlpTier] ${sentences.length} sentences, ${entities.length} entities, ${contributions.length} claimed contributions`,
        );
        return analysis;
    }
}
