import { z } from "zod";
import indicatorData from "../../data/rhetoricalIndicators.json" with { type: "json" };
import {
    RHETORICAL_FUNCTIONS,
    SECTION_TYPES,
    type AnnotatedSentence,
    type RhetoricalFunction,
    type SectionType,
} from "../../types/domain.js";
import type { ILinguisticBackend } from "../../types/interfaces/pipeline.js";

const FunctionKey = z.enum(RHETORICAL_FUNCTIONS);
const Weights = z.record(FunctionKey, z.number());

export const IndicatorTableSchema = z.object({
    indicators: z.record(FunctionKey, z.array(z.string())),
    sectionPriors: z.record(z.enum(SECTION_TYPES), Weights),
    positionPriors: z.object({
        leadingFraction: z.number(),
        leading: Weights,
        trailingFraction: z.number(),
        trailing: Weights,
    }),
});

export type IndicatorTable = z.infer<typeof IndicatorTableSchema>;

export const DEFAULT_INDICATORS: IndicatorTable = IndicatorTableSchema.parse(indicatorData);

type ScoreVector = Record<(typeof RHETORICAL_FUNCTIONS)[number], number>;

function addWeights(scores: ScoreVector, weights: Partial<ScoreVector> | undefined): void {
    if (!weights) return;
    for (const fn of RHETORICAL_FUNCTIONS) {
        scores[fn] += weights[fn] ?? 0;
    }
}

/**
 * Scores one sentence against every rhetorical function and returns the argmax.
 * Each indicator phrase present in the sentence adds one unit.
 */
export function classifySentence(
    sentence: string,
    position: number,
    total: number,
    sectionHint?: SectionType,
    table: IndicatorTable = DEFAULT_INDICATORS,
): { function: RhetoricalFunction; confidence: number } {
    const lower = sentence.toLowerCase();
    const scores: ScoreVector = {
        background: 0,
        objective: 0,
        method: 0,
        result: 0,
        conclusion: 0,
        future_work: 0,
        limitation: 0,
    };

    for (const fn of RHETORICAL_FUNCTIONS) {
        for (const indicator of table.indicators[fn] ?? []) {
            if (lower.includes(indicator)) scores[fn] += 1;
        }
    }

    if (sectionHint) {
        addWeights(scores, table.sectionPriors[sectionHint]);
    }

    const relative = position / Math.max(total, 1);
    if (relative < table.positionPriors.leadingFraction) {
        addWeights(scores, table.positionPriors.leading);
    } else if (relative > table.positionPriors.trailingFraction) {
        addWeights(scores, table.positionPriors.trailing);
    }

    let best: RhetoricalFunction = "unknown";
    let max = 0;
    for (const fn of RHETORICAL_FUNCTIONS) {
        if (scores[fn] > max) {
            max = scores[fn];
            best = fn;
        }
    }

    if (max === 0) return { function: "unknown", confidence: 0 };
    return { function: best, confidence: Math.min(max / 3, 1) };
}

/**
 * Splits a block into sentences and labels each with its rhetorical function.
 * Pure function of (text, hint, table): no state is kept between calls.
 */
export class DiscourseSegmenter {
    name = "[DiscourseSegmenter]";

    constructor(
        private backend: ILinguisticBackend,
        private table: IndicatorTable = DEFAULT_INDICATORS,
    ) {}

    segment(text: string, sectionHint?: SectionType): AnnotatedSentence[] {
        const sentences = this.backend.splitSentences(text);

        return sentences.map((sentence, position) => ({
            text: sentence.text,
            ...classifySentence(sentence.text, position, sentences.length, sectionHint, this.table),
            position,
        }));
    }
}
