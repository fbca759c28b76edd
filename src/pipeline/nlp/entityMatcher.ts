import type { EntityType, ScientificEntity } from "../../types/domain.js";
import type { ILinguisticBackend, SentenceSpan } from "../../types/interfaces/pipeline.js";
import { normalizeWhitespace } from "./backend.js";
import { CONCEPT_CONFIDENCE, ENTITY_PATTERNS, PATTERN_CONFIDENCE } from "./entityPatterns.js";
import { extractNounPhrases } from "./nounPhrases.js";

function sentenceAt(sentences: SentenceSpan[], offset: number): string {
    const hit = sentences.find((s) => offset >= s.start && offset < s.end);
    return hit ? hit.text : "";
}

/**
 * Keeps one entity per (lowercased text, type), preferring higher confidence.
 * On equal confidence the first occurrence wins; output follows first-seen order.
 */
export function deduplicateEntities(entities: ScientificEntity[]): ScientificEntity[] {
    const seen = new Map<string, ScientificEntity>();
    for (const entity of entities) {
        const key = `${entity.entityType}\u0000${entity.text.toLowerCase()}`;
        const existing = seen.get(key);
        if (!existing || entity.confidence > existing.confidence) {
            seen.set(key, entity);
        }
    }
    return [...seen.values()];
}

/**
 * Scientific entity recognition: pattern tables for typed entities,
 * capitalised multi-word noun phrases as CONCEPT candidates.
 */
export class EntityMatcher {
    name = "[EntityMatcher]";

    constructor(
        private backend: ILinguisticBackend,
        private patterns: ReadonlyArray<readonly [EntityType, readonly RegExp[]]> = ENTITY_PATTERNS,
    ) {}

    extract(input: string): ScientificEntity[] {
        const text = normalizeWhitespace(input ?? "");
        if (!text) return [];

        try {
            const sentences = this.backend.splitSentences(text);
            const entities: ScientificEntity[] = [];

            for (const [entityType, regexes] of this.patterns) {
                for (const regex of regexes) {
                    for (const match of text.matchAll(regex)) {
                        entities.push({
                            text: match[0],
                            entityType,
                            context: sentenceAt(sentences, match.index ?? 0),
                            confidence: PATTERN_CONFIDENCE,
                        });
                    }
                }
            }

            for (const sentence of sentences) {
                for (const phrase of extractNounPhrases(this.backend, sentence.text)) {
                    const first = phrase.text.charAt(0);
                    if (phrase.tokens.length >= 2 && first !== first.toLowerCase()) {
                        entities.push({
                            text: phrase.text,
                            entityType: "concept",
                            context: sentence.text,
                            confidence: CONCEPT_CONFIDENCE,
                        });
                    }
                }
            }

            return deduplicateEntities(entities);
        } catch (error) {
            console.warn(`${this.name} Extraction failed, returning no entities: ${error instanceof Error ? error.message : String(error)}`);
            return [];
        }
    }
}
