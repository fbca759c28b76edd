import type { KeyPhrase } from "../../types/domain.js";
import type { ILinguisticBackend } from "../../types/interfaces/pipeline.js";
import { extractNounPhrases } from "./nounPhrases.js";

/**
 * Frequency-ranked multi-word noun phrases.
 * Ties keep first-seen order (Map insertion order + stable sort).
 */
export class KeyPhraseExtractor {
    name = "[KeyPhraseExtractor]";

    constructor(private backend: ILinguisticBackend) {}

    extract(text: string, maxPhrases = 20): KeyPhrase[] {
        const scores = new Map<string, number>();

        for (const sentence of this.backend.splitSentences(text)) {
            for (const phrase of extractNounPhrases(this.backend, sentence.text)) {
                if (phrase.tokens.length < 2) continue;
                if (phrase.tokens.every((token) => this.backend.isStopWord(token))) continue;

                const key = phrase.text.toLowerCase();
                scores.set(key, (scores.get(key) ?? 0) + 1);
            }
        }

        return [...scores.entries()]
            .map(([phrase, score]) => ({ phrase, score }))
            .sort((a, b) => b.score - a.score)
            .slice(0, Math.max(0, maxPhrases));
    }
}
