import type { ILinguisticBackend, TaggedToken } from "../../types/interfaces/pipeline.js";

const NOUN_TAGS = new Set(["NN", "NNS", "NNP", "NNPS"]);
const MODIFIER_TAGS = new Set(["JJ", "JJR", "JJS", "CD", "VBG"]);

export interface NounPhrase {
    text: string;
    tokens: string[];
}

/**
 * Chunks a tagged token stream into noun phrases: maximal runs of modifiers and nouns,
 * trimmed back to end on a noun. Determiners are never part of a run.
 */
export function chunkNounPhrases(tagged: TaggedToken[]): NounPhrase[] {
    const phrases: NounPhrase[] = [];
    let run: TaggedToken[] = [];

    const flush = () => {
        let end = run.length;
        while (end > 0) {
            const last = run[end - 1];
            if (last && NOUN_TAGS.has(last.tag)) break;
            end--;
        }
        const tokens = run.slice(0, end).map((t) => t.token);
        if (tokens.length > 0) {
            phrases.push({ text: tokens.join(" "), tokens });
        }
        run = [];
    };

    for (const item of tagged) {
        if (NOUN_TAGS.has(item.tag) || MODIFIER_TAGS.has(item.tag)) {
            run.push(item);
        } else {
            flush();
        }
    }
    flush();

    return phrases;
}

/** Noun phrases of one sentence, in order of appearance. */
export function extractNounPhrases(backend: ILinguisticBackend, sentence: string): NounPhrase[] {
    return chunkNounPhrases(backend.tag(backend.tokenize(sentence)));
}
