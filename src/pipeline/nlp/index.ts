import type { AnnotatedSentence, KeyPhrase, ScientificEntity, SectionType } from "../../types/domain.js";
import type { ILinguisticBackend } from "../../types/interfaces/pipeline.js";
import { DiscourseSegmenter } from "./discourse.js";
import { EntityMatcher } from "./entityMatcher.js";
import { KeyPhraseExtractor } from "./keyPhrases.js";

export interface NlpResult {
    entities: ScientificEntity[];
    discourse: AnnotatedSentence[];
    keyPhrases: KeyPhrase[];
}

/**
 * Unified entry point over entity matching, discourse segmentation and key phrases.
 * Holds only read-only handles, so one instance serves any number of documents.
 */
export class NlpProcessor {
    readonly entities: EntityMatcher;
    readonly segmenter: DiscourseSegmenter;
    readonly keyPhrases: KeyPhraseExtractor;

    constructor(readonly backend: ILinguisticBackend) {
        this.entities = new EntityMatcher(backend);
        this.segmenter = new DiscourseSegmenter(backend);
        this.keyPhrases = new KeyPhraseExtractor(backend);
    }

    process(text: string, sectionHint?: SectionType, maxPhrases = 20): NlpResult {
        return {
            entities: this.entities.extract(text),
            discourse: this.segmenter.segment(text, sectionHint),
            keyPhrases: this.keyPhrases.extract(text, maxPhrases),
        };
    }
}

export { loadLinguisticBackend, NaturalBackend } from "./backend.js";
export { DiscourseSegmenter, classifySentence } from "./discourse.js";
export { EntityMatcher, deduplicateEntities } from "./entityMatcher.js";
export { KeyPhraseExtractor } from "./keyPhrases.js";
