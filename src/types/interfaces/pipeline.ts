import type { Paper } from "../domain.js";
import type { ExtractedDocument } from "../extractedDocument.js";
import type { AcademicAnalysis } from "../zodSchemas.js";

/**
 * Generic pipeline step interface
 * Synchronous stages (structuring) and async ones (loading) share the shape
 */
export interface IPipelineStep<TInput, TOutput> {
    name: string;
    process(input: TInput): TOutput;
}

/**
 * Loads a source file into line-oriented text
 */
export interface IPaperLoader {
    load(filePath: string): Promise<ExtractedDocument>;
}

/**
 * Turns extracted text into the canonical structured paper
 */
export type IPaperStructurer = IPipelineStep<ExtractedDocument, Paper>;

export interface TierContext {
    signal?: AbortSignal;
}

/**
 * One strategy in the analysis chain.
 * A tier either resolves with a complete analysis or rejects; the orchestrator falls through on rejection.
 */
export interface IAnalysisTier {
    name: TierName;
    analyze(paper: Paper, context?: TierContext): Promise<AcademicAnalysis>;
}

export type TierName = "remote-model" | "local-nlp" | "template";

export interface CompletionRequest {
    system: string;
    prompt: string;
    signal?: AbortSignal;
}

/**
 * Contract with the external completion service.
 * Resolves with the raw text of the model's reply.
 */
export interface ICompletionClient {
    model: string;
    complete(request: CompletionRequest): Promise<string>;
}

export interface SentenceSpan {
    text: string;
    start: number;
    end: number;
}

export interface TaggedToken {
    token: string;
    tag: string;
}

/**
 * Tokenizer / tagger handle shared read-only across documents
 */
export interface ILinguisticBackend {
    name: string;
    splitSentences(text: string): SentenceSpan[];
    tokenize(text: string): string[];
    tag(tokens: string[]): TaggedToken[];
    isStopWord(word: string): boolean;
}
