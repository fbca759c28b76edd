import natural from "natural";
import { z } from "zod";
import abbreviationData from "../../data/abbreviations.json" with { type: "json" };
import type { ILinguisticBackend, SentenceSpan, TaggedToken } from "../../types/interfaces/pipeline.js";

/**
 * Maps tokenizer output back onto the text it came from.
 * Anything the tokenizer skipped (a trailing fragment without terminal punctuation,
 * a fragment broken by odd spacing) becomes its own span, so the spans cover every word.
 */
export function alignSentences(text: string, sentences: string[]): SentenceSpan[] {
    const spans: SentenceSpan[] = [];
    let cursor = 0;

    const pushGap = (from: number, to: number) => {
        const gap = text.slice(from, to);
        const trimmed = gap.trim();
        if (!trimmed) return;
        const start = from + gap.indexOf(trimmed);
        spans.push({ text: trimmed, start, end: start + trimmed.length });
    };

    for (const raw of sentences) {
        const sentence = raw.trim();
        if (!sentence) continue;

        const start = text.indexOf(sentence, cursor);
        if (start === -1) continue;

        pushGap(cursor, start);
        spans.push({ text: sentence, start, end: start + sentence.length });
        cursor = start + sentence.length;
    }

    pushGap(cursor, text.length);
    return spans;
}

/**
 * "continuing" abbreviations never end a sentence; "terminal" ones end it
 * unless the next span starts in lowercase, with a digit or with "(".
 */
export const AbbreviationTableSchema = z.object({
    continuing: z.array(z.string()),
    terminal: z.array(z.string()),
});

export type AbbreviationTable = z.infer<typeof AbbreviationTableSchema>;

export const DEFAULT_ABBREVIATIONS: AbbreviationTable = AbbreviationTableSchema.parse(abbreviationData);

function lastWord(sentence: string): string {
    const words = sentence.split(" ");
    return (words[words.length - 1] ?? "").toLowerCase().replace(/^[^a-z]+/, "");
}

/**
 * Rejoins spans the tokenizer cut after an abbreviation ("et al.", "Fig.", "e.g.").
 * Spans must come from `text`; merged spans take the original slice between them.
 */
export function mergeAbbreviationSpans(
    text: string,
    spans: SentenceSpan[],
    table: AbbreviationTable = DEFAULT_ABBREVIATIONS,
): SentenceSpan[] {
    const continuing = new Set(table.continuing);
    const terminal = new Set(table.terminal);
    const merged: SentenceSpan[] = [];

    for (const span of spans) {
        const previous = merged[merged.length - 1];
        const word = previous ? lastWord(previous.text) : "";
        const joins =
            continuing.has(word) || (terminal.has(word) && /^[a-z0-9(]/.test(span.text));

        if (previous && joins) {
            merged[merged.length - 1] = {
                text: text.slice(previous.start, span.end),
                start: previous.start,
                end: span.end,
            };
        } else {
            merged.push(span);
        }
    }
    return merged;
}

/** Collapses line breaks and runs of whitespace so sentences can span extracted lines. */
export function normalizeWhitespace(text: string): string {
    return text.replace(/\s+/g, " ").trim();
}

export class NaturalBackend implements ILinguisticBackend {
    name = "natural";
    private sentenceTokenizer = new natural.SentenceTokenizer();
    private wordTokenizer = new natural.WordTokenizer();
    private tagger: InstanceType<typeof natural.BrillPOSTagger>;
    private stopWords: Set<string>;

    constructor() {
        const lexicon = new natural.Lexicon("EN", "N", "NNP");
        const ruleSet = new natural.RuleSet("EN");
        this.tagger = new natural.BrillPOSTagger(lexicon, ruleSet);
        this.stopWords = new Set(natural.stopwords);
    }

    /** Offsets refer to the whitespace-normalized text. */
    splitSentences(text: string): SentenceSpan[] {
        const normalized = normalizeWhitespace(text);
        if (!normalized) return [];
        const spans = alignSentences(normalized, this.sentenceTokenizer.tokenize(normalized));
        return mergeAbbreviationSpans(normalized, spans);
    }

    tokenize(text: string): string[] {
        return this.wordTokenizer.tokenize(text) ?? [];
    }

    tag(tokens: string[]): TaggedToken[] {
        if (tokens.length === 0) return [];
        return this.tagger.tag(tokens).taggedWords.map((word) => ({
            token: word.token,
            tag: word.tag,
        }));
    }

    isStopWord(word: string): boolean {
        return this.stopWords.has(word.toLowerCase());
    }
}

let shared: Promise<ILinguisticBackend | null> | undefined;

/**
 * Loads the tokenizer / tagger once per process.
 * Resolves null when initialisation fails, which callers treat as "NLP unavailable".
 */
export function loadLinguisticBackend(): Promise<ILinguisticBackend | null> {
    if (!shared) {
        shared = Promise.resolve().then(() => {
            try {
                const backend = new NaturalBackend();
                console.log(`[NLP] Linguistic backend "${backend.name}" initialised`);
                return backend;
            } catch (error) {
                console.warn(`[NLP] Backend initialisation failed: ${error instanceof Error ? error.message : String(error)}`);
                return null;
            }
        });
    }
    return shared;
}
