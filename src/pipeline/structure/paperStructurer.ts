import { config } from "../../config/index.js";
import type { Author, Paper, PaperIdentifiers, Section } from "../../types/domain.js";
import type { ExtractedDocument } from "../../types/extractedDocument.js";
import type { IPaperStructurer } from "../../types/interfaces/pipeline.js";
import { SectionSegmenter, toSourceLines } from "./sectionSegmenter.js";

const FRONT_MATTER_CHARS = 3000;
const DOI_PATTERN = /\b(10\.\d{4,9}\/[-._;()/:A-Z0-9]+[A-Z0-9])/i;
const ARXIV_PATTERN = /\barXiv:\s*(\d{4}\.\d{4,5}(?:v\d+)?)/i;
const REFERENCE_START = /^(?:\[\d+\]|\d+\.)\s+/;

export function extractTitle(document: ExtractedDocument): string {
    const hint = document.metadata?.title?.trim();
    if (hint && hint.toLowerCase() !== "untitled") {
        return hint;
    }

    const firstLine = toSourceLines(document.text)
        .map((line) => line.text.trim())
        .find((line) => line.length > 0);
    return firstLine ?? "Untitled Document";
}

export function parseAuthors(authorString: string | undefined): Author[] {
    if (!authorString) return [];
    return authorString
        .split(/[,;]|\sand\s/)
        .map((name) => name.trim())
        .filter((name) => name.length > 0)
        .map((name) => ({ name }));
}

export function detectIdentifiers(text: string): PaperIdentifiers {
    const frontMatter = text.slice(0, FRONT_MATTER_CHARS);
    const identifiers: PaperIdentifiers = {};

    const doi = DOI_PATTERN.exec(frontMatter)?.[1];
    if (doi) identifiers.doi = doi;

    const arxivId = ARXIV_PATTERN.exec(frontMatter)?.[1];
    if (arxivId) identifiers.arxivId = arxivId;

    return identifiers;
}

/**
 * Splits a references section into entries.
 * "[n]" or "n." opens an entry; any other line continues the current one.
 */
export function splitReferences(content: string): string[] {
    const entries: string[] = [];
    for (const line of content.split("\n")) {
        const text = line.trim();
        if (!text) continue;
        const last = entries.length - 1;
        if (REFERENCE_START.test(text) || last < 0) {
            entries.push(text);
        } else {
            entries[last] = `${entries[last]} ${text}`;
        }
    }
    return entries;
}

/**
 * Builds the canonical Paper from extracted text plus optional metadata hints.
 */
export class PaperStructurer implements IPaperStructurer {
    name = "[PaperStructurer]";

    constructor(
        private segmenter = new SectionSegmenter(),
        private parserVersion: string = config.parser.version,
        private now: () => Date = () => new Date(),
    ) {}

    process(document: ExtractedDocument): Paper {
        const allSections = this.segmenter.segment(document.text);

        // Headers with nothing under them are dropped; a paper always keeps at least one section.
        const withContent = allSections.filter((section) => section.content.length > 0);
        const sections: Section[] = withContent.length > 0 ? withContent : allSections.slice(0, 1);

        const abstract = sections.find((s) => s.sectionType === "abstract")?.content;
        const referenceSection = sections.find((s) => s.sectionType === "references");

        const paper: Paper = {
            title: extractTitle(document),
            authors: parseAuthors(document.metadata?.author),
            sections,
            references: referenceSection ? splitReferences(referenceSection.content) : [],
            identifiers: detectIdentifiers(document.text),
            parserVersion: this.parserVersion,
            ingestedAt: this.now().toISOString(),
        };
        if (abstract !== undefined) paper.abstract = abstract;
        if (document.metadata?.publicationDate) paper.publicationDate = document.metadata.publicationDate;
        if (document.sourceRef) paper.sourceRef = document.sourceRef;

        console.log(`${this.name} "${paper.title}": ${sections.length} sections, ${paper.references.length} references`);
        return paper;
    }
}
