import type { Section, SectionType } from "../../types/domain.js";
import type { SourceLine } from "../../types/extractedDocument.js";
import { HEADER_MAX_CHARS, HEADER_MAX_WORDS, SECTION_PATTERNS } from "./sectionPatterns.js";

/**
 * Splits extracted text into lines; each form feed advances the page counter.
 */
export function toSourceLines(text: string): SourceLine[] {
    const lines: SourceLine[] = [];
    const hasPages = text.includes("\f");

    text.split("\f").forEach((pageText, pageIndex) => {
        for (const line of pageText.split(/\r?\n/)) {
            lines.push(hasPages ? { text: line, page: pageIndex + 1 } : { text: line });
        }
    });

    return lines;
}

/** Header-shaped and matching one of the ordered patterns, or null. */
export function matchHeader(
    line: string,
    patterns: ReadonlyArray<readonly [SectionType, RegExp]> = SECTION_PATTERNS,
): SectionType | null {
    const trimmed = line.trim();
    const isHeaderShaped =
        trimmed.length < HEADER_MAX_CHARS && trimmed.split(/\s+/).length < HEADER_MAX_WORDS;
    if (!isHeaderShaped) return null;

    for (const [sectionType, pattern] of patterns) {
        if (pattern.test(trimmed)) return sectionType;
    }
    return null;
}

/**
 * Groups lines under the most recent recognised header.
 *
 * Text before the first header lands in a leading "other" section; a document without
 * any recognised header comes back as a single "other" section. Consecutive headers
 * produce empty-content sections, which callers may drop. Never throws.
 */
export class SectionSegmenter {
    name = "[SectionSegmenter]";

    constructor(private patterns: ReadonlyArray<readonly [SectionType, RegExp]> = SECTION_PATTERNS) {}

    segment(input: string | SourceLine[]): Section[] {
        const lines = typeof input === "string" ? toSourceLines(input) : input;
        const sections: Section[] = [];

        let currentType: SectionType = "other";
        let currentTitle: string | undefined;
        let content: string[] = [];
        let pageStart: number | undefined;
        let pageEnd: number | undefined;

        const flush = () => {
            const isPreamble = currentType === "other" && currentTitle === undefined;
            if (!isPreamble || content.length > 0) {
                const section: Section = {
                    sectionType: currentType,
                    content: content.join("\n").trim(),
                };
                if (currentTitle !== undefined) section.title = currentTitle;
                if (pageStart !== undefined) section.pageStart = pageStart;
                if (pageEnd !== undefined) section.pageEnd = pageEnd;
                sections.push(section);
            }
        };

        for (const line of lines) {
            const text = line.text.trim();
            if (!text) continue;

            const matched = matchHeader(text, this.patterns);
            if (matched) {
                flush();
                currentType = matched;
                currentTitle = text;
                content = [];
                pageStart = line.page;
                pageEnd = line.page;
            } else {
                content.push(text);
                pageStart ??= line.page;
                pageEnd = line.page ?? pageEnd;
            }
        }
        flush();

        if (sections.length === 0) {
            // Empty input still yields the catch-all section.
            sections.push({ sectionType: "other", content: "" });
        }

        return sections;
    }
}
