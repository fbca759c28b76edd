import { describe, expect, it } from "vitest";
import { SectionSegmenter, matchHeader, toSourceLines } from "./sectionSegmenter.js";

describe("SectionSegmenter", () => {
    const segmenter = new SectionSegmenter();

    it("groups lines under recognised headers in document order", () => {
        const sections = segmenter.segment(
            "Abstract\nWe study X.\nIntroduction\nX is important.\nMethodology\nWe use Y.",
        );

        expect(sections).toEqual([
            { sectionType: "abstract", title: "Abstract", content: "We study X." },
            { sectionType: "introduction", title: "Introduction", content: "X is important." },
            { sectionType: "methodology", title: "Methodology", content: "We use Y." },
        ]);
    });

    it("returns a single other section when no header matches", () => {
        const sections = segmenter.segment("Some text.\nMore text here.");

        expect(sections).toEqual([{ sectionType: "other", content: "Some text.\nMore text here." }]);
    });

    it("returns one empty other section for empty input", () => {
        expect(segmenter.segment("")).toEqual([{ sectionType: "other", content: "" }]);
        expect(segmenter.segment("   \n\n")).toEqual([{ sectionType: "other", content: "" }]);
    });

    it("keeps text before the first header as a leading other section", () => {
        const sections = segmenter.segment("A Paper Title\nJane Doe\nAbstract\nBody.");

        expect(sections.map((s) => s.sectionType)).toEqual(["other", "abstract"]);
        expect(sections[0]?.content).toBe("A Paper Title\nJane Doe");
    });

    it("matches headers case-insensitively", () => {
        const upper = segmenter.segment("ABSTRACT\nText.");
        const lower = segmenter.segment("abstract\nText.");

        expect(upper[0]?.sectionType).toBe("abstract");
        expect(lower[0]?.sectionType).toBe("abstract");
    });

    it("tolerates arabic and roman numbering and trailing punctuation", () => {
        const sections = segmenter.segment(
            "1. Introduction\nA.\nII. Related Work\nB.\n3.1 Materials and Methods:\nC.\n## Conclusions\nD.",
        );

        expect(sections.map((s) => s.sectionType)).toEqual([
            "introduction",
            "discussion",
            "methodology",
            "conclusion",
        ]);
    });

    it("recognises cross-lingual synonyms", () => {
        expect(segmenter.segment("Resumen\nTexto.")[0]?.sectionType).toBe("abstract");
        expect(segmenter.segment("Introducción\nTexto.")[0]?.sectionType).toBe("introduction");
    });

    it("keeps empty sections produced by consecutive headers", () => {
        const sections = segmenter.segment("Abstract\nIntroduction\nText.");

        expect(sections).toEqual([
            { sectionType: "abstract", title: "Abstract", content: "" },
            { sectionType: "introduction", title: "Introduction", content: "Text." },
        ]);
    });

    it("does not treat a long sentence mentioning a header word as a header", () => {
        const sections = segmenter.segment(
            "Abstract\nThe results of this study are discussed in the conclusion of the paper below.",
        );

        expect(sections).toHaveLength(1);
        expect(sections[0]?.sectionType).toBe("abstract");
    });

    it("reproduces every non-blank non-header line in its section contents", () => {
        const text = "Title\n\nAbstract\n  First line.  \nSecond line.\n\nResults\nThird line.";
        const sections = segmenter.segment(text);
        const contentLines = sections.flatMap((s) => (s.content ? s.content.split("\n") : []));

        expect(contentLines).toEqual(["Title", "First line.", "Second line.", "Third line."]);
    });

    it("tracks page ranges across form feeds", () => {
        const sections = segmenter.segment("Abstract\nOne.\fTwo.\nIntroduction\fThree.");

        expect(sections).toEqual([
            { sectionType: "abstract", title: "Abstract", content: "One.\nTwo.", pageStart: 1, pageEnd: 2 },
            { sectionType: "introduction", title: "Introduction", content: "Three.", pageStart: 2, pageEnd: 3 },
        ]);
    });
});

describe("matchHeader", () => {
    it("prefers the earlier pattern when two would match", () => {
        expect(matchHeader("Summary")).toBe("abstract");
    });

    it("returns null for lines that are not header-shaped", () => {
        expect(matchHeader("one two three four five six seven eight nine ten results")).toBeNull();
    });
});

describe("toSourceLines", () => {
    it("omits page numbers when the text has no form feeds", () => {
        expect(toSourceLines("a\nb")).toEqual([{ text: "a" }, { text: "b" }]);
    });

    it("numbers pages from one", () => {
        expect(toSourceLines("a\fb")).toEqual([
            { text: "a", page: 1 },
            { text: "b", page: 2 },
        ]);
    });
});
