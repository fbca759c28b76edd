import { describe, expect, it } from "vitest";
import { finalizeAnalysis } from "../pipeline/analyze/shared.js";
import { makeAnalysisBody, makePaper } from "../testing/fakes.js";
import { renderReport } from "./render.js";

const heading = (title: string) => `${title}\n${"-".repeat(title.length)}`;

describe("renderReport", () => {
    const analysis = finalizeAnalysis(
        makePaper({ title: "Short Title", identifiers: { doi: "10.1234/r" } }),
        makeAnalysisBody({ limitations: [] }),
    );

    it("opens with the title, underline and DOI", () => {
        const lines = renderReport(analysis).split("\n");

        expect(lines.slice(0, 3)).toEqual(["Short Title", "===========", "DOI: 10.1234/r"]);
    });

    it("renders the nine parts in order", () => {
        const headings = renderReport(analysis)
            .split("\n")
            .filter((line) => /^\d\. /.test(line));

        expect(headings).toEqual([
            "1. Technical Summary",
            "2. Research Problem",
            "3. Methodology",
            "4. Main Contributions",
            "5. Limitations",
            "6. Key Concepts",
            "7. Thematic Tags",
            "8. State of the Art Positioning",
            "9. Citation Summary",
        ]);
    });

    it("lists items as bullets and marks empty lists", () => {
        const report = renderReport(analysis);

        expect(report).toContain(`${heading("4. Main Contributions")}\n  - First.\n  - Second.`);
        expect(report).toContain(`${heading("5. Limitations")}\n  (none)`);
        expect(report).toContain(`${heading("6. Key Concepts")}\n  - Concept: Definition.`);
    });

    it("names the producing tier in the metadata", () => {
        const report = renderReport(analysis, "remote-model");

        expect(report).toContain("Confidence: high\nProduced by: remote-model\nMissing information:\n  (none)\n");
    });
});
