import type { TierName } from "../types/interfaces/pipeline.js";
import type { AcademicAnalysis } from "../types/zodSchemas.js";

function heading(title: string): string {
    return `${title}\n${"-".repeat(title.length)}`;
}

function bullets(items: readonly string[]): string {
    return items.length > 0 ? items.map((item) => `  - ${item}`).join("\n") : "  (none)";
}

/**
 * Plain-text report of an analysis: header, the nine analysis parts, then metadata.
 */
export function renderReport(analysis: AcademicAnalysis, tier?: TierName): string {
    const concepts = Object.entries(analysis.key_concepts).map(([concept, definition]) => `${concept}: ${definition}`);

    const header = [analysis.paper_title, "=".repeat(analysis.paper_title.length)];
    if (analysis.paper_doi) header.push(`DOI: ${analysis.paper_doi}`);

    const parts = [
        header.join("\n"),
        `${heading("1. Technical Summary")}\n${analysis.technical_summary}`,
        [
            heading("2. Research Problem"),
            `Problem: ${analysis.research_problem.problem_statement}`,
            `Relevance: ${analysis.research_problem.domain_relevance}`,
            `Constraints:\n${bullets(analysis.research_problem.constraints)}`,
        ].join("\n"),
        [
            heading("3. Methodology"),
            `Input data: ${analysis.methodology.input_data}`,
            `Techniques:\n${bullets(analysis.methodology.techniques)}`,
            `Pipeline: ${analysis.methodology.pipeline}`,
            `Evaluation: ${analysis.methodology.evaluation}`,
        ].join("\n"),
        `${heading("4. Main Contributions")}\n${bullets(analysis.main_contributions)}`,
        `${heading("5. Limitations")}\n${bullets(analysis.limitations)}`,
        `${heading("6. Key Concepts")}\n${bullets(concepts)}`,
        `${heading("7. Thematic Tags")}\n${analysis.thematic_tags.join(", ")}`,
        `${heading("8. State of the Art Positioning")}\n${analysis.sota_positioning}`,
        `${heading("9. Citation Summary")}\n${analysis.citation_summary}`,
        [
            heading("Metadata"),
            `Confidence: ${analysis.analysis_confidence}`,
            ...(tier ? [`Produced by: ${tier}`] : []),
            `Missing information:\n${bullets(analysis.missing_information)}`,
        ].join("\n"),
    ];

    return `${parts.join("\n\n")}\n`;
}
