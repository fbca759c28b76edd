import type { SectionType } from "../../types/domain.js";

/**
 * Whole-line header pattern: optional markdown hashes, optional arabic ("2", "2.1")
 * or roman ("IV") numbering, the header words, optional trailing ":" "." or "-".
 */
function header(alternatives: string[]): RegExp {
  return new RegExp(
    String.raw`^\s*(?:#{1,6}\s*)?(?:(?:\d+(?:\.\d+)*|[IVX]+)\.?\s*)?(?:${alternatives.join("|")})\s*[:.\-]?\s*$`,
    "i",
  );
}

/**
 * Checked in this order; the first match wins ("summary" is an abstract, not a conclusion).
 */
export const SECTION_PATTERNS: ReadonlyArray<readonly [SectionType, RegExp]> = [
  ["abstract", header(["abstract", "resumen", "summary", String.raw`executive\s+summary`])],
  [
    "introduction",
    header([
      "introduction",
      "introducci[oó]n",
      "background",
      "motivation",
      "overview",
      "preliminaries",
      String.raw`problem\s+statement`,
      "context",
    ]),
  ],
  [
    "methodology",
    header([
      "methodology",
      "methods?",
      String.raw`materials?\s+and\s+methods?`,
      String.raw`patients\s+and\s+methods?`,
      String.raw`experimental\s+setup`,
      "approach",
      "implementation",
      String.raw`system\s+design`,
      "architecture",
      String.raw`system\s+model`,
      String.raw`proposed\s+method`,
      "algorithm",
      "procedure",
      String.raw`study\s+design`,
      "participants?",
      "protocol",
    ]),
  ],
  [
    "results",
    header([
      "results?",
      "findings",
      String.raw`experimental\s+results?`,
      "experiments?",
      "evaluations?",
      "performance",
      "outcomes?",
      String.raw`simulation\s+results?`,
      String.raw`analysis\s+of\s+results`,
    ]),
  ],
  [
    "discussion",
    header([
      "discussion",
      "analysis",
      "interpretation",
      "limitations?",
      "implications?",
      String.raw`theoretical\s+framework`,
      String.raw`literature\s+review`,
      String.raw`related\s+works?`,
    ]),
  ],
  [
    "conclusion",
    header([
      "conclusions?",
      String.raw`concluding\s+remarks`,
      "summary",
      String.raw`future\s+work`,
      "recommendations?",
    ]),
  ],
  ["references", header(["references?", "bibliography", String.raw`works?\s+cited`, "sources?"])],
  ["acknowledgments", header(["acknowledge?ments?"])],
  ["appendix", header([String.raw`appendix(?:\s+[A-Z0-9])?`, String.raw`supplementary\s+materials?`])],
];

export const HEADER_MAX_CHARS = 80;
export const HEADER_MAX_WORDS = 10;
