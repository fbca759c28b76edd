export const SECTION_TYPES = [
  "abstract",
  "introduction",
  "background",
  "methodology",
  "results",
  "discussion",
  "conclusion",
  "references",
  "acknowledgments",
  "appendix",
  "other",
] as const;

export type SectionType = (typeof SECTION_TYPES)[number];

export const ENTITY_TYPES = [
  "task",
  "method",
  "metric",
  "material",
  "concept",
  "tool",
] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

/** Declaration order doubles as the tie-break order when scores are equal. */
export const RHETORICAL_FUNCTIONS = [
  "background",
  "objective",
  "method",
  "result",
  "conclusion",
  "future_work",
  "limitation",
] as const;

export type RhetoricalFunction = (typeof RHETORICAL_FUNCTIONS)[number] | "unknown";

export interface Author {
  name: string;
  affiliation?: string;
  email?: string;
  orcid?: string;
}

export interface Section {
  sectionType: SectionType;
  title?: string; // raw header line that opened the section
  content: string;
  pageStart?: number;
  pageEnd?: number;
}

export interface PaperIdentifiers {
  doi?: string;
  arxivId?: string;
}

export interface Paper {
  title: string;
  authors: Author[];
  abstract?: string;
  sections: Section[];
  references: string[];
  identifiers: PaperIdentifiers;
  publicationDate?: string;
  sourceRef?: string;
  parserVersion: string;
  ingestedAt: string; // ISO-8601
}

export interface ScientificEntity {
  text: string;
  entityType: EntityType;
  context: string; // sentence containing the match
  confidence: number;
}

export interface AnnotatedSentence {
  text: string;
  function: RhetoricalFunction;
  confidence: number;
  position: number;
}

export interface KeyPhrase {
  phrase: string;
  score: number;
}
