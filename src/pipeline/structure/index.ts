export { SectionSegmenter, matchHeader, toSourceLines } from "./sectionSegmenter.js";
export { PaperStructurer, detectIdentifiers, extractTitle, parseAuthors, splitReferences } from "./paperStructurer.js";
export { SECTION_PATTERNS } from "./sectionPatterns.js";
