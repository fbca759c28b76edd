/**
 * Output of the PDF-text-extraction collaborator.
 * Text is line-oriented; form feeds (\f) mark page boundaries when the extractor provides them.
 */
export interface ExtractedDocument {
    text: string;
    sourceRef?: string;
    metadata?: {
        title?: string;
        author?: string;
        publicationDate?: string;
    };
}

export interface SourceLine {
    text: string;
    page?: number;
}
