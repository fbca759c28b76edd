import * as fs from "fs/promises";
import * as path from "path";
import { PDFParse } from "pdf-parse";
import { z } from "zod";
import type { ExtractedDocument } from "../types/extractedDocument.js";
import type { IPaperLoader } from "../types/interfaces/pipeline.js";

/** Separator pdf-parse puts between pages ("-- 3 of 12 --"). */
const PAGE_MARKER = /^[ \t]*-- \d+ of \d+ --[ \t]*$/gm;

const InfoField = z.string().optional().catch(undefined);

/** The document-information dictionary; anything malformed reads as absent. */
const PdfInfoSchema = z
    .object({
        info: z
            .object({ Title: InfoField, Author: InfoField, CreationDate: InfoField })
            .catch({}),
    })
    .catch({ info: {} });

/**
 * Replaces the page separators in extracted text with form feeds,
 * which the section segmenter reads as page breaks.
 */
export function markPageBreaks(text: string): string {
    return text.replace(PAGE_MARKER, "\f");
}

/** "D:20240301120000+01'00'" becomes "2024-03-01"; missing month or day is left off. */
export function pdfDateToIso(value: string | undefined): string | undefined {
    const match = value?.trim().match(/^(?:D:)?(\d{4})(\d{2})?(\d{2})?/);
    if (!match) return undefined;
    const [, year, month, day] = match;
    return [year, month, month ? day : undefined].filter(Boolean).join("-");
}

/** Reads title, author and creation date out of pdf-parse's info result. */
export function metadataFromInfo(result: unknown): ExtractedDocument["metadata"] {
    const { info } = PdfInfoSchema.parse(result);
    const metadata: NonNullable<ExtractedDocument["metadata"]> = {};

    const title = info.Title?.trim();
    const author = info.Author?.trim();
    const publicationDate = pdfDateToIso(info.CreationDate);
    if (title) metadata.title = title;
    if (author) metadata.author = author;
    if (publicationDate) metadata.publicationDate = publicationDate;

    return Object.keys(metadata).length > 0 ? metadata : undefined;
}

export class LocalPdfLoader implements IPaperLoader {
    async load(filePath: string): Promise<ExtractedDocument> {
        if (path.extname(filePath).toLowerCase() !== ".pdf") {
            throw new Error(`Not a PDF file: ${filePath}`);
        }

        const stat = await fs.stat(filePath).catch((error: unknown) => {
            throw new Error(`Paper not found: ${filePath}`, { cause: error });
        });
        if (!stat.isFile()) {
            throw new Error(`Not a file: ${filePath}`);
        }

        console.log(`[LocalPdfLoader] Parsing locally: ${path.basename(filePath)}`);
        const buffer = await fs.readFile(filePath);
        const parser = new PDFParse({ data: buffer });

        try {
            const result = await parser.getText();
            const info = await parser.getInfo().catch((error: unknown) => {
                console.warn(`[LocalPdfLoader] No document info: ${error instanceof Error ? error.message : String(error)}`);
                return undefined;
            });

            const text = markPageBreaks(result.text);
            const metadata = metadataFromInfo(info);
            console.log(`[LocalPdfLoader] Extracted ${text.length} characters`);

            const document: ExtractedDocument = { text, sourceRef: path.resolve(filePath) };
            if (metadata) document.metadata = metadata;
            return document;
        } finally {
            await parser.destroy();
        }
    }
}
