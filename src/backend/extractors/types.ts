/**
 * Extractor contracts
 *
 * Every input kind (text PDF, scanned PDF, image, web page) is turned into an
 * ExtractedDocument: plain text per page or section, plus the citation
 * metadata the chunker copies onto each record.
 */

import { SourceType } from '../../shared/types';

export interface ExtractedSection {
    /** "Page 3" for PDFs, a short description otherwise */
    label: string;
    text: string;
}

export interface ExtractedDocument {
    source: string;
    sourceType: SourceType;
    title: string;
    sections: ExtractedSection[];
}

/**
 * Strategy interface: one implementation per input kind.
 */
export interface Extractor<TInput> {
    extract(input: TInput): Promise<ExtractedDocument>;
}

/**
 * Joins the sections of a document into the text that gets chunked.
 *
 * PDF pages are prefixed with a boundary marker so page numbers survive
 * chunking and show up in citations. Empty sections contribute nothing, so a
 * document with no text at all yields an empty string.
 */
export function documentText(document: ExtractedDocument): string {
    const parts: string[] = [];

    for (const section of document.sections) {
        const text = section.text.trim();
        if (!text) {
            continue;
        }
        parts.push(document.sourceType === 'pdf' ? `--- ${section.label} ---\n\n${text}` : text);
    }

    return parts.join('\n\n');
}
