/**
 * Per-page embedded text from a PDF, read with pdfjs-dist.
 */

export interface PdfTextReader {
    /** Embedded text of each page, in page order */
    readPages(pdf: Buffer): Promise<string[]>;
}

export class PdfjsTextReader implements PdfTextReader {
    async readPages(pdf: Buffer): Promise<string[]> {
        // Loaded on first use: pdfjs is large and only PDF ingestion needs it
        const pdfjs = await import('pdfjs-dist');

        const document = await pdfjs.getDocument({
            data: new Uint8Array(pdf),
            isEvalSupported: false,
            disableFontFace: true,
        }).promise;

        try {
            const pages: string[] = [];
            for (let pageNumber = 1; pageNumber <= document.numPages; pageNumber++) {
                const page = await document.getPage(pageNumber);
                const content = await page.getTextContent();

                let text = '';
                for (const item of content.items) {
                    if (!('str' in item)) {
                        continue;
                    }
                    text += item.str;
                    text += item.hasEOL ? '\n' : ' ';
                }
                pages.push(text.trim());
            }
            return pages;
        } finally {
            await document.destroy();
        }
    }
}

export function createPdfTextReader(): PdfjsTextReader {
    return new PdfjsTextReader();
}
