/**
 * PDF extraction with OCR fallback.
 *
 * Embedded text is used where a page has enough of it. Pages below the
 * threshold are treated as scans: rendered, enhanced with the text profile
 * and run through OCR. A page that cannot be recovered contributes empty
 * text and the rest of the document still goes through.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { ExtractionError, toError } from '../errors';
import { createLogger, errorFields } from '../utils/logger';
import { ImageEnhancer } from './imageEnhancer';
import { OcrEngine } from './ocrEngine';
import { PageRasterizer } from './pdfRasterizer';
import { PdfTextReader } from './pdfTextReader';
import { ExtractedDocument, ExtractedSection, Extractor } from './types';

const log = createLogger('pdf-extractor');

export interface PdfExtractorOptions {
    /** Pages whose trimmed text is shorter than this are OCR'd */
    minTextLength: number;
    dpi: number;
}

export interface PdfExtractorDeps {
    textReader: PdfTextReader;
    rasterizer: PageRasterizer;
    enhancer: ImageEnhancer;
    ocr: OcrEngine;
}

export class PdfExtractor implements Extractor<string> {
    constructor(
        private readonly deps: PdfExtractorDeps,
        private readonly options: PdfExtractorOptions
    ) {}

    async extract(filePath: string): Promise<ExtractedDocument> {
        let pdf: Buffer;
        let pages: string[];
        try {
            pdf = await fs.readFile(filePath);
            pages = await this.deps.textReader.readPages(pdf);
        } catch (error) {
            throw new ExtractionError(
                `Failed to read PDF ${filePath}: ${toError(error).message}`,
                filePath,
                toError(error)
            );
        }

        const sections: ExtractedSection[] = [];
        let ocrPages = 0;

        for (const [index, embedded] of pages.entries()) {
            const pageNumber = index + 1;
            let text = embedded.trim();

            if (text.length < this.options.minTextLength) {
                ocrPages++;
                text = await this.recognizePage(pdf, pageNumber, filePath);
            }

            sections.push({ label: `Page ${pageNumber}`, text });
        }

        log.info('pdf_extracted', { source: filePath, pages: pages.length, ocrPages });

        return {
            source: filePath,
            sourceType: 'pdf',
            title: path.basename(filePath),
            sections,
        };
    }

    private async recognizePage(pdf: Buffer, pageNumber: number, filePath: string): Promise<string> {
        try {
            const rendered = await this.deps.rasterizer.renderPage(pdf, pageNumber, this.options.dpi);
            const enhanced = await this.deps.enhancer.forText(rendered);
            return (await this.deps.ocr.recognize(enhanced)).trim();
        } catch (error) {
            log.warn('pdf_page_ocr_failed', { source: filePath, page: pageNumber, ...errorFields(error) });
            return '';
        }
    }
}

export function createPdfExtractor(deps: PdfExtractorDeps, options: PdfExtractorOptions): PdfExtractor {
    return new PdfExtractor(deps, options);
}
