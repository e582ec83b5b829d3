/**
 * Unit tests for PDF extraction with OCR fallback
 *
 * Text reading, rendering, enhancement and OCR are replaced by fakes so the
 * page-by-page decisions can be checked without external tools.
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ExtractionError } from '../../errors';
import { ImageEnhancer } from '../imageEnhancer';
import { OcrEngine } from '../ocrEngine';
import { PdfExtractor } from '../pdfExtractor';
import { PageRasterizer } from '../pdfRasterizer';
import { PdfTextReader } from '../pdfTextReader';

describe('PdfExtractor', () => {
    let tmpDir: string;
    let pdfPath: string;

    const enhancer: ImageEnhancer = {
        forText: async (image) => Buffer.from(`enhanced-${image.toString()}`),
        forDiagram: async (image) => image,
    };
    const ocr: OcrEngine = {
        recognize: async (image) => `  OCR of ${image.toString()}  `,
    };

    beforeEach(async () => {
        tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pdf-extractor-test-'));
        pdfPath = path.join(tmpDir, 'manual.pdf');
        await fs.writeFile(pdfPath, '%PDF-1.4 test');
    });

    afterEach(async () => {
        await fs.rm(tmpDir, { recursive: true, force: true });
    });

    function textReader(pages: string[]): PdfTextReader {
        return { readPages: async () => pages };
    }

    it('should keep embedded text and OCR pages below the threshold', async () => {
        const rendered: Array<[number, number]> = [];
        const rasterizer: PageRasterizer = {
            renderPage: async (_pdf, pageNumber, dpi) => {
                rendered.push([pageNumber, dpi]);
                if (pageNumber === 3) {
                    throw new Error('pdftoppm crashed');
                }
                return Buffer.from(`page-${pageNumber}`);
            },
        };
        const extractor = new PdfExtractor(
            { textReader: textReader(['  Embedded page text here  ', '  ', 'short']), rasterizer, enhancer, ocr },
            { minTextLength: 10, dpi: 300 }
        );

        const document = await extractor.extract(pdfPath);

        expect(rendered).toEqual([
            [2, 300],
            [3, 300],
        ]);
        expect(document).toEqual({
            source: pdfPath,
            sourceType: 'pdf',
            title: 'manual.pdf',
            sections: [
                { label: 'Page 1', text: 'Embedded page text here' },
                { label: 'Page 2', text: 'OCR of enhanced-page-2' },
                { label: 'Page 3', text: '' },
            ],
        });
    });

    it('should pass the file contents to the text reader', async () => {
        let received = '';
        const extractor = new PdfExtractor(
            {
                textReader: {
                    readPages: async (pdf) => {
                        received = pdf.toString();
                        return [];
                    },
                },
                rasterizer: { renderPage: async () => Buffer.alloc(0) },
                enhancer,
                ocr,
            },
            { minTextLength: 10, dpi: 300 }
        );

        const document = await extractor.extract(pdfPath);
        expect(received).toBe('%PDF-1.4 test');
        expect(document.sections).toEqual([]);
    });

    it('should raise ExtractionError when the file is missing', async () => {
        const extractor = new PdfExtractor(
            { textReader: textReader([]), rasterizer: { renderPage: async () => Buffer.alloc(0) }, enhancer, ocr },
            { minTextLength: 10, dpi: 300 }
        );

        await expect(extractor.extract(path.join(tmpDir, 'missing.pdf'))).rejects.toBeInstanceOf(ExtractionError);
    });

    it('should raise ExtractionError when the PDF cannot be parsed', async () => {
        const extractor = new PdfExtractor(
            {
                textReader: {
                    readPages: async () => {
                        throw new Error('Invalid PDF structure');
                    },
                },
                rasterizer: { renderPage: async () => Buffer.alloc(0) },
                enhancer,
                ocr,
            },
            { minTextLength: 10, dpi: 300 }
        );

        await expect(extractor.extract(pdfPath)).rejects.toThrow(
            `Failed to read PDF ${pdfPath}: Invalid PDF structure`
        );
    });
});
