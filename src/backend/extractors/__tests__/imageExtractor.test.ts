/**
 * Unit tests for image extraction
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ExtractionError } from '../../errors';
import { ImageExtractor } from '../imageExtractor';
import { ImageEnhancer } from '../imageEnhancer';
import { DIAGRAM_CHAR_WHITELIST, OcrEngine, OcrOptions } from '../ocrEngine';

describe('ImageExtractor', () => {
    let tmpDir: string;
    let imagePath: string;

    const enhancer: ImageEnhancer = {
        forText: async () => {
            throw new Error('text profile is not used for images');
        },
        forDiagram: async (image) => Buffer.concat([Buffer.from('diagram:'), image]),
    };

    beforeEach(async () => {
        tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'image-extractor-test-'));
        imagePath = path.join(tmpDir, 'schematic.png');
        await fs.writeFile(imagePath, 'png-bytes');
    });

    afterEach(async () => {
        await fs.rm(tmpDir, { recursive: true, force: true });
    });

    it('should OCR the enhanced diagram with the whitelist and enrich the text', async () => {
        const calls: Array<{ image: string; options?: OcrOptions }> = [];
        const ocr: OcrEngine = {
            recognize: async (image, options) => {
                calls.push({ image: image.toString(), options });
                return ' R1 10k \n';
            },
        };

        const document = await new ImageExtractor(enhancer, ocr).extract(imagePath);

        expect(calls).toEqual([{ image: 'diagram:png-bytes', options: { whitelist: DIAGRAM_CHAR_WHITELIST } }]);
        expect(document).toEqual({
            source: imagePath,
            sourceType: 'image',
            title: 'schematic.png',
            sections: [
                {
                    label: 'Image',
                    text: 'Image Analysis:\nR1 10k\n\nTechnical Information:\nresistors: 10k',
                },
            ],
        });
    });

    it('should return no sections when OCR finds no text', async () => {
        const ocr: OcrEngine = { recognize: async () => '  \n ' };

        const document = await new ImageExtractor(enhancer, ocr).extract(imagePath);
        expect(document.sections).toEqual([]);
    });

    it('should raise ExtractionError when OCR fails', async () => {
        const ocr: OcrEngine = {
            recognize: async () => {
                throw new Error('tesseract not found');
            },
        };

        const extraction = new ImageExtractor(enhancer, ocr).extract(imagePath);
        await expect(extraction).rejects.toBeInstanceOf(ExtractionError);
        await expect(extraction).rejects.toThrow(`Failed to process image ${imagePath}: tesseract not found`);
    });
});
