/**
 * Image extraction: diagram enhancement, whitelisted OCR, then the
 * technical-value enrichment block.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { ExtractionError, toError } from '../errors';
import { createLogger } from '../utils/logger';
import { ImageEnhancer } from './imageEnhancer';
import { DIAGRAM_CHAR_WHITELIST, OcrEngine } from './ocrEngine';
import { enrichOcrText } from './technicalValues';
import { ExtractedDocument, Extractor } from './types';

const log = createLogger('image-extractor');

export class ImageExtractor implements Extractor<string> {
    constructor(
        private readonly enhancer: ImageEnhancer,
        private readonly ocr: OcrEngine
    ) {}

    async extract(filePath: string): Promise<ExtractedDocument> {
        let ocrText: string;
        try {
            const image = await fs.readFile(filePath);
            const enhanced = await this.enhancer.forDiagram(image);
            ocrText = (await this.ocr.recognize(enhanced, { whitelist: DIAGRAM_CHAR_WHITELIST })).trim();
        } catch (error) {
            throw new ExtractionError(
                `Failed to process image ${filePath}: ${toError(error).message}`,
                filePath,
                toError(error)
            );
        }

        log.info('image_extracted', { source: filePath, characters: ocrText.length });

        return {
            source: filePath,
            sourceType: 'image',
            title: path.basename(filePath),
            sections: ocrText ? [{ label: 'Image', text: enrichOcrText(ocrText) }] : [],
        };
    }
}

export function createImageExtractor(enhancer: ImageEnhancer, ocr: OcrEngine): ImageExtractor {
    return new ImageExtractor(enhancer, ocr);
}
