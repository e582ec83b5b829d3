/**
 * Extractors
 *
 * One extractor per input kind, plus the enhancement, OCR and rasterizing
 * collaborators they are assembled from.
 */

import * as path from 'path';
import { SourceType } from '../../shared/types';

export * from './types';
export * from './technicalValues';
export * from './imageEnhancer';
export * from './ocrEngine';
export * from './pdfRasterizer';
export * from './pdfTextReader';
export * from './pdfExtractor';
export * from './imageExtractor';
export * from './webExtractor';

export type FileSourceType = Exclude<SourceType, 'web'>;

const IMAGE_EXTENSIONS = new Set(['.png', '.jpg', '.jpeg', '.tiff', '.tif', '.bmp']);

export const SUPPORTED_EXTENSIONS: readonly string[] = ['.pdf', ...IMAGE_EXTENSIONS];

/**
 * Maps a file path to the source type its extension implies, or null for
 * unsupported files.
 */
export function detectSourceType(filePath: string): FileSourceType | null {
    const extension = path.extname(filePath).toLowerCase();
    if (extension === '.pdf') {
        return 'pdf';
    }
    return IMAGE_EXTENSIONS.has(extension) ? 'image' : null;
}
