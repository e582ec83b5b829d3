/**
 * OCR through the Tesseract command-line tool.
 *
 * The engine takes an already enhanced PNG, writes it to a scratch
 * directory and reads the recognized text from stdout.
 */

import { execFile } from 'child_process';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

/** Characters Tesseract may emit for schematics and component labels */
export const DIAGRAM_CHAR_WHITELIST =
    '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz.,;:()[]{}+-=*/\\|<>%$#@!?"\' Ωμ';

export interface OcrOptions {
    /** Restrict recognition to these characters */
    whitelist?: string;
}

export interface OcrEngine {
    recognize(image: Buffer, options?: OcrOptions): Promise<string>;
}

export interface TesseractOcrConfig {
    binaryPath: string;
    timeoutMs: number;
    /** Page segmentation mode; 6 treats the image as one block of text */
    pageSegMode: number;
}

export const DEFAULT_TESSERACT_CONFIG: TesseractOcrConfig = {
    binaryPath: 'tesseract',
    timeoutMs: 120000,
    pageSegMode: 6,
};

export class TesseractOcrEngine implements OcrEngine {
    private readonly config: TesseractOcrConfig;

    constructor(config: Partial<TesseractOcrConfig> = {}) {
        this.config = { ...DEFAULT_TESSERACT_CONFIG, ...config };
    }

    async recognize(image: Buffer, options: OcrOptions = {}): Promise<string> {
        const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'rag-ocr-'));
        const imagePath = path.join(tmpDir, 'input.png');

        try {
            await fs.writeFile(imagePath, image);

            const args = [imagePath, 'stdout', '--psm', String(this.config.pageSegMode)];
            if (options.whitelist) {
                args.push('-c', `tessedit_char_whitelist=${options.whitelist}`);
            }

            const { stdout } = await execFileAsync(this.config.binaryPath, args, {
                timeout: this.config.timeoutMs,
                maxBuffer: 1024 * 1024 * 20,
                encoding: 'utf8',
            });
            return stdout;
        } finally {
            await fs.rm(tmpDir, { recursive: true, force: true });
        }
    }
}

export function createOcrEngine(config?: Partial<TesseractOcrConfig>): TesseractOcrEngine {
    return new TesseractOcrEngine(config);
}
