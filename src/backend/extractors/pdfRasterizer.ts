/**
 * Renders single PDF pages to PNG with poppler's pdftoppm.
 */

import { execFile } from 'child_process';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

export interface PageRasterizer {
    /** Renders a 1-based page of the PDF at the given resolution */
    renderPage(pdf: Buffer, pageNumber: number, dpi: number): Promise<Buffer>;
}

export interface PopplerRasterizerConfig {
    binaryPath: string;
    timeoutMs: number;
}

export class PopplerPageRasterizer implements PageRasterizer {
    private readonly config: PopplerRasterizerConfig;

    constructor(config: Partial<PopplerRasterizerConfig> = {}) {
        this.config = { binaryPath: 'pdftoppm', timeoutMs: 120000, ...config };
    }

    async renderPage(pdf: Buffer, pageNumber: number, dpi: number): Promise<Buffer> {
        const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'rag-raster-'));
        const pdfPath = path.join(tmpDir, 'input.pdf');
        const outputBase = path.join(tmpDir, 'page');

        try {
            await fs.writeFile(pdfPath, pdf);
            await execFileAsync(
                this.config.binaryPath,
                [
                    '-r', String(dpi),
                    '-f', String(pageNumber),
                    '-l', String(pageNumber),
                    '-png',
                    '-singlefile',
                    pdfPath,
                    outputBase,
                ],
                { timeout: this.config.timeoutMs }
            );
            return await fs.readFile(`${outputBase}.png`);
        } finally {
            await fs.rm(tmpDir, { recursive: true, force: true });
        }
    }
}

export function createPageRasterizer(config?: Partial<PopplerRasterizerConfig>): PopplerPageRasterizer {
    return new PopplerPageRasterizer(config);
}
