/**
 * Tests for the command-line OCR and rasterizer adapters
 *
 * Small shell scripts stand in for tesseract and pdftoppm and echo back what
 * they were given.
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { TesseractOcrEngine } from '../ocrEngine';
import { PopplerPageRasterizer } from '../pdfRasterizer';

// The fake tools are shell scripts
const itOnPosix = process.platform === 'win32' ? it.skip : it;

const FAKE_TESSERACT = `#!/bin/sh
image="$1"
shift
cat "$image"
printf '\\n%s' "$@"
`;

const FAKE_PDFTOPPM = `#!/bin/sh
printf 'dpi=%s page=%s ' "$2" "$4" > "\${10}.png"
cat "$9" >> "\${10}.png"
`;

const FAILING_TOOL = `#!/bin/sh
echo "cannot open" >&2
exit 1
`;

describe('external tool adapters', () => {
    let tmpDir: string;

    beforeEach(async () => {
        tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'external-tools-test-'));
    });

    afterEach(async () => {
        await fs.rm(tmpDir, { recursive: true, force: true });
    });

    async function script(name: string, body: string): Promise<string> {
        const scriptPath = path.join(tmpDir, name);
        await fs.writeFile(scriptPath, body, { mode: 0o755 });
        return scriptPath;
    }

    describe('TesseractOcrEngine', () => {
        itOnPosix('should pass the image and page segmentation mode', async () => {
            const engine = new TesseractOcrEngine({ binaryPath: await script('tesseract', FAKE_TESSERACT) });

            expect(await engine.recognize(Buffer.from('fake image'))).toBe('fake image\nstdout\n--psm\n6');
        });

        itOnPosix('should pass a character whitelist', async () => {
            const engine = new TesseractOcrEngine({
                binaryPath: await script('tesseract', FAKE_TESSERACT),
                pageSegMode: 3,
            });

            expect(await engine.recognize(Buffer.from('img'), { whitelist: 'RCL0123' })).toBe(
                'img\nstdout\n--psm\n3\n-c\ntessedit_char_whitelist=RCL0123'
            );
        });

        itOnPosix('should reject when the tool fails', async () => {
            const engine = new TesseractOcrEngine({ binaryPath: await script('tesseract', FAILING_TOOL) });
            await expect(engine.recognize(Buffer.from('img'))).rejects.toThrow('cannot open');
        });

        itOnPosix('should reject when the tool is missing', async () => {
            const engine = new TesseractOcrEngine({ binaryPath: path.join(tmpDir, 'no-such-tesseract') });
            await expect(engine.recognize(Buffer.from('img'))).rejects.toThrow('ENOENT');
        });
    });

    describe('PopplerPageRasterizer', () => {
        itOnPosix('should render the requested page at the requested resolution', async () => {
            const rasterizer = new PopplerPageRasterizer({ binaryPath: await script('pdftoppm', FAKE_PDFTOPPM) });

            const image = await rasterizer.renderPage(Buffer.from('%PDF-1.4 test'), 2, 150);
            expect(image.toString()).toBe('dpi=150 page=2 %PDF-1.4 test');
        });

        itOnPosix('should reject when the tool fails', async () => {
            const rasterizer = new PopplerPageRasterizer({ binaryPath: await script('pdftoppm', FAILING_TOOL) });
            await expect(rasterizer.renderPage(Buffer.from('%PDF'), 1, 300)).rejects.toThrow('cannot open');
        });
    });
});
