/**
 * Unit tests for image enhancement
 *
 * The pixel operations are tested on tiny hand-made images; the sharp
 * pipelines are run once on generated images to check the output encoding.
 */

import sharp from 'sharp';
import {
    GrayImage,
    SharpImageEnhancer,
    adaptiveThreshold,
    closeThenOpen,
    otsuLevel,
    otsuThreshold,
} from '../imageEnhancer';

function gray(width: number, height: number, values: number[]): GrayImage {
    return { width, height, pixels: Uint8Array.from(values) };
}

describe('otsuThreshold', () => {
    it('should split a two-level image between the levels', () => {
        const image = gray(6, 1, [10, 10, 10, 200, 200, 200]);

        expect(otsuLevel(image.pixels)).toBe(10);
        expect(Array.from(otsuThreshold(image).pixels)).toEqual([0, 0, 0, 255, 255, 255]);
    });
});

describe('adaptiveThreshold', () => {
    it('should blacken a pixel darker than its neighborhood', () => {
        const image = gray(3, 3, [200, 200, 200, 200, 0, 200, 200, 200, 200]);

        expect(Array.from(adaptiveThreshold(image, 3, 2).pixels)).toEqual([
            255, 255, 255, 255, 0, 255, 255, 255, 255,
        ]);
    });

    it('should whiten a uniform image', () => {
        const image = gray(4, 2, new Array<number>(8).fill(128));
        expect(Array.from(adaptiveThreshold(image, 3, 2).pixels)).toEqual(new Array<number>(8).fill(255));
    });
});

describe('closeThenOpen', () => {
    it('should remove an isolated bright speck', () => {
        const values = new Array<number>(25).fill(0);
        values[12] = 255;

        expect(Array.from(closeThenOpen(gray(5, 5, values), 3).pixels)).toEqual(new Array<number>(25).fill(0));
    });

    it('should fill an isolated dark hole', () => {
        const values = new Array<number>(25).fill(255);
        values[12] = 0;

        expect(Array.from(closeThenOpen(gray(5, 5, values), 3).pixels)).toEqual(new Array<number>(25).fill(255));
    });

    it('should leave the image unchanged for a kernel of 1', () => {
        const image = gray(2, 1, [0, 255]);
        expect(closeThenOpen(image, 1)).toBe(image);
    });
});

describe('SharpImageEnhancer', () => {
    const enhancer = new SharpImageEnhancer();

    async function solidPng(width: number, height: number): Promise<Buffer> {
        return sharp({
            create: { width, height, channels: 3, background: { r: 128, g: 128, b: 128 } },
        })
            .png()
            .toBuffer();
    }

    it('should produce a binary PNG of the same size for text pages', async () => {
        const output = await enhancer.forText(await solidPng(16, 12));

        const metadata = await sharp(output).metadata();
        expect(metadata.format).toBe('png');
        expect(metadata.width).toBe(16);
        expect(metadata.height).toBe(12);

        const { data } = await sharp(output).raw().toBuffer({ resolveWithObject: true });
        expect(Math.min(...data)).toBe(255);
    });

    it('should produce a PNG of the same size for diagrams', async () => {
        const output = await enhancer.forDiagram(await solidPng(20, 20));

        const metadata = await sharp(output).metadata();
        expect(metadata.format).toBe('png');
        expect(metadata.width).toBe(20);
        expect(metadata.height).toBe(20);
    });
});
