/**
 * Image enhancement before OCR.
 *
 * Two profiles:
 * - text: scanned text pages. Grayscale, adaptive mean thresholding, then a
 *   morphological close followed by an open to drop speckles while keeping
 *   character strokes.
 * - diagram: photos and scans of schematics. Grayscale, contrast-limited
 *   adaptive histogram equalization (CLAHE), then a global Otsu threshold.
 *
 * sharp decodes and encodes images and runs CLAHE; the thresholding and
 * morphology run on raw 8-bit grayscale pixels.
 */

import sharp from 'sharp';

export interface GrayImage {
  width: number;
  height: number;
  /** One byte per pixel, row-major */
  pixels: Uint8Array;
}

export interface TextProfileOptions {
  /** Neighborhood size for adaptive thresholding (odd, >= 3) */
  blockSize: number;
  /** Constant subtracted from the neighborhood mean */
  thresholdC: number;
  /** Square structuring element size; 1 leaves the image unchanged */
  morphKernelSize: number;
}

export interface DiagramProfileOptions {
  /** Tiles per axis for CLAHE */
  tileGrid: number;
  /** Contrast limit for CLAHE */
  maxSlope: number;
}

export const DEFAULT_TEXT_PROFILE: TextProfileOptions = {
  blockSize: 11,
  thresholdC: 2,
  morphKernelSize: 1,
};

export const DEFAULT_DIAGRAM_PROFILE: DiagramProfileOptions = {
  tileGrid: 8,
  maxSlope: 2,
};

export interface ImageEnhancer {
  forText(image: Buffer): Promise<Buffer>;
  forDiagram(image: Buffer): Promise<Buffer>;
}

const WHITE = 255;
const BLACK = 0;

/**
 * Binarizes each pixel against the mean of its blockSize x blockSize
 * neighborhood (clipped at the borders) minus `c`.
 */
export function adaptiveThreshold(image: GrayImage, blockSize: number, c: number): GrayImage {
  const { width, height, pixels } = image;
  const stride = width + 1;
  // Summed-area table with a zero row and column in front
  const integral = new Float64Array(stride * (height + 1));

  for (let y = 0; y < height; y++) {
    let rowSum = 0;
    for (let x = 0; x < width; x++) {
      rowSum += pixels[y * width + x] ?? 0;
      integral[(y + 1) * stride + (x + 1)] = (integral[y * stride + (x + 1)] ?? 0) + rowSum;
    }
  }

  const radius = Math.floor(blockSize / 2);
  const out = new Uint8Array(width * height);

  for (let y = 0; y < height; y++) {
    const top = Math.max(0, y - radius);
    const bottom = Math.min(height - 1, y + radius);
    for (let x = 0; x < width; x++) {
      const left = Math.max(0, x - radius);
      const right = Math.min(width - 1, x + radius);
      const area = (bottom - top + 1) * (right - left + 1);
      const sum =
        (integral[(bottom + 1) * stride + (right + 1)] ?? 0) -
        (integral[top * stride + (right + 1)] ?? 0) -
        (integral[(bottom + 1) * stride + left] ?? 0) +
        (integral[top * stride + left] ?? 0);
      const threshold = sum / area - c;
      out[y * width + x] = (pixels[y * width + x] ?? 0) > threshold ? WHITE : BLACK;
    }
  }

  return { width, height, pixels: out };
}

/**
 * Otsu's method: the threshold that maximizes between-class variance.
 */
export function otsuLevel(pixels: Uint8Array): number {
  const histogram = new Array<number>(256).fill(0);
  for (const value of pixels) {
    histogram[value] = (histogram[value] ?? 0) + 1;
  }

  const total = pixels.length;
  let totalSum = 0;
  for (let level = 0; level < 256; level++) {
    totalSum += level * (histogram[level] ?? 0);
  }

  let backgroundWeight = 0;
  let backgroundSum = 0;
  let bestLevel = 0;
  let bestVariance = -1;

  for (let level = 0; level < 256; level++) {
    backgroundWeight += histogram[level] ?? 0;
    if (backgroundWeight === 0) {
      continue;
    }
    const foregroundWeight = total - backgroundWeight;
    if (foregroundWeight === 0) {
      break;
    }

    backgroundSum += level * (histogram[level] ?? 0);
    const backgroundMean = backgroundSum / backgroundWeight;
    const foregroundMean = (totalSum - backgroundSum) / foregroundWeight;
    const variance =
      backgroundWeight * foregroundWeight * (backgroundMean - foregroundMean) ** 2;

    if (variance > bestVariance) {
      bestVariance = variance;
      bestLevel = level;
    }
  }

  return bestLevel;
}

export function otsuThreshold(image: GrayImage): GrayImage {
  const level = otsuLevel(image.pixels);
  const out = image.pixels.map((value) => (value > level ? WHITE : BLACK));
  return { ...image, pixels: out };
}

/**
 * Min (erode) or max (dilate) over a square window, clipped at the borders.
 */
function morph(image: GrayImage, kernelSize: number, pick: (a: number, b: number) => number): GrayImage {
  const { width, height, pixels } = image;
  const low = -Math.floor((kernelSize - 1) / 2);
  const high = Math.floor(kernelSize / 2);
  const out = new Uint8Array(width * height);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let value = pixels[y * width + x] ?? 0;
      for (let dy = low; dy <= high; dy++) {
        const ny = y + dy;
        if (ny < 0 || ny >= height) {
          continue;
        }
        for (let dx = low; dx <= high; dx++) {
          const nx = x + dx;
          if (nx < 0 || nx >= width) {
            continue;
          }
          value = pick(value, pixels[ny * width + nx] ?? 0);
        }
      }
      out[y * width + x] = value;
    }
  }

  return { width, height, pixels: out };
}

export function erode(image: GrayImage, kernelSize: number): GrayImage {
  return morph(image, kernelSize, Math.min);
}

export function dilate(image: GrayImage, kernelSize: number): GrayImage {
  return morph(image, kernelSize, Math.max);
}

/**
 * Morphological close (fills small dark gaps) then open (removes small
 * bright specks).
 */
export function closeThenOpen(image: GrayImage, kernelSize: number): GrayImage {
  if (kernelSize <= 1) {
    return image;
  }
  const closed = erode(dilate(image, kernelSize), kernelSize);
  return dilate(erode(closed, kernelSize), kernelSize);
}

async function decodeGray(pipeline: sharp.Sharp): Promise<GrayImage> {
  const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
  const { width, height, channels } = info;

  if (channels === 1) {
    return { width, height, pixels: new Uint8Array(data) };
  }

  const pixels = new Uint8Array(width * height);
  for (let i = 0; i < pixels.length; i++) {
    pixels[i] = data[i * channels] ?? 0;
  }
  return { width, height, pixels };
}

function encodePng(image: GrayImage): Promise<Buffer> {
  return sharp(Buffer.from(image.pixels), {
    raw: { width: image.width, height: image.height, channels: 1 },
  })
    .png()
    .toBuffer();
}

function grayscalePipeline(input: Buffer): sharp.Sharp {
  return sharp(input).flatten({ background: '#ffffff' }).grayscale();
}

export class SharpImageEnhancer implements ImageEnhancer {
  private readonly text: TextProfileOptions;
  private readonly diagram: DiagramProfileOptions;

  constructor(
    text: Partial<TextProfileOptions> = {},
    diagram: Partial<DiagramProfileOptions> = {}
  ) {
    this.text = { ...DEFAULT_TEXT_PROFILE, ...text };
    this.diagram = { ...DEFAULT_DIAGRAM_PROFILE, ...diagram };
  }

  async forText(image: Buffer): Promise<Buffer> {
    const gray = await decodeGray(grayscalePipeline(image));
    const binary = adaptiveThreshold(gray, this.text.blockSize, this.text.thresholdC);
    return encodePng(closeThenOpen(binary, this.text.morphKernelSize));
  }

  async forDiagram(image: Buffer): Promise<Buffer> {
    const metadata = await sharp(image).metadata();
    const width = metadata.width ?? 1;
    const height = metadata.height ?? 1;

    const equalized = await decodeGray(
      grayscalePipeline(image).clahe({
        width: Math.max(1, Math.ceil(width / this.diagram.tileGrid)),
        height: Math.max(1, Math.ceil(height / this.diagram.tileGrid)),
        maxSlope: this.diagram.maxSlope,
      })
    );
    return encodePng(otsuThreshold(equalized));
  }
}

export function createImageEnhancer(
  text?: Partial<TextProfileOptions>,
  diagram?: Partial<DiagramProfileOptions>
): SharpImageEnhancer {
  return new SharpImageEnhancer(text, diagram);
}
