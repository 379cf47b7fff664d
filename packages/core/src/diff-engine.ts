/**
 * Diff Engine
 *
 * Pixel-by-pixel comparison of two rendered images. Both are padded with
 * white to the larger width and height (anchored top-left), each pixel is
 * classified as drawn or blank, and the composite is painted:
 *
 * | base  | target | colour                                  |
 * |-------|--------|-----------------------------------------|
 * | drawn | blank  | red (removed)                           |
 * | blank | drawn  | blue (added)                            |
 * | drawn | drawn  | white, or light gray with showUnchanged |
 * | blank | blank  | white                                   |
 */

import { PNG } from 'pngjs';

import { DIFF_DEFAULTS } from '@kicad-vdiff/config';

import { logDebug } from './logger.js';

export type Rgb = readonly [number, number, number];

export const DIFF_COLORS = {
  blank: [255, 255, 255],
  removed: [255, 0, 0],
  added: [0, 0, 255],
  common: [200, 200, 200],
} as const satisfies Record<string, Rgb>;

export interface DiffOptions {
  /** Darkness (0-255) above which a pixel counts as drawn */
  presenceThreshold: number;
  /** Paint pixels drawn in both images light gray */
  showUnchanged: boolean;
}

export interface DiffOutcome {
  png: Buffer;
  width: number;
  height: number;
  /** No pixel differs */
  identical: boolean;
  removedPixels: number;
  addedPixels: number;
}

export interface DecodedImage {
  width: number;
  height: number;
  /** RGBA, 4 bytes per pixel, row-major */
  data: Buffer;
}

/**
 * @throws Error if the bytes are not a PNG
 */
export function decodePng(png: Buffer): DecodedImage {
  const image = PNG.sync.read(png);
  return { width: image.width, height: image.height, data: image.data };
}

export function encodePng(image: DecodedImage): Buffer {
  const png = new PNG({ width: image.width, height: image.height });
  image.data.copy(png.data);
  return PNG.sync.write(png);
}

/**
 * Whether the pixel at (x, y) is drawn; pixels outside the image are blank
 */
export function isPresent(image: DecodedImage, x: number, y: number, threshold: number): boolean {
  if (x >= image.width || y >= image.height) {
    return false;
  }
  const offset = (y * image.width + x) * 4;
  const alpha = image.data[offset + 3] / 255;
  // Composite over white
  const r = image.data[offset] * alpha + 255 * (1 - alpha);
  const g = image.data[offset + 1] * alpha + 255 * (1 - alpha);
  const b = image.data[offset + 2] * alpha + 255 * (1 - alpha);
  const luminance = 0.299 * r + 0.587 * g + 0.114 * b;
  return 255 - luminance > threshold;
}

/**
 * Compare two decoded images
 */
export function diffDecoded(
  base: DecodedImage,
  target: DecodedImage,
  options: Partial<DiffOptions> = {}
): DiffOutcome {
  const threshold = options.presenceThreshold ?? DIFF_DEFAULTS.PRESENCE_THRESHOLD;
  const showUnchanged = options.showUnchanged ?? DIFF_DEFAULTS.SHOW_UNCHANGED;
  const width = Math.max(base.width, target.width);
  const height = Math.max(base.height, target.height);
  const data = Buffer.alloc(width * height * 4);
  let removedPixels = 0;
  let addedPixels = 0;

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const inBase = isPresent(base, x, y, threshold);
      const inTarget = isPresent(target, x, y, threshold);
      let colour: Rgb = DIFF_COLORS.blank;
      if (inBase && !inTarget) {
        colour = DIFF_COLORS.removed;
        removedPixels++;
      } else if (!inBase && inTarget) {
        colour = DIFF_COLORS.added;
        addedPixels++;
      } else if (inBase && inTarget && showUnchanged) {
        colour = DIFF_COLORS.common;
      }
      const offset = (y * width + x) * 4;
      data[offset] = colour[0];
      data[offset + 1] = colour[1];
      data[offset + 2] = colour[2];
      data[offset + 3] = 255;
    }
  }

  logDebug('diff', 'Compared images', { width, height, removedPixels, addedPixels });
  return {
    png: encodePng({ width, height, data }),
    width,
    height,
    identical: removedPixels === 0 && addedPixels === 0,
    removedPixels,
    addedPixels,
  };
}

/**
 * Compare two PNG images
 *
 * @example
 * const outcome = diffImages(basePng, targetPng, { presenceThreshold: 64 });
 * if (!outcome.identical) await writeFile('diff.png', outcome.png);
 */
export function diffImages(basePng: Buffer, targetPng: Buffer, options: Partial<DiffOptions> = {}): DiffOutcome {
  return diffDecoded(decodePng(basePng), decodePng(targetPng), options);
}
