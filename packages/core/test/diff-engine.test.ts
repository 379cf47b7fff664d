import { describe, it, expect } from 'vitest';
import { PNG } from 'pngjs';

import { DIFF_COLORS, decodePng, diffImages, isPresent } from '../src/diff-engine.js';

import { makePng, pixelAt } from './helpers/fakes.js';

function rect(x0: number, y0: number, w: number, h: number) {
  return (x: number, y: number): boolean => x >= x0 && x < x0 + w && y >= y0 && y < y0 + h;
}

/** 1x1 image of one RGBA pixel */
function singlePixel(r: number, g: number, b: number, a: number): Buffer {
  const png = new PNG({ width: 1, height: 1 });
  png.data[0] = r;
  png.data[1] = g;
  png.data[2] = b;
  png.data[3] = a;
  return PNG.sync.write(png);
}

describe('diff-engine', () => {
  describe('isPresent', () => {
    it('should count dark pixels and ignore light gray', () => {
      expect(isPresent(decodePng(singlePixel(0, 0, 0, 255)), 0, 0, 64)).toBe(true);
      expect(isPresent(decodePng(singlePixel(150, 150, 150, 255)), 0, 0, 64)).toBe(true);
      expect(isPresent(decodePng(singlePixel(200, 200, 200, 255)), 0, 0, 64)).toBe(false);
    });

    it('should composite transparent pixels over white', () => {
      expect(isPresent(decodePng(singlePixel(0, 0, 0, 0)), 0, 0, 64)).toBe(false);
      expect(isPresent(decodePng(singlePixel(0, 0, 0, 128)), 0, 0, 64)).toBe(true);
    });

    it('should weight channels by luminance', () => {
      // Pure blue has luminance 29, yellow 226
      expect(isPresent(decodePng(singlePixel(0, 0, 255, 255)), 0, 0, 64)).toBe(true);
      expect(isPresent(decodePng(singlePixel(255, 255, 0, 255)), 0, 0, 64)).toBe(false);
    });

    it('should treat pixels outside the image as blank', () => {
      expect(isPresent(decodePng(singlePixel(0, 0, 0, 255)), 1, 0, 64)).toBe(false);
    });
  });

  describe('diffImages', () => {
    it('should report an image compared with itself as identical and all white', () => {
      const image = makePng(16, 16, rect(2, 2, 6, 6));

      const result = diffImages(image, image);

      expect(result).toMatchObject({ width: 16, height: 16, identical: true, removedPixels: 0, addedPixels: 0 });
      const decoded = decodePng(result.png);
      expect(decoded.data.every(value => value === 255)).toBe(true);
    });

    it('should paint a moved footprint red where it was and blue where it went', () => {
      const base = makePng(20, 10, rect(2, 2, 4, 4));
      const target = makePng(20, 10, rect(10, 2, 4, 4));

      const result = diffImages(base, target);

      expect(result.identical).toBe(false);
      expect(result.removedPixels).toBe(16);
      expect(result.addedPixels).toBe(16);
      expect(pixelAt(result.png, 3, 3)).toEqual([...DIFF_COLORS.removed]);
      expect(pixelAt(result.png, 11, 3)).toEqual([...DIFF_COLORS.added]);
      expect(pixelAt(result.png, 0, 0)).toEqual([...DIFF_COLORS.blank]);
    });

    it('should swap only red and blue when the inputs are swapped', () => {
      const a = makePng(12, 12, rect(1, 1, 6, 6));
      const b = makePng(12, 12, rect(4, 4, 6, 6));

      const forward = decodePng(diffImages(a, b).png);
      const backward = decodePng(diffImages(b, a).png);

      const swapped = Buffer.from(forward.data);
      for (let offset = 0; offset < swapped.length; offset += 4) {
        const red = swapped[offset];
        swapped[offset] = swapped[offset + 2];
        swapped[offset + 2] = red;
      }
      expect(backward.data.equals(swapped)).toBe(true);
    });

    it('should pad the smaller image with white anchored top-left', () => {
      const base = makePng(4, 4, () => true);
      const target = makePng(8, 2, () => false);

      const result = diffImages(base, target);

      expect(result.width).toBe(8);
      expect(result.height).toBe(4);
      expect(result.removedPixels).toBe(16);
      expect(pixelAt(result.png, 1, 3)).toEqual([...DIFF_COLORS.removed]);
      expect(pixelAt(result.png, 6, 3)).toEqual([...DIFF_COLORS.blank]);
    });

    it('should ignore changes below the presence threshold', () => {
      const base = singlePixel(255, 255, 255, 255);
      const faint = singlePixel(220, 220, 220, 255);

      expect(diffImages(base, faint).identical).toBe(true);
      expect(diffImages(base, faint, { presenceThreshold: 10 }).addedPixels).toBe(1);
    });

    it('should paint common pixels gray without affecting identical', () => {
      const image = makePng(4, 4, rect(0, 0, 2, 2));

      const result = diffImages(image, image, { showUnchanged: true });

      expect(result.identical).toBe(true);
      expect(pixelAt(result.png, 1, 1)).toEqual([...DIFF_COLORS.common]);
      expect(pixelAt(result.png, 3, 3)).toEqual([...DIFF_COLORS.blank]);
    });

    it('should be deterministic', () => {
      const a = makePng(10, 10, rect(0, 0, 5, 5));
      const b = makePng(10, 10, rect(3, 3, 5, 5));

      expect(diffImages(a, b).png.equals(diffImages(a, b).png)).toBe(true);
    });
  });
});
