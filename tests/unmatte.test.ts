import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import type { RasterImage } from '@/lib/raster';
import { unmatteEdges } from '@/lib/unmatte';
import { solidImage, STUDIO_GREY } from './helpers';

const WHITE_MATTE = { r: 255, g: 255, b: 255 };

function rgbaRow(pixels: [number, number, number, number][]): RasterImage {
  return { width: pixels.length, height: 1, channels: 4, data: new Uint8Array(pixels.flat()) };
}

const rgbaImage = fc
  .record({ width: fc.integer({ min: 1, max: 8 }), height: fc.integer({ min: 1, max: 8 }) })
  .chain(({ width, height }) =>
    fc
      .uint8Array({ minLength: width * height * 4, maxLength: width * height * 4 })
      .map((data): RasterImage => ({ width, height, channels: 4, data }))
  );

describe('unmatteEdges', () => {
  it('removes a white halo from a semi-transparent edge pixel', () => {
    const image = rgbaRow([
      [0, 0, 0, 0],
      [220, 220, 220, 64],
      [50, 50, 50, 255]
    ]);
    const out = unmatteEdges(image, WHITE_MATTE);
    expect(Array.from(out.data.subarray(4, 8))).toEqual([116, 116, 116, 64]);
  });

  it('leaves dark edge pixels alone', () => {
    const image = rgbaRow([
      [0, 0, 0, 0],
      [20, 20, 20, 128],
      [20, 20, 20, 255]
    ]);
    expect(Array.from(unmatteEdges(image, WHITE_MATTE).data)).toEqual(Array.from(image.data));
  });

  it('keeps light product edges whose unmatted color stays near the matte', () => {
    const image = rgbaRow([
      [0, 0, 0, 0],
      [250, 250, 250, 200],
      [250, 250, 250, 255]
    ]);
    expect(Array.from(unmatteEdges(image, WHITE_MATTE).data)).toEqual(Array.from(image.data));
  });

  it('never touches fully transparent or opaque pixels and never changes alpha', () => {
    fc.assert(
      fc.property(rgbaImage, (image) => {
        const out = unmatteEdges(image, WHITE_MATTE);
        for (let i = 0; i < image.width * image.height; i += 1) {
          const a = image.data[i * 4 + 3];
          expect(out.data[i * 4 + 3]).toBe(a);
          if (a <= 12 || a >= 243) {
            expect(Array.from(out.data.subarray(i * 4, i * 4 + 3))).toEqual(Array.from(image.data.subarray(i * 4, i * 4 + 3)));
          }
        }
      }),
      { numRuns: 100 }
    );
  });

  it('is idempotent', () => {
    fc.assert(
      fc.property(rgbaImage, (image) => {
        const once = unmatteEdges(image, WHITE_MATTE);
        const twice = unmatteEdges(once, WHITE_MATTE);
        expect(Array.from(twice.data)).toEqual(Array.from(once.data));
      }),
      { numRuns: 100 }
    );
  });

  it('returns RGB images unchanged', () => {
    const image = solidImage(3, 3, STUDIO_GREY);
    expect(unmatteEdges(image, WHITE_MATTE)).toBe(image);
  });

  it('does not mutate its input', () => {
    const image = rgbaRow([
      [0, 0, 0, 0],
      [220, 220, 220, 64]
    ]);
    const before = Array.from(image.data);
    unmatteEdges(image, WHITE_MATTE);
    expect(Array.from(image.data)).toEqual(before);
  });
});
