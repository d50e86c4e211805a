import sharp from 'sharp';
import { describe, it, expect, vi } from 'vitest';
import fc from 'fast-check';
import { encodeRaster, encodeWithinBudget, nextQuality, type EncodeOptions, type RasterEncoder } from '@/lib/encoder';
import { solidImage, STUDIO_GREY } from './helpers';

const image = solidImage(4, 4, STUDIO_GREY);

/** Fake encoder whose output grows by `bytesPerStep` with every quality point. */
function sizedEncoder(bytesPerStep: number) {
  return vi.fn<RasterEncoder>(async (_image, _format, quality) => Buffer.alloc(quality * bytesPerStep));
}

const base: EncodeOptions = {
  format: 'webp',
  quality: 95,
  minQuality: 65,
  targetMaxKb: 1,
  maxAttempts: 10
};

describe('nextQuality', () => {
  it('steps coarsely at high quality and finely near the floor', () => {
    expect(nextQuality(95, 65)).toBe(88);
    expect(nextQuality(81, 65)).toBe(76);
    expect(nextQuality(71, 65)).toBe(68);
    expect(nextQuality(67, 65)).toBe(65);
  });
});

describe('encodeWithinBudget', () => {
  it('stops at the first encoding that fits', async () => {
    const encode = sizedEncoder(10);
    const result = await encodeWithinBudget(image, base, encode);
    expect(encode).toHaveBeenCalledTimes(1);
    expect(result.quality).toBe(95);
    expect(result.attempts).toBe(1);
    expect(result.sizeTargetMet).toBe(true);
  });

  it('lowers quality until the output fits', async () => {
    const encode = sizedEncoder(13);
    const result = await encodeWithinBudget(image, base, encode);
    expect(encode.mock.calls.map((call) => call[2])).toEqual([95, 88, 81, 76]);
    expect(result.data.length).toBe(988);
    expect(result.sizeTargetMet).toBe(true);
  });

  it('returns the floor-quality encoding when the budget cannot be met', async () => {
    const encode = sizedEncoder(100);
    const result = await encodeWithinBudget(image, base, encode);
    expect(encode.mock.calls.map((call) => call[2])).toEqual([95, 88, 81, 76, 71, 68, 65]);
    expect(result.quality).toBe(65);
    expect(result.attempts).toBe(7);
    expect(result.sizeTargetMet).toBe(false);
  });

  it('honours the attempt bound', async () => {
    const encode = sizedEncoder(100);
    const result = await encodeWithinBudget(image, { ...base, maxAttempts: 3 }, encode);
    expect(result.attempts).toBe(3);
    expect(result.quality).toBe(81);
  });

  it('encodes once without a budget', async () => {
    const encode = sizedEncoder(100);
    const result = await encodeWithinBudget(image, { ...base, targetMaxKb: null }, encode);
    expect(encode).toHaveBeenCalledTimes(1);
    expect(result.sizeTargetMet).toBeNull();
  });

  it('encodes fixed and lossless formats once', async () => {
    const jpeg = await encodeWithinBudget(image, { ...base, format: 'jpeg' }, sizedEncoder(100));
    expect(jpeg.attempts).toBe(1);
    expect(jpeg.quality).toBe(95);
    expect(jpeg.sizeTargetMet).toBe(false);

    const png = await encodeWithinBudget(image, { ...base, format: 'png' }, sizedEncoder(1));
    expect(png.attempts).toBe(1);
    expect(png.quality).toBeNull();
    expect(png.sizeTargetMet).toBe(true);
  });

  it('never goes below the floor or past the attempt bound', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.integer({ min: 1, max: 100 }),
        fc.integer({ min: 1, max: 100 }),
        fc.integer({ min: 1, max: 20 }),
        fc.integer({ min: 1, max: 50 }),
        async (a, b, maxAttempts, bytesPerStep) => {
          const quality = Math.max(a, b);
          const minQuality = Math.min(a, b);
          const encode = sizedEncoder(bytesPerStep);
          const result = await encodeWithinBudget(image, { ...base, quality, minQuality, maxAttempts }, encode);
          expect(result.attempts).toBeLessThanOrEqual(maxAttempts);
          expect(result.attempts).toBe(encode.mock.calls.length);
          expect(result.quality).toBeGreaterThanOrEqual(minQuality);
          expect(result.sizeTargetMet).toBe(result.data.length <= 1024);
        }
      ),
      { numRuns: 100 }
    );
  });
});

describe('encodeRaster', () => {
  it.each([
    ['webp', 'webp'],
    ['jpeg', 'jpeg'],
    ['png', 'png']
  ] as const)('writes %s', async (format, expected) => {
    const data = await encodeRaster(image, format, 90);
    const meta = await sharp(data).metadata();
    expect(meta.format).toBe(expected);
    expect(meta.width).toBe(4);
    expect(meta.height).toBe(4);
  });
});
