import sharp from 'sharp';
import type { Rgb } from '@/lib/color';
import type { BinaryMask } from '@/lib/mask';
import type { RasterImage } from '@/lib/raster';

export const STUDIO_GREY: Rgb = { r: 243, g: 243, b: 243 };
export const PURE_WHITE: Rgb = { r: 255, g: 255, b: 255 };
export const DARK: Rgb = { r: 40, g: 40, b: 40 };

export type Rect = { x: number; y: number; width: number; height: number };

export function solidImage(width: number, height: number, color: Rgb): RasterImage {
  const data = new Uint8Array(width * height * 3);
  for (let i = 0; i < width * height; i += 1) {
    data[i * 3] = color.r;
    data[i * 3 + 1] = color.g;
    data[i * 3 + 2] = color.b;
  }
  return { width, height, channels: 3, data };
}

export function paintRect(image: RasterImage, rect: Rect, color: Rgb, alpha = 255) {
  const c = image.channels;
  for (let y = rect.y; y < rect.y + rect.height; y += 1) {
    for (let x = rect.x; x < rect.x + rect.width; x += 1) {
      const i = (y * image.width + x) * c;
      image.data[i] = color.r;
      image.data[i + 1] = color.g;
      image.data[i + 2] = color.b;
      if (c === 4) image.data[i + 3] = alpha;
    }
  }
  return image;
}

/** Rows shade linearly from `top` at the first row to `bottom` at the last. */
export function shadedImage(width: number, height: number, top: number, bottom: number): RasterImage {
  const image = solidImage(width, height, { r: 0, g: 0, b: 0 });
  for (let y = 0; y < height; y += 1) {
    const level = Math.round(top + ((bottom - top) * y) / (height - 1));
    image.data.fill(level, y * width * 3, (y + 1) * width * 3);
  }
  return image;
}

/** Every channel uniformly in `level ± spread`, from a seeded LCG so runs repeat. */
export function noisyImage(width: number, height: number, level: number, spread: number, seed = 1): RasterImage {
  const image = solidImage(width, height, { r: 0, g: 0, b: 0 });
  let state = seed >>> 0;
  for (let i = 0; i < image.data.length; i += 1) {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    image.data[i] = level - spread + ((state >>> 16) % (2 * spread + 1));
  }
  return image;
}

export function transparentImage(width: number, height: number): RasterImage {
  return { width, height, channels: 4, data: new Uint8Array(width * height * 4) };
}

export function inRect(x: number, y: number, rect: Rect) {
  return x >= rect.x && x < rect.x + rect.width && y >= rect.y && y < rect.y + rect.height;
}

/** Pixels whose mask value differs from "inside one of the rects". */
export function maskMismatches(mask: BinaryMask, rects: Rect[]) {
  let mismatches = 0;
  for (let y = 0; y < mask.height; y += 1) {
    for (let x = 0; x < mask.width; x += 1) {
      const expected = rects.some((r) => inRect(x, y, r)) ? 1 : 0;
      if (mask.data[y * mask.width + x] !== expected) mismatches += 1;
    }
  }
  return mismatches;
}

export function productFraction(mask: BinaryMask) {
  const product = mask.data.reduce((acc, v) => acc + (v ? 1 : 0), 0);
  return product / mask.data.length;
}

export async function toPngBuffer(image: RasterImage) {
  return sharp(image.data, { raw: { width: image.width, height: image.height, channels: image.channels } })
    .png()
    .toBuffer();
}

export async function decodeRgb(buffer: Buffer) {
  const { data, info } = await sharp(buffer).removeAlpha().raw().toBuffer({ resolveWithObject: true });
  return {
    width: info.width,
    height: info.height,
    at(x: number, y: number): Rgb {
      const i = (y * info.width + x) * info.channels;
      return { r: data[i], g: data[i + 1], b: data[i + 2] };
    }
  };
}
