import sharp from 'sharp';
import type { Rgb } from './color';
import { ProcessingError, ProcessingErrorCode } from './errors';

export type Channels = 3 | 4;

/** Interleaved 8-bit sRGB, optionally with straight (non-premultiplied) alpha. */
export type RasterImage = {
  width: number;
  height: number;
  channels: Channels;
  data: Uint8Array;
};

export type BoundingBox = {
  left: number;
  top: number;
  right: number;
  bottom: number;
};

export type ResizeKernel = 'nearest' | 'lanczos3';

function toChannels(n: number): Channels {
  if (n === 3 || n === 4) return n;
  throw new ProcessingError(`Unsupported channel count: ${n}`, ProcessingErrorCode.UNREADABLE_INPUT);
}

export function createRaster(width: number, height: number, fill: Rgb): RasterImage {
  const data = new Uint8Array(width * height * 3);
  for (let i = 0; i < width * height; i += 1) {
    data[i * 3] = fill.r;
    data[i * 3 + 1] = fill.g;
    data[i * 3 + 2] = fill.b;
  }
  return { width, height, channels: 3, data };
}

export async function decodeImage(input: Buffer): Promise<RasterImage> {
  try {
    const meta = await sharp(input).metadata();
    const base = sharp(input).rotate().toColourspace('srgb');
    const shaped = meta.hasAlpha ? base.ensureAlpha() : base.removeAlpha();
    const { data, info } = await shaped.raw().toBuffer({ resolveWithObject: true });
    return { width: info.width, height: info.height, channels: toChannels(info.channels), data };
  } catch (error) {
    if (error instanceof ProcessingError) throw error;
    const detail = error instanceof Error ? error.message : String(error);
    throw new ProcessingError(`Unreadable image: ${detail}`, ProcessingErrorCode.UNREADABLE_INPUT);
  }
}

export function withAlpha(image: RasterImage, alpha: Uint8Array): RasterImage {
  const total = image.width * image.height;
  const data = new Uint8Array(total * 4);
  const c = image.channels;
  for (let i = 0; i < total; i += 1) {
    data[i * 4] = image.data[i * c];
    data[i * 4 + 1] = image.data[i * c + 1];
    data[i * 4 + 2] = image.data[i * c + 2];
    data[i * 4 + 3] = alpha[i];
  }
  return { width: image.width, height: image.height, channels: 4, data };
}

/** Alpha-composites onto a solid color and drops the alpha channel. */
export function flattenOnto(image: RasterImage, color: Rgb): RasterImage {
  if (image.channels === 3) {
    return { ...image, data: new Uint8Array(image.data) };
  }
  const total = image.width * image.height;
  const data = new Uint8Array(total * 3);
  for (let i = 0; i < total; i += 1) {
    const a = image.data[i * 4 + 3] / 255;
    data[i * 3] = Math.round(image.data[i * 4] * a + color.r * (1 - a));
    data[i * 3 + 1] = Math.round(image.data[i * 4 + 1] * a + color.g * (1 - a));
    data[i * 3 + 2] = Math.round(image.data[i * 4 + 2] * a + color.b * (1 - a));
  }
  return { width: image.width, height: image.height, channels: 3, data };
}

export const WHITE: Rgb = { r: 255, g: 255, b: 255 };

export function toRgb(image: RasterImage) {
  return flattenOnto(image, WHITE);
}

export function cropRaster(image: RasterImage, box: BoundingBox): RasterImage {
  const width = box.right - box.left;
  const height = box.bottom - box.top;
  const c = image.channels;
  const data = new Uint8Array(width * height * c);
  for (let y = 0; y < height; y += 1) {
    const srcStart = ((box.top + y) * image.width + box.left) * c;
    data.set(image.data.subarray(srcStart, srcStart + width * c), y * width * c);
  }
  return { width, height, channels: c, data };
}

export async function resizeRaster(
  image: RasterImage,
  width: number,
  height: number,
  kernel: ResizeKernel = 'lanczos3'
): Promise<RasterImage> {
  const { data, info } = await sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: image.channels }
  })
    .resize(width, height, { fit: 'fill', kernel })
    .raw()
    .toBuffer({ resolveWithObject: true });
  return { width: info.width, height: info.height, channels: toChannels(info.channels), data };
}

export async function sharpenRaster(image: RasterImage, sigma: number): Promise<RasterImage> {
  const { data, info } = await sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: image.channels }
  })
    .sharpen({ sigma })
    .raw()
    .toBuffer({ resolveWithObject: true });
  return { width: info.width, height: info.height, channels: toChannels(info.channels), data };
}

export async function encodePng(image: RasterImage): Promise<Buffer> {
  return sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: image.channels }
  })
    .png({ compressionLevel: 9, adaptiveFiltering: false, force: true })
    .toBuffer();
}
