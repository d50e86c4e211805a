import type { Rgb } from './color';
import { dilate, type BinaryMask } from './mask';
import type { RasterImage } from './raster';

const OPAQUE = 0.95;
const TRANSPARENT = 0.05;
const FRINGE_DISTANCE = 0.35;

function fromPredicate(image: RasterImage, test: (a: number) => boolean): BinaryMask {
  const total = image.width * image.height;
  const data = new Uint8Array(total);
  for (let i = 0; i < total; i += 1) {
    data[i] = test(image.data[i * 4 + 3] / 255) ? 1 : 0;
  }
  return { width: image.width, height: image.height, data };
}

function distanceToMatte(r: number, g: number, b: number, matte: [number, number, number]) {
  return Math.hypot(r - matte[0], g - matte[1], b - matte[2]);
}

/**
 * Removes a light matte that semi-transparent edge pixels picked up from an
 * earlier composite. Only light pixels next to transparency are touched; a
 * pixel whose unmatted color would still sit inside the fringe radius belongs
 * to a light product edge and keeps its color. Alpha is never changed.
 */
export function unmatteEdges(image: RasterImage, matteColor: Rgb): RasterImage {
  if (image.channels !== 4) {
    return image;
  }

  const { width, height } = image;
  const matte: [number, number, number] = [matteColor.r / 255, matteColor.g / 255, matteColor.b / 255];

  const opaque = fromPredicate(image, (a) => a >= OPAQUE);
  const transparent = fromPredicate(image, (a) => a <= TRANSPARENT);
  const nearTransparent = dilate(transparent, 2);
  const nearOpaque = dilate(opaque, 1);

  const out = new Uint8Array(image.data);

  for (let i = 0; i < width * height; i += 1) {
    const a = image.data[i * 4 + 3] / 255;
    if (a <= TRANSPARENT || a >= OPAQUE) continue;

    const edge = nearTransparent.data[i] === 1;
    const antialiased = a < 0.5 && nearOpaque.data[i] === 1;
    if (!edge && !antialiased) continue;

    const r = image.data[i * 4] / 255;
    const g = image.data[i * 4 + 1] / 255;
    const b = image.data[i * 4 + 2] / 255;
    if (distanceToMatte(r, g, b, matte) >= FRINGE_DISTANCE) continue;

    const ur = Math.round(Math.min(1, Math.max(0, (r - matte[0] * (1 - a)) / a)) * 255);
    const ug = Math.round(Math.min(1, Math.max(0, (g - matte[1] * (1 - a)) / a)) * 255);
    const ub = Math.round(Math.min(1, Math.max(0, (b - matte[2] * (1 - a)) / a)) * 255);
    if (distanceToMatte(ur / 255, ug / 255, ub / 255, matte) < FRINGE_DISTANCE) continue;

    out[i * 4] = ur;
    out[i * 4 + 1] = ug;
    out[i * 4 + 2] = ub;
  }

  return { width, height, channels: 4, data: out };
}
