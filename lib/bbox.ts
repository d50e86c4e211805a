import type { BinaryMask } from './mask';
import type { BoundingBox } from './raster';

export const DEFAULT_MIN_BOX_SIZE = 2;

/**
 * Tight box around every product pixel, grown by `padding` and clamped to the
 * image. `right` and `bottom` are exclusive. Returns null for an empty mask or
 * a degenerate product smaller than `minSize` on either axis.
 */
export function findProductBox(
  mask: BinaryMask,
  padding: number,
  minSize = DEFAULT_MIN_BOX_SIZE
): BoundingBox | null {
  const { width, height, data } = mask;
  let minX = width;
  let minY = height;
  let maxX = -1;
  let maxY = -1;

  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      if (!data[y * width + x]) continue;
      if (x < minX) minX = x;
      if (x > maxX) maxX = x;
      if (y < minY) minY = y;
      if (y > maxY) maxY = y;
    }
  }

  if (maxX < 0) {
    return null;
  }

  if (maxX - minX + 1 < minSize || maxY - minY + 1 < minSize) {
    return null;
  }

  return {
    left: Math.max(0, minX - padding),
    top: Math.max(0, minY - padding),
    right: Math.min(width, maxX + 1 + padding),
    bottom: Math.min(height, maxY + 1 + padding)
  };
}
