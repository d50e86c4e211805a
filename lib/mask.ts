import type { BoundingBox } from './raster';

/** `1` marks product, `0` background. */
export type BinaryMask = {
  width: number;
  height: number;
  data: Uint8Array;
};

export type ComponentLabels = {
  labels: Int32Array;
  areas: number[];
};

export function createMask(width: number, height: number, fill: 0 | 1 = 0): BinaryMask {
  return { width, height, data: new Uint8Array(width * height).fill(fill) };
}

export function maskToAlpha(mask: BinaryMask) {
  const alpha = new Uint8Array(mask.data.length);
  for (let i = 0; i < alpha.length; i += 1) {
    alpha[i] = mask.data[i] ? 255 : 0;
  }
  return alpha;
}

/** 4-connected labelling; label -1 is background, otherwise an index into `areas`. */
export function labelComponents(mask: BinaryMask): ComponentLabels {
  const { width, height, data } = mask;
  const labels = new Int32Array(width * height).fill(-1);
  const areas: number[] = [];

  for (let idx = 0; idx < data.length; idx += 1) {
    if (!data[idx] || labels[idx] !== -1) {
      continue;
    }

    const label = areas.length;
    let area = 0;
    const stack = [idx];
    labels[idx] = label;

    while (stack.length > 0) {
      const cur = stack.pop() as number;
      area += 1;

      const x = cur % width;
      const y = Math.floor(cur / width);

      const neighbors = [
        x > 0 ? cur - 1 : -1,
        x + 1 < width ? cur + 1 : -1,
        y > 0 ? cur - width : -1,
        y + 1 < height ? cur + width : -1
      ];

      for (const next of neighbors) {
        if (next < 0 || !data[next] || labels[next] !== -1) continue;
        labels[next] = label;
        stack.push(next);
      }
    }

    areas.push(area);
  }

  return { labels, areas };
}

export function erode(mask: BinaryMask, radius: number): BinaryMask {
  const { width, height, data: src } = mask;
  if (radius <= 0) return { width, height, data: new Uint8Array(src) };
  const dst = new Uint8Array(src.length);

  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      let on = 1;
      for (let ky = -radius; ky <= radius && on; ky += 1) {
        for (let kx = -radius; kx <= radius; kx += 1) {
          const nx = x + kx;
          const ny = y + ky;
          if (nx < 0 || nx >= width || ny < 0 || ny >= height || !src[ny * width + nx]) {
            on = 0;
            break;
          }
        }
      }
      dst[y * width + x] = on;
    }
  }

  return { width, height, data: dst };
}

export function dilate(mask: BinaryMask, radius: number): BinaryMask {
  const { width, height, data: src } = mask;
  if (radius <= 0) return { width, height, data: new Uint8Array(src) };
  const dst = new Uint8Array(src.length);

  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      let on = 0;
      for (let ky = -radius; ky <= radius && !on; ky += 1) {
        for (let kx = -radius; kx <= radius; kx += 1) {
          const nx = x + kx;
          const ny = y + ky;
          if (nx < 0 || nx >= width || ny < 0 || ny >= height) continue;
          if (src[ny * width + nx]) {
            on = 1;
            break;
          }
        }
      }
      dst[y * width + x] = on;
    }
  }

  return { width, height, data: dst };
}

export function cropMask(mask: BinaryMask, box: BoundingBox): BinaryMask {
  const width = box.right - box.left;
  const height = box.bottom - box.top;
  const data = new Uint8Array(width * height);
  for (let y = 0; y < height; y += 1) {
    const start = (box.top + y) * mask.width + box.left;
    data.set(mask.data.subarray(start, start + width), y * width);
  }
  return { width, height, data };
}

/** Separable running-sum blur, edges clamped. */
export function boxBlur(src: Float32Array, width: number, height: number, radius: number) {
  if (radius <= 0) {
    return new Float32Array(src);
  }

  const tmp = new Float32Array(width * height);
  const dst = new Float32Array(width * height);
  const window = radius * 2 + 1;

  for (let y = 0; y < height; y += 1) {
    let sum = 0;
    for (let k = -radius; k <= radius; k += 1) {
      const x = Math.min(width - 1, Math.max(0, k));
      sum += src[y * width + x];
    }

    for (let x = 0; x < width; x += 1) {
      tmp[y * width + x] = sum / window;

      const removeX = Math.max(0, x - radius);
      const addX = Math.min(width - 1, x + radius + 1);
      sum += src[y * width + addX] - src[y * width + removeX];
    }
  }

  for (let x = 0; x < width; x += 1) {
    let sum = 0;
    for (let k = -radius; k <= radius; k += 1) {
      const y = Math.min(height - 1, Math.max(0, k));
      sum += tmp[y * width + x];
    }

    for (let y = 0; y < height; y += 1) {
      dst[y * width + x] = sum / window;

      const removeY = Math.max(0, y - radius);
      const addY = Math.min(height - 1, y + radius + 1);
      sum += tmp[addY * width + x] - tmp[removeY * width + x];
    }
  }

  return dst;
}
