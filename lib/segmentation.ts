import { channelDistance, meanBrightness, type Rgb } from './color';
import type { ProcessingConfig } from './config';
import type { BinaryMask } from './mask';
import type { RasterImage } from './raster';

export type Polarity = 'white' | 'black';

export type SegmentationMode = 'alpha' | 'flood-fill';

export type SegmentationResult = {
  mask: BinaryMask;
  mode: SegmentationMode;
  polarity: Polarity | null;
};

export type FloodFillResult = {
  mask: BinaryMask;
  polarity: Polarity;
  reference: Rgb;
};

type FloodFillOptions = Pick<
  ProcessingConfig,
  'whiteThreshold' | 'blackThreshold' | 'backgroundEdgeMode'
>;

/**
 * Tolerances are max-channel distances in 8-bit units. Edge-band cells are
 * compared with the border colour interpolated between the corner samples.
 * Growth compares each cell with a reference that follows the background
 * slowly (`referenceFollow` per step) and never strays more than
 * `anchorTolerance` from the colour of the seed it started from, so a white
 * product on #F3F3F3 (12 levels) stays out while shading and sensor noise are
 * absorbed.
 */
export const FLOOD_FILL_TUNING = {
  workMaxDim: 256,
  cornerPatch: 10,
  barrierMargin: 2,
  seedTolerance: 6,
  growTolerance: 8,
  anchorTolerance: 10,
  referenceFollow: 0.0625,
  driftTolerance: 48,
  pixelTolerance: 8,
  lightCornerCutoff: 100,
  dynamicFloor: 150,
  dynamicDrop: 15
} as const;

type WorkImage = {
  width: number;
  height: number;
  rgb: Float32Array;
  colToCell: Int32Array;
  rowToCell: Int32Array;
};

function cellRanges(full: number, work: number) {
  const map = new Int32Array(full);
  for (let c = 0; c < work; c += 1) {
    const start = Math.floor((c * full) / work);
    const end = Math.floor(((c + 1) * full) / work);
    for (let i = start; i < end; i += 1) {
      map[i] = c;
    }
  }
  return map;
}

/** Area-average downscale; cells map back to full-resolution pixels through colToCell/rowToCell. */
function buildWorkImage(image: RasterImage): WorkImage {
  const { width, height, channels, data } = image;
  const longest = Math.max(width, height);
  const scale = longest > FLOOD_FILL_TUNING.workMaxDim ? FLOOD_FILL_TUNING.workMaxDim / longest : 1;
  const workW = Math.max(1, Math.min(width, Math.round(width * scale)));
  const workH = Math.max(1, Math.min(height, Math.round(height * scale)));
  const colToCell = cellRanges(width, workW);
  const rowToCell = cellRanges(height, workH);

  const sums = new Float64Array(workW * workH * 3);
  const counts = new Uint32Array(workW * workH);

  for (let y = 0; y < height; y += 1) {
    const rowBase = rowToCell[y] * workW;
    for (let x = 0; x < width; x += 1) {
      const cell = rowBase + colToCell[x];
      const src = (y * width + x) * channels;
      sums[cell * 3] += data[src];
      sums[cell * 3 + 1] += data[src + 1];
      sums[cell * 3 + 2] += data[src + 2];
      counts[cell] += 1;
    }
  }

  const rgb = new Float32Array(workW * workH * 3);
  for (let cell = 0; cell < counts.length; cell += 1) {
    const n = Math.max(1, counts[cell]);
    rgb[cell * 3] = sums[cell * 3] / n;
    rgb[cell * 3 + 1] = sums[cell * 3 + 1] / n;
    rgb[cell * 3 + 2] = sums[cell * 3 + 2] / n;
  }

  return { width: workW, height: workH, rgb, colToCell, rowToCell };
}

function cellColor(work: WorkImage, cell: number): Rgb {
  return { r: work.rgb[cell * 3], g: work.rgb[cell * 3 + 1], b: work.rgb[cell * 3 + 2] };
}

function median(values: number[]) {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = sorted.length >> 1;
  return sorted.length % 2 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

type CornerSample = {
  brightness: number;
  color: Rgb;
};

function sampleCorners(work: WorkImage): CornerSample[] {
  const { width, height } = work;
  const pw = Math.min(FLOOD_FILL_TUNING.cornerPatch, width);
  const ph = Math.min(FLOOD_FILL_TUNING.cornerPatch, height);
  const origins = [
    [0, 0],
    [width - pw, 0],
    [0, height - ph],
    [width - pw, height - ph]
  ];

  return origins.map(([ox, oy]) => {
    let r = 0;
    let g = 0;
    let b = 0;
    for (let y = oy; y < oy + ph; y += 1) {
      for (let x = ox; x < ox + pw; x += 1) {
        const c = cellColor(work, y * width + x);
        r += c.r;
        g += c.g;
        b += c.b;
      }
    }
    const n = pw * ph;
    const color = { r: r / n, g: g / n, b: b / n };
    return { brightness: meanBrightness(color.r, color.g, color.b), color };
  });
}

/**
 * Light corners lower the white cut-off towards the actual background
 * brightness so dim studio shots still seed, but never below the floor and
 * never above the configured threshold.
 */
export function effectiveWhiteThreshold(whiteThreshold: number, cornerMean: number) {
  if (cornerMean <= FLOOD_FILL_TUNING.lightCornerCutoff) {
    return whiteThreshold;
  }
  const dynamic = Math.max(FLOOD_FILL_TUNING.dynamicFloor, cornerMean - FLOOD_FILL_TUNING.dynamicDrop);
  return Math.min(whiteThreshold, dynamic);
}

function choosePolarity(corners: CornerSample[], whiteCut: number, options: FloodFillOptions) {
  const whiteVoters = corners.filter((c) => c.brightness >= whiteCut);
  const blackVoters = corners.filter((c) => c.brightness <= options.blackThreshold);

  let polarity: Polarity;
  if (options.backgroundEdgeMode === 'white' || options.backgroundEdgeMode === 'black') {
    polarity = options.backgroundEdgeMode;
  } else {
    polarity = blackVoters.length > whiteVoters.length ? 'black' : 'white';
  }

  const voters = polarity === 'white' ? whiteVoters : blackVoters;
  const pool = voters.length ? voters : corners;
  const reference = {
    r: median(pool.map((c) => c.color.r)),
    g: median(pool.map((c) => c.color.g)),
    b: median(pool.map((c) => c.color.b))
  };
  // a corner covered by the product does not speak for its edge
  const cornerColors = corners.map((c) => (voters.includes(c) ? c.color : reference));

  return { polarity, reference, cornerColors };
}

function analyzeCorners(work: WorkImage, options: FloodFillOptions) {
  const corners = sampleCorners(work);
  const cornerMean = corners.reduce((acc, c) => acc + c.brightness, 0) / corners.length;
  const whiteCut = effectiveWhiteThreshold(options.whiteThreshold, cornerMean);
  return { ...choosePolarity(corners, whiteCut, options), whiteCut };
}

function lerpRgb(a: Rgb, b: Rgb, t: number): Rgb {
  return { r: a.r + (b.r - a.r) * t, g: a.g + (b.g - a.g) * t, b: a.b + (b.b - a.b) * t };
}

/** Position of `pos` between the centres of the two corner patches along an edge of `size` cells. */
function edgePosition(pos: number, size: number) {
  const half = (Math.min(FLOOD_FILL_TUNING.cornerPatch, size) - 1) / 2;
  const span = size - 1 - 2 * half;
  if (span <= 0) return 0;
  return Math.min(1, Math.max(0, (pos - half) / span));
}

/**
 * Expected background colour of an edge-band cell: left and right bands
 * interpolate between their top and bottom corners, top and bottom bands
 * between their left and right corners.
 */
function borderReference(work: WorkImage, cornerColors: Rgb[], x: number, y: number): Rgb {
  const { width: w, height: h } = work;
  const margin = FLOOD_FILL_TUNING.barrierMargin;
  const [tl, tr, bl, br] = cornerColors;
  const ty = edgePosition(y, h);
  if (x < margin) return lerpRgb(tl, bl, ty);
  if (x >= w - margin) return lerpRgb(tr, br, ty);
  const tx = edgePosition(x, w);
  return y < margin ? lerpRgb(tl, tr, tx) : lerpRgb(bl, br, tx);
}

/**
 * Background = pixels reachable from the border through background-bright
 * pixels that stay close to the local background colour. Runs on the work
 * image, then maps back to full resolution and re-tests pixels along the
 * product boundary.
 */
export function computeFloodFillMask(image: RasterImage, options: FloodFillOptions): FloodFillResult {
  const work = buildWorkImage(image);
  const { polarity, reference, cornerColors, whiteCut } = analyzeCorners(work, options);

  const passesPolarity = (c: Rgb) => {
    const v = meanBrightness(c.r, c.g, c.b);
    return polarity === 'white' ? v >= whiteCut : v <= options.blackThreshold;
  };

  const { width: w, height: h } = work;
  const margin = FLOOD_FILL_TUNING.barrierMargin;
  const accepted = new Uint8Array(w * h);
  for (let y = 0; y < h; y += 1) {
    for (let x = 0; x < w; x += 1) {
      const i = y * w + x;
      const c = cellColor(work, i);
      if (!passesPolarity(c)) continue;
      if (channelDistance(c, reference) > FLOOD_FILL_TUNING.driftTolerance) continue;
      const inBand = x < margin || y < margin || x >= w - margin || y >= h - margin;
      if (inBand && channelDistance(c, borderReference(work, cornerColors, x, y)) > FLOOD_FILL_TUNING.seedTolerance) {
        continue;
      }
      accepted[i] = 1;
    }
  }

  const background = new Uint8Array(w * h);
  // per cell: the followed reference, then the anchor of the seed it came from
  const refs = new Float32Array(w * h * 6);
  const queue = new Int32Array(w * h);
  let head = 0;
  let tail = 0;

  const enqueue = (i: number, ref: Rgb, anchor: Rgb) => {
    background[i] = 1;
    refs.set([ref.r, ref.g, ref.b, anchor.r, anchor.g, anchor.b], i * 6);
    queue[tail] = i;
    tail += 1;
  };

  const seed = (i: number) => {
    if (!accepted[i] || background[i]) return;
    const border = borderReference(work, cornerColors, i % w, Math.floor(i / w));
    enqueue(i, border, border);
  };

  for (let x = 0; x < w; x += 1) {
    seed(x);
    seed((h - 1) * w + x);
  }
  for (let y = 0; y < h; y += 1) {
    seed(y * w);
    seed(y * w + w - 1);
  }

  const follow = FLOOD_FILL_TUNING.referenceFollow;
  while (head < tail) {
    const cur = queue[head];
    head += 1;
    const x = cur % w;
    const y = Math.floor(cur / w);
    const base = cur * 6;
    const ref = { r: refs[base], g: refs[base + 1], b: refs[base + 2] };
    const anchor = { r: refs[base + 3], g: refs[base + 4], b: refs[base + 5] };
    const neighbors = [
      x > 0 ? cur - 1 : -1,
      x + 1 < w ? cur + 1 : -1,
      y > 0 ? cur - w : -1,
      y + 1 < h ? cur + w : -1
    ];
    for (const next of neighbors) {
      if (next < 0 || background[next] || !accepted[next]) continue;
      const c = cellColor(work, next);
      if (channelDistance(c, ref) > FLOOD_FILL_TUNING.growTolerance) continue;
      if (channelDistance(c, anchor) > FLOOD_FILL_TUNING.anchorTolerance) continue;
      enqueue(next, lerpRgb(ref, c, follow), anchor);
    }
  }

  const mask = upscaleBackground(image, work, background, reference, passesPolarity);
  return { mask, polarity, reference };
}

function upscaleBackground(
  image: RasterImage,
  work: WorkImage,
  background: Uint8Array,
  reference: Rgb,
  passesPolarity: (c: Rgb) => boolean
): BinaryMask {
  const { width, height, channels, data } = image;
  const { width: w, height: h } = work;
  const out = new Uint8Array(width * height);

  if (w === width && h === height) {
    for (let i = 0; i < out.length; i += 1) {
      out[i] = background[i] ? 0 : 1;
    }
    return { width, height, data: out };
  }

  // 0 = product interior, 1 = background interior, 2 = boundary cell
  const kind = new Uint8Array(w * h);
  const boundaryRef = new Array<Rgb | null>(w * h).fill(null);

  for (let y = 0; y < h; y += 1) {
    for (let x = 0; x < w; x += 1) {
      const i = y * w + x;
      let touchesOther = false;
      if (x > 0 && background[i - 1] !== background[i]) touchesOther = true;
      if (x + 1 < w && background[i + 1] !== background[i]) touchesOther = true;
      if (y > 0 && background[i - w] !== background[i]) touchesOther = true;
      if (y + 1 < h && background[i + w] !== background[i]) touchesOther = true;
      kind[i] = touchesOther ? 2 : background[i];
    }
  }

  for (let y = 0; y < h; y += 1) {
    for (let x = 0; x < w; x += 1) {
      const i = y * w + x;
      if (kind[i] !== 2) continue;
      let r = 0;
      let g = 0;
      let b = 0;
      let n = 0;
      for (let ky = -1; ky <= 1; ky += 1) {
        for (let kx = -1; kx <= 1; kx += 1) {
          const nx = x + kx;
          const ny = y + ky;
          if (nx < 0 || nx >= w || ny < 0 || ny >= h) continue;
          const j = ny * w + nx;
          if (kind[j] !== 1) continue;
          const c = cellColor(work, j);
          r += c.r;
          g += c.g;
          b += c.b;
          n += 1;
        }
      }
      boundaryRef[i] = n ? { r: r / n, g: g / n, b: b / n } : reference;
    }
  }

  for (let y = 0; y < height; y += 1) {
    const rowBase = work.rowToCell[y] * w;
    for (let x = 0; x < width; x += 1) {
      const cell = rowBase + work.colToCell[x];
      const p = y * width + x;
      if (kind[cell] === 1) {
        out[p] = 0;
        continue;
      }
      const ref = boundaryRef[cell];
      if (kind[cell] === 0 || !ref) {
        out[p] = 1;
        continue;
      }
      const src = p * channels;
      const c = { r: data[src], g: data[src + 1], b: data[src + 2] };
      const isBackground = passesPolarity(c) && channelDistance(c, ref) <= FLOOD_FILL_TUNING.pixelTolerance;
      out[p] = isBackground ? 0 : 1;
    }
  }

  return { width, height, data: out };
}

export function computeAlphaMask(image: RasterImage, alphaThreshold: number): BinaryMask {
  const total = image.width * image.height;
  const data = new Uint8Array(total);
  if (image.channels === 3) {
    data.fill(1);
  } else {
    for (let i = 0; i < total; i += 1) {
      data[i] = image.data[i * 4 + 3] > alphaThreshold ? 1 : 0;
    }
  }
  return { width: image.width, height: image.height, data };
}

export function computeProductMask(image: RasterImage, config: ProcessingConfig): SegmentationResult {
  if (image.channels === 4) {
    return { mask: computeAlphaMask(image, config.alphaThreshold), mode: 'alpha', polarity: null };
  }
  const { mask, polarity } = computeFloodFillMask(image, config);
  return { mask, mode: 'flood-fill', polarity };
}
