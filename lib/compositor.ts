import sharp from 'sharp';
import { hexToRgb } from './color';
import type { ProcessingConfig } from './config';
import { boxBlur, maskToAlpha, type BinaryMask } from './mask';
import { createRaster, flattenOnto, resizeRaster, sharpenRaster, withAlpha, type RasterImage } from './raster';

export type Placement = {
  x: number;
  y: number;
  width: number;
  height: number;
};

export type ProductFit = {
  width: number;
  height: number;
  scale: number;
  marginX: number;
  marginY: number;
};

export type CompositeResult = {
  canvas: RasterImage;
  placement: Placement;
  upscalePasses: number;
};

type FitOptions = Pick<ProcessingConfig, 'targetWidth' | 'targetHeight' | 'productSizeRatio' | 'minMarginRatio'>;

const SIZE_EPS = 1e-9;
const UPSCALE_STEP = 2;
const UPSCALE_SHARPEN_SIGMA = 0.6;

/** Largest aspect-preserving size inside both the ratio box and the margin box. */
export function planProductFit(productWidth: number, productHeight: number, options: FitOptions): ProductFit {
  const { targetWidth: tw, targetHeight: th } = options;
  const marginX = Math.round(tw * options.minMarginRatio);
  const marginY = Math.round(th * options.minMarginRatio);
  const boxW = Math.min(Math.floor(tw * options.productSizeRatio), tw - 2 * marginX);
  const boxH = Math.min(Math.floor(th * options.productSizeRatio), th - 2 * marginY);
  const scale = Math.min(boxW / productWidth, boxH / productHeight);

  return {
    width: Math.max(1, Math.floor(productWidth * scale + SIZE_EPS)),
    height: Math.max(1, Math.floor(productHeight * scale + SIZE_EPS)),
    scale,
    marginX,
    marginY
  };
}

function clampOffset(value: number, margin: number, canvas: number, size: number) {
  return Math.max(margin, Math.min(value, canvas - margin - size));
}

export function maskCentroid(mask: BinaryMask) {
  let sx = 0;
  let sy = 0;
  let n = 0;
  for (let y = 0; y < mask.height; y += 1) {
    for (let x = 0; x < mask.width; x += 1) {
      if (!mask.data[y * mask.width + x]) continue;
      sx += x;
      sy += y;
      n += 1;
    }
  }
  return n ? { x: sx / n, y: sy / n } : null;
}

export function placeProduct(
  fit: ProductFit,
  options: Pick<ProcessingConfig, 'targetWidth' | 'targetHeight' | 'centerMode'>,
  mask?: BinaryMask
): Placement {
  const { targetWidth: tw, targetHeight: th } = options;
  let x = Math.floor((tw - fit.width) / 2);
  let y = Math.floor((th - fit.height) / 2);

  if (options.centerMode === 'centroid' && mask) {
    const centroid = maskCentroid(mask);
    if (centroid) {
      x = Math.round(tw / 2 - centroid.x * fit.scale);
      y = Math.round(th / 2 - centroid.y * fit.scale);
    }
  }

  return {
    x: clampOffset(x, fit.marginX, tw, fit.width),
    y: clampOffset(y, fit.marginY, th, fit.height),
    width: fit.width,
    height: fit.height
  };
}

/** Enlarges in steps of at most 2x, sharpening after each step, stopping short of the final size. */
export async function enlargeStepwise(product: RasterImage, width: number, height: number) {
  let current = product;
  let passes = 0;
  while (current.width * UPSCALE_STEP < width && current.height * UPSCALE_STEP < height) {
    const resized = await resizeRaster(current, current.width * UPSCALE_STEP, current.height * UPSCALE_STEP);
    current = await sharpenRaster(resized, UPSCALE_SHARPEN_SIGMA);
    passes += 1;
  }
  return { image: current, passes };
}

function softenAlpha(image: RasterImage, radius: number): RasterImage {
  const total = image.width * image.height;
  const alpha = new Float32Array(total);
  for (let i = 0; i < total; i += 1) {
    alpha[i] = image.data[i * 4 + 3];
  }
  const blurred = boxBlur(alpha, image.width, image.height, radius);
  const data = new Uint8Array(image.data);
  for (let i = 0; i < total; i += 1) {
    data[i * 4 + 3] = Math.round(blurred[i]);
  }
  return { ...image, data };
}

function blendOnto(canvas: RasterImage, product: RasterImage, at: Placement) {
  const out = canvas.data;
  for (let y = 0; y < product.height; y += 1) {
    const cy = at.y + y;
    if (cy < 0 || cy >= canvas.height) continue;
    for (let x = 0; x < product.width; x += 1) {
      const cx = at.x + x;
      if (cx < 0 || cx >= canvas.width) continue;
      const src = (y * product.width + x) * 4;
      const dst = (cy * canvas.width + cx) * 3;
      const a = product.data[src + 3] / 255;
      if (a === 0) continue;
      out[dst] = Math.round(product.data[src] * a + out[dst] * (1 - a));
      out[dst + 1] = Math.round(product.data[src + 1] * a + out[dst + 1] * (1 - a));
      out[dst + 2] = Math.round(product.data[src + 2] * a + out[dst + 2] * (1 - a));
    }
  }
}

/**
 * Scales the cropped product into the ratio/margin box, centres it and blends
 * it onto a fresh canvas. RGB crops are cut out with the product mask; RGBA
 * crops keep their own alpha so anti-aliased edges survive.
 */
export async function compositeOnCanvas(
  product: RasterImage,
  mask: BinaryMask,
  config: ProcessingConfig
): Promise<CompositeResult> {
  const fit = planProductFit(product.width, product.height, config);
  const placement = placeProduct(fit, config, mask);

  const cutout = product.channels === 4 ? product : withAlpha(product, maskToAlpha(mask));
  let source = cutout;
  let upscalePasses = 0;
  const enlarging = fit.width > product.width && fit.height > product.height;
  if (config.autoUpscale && enlarging && Math.max(product.width, product.height) < config.upscaleThreshold) {
    const enlarged = await enlargeStepwise(cutout, fit.width, fit.height);
    source = enlarged.image;
    upscalePasses = enlarged.passes;
  }

  let scaled = await resizeRaster(source, fit.width, fit.height, 'lanczos3');
  const radius = Math.round(config.softEdgesRadius);
  if (config.softEdges && radius > 0) {
    scaled = softenAlpha(scaled, radius);
  }

  const canvas = createRaster(config.targetWidth, config.targetHeight, hexToRgb(config.backgroundColor));
  blendOnto(canvas, scaled, placement);

  return { canvas, placement, upscalePasses };
}

/** No-product fallback: the whole frame, cover-resized and centre-cropped to the canvas. */
export async function coverOnCanvas(image: RasterImage, config: ProcessingConfig): Promise<CompositeResult> {
  const flat = flattenOnto(image, hexToRgb(config.backgroundColor));
  const { data, info } = await sharp(flat.data, {
    raw: { width: flat.width, height: flat.height, channels: 3 }
  })
    .resize(config.targetWidth, config.targetHeight, { fit: 'cover', position: 'centre', kernel: 'lanczos3' })
    .raw()
    .toBuffer({ resolveWithObject: true });

  return {
    canvas: { width: info.width, height: info.height, channels: 3, data },
    placement: { x: 0, y: 0, width: info.width, height: info.height },
    upscalePasses: 0
  };
}

type RepaintOptions = Pick<ProcessingConfig, 'backgroundColor' | 'whiteThreshold' | 'blackThreshold'>;

/**
 * Paints every canvas pixel whose channels are all at or above
 * `whiteThreshold`, or all at or below `blackThreshold`, with the background
 * colour. Applies to product pixels too.
 */
export function repaintBackground(canvas: RasterImage, options: RepaintOptions): RasterImage {
  const fill = hexToRgb(options.backgroundColor);
  const { channels } = canvas;
  const data = new Uint8Array(canvas.data);
  for (let i = 0; i < data.length; i += channels) {
    const r = data[i];
    const g = data[i + 1];
    const b = data[i + 2];
    const white = r >= options.whiteThreshold && g >= options.whiteThreshold && b >= options.whiteThreshold;
    const black = r <= options.blackThreshold && g <= options.blackThreshold && b <= options.blackThreshold;
    if (white || black) {
      data[i] = fill.r;
      data[i + 1] = fill.g;
      data[i + 2] = fill.b;
    }
  }
  return { ...canvas, data };
}
