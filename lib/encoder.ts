import sharp from 'sharp';
import { OUTPUT_FORMATS, type OutputFormatId } from './formats';
import type { RasterImage } from './raster';

export type EncodeOptions = {
  format: OutputFormatId;
  quality: number;
  minQuality: number;
  targetMaxKb: number | null;
  maxAttempts: number;
};

export type EncodeResult = {
  data: Buffer;
  format: OutputFormatId;
  quality: number | null;
  attempts: number;
  sizeTargetMet: boolean | null;
};

export type RasterEncoder = (image: RasterImage, format: OutputFormatId, quality: number) => Promise<Buffer>;

export const encodeRaster: RasterEncoder = async (image, format, quality) => {
  const pipeline = sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: image.channels }
  });

  if (format === 'webp') {
    return pipeline.webp({ quality, effort: 6 }).toBuffer();
  }
  if (format === 'png') {
    return pipeline.png({ compressionLevel: 9, adaptiveFiltering: false, force: true }).toBuffer();
  }
  return pipeline.jpeg({ quality, chromaSubsampling: '4:4:4', optimiseCoding: true }).toBuffer();
};

/** Coarse steps while quality is high, finer ones near the floor. */
export function nextQuality(quality: number, minQuality: number) {
  let step = 3;
  if (quality > 85) {
    step = 7;
  } else if (quality > 75) {
    step = 5;
  }
  return Math.max(minQuality, quality - step);
}

/**
 * Re-encodes variable-quality formats until the output fits `targetMaxKb`,
 * quality reaches the floor or the attempt bound is hit. The last encoding is
 * returned either way; an overshoot only shows up as `sizeTargetMet: false`.
 */
export async function encodeWithinBudget(
  image: RasterImage,
  options: EncodeOptions,
  encode: RasterEncoder = encodeRaster
): Promise<EncodeResult> {
  const format = OUTPUT_FORMATS[options.format];
  const limit = options.targetMaxKb === null ? null : options.targetMaxKb * 1024;
  const reportedQuality = format.qualityMode === 'lossless' ? null : options.quality;

  if (format.qualityMode !== 'variable' || limit === null) {
    const data = await encode(image, options.format, options.quality);
    return {
      data,
      format: options.format,
      quality: reportedQuality,
      attempts: 1,
      sizeTargetMet: limit === null ? null : data.length <= limit
    };
  }

  let quality = options.quality;
  let data = await encode(image, options.format, quality);
  let attempts = 1;

  while (data.length > limit && quality > options.minQuality && attempts < options.maxAttempts) {
    quality = nextQuality(quality, options.minQuality);
    data = await encode(image, options.format, quality);
    attempts += 1;
  }

  return {
    data,
    format: options.format,
    quality,
    attempts,
    sizeTargetMet: data.length <= limit
  };
}
