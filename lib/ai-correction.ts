import type { ProcessingConfig } from './config';
import { erode, labelComponents } from './mask';
import { toRgb, withAlpha, type RasterImage } from './raster';
import { computeFloodFillMask } from './segmentation';

export type AiCorrectionStats = {
  promotedPixels: number;
  restoredRegions: number;
};

export type AiCorrectionResult = {
  image: RasterImage;
  stats: AiCorrectionStats;
};

type CorrectionOptions = Pick<
  ProcessingConfig,
  'alphaThreshold' | 'aiConfidenceThreshold' | 'whiteThreshold' | 'blackThreshold' | 'backgroundEdgeMode'
>;

export const AI_CORRECTION_TUNING = {
  interiorErosion: 1,
  survivalRatio: 0.1,
  minRegionFraction: 0.0005,
  minRegionArea: 16
} as const;

/**
 * Reconciles a model alpha with the flood-fill product mask:
 * semi-transparent interior product pixels become opaque (ghosting), and a
 * flood-fill product region the model dropped almost entirely is restored
 * from the source pixels (a second product the model treated as background).
 */
export function correctModelAlpha(
  image: RasterImage,
  modelAlpha: Uint8Array,
  options: CorrectionOptions
): AiCorrectionResult {
  const { width, height } = image;
  const total = width * height;
  const { mask: flood } = computeFloodFillMask(toRgb(image), options);
  const interior = erode(flood, AI_CORRECTION_TUNING.interiorErosion);

  const alpha = new Uint8Array(modelAlpha);
  let promotedPixels = 0;

  for (let i = 0; i < total; i += 1) {
    const a = modelAlpha[i];
    if (a > options.alphaThreshold && a < options.aiConfidenceThreshold && interior.data[i]) {
      alpha[i] = 255;
      promotedPixels += 1;
    }
  }

  const { labels, areas } = labelComponents(flood);
  const survivors = new Uint32Array(areas.length);
  for (let i = 0; i < total; i += 1) {
    const label = labels[i];
    if (label >= 0 && modelAlpha[i] > options.alphaThreshold) {
      survivors[label] += 1;
    }
  }

  const minArea = Math.max(
    AI_CORRECTION_TUNING.minRegionArea,
    Math.ceil(total * AI_CORRECTION_TUNING.minRegionFraction)
  );
  const restore = areas.map(
    (area, label) => area >= minArea && survivors[label] < area * AI_CORRECTION_TUNING.survivalRatio
  );

  for (let i = 0; i < total; i += 1) {
    const label = labels[i];
    if (label >= 0 && restore[label]) {
      alpha[i] = 255;
    }
  }

  return {
    image: withAlpha(image, alpha),
    stats: {
      promotedPixels,
      restoredRegions: restore.filter(Boolean).length
    }
  };
}
