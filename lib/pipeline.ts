import { correctModelAlpha, type AiCorrectionStats } from './ai-correction';
import { findProductBox } from './bbox';
import { hexToRgb } from './color';
import {
  compositeOnCanvas,
  coverOnCanvas,
  repaintBackground,
  type CompositeResult,
  type Placement
} from './compositor';
import type { ProcessingConfig } from './config';
import { encodeWithinBudget, encodeRaster, type RasterEncoder } from './encoder';
import { OUTPUT_FORMATS, type OutputFormatId } from './formats';
import { cropMask } from './mask';
import { cropRaster, decodeImage, flattenOnto, WHITE, type BoundingBox, type RasterImage } from './raster';
import { computeProductMask, type Polarity, type SegmentationMode } from './segmentation';
import { notConfiguredModel, type SegmentationModel } from './segmentation-model';
import { unmatteEdges } from './unmatte';

export type AiRemovalStatus = 'disabled' | 'applied' | 'fallback';

export type ProcessingDiagnostics = {
  productFound: boolean;
  boundingBox: BoundingBox | null;
  segmentationMode: SegmentationMode;
  polarity: Polarity | null;
  productSize: { width: number; height: number } | null;
  placement: Placement;
  encodedBytes: number;
  quality: number | null;
  encodeAttempts: number;
  sizeTargetMet: boolean | null;
  aiRemoval: AiRemovalStatus;
  aiFallbackReason: string | null;
  aiCorrection: AiCorrectionStats | null;
  upscalePasses: number;
};

export type ProcessResult = {
  data: Buffer;
  format: OutputFormatId;
  mimeType: string;
  width: number;
  height: number;
  diagnostics: ProcessingDiagnostics;
};

type AiStage = {
  image: RasterImage;
  status: AiRemovalStatus;
  reason: string | null;
  stats: AiCorrectionStats | null;
};

async function runAiRemoval(image: RasterImage, config: ProcessingConfig, model: SegmentationModel): Promise<AiStage> {
  if (!config.aiBackgroundRemoval) {
    return { image, status: 'disabled', reason: null, stats: null };
  }

  const outcome = await model.segment(image);
  if (outcome.status === 'unavailable') {
    return { image, status: 'fallback', reason: outcome.reason, stats: null };
  }
  if (outcome.alpha.length !== image.width * image.height) {
    return { image, status: 'fallback', reason: 'model alpha does not match the image size', stats: null };
  }

  const corrected = correctModelAlpha(image, outcome.alpha, config);
  return { image: corrected.image, status: 'applied', reason: null, stats: corrected.stats };
}

/**
 * Runs one decoded image through segmentation, cropping, edge cleanup,
 * compositing, optional background repainting and encoding. Never mutates
 * `image`; a missing product or an unavailable model shows up in the
 * diagnostics rather than as an error.
 */
export async function processImage(
  image: RasterImage,
  config: ProcessingConfig,
  model: SegmentationModel = notConfiguredModel,
  encode: RasterEncoder = encodeRaster
): Promise<ProcessResult> {
  const source = config.flattenPngFirst && image.channels === 4 ? flattenOnto(image, WHITE) : image;
  const ai = await runAiRemoval(source, config, model);

  const { mask, mode, polarity } = computeProductMask(ai.image, config);
  const box = findProductBox(mask, config.boxPadding);

  let composite: CompositeResult;
  if (!box) {
    composite = await coverOnCanvas(ai.image, config);
  } else {
    let product = cropRaster(ai.image, box);
    if (product.channels === 4 && config.pngEdgeFix) {
      product = unmatteEdges(product, hexToRgb(config.pngMatte));
    }
    composite = await compositeOnCanvas(product, cropMask(mask, box), config);
  }

  const canvas = config.recolorBackground ? repaintBackground(composite.canvas, config) : composite.canvas;
  const encoded = await encodeWithinBudget(
    canvas,
    {
      format: config.outputFormat,
      quality: config.quality,
      minQuality: config.minQuality,
      targetMaxKb: config.targetMaxKb,
      maxAttempts: config.maxEncodeAttempts
    },
    encode
  );

  return {
    data: encoded.data,
    format: encoded.format,
    mimeType: OUTPUT_FORMATS[encoded.format].mimeType,
    width: canvas.width,
    height: canvas.height,
    diagnostics: {
      productFound: box !== null,
      boundingBox: box,
      segmentationMode: mode,
      polarity,
      productSize: box ? { width: box.right - box.left, height: box.bottom - box.top } : null,
      placement: composite.placement,
      encodedBytes: encoded.data.length,
      quality: encoded.quality,
      encodeAttempts: encoded.attempts,
      sizeTargetMet: encoded.sizeTargetMet,
      aiRemoval: ai.status,
      aiFallbackReason: ai.reason,
      aiCorrection: ai.stats,
      upscalePasses: composite.upscalePasses
    }
  };
}

export async function processImageBuffer(
  input: Buffer,
  config: ProcessingConfig,
  model: SegmentationModel = notConfiguredModel
): Promise<ProcessResult> {
  const image = await decodeImage(input);
  return processImage(image, config, model);
}
