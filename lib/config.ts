import { readFile } from 'fs/promises';
import { z } from 'zod';
import { isHexColor } from './color';
import { ConfigValidationError } from './errors';
import { OUTPUT_FORMAT_IDS } from './formats';

const hexColor = z.string().refine(isHexColor, { message: 'expected a hex color such as #F3F3F3' });
const byte = z.number().int().min(0).max(255);
const quality = z.number().int().min(1).max(100);

const configShape = z.object({
  targetWidth: z.number().int().positive().max(10000),
  targetHeight: z.number().int().positive().max(10000),
  backgroundColor: hexColor,
  recolorBackground: z.boolean(),
  productSizeRatio: z.number().gt(0).max(1),
  minMarginRatio: z.number().min(0).lt(0.5),
  centerMode: z.enum(['bbox', 'centroid']),
  whiteThreshold: byte,
  blackThreshold: byte,
  backgroundEdgeMode: z.enum(['auto', 'white', 'black']),
  alphaThreshold: byte,
  boxPadding: z.number().int().min(0).max(500),
  softEdges: z.boolean(),
  softEdgesRadius: z.number().min(0).max(10),
  pngEdgeFix: z.boolean(),
  pngMatte: hexColor,
  flattenPngFirst: z.boolean(),
  autoUpscale: z.boolean(),
  upscaleThreshold: z.number().int().positive(),
  aiBackgroundRemoval: z.boolean(),
  aiConfidenceThreshold: z.number().int().min(1).max(255),
  outputFormat: z.enum(OUTPUT_FORMAT_IDS),
  quality,
  targetMaxKb: z.number().positive().nullable(),
  minQuality: quality,
  maxEncodeAttempts: z.number().int().min(1).max(20)
});

const processingConfigSchema = configShape.strict().superRefine((cfg, ctx) => {
  if (cfg.minQuality > cfg.quality) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['minQuality'],
      message: 'must not exceed quality'
    });
  }
});

const configLayerSchema = configShape.partial().strict();

export type ProcessingConfig = Readonly<z.infer<typeof configShape>>;

export type ConfigLayer = Partial<z.infer<typeof configShape>>;

export const DEFAULT_CONFIG: ProcessingConfig = Object.freeze({
  targetWidth: 1000,
  targetHeight: 1000,
  backgroundColor: '#F3F3F3',
  recolorBackground: false,
  productSizeRatio: 0.75,
  minMarginRatio: 0.05,
  centerMode: 'bbox',
  whiteThreshold: 240,
  blackThreshold: 15,
  backgroundEdgeMode: 'auto',
  alphaThreshold: 5,
  boxPadding: 10,
  softEdges: true,
  softEdgesRadius: 1,
  pngEdgeFix: true,
  pngMatte: '#FFFFFF',
  flattenPngFirst: false,
  autoUpscale: false,
  upscaleThreshold: 800,
  aiBackgroundRemoval: false,
  aiConfidenceThreshold: 200,
  outputFormat: 'jpeg',
  quality: 95,
  targetMaxKb: null,
  minQuality: 65,
  maxEncodeAttempts: 10
});

function toValidationError(error: z.ZodError) {
  const issue = error.issues[0];
  if (!issue) {
    return new ConfigValidationError('config', 'unknown validation failure');
  }
  if (issue.code === z.ZodIssueCode.unrecognized_keys) {
    return new ConfigValidationError(issue.keys[0] ?? 'config', 'unrecognized option');
  }
  const field = issue.path.length ? issue.path.join('.') : 'config';
  return new ConfigValidationError(field, issue.message);
}

/** Validates one partial layer, e.g. request overrides or the config file contents. */
export function parseConfigLayer(raw: unknown): ConfigLayer {
  const parsed = configLayerSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw toValidationError(parsed.error);
  }
  return parsed.data;
}

export function parseConfigJson(text: string | null | undefined): ConfigLayer {
  if (!text || !text.trim()) {
    return {};
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new ConfigValidationError('config', 'not valid JSON');
  }
  return parseConfigLayer(raw);
}

/**
 * Flattening native transparency onto white destroys the alpha the model
 * correction works on, so AI removal always runs with flattening off.
 */
export function forcedValuesFor(...layers: ConfigLayer[]): ConfigLayer {
  const merged: ConfigLayer = Object.assign({}, ...layers);
  return merged.aiBackgroundRemoval ? { flattenPngFirst: false } : {};
}

export type ConfigLayers = {
  file?: ConfigLayer;
  overrides?: ConfigLayer;
  forced?: ConfigLayer;
};

/** defaults -> file -> request overrides -> forced, validated once and frozen. */
export function resolveProcessingConfig(layers: ConfigLayers = {}): ProcessingConfig {
  const merged = {
    ...DEFAULT_CONFIG,
    ...layers.file,
    ...layers.overrides,
    ...layers.forced
  };
  const parsed = processingConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw toValidationError(parsed.error);
  }
  return Object.freeze(parsed.data);
}

/** Environment variables as read from `process.env`. */
export type Environment = Record<string, string | undefined>;

export function configFilePath(env: Environment = process.env) {
  return env.PRODUCT_CANVAS_CONFIG || 'config.json';
}

export async function loadConfigFile(path: string): Promise<ConfigLayer> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw error;
  }
  return parseConfigJson(text);
}

/** Full resolution for one request: the config file under the request's own overrides. */
export async function resolveRequestConfig(
  overrides: ConfigLayer,
  env: Environment = process.env
): Promise<ProcessingConfig> {
  const file = await loadConfigFile(configFilePath(env));
  return resolveProcessingConfig({ file, overrides, forced: forcedValuesFor(file, overrides) });
}
