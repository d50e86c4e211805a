import { NextResponse } from 'next/server';
import { z } from 'zod';
import { parseConfigJson, parseConfigLayer, resolveRequestConfig } from '@/lib/config';
import { ConfigValidationError } from '@/lib/errors';
import { errorResponse, missingInput } from '@/lib/http';
import { logger } from '@/lib/logger';
import { processImageBuffer } from '@/lib/pipeline';
import { createSegmentationModel } from '@/lib/segmentation-model';

export const runtime = 'nodejs';
export const maxDuration = 30;

const requestSchema = z.object({
  image: z.string().min(1),
  config: z.unknown().optional()
});

const DATA_URL_PREFIX = /^data:[^;,]+;base64,/;

export async function POST(req: Request) {
  try {
    let body: unknown;
    try {
      body = await req.json();
    } catch {
      throw new ConfigValidationError('body', 'not valid JSON');
    }

    const parsed = requestSchema.safeParse(body);
    if (!parsed.success) {
      throw missingInput('Missing base64 image');
    }

    const rawConfig = parsed.data.config;
    const overrides = typeof rawConfig === 'string' ? parseConfigJson(rawConfig) : parseConfigLayer(rawConfig);
    const config = await resolveRequestConfig(overrides);
    const bytes = Buffer.from(parsed.data.image.replace(DATA_URL_PREFIX, ''), 'base64');
    const result = await processImageBuffer(bytes, config, createSegmentationModel());

    logger.info('Processed image', { file: 'base64', diagnostics: result.diagnostics });

    return NextResponse.json({
      image: result.data.toString('base64'),
      mimeType: result.mimeType,
      width: result.width,
      height: result.height,
      diagnostics: result.diagnostics
    });
  } catch (error) {
    return errorResponse(error, { route: 'process-base64' });
  }
}
