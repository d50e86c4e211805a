import { resolveRequestConfig } from '@/lib/config';
import { configFromForm, errorResponse, isAcceptedUpload, missingInput, toHeaderJson } from '@/lib/http';
import { logger } from '@/lib/logger';
import { processImageBuffer } from '@/lib/pipeline';
import { createSegmentationModel } from '@/lib/segmentation-model';

export const runtime = 'nodejs';
export const maxDuration = 30;

export async function POST(req: Request) {
  try {
    const form = await req.formData();
    const file = form.get('image');

    if (!file || !(file instanceof File)) {
      throw missingInput('Missing image file');
    }
    if (!isAcceptedUpload(file.name)) {
      throw missingInput('Unsupported file type');
    }

    const config = await resolveRequestConfig(configFromForm(form));
    const bytes = Buffer.from(await file.arrayBuffer());
    const result = await processImageBuffer(bytes, config, createSegmentationModel());

    logger.info('Processed image', { file: file.name, diagnostics: result.diagnostics });

    return new Response(new Uint8Array(result.data), {
      headers: {
        'Content-Type': result.mimeType,
        'X-Processing-Diagnostics': toHeaderJson(result.diagnostics)
      }
    });
  } catch (error) {
    return errorResponse(error, { route: 'process' });
  }
}
