import JSZip from 'jszip';
import { resolveRequestConfig } from '@/lib/config';
import { formatErrorMessage, type ErrorMessage } from '@/lib/errors';
import { OUTPUT_FORMATS } from '@/lib/formats';
import { configFromForm, errorResponse, fileStem, isAcceptedUpload, missingInput } from '@/lib/http';
import { logger } from '@/lib/logger';
import { processImageBuffer, type ProcessingDiagnostics } from '@/lib/pipeline';
import { createSegmentationModel } from '@/lib/segmentation-model';

export const runtime = 'nodejs';
export const maxDuration = 300;

type BatchEntry =
  | { file: string; output: string; diagnostics: ProcessingDiagnostics }
  | { file: string; error: ErrorMessage };

export async function POST(req: Request) {
  try {
    const form = await req.formData();
    const files = [...form.getAll('images'), ...form.getAll('images[]')].filter(
      (entry): entry is File => entry instanceof File
    );

    if (!files.length) {
      throw missingInput('Missing image files');
    }

    const config = await resolveRequestConfig(configFromForm(form));
    const model = createSegmentationModel();
    const extension = OUTPUT_FORMATS[config.outputFormat].extension;
    const zip = new JSZip();
    const report: BatchEntry[] = [];

    for (const file of files) {
      if (!isAcceptedUpload(file.name)) {
        report.push({ file: file.name, error: formatErrorMessage(missingInput('Unsupported file type')) });
        continue;
      }
      try {
        const result = await processImageBuffer(Buffer.from(await file.arrayBuffer()), config, model);
        const output = `processed_${fileStem(file.name)}.${extension}`;
        zip.file(output, result.data);
        report.push({ file: file.name, output, diagnostics: result.diagnostics });
        logger.info('Processed image', { file: file.name, diagnostics: result.diagnostics });
      } catch (error) {
        const message = formatErrorMessage(error);
        report.push({ file: file.name, error: message });
        logger.error('Batch item failed', { file: file.name, ...message });
      }
    }

    zip.file('report.json', JSON.stringify({ processed: report.filter((e) => 'output' in e).length, files: report }, null, 2));
    const archive = await zip.generateAsync({ type: 'uint8array', compression: 'DEFLATE' });

    return new Response(new Uint8Array(archive), {
      headers: {
        'Content-Type': 'application/zip',
        'Content-Disposition': 'attachment; filename="processed_images.zip"'
      }
    });
  } catch (error) {
    return errorResponse(error, { route: 'process-batch' });
  }
}
