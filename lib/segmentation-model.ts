import sharp from 'sharp';
import type { Environment } from './config';
import { logger } from './logger';
import { encodePng, type RasterImage } from './raster';

export type SegmentationOutcome =
  | { status: 'ok'; alpha: Uint8Array }
  | { status: 'unavailable'; reason: string };

export interface SegmentationModel {
  readonly name: string;
  segment(image: RasterImage): Promise<SegmentationOutcome>;
}

export const notConfiguredModel: SegmentationModel = {
  name: 'none',
  async segment() {
    return { status: 'unavailable', reason: 'no segmentation model configured' };
  }
};

export type RemoteModelOptions = {
  url: string;
  apiKey?: string;
  timeoutMs?: number;
};

type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

const DEFAULT_TIMEOUT_MS = 30000;

/** Reads the alpha channel of a model reply, resampled to the input size. */
async function readReplyAlpha(reply: Buffer, width: number, height: number) {
  const { data, info } = await sharp(reply)
    .ensureAlpha()
    .resize(width, height, { fit: 'fill' })
    .extractChannel(3)
    .raw()
    .toBuffer({ resolveWithObject: true });
  if (info.channels !== 1 || data.length !== width * height) {
    throw new Error(`unexpected alpha layout (${info.channels} channels, ${data.length} bytes)`);
  }
  return new Uint8Array(data);
}

/**
 * Background-removal HTTP service taking a multipart `image_file` and answering
 * with a PNG cutout. Any failure degrades to `unavailable`.
 */
export class RemoteSegmentationModel implements SegmentationModel {
  public readonly name = 'remote';

  constructor(
    private readonly options: RemoteModelOptions,
    private readonly fetchImpl: FetchLike = (input, init) => fetch(input, init)
  ) {}

  async segment(image: RasterImage): Promise<SegmentationOutcome> {
    try {
      const png = await encodePng(image);
      const body = new FormData();
      body.append('image_file', new Blob([new Uint8Array(png)], { type: 'image/png' }), 'input.png');
      body.append('size', 'auto');
      body.append('format', 'png');
      body.append('type', 'product');

      const headers: Record<string, string> = {};
      if (this.options.apiKey) {
        headers['X-Api-Key'] = this.options.apiKey;
      }

      const res = await this.fetchImpl(this.options.url, {
        method: 'POST',
        headers,
        body,
        signal: AbortSignal.timeout(this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS)
      });

      if (!res.ok) {
        return this.unavailable(`model responded with HTTP ${res.status}`);
      }

      const reply = Buffer.from(await res.arrayBuffer());
      const alpha = await readReplyAlpha(reply, image.width, image.height);
      return { status: 'ok', alpha };
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      return this.unavailable(`model request failed: ${detail}`);
    }
  }

  private unavailable(reason: string): SegmentationOutcome {
    logger.warn('Segmentation model unavailable, falling back to flood fill', { model: this.name, reason });
    return { status: 'unavailable', reason };
  }
}

export function createSegmentationModel(env: Environment = process.env): SegmentationModel {
  const url = env.SEGMENTATION_API_URL;
  if (!url) {
    return notConfiguredModel;
  }
  return new RemoteSegmentationModel({ url, apiKey: env.SEGMENTATION_API_KEY || undefined });
}
