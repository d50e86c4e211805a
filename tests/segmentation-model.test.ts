import sharp from 'sharp';
import { describe, it, expect, vi } from 'vitest';
import {
  createSegmentationModel,
  notConfiguredModel,
  RemoteSegmentationModel
} from '@/lib/segmentation-model';
import { solidImage, STUDIO_GREY } from './helpers';

const image = solidImage(4, 3, STUDIO_GREY);

async function cutoutReply(width: number, height: number, alpha: number) {
  const data = Buffer.alloc(width * height * 4);
  for (let i = 0; i < width * height; i += 1) {
    data[i * 4] = 10;
    data[i * 4 + 3] = alpha;
  }
  return sharp(data, { raw: { width, height, channels: 4 } }).png().toBuffer();
}

function replyWith(body: Buffer, status = 200) {
  return vi.fn(async (_url: string, _init: RequestInit) => new Response(new Uint8Array(body), { status }));
}

describe('notConfiguredModel', () => {
  it('is always unavailable', async () => {
    await expect(notConfiguredModel.segment(image)).resolves.toEqual({
      status: 'unavailable',
      reason: 'no segmentation model configured'
    });
  });
});

describe('RemoteSegmentationModel', () => {
  it('posts the image and reads the alpha of the reply', async () => {
    const fetchImpl = replyWith(await cutoutReply(4, 3, 200));
    const model = new RemoteSegmentationModel({ url: 'http://model.test/remove', apiKey: 'test-key' }, fetchImpl);

    const outcome = await model.segment(image);

    expect(outcome).toEqual({ status: 'ok', alpha: new Uint8Array(12).fill(200) });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('http://model.test/remove');
    expect(init.method).toBe('POST');
    expect(init.headers).toEqual({ 'X-Api-Key': 'test-key' });
    expect(init.body).toBeInstanceOf(FormData);
  });

  it('resizes a reply of another size to the input size', async () => {
    const model = new RemoteSegmentationModel({ url: 'http://model.test' }, replyWith(await cutoutReply(8, 6, 255)));
    const outcome = await model.segment(image);
    expect(outcome.status).toBe('ok');
    if (outcome.status === 'ok') {
      expect(outcome.alpha.length).toBe(12);
    }
  });

  it('falls back on an error status', async () => {
    const model = new RemoteSegmentationModel({ url: 'http://model.test' }, replyWith(Buffer.from('quota'), 402));
    await expect(model.segment(image)).resolves.toEqual({
      status: 'unavailable',
      reason: 'model responded with HTTP 402'
    });
  });

  it('falls back when the request fails', async () => {
    const fetchImpl = vi.fn(async (_url: string, _init: RequestInit): Promise<Response> => {
      throw new Error('connection refused');
    });
    const model = new RemoteSegmentationModel({ url: 'http://model.test' }, fetchImpl);
    await expect(model.segment(image)).resolves.toEqual({
      status: 'unavailable',
      reason: 'model request failed: connection refused'
    });
  });

  it('falls back on an undecodable reply', async () => {
    const model = new RemoteSegmentationModel({ url: 'http://model.test' }, replyWith(Buffer.from('not a png')));
    const outcome = await model.segment(image);
    expect(outcome.status).toBe('unavailable');
  });
});

describe('createSegmentationModel', () => {
  it('uses the remote model only when a URL is configured', () => {
    expect(createSegmentationModel({})).toBe(notConfiguredModel);
    expect(createSegmentationModel({ SEGMENTATION_API_URL: 'http://model.test' })).toBeInstanceOf(RemoteSegmentationModel);
  });
});
