export const OUTPUT_FORMAT_IDS = ['webp', 'jpeg', 'png'] as const;

export type OutputFormatId = (typeof OUTPUT_FORMAT_IDS)[number];

export type QualityMode = 'variable' | 'fixed' | 'lossless';

export type OutputFormat = {
  id: OutputFormatId;
  name: string;
  mimeType: string;
  extension: string;
  qualityMode: QualityMode;
};

export const OUTPUT_FORMATS: Record<OutputFormatId, OutputFormat> = {
  webp: {
    id: 'webp',
    name: 'WebP',
    mimeType: 'image/webp',
    extension: 'webp',
    qualityMode: 'variable'
  },
  jpeg: {
    id: 'jpeg',
    name: 'JPEG',
    mimeType: 'image/jpeg',
    extension: 'jpg',
    qualityMode: 'fixed'
  },
  png: {
    id: 'png',
    name: 'PNG',
    mimeType: 'image/png',
    extension: 'png',
    qualityMode: 'lossless'
  }
};
