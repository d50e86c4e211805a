import { mkdtemp, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, it, expect } from 'vitest';
import {
  configFilePath,
  DEFAULT_CONFIG,
  forcedValuesFor,
  loadConfigFile,
  parseConfigJson,
  parseConfigLayer,
  resolveProcessingConfig,
  resolveRequestConfig
} from '@/lib/config';
import { ConfigValidationError } from '@/lib/errors';

function fieldOf(fn: () => unknown) {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigValidationError) return error.field;
    throw error;
  }
  return null;
}

describe('resolveProcessingConfig', () => {
  it('returns the defaults when nothing is layered on top', () => {
    const config = resolveProcessingConfig();
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.backgroundColor).toBe('#F3F3F3');
    expect(config.targetMaxKb).toBeNull();
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('applies file, then overrides, then forced values', () => {
    const config = resolveProcessingConfig({
      file: { quality: 90, outputFormat: 'webp' },
      overrides: { quality: 80, flattenPngFirst: true },
      forced: { flattenPngFirst: false }
    });
    expect(config.quality).toBe(80);
    expect(config.outputFormat).toBe('webp');
    expect(config.flattenPngFirst).toBe(false);
  });

  it('rejects out-of-range values with the offending field', () => {
    expect(fieldOf(() => resolveProcessingConfig({ overrides: { productSizeRatio: 1.5 } }))).toBe('productSizeRatio');
    expect(fieldOf(() => resolveProcessingConfig({ overrides: { backgroundColor: 'grey' } }))).toBe('backgroundColor');
  });

  it('rejects a quality floor above the starting quality', () => {
    expect(fieldOf(() => resolveProcessingConfig({ overrides: { quality: 60, minQuality: 70 } }))).toBe('minQuality');
  });
});

describe('config layers', () => {
  it('rejects unknown keys by name', () => {
    expect(fieldOf(() => parseConfigLayer({ sharpness: 3 }))).toBe('sharpness');
  });

  it('parses JSON overrides and treats blank input as empty', () => {
    expect(parseConfigJson('{"targetWidth": 800}')).toEqual({ targetWidth: 800 });
    expect(parseConfigJson('  ')).toEqual({});
    expect(parseConfigJson(null)).toEqual({});
    expect(fieldOf(() => parseConfigJson('{oops'))).toBe('config');
  });

  it('forces flattening off when AI removal is on in any layer', () => {
    expect(forcedValuesFor({ aiBackgroundRemoval: true }, { flattenPngFirst: true })).toEqual({ flattenPngFirst: false });
    expect(forcedValuesFor({ flattenPngFirst: true })).toEqual({});
  });
});

describe('config file', () => {
  it('falls back to config.json', () => {
    expect(configFilePath({})).toBe('config.json');
    expect(configFilePath({ PRODUCT_CANVAS_CONFIG: '/etc/canvas.json' })).toBe('/etc/canvas.json');
  });

  it('treats a missing file as an empty layer', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'canvas-config-'));
    await expect(loadConfigFile(join(dir, 'missing.json'))).resolves.toEqual({});
  });

  it('layers request overrides over the file', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'canvas-config-'));
    const path = join(dir, 'config.json');
    await writeFile(path, JSON.stringify({ backgroundColor: '#FFFFFF', quality: 90, flattenPngFirst: true }));

    const config = await resolveRequestConfig({ quality: 85, aiBackgroundRemoval: true }, { PRODUCT_CANVAS_CONFIG: path });
    expect(config.backgroundColor).toBe('#FFFFFF');
    expect(config.quality).toBe(85);
    expect(config.flattenPngFirst).toBe(false);
  });
});
