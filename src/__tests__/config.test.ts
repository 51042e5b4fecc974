import { describe, it, expect } from 'vitest';
import {
  CHUNK_SIZE,
  MAX_CHUNKS,
  VISIBLE_RADIUS,
  WATER_LEVEL,
  capacityForRadius,
  validateAndLoadConfig,
} from '../config';

describe('config', () => {
  it('loads default runtime config with valid values', () => {
    const result = validateAndLoadConfig();
    expect(result.valid).toBe(true);
    expect(result.errors).toHaveLength(0);
    expect(result.config).toEqual({
      chunkSize: 32,
      visibleRadius: 4,
      maxChunks: 128,
      waterLevel: 10,
      logLevel: 'info',
    });
  });

  it('derives maxChunks from the visible radius', () => {
    expect(validateAndLoadConfig({ visibleRadius: 2 }).config.maxChunks).toBe(32);
    expect(validateAndLoadConfig({ visibleRadius: 1 }).config.maxChunks).toBe(8);
  });

  it('keeps an explicit maxChunks override', () => {
    const result = validateAndLoadConfig({ visibleRadius: 2, maxChunks: 5 });
    expect(result.valid).toBe(true);
    expect(result.config.maxChunks).toBe(5);
  });

  it('fails when required values are invalid', () => {
    const result = validateAndLoadConfig({ visibleRadius: 0 });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'visibleRadius must be greater than 0',
      'maxChunks must be greater than 0',
    ]);
  });

  it('rejects non-integer and infinite sizes', () => {
    expect(validateAndLoadConfig({ visibleRadius: 1.5 }).errors).toEqual([
      'visibleRadius must be an integer',
    ]);
    expect(validateAndLoadConfig({ maxChunks: Infinity }).errors).toEqual([
      'maxChunks must be finite',
    ]);
  });

  it('bounds the chunk size', () => {
    const result = validateAndLoadConfig({ chunkSize: 1, waterLevel: 0 });
    expect(result.errors).toEqual(['chunkSize must be between 2 and 255, got 1']);
    expect(validateAndLoadConfig({ chunkSize: 256 }).errors).toEqual([
      'chunkSize must be between 2 and 255, got 256',
    ]);
  });

  it('keeps the water level inside the chunk', () => {
    expect(validateAndLoadConfig({ chunkSize: 8 }).errors).toEqual([
      'waterLevel (10) must be smaller than chunkSize (8)',
    ]);
    expect(validateAndLoadConfig({ waterLevel: -1 }).errors).toEqual([
      'waterLevel must be a non-negative integer',
    ]);
    expect(validateAndLoadConfig({ chunkSize: 8, waterLevel: 0 }).valid).toBe(true);
  });

  it('exports chunk constants consistent with the defaults', () => {
    expect(CHUNK_SIZE).toBe(32);
    expect(VISIBLE_RADIUS).toBe(4);
    expect(MAX_CHUNKS).toBe(capacityForRadius(VISIBLE_RADIUS));
    expect(WATER_LEVEL).toBeLessThan(CHUNK_SIZE);
  });
});
