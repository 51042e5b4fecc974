/**
 * Global constants for the Cubeland voxel core.
 * All magic numbers live here, nowhere else.
 */

import { LOG_LEVELS, type LogLevel } from './core/logger';

// ── Chunk Dimensions ────────────────────────────────────────────
export const CHUNK_SIZE = 32;
export const VISIBLE_RADIUS = 4;
export const MAX_CHUNKS = (VISIBLE_RADIUS * 2) * (VISIBLE_RADIUS * 2) * 2; // 128

// ── Terrain ─────────────────────────────────────────────────────
export const BASE_HEIGHT = 15;
export const BASE_VARIANCE = 10;
export const WATER_LEVEL = 10;
export const DIRT_BAND_MAX_HEIGHT = 20;
export const DIRT_BASE_THICKNESS = 4;
export const DIRT_THICKNESS_VARIANCE = 8;
export const GRASS_LAYERS = 2;

/** Noise frequencies as [x, z] pairs, one per noise field. */
export const NOISE_FREQUENCIES = [
  [0.07, 0.04],
  [0.05, 0.05],
  [0.005, 0.005],
  [0.001, 0.001],
] as const;

/** Multipliers applied to the world seed to derive each noise field's seed. */
export const NOISE_SEED_MULTIPLIERS = [1, 7, 13, 17] as const;

// ── Meshing ─────────────────────────────────────────────────────
export const VERTICES_PER_QUAD = 4;
export const INDICES_PER_QUAD = 6;
export const EXPECTED_VERTICES = 70_000;

// ── Runtime Config Loading ──────────────────────────────────────
export interface RuntimeConfig {
  chunkSize: number;
  visibleRadius: number;
  maxChunks: number;
  waterLevel: number;
  logLevel: LogLevel;
}

export interface ConfigValidationResult {
  valid: boolean;
  config: RuntimeConfig;
  errors: string[];
}

/** Cache capacity for a given visible radius: a square of side 2r, doubled. */
export function capacityForRadius(visibleRadius: number): number {
  const side = visibleRadius * 2;
  return side * side * 2;
}

const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = {
  chunkSize: CHUNK_SIZE,
  visibleRadius: VISIBLE_RADIUS,
  maxChunks: MAX_CHUNKS,
  waterLevel: WATER_LEVEL,
  logLevel: 'info',
};

const POSITIVE_INT_FIELDS = ['chunkSize', 'visibleRadius', 'maxChunks'] as const;

/** Largest edge length whose block count still indexes comfortably in a Uint32 range. */
const MAX_CHUNK_SIZE = 255;

function isPositiveInt(value: unknown, field: string, errors: string[]): boolean {
  if (typeof value !== 'number' || Number.isNaN(value) || value <= 0) {
    errors.push(`${field} must be greater than 0`);
    return false;
  }
  if (!Number.isFinite(value)) {
    errors.push(`${field} must be finite`);
    return false;
  }
  if (!Number.isInteger(value)) {
    errors.push(`${field} must be an integer`);
    return false;
  }
  return true;
}

/**
 * Merge defaults with overrides and validate resulting runtime config.
 * maxChunks follows visibleRadius unless it is overridden explicitly.
 */
export function validateAndLoadConfig(
  overrides: Partial<RuntimeConfig> = {},
): ConfigValidationResult {
  const config: RuntimeConfig = { ...DEFAULT_RUNTIME_CONFIG, ...overrides };
  if (overrides.maxChunks === undefined) {
    config.maxChunks = capacityForRadius(config.visibleRadius);
  }
  const errors: string[] = [];

  for (const field of POSITIVE_INT_FIELDS) {
    isPositiveInt(config[field], field, errors);
  }

  if (config.chunkSize < 2 || config.chunkSize > MAX_CHUNK_SIZE) {
    errors.push(`chunkSize must be between 2 and ${MAX_CHUNK_SIZE}, got ${config.chunkSize}`);
  }

  if (!Number.isInteger(config.waterLevel) || config.waterLevel < 0) {
    errors.push('waterLevel must be a non-negative integer');
  } else if (config.waterLevel >= config.chunkSize) {
    errors.push(`waterLevel (${config.waterLevel}) must be smaller than chunkSize (${config.chunkSize})`);
  }

  if (!LOG_LEVELS.includes(config.logLevel)) {
    errors.push(`logLevel must be one of ${LOG_LEVELS.join(', ')}, got ${String(config.logLevel)}`);
  }

  return {
    valid: errors.length === 0,
    config,
    errors,
  };
}
