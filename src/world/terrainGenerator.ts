/**
 * Seeded terrain generator.
 *
 * Four independent 2D simplex noise fields, seeded from seed, seed*7,
 * seed*13 and seed*17, are sampled at world-space block coordinates so
 * columns agree across chunk borders. Per column:
 *
 *   height = clamp(round(15 + n4*10 + 10 * (n3+1)^2.5 * n1), 1, size-1)
 *
 * Columns are stone up to their height. Low columns (height <= 20) get a
 * dirt band of thickness 4 + n2*8 capped with two grass layers. Any air
 * below the water level is flooded.
 */

import { createNoise2D, type NoiseFunction2D } from 'simplex-noise';
import {
  BASE_HEIGHT,
  BASE_VARIANCE,
  CHUNK_SIZE,
  DIRT_BAND_MAX_HEIGHT,
  DIRT_BASE_THICKNESS,
  DIRT_THICKNESS_VARIANCE,
  GRASS_LAYERS,
  NOISE_FREQUENCIES,
  NOISE_SEED_MULTIPLIERS,
  WATER_LEVEL,
} from '../config';
import { clamp } from '../core/math';
import { BlockType } from './block';
import { VoxelGrid } from './voxelGrid';

export interface TerrainOptions {
  chunkSize?: number;
  waterLevel?: number;
}

export interface ColumnSample {
  height: number;
  dirtThickness: number;
  /** Raw noise values n1..n4, each in [-1, 1]. */
  noise: readonly [number, number, number, number];
}

/** Mulberry32 PRNG: deterministic [0, 1) stream from a 32-bit seed. */
export function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Seeds of the four noise fields, reduced to u32. */
export function deriveNoiseSeeds(seed: number): [number, number, number, number] {
  const [m1, m2, m3, m4] = NOISE_SEED_MULTIPLIERS;
  return [
    Math.imul(seed, m1) >>> 0,
    Math.imul(seed, m2) >>> 0,
    Math.imul(seed, m3) >>> 0,
    Math.imul(seed, m4) >>> 0,
  ];
}

export class TerrainGenerator {
  readonly seed: number;
  readonly chunkSize: number;
  readonly waterLevel: number;
  private readonly fields: readonly [NoiseFunction2D, NoiseFunction2D, NoiseFunction2D, NoiseFunction2D];

  constructor(seed: number, options: TerrainOptions = {}) {
    this.seed = seed >>> 0;
    this.chunkSize = options.chunkSize ?? CHUNK_SIZE;
    this.waterLevel = options.waterLevel ?? WATER_LEVEL;

    const [s1, s2, s3, s4] = deriveNoiseSeeds(this.seed);
    this.fields = [
      createNoise2D(mulberry32(s1)),
      createNoise2D(mulberry32(s2)),
      createNoise2D(mulberry32(s3)),
      createNoise2D(mulberry32(s4)),
    ];
  }

  /** Noise, height and dirt thickness of the column at world block (worldX, worldZ). */
  sampleColumn(worldX: number, worldZ: number): ColumnSample {
    const [f1, f2, f3, f4] = this.fields;
    const [q1, q2, q3, q4] = NOISE_FREQUENCIES;

    const n1 = f1(worldX * q1[0], worldZ * q1[1]);
    const n2 = f2(worldX * q2[0], worldZ * q2[1]);
    const n3 = f3(worldX * q3[0], worldZ * q3[1]);
    const n4 = f4(worldX * q4[0], worldZ * q4[1]);

    // (n3 + 1) can dip a hair below zero from float error; pow of a negative base is NaN.
    const ridge = Math.pow(Math.max(0, n3 + 1), 2.5);
    const raw = BASE_HEIGHT + n4 * 10 + BASE_VARIANCE * ridge * n1;

    return {
      height: clamp(Math.round(raw), 1, this.chunkSize - 1),
      dirtThickness: DIRT_BASE_THICKNESS + n2 * DIRT_THICKNESS_VARIANCE,
      noise: [n1, n2, n3, n4],
    };
  }

  columnHeight(worldX: number, worldZ: number): number {
    return this.sampleColumn(worldX, worldZ).height;
  }

  /** Fill and seal a grid for chunk (chunkX, chunkZ). */
  generate(chunkX: number, chunkZ: number): VoxelGrid {
    const size = this.chunkSize;
    const grid = new VoxelGrid(size);
    const originX = chunkX * size;
    const originZ = chunkZ * size;
    const waterTop = Math.min(this.waterLevel, size);

    for (let bx = 0; bx < size; bx++) {
      for (let bz = 0; bz < size; bz++) {
        const { height, dirtThickness } = this.sampleColumn(originX + bx, originZ + bz);
        const hasDirtBand = height <= DIRT_BAND_MAX_HEIGHT;

        for (let y = 0; y < height; y++) {
          let type: BlockType = BlockType.STONE;
          if (hasDirtBand && y + dirtThickness >= height) {
            type = y >= height - GRASS_LAYERS ? BlockType.GRASS : BlockType.DIRT;
          }
          grid.set(bx, y, bz, type);
        }

        grid.fillColumn(bx, bz, height, waterTop, BlockType.WATER);
      }
    }

    return grid.seal();
  }
}

/** One-shot generation for a single chunk. */
export function generateTerrain(
  seed: number,
  chunkX: number,
  chunkZ: number,
  options: TerrainOptions = {},
): VoxelGrid {
  return new TerrainGenerator(seed, options).generate(chunkX, chunkZ);
}
