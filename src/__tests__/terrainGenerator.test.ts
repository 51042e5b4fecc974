import { describe, it, expect } from 'vitest';
import { DIRT_BAND_MAX_HEIGHT, GRASS_LAYERS } from '../config';
import { worldToLocal } from '../core/math';
import { BlockType } from '../world/block';
import {
  TerrainGenerator,
  deriveNoiseSeeds,
  generateTerrain,
  mulberry32,
  type ColumnSample,
} from '../world/terrainGenerator';
import type { VoxelGrid } from '../world/voxelGrid';

/**
 * Terrain tests check generation rules per column against sampleColumn
 * rather than fixed heights, so they hold for any seed.
 */

const SIZE = 8;
const WATER = 3;

/** Block the layering rules put at height y of a sampled column. */
function expectedBlock({ height, dirtThickness }: ColumnSample, y: number, waterLevel: number): BlockType {
  if (y >= height) return y < waterLevel ? BlockType.WATER : BlockType.AIR;
  if (height <= DIRT_BAND_MAX_HEIGHT && y + dirtThickness >= height) {
    return y >= height - GRASS_LAYERS ? BlockType.GRASS : BlockType.DIRT;
  }
  return BlockType.STONE;
}

/** One past the highest solid (non-air, non-water) cell of a column. */
function solidTop(grid: VoxelGrid, x: number, z: number): number {
  let top = 0;
  for (let y = 0; y < grid.size; y++) {
    const type = grid.get(x, y, z);
    if (type !== BlockType.AIR && type !== BlockType.WATER) top = y + 1;
  }
  return top;
}

describe('mulberry32', () => {
  it('is deterministic per seed', () => {
    const a = mulberry32(42);
    const b = mulberry32(42);
    const seqA = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(seqA);
  });

  it('yields values in [0, 1)', () => {
    const rand = mulberry32(7);
    for (let i = 0; i < 1000; i++) {
      const value = rand();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe('deriveNoiseSeeds', () => {
  it('multiplies the seed by 1, 7, 13 and 17', () => {
    expect(deriveNoiseSeeds(1)).toEqual([1, 7, 13, 17]);
    expect(deriveNoiseSeeds(10)).toEqual([10, 70, 130, 170]);
  });

  it('wraps to unsigned 32 bits', () => {
    expect(deriveNoiseSeeds(0x80000000)).toEqual([0x80000000, 0x80000000, 0x80000000, 0x80000000]);
  });
});

describe('TerrainGenerator', () => {
  const generator = new TerrainGenerator(1234, { chunkSize: SIZE, waterLevel: WATER });

  it('generates identical grids for the same seed and coordinate', () => {
    const a = generator.generate(3, -2);
    const b = new TerrainGenerator(1234, { chunkSize: SIZE, waterLevel: WATER }).generate(3, -2);
    expect(a.equals(b)).toBe(true);
    expect(generateTerrain(1234, 3, -2, { chunkSize: SIZE, waterLevel: WATER }).equals(a)).toBe(true);
  });

  it('draws different noise for different seeds', () => {
    const other = new TerrainGenerator(99, { chunkSize: SIZE, waterLevel: WATER });
    expect(other.sampleColumn(37, 91).noise).not.toEqual(generator.sampleColumn(37, 91).noise);
  });

  it('returns a sealed grid', () => {
    const grid = generator.generate(0, 0);
    expect(grid.isSealed).toBe(true);
    expect(grid.size).toBe(SIZE);
  });

  it('clamps column heights to [1, size - 1]', () => {
    for (let x = -40; x < 40; x += 3) {
      for (let z = -40; z < 40; z += 3) {
        const height = generator.columnHeight(x, z);
        expect(height).toBeGreaterThanOrEqual(1);
        expect(height).toBeLessThanOrEqual(SIZE - 1);
      }
    }
  });

  it('samples in world space so columns agree across chunk borders', () => {
    const east = generator.generate(1, 0);
    const south = generator.generate(0, -1);
    for (let b = 0; b < SIZE; b++) {
      expect(solidTop(east, 0, b)).toBe(generator.columnHeight(SIZE, b));
      expect(solidTop(south, b, 0)).toBe(generator.columnHeight(b, -SIZE));
    }
  });

  it('layers stone, dirt, grass and water per column', () => {
    const chunkX = -1;
    const chunkZ = 2;
    const grid = generator.generate(chunkX, chunkZ);

    for (let bx = 0; bx < SIZE; bx++) {
      for (let bz = 0; bz < SIZE; bz++) {
        const sample = generator.sampleColumn(chunkX * SIZE + bx, chunkZ * SIZE + bz);
        for (let y = 0; y < SIZE; y++) {
          expect(grid.get(bx, y, bz)).toBe(expectedBlock(sample, y, WATER));
        }
      }
    }
  });

  it('keeps bedrock solid under every column', () => {
    const grid = generator.generate(5, 5);
    for (let bx = 0; bx < SIZE; bx++) {
      for (let bz = 0; bz < SIZE; bz++) {
        expect(grid.get(bx, 0, bz)).not.toBe(BlockType.AIR);
        expect(grid.get(bx, 0, bz)).not.toBe(BlockType.WATER);
      }
    }
  });

  it('uses the default chunk size and water level', () => {
    const defaults = new TerrainGenerator(1);
    expect(defaults.chunkSize).toBe(32);
    expect(defaults.waterLevel).toBe(10);
  });
});

describe('TerrainGenerator at full chunk size', () => {
  const generator = new TerrainGenerator(1234);
  const size = generator.chunkSize;

  interface FoundColumn {
    worldX: number;
    worldZ: number;
    sample: ColumnSample;
  }

  function findColumn(match: (sample: ColumnSample) => boolean): FoundColumn {
    for (let worldX = -192; worldX < 192; worldX += 3) {
      for (let worldZ = -192; worldZ < 192; worldZ += 3) {
        const sample = generator.sampleColumn(worldX, worldZ);
        if (match(sample)) return { worldX, worldZ, sample };
      }
    }
    throw new Error('no matching column in the scanned area');
  }

  function generatedColumn({ worldX, worldZ }: FoundColumn): Array<BlockType | null> {
    const grid = generator.generate(Math.floor(worldX / size), Math.floor(worldZ / size));
    const lx = worldToLocal(worldX, size);
    const lz = worldToLocal(worldZ, size);
    return Array.from({ length: size }, (_, y) => grid.get(lx, y, lz));
  }

  it('leaves columns taller than the dirt band limit as bare stone', () => {
    const tall = findColumn(({ height, dirtThickness }) => height > DIRT_BAND_MAX_HEIGHT && dirtThickness >= 1);
    const { height } = tall.sample;
    const column = generatedColumn(tall);

    expect(column.slice(0, height)).toEqual(Array.from({ length: height }, () => BlockType.STONE));
    expect(column.slice(height)).toEqual(Array.from({ length: size - height }, () => BlockType.AIR));
  });

  it('caps low columns with dirt and two grass layers', () => {
    const low = findColumn(({ height, dirtThickness }) =>
      height <= DIRT_BAND_MAX_HEIGHT && height >= 4 && dirtThickness >= 3);
    const { height } = low.sample;
    const column = generatedColumn(low);

    expect(column[height - 1]).toBe(BlockType.GRASS);
    expect(column[height - 2]).toBe(BlockType.GRASS);
    expect(column[height - 3]).toBe(BlockType.DIRT);
    expect(column[height]).toBe(height < generator.waterLevel ? BlockType.WATER : BlockType.AIR);
    expect(column).toEqual(Array.from({ length: size }, (_, y) => expectedBlock(low.sample, y, generator.waterLevel)));
  });
});
