/**
 * Math utilities for coordinate conversions.
 * Zero allocations beyond small result objects.
 */

import type { ChunkCoord } from '../types';

/** Clamp value between min and max inclusive. */
export function clamp(value: number, min: number, max: number): number {
  return value < min ? min : value > max ? max : value;
}

/** Convert a world block coordinate to the chunk containing it (floors negatives). */
export function worldToChunk(worldX: number, worldZ: number, chunkSize: number): ChunkCoord {
  return {
    x: Math.floor(worldX / chunkSize),
    z: Math.floor(worldZ / chunkSize),
  };
}

/** Convert a chunk coordinate to the world position of its block (0, 0, 0). */
export function chunkToWorld(x: number, z: number, chunkSize: number): { worldX: number; worldZ: number } {
  return {
    worldX: x * chunkSize,
    worldZ: z * chunkSize,
  };
}

/** Block position of a world coordinate inside its chunk, always in [0, chunkSize). */
export function worldToLocal(world: number, chunkSize: number): number {
  return ((world % chunkSize) + chunkSize) % chunkSize;
}

/**
 * Generate spiral order offsets from center outward.
 * Returns [dx, dz] pairs covering the square of the given radius.
 */
export function spiralOrder(radius: number): Array<[number, number]> {
  const result: Array<[number, number]> = [[0, 0]];
  for (let r = 1; r <= radius; r++) {
    for (let i = -r; i < r; i++) result.push([i, -r]);   // top
    for (let i = -r; i < r; i++) result.push([r, i]);     // right
    for (let i = r; i > -r; i--) result.push([i, r]);     // bottom
    for (let i = r; i > -r; i--) result.push([-r, i]);    // left
  }
  return result;
}

/**
 * Offsets of the visible window around a center chunk, nearest first.
 * The window is half-open, [-radius, radius) on both axes, so it holds
 * exactly (2 * radius)^2 chunks.
 */
export function visibleOffsets(radius: number): Array<[number, number]> {
  return spiralOrder(radius).filter(([dx, dz]) => dx < radius && dz < radius);
}
