/**
 * Core type definitions for the Cubeland voxel core.
 */

// ── Chunks ──────────────────────────────────────────────────────

/** Horizontal chunk position. Chunks are full-height columns. */
export interface ChunkCoord {
  x: number;
  z: number;
}

export type ChunkKey = `${number},${number}`;

export function makeChunkKey(x: number, z: number): ChunkKey {
  return `${x},${z}`;
}

export function parseChunkKey(key: ChunkKey): ChunkCoord {
  const commaIdx = key.indexOf(',');
  return {
    x: Number(key.slice(0, commaIdx)),
    z: Number(key.slice(commaIdx + 1)),
  };
}

/**
 * Largest chunk index whose every block column, `x * chunkSize + b` for
 * b in [0, chunkSize), is still an exact integer.
 */
export function maxChunkIndex(chunkSize: number): number {
  return Math.floor((Number.MAX_SAFE_INTEGER - chunkSize) / chunkSize);
}

/** Integer chunk indices within ±maxChunkIndex(chunkSize) on both axes. */
export function isValidChunkCoord(x: number, z: number, chunkSize: number): boolean {
  const limit = maxChunkIndex(chunkSize);
  return Number.isInteger(x) && Number.isInteger(z) && Math.abs(x) <= limit && Math.abs(z) <= limit;
}

// ── Mesh ────────────────────────────────────────────────────────

/** Raw geometry arrays handed to the graphics upload boundary. */
export interface GeometryArrays {
  positions: Float32Array;
  normals: Float32Array;
  blockTypes: Float32Array;
  indices: Uint32Array;
}

/** Index range of one face orientation inside the shared index array. */
export interface FaceRange {
  offset: number;
  count: number;
}

/** One range per face orientation, in face-table order. */
export type FaceRanges = readonly [FaceRange, FaceRange, FaceRange, FaceRange, FaceRange, FaceRange];

// ── Result Type ─────────────────────────────────────────────────

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T, E = Error>(value: T): Result<T, E> {
  return { ok: true, value };
}

export function err<T, E = Error>(error: E): Result<T, E> {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok;
}

/** Return the value or throw the error (wrapped in an Error if it is not one). */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value;
  if (result.error instanceof Error) throw result.error;
  throw new Error(String(result.error));
}
