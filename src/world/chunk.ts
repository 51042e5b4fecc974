/**
 * Chunk: one generated column of voxels plus the geometry built from it.
 *
 * buildChunk runs the whole pipeline synchronously:
 *   terrain -> greedy mesh -> upload (skipped for empty meshes) -> Chunk.
 * The chunk owns its buffer lease; dispose() releases it exactly once and
 * any later access to the mesh throws ChunkDisposedError.
 */

import { createLogger } from '../core/logger';
import { chunkToWorld } from '../core/math';
import type { ChunkCoord, FaceRange, Result } from '../types';
import { err, ok } from '../types';
import { FACES, type FaceDir } from './faceTable';
import { BufferLease, ChunkDisposedError, type GeometryUploader } from './geometryUploader';
import { greedyMeshGrid, type ChunkMeshData, type MesherOptions } from './greedyMesher';
import type { TerrainGenerator } from './terrainGenerator';
import type { ReadonlyVoxelGrid } from './voxelGrid';

const log = createLogger('Chunk');

// ── Clock ──────────────────────────────────────────────────────────

/** Monotonic time source in milliseconds. Only relative order matters. */
export type Clock = () => number;

export const monotonicClock: Clock = () => performance.now();

// ── Errors ─────────────────────────────────────────────────────────

export type ChunkLoadErrorCode = 'INVALID_COORDINATE' | 'UPLOAD_FAILED';

export class ChunkLoadError extends Error {
  readonly code: ChunkLoadErrorCode;
  readonly coord: ChunkCoord;

  constructor(code: ChunkLoadErrorCode, coord: ChunkCoord, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ChunkLoadError';
    this.code = code;
    this.coord = coord;
  }
}

// ── Mesh Batches ───────────────────────────────────────────────────

export interface FaceBatch extends FaceRange {
  face: FaceDir;
  name: string;
}

type FaceBatches = readonly [FaceBatch, FaceBatch, FaceBatch, FaceBatch, FaceBatch, FaceBatch];

/** Per-orientation index ranges over one set of uploaded buffers. */
export class MeshBatches<H> {
  readonly batches: FaceBatches;
  readonly vertexCount: number;
  readonly indexCount: number;
  readonly quadCount: number;
  readonly buffers: BufferLease<H>;

  constructor(mesh: ChunkMeshData, buffers: BufferLease<H>) {
    const batch = (dir: FaceDir): FaceBatch => ({
      face: dir,
      name: FACES[dir].name,
      offset: mesh.ranges[dir].offset,
      count: mesh.ranges[dir].count,
    });
    this.batches = [batch(0), batch(1), batch(2), batch(3), batch(4), batch(5)];
    this.vertexCount = mesh.positions.length / 3;
    this.indexCount = mesh.indices.length;
    this.quadCount = mesh.quadCount;
    this.buffers = buffers;
  }

  /** A mesh with no faces; valid for all-air or fully buried chunks. */
  get isEmpty(): boolean {
    return this.indexCount === 0;
  }

  batch(dir: FaceDir): FaceBatch {
    return this.batches[dir];
  }
}

// ── Chunk ──────────────────────────────────────────────────────────

export class Chunk<H> {
  readonly coord: ChunkCoord;
  readonly grid: ReadonlyVoxelGrid;
  private readonly meshBatches: MeshBatches<H>;
  private touchedAt: number;
  private disposed = false;

  constructor(coord: ChunkCoord, grid: ReadonlyVoxelGrid, mesh: MeshBatches<H>, now: number) {
    this.coord = coord;
    this.grid = grid;
    this.meshBatches = mesh;
    this.touchedAt = now;
  }

  get x(): number {
    return this.coord.x;
  }

  get z(): number {
    return this.coord.z;
  }

  /** World position of the chunk's block (0, 0, 0). */
  get worldOrigin(): { x: number; y: number; z: number } {
    const { worldX, worldZ } = chunkToWorld(this.coord.x, this.coord.z, this.grid.size);
    return { x: worldX, y: 0, z: worldZ };
  }

  get lastTouched(): number {
    return this.touchedAt;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  get mesh(): MeshBatches<H> {
    if (this.disposed) {
      throw new ChunkDisposedError(`Chunk (${this.coord.x}, ${this.coord.z})`);
    }
    return this.meshBatches;
  }

  /** Mark the chunk as used at `now`. */
  touch(now: number): void {
    this.touchedAt = now;
  }

  /** Release the chunk's buffers. Returns false if already disposed. */
  dispose(): boolean {
    if (this.disposed) return false;
    this.disposed = true;
    this.meshBatches.buffers.release();
    return true;
  }
}

// ── Pipeline ───────────────────────────────────────────────────────

export interface BuildChunkDeps<H> {
  generator: TerrainGenerator;
  uploader: GeometryUploader<H>;
  clock?: Clock;
  mesher?: MesherOptions;
}

function elapsedMicros(from: number, to: number): number {
  return Math.round((to - from) * 1000);
}

/**
 * Generate, mesh and upload one chunk.
 * Upload failures come back as UPLOAD_FAILED; nothing is left allocated.
 */
export function buildChunk<H>(coord: ChunkCoord, deps: BuildChunkDeps<H>): Result<Chunk<H>, ChunkLoadError> {
  const clock = deps.clock ?? monotonicClock;
  const start = performance.now();

  const grid = deps.generator.generate(coord.x, coord.z);
  const afterTerrain = performance.now();

  const mesh = greedyMeshGrid(grid, coord, deps.mesher);
  const afterMesh = performance.now();

  let buffers: BufferLease<H>;
  if (mesh.indices.length === 0) {
    buffers = BufferLease.empty<H>();
  } else {
    try {
      buffers = BufferLease.of(deps.uploader.upload(mesh, mesh.ranges), deps.uploader);
    } catch (cause) {
      const reason = cause instanceof Error ? cause.message : String(cause);
      return err(new ChunkLoadError(
        'UPLOAD_FAILED',
        coord,
        `Buffer upload failed for chunk (${coord.x}, ${coord.z}): ${reason}`,
        { cause },
      ));
    }
  }
  const afterUpload = performance.now();

  log.debug(
    `chunk load (${coord.x}, ${coord.z}): ` +
    `terrain=${elapsedMicros(start, afterTerrain)}us ` +
    `mesh=${elapsedMicros(afterTerrain, afterMesh)}us ` +
    `buffer=${elapsedMicros(afterMesh, afterUpload)}us ` +
    `num_vertices=${mesh.positions.length / 3} num_elements=${mesh.indices.length}`,
  );

  return ok(new Chunk(coord, grid, new MeshBatches(mesh, buffers), clock()));
}
