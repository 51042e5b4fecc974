/**
 * Greedy meshing for voxel chunks.
 *
 * For each of the six face orientations the mesher:
 *   1. marks every exposed voxel face in a size^3 mask,
 *   2. scans the mask in the face's own (di, dj, dk) basis and, at each
 *      unconsumed cell, grows the largest rectangle of masked same-type
 *      cells anchored there (run along dk first, then the minimum run
 *      along dj over that span),
 *   3. clears the rectangle from the mask and emits one quad for it.
 *
 * All six orientations write into one shared set of vertex, normal,
 * block-type and index arrays; each orientation's slice of the index array
 * is reported as a FaceRange.
 *
 * No THREE.js dependency -- pure typed arrays.
 */

import { EXPECTED_VERTICES, INDICES_PER_QUAD, VERTICES_PER_QUAD } from '../config';
import type { ChunkCoord, FaceRange, FaceRanges, GeometryArrays } from '../types';
import { BlockType, isBlockType, isOpaque } from './block';
import { FACE_ELEMENTS, FACES, type Face, type FaceDir } from './faceTable';
import type { ReadonlyVoxelGrid } from './voxelGrid';

// ── Types ──────────────────────────────────────────────────────────

export interface MesherOptions {
  /**
   * Treat the space below y = 0 as solid so chunk floors emit no bottom
   * faces. Defaults to true.
   */
  solidFloor?: boolean;
}

/** One merged rectangle of exposed faces. */
export interface GreedyQuad {
  face: FaceDir;
  /** Anchor cell, chunk-local. */
  x: number;
  y: number;
  z: number;
  /** Extent along the face's dj axis. */
  sizeJ: number;
  /** Extent along the face's dk axis. */
  sizeK: number;
  blockType: BlockType;
}

export type FaceQuadCounts = readonly [number, number, number, number, number, number];

export interface ChunkMeshData extends GeometryArrays {
  /** Index ranges per face orientation, in FACES order. */
  ranges: FaceRanges;
  quadCounts: FaceQuadCounts;
  quadCount: number;
}

// ── Growable Buffers ───────────────────────────────────────────────
// Reused across calls; meshing is synchronous and single-threaded.

/** Dynamic typed array that grows by doubling, avoids per-element GC pressure. */
class GrowableFloat32 {
  data: Float32Array;
  length: number;

  constructor(initialCapacity: number) {
    this.data = new Float32Array(initialCapacity);
    this.length = 0;
  }

  push1(a: number): void {
    if (this.length + 1 > this.data.length) {
      this.grow();
    }
    this.data[this.length++] = a;
  }

  push3(a: number, b: number, c: number): void {
    if (this.length + 3 > this.data.length) {
      this.grow();
    }
    this.data[this.length++] = a;
    this.data[this.length++] = b;
    this.data[this.length++] = c;
  }

  /** Return a trimmed copy of the underlying buffer. */
  toFloat32Array(): Float32Array {
    return this.data.slice(0, this.length);
  }

  reset(): void {
    this.length = 0;
  }

  private grow(): void {
    const next = new Float32Array(this.data.length * 2);
    next.set(this.data);
    this.data = next;
  }
}

class GrowableUint32 {
  data: Uint32Array;
  length: number;

  constructor(initialCapacity: number) {
    this.data = new Uint32Array(initialCapacity);
    this.length = 0;
  }

  push6(a: number, b: number, c: number, d: number, e: number, f: number): void {
    if (this.length + 6 > this.data.length) {
      this.grow();
    }
    this.data[this.length++] = a;
    this.data[this.length++] = b;
    this.data[this.length++] = c;
    this.data[this.length++] = d;
    this.data[this.length++] = e;
    this.data[this.length++] = f;
  }

  toUint32Array(): Uint32Array {
    return this.data.slice(0, this.length);
  }

  reset(): void {
    this.length = 0;
  }

  private grow(): void {
    const next = new Uint32Array(this.data.length * 2);
    next.set(this.data);
    this.data = next;
  }
}

const EXPECTED_ELEMENTS = (EXPECTED_VERTICES * 3) / 2;

const scratchPositions = new GrowableFloat32(EXPECTED_VERTICES * 3);
const scratchNormals = new GrowableFloat32(EXPECTED_VERTICES * 3);
const scratchBlockTypes = new GrowableFloat32(EXPECTED_VERTICES);
const scratchIndices = new GrowableUint32(EXPECTED_ELEMENTS);

// ── Grid Snapshot ──────────────────────────────────────────────────

/**
 * Copy of the grid's block types in x*S*S + y*S + z order, so the mask
 * and the merge loop share one linear index.
 */
function snapshotTypes(grid: ReadonlyVoxelGrid): Uint8Array {
  const s = grid.size;
  const types = new Uint8Array(s * s * s);
  let idx = 0;
  for (let x = 0; x < s; x++) {
    for (let y = 0; y < s; y++) {
      for (let z = 0; z < s; z++) {
        types[idx++] = grid.get(x, y, z) ?? BlockType.AIR;
      }
    }
  }
  return types;
}

/** Linear-index stride of each axis (x, y, z). */
function axisStrides(size: number): readonly [number, number, number] {
  return [size * size, size, 1];
}

// ── Exposure Pass ──────────────────────────────────────────────────

/**
 * Whether the neighbour cell hides a face. Below the floor counts as solid
 * when solidFloor is set; every other out-of-range cell is absent.
 */
function neighborOccludes(
  grid: ReadonlyVoxelGrid,
  x: number, y: number, z: number,
  solidFloor: boolean,
): boolean {
  if (y < 0) return solidFloor;
  const type = grid.get(x, y, z);
  return type !== null && isOpaque(type);
}

function buildFaceMask(
  grid: ReadonlyVoxelGrid,
  types: Uint8Array,
  face: Face,
  solidFloor: boolean,
  mask: Uint8Array,
): number {
  const s = grid.size;
  const [nx, ny, nz] = face.normal;
  let exposed = 0;
  let idx = 0;

  for (let x = 0; x < s; x++) {
    for (let y = 0; y < s; y++) {
      for (let z = 0; z < s; z++, idx++) {
        const type = types[idx] ?? BlockType.AIR;
        if (type === BlockType.AIR || neighborOccludes(grid, x + nx, y + ny, z + nz, solidFloor)) {
          mask[idx] = 0;
        } else {
          mask[idx] = 1;
          exposed++;
        }
      }
    }
  }

  return exposed;
}

// ── Merge Pass ─────────────────────────────────────────────────────

function mergeFace(
  size: number,
  types: Uint8Array,
  mask: Uint8Array,
  face: Face,
  out: GreedyQuad[],
): void {
  const strides = axisStrides(size);
  const si = strides[face.di];
  const sj = strides[face.dj];
  const sk = strides[face.dk];
  const pos = [0, 0, 0];

  for (let i = 0; i < size; i++) {
    for (let j = 0; j < size; j++) {
      for (let k = 0; k < size; k++) {
        const idx = i * si + j * sj + k * sk;
        if (mask[idx] !== 1) continue;

        const type = types[idx] ?? BlockType.AIR;

        // Run along dk from the anchor.
        let runK = 1;
        while (
          k + runK < size &&
          mask[idx + runK * sk] === 1 &&
          types[idx + runK * sk] === type
        ) {
          runK++;
        }

        // Shortest run along dj over every column of that span.
        let runJ = size - j;
        for (let off = 0; off < runK && runJ > 1; off++) {
          const base = idx + off * sk;
          let r = 1;
          while (
            r < runJ &&
            mask[base + r * sj] === 1 &&
            types[base + r * sj] === type
          ) {
            r++;
          }
          runJ = r;
        }

        for (let dj = 0; dj < runJ; dj++) {
          for (let dk = 0; dk < runK; dk++) {
            mask[idx + dj * sj + dk * sk] = 0;
          }
        }

        pos[face.di] = i;
        pos[face.dj] = j;
        pos[face.dk] = k;
        out.push({
          face: face.dir,
          x: pos[0] ?? 0,
          y: pos[1] ?? 0,
          z: pos[2] ?? 0,
          sizeJ: runJ,
          sizeK: runK,
          blockType: isBlockType(type) ? type : BlockType.AIR,
        });
      }
    }
  }
}

/**
 * Merged quads of one orientation, in scan order.
 * Exposed for inspection; greedyMeshGrid emits geometry from the same quads.
 */
export function greedyQuads(
  grid: ReadonlyVoxelGrid,
  dir: FaceDir,
  options: MesherOptions = {},
): GreedyQuad[] {
  const types = snapshotTypes(grid);
  const mask = new Uint8Array(types.length);
  const face = FACES[dir];
  const quads: GreedyQuad[] = [];
  if (buildFaceMask(grid, types, face, options.solidFloor ?? true, mask) > 0) {
    mergeFace(grid.size, types, mask, face, quads);
  }
  return quads;
}

// ── Quad Emitter ───────────────────────────────────────────────────

function emitQuad(
  quad: GreedyQuad,
  face: Face,
  originX: number,
  originZ: number,
  vertexBase: number,
): void {
  const scale = [1, 1, 1];
  scale[face.dj] = quad.sizeJ;
  scale[face.dk] = quad.sizeK;
  const sx = scale[0] ?? 1;
  const sy = scale[1] ?? 1;
  const sz = scale[2] ?? 1;
  const [nx, ny, nz] = face.normal;

  for (const [vx, vy, vz] of face.vertices) {
    scratchPositions.push3(
      vx * sx + quad.x + originX,
      vy * sy + quad.y,
      vz * sz + quad.z + originZ,
    );
    scratchNormals.push3(nx, ny, nz);
    scratchBlockTypes.push1(quad.blockType);
  }

  const [e0, e1, e2, e3, e4, e5] = FACE_ELEMENTS;
  scratchIndices.push6(
    vertexBase + e0, vertexBase + e1, vertexBase + e2,
    vertexBase + e3, vertexBase + e4, vertexBase + e5,
  );
}

// ── Main Entry Point ───────────────────────────────────────────────

/**
 * Greedy-mesh a chunk grid into one shared set of geometry arrays.
 *
 * Vertex positions are in world space: the chunk at `coord` starts at
 * (coord.x * size, 0, coord.z * size). The returned arrays are compact.
 */
export function greedyMeshGrid(
  grid: ReadonlyVoxelGrid,
  coord: ChunkCoord,
  options: MesherOptions = {},
): ChunkMeshData {
  const size = grid.size;
  const solidFloor = options.solidFloor ?? true;
  const originX = coord.x * size;
  const originZ = coord.z * size;

  scratchPositions.reset();
  scratchNormals.reset();
  scratchBlockTypes.reset();
  scratchIndices.reset();

  const types = snapshotTypes(grid);
  const mask = new Uint8Array(types.length);
  const ranges: [FaceRange, FaceRange, FaceRange, FaceRange, FaceRange, FaceRange] = [
    { offset: 0, count: 0 }, { offset: 0, count: 0 }, { offset: 0, count: 0 },
    { offset: 0, count: 0 }, { offset: 0, count: 0 }, { offset: 0, count: 0 },
  ];
  const quadCounts: [number, number, number, number, number, number] = [0, 0, 0, 0, 0, 0];
  const quads: GreedyQuad[] = [];
  let vertexCount = 0;

  for (const face of FACES) {
    const offset = scratchIndices.length;
    quads.length = 0;

    if (buildFaceMask(grid, types, face, solidFloor, mask) > 0) {
      mergeFace(size, types, mask, face, quads);
    }

    for (const quad of quads) {
      emitQuad(quad, face, originX, originZ, vertexCount);
      vertexCount += VERTICES_PER_QUAD;
    }

    ranges[face.dir] = { offset, count: quads.length * INDICES_PER_QUAD };
    quadCounts[face.dir] = quads.length;
  }

  return {
    positions: scratchPositions.toFloat32Array(),
    normals: scratchNormals.toFloat32Array(),
    blockTypes: scratchBlockTypes.toFloat32Array(),
    indices: scratchIndices.toUint32Array(),
    ranges,
    quadCounts,
    quadCount: vertexCount / VERTICES_PER_QUAD,
  };
}
