/**
 * Cubic block storage for one chunk.
 *
 * Blocks live in a flat Uint8Array of size^3 cells indexed as
 * x * size * size + y * size + z. Lookups outside [0, size) on any axis
 * return null instead of throwing; bounds are checked once per call, not
 * per neighbour inside hot loops.
 */

import { BlockType, isBlockType, type Block } from './block';

export class SealedGridError extends Error {
  constructor() {
    super('VoxelGrid is sealed; terrain generation has already completed');
    this.name = 'SealedGridError';
  }
}

export class GridBoundsError extends Error {
  constructor(x: number, y: number, z: number, size: number) {
    super(`Block (${x}, ${y}, ${z}) is outside a grid of size ${size}`);
    this.name = 'GridBoundsError';
  }
}

/** Read-only view handed to the mesher. */
export interface ReadonlyVoxelGrid {
  readonly size: number;
  inBounds(x: number, y: number, z: number): boolean;
  get(x: number, y: number, z: number): BlockType | null;
  getBlock(x: number, y: number, z: number): Block | null;
  countBlocks(type: BlockType): number;
}

export class VoxelGrid implements ReadonlyVoxelGrid {
  readonly size: number;
  private readonly cells: Uint8Array;
  private sealed = false;

  constructor(size: number) {
    if (!Number.isInteger(size) || size <= 0) {
      throw new RangeError(`VoxelGrid size must be a positive integer, got ${size}`);
    }
    this.size = size;
    this.cells = new Uint8Array(size * size * size); // all AIR
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  inBounds(x: number, y: number, z: number): boolean {
    const s = this.size;
    return x >= 0 && x < s && y >= 0 && y < s && z >= 0 && z < s;
  }

  /** Linear cell index. Callers must check bounds first. */
  index(x: number, y: number, z: number): number {
    return (x * this.size + y) * this.size + z;
  }

  get(x: number, y: number, z: number): BlockType | null {
    if (!this.inBounds(x, y, z)) return null;
    const value = this.cells[this.index(x, y, z)] ?? BlockType.AIR;
    return isBlockType(value) ? value : BlockType.AIR;
  }

  getBlock(x: number, y: number, z: number): Block | null {
    const blocktype = this.get(x, y, z);
    return blocktype === null ? null : { blocktype };
  }

  set(x: number, y: number, z: number, type: BlockType): void {
    if (this.sealed) throw new SealedGridError();
    if (!this.inBounds(x, y, z)) throw new GridBoundsError(x, y, z, this.size);
    this.cells[this.index(x, y, z)] = type;
  }

  /** Fill the vertical run [y0, y1) of column (x, z). */
  fillColumn(x: number, z: number, y0: number, y1: number, type: BlockType): void {
    for (let y = y0; y < y1; y++) {
      this.set(x, y, z, type);
    }
  }

  /** Freeze the grid. Later writes throw SealedGridError. */
  seal(): this {
    this.sealed = true;
    return this;
  }

  countBlocks(type: BlockType): number {
    let count = 0;
    for (let i = 0; i < this.cells.length; i++) {
      if (this.cells[i] === type) count++;
    }
    return count;
  }

  /** True when both grids have the same size and identical cells. */
  equals(other: VoxelGrid): boolean {
    if (other.size !== this.size) return false;
    for (let i = 0; i < this.cells.length; i++) {
      if (this.cells[i] !== other.cells[i]) return false;
    }
    return true;
  }
}
