/**
 * Graphics upload boundary.
 *
 * The core never talks to a GPU API. It hands finished arrays to a
 * GeometryUploader and keeps the opaque handle it gets back inside a
 * BufferLease, which releases the handle at most once and refuses access
 * afterwards.
 */

import type { FaceRanges, GeometryArrays } from '../types';

export interface GeometryUploader<H> {
  /**
   * Upload one chunk's arrays. `ranges` gives each face orientation's slice
   * of the index array. Throws when the resources cannot be created.
   */
  upload(arrays: GeometryArrays, ranges: FaceRanges): H;
  release(handle: H): void;
}

export class ChunkDisposedError extends Error {
  constructor(what: string) {
    super(`${what} was used after its buffers were released`);
    this.name = 'ChunkDisposedError';
  }
}

export class BufferLease<H> {
  private current: H | null;
  private readonly uploader: GeometryUploader<H> | null;
  private released = false;

  private constructor(handle: H | null, uploader: GeometryUploader<H> | null) {
    this.current = handle;
    this.uploader = uploader;
  }

  /** Lease over freshly uploaded buffers. */
  static of<H>(handle: H, uploader: GeometryUploader<H>): BufferLease<H> {
    return new BufferLease(handle, uploader);
  }

  /** Lease for a chunk with no geometry: nothing was uploaded, nothing to release. */
  static empty<H>(): BufferLease<H> {
    return new BufferLease<H>(null, null);
  }

  get isEmpty(): boolean {
    return this.uploader === null;
  }

  get isReleased(): boolean {
    return this.released;
  }

  /** The uploaded handle, or null for an empty lease. Throws once released. */
  get handle(): H | null {
    if (this.released) throw new ChunkDisposedError('BufferLease');
    return this.current;
  }

  /** Release the handle. Returns false if it was already released. */
  release(): boolean {
    if (this.released) return false;
    this.released = true;
    const handle = this.current;
    this.current = null;
    if (handle !== null && this.uploader) {
      this.uploader.release(handle);
    }
    return true;
  }
}
