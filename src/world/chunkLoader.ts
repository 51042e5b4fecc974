/**
 * ChunkLoader: bounded cache of generated chunks keyed by chunk coordinate.
 *
 * load() always regenerates: terrain, mesh and upload run inline, the new
 * chunk replaces any previous one for that coordinate (whose buffers are
 * released), and then the least recently touched chunks are evicted until
 * the cache is back within capacity. Evicted chunks release their buffers
 * exactly once and are never handed out again.
 *
 * Capacity defaults to (2 * visibleRadius)^2 * 2: the visible window plus
 * the same again of recently seen chunks.
 */

import { validateAndLoadConfig, type RuntimeConfig } from '../config';
import { worldEvents, type EventBus, type WorldEventMap } from '../core/eventBus';
import { createLogger } from '../core/logger';
import { visibleOffsets } from '../core/math';
import type { ChunkKey, Result } from '../types';
import { err, isValidChunkCoord, makeChunkKey, maxChunkIndex, ok, parseChunkKey } from '../types';
import { buildChunk, Chunk, ChunkLoadError, monotonicClock, type Clock } from './chunk';
import type { GeometryUploader } from './geometryUploader';
import type { MesherOptions } from './greedyMesher';
import { TerrainGenerator } from './terrainGenerator';

const log = createLogger('ChunkLoader');

// ── Types ──────────────────────────────────────────────────────────

export interface ChunkLoaderOptions<H> {
  uploader: GeometryUploader<H>;
  /** Overrides applied on top of the default runtime config. */
  config?: Partial<RuntimeConfig>;
  clock?: Clock;
  events?: EventBus<WorldEventMap>;
  mesher?: MesherOptions;
  /** Replaces the seeded default generator; its chunk size must match config.chunkSize. */
  generator?: TerrainGenerator;
}

export interface VisibleRefresh<H> {
  chunks: Chunk<H>[];
  loaded: number;
  failures: ChunkLoadError[];
}

export class ConfigError extends Error {
  readonly errors: readonly string[];

  constructor(errors: readonly string[]) {
    super(`Invalid runtime config: ${errors.join('; ')}`);
    this.name = 'ConfigError';
    this.errors = errors;
  }
}

// ── ChunkLoader ────────────────────────────────────────────────────

export class ChunkLoader<H> {
  readonly seed: number;
  readonly capacity: number;
  readonly visibleRadius: number;
  readonly chunkSize: number;

  private readonly entries = new Map<ChunkKey, Chunk<H>>();
  private readonly uploader: GeometryUploader<H>;
  private readonly generator: TerrainGenerator;
  private readonly clock: Clock;
  private readonly events: EventBus<WorldEventMap>;
  private readonly mesher: MesherOptions;

  constructor(seed: number, options: ChunkLoaderOptions<H>) {
    const { valid, config, errors } = validateAndLoadConfig(options.config);
    if (!valid) {
      throw new ConfigError(errors);
    }

    this.seed = seed >>> 0;
    this.capacity = config.maxChunks;
    this.visibleRadius = config.visibleRadius;
    this.chunkSize = config.chunkSize;
    this.uploader = options.uploader;
    this.clock = options.clock ?? monotonicClock;
    this.events = options.events ?? worldEvents;
    this.mesher = options.mesher ?? {};
    this.generator = options.generator ?? new TerrainGenerator(this.seed, {
      chunkSize: config.chunkSize,
      waterLevel: config.waterLevel,
    });

    if (this.generator.chunkSize !== this.chunkSize) {
      throw new ConfigError([
        `generator chunkSize (${this.generator.chunkSize}) must equal config chunkSize (${this.chunkSize})`,
      ]);
    }

    log.info(
      `Initialised: seed=${this.seed}, chunkSize=${this.chunkSize}, ` +
      `visibleRadius=${this.visibleRadius}, capacity=${this.capacity}`,
    );
  }

  // ── Queries ─────────────────────────────────────────────────────

  get size(): number {
    return this.entries.size;
  }

  has(x: number, z: number): boolean {
    return this.entries.has(makeChunkKey(x, z));
  }

  get(x: number, z: number): Chunk<H> | undefined {
    return this.entries.get(makeChunkKey(x, z));
  }

  /** Resident chunks in insertion order. */
  chunks(): Chunk<H>[] {
    return [...this.entries.values()];
  }

  // ── Loading ─────────────────────────────────────────────────────

  /**
   * Generate the chunk at (x, z) and cache it, replacing any existing entry.
   * On failure the cache is left exactly as it was.
   */
  load(x: number, z: number): Result<Chunk<H>, ChunkLoadError> {
    const coord = { x, z };
    if (!isValidChunkCoord(x, z, this.chunkSize)) {
      return this.fail(new ChunkLoadError(
        'INVALID_COORDINATE',
        coord,
        `Chunk coordinate (${x}, ${z}) must be integers within ±${maxChunkIndex(this.chunkSize)}`,
      ));
    }

    log.debug(`loading chunk (${x}, ${z})`);
    const built = buildChunk(coord, {
      generator: this.generator,
      uploader: this.uploader,
      clock: this.clock,
      mesher: this.mesher,
    });
    if (!built.ok) {
      return this.fail(built.error);
    }

    const chunk = built.value;
    const key = makeChunkKey(x, z);
    const previous = this.entries.get(key);
    if (previous) {
      previous.dispose();
    }
    this.entries.set(key, chunk);
    this.events.emit('chunk_loaded', { x, z, quads: chunk.mesh.quadCount });

    this.evictOverflow();
    return ok(chunk);
  }

  /** Mark the chunk at (x, z) as used now. Returns false if it is not cached. */
  touch(x: number, z: number): boolean {
    const chunk = this.entries.get(makeChunkKey(x, z));
    if (!chunk) return false;
    chunk.touch(this.clock());
    return true;
  }

  /**
   * Make the visible window around chunk (centerX, centerZ) resident, nearest
   * chunks first: cached chunks are touched, missing ones are loaded.
   */
  refreshVisible(centerX: number, centerZ: number): VisibleRefresh<H> {
    const chunks: Chunk<H>[] = [];
    const failures: ChunkLoadError[] = [];
    let loaded = 0;

    for (const [dx, dz] of visibleOffsets(this.visibleRadius)) {
      const x = centerX + dx;
      const z = centerZ + dz;
      const cached = this.get(x, z);
      if (cached) {
        cached.touch(this.clock());
        chunks.push(cached);
        continue;
      }

      const result = this.load(x, z);
      if (result.ok) {
        chunks.push(result.value);
        loaded++;
      } else {
        failures.push(result.error);
      }
    }

    // Later loads may have evicted chunks gathered earlier in this pass.
    return { chunks: chunks.filter((chunk) => !chunk.isDisposed), loaded, failures };
  }

  // ── Eviction ────────────────────────────────────────────────────

  private evictOverflow(): void {
    while (this.entries.size > this.capacity) {
      let oldestKey: ChunkKey | null = null;
      let oldestTime = Infinity;
      for (const [key, chunk] of this.entries) {
        if (chunk.lastTouched < oldestTime) {
          oldestTime = chunk.lastTouched;
          oldestKey = key;
        }
      }
      if (oldestKey === null) return;
      this.evict(oldestKey);
    }
  }

  private evict(key: ChunkKey): void {
    const chunk = this.entries.get(key);
    if (!chunk) return;
    this.entries.delete(key);
    chunk.dispose();
    const { x, z } = parseChunkKey(key);
    log.debug(`unloading chunk (${x}, ${z})`);
    this.events.emit('chunk_unloaded', { x, z });
  }

  private fail(error: ChunkLoadError): Result<Chunk<H>, ChunkLoadError> {
    log.warn(error.message);
    this.events.emit('chunk_load_failed', { x: error.coord.x, z: error.coord.z, reason: error.code });
    return err(error);
  }

  /** Release every cached chunk and empty the cache. */
  dispose(): void {
    for (const key of [...this.entries.keys()]) {
      this.evict(key);
    }
    log.info('Disposed');
  }
}
