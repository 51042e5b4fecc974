/**
 * Public API of the voxel core.
 */

import { validateAndLoadConfig, type RuntimeConfig } from './config';
import { parseLogLevel, setLogLevel } from './core/logger';
import type { Clock } from './world/chunk';
import { ChunkLoader, ConfigError } from './world/chunkLoader';
import type { GeometryUploader } from './world/geometryUploader';

export * from './config';
export * from './types';
export { EventBus, worldEvents, type WorldEventMap } from './core/eventBus';
export {
  createLogger,
  getLogLevel,
  parseLogLevel,
  setLogLevel,
  type LogLevel,
  type Logger,
} from './core/logger';
export { chunkToWorld, spiralOrder, visibleOffsets, worldToChunk, worldToLocal } from './core/math';
export { BlockType, blockTypeName, isOpaque, type Block } from './world/block';
export { VoxelGrid, GridBoundsError, SealedGridError, type ReadonlyVoxelGrid } from './world/voxelGrid';
export { FACES, FACE_ELEMENTS, FaceDir, faceFor, type Face } from './world/faceTable';
export {
  greedyMeshGrid,
  greedyQuads,
  type ChunkMeshData,
  type GreedyQuad,
  type MesherOptions,
} from './world/greedyMesher';
export { TerrainGenerator, generateTerrain, type ColumnSample, type TerrainOptions } from './world/terrainGenerator';
export { BufferLease, ChunkDisposedError, type GeometryUploader } from './world/geometryUploader';
export {
  Chunk,
  ChunkLoadError,
  MeshBatches,
  buildChunk,
  monotonicClock,
  type ChunkLoadErrorCode,
  type Clock,
  type FaceBatch,
} from './world/chunk';
export { ChunkLoader, ConfigError, type ChunkLoaderOptions, type VisibleRefresh } from './world/chunkLoader';
export { ThreeGeometryUploader } from './rendering/threeGeometryUploader';

export interface CreateChunkLoaderOptions<H> {
  uploader: GeometryUploader<H>;
  config?: Partial<RuntimeConfig>;
  clock?: Clock;
}

/**
 * Validate the runtime config, apply its log level and build a ChunkLoader.
 * The log level comes from LOG_LEVEL unless the config sets one.
 * Throws ConfigError listing every validation failure.
 */
export function createChunkLoader<H>(seed: number, options: CreateChunkLoaderOptions<H>): ChunkLoader<H> {
  const { valid, config, errors } = validateAndLoadConfig({
    logLevel: parseLogLevel(process.env.LOG_LEVEL),
    ...options.config,
  });
  if (!valid) {
    throw new ConfigError(errors);
  }
  setLogLevel(config.logLevel);
  return new ChunkLoader(seed, {
    uploader: options.uploader,
    config,
    clock: options.clock,
  });
}
