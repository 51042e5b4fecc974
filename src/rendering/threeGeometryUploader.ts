/**
 * GeometryUploader backed by THREE.BufferGeometry.
 *
 * Attributes are named after the shader inputs of the chunk program:
 * `position` (vec3), `normal` (vec3) and `blocktype` (float), plus the
 * index. Each non-empty face orientation becomes one geometry group whose
 * materialIndex is the face's FaceDir, so a renderer can draw or cull
 * orientations independently.
 */

import * as THREE from 'three';
import { createLogger } from '../core/logger';
import type { FaceRanges, GeometryArrays } from '../types';
import type { GeometryUploader } from '../world/geometryUploader';

const log = createLogger('ThreeUploader');

export class ThreeGeometryUploader implements GeometryUploader<THREE.BufferGeometry> {
  private readonly live = new Set<THREE.BufferGeometry>();

  /** Geometries uploaded and not yet released. */
  get liveCount(): number {
    return this.live.size;
  }

  upload(arrays: GeometryArrays, ranges: FaceRanges): THREE.BufferGeometry {
    const geometry = new THREE.BufferGeometry();
    geometry.setAttribute('position', new THREE.BufferAttribute(arrays.positions, 3));
    geometry.setAttribute('normal', new THREE.BufferAttribute(arrays.normals, 3));
    geometry.setAttribute('blocktype', new THREE.BufferAttribute(arrays.blockTypes, 1));
    geometry.setIndex(new THREE.BufferAttribute(arrays.indices, 1));

    ranges.forEach((range, faceIndex) => {
      if (range.count > 0) {
        geometry.addGroup(range.offset, range.count, faceIndex);
      }
    });

    geometry.computeBoundingBox();
    this.live.add(geometry);
    return geometry;
  }

  release(geometry: THREE.BufferGeometry): void {
    if (!this.live.delete(geometry)) {
      log.warn(`release() of unknown geometry ${geometry.uuid}`);
      return;
    }
    geometry.dispose();
  }

  /** Dispose everything still live. */
  dispose(): void {
    for (const geometry of this.live) {
      geometry.dispose();
    }
    log.debug(`Disposed ${this.live.size} live geometries`);
    this.live.clear();
  }
}
