/**
 * The six axis-aligned face orientations of a unit cube.
 *
 * Each record carries its normal, the sweep axis along that normal (di),
 * the two in-plane axes (dj, dk) the mesher merges along, and the unit
 * quad template. Template vertices are ordered so that the index pattern
 * 0,1,2 / 3,2,1 gives two triangles wound counter-clockwise when seen
 * from outside the cube.
 */

export type Vec3Tuple = readonly [number, number, number];
type QuadTemplate = readonly [Vec3Tuple, Vec3Tuple, Vec3Tuple, Vec3Tuple];

/** Axis index: 0 = x, 1 = y, 2 = z. */
export type Axis = 0 | 1 | 2;

export const FaceDir = {
  FRONT: 0,  // +Z
  BACK: 1,   // -Z
  RIGHT: 2,  // +X
  LEFT: 3,   // -X
  TOP: 4,    // +Y
  BOTTOM: 5, // -Y
} as const;
export type FaceDir = (typeof FaceDir)[keyof typeof FaceDir];

export interface Face {
  dir: FaceDir;
  name: string;
  normal: Vec3Tuple;
  /** Sweep axis, parallel to the normal. */
  di: Axis;
  /** Outer in-plane axis: the quad's second extent. */
  dj: Axis;
  /** Inner in-plane axis: runs are measured along it first. */
  dk: Axis;
  vertices: QuadTemplate;
}

/** Relative indices of the two triangles of a quad. */
export const FACE_ELEMENTS = [0, 1, 2, 3, 2, 1] as const;

export const FACES: readonly [Face, Face, Face, Face, Face, Face] = [
  {
    dir: FaceDir.FRONT,
    name: 'front',
    normal: [0, 0, 1],
    di: 2, dj: 1, dk: 0,
    vertices: [
      [0, 0, 1], // bottom left
      [1, 0, 1], // bottom right
      [0, 1, 1], // top left
      [1, 1, 1], // top right
    ],
  },
  {
    dir: FaceDir.BACK,
    name: 'back',
    normal: [0, 0, -1],
    di: 2, dj: 1, dk: 0,
    vertices: [
      [1, 0, 0], // bottom right
      [0, 0, 0], // bottom left
      [1, 1, 0], // top right
      [0, 1, 0], // top left
    ],
  },
  {
    dir: FaceDir.RIGHT,
    name: 'right',
    normal: [1, 0, 0],
    di: 0, dj: 1, dk: 2,
    vertices: [
      [1, 0, 1], // bottom front
      [1, 0, 0], // bottom back
      [1, 1, 1], // top front
      [1, 1, 0], // top back
    ],
  },
  {
    dir: FaceDir.LEFT,
    name: 'left',
    normal: [-1, 0, 0],
    di: 0, dj: 1, dk: 2,
    vertices: [
      [0, 0, 0], // bottom back
      [0, 0, 1], // bottom front
      [0, 1, 0], // top back
      [0, 1, 1], // top front
    ],
  },
  {
    dir: FaceDir.TOP,
    name: 'top',
    normal: [0, 1, 0],
    di: 1, dj: 2, dk: 0,
    vertices: [
      [0, 1, 1], // front left
      [1, 1, 1], // front right
      [0, 1, 0], // back left
      [1, 1, 0], // back right
    ],
  },
  {
    dir: FaceDir.BOTTOM,
    name: 'bottom',
    normal: [0, -1, 0],
    di: 1, dj: 2, dk: 0,
    vertices: [
      [0, 0, 0], // back left
      [1, 0, 0], // back right
      [0, 0, 1], // front left
      [1, 0, 1], // front right
    ],
  },
];

export function faceFor(dir: FaceDir): Face {
  return FACES[dir];
}
