import type { Mesh } from '../api/types'

/**
 * Built-in model shown at startup: a 2×2×2 cube centred on the origin,
 * as six quads.
 */
export const DEFAULT_CUBE: Mesh = {
  vertices: [
    { x: -1, y: -1, z: -1 },
    { x: 1, y: -1, z: -1 },
    { x: 1, y: 1, z: -1 },
    { x: -1, y: 1, z: -1 },
    { x: -1, y: -1, z: 1 },
    { x: 1, y: -1, z: 1 },
    { x: 1, y: 1, z: 1 },
    { x: -1, y: 1, z: 1 },
  ],
  faces: [
    [0, 1, 2, 3], // back
    [4, 5, 6, 7], // front
    [0, 1, 5, 4], // bottom
    [3, 2, 6, 7], // top
    [0, 3, 7, 4], // left
    [1, 2, 6, 5], // right
  ],
}
