/**
 * Transform pipeline: rotate every vertex about X, then about Y, then project
 * it into screen space with a simple perspective divide.
 *
 *   u =  x · scale / (z + distance) + width / 2
 *   v = −y · scale / (z + distance) + height / 2
 *
 * The v sign flip maps model +Y (up) to screen rows (growing downward).
 * The denominator is clamped to `epsilon`, so a vertex at or behind the
 * camera projects to a large but finite coordinate instead of NaN/∞.
 */

import * as THREE from 'three'
import type { Mesh, ScreenPoint, Vec3 } from '../api/types'

export interface Projection {
  /** Pixels per model unit at the camera distance; baseScale × zoom. */
  scale: number
  distance: number
  width: number
  height: number
  epsilon: number
}

const _v = new THREE.Vector3()
const _rx = new THREE.Matrix4()
const _ry = new THREE.Matrix4()

/** Rotate `p` about the X axis (right-handed). */
export function rotateX(p: Vec3, angle: number): Vec3 {
  _v.set(p.x, p.y, p.z).applyMatrix4(_rx.makeRotationX(angle))
  return { x: _v.x, y: _v.y, z: _v.z }
}

/** Rotate `p` about the Y axis (right-handed). */
export function rotateY(p: Vec3, angle: number): Vec3 {
  _v.set(p.x, p.y, p.z).applyMatrix4(_ry.makeRotationY(angle))
  return { x: _v.x, y: _v.y, z: _v.z }
}

/** Perspective-project an already rotated point. */
export function projectPoint(p: Vec3, projection: Projection): { u: number; v: number } {
  const { scale, distance, width, height, epsilon } = projection
  const denom = Math.max(p.z + distance, epsilon)
  return {
    u: (p.x * scale) / denom + width / 2,
    v: (-p.y * scale) / denom + height / 2,
  }
}

/**
 * Project every vertex of `mesh`, preserving vertex order so face indices
 * stay valid against the returned array.
 */
export function transformMesh(
  mesh: Mesh,
  rotationX: number,
  rotationY: number,
  projection: Projection,
): ScreenPoint[] {
  // Build the combined rotation once: Ry · Rx applies X first.
  _rx.makeRotationX(rotationX)
  _ry.makeRotationY(rotationY).multiply(_rx)

  return mesh.vertices.map((vertex, index) => {
    _v.set(vertex.x, vertex.y, vertex.z).applyMatrix4(_ry)
    const { u, v } = projectPoint(_v, projection)
    return { u, v, index }
  })
}
