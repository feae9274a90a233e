/**
 * ViewState: everything the frame loop needs to draw one frame.
 *
 * Values are immutable snapshots; every helper here returns a new ViewState
 * with its invariants restored (angles in [0, 2π), zoom within bounds,
 * color indices within the palette).
 */

import * as THREE from 'three'
import type { Mesh } from '../api/types'
import type { ViewerConfig } from '../config'

const TWO_PI = Math.PI * 2

export interface ViewState {
  /** Radians, always in [0, 2π). */
  rotationX: number
  /** Radians, always in [0, 2π). */
  rotationY: number
  /** Projection scale multiplier, always within [minZoom, maxZoom]. */
  zoom: number
  autoRotate: boolean
  /** Index into the configured palette. */
  backgroundColor: number
  /** Index into the configured palette. */
  objectColor: number
  mesh: Mesh
}

/** Normalize an angle into [0, 2π). */
export function wrapAngle(angle: number): number {
  if (angle >= 0 && angle < TWO_PI) return angle
  const wrapped = THREE.MathUtils.euclideanModulo(angle, TWO_PI)
  // euclideanModulo can return exactly 2π for tiny negative inputs.
  return wrapped >= TWO_PI ? 0 : wrapped
}

export function clampZoom(zoom: number, config: ViewerConfig): number {
  return THREE.MathUtils.clamp(zoom, config.minZoom, config.maxZoom)
}

/** Advance a palette index by one, wrapping at the end. */
export function nextColor(index: number, paletteSize: number): number {
  return (index + 1) % paletteSize
}

export function createViewState(mesh: Mesh, config: ViewerConfig): ViewState {
  const size = config.palette.length
  return {
    rotationX: 0,
    rotationY: 0,
    zoom: clampZoom(config.initialZoom, config),
    autoRotate: config.autoRotate,
    backgroundColor: config.backgroundColor % size,
    objectColor: config.objectColor % size,
    mesh,
  }
}

/** Add radians about X and Y, re-normalizing both rotations. */
export function rotateBy(state: ViewState, aboutX: number, aboutY: number): ViewState {
  return {
    ...state,
    rotationX: wrapAngle(state.rotationX + aboutX),
    rotationY: wrapAngle(state.rotationY + aboutY),
  }
}

/** Step zoom by `delta` and clamp. */
export function zoomBy(state: ViewState, delta: number, config: ViewerConfig): ViewState {
  return { ...state, zoom: clampZoom(state.zoom + delta, config) }
}

/** Replace the mesh wholesale; the previous mesh is dropped, never mutated. */
export function withMesh(state: ViewState, mesh: Mesh): ViewState {
  return { ...state, mesh }
}

/** Resolve the palette indices to 0xRRGGBB colors. */
export function resolveColors(
  state: ViewState,
  palette: readonly number[],
): { background: number; object: number } {
  return {
    background: palette[state.backgroundColor],
    object: palette[state.objectColor],
  }
}
