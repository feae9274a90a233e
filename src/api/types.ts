/**
 * Shared data types for the viewer: mesh geometry, projected points, and the
 * error payload every loader and surface failure is narrowed to.
 */

// ── Geometry ──────────────────────────────────────────────────────────────────

/** 3-component vector used for vertex positions. */
export interface Vec3 {
  x: number
  y: number
  z: number
}

/**
 * A polygon as an ordered list of zero-based vertex indices (at least 3).
 * Index validity is checked once, when the mesh is loaded.
 */
export type Face = readonly number[]

/** Vertex and face lists describing one polygonal surface. */
export interface Mesh {
  readonly vertices: readonly Vec3[]
  readonly faces: readonly Face[]
}

/** An undirected edge between two vertex indices. */
export type Edge = readonly [number, number]

/**
 * A vertex projected into screen space (origin top-left, v grows downward).
 * Recomputed every frame; `index` is the source vertex's position in the mesh.
 */
export interface ScreenPoint {
  u: number
  v: number
  index: number
}

// ── Errors ────────────────────────────────────────────────────────────────────

export type AppErrorKind = 'LoadError' | 'DisplaySurfaceError' | 'Unknown'

/**
 * Error payload produced by the loader and the display surface.
 *
 * Thrown as a plain object, not an Error subclass, so callers narrow it with
 * `toAppError` and read `kind` / `message` directly.
 */
export interface AppError {
  kind: AppErrorKind
  message?: string
}
