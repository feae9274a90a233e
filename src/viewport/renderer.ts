/**
 * Wireframe renderer.
 *
 * Draws one complete frame: clear to the background color, then every mesh
 * edge in the object color. Edges are derived from the faces once per mesh
 * and cached, so a shared edge between two faces is drawn once.
 */

import type { Edge, Mesh, ScreenPoint } from '../api/types'
import type { DisplaySurface } from './frameBuffer'

const edgeCache = new WeakMap<Mesh, readonly Edge[]>()

/**
 * Unique undirected edges of `mesh`, in the order faces first mention them.
 * Each face contributes its consecutive pairs plus the closing edge.
 */
export function meshEdges(mesh: Mesh): readonly Edge[] {
  const cached = edgeCache.get(mesh)
  if (cached) return cached

  const seen = new Set<string>()
  const edges: Edge[] = []
  for (const face of mesh.faces) {
    for (let i = 0; i < face.length; i++) {
      const a = face[i]
      const b = face[(i + 1) % face.length]
      if (a === b) continue
      const key = a < b ? `${a}:${b}` : `${b}:${a}`
      if (seen.has(key)) continue
      seen.add(key)
      edges.push([a, b])
    }
  }
  edgeCache.set(mesh, edges)
  return edges
}

export interface FrameColors {
  background: number
  object: number
}

export function renderFrame(
  surface: DisplaySurface,
  points: readonly ScreenPoint[],
  edges: readonly Edge[],
  colors: FrameColors,
): void {
  surface.clear(colors.background)
  for (const [a, b] of edges) {
    surface.drawLine(points[a], points[b], colors.object)
  }
}
