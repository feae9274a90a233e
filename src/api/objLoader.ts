/**
 * Wavefront OBJ parser.
 *
 * Only geometry statements are read: `v` declares a vertex and `f` declares a
 * polygon over previously declared vertices. Indices in the file are 1-based
 * (or negative, counting back from the latest vertex) and are converted to
 * 0-based here. Every other statement (`vt`, `vn`, `o`, `g`, `usemtl`, …) is
 * skipped.
 *
 * Any malformed line rejects the whole file with a LoadError naming the line,
 * so a half-parsed mesh never reaches the viewer.
 */

import { loadError } from './errors'
import type { Face, Mesh, Vec3 } from './types'

function parseCoordinate(token: string | undefined, lineNo: number): number {
  const value = token === undefined ? NaN : Number(token)
  if (!Number.isFinite(value)) {
    throw loadError(`Line ${lineNo}: invalid vertex coordinate "${token ?? ''}"`)
  }
  return value
}

/**
 * Resolve one face token (`7`, `7/1`, `7//3`, `7/1/3`, `-2`) to a 0-based
 * index into the vertices declared so far.
 */
function parseFaceIndex(token: string, vertexCount: number, lineNo: number): number {
  const head = token.split('/')[0]
  if (!/^-?\d+$/.test(head)) {
    throw loadError(`Line ${lineNo}: invalid face index "${token}"`)
  }
  const raw = Number(head)
  if (raw === 0) {
    throw loadError(`Line ${lineNo}: face index 0 is not valid (indices start at 1)`)
  }
  const index = raw > 0 ? raw - 1 : vertexCount + raw
  if (index < 0 || index >= vertexCount) {
    throw loadError(
      `Line ${lineNo}: face index ${raw} out of range (${vertexCount} vertices declared)`,
    )
  }
  return index
}

/**
 * Parse OBJ source text into a Mesh.
 *
 * @throws AppError with kind "LoadError" on any malformed statement, on
 *   out-of-range face indices, or when the file declares no vertices.
 */
export function parseObj(text: string): Mesh {
  const vertices: Vec3[] = []
  const faces: Face[] = []

  const lines = text.split(/\r?\n/)
  lines.forEach((rawLine, i) => {
    const lineNo = i + 1
    const line = rawLine.split('#')[0].trim()
    if (line === '') return

    const [keyword, ...args] = line.split(/\s+/)
    switch (keyword) {
      case 'v': {
        if (args.length < 3) {
          throw loadError(`Line ${lineNo}: vertex needs 3 coordinates, got ${args.length}`)
        }
        vertices.push({
          x: parseCoordinate(args[0], lineNo),
          y: parseCoordinate(args[1], lineNo),
          z: parseCoordinate(args[2], lineNo),
        })
        break
      }
      case 'f': {
        if (args.length < 3) {
          throw loadError(`Line ${lineNo}: face needs at least 3 vertices, got ${args.length}`)
        }
        faces.push(args.map((token) => parseFaceIndex(token, vertices.length, lineNo)))
        break
      }
      default:
        break
    }
  })

  if (vertices.length === 0) {
    throw loadError('Model contains no vertices')
  }

  return { vertices, faces }
}
