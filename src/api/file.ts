/**
 * Model file access for the viewer.
 *
 * A model arrives either as a `File` the user picked or as a URL (the
 * `?model=` startup parameter). Both paths read the text, parse it, and
 * reject with a typed AppError so callers never see a raw exception.
 */

import { loadError, toAppError } from './errors'
import { parseObj } from './objLoader'
import type { Mesh } from './types'

/** Where a model comes from: a picked file or a URL to fetch. */
export type ModelSource = File | string

/** Display name for a model source: the file name or the URL's last segment. */
export function sourceName(source: ModelSource): string {
  if (typeof source !== 'string') return source.name
  const path = source.split(/[?#]/)[0]
  return path.split('/').pop() || source
}

async function readText(source: ModelSource): Promise<string> {
  if (typeof source !== 'string') {
    return source.text()
  }
  const response = await fetch(source)
  if (!response.ok) {
    throw loadError(`Could not open ${source}: HTTP ${response.status}`)
  }
  return response.text()
}

/**
 * Read and parse an OBJ model.
 *
 * @returns The fully validated Mesh.
 * @throws AppError "LoadError" if the source cannot be read or is malformed.
 */
export async function openModel(source: ModelSource): Promise<Mesh> {
  let text: string
  try {
    text = await readText(source)
  } catch (e) {
    const err = toAppError(e)
    if (err.kind === 'LoadError') throw err
    throw loadError(`Could not open ${sourceName(source)}: ${err.message ?? err.kind}`)
  }
  try {
    return parseObj(text)
  } catch (e) {
    throw toAppError(e)
  }
}
