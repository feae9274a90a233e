/**
 * Startup model selection.
 *
 * The page accepts an optional `?model=<url>` parameter naming an OBJ file to
 * show instead of the built-in cube.
 */

import { openModel, sourceName } from './api/file'
import { describeError, toAppError } from './api/errors'
import type { ViewerStore } from './store/viewerStore'

/** Read the `model` query parameter, or null when absent or blank. */
export function initialModelUrl(search: string): string | null {
  const value = new URLSearchParams(search).get('model')
  return value !== null && value.trim() !== '' ? value.trim() : null
}

/**
 * Load the model named by `search`, if any, into `store`.
 *
 * On failure the current mesh stays and the error becomes a notification.
 */
export async function loadStartupModel(store: ViewerStore, search: string): Promise<void> {
  const url = initialModelUrl(search)
  if (url === null) return

  const { setLoading } = store.getState()
  setLoading(true)
  try {
    const mesh = await openModel(url)
    store.getState().replaceMesh(mesh, sourceName(url))
    console.info(`Model loaded successfully: ${url}`)
  } catch (e) {
    const message = describeError(toAppError(e))
    console.error('Error loading model:', message)
    store.getState().pushNotification(message)
  } finally {
    store.getState().setLoading(false)
  }
}
