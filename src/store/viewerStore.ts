/**
 * Zustand store for the viewer.
 *
 * Holds the ViewState the frame loop draws from, plus the UI-facing status:
 * notifications, whether a model load is pending, and whether the loop has
 * stopped. One store is created at startup and handed to the frame loop and
 * to React through ViewerContext; there is no module-level instance.
 */

import { createContext, useContext } from 'react'
import { createStore, type StoreApi } from 'zustand/vanilla'
import { useStore } from 'zustand'
import type { Mesh } from '../api/types'
import { DEFAULT_CONFIG, type ViewerConfig } from '../config'
import { DEFAULT_CUBE } from '../viewport/defaultMesh'
import type { InputQueue } from '../viewport/inputQueue'
import { createViewState, withMesh, type ViewState } from '../viewport/viewState'

export interface ViewerNotification {
  /** Unique per store, so repeated messages stay distinct toasts. */
  id: number
  message: string
}

export interface ViewerState {
  config: ViewerConfig
  /** Current view; replaced, never mutated, on every update. */
  view: ViewState
  /** Display name of the loaded model ("Cube" for the built-in one). */
  modelName: string
  /** True while a model file is being read and parsed. */
  loading: boolean
  /** Set when the frame loop has terminated, with the reason. */
  stopped: string | null
  /** Active notifications, oldest first. */
  notifications: ViewerNotification[]
  setView: (view: ViewState) => void
  /** Swap in a fully validated mesh in one update. */
  replaceMesh: (mesh: Mesh, name: string) => void
  setLoading: (loading: boolean) => void
  setStopped: (reason: string) => void
  /** Append a notification message. */
  pushNotification: (message: string) => void
  /** Remove the notification with the given id. */
  dismissNotification: (id: number) => void
}

export type ViewerStore = StoreApi<ViewerState>

export function createViewerStore(
  config: ViewerConfig = DEFAULT_CONFIG,
  mesh: Mesh = DEFAULT_CUBE,
): ViewerStore {
  let nextNotificationId = 1
  return createStore<ViewerState>((set) => ({
    config,
    view: createViewState(mesh, config),
    modelName: 'Cube',
    loading: false,
    stopped: null,
    notifications: [],
    setView: (view) => set({ view }),
    replaceMesh: (next, name) => set((s) => ({ view: withMesh(s.view, next), modelName: name })),
    setLoading: (loading) => set({ loading }),
    setStopped: (reason) => set({ stopped: reason }),
    pushNotification: (message) =>
      set((s) => ({ notifications: [...s.notifications, { id: nextNotificationId++, message }] })),
    dismissNotification: (id) =>
      set((s) => ({ notifications: s.notifications.filter((n) => n.id !== id) })),
  }))
}

// ── React bindings ────────────────────────────────────────────────────────────

export interface ViewerContextValue {
  store: ViewerStore
  /** Shared input queue; UI controls push events here like the keyboard does. */
  queue: InputQueue
}

export const ViewerContext = createContext<ViewerContextValue | null>(null)

export function useViewer(): ViewerContextValue {
  const value = useContext(ViewerContext)
  if (value === null) {
    throw new Error('useViewer must be used inside a ViewerContext provider')
  }
  return value
}

/** Select a slice of the viewer store; re-renders only when it changes. */
export function useViewerStore<T>(selector: (state: ViewerState) => T): T {
  return useStore(useViewer().store, selector)
}
