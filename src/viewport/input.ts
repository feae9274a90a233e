/**
 * Input controller — the transition function from one ControllerState to the
 * next for a single InputEvent.
 *
 * Most events only touch the ViewState. Loading a model and exiting need the
 * frame loop, so those come back as Commands rather than state changes.
 */

import type { ViewerConfig } from '../config'
import { nextColor, rotateBy, zoomBy, type ViewState } from './viewState'

export type KeyAction =
  | 'toggle-auto-rotate'
  | 'zoom-in'
  | 'zoom-out'
  | 'cycle-background'
  | 'cycle-object-color'
  | 'load-model'
  | 'exit'

export type InputEvent =
  | { type: 'drag-begin'; x: number; y: number }
  | { type: 'drag-move'; dx: number; dy: number }
  | { type: 'drag-end' }
  | { type: 'key'; action: KeyAction }

export type Command = { type: 'load-model' } | { type: 'exit' }

export interface ControllerState {
  view: ViewState
  /** Where the active drag started, or null when no button is held. */
  dragOrigin: { x: number; y: number } | null
  /** True once any drag event has been seen during the current frame. */
  draggedThisFrame: boolean
}

export interface InputResult {
  state: ControllerState
  command?: Command
}

export function createControllerState(view: ViewState): ControllerState {
  return { view, dragOrigin: null, draggedThisFrame: false }
}

/**
 * Apply one event.
 *
 * A drag-move without a drag in progress, or with non-finite deltas, is
 * ignored. Horizontal motion turns the model about Y, vertical about X.
 */
export function applyInput(
  state: ControllerState,
  event: InputEvent,
  config: ViewerConfig,
): InputResult {
  switch (event.type) {
    case 'drag-begin':
      if (!Number.isFinite(event.x) || !Number.isFinite(event.y)) return { state }
      return {
        state: { ...state, dragOrigin: { x: event.x, y: event.y }, draggedThisFrame: true },
      }

    case 'drag-move': {
      if (state.dragOrigin === null) return { state }
      if (!Number.isFinite(event.dx) || !Number.isFinite(event.dy)) return { state }
      const s = config.rotationSensitivity
      return {
        state: {
          ...state,
          view: rotateBy(state.view, event.dy * s, event.dx * s),
          draggedThisFrame: true,
        },
      }
    }

    case 'drag-end':
      if (state.dragOrigin === null) return { state }
      return { state: { ...state, dragOrigin: null, draggedThisFrame: true } }

    case 'key':
      return applyKey(state, event.action, config)

    default:
      return { state }
  }
}

function applyKey(state: ControllerState, action: KeyAction, config: ViewerConfig): InputResult {
  const { view } = state
  switch (action) {
    case 'toggle-auto-rotate':
      return { state: { ...state, view: { ...view, autoRotate: !view.autoRotate } } }
    case 'zoom-in':
      return { state: { ...state, view: zoomBy(view, config.zoomStep, config) } }
    case 'zoom-out':
      return { state: { ...state, view: zoomBy(view, -config.zoomStep, config) } }
    case 'cycle-background':
      return {
        state: {
          ...state,
          view: { ...view, backgroundColor: nextColor(view.backgroundColor, config.palette.length) },
        },
      }
    case 'cycle-object-color':
      return {
        state: {
          ...state,
          view: { ...view, objectColor: nextColor(view.objectColor, config.palette.length) },
        },
      }
    case 'load-model':
      return { state, command: { type: 'load-model' } }
    case 'exit':
      return { state, command: { type: 'exit' } }
    default:
      return { state }
  }
}

/**
 * True when the per-frame auto-rotate increment should be skipped: a drag is
 * held, or one began, moved or ended during this frame.
 */
export function isDragActive(state: ControllerState): boolean {
  return state.dragOrigin !== null || state.draggedThisFrame
}

/** Start a new frame: forget drag activity from the previous one. */
export function beginFrame(state: ControllerState): ControllerState {
  return state.draggedThisFrame ? { ...state, draggedThisFrame: false } : state
}
