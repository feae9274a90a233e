/**
 * FrameLoop — drives the viewer one frame at a time.
 *
 * Each frame: drain the input queue → apply each event → auto-rotate unless a
 * drag was active → transform → render → present → wait a fixed interval.
 *
 * Everything in a frame runs synchronously. The only work that outlives a
 * frame is a model load: the old mesh keeps rendering until the new one is
 * fully parsed, then the store swaps it in with a single update.
 */

import { describeError, toAppError } from '../api/errors'
import type { Mesh } from '../api/types'
import type { ViewerStore } from '../store/viewerStore'
import type { DisplaySurface } from './frameBuffer'
import {
  applyInput,
  beginFrame,
  createControllerState,
  isDragActive,
  type Command,
  type ControllerState,
} from './input'
import type { InputQueue } from './inputQueue'
import { meshEdges, renderFrame } from './renderer'
import { transformMesh } from './transform'
import { resolveColors, wrapAngle } from './viewState'

export interface LoadedModel {
  mesh: Mesh
  name: string
}

/**
 * Ask the user for a model and load it. Resolves null when the user cancels;
 * rejects with a LoadError when the file cannot be used.
 */
export type ModelRequester = () => Promise<LoadedModel | null>

export interface FrameLoopOptions {
  store: ViewerStore
  surface: DisplaySurface
  queue: InputQueue
  requestModel: ModelRequester
}

export class FrameLoop {
  private readonly store: ViewerStore
  private readonly surface: DisplaySurface
  private readonly queue: InputQueue
  private readonly requestModel: ModelRequester

  private controller: ControllerState
  private timer: ReturnType<typeof setTimeout> | null = null
  private stopped = false
  private load: Promise<void> | null = null

  constructor({ store, surface, queue, requestModel }: FrameLoopOptions) {
    this.store = store
    this.surface = surface
    this.queue = queue
    this.requestModel = requestModel
    this.controller = createControllerState(store.getState().view)
  }

  /** True until an exit command, a display failure, or `stop()`. */
  get running(): boolean {
    return !this.stopped
  }

  /** The in-flight model load, if any. */
  get pendingLoad(): Promise<void> | null {
    return this.load
  }

  /**
   * Run one frame.
   *
   * @returns false once the loop has terminated; no frame is presented then.
   */
  step(): boolean {
    if (this.stopped) return false

    const { config } = this.store.getState()
    // Pick up mesh swaps made by a finished load since the last frame.
    this.controller = beginFrame({ ...this.controller, view: this.store.getState().view })

    for (const event of this.queue.drain()) {
      const result = applyInput(this.controller, event, config)
      this.controller = result.state
      if (result.command && !this.handleCommand(result.command)) return false
    }

    let view = this.controller.view
    if (view.autoRotate && !isDragActive(this.controller)) {
      view = { ...view, rotationY: wrapAngle(view.rotationY + config.autoRotateStep) }
      this.controller = { ...this.controller, view }
    }
    if (view !== this.store.getState().view) {
      this.store.getState().setView(view)
    }

    try {
      const points = transformMesh(view.mesh, view.rotationX, view.rotationY, {
        scale: config.baseScale * view.zoom,
        distance: config.cameraDistance,
        width: this.surface.width,
        height: this.surface.height,
        epsilon: config.epsilon,
      })
      renderFrame(this.surface, points, meshEdges(view.mesh), resolveColors(view, config.palette))
      this.surface.present()
    } catch (e) {
      const err = toAppError(e)
      console.error('Display surface failed:', describeError(err))
      this.terminate(`Display error: ${describeError(err)}`)
      return false
    }
    return true
  }

  /** Run frames every `frameIntervalMs` until the loop terminates. */
  start(): void {
    if (this.stopped || this.timer !== null) return
    const tick = () => {
      this.timer = null
      if (this.step()) {
        this.timer = setTimeout(tick, this.store.getState().config.frameIntervalMs)
      }
    }
    tick()
  }

  /** Stop scheduling frames. Used on unmount; does not mark the viewer as exited. */
  stop(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer)
      this.timer = null
    }
    this.stopped = true
  }

  /** @returns false when the command ends the loop. */
  private handleCommand(command: Command): boolean {
    switch (command.type) {
      case 'exit':
        console.info('Exit requested')
        this.terminate('Viewer stopped')
        return false
      case 'load-model':
        this.beginLoad()
        return true
    }
  }

  private beginLoad(): void {
    // `loading` also covers the startup model, which loads outside the loop.
    const { loading, setLoading } = this.store.getState()
    if (this.load !== null || loading) {
      console.info('Model load already in progress')
      return
    }
    setLoading(true)
    console.info('Loading model from file...')

    this.load = this.requestModel()
      .then(
        (loaded) => {
          if (loaded === null) {
            console.info('No file was selected')
            return
          }
          if (this.stopped) return
          this.store.getState().replaceMesh(loaded.mesh, loaded.name)
          console.info(`Model loaded successfully: ${loaded.name}`)
        },
        (e: unknown) => {
          const message = describeError(toAppError(e))
          console.error('Error loading model:', message)
          this.store.getState().pushNotification(message)
        },
      )
      .finally(() => {
        this.load = null
        this.store.getState().setLoading(false)
      })
  }

  private terminate(reason: string): void {
    this.stop()
    this.store.getState().setStopped(reason)
  }
}
