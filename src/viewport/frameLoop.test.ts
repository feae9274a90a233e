/**
 * Tests for FrameLoop. A RecordingSurface stands in for the canvas and the
 * model requester is a mock, so every frame can be stepped by hand.
 */

import type { Mock } from 'vitest'
import { displaySurfaceError, loadError } from '../api/errors'
import type { Mesh } from '../api/types'
import { DEFAULT_CONFIG } from '../config'
import { createViewerStore, type ViewerStore } from '../store/viewerStore'
import { RecordingSurface } from '../test/recordingSurface'
import { DEFAULT_CUBE } from './defaultMesh'
import { FrameLoop, type LoadedModel } from './frameLoop'
import { InputQueue } from './inputQueue'

const TRIANGLE: Mesh = {
  vertices: [
    { x: 0, y: 0, z: 0 },
    { x: 1, y: 0, z: 0 },
    { x: 0, y: 1, z: 0 },
  ],
  faces: [[0, 1, 2]],
}

function deferred<T>() {
  let resolve: (value: T) => void = () => {}
  const promise = new Promise<T>((res) => {
    resolve = res
  })
  return { promise, resolve: (value: T) => resolve(value) }
}

let store: ViewerStore
let surface: RecordingSurface
let queue: InputQueue
let requestModel: Mock<() => Promise<LoadedModel | null>>
let loop: FrameLoop

function makeLoop(autoRotate = true) {
  store = createViewerStore({ ...DEFAULT_CONFIG, autoRotate })
  surface = new RecordingSurface(800, 600)
  queue = new InputQueue()
  requestModel = vi.fn<() => Promise<LoadedModel | null>>()
  loop = new FrameLoop({ store, surface, queue, requestModel })
}

beforeEach(() => {
  vi.spyOn(console, 'info').mockImplementation(() => {})
  vi.spyOn(console, 'error').mockImplementation(() => {})
  makeLoop()
})

afterEach(() => {
  loop.stop()
  vi.restoreAllMocks()
  vi.useRealTimers()
})

/** Rotation about Y as stored after the last frame. */
const rotationY = () => store.getState().view.rotationY

// ── Rendering ─────────────────────────────────────────────────────────────────

describe('FrameLoop — one frame', () => {
  it('clears, draws the cube edges, and presents', () => {
    expect(loop.step()).toBe(true)
    expect(surface.calls[0]).toEqual({ op: 'clear', color: 0xffffff })
    expect(surface.lines()).toHaveLength(12)
    expect(surface.calls.at(-1)).toEqual({ op: 'present' })
  })

  it('projects with baseScale × zoom around the canvas centre', () => {
    makeLoop(false)
    loop.step()
    // Vertex 0 is (-1, -1, -1): denominator -1 + 8 = 7.
    const from = surface.lines()[0].from
    expect(from.u).toBeCloseTo(-600 / 7 + 400, 9)
    expect(from.v).toBeCloseTo(600 / 7 + 300, 9)
  })

  it('zooming in scales the projection', () => {
    makeLoop(false)
    queue.push({ type: 'key', action: 'zoom-in' })
    loop.step()
    expect(store.getState().view.zoom).toBeCloseTo(1.1)
    expect(surface.lines()[0].from.u).toBeCloseTo(-660 / 7 + 400, 6)
  })

  it('draws in the cycled object color', () => {
    queue.push({ type: 'key', action: 'cycle-object-color' })
    loop.step()
    // Palette index 1 is white.
    expect(surface.lines()[0].color).toBe(0xffffff)
  })
})

// ── Auto-rotate and drag ──────────────────────────────────────────────────────

describe('FrameLoop — auto-rotate', () => {
  it('adds autoRotateStep to rotationY every frame', () => {
    loop.step()
    expect(rotationY()).toBeCloseTo(0.01)
    loop.step()
    expect(rotationY()).toBeCloseTo(0.02)
    expect(store.getState().view.rotationX).toBe(0)
  })

  it('leaves the view untouched when auto-rotate is off', () => {
    makeLoop(false)
    const before = store.getState().view
    loop.step()
    expect(store.getState().view).toBe(before)
  })

  it('two toggles in one frame keep auto-rotating', () => {
    queue.push({ type: 'key', action: 'toggle-auto-rotate' })
    queue.push({ type: 'key', action: 'toggle-auto-rotate' })
    loop.step()
    expect(store.getState().view.autoRotate).toBe(true)
    expect(rotationY()).toBeCloseTo(0.01)
  })

  it('one toggle stops the increment from that frame on', () => {
    queue.push({ type: 'key', action: 'toggle-auto-rotate' })
    loop.step()
    loop.step()
    expect(rotationY()).toBe(0)
  })

  it('a drag replaces the increment for its frame only', () => {
    queue.push({ type: 'drag-begin', x: 0, y: 0 })
    queue.push({ type: 'drag-move', dx: 10, dy: 0 })
    queue.push({ type: 'drag-end' })
    loop.step()
    expect(rotationY()).toBeCloseTo(0.1)

    loop.step()
    expect(rotationY()).toBeCloseTo(0.11)
    expect(store.getState().view.autoRotate).toBe(true)
  })

  it('a held drag suppresses the increment until the frame after it ends', () => {
    queue.push({ type: 'drag-begin', x: 0, y: 0 })
    loop.step()
    loop.step()
    expect(rotationY()).toBe(0)

    queue.push({ type: 'drag-end' })
    loop.step()
    expect(rotationY()).toBe(0)

    loop.step()
    expect(rotationY()).toBeCloseTo(0.01)
  })
})

// ── Termination ───────────────────────────────────────────────────────────────

describe('FrameLoop — termination', () => {
  it('stops on an exit command without presenting', () => {
    queue.push({ type: 'key', action: 'exit' })
    expect(loop.step()).toBe(false)
    expect(surface.presented).toBe(0)
    expect(loop.running).toBe(false)
    expect(store.getState().stopped).toBe('Viewer stopped')
  })

  it('ignores events queued after the exit', () => {
    queue.push({ type: 'key', action: 'exit' })
    queue.push({ type: 'key', action: 'zoom-in' })
    loop.step()
    expect(store.getState().view.zoom).toBe(1)
  })

  it('never runs another frame once stopped', () => {
    queue.push({ type: 'key', action: 'exit' })
    loop.step()
    expect(loop.step()).toBe(false)
    expect(surface.calls).toEqual([])
  })

  it('stops on a display surface error', () => {
    vi.spyOn(surface, 'present').mockImplementation(() => {
      throw displaySurfaceError('Canvas was detached from the document')
    })
    expect(loop.step()).toBe(false)
    expect(store.getState().stopped).toBe('Display error: Canvas was detached from the document')
    expect(console.error).toHaveBeenCalledWith(
      'Display surface failed:',
      'Canvas was detached from the document',
    )
    expect(loop.step()).toBe(false)
  })
})

// ── Model loading ─────────────────────────────────────────────────────────────

describe('FrameLoop — load-model', () => {
  it('keeps rendering the old mesh until the new one is ready, then swaps', async () => {
    const pending = deferred<LoadedModel | null>()
    requestModel.mockReturnValue(pending.promise)

    queue.push({ type: 'key', action: 'load-model' })
    loop.step()
    expect(store.getState().loading).toBe(true)
    expect(surface.lines()).toHaveLength(12)

    surface.calls = []
    loop.step()
    expect(surface.lines()).toHaveLength(12)

    pending.resolve({ mesh: TRIANGLE, name: 'tri.obj' })
    await loop.pendingLoad

    expect(store.getState().view.mesh).toBe(TRIANGLE)
    expect(store.getState().modelName).toBe('tri.obj')
    expect(store.getState().loading).toBe(false)

    surface.calls = []
    loop.step()
    expect(surface.lines()).toHaveLength(3)
  })

  it('keeps the view angles across a mesh swap', async () => {
    requestModel.mockResolvedValue({ mesh: TRIANGLE, name: 'tri.obj' })
    queue.push({ type: 'key', action: 'load-model' })
    loop.step()
    await loop.pendingLoad
    expect(rotationY()).toBeCloseTo(0.01)
  })

  it('leaves the mesh unchanged and notifies on a LoadError', async () => {
    requestModel.mockRejectedValue(loadError('Line 4: face index 9 out of range (3 vertices declared)'))

    queue.push({ type: 'key', action: 'load-model' })
    loop.step()
    await loop.pendingLoad

    expect(store.getState().view.mesh).toBe(DEFAULT_CUBE)
    expect(store.getState().notifications).toEqual([
      { id: 1, message: 'Line 4: face index 9 out of range (3 vertices declared)' },
    ])
    expect(store.getState().loading).toBe(false)
    expect(loop.step()).toBe(true)
  })

  it('does nothing when the user cancels', async () => {
    requestModel.mockResolvedValue(null)
    queue.push({ type: 'key', action: 'load-model' })
    loop.step()
    await loop.pendingLoad

    expect(store.getState().view.mesh).toBe(DEFAULT_CUBE)
    expect(store.getState().notifications).toEqual([])
  })

  it('ignores load requests while one is in flight', async () => {
    const pending = deferred<LoadedModel | null>()
    requestModel.mockReturnValue(pending.promise)

    queue.push({ type: 'key', action: 'load-model' })
    loop.step()
    queue.push({ type: 'key', action: 'load-model' })
    loop.step()
    expect(requestModel).toHaveBeenCalledTimes(1)

    pending.resolve(null)
    await loop.pendingLoad
    expect(loop.pendingLoad).toBeNull()
  })

  it('ignores load requests while the startup model is loading', () => {
    store.getState().setLoading(true)
    queue.push({ type: 'key', action: 'load-model' })
    loop.step()
    expect(requestModel).not.toHaveBeenCalled()
    expect(loop.pendingLoad).toBeNull()
    expect(store.getState().loading).toBe(true)
  })
})

// ── Scheduling ────────────────────────────────────────────────────────────────

describe('FrameLoop — start / stop', () => {
  it('runs the first frame immediately and then one per interval', () => {
    vi.useFakeTimers()
    loop.start()
    expect(surface.presented).toBe(1)

    vi.advanceTimersByTime(DEFAULT_CONFIG.frameIntervalMs * 3)
    expect(surface.presented).toBe(4)
  })

  it('stop() cancels the next frame', () => {
    vi.useFakeTimers()
    loop.start()
    loop.stop()
    vi.advanceTimersByTime(1000)
    expect(surface.presented).toBe(1)
    expect(store.getState().stopped).toBeNull()
  })

  it('stops scheduling after an exit command', () => {
    vi.useFakeTimers()
    loop.start()
    queue.push({ type: 'key', action: 'exit' })
    vi.advanceTimersByTime(DEFAULT_CONFIG.frameIntervalMs)
    vi.advanceTimersByTime(1000)
    expect(surface.presented).toBe(1)
    expect(vi.getTimerCount()).toBe(0)
  })
})
