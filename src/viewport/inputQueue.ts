/**
 * Input event source.
 *
 * DOM listeners translate mouse and keyboard activity into InputEvents and
 * push them onto a queue. The frame loop drains the queue once per frame, so
 * handlers never touch view state directly. Toolbar buttons push onto the
 * same queue.
 */

import type { InputEvent, KeyAction } from './input'

/** Keyboard bindings by `KeyboardEvent.key`. */
export const KEY_BINDINGS: Readonly<Record<string, KeyAction>> = {
  ' ': 'toggle-auto-rotate',
  ArrowUp: 'zoom-in',
  '=': 'zoom-in',
  '+': 'zoom-in',
  ArrowDown: 'zoom-out',
  '-': 'zoom-out',
  b: 'cycle-background',
  B: 'cycle-background',
  m: 'cycle-object-color',
  M: 'cycle-object-color',
  l: 'load-model',
  L: 'load-model',
  Escape: 'exit',
}

/** Actions that keep firing while their key is held. */
const REPEATABLE: ReadonlySet<KeyAction> = new Set<KeyAction>(['zoom-in', 'zoom-out'])

export class InputQueue {
  private events: InputEvent[] = []

  push(event: InputEvent): void {
    this.events.push(event)
  }

  /** Take every pending event, leaving the queue empty. Never blocks. */
  drain(): InputEvent[] {
    const drained = this.events
    this.events = []
    return drained
  }

  get size(): number {
    return this.events.length
  }
}

/**
 * Attach mouse listeners to `target` and key listeners to `keyTarget`.
 *
 * Only the left button drags. Move deltas are measured against the previous
 * pointer position. Keys without a binding are ignored, and so is auto-repeat
 * on every key except zoom.
 *
 * @returns A function that removes every listener.
 */
export function bindInput(
  queue: InputQueue,
  target: HTMLElement,
  keyTarget: Pick<Window, 'addEventListener' | 'removeEventListener'> = window,
): () => void {
  let last: { x: number; y: number } | null = null

  const onMouseDown = (e: MouseEvent) => {
    if (e.button !== 0) return
    last = { x: e.clientX, y: e.clientY }
    queue.push({ type: 'drag-begin', x: e.clientX, y: e.clientY })
  }

  const onMouseMove = (e: MouseEvent) => {
    if (last === null) return
    const dx = e.clientX - last.x
    const dy = e.clientY - last.y
    last = { x: e.clientX, y: e.clientY }
    if (dx === 0 && dy === 0) return
    queue.push({ type: 'drag-move', dx, dy })
  }

  const onMouseUp = () => {
    if (last === null) return
    last = null
    queue.push({ type: 'drag-end' })
  }

  const onKeyDown = (e: KeyboardEvent) => {
    const action = KEY_BINDINGS[e.key]
    if (action === undefined) return
    // Keep Space / arrows from scrolling the page.
    e.preventDefault()
    if (e.repeat && !REPEATABLE.has(action)) return
    queue.push({ type: 'key', action })
  }

  target.addEventListener('mousedown', onMouseDown)
  target.addEventListener('mousemove', onMouseMove)
  target.addEventListener('mouseup', onMouseUp)
  target.addEventListener('mouseleave', onMouseUp)
  keyTarget.addEventListener('keydown', onKeyDown)

  return () => {
    target.removeEventListener('mousedown', onMouseDown)
    target.removeEventListener('mousemove', onMouseMove)
    target.removeEventListener('mouseup', onMouseUp)
    target.removeEventListener('mouseleave', onMouseUp)
    keyTarget.removeEventListener('keydown', onKeyDown)
  }
}
