/**
 * Viewport — the wireframe canvas component.
 *
 * Mounts a canvas, wraps it in a CanvasSurface, binds mouse and keyboard
 * input to the shared queue, and runs a FrameLoop for the lifetime of the
 * component. A hidden file input serves load-model requests.
 */

import { useEffect, useRef } from 'react'
import { openModel, sourceName } from '../api/file'
import { describeError, toAppError } from '../api/errors'
import { useViewer } from '../store/viewerStore'
import { CanvasSurface } from './canvasSurface'
import { pickFile } from './filePicker'
import { FrameLoop, type LoadedModel } from './frameLoop'
import { bindInput } from './inputQueue'

export function Viewport() {
  const containerRef = useRef<HTMLDivElement>(null)
  const fileInputRef = useRef<HTMLInputElement>(null)
  const { store, queue } = useViewer()

  function createSurface(canvas: HTMLCanvasElement): CanvasSurface | null {
    const { config, setStopped } = store.getState()
    try {
      return new CanvasSurface(canvas, config.width, config.height)
    } catch (e) {
      const message = describeError(toAppError(e))
      console.error('Could not create display surface:', message)
      setStopped(`Display error: ${message}`)
      return null
    }
  }

  useEffect(() => {
    const container = containerRef.current
    const fileInput = fileInputRef.current
    if (!container || !fileInput) return

    const canvas = document.createElement('canvas')
    canvas.style.display = 'block'
    canvas.style.maxWidth = '100%'
    container.appendChild(canvas)

    const surface = createSurface(canvas)
    if (surface === null) {
      container.removeChild(canvas)
      return
    }

    async function requestModel(): Promise<LoadedModel | null> {
      if (!fileInput) return null
      const file = await pickFile(fileInput)
      if (file === null) return null
      const mesh = await openModel(file)
      return { mesh, name: sourceName(file) }
    }

    const unbind = bindInput(queue, canvas)
    const loop = new FrameLoop({ store, surface, queue, requestModel })
    loop.start()

    return () => {
      loop.stop()
      unbind()
      if (container.contains(canvas)) container.removeChild(canvas)
    }
  }, [store, queue])

  return (
    <div ref={containerRef} style={{ width: '100%', height: '100%', overflow: 'auto' }}>
      <input
        ref={fileInputRef}
        type="file"
        accept=".obj"
        data-testid="model-file-input"
        style={{ display: 'none' }}
      />
    </div>
  )
}
