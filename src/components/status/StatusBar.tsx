/**
 * StatusBar — one-line summary of the current model and view.
 */

import { useViewerStore } from '../../store/viewerStore'

export function StatusBar() {
  const modelName = useViewerStore((s) => s.modelName)
  const vertexCount = useViewerStore((s) => s.view.mesh.vertices.length)
  const faceCount = useViewerStore((s) => s.view.mesh.faces.length)
  const zoom = useViewerStore((s) => s.view.zoom)
  const autoRotate = useViewerStore((s) => s.view.autoRotate)
  const stopped = useViewerStore((s) => s.stopped)

  return (
    <div
      data-testid="status-bar"
      style={{ display: 'flex', gap: '1rem', padding: '0.25rem 0.5rem', borderTop: '1px solid #ccc', fontSize: '0.85rem' }}
    >
      <span>{modelName}</span>
      <span>
        {vertexCount} vertices, {faceCount} faces
      </span>
      <span>Zoom {zoom.toFixed(1)}×</span>
      <span>Auto-rotate {autoRotate ? 'on' : 'off'}</span>
      {stopped && <strong>{stopped}</strong>}
    </div>
  )
}
