/**
 * Toolbar — buttons mirroring the keyboard controls.
 *
 * Each button pushes the same InputEvent its key binding would, so the
 * frame loop handles mouse, keyboard and toolbar input identically.
 */

import type { KeyAction } from '../../viewport/input'
import { useViewer, useViewerStore } from '../../store/viewerStore'

interface ToolbarButton {
  label: string
  action: KeyAction
  hint: string
}

const BUTTONS: readonly ToolbarButton[] = [
  { label: 'Open Model', action: 'load-model', hint: 'L' },
  { label: 'Auto-rotate', action: 'toggle-auto-rotate', hint: 'Space' },
  { label: 'Zoom In', action: 'zoom-in', hint: '↑ / =' },
  { label: 'Zoom Out', action: 'zoom-out', hint: '↓ / -' },
  { label: 'Background', action: 'cycle-background', hint: 'B' },
  { label: 'Object Color', action: 'cycle-object-color', hint: 'M' },
]

export function Toolbar() {
  const { queue } = useViewer()
  const loading = useViewerStore((s) => s.loading)
  const stopped = useViewerStore((s) => s.stopped !== null)
  const autoRotate = useViewerStore((s) => s.view.autoRotate)

  return (
    <div style={{ display: 'flex', alignItems: 'center', gap: '0.5rem', padding: '0.25rem 0.5rem', borderBottom: '1px solid #ccc' }}>
      {BUTTONS.map(({ label, action, hint }) => (
        <button
          key={action}
          title={`${label} (${hint})`}
          aria-pressed={action === 'toggle-auto-rotate' ? autoRotate : undefined}
          disabled={stopped || (action === 'load-model' && loading)}
          onClick={() => queue.push({ type: 'key', action })}
        >
          {label}
        </button>
      ))}
      {loading && <span role="status">Loading model…</span>}
    </div>
  )
}
