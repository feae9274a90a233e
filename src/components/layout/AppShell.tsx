/**
 * AppShell — root layout component.
 *
 * Places the Toolbar across the top, the wireframe Viewport in the main
 * area, and the StatusBar along the bottom.
 */

import { Toolbar } from '../toolbar/Toolbar'
import { Viewport } from '../../viewport/Viewport'
import { StatusBar } from '../status/StatusBar'
import { Notifications } from '../common/Notifications'

export function AppShell() {
  return (
    <div style={{ display: 'flex', flexDirection: 'column', height: '100vh' }}>
      <Toolbar />
      <div style={{ display: 'flex', flex: 1, overflow: 'hidden' }}>
        <Viewport />
      </div>
      <StatusBar />
      <Notifications />
    </div>
  )
}
