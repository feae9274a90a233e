/**
 * Tests for Notifications.tsx — toast overlay driven by the viewer store.
 */

import { act, screen, fireEvent, waitFor } from '@testing-library/react'
import { Notifications } from './Notifications'
import { createViewerStore } from '../../store/viewerStore'
import { renderWithViewer } from '../../test/renderWithViewer'

function storeWith(messages: string[]) {
  const store = createViewerStore()
  for (const message of messages) store.getState().pushNotification(message)
  return store
}

describe('Notifications', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('renders nothing when there are no notifications', () => {
    const { container } = renderWithViewer(<Notifications />)
    expect(container.textContent).toBe('')
  })

  it('renders a toast when a notification is added', () => {
    const { store } = renderWithViewer(<Notifications />)
    act(() => store.getState().pushNotification('Model contains no vertices'))
    expect(screen.getByText('Model contains no vertices')).toBeInTheDocument()
  })

  it('renders multiple toasts when multiple notifications are present', () => {
    renderWithViewer(<Notifications />, { store: storeWith(['error one', 'error two']) })
    expect(screen.getByText('error one')).toBeInTheDocument()
    expect(screen.getByText('error two')).toBeInTheDocument()
  })

  it('clicking × dismisses the toast', async () => {
    renderWithViewer(<Notifications />, { store: storeWith(['something went wrong']) })

    fireEvent.click(screen.getByRole('button', { name: 'Dismiss notification' }))

    await waitFor(() =>
      expect(screen.queryByText('something went wrong')).not.toBeInTheDocument()
    )
  })

  it('auto-dismisses after 5 seconds', async () => {
    vi.useFakeTimers()
    renderWithViewer(<Notifications />, { store: storeWith(['something went wrong']) })

    expect(screen.getByText('something went wrong')).toBeInTheDocument()

    await act(async () => { vi.advanceTimersByTime(5000) })

    expect(screen.queryByText('something went wrong')).not.toBeInTheDocument()
  })

  it('auto-dismisses repeated messages one after another', async () => {
    vi.useFakeTimers()
    const { store } = renderWithViewer(<Notifications />, {
      store: storeWith(['Model contains no vertices', 'Model contains no vertices']),
    })
    expect(screen.getAllByRole('alert')).toHaveLength(2)

    await act(async () => { vi.advanceTimersByTime(5000) })
    expect(screen.getAllByRole('alert')).toHaveLength(1)

    await act(async () => { vi.advanceTimersByTime(5000) })
    expect(screen.queryByRole('alert')).not.toBeInTheDocument()
    expect(store.getState().notifications).toEqual([])
  })
})
