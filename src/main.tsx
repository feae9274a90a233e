import React from 'react'
import ReactDOM from 'react-dom/client'
import App from './App'
import { resolveConfig } from './config'
import { createViewerStore } from './store/viewerStore'
import { InputQueue } from './viewport/inputQueue'
import { loadStartupModel } from './startup'

const config = resolveConfig(import.meta.env)
const store = createViewerStore(config)
const queue = new InputQueue()

// A missing or broken startup model leaves the built-in cube on screen.
loadStartupModel(store, window.location.search).catch(console.error)

const root = document.getElementById('root')
if (root === null) {
  throw new Error('Missing #root element')
}

ReactDOM.createRoot(root).render(
  <React.StrictMode>
    <App viewer={{ store, queue }} />
  </React.StrictMode>,
)
