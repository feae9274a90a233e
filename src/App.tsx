import { ViewerContext, type ViewerContextValue } from './store/viewerStore'
import { AppShell } from './components/layout/AppShell'

interface AppProps {
  viewer: ViewerContextValue
}

export default function App({ viewer }: AppProps) {
  return (
    <ViewerContext.Provider value={viewer}>
      <AppShell />
    </ViewerContext.Provider>
  )
}
