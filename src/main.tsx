import { StrictMode } from 'react'
import { createRoot } from 'react-dom/client'
import App from './App'
import { createGameRuntime } from './app/core/runtime'

const root = document.getElementById('root')
if (!root) {
  throw new Error('Missing #root element')
}

// Created outside React so StrictMode's double render cannot build a second session.
const runtime = createGameRuntime()

createRoot(root).render(
  <StrictMode>
    <App runtime={runtime} />
  </StrictMode>,
)
