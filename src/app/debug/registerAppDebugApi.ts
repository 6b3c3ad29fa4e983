import type { AppDebugApi, RegisterAppDebugApiOptions } from './types'
import { isDirection } from '@game/direction'
import { parseGameConfigOverrides } from '@game/config'
import { persistConfigOverrides } from '../core/debugSettings'

function getRootDebugApi(): AppDebugApi | null {
  if (typeof window === 'undefined') return null
  if (!window.__SNAKE_DEBUG__ || typeof window.__SNAKE_DEBUG__ !== 'object') {
    window.__SNAKE_DEBUG__ = {}
  }
  return window.__SNAKE_DEBUG__
}

export function registerAppDebugApi(options: RegisterAppDebugApiOptions): () => void {
  const rootDebugApi = getRootDebugApi()
  if (!rootDebugApi) return () => {}

  const { session } = options
  rootDebugApi.getSnapshot = () => session.snapshot()
  rootDebugApi.getConfig = () => structuredClone(session.config)
  rootDebugApi.step = () => session.tick()
  rootDebugApi.setDirection = (direction) => {
    if (!isDirection(direction)) return
    session.setDirection(direction)
  }
  rootDebugApi.setConfigOverrides = (overrides) =>
    persistConfigOverrides(parseGameConfigOverrides(overrides))

  return () => {
    delete rootDebugApi.getSnapshot
    delete rootDebugApi.getConfig
    delete rootDebugApi.step
    delete rootDebugApi.setDirection
    delete rootDebugApi.setConfigOverrides
  }
}
