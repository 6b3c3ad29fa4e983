import { localStore } from '@shared/storage/localStorage'
import { parseGameConfigOverrides, type GameConfigOverrides } from '@game/config'

const DEBUG_LOGGING_KEY = 'pixel_snake_debug'
const CONFIG_OVERRIDES_KEY = 'pixel_snake_config_overrides'

export const DEBUG_UI_ENABLED = import.meta.env.DEV || import.meta.env.VITE_SNAKE_DEBUG === '1'

export const getDebugLoggingEnabled = () => {
  if (typeof window === 'undefined') return false
  try {
    const url = new URL(window.location.href)
    const queryValue = url.searchParams.get('debug')
    if (queryValue === '1') {
      localStore.write(DEBUG_LOGGING_KEY, '1')
      return true
    }
    if (queryValue === '0') {
      localStore.write(DEBUG_LOGGING_KEY, '0')
      return false
    }
    const stored = localStore.read(DEBUG_LOGGING_KEY)
    if (stored === '1') return true
    if (stored === '0') return false

    const host = url.hostname.toLowerCase()
    return host === 'localhost' || host === '127.0.0.1' || host === '::1'
  } catch {
    return false
  }
}

export const getStoredConfigOverrides = (): GameConfigOverrides =>
  parseGameConfigOverrides(localStore.readJson(CONFIG_OVERRIDES_KEY))

export const persistConfigOverrides = (overrides: GameConfigOverrides) =>
  localStore.write(CONFIG_OVERRIDES_KEY, JSON.stringify(overrides))
