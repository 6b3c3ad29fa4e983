import type { Direction, GameConfig, GameSnapshot, TickStatus } from '@game/types'
import type { GameSession } from '@game/session'

export type AppDebugApi = {
  getSnapshot?: () => GameSnapshot
  getConfig?: () => GameConfig
  step?: () => TickStatus
  setDirection?: (direction: Direction) => void
  // Stored overrides apply from the next page load.
  setConfigOverrides?: (overrides: unknown) => boolean
}

export type RegisterAppDebugApiOptions = {
  session: GameSession
}

declare global {
  interface Window {
    __SNAKE_DEBUG__?: AppDebugApi
  }
}
