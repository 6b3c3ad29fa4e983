import type { Direction, GamePhase } from './types'
import type { GameSession } from './session'

export type InputCommand =
  | { type: 'direction'; direction: Direction }
  | { type: 'togglePause' }
  | { type: 'start' }
  | { type: 'restart' }
  | { type: 'menu' }
  | { type: 'quit' }

const DIRECTION_KEYS: ReadonlyMap<string, Direction> = new Map<string, Direction>([
  ['ArrowUp', 'up'],
  ['ArrowDown', 'down'],
  ['ArrowLeft', 'left'],
  ['ArrowRight', 'right'],
  ['KeyW', 'up'],
  ['KeyS', 'down'],
  ['KeyA', 'left'],
  ['KeyD', 'right'],
])

/** Maps a KeyboardEvent.code to the command it means in the given phase. */
export function parseKeyCommand(code: string, phase: GamePhase): InputCommand | null {
  switch (phase) {
    case 'menu':
      if (code === 'Space' || code === 'Enter' || code === 'NumpadEnter') return { type: 'start' }
      if (code === 'Escape') return { type: 'quit' }
      return null
    case 'playing': {
      if (code === 'Space') return { type: 'togglePause' }
      if (code === 'Escape') return { type: 'menu' }
      const direction = DIRECTION_KEYS.get(code)
      return direction ? { type: 'direction', direction } : null
    }
    case 'paused':
      if (code === 'Space') return { type: 'togglePause' }
      if (code === 'Escape') return { type: 'menu' }
      return null
    case 'gameOver':
      if (code === 'KeyR') return { type: 'restart' }
      if (code === 'Escape') return { type: 'menu' }
      return null
  }
}

/**
 * Applies a command to the session. Returns false when the command had no
 * effect, including `quit`, which belongs to whoever owns the session.
 */
export function applyInputCommand(session: GameSession, command: InputCommand) {
  switch (command.type) {
    case 'direction':
      if (session.getPhase() !== 'playing') return false
      session.setDirection(command.direction)
      return true
    case 'togglePause':
      return session.togglePause()
    case 'start':
      return session.start()
    case 'restart':
      return session.restart()
    case 'menu':
      return session.returnToMenu()
    case 'quit':
      return false
  }
}
