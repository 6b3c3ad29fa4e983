export type GameErrorCode = 'INVALID_SNAKE_LAYOUT'

export class GameConfigError extends Error {
  readonly code: GameErrorCode
  readonly context?: Record<string, unknown>

  constructor(code: GameErrorCode, message: string, context?: Record<string, unknown>) {
    super(message)
    this.name = 'GameConfigError'
    this.code = code
    this.context = context
  }
}
