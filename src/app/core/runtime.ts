import { GameSession } from '@game/session'
import { createTickLoop, type TickLoop } from '@game/loop'
import { createHtmlAudioSink, type AudioSink } from '@game/audio'
import { createLocalHighScoreStore, type HighScoreStore } from '@game/storage'
import type { GameConfigOverrides } from '@game/config'
import type { RandomSource } from '@game/types'
import { GameConfigError } from '@game/errors'
import { createLogger, type Logger } from '@shared/log/logger'
import { formatErrorMessage } from '@shared/errors/format'
import { getDebugLoggingEnabled, getStoredConfigOverrides } from './debugSettings'

export type GameRuntime = {
  session: GameSession
  loop: TickLoop
  audio: AudioSink
  logger: Logger
}

export type GameRuntimeOptions = {
  config?: GameConfigOverrides
  audio?: AudioSink
  highScoreStore?: HighScoreStore
  random?: RandomSource
  logger?: Logger
}

function createSession(options: GameRuntimeOptions, audio: AudioSink, logger: Logger) {
  const base = {
    audio,
    logger,
    highScoreStore: options.highScoreStore ?? createLocalHighScoreStore(),
    random: options.random,
  }
  const config = options.config ?? getStoredConfigOverrides()
  try {
    return new GameSession({ ...base, config })
  } catch (error) {
    if (!(error instanceof GameConfigError)) throw error
    // Stored overrides can go stale; a bad layout falls back to the defaults.
    logger.warn('ignoring config overrides', formatErrorMessage(error))
    return new GameSession(base)
  }
}

export function createGameRuntime(options: GameRuntimeOptions = {}): GameRuntime {
  const logger = options.logger ?? createLogger('snake', getDebugLoggingEnabled)
  const audio = options.audio ?? createHtmlAudioSink({ logger: createLogger('audio', getDebugLoggingEnabled) })
  const session = createSession(options, audio, logger)
  return {
    session,
    loop: createTickLoop(session),
    audio,
    logger,
  }
}
