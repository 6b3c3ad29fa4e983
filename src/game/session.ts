import type {
  Direction,
  Food,
  GameConfig,
  GamePhase,
  GameSnapshot,
  MusicTrack,
  RandomSource,
  Snake,
  TickStatus,
} from './types'
import { resolveGameConfig, type GameConfigOverrides } from './config'
import { ageFood, foodGrowth, isFoodEatenBy, spawnFood } from './food'
import { copyPosition } from './math'
import { advanceSnake, createSnake, growSnake, setSnakeDirection, snakeHead } from './snake'
import { tickRateForScore } from './speed'
import { silentAudioSink, type AudioSink } from './audio'
import { createMemoryHighScoreStore, type HighScoreStore } from './storage'
import { formatErrorMessage } from '@shared/errors/format'
import { silentLogger, type Logger } from '@shared/log/logger'

export type GameSessionOptions = {
  config?: GameConfigOverrides
  highScoreStore?: HighScoreStore
  audio?: AudioSink
  random?: RandomSource
  logger?: Logger
}

export type SessionListener = (snapshot: GameSnapshot) => void

const PHASE_MUSIC: Readonly<Record<GamePhase, MusicTrack>> = {
  menu: 'menu',
  playing: 'playing',
  paused: 'playing',
  gameOver: 'gameOver',
}

export class GameSession {
  readonly config: GameConfig
  private snake: Snake
  private food: Food | null = null
  private score = 0
  private tickRate: number
  private phase: GamePhase = 'menu'
  private highScore: number
  private readonly store: HighScoreStore
  private readonly audio: AudioSink
  private readonly random: RandomSource
  private readonly logger: Logger
  private readonly listeners = new Set<SessionListener>()

  constructor(options: GameSessionOptions = {}) {
    this.config = resolveGameConfig(options.config)
    this.store = options.highScoreStore ?? createMemoryHighScoreStore()
    this.audio = options.audio ?? silentAudioSink
    this.random = options.random ?? Math.random
    this.logger = options.logger ?? silentLogger

    this.snake = createSnake(this.config.snake)
    this.tickRate = this.config.speed.initialTickRate
    this.highScore = this.loadHighScore()
    this.notifyAudio(() => this.audio.playMusic('menu'))
  }

  getPhase() {
    return this.phase
  }

  getScore() {
    return this.score
  }

  getHighScore() {
    return this.highScore
  }

  getTickRate() {
    return this.tickRate
  }

  subscribe(listener: SessionListener) {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  start() {
    if (this.phase !== 'menu') return false
    this.beginPlay()
    return true
  }

  restart() {
    if (this.phase !== 'gameOver') return false
    this.beginPlay()
    return true
  }

  pause() {
    if (this.phase !== 'playing') return false
    this.phase = 'paused'
    this.notifyAudio(() => this.audio.playSound('pauseToggle'))
    this.logger.info('paused')
    this.emit()
    return true
  }

  resume() {
    if (this.phase !== 'paused') return false
    this.phase = 'playing'
    this.notifyAudio(() => this.audio.playSound('pauseToggle'))
    this.logger.info('resumed')
    this.emit()
    return true
  }

  togglePause() {
    return this.phase === 'paused' ? this.resume() : this.pause()
  }

  returnToMenu() {
    if (this.phase === 'menu') return false
    this.resetPlayfield()
    this.food = null
    this.phase = 'menu'
    this.notifyAudio(() => this.audio.playMusic('menu'))
    this.logger.info('returned to menu')
    this.emit()
    return true
  }

  /** Requests the current phase's track again. A track that is already playing is left alone. */
  replayPhaseMusic() {
    const track = PHASE_MUSIC[this.phase]
    this.notifyAudio(() => this.audio.playMusic(track))
  }

  setDirection(direction: Direction) {
    if (this.phase !== 'playing') return
    setSnakeDirection(this.snake, direction)
  }

  tick(): TickStatus {
    if (this.phase !== 'playing') return 'idle'

    if (!this.food || ageFood(this.food)) {
      if (this.food?.expired) this.logger.info('bonus food expired')
      this.respawnFood()
    }

    if (!advanceSnake(this.snake, this.config.grid)) {
      this.endGame()
      this.emit()
      return 'gameOver'
    }

    if (this.food && isFoodEatenBy(this.food, snakeHead(this.snake))) {
      this.eat(this.food)
    }

    this.emit()
    return 'continue'
  }

  snapshot(): GameSnapshot {
    const food = this.food
    return {
      phase: this.phase,
      snake: {
        body: this.snake.body.map(copyPosition),
        direction: this.snake.direction,
      },
      food: food
        ? {
            position: food.position ? copyPosition(food.position) : null,
            kind: food.kind,
            value: food.value,
            ticksRemaining: food.ticksRemaining,
          }
        : null,
      score: this.score,
      highScore: this.highScore,
      tickRate: this.tickRate,
    }
  }

  private beginPlay() {
    this.resetPlayfield()
    this.respawnFood()
    this.phase = 'playing'
    this.notifyAudio(() => this.audio.playMusic('playing'))
    this.logger.info('game started', { tickRate: this.tickRate })
    this.emit()
  }

  private resetPlayfield() {
    this.score = 0
    this.tickRate = this.config.speed.initialTickRate
    this.snake = createSnake(this.config.snake)
  }

  private respawnFood() {
    this.food = spawnFood(
      this.config.food,
      this.config.grid,
      this.snake.body,
      this.tickRate,
      this.random,
    )
    this.logger.info('food spawned', {
      kind: this.food.kind,
      position: this.food.position,
      ticksRemaining: this.food.ticksRemaining,
    })
  }

  private eat(food: Food) {
    this.score += food.value
    this.notifyAudio(() => this.audio.playSound('foodEaten'))

    // Growth does not stack: repeated calls before the next advance add one cell.
    const growth = foodGrowth(this.config.food, food.kind)
    for (let i = 0; i < growth; i += 1) {
      growSnake(this.snake)
    }

    const previousRate = this.tickRate
    this.tickRate = tickRateForScore(this.score, this.config.speed)
    if (this.tickRate !== previousRate) {
      this.logger.info('speed changed', { from: previousRate, to: this.tickRate })
    }

    this.respawnFood()
  }

  private endGame() {
    this.phase = 'gameOver'
    this.logger.info('game over', { score: this.score, length: this.snake.body.length })
    if (this.score > this.highScore) {
      this.highScore = this.score
      this.saveHighScore(this.score)
    }
    this.notifyAudio(() => this.audio.playMusic('gameOver'))
  }

  private loadHighScore() {
    try {
      const value = this.store.load()
      return Number.isFinite(value) && value > 0 ? Math.floor(value) : 0
    } catch (error) {
      this.logger.warn('high score load failed', formatErrorMessage(error))
      return 0
    }
  }

  private saveHighScore(score: number) {
    try {
      this.store.save(score)
    } catch (error) {
      this.logger.warn('high score save failed', formatErrorMessage(error))
    }
  }

  private notifyAudio(call: () => void) {
    try {
      call()
    } catch (error) {
      this.logger.warn('audio notification failed', formatErrorMessage(error))
    }
  }

  private emit() {
    if (this.listeners.size === 0) return
    const snapshot = this.snapshot()
    for (const listener of this.listeners) {
      try {
        listener(snapshot)
      } catch (error) {
        this.logger.warn('session listener failed', formatErrorMessage(error))
      }
    }
  }
}
