import type {
  Direction,
  FoodConfig,
  GameConfig,
  GridConfig,
  Position,
  SnakeConfig,
  SpeedProgression,
} from './types'
import { DEFAULT_GAME_CONFIG } from './constants'
import { isDirection } from './direction'
import { createSnake, snakeFitsGrid } from './snake'
import { GameConfigError } from './errors'

export type GameConfigOverrides = {
  grid?: Partial<GridConfig>
  snake?: Partial<SnakeConfig>
  speed?: Partial<SpeedProgression>
  food?: Partial<FoodConfig>
}

const MAX_GRID_SPAN = 200

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value)

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const withRange = (value: unknown, fallback: number, min: number, max: number) => {
  if (!isFiniteNumber(value)) return fallback
  return Math.min(max, Math.max(min, value))
}

const intWithRange = (value: unknown, fallback: number, min: number, max: number) =>
  Math.round(withRange(value, fallback, min, max))

const withPosition = (value: unknown, fallback: Position): Position => {
  if (!isRecord(value) || !isFiniteNumber(value.x) || !isFiniteNumber(value.y)) {
    return { ...fallback }
  }
  return { x: Math.round(value.x), y: Math.round(value.y) }
}

const withDirection = (value: unknown, fallback: Direction): Direction =>
  isDirection(value) ? value : fallback

const resolveGrid = (overrides: Partial<GridConfig> | undefined): GridConfig => {
  const base = DEFAULT_GAME_CONFIG.grid
  const merged = { ...base, ...(overrides ?? {}) }
  return {
    originX: intWithRange(merged.originX, base.originX, 0, MAX_GRID_SPAN),
    originY: intWithRange(merged.originY, base.originY, 0, MAX_GRID_SPAN),
    width: intWithRange(merged.width, base.width, 2, MAX_GRID_SPAN),
    height: intWithRange(merged.height, base.height, 2, MAX_GRID_SPAN),
    wallThickness: intWithRange(merged.wallThickness, base.wallThickness, 0, 8),
    cellSize: intWithRange(merged.cellSize, base.cellSize, 4, 128),
  }
}

const resolveSpeed = (overrides: Partial<SpeedProgression> | undefined): SpeedProgression => {
  const base = DEFAULT_GAME_CONFIG.speed
  const merged = { ...base, ...(overrides ?? {}) }
  const initialTickRate = withRange(merged.initialTickRate, base.initialTickRate, 1, 120)
  return {
    initialTickRate,
    maxTickRate: withRange(merged.maxTickRate, base.maxTickRate, initialTickRate, 120),
    scoreInterval: intWithRange(merged.scoreInterval, base.scoreInterval, 1, 1_000_000),
    increment: withRange(merged.increment, base.increment, 0, 120),
  }
}

const resolveFood = (overrides: Partial<FoodConfig> | undefined): FoodConfig => {
  const base = DEFAULT_GAME_CONFIG.food
  const merged = { ...base, ...(overrides ?? {}) }
  return {
    normalValue: intWithRange(merged.normalValue, base.normalValue, 0, 1_000_000),
    bonusValue: intWithRange(merged.bonusValue, base.bonusValue, 0, 1_000_000),
    bonusChance: withRange(merged.bonusChance, base.bonusChance, 0, 1),
    bonusLifetimeSeconds: withRange(merged.bonusLifetimeSeconds, base.bonusLifetimeSeconds, 0.1, 600),
    normalGrowth: intWithRange(merged.normalGrowth, base.normalGrowth, 0, 100),
    bonusGrowth: intWithRange(merged.bonusGrowth, base.bonusGrowth, 0, 100),
    maxPlacementAttempts: intWithRange(merged.maxPlacementAttempts, base.maxPlacementAttempts, 0, 100_000),
    fallbackPosition: withPosition(merged.fallbackPosition, base.fallbackPosition),
  }
}

const resolveSnake = (overrides: Partial<SnakeConfig> | undefined): SnakeConfig => {
  const base = DEFAULT_GAME_CONFIG.snake
  const merged = { ...base, ...(overrides ?? {}) }
  return {
    initialLength: intWithRange(merged.initialLength, base.initialLength, 1, MAX_GRID_SPAN),
    initialHead: withPosition(merged.initialHead, base.initialHead),
    initialDirection: withDirection(merged.initialDirection, base.initialDirection),
  }
}

export const resolveGameConfig = (overrides?: GameConfigOverrides | null): GameConfig => {
  const config: GameConfig = {
    grid: resolveGrid(overrides?.grid),
    snake: resolveSnake(overrides?.snake),
    speed: resolveSpeed(overrides?.speed),
    food: resolveFood(overrides?.food),
  }

  if (!snakeFitsGrid(createSnake(config.snake), config.grid)) {
    throw new GameConfigError(
      'INVALID_SNAKE_LAYOUT',
      'Initial snake does not fit inside the playable area',
      { snake: config.snake, grid: config.grid },
    )
  }

  return config
}

const pickNumbers = <K extends string>(value: unknown, keys: readonly K[]) => {
  if (!isRecord(value)) return undefined
  const picked: Partial<Record<K, number>> = {}
  for (const key of keys) {
    const field = value[key]
    if (isFiniteNumber(field)) picked[key] = field
  }
  return picked
}

const pickPosition = (value: unknown): Position | undefined => {
  if (!isRecord(value) || !isFiniteNumber(value.x) || !isFiniteNumber(value.y)) return undefined
  return { x: value.x, y: value.y }
}

/** Keeps only well-typed fields from untrusted JSON (localStorage, debug API). */
export const parseGameConfigOverrides = (value: unknown): GameConfigOverrides => {
  if (!isRecord(value)) return {}
  const overrides: GameConfigOverrides = {}

  const grid = pickNumbers(value.grid, ['originX', 'originY', 'width', 'height', 'wallThickness', 'cellSize'])
  if (grid) overrides.grid = grid

  const speed = pickNumbers(value.speed, ['initialTickRate', 'maxTickRate', 'scoreInterval', 'increment'])
  if (speed) overrides.speed = speed

  const food = pickNumbers(value.food, [
    'normalValue',
    'bonusValue',
    'bonusChance',
    'bonusLifetimeSeconds',
    'normalGrowth',
    'bonusGrowth',
    'maxPlacementAttempts',
  ])
  if (food) {
    const fallbackPosition = isRecord(value.food) ? pickPosition(value.food.fallbackPosition) : undefined
    overrides.food = fallbackPosition ? { ...food, fallbackPosition } : food
  }

  if (isRecord(value.snake)) {
    const snake: Partial<SnakeConfig> = {}
    if (isFiniteNumber(value.snake.initialLength)) snake.initialLength = value.snake.initialLength
    const head = pickPosition(value.snake.initialHead)
    if (head) snake.initialHead = head
    if (isDirection(value.snake.initialDirection)) snake.initialDirection = value.snake.initialDirection
    overrides.snake = snake
  }

  return overrides
}
