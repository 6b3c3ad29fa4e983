import type { GameConfig } from './types'

export const PLAYABLE_ORIGIN_X = 5
export const PLAYABLE_ORIGIN_Y = 4
export const PLAYABLE_WIDTH = 30
export const PLAYABLE_HEIGHT = 15
export const WALL_THICKNESS = 1
export const CELL_SIZE = 32

export const INITIAL_SNAKE_LENGTH = 3
export const INITIAL_SNAKE_HEAD = { x: 20, y: 11 }

export const INITIAL_TICK_RATE = 4
export const MAX_TICK_RATE = 15
export const SPEED_SCORE_INTERVAL = 30
export const SPEED_INCREMENT = 1

export const NORMAL_FOOD_VALUE = 10
export const BONUS_FOOD_VALUE = NORMAL_FOOD_VALUE * 2
export const BONUS_FOOD_CHANCE = 0.15
export const BONUS_FOOD_LIFETIME_SECONDS = 4
export const NORMAL_FOOD_GROWTH = 1
export const BONUS_FOOD_GROWTH = 2
export const MAX_PLACEMENT_ATTEMPTS = 1000
export const FALLBACK_FOOD_POSITION = { x: 5, y: 5 }

export const DEFAULT_GAME_CONFIG: GameConfig = {
  grid: {
    originX: PLAYABLE_ORIGIN_X,
    originY: PLAYABLE_ORIGIN_Y,
    width: PLAYABLE_WIDTH,
    height: PLAYABLE_HEIGHT,
    wallThickness: WALL_THICKNESS,
    cellSize: CELL_SIZE,
  },
  snake: {
    initialLength: INITIAL_SNAKE_LENGTH,
    initialHead: INITIAL_SNAKE_HEAD,
    initialDirection: 'right',
  },
  speed: {
    initialTickRate: INITIAL_TICK_RATE,
    maxTickRate: MAX_TICK_RATE,
    scoreInterval: SPEED_SCORE_INTERVAL,
    increment: SPEED_INCREMENT,
  },
  food: {
    normalValue: NORMAL_FOOD_VALUE,
    bonusValue: BONUS_FOOD_VALUE,
    bonusChance: BONUS_FOOD_CHANCE,
    bonusLifetimeSeconds: BONUS_FOOD_LIFETIME_SECONDS,
    normalGrowth: NORMAL_FOOD_GROWTH,
    bonusGrowth: BONUS_FOOD_GROWTH,
    maxPlacementAttempts: MAX_PLACEMENT_ATTEMPTS,
    fallbackPosition: FALLBACK_FOOD_POSITION,
  },
}
