import type { Food, FoodConfig, FoodKind, GridConfig, Position, RandomSource } from './types'
import { copyPosition, positionKey, samePosition } from './math'
import { isInsidePlayable, playableCells, randomPlayableCell } from './grid'

export type FoodPlacement = {
  position: Position
  source: 'random' | 'enumerated' | 'fallback'
}

export function rollFoodKind(config: FoodConfig, random: RandomSource): FoodKind {
  return random() < config.bonusChance ? 'bonus' : 'normal'
}

export function foodGrowth(config: FoodConfig, kind: FoodKind) {
  return kind === 'bonus' ? config.bonusGrowth : config.normalGrowth
}

export function placeFood(
  config: FoodConfig,
  grid: GridConfig,
  excluded: readonly Position[],
  random: RandomSource,
): FoodPlacement {
  const blocked = new Set(excluded.map(positionKey))

  for (let attempt = 0; attempt < config.maxPlacementAttempts; attempt += 1) {
    const candidate = randomPlayableCell(grid, random)
    if (isInsidePlayable(grid, candidate) && !blocked.has(positionKey(candidate))) {
      return { position: candidate, source: 'random' }
    }
  }

  const free: Position[] = []
  for (const cell of playableCells(grid)) {
    if (!blocked.has(positionKey(cell))) free.push(cell)
  }
  if (free.length > 0) {
    const index = Math.min(free.length - 1, Math.floor(random() * free.length))
    return { position: free[index], source: 'enumerated' }
  }

  return { position: copyPosition(config.fallbackPosition), source: 'fallback' }
}

export function spawnFood(
  config: FoodConfig,
  grid: GridConfig,
  excluded: readonly Position[],
  tickRate: number,
  random: RandomSource,
): Food {
  const kind = rollFoodKind(config, random)
  const { position } = placeFood(config, grid, excluded, random)

  if (kind === 'bonus') {
    return {
      position,
      kind,
      value: config.bonusValue,
      // Ticks scale with the current rate so the wall-clock lifetime stays fixed.
      ticksRemaining: Math.max(1, Math.round(config.bonusLifetimeSeconds * tickRate)),
      expired: false,
    }
  }

  return {
    position,
    kind,
    value: config.normalValue,
    ticksRemaining: 0,
    expired: false,
  }
}

/** Counts a bonus food down by one tick. Returns true on the tick it expires. */
export function ageFood(food: Food) {
  if (food.kind !== 'bonus' || food.expired || food.ticksRemaining <= 0) return false
  food.ticksRemaining -= 1
  if (food.ticksRemaining > 0) return false
  food.expired = true
  food.position = null
  return true
}

export function isFoodEatenBy(food: Food, head: Position) {
  if (!food.position) return false
  return samePosition(food.position, head)
}
