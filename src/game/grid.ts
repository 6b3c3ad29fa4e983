import type { GridConfig, Position, RandomSource } from './types'
import { randomInt } from './math'

export type BoardSize = {
  columns: number
  rows: number
}

export function isInsidePlayable(grid: GridConfig, position: Position) {
  return (
    position.x >= grid.originX &&
    position.x < grid.originX + grid.width &&
    position.y >= grid.originY &&
    position.y < grid.originY + grid.height
  )
}

export function* playableCells(grid: GridConfig): Generator<Position> {
  for (let y = grid.originY; y < grid.originY + grid.height; y += 1) {
    for (let x = grid.originX; x < grid.originX + grid.width; x += 1) {
      yield { x, y }
    }
  }
}

export function randomPlayableCell(grid: GridConfig, random: RandomSource): Position {
  return {
    x: randomInt(random, grid.originX, grid.originX + grid.width - 1),
    y: randomInt(random, grid.originY, grid.originY + grid.height - 1),
  }
}

// Playable area plus its wall ring, anchored at the wall's top-left cell.
export function boardBounds(grid: GridConfig) {
  const t = grid.wallThickness
  return {
    minX: grid.originX - t,
    minY: grid.originY - t,
    size: {
      columns: grid.width + t * 2,
      rows: grid.height + t * 2,
    } satisfies BoardSize,
  }
}
