import type { Direction, Position } from './types'

export const DIRECTIONS: readonly Direction[] = ['up', 'down', 'left', 'right']

export const DIRECTION_VECTORS: Readonly<Record<Direction, Position>> = {
  up: { x: 0, y: -1 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 },
}

const OPPOSITES: Readonly<Record<Direction, Direction>> = {
  up: 'down',
  down: 'up',
  left: 'right',
  right: 'left',
}

export function oppositeDirection(direction: Direction): Direction {
  return OPPOSITES[direction]
}

export function isOppositeDirection(a: Direction, b: Direction) {
  return OPPOSITES[a] === b
}

export function isDirection(value: unknown): value is Direction {
  return DIRECTIONS.some((direction) => direction === value)
}

export function stepPosition(position: Position, direction: Direction): Position {
  const vector = DIRECTION_VECTORS[direction]
  return { x: position.x + vector.x, y: position.y + vector.y }
}
