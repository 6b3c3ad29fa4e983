import type { Position, RandomSource } from './types'

export function samePosition(a: Position, b: Position) {
  return a.x === b.x && a.y === b.y
}

export function copyPosition(src: Position): Position {
  return { x: src.x, y: src.y }
}

export function containsPosition(cells: readonly Position[], target: Position) {
  for (const cell of cells) {
    if (samePosition(cell, target)) return true
  }
  return false
}

export function positionKey(position: Position) {
  return `${position.x},${position.y}`
}

// Inclusive on both ends.
export function randomInt(random: RandomSource, min: number, max: number) {
  const span = max - min + 1
  const index = Math.floor(random() * span)
  return min + Math.min(span - 1, Math.max(0, index))
}
