import type { Direction, GridConfig, Position, Snake, SnakeConfig } from './types'
import { isOppositeDirection, oppositeDirection, stepPosition } from './direction'
import { containsPosition, copyPosition } from './math'
import { isInsidePlayable } from './grid'

export function createSnake(config: SnakeConfig): Snake {
  const body: Position[] = []
  const trailing = oppositeDirection(config.initialDirection)
  let cell = copyPosition(config.initialHead)

  for (let i = 0; i < config.initialLength; i += 1) {
    body.push(cell)
    cell = stepPosition(cell, trailing)
  }

  return {
    body,
    direction: config.initialDirection,
    nextDirection: config.initialDirection,
    growPending: false,
  }
}

export function snakeHead(snake: Snake): Position {
  return snake.body[0]
}

export function setSnakeDirection(snake: Snake, direction: Direction) {
  if (snake.body.length > 1 && isOppositeDirection(snake.direction, direction)) return
  snake.nextDirection = direction
}

/**
 * Moves the snake one cell. Returns false on a wall or body hit, in which case
 * nothing about the snake has changed. The current tail still counts as body
 * here because it is only vacated after the head moves.
 */
export function advanceSnake(snake: Snake, grid: GridConfig) {
  const direction = snake.nextDirection
  const nextHead = stepPosition(snakeHead(snake), direction)

  if (!isInsidePlayable(grid, nextHead)) return false
  if (containsPosition(snake.body, nextHead)) return false

  snake.direction = direction
  snake.body.unshift(nextHead)
  if (snake.growPending) {
    snake.growPending = false
  } else {
    snake.body.pop()
  }
  return true
}

export function growSnake(snake: Snake) {
  snake.growPending = true
}

export function snakeFitsGrid(snake: Snake, grid: GridConfig) {
  for (let i = 0; i < snake.body.length; i += 1) {
    const cell = snake.body[i]
    if (!isInsidePlayable(grid, cell)) return false
    if (containsPosition(snake.body.slice(0, i), cell)) return false
  }
  return true
}
