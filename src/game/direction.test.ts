import { describe, expect, it } from 'vitest'
import {
  DIRECTIONS,
  isDirection,
  isOppositeDirection,
  oppositeDirection,
  stepPosition,
} from './direction'

describe('direction', () => {
  it('pairs every direction with its reverse', () => {
    expect(oppositeDirection('up')).toBe('down')
    expect(oppositeDirection('down')).toBe('up')
    expect(oppositeDirection('left')).toBe('right')
    expect(oppositeDirection('right')).toBe('left')
    for (const direction of DIRECTIONS) {
      expect(isOppositeDirection(direction, oppositeDirection(direction))).toBe(true)
      expect(isOppositeDirection(direction, direction)).toBe(false)
    }
  })

  it('steps one cell along the screen axes', () => {
    const origin = { x: 3, y: 3 }
    expect(stepPosition(origin, 'up')).toEqual({ x: 3, y: 2 })
    expect(stepPosition(origin, 'down')).toEqual({ x: 3, y: 4 })
    expect(stepPosition(origin, 'left')).toEqual({ x: 2, y: 3 })
    expect(stepPosition(origin, 'right')).toEqual({ x: 4, y: 3 })
    expect(origin).toEqual({ x: 3, y: 3 })
  })

  it('recognises only the four direction names', () => {
    expect(isDirection('left')).toBe(true)
    expect(isDirection('LEFT')).toBe(false)
    expect(isDirection('toString')).toBe(false)
    expect(isDirection(undefined)).toBe(false)
  })
})
