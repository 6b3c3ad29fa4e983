import { describe, expect, it } from 'vitest'
import type { GameSnapshot } from './types'
import { DEFAULT_GAME_CONFIG } from './constants'
import {
  cellRect,
  computeBoardLayout,
  drawFrame,
  formatHighScoreLine,
  formatScoreLine,
  FRAME_COLORS,
  type FrameContext,
} from './hud'

const grid = DEFAULT_GAME_CONFIG.grid

type DrawCall =
  | { op: 'fillRect'; rect: [number, number, number, number]; fillStyle: FrameContext['fillStyle'] }
  | { op: 'fillText'; text: string; x: number; y: number; textAlign: CanvasTextAlign }

function recordingContext() {
  const calls: DrawCall[] = []
  const ctx: FrameContext = {
    fillStyle: '#000000',
    font: '',
    textAlign: 'start',
    textBaseline: 'alphabetic',
    fillRect(x, y, w, h) {
      calls.push({ op: 'fillRect', rect: [x, y, w, h], fillStyle: ctx.fillStyle })
    },
    fillText(text, x, y) {
      calls.push({ op: 'fillText', text, x, y, textAlign: ctx.textAlign })
    },
    beginPath() {},
    arc() {},
    fill() {},
    save() {},
    restore() {},
  }
  return { ctx, calls }
}

const playingSnapshot = (overrides: Partial<GameSnapshot> = {}): GameSnapshot => ({
  phase: 'playing',
  snake: {
    body: [
      { x: 20, y: 11 },
      { x: 19, y: 11 },
      { x: 18, y: 11 },
    ],
    direction: 'right',
  },
  food: { position: { x: 21, y: 11 }, kind: 'normal', value: 10, ticksRemaining: 0 },
  score: 30,
  highScore: 0,
  tickRate: 5,
  ...overrides,
})

describe('computeBoardLayout', () => {
  it('centres the board below the score bar at full cell size', () => {
    expect(computeBoardLayout(grid, 1024, 768)).toEqual({
      width: 1024,
      height: 768,
      cellSize: 32,
      offsetX: 0,
      offsetY: 132,
      minX: 4,
      minY: 3,
      columns: 32,
      rows: 17,
    })
  })

  it('shrinks cells to fit a small canvas', () => {
    const layout = computeBoardLayout(grid, 320, 240)
    expect(layout.cellSize).toBe(10)
    expect(layout.offsetX).toBe(0)
    expect(layout.offsetY).toBe(55)
  })

  it('maps grid cells to canvas pixels', () => {
    const layout = computeBoardLayout(grid, 1024, 768)
    expect(cellRect(layout, { x: 4, y: 3 })).toEqual({ x: 0, y: 132, size: 32 })
    expect(cellRect(layout, { x: 5, y: 4 })).toEqual({ x: 32, y: 164, size: 32 })
  })
})

describe('score lines', () => {
  it('shows the high score only once there is one', () => {
    expect(formatScoreLine(playingSnapshot())).toBe('Score: 30')
    expect(formatHighScoreLine(playingSnapshot())).toBeNull()
    expect(formatHighScoreLine(playingSnapshot({ highScore: 120 }))).toBe('High: 120')
  })
})

describe('drawFrame', () => {
  const layout = computeBoardLayout(grid, 1024, 768)

  it('draws only the board in the menu', () => {
    const { ctx, calls } = recordingContext()
    drawFrame(ctx, playingSnapshot({ phase: 'menu', food: null }), layout, grid)
    expect(calls).toEqual([
      { op: 'fillRect', rect: [0, 0, 1024, 768], fillStyle: FRAME_COLORS.background },
      { op: 'fillRect', rect: [0, 132, 1024, 544], fillStyle: FRAME_COLORS.wall },
      { op: 'fillRect', rect: [32, 164, 960, 480], fillStyle: FRAME_COLORS.playfield },
    ])
  })

  it('draws food, the snake tail first and the score', () => {
    const { ctx, calls } = recordingContext()
    drawFrame(ctx, playingSnapshot(), layout, grid)
    expect(calls.slice(3)).toEqual([
      { op: 'fillRect', rect: [544, 388, 32, 32], fillStyle: FRAME_COLORS.normalFood },
      { op: 'fillRect', rect: [448, 388, 32, 32], fillStyle: FRAME_COLORS.tail },
      { op: 'fillRect', rect: [480, 388, 32, 32], fillStyle: FRAME_COLORS.body },
      { op: 'fillRect', rect: [512, 388, 32, 32], fillStyle: FRAME_COLORS.head },
      { op: 'fillText', text: 'Score: 30', x: 0, y: 20, textAlign: 'left' },
    ])
  })

  it('colours bonus food and right-aligns the high score', () => {
    const { ctx, calls } = recordingContext()
    drawFrame(
      ctx,
      playingSnapshot({
        phase: 'gameOver',
        food: { position: { x: 6, y: 5 }, kind: 'bonus', value: 20, ticksRemaining: 12 },
        highScore: 50,
      }),
      layout,
      grid,
    )
    expect(calls[3]).toEqual({ op: 'fillRect', rect: [64, 196, 32, 32], fillStyle: FRAME_COLORS.bonusFood })
    expect(calls.at(-1)).toEqual({ op: 'fillText', text: 'High: 50', x: 1024, y: 20, textAlign: 'right' })
  })

  it('skips food that has expired', () => {
    const { ctx, calls } = recordingContext()
    drawFrame(
      ctx,
      playingSnapshot({ food: { position: null, kind: 'bonus', value: 20, ticksRemaining: 0 } }),
      layout,
      grid,
    )
    expect(calls.filter((call) => call.op === 'fillRect')).toHaveLength(6)
  })
})
