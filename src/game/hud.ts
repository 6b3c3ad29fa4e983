import type { FoodSnapshot, GameSnapshot, GridConfig, Position } from './types'
import { boardBounds } from './grid'

export const HUD_HEIGHT = 40

export type FrameContext = Pick<
  CanvasRenderingContext2D,
  | 'fillStyle'
  | 'font'
  | 'textAlign'
  | 'textBaseline'
  | 'fillRect'
  | 'fillText'
  | 'beginPath'
  | 'arc'
  | 'fill'
  | 'save'
  | 'restore'
>

export type BoardLayout = {
  width: number
  height: number
  cellSize: number
  offsetX: number
  offsetY: number
  minX: number
  minY: number
  columns: number
  rows: number
}

export type CellRect = {
  x: number
  y: number
  size: number
}

export const FRAME_COLORS = {
  background: '#0b0f0b',
  playfield: '#141b14',
  wall: '#4a4f5a',
  head: 'rgb(0, 255, 0)',
  body: 'rgb(0, 150, 0)',
  tail: 'rgb(0, 200, 0)',
  normalFood: 'rgb(255, 0, 0)',
  normalFoodCore: 'rgb(255, 255, 255)',
  bonusFood: 'rgb(139, 69, 19)',
  bonusFoodCore: 'rgb(160, 82, 45)',
  text: '#f1f5f9',
} as const

/** Fits the board (playable area and wall ring) into a canvas below the score bar. */
export function computeBoardLayout(
  grid: GridConfig,
  width: number,
  height: number,
  hudHeight = HUD_HEIGHT,
): BoardLayout {
  const { minX, minY, size } = boardBounds(grid)
  const availableHeight = Math.max(0, height - hudHeight)
  const fit = Math.floor(Math.min(width / size.columns, availableHeight / size.rows))
  const cellSize = Math.max(1, Math.min(grid.cellSize, fit))
  return {
    width,
    height,
    cellSize,
    offsetX: Math.floor((width - cellSize * size.columns) / 2),
    offsetY: hudHeight + Math.floor((availableHeight - cellSize * size.rows) / 2),
    minX,
    minY,
    columns: size.columns,
    rows: size.rows,
  }
}

export function cellRect(layout: BoardLayout, position: Position): CellRect {
  return {
    x: layout.offsetX + (position.x - layout.minX) * layout.cellSize,
    y: layout.offsetY + (position.y - layout.minY) * layout.cellSize,
    size: layout.cellSize,
  }
}

function drawBoard(ctx: FrameContext, layout: BoardLayout, grid: GridConfig) {
  const boardWidth = layout.columns * layout.cellSize
  const boardHeight = layout.rows * layout.cellSize
  ctx.fillStyle = FRAME_COLORS.wall
  ctx.fillRect(layout.offsetX, layout.offsetY, boardWidth, boardHeight)

  const inner = cellRect(layout, { x: grid.originX, y: grid.originY })
  ctx.fillStyle = FRAME_COLORS.playfield
  ctx.fillRect(inner.x, inner.y, grid.width * layout.cellSize, grid.height * layout.cellSize)
}

function drawFood(ctx: FrameContext, layout: BoardLayout, food: FoodSnapshot) {
  if (!food.position) return
  const rect = cellRect(layout, food.position)
  const bonus = food.kind === 'bonus'
  ctx.fillStyle = bonus ? FRAME_COLORS.bonusFood : FRAME_COLORS.normalFood
  ctx.fillRect(rect.x, rect.y, rect.size, rect.size)

  ctx.fillStyle = bonus ? FRAME_COLORS.bonusFoodCore : FRAME_COLORS.normalFoodCore
  ctx.beginPath()
  ctx.arc(rect.x + rect.size / 2, rect.y + rect.size / 2, Math.max(1, rect.size / 4), 0, Math.PI * 2)
  ctx.fill()
}

function segmentColor(index: number, length: number) {
  if (index === 0) return FRAME_COLORS.head
  if (index === length - 1) return FRAME_COLORS.tail
  return FRAME_COLORS.body
}

function drawSnake(ctx: FrameContext, layout: BoardLayout, body: readonly Position[]) {
  // Tail first so the head ends up on top.
  for (let i = body.length - 1; i >= 0; i -= 1) {
    const rect = cellRect(layout, body[i])
    ctx.fillStyle = segmentColor(i, body.length)
    ctx.fillRect(rect.x, rect.y, rect.size, rect.size)
  }
}

export function formatScoreLine(snapshot: GameSnapshot) {
  return `Score: ${snapshot.score}`
}

export function formatHighScoreLine(snapshot: GameSnapshot) {
  return snapshot.highScore > 0 ? `High: ${snapshot.highScore}` : null
}

function drawScoreBar(ctx: FrameContext, layout: BoardLayout, snapshot: GameSnapshot) {
  const baseline = Math.max(12, Math.round(HUD_HEIGHT / 2))
  ctx.fillStyle = FRAME_COLORS.text
  ctx.font = '600 18px "Press Start 2P", ui-monospace, monospace'
  ctx.textBaseline = 'middle'

  ctx.textAlign = 'left'
  ctx.fillText(formatScoreLine(snapshot), layout.offsetX, baseline)

  const high = formatHighScoreLine(snapshot)
  if (high) {
    ctx.textAlign = 'right'
    ctx.fillText(high, layout.offsetX + layout.columns * layout.cellSize, baseline)
  }
}

export function drawFrame(
  ctx: FrameContext,
  snapshot: GameSnapshot,
  layout: BoardLayout,
  grid: GridConfig,
) {
  ctx.save()
  ctx.fillStyle = FRAME_COLORS.background
  ctx.fillRect(0, 0, layout.width, layout.height)
  drawBoard(ctx, layout, grid)

  if (snapshot.phase !== 'menu') {
    if (snapshot.food) drawFood(ctx, layout, snapshot.food)
    drawSnake(ctx, layout, snapshot.snake.body)
    drawScoreBar(ctx, layout, snapshot)
  }
  ctx.restore()
}
