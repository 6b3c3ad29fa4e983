import { useEffect, useState } from 'react'
import type { RefObject } from 'react'
import type { GameSnapshot, GridConfig } from '@game/types'
import { computeBoardLayout, drawFrame } from '@game/hud'

type CanvasSize = {
  width: number
  height: number
}

const readViewport = (): CanvasSize => ({
  width: window.innerWidth,
  height: window.innerHeight,
})

export function useCanvasRenderer(
  canvasRef: RefObject<HTMLCanvasElement>,
  snapshot: GameSnapshot,
  grid: GridConfig,
): void {
  const [size, setSize] = useState<CanvasSize>(readViewport)

  useEffect(() => {
    const onResize = () => setSize(readViewport())
    window.addEventListener('resize', onResize)
    return () => {
      window.removeEventListener('resize', onResize)
    }
  }, [])

  useEffect(() => {
    const canvas = canvasRef.current
    if (!canvas) return
    if (canvas.width !== size.width) canvas.width = size.width
    if (canvas.height !== size.height) canvas.height = size.height
    const ctx = canvas.getContext('2d')
    if (!ctx) return
    ctx.imageSmoothingEnabled = false
    drawFrame(ctx, snapshot, computeBoardLayout(grid, size.width, size.height), grid)
  }, [canvasRef, snapshot, grid, size])
}
