import type { TickStatus } from './types'
import { tickIntervalMs } from './speed'

export type TickSource = {
  tick: () => TickStatus
  getTickRate: () => number
}

export type LoopTimers<H> = {
  setTimeout: (callback: () => void, delayMs: number) => H
  clearTimeout: (handle: H) => void
}

export type TickLoop = {
  start: () => void
  stop: () => void
  isRunning: () => boolean
}

const globalTimers: LoopTimers<ReturnType<typeof setTimeout>> = {
  setTimeout: (callback, delayMs) => setTimeout(callback, delayMs),
  clearTimeout: (handle) => clearTimeout(handle),
}

/**
 * Drives `tick()` at the source's current rate. The delay is read again after
 * every step, so a speed change applies from the next step on. Ticks keep
 * being scheduled while the session is idle (menu, paused, game over) so a
 * resume needs no restart of the loop.
 */
export function createTickLoop(source: TickSource): TickLoop {
  return createTickLoopWithTimers(source, globalTimers)
}

export function createTickLoopWithTimers<H>(source: TickSource, timers: LoopTimers<H>): TickLoop {
  let handle: H | undefined
  let running = false

  const schedule = () => {
    handle = timers.setTimeout(step, tickIntervalMs(source.getTickRate()))
  }

  const step = () => {
    if (!running) return
    try {
      source.tick()
    } finally {
      // A throwing tick must not leave the loop marked running with nothing scheduled.
      if (running) schedule()
    }
  }

  return {
    start() {
      if (running) return
      running = true
      schedule()
    },
    stop() {
      if (!running) return
      running = false
      if (handle !== undefined) timers.clearTimeout(handle)
      handle = undefined
    },
    isRunning() {
      return running
    },
  }
}
