import type { SpeedProgression } from './types'

export function tickRateForScore(score: number, progression: SpeedProgression) {
  const steps = Math.floor(Math.max(0, score) / progression.scoreInterval)
  const rate = progression.initialTickRate + steps * progression.increment
  return Math.min(rate, progression.maxTickRate)
}

export function tickIntervalMs(tickRate: number) {
  return 1000 / tickRate
}
