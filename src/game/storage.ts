import { localStore, type SafeStorage } from '@shared/storage/localStorage'

const LOCAL_STORAGE_BEST = 'pixel_snake_best_score'
const MAX_STORED_SCORE = Number.MAX_SAFE_INTEGER

export type HighScoreStore = {
  load: () => number
  save: (score: number) => void
}

function sanitizeScore(value: number) {
  if (!Number.isFinite(value) || value < 0) return 0
  return Math.floor(value)
}

export function createLocalHighScoreStore(storage: SafeStorage = localStore): HighScoreStore {
  return {
    load() {
      return sanitizeScore(storage.readNumber(LOCAL_STORAGE_BEST, 0, { min: 0, max: MAX_STORED_SCORE }))
    },
    save(score) {
      storage.write(LOCAL_STORAGE_BEST, String(sanitizeScore(score)))
    },
  }
}

export function createMemoryHighScoreStore(initial = 0): HighScoreStore & { saved: number[] } {
  let value = sanitizeScore(initial)
  const saved: number[] = []
  return {
    saved,
    load() {
      return value
    },
    save(score) {
      value = sanitizeScore(score)
      saved.push(value)
    },
  }
}
