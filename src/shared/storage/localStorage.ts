export type StorageLike = Pick<Storage, 'getItem' | 'setItem'>

export type SafeStorage = {
  read: (key: string) => string | null
  write: (key: string, value: string) => boolean
  readJson: (key: string) => unknown
  readNumber: (key: string, fallback: number, options?: { min?: number; max?: number }) => number
}

const windowStorage = (): StorageLike | null => {
  if (typeof window === 'undefined') return null
  try {
    return window.localStorage
  } catch {
    // Accessing localStorage throws when storage is disabled for the origin.
    return null
  }
}

/** Wraps a Storage so every access degrades to a fallback instead of throwing. */
export function createSafeStorage(getStorage: () => StorageLike | null = windowStorage): SafeStorage {
  const read = (key: string): string | null => {
    const storage = getStorage()
    if (!storage) return null
    try {
      return storage.getItem(key)
    } catch {
      return null
    }
  }

  const write = (key: string, value: string): boolean => {
    const storage = getStorage()
    if (!storage) return false
    try {
      storage.setItem(key, value)
      return true
    } catch {
      return false
    }
  }

  const readJson = (key: string): unknown => {
    const value = read(key)
    if (!value) return null
    try {
      return JSON.parse(value)
    } catch {
      return null
    }
  }

  const readNumber = (
    key: string,
    fallback: number,
    options?: { min?: number; max?: number },
  ): number => {
    const value = read(key)
    if (value === null || !value.trim()) return fallback
    const parsed = Number(value)
    if (!Number.isFinite(parsed)) return fallback
    let next = parsed
    if (typeof options?.min === 'number') next = Math.max(options.min, next)
    if (typeof options?.max === 'number') next = Math.min(options.max, next)
    return next
  }

  return { read, write, readJson, readNumber }
}

export const localStore = createSafeStorage()
