export type Logger = {
  info: (message: string, details?: unknown) => void
  warn: (message: string, details?: unknown) => void
}

type LoggingSwitch = boolean | (() => boolean)

const isEnabled = (enabled: LoggingSwitch) => (typeof enabled === 'function' ? enabled() : enabled)

export function createLogger(scope: string, enabled: LoggingSwitch): Logger {
  const prefix = `[${scope}]`
  return {
    info(message, details) {
      if (!isEnabled(enabled)) return
      if (details === undefined) {
        console.info(`${prefix} ${message}`)
      } else {
        console.info(`${prefix} ${message}`, details)
      }
    },
    warn(message, details) {
      if (details === undefined) {
        console.warn(`${prefix} ${message}`)
      } else {
        console.warn(`${prefix} ${message}`, details)
      }
    },
  }
}

export const silentLogger: Logger = {
  info() {},
  warn() {},
}
