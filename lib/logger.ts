export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface Logger {
  debug: (message: string, ...details: unknown[]) => void
  info: (message: string, ...details: unknown[]) => void
  warn: (message: string, ...details: unknown[]) => void
  error: (message: string, ...details: unknown[]) => void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
}

let defaultLevel: LogLevel = 'info'

export const setDefaultLogLevel = (level: LogLevel): void => {
  defaultLevel = level
}

/**
 * Console logger that prefixes every line with `[scope]`.
 * Calls below `level` (or the process default when omitted) are dropped.
 */
export const createLogger = (scope: string, level?: LogLevel): Logger => {
  const enabled = (candidate: LogLevel): boolean =>
    LEVEL_ORDER[candidate] >= LEVEL_ORDER[level ?? defaultLevel]
  const prefix = `[${scope}]`

  return {
    debug: (message, ...details) => {
      if (enabled('debug')) console.debug(`${prefix} ${message}`, ...details)
    },
    info: (message, ...details) => {
      if (enabled('info')) console.log(`${prefix} ${message}`, ...details)
    },
    warn: (message, ...details) => {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...details)
    },
    error: (message, ...details) => {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...details)
    }
  }
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
}
