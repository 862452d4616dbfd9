import type { LogLevel } from '@lib/logger'

export interface AppConfig {
  backendUrl: string
  embedParentHost: string | null
  maxSlotRetries: number
  slotLoadTimeoutMs: number
  logLevel: LogLevel
  isDevelopment: boolean
}

export type AppEnv = Partial<Record<string, string | undefined>>

const DEFAULT_BACKEND_URL = 'http://localhost:4000'
const DEFAULT_MAX_SLOT_RETRIES = 3
const DEFAULT_SLOT_LOAD_TIMEOUT_MS = 15_000
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

const readNumber = (raw: string | undefined, fallback: number, min: number): number => {
  const value = Number(raw?.trim())
  if (!raw?.trim() || !Number.isFinite(value) || value < min) return fallback
  return Math.floor(value)
}

const readLogLevel = (raw: string | undefined, fallback: LogLevel): LogLevel => {
  const value = raw?.trim().toLowerCase()
  return LOG_LEVELS.find((level) => level === value) ?? fallback
}

export const createAppConfig = (env: AppEnv): AppConfig => {
  const isDevelopment = env.NODE_ENV === 'development'
  return {
    backendUrl: (env.NEXT_PUBLIC_BACKEND_URL?.trim() || DEFAULT_BACKEND_URL).replace(/\/+$/, ''),
    embedParentHost: env.NEXT_PUBLIC_EMBED_PARENT_HOST?.trim() || null,
    maxSlotRetries: readNumber(env.NEXT_PUBLIC_MAX_SLOT_RETRIES, DEFAULT_MAX_SLOT_RETRIES, 0),
    slotLoadTimeoutMs: readNumber(
      env.NEXT_PUBLIC_SLOT_LOAD_TIMEOUT_MS,
      DEFAULT_SLOT_LOAD_TIMEOUT_MS,
      1000
    ),
    logLevel: readLogLevel(env.NEXT_PUBLIC_LOG_LEVEL, isDevelopment ? 'debug' : 'info'),
    isDevelopment
  }
}

// Next.js only inlines NEXT_PUBLIC_* variables that are read by their literal name.
export const appConfig: AppConfig = createAppConfig({
  NODE_ENV: process.env.NODE_ENV,
  NEXT_PUBLIC_BACKEND_URL: process.env.NEXT_PUBLIC_BACKEND_URL,
  NEXT_PUBLIC_EMBED_PARENT_HOST: process.env.NEXT_PUBLIC_EMBED_PARENT_HOST,
  NEXT_PUBLIC_MAX_SLOT_RETRIES: process.env.NEXT_PUBLIC_MAX_SLOT_RETRIES,
  NEXT_PUBLIC_SLOT_LOAD_TIMEOUT_MS: process.env.NEXT_PUBLIC_SLOT_LOAD_TIMEOUT_MS,
  NEXT_PUBLIC_LOG_LEVEL: process.env.NEXT_PUBLIC_LOG_LEVEL
})

export const resolveEmbedParentHost = (config: AppConfig): string => {
  if (config.embedParentHost) return config.embedParentHost
  if (typeof window !== 'undefined' && window.location.hostname) return window.location.hostname
  return 'localhost'
}
