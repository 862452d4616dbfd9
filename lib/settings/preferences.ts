import { z } from 'zod'
import { supportedLocales } from '@data/i18n/config'
import { createLogger, type Logger } from '@lib/logger'

export interface KeyValueStorage {
  getItem: (key: string) => string | null
  setItem: (key: string, value: string) => void
  removeItem: (key: string) => void
}

export const STORAGE_PREFIX = 'streamyyy_'

export const browserStorage = (logger: Logger = createLogger('preferences')): KeyValueStorage | null => {
  if (typeof window === 'undefined') return null
  try {
    return window.localStorage
  } catch (error) {
    logger.warn('localStorage is not available', error)
    return null
  }
}

export const createMemoryStorage = (initial: Record<string, string> = {}): KeyValueStorage => {
  const values = new Map(Object.entries(initial))
  return {
    getItem: (key) => values.get(key) ?? null,
    setItem: (key, value) => {
      values.set(key, value)
    },
    removeItem: (key) => {
      values.delete(key)
    }
  }
}

const preferencesSchema = z.object({
  audioMode: z.enum(['focusedOnly', 'all', 'manual']).catch('focusedOnly'),
  defaultLayout: z.string().min(1).catch('grid-2'),
  autoplay: z.boolean().catch(true),
  streamQuality: z
    .enum(['auto', 'source', '1080p', '720p', '480p', '360p', '160p', 'audio_only'])
    .catch('auto'),
  showSecondaryStreams: z.boolean().catch(true),
  hasCompletedOnboarding: z.boolean().catch(false),
  // null until the user picks one; the UI detects a locale from the browser meanwhile
  locale: z.enum(supportedLocales).nullable().catch(null)
})

export type PreferenceValues = z.infer<typeof preferencesSchema>
export type PreferenceKey = keyof PreferenceValues

export const PREFERENCE_KEYS = Object.keys(preferencesSchema.shape).filter(
  (key): key is PreferenceKey => key in preferencesSchema.shape
)

export const PREFERENCE_DEFAULTS: PreferenceValues = preferencesSchema.parse({})

export interface Preferences {
  get: <K extends PreferenceKey>(key: K) => PreferenceValues[K]
  set: <K extends PreferenceKey>(key: K, value: PreferenceValues[K]) => void
  reset: (key: PreferenceKey) => void
  all: () => PreferenceValues
  readJson: <S extends z.ZodTypeAny>(key: string, schema: S) => z.infer<S> | null
  writeJson: (key: string, value: unknown) => void
  remove: (key: string) => void
}

const preferenceStorageKey = (key: PreferenceKey): string => `${STORAGE_PREFIX}${key}_v1`
const rawStorageKey = (key: string): string => `${STORAGE_PREFIX}${key}`

/**
 * Typed preferences over a string key/value store.
 *
 * Values are JSON encoded, one key each. Unreadable or invalid values read back as their
 * defaults; storage failures are logged and otherwise ignored so settings never break the app.
 */
export const createPreferences = (
  storage: KeyValueStorage | null,
  logger: Logger = createLogger('preferences')
): Preferences => {
  const readRaw = (storageKey: string): unknown => {
    if (!storage) return undefined
    try {
      const raw = storage.getItem(storageKey)
      return raw === null ? undefined : JSON.parse(raw)
    } catch (error) {
      logger.warn(`could not read ${storageKey}`, error)
      return undefined
    }
  }

  const writeRaw = (storageKey: string, value: unknown): void => {
    if (!storage) return
    try {
      storage.setItem(storageKey, JSON.stringify(value))
    } catch (error) {
      logger.warn(`could not write ${storageKey}`, error)
    }
  }

  const removeRaw = (storageKey: string): void => {
    if (!storage) return
    try {
      storage.removeItem(storageKey)
    } catch (error) {
      logger.warn(`could not remove ${storageKey}`, error)
    }
  }

  const all = (): PreferenceValues =>
    preferencesSchema.parse(
      Object.fromEntries(PREFERENCE_KEYS.map((key) => [key, readRaw(preferenceStorageKey(key))]))
    )

  return {
    get: (key) => all()[key],
    set: (key, value) => writeRaw(preferenceStorageKey(key), value),
    reset: (key) => removeRaw(preferenceStorageKey(key)),
    all,
    readJson: (key, schema) => {
      const raw = readRaw(rawStorageKey(key))
      if (raw === undefined) return null
      const result = schema.safeParse(raw)
      if (!result.success) {
        logger.warn(`ignoring invalid value stored under ${key}`)
        return null
      }
      return result.data
    },
    writeJson: (key, value) => writeRaw(rawStorageKey(key), value),
    remove: (key) => removeRaw(rawStorageKey(key))
  }
}
