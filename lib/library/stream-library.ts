import { z } from 'zod'
import { createStore } from 'zustand/vanilla'
import type { StoreApi } from 'zustand/vanilla'
import type { StreamReference } from '@components/types'
import { createLogger, type Logger } from '@lib/logger'
import type { Preferences } from '@lib/settings/preferences'

export const FAVORITES_KEY = 'favorites_v1'
export const HISTORY_KEY = 'history_v1'
export const DEFAULT_HISTORY_LIMIT = 20

const entrySchema = z.object({
  streamId: z.string().min(1),
  platform: z.enum(['twitch', 'youtube', 'kick', 'rumble', 'other']),
  title: z.string(),
  url: z.string().min(1),
  savedAt: z.number()
})

const entryListSchema = z.array(entrySchema)

export type LibraryEntry = z.infer<typeof entrySchema>

export interface LibraryState {
  favorites: LibraryEntry[]
  recent: LibraryEntry[]

  isFavorite: (streamId: string) => boolean
  toggleFavorite: (stream: StreamReference) => boolean
  removeFavorite: (streamId: string) => void
  recordWatched: (stream: StreamReference) => void
  clearRecent: () => void
}

export type LibraryStore = StoreApi<LibraryState>

export interface LibraryOptions {
  preferences?: Preferences
  historyLimit?: number
  now?: () => number
  logger?: Logger
}

const toEntry = (stream: StreamReference, savedAt: number): LibraryEntry => ({
  streamId: stream.id,
  platform: stream.platform,
  title: stream.title,
  url: stream.url,
  savedAt
})

/**
 * Favorite streams and the most recently watched ones, newest first.
 * Both lists persist through preferences and hold one entry per stream.
 */
export const createStreamLibrary = ({
  preferences,
  historyLimit = DEFAULT_HISTORY_LIMIT,
  now = Date.now,
  logger = createLogger('library')
}: LibraryOptions = {}): LibraryStore =>
  createStore<LibraryState>()((set, get) => {
    const persist = (key: string, entries: LibraryEntry[]): void => {
      preferences?.writeJson(key, entries)
    }

    const without = (entries: LibraryEntry[], streamId: string): LibraryEntry[] =>
      entries.filter((entry) => entry.streamId !== streamId)

    return {
      favorites: preferences?.readJson(FAVORITES_KEY, entryListSchema) ?? [],
      recent: (preferences?.readJson(HISTORY_KEY, entryListSchema) ?? []).slice(0, historyLimit),

      isFavorite: (streamId) => get().favorites.some((entry) => entry.streamId === streamId),

      toggleFavorite: (stream) => {
        const { favorites } = get()
        const saved = !get().isFavorite(stream.id)
        const next = saved ? [toEntry(stream, now()), ...favorites] : without(favorites, stream.id)
        set({ favorites: next })
        persist(FAVORITES_KEY, next)
        logger.info(`${saved ? 'saved' : 'removed'} favorite ${stream.id}`)
        return saved
      },

      removeFavorite: (streamId) => {
        const next = without(get().favorites, streamId)
        set({ favorites: next })
        persist(FAVORITES_KEY, next)
      },

      recordWatched: (stream) => {
        const next = [toEntry(stream, now()), ...without(get().recent, stream.id)].slice(
          0,
          Math.max(0, historyLimit)
        )
        set({ recent: next })
        persist(HISTORY_KEY, next)
      },

      clearRecent: () => {
        set({ recent: [] })
        preferences?.remove(HISTORY_KEY)
      }
    }
  })
