import { describe, it, expect } from 'vitest'
import type { StreamReference } from '@components/types'
import { silentLogger } from '@lib/logger'
import { createMemoryStorage, createPreferences, type KeyValueStorage } from '@lib/settings/preferences'
import { FAVORITES_KEY, HISTORY_KEY, createStreamLibrary } from './stream-library'

const stream = (channel: string): StreamReference => ({
  id: `twitch:${channel}`,
  platform: 'twitch',
  title: channel,
  url: `https://www.twitch.tv/${channel}`,
  channel,
  isLive: true
})

const setup = (storage: KeyValueStorage = createMemoryStorage(), historyLimit?: number) => {
  let clock = 1000
  return createStreamLibrary({
    preferences: createPreferences(storage, silentLogger),
    historyLimit,
    now: () => (clock += 1),
    logger: silentLogger
  })
}

describe('createStreamLibrary', () => {
  it('toggles favorites and persists them', () => {
    const storage = createMemoryStorage()
    const library = setup(storage)

    expect(library.getState().toggleFavorite(stream('shroud'))).toBe(true)
    expect(library.getState().isFavorite('twitch:shroud')).toBe(true)
    expect(JSON.parse(storage.getItem(`streamyyy_${FAVORITES_KEY}`) ?? 'null')).toEqual([
      {
        streamId: 'twitch:shroud',
        platform: 'twitch',
        title: 'shroud',
        url: 'https://www.twitch.tv/shroud',
        savedAt: 1001
      }
    ])

    expect(library.getState().toggleFavorite(stream('shroud'))).toBe(false)
    expect(library.getState().favorites).toEqual([])
  })

  it('keeps recently watched streams newest first without duplicates', () => {
    const library = setup(createMemoryStorage(), 2)

    library.getState().recordWatched(stream('alpha_one'))
    library.getState().recordWatched(stream('bravo_two'))
    library.getState().recordWatched(stream('alpha_one'))
    expect(library.getState().recent.map((entry) => entry.streamId)).toEqual([
      'twitch:alpha_one',
      'twitch:bravo_two'
    ])

    library.getState().recordWatched(stream('charlie_three'))
    expect(library.getState().recent.map((entry) => entry.streamId)).toEqual([
      'twitch:charlie_three',
      'twitch:alpha_one'
    ])
  })

  it('loads stored lists and drops invalid ones', () => {
    const storage = createMemoryStorage()
    const first = setup(storage)
    first.getState().toggleFavorite(stream('shroud'))
    first.getState().recordWatched(stream('shroud'))

    const second = setup(storage)
    expect(second.getState().favorites.map((entry) => entry.streamId)).toEqual(['twitch:shroud'])
    expect(second.getState().recent.map((entry) => entry.streamId)).toEqual(['twitch:shroud'])

    second.getState().clearRecent()
    expect(storage.getItem(`streamyyy_${HISTORY_KEY}`)).toBeNull()

    const broken = createMemoryStorage({ [`streamyyy_${FAVORITES_KEY}`]: '[{"streamId":3}]' })
    expect(setup(broken).getState().favorites).toEqual([])
  })
})
