import { describe, it, expect } from 'vitest'
import type { StreamReference } from '@components/types'
import { buildEmbedUrl, playerFor, twitchQuality } from './players'

const reference = (overrides: Partial<StreamReference>): StreamReference => ({
  id: 'test',
  platform: 'other',
  title: 'Test',
  url: 'https://example.com/live',
  isLive: true,
  ...overrides
})

describe('buildEmbedUrl', () => {
  it('builds twitch urls with the parent host and optional quality', () => {
    const twitch = reference({ platform: 'twitch', channel: 'shroud' })

    expect(buildEmbedUrl(twitch, { muted: true, parentHost: 'localhost' })).toBe(
      'https://player.twitch.tv/?channel=shroud&parent=localhost&autoplay=true&muted=true'
    )
    expect(buildEmbedUrl(twitch, { muted: false, parentHost: 'app.test', quality: '1080p' })).toBe(
      'https://player.twitch.tv/?channel=shroud&parent=app.test&autoplay=true&muted=false&quality=1080p60'
    )
  })

  it('builds youtube video and channel urls', () => {
    const video = reference({ platform: 'youtube', videoId: 'dQw4w9WgXcQ' })
    expect(
      buildEmbedUrl(video, { muted: false, parentHost: 'localhost', origin: 'https://app.test' })
    ).toBe(
      'https://www.youtube.com/embed/dQw4w9WgXcQ?autoplay=1&mute=0&controls=1&modestbranding=1&rel=0&playsinline=1&enablejsapi=1&origin=https%3A%2F%2Fapp.test'
    )

    const channel = reference({ platform: 'youtube', channel: 'UCabcdefghijklmnopqrstuv' })
    expect(
      buildEmbedUrl(channel, { muted: true, parentHost: 'localhost', showControls: false })
    ).toBe(
      'https://www.youtube.com/embed/live_stream?channel=UCabcdefghijklmnopqrstuv&autoplay=1&mute=1&controls=0&modestbranding=1&rel=0&playsinline=1&enablejsapi=1'
    )
  })

  it('builds kick and rumble urls with the mute flag in the url', () => {
    expect(
      buildEmbedUrl(reference({ platform: 'kick', channel: 'somestreamer' }), {
        muted: false,
        parentHost: 'localhost'
      })
    ).toBe('https://player.kick.com/somestreamer?autoplay=true&muted=false')
    expect(
      buildEmbedUrl(reference({ platform: 'rumble', videoId: 'v4abcd' }), {
        muted: true,
        parentHost: 'localhost',
        autoplay: false
      })
    ).toBe('https://rumble.com/embed/v4abcd/?autoplay=0&muted=1')
  })

  it('passes other urls through and returns null without an identifier', () => {
    expect(buildEmbedUrl(reference({}), { muted: true, parentHost: 'localhost' })).toBe(
      'https://example.com/live'
    )
    expect(
      buildEmbedUrl(reference({ platform: 'twitch' }), { muted: true, parentHost: 'localhost' })
    ).toBeNull()
    expect(
      buildEmbedUrl(reference({ platform: 'youtube' }), { muted: true, parentHost: 'localhost' })
    ).toBeNull()
  })
})

describe('playerFor', () => {
  it('selects the mute strategy per platform', () => {
    expect(playerFor('youtube').muteStrategy).toBe('message')
    expect(playerFor('twitch').muteStrategy).toBe('sdk')
    expect(playerFor('kick').muteStrategy).toBe('reload')
    expect(playerFor('rumble').muteStrategy).toBe('reload')
    expect(playerFor('other').muteStrategy).toBe('reload')
  })

  it('produces postMessage commands only for youtube', () => {
    expect(playerFor('youtube').muteCommand(true)).toBe(
      '{"event":"command","func":"mute","args":[]}'
    )
    expect(playerFor('youtube').muteCommand(false)).toBe(
      '{"event":"command","func":"unMute","args":[]}'
    )
    expect(playerFor('twitch').muteCommand(true)).toBeNull()
  })

  it('scales youtube volume commands to whole percentages', () => {
    expect(playerFor('youtube').volumeCommand(0.456)).toBe(
      '{"event":"command","func":"setVolume","args":[46]}'
    )
    expect(playerFor('youtube').volumeCommand(3)).toBe(
      '{"event":"command","func":"setVolume","args":[100]}'
    )
    expect(playerFor('kick').volumeCommand(0.5)).toBeNull()
  })
})

describe('twitchQuality', () => {
  it('maps qualities to twitch values', () => {
    expect(twitchQuality('auto')).toBeNull()
    expect(twitchQuality(undefined)).toBeNull()
    expect(twitchQuality('audio_only')).toBe('audio_only')
    expect(twitchQuality('source')).toBe('chunked')
    expect(twitchQuality('1080p')).toBe('1080p60')
  })
})
