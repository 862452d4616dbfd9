import { describe, it, expect } from 'vitest'
import { ValidationError } from '@lib/errors'
import {
  fallbackTitleFromUrl,
  parseStreamUrl,
  platformLabel,
  requireStreamUrl,
  toStreamReference
} from './platform'

describe('parseStreamUrl', () => {
  it('parses twitch channel urls', () => {
    expect(parseStreamUrl('https://twitch.tv/shroud')).toEqual({
      platform: 'twitch',
      channel: 'shroud',
      normalizedUrl: 'https://www.twitch.tv/shroud'
    })
  })

  it('lower-cases twitch channels and accepts urls without a scheme', () => {
    expect(parseStreamUrl('  twitch.tv/Shroud  ')?.channel).toBe('shroud')
    expect(parseStreamUrl('twitch:xQc')?.channel).toBe('xqc')
  })

  it('rejects reserved twitch paths', () => {
    expect(parseStreamUrl('https://www.twitch.tv/directory')).toBeNull()
    expect(parseStreamUrl('https://www.twitch.tv/shroud/videos')).toBeNull()
  })

  it('parses youtube video urls in every supported shape', () => {
    const urls = [
      'https://youtube.com/watch?v=dQw4w9WgXcQ',
      'https://youtu.be/dQw4w9WgXcQ',
      'https://www.youtube.com/live/dQw4w9WgXcQ?si=abc',
      'https://www.youtube.com/embed/dQw4w9WgXcQ',
      'https://m.youtube.com/shorts/dQw4w9WgXcQ'
    ]

    for (const url of urls) {
      const parsed = parseStreamUrl(url)
      expect(parsed?.platform).toBe('youtube')
      expect(parsed?.videoId).toBe('dQw4w9WgXcQ')
    }
  })

  it('parses youtube channel ids', () => {
    expect(parseStreamUrl('https://www.youtube.com/channel/UCabcdefghijklmnopqrstuv')).toEqual({
      platform: 'youtube',
      channel: 'UCabcdefghijklmnopqrstuv',
      normalizedUrl: 'https://www.youtube.com/channel/UCabcdefghijklmnopqrstuv'
    })
  })

  it('returns null for known hosts with unsupported paths', () => {
    expect(parseStreamUrl('https://www.youtube.com/@somebody')).toBeNull()
    expect(parseStreamUrl('https://youtube.com/watch?v=short')).toBeNull()
    expect(parseStreamUrl('https://kick.com/categories')).toBeNull()
  })

  it('parses kick and rumble urls', () => {
    expect(parseStreamUrl('kick.com/SomeStreamer')).toEqual({
      platform: 'kick',
      channel: 'somestreamer',
      normalizedUrl: 'https://kick.com/somestreamer'
    })
    expect(parseStreamUrl('https://rumble.com/v4abcd-some-title.html')).toEqual({
      platform: 'rumble',
      videoId: 'v4abcd',
      normalizedUrl: 'https://rumble.com/embed/v4abcd/'
    })
    expect(parseStreamUrl('https://rumble.com/embed/v4abcd/')?.videoId).toBe('v4abcd')
  })

  it('treats any other http url as a generic embed', () => {
    expect(parseStreamUrl('https://example.com/live/stream')).toEqual({
      platform: 'other',
      normalizedUrl: 'https://example.com/live/stream'
    })
  })

  it('returns null for text that is not a url', () => {
    expect(parseStreamUrl('not a url')).toBeNull()
    expect(parseStreamUrl('   ')).toBeNull()
    expect(parseStreamUrl('ftp://example.com/file')).toBeNull()
  })
})

describe('requireStreamUrl', () => {
  it('throws a validation error for empty and invalid input', () => {
    expect(() => requireStreamUrl('')).toThrow(ValidationError)
    expect(() => requireStreamUrl('not a url')).toThrow(
      'That does not look like a stream link. Try a Twitch, YouTube, Kick or Rumble URL.'
    )
  })

  it('returns the parsed input when valid', () => {
    expect(requireStreamUrl('twitch:shroud').channel).toBe('shroud')
  })
})

describe('toStreamReference', () => {
  it('builds a lower-cased identity and a title from the channel', () => {
    const parsed = requireStreamUrl('https://twitch.tv/shroud')
    expect(toStreamReference(parsed)).toEqual({
      id: 'twitch:shroud',
      platform: 'twitch',
      title: 'shroud',
      url: 'https://www.twitch.tv/shroud',
      channel: 'shroud',
      videoId: undefined,
      viewerCount: undefined,
      thumbnailUrl: undefined,
      isLive: true
    })
  })

  it('titles videos with the platform label and falls back to the host', () => {
    const video = toStreamReference(requireStreamUrl('https://youtu.be/dQw4w9WgXcQ'))
    expect(video.id).toBe('youtube:dqw4w9wgxcq')
    expect(video.title).toBe('YouTube dQw4w9WgXcQ')

    const other = toStreamReference(requireStreamUrl('https://www.example.com/live'))
    expect(other.title).toBe('example.com')
  })

  it('applies overrides', () => {
    const reference = toStreamReference(requireStreamUrl('kick:somestreamer'), {
      title: '  Night stream ',
      isLive: false
    })
    expect(reference.title).toBe('Night stream')
    expect(reference.isLive).toBe(false)
  })
})

describe('fallbackTitleFromUrl', () => {
  it('extracts handles and hosts', () => {
    expect(fallbackTitleFromUrl('https://www.youtube.com/@lofi')).toBe('lofi')
    expect(fallbackTitleFromUrl('https://www.youtube.com/c/somechannel')).toBe('somechannel')
    expect(fallbackTitleFromUrl('garbage')).toBe('Stream')
  })
})

describe('platformLabel', () => {
  it('names every platform', () => {
    expect(platformLabel('youtube')).toBe('YouTube')
    expect(platformLabel('other')).toBe('Web')
  })
})
