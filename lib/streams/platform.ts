import type { StreamPlatform, StreamReference } from '@components/types'
import { ValidationError } from '@lib/errors'

export interface ParsedStreamInput {
  platform: StreamPlatform
  channel?: string
  videoId?: string
  normalizedUrl: string
}

const TWITCH_CHANNEL = /^[a-zA-Z0-9_]{3,25}$/
const KICK_CHANNEL = /^[a-zA-Z0-9_-]{3,40}$/
const YOUTUBE_VIDEO_ID = /^[\w-]{11}$/
const YOUTUBE_CHANNEL_ID = /^UC[\w-]{22}$/
const RUMBLE_VIDEO_ID = /^v[a-z0-9]{3,}$/i

const TWITCH_RESERVED_PATHS = new Set([
  'directory',
  'videos',
  'settings',
  'search',
  'downloads',
  'jobs',
  'p',
  'subscriptions',
  'inventory',
  'wallet'
])

const KICK_RESERVED_PATHS = new Set(['categories', 'browse', 'following', 'search', 'video'])

const PLATFORM_LABELS: Record<StreamPlatform, string> = {
  twitch: 'Twitch',
  youtube: 'YouTube',
  kick: 'Kick',
  rumble: 'Rumble',
  other: 'Web'
}

export const platformLabel = (platform: StreamPlatform): string => PLATFORM_LABELS[platform]

const hostMatches = (host: string, domain: string): boolean =>
  host === domain || host.endsWith(`.${domain}`)

const toUrl = (raw: string): URL | null => {
  const withScheme = /^https?:\/\//i.test(raw)
    ? raw
    : /^(?:www\.)?[a-z0-9-]+(?:\.[a-z0-9-]+)+(?:[/?#]|$)/i.test(raw)
      ? `https://${raw}`
      : null
  if (!withScheme) return null

  try {
    const url = new URL(withScheme)
    if (url.protocol !== 'http:' && url.protocol !== 'https:') return null
    if (!url.hostname.includes('.')) return null
    return url
  } catch {
    return null
  }
}

const pathSegments = (url: URL): string[] => url.pathname.split('/').filter(Boolean)

const twitchChannel = (name: string): ParsedStreamInput | null => {
  if (!TWITCH_CHANNEL.test(name) || TWITCH_RESERVED_PATHS.has(name.toLowerCase())) return null
  const channel = name.toLowerCase()
  return { platform: 'twitch', channel, normalizedUrl: `https://www.twitch.tv/${channel}` }
}

const kickChannel = (name: string): ParsedStreamInput | null => {
  if (!KICK_CHANNEL.test(name) || KICK_RESERVED_PATHS.has(name.toLowerCase())) return null
  const channel = name.toLowerCase()
  return { platform: 'kick', channel, normalizedUrl: `https://kick.com/${channel}` }
}

const youtubeVideo = (videoId: string | null | undefined): ParsedStreamInput | null => {
  if (!videoId || !YOUTUBE_VIDEO_ID.test(videoId)) return null
  return {
    platform: 'youtube',
    videoId,
    normalizedUrl: `https://www.youtube.com/watch?v=${videoId}`
  }
}

const parseYoutube = (url: URL): ParsedStreamInput | null => {
  const host = url.hostname.toLowerCase()
  const [first, second] = pathSegments(url)

  if (hostMatches(host, 'youtu.be')) return youtubeVideo(first)
  if (url.pathname === '/watch') return youtubeVideo(url.searchParams.get('v'))
  if (first === 'live' || first === 'embed' || first === 'shorts') return youtubeVideo(second)
  if (first === 'channel' && second && YOUTUBE_CHANNEL_ID.test(second)) {
    return {
      platform: 'youtube',
      channel: second,
      normalizedUrl: `https://www.youtube.com/channel/${second}`
    }
  }
  return null
}

const parseRumble = (url: URL): ParsedStreamInput | null => {
  const [first, second] = pathSegments(url)
  const candidate = first === 'embed' ? second : first?.match(/^(v[a-z0-9]+)-.*\.html$/i)?.[1]
  if (!candidate || !RUMBLE_VIDEO_ID.test(candidate)) return null
  return {
    platform: 'rumble',
    videoId: candidate,
    normalizedUrl: `https://rumble.com/embed/${candidate}/`
  }
}

export const parseStreamUrl = (input: string): ParsedStreamInput | null => {
  const raw = input.trim()
  if (!raw) return null

  const twitchPrefixed = raw.match(/^twitch:(\S+)$/i)
  if (twitchPrefixed?.[1]) return twitchChannel(twitchPrefixed[1])

  const kickPrefixed = raw.match(/^kick:(\S+)$/i)
  if (kickPrefixed?.[1]) return kickChannel(kickPrefixed[1])

  const url = toUrl(raw)
  if (!url) return null
  const host = url.hostname.toLowerCase()

  if (hostMatches(host, 'twitch.tv')) {
    const segments = pathSegments(url)
    return segments.length === 1 ? twitchChannel(segments[0]) : null
  }

  if (hostMatches(host, 'youtube.com') || hostMatches(host, 'youtu.be')) {
    return parseYoutube(url)
  }

  if (hostMatches(host, 'kick.com')) {
    const segments = pathSegments(url)
    return segments.length === 1 ? kickChannel(segments[0]) : null
  }

  if (hostMatches(host, 'rumble.com')) {
    return parseRumble(url)
  }

  return { platform: 'other', normalizedUrl: url.toString() }
}

export const requireStreamUrl = (input: string): ParsedStreamInput => {
  if (!input.trim()) {
    throw new ValidationError('Paste a stream link to add it.')
  }
  const parsed = parseStreamUrl(input)
  if (!parsed) {
    throw new ValidationError(
      'That does not look like a stream link. Try a Twitch, YouTube, Kick or Rumble URL.'
    )
  }
  return parsed
}

export const fallbackTitleFromUrl = (url: string): string => {
  const twitchMatch = url.match(/twitch\.tv\/([a-zA-Z0-9_]+)/i)
  if (twitchMatch?.[1]) return twitchMatch[1]

  const kickMatch = url.match(/kick\.com\/([a-zA-Z0-9_-]+)/i)
  if (kickMatch?.[1]) return kickMatch[1]

  const atMatch = url.match(/@([a-zA-Z0-9_-]+)/)
  if (atMatch?.[1]) return atMatch[1]

  const channelMatch = url.match(/\/(channel|c)\/([a-zA-Z0-9_-]+)/)
  if (channelMatch?.[2]) return channelMatch[2]

  try {
    return new URL(url).hostname.replace(/^www\./, '')
  } catch {
    return 'Stream'
  }
}

export const streamIdentity = (parsed: ParsedStreamInput): string => {
  const key = parsed.channel ?? parsed.videoId ?? parsed.normalizedUrl
  return `${parsed.platform}:${key}`.toLowerCase()
}

export const toStreamReference = (
  parsed: ParsedStreamInput,
  overrides: Partial<Omit<StreamReference, 'id' | 'platform'>> = {}
): StreamReference => ({
  id: streamIdentity(parsed),
  platform: parsed.platform,
  title:
    overrides.title?.trim() ||
    parsed.channel ||
    (parsed.videoId ? `${platformLabel(parsed.platform)} ${parsed.videoId}` : '') ||
    fallbackTitleFromUrl(parsed.normalizedUrl),
  url: overrides.url ?? parsed.normalizedUrl,
  channel: parsed.channel,
  videoId: parsed.videoId,
  viewerCount: overrides.viewerCount,
  thumbnailUrl: overrides.thumbnailUrl,
  isLive: overrides.isLive ?? true
})
