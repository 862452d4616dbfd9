import type { StreamPlatform, StreamQuality, StreamReference } from '@components/types'

export interface EmbedOptions {
  muted: boolean
  parentHost: string
  autoplay?: boolean
  origin?: string
  quality?: StreamQuality
  showControls?: boolean
}

export type MuteStrategy = 'message' | 'sdk' | 'reload'

export interface StreamPlayer {
  platform: StreamPlatform
  muteStrategy: MuteStrategy
  embedUrl: (reference: StreamReference, options: EmbedOptions) => string | null
  muteCommand: (muted: boolean) => string | null
  // volume in 0..1
  volumeCommand: (volume: number) => string | null
}

const TWITCH_QUALITY: Record<Exclude<StreamQuality, 'auto'>, string> = {
  source: 'chunked',
  '1080p': '1080p60',
  '720p': '720p',
  '480p': '480p',
  '360p': '360p',
  '160p': '160p',
  audio_only: 'audio_only'
}

export const twitchQuality = (quality: StreamQuality | undefined): string | null =>
  !quality || quality === 'auto' ? null : TWITCH_QUALITY[quality]

const flag = (value: boolean): string => (value ? '1' : '0')

const twitchEmbedUrl = (reference: StreamReference, options: EmbedOptions): string | null => {
  if (!reference.channel) return null
  const params = new URLSearchParams({
    channel: reference.channel,
    parent: options.parentHost,
    autoplay: String(options.autoplay ?? true),
    muted: String(options.muted)
  })
  const quality = twitchQuality(options.quality)
  if (quality) params.set('quality', quality)
  return `https://player.twitch.tv/?${params.toString()}`
}

const youtubeEmbedUrl = (reference: StreamReference, options: EmbedOptions): string | null => {
  const params = new URLSearchParams({
    autoplay: flag(options.autoplay ?? true),
    mute: flag(options.muted),
    controls: flag(options.showControls ?? true),
    modestbranding: '1',
    rel: '0',
    playsinline: '1',
    enablejsapi: '1'
  })
  if (options.origin) params.set('origin', options.origin)

  if (reference.videoId) {
    return `https://www.youtube.com/embed/${encodeURIComponent(reference.videoId)}?${params.toString()}`
  }
  if (reference.channel) {
    return `https://www.youtube.com/embed/live_stream?channel=${encodeURIComponent(reference.channel)}&${params.toString()}`
  }
  return null
}

const kickEmbedUrl = (reference: StreamReference, options: EmbedOptions): string | null => {
  if (!reference.channel) return null
  const autoplay = String(options.autoplay ?? true)
  return `https://player.kick.com/${encodeURIComponent(reference.channel)}?autoplay=${autoplay}&muted=${String(options.muted)}`
}

const rumbleEmbedUrl = (reference: StreamReference, options: EmbedOptions): string | null => {
  if (!reference.videoId) return null
  const autoplay = flag(options.autoplay ?? true)
  return `https://rumble.com/embed/${encodeURIComponent(reference.videoId)}/?autoplay=${autoplay}&muted=${flag(options.muted)}`
}

const youtubeMuteCommand = (muted: boolean): string =>
  JSON.stringify({ event: 'command', func: muted ? 'mute' : 'unMute', args: [] })

const youtubeVolumeCommand = (volume: number): string =>
  JSON.stringify({
    event: 'command',
    func: 'setVolume',
    args: [Math.round(Math.min(1, Math.max(0, volume)) * 100)]
  })

const PLAYERS: Record<StreamPlatform, StreamPlayer> = {
  twitch: {
    platform: 'twitch',
    muteStrategy: 'sdk',
    embedUrl: twitchEmbedUrl,
    muteCommand: () => null,
    volumeCommand: () => null
  },
  youtube: {
    platform: 'youtube',
    muteStrategy: 'message',
    embedUrl: youtubeEmbedUrl,
    muteCommand: youtubeMuteCommand,
    volumeCommand: youtubeVolumeCommand
  },
  kick: {
    platform: 'kick',
    muteStrategy: 'reload',
    embedUrl: kickEmbedUrl,
    muteCommand: () => null,
    volumeCommand: () => null
  },
  rumble: {
    platform: 'rumble',
    muteStrategy: 'reload',
    embedUrl: rumbleEmbedUrl,
    muteCommand: () => null,
    volumeCommand: () => null
  },
  other: {
    platform: 'other',
    muteStrategy: 'reload',
    embedUrl: (reference) => reference.url || null,
    muteCommand: () => null,
    volumeCommand: () => null
  }
}

export const playerFor = (platform: StreamPlatform): StreamPlayer => PLAYERS[platform]

export const buildEmbedUrl = (reference: StreamReference, options: EmbedOptions): string | null =>
  playerFor(reference.platform).embedUrl(reference, options)
