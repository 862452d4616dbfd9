export type StreamPlatform = 'twitch' | 'youtube' | 'kick' | 'rumble' | 'other'

export interface StreamReference {
  id: string
  platform: StreamPlatform
  title: string
  url: string
  channel?: string
  videoId?: string
  viewerCount?: number
  thumbnailUrl?: string
  isLive: boolean
}

export type StreamQuality =
  | 'auto'
  | 'source'
  | '1080p'
  | '720p'
  | '480p'
  | '360p'
  | '160p'
  | 'audio_only'

export const STREAM_QUALITIES: readonly StreamQuality[] = [
  'auto',
  'source',
  '1080p',
  '720p',
  '480p',
  '360p',
  '160p',
  'audio_only'
]

export type AudioMode = 'focusedOnly' | 'all' | 'manual'

export const AUDIO_MODES: readonly AudioMode[] = ['focusedOnly', 'all', 'manual']
