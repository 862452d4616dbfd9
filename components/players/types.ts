import type { StreamQuality, StreamReference } from '@components/types'

export interface PlayerProps {
  stream: StreamReference
  muted: boolean
  // 0..1
  volume: number
  autoplay: boolean
  quality: StreamQuality
  parentHost: string
  onReady: () => void
  onError: (message: string) => void
}
