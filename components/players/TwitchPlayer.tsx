'use client'

import { useEffect, useRef } from 'react'
import type { FC } from 'react'
import { twitchQuality } from '@lib/streams/players'
import { createLogger } from '@lib/logger'
import type { PlayerProps } from './types'

type TwitchPlayerApi = {
  setMuted: (value: boolean) => void
  setVolume: (volume: number) => void
  setQuality: (quality: string) => void
  play: () => void
  destroy?: () => void
  addEventListener: (event: string, callback: () => void) => void
}

type TwitchPlayerCtor = {
  new (
    element: string | HTMLElement,
    options: {
      channel: string
      parent: string[]
      width: string
      height: string
      autoplay: boolean
      muted: boolean
    }
  ): TwitchPlayerApi
  READY: string
  PLAYING: string
  OFFLINE: string
}

type TwitchGlobal = {
  Player: TwitchPlayerCtor
}

declare global {
  interface Window {
    Twitch?: TwitchGlobal
  }
}

const SDK_URL = 'https://player.twitch.tv/js/embed/v1.js'
const logger = createLogger('twitch')

let twitchSdkPromise: Promise<TwitchGlobal> | null = null

const loadTwitchSdk = (): Promise<TwitchGlobal> => {
  if (window.Twitch?.Player) return Promise.resolve(window.Twitch)
  if (twitchSdkPromise) return twitchSdkPromise

  twitchSdkPromise = new Promise<TwitchGlobal>((resolve, reject) => {
    const done = () => {
      if (window.Twitch?.Player) resolve(window.Twitch)
      else reject(new Error('The Twitch player did not initialise.'))
    }
    const fail = () => {
      twitchSdkPromise = null
      reject(new Error('Failed to load the Twitch player.'))
    }

    const existing = document.getElementById('twitch-embed-sdk')
    if (existing) {
      existing.addEventListener('load', done, { once: true })
      existing.addEventListener('error', fail, { once: true })
      return
    }

    const script = document.createElement('script')
    script.id = 'twitch-embed-sdk'
    script.src = SDK_URL
    script.async = true
    script.onload = done
    script.onerror = fail
    document.head.appendChild(script)
  })

  return twitchSdkPromise
}

export const TwitchPlayer: FC<PlayerProps> = ({
  stream,
  muted,
  volume,
  autoplay,
  quality,
  parentHost,
  onReady,
  onError
}) => {
  const containerRef = useRef<HTMLDivElement | null>(null)
  const playerRef = useRef<TwitchPlayerApi | null>(null)
  // Mute and volume are applied through the SDK; reading them here keeps them out of the
  // effect dependencies so changing them never rebuilds the player.
  const mutedRef = useRef(muted)
  const volumeRef = useRef(volume)
  mutedRef.current = muted
  volumeRef.current = volume

  const channel = stream.channel

  useEffect(() => {
    const container = containerRef.current
    if (!container) return
    if (!channel) {
      onError('This Twitch link has no channel to play.')
      return
    }

    let cancelled = false

    loadTwitchSdk()
      .then((twitch) => {
        if (cancelled) return
        container.replaceChildren()
        const player = new twitch.Player(container, {
          channel,
          parent: [parentHost],
          width: '100%',
          height: '100%',
          autoplay,
          muted: mutedRef.current
        })
        playerRef.current = player

        player.addEventListener(twitch.Player.READY, () => {
          if (cancelled) return
          player.setVolume(volumeRef.current)
          const preferred = twitchQuality(quality)
          if (preferred) player.setQuality(preferred)
          onReady()
        })
        player.addEventListener(twitch.Player.OFFLINE, () => {
          logger.info(`${channel} is offline`)
        })
      })
      .catch((error: unknown) => {
        if (cancelled) return
        logger.warn('sdk unavailable', error)
        onError(error instanceof Error ? error.message : 'Failed to load the Twitch player.')
      })

    return () => {
      cancelled = true
      playerRef.current?.destroy?.()
      playerRef.current = null
      container.replaceChildren()
    }
  }, [channel, parentHost, autoplay, quality, onReady, onError])

  useEffect(() => {
    playerRef.current?.setMuted(muted)
  }, [muted])

  useEffect(() => {
    playerRef.current?.setVolume(volume)
  }, [volume])

  return <div ref={containerRef} className="w-full h-full" data-testid="twitch-player" />
}
