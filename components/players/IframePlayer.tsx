'use client'

import { useEffect, useRef, useState } from 'react'
import type { FC } from 'react'
import { playerFor } from '@lib/streams/players'
import type { PlayerProps } from './types'

/**
 * Iframe embed for every platform except Twitch.
 *
 * YouTube takes mute and volume commands over postMessage, so its URL is built once with the
 * initial mute state. Other platforms only read the mute flag from the URL, so toggling it
 * reloads the embed.
 */
export const IframePlayer: FC<PlayerProps> = ({
  stream,
  muted,
  volume,
  autoplay,
  quality,
  parentHost,
  onReady,
  onError
}) => {
  const iframeRef = useRef<HTMLIFrameElement | null>(null)
  const player = playerFor(stream.platform)
  const [initialMuted] = useState(muted)
  const [origin, setOrigin] = useState<string | undefined>(undefined)

  useEffect(() => {
    if (typeof window !== 'undefined') setOrigin(window.location.origin)
  }, [])

  const embedUrl = player.embedUrl(stream, {
    muted: player.muteStrategy === 'message' ? initialMuted : muted,
    parentHost,
    autoplay,
    origin,
    quality
  })

  useEffect(() => {
    if (!embedUrl) onError('This link cannot be embedded.')
  }, [embedUrl, onError])

  const postCommand = (command: string | null): void => {
    const target = iframeRef.current?.contentWindow
    if (!command || !target) return
    target.postMessage(command, '*')
  }

  useEffect(() => {
    postCommand(player.muteCommand(muted))
  }, [player, muted])

  useEffect(() => {
    postCommand(player.volumeCommand(volume))
  }, [player, volume])

  if (!embedUrl) return null

  return (
    <iframe
      ref={iframeRef}
      src={embedUrl}
      title={stream.title}
      className="w-full h-full border-0"
      allow="autoplay; encrypted-media; picture-in-picture; fullscreen"
      allowFullScreen
      onLoad={() => {
        postCommand(player.muteCommand(muted))
        postCommand(player.volumeCommand(volume))
        onReady()
      }}
      onError={() => onError('The player could not be loaded.')}
    />
  )
}
