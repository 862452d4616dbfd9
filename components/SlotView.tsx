'use client'

import { useCallback, useEffect, useState } from 'react'
import type { FC } from 'react'
import {
  ChevronLeft,
  ChevronRight,
  Headphones,
  Loader2,
  Maximize2,
  RotateCw,
  Star,
  Volume2,
  VolumeX,
  X
} from 'lucide-react'
import { useI18n } from '@components/i18n'
import { useAudio, useLibrary, useServices, useSession, useSlots } from '@components/SessionProvider'
import { IframePlayer } from '@components/players/IframePlayer'
import { TwitchPlayer } from '@components/players/TwitchPlayer'
import type { PlayerProps } from '@components/players/types'
import { resolveEmbedParentHost } from '@lib/config'
import { createLogger } from '@lib/logger'
import type { StreamSlot } from '@lib/multistream/slot-store'
import { playerFor } from '@lib/streams/players'
import { platformLabel } from '@lib/streams/platform'
import { toUserMessage } from '@lib/errors'
import { Button } from '@ui/button'
import {
  Dialog,
  DialogContent,
  DialogDescription,
  DialogFooter,
  DialogHeader,
  DialogTitle
} from '@ui/dialog'

interface SlotViewProps {
  slot: StreamSlot
  index: number
}

const logger = createLogger('slot')

const iconButton =
  'size-7 bg-gray-900/80 border border-gray-700 text-gray-100 hover:bg-gray-800 hover:text-gray-100'

export const SlotView: FC<SlotViewProps> = ({ slot, index }) => {
  const { t } = useI18n()
  const { config, preferences, library } = useServices()
  const session = useSession()
  const [isConfirmOpen, setIsConfirmOpen] = useState(false)
  const [parentHost, setParentHost] = useState(config.embedParentHost ?? 'localhost')
  const isMuted = useAudio((state) => state.isMuted(slot.id))
  const volume = useAudio((state) => state.effectiveVolume(slot.id))
  const isActive = useAudio((state) => state.activeSlotId === slot.id)
  const slotCount = useSlots((state) => state.slots.length)
  const { stream, status } = slot
  const isFavorite = useLibrary((state) =>
    state.favorites.some((entry) => entry.streamId === stream?.id)
  )

  useEffect(() => {
    setParentHost(resolveEmbedParentHost(config))
  }, [config])

  // A player that never reports ready counts as a failure.
  useEffect(() => {
    if (status !== 'loading') return
    const timer = window.setTimeout(() => {
      session.slots.getState().markError(index, t('slot.timeout'))
    }, config.slotLoadTimeoutMs)
    return () => window.clearTimeout(timer)
  }, [status, index, slot.retryCount, config.slotLoadTimeoutMs, session, t])

  const handleReady = useCallback(() => {
    session.slots.getState().markReady(index)
  }, [session, index])

  const handleError = useCallback(
    (message: string) => {
      logger.warn(`slot ${index + 1} failed: ${message}`)
      session.slots.getState().markError(index, message)
    },
    [session, index]
  )

  const runAction = (action: () => void): void => {
    try {
      action()
    } catch (error) {
      logger.error(toUserMessage(error), error)
    }
  }

  if (!stream) {
    return (
      <div className="w-full h-full bg-gray-950 border border-dashed border-gray-800 rounded-md flex items-center justify-center">
        <p className="text-sm text-gray-600">{t('slot.empty', { index: index + 1 })}</p>
      </div>
    )
  }

  const playerProps: PlayerProps = {
    stream,
    muted: isMuted,
    volume,
    autoplay: preferences.get('autoplay'),
    quality: preferences.get('streamQuality'),
    parentHost,
    onReady: handleReady,
    onError: handleError
  }
  const Player = playerFor(stream.platform).muteStrategy === 'sdk' ? TwitchPlayer : IframePlayer

  return (
    <div
      className={`group relative w-full h-full bg-black rounded-md overflow-hidden border ${
        isActive ? 'border-blue-500' : 'border-gray-800'
      }`}
      onClick={() => session.audio.getState().setActive(slot.id)}
      data-testid={`slot-${index}`}
    >
      {status !== 'error' && <Player key={`${stream.id}-${slot.retryCount}`} {...playerProps} />}

      <div className="absolute top-0 inset-x-0 px-2 py-1 flex items-center gap-2 bg-gradient-to-b from-black/80 to-transparent opacity-0 group-hover:opacity-100 transition-opacity">
        <span className="text-[10px] font-semibold uppercase text-gray-400">
          {platformLabel(stream.platform)}
        </span>
        <span className="text-xs text-white truncate flex-1" title={stream.title}>
          {stream.title}
        </span>
        <Button
          variant="ghost"
          size="icon"
          className={iconButton}
          aria-label={t('slot.moveEarlier')}
          disabled={index === 0}
          onClick={(event) => {
            event.stopPropagation()
            runAction(() => session.swapSlots(index, index - 1))
          }}
        >
          <ChevronLeft className="size-4" />
        </Button>
        <Button
          variant="ghost"
          size="icon"
          className={iconButton}
          aria-label={t('slot.moveLater')}
          disabled={index >= slotCount - 1}
          onClick={(event) => {
            event.stopPropagation()
            runAction(() => session.swapSlots(index, index + 1))
          }}
        >
          <ChevronRight className="size-4" />
        </Button>
        <Button
          variant="ghost"
          size="icon"
          className={iconButton}
          aria-label={isFavorite ? t('slot.unfavorite') : t('slot.favorite')}
          aria-pressed={isFavorite}
          onClick={(event) => {
            event.stopPropagation()
            library.getState().toggleFavorite(stream)
          }}
        >
          <Star className={`size-4 ${isFavorite ? 'fill-yellow-400 text-yellow-400' : ''}`} />
        </Button>
        <Button
          variant="ghost"
          size="icon"
          className={iconButton}
          aria-label={t('slot.solo')}
          onClick={(event) => {
            event.stopPropagation()
            session.audio.getState().solo(slot.id)
          }}
        >
          <Headphones className="size-4" />
        </Button>
        <Button
          variant="ghost"
          size="icon"
          className={iconButton}
          aria-label={isMuted ? t('slot.unmute') : t('slot.mute')}
          onClick={(event) => {
            event.stopPropagation()
            session.audio.getState().toggleMute(slot.id)
          }}
        >
          {isMuted ? <VolumeX className="size-4" /> : <Volume2 className="size-4" />}
        </Button>
        <Button
          variant="ghost"
          size="icon"
          className={iconButton}
          aria-label={t('slot.focus')}
          onClick={(event) => {
            event.stopPropagation()
            runAction(() => session.focusSlot(index))
          }}
        >
          <Maximize2 className="size-4" />
        </Button>
        <Button
          variant="ghost"
          size="icon"
          className={iconButton}
          aria-label={t('slot.remove')}
          onClick={(event) => {
            event.stopPropagation()
            setIsConfirmOpen(true)
          }}
        >
          <X className="size-4" />
        </Button>
      </div>

      {status === 'loading' && (
        <div className="absolute inset-0 flex flex-col items-center justify-center gap-2 bg-black/60 pointer-events-none">
          <Loader2 className="size-6 animate-spin text-gray-300" />
          <p className="text-xs text-gray-300">{t('slot.loading')}</p>
          {slot.retryCount > 0 && (
            <p className="text-[10px] text-gray-500">
              {t('slot.attempt', { count: slot.retryCount + 1, max: config.maxSlotRetries + 1 })}
            </p>
          )}
        </div>
      )}

      {status === 'error' && (
        <div
          role="alert"
          className="absolute inset-0 flex flex-col items-center justify-center gap-3 bg-gray-950 p-4 text-center"
        >
          <p className="text-sm text-gray-200">{slot.error ?? t('slot.failed')}</p>
          {slot.terminal ? (
            <p className="text-xs text-gray-500">{t('slot.terminal')}</p>
          ) : (
            <Button
              variant="outline"
              size="sm"
              onClick={(event) => {
                event.stopPropagation()
                runAction(() => session.slots.getState().retry(index))
              }}
            >
              <RotateCw className="size-4" />
              {t('slot.retry')}
            </Button>
          )}
        </div>
      )}

      <Dialog open={isConfirmOpen} onOpenChange={setIsConfirmOpen}>
        <DialogContent closeLabel={t('common.close')} className="max-w-sm">
          <DialogHeader>
            <DialogTitle>{t('slot.remove')}</DialogTitle>
            <DialogDescription>{t('slot.removeConfirm')}</DialogDescription>
          </DialogHeader>
          <DialogFooter>
            <Button variant="ghost" onClick={() => setIsConfirmOpen(false)}>
              {t('common.cancel')}
            </Button>
            <Button
              variant="destructive"
              onClick={() => {
                setIsConfirmOpen(false)
                runAction(() => session.removeStream(index))
              }}
            >
              {t('slot.remove')}
            </Button>
          </DialogFooter>
        </DialogContent>
      </Dialog>
    </div>
  )
}
