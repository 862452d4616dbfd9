'use client'

import { useEffect, useState } from 'react'
import {
  Bookmark,
  CircleUser,
  Crown,
  LayoutGrid,
  Minimize2,
  Settings,
  Volume,
  Volume2,
  VolumeX
} from 'lucide-react'
import { AccountDialog } from '@components/AccountDialog'
import { useCurrentUser } from '@components/account-queries'
import { I18nProvider, localeLabels, useI18n } from '@components/i18n'
import { LayoutPicker } from '@components/LayoutPicker'
import { LibraryDialog } from '@components/LibraryDialog'
import { MultiStreamView } from '@components/MultiStreamView'
import { QueryProvider } from '@components/QueryProvider'
import {
  SessionProvider,
  useAudio,
  useLayout,
  useServices,
  useSlots
} from '@components/SessionProvider'
import { AUDIO_MODE_LABELS, SettingsDialog } from '@components/SettingsDialog'
import { SubscriptionDialog } from '@components/SubscriptionDialog'
import { AUDIO_MODES } from '@components/types'
import { URLInput } from '@components/URLInput'
import { streamLimitFor } from '@data/plans'
import { describeVariant } from '@lib/layout/layout-engine'
import { createLogger } from '@lib/logger'
import { Button } from '@ui/button'
import { Dialog, DialogContent, DialogHeader, DialogTitle } from '@ui/dialog'

const logger = createLogger('app')

const headerButton =
  'bg-gray-900 border border-gray-700 text-gray-100 hover:bg-gray-800 hover:text-gray-100'

const headerSelect =
  'h-9 bg-gray-900 border border-gray-700 rounded px-2 text-xs text-gray-100 focus:outline-none focus:border-blue-500'

const isTypingTarget = (target: EventTarget | null): boolean =>
  target instanceof HTMLElement &&
  (target.isContentEditable || ['INPUT', 'TEXTAREA', 'SELECT'].includes(target.tagName))

export function AppShell() {
  const { t, locale, locales, setLocale } = useI18n()
  const { session, preferences, library } = useServices()
  const user = useCurrentUser()
  const filledCount = useSlots((state) => state.slots.filter((slot) => slot.stream !== null).length)
  const variant = useLayout((state) => state.variant)
  const masterMuted = useAudio((state) => state.masterMuted)
  const audioMode = useAudio((state) => state.mode)
  const masterVolume = useAudio((state) => state.masterVolume)
  const [isLayoutOpen, setIsLayoutOpen] = useState(false)
  const [isSettingsOpen, setIsSettingsOpen] = useState(false)
  const [isAccountOpen, setIsAccountOpen] = useState(false)
  const [isSubscriptionOpen, setIsSubscriptionOpen] = useState(false)
  const [isLibraryOpen, setIsLibraryOpen] = useState(false)
  const [showOnboarding, setShowOnboarding] = useState(
    () => !preferences.get('hasCompletedOnboarding')
  )

  const plan = user.data?.plan ?? 'free'

  const addStream = (url: string): void => {
    const added = session.addStreamFromUrl(url)
    library.getState().recordWatched(added.stream)
  }

  const dismissOnboarding = (): void => {
    preferences.set('hasCompletedOnboarding', true)
    setShowOnboarding(false)
  }

  useEffect(() => {
    session.slots.getState().setStreamLimit(streamLimitFor(plan))
    logger.debug(`stream limit follows the ${plan} plan`)
  }, [session, plan])

  useEffect(() => {
    const handleKeyDown = (event: KeyboardEvent) => {
      if (event.defaultPrevented || event.metaKey || event.ctrlKey || event.altKey) return
      if (isTypingTarget(event.target)) return

      switch (event.key) {
        case ']':
          session.focusNext()
          break
        case '[':
          session.focusPrevious()
          break
        case 'm':
          session.audio.getState().toggleMasterMute()
          break
        case 'Escape':
          session.exitFocus()
          break
        default:
          return
      }
      event.preventDefault()
    }

    window.addEventListener('keydown', handleKeyDown)
    return () => window.removeEventListener('keydown', handleKeyDown)
  }, [session])

  return (
    <div className="w-screen h-screen bg-black text-white flex flex-col">
      <header className="bg-black border-b border-gray-800 px-3 py-2 flex items-center justify-between min-h-16 gap-2">
        <div className="min-w-0 shrink-0">
          <h1 className="text-lg md:text-2xl font-bold tracking-tight">{t('app.title')}</h1>
          <p className="hidden md:block text-xs text-gray-500">{t('app.tagline')}</p>
        </div>

        <URLInput onAdd={addStream} />

        <div className="flex items-center gap-2 shrink-0">
          {variant.kind === 'focus' && (
            <Button
              variant="ghost"
              size="icon"
              onClick={() => session.exitFocus()}
              aria-label={t('layout.exitFocus')}
              title={t('layout.exitFocus')}
              className={headerButton}
            >
              <Minimize2 className="size-4" />
            </Button>
          )}
          <Button
            variant="ghost"
            size="icon"
            onClick={() => setIsLayoutOpen(true)}
            aria-label={t('app.layout')}
            title={t('app.layout')}
            className={headerButton}
          >
            <LayoutGrid className="size-4" />
          </Button>
          <select
            aria-label={t('audio.mode')}
            className={`hidden sm:block ${headerSelect}`}
            value={audioMode}
            onChange={(event) => {
              const mode = AUDIO_MODES.find((option) => option === event.target.value)
              if (!mode) return
              session.audio.getState().setMode(mode)
              preferences.set('audioMode', mode)
            }}
          >
            {AUDIO_MODES.map((mode) => (
              <option key={mode} value={mode}>
                {t(AUDIO_MODE_LABELS[mode])}
              </option>
            ))}
          </select>
          <Button
            variant="ghost"
            size="icon"
            onClick={() => session.audio.getState().toggleMasterMute()}
            aria-label={masterMuted ? t('app.masterUnmute') : t('app.masterMute')}
            title={masterMuted ? t('app.masterUnmute') : t('app.masterMute')}
            className={headerButton}
          >
            {masterMuted ? <VolumeX className="size-4" /> : <Volume2 className="size-4" />}
          </Button>
          <input
            type="range"
            min={0}
            max={100}
            value={Math.round(masterVolume * 100)}
            onChange={(event) =>
              session.audio.getState().setMasterVolume(Number(event.target.value) / 100)
            }
            aria-label={t('app.masterVolume')}
            title={t('app.masterVolume')}
            className="hidden lg:block w-20 accent-blue-500"
          />
          <Button
            variant="ghost"
            size="icon"
            onClick={() => session.audio.getState().muteAll()}
            aria-label={t('app.muteAll')}
            title={t('app.muteAll')}
            className={headerButton}
          >
            <Volume className="size-4" />
          </Button>
          <select
            aria-label={t('settings.language')}
            className={`hidden md:block ${headerSelect}`}
            value={locale}
            onChange={(event) => {
              const next = locales.find((option) => option === event.target.value)
              if (next) setLocale(next)
            }}
          >
            {locales.map((option) => (
              <option key={option} value={option}>
                {localeLabels[option]}
              </option>
            ))}
          </select>
          <Button
            variant="ghost"
            size="icon"
            onClick={() => setIsLibraryOpen(true)}
            aria-label={t('app.library')}
            title={t('app.library')}
            className={headerButton}
          >
            <Bookmark className="size-4" />
          </Button>
          <Button
            variant="ghost"
            size="icon"
            onClick={() => setIsSettingsOpen(true)}
            aria-label={t('app.settings')}
            title={t('app.settings')}
            className={headerButton}
          >
            <Settings className="size-4" />
          </Button>
          <Button
            variant="ghost"
            size="icon"
            onClick={() => setIsSubscriptionOpen(true)}
            aria-label={t('app.subscription')}
            title={t('app.subscription')}
            className={headerButton}
          >
            <Crown className="size-4" />
          </Button>
          <Button
            variant="ghost"
            size="icon"
            onClick={() => setIsAccountOpen(true)}
            aria-label={t('app.account')}
            title={t('app.account')}
            className={headerButton}
          >
            <CircleUser className="size-4" />
          </Button>
        </div>
      </header>

      <main className="flex-1 overflow-hidden relative">
        <MultiStreamView />

        {filledCount === 0 && (
          <div className="absolute inset-0 flex flex-col items-center justify-center gap-4 pointer-events-none">
            <p className="text-gray-500 text-lg text-center px-4">{t('app.empty')}</p>
            {showOnboarding && (
              <div className="pointer-events-auto max-w-md rounded-lg border border-gray-700 bg-gray-900 p-4 text-sm">
                <h2 className="font-semibold text-gray-100">{t('app.onboardingTitle')}</h2>
                <p className="mt-1 text-gray-400">{t('app.onboardingShortcuts')}</p>
                <Button size="sm" className="mt-3" onClick={dismissOnboarding}>
                  {t('app.onboardingDismiss')}
                </Button>
              </div>
            )}
          </div>
        )}
      </main>

      <Dialog open={isLayoutOpen} onOpenChange={setIsLayoutOpen}>
        <DialogContent closeLabel={t('common.close')}>
          <DialogHeader>
            <DialogTitle>{t('layout.title')}</DialogTitle>
          </DialogHeader>
          <LayoutPicker
            currentKey={describeVariant(variant)}
            onSelect={(next) => {
              session.applyLayout(next)
              setIsLayoutOpen(false)
            }}
          />
        </DialogContent>
      </Dialog>

      <LibraryDialog open={isLibraryOpen} onOpenChange={setIsLibraryOpen} onAdd={addStream} />
      <SettingsDialog open={isSettingsOpen} onOpenChange={setIsSettingsOpen} />
      <AccountDialog
        open={isAccountOpen}
        onOpenChange={setIsAccountOpen}
        onManageSubscription={() => {
          setIsAccountOpen(false)
          setIsSubscriptionOpen(true)
        }}
      />
      <SubscriptionDialog open={isSubscriptionOpen} onOpenChange={setIsSubscriptionOpen} />
    </div>
  )
}

function LoadingScreen() {
  const { t } = useI18n()
  return (
    <div className="w-screen h-screen bg-black flex items-center justify-center">
      <p className="text-gray-500 text-lg">{t('app.loading')}</p>
    </div>
  )
}

export function AppClient() {
  return (
    <QueryProvider>
      <I18nProvider>
        <SessionProvider fallback={<LoadingScreen />}>
          <AppShell />
        </SessionProvider>
      </I18nProvider>
    </QueryProvider>
  )
}
