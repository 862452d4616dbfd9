'use client'

import { useEffect, useState } from 'react'
import type { FC, ReactNode } from 'react'
import { useI18n, localeLabels, type TranslationKey } from '@components/i18n'
import { useServices } from '@components/SessionProvider'
import { AUDIO_MODES, STREAM_QUALITIES, type AudioMode, type StreamQuality } from '@components/types'
import { BENTO_PRESETS, LAYOUT_PRESETS } from '@lib/layout/layout-engine'
import {
  PREFERENCE_DEFAULTS,
  PREFERENCE_KEYS,
  type PreferenceKey,
  type PreferenceValues
} from '@lib/settings/preferences'
import { Button } from '@ui/button'
import { Dialog, DialogContent, DialogFooter, DialogHeader, DialogTitle } from '@ui/dialog'

interface SettingsDialogProps {
  open: boolean
  onOpenChange: (open: boolean) => void
}

export const AUDIO_MODE_LABELS: Record<AudioMode, TranslationKey> = {
  focusedOnly: 'audio.focusedOnly',
  all: 'audio.all',
  manual: 'audio.manual'
}

const selectClass =
  'bg-gray-950 border border-gray-700 rounded px-2 py-1 text-sm text-white focus:outline-none focus:border-blue-500'

const Row: FC<{ label: string; htmlFor: string; children: ReactNode }> = ({ label, htmlFor, children }) => (
  <div className="flex items-center justify-between gap-4">
    <label htmlFor={htmlFor} className="text-sm text-gray-300">
      {label}
    </label>
    {children}
  </div>
)

export const SettingsDialog: FC<SettingsDialogProps> = ({ open, onOpenChange }) => {
  const { t, locale, locales, setLocale } = useI18n()
  const { preferences, session } = useServices()
  const [values, setValues] = useState<PreferenceValues>(PREFERENCE_DEFAULTS)

  useEffect(() => {
    if (open) setValues(preferences.all())
  }, [open, preferences])

  const update = <K extends PreferenceKey>(key: K, value: PreferenceValues[K]): void => {
    preferences.set(key, value)
    setValues(preferences.all())
  }

  const isAudioMode = (value: string): value is AudioMode => AUDIO_MODES.some((mode) => mode === value)
  const isQuality = (value: string): value is StreamQuality =>
    STREAM_QUALITIES.some((quality) => quality === value)

  const resetAll = (): void => {
    for (const key of PREFERENCE_KEYS) preferences.reset(key)
    session.audio.getState().setMode(PREFERENCE_DEFAULTS.audioMode)
    setValues(preferences.all())
  }

  return (
    <Dialog open={open} onOpenChange={onOpenChange}>
      <DialogContent closeLabel={t('common.close')} className="max-w-md">
        <DialogHeader>
          <DialogTitle>{t('settings.title')}</DialogTitle>
        </DialogHeader>

        <div className="space-y-3">
          <Row label={t('settings.language')} htmlFor="settings-language">
            <select
              id="settings-language"
              className={selectClass}
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
          </Row>

          <Row label={t('settings.audioMode')} htmlFor="settings-audio">
            <select
              id="settings-audio"
              className={selectClass}
              value={values.audioMode}
              onChange={(event) => {
                const mode = event.target.value
                if (!isAudioMode(mode)) return
                update('audioMode', mode)
                session.audio.getState().setMode(mode)
              }}
            >
              {AUDIO_MODES.map((mode) => (
                <option key={mode} value={mode}>
                  {t(AUDIO_MODE_LABELS[mode])}
                </option>
              ))}
            </select>
          </Row>

          <Row label={t('settings.quality')} htmlFor="settings-quality">
            <select
              id="settings-quality"
              className={selectClass}
              value={values.streamQuality}
              onChange={(event) => {
                const quality = event.target.value
                if (isQuality(quality)) update('streamQuality', quality)
              }}
            >
              {STREAM_QUALITIES.map((quality) => (
                <option key={quality} value={quality}>
                  {quality === 'auto' ? t('settings.qualityAuto') : quality.replace('_', ' ')}
                </option>
              ))}
            </select>
          </Row>

          <Row label={t('settings.defaultLayout')} htmlFor="settings-layout">
            <select
              id="settings-layout"
              className={selectClass}
              value={values.defaultLayout}
              onChange={(event) => update('defaultLayout', event.target.value)}
            >
              {[...LAYOUT_PRESETS, ...BENTO_PRESETS]
                .filter((preset) => preset.kind !== 'focus')
                .map((preset) => (
                  <option key={preset.key} value={preset.key}>
                    {preset.kind === 'bento' ? `${t('layout.bento')}: ${preset.label}` : preset.label}
                  </option>
                ))}
            </select>
          </Row>

          <Row label={t('settings.autoplay')} htmlFor="settings-autoplay">
            <input
              id="settings-autoplay"
              type="checkbox"
              checked={values.autoplay}
              onChange={(event) => update('autoplay', event.target.checked)}
            />
          </Row>

          <Row label={t('settings.showSecondary')} htmlFor="settings-secondary">
            <input
              id="settings-secondary"
              type="checkbox"
              checked={values.showSecondaryStreams}
              onChange={(event) => update('showSecondaryStreams', event.target.checked)}
            />
          </Row>
        </div>

        <DialogFooter>
          <Button variant="outline" onClick={resetAll}>
            {t('settings.reset')}
          </Button>
          <Button onClick={() => onOpenChange(false)}>{t('common.close')}</Button>
        </DialogFooter>
      </DialogContent>
    </Dialog>
  )
}
