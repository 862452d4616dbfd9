'use client'

import { createContext, useContext, useEffect, useMemo, useState } from 'react'
import type { FC, ReactNode } from 'react'
import {
  localeLabels,
  messages,
  supportedLocales,
  type Locale,
  type TranslationKey
} from '@data/i18n'
import { browserStorage, createPreferences, type Preferences } from '@lib/settings/preferences'

export const detectLocale = (languages: readonly string[]): Locale => {
  for (const candidate of languages) {
    const lower = candidate.toLowerCase()
    if (lower === 'pt' || lower.startsWith('pt-')) return 'pt-BR'
    if (lower === 'es' || lower.startsWith('es-')) return 'es'
    if (lower === 'en' || lower.startsWith('en-')) return 'en'
  }
  return 'en'
}

const browserLanguages = (): readonly string[] => {
  if (typeof navigator === 'undefined') return []
  return navigator.languages?.length ? navigator.languages : [navigator.language]
}

export const interpolate = (text: string, vars?: Record<string, string | number>): string => {
  if (!vars) return text
  return text.replace(/\{(\w+)\}/g, (match, name: string) =>
    name in vars ? String(vars[name]) : match
  )
}

interface I18nContextValue {
  locale: Locale
  setLocale: (locale: Locale) => void
  locales: readonly Locale[]
  t: (key: TranslationKey, vars?: Record<string, string | number>) => string
}

const I18nContext = createContext<I18nContextValue | null>(null)

interface I18nProviderProps {
  children: ReactNode
  preferences?: Preferences
}

export const I18nProvider: FC<I18nProviderProps> = ({ children, preferences }) => {
  const [locale, setLocaleState] = useState<Locale>('en')
  const [store] = useState(() => preferences ?? createPreferences(browserStorage()))

  useEffect(() => {
    setLocaleState(store.get('locale') ?? detectLocale(browserLanguages()))
  }, [store])

  useEffect(() => {
    if (typeof document === 'undefined') return
    document.documentElement.lang = locale
  }, [locale])

  const value = useMemo<I18nContextValue>(
    () => ({
      locale,
      setLocale: (next) => {
        store.set('locale', next)
        setLocaleState(next)
      },
      locales: supportedLocales,
      t: (key, vars) => interpolate(messages[locale][key] ?? messages.en[key] ?? key, vars)
    }),
    [locale, store]
  )

  return <I18nContext.Provider value={value}>{children}</I18nContext.Provider>
}

export const useI18n = (): I18nContextValue => {
  const context = useContext(I18nContext)
  if (!context) {
    throw new Error('useI18n must be used within I18nProvider')
  }
  return context
}

export { localeLabels }
export type { Locale, TranslationKey }
