import type { Locale } from './types'

export const supportedLocales = ['en', 'es', 'pt-BR'] as const satisfies readonly Locale[]

export const localeLabels: Record<Locale, string> = {
  en: 'English',
  es: 'Español',
  'pt-BR': 'Português (Brasil)'
}
