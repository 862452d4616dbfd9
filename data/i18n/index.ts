import { localeLabels, supportedLocales } from './config'
import { enMessages } from './locales/en'
import { esMessages } from './locales/es'
import { ptBrMessages } from './locales/ptBr'
import type { Locale, LocaleMessages, TranslationKey } from './types'

export const messages: Record<Locale, LocaleMessages> = {
  en: enMessages,
  es: esMessages,
  'pt-BR': ptBrMessages
}

export { localeLabels, supportedLocales }
export type { Locale, LocaleMessages, TranslationKey }
