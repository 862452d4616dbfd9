import type { enMessages } from './locales/en'

export type Locale = 'en' | 'es' | 'pt-BR'
export type TranslationKey = keyof typeof enMessages
export type LocaleMessages = Record<TranslationKey, string>
