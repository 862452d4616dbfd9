'use client'

import { createContext, useContext, useEffect, useState } from 'react'
import type { FC, ReactNode } from 'react'
import { useStore } from 'zustand'
import { appConfig, type AppConfig } from '@lib/config'
import { createStreamLibrary, type LibraryStore, type LibraryState } from '@lib/library/stream-library'
import { createLogger, setDefaultLogLevel } from '@lib/logger'
import { createMultiStreamSession, type MultiStreamSession } from '@lib/multistream/session'
import type { AudioFocusState } from '@lib/multistream/audio-focus'
import type { SlotState } from '@lib/multistream/slot-store'
import type { LayoutState } from '@lib/multistream/session'
import { createHttpAuthService, createTokenStore, type AuthService } from '@lib/services/auth'
import { createHttpPaymentService, type PaymentService } from '@lib/services/payments'
import { browserStorage, createPreferences, type Preferences } from '@lib/settings/preferences'

export interface SessionServices {
  config: AppConfig
  preferences: Preferences
  session: MultiStreamSession
  library: LibraryStore
  auth: AuthService
  payments: PaymentService
}

const logger = createLogger('session-provider')

export const createSessionServices = (config: AppConfig = appConfig): SessionServices => {
  setDefaultLogLevel(config.logLevel)
  const preferences = createPreferences(browserStorage())
  const tokens = createTokenStore(preferences)
  return {
    config,
    preferences,
    session: createMultiStreamSession({ config, preferences, autoSave: true }),
    library: createStreamLibrary({ preferences }),
    auth: createHttpAuthService({ config, tokens }),
    payments: createHttpPaymentService({ config, getToken: tokens.get })
  }
}

const SessionContext = createContext<SessionServices | null>(null)

interface SessionProviderProps {
  children: ReactNode
  fallback?: ReactNode
  // Injected by tests; the browser build creates its own on mount.
  services?: SessionServices
}

export const SessionProvider: FC<SessionProviderProps> = ({ children, fallback = null, services }) => {
  const [value, setValue] = useState<SessionServices | null>(services ?? null)

  // Created after mount so the server render never touches localStorage.
  useEffect(() => {
    if (services) return
    const created = createSessionServices()
    if (created.session.restoreSnapshot()) logger.info('restored previous session')
    setValue(created)
    return () => {
      created.session.dispose()
    }
  }, [services])

  if (!value) return <>{fallback}</>
  return <SessionContext.Provider value={value}>{children}</SessionContext.Provider>
}

export const useServices = (): SessionServices => {
  const context = useContext(SessionContext)
  if (!context) {
    throw new Error('useServices must be used within SessionProvider')
  }
  return context
}

export const useSession = (): MultiStreamSession => useServices().session

export const useSlots = <T,>(selector: (state: SlotState) => T): T =>
  useStore(useSession().slots, selector)

export const useAudio = <T,>(selector: (state: AudioFocusState) => T): T =>
  useStore(useSession().audio, selector)

export const useLayout = <T,>(selector: (state: LayoutState) => T): T =>
  useStore(useSession().layout, selector)

export const useLibrary = <T,>(selector: (state: LibraryState) => T): T =>
  useStore(useServices().library, selector)
