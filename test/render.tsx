import { render, type RenderResult } from '@testing-library/react'
import type { ReactElement } from 'react'
import { vi } from 'vitest'
import { I18nProvider } from '@components/i18n'
import { QueryProvider, createQueryClient } from '@components/QueryProvider'
import { SessionProvider, type SessionServices } from '@components/SessionProvider'
import { createAppConfig, type AppEnv } from '@lib/config'
import { createStreamLibrary } from '@lib/library/stream-library'
import { silentLogger } from '@lib/logger'
import { createMultiStreamSession } from '@lib/multistream/session'
import type { AuthService } from '@lib/services/auth'
import type { PaymentService } from '@lib/services/payments'
import { createMemoryStorage, createPreferences, type KeyValueStorage } from '@lib/settings/preferences'

export const createFakeAuth = (overrides: Partial<AuthService> = {}): AuthService => ({
  currentUser: vi.fn(async () => null),
  signIn: vi.fn(),
  signUp: vi.fn(),
  signOut: vi.fn(async () => undefined),
  resetPassword: vi.fn(async () => undefined),
  oauthUrl: vi.fn((provider: string) => `http://localhost:4000/auth/oauth/${provider}`),
  ...overrides
})

export const createFakePayments = (overrides: Partial<PaymentService> = {}): PaymentService => ({
  listPaymentMethods: vi.fn(async () => []),
  setDefault: vi.fn(async () => undefined),
  delete: vi.fn(async () => undefined),
  getSubscription: vi.fn(async () => null),
  createSubscription: vi.fn(),
  cancelSubscription: vi.fn(),
  ...overrides
})

export interface TestServicesOptions {
  env?: AppEnv
  storage?: KeyValueStorage
  auth?: AuthService
  payments?: PaymentService
}

export const createTestServices = ({
  env = {},
  storage = createMemoryStorage(),
  auth,
  payments
}: TestServicesOptions = {}): SessionServices => {
  const config = createAppConfig({ NEXT_PUBLIC_LOG_LEVEL: 'error', ...env })
  const preferences = createPreferences(storage, silentLogger)
  let nextId = 0
  return {
    config,
    preferences,
    session: createMultiStreamSession({
      config,
      preferences,
      logger: silentLogger,
      createSlotId: () => `slot-${nextId++}`
    }),
    library: createStreamLibrary({ preferences, logger: silentLogger }),
    auth: auth ?? createFakeAuth(),
    payments: payments ?? createFakePayments()
  }
}

export const renderWithProviders = (
  ui: ReactElement,
  services: SessionServices = createTestServices()
): RenderResult & { services: SessionServices } => {
  const client = createQueryClient()
  const result = render(
    <QueryProvider client={client}>
      <I18nProvider preferences={services.preferences}>
        <SessionProvider services={services}>{ui}</SessionProvider>
      </I18nProvider>
    </QueryProvider>
  )
  return { ...result, services }
}
