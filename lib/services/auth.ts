import { z } from 'zod'
import { PLAN_IDS } from '@data/plans'
import type { AppConfig } from '@lib/config'
import { AuthError, ValidationError } from '@lib/errors'
import { createLogger, type Logger } from '@lib/logger'
import type { Preferences } from '@lib/settings/preferences'
import { createHttpClient, type FetchLike } from './http'

export const userSchema = z.object({
  id: z.string(),
  email: z.string(),
  firstName: z.string().nullable(),
  lastName: z.string().nullable(),
  plan: z.enum(PLAN_IDS).catch('free')
})

export type AuthUser = z.infer<typeof userSchema>
export type OAuthProvider = 'google' | 'apple'

export interface SignUpInput {
  email: string
  password: string
  firstName: string
  lastName: string
}

export interface AuthService {
  currentUser: () => Promise<AuthUser | null>
  signIn: (email: string, password: string) => Promise<AuthUser>
  signUp: (input: SignUpInput) => Promise<AuthUser>
  signOut: () => Promise<void>
  resetPassword: (email: string) => Promise<void>
  oauthUrl: (provider: OAuthProvider, redirectUrl: string) => string
}

export interface TokenStore {
  get: () => string | null
  set: (token: string) => void
  clear: () => void
}

const TOKEN_KEY = 'auth_token_v1'
const MIN_PASSWORD_LENGTH = 8
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/

export const createTokenStore = (preferences: Preferences): TokenStore => ({
  get: () => preferences.readJson(TOKEN_KEY, z.string().min(1)),
  set: (token) => preferences.writeJson(TOKEN_KEY, token),
  clear: () => preferences.remove(TOKEN_KEY)
})

const sessionSchema = z.object({ token: z.string().min(1), user: userSchema })
const meSchema = z.object({ user: userSchema })

const requireEmail = (email: string): string => {
  const trimmed = email.trim().toLowerCase()
  if (!EMAIL_PATTERN.test(trimmed)) {
    throw new ValidationError('Enter a valid email address.')
  }
  return trimmed
}

const requirePassword = (password: string): string => {
  if (password.length < MIN_PASSWORD_LENGTH) {
    throw new ValidationError(`Passwords need at least ${MIN_PASSWORD_LENGTH} characters.`)
  }
  return password
}

const requireName = (value: string, label: string): string => {
  const trimmed = value.trim()
  if (!trimmed) throw new ValidationError(`Enter your ${label}.`)
  return trimmed
}

export interface HttpAuthServiceOptions {
  config: AppConfig
  tokens: TokenStore
  fetch?: FetchLike
  logger?: Logger
}

export const createHttpAuthService = ({
  config,
  tokens,
  fetch,
  logger = createLogger('auth')
}: HttpAuthServiceOptions): AuthService => {
  const http = createHttpClient({
    baseUrl: config.backendUrl,
    fetch,
    getToken: tokens.get,
    toError: (message, status) => new AuthError(message, status),
    logger
  })

  const startSession = async (path: string, body: Record<string, string>): Promise<AuthUser> => {
    const session = await http.request('POST', path, { body, schema: sessionSchema })
    tokens.set(session.token)
    logger.info(`signed in as ${session.user.id}`)
    return session.user
  }

  return {
    currentUser: async () => {
      if (!tokens.get()) return null
      try {
        const { user } = await http.request('GET', '/auth/me', { schema: meSchema })
        return user
      } catch (error) {
        if (error instanceof AuthError && error.status === 401) {
          logger.info('stored session expired')
          tokens.clear()
          return null
        }
        throw error
      }
    },

    signIn: async (email, password) =>
      startSession('/auth/sign-in', {
        email: requireEmail(email),
        password: requirePassword(password)
      }),

    signUp: async ({ email, password, firstName, lastName }) =>
      startSession('/auth/sign-up', {
        email: requireEmail(email),
        password: requirePassword(password),
        firstName: requireName(firstName, 'first name'),
        lastName: requireName(lastName, 'last name')
      }),

    signOut: async () => {
      if (!tokens.get()) return
      try {
        await http.request('POST', '/auth/sign-out', { schema: z.unknown() })
      } catch (error) {
        logger.warn('sign-out request failed; clearing the local session anyway', error)
      } finally {
        tokens.clear()
      }
    },

    resetPassword: async (email) => {
      await http.request('POST', '/auth/reset-password', {
        body: { email: requireEmail(email) },
        schema: z.unknown()
      })
    },

    oauthUrl: (provider, redirectUrl) =>
      `${config.backendUrl}/auth/oauth/${provider}?${new URLSearchParams({ redirect_uri: redirectUrl }).toString()}`
  }
}
