export type AppErrorKind = 'validation' | 'network' | 'auth' | 'payment' | 'slot'

export class AppError extends Error {
  readonly kind: AppErrorKind

  constructor(kind: AppErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'AppError'
    this.kind = kind
  }
}

export class ValidationError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('validation', message, options)
    this.name = 'ValidationError'
  }
}

export class NetworkError extends AppError {
  readonly status: number | null

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super('network', message, options)
    this.name = 'NetworkError'
    this.status = status
  }
}

export class AuthError extends AppError {
  readonly status: number | null

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super('auth', message, options)
    this.name = 'AuthError'
    this.status = status
  }
}

export class PaymentError extends AppError {
  readonly status: number | null

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super('payment', message, options)
    this.name = 'PaymentError'
    this.status = status
  }
}

export type SlotErrorCode = 'out-of-range' | 'duplicate' | 'limit' | 'no-free-slot'

export class SlotError extends AppError {
  readonly code: SlotErrorCode

  constructor(code: SlotErrorCode, message: string) {
    super('slot', message)
    this.name = 'SlotError'
    this.code = code
  }
}

export const isAppError = (error: unknown): error is AppError => error instanceof AppError

const DEFAULT_MESSAGE = 'Something went wrong. Please try again.'

export const toUserMessage = (error: unknown, fallback: string = DEFAULT_MESSAGE): string => {
  if (isAppError(error)) return error.message || fallback
  if (error instanceof TypeError && /fetch|network/i.test(error.message)) {
    return 'Network unavailable. Check your connection and try again.'
  }
  if (error instanceof Error && error.message.trim()) return error.message
  if (typeof error === 'string' && error.trim()) return error
  return fallback
}
