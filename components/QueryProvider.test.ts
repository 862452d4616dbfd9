import { describe, expect, it } from 'vitest'
import { AuthError, NetworkError, ValidationError } from '@lib/errors'
import { shouldRetry } from './QueryProvider'

describe('shouldRetry', () => {
  it('retries transient failures once', () => {
    expect(shouldRetry(0, new NetworkError('offline'))).toBe(true)
    expect(shouldRetry(1, new NetworkError('offline'))).toBe(false)
  })

  it('never retries validation or auth failures', () => {
    expect(shouldRetry(0, new ValidationError('bad input'))).toBe(false)
    expect(shouldRetry(0, new AuthError('expired', 401))).toBe(false)
  })
})
