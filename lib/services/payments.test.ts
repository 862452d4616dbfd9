// @vitest-environment node
import { describe, it, expect, vi } from 'vitest'
import { createAppConfig } from '@lib/config'
import { PaymentError, ValidationError } from '@lib/errors'
import { silentLogger } from '@lib/logger'
import type { FetchLike } from './http'
import { createHttpPaymentService } from './payments'

const config = createAppConfig({ NEXT_PUBLIC_BACKEND_URL: 'https://api.test' })

const subscription = {
  id: 'sub_1',
  plan: 'premium',
  interval: 'yearly',
  status: 'active',
  currentPeriodEnd: '2026-01-01T00:00:00.000Z',
  cancelAtPeriodEnd: false
}

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } })

const setup = () => {
  const fetch = vi.fn<FetchLike>()
  const payments = createHttpPaymentService({
    config,
    getToken: () => 'test-token',
    fetch,
    logger: silentLogger
  })
  return { payments, fetch }
}

describe('createHttpPaymentService', () => {
  it('lists payment methods', async () => {
    const { payments, fetch } = setup()
    const method = { id: 'pm_1', brand: 'visa', last4: '4242', expMonth: 4, expYear: 2030, isDefault: true }
    fetch.mockResolvedValue(jsonResponse({ paymentMethods: [method] }))

    await expect(payments.listPaymentMethods()).resolves.toEqual([method])
    expect(fetch.mock.calls[0][0]).toBe('https://api.test/payments/methods')
  })

  it('sets the default method and deletes methods', async () => {
    const { payments, fetch } = setup()
    fetch.mockImplementation(async () => new Response(null, { status: 204 }))

    await payments.setDefault('pm_1')
    await payments.delete('pm 2')

    expect(fetch.mock.calls.map(([url, init]) => [init?.method, url])).toEqual([
      ['POST', 'https://api.test/payments/methods/pm_1/default'],
      ['DELETE', 'https://api.test/payments/methods/pm%202']
    ])
    await expect(payments.delete('  ')).rejects.toBeInstanceOf(ValidationError)
  })

  it('reads the current subscription, which may be absent', async () => {
    const { payments, fetch } = setup()
    fetch.mockResolvedValueOnce(jsonResponse({ subscription: null }))
    fetch.mockResolvedValueOnce(jsonResponse({ subscription }))

    await expect(payments.getSubscription()).resolves.toBeNull()
    await expect(payments.getSubscription()).resolves.toEqual(subscription)
  })

  it('creates subscriptions for paid plans only', async () => {
    const { payments, fetch } = setup()
    fetch.mockResolvedValue(jsonResponse({ subscription }))

    await expect(payments.createSubscription({ plan: 'free', interval: 'monthly' })).rejects.toBeInstanceOf(
      ValidationError
    )
    await expect(
      payments.createSubscription({ plan: 'premium', interval: 'yearly', paymentMethodId: 'pm_1' })
    ).resolves.toEqual(subscription)
    expect(fetch).toHaveBeenCalledTimes(1)
    expect(fetch.mock.calls[0][1]?.body).toBe('{"plan":"premium","interval":"yearly","paymentMethodId":"pm_1"}')
  })

  it('cancels a subscription', async () => {
    const { payments, fetch } = setup()
    fetch.mockResolvedValue(jsonResponse({ subscription: { ...subscription, cancelAtPeriodEnd: true } }))

    const cancelled = await payments.cancelSubscription('sub_1', { immediately: false })
    expect(cancelled.cancelAtPeriodEnd).toBe(true)
    expect(fetch.mock.calls[0][0]).toBe('https://api.test/subscriptions/sub_1/cancel')
    expect(fetch.mock.calls[0][1]?.body).toBe('{"immediately":false}')
  })

  it('turns backend rejections into payment errors', async () => {
    const { payments, fetch } = setup()
    fetch.mockResolvedValue(jsonResponse({ error: { message: 'Your card was declined.' } }, 402))

    const failure = payments.createSubscription({ plan: 'basic', interval: 'monthly' })
    await expect(failure).rejects.toBeInstanceOf(PaymentError)
    await expect(failure).rejects.toMatchObject({ status: 402, message: 'Your card was declined.' })
  })
})
