import { z } from 'zod'
import { BILLING_INTERVALS, PLAN_IDS, type BillingInterval, type PlanId } from '@data/plans'
import type { AppConfig } from '@lib/config'
import { PaymentError, ValidationError } from '@lib/errors'
import { createLogger, type Logger } from '@lib/logger'
import { createHttpClient, type FetchLike } from './http'

export const paymentMethodSchema = z.object({
  id: z.string(),
  brand: z.string(),
  last4: z.string(),
  expMonth: z.number().int(),
  expYear: z.number().int(),
  isDefault: z.boolean()
})

export const subscriptionSchema = z.object({
  id: z.string(),
  plan: z.enum(PLAN_IDS),
  interval: z.enum(BILLING_INTERVALS),
  status: z.enum([
    'active',
    'trialing',
    'past_due',
    'canceled',
    'unpaid',
    'incomplete',
    'incomplete_expired',
    'paused'
  ]),
  currentPeriodEnd: z.string(),
  cancelAtPeriodEnd: z.boolean()
})

export type PaymentMethod = z.infer<typeof paymentMethodSchema>
export type Subscription = z.infer<typeof subscriptionSchema>

export interface CreateSubscriptionInput {
  plan: PlanId
  interval: BillingInterval
  paymentMethodId?: string
}

export interface PaymentService {
  listPaymentMethods: () => Promise<PaymentMethod[]>
  setDefault: (paymentMethodId: string) => Promise<void>
  delete: (paymentMethodId: string) => Promise<void>
  getSubscription: () => Promise<Subscription | null>
  createSubscription: (input: CreateSubscriptionInput) => Promise<Subscription>
  cancelSubscription: (subscriptionId: string, options: { immediately: boolean }) => Promise<Subscription>
}

export interface HttpPaymentServiceOptions {
  config: AppConfig
  getToken: () => string | null
  fetch?: FetchLike
  logger?: Logger
}

const methodsSchema = z.object({ paymentMethods: z.array(paymentMethodSchema) })
const currentSubscriptionSchema = z.object({ subscription: subscriptionSchema.nullable() })
const subscriptionResponseSchema = z.object({ subscription: subscriptionSchema })

const requireId = (id: string, label: string): string => {
  const trimmed = id.trim()
  if (!trimmed) throw new ValidationError(`Missing ${label}.`)
  return encodeURIComponent(trimmed)
}

export const createHttpPaymentService = ({
  config,
  getToken,
  fetch,
  logger = createLogger('payments')
}: HttpPaymentServiceOptions): PaymentService => {
  const http = createHttpClient({
    baseUrl: config.backendUrl,
    fetch,
    getToken,
    toError: (message, status) => new PaymentError(message, status),
    logger
  })

  return {
    listPaymentMethods: async () => {
      const { paymentMethods } = await http.request('GET', '/payments/methods', {
        schema: methodsSchema
      })
      return paymentMethods
    },

    setDefault: async (paymentMethodId) => {
      await http.request('POST', `/payments/methods/${requireId(paymentMethodId, 'payment method')}/default`, {
        schema: z.unknown()
      })
    },

    delete: async (paymentMethodId) => {
      await http.request('DELETE', `/payments/methods/${requireId(paymentMethodId, 'payment method')}`, {
        schema: z.unknown()
      })
    },

    getSubscription: async () => {
      const { subscription } = await http.request('GET', '/subscriptions/current', {
        schema: currentSubscriptionSchema
      })
      return subscription
    },

    createSubscription: async ({ plan, interval, paymentMethodId }) => {
      if (plan === 'free') {
        throw new ValidationError('The free plan does not need a subscription.')
      }
      const { subscription } = await http.request('POST', '/subscriptions', {
        body: { plan, interval, paymentMethodId },
        schema: subscriptionResponseSchema
      })
      logger.info(`subscribed to ${subscription.plan} (${subscription.interval})`)
      return subscription
    },

    cancelSubscription: async (subscriptionId, { immediately }) => {
      const { subscription } = await http.request(
        'POST',
        `/subscriptions/${requireId(subscriptionId, 'subscription')}/cancel`,
        { body: { immediately }, schema: subscriptionResponseSchema }
      )
      logger.info(`cancelled subscription ${subscription.id}`, { immediately })
      return subscription
    }
  }
}
