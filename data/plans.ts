export type PlanId = 'free' | 'basic' | 'premium' | 'pro' | 'enterprise'
export type BillingInterval = 'monthly' | 'yearly'

export const PLAN_IDS = ['free', 'basic', 'premium', 'pro', 'enterprise'] as const satisfies readonly PlanId[]
export const BILLING_INTERVALS = ['monthly', 'yearly'] as const satisfies readonly BillingInterval[]

export interface PlanDefinition {
  id: PlanId
  name: string
  prices: Record<BillingInterval, number>
  // null means no limit
  maxStreams: number | null
}

export const PLANS: PlanDefinition[] = [
  { id: 'free', name: 'Free', prices: { monthly: 0, yearly: 0 }, maxStreams: 4 },
  { id: 'basic', name: 'Basic', prices: { monthly: 4.99, yearly: 49.99 }, maxStreams: 8 },
  { id: 'premium', name: 'Premium', prices: { monthly: 9.99, yearly: 99.99 }, maxStreams: 16 },
  { id: 'pro', name: 'Pro', prices: { monthly: 19.99, yearly: 199.99 }, maxStreams: 50 },
  {
    id: 'enterprise',
    name: 'Enterprise',
    prices: { monthly: 49.99, yearly: 499.99 },
    maxStreams: null
  }
]

export const planById = (id: PlanId): PlanDefinition =>
  PLANS.find((plan) => plan.id === id) ?? PLANS[0]

export const streamLimitFor = (id: PlanId | null | undefined): number | null =>
  planById(id ?? 'free').maxStreams

/** Whole-percent saving of the yearly price over twelve monthly payments. */
export const yearlySavingsPercent = (id: PlanId): number => {
  const { prices } = planById(id)
  const twelveMonths = prices.monthly * 12
  if (twelveMonths === 0) return 0
  return Math.round(((twelveMonths - prices.yearly) / twelveMonths) * 100)
}
