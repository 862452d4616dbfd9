'use client'

import { useState } from 'react'
import type { FC } from 'react'
import { Check, CreditCard, Trash2 } from 'lucide-react'
import { useI18n } from '@components/i18n'
import {
  useCancelSubscription,
  useCreateSubscription,
  useCurrentUser,
  useDeletePaymentMethod,
  usePaymentMethods,
  useSetDefaultPaymentMethod,
  useSubscription
} from '@components/account-queries'
import { BILLING_INTERVALS, PLANS, yearlySavingsPercent, type BillingInterval } from '@data/plans'
import { toUserMessage } from '@lib/errors'
import { Button } from '@ui/button'
import { Dialog, DialogContent, DialogHeader, DialogTitle } from '@ui/dialog'

interface SubscriptionDialogProps {
  open: boolean
  onOpenChange: (open: boolean) => void
}

const formatPrice = (amount: number): string =>
  new Intl.NumberFormat('en-US', { style: 'currency', currency: 'USD' }).format(amount)

export const SubscriptionDialog: FC<SubscriptionDialogProps> = ({ open, onOpenChange }) => {
  const { t, locale } = useI18n()
  const [interval, setBillingInterval] = useState<BillingInterval>('monthly')
  const user = useCurrentUser()
  const isSignedIn = Boolean(user.data)
  const methods = usePaymentMethods(open && isSignedIn)
  const subscription = useSubscription(open && isSignedIn)
  const create = useCreateSubscription()
  const cancel = useCancelSubscription()
  const setDefault = useSetDefaultPaymentMethod()
  const remove = useDeletePaymentMethod()

  const currentPlan = user.data?.plan ?? 'free'
  const defaultMethod = methods.data?.find((method) => method.isDefault)
  const active = subscription.data
  const error =
    create.error ?? cancel.error ?? setDefault.error ?? remove.error ?? methods.error ?? subscription.error

  return (
    <Dialog open={open} onOpenChange={onOpenChange}>
      <DialogContent closeLabel={t('common.close')} className="sm:max-w-2xl">
        <DialogHeader>
          <DialogTitle>{t('subscription.title')}</DialogTitle>
        </DialogHeader>

        {!isSignedIn ? (
          <p className="text-sm text-gray-400">{t('subscription.signInRequired')}</p>
        ) : (
          <div className="space-y-4">
            <div className="inline-flex rounded border border-gray-700 p-0.5" role="group">
              {BILLING_INTERVALS.map((option) => (
                <button
                  key={option}
                  type="button"
                  aria-pressed={interval === option}
                  onClick={() => setBillingInterval(option)}
                  className={`px-3 py-1 text-sm rounded ${
                    interval === option ? 'bg-gray-800 text-white' : 'text-gray-400 hover:text-white'
                  }`}
                >
                  {t(option === 'monthly' ? 'subscription.monthly' : 'subscription.yearly')}
                </button>
              ))}
            </div>

            <div className="grid grid-cols-1 sm:grid-cols-2 lg:grid-cols-3 gap-3">
              {PLANS.filter((plan) => plan.id !== 'free').map((plan) => {
                const isCurrent = plan.id === currentPlan
                const savings = yearlySavingsPercent(plan.id)
                return (
                  <div
                    key={plan.id}
                    className={`rounded-lg border p-3 space-y-2 ${
                      isCurrent ? 'border-blue-500 bg-gray-800/60' : 'border-gray-800 bg-gray-950/50'
                    }`}
                  >
                    <p className="font-semibold text-white">{plan.name}</p>
                    <p className="text-sm text-gray-300">
                      {formatPrice(plan.prices[interval])}
                      <span className="text-gray-500">
                        {t(interval === 'monthly' ? 'subscription.perMonth' : 'subscription.perYear')}
                      </span>
                    </p>
                    {interval === 'yearly' && savings > 0 && (
                      <p className="text-xs text-green-400">{t('subscription.save', { percent: savings })}</p>
                    )}
                    <p className="text-xs text-gray-400">
                      {plan.maxStreams === null
                        ? t('subscription.unlimited')
                        : t('subscription.streams', { count: plan.maxStreams })}
                    </p>
                    {isCurrent ? (
                      <p className="text-xs text-blue-400 flex items-center gap-1">
                        <Check className="size-3" />
                        {t('subscription.current')}
                      </p>
                    ) : (
                      <Button
                        size="sm"
                        className="w-full"
                        disabled={create.isPending}
                        onClick={() =>
                          create.mutate({ plan: plan.id, interval, paymentMethodId: defaultMethod?.id })
                        }
                      >
                        {t('subscription.choose', { plan: plan.name })}
                      </Button>
                    )}
                  </div>
                )
              })}
            </div>

            {active && active.status !== 'canceled' && (
              <div className="flex items-center justify-between gap-3 text-sm">
                <span className="text-gray-400">
                  {active.cancelAtPeriodEnd
                    ? t('subscription.endsOn', {
                        date: new Date(active.currentPeriodEnd).toLocaleDateString(locale)
                      })
                    : null}
                </span>
                {!active.cancelAtPeriodEnd && (
                  <Button
                    variant="destructive"
                    size="sm"
                    disabled={cancel.isPending}
                    onClick={() => cancel.mutate(active.id)}
                  >
                    {t('subscription.cancel')}
                  </Button>
                )}
              </div>
            )}

            <section className="space-y-2">
              <h3 className="text-xs font-semibold uppercase text-gray-400">
                {t('subscription.paymentMethods')}
              </h3>
              {methods.data && methods.data.length === 0 && (
                <p className="text-sm text-gray-500">{t('subscription.noPaymentMethods')}</p>
              )}
              {methods.data?.map((method) => (
                <div
                  key={method.id}
                  className="flex items-center gap-3 rounded border border-gray-800 bg-gray-950/50 px-3 py-2 text-sm"
                >
                  <CreditCard className="size-4 text-gray-400" />
                  <span className="flex-1 text-gray-200">
                    {method.brand} •••• {method.last4}
                    <span className="ml-2 text-xs text-gray-500">
                      {t('subscription.expires', {
                        month: String(method.expMonth).padStart(2, '0'),
                        year: method.expYear
                      })}
                    </span>
                  </span>
                  {method.isDefault ? (
                    <span className="text-xs text-blue-400">{t('subscription.default')}</span>
                  ) : (
                    <Button
                      variant="ghost"
                      size="sm"
                      disabled={setDefault.isPending}
                      onClick={() => setDefault.mutate(method.id)}
                    >
                      {t('subscription.makeDefault')}
                    </Button>
                  )}
                  <Button
                    variant="ghost"
                    size="icon"
                    aria-label={t('subscription.delete')}
                    disabled={remove.isPending}
                    onClick={() => remove.mutate(method.id)}
                  >
                    <Trash2 className="size-4" />
                  </Button>
                </div>
              ))}
            </section>

            {error && (
              <p role="alert" className="text-xs text-red-300">
                {toUserMessage(error)}
              </p>
            )}
          </div>
        )}
      </DialogContent>
    </Dialog>
  )
}
