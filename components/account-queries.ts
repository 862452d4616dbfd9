'use client'

import { useMutation, useQuery, useQueryClient } from '@tanstack/react-query'
import { useServices } from '@components/SessionProvider'
import type { SignUpInput } from '@lib/services/auth'
import type { CreateSubscriptionInput } from '@lib/services/payments'

export const accountKeys = {
  user: ['auth', 'me'] as const,
  paymentMethods: ['payments', 'methods'] as const,
  subscription: ['payments', 'subscription'] as const
}

export const useCurrentUser = () => {
  const { auth } = useServices()
  return useQuery({ queryKey: accountKeys.user, queryFn: () => auth.currentUser() })
}

export const useSignIn = () => {
  const { auth } = useServices()
  const queryClient = useQueryClient()
  return useMutation({
    mutationFn: ({ email, password }: { email: string; password: string }) =>
      auth.signIn(email, password),
    retry: false,
    onSuccess: (user) => queryClient.setQueryData(accountKeys.user, user)
  })
}

export const useSignUp = () => {
  const { auth } = useServices()
  const queryClient = useQueryClient()
  return useMutation({
    mutationFn: (input: SignUpInput) => auth.signUp(input),
    retry: false,
    onSuccess: (user) => queryClient.setQueryData(accountKeys.user, user)
  })
}

export const useSignOut = () => {
  const { auth } = useServices()
  const queryClient = useQueryClient()
  return useMutation({
    mutationFn: () => auth.signOut(),
    retry: false,
    onSuccess: () => {
      queryClient.setQueryData(accountKeys.user, null)
      queryClient.removeQueries({ queryKey: ['payments'] })
    }
  })
}

export const useResetPassword = () => {
  const { auth } = useServices()
  return useMutation({ mutationFn: (email: string) => auth.resetPassword(email), retry: false })
}

export const usePaymentMethods = (enabled: boolean) => {
  const { payments } = useServices()
  return useQuery({
    queryKey: accountKeys.paymentMethods,
    queryFn: () => payments.listPaymentMethods(),
    enabled
  })
}

export const useSubscription = (enabled: boolean) => {
  const { payments } = useServices()
  return useQuery({
    queryKey: accountKeys.subscription,
    queryFn: () => payments.getSubscription(),
    enabled
  })
}

const useInvalidateBilling = () => {
  const queryClient = useQueryClient()
  return async () => {
    await Promise.all([
      queryClient.invalidateQueries({ queryKey: ['payments'] }),
      queryClient.invalidateQueries({ queryKey: accountKeys.user })
    ])
  }
}

export const useCreateSubscription = () => {
  const { payments } = useServices()
  const invalidate = useInvalidateBilling()
  return useMutation({
    mutationFn: (input: CreateSubscriptionInput) => payments.createSubscription(input),
    retry: false,
    onSuccess: invalidate
  })
}

export const useCancelSubscription = () => {
  const { payments } = useServices()
  const invalidate = useInvalidateBilling()
  return useMutation({
    mutationFn: (subscriptionId: string) =>
      payments.cancelSubscription(subscriptionId, { immediately: false }),
    retry: false,
    onSuccess: invalidate
  })
}

export const useSetDefaultPaymentMethod = () => {
  const { payments } = useServices()
  const invalidate = useInvalidateBilling()
  return useMutation({
    mutationFn: (paymentMethodId: string) => payments.setDefault(paymentMethodId),
    onSuccess: invalidate
  })
}

export const useDeletePaymentMethod = () => {
  const { payments } = useServices()
  const invalidate = useInvalidateBilling()
  return useMutation({
    mutationFn: (paymentMethodId: string) => payments.delete(paymentMethodId),
    onSuccess: invalidate
  })
}
