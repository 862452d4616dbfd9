'use client'

import { QueryClient, QueryClientProvider } from '@tanstack/react-query'
import type { FC, ReactNode } from 'react'
import { useState } from 'react'
import { isAppError } from '@lib/errors'

const MAX_QUERY_RETRIES = 1

// Validation and auth failures will not change on a second attempt.
export const shouldRetry = (failureCount: number, error: unknown): boolean => {
  if (isAppError(error) && (error.kind === 'validation' || error.kind === 'auth')) return false
  return failureCount < MAX_QUERY_RETRIES
}

export const createQueryClient = (): QueryClient =>
  new QueryClient({
    defaultOptions: {
      queries: {
        refetchOnWindowFocus: true,
        retry: shouldRetry,
        staleTime: 60_000
      },
      mutations: {
        retry: false
      }
    }
  })

export const QueryProvider: FC<{ children: ReactNode; client?: QueryClient }> = ({ children, client }) => {
  const [queryClient] = useState(() => client ?? createQueryClient())

  return <QueryClientProvider client={queryClient}>{children}</QueryClientProvider>
}
