import { useQuery } from '@tanstack/react-query'
import type { BillingRun } from '@/types/billing'

async function fetchBillingRun(): Promise<BillingRun> {
  const response = await fetch('/api/billing')

  if (!response.ok) {
    const body: { error?: string } = await response.json().catch(() => ({}))
    throw new Error(body.error ?? `Failed to run billing (${response.status})`)
  }

  return response.json()
}

/**
 * Hook to fetch the billing run of the configured period
 */
export function useBillingRun() {
  return useQuery({
    queryKey: ['billingRun'],
    queryFn: fetchBillingRun,
    staleTime: 5 * 60 * 1000, // 5 minutes
    retry: false,
  })
}
