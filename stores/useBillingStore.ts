import { create } from 'zustand'
import { persist } from 'zustand/middleware'

export type BillView = 'table' | 'chart'

export interface BillingFilters {
  selectedPeriod: string | null
  selectedMembers: string[]
  view: BillView
}

interface BillingStore extends BillingFilters {
  setSelectedPeriod: (period: string | null) => void
  toggleMember: (memberId: string) => void
  setView: (view: BillView) => void
  resetFilters: () => void
}

const initialState: BillingFilters = {
  selectedPeriod: null,
  selectedMembers: [],
  view: 'table',
}

export const useBillingStore = create<BillingStore>()(
  persist(
    (set, get) => ({
      ...initialState,

      setSelectedPeriod: (period) => set({ selectedPeriod: period }),

      toggleMember: (memberId) => {
        const current = get().selectedMembers
        const updated = current.includes(memberId)
          ? current.filter((m) => m !== memberId)
          : [...current, memberId]
        set({ selectedMembers: updated })
      },

      setView: (view) => set({ view }),

      resetFilters: () => set(initialState),
    }),
    {
      name: 'billing-filters',
      version: 1,
      partialize: (state) => ({
        selectedPeriod: state.selectedPeriod,
        selectedMembers: state.selectedMembers,
        view: state.view,
      }),
    }
  )
)
