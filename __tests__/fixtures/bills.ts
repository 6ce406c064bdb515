/**
 * Bill records for component tests
 */

import type { Bill, BillingPeriod } from '@/types/billing';
import { RATES } from './collective';

export function period(key: string, start: string, end: string): BillingPeriod {
  return { key, kind: 'monthly', start, end, months: [key] };
}

export const JANUARY = period('2024-01', '2024-01-01', '2024-02-01');
export const FEBRUARY = period('2024-02', '2024-02-01', '2024-03-01');

export function bill(overrides: Partial<Bill> = {}): Bill {
  return {
    memberId: 'tenant',
    memberName: 'Tobias Amstutz',
    isHost: false,
    isProducer: false,
    period: JANUARY,
    currency: 'CHF',
    consumptionKwh: 100,
    localKwh: 60,
    gridKwh: 40,
    productionKwh: 0,
    localSoldKwh: 0,
    exportKwh: 0,
    rates: { ...RATES, appliedLocalRate: RATES.localRate },
    localCost: 12,
    gridCost: 12,
    fees: [],
    feesTotal: 0,
    totalCost: 24,
    localSellRevenue: 0,
    exportRevenue: 0,
    totalRevenue: 0,
    netAmount: 24,
    vatRate: 0,
    localCostInclVat: 12,
    gridCostInclVat: 12,
    feesTotalInclVat: 0,
    vatAmount: 0,
    totalCostInclVat: 24,
    grandTotal: 24,
    dailyDetails: [],
    ...overrides,
  };
}

export function hostBill(overrides: Partial<Bill> = {}): Bill {
  return bill({
    memberId: 'host',
    memberName: 'Hanna Huber',
    isHost: true,
    isProducer: true,
    consumptionKwh: 50,
    localKwh: 50,
    gridKwh: 0,
    productionKwh: 150,
    localSoldKwh: 60,
    exportKwh: 40,
    rates: { ...RATES, appliedLocalRate: 0 },
    localCost: 0,
    gridCost: 0,
    totalCost: 0,
    localSellRevenue: 12,
    exportRevenue: 4,
    totalRevenue: 16,
    netAmount: -16,
    localCostInclVat: 0,
    gridCostInclVat: 0,
    totalCostInclVat: 0,
    grandTotal: -16,
    ...overrides,
  });
}
