/**
 * Billing Types
 *
 * Records produced by the completeness check, the solar allocation and the
 * billing aggregation. Everything here is derived data: recomputing from the
 * same readings and configuration yields identical records.
 */

import type { BillingIntervalKind, FeeKind, FeeBasis, CollectiveRates } from './collective';
import type { MonthKey, Slot } from './meter';

// ============================================================================
// Completeness
// ============================================================================

export interface MonthStatus {
  month: MonthKey;
  billable: boolean;
  expectedSlots: number;
  missing: Record<string, number>;      // Every physical meter, 0 when complete
  gaps: Record<string, Slot[]>;         // Only meters with missing slots
  unexpected: Record<string, number>;   // Valid readings off the slot grid
  warnings: string[];
}

// ============================================================================
// Allocation
// ============================================================================

export interface AllocationResult {
  memberId: string;
  slot: string;                 // Slot start (UTC)
  localDate: string;
  consumptionKwh: number;
  localKwh: number;             // Local solar consumed
  gridKwh: number;              // Drawn from the grid
  productionKwh: number;
  localSoldKwh: number;         // Own production consumed by other members
  exportKwh: number;            // Own production exported to the grid
}

export interface SlotAllocation {
  slot: string;
  localDate: string;
  totalProductionKwh: number;
  totalConsumptionKwh: number;
  locallyConsumedKwh: number;
  surplusExportKwh: number;
  members: AllocationResult[];
}

export interface MonthAllocation {
  month: MonthKey;
  slots: SlotAllocation[];
}

// ============================================================================
// Bills
// ============================================================================

export interface BillingPeriod {
  key: string;                  // e.g. 2024-Q1, 2024-H2, 2024-03, 2024
  kind: BillingIntervalKind;
  start: string;                // YYYY-MM-DD, inclusive
  end: string;                  // YYYY-MM-DD, exclusive
  months: MonthKey[];
}

export interface CalculatedFee {
  name: string;
  kind: FeeKind;
  basis: FeeBasis | null;
  value: number;
  amount: number;
  amountInclVat: number;
}

export interface DailyDetail {
  date: string;
  consumptionKwh: number;
  localKwh: number;
  gridKwh: number;
  productionKwh: number;
  localSoldKwh: number;
  exportKwh: number;
  localCost: number;
  gridCost: number;
  totalCost: number;
  localSellRevenue: number;
  exportRevenue: number;
  totalRevenue: number;
}

/**
 * Sign convention: netAmount = totalCost - totalRevenue.
 * Positive means the member owes the collective, negative means the
 * collective owes the member. grandTotal applies the same convention to
 * costs including VAT; revenue never carries VAT.
 */
export interface Bill {
  memberId: string;
  memberName: string;
  isHost: boolean;
  isProducer: boolean;
  period: BillingPeriod;
  currency: string;

  consumptionKwh: number;
  localKwh: number;
  gridKwh: number;
  productionKwh: number;
  localSoldKwh: number;
  exportKwh: number;

  rates: CollectiveRates & { appliedLocalRate: number };

  localCost: number;
  gridCost: number;
  fees: CalculatedFee[];
  feesTotal: number;
  totalCost: number;

  localSellRevenue: number;
  exportRevenue: number;
  totalRevenue: number;

  netAmount: number;

  vatRate: number;              // Percent, 0 when VAT is off
  localCostInclVat: number;
  gridCostInclVat: number;
  feesTotalInclVat: number;
  vatAmount: number;
  totalCostInclVat: number;
  grandTotal: number;           // totalCostInclVat - totalRevenue

  dailyDetails: DailyDetail[];
}

export type ExportValue = string | number | boolean;
export type BillExportRow = Record<string, ExportValue>;

// ============================================================================
// Pipeline
// ============================================================================

export interface ExcludedMonth {
  month: MonthKey;
  reason: string;
}

export interface ExcludedPeriod {
  period: BillingPeriod;
  missingMonths: MonthKey[];
}

export interface BillingRun {
  collective: string;
  bills: Bill[];
  exportRows: BillExportRow[];
  months: MonthStatus[];
  excludedMonths: ExcludedMonth[];
  excludedPeriods: ExcludedPeriod[];
  warnings: string[];
}
