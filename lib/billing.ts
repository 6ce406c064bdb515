/**
 * Billing aggregation
 *
 * Sums a member's allocated energy over every slot of a billing period and
 * prices it with the collective's rates. Hosts consume their local solar for
 * free; producers earn the local rate on energy other members drew from their
 * production and the grid sell rate on their exported share.
 *
 * Sign convention: netAmount = totalCost - totalRevenue. A positive amount is
 * owed by the member, a negative one is paid out to the member.
 *
 * VAT is added per position (local energy, grid energy, fees) on the rounded
 * line amount; grandTotal is netAmount with VAT included.
 */

import Decimal from 'decimal.js';
import { NonBillablePeriodError } from '@/lib/errors';
import { fullName, isProducer } from '@/types/collective';
import { getRatesAt } from '@/types/rates';
import type { CollectiveConfig, CollectiveRates, Member, MemberFee, VatSettings } from '@/types/collective';
import type {
  AllocationResult,
  Bill,
  BillingPeriod,
  CalculatedFee,
  DailyDetail,
  MonthAllocation,
} from '@/types/billing';
import type { MonthKey } from '@/types/meter';

const Money = Decimal.clone({ precision: 40, rounding: Decimal.ROUND_HALF_UP });
type Amount = Decimal;

const MONEY_DECIMALS = 2;
const KWH_DECIMALS = 3;

export interface AggregateOptions {
  currency?: string;
  showDailyDetail?: boolean;
  vat?: VatSettings;
}

const NO_VAT: VatSettings = { rate: 0, onLocal: false, onGrid: false, onFees: false };

interface EnergyTotals {
  consumption: Amount;
  local: Amount;
  grid: Amount;
  production: Amount;
  localSold: Amount;
  export: Amount;
}

function emptyTotals(): EnergyTotals {
  const zero = new Money(0);
  return { consumption: zero, local: zero, grid: zero, production: zero, localSold: zero, export: zero };
}

function addResult(totals: EnergyTotals, result: AllocationResult): EnergyTotals {
  return {
    consumption: totals.consumption.plus(result.consumptionKwh),
    local: totals.local.plus(result.localKwh),
    grid: totals.grid.plus(result.gridKwh),
    production: totals.production.plus(result.productionKwh),
    localSold: totals.localSold.plus(result.localSoldKwh),
    export: totals.export.plus(result.exportKwh),
  };
}

function money(value: Amount): Amount {
  return value.toDecimalPlaces(MONEY_DECIMALS, Decimal.ROUND_HALF_UP);
}

function kwh(value: Amount): number {
  return value.toDecimalPlaces(KWH_DECIMALS, Decimal.ROUND_HALF_UP).toNumber();
}

/**
 * Rates in effect at the start of a billing period
 */
export function resolveRates(config: CollectiveConfig, period: BillingPeriod): CollectiveRates {
  return getRatesAt(config.rates, config.rateChanges, period.start);
}

export function vatSettings(config: CollectiveConfig): VatSettings {
  return {
    rate: config.vatRate,
    onLocal: config.vatOnLocal,
    onGrid: config.vatOnGrid,
    onFees: config.vatOnFees,
  };
}

function withVat(amount: Amount, vat: VatSettings, applies: boolean): Amount {
  if (!applies || vat.rate <= 0) return amount;
  return money(amount.times(new Money(vat.rate).dividedBy(100).plus(1)));
}

function calculateFee(
  fee: MemberFee,
  totals: EnergyTotals,
  monthCount: number,
  vat: VatSettings
): CalculatedFee {
  let amount: Amount;
  if (fee.kind === 'yearly') {
    amount = new Money(fee.value).dividedBy(12).times(monthCount);
  } else {
    amount = new Money(fee.value).times(fee.basis === 'local' ? totals.local : totals.grid);
  }

  return {
    name: fee.name,
    kind: fee.kind,
    basis: fee.kind === 'per_kwh' ? fee.basis : null,
    value: fee.value,
    amount: money(amount).toNumber(),
    amountInclVat: withVat(money(amount), vat, vat.onFees).toNumber(),
  };
}

interface Pricing {
  appliedLocalRate: number;
  rates: CollectiveRates;
  producer: boolean;
}

function price(totals: EnergyTotals, pricing: Pricing) {
  const localCost = money(totals.local.times(pricing.appliedLocalRate));
  const gridCost = money(totals.grid.times(pricing.rates.gridBuyRate));
  const localSellRevenue = pricing.producer
    ? money(totals.localSold.times(pricing.rates.localRate))
    : new Money(0);
  const exportRevenue = pricing.producer
    ? money(totals.export.times(pricing.rates.gridSellRate))
    : new Money(0);

  return { localCost, gridCost, localSellRevenue, exportRevenue };
}

function dailyDetails(results: AllocationResult[], pricing: Pricing): DailyDetail[] {
  const byDate = new Map<string, EnergyTotals>();
  for (const result of results) {
    byDate.set(result.localDate, addResult(byDate.get(result.localDate) ?? emptyTotals(), result));
  }

  return [...byDate.keys()].sort().map((date) => {
    const totals = byDate.get(date) ?? emptyTotals();
    const priced = price(totals, pricing);
    return {
      date,
      consumptionKwh: kwh(totals.consumption),
      localKwh: kwh(totals.local),
      gridKwh: kwh(totals.grid),
      productionKwh: kwh(totals.production),
      localSoldKwh: kwh(totals.localSold),
      exportKwh: kwh(totals.export),
      localCost: priced.localCost.toNumber(),
      gridCost: priced.gridCost.toNumber(),
      totalCost: priced.localCost.plus(priced.gridCost).toNumber(),
      localSellRevenue: priced.localSellRevenue.toNumber(),
      exportRevenue: priced.exportRevenue.toNumber(),
      totalRevenue: priced.localSellRevenue.plus(priced.exportRevenue).toNumber(),
    };
  });
}

/**
 * Build one member's bill for a billing period
 *
 * Every month of the period must have an allocation; partial periods are
 * never billed. Periods always cover whole months, so yearly fees are
 * prorated by month count.
 */
export function aggregate(
  member: Member,
  period: BillingPeriod,
  allocations: ReadonlyMap<MonthKey, MonthAllocation>,
  rates: CollectiveRates,
  options: AggregateOptions = {}
): Bill {
  const missing = period.months.filter((month) => !allocations.has(month));
  if (missing.length > 0) {
    throw new NonBillablePeriodError(period.key, missing);
  }

  const results: AllocationResult[] = [];
  for (const month of period.months) {
    const allocation = allocations.get(month);
    if (!allocation) continue;
    for (const slot of allocation.slots) {
      const result = slot.members.find((r) => r.memberId === member.id);
      if (result) results.push(result);
    }
  }

  const totals = results.reduce(addResult, emptyTotals());
  const pricing: Pricing = {
    appliedLocalRate: member.isHost ? 0 : rates.localRate,
    rates,
    producer: isProducer(member),
  };
  const priced = price(totals, pricing);

  const vat = options.vat ?? NO_VAT;
  const fees = member.fees.map((fee) => calculateFee(fee, totals, period.months.length, vat));
  const feesTotal = fees.reduce((sum, fee) => sum.plus(fee.amount), new Money(0));
  const feesTotalInclVat = fees.reduce((sum, fee) => sum.plus(fee.amountInclVat), new Money(0));

  const totalCost = priced.localCost.plus(priced.gridCost).plus(feesTotal);
  const totalRevenue = priced.localSellRevenue.plus(priced.exportRevenue);

  const localCostInclVat = withVat(priced.localCost, vat, vat.onLocal);
  const gridCostInclVat = withVat(priced.gridCost, vat, vat.onGrid);
  const totalCostInclVat = localCostInclVat.plus(gridCostInclVat).plus(feesTotalInclVat);

  return {
    memberId: member.id,
    memberName: fullName(member),
    isHost: member.isHost,
    isProducer: pricing.producer,
    period,
    currency: options.currency ?? 'CHF',

    consumptionKwh: kwh(totals.consumption),
    localKwh: kwh(totals.local),
    gridKwh: kwh(totals.grid),
    productionKwh: kwh(totals.production),
    localSoldKwh: kwh(totals.localSold),
    exportKwh: kwh(totals.export),

    rates: { ...rates, appliedLocalRate: pricing.appliedLocalRate },

    localCost: priced.localCost.toNumber(),
    gridCost: priced.gridCost.toNumber(),
    fees,
    feesTotal: feesTotal.toNumber(),
    totalCost: totalCost.toNumber(),

    localSellRevenue: priced.localSellRevenue.toNumber(),
    exportRevenue: priced.exportRevenue.toNumber(),
    totalRevenue: totalRevenue.toNumber(),

    netAmount: totalCost.minus(totalRevenue).toNumber(),

    vatRate: vat.rate,
    localCostInclVat: localCostInclVat.toNumber(),
    gridCostInclVat: gridCostInclVat.toNumber(),
    feesTotalInclVat: feesTotalInclVat.toNumber(),
    vatAmount: totalCostInclVat.minus(totalCost).toNumber(),
    totalCostInclVat: totalCostInclVat.toNumber(),
    grandTotal: totalCostInclVat.minus(totalRevenue).toNumber(),

    dailyDetails: options.showDailyDetail ? dailyDetails(results, pricing) : [],
  };
}
