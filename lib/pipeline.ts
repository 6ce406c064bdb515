/**
 * Billing run: load, check, allocate, aggregate
 *
 * Months are checked and allocated independently. A billing period is billed
 * only when all of its months are billable; otherwise it is reported as
 * excluded and no partial bill is produced.
 */

import { allocateMonth, crossCheckVirtualMeters } from '@/lib/allocation';
import { aggregate, resolveRates, vatSettings } from '@/lib/billing';
import { expectedSlots, monthBounds, monthsInRange, partition } from '@/lib/calendar';
import { toExportRows } from '@/lib/export';
import { checkMonth, describeExclusion } from '@/lib/quality';
import { physicalMeters } from '@/types/collective';
import type { IntervalStore } from '@/lib/interval-store';
import type { CollectiveConfig, Meter } from '@/types/collective';
import type {
  Bill,
  BillingRun,
  ExcludedMonth,
  ExcludedPeriod,
  MonthAllocation,
  MonthStatus,
} from '@/types/billing';
import type { IntervalReading, MonthKey, ReadingsByMeter } from '@/types/meter';

const LOG_PREFIX = '[billing]';

/**
 * Fetch every meter's readings for one local calendar month
 */
async function loadMonth(
  config: CollectiveConfig,
  store: IntervalStore,
  month: MonthKey
): Promise<ReadingsByMeter> {
  const { start, end } = monthBounds(month);
  const slots = expectedSlots(start, end, config.timeZone);
  const rangeStart = slots[0].start;
  const rangeEnd = slots[slots.length - 1].end;

  const meterIds = config.members.flatMap((member) => member.meters.map((m) => m.externalId));
  const entries = await Promise.all(
    meterIds.map(async (meterId): Promise<[string, IntervalReading[]]> => [
      meterId,
      await store.readings(meterId, rangeStart, rangeEnd),
    ])
  );
  return new Map(entries);
}

function allMeters(config: CollectiveConfig): Meter[] {
  return config.members.flatMap((member) => member.meters);
}

/**
 * Completeness status of a single month
 */
export async function checkCollectiveMonth(
  config: CollectiveConfig,
  store: IntervalStore,
  month: MonthKey
): Promise<MonthStatus> {
  const readings = await loadMonth(config, store, month);
  return checkMonth(month, allMeters(config), readings, config.timeZone);
}

export async function runBilling(config: CollectiveConfig, store: IntervalStore): Promise<BillingRun> {
  const months: MonthStatus[] = [];
  const excludedMonths: ExcludedMonth[] = [];
  const warnings: string[] = [];
  const allocations = new Map<MonthKey, MonthAllocation>();
  const periods = partition(config.periodStart, config.periodEnd, config.billingInterval);

  for (const month of monthsInRange(config.periodStart, config.periodEnd)) {
    const readings = await loadMonth(config, store, month);
    const status = checkMonth(month, allMeters(config), readings, config.timeZone);
    months.push(status);
    warnings.push(...status.warnings);

    if (!status.billable) {
      const reason = describeExclusion(status);
      console.warn(`${LOG_PREFIX} Excluding ${month}: ${reason}`);
      excludedMonths.push({ month, reason });
      continue;
    }

    const allocation = allocateMonth(month, config.members, readings, config.timeZone);
    allocations.set(month, allocation);
    warnings.push(...crossCheckVirtualMeters(allocation, config.members, readings));
    console.info(`${LOG_PREFIX} ${month} is billable (${status.expectedSlots} slots)`);
  }

  const billedMembers = config.members.filter((member) => physicalMeters(member).length > 0);
  const bills: Bill[] = [];
  const excludedPeriods: ExcludedPeriod[] = [];

  for (const period of periods) {
    const missingMonths = period.months.filter((month) => !allocations.has(month));
    if (missingMonths.length > 0) {
      console.warn(`${LOG_PREFIX} Skipping period ${period.key}, incomplete: ${missingMonths.join(', ')}`);
      excludedPeriods.push({ period, missingMonths });
      continue;
    }

    const rates = resolveRates(config, period);
    for (const member of billedMembers) {
      bills.push(
        aggregate(member, period, allocations, rates, {
          currency: config.currency,
          showDailyDetail: config.showDailyDetail,
          vat: vatSettings(config),
        })
      );
    }
    console.info(`${LOG_PREFIX} Period ${period.key}: ${billedMembers.length} bill(s)`);
  }

  return {
    collective: config.name,
    bills,
    exportRows: toExportRows(bills, config.members),
    months,
    excludedMonths,
    excludedPeriods,
    warnings,
  };
}
