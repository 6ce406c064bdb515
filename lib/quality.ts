/**
 * Data-quality and completeness checks for interval readings
 *
 * A month is billable only when every physical meter of the collective has a
 * valid reading for every expected slot. Gaps never throw: they are reported
 * in the MonthStatus. Duplicate or unreadable readings are input errors.
 */

import { expectedSlots, monthBounds } from '@/lib/calendar';
import { DuplicateReadingError, InvalidReadingError } from '@/lib/errors';
import { DEFAULT_TIME_ZONE } from '@/types/collective';
import type { Meter } from '@/types/collective';
import type { MonthStatus } from '@/types/billing';
import type { IntervalReading, MonthKey, ReadingsByMeter, Slot } from '@/types/meter';

/**
 * Index a meter's valid readings by slot start (epoch ms)
 */
export function indexReadings(
  meterId: string,
  readings: readonly IntervalReading[]
): Map<number, IntervalReading> {
  const index = new Map<number, IntervalReading>();

  for (const reading of readings) {
    if (reading.quality !== 'valid') continue;

    const at = Date.parse(reading.timestamp);
    if (Number.isNaN(at)) {
      throw new InvalidReadingError(meterId, reading.timestamp, 'unparsable timestamp');
    }
    if (!Number.isFinite(reading.energyKwh) || reading.energyKwh < 0) {
      throw new InvalidReadingError(meterId, reading.timestamp, `energy ${reading.energyKwh} kWh`);
    }
    if (index.has(at)) {
      throw new DuplicateReadingError(meterId, reading.timestamp);
    }
    index.set(at, reading);
  }

  return index;
}

interface MeterCoverage {
  missingSlots: Slot[];
  unexpected: number;
}

function coverage(slots: Slot[], slotStarts: Set<number>, index: Map<number, IntervalReading>): MeterCoverage {
  const missingSlots = slots.filter((slot) => !index.has(Date.parse(slot.start)));
  let unexpected = 0;
  for (const at of index.keys()) {
    if (!slotStarts.has(at)) unexpected++;
  }
  return { missingSlots, unexpected };
}

/**
 * Decide whether a month has a complete, gap-free reading set
 */
export function checkMonth(
  month: MonthKey,
  meters: readonly Meter[],
  readingsByMeter: ReadingsByMeter,
  timeZone: string = DEFAULT_TIME_ZONE
): MonthStatus {
  const { start, end } = monthBounds(month);
  const slots = expectedSlots(start, end, timeZone);
  const slotStarts = new Set(slots.map((slot) => Date.parse(slot.start)));

  const sorted = [...meters].sort((a, b) => a.externalId.localeCompare(b.externalId));
  const physical = sorted.filter((m) => !m.isVirtual);
  const virtual = sorted.filter((m) => m.isVirtual);

  const missing: Record<string, number> = {};
  const gaps: Record<string, Slot[]> = {};
  const unexpected: Record<string, number> = {};
  const warnings: string[] = [];

  for (const meter of physical) {
    const index = indexReadings(meter.externalId, readingsByMeter.get(meter.externalId) ?? []);
    const result = coverage(slots, slotStarts, index);

    missing[meter.externalId] = result.missingSlots.length;
    if (result.missingSlots.length > 0) {
      gaps[meter.externalId] = result.missingSlots;
    }
    if (result.unexpected > 0) {
      unexpected[meter.externalId] = result.unexpected;
    }
  }

  // Virtual meters only cross-check the allocation, they never gate billing
  for (const meter of virtual) {
    const index = indexReadings(meter.externalId, readingsByMeter.get(meter.externalId) ?? []);
    const result = coverage(slots, slotStarts, index);
    if (result.missingSlots.length > 0) {
      warnings.push(
        `Virtual meter ${meter.externalId} is missing ${result.missingSlots.length} of ${slots.length} slots in ${month}`
      );
    }
  }

  if (physical.length === 0) {
    warnings.push(`No physical meters to check in ${month}`);
  }

  const billable = physical.length > 0 && physical.every((m) => missing[m.externalId] === 0);

  return {
    month,
    billable,
    expectedSlots: slots.length,
    missing,
    gaps,
    unexpected,
    warnings,
  };
}

/**
 * Human-readable reason a month was excluded from billing
 */
export function describeExclusion(status: MonthStatus): string {
  if (status.billable) return '';

  const incomplete = Object.entries(status.missing).filter(([, count]) => count > 0);
  if (incomplete.length === 0) {
    return 'no physical meter data';
  }

  const details = incomplete.map(([meterId, count]) => {
    const firstGap = status.gaps[meterId]?.[0];
    const from = firstGap ? `, first missing slot ${firstGap.start}` : '';
    return `${meterId} ${count}/${status.expectedSlots} slots missing${from}`;
  });
  return `incomplete data: ${details.join('; ')}`;
}
