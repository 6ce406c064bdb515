/**
 * Calendar arithmetic for 15-minute metering
 *
 * Slots are enumerated in real elapsed time between two local midnights, so a
 * day has 92 slots when clocks spring forward, 100 when they fall back and 96
 * otherwise. Billing periods are calendar-aligned, start and end on the first
 * of a month and never reach past the configured end of the overall period.
 */

import { DateTime } from 'luxon';
import { InvalidRangeError } from '@/lib/errors';
import { DEFAULT_TIME_ZONE } from '@/types/collective';
import type { BillingIntervalKind } from '@/types/collective';
import type { BillingPeriod } from '@/types/billing';
import type { MonthKey, Slot } from '@/types/meter';

export const SLOT_MINUTES = 15;
export const SLOT_MS = SLOT_MINUTES * 60 * 1000;

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const MONTH_PATTERN = /^(\d{4})-(\d{2})$/;

const MONTHS_PER_PERIOD: Record<BillingIntervalKind, number> = {
  monthly: 1,
  quarterly: 3,
  semi_annual: 6,
  annual: 12,
};

function parseCalendarDate(date: string, zone: string, start: string, end: string): DateTime {
  if (!DATE_PATTERN.test(date)) {
    throw new InvalidRangeError(start, end, `malformed date "${date}"`);
  }
  const parsed = DateTime.fromISO(date, { zone });
  if (!parsed.isValid) {
    throw new InvalidRangeError(start, end, `invalid date "${date}" in zone ${zone}`);
  }
  return parsed.startOf('day');
}

function toDateString(dt: DateTime): string {
  return dt.toFormat('yyyy-MM-dd');
}

/**
 * Every 15-minute slot in [startDate 00:00, endDate 00:00) local time
 */
export function expectedSlots(
  startDate: string,
  endDate: string,
  timeZone: string = DEFAULT_TIME_ZONE
): Slot[] {
  const start = parseCalendarDate(startDate, timeZone, startDate, endDate).toMillis();
  const end = parseCalendarDate(endDate, timeZone, startDate, endDate).toMillis();

  if (start >= end) {
    throw new InvalidRangeError(startDate, endDate);
  }

  const slots: Slot[] = [];
  for (let ms = start; ms < end; ms += SLOT_MS) {
    slots.push({
      start: new Date(ms).toISOString(),
      end: new Date(ms + SLOT_MS).toISOString(),
      localDate: toDateString(DateTime.fromMillis(ms, { zone: timeZone })),
    });
  }
  return slots;
}

/**
 * First day of the month and first day of the following month
 */
export function monthBounds(month: MonthKey): { start: string; end: string } {
  const match = month.match(MONTH_PATTERN);
  const monthNumber = match ? parseInt(match[2], 10) : 0;
  if (!match || monthNumber < 1 || monthNumber > 12) {
    throw new InvalidRangeError(month, month, `malformed month "${month}"`);
  }

  const first = DateTime.fromObject(
    { year: parseInt(match[1], 10), month: monthNumber, day: 1 },
    { zone: 'utc' }
  );
  return {
    start: toDateString(first),
    end: toDateString(first.plus({ months: 1 })),
  };
}

/**
 * Calendar months touched by the half-open date range [start, end)
 */
export function monthsInRange(start: string, end: string): MonthKey[] {
  const first = parseCalendarDate(start, 'utc', start, end);
  parseCalendarDate(end, 'utc', start, end);
  if (start >= end) {
    throw new InvalidRangeError(start, end);
  }

  const months: MonthKey[] = [];
  let cursor = first.startOf('month');
  while (toDateString(cursor) < end) {
    months.push(cursor.toFormat('yyyy-MM'));
    cursor = cursor.plus({ months: 1 });
  }
  return months;
}

function periodKey(kind: BillingIntervalKind, year: number, index: number, month: number): string {
  switch (kind) {
    case 'monthly':
      return `${year}-${String(month).padStart(2, '0')}`;
    case 'quarterly':
      return `${year}-Q${index + 1}`;
    case 'semi_annual':
      return `${year}-H${index + 1}`;
    case 'annual':
      return `${year}`;
  }
}

/**
 * Split [periodStart, periodEnd) into calendar-aligned billing periods
 *
 * Both bounds must fall on the first of a month, so every period covers whole
 * months. The first period starts at periodStart even when that is mid-bucket,
 * and the last one is cut at periodEnd.
 */
export function partition(
  periodStart: string,
  periodEnd: string,
  intervalKind: BillingIntervalKind
): BillingPeriod[] {
  parseCalendarDate(periodStart, 'utc', periodStart, periodEnd);
  parseCalendarDate(periodEnd, 'utc', periodStart, periodEnd);
  if (periodStart >= periodEnd) {
    throw new InvalidRangeError(periodStart, periodEnd);
  }
  if (!periodStart.endsWith('-01') || !periodEnd.endsWith('-01')) {
    throw new InvalidRangeError(
      periodStart,
      periodEnd,
      'billing periods must start and end on the first of a month'
    );
  }

  const span = MONTHS_PER_PERIOD[intervalKind];
  const periods: BillingPeriod[] = [];
  let cursor = periodStart;

  while (cursor < periodEnd) {
    const day = DateTime.fromISO(cursor, { zone: 'utc' });
    const index = Math.floor((day.month - 1) / span);
    const alignedStart = DateTime.fromObject(
      { year: day.year, month: index * span + 1, day: 1 },
      { zone: 'utc' }
    );
    const alignedEnd = toDateString(alignedStart.plus({ months: span }));
    const end = alignedEnd < periodEnd ? alignedEnd : periodEnd;

    periods.push({
      key: periodKey(intervalKind, day.year, index, day.month),
      kind: intervalKind,
      start: cursor,
      end,
      months: monthsInRange(cursor, end),
    });
    cursor = end;
  }

  return periods;
}
