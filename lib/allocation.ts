/**
 * Proportional solar allocation per 15-minute slot
 *
 * Local production covers collective consumption first; every consumer meter
 * receives a share of the locally consumed energy proportional to its own
 * consumption, and the surplus is exported on behalf of the producers in
 * proportion to their production.
 *
 * All arithmetic runs on decimals at a resolution of 1e-9 kWh. Shares are
 * truncated to that resolution and the remainder goes to the holder with the
 * largest raw share (smallest meter external id on ties), so the shares always
 * add up exactly to the quantity being split.
 */

import Decimal from 'decimal.js';
import { expectedSlots, monthBounds } from '@/lib/calendar';
import { NonBillablePeriodError } from '@/lib/errors';
import { indexReadings } from '@/lib/quality';
import {
  DEFAULT_TIME_ZONE,
  consumptionMeters,
  findHosts,
  productionMeters,
  virtualMeters,
} from '@/types/collective';
import type { Member } from '@/types/collective';
import type { AllocationResult, MonthAllocation, SlotAllocation } from '@/types/billing';
import type { IntervalReading, MonthKey, ReadingsByMeter, Slot } from '@/types/meter';

export const ENERGY_DECIMALS = 9;

const Energy = Decimal.clone({ precision: 40, rounding: Decimal.ROUND_HALF_UP });
type Energy = Decimal;

const ZERO: Energy = new Energy(0);

export interface MeterEnergy {
  meterId: string;
  memberId: string;
  energyKwh: number;
}

interface Holder {
  id: string;
  weight: Energy;
}

function toEnergy(kwh: number): Energy {
  return new Energy(kwh).toDecimalPlaces(ENERGY_DECIMALS, Decimal.ROUND_HALF_UP);
}

function byMeterId(a: MeterEnergy, b: MeterEnergy): number {
  return a.meterId < b.meterId ? -1 : a.meterId > b.meterId ? 1 : 0;
}

/**
 * Split `total` across holders proportionally to their weights
 *
 * Holders must already be ordered by id; the first holder with the largest
 * raw share absorbs the truncation remainder.
 */
export function splitProportionally(total: Energy, holders: Holder[]): Map<string, Energy> {
  const shares = new Map<string, Energy>();
  const totalWeight = holders.reduce((sum, h) => sum.plus(h.weight), ZERO);

  if (total.isZero() || totalWeight.isZero()) {
    holders.forEach((h) => shares.set(h.id, ZERO));
    return shares;
  }

  let distributed = ZERO;
  let largest: { id: string; raw: Energy } | null = null;

  for (const holder of holders) {
    const raw = total.times(holder.weight).dividedBy(totalWeight);
    const share = raw.toDecimalPlaces(ENERGY_DECIMALS, Decimal.ROUND_DOWN);
    shares.set(holder.id, share);
    distributed = distributed.plus(share);

    if (largest === null || raw.greaterThan(largest.raw)) {
      largest = { id: holder.id, raw };
    }
  }

  const remainder = total.minus(distributed);
  if (largest !== null && !remainder.isZero()) {
    const current = shares.get(largest.id) ?? ZERO;
    shares.set(largest.id, current.plus(remainder));
  }

  return shares;
}

interface MemberTotals {
  consumption: Energy;
  local: Energy;
  production: Energy;
  export: Energy;
}

function emptyTotals(): MemberTotals {
  return { consumption: ZERO, local: ZERO, production: ZERO, export: ZERO };
}

/**
 * Allocate one slot's production across the collective's consumers
 */
export function allocateSlot(
  slot: Slot,
  consumers: readonly MeterEnergy[],
  producers: readonly MeterEnergy[]
): SlotAllocation {
  const orderedConsumers = [...consumers].sort(byMeterId);
  const orderedProducers = [...producers].sort(byMeterId);

  const consumerHolders = orderedConsumers.map((c) => ({ id: c.meterId, weight: toEnergy(c.energyKwh) }));
  const producerHolders = orderedProducers.map((p) => ({ id: p.meterId, weight: toEnergy(p.energyKwh) }));

  const totalConsumption = consumerHolders.reduce((sum, h) => sum.plus(h.weight), ZERO);
  const totalProduction = producerHolders.reduce((sum, h) => sum.plus(h.weight), ZERO);

  const locallyConsumed = totalConsumption.isZero() ? ZERO : Decimal.min(totalProduction, totalConsumption);
  const surplusExport = totalProduction.minus(locallyConsumed);

  const localShares = splitProportionally(locallyConsumed, consumerHolders);
  const exportShares = splitProportionally(surplusExport, producerHolders);

  const totals = new Map<string, MemberTotals>();
  const totalsFor = (memberId: string): MemberTotals => {
    let entry = totals.get(memberId);
    if (!entry) {
      entry = emptyTotals();
      totals.set(memberId, entry);
    }
    return entry;
  };

  orderedConsumers.forEach((consumer, i) => {
    const entry = totalsFor(consumer.memberId);
    entry.consumption = entry.consumption.plus(consumerHolders[i].weight);
    entry.local = entry.local.plus(localShares.get(consumer.meterId) ?? ZERO);
  });

  orderedProducers.forEach((producer, i) => {
    const entry = totalsFor(producer.memberId);
    entry.production = entry.production.plus(producerHolders[i].weight);
    entry.export = entry.export.plus(exportShares.get(producer.meterId) ?? ZERO);
  });

  const memberIds = [...totals.keys()].sort();
  const members: AllocationResult[] = memberIds.map((memberId) => {
    const entry = totalsFor(memberId);

    // A producer supplies the local pool in proportion to its production;
    // what other members draw from its supply counts as sold
    const localSold = totalProduction.isZero()
      ? ZERO
      : locallyConsumed
          .minus(entry.local)
          .times(entry.production)
          .dividedBy(totalProduction)
          .toDecimalPlaces(ENERGY_DECIMALS, Decimal.ROUND_DOWN);

    return {
      memberId,
      slot: slot.start,
      localDate: slot.localDate,
      consumptionKwh: entry.consumption.toNumber(),
      localKwh: entry.local.toNumber(),
      gridKwh: entry.consumption.minus(entry.local).toNumber(),
      productionKwh: entry.production.toNumber(),
      localSoldKwh: localSold.toNumber(),
      exportKwh: entry.export.toNumber(),
    };
  });

  return {
    slot: slot.start,
    localDate: slot.localDate,
    totalProductionKwh: totalProduction.toNumber(),
    totalConsumptionKwh: totalConsumption.toNumber(),
    locallyConsumedKwh: locallyConsumed.toNumber(),
    surplusExportKwh: surplusExport.toNumber(),
    members,
  };
}

interface IndexedMeter {
  meterId: string;
  memberId: string;
  readings: Map<number, IntervalReading>;
}

function indexMeters(
  members: readonly Member[],
  pick: (member: Member) => { externalId: string }[],
  readingsByMeter: ReadingsByMeter
): IndexedMeter[] {
  return members.flatMap((member) =>
    pick(member).map((meter) => ({
      meterId: meter.externalId,
      memberId: member.id,
      readings: indexReadings(meter.externalId, readingsByMeter.get(meter.externalId) ?? []),
    }))
  );
}

function slotEnergies(month: MonthKey, slot: Slot, meters: IndexedMeter[]): MeterEnergy[] {
  const at = Date.parse(slot.start);
  return meters.map((meter) => {
    const reading = meter.readings.get(at);
    if (!reading) {
      throw new NonBillablePeriodError(month, [month]);
    }
    return { meterId: meter.meterId, memberId: meter.memberId, energyKwh: reading.energyKwh };
  });
}

/**
 * Allocate every slot of a billable month
 *
 * Refuses months with a missing physical reading; run checkMonth first.
 */
export function allocateMonth(
  month: MonthKey,
  members: readonly Member[],
  readingsByMeter: ReadingsByMeter,
  timeZone: string = DEFAULT_TIME_ZONE
): MonthAllocation {
  const { start, end } = monthBounds(month);
  const consumers = indexMeters(members, consumptionMeters, readingsByMeter);
  const producers = indexMeters(members, productionMeters, readingsByMeter);

  const slots = expectedSlots(start, end, timeZone).map((slot) =>
    allocateSlot(slot, slotEnergies(month, slot, consumers), slotEnergies(month, slot, producers))
  );

  return { month, slots };
}

function sumValidReadings(readings: readonly IntervalReading[]): Energy {
  return readings
    .filter((r) => r.quality === 'valid')
    .reduce((sum, r) => sum.plus(toEnergy(r.energyKwh)), ZERO);
}

function deviates(expected: Energy, measured: Energy, tolerance: number): boolean {
  const scale = Decimal.max(expected.abs(), measured.abs());
  if (scale.isZero()) return false;
  return expected.minus(measured).abs().dividedBy(scale).greaterThan(tolerance);
}

/**
 * Compare the allocation with the host's aggregate meters
 *
 * Grid draw should match the virtual consumption meter and the exported
 * surplus the virtual production meter. Deviations are warnings only.
 */
export function crossCheckVirtualMeters(
  allocation: MonthAllocation,
  members: readonly Member[],
  readingsByMeter: ReadingsByMeter,
  tolerance = 0.01
): string[] {
  const warnings: string[] = [];

  let grid = ZERO;
  let exported = ZERO;
  for (const slot of allocation.slots) {
    for (const result of slot.members) {
      grid = grid.plus(toEnergy(result.gridKwh));
      exported = exported.plus(toEnergy(result.exportKwh));
    }
  }

  for (const host of findHosts([...members])) {
    for (const meter of virtualMeters(host)) {
      const readings = readingsByMeter.get(meter.externalId) ?? [];
      if (readings.length === 0) continue;

      const measured = sumValidReadings(readings);
      const expected = meter.isProduction ? exported : grid;
      if (deviates(expected, measured, tolerance)) {
        const label = meter.isProduction ? 'export' : 'grid draw';
        warnings.push(
          `${allocation.month}: virtual meter ${meter.externalId} reads ${measured.toFixed(3)} kWh, ` +
            `allocated ${label} is ${expected.toFixed(3)} kWh`
        );
      }
    }
  }

  return warnings;
}
