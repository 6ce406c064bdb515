/**
 * Collective Configuration Types
 *
 * This module defines the member/meter graph of a solar self-consumption
 * collective and the rates it bills with.
 */

export type BillingIntervalKind = 'monthly' | 'quarterly' | 'semi_annual' | 'annual';

export interface Meter {
  externalId: string;
  name: string;
  isProduction: boolean;
  isVirtual: boolean;       // Grid-level aggregate, never allocated
}

export type FeeKind = 'yearly' | 'per_kwh';
export type FeeBasis = 'local' | 'grid';

export interface MemberFee {
  name: string;
  kind: FeeKind;
  value: number;            // CHF per year, or CHF per kWh
  basis: FeeBasis;          // Only used by per_kwh fees
}

export interface Member {
  id: string;
  firstName: string;
  lastName: string;
  street: string;
  zip: string;
  city: string;
  canton: string;
  isHost: boolean;
  meters: Meter[];
  fees: MemberFee[];
}

export interface CollectiveRates {
  localRate: number;        // CHF/kWh for local solar energy
  gridBuyRate: number;      // CHF/kWh bought from the grid operator
  gridSellRate: number;     // CHF/kWh paid by the grid operator for exports
}

export interface RateChange extends CollectiveRates {
  validFrom: string;        // YYYY-MM-DD, inclusive
  validTo: string | null;   // YYYY-MM-DD, inclusive (null = open-ended)
}

export interface VatSettings {
  rate: number;             // Percent
  onLocal: boolean;
  onGrid: boolean;
  onFees: boolean;
}

export interface CollectiveConfig {
  name: string;
  timeZone: string;
  currency: string;
  billingInterval: BillingIntervalKind;
  periodStart: string;      // YYYY-MM-DD, inclusive
  periodEnd: string;        // YYYY-MM-DD, exclusive
  rates: CollectiveRates;
  rateChanges: RateChange[];
  showDailyDetail: boolean;
  vatRate: number;          // Percent, 0 disables VAT
  vatOnLocal: boolean;
  vatOnGrid: boolean;
  vatOnFees: boolean;
  members: Member[];
}

export const DEFAULT_TIME_ZONE = 'Europe/Zurich';

export function fullName(member: Member): string {
  return `${member.firstName} ${member.lastName}`.trim();
}

/**
 * Physical meters take part in allocation; virtual ones only cross-check it
 */
export function physicalMeters(member: Member): Meter[] {
  return member.meters.filter((m) => !m.isVirtual);
}

export function consumptionMeters(member: Member): Meter[] {
  return member.meters.filter((m) => !m.isVirtual && !m.isProduction);
}

export function productionMeters(member: Member): Meter[] {
  return member.meters.filter((m) => !m.isVirtual && m.isProduction);
}

export function virtualMeters(member: Member): Meter[] {
  return member.meters.filter((m) => m.isVirtual);
}

export function isProducer(member: Member): boolean {
  return productionMeters(member).length > 0;
}

/**
 * Hosts that own both aggregate meters of the grid connection
 */
export function findHosts(members: Member[]): Member[] {
  return members.filter((member) => {
    if (!member.isHost) return false;
    const virtual = virtualMeters(member);
    return virtual.some((m) => !m.isProduction) && virtual.some((m) => m.isProduction);
  });
}
