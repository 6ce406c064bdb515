/**
 * Rate Configuration Helpers
 *
 * A collective bills with one set of base rates; dated rate changes override
 * them from their validity start onwards.
 */

import type { CollectiveRates, RateChange } from './collective';

/**
 * Helper to get the rate change in effect on a given day (YYYY-MM-DD)
 */
export function getActiveRateChangeAt(
  changes: RateChange[],
  date: string
): RateChange | null {
  const active = changes.filter((change) => {
    if (change.validFrom > date) return false;
    if (change.validTo && change.validTo < date) return false;
    return true;
  });

  if (active.length === 0) return null;

  // Most recent change wins on overlaps
  const sorted = [...active].sort((a, b) => b.validFrom.localeCompare(a.validFrom));
  return sorted[0];
}

/**
 * Rates in effect on a given day, falling back to the base rates
 */
export function getRatesAt(
  base: CollectiveRates,
  changes: RateChange[],
  date: string
): CollectiveRates {
  const change = getActiveRateChangeAt(changes, date);
  if (!change) return { ...base };

  return {
    localRate: change.localRate,
    gridBuyRate: change.gridBuyRate,
    gridSellRate: change.gridSellRate,
  };
}
