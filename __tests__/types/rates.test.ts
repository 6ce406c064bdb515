/**
 * Unit tests for rate helpers
 */

import { getActiveRateChangeAt, getRatesAt } from '@/types/rates';
import type { CollectiveRates, RateChange } from '@/types/collective';

describe('rate helpers', () => {
  const base: CollectiveRates = { localRate: 0.2, gridBuyRate: 0.3, gridSellRate: 0.1 };

  const changes: RateChange[] = [
    { validFrom: '2024-01-01', validTo: '2024-06-30', localRate: 0.21, gridBuyRate: 0.31, gridSellRate: 0.11 },
    { validFrom: '2024-07-01', validTo: null, localRate: 0.22, gridBuyRate: 0.32, gridSellRate: 0.12 },
    { validFrom: '2024-10-01', validTo: '2024-12-31', localRate: 0.25, gridBuyRate: 0.35, gridSellRate: 0.15 },
  ];

  describe('getActiveRateChangeAt', () => {
    it('should find the change covering a date', () => {
      expect(getActiveRateChangeAt(changes, '2024-03-15')?.localRate).toBe(0.21);
      expect(getActiveRateChangeAt(changes, '2024-06-30')?.localRate).toBe(0.21);
      expect(getActiveRateChangeAt(changes, '2024-07-01')?.localRate).toBe(0.22);
    });

    it('should prefer the most recent change on overlaps', () => {
      expect(getActiveRateChangeAt(changes, '2024-11-01')?.localRate).toBe(0.25);
      expect(getActiveRateChangeAt(changes, '2025-01-01')?.localRate).toBe(0.22);
    });

    it('should return null before the first change', () => {
      expect(getActiveRateChangeAt(changes, '2023-12-31')).toBeNull();
      expect(getActiveRateChangeAt([], '2024-01-01')).toBeNull();
    });
  });

  describe('getRatesAt', () => {
    it('should fall back to the base rates', () => {
      expect(getRatesAt(base, changes, '2023-06-01')).toEqual(base);
    });

    it('should return only the rate fields of a change', () => {
      expect(getRatesAt(base, changes, '2024-08-01')).toEqual({
        localRate: 0.22,
        gridBuyRate: 0.32,
        gridSellRate: 0.12,
      });
    });
  });
});
