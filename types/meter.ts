/**
 * Centralized type definitions for interval data and InfluxDB rows
 */

// ============================================================================
// Interval Data Types
// ============================================================================

export type QualityFlag = 'valid' | 'estimated' | 'invalid';

export interface IntervalReading {
  meterId: string;
  timestamp: string;     // UTC instant of the slot start
  energyKwh: number;
  quality: QualityFlag;
}

/** Canonical 15-minute slot, half-open [start, end) */
export interface Slot {
  start: string;         // ISO timestamp (UTC)
  end: string;           // ISO timestamp (UTC)
  localDate: string;     // YYYY-MM-DD in the collective's time zone
}

export type MonthKey = string; // YYYY-MM

export type ReadingsByMeter = ReadonlyMap<string, readonly IntervalReading[]>;
