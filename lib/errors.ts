/**
 * Error taxonomy of the billing engine.
 *
 * Input errors (bad ranges, bad configuration, duplicate or unreadable
 * readings) abort a run. A non-billable period is recoverable: the caller
 * can retry once the missing data has arrived. Data-quality gaps are not
 * errors at all; they surface as non-billable month statuses.
 */

import type { MonthKey } from '@/types/meter';

export class BillingEngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidRangeError extends BillingEngineError {
  constructor(
    readonly start: string,
    readonly end: string,
    detail = 'start must be before end'
  ) {
    super(`Invalid range ${start} .. ${end}: ${detail}`);
  }
}

export class ConfigurationError extends BillingEngineError {
  constructor(readonly issues: string[]) {
    super(`Invalid collective configuration: ${issues.join('; ')}`);
  }
}

export class DuplicateReadingError extends BillingEngineError {
  constructor(
    readonly meterId: string,
    readonly timestamp: string
  ) {
    super(`Duplicate reading for meter ${meterId} at ${timestamp}`);
  }
}

export class InvalidReadingError extends BillingEngineError {
  constructor(
    readonly meterId: string,
    readonly timestamp: string,
    detail: string
  ) {
    super(`Invalid reading for meter ${meterId} at ${timestamp}: ${detail}`);
  }
}

export class NonBillablePeriodError extends BillingEngineError {
  constructor(
    readonly periodKey: string,
    readonly months: MonthKey[]
  ) {
    super(`Period ${periodKey} is not billable, incomplete month(s): ${months.join(', ')}`);
  }
}

/**
 * Input errors mean the setup is broken, not that data is still missing
 */
export function isInputError(error: unknown): error is BillingEngineError {
  return (
    error instanceof InvalidRangeError ||
    error instanceof ConfigurationError ||
    error instanceof DuplicateReadingError ||
    error instanceof InvalidReadingError
  );
}
