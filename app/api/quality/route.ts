import { NextRequest, NextResponse } from 'next/server';
import { monthsInRange } from '@/lib/calendar';
import { fetchCollectiveConfig } from '@/lib/collective-config';
import { isInputError } from '@/lib/errors';
import { createIntervalStore } from '@/lib/interval-store';
import { checkCollectiveMonth } from '@/lib/pipeline';
import type { MonthStatus } from '@/types/billing';

export const dynamic = 'force-dynamic';

const MONTH_PATTERN = /^\d{4}-(0[1-9]|1[0-2])$/;

/**
 * GET /api/quality?month=YYYY-MM
 * Completeness status of one month, or of every month in the period
 */
export async function GET(request: NextRequest): Promise<NextResponse> {
  const month = request.nextUrl.searchParams.get('month');
  if (month !== null && !MONTH_PATTERN.test(month)) {
    return NextResponse.json(
      { error: 'month must be in YYYY-MM format' },
      { status: 400 }
    );
  }

  try {
    const config = await fetchCollectiveConfig();
    if (!config) {
      return NextResponse.json(
        { error: 'No collective configuration found' },
        { status: 404 }
      );
    }

    const store = createIntervalStore();
    const months = month ? [month] : monthsInRange(config.periodStart, config.periodEnd);
    const statuses: MonthStatus[] = [];
    for (const m of months) {
      statuses.push(await checkCollectiveMonth(config, store, m));
    }

    return NextResponse.json({ months: statuses });
  } catch (error) {
    if (isInputError(error)) {
      console.warn('Quality check rejected input:', error.message);
      return NextResponse.json({ error: error.message }, { status: 422 });
    }
    console.error('Error checking data quality:', error);
    return NextResponse.json({ error: 'Failed to check data quality' }, { status: 500 });
  }
}
