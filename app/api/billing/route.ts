import { NextResponse } from 'next/server';
import { fetchCollectiveConfig } from '@/lib/collective-config';
import { isInputError } from '@/lib/errors';
import { createIntervalStore } from '@/lib/interval-store';
import { runBilling } from '@/lib/pipeline';

export const dynamic = 'force-dynamic';

/**
 * GET /api/billing
 * Runs billing for the configured period
 */
export async function GET(): Promise<NextResponse> {
  try {
    const config = await fetchCollectiveConfig();
    if (!config) {
      return NextResponse.json(
        { error: 'No collective configuration found' },
        { status: 404 }
      );
    }

    const run = await runBilling(config, createIntervalStore());
    return NextResponse.json(run);
  } catch (error) {
    if (isInputError(error)) {
      console.warn('Billing rejected input:', error.message);
      return NextResponse.json({ error: error.message }, { status: 422 });
    }
    console.error('Error running billing:', error);
    return NextResponse.json({ error: 'Failed to run billing' }, { status: 500 });
  }
}
