import { NextRequest, NextResponse } from 'next/server';
import { fetchCollectiveConfig, saveCollectiveConfig } from '@/lib/collective-config';
import { collectiveConfigSchema, formatIssues } from '@/lib/schemas/collective';

/**
 * GET /api/collective-config
 * Fetches the latest collective configuration
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

    return NextResponse.json({ config });
  } catch (error) {
    console.error('Error fetching collective config:', error);
    return NextResponse.json(
      { error: 'Failed to fetch collective configuration' },
      { status: 500 }
    );
  }
}

/**
 * POST /api/collective-config
 * Validates and saves a new collective configuration
 */
export async function POST(request: NextRequest): Promise<NextResponse> {
  let body: unknown;
  try {
    body = await request.json();
  } catch (error) {
    console.warn('Rejected collective config with malformed JSON:', error);
    return NextResponse.json({ error: 'Request body must be JSON' }, { status: 400 });
  }

  const result = collectiveConfigSchema.safeParse(body);
  if (!result.success) {
    return NextResponse.json(
      { error: 'Invalid collective configuration', issues: formatIssues(result.error) },
      { status: 400 }
    );
  }

  try {
    await saveCollectiveConfig(result.data);
    return NextResponse.json({ success: true, config: result.data }, { status: 201 });
  } catch (error) {
    console.error('Error saving collective config:', error);
    return NextResponse.json(
      { error: 'Failed to save collective configuration' },
      { status: 500 }
    );
  }
}
