/**
 * Unit tests for /api/billing route
 */

import { GET } from '@/app/api/billing/route';
import { fetchCollectiveConfig } from '@/lib/collective-config';
import { ConfigurationError } from '@/lib/errors';
import { createIntervalStore } from '@/lib/interval-store';
import { InMemoryIntervalStore } from '@/__tests__/mocks/intervalStore';
import { collectiveConfig, scenarioAReadings } from '@/__tests__/fixtures/collective';
import type { BillingRun } from '@/types/billing';

jest.mock('@/lib/collective-config', () => ({
  fetchCollectiveConfig: jest.fn(),
}));

jest.mock('@/lib/interval-store', () => ({
  createIntervalStore: jest.fn(),
}));

const mockFetchConfig = jest.mocked(fetchCollectiveConfig);
const mockCreateStore = jest.mocked(createIntervalStore);

describe('/api/billing', () => {
  beforeEach(() => {
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    mockCreateStore.mockReturnValue(new InMemoryIntervalStore(scenarioAReadings('2024-01')));
  });

  afterEach(() => {
    jest.restoreAllMocks();
    mockFetchConfig.mockReset();
  });

  it('should return 404 without a configuration', async () => {
    mockFetchConfig.mockResolvedValue(null);

    const response = await GET();

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'No collective configuration found' });
  });

  it('should return the billing run', async () => {
    mockFetchConfig.mockResolvedValue(collectiveConfig());

    const response = await GET();
    const run: BillingRun = await response.json();

    expect(response.status).toBe(200);
    expect(run.collective).toBe('Sonnenhof');
    expect(run.bills.map((b) => [b.memberId, b.netAmount])).toEqual([
      ['host', -3571.2],
      ['tenant', 3571.2],
    ]);
    expect(run.excludedMonths).toEqual([]);
  });

  it('should return 422 for input errors', async () => {
    mockFetchConfig.mockRejectedValue(new ConfigurationError(['name: Collective name is required']));

    const response = await GET();

    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({
      error: 'Invalid collective configuration: name: Collective name is required',
    });
  });

  it('should return 500 for other failures', async () => {
    mockFetchConfig.mockRejectedValue(new Error('connection refused'));

    const response = await GET();

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: 'Failed to run billing' });
    expect(console.error).toHaveBeenCalledWith('Error running billing:', expect.any(Error));
  });
});
