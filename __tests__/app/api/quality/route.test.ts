/**
 * Unit tests for /api/quality route
 */

import { GET } from '@/app/api/quality/route';
import { NextRequest } from 'next/server';
import { fetchCollectiveConfig } from '@/lib/collective-config';
import { createIntervalStore } from '@/lib/interval-store';
import { InMemoryIntervalStore } from '@/__tests__/mocks/intervalStore';
import { collectiveConfig, scenarioAReadings, slotsOfMonth } from '@/__tests__/fixtures/collective';
import type { MonthStatus } from '@/types/billing';

jest.mock('@/lib/collective-config', () => ({
  fetchCollectiveConfig: jest.fn(),
}));

jest.mock('@/lib/interval-store', () => ({
  createIntervalStore: jest.fn(),
}));

const mockFetchConfig = jest.mocked(fetchCollectiveConfig);
const mockCreateStore = jest.mocked(createIntervalStore);

const gap = slotsOfMonth('2024-02')[0].start;

describe('/api/quality', () => {
  beforeEach(() => {
    mockFetchConfig.mockResolvedValue(collectiveConfig({ periodEnd: '2024-03-01' }));
    mockCreateStore.mockReturnValue(
      new InMemoryIntervalStore(
        [...scenarioAReadings('2024-01'), ...scenarioAReadings('2024-02')].filter(
          (r) => !(r.meterId === 'H-PROD' && r.timestamp === gap)
        )
      )
    );
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should reject a malformed month', async () => {
    const response = await GET(new NextRequest('http://localhost:3000/api/quality?month=2024-13'));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'month must be in YYYY-MM format' });
    expect(mockFetchConfig).not.toHaveBeenCalled();
  });

  it('should report a single month', async () => {
    const response = await GET(new NextRequest('http://localhost:3000/api/quality?month=2024-02'));
    const body: { months: MonthStatus[] } = await response.json();

    expect(response.status).toBe(200);
    expect(body.months).toHaveLength(1);
    expect(body.months[0].billable).toBe(false);
    expect(body.months[0].missing['H-PROD']).toBe(1);
  });

  it('should report every month of the period without a month', async () => {
    const response = await GET(new NextRequest('http://localhost:3000/api/quality'));
    const body: { months: MonthStatus[] } = await response.json();

    expect(body.months.map((m) => [m.month, m.billable])).toEqual([
      ['2024-01', true],
      ['2024-02', false],
    ]);
  });

  it('should return 404 without a configuration', async () => {
    mockFetchConfig.mockResolvedValue(null);

    const response = await GET(new NextRequest('http://localhost:3000/api/quality'));

    expect(response.status).toBe(404);
  });
});
