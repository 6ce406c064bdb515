/**
 * In-process stand-ins for the InfluxDB client
 */

import type { RowQueryApi } from '@/lib/interval-store';

export type MockRow = Record<string, unknown>;

type RowConsumer = Parameters<RowQueryApi['queryRows']>[1];

export class MockQueryApi implements RowQueryApi {
  private mockData: MockRow[] = [];
  private shouldError = false;
  private errorMessage = 'Mock query error';
  readonly queries: string[] = [];

  setMockData(data: MockRow[]): void {
    this.mockData = data;
  }

  setShouldError(shouldError: boolean, message?: string): void {
    this.shouldError = shouldError;
    if (message) {
      this.errorMessage = message;
    }
  }

  queryRows(query: string, consumer: RowConsumer): void {
    this.queries.push(query);

    if (this.shouldError) {
      consumer.error(new Error(this.errorMessage));
      return;
    }

    const tableMeta = {
      toObject: (row: string[]): MockRow => (row[0] ? JSON.parse(row[0]) : {}),
    };

    this.mockData.forEach((data) => {
      consumer.next([JSON.stringify(data)], tableMeta);
    });
    consumer.complete();
  }
}

export interface WrittenPoint {
  measurement: string;
  tags: Record<string, string>;
  fields: Record<string, string | number>;
}

/**
 * Collects points instead of sending them; `closed` flips on flush
 */
export class MockWriteApi {
  readonly points: WrittenPoint[] = [];
  closed = false;

  writePoint(point: WrittenPoint): void {
    this.points.push(point);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * Client stand-in handing out one query and one write api per instance
 */
export class MockInfluxDB {
  readonly queryApi = new MockQueryApi();
  readonly writeApi = new MockWriteApi();
  readonly writeTargets: Array<{ org: string; bucket: string; precision?: string }> = [];

  getQueryApi(_org: string): MockQueryApi {
    return this.queryApi;
  }

  getWriteApi(org: string, bucket: string, precision?: string): MockWriteApi {
    this.writeTargets.push({ org, bucket, precision });
    return this.writeApi;
  }
}

/**
 * Stand-in for the client's Point builder that records what was written
 */
export class MockPoint implements WrittenPoint {
  tags: Record<string, string> = {};
  fields: Record<string, string | number> = {};

  constructor(public measurement: string) {}

  tag(key: string, value: string): this {
    this.tags[key] = value;
    return this;
  }

  stringField(key: string, value: string): this {
    this.fields[key] = value;
    return this;
  }

  intField(key: string, value: number): this {
    this.fields[key] = value;
    return this;
  }
}
