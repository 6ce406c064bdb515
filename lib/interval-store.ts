import { getInfluxClient, getInfluxConfig } from '@/lib/influxdb';
import type { IntervalReading, QualityFlag } from '@/types/meter';

const MEASUREMENT_NAME = 'meter_energy';

/**
 * Source of 15-minute interval readings
 *
 * `start` and `end` are UTC instants bounding a half-open range. Results are
 * sorted ascending by timestamp and contain valid readings only.
 */
export interface IntervalStore {
  readings(meterId: string, start: string, end: string): Promise<IntervalReading[]>;
}

function escapeFlux(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\$/g, '\\$');
}

function toQualityFlag(value: unknown): QualityFlag {
  return value === 'estimated' || value === 'invalid' ? value : 'valid';
}

/**
 * The slice of the InfluxDB QueryApi the store reads through
 */
export interface RowQueryApi {
  queryRows(
    query: string,
    consumer: {
      next(row: string[], tableMeta: { toObject(row: string[]): Record<string, unknown> }): void;
      error(error: Error): void;
      complete(): void;
    }
  ): void;
}

export class InfluxIntervalStore implements IntervalStore {
  constructor(
    private readonly queryApi: RowQueryApi,
    private readonly bucket: string
  ) {}

  buildQuery(meterId: string, start: string, end: string): string {
    return `
      from(bucket: "${escapeFlux(this.bucket)}")
        |> range(start: ${start}, stop: ${end})
        |> filter(fn: (r) => r["_measurement"] == "${MEASUREMENT_NAME}")
        |> filter(fn: (r) => r["meter_id"] == "${escapeFlux(meterId)}")
        |> filter(fn: (r) => r["_field"] == "kwh")
        |> filter(fn: (r) => r["quality"] == "valid")
        |> sort(columns: ["_time"])
    `;
  }

  async readings(meterId: string, start: string, end: string): Promise<IntervalReading[]> {
    const query = this.buildQuery(meterId, start, end);
    const readings: IntervalReading[] = [];

    await new Promise<void>((resolve, reject) => {
      this.queryApi.queryRows(query, {
        next(row, tableMeta) {
          const o = tableMeta.toObject(row);
          const at = typeof o._time === 'string' ? Date.parse(o._time) : NaN;
          const energyKwh = parseFloat(String(o._value));

          if (Number.isNaN(at) || Number.isNaN(energyKwh)) {
            console.warn('[interval-store] Skipping row with missing data:', { time: o._time, value: o._value });
            return;
          }

          readings.push({
            meterId,
            timestamp: new Date(at).toISOString(),
            energyKwh,
            quality: toQualityFlag(o.quality),
          });
        },
        error: reject,
        complete: resolve,
      });
    });

    return readings
      .filter((r) => r.quality === 'valid')
      .sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));
  }
}

export function createIntervalStore(): IntervalStore {
  const config = getInfluxConfig();
  const queryApi = getInfluxClient().getQueryApi(config.org);
  return new InfluxIntervalStore(queryApi, config.bucketReadings);
}
