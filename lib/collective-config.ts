import { Point } from '@influxdata/influxdb-client';
import { getInfluxClient, getInfluxConfig } from '@/lib/influxdb';
import { parseCollectiveConfig } from '@/lib/schemas/collective';
import type { CollectiveConfig } from '@/types/collective';

const MEASUREMENT_NAME = 'collective_config';

/**
 * Loads the latest stored collective configuration, or null if none was saved
 */
export async function fetchCollectiveConfig(): Promise<CollectiveConfig | null> {
  const influx = getInfluxClient();
  const config = getInfluxConfig();
  const queryApi = influx.getQueryApi(config.org);

  const query = `
    from(bucket: "${config.bucketConfig}")
      |> range(start: 0)
      |> filter(fn: (r) => r["_measurement"] == "${MEASUREMENT_NAME}")
      |> filter(fn: (r) => r["_field"] == "config_json")
      |> last()
  `;

  const values: string[] = [];

  await new Promise<void>((resolve, reject) => {
    queryApi.queryRows(query, {
      next(row: string[], tableMeta) {
        const o: Record<string, unknown> = tableMeta.toObject(row);
        if (o._value) {
          values.push(String(o._value));
        }
      },
      error: reject,
      complete: resolve,
    });
  });

  if (values.length === 0) return null;
  return parseCollectiveConfig(JSON.parse(values[values.length - 1]));
}

/**
 * Stores a validated configuration as a new config point
 */
export async function saveCollectiveConfig(collective: CollectiveConfig): Promise<void> {
  const influx = getInfluxClient();
  const config = getInfluxConfig();
  const writeApi = influx.getWriteApi(config.org, config.bucketConfig, 'ms');

  const point = new Point(MEASUREMENT_NAME)
    .tag('collective', collective.name)
    .stringField('config_json', JSON.stringify(collective))
    .intField('member_count', collective.members.length);

  writeApi.writePoint(point);
  await writeApi.close();
}
