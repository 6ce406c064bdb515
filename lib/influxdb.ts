import { InfluxDB } from '@influxdata/influxdb-client';

const PLACEHOLDER_TOKEN = 'your_token_here';
const DEFAULT_READINGS_BUCKET = 'vzev_readings';
const DEFAULT_CONFIG_BUCKET = 'vzev_config';

/**
 * Connection settings plus the two buckets the collective uses:
 * interval readings and stored collective configurations
 */
export interface InfluxConfig {
  url: string;
  token: string;
  org: string;
  bucketReadings: string;
  bucketConfig: string;
}

export function getInfluxConfig(env: Partial<NodeJS.ProcessEnv> = process.env): InfluxConfig {
  const { INFLUX_URL: url, INFLUX_TOKEN: token, INFLUX_ORG: org } = env;

  if (!url || !token || !org) {
    const missing = Object.entries({ INFLUX_URL: url, INFLUX_TOKEN: token, INFLUX_ORG: org })
      .filter(([, value]) => !value)
      .map(([name]) => name);
    throw new Error(
      `Missing required InfluxDB environment variables: ${missing.join(', ')}. Please check your .env.local file.`
    );
  }

  if (token === PLACEHOLDER_TOKEN) {
    throw new Error('INFLUX_TOKEN is still set to the placeholder value. Set the token of the collective\'s InfluxDB.');
  }

  return {
    url,
    token,
    org,
    bucketReadings: env.INFLUX_BUCKET_READINGS || DEFAULT_READINGS_BUCKET,
    bucketConfig: env.INFLUX_BUCKET_CONFIG || DEFAULT_CONFIG_BUCKET,
  };
}

export function getInfluxClient(): InfluxDB {
  const { url, token } = getInfluxConfig();
  return new InfluxDB({ url, token });
}
