/**
 * Unit tests for lib/influxdb.ts
 */

import { getInfluxConfig, getInfluxClient } from '@/lib/influxdb';
import { InfluxDB } from '@influxdata/influxdb-client';

jest.mock('@influxdata/influxdb-client');

const connection = {
  INFLUX_URL: 'http://influxdb:8086',
  INFLUX_TOKEN: 'test-secret',
  INFLUX_ORG: 'collective-org',
};

describe('getInfluxConfig', () => {
  it('should read connection and buckets from the environment', () => {
    const config = getInfluxConfig({
      ...connection,
      INFLUX_BUCKET_READINGS: 'readings',
      INFLUX_BUCKET_CONFIG: 'settings',
    });

    expect(config).toEqual({
      url: 'http://influxdb:8086',
      token: 'test-secret',
      org: 'collective-org',
      bucketReadings: 'readings',
      bucketConfig: 'settings',
    });
  });

  it('should fall back to the default buckets', () => {
    const config = getInfluxConfig({ ...connection, INFLUX_BUCKET_CONFIG: '' });

    expect(config.bucketReadings).toBe('vzev_readings');
    expect(config.bucketConfig).toBe('vzev_config');
  });

  it('should name every missing connection variable', () => {
    expect(() => getInfluxConfig({ INFLUX_TOKEN: 'test-secret' })).toThrow(
      'Missing required InfluxDB environment variables: INFLUX_URL, INFLUX_ORG.'
    );
  });

  it('should reject the placeholder token', () => {
    expect(() => getInfluxConfig({ ...connection, INFLUX_TOKEN: 'your_token_here' })).toThrow(
      'INFLUX_TOKEN is still set to the placeholder value'
    );
  });

  it('should read process.env by default', () => {
    expect(getInfluxConfig().bucketReadings).toBe('test_readings');
    expect(getInfluxConfig().org).toBe('test-org');
  });
});

describe('getInfluxClient', () => {
  const originalEnv = process.env;

  afterEach(() => {
    process.env = originalEnv;
  });

  it('should connect with url and token', () => {
    const client = getInfluxClient();

    expect(InfluxDB).toHaveBeenCalledWith({ url: 'http://test-influxdb:8086', token: 'test-token' });
    expect(client).toBeInstanceOf(InfluxDB);
  });

  it('should not connect without configuration', () => {
    process.env = { ...originalEnv, INFLUX_URL: '' };

    expect(() => getInfluxClient()).toThrow('Missing required InfluxDB environment variables: INFLUX_URL.');
  });
});
