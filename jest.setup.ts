import '@testing-library/jest-dom';
import { TextEncoder, TextDecoder } from 'util';

// jsdom does not provide these
Object.assign(global, { TextEncoder, TextDecoder });

process.env.INFLUX_URL = 'http://test-influxdb:8086';
process.env.INFLUX_TOKEN = 'test-token';
process.env.INFLUX_ORG = 'test-org';
process.env.INFLUX_BUCKET_READINGS = 'test_readings';
process.env.INFLUX_BUCKET_CONFIG = 'test_config';
