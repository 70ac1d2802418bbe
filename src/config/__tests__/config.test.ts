import { describe, it, expect } from 'vitest';
import { load_config, validateEnvironment, type EnvironmentVariables } from '../config';

describe('load_config', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(load_config({})).toEqual({
      serial: { port: null, baud: 115200 },
      reconnect: { max_attempts: 5, delay_ms: 2000 },
      nmea: { default_battery_v: 11.5, verify_checksum: false },
      stale_threshold_ms: 500,
      logging: { level: 'info', pretty: false }
    });
  });

  it('reads every variable', () => {
    const config = load_config({
      GS_SERIAL_PORT: '/dev/ttyUSB0',
      GS_SERIAL_BAUD: '57600',
      GS_RECONNECT_MAX_ATTEMPTS: '3',
      GS_RECONNECT_DELAY_MS: '250',
      GS_NMEA_DEFAULT_BATTERY_V: '12.6',
      GS_NMEA_VERIFY_CHECKSUM: 'true',
      GS_STALE_THRESHOLD_MS: '800',
      LOG_LEVEL: 'debug',
      LOG_PRETTY: '1'
    });

    expect(config).toEqual({
      serial: { port: '/dev/ttyUSB0', baud: 57600 },
      reconnect: { max_attempts: 3, delay_ms: 250 },
      nmea: { default_battery_v: 12.6, verify_checksum: true },
      stale_threshold_ms: 800,
      logging: { level: 'debug', pretty: true }
    });
  });

  it('treats any other flag value as false', () => {
    expect(load_config({ LOG_PRETTY: 'yes' }).logging.pretty).toBe(false);
  });
});

describe('validateEnvironment', () => {
  it('returns the parsed variables with numbers converted', () => {
    const vars: EnvironmentVariables = validateEnvironment({ GS_SERIAL_BAUD: '9600' });
    expect(vars.GS_SERIAL_BAUD).toBe(9600);
    expect(vars.GS_SERIAL_PORT).toBeUndefined();
    expect(vars.GS_NMEA_VERIFY_CHECKSUM).toBe(false);
  });

  it('rejects a non-numeric baud rate', () => {
    expect(() => validateEnvironment({ GS_SERIAL_BAUD: 'fast' })).toThrow(/GS_SERIAL_BAUD/);
  });

  it('rejects a negative reconnect delay', () => {
    expect(() => validateEnvironment({ GS_RECONNECT_DELAY_MS: '-1' })).toThrow(
      /Invalid environment configuration/
    );
  });

  it('rejects an unknown log level', () => {
    expect(() => validateEnvironment({ LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL/);
  });

  it('rejects an empty port name', () => {
    expect(() => validateEnvironment({ GS_SERIAL_PORT: '' })).toThrow(/GS_SERIAL_PORT/);
  });
});
