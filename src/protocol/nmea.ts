/**
 * NMEA 0183 sentence parser for the GPS module sharing the serial link.
 *
 * Only GPGGA, GPRMC and GPGSV are recognised. GPGGA and GPRMC yield a
 * position fix; GPGSV carries satellites-in-view only and never yields one.
 * Malformed sentences come back as errors, never as exceptions.
 *
 * @module protocol/nmea
 */

import {
  GPGGA_MIN_FIELDS,
  GPRMC_MIN_FIELDS,
  GPGSV_MIN_FIELDS,
  NMEA_DEFAULT_BATTERY_V
} from './constants';
import type { GpsFix } from './types';

export interface NmeaOptions {
  /** Wall-clock time stamped on the fix. */
  timestamp: number;
  /** Battery voltage reported with the fix. Defaults to 11.5 V. */
  default_battery_v?: number;
  /** Reject sentences whose XOR checksum does not match. Off by default. */
  verify_checksum?: boolean;
}

export type NmeaResult =
  | { ok: true; type: 'GPGGA' | 'GPRMC'; fix: GpsFix }
  | { ok: true; type: 'GPGSV'; fix: null; satellites_in_view: number }
  | { ok: false; error: string };

function fail(error: string): { ok: false; error: string } {
  return { ok: false, error };
}

/**
 * XOR of every character between `$` and `*`.
 *
 * @param body - Sentence text without the leading `$` or the `*` suffix.
 */
export function nmea_checksum(body: string): number {
  let cs = 0;
  for (let i = 0; i < body.length; i++) {
    cs ^= body.charCodeAt(i) & 0xff;
  }
  return cs;
}

/** Parse a numeric field; empty fields take the fallback. NaN when garbled. */
function num_field(field: string, fallback: number): number {
  if (field === '') {
    return fallback;
  }
  const value = Number(field);
  return Number.isFinite(value) ? value : NaN;
}

/**
 * Convert a (D)DDMM.MMMM coordinate to signed decimal degrees.
 *
 * @param value - Coordinate text; empty or "0" means no position.
 * @param degree_digits - 2 for latitude, 3 for longitude.
 * @param hemisphere - N/S/E/W.
 * @returns Decimal degrees, or NaN when the text is not numeric.
 */
function to_decimal_degrees(value: string, degree_digits: number, hemisphere: string): number {
  if (value === '' || value === '0') {
    return 0;
  }
  const degrees = Number(value.slice(0, degree_digits));
  const minutes = Number(value.slice(degree_digits));
  if (!Number.isFinite(degrees) || !Number.isFinite(minutes)) {
    return NaN;
  }
  const decimal = degrees + minutes / 60;
  return hemisphere === 'S' || hemisphere === 'W' ? -decimal : decimal;
}

/**
 * Parse one NMEA sentence.
 *
 * @param sentence - Sentence text starting with `$`. A trailing `\r\n` is ignored.
 */
export function parse_nmea(sentence: string, options: NmeaOptions): NmeaResult {
  const text = sentence.trim();

  if (!text.startsWith('$')) {
    return fail('sentence does not start with $');
  }

  const star = text.indexOf('*');
  if (star === -1 || text.indexOf('*', star + 1) !== -1) {
    return fail('sentence must contain exactly one *');
  }

  const body = text.slice(1, star);

  if (options.verify_checksum) {
    const expected = Number.parseInt(text.slice(star + 1), 16);
    const computed = nmea_checksum(body);
    if (Number.isNaN(expected) || expected !== computed) {
      return fail(`checksum mismatch: computed ${computed.toString(16).padStart(2, '0').toUpperCase()}`);
    }
  }

  const type = text.slice(1, 6);
  const fields = body.split(',');

  switch (type) {
    case 'GPGGA':
      return parse_gpgga(fields, options);
    case 'GPRMC':
      return parse_gprmc(fields, options);
    case 'GPGSV':
      return parse_gpgsv(fields);
    default:
      return fail(`unsupported sentence type: ${type}`);
  }
}

// ---------------------------------------------------------------------------
// GPGGA: fix data
// ---------------------------------------------------------------------------

/**
 * Fields: 0 type, 1 time, 2 lat, 3 N/S, 4 lon, 5 E/W, 6 fix quality,
 * 7 satellites, 8 HDOP, 9 altitude, 10 altitude unit, ...
 */
function parse_gpgga(fields: string[], options: NmeaOptions): NmeaResult {
  if (fields.length < GPGGA_MIN_FIELDS) {
    return fail(`GPGGA too short: ${fields.length} fields`);
  }

  const latitude = to_decimal_degrees(fields[2], 2, fields[3] || 'N');
  const longitude = to_decimal_degrees(fields[4], 3, fields[5] || 'E');
  const fix_quality = num_field(fields[6], 0);
  const satellites = num_field(fields[7], 0);
  const hdop = num_field(fields[8], 0);
  const altitude = num_field(fields[9], 0);

  if ([latitude, longitude, fix_quality, satellites, hdop, altitude].some(Number.isNaN)) {
    return fail('GPGGA has a non-numeric field');
  }

  return {
    ok: true,
    type: 'GPGGA',
    fix: {
      source: 'nmea',
      latitude,
      longitude,
      altitude,
      battery_voltage: options.default_battery_v ?? NMEA_DEFAULT_BATTERY_V,
      swa: 0,
      swc: 0,
      failsafe: 0,
      fix_quality: Math.trunc(fix_quality),
      satellites: Math.trunc(satellites),
      hdop,
      timestamp: options.timestamp
    }
  };
}

// ---------------------------------------------------------------------------
// GPRMC: recommended minimum
// ---------------------------------------------------------------------------

/**
 * Fields: 0 type, 1 time, 2 status (A/V), 3 lat, 4 N/S, 5 lon, 6 E/W,
 * 7 speed, 8 track, 9 date, ...
 */
function parse_gprmc(fields: string[], options: NmeaOptions): NmeaResult {
  if (fields.length < GPRMC_MIN_FIELDS) {
    return fail(`GPRMC too short: ${fields.length} fields`);
  }

  const latitude = to_decimal_degrees(fields[3], 2, fields[4] || 'N');
  const longitude = to_decimal_degrees(fields[5], 3, fields[6] || 'E');

  if (Number.isNaN(latitude) || Number.isNaN(longitude)) {
    return fail('GPRMC has a non-numeric coordinate');
  }

  return {
    ok: true,
    type: 'GPRMC',
    fix: {
      source: 'nmea',
      latitude,
      longitude,
      altitude: 0,
      battery_voltage: options.default_battery_v ?? NMEA_DEFAULT_BATTERY_V,
      swa: 0,
      swc: 0,
      failsafe: 0,
      fix_quality: fields[2] === 'A' ? 1 : 0,
      satellites: 0,
      hdop: null,
      timestamp: options.timestamp
    }
  };
}

// ---------------------------------------------------------------------------
// GPGSV: satellites in view
// ---------------------------------------------------------------------------

/** Fields: 0 type, 1 sentence count, 2 sentence index, 3 satellites in view, ... */
function parse_gpgsv(fields: string[]): NmeaResult {
  if (fields.length < GPGSV_MIN_FIELDS) {
    return fail(`GPGSV too short: ${fields.length} fields`);
  }

  const satellites_in_view = num_field(fields[3], 0);
  if (Number.isNaN(satellites_in_view)) {
    return fail('GPGSV has a non-numeric satellite count');
  }

  return { ok: true, type: 'GPGSV', fix: null, satellites_in_view: Math.trunc(satellites_in_view) };
}
