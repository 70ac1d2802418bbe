/**
 * Field decoders for each inbound message type.
 *
 * Every decoder takes the 16-byte payload of a validated frame, applies
 * the scale factors and sanity bounds for its message and returns a typed
 * RecordResult. All multi-byte fields are little-endian. Nothing here
 * throws: short payloads and implausible values come back as errors.
 *
 * @module protocol/payload_decoders
 */

import {
  MSG_ID_AHRS,
  MSG_ID_GPS,
  MSG_ID_BATTERY,
  MSG_ID_ESC,
  MSG_ID_FLIGHT_MODE,
  MSG_ID_GPS_ENHANCED,
  MSG_ID_PID_FIRST,
  MSG_ID_PID_LAST,
  PAYLOAD_SIZE,
  ANGLE_SCALE,
  AHRS_ALT_SCALE,
  COORD_SCALE,
  VOLTAGE_SCALE,
  CURRENT_SCALE,
  ESC_SCALE,
  DOP_SCALE,
  HOME_ALT_SCALE,
  MAX_ROLL_DEG,
  MAX_PITCH_DEG,
  MAX_YAW_DEG,
  MAX_LATITUDE_DEG,
  MAX_LONGITUDE_DEG,
  MAX_PID_GAIN,
  FLIGHT_MODE_NAMES,
  ARMING_STATE_NAMES
} from './constants';
import {
  PID_AXES,
  type AhrsSample,
  type BatteryStatus,
  type DecodeError,
  type EscMotor,
  type EscStatus,
  type FlightModeStatus,
  type GpsEnhancedStatus,
  type GpsFix,
  type PidAxis,
  type PidGainRecord,
  type RecordResult
} from './types';

// ---------------------------------------------------------------------------
// Helper: read little-endian values from Uint8Array
// ---------------------------------------------------------------------------

/** Read unsigned 16-bit little-endian at offset. */
function read_u16_le(data: Uint8Array, offset: number): number {
  return data[offset] | (data[offset + 1] << 8);
}

/** Read signed 16-bit little-endian at offset. */
function read_i16_le(data: Uint8Array, offset: number): number {
  const val = data[offset] | (data[offset + 1] << 8);
  return val >= 0x8000 ? val - 0x10000 : val;
}

/** Read unsigned 32-bit little-endian at offset. */
function read_u32_le(data: Uint8Array, offset: number): number {
  return (
    (data[offset] |
      (data[offset + 1] << 8) |
      (data[offset + 2] << 16) |
      (data[offset + 3] << 24)) >>> 0
  );
}

/** Read signed 32-bit little-endian at offset. */
function read_i32_le(data: Uint8Array, offset: number): number {
  return (
    data[offset] |
    (data[offset + 1] << 8) |
    (data[offset + 2] << 16) |
    (data[offset + 3] << 24)
  );
}

/** Read IEEE-754 single-precision little-endian at offset. */
function read_f32_le(data: Uint8Array, offset: number): number {
  return new DataView(data.buffer, data.byteOffset, data.byteLength).getFloat32(offset, true);
}

type DecodeFailure = { ok: false; error: DecodeError };

function too_short(name: string, msg_id: number, length: number, min: number): DecodeFailure {
  return {
    ok: false,
    error: { kind: 'format', message: `${name} payload too short: ${length} < ${min}`, msg_id }
  };
}

function out_of_range(msg_id: number, message: string): DecodeFailure {
  return { ok: false, error: { kind: 'range', message, msg_id } };
}

// ---------------------------------------------------------------------------
// AHRS (msg_id 0x10)
// ---------------------------------------------------------------------------

/** Bytes needed for the measured values; setpoints follow when present. */
const AHRS_MIN_SIZE = 8;

/**
 * Decode an AHRS payload.
 *
 * Layout:
 *   [0-1]   roll (i16)      / 100 deg
 *   [2-3]   pitch (i16)     / 100 deg
 *   [4-5]   yaw (u16)       / 100 deg
 *   [6-7]   altitude (i16)  / 10 m
 *   [8-15]  setpoints, same types and scales (optional)
 *
 * When the setpoints are absent the measured values stand in for them.
 */
export function decode_ahrs(payload: Uint8Array, timestamp: number): RecordResult<AhrsSample> {
  if (payload.length < AHRS_MIN_SIZE) {
    return too_short('AHRS', MSG_ID_AHRS, payload.length, AHRS_MIN_SIZE);
  }

  const roll = read_i16_le(payload, 0) / ANGLE_SCALE;
  const pitch = read_i16_le(payload, 2) / ANGLE_SCALE;
  const yaw = read_u16_le(payload, 4) / ANGLE_SCALE;
  const altitude = read_i16_le(payload, 6) / AHRS_ALT_SCALE;

  const has_setpoints = payload.length >= PAYLOAD_SIZE;

  if (Math.abs(roll) > MAX_ROLL_DEG || Math.abs(pitch) > MAX_PITCH_DEG || Math.abs(yaw) > MAX_YAW_DEG) {
    return out_of_range(
      MSG_ID_AHRS,
      `AHRS angles out of range: roll=${roll} pitch=${pitch} yaw=${yaw}`
    );
  }

  return {
    ok: true,
    record: {
      roll,
      pitch,
      yaw,
      altitude,
      roll_sp: has_setpoints ? read_i16_le(payload, 8) / ANGLE_SCALE : roll,
      pitch_sp: has_setpoints ? read_i16_le(payload, 10) / ANGLE_SCALE : pitch,
      yaw_sp: has_setpoints ? read_u16_le(payload, 12) / ANGLE_SCALE : yaw,
      altitude_sp: has_setpoints ? read_i16_le(payload, 14) / AHRS_ALT_SCALE : altitude,
      timestamp
    }
  };
}

// ---------------------------------------------------------------------------
// GPS, binary form (msg_id 0x11)
// ---------------------------------------------------------------------------

const GPS_MIN_SIZE = 13;

/**
 * Check a fix against the coordinate bounds. Shared by the binary decoder
 * and the dispatcher's NMEA path.
 */
export function validate_fix(fix: GpsFix): RecordResult<GpsFix> {
  if (Math.abs(fix.latitude) > MAX_LATITUDE_DEG || Math.abs(fix.longitude) > MAX_LONGITUDE_DEG) {
    return out_of_range(
      MSG_ID_GPS,
      `GPS coordinates out of range: lat=${fix.latitude} lon=${fix.longitude}`
    );
  }
  return { ok: true, record: fix };
}

/**
 * Decode a binary GPS payload.
 *
 * Layout:
 *   [0-3]   latitude (i32)   / 1e7 deg
 *   [4-7]   longitude (i32)  / 1e7 deg
 *   [8-9]   battery (u16)    / 100 V
 *   [10]    SwA
 *   [11]    SwC
 *   [12]    failsafe
 *
 * The frame carries no altitude or satellite count; a non-zero position
 * counts as a fix.
 */
export function decode_gps(payload: Uint8Array, timestamp: number): RecordResult<GpsFix> {
  if (payload.length < GPS_MIN_SIZE) {
    return too_short('GPS', MSG_ID_GPS, payload.length, GPS_MIN_SIZE);
  }

  const latitude = read_i32_le(payload, 0) / COORD_SCALE;
  const longitude = read_i32_le(payload, 4) / COORD_SCALE;

  return validate_fix({
    source: 'binary',
    latitude,
    longitude,
    altitude: 0,
    battery_voltage: read_u16_le(payload, 8) / VOLTAGE_SCALE,
    swa: payload[10],
    swc: payload[11],
    failsafe: payload[12],
    fix_quality: latitude !== 0 && longitude !== 0 ? 1 : 0,
    satellites: 0,
    hdop: null,
    timestamp
  });
}

// ---------------------------------------------------------------------------
// PID gains (msg_id 0x00..0x05)
// ---------------------------------------------------------------------------

const PID_MIN_SIZE = 12;

/** True for message IDs that carry a PID triplet. */
export function is_pid_msg_id(msg_id: number): boolean {
  return msg_id >= MSG_ID_PID_FIRST && msg_id <= MSG_ID_PID_LAST;
}

/** Axis carried by a PID message ID, or null outside 0x00..0x05. */
export function pid_axis_for(msg_id: number): PidAxis | null {
  return is_pid_msg_id(msg_id) ? PID_AXES[msg_id - MSG_ID_PID_FIRST] : null;
}

function is_valid_gain(value: number): boolean {
  return Number.isFinite(value) && Math.abs(value) <= MAX_PID_GAIN;
}

/**
 * Decode a PID gain acknowledgement.
 *
 * Layout:
 *   [0-3]   P (f32)
 *   [4-7]   I (f32)
 *   [8-11]  D (f32)
 */
export function decode_pid_gains(
  msg_id: number,
  payload: Uint8Array,
  timestamp: number
): RecordResult<PidGainRecord> {
  const axis = pid_axis_for(msg_id);
  if (axis === null) {
    return {
      ok: false,
      error: { kind: 'format', message: `not a PID message: 0x${msg_id.toString(16)}`, msg_id }
    };
  }
  if (payload.length < PID_MIN_SIZE) {
    return too_short('PID', msg_id, payload.length, PID_MIN_SIZE);
  }

  const p = read_f32_le(payload, 0);
  const i = read_f32_le(payload, 4);
  const d = read_f32_le(payload, 8);

  if (!is_valid_gain(p) || !is_valid_gain(i) || !is_valid_gain(d)) {
    return out_of_range(msg_id, `PID gains out of range for ${axis}: P=${p} I=${i} D=${d}`);
  }

  return { ok: true, record: { axis, p, i, d, timestamp } };
}

// ---------------------------------------------------------------------------
// Battery (msg_id 0x12)
// ---------------------------------------------------------------------------

const BATTERY_MIN_SIZE = 11;

/** Current below which no flight-time estimate is made (A). */
const MIN_ESTIMATE_CURRENT_A = 0.1;

/**
 * Decode a battery status payload.
 *
 * Layout:
 *   [0-1]   voltage (u16)      / 100 V
 *   [2-3]   current (i16)      / 100 A
 *   [4-7]   consumption (u32)  mAh
 *   [8]     cells
 *   [9-10]  remaining (u16)    mAh
 */
export function decode_battery(payload: Uint8Array, timestamp: number): RecordResult<BatteryStatus> {
  if (payload.length < BATTERY_MIN_SIZE) {
    return too_short('Battery', MSG_ID_BATTERY, payload.length, BATTERY_MIN_SIZE);
  }

  const voltage = read_u16_le(payload, 0) / VOLTAGE_SCALE;
  const current = read_i16_le(payload, 2) / CURRENT_SCALE;
  const cells = payload[8];
  const remaining_capacity = read_u16_le(payload, 9);

  return {
    ok: true,
    record: {
      voltage,
      current,
      consumption_mah: read_u32_le(payload, 4),
      cells,
      remaining_capacity,
      voltage_per_cell: cells > 0 ? voltage / cells : 0,
      estimated_flight_time_min:
        current > MIN_ESTIMATE_CURRENT_A ? (remaining_capacity / (current * 1000)) * 60 : 0,
      timestamp
    }
  };
}

// ---------------------------------------------------------------------------
// ESC (msg_id 0x13)
// ---------------------------------------------------------------------------

const ESC_MOTORS = 4;
const ESC_STRIDE = 3;

/**
 * Decode four ESC readings.
 *
 * Layout, per motor n at offset 3n:
 *   [+0]  temperature (u8)  degC
 *   [+1]  voltage (u8)      / 10 V
 *   [+2]  current (u8)      / 10 A
 */
export function decode_esc(payload: Uint8Array, timestamp: number): RecordResult<EscStatus> {
  const min = ESC_MOTORS * ESC_STRIDE;
  if (payload.length < min) {
    return too_short('ESC', MSG_ID_ESC, payload.length, min);
  }

  const motor = (n: number): EscMotor => {
    const base = n * ESC_STRIDE;
    return {
      temperature: payload[base],
      voltage: payload[base + 1] / ESC_SCALE,
      current: payload[base + 2] / ESC_SCALE,
      rpm: 0
    };
  };

  return {
    ok: true,
    record: { motors: [motor(0), motor(1), motor(2), motor(3)], timestamp }
  };
}

// ---------------------------------------------------------------------------
// Flight mode (msg_id 0x14)
// ---------------------------------------------------------------------------

/**
 * Decode flight mode and arming state.
 *
 * Layout:
 *   [0]  mode_id
 *   [1]  arming byte: bit0 = armed, bits 1-2 = arming state
 */
export function decode_flight_mode(
  payload: Uint8Array,
  timestamp: number
): RecordResult<FlightModeStatus> {
  if (payload.length < 2) {
    return too_short('Flight mode', MSG_ID_FLIGHT_MODE, payload.length, 2);
  }

  const mode_id = payload[0];
  const arming = payload[1];

  return {
    ok: true,
    record: {
      mode: FLIGHT_MODE_NAMES[mode_id] ?? 'UNKNOWN',
      mode_id,
      armed: (arming & 0x01) !== 0,
      arming_state: ARMING_STATE_NAMES[(arming >> 1) & 0x03] ?? 'UNKNOWN',
      timestamp
    }
  };
}

// ---------------------------------------------------------------------------
// Enhanced GPS (msg_id 0x15)
// ---------------------------------------------------------------------------

/**
 * Decode enhanced GPS status.
 *
 * Layout:
 *   [0]      fix type
 *   [1]      satellites visible
 *   [2-3]    HDOP (u16)      / 100
 *   [4-5]    VDOP (u16)      / 100
 *   [6-9]    home lat (i32)  / 1e7 deg
 *   [10-13]  home lon (i32)  / 1e7 deg
 *   [14-15]  home alt (i16)  / 10 m
 */
export function decode_gps_enhanced(
  payload: Uint8Array,
  timestamp: number
): RecordResult<GpsEnhancedStatus> {
  if (payload.length < PAYLOAD_SIZE) {
    return too_short('Enhanced GPS', MSG_ID_GPS_ENHANCED, payload.length, PAYLOAD_SIZE);
  }

  const home_lat = read_i32_le(payload, 6) / COORD_SCALE;
  const home_lon = read_i32_le(payload, 10) / COORD_SCALE;

  return {
    ok: true,
    record: {
      fix_type: payload[0],
      satellites_visible: payload[1],
      hdop: read_u16_le(payload, 2) / DOP_SCALE,
      vdop: read_u16_le(payload, 4) / DOP_SCALE,
      home_lat,
      home_lon,
      home_alt: read_i16_le(payload, 14) / HOME_ALT_SCALE,
      home_position_set: home_lat !== 0 && home_lon !== 0,
      timestamp
    }
  };
}
