/**
 * Protocol types for the flight controller serial link.
 *
 * Telemetry records produced by the decoders, the decoded frame shape and
 * the discriminated unions returned by every decode step.
 *
 * @module protocol/types
 */

// ---------------------------------------------------------------------------
// PID axes
// ---------------------------------------------------------------------------

/** Control axes with a tunable PID triplet, in message-ID order (0x00..0x05). */
export const PID_AXES = [
  'roll_inner',
  'roll_outer',
  'pitch_inner',
  'pitch_outer',
  'yaw_angle',
  'yaw_rate'
] as const;

export type PidAxis = (typeof PID_AXES)[number];

// ---------------------------------------------------------------------------
// Telemetry records
// ---------------------------------------------------------------------------

/** AHRS sample (msg_id 0x10). Angles in degrees, altitude in metres. */
export interface AhrsSample {
  roll: number;
  pitch: number;
  yaw: number;
  altitude: number;
  roll_sp: number;
  pitch_sp: number;
  yaw_sp: number;
  altitude_sp: number;
  timestamp: number;
}

/** Position fix from the binary GPS frame (0x11) or an NMEA sentence. */
export interface GpsFix {
  source: 'binary' | 'nmea';
  /** Decimal degrees, north positive. */
  latitude: number;
  /** Decimal degrees, east positive. */
  longitude: number;
  /** Metres. Zero where the source has no altitude. */
  altitude: number;
  /** Volts. NMEA fixes carry a configured default. */
  battery_voltage: number;
  /** RC switch A (0=up, 1=down). */
  swa: number;
  /** RC switch C (0=up, 1=mid, 2=down). */
  swc: number;
  /** Receiver failsafe (0=normal, 1=triggered, 2=no receiver data). */
  failsafe: number;
  fix_quality: number;
  satellites: number;
  /** Horizontal dilution of precision, null when the source has none. */
  hdop: number | null;
  timestamp: number;
}

/** Battery status (msg_id 0x12). */
export interface BatteryStatus {
  /** Volts. */
  voltage: number;
  /** Amps, negative while charging. */
  current: number;
  consumption_mah: number;
  cells: number;
  /** mAh. */
  remaining_capacity: number;
  voltage_per_cell: number;
  /** Minutes left at the present draw; 0 when the draw is negligible. */
  estimated_flight_time_min: number;
  timestamp: number;
}

/** One motor's ESC readings. */
export interface EscMotor {
  /** Degrees Celsius. */
  temperature: number;
  voltage: number;
  current: number;
  /** Not carried on the wire; always 0. */
  rpm: number;
}

/** ESC status for the four motors (msg_id 0x13). */
export interface EscStatus {
  motors: [EscMotor, EscMotor, EscMotor, EscMotor];
  timestamp: number;
}

/** Flight mode and arming state (msg_id 0x14). */
export interface FlightModeStatus {
  mode: string;
  mode_id: number;
  armed: boolean;
  arming_state: string;
  timestamp: number;
}

/** Enhanced GPS status with home position (msg_id 0x15). */
export interface GpsEnhancedStatus {
  fix_type: number;
  satellites_visible: number;
  hdop: number;
  vdop: number;
  home_lat: number;
  home_lon: number;
  /** Metres. */
  home_alt: number;
  /** True once the controller reports a non-zero home position. */
  home_position_set: boolean;
  timestamp: number;
}

/** PID gain triplet echoed by the controller (msg_id 0x00..0x05). */
export interface PidGainRecord {
  axis: PidAxis;
  p: number;
  i: number;
  d: number;
  timestamp: number;
}

// ---------------------------------------------------------------------------
// Frames
// ---------------------------------------------------------------------------

/** A validated frame, stripped of sync and checksum. */
export interface DecodedFrame {
  msg_id: number;
  /** Always 16 bytes. */
  payload: Uint8Array;
}

/** Why a 20-byte candidate was rejected by the frame codec. */
export type FrameError = 'bad_length' | 'bad_sync' | 'bad_checksum';

export type FrameDecodeResult =
  | { ok: true; frame: DecodedFrame }
  | { ok: false; error: FrameError; message: string };

// ---------------------------------------------------------------------------
// Drops
// ---------------------------------------------------------------------------

/**
 * Category of a dropped message.
 *
 * - `format`: wrong length or sync; the stream resynchronises.
 * - `checksum`: frame corrupted in transit.
 * - `range`: checksum passed but the values are implausible.
 * - `parse`: malformed NMEA sentence.
 */
export type DropKind = 'format' | 'checksum' | 'range' | 'parse';

export interface DecodeError {
  kind: DropKind;
  message: string;
  msg_id?: number;
}

/** Result of decoding a single record. */
export type RecordResult<T> =
  | { ok: true; record: T }
  | { ok: false; error: DecodeError };

// ---------------------------------------------------------------------------
// Dispatcher output
// ---------------------------------------------------------------------------

/** Discriminated union of every event the dispatcher can produce. */
export type TelemetryEvent =
  | { type: 'ahrs_updated'; data: AhrsSample }
  | { type: 'gps_updated'; data: GpsFix }
  | { type: 'pid_ack_received'; data: PidGainRecord }
  | { type: 'battery_updated'; data: BatteryStatus }
  | { type: 'esc_updated'; data: EscStatus }
  | { type: 'flight_mode_changed'; data: FlightModeStatus }
  | { type: 'gps_enhanced_updated'; data: GpsEnhancedStatus }
  | { type: 'unknown_message'; msg_id: number; payload: Uint8Array };

/** Result of dispatching one decoded message. */
export type DispatchResult =
  | { ok: true; event: TelemetryEvent }
  | { ok: false; error: DecodeError };
