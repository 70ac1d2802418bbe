/**
 * Protocol constants for the flight controller serial link.
 *
 * Sync markers, message IDs, frame geometry, field scales and the sanity
 * bounds applied to decoded telemetry.
 *
 * @module protocol/constants
 */

// ---------------------------------------------------------------------------
// Frame geometry
// ---------------------------------------------------------------------------

/** Total size of a binary frame on the wire. */
export const FRAME_SIZE = 20;

/** Size of the payload field inside a frame. */
export const PAYLOAD_SIZE = 16;

/** Offset of the message ID byte. */
export const MSG_ID_OFFSET = 2;

/** Offset of the first payload byte. */
export const PAYLOAD_OFFSET = 3;

/** Offset of the trailing checksum byte. */
export const CHECKSUM_OFFSET = 19;

// ---------------------------------------------------------------------------
// Sync markers
// ---------------------------------------------------------------------------

/** Two-byte marker at the start of every frame. */
export type SyncMarker = readonly [number, number];

/** 'FC': controller to station. */
export const SYNC_FC: SyncMarker = [0x46, 0x43];

/** 'GS': station to controller. */
export const SYNC_GS: SyncMarker = [0x47, 0x53];

// ---------------------------------------------------------------------------
// Message IDs
// ---------------------------------------------------------------------------

/** PID gain set/ack, one ID per control axis (0x00..0x05). */
export const MSG_ID_PID_FIRST = 0x00;
export const MSG_ID_PID_LAST = 0x05;

/** AHRS sample (inbound). */
export const MSG_ID_AHRS = 0x10;

/** PID gain request (outbound). Shares its ID with AHRS. */
export const MSG_ID_PID_REQUEST = 0x10;

/** GPS position, binary form. */
export const MSG_ID_GPS = 0x11;

/** Battery status. */
export const MSG_ID_BATTERY = 0x12;

/** ESC / motor status for four motors. */
export const MSG_ID_ESC = 0x13;

/** Flight mode and arming state. */
export const MSG_ID_FLIGHT_MODE = 0x14;

/** Enhanced GPS status with home position. */
export const MSG_ID_GPS_ENHANCED = 0x15;

/** Axis index in a PID request meaning "every axis". */
export const PID_REQUEST_ALL = 0x06;

// ---------------------------------------------------------------------------
// Scales (raw / SCALE = engineering units)
// ---------------------------------------------------------------------------

export const ANGLE_SCALE = 100;
export const AHRS_ALT_SCALE = 10;
export const COORD_SCALE = 1e7;
export const VOLTAGE_SCALE = 100;
export const CURRENT_SCALE = 100;
export const ESC_SCALE = 10;
export const DOP_SCALE = 100;
export const HOME_ALT_SCALE = 10;

// ---------------------------------------------------------------------------
// Sanity bounds
// ---------------------------------------------------------------------------

export const MAX_ROLL_DEG = 180;
export const MAX_PITCH_DEG = 180;
export const MAX_YAW_DEG = 360;
export const MAX_LATITUDE_DEG = 90;
export const MAX_LONGITUDE_DEG = 180;
export const MAX_PID_GAIN = 1000;

// ---------------------------------------------------------------------------
// Stream demuxer
// ---------------------------------------------------------------------------

/** Buffered bytes beyond which the demuxer gives up and resets. */
export const MAX_DEMUX_BUFFER = 100;

/** First byte of every NMEA sentence. */
export const NMEA_START = 0x24; // '$'

export const CR = 0x0d;
export const LF = 0x0a;

// ---------------------------------------------------------------------------
// NMEA
// ---------------------------------------------------------------------------

/** Battery voltage reported with NMEA fixes, which carry none of their own. */
export const NMEA_DEFAULT_BATTERY_V = 11.5;

export const GPGGA_MIN_FIELDS = 15;
export const GPRMC_MIN_FIELDS = 12;
export const GPGSV_MIN_FIELDS = 4;

// ---------------------------------------------------------------------------
// Link session
// ---------------------------------------------------------------------------

export const DEFAULT_BAUD_RATE = 115200;
export const RECONNECT_MAX_ATTEMPTS = 5;
export const RECONNECT_DELAY_MS = 2000;

/** Time allowed for the controller to echo a PID gain set. */
export const PID_ACK_TIMEOUT_MS = 2000;

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

/** No AHRS sample for this long marks the snapshot stale. */
export const STALE_THRESHOLD_MS = 500;

/** Metres per degree used for the rough distance-to-home estimate. */
export const METRES_PER_DEGREE = 111000;

export const CELL_EMPTY_V = 3.0;
export const CELL_FULL_V = 4.2;
export const LOW_BATTERY_V = 3.5;

// ---------------------------------------------------------------------------
// Names
// ---------------------------------------------------------------------------

/** Flight mode names by mode_id. */
export const FLIGHT_MODE_NAMES: Record<number, string> = {
  0: 'MANUAL',
  1: 'STABILIZE',
  2: 'ALT_HOLD',
  3: 'AUTO',
  4: 'RTL',
  5: 'LAND'
};

/** Arming state names by bits 1-2 of the arming byte. */
export const ARMING_STATE_NAMES: Record<number, string> = {
  0: 'STANDBY',
  1: 'ARMING',
  2: 'ARMED',
  3: 'DISARMING'
};
