/**
 * Shape of the telemetry snapshot kept by the TelemetryStore.
 *
 * @module store/store_types
 */

import type {
  AhrsSample,
  BatteryStatus,
  DropKind,
  EscStatus,
  FlightModeStatus,
  GpsEnhancedStatus,
  GpsFix,
  PidAxis,
  PidGainRecord
} from '../protocol/types';
import type { LinkState } from '../session/link_session';

/** Dropped-message counters by reason. */
export type DropCounters = Record<DropKind, number>;

/**
 * Latest-values view of the link, updated by the store on every event.
 *
 * Records are replaced whole, never mutated, so a snapshot may share them
 * with the store.
 */
export interface TelemetrySnapshot {
  // --- Connection ---
  link_state: LinkState;
  /** Open port path, or null. */
  port: string | null;

  // --- Latest records ---
  ahrs: AhrsSample | null;
  gps: GpsFix | null;
  battery: BatteryStatus | null;
  esc: EscStatus | null;
  flight_mode: FlightModeStatus | null;
  gps_enhanced: GpsEnhancedStatus | null;
  /** Last echoed gains per axis. */
  pid_gains: Record<PidAxis, PidGainRecord | null>;
  /** From GPGSV, null until one arrives. */
  satellites_in_view: number | null;

  // --- Derived from the GPS frame ---
  /** 0-100, from the GPS-frame battery voltage. Null before any fix. */
  battery_pct: number | null;
  low_battery: boolean;
  /** Receiver failsafe triggered. */
  failsafe: boolean;
  /** Rough metres to home, null until both positions are known. */
  distance_to_home_m: number | null;

  // --- Link health ---
  /** AHRS samples received in the last second. */
  ahrs_rate_hz: number;
  drops: DropCounters;
  unknown_messages: number;
  /** True when no AHRS sample has arrived within the stale threshold. */
  stale: boolean;
  /** Milliseconds since the last AHRS sample, while stale. */
  stale_since_ms: number;
}

function empty_pid_gains(): Record<PidAxis, PidGainRecord | null> {
  return {
    roll_inner: null,
    roll_outer: null,
    pitch_inner: null,
    pitch_outer: null,
    yaw_angle: null,
    yaw_rate: null
  };
}

/** A fresh snapshot with nothing received. */
export function default_snapshot(): TelemetrySnapshot {
  return {
    link_state: 'disconnected',
    port: null,
    ahrs: null,
    gps: null,
    battery: null,
    esc: null,
    flight_mode: null,
    gps_enhanced: null,
    pid_gains: empty_pid_gains(),
    satellites_in_view: null,
    battery_pct: null,
    low_battery: false,
    failsafe: false,
    distance_to_home_m: null,
    ahrs_rate_hz: 0,
    drops: { format: 0, checksum: 0, range: 0, parse: 0 },
    unknown_messages: 0,
    stale: false,
    stale_since_ms: 0
  };
}
