/**
 * Latest-values telemetry store.
 *
 * Single writer, many readers: the link session's events flow in through
 * `apply()`, `record_drop()` and `set_link()`; readers take isolated
 * copies with `get_snapshot()` or are pushed one on every change through
 * `subscribe()`.
 *
 * @module store/telemetry_store
 */

import { type TelemetrySnapshot, default_snapshot } from './store_types';
import type { DropKind, GpsEnhancedStatus, GpsFix, TelemetryEvent } from '../protocol/types';
import type { LinkState } from '../session/link_session';
import {
  STALE_THRESHOLD_MS,
  METRES_PER_DEGREE,
  CELL_EMPTY_V,
  CELL_FULL_V,
  LOW_BATTERY_V
} from '../protocol/constants';

/** Window over which the AHRS rate is counted. */
const RATE_WINDOW_MS = 1000;

/** Battery charge from the GPS-frame voltage, clamped to 0-100 %. */
export function battery_percentage(voltage: number): number {
  const pct = ((voltage - CELL_EMPTY_V) / (CELL_FULL_V - CELL_EMPTY_V)) * 100;
  return Math.min(100, Math.max(0, pct));
}

/**
 * Flat-earth distance between the current fix and home.
 *
 * @returns Metres, or null unless both positions are known.
 */
export function distance_to_home(fix: GpsFix | null, home: GpsEnhancedStatus | null): number | null {
  if (!fix || !home || !home.home_position_set) {
    return null;
  }
  if (fix.latitude === 0 && fix.longitude === 0) {
    return null;
  }
  const dlat = fix.latitude - home.home_lat;
  const dlon = fix.longitude - home.home_lon;
  return Math.sqrt(dlat * dlat + dlon * dlon) * METRES_PER_DEGREE;
}

export class TelemetryStore {
  private snapshot: TelemetrySnapshot = default_snapshot();
  private subscribers: Set<(s: TelemetrySnapshot) => void> = new Set();
  private last_ahrs_ms: number = 0;
  private ahrs_times: number[] = [];
  private readonly stale_threshold_ms: number;

  constructor(stale_threshold_ms: number = STALE_THRESHOLD_MS) {
    this.stale_threshold_ms = stale_threshold_ms;
  }

  /**
   * Register a callback that fires whenever the snapshot changes.
   *
   * @returns An unsubscribe function.
   */
  subscribe(callback: (snapshot: TelemetrySnapshot) => void): () => void {
    this.subscribers.add(callback);
    return () => { this.subscribers.delete(callback); };
  }

  /** Copy of the current snapshot; callers cannot reach the store's state. */
  get_snapshot(): TelemetrySnapshot {
    return {
      ...this.snapshot,
      pid_gains: { ...this.snapshot.pid_gains },
      drops: { ...this.snapshot.drops }
    };
  }

  /** Ingest one telemetry event from the link. */
  apply(event: TelemetryEvent): void {
    const s = this.snapshot;

    switch (event.type) {
      case 'ahrs_updated':
        s.ahrs = event.data;
        this._count_ahrs(event.data.timestamp);
        s.stale = false;
        s.stale_since_ms = 0;
        break;

      case 'gps_updated': {
        const fix = event.data;
        s.gps = fix;
        s.battery_pct = battery_percentage(fix.battery_voltage);
        s.low_battery = fix.battery_voltage < LOW_BATTERY_V;
        s.failsafe = fix.failsafe === 1;
        s.distance_to_home_m = distance_to_home(fix, s.gps_enhanced);
        break;
      }

      case 'pid_ack_received':
        s.pid_gains[event.data.axis] = event.data;
        break;

      case 'battery_updated':
        s.battery = event.data;
        break;

      case 'esc_updated':
        s.esc = event.data;
        break;

      case 'flight_mode_changed':
        s.flight_mode = event.data;
        break;

      case 'gps_enhanced_updated':
        s.gps_enhanced = event.data;
        s.distance_to_home_m = distance_to_home(s.gps, event.data);
        break;

      case 'unknown_message':
        s.unknown_messages++;
        break;
    }

    this._notify();
  }

  record_drop(kind: DropKind): void {
    this.snapshot.drops[kind]++;
    this._notify();
  }

  set_satellites_in_view(count: number): void {
    this.snapshot.satellites_in_view = count;
    this._notify();
  }

  /**
   * Update the link state. Leaving `connected` clears the telemetry
   * values; counters and the last known PID gains are kept.
   */
  set_link(state: LinkState, port: string | null): void {
    const was_connected = this.snapshot.link_state === 'connected';

    if (was_connected && state !== 'connected') {
      const { drops, unknown_messages, pid_gains } = this.snapshot;
      this.snapshot = default_snapshot();
      this.snapshot.drops = drops;
      this.snapshot.unknown_messages = unknown_messages;
      this.snapshot.pid_gains = pid_gains;
      this.last_ahrs_ms = 0;
      this.ahrs_times = [];
    }

    this.snapshot.link_state = state;
    this.snapshot.port = port;
    this._notify();
  }

  /**
   * Called periodically (typically every 100 ms). Once more than the stale
   * threshold has passed since the last AHRS sample the snapshot is marked
   * stale and subscribers are notified.
   */
  tick_stale(now_ms: number): void {
    if (this.last_ahrs_ms === 0) return; // nothing received yet
    const elapsed = now_ms - this.last_ahrs_ms;
    if (elapsed > this.stale_threshold_ms) {
      this.snapshot.stale = true;
      this.snapshot.stale_since_ms = elapsed;
      this._trim_rate_window(now_ms);
      this._notify();
    }
  }

  /** Back to factory defaults. */
  reset(): void {
    this.snapshot = default_snapshot();
    this.last_ahrs_ms = 0;
    this.ahrs_times = [];
    this._notify();
  }

  // --- Private helpers ---

  private _count_ahrs(timestamp: number): void {
    this.last_ahrs_ms = timestamp;
    this.ahrs_times.push(timestamp);
    this._trim_rate_window(timestamp);
  }

  private _trim_rate_window(now_ms: number): void {
    while (this.ahrs_times.length > 0 && now_ms - this.ahrs_times[0] >= RATE_WINDOW_MS) {
      this.ahrs_times.shift();
    }
    this.snapshot.ahrs_rate_hz = this.ahrs_times.length;
  }

  private _notify(): void {
    const snap = this.get_snapshot();
    for (const cb of this.subscribers) {
      cb(snap);
    }
  }
}
