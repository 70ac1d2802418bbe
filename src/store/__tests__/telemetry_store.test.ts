/**
 * Tests for TelemetryStore and its derived values.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { TelemetryStore, battery_percentage, distance_to_home } from '../telemetry_store';
import type { TelemetrySnapshot } from '../store_types';
import type { AhrsSample, GpsEnhancedStatus, GpsFix } from '../../protocol/types';

function ahrs(timestamp: number, roll = 0): AhrsSample {
  return {
    roll,
    pitch: 0,
    yaw: 0,
    altitude: 0,
    roll_sp: 0,
    pitch_sp: 0,
    yaw_sp: 0,
    altitude_sp: 0,
    timestamp
  };
}

function fix(latitude: number, longitude: number, battery_voltage = 4.0, failsafe = 0): GpsFix {
  return {
    source: 'binary',
    latitude,
    longitude,
    altitude: 0,
    battery_voltage,
    swa: 0,
    swc: 0,
    failsafe,
    fix_quality: 1,
    satellites: 0,
    hdop: null,
    timestamp: 0
  };
}

function home(home_lat: number, home_lon: number, home_position_set = true): GpsEnhancedStatus {
  return {
    fix_type: 3,
    satellites_visible: 9,
    hdop: 0.8,
    vdop: 1.1,
    home_lat,
    home_lon,
    home_alt: 0,
    home_position_set,
    timestamp: 0
  };
}

describe('battery_percentage', () => {
  it('maps 3.0-4.2 V onto 0-100', () => {
    expect(battery_percentage(3.0)).toBe(0);
    expect(battery_percentage(3.6)).toBeCloseTo(50, 9);
    expect(battery_percentage(4.2)).toBe(100);
  });

  it('clamps outside that range', () => {
    expect(battery_percentage(2.5)).toBe(0);
    expect(battery_percentage(11.1)).toBe(100);
  });
});

describe('distance_to_home', () => {
  it('is null without a home position', () => {
    expect(distance_to_home(fix(48, 11), null)).toBeNull();
    expect(distance_to_home(fix(48, 11), home(48, 11, false))).toBeNull();
  });

  it('is null for an empty fix', () => {
    expect(distance_to_home(fix(0, 0), home(48, 11))).toBeNull();
  });

  it('scales degrees by 111 km', () => {
    expect(distance_to_home(fix(48.001, 11), home(48, 11))).toBeCloseTo(111, 3);
  });
});

describe('TelemetryStore', () => {
  let store: TelemetryStore;

  beforeEach(() => {
    store = new TelemetryStore(500);
  });

  it('starts empty and disconnected', () => {
    const snap = store.get_snapshot();
    expect(snap.link_state).toBe('disconnected');
    expect(snap.ahrs).toBeNull();
    expect(snap.drops).toEqual({ format: 0, checksum: 0, range: 0, parse: 0 });
  });

  it('keeps the latest AHRS sample', () => {
    store.apply({ type: 'ahrs_updated', data: ahrs(1000, 5) });
    store.apply({ type: 'ahrs_updated', data: ahrs(1010, 6) });
    expect(store.get_snapshot().ahrs?.roll).toBe(6);
  });

  it('derives battery, failsafe and home distance from a GPS fix', () => {
    store.apply({ type: 'gps_enhanced_updated', data: home(48, 11) });
    store.apply({ type: 'gps_updated', data: fix(48.001, 11, 3.4, 1) });

    const snap = store.get_snapshot();
    expect(snap.battery_pct).toBeCloseTo(100 / 3, 9);
    expect(snap.low_battery).toBe(true);
    expect(snap.failsafe).toBe(true);
    expect(snap.distance_to_home_m).toBeCloseTo(111, 3);
  });

  it('stores echoed PID gains per axis', () => {
    store.apply({ type: 'pid_ack_received', data: { axis: 'yaw_rate', p: 1, i: 2, d: 3, timestamp: 0 } });
    const snap = store.get_snapshot();
    expect(snap.pid_gains.yaw_rate).toEqual({ axis: 'yaw_rate', p: 1, i: 2, d: 3, timestamp: 0 });
    expect(snap.pid_gains.roll_inner).toBeNull();
  });

  it('counts unknown messages and drops', () => {
    store.apply({ type: 'unknown_message', msg_id: 0x42, payload: new Uint8Array(16) });
    store.record_drop('checksum');
    store.record_drop('checksum');
    store.record_drop('parse');

    const snap = store.get_snapshot();
    expect(snap.unknown_messages).toBe(1);
    expect(snap.drops).toEqual({ format: 0, checksum: 2, range: 0, parse: 1 });
  });

  it('counts AHRS samples over the last second', () => {
    for (let t = 0; t < 2000; t += 20) {
      store.apply({ type: 'ahrs_updated', data: ahrs(10_000 + t) });
    }
    expect(store.get_snapshot().ahrs_rate_hz).toBe(50);
  });

  it('hands out copies that do not track later changes', () => {
    const before = store.get_snapshot();
    store.record_drop('format');
    before.drops.range = 99;

    expect(before.drops.format).toBe(0);
    expect(store.get_snapshot().drops).toEqual({ format: 1, checksum: 0, range: 0, parse: 0 });
  });

  it('notifies subscribers until they unsubscribe', () => {
    const seen: TelemetrySnapshot[] = [];
    const unsubscribe = store.subscribe((snap) => seen.push(snap));

    store.set_satellites_in_view(11);
    unsubscribe();
    store.set_satellites_in_view(12);

    expect(seen.map((s) => s.satellites_in_view)).toEqual([11]);
  });

  describe('staleness', () => {
    it('does nothing before the first AHRS sample', () => {
      store.tick_stale(5000);
      expect(store.get_snapshot().stale).toBe(false);
    });

    it('goes stale past the threshold and recovers on the next sample', () => {
      store.apply({ type: 'ahrs_updated', data: ahrs(1000) });

      store.tick_stale(1500);
      expect(store.get_snapshot().stale).toBe(false);

      store.tick_stale(1501);
      expect(store.get_snapshot()).toMatchObject({ stale: true, stale_since_ms: 501 });

      store.apply({ type: 'ahrs_updated', data: ahrs(1600) });
      expect(store.get_snapshot()).toMatchObject({ stale: false, stale_since_ms: 0 });
    });

    it('lets the AHRS rate fall while stale', () => {
      store.apply({ type: 'ahrs_updated', data: ahrs(1000) });
      store.apply({ type: 'ahrs_updated', data: ahrs(1100) });
      store.tick_stale(2050);
      expect(store.get_snapshot().ahrs_rate_hz).toBe(1);
    });
  });

  describe('link state', () => {
    it('records the port while connected', () => {
      store.set_link('connected', 'COM3');
      expect(store.get_snapshot()).toMatchObject({ link_state: 'connected', port: 'COM3' });
    });

    it('clears telemetry but keeps counters and gains when the link drops', () => {
      store.set_link('connected', 'COM3');
      store.apply({ type: 'ahrs_updated', data: ahrs(1000) });
      store.apply({ type: 'pid_ack_received', data: { axis: 'roll_inner', p: 1, i: 0, d: 0, timestamp: 0 } });
      store.record_drop('range');

      store.set_link('connecting', null);

      const snap = store.get_snapshot();
      expect(snap.link_state).toBe('connecting');
      expect(snap.ahrs).toBeNull();
      expect(snap.ahrs_rate_hz).toBe(0);
      expect(snap.drops.range).toBe(1);
      expect(snap.pid_gains.roll_inner?.p).toBe(1);
    });

    it('does not go stale on samples from before the link dropped', () => {
      store.set_link('connected', 'COM3');
      store.apply({ type: 'ahrs_updated', data: ahrs(1000) });
      store.set_link('disconnected', null);

      store.tick_stale(9000);
      expect(store.get_snapshot().stale).toBe(false);
    });
  });

  it('reset() returns to defaults', () => {
    store.set_link('connected', 'COM3');
    store.record_drop('format');
    store.reset();
    expect(store.get_snapshot().link_state).toBe('disconnected');
    expect(store.get_snapshot().drops.format).toBe(0);
  });
});
