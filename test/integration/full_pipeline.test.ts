/**
 * Integration tests for the ground link pipeline.
 *
 * Drives raw bytes through transport, demuxer, codec, dispatcher and
 * session into the telemetry store and PID tracker, with an in-process
 * transport standing in for the serial port.
 *
 * @module test/integration/full_pipeline
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { create_ground_link, type GroundLink } from '../../src/app';
import { load_config } from '../../src/config/config';
import { create_logger } from '../../src/logger';
import { pid_msg_id } from '../../src/protocol/command_builder';
import type { PidAckOutcome } from '../../src/command/pid_ack_tracker';
import { FakeTransport } from '../fixtures/fake_transport';
import {
  AHRS_FRAME,
  GPS_FRAME,
  GPGGA_SENTENCE,
  GPGSV_SENTENCE,
  fc_frame,
  pid_payload,
  sentence_bytes
} from '../fixtures/frames';

const silent = create_logger({ level: 'silent', pretty: false });

function build(transport: FakeTransport, env: Record<string, string> = { GS_SERIAL_PORT: 'COM1' }): GroundLink {
  return create_ground_link({
    config: load_config(env),
    transport,
    logger: silent,
    now: () => Date.now()
  });
}

describe('Full Pipeline Integration', () => {
  let transport: FakeTransport;
  let link: GroundLink;

  beforeEach(() => {
    vi.useFakeTimers();
    transport = new FakeTransport();
    transport.openable.add('COM1');
    link = build(transport);
  });

  afterEach(async () => {
    await link.stop();
    vi.useRealTimers();
  });

  it('connects to the configured port on start', async () => {
    await link.start();

    expect(transport.open_calls).toEqual(['COM1']);
    expect(link.store.get_snapshot()).toMatchObject({ link_state: 'connected', port: 'COM1' });
  });

  it('only lists ports when none is configured', async () => {
    await link.stop();
    link = build(transport, {});

    await link.start();

    expect(transport.list_calls).toBe(1);
    expect(transport.open_calls).toEqual([]);
    expect(link.store.get_snapshot().link_state).toBe('disconnected');
  });

  it('carries binary frames and NMEA sentences into the snapshot', async () => {
    await link.start();
    const handle = transport.last_handle();

    handle.receive([
      ...AHRS_FRAME,
      ...sentence_bytes(GPGSV_SENTENCE),
      ...GPS_FRAME,
      ...sentence_bytes(GPGGA_SENTENCE)
    ]);

    const snap = link.store.get_snapshot();
    expect(snap.ahrs?.roll).toBe(10);
    expect(snap.ahrs_rate_hz).toBe(1);
    expect(snap.satellites_in_view).toBe(11);
    expect(snap.gps?.source).toBe('nmea');
    expect(snap.gps?.satellites).toBe(8);
    expect(snap.battery_pct).toBe(100);
    expect(snap.low_battery).toBe(false);
    expect(snap.drops).toEqual({ format: 0, checksum: 0, range: 0, parse: 0 });
  });

  it('counts dropped messages by reason', async () => {
    await link.start();
    const corrupt = Uint8Array.from(AHRS_FRAME);
    corrupt[6] ^= 0x04;

    transport.last_handle().receive([...corrupt, ...sentence_bytes('$GPXYZ,1*00'), ...fc_frame(0x42)]);

    const snap = link.store.get_snapshot();
    expect(snap.drops).toEqual({ format: 0, checksum: 1, range: 0, parse: 1 });
    expect(snap.unknown_messages).toBe(1);
  });

  it('confirms a PID gain set when the controller echoes it', async () => {
    await link.start();
    const outcomes: PidAckOutcome[] = [];
    link.tracker.on('resolved', (outcome: PidAckOutcome) => outcomes.push(outcome));

    await expect(link.session.send_pid_gain('roll_outer', 4, 0.5, 0.0625)).resolves.toBe(true);
    expect(link.tracker.is_pending('roll_outer')).toBe(true);

    vi.advanceTimersByTime(40);
    transport.last_handle().receive(fc_frame(pid_msg_id('roll_outer'), pid_payload(4, 0.5, 0.0625)));

    expect(outcomes.map((o) => [o.axis, o.result, o.elapsed_ms])).toEqual([['roll_outer', 'acked', 40]]);
    expect(link.store.get_snapshot().pid_gains.roll_outer).toMatchObject({ p: 4, i: 0.5, d: 0.0625 });
  });

  it('reports a PID gain set the controller never echoes', async () => {
    await link.start();
    const outcomes: PidAckOutcome[] = [];
    link.tracker.on('resolved', (outcome: PidAckOutcome) => outcomes.push(outcome));

    await link.session.send_pid_gain('pitch_inner', 1, 0, 0);
    vi.advanceTimersByTime(2000);

    expect(outcomes.map((o) => o.result)).toEqual(['timeout']);
  });

  it('marks the snapshot stale when AHRS stops', async () => {
    await link.start();
    transport.last_handle().receive(AHRS_FRAME);

    vi.advanceTimersByTime(500);
    expect(link.store.get_snapshot().stale).toBe(false);

    vi.advanceTimersByTime(100);
    expect(link.store.get_snapshot()).toMatchObject({ stale: true, stale_since_ms: 600 });

    transport.last_handle().receive(AHRS_FRAME);
    expect(link.store.get_snapshot().stale).toBe(false);
  });

  it('clears telemetry on link loss and resumes after reconnecting', async () => {
    transport.ports = ['COM1'];
    await link.start();
    const first = transport.last_handle();
    first.receive(AHRS_FRAME);

    first.unplug();
    expect(link.store.get_snapshot()).toMatchObject({ link_state: 'connecting', ahrs: null });

    await vi.advanceTimersByTimeAsync(0);
    expect(link.store.get_snapshot()).toMatchObject({ link_state: 'connected', port: 'COM1' });

    transport.last_handle().receive(AHRS_FRAME);
    expect(link.store.get_snapshot().ahrs?.yaw).toBe(90);
  });

  it('stop() closes the link and clears its timers', async () => {
    await link.start();
    const handle = transport.last_handle();

    await link.stop();

    expect(handle.is_open()).toBe(false);
    expect(link.session.state).toBe('disconnected');
    expect(vi.getTimerCount()).toBe(0);
  });
});
