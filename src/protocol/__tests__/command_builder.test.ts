/**
 * Tests for outbound command payload builders.
 */

import { describe, it, expect } from 'vitest';
import {
  build_pid_gain_payload,
  build_pid_request_payload,
  is_pid_axis,
  parse_terminal_input,
  pid_msg_id
} from '../command_builder';
import { decode_pid_gains } from '../payload_decoders';
import { PAYLOAD_SIZE } from '../constants';

describe('pid_msg_id', () => {
  it('numbers the axes 0x00..0x05', () => {
    expect(pid_msg_id('roll_inner')).toBe(0x00);
    expect(pid_msg_id('pitch_outer')).toBe(0x03);
    expect(pid_msg_id('yaw_rate')).toBe(0x05);
  });
});

describe('is_pid_axis', () => {
  it('recognises axis names only', () => {
    expect(is_pid_axis('yaw_angle')).toBe(true);
    expect(is_pid_axis('yaw')).toBe(false);
  });
});

describe('build_pid_gain_payload', () => {
  it('writes P, I and D as little-endian f32', () => {
    const payload = build_pid_gain_payload(1.5, 0.25, -2);
    expect(payload.length).toBe(PAYLOAD_SIZE);
    expect(Array.from(payload.subarray(0, 12))).toEqual([
      0x00, 0x00, 0xc0, 0x3f,
      0x00, 0x00, 0x80, 0x3e,
      0x00, 0x00, 0x00, 0xc0
    ]);
    expect(Array.from(payload.subarray(12))).toEqual([0, 0, 0, 0]);
  });

  it('is read back by the PID decoder', () => {
    const result = decode_pid_gains(pid_msg_id('roll_outer'), build_pid_gain_payload(4, 0.5, 0.0625), 0);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.record).toEqual({ axis: 'roll_outer', p: 4, i: 0.5, d: 0.0625, timestamp: 0 });
  });
});

describe('build_pid_request_payload', () => {
  it('puts the axis index in byte 0', () => {
    const payload = build_pid_request_payload('pitch_outer');
    expect(payload.length).toBe(PAYLOAD_SIZE);
    expect(payload[0]).toBe(3);
    expect(payload.subarray(1).every((b) => b === 0)).toBe(true);
  });

  it('uses 6 for every axis', () => {
    expect(build_pid_request_payload('all')[0]).toBe(6);
  });
});

describe('parse_terminal_input', () => {
  it('passes ASCII text through', () => {
    expect(Array.from(parse_terminal_input('AT', 'ascii') ?? [])).toEqual([0x41, 0x54]);
  });

  it('refuses non-ASCII characters', () => {
    expect(parse_terminal_input('café', 'ascii')).toBeNull();
  });

  it('parses hex byte pairs separated by whitespace', () => {
    expect(Array.from(parse_terminal_input('47 53 0a', 'hex') ?? [])).toEqual([0x47, 0x53, 0x0a]);
    expect(Array.from(parse_terminal_input('4753', 'hex') ?? [])).toEqual([0x47, 0x53]);
  });

  it('refuses malformed hex', () => {
    expect(parse_terminal_input('475', 'hex')).toBeNull();
    expect(parse_terminal_input('zz', 'hex')).toBeNull();
    expect(parse_terminal_input('  ', 'hex')).toBeNull();
  });
});
