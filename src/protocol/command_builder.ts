/**
 * Outbound command payload builders.
 *
 * Each builder returns the 16-byte payload for one command; the frame
 * codec wraps it with the 'GS' sync marker and checksum.
 *
 * Commands (station to controller):
 *   0x00..0x05  PID gain set   [P:f32 LE][I:f32 LE][D:f32 LE][zero pad]
 *   0x10        PID request    [axis index | 6 for all][zero pad]
 *
 * @module protocol/command_builder
 */

import {
  PAYLOAD_SIZE,
  MSG_ID_PID_FIRST,
  PID_REQUEST_ALL
} from './constants';
import { PID_AXES, type PidAxis } from './types';

// ---------------------------------------------------------------------------
// Helper: write little-endian values
// ---------------------------------------------------------------------------

/** Write IEEE-754 single-precision little-endian at offset. */
function write_f32_le(buf: Uint8Array, offset: number, value: number): void {
  new DataView(buf.buffer, buf.byteOffset, buf.byteLength).setFloat32(offset, value, true);
}

// ---------------------------------------------------------------------------
// PID axes
// ---------------------------------------------------------------------------

/** True when `name` is one of the six tunable axes. */
export function is_pid_axis(name: string): name is PidAxis {
  return PID_AXES.some((axis) => axis === name);
}

/** Message ID carrying the gains for an axis. */
export function pid_msg_id(axis: PidAxis): number {
  return MSG_ID_PID_FIRST + PID_AXES.indexOf(axis);
}

// ---------------------------------------------------------------------------
// Command builders
// ---------------------------------------------------------------------------

/**
 * Build a PID gain set payload.
 *
 * Values are narrowed to f32 on the wire.
 */
export function build_pid_gain_payload(p: number, i: number, d: number): Uint8Array {
  const buf = new Uint8Array(PAYLOAD_SIZE);
  write_f32_le(buf, 0, p);
  write_f32_le(buf, 4, i);
  write_f32_le(buf, 8, d);
  return buf;
}

/**
 * Build a PID gain request payload.
 *
 * @param axis - Axis to request, or 'all'.
 */
export function build_pid_request_payload(axis: PidAxis | 'all'): Uint8Array {
  const buf = new Uint8Array(PAYLOAD_SIZE);
  buf[0] = axis === 'all' ? PID_REQUEST_ALL : PID_AXES.indexOf(axis);
  return buf;
}

// ---------------------------------------------------------------------------
// Terminal
// ---------------------------------------------------------------------------

/**
 * Turn terminal input into raw bytes.
 *
 * ASCII text is sent as-is (characters above 0x7F are rejected). Hex text
 * may contain whitespace between byte pairs, e.g. "47 53 10".
 *
 * @returns The bytes, or null when the text cannot be encoded.
 */
export function parse_terminal_input(text: string, mode: 'ascii' | 'hex'): Uint8Array | null {
  if (mode === 'ascii') {
    const out = new Uint8Array(text.length);
    for (let i = 0; i < text.length; i++) {
      const code = text.charCodeAt(i);
      if (code > 0x7f) {
        return null;
      }
      out[i] = code;
    }
    return out;
  }

  const digits = text.replace(/\s+/g, '');
  if (digits.length === 0 || digits.length % 2 !== 0 || !/^[0-9a-fA-F]+$/.test(digits)) {
    return null;
  }
  const out = new Uint8Array(digits.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = Number.parseInt(digits.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}
