/**
 * Fixed-size binary frame codec.
 *
 * Frame layout (20 bytes):
 *   [0-1]   sync marker ('FC' inbound, 'GS' outbound)
 *   [2]     msg_id
 *   [3-18]  payload (16 bytes)
 *   [19]    checksum = (0xFF - sum(bytes[0..18])) & 0xFF
 *
 * Decoding never throws; every failure comes back as a typed result.
 *
 * @module protocol/frame_codec
 */

import {
  FRAME_SIZE,
  PAYLOAD_SIZE,
  MSG_ID_OFFSET,
  PAYLOAD_OFFSET,
  CHECKSUM_OFFSET,
  SYNC_FC,
  SYNC_GS,
  type SyncMarker
} from './constants';
import { checksum_compute, checksum_validate } from './checksum';
import type { DropKind, FrameDecodeResult, FrameError } from './types';

/** Format a byte as two hex digits. */
function hex(byte: number): string {
  return byte.toString(16).padStart(2, '0');
}

/**
 * Decode a 20-byte frame candidate.
 *
 * @param data - Raw frame bytes.
 * @param expected_sync - Marker the frame must start with. Defaults to 'FC'.
 */
export function decode_frame(
  data: Uint8Array,
  expected_sync: SyncMarker = SYNC_FC
): FrameDecodeResult {
  if (data.length !== FRAME_SIZE) {
    return {
      ok: false,
      error: 'bad_length',
      message: `frame length ${data.length} != ${FRAME_SIZE}`
    };
  }

  if (data[0] !== expected_sync[0] || data[1] !== expected_sync[1]) {
    return {
      ok: false,
      error: 'bad_sync',
      message: `sync ${hex(data[0])}${hex(data[1])} != ${hex(expected_sync[0])}${hex(expected_sync[1])}`
    };
  }

  if (!checksum_validate(data)) {
    const computed = checksum_compute(data.subarray(0, CHECKSUM_OFFSET));
    return {
      ok: false,
      error: 'bad_checksum',
      message: `checksum ${hex(data[CHECKSUM_OFFSET])} != computed ${hex(computed)}`
    };
  }

  return {
    ok: true,
    frame: {
      msg_id: data[MSG_ID_OFFSET],
      payload: data.slice(PAYLOAD_OFFSET, PAYLOAD_OFFSET + PAYLOAD_SIZE)
    }
  };
}

/**
 * Build a frame around a payload.
 *
 * Payloads shorter than 16 bytes are zero-padded; longer ones are
 * truncated. Each message type has a fixed layout that fits.
 *
 * @param msg_id - Message ID byte.
 * @param payload - Payload bytes.
 * @param sync - Marker to write. Defaults to 'GS' (station to controller).
 * @returns 20-byte frame.
 */
export function encode_frame(
  msg_id: number,
  payload: ArrayLike<number>,
  sync: SyncMarker = SYNC_GS
): Uint8Array {
  const frame = new Uint8Array(FRAME_SIZE);

  frame[0] = sync[0];
  frame[1] = sync[1];
  frame[MSG_ID_OFFSET] = msg_id & 0xff;

  const count = Math.min(payload.length, PAYLOAD_SIZE);
  for (let i = 0; i < count; i++) {
    frame[PAYLOAD_OFFSET + i] = payload[i] & 0xff;
  }

  frame[CHECKSUM_OFFSET] = checksum_compute(frame.subarray(0, CHECKSUM_OFFSET));
  return frame;
}

/** Map a frame codec failure onto the drop taxonomy. */
export function frame_error_kind(error: FrameError): DropKind {
  return error === 'bad_checksum' ? 'checksum' : 'format';
}
