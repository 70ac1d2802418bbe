/**
 * Single-byte frame checksum.
 *
 * The controller computes `0xFF - sum(bytes)` over the first 19 bytes of a
 * frame and keeps the low 8 bits. Sums wrap modulo 256; nothing here can
 * overflow or throw.
 *
 * @module protocol/checksum
 */

import { CHECKSUM_OFFSET, FRAME_SIZE } from './constants';

/**
 * Compute the checksum over a run of bytes.
 *
 * @param data - Bytes to cover (bytes 0..18 of a frame).
 * @returns Checksum byte (0..255).
 */
export function checksum_compute(data: Uint8Array): number {
  let sum = 0;
  for (let i = 0; i < data.length; i++) {
    sum = (sum + data[i]) & 0xff;
  }
  return (0xff - sum) & 0xff;
}

/**
 * Check the trailing checksum byte of a complete frame.
 *
 * @param frame - A 20-byte frame. Any other length fails.
 */
export function checksum_validate(frame: Uint8Array): boolean {
  if (frame.length !== FRAME_SIZE) {
    return false;
  }
  return checksum_compute(frame.subarray(0, CHECKSUM_OFFSET)) === frame[CHECKSUM_OFFSET];
}
