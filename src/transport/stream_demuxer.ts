/**
 * Splits the raw serial byte stream into binary frame candidates and NMEA
 * sentences.
 *
 * The controller and the GPS module share one link, so 20-byte binary
 * frames and `$...\r\n` ASCII sentences arrive interleaved, possibly with
 * line noise between them. Bytes are processed one at a time:
 *
 * - a `$` on an empty buffer starts an NMEA sentence, which ends at `\r\n`;
 * - anything else accumulates as binary; once 20 bytes are buffered the
 *   'FC' sync marker is searched for and a full frame from it is emitted,
 *   otherwise the oldest byte is discarded;
 * - when discarding leaves a `$` at the front, the buffered bytes are
 *   replayed as the start of a sentence;
 * - more than 100 buffered bytes clears the buffer.
 *
 * Frame candidates are not checksum-validated here.
 *
 * @module transport/stream_demuxer
 */

import type { Logger } from 'pino';
import {
  FRAME_SIZE,
  MAX_DEMUX_BUFFER,
  NMEA_START,
  CR,
  LF,
  SYNC_FC,
  type SyncMarker
} from '../protocol/constants';
import { module_logger } from '../logger';

export type DemuxState = 'seeking' | 'accumulating_nmea' | 'accumulating_binary';

export type DemuxMessage =
  | { kind: 'frame'; bytes: Uint8Array }
  | { kind: 'sentence'; text: string };

export interface DemuxStats {
  /** Bytes dropped while hunting for a sync marker. */
  bytes_discarded: number;
  /** Times the buffer was cleared for exceeding its limit. */
  overflow_resets: number;
  frames_emitted: number;
  sentences_emitted: number;
}

export interface StreamDemuxerOptions {
  logger?: Logger;
  /** Marker that starts an inbound frame. Defaults to 'FC'. */
  sync?: SyncMarker;
}

export class StreamDemuxer {
  private buffer: number[] = [];
  private _state: DemuxState = 'seeking';
  private readonly sync: SyncMarker;
  private readonly log: Logger;
  private readonly _stats: DemuxStats = {
    bytes_discarded: 0,
    overflow_resets: 0,
    frames_emitted: 0,
    sentences_emitted: 0
  };

  constructor(options: StreamDemuxerOptions = {}) {
    this.sync = options.sync ?? SYNC_FC;
    this.log = options.logger ?? module_logger('stream_demuxer');
  }

  get state(): DemuxState {
    return this._state;
  }

  /** Bytes currently buffered. */
  get buffered(): number {
    return this.buffer.length;
  }

  get stats(): Readonly<DemuxStats> {
    return { ...this._stats };
  }

  /** Drop buffered bytes and return to `seeking`. Counters are kept. */
  reset(): void {
    this.buffer = [];
    this._state = 'seeking';
  }

  /** Feed a chunk and return every message it completes, in stream order. */
  feed(chunk: ArrayLike<number>): DemuxMessage[] {
    const out: DemuxMessage[] = [];
    for (let i = 0; i < chunk.length; i++) {
      this.step(chunk[i] & 0xff, out);
    }
    return out;
  }

  /** Process one byte; returns the messages it completes, usually none. */
  push(byte: number): DemuxMessage[] {
    const out: DemuxMessage[] = [];
    this.step(byte & 0xff, out);
    return out;
  }

  private step(b: number, out: DemuxMessage[]): void {
    if (this._state === 'seeking' && this.buffer.length === 0 && b === NMEA_START) {
      this._state = 'accumulating_nmea';
      this.buffer.push(b);
      return;
    }

    this.buffer.push(b);

    if (this.buffer.length > MAX_DEMUX_BUFFER) {
      this.log.debug({ buffered: this.buffer.length, state: this._state }, 'demux buffer overflow, clearing');
      this._stats.bytes_discarded += this.buffer.length;
      this._stats.overflow_resets++;
      this.reset();
      return;
    }

    if (this._state === 'accumulating_nmea') {
      this.scan_nmea(out);
      return;
    }

    this._state = 'accumulating_binary';
    this.scan_binary(out);
  }

  // -------------------------------------------------------------------------
  // Scanners
  // -------------------------------------------------------------------------

  private scan_nmea(out: DemuxMessage[]): void {
    const n = this.buffer.length;
    if (n < 2 || this.buffer[n - 2] !== CR || this.buffer[n - 1] !== LF) {
      return;
    }

    const text = String.fromCharCode(...this.buffer.slice(0, n - 2));
    this.reset();
    this._stats.sentences_emitted++;
    out.push({ kind: 'sentence', text });
  }

  private scan_binary(out: DemuxMessage[]): void {
    if (this.buffer.length < FRAME_SIZE) {
      return;
    }

    const [s0, s1] = this.sync;
    for (let pos = 0; pos + FRAME_SIZE <= this.buffer.length; pos++) {
      if (this.buffer[pos] === s0 && this.buffer[pos + 1] === s1) {
        const bytes = Uint8Array.from(this.buffer.slice(pos, pos + FRAME_SIZE));
        this._stats.bytes_discarded += pos;
        this.buffer = this.buffer.slice(pos + FRAME_SIZE);
        if (this.buffer.length === 0) {
          this._state = 'seeking';
        }
        this._stats.frames_emitted++;
        out.push({ kind: 'frame', bytes });
        return;
      }
    }

    this.buffer.shift();
    this._stats.bytes_discarded++;

    if (this.buffer[0] === NMEA_START) {
      this.replay(out);
    }
  }

  /**
   * Re-run the buffered bytes from an empty buffer. Called with a `$` at the
   * front, so they restart as a sentence; fewer than 20 bytes are replayed,
   * which keeps the replay from reaching the binary scan again.
   */
  private replay(out: DemuxMessage[]): void {
    const pending = this.buffer;
    this.reset();
    for (const b of pending) {
      this.step(b, out);
    }
  }
}
