/**
 * Serial link to the flight controller.
 *
 * Owns the open handle, the stream demuxer and the reconnection policy.
 * Every inbound chunk is demultiplexed, decoded and dispatched in the
 * handle's 'data' callback; the resulting telemetry is re-emitted as
 * `'telemetry'` events and rejected messages as `'drop'` events.
 *
 * Losing the link (I/O error or unexpected close) starts a reconnect
 * loop: each attempt enumerates the ports and tries every one at the
 * session baud rate, with a fixed delay between attempts. When the
 * attempts run out the session settles in `disconnected` and stays there
 * until `connect()` is called again.
 *
 * Outbound writes go through a single promise chain so frames are never
 * interleaved on the wire.
 *
 * @module session/link_session
 */

import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import {
  DEFAULT_BAUD_RATE,
  RECONNECT_MAX_ATTEMPTS,
  RECONNECT_DELAY_MS,
  MSG_ID_PID_REQUEST,
  MAX_PID_GAIN,
  SYNC_FC,
  SYNC_GS
} from '../protocol/constants';
import { decode_frame, encode_frame, frame_error_kind } from '../protocol/frame_codec';
import { parse_nmea } from '../protocol/nmea';
import {
  build_pid_gain_payload,
  build_pid_request_payload,
  parse_terminal_input,
  pid_msg_id
} from '../protocol/command_builder';
import type { DecodeError, DispatchResult, PidAxis, TelemetryEvent } from '../protocol/types';
import { StreamDemuxer, type DemuxMessage, type DemuxStats } from '../transport/stream_demuxer';
import type { SerialHandle, SerialTransport } from '../transport/serial_transport';
import type { PortInfo } from '../transport/port_scanner';
import { dispatch } from '../dispatch/dispatcher';
import { module_logger } from '../logger';

export type LinkState = 'disconnected' | 'connecting' | 'connected';

/** A PID gain set that was written to the link. */
export interface PidGainCommand {
  axis: PidAxis;
  p: number;
  i: number;
  d: number;
}

/**
 * Events emitted by {@link LinkSession}.
 *
 * - `'telemetry'`: Decoded telemetry event.
 * - `'drop'`: A message was rejected; carries the reason.
 * - `'state'`: Link state changed (new state, previous state).
 * - `'satellites'`: Satellites in view from a GPGSV sentence.
 * - `'pid_gain_sent'`: A PID gain set was written.
 * - `'reconnected'`: The link came back on `path` after `attempt` tries.
 * - `'reconnect_failed'`: Every reconnect attempt failed.
 */
export interface LinkSessionEvents {
  telemetry: (event: TelemetryEvent) => void;
  drop: (error: DecodeError) => void;
  state: (state: LinkState, previous: LinkState) => void;
  satellites: (satellites_in_view: number) => void;
  pid_gain_sent: (command: PidGainCommand) => void;
  reconnected: (path: string, attempt: number) => void;
  reconnect_failed: (attempts: number) => void;
}

export interface LinkSessionOptions {
  transport: SerialTransport;
  logger?: Logger;
  reconnect_max_attempts?: number;
  reconnect_delay_ms?: number;
  nmea?: {
    default_battery_v?: number;
    verify_checksum?: boolean;
  };
  /** Epoch-ms clock stamped on decoded records. */
  now?: () => number;
}

export class LinkSession extends EventEmitter {
  private readonly transport: SerialTransport;
  private readonly log: Logger;
  private readonly max_attempts: number;
  private readonly delay_ms: number;
  private readonly nmea_battery_v: number | undefined;
  private readonly nmea_verify: boolean;
  private readonly now: () => number;

  private readonly demuxer: StreamDemuxer;
  private handle: SerialHandle | null = null;
  private _state: LinkState = 'disconnected';
  private baud = DEFAULT_BAUD_RATE;

  /** Bumped by connect()/disconnect(); a reconnect loop from an older epoch stops. */
  private epoch = 0;
  private delay_timer: ReturnType<typeof setTimeout> | null = null;
  private wake_delay: (() => void) | null = null;

  private write_chain: Promise<void> = Promise.resolve();

  constructor(options: LinkSessionOptions) {
    super();
    this.transport = options.transport;
    this.log = options.logger ?? module_logger('link_session');
    this.max_attempts = options.reconnect_max_attempts ?? RECONNECT_MAX_ATTEMPTS;
    this.delay_ms = options.reconnect_delay_ms ?? RECONNECT_DELAY_MS;
    this.nmea_battery_v = options.nmea?.default_battery_v;
    this.nmea_verify = options.nmea?.verify_checksum ?? false;
    this.now = options.now ?? Date.now;
    this.demuxer = new StreamDemuxer({ logger: this.log, sync: SYNC_FC });
  }

  get state(): LinkState {
    return this._state;
  }

  /** Path of the open port, or null. */
  get port_path(): string | null {
    return this.handle?.path ?? null;
  }

  get demux_stats(): Readonly<DemuxStats> {
    return this.demuxer.stats;
  }

  is_connected(): boolean {
    return this._state === 'connected' && this.handle !== null;
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Open the link.
   *
   * Cancels any reconnect loop in progress.
   *
   * @throws If already connected, or with the transport's error when the
   *         port cannot be opened. The session is then `disconnected`.
   */
  async connect(path: string, baud: number = DEFAULT_BAUD_RATE): Promise<void> {
    if (this.handle) {
      throw new Error('LinkSession: already connected, call disconnect() first');
    }

    const epoch = ++this.epoch;
    this.cancel_delay();
    this.baud = baud;
    this.set_state('connecting');

    let handle: SerialHandle;
    try {
      handle = await this.transport.open(path, baud);
    } catch (err) {
      if (epoch === this.epoch) {
        this.set_state('disconnected');
      }
      this.log.warn({ err, path, baud }, 'failed to open link');
      throw err;
    }

    if (epoch !== this.epoch) {
      await this.close_quietly(handle);
      throw new Error(`LinkSession: connect to ${path} cancelled`);
    }

    this.attach(handle);
    this.set_state('connected');
    this.log.info({ path, baud }, 'link connected');
  }

  /** Close the link and stop any reconnect loop. Safe to call at any time. */
  async disconnect(): Promise<void> {
    this.epoch++;
    this.cancel_delay();

    const handle = this.handle;
    this.handle = null;
    this.demuxer.reset();
    this.set_state('disconnected');

    if (handle) {
      handle.removeAllListeners();
      await this.close_quietly(handle);
      this.log.info({ path: handle.path }, 'link disconnected');
    }
  }

  // -------------------------------------------------------------------------
  // Commands
  // -------------------------------------------------------------------------

  /**
   * Frame a payload with the 'GS' marker and write it.
   *
   * @returns false when not connected or the write fails. No retry.
   */
  send_raw(msg_id: number, payload: ArrayLike<number>): Promise<boolean> {
    if (!this.is_connected()) {
      return Promise.resolve(false);
    }
    return this.enqueue_write(encode_frame(msg_id, payload, SYNC_GS));
  }

  /**
   * Set the PID gains of one axis.
   *
   * Gains that are not finite or exceed the decoder's bounds are refused
   * without touching the link.
   */
  async send_pid_gain(axis: PidAxis, p: number, i: number, d: number): Promise<boolean> {
    const gains = [p, i, d];
    if (gains.some((g) => !Number.isFinite(g) || Math.abs(g) > MAX_PID_GAIN)) {
      this.log.warn({ axis, p, i, d }, 'refusing PID gains out of range');
      return false;
    }

    const sent = await this.send_raw(pid_msg_id(axis), build_pid_gain_payload(p, i, d));
    if (sent) {
      this.emit('pid_gain_sent', { axis, p, i, d });
    }
    return sent;
  }

  /** Ask the controller to echo the gains of one axis, or of all of them. */
  request_pid_gain(axis: PidAxis | 'all'): Promise<boolean> {
    return this.send_raw(MSG_ID_PID_REQUEST, build_pid_request_payload(axis));
  }

  /**
   * Write terminal input to the link unframed.
   *
   * @returns false for text that cannot be encoded in the given mode.
   */
  send_terminal(text: string, mode: 'ascii' | 'hex' = 'ascii'): Promise<boolean> {
    const bytes = parse_terminal_input(text, mode);
    if (bytes === null) {
      this.log.warn({ mode }, 'terminal input cannot be encoded');
      return Promise.resolve(false);
    }
    if (!this.is_connected()) {
      return Promise.resolve(false);
    }
    return this.enqueue_write(bytes);
  }

  private enqueue_write(bytes: Uint8Array): Promise<boolean> {
    const handle = this.handle;
    if (!handle) {
      return Promise.resolve(false);
    }

    const result = this.write_chain.then(async () => {
      if (handle !== this.handle) {
        return false;
      }
      try {
        await handle.write(bytes);
        return true;
      } catch (err) {
        this.log.warn({ err, path: handle.path }, 'write failed');
        return false;
      }
    });

    this.write_chain = result.then(() => undefined);
    return result;
  }

  // -------------------------------------------------------------------------
  // Handle wiring
  // -------------------------------------------------------------------------

  private attach(handle: SerialHandle): void {
    this.handle = handle;
    this.demuxer.reset();

    handle.on('data', (chunk) => {
      if (handle === this.handle && this._state === 'connected') {
        this.process_chunk(chunk);
      }
    });
    handle.on('error', (err) => {
      if (handle === this.handle) {
        this.log.error({ err, path: handle.path }, 'link I/O error');
        this.on_link_lost(handle);
      }
    });
    handle.on('close', () => {
      if (handle === this.handle) {
        this.log.warn({ path: handle.path }, 'link closed unexpectedly');
        this.on_link_lost(handle);
      }
    });
  }

  private on_link_lost(handle: SerialHandle): void {
    this.handle = null;
    this.demuxer.reset();
    handle.removeAllListeners();
    this.close_quietly(handle).catch((err: unknown) => {
      this.log.debug({ err }, 'close after link loss failed');
    });

    const epoch = ++this.epoch;
    this.run_reconnect(epoch).catch((err: unknown) => {
      this.log.error({ err }, 'reconnect loop failed');
      if (epoch === this.epoch) {
        this.set_state('disconnected');
      }
    });
  }

  private async close_quietly(handle: SerialHandle): Promise<void> {
    try {
      await handle.close();
    } catch (err) {
      this.log.warn({ err, path: handle.path }, 'error closing port');
    }
  }

  // -------------------------------------------------------------------------
  // Reconnection
  // -------------------------------------------------------------------------

  private async run_reconnect(epoch: number): Promise<void> {
    this.set_state('connecting');

    for (let attempt = 1; attempt <= this.max_attempts; attempt++) {
      this.log.info({ attempt, max_attempts: this.max_attempts }, 'reconnect attempt');

      const handle = await this.try_all_ports();
      if (epoch !== this.epoch) {
        if (handle) {
          await this.close_quietly(handle);
        }
        return;
      }

      if (handle) {
        this.attach(handle);
        this.set_state('connected');
        this.log.info({ path: handle.path, attempt }, 'link reconnected');
        this.emit('reconnected', handle.path, attempt);
        return;
      }

      if (attempt < this.max_attempts) {
        await this.delay(this.delay_ms);
        if (epoch !== this.epoch) {
          return;
        }
      }
    }

    this.set_state('disconnected');
    this.log.error({ attempts: this.max_attempts }, 'reconnect failed, giving up');
    this.emit('reconnect_failed', this.max_attempts);
  }

  /** Try every enumerated port in turn; null when none opens. */
  private async try_all_ports(): Promise<SerialHandle | null> {
    let ports: PortInfo[];
    try {
      ports = await this.transport.list_ports();
    } catch (err) {
      this.log.warn({ err }, 'port enumeration failed');
      return null;
    }

    for (const port of ports) {
      try {
        return await this.transport.open(port.path, this.baud);
      } catch (err) {
        this.log.debug({ err, path: port.path }, 'reconnect: open failed');
      }
    }
    return null;
  }

  private delay(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      this.wake_delay = resolve;
      this.delay_timer = setTimeout(() => {
        this.delay_timer = null;
        this.wake_delay = null;
        resolve();
      }, ms);
    });
  }

  private cancel_delay(): void {
    if (this.delay_timer) {
      clearTimeout(this.delay_timer);
      this.delay_timer = null;
    }
    const wake = this.wake_delay;
    this.wake_delay = null;
    if (wake) {
      wake();
    }
  }

  // -------------------------------------------------------------------------
  // Inbound pipeline
  // -------------------------------------------------------------------------

  private process_chunk(chunk: Uint8Array): void {
    for (const message of this.demuxer.feed(chunk)) {
      this.process_message(message);
    }
  }

  private process_message(message: DemuxMessage): void {
    const now = this.now();

    if (message.kind === 'frame') {
      const decoded = decode_frame(message.bytes, SYNC_FC);
      if (!decoded.ok) {
        this.drop({ kind: frame_error_kind(decoded.error), message: decoded.message });
        return;
      }
      this.deliver(dispatch({ kind: 'frame', frame: decoded.frame }, now));
      return;
    }

    const parsed = parse_nmea(message.text, {
      timestamp: now,
      default_battery_v: this.nmea_battery_v,
      verify_checksum: this.nmea_verify
    });
    if (!parsed.ok) {
      this.drop({ kind: 'parse', message: parsed.error });
      return;
    }
    if (parsed.type === 'GPGSV') {
      this.emit('satellites', parsed.satellites_in_view);
      return;
    }
    this.deliver(dispatch({ kind: 'fix', fix: parsed.fix }, now));
  }

  private deliver(result: DispatchResult): void {
    if (result.ok) {
      this.emit('telemetry', result.event);
    } else {
      this.drop(result.error);
    }
  }

  private drop(error: DecodeError): void {
    if (error.kind === 'format') {
      this.log.debug({ drop: error }, 'message dropped');
    } else {
      this.log.warn({ drop: error }, 'message dropped');
    }
    this.emit('drop', error);
  }

  private set_state(state: LinkState): void {
    const previous = this._state;
    if (previous === state) {
      return;
    }
    this._state = state;
    this.emit('state', state, previous);
  }
}
