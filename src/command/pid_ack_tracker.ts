/**
 * Tracks PID gain sets until the controller echoes them back.
 *
 * One exchange may be pending per axis:
 *   PENDING --> acked     on an echo whose gains match the request
 *   PENDING --> mismatch  on an echo with different gains
 *   PENDING --> timeout   when no echo arrives in time
 *
 * There is no retransmission; a newer set on the same axis replaces the
 * pending one. Echoes with nothing pending (replies to a gain request)
 * are ignored.
 *
 * @module command/pid_ack_tracker
 */

import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import { PID_ACK_TIMEOUT_MS } from '../protocol/constants';
import type { PidAxis, PidGainRecord, TelemetryEvent } from '../protocol/types';
import type { PidGainCommand } from '../session/link_session';
import { module_logger } from '../logger';

export type PidAckResult = 'acked' | 'mismatch' | 'timeout';

/** Final outcome of one tracked gain set. */
export interface PidAckOutcome {
  axis: PidAxis;
  result: PidAckResult;
  sent: PidGainCommand;
  /** The echo, or null on timeout. */
  received: PidGainRecord | null;
  elapsed_ms: number;
}

interface PendingAck {
  sent: PidGainCommand;
  sent_at: number;
  timer: ReturnType<typeof setTimeout>;
}

export interface PidAckTrackerOptions {
  timeout_ms?: number;
  logger?: Logger;
  now?: () => number;
}

/** Gains travel as f32; compare at that precision. */
function same_gain(sent: number, received: number): boolean {
  return Math.fround(sent) === Math.fround(received);
}

/**
 * Emits:
 *   'resolved' (outcome: PidAckOutcome) -- when an exchange completes
 */
export class PidAckTracker extends EventEmitter {
  private readonly pending = new Map<PidAxis, PendingAck>();
  private readonly timeout_ms: number;
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(options: PidAckTrackerOptions = {}) {
    super();
    this.timeout_ms = options.timeout_ms ?? PID_ACK_TIMEOUT_MS;
    this.log = options.logger ?? module_logger('pid_ack_tracker');
    this.now = options.now ?? Date.now;
  }

  /** True while a set on `axis` awaits its echo. */
  is_pending(axis: PidAxis): boolean {
    return this.pending.has(axis);
  }

  pending_axes(): PidAxis[] {
    return [...this.pending.keys()];
  }

  /** Start tracking a gain set that was just written. */
  track(sent: PidGainCommand): void {
    const previous = this.pending.get(sent.axis);
    if (previous) {
      clearTimeout(previous.timer);
      this.log.debug({ axis: sent.axis }, 'pending PID set superseded');
    }

    const timer = setTimeout(() => {
      this.on_timeout(sent.axis);
    }, this.timeout_ms);

    this.pending.set(sent.axis, { sent, sent_at: this.now(), timer });
  }

  /** Feed telemetry; only `pid_ack_received` events are considered. */
  on_telemetry(event: TelemetryEvent): void {
    if (event.type === 'pid_ack_received') {
      this.on_ack(event.data);
    }
  }

  on_ack(record: PidGainRecord): void {
    const entry = this.pending.get(record.axis);
    if (!entry) {
      return;
    }

    const { sent } = entry;
    const matches =
      same_gain(sent.p, record.p) && same_gain(sent.i, record.i) && same_gain(sent.d, record.d);

    this.resolve(entry, matches ? 'acked' : 'mismatch', record);
  }

  /** Cancel every pending exchange without reporting outcomes. */
  dispose(): void {
    for (const entry of this.pending.values()) {
      clearTimeout(entry.timer);
    }
    this.pending.clear();
  }

  // -----------------------------------------------------------------------
  // Private
  // -----------------------------------------------------------------------

  private on_timeout(axis: PidAxis): void {
    const entry = this.pending.get(axis);
    if (entry) {
      this.resolve(entry, 'timeout', null);
    }
  }

  private resolve(entry: PendingAck, result: PidAckResult, received: PidGainRecord | null): void {
    clearTimeout(entry.timer);
    this.pending.delete(entry.sent.axis);

    const outcome: PidAckOutcome = {
      axis: entry.sent.axis,
      result,
      sent: entry.sent,
      received,
      elapsed_ms: this.now() - entry.sent_at
    };

    if (result === 'acked') {
      this.log.info({ axis: outcome.axis, elapsed_ms: outcome.elapsed_ms }, 'PID gains acknowledged');
    } else {
      this.log.warn({ axis: outcome.axis, result, sent: entry.sent, received }, 'PID gains not confirmed');
    }

    this.emit('resolved', outcome);
  }
}
