/**
 * Routes decoded messages to their field decoders and wraps the result as
 * a typed telemetry event.
 *
 * Pure: no I/O and no state. The caller supplies the clock.
 *
 * @module dispatch/dispatcher
 */

import {
  MSG_ID_AHRS,
  MSG_ID_GPS,
  MSG_ID_BATTERY,
  MSG_ID_ESC,
  MSG_ID_FLIGHT_MODE,
  MSG_ID_GPS_ENHANCED
} from '../protocol/constants';
import {
  decode_ahrs,
  decode_gps,
  decode_pid_gains,
  decode_battery,
  decode_esc,
  decode_flight_mode,
  decode_gps_enhanced,
  is_pid_msg_id,
  validate_fix
} from '../protocol/payload_decoders';
import type {
  DecodedFrame,
  DispatchResult,
  GpsFix,
  RecordResult,
  TelemetryEvent
} from '../protocol/types';

/** A validated binary frame, or a fix parsed from an NMEA sentence. */
export type DispatchInput =
  | { kind: 'frame'; frame: DecodedFrame }
  | { kind: 'fix'; fix: GpsFix };

/** Lift a record result into a dispatch result. */
function wrap<T>(
  result: RecordResult<T>,
  to_event: (record: T) => TelemetryEvent
): DispatchResult {
  return result.ok ? { ok: true, event: to_event(result.record) } : result;
}

/**
 * Dispatch one decoded message.
 *
 * @param input - Frame or NMEA fix.
 * @param now - Epoch ms stamped on records decoded from frames.
 */
export function dispatch(input: DispatchInput, now: number): DispatchResult {
  if (input.kind === 'fix') {
    return wrap(validate_fix(input.fix), (data) => ({ type: 'gps_updated', data }));
  }

  const { msg_id, payload } = input.frame;

  if (is_pid_msg_id(msg_id)) {
    return wrap(decode_pid_gains(msg_id, payload, now), (data) => ({
      type: 'pid_ack_received',
      data
    }));
  }

  switch (msg_id) {
    case MSG_ID_AHRS:
      return wrap(decode_ahrs(payload, now), (data) => ({ type: 'ahrs_updated', data }));

    case MSG_ID_GPS:
      return wrap(decode_gps(payload, now), (data) => ({ type: 'gps_updated', data }));

    case MSG_ID_BATTERY:
      return wrap(decode_battery(payload, now), (data) => ({ type: 'battery_updated', data }));

    case MSG_ID_ESC:
      return wrap(decode_esc(payload, now), (data) => ({ type: 'esc_updated', data }));

    case MSG_ID_FLIGHT_MODE:
      return wrap(decode_flight_mode(payload, now), (data) => ({
        type: 'flight_mode_changed',
        data
      }));

    case MSG_ID_GPS_ENHANCED:
      return wrap(decode_gps_enhanced(payload, now), (data) => ({
        type: 'gps_enhanced_updated',
        data
      }));

    default:
      // Unknown IDs are reported, never dropped as errors.
      return { ok: true, event: { type: 'unknown_message', msg_id, payload } };
  }
}
