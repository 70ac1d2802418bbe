/**
 * Wires the link session, PID acknowledgement tracker and telemetry store
 * into one running ground link.
 *
 * @module app
 */

import type { Logger } from 'pino'
import type { AppConfig } from './config/config'
import { LinkSession } from './session/link_session'
import { PidAckTracker, type PidAckOutcome } from './command/pid_ack_tracker'
import { TelemetryStore } from './store/telemetry_store'
import type { SerialTransport } from './transport/serial_transport'
import type { DecodeError, TelemetryEvent } from './protocol/types'
import type { LinkState, PidGainCommand } from './session/link_session'

/** Period of the stale-data check. */
const STALE_TICK_MS = 100

export interface GroundLink {
  session: LinkSession
  store: TelemetryStore
  tracker: PidAckTracker
  /** Start the stale tick and open the configured port, if any. */
  start(): Promise<void>
  /** Stop timers and close the link. */
  stop(): Promise<void>
}

export interface GroundLinkDeps {
  config: AppConfig
  transport: SerialTransport
  logger: Logger
  now?: () => number
}

export function create_ground_link(deps: GroundLinkDeps): GroundLink {
  const { config, transport, logger } = deps
  const now = deps.now ?? Date.now

  const session = new LinkSession({
    transport,
    logger: logger.child({ module: 'link_session' }),
    reconnect_max_attempts: config.reconnect.max_attempts,
    reconnect_delay_ms: config.reconnect.delay_ms,
    nmea: {
      default_battery_v: config.nmea.default_battery_v,
      verify_checksum: config.nmea.verify_checksum
    },
    now
  })
  const store = new TelemetryStore(config.stale_threshold_ms)
  const tracker = new PidAckTracker({ logger: logger.child({ module: 'pid_ack_tracker' }), now })

  // ---------------------------------------------------------------------------
  // Data pipeline wiring
  // ---------------------------------------------------------------------------

  session.on('telemetry', (event: TelemetryEvent) => {
    store.apply(event)
    tracker.on_telemetry(event)
  })
  session.on('drop', (error: DecodeError) => {
    store.record_drop(error.kind)
  })
  session.on('satellites', (count: number) => {
    store.set_satellites_in_view(count)
  })
  session.on('state', (state: LinkState) => {
    store.set_link(state, session.port_path)
  })
  session.on('pid_gain_sent', (command: PidGainCommand) => {
    tracker.track(command)
  })
  session.on('reconnect_failed', (attempts: number) => {
    logger.error({ attempts }, 'link lost; call connect to retry')
  })
  tracker.on('resolved', (outcome: PidAckOutcome) => {
    logger.debug({ outcome }, 'PID exchange resolved')
  })

  let stale_interval: ReturnType<typeof setInterval> | null = null

  return {
    session,
    store,
    tracker,

    async start(): Promise<void> {
      if (stale_interval === null) {
        stale_interval = setInterval(() => {
          store.tick_stale(now())
        }, STALE_TICK_MS)
      }

      if (config.serial.port === null) {
        const ports = await transport.list_ports()
        logger.info(
          { ports: ports.map((p) => p.label) },
          'GS_SERIAL_PORT not set; available ports listed'
        )
        return
      }

      await session.connect(config.serial.port, config.serial.baud)
    },

    async stop(): Promise<void> {
      if (stale_interval !== null) {
        clearInterval(stale_interval)
        stale_interval = null
      }
      tracker.dispose()
      await session.disconnect()
    }
  }
}
