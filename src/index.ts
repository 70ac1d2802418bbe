#!/usr/bin/env node
import { load_config } from './config/config'
import { create_logger } from './logger'
import { create_ground_link } from './app'
import { NodeSerialTransport } from './transport/serial_transport'
import type { TelemetryEvent } from './protocol/types'

// ---------------------------------------------------------------------------
// Process lifecycle
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const config = load_config(process.env)
  const logger = create_logger(config.logging)

  const link = create_ground_link({
    config,
    transport: new NodeSerialTransport(),
    logger
  })

  link.session.on('telemetry', (event: TelemetryEvent) => {
    logger.trace({ event }, 'telemetry')
  })

  let stopping = false
  const shutdown = (signal: string): void => {
    if (stopping) return
    stopping = true
    logger.info({ signal }, 'shutting down')
    link
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, 'error during shutdown')
        process.exit(1)
      })
  }

  process.on('SIGINT', () => shutdown('SIGINT'))
  process.on('SIGTERM', () => shutdown('SIGTERM'))

  await link.start()

  // Nothing to run without a port; the available ones have been listed.
  if (config.serial.port === null) {
    await link.stop()
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err))
  process.exit(1)
})
