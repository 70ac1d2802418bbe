/**
 * Environment configuration, validated once at startup.
 *
 * @module config/config
 */

import { z } from 'zod';
import {
  DEFAULT_BAUD_RATE,
  RECONNECT_MAX_ATTEMPTS,
  RECONNECT_DELAY_MS,
  NMEA_DEFAULT_BATTERY_V,
  STALE_THRESHOLD_MS
} from '../protocol/constants';

const bool_flag = z
  .string()
  .optional()
  .transform((val) => val === 'true' || val === '1');

const envSchema = z.object({
  GS_SERIAL_PORT: z.string().min(1).optional(),
  GS_SERIAL_BAUD: z
    .string()
    .default(String(DEFAULT_BAUD_RATE))
    .transform((val) => Number(val))
    .pipe(z.number().int().positive()),
  GS_RECONNECT_MAX_ATTEMPTS: z
    .string()
    .default(String(RECONNECT_MAX_ATTEMPTS))
    .transform((val) => Number(val))
    .pipe(z.number().int().min(0)),
  GS_RECONNECT_DELAY_MS: z
    .string()
    .default(String(RECONNECT_DELAY_MS))
    .transform((val) => Number(val))
    .pipe(z.number().int().min(0)),
  GS_NMEA_DEFAULT_BATTERY_V: z
    .string()
    .default(String(NMEA_DEFAULT_BATTERY_V))
    .transform((val) => Number(val))
    .pipe(z.number().min(0)),
  GS_NMEA_VERIFY_CHECKSUM: bool_flag,
  GS_STALE_THRESHOLD_MS: z
    .string()
    .default(String(STALE_THRESHOLD_MS))
    .transform((val) => Number(val))
    .pipe(z.number().int().positive()),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LOG_PRETTY: bool_flag
});

export type EnvironmentVariables = z.infer<typeof envSchema>;

export interface AppConfig {
  serial: {
    port: string | null;
    baud: number;
  };
  reconnect: {
    max_attempts: number;
    delay_ms: number;
  };
  nmea: {
    default_battery_v: number;
    verify_checksum: boolean;
  };
  stale_threshold_ms: number;
  logging: {
    level: string;
    pretty: boolean;
  };
}

export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const parsed = envSchema.safeParse(config);

  if (!parsed.success) {
    const formatted = parsed.error.flatten();
    throw new Error(
      `Invalid environment configuration: ${JSON.stringify(formatted.fieldErrors, null, 2)}`
    );
  }

  return parsed.data;
}

/** Load and validate configuration from an environment map. */
export function load_config(env: Record<string, unknown> = process.env): AppConfig {
  const vars = validateEnvironment(env);
  return {
    serial: {
      port: vars.GS_SERIAL_PORT ?? null,
      baud: vars.GS_SERIAL_BAUD
    },
    reconnect: {
      max_attempts: vars.GS_RECONNECT_MAX_ATTEMPTS,
      delay_ms: vars.GS_RECONNECT_DELAY_MS
    },
    nmea: {
      default_battery_v: vars.GS_NMEA_DEFAULT_BATTERY_V,
      verify_checksum: vars.GS_NMEA_VERIFY_CHECKSUM
    },
    stale_threshold_ms: vars.GS_STALE_THRESHOLD_MS,
    logging: {
      level: vars.LOG_LEVEL,
      pretty: vars.LOG_PRETTY
    }
  };
}
