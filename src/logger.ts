/**
 * Process-wide pino logger.
 *
 * Modules accept an optional `Logger` and otherwise take a child of the
 * root logger with a `module` binding.
 *
 * @module logger
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger };

export interface LoggerSettings {
  level: string;
  pretty: boolean;
}

/** Build a logger; `pretty` routes output through pino-pretty. */
export function create_logger(settings: LoggerSettings): Logger {
  const options: LoggerOptions = {
    level: settings.level,
    base: undefined
  };

  if (settings.pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        singleLine: false,
        translateTime: 'SYS:standard'
      }
    };
  }

  return pino(options);
}

/** Root logger, configured from LOG_LEVEL and LOG_PRETTY. */
export const logger: Logger = create_logger({
  level: process.env.LOG_LEVEL ?? 'info',
  pretty: process.env.LOG_PRETTY === 'true'
});

/** Child of `parent` (the root logger by default) tagged with a module name. */
export function module_logger(module: string, parent: Logger = logger): Logger {
  return parent.child({ module });
}
