import pino, { type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/datastore-config.js'

export type { Logger } from 'pino'

export const LOGGER_NAME = 'blob-datastore'

/**
 * Root logger for a datastore process; adapters given none stay silent.
 * Output is pretty-printed unless running in production with
 * `logging.pretty` off.
 */
export function createLogger(config: LoggingConfig): Logger {
  const pretty = config.pretty || process.env.NODE_ENV !== 'production'

  return pino({
    name: LOGGER_NAME,
    level: config.level,
    ...(pretty ? { transport: { target: 'pino-pretty' } } : {}),
  })
}

export function createSilentLogger(): Logger {
  return pino({ name: LOGGER_NAME, level: 'silent' })
}
