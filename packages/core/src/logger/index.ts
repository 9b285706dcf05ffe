import pino, { type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/app-config.js'

export type { Logger } from 'pino'

/** File descriptor for stderr; stdout is reserved for command output. */
const STATUS_STREAM_FD = 2

export function createLogger(config: LoggingConfig): Logger {
  const usePretty =
    config.pretty || process.env.NODE_ENV !== 'production'

  if (usePretty && config.level !== 'silent') {
    return pino({
      level: config.level,
      transport: {
        target: 'pino-pretty',
        options: { destination: STATUS_STREAM_FD },
      },
    })
  }

  return pino(
    { level: config.level },
    pino.destination({ dest: STATUS_STREAM_FD, sync: true }),
  )
}
