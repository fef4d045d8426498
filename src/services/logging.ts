import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino'
import pinoPretty from 'pino-pretty'
import type { LogFn, LogLevel } from './types'

export interface CreateLoggerOptions {
  level?: string
  pretty?: boolean
  // Explicit sink; bypasses pretty printing
  destination?: DestinationStream
}

export function createLogger(service: string, opts: CreateLoggerOptions = {}): Logger {
  const pretty = opts.pretty ?? String(process.env.PRETTY_LOGS ?? 'false').toLowerCase() === 'true'
  const options: LoggerOptions = {
    level: opts.level ?? process.env.LOG_LEVEL ?? 'info',
    base: { service },
  }

  if (opts.destination) return pino(options, opts.destination)

  if (pretty) {
    return pino(options, pinoPretty({
      translateTime: 'SYS:standard',
      colorize: true,
      ignore: 'pid,hostname,service',
    }))
  }

  return pino(options)
}

// Adapt a pino logger to the driver log callback.
// pino has no "success" level, so it is written at info with an outcome marker.
export function toLogFn(logger: Logger): LogFn {
  return (level: LogLevel, message: string, extra?: Record<string, unknown>) => {
    const fields = extra ?? {}
    switch (level) {
      case 'success':
        logger.info({ ...fields, outcome: 'success' }, message)
        break
      case 'warn':
        logger.warn(fields, message)
        break
      case 'error':
        logger.error(fields, message)
        break
      default:
        logger.info(fields, message)
    }
  }
}
