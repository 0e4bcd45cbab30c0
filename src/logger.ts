/**
 * Logging
 *
 * pino loggers for the scheduler-facing gate. The condition core never logs.
 */

import pino, { type DestinationStream, type LevelWithSilent, type Logger } from 'pino'

export type { Logger, Level, LevelWithSilent, DestinationStream } from 'pino'

export type LoggerOptions = {
  level?: LevelWithSilent
  name?: string
  /** Where JSON lines go; stdout when omitted */
  destination?: DestinationStream
}

export function createLogger(options?: LoggerOptions): Logger {
  const config = {
    name: options?.name ?? 'tickgate',
    level: options?.level ?? 'info',
  }
  return options?.destination ? pino(config, options.destination) : pino(config)
}
