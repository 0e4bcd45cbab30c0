/**
 * Gate Configuration
 *
 * Defaults and validation for createConditionGate.
 */

import { type Duration, seconds } from './core'
import { isValidTimezone } from './time-date'
import { type Clock, type ClockedKind, type EvaluationContext, createContext, systemClock } from './clock'
import { type Logger, type LevelWithSilent, createLogger } from './logger'

export { ValidationError } from './errors'
import { ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type GateConfig = {
  /** IANA timezone the schedule's wall-clock times are in */
  timezone: string
  /** Defaults to the system clock in `timezone` */
  clock?: Clock
  overrides?: Partial<Record<ClockedKind, Clock>>
  /** Seconds; shortest sleep the gate suggests */
  minSleep?: number
  /** Seconds; longest sleep the gate suggests */
  maxSleep?: number
  logger?: Logger
  /** Level for the default logger; ignored when `logger` is given */
  logLevel?: LevelWithSilent
}

export type ResolvedGateConfig = {
  timezone: string
  context: EvaluationContext
  minSleep: Duration
  maxSleep: Duration
  logger: Logger
}

export const DEFAULT_MIN_SLEEP: Duration = seconds(1)
export const DEFAULT_MAX_SLEEP: Duration = seconds(3600)

// ============================================================================
// Resolution
// ============================================================================

export function resolveGateConfig(config: GateConfig): ResolvedGateConfig {
  if (!isValidTimezone(config.timezone)) {
    throw new ValidationError(`Invalid timezone: ${config.timezone}`)
  }

  const minSleep = config.minSleep ?? DEFAULT_MIN_SLEEP
  const maxSleep = config.maxSleep ?? Math.max(DEFAULT_MAX_SLEEP, minSleep)
  if (!Number.isFinite(minSleep) || minSleep < 0) {
    throw new ValidationError(`minSleep must be a finite number >= 0, got ${minSleep}`)
  }
  if (!Number.isFinite(maxSleep) || maxSleep < minSleep) {
    throw new ValidationError(`maxSleep must be finite and >= minSleep (${minSleep}), got ${maxSleep}`)
  }

  return {
    timezone: config.timezone,
    context: createContext(config.clock ?? systemClock(config.timezone), config.overrides),
    minSleep: seconds(minSleep),
    maxSleep: seconds(maxSleep),
    logger: config.logger ?? createLogger({ level: config.logLevel ?? 'info' }),
  }
}
