/**
 * Clock Source
 *
 * Conditions read "now" through a Clock carried by the evaluation context.
 * Tests pin a fixed clock, either for the whole evaluation or for one leaf
 * kind only, without touching the system clock used elsewhere.
 */

import { type LocalDateTime, fromEpochMs, localTimezone, parseDateTime } from './time-date'
import { ParseError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type Clock = {
  now: () => LocalDateTime
}

/** Leaf kinds that read the clock. */
export type ClockedKind = 'time' | 'probe'

const CLOCKED_KINDS: readonly ClockedKind[] = ['time', 'probe']

export type EvaluationContext = {
  clock: Clock
  overrides?: Partial<Record<ClockedKind, Clock>>
}

// ============================================================================
// Clocks
// ============================================================================

export function systemClock(timezone: string = localTimezone()): Clock {
  return { now: () => fromEpochMs(Date.now(), timezone) }
}

function pinned(instant: LocalDateTime): Clock {
  return { now: () => instant }
}

export function fixedClock(instant: LocalDateTime | string): Clock {
  const parsed = parseDateTime(instant)
  if (!parsed.ok) throw new ParseError(`Invalid clock instant: '${instant}'`)
  return pinned(parsed.value)
}

// ============================================================================
// Context
// ============================================================================

export function createContext(clock: Clock = systemClock(), overrides?: Partial<Record<ClockedKind, Clock>>): EvaluationContext {
  return overrides ? { clock, overrides } : { clock }
}

/**
 * Reads every clock of `ctx` once and pins the readings, so that several
 * passes over one condition see the same instants.
 */
export function snapshotContext(ctx: EvaluationContext): EvaluationContext {
  const clock = pinned(ctx.clock.now())
  if (!ctx.overrides) return { clock }
  const overrides: Partial<Record<ClockedKind, Clock>> = {}
  for (const kind of CLOCKED_KINDS) {
    const override = ctx.overrides[kind]
    if (override) overrides[kind] = pinned(override.now())
  }
  return { clock, overrides }
}

export function nowFor(ctx: EvaluationContext, kind: ClockedKind): LocalDateTime {
  return (ctx.overrides?.[kind] ?? ctx.clock).now()
}
