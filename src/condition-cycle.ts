/**
 * Cycles and Next-Change Estimates
 *
 * Temporal metadata a scheduler reads to avoid busy-polling: the window in
 * which a condition could be true, and how long it can safely sleep before the
 * condition might flip.
 */

import { type Duration, NEVER, RESOLUTION, ZERO, seconds } from './core'
import { type LocalDateTime, secondsBetween } from './time-date'
import {
  type TimeWindow,
  alwaysWindow,
  complementWindow,
  findNextStart,
  intersectWindows,
  unionWindows,
} from './time-window'
import { type ClockedKind, type EvaluationContext, createContext, nowFor } from './clock'
import { type Condition, type ProbeCondition, ConditionEvaluationError, isTimeCondition } from './condition-evaluation'

// ============================================================================
// Cycle
// ============================================================================

/**
 * Window in which the condition could be true. Conditions without temporal
 * structure, and mixes the window algebra cannot express, get the unbounded
 * window.
 */
export function cycleOf(condition: Condition): TimeWindow {
  switch (condition.type) {
    case 'time':
      return condition.window
    case 'any': {
      const timed = condition.conditions.filter(isTimeCondition)
      if (timed.length !== condition.conditions.length) return alwaysWindow()
      return unionWindows(timed.map((c) => c.window))
    }
    case 'all':
      return intersectWindows(condition.conditions.map(cycleOf))
    case 'not':
      return isTimeCondition(condition.condition) ? complementWindow(condition.condition.window) : alwaysWindow()
    default:
      return alwaysWindow()
  }
}

// ============================================================================
// Estimates
// ============================================================================

export function supportsEstimate(condition: Condition): boolean {
  switch (condition.type) {
    case 'time':
    case 'any':
    case 'all':
      return true
    case 'probe':
      return condition.estimate !== undefined
    case 'not':
      return isTimeCondition(condition.condition) || supportsEstimate(condition.condition)
    default:
      return false
  }
}

/**
 * Distance from `now` to the start of the window's next occurrence. When the
 * search stops before finding one, the distance to where it stopped: the
 * window stays closed at least that long.
 */
export function estimateWindow(window: TimeWindow, now: LocalDateTime): Duration {
  const search = findNextStart(window, now)
  if (search === null) return NEVER
  return seconds(secondsBetween(now, search.found ? search.start : search.searchedUntil))
}

type InstantOf = (kind: ClockedKind) => LocalDateTime

function runEstimate(condition: ProbeCondition, now: LocalDateTime): Duration {
  if (!condition.estimate) return ZERO
  try {
    return condition.estimate(now)
  } catch (err) {
    if (err instanceof ConditionEvaluationError) throw err
    const reason = err instanceof Error ? err.message : String(err)
    throw new ConditionEvaluationError(`Probe '${condition.name}' estimate failed: ${reason}`, { cause: err })
  }
}

function estimate(condition: Condition, at: InstantOf): Duration {
  switch (condition.type) {
    case 'time':
      return estimateWindow(condition.window, at('time'))
    case 'probe':
      return runEstimate(condition, at('probe'))
    case 'any':
      // The soonest branch to change is enough to re-check the disjunction
      return seconds(Math.min(
        ...condition.conditions.map((c) => (supportsEstimate(c) ? estimate(c, at) : ZERO))
      ))
    case 'all':
      // A conjunction cannot turn true before its slowest branch could
      return seconds(Math.max(
        ...condition.conditions.map((c) => (supportsEstimate(c) ? estimate(c, at) : RESOLUTION))
      ))
    case 'not':
      if (isTimeCondition(condition.condition)) {
        return estimateWindow(complementWindow(condition.condition.window), at('time'))
      }
      return estimate(condition.condition, at)
    default:
      return ZERO
  }
}

/**
 * Lower bound on how long the condition stays as it is. Conditions without the
 * capability report zero: check again immediately.
 */
export function estimateTimeToNextChange(condition: Condition, now: LocalDateTime): Duration {
  return estimate(condition, () => now)
}

/** Same as estimateTimeToNextChange, with each leaf reading the clock `evaluate` would give it. */
export function estimateInContext(condition: Condition, ctx: EvaluationContext = createContext()): Duration {
  return estimate(condition, (kind) => nowFor(ctx, kind))
}
