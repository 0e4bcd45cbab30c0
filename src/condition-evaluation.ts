/**
 * Condition Evaluation
 *
 * Conditions are immutable boolean expressions that gate task execution.
 * Leaves read the current time through the evaluation context; composites
 * combine them with AND / OR / NOT.
 */

import type { Duration } from './core'
import type { LocalDateTime } from './time-date'
import { type TimeWindow, type WindowParams, contains, formatWindow, windowFrom } from './time-window'
import { type EvaluationContext, createContext, nowFor } from './clock'

export type { LocalDateTime } from './time-date'

// ============================================================================
// Types
// ============================================================================

export type ProbeCheck = (now: LocalDateTime) => boolean
export type ProbeEstimate = (now: LocalDateTime) => Duration

export type Condition =
  | { type: 'alwaysTrue' }
  | { type: 'alwaysFalse' }
  | { type: 'time'; window: TimeWindow }
  | {
      type: 'probe'
      name: string
      check: ProbeCheck
      estimate?: ProbeEstimate
      attributes: Readonly<Record<string, unknown>>
    }
  | { type: 'any'; conditions: readonly Condition[] }
  | { type: 'all'; conditions: readonly Condition[] }
  | { type: 'not'; condition: Condition }

export type TimeCondition = Extract<Condition, { type: 'time' }>
export type ProbeCondition = Extract<Condition, { type: 'probe' }>
export type AnyCondition = Extract<Condition, { type: 'any' }>
export type AllCondition = Extract<Condition, { type: 'all' }>
export type NotCondition = Extract<Condition, { type: 'not' }>

// ============================================================================
// Errors
// ============================================================================

export { InvalidConditionError, ConditionEvaluationError } from './errors'
import { InvalidConditionError, ConditionEvaluationError } from './errors'

// ============================================================================
// Leaf Constructors
// ============================================================================

const ALWAYS_TRUE: Condition = Object.freeze({ type: 'alwaysTrue' })
const ALWAYS_FALSE: Condition = Object.freeze({ type: 'alwaysFalse' })

export function alwaysTrue(): Condition {
  return ALWAYS_TRUE
}

export function alwaysFalse(): Condition {
  return ALWAYS_FALSE
}

/**
 * True while the clock is inside the window built from `params`:
 * `timeCondition({ type: 'timeOfDay', start: '08:00', end: '17:00' })`.
 */
export function timeCondition(params: WindowParams): Condition {
  return fromWindow(windowFrom(params))
}

/** Time condition over an existing, possibly composite, window. */
export function fromWindow(window: TimeWindow): Condition {
  return Object.freeze({ type: 'time', window })
}

export function isTimeCondition(condition: Condition): condition is TimeCondition {
  return condition.type === 'time'
}

/**
 * An external check, such as a resource probe. `estimate` opts the probe into
 * next-change estimates; `attributes` are readable through `getAttribute`.
 */
export function probe(
  name: string,
  check: ProbeCheck,
  options?: { estimate?: ProbeEstimate; attributes?: Record<string, unknown> }
): Condition {
  const attributes = Object.freeze({ ...options?.attributes })
  if (options?.estimate) {
    return Object.freeze({ type: 'probe', name, check, estimate: options.estimate, attributes })
  }
  return Object.freeze({ type: 'probe', name, check, attributes })
}

// ============================================================================
// Composite Constructors
// ============================================================================

function flatten(type: 'any' | 'all', conditions: readonly Condition[]): Condition[] {
  // Any(Any(a, b), c) keeps a single level: [a, b, c]
  return conditions.flatMap((c) => (c.type === type ? childrenOf(c) : [c]))
}

export function anyCondition(conditions: readonly Condition[]): Condition {
  const flat = flatten('any', conditions)
  if (flat.length === 0) throw new InvalidConditionError('any requires at least one condition')
  return Object.freeze({ type: 'any', conditions: Object.freeze(flat) })
}

export function allCondition(conditions: readonly Condition[]): Condition {
  const flat = flatten('all', conditions)
  if (flat.length === 0) throw new InvalidConditionError('all requires at least one condition')
  return Object.freeze({ type: 'all', conditions: Object.freeze(flat) })
}

/** Negating a negation returns the wrapped condition itself. */
export function notCondition(condition: Condition): Condition {
  if (condition.type === 'not') return condition.condition
  return Object.freeze({ type: 'not', condition })
}

// ============================================================================
// Operators
// ============================================================================

export function and(left: Condition, right: Condition): Condition {
  return allCondition([left, right])
}

export function or(left: Condition, right: Condition): Condition {
  return anyCondition([left, right])
}

export function not(condition: Condition): Condition {
  return notCondition(condition)
}

// ============================================================================
// Evaluation
// ============================================================================

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

function runProbe(condition: ProbeCondition, now: LocalDateTime): boolean {
  try {
    return condition.check(now)
  } catch (err) {
    if (err instanceof ConditionEvaluationError) throw err
    throw new ConditionEvaluationError(`Probe '${condition.name}' failed: ${describeError(err)}`, { cause: err })
  }
}

/**
 * Children are evaluated in order and stop at the first child that decides
 * the result, so a failing child after that point is never reached.
 */
export function evaluate(condition: Condition, ctx: EvaluationContext = createContext()): boolean {
  switch (condition.type) {
    case 'alwaysTrue':
      return true
    case 'alwaysFalse':
      return false
    case 'time':
      return contains(condition.window, nowFor(ctx, 'time'))
    case 'probe':
      return runProbe(condition, nowFor(ctx, 'probe'))
    case 'any':
      return condition.conditions.some((c) => evaluate(c, ctx))
    case 'all':
      return condition.conditions.every((c) => evaluate(c, ctx))
    case 'not':
      return !evaluate(condition.condition, ctx)
  }
}

// ============================================================================
// Delegation
// ============================================================================

/** Reads a probe attribute; `not` forwards to its wrapped condition. */
export function getAttribute(condition: Condition, key: string): unknown {
  switch (condition.type) {
    case 'probe':
      return condition.attributes[key]
    case 'not':
      return getAttribute(condition.condition, key)
    default:
      return undefined
  }
}

/** Window of a time condition; `not` forwards to its wrapped condition. */
export function windowOf(condition: Condition): TimeWindow | null {
  switch (condition.type) {
    case 'time':
      return condition.window
    case 'not':
      return windowOf(condition.condition)
    default:
      return null
  }
}

// ============================================================================
// Tree Helpers
// ============================================================================

export function childrenOf(condition: Condition): readonly Condition[] {
  switch (condition.type) {
    case 'any':
    case 'all':
      return condition.conditions
    case 'not':
      return [condition.condition]
    default:
      return []
  }
}

export function leavesOf(condition: Condition): Condition[] {
  const children = childrenOf(condition)
  if (children.length === 0) return [condition]
  return children.flatMap(leavesOf)
}

/** Rebuilds the tree with `fn` applied to every leaf. */
export function mapLeaves(condition: Condition, fn: (leaf: Condition) => Condition): Condition {
  switch (condition.type) {
    case 'any':
      return anyCondition(condition.conditions.map((c) => mapLeaves(c, fn)))
    case 'all':
      return allCondition(condition.conditions.map((c) => mapLeaves(c, fn)))
    case 'not':
      return notCondition(mapLeaves(condition.condition, fn))
    default:
      return fn(condition)
  }
}

export function formatCondition(condition: Condition): string {
  switch (condition.type) {
    case 'alwaysTrue':
      return 'true'
    case 'alwaysFalse':
      return 'false'
    case 'time':
      return `<is ${formatWindow(condition.window)}>`
    case 'probe':
      return condition.name
    case 'any':
      return `(${condition.conditions.map(formatCondition).join(' | ')})`
    case 'all':
      return `(${condition.conditions.map(formatCondition).join(' & ')})`
    case 'not':
      return `~${formatCondition(condition.condition)}`
  }
}
