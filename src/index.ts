/**
 * tickgate
 *
 * Public API exports
 */

// Error system
export {
  TickgateError, TickgateErrorCode,
  ParseError, InvalidWindowError, InvalidConditionError,
  ConditionEvaluationError, ConditionParseError, ValidationError,
} from './errors'
export type { TickgateErrorCode as TickgateErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time & Date
export type { LocalDate, LocalTime, LocalDateTime, Weekday } from './time-date'
export {
  parseDate, parseTime, parseDateTime, parseWeekday,
  makeDate, makeTime, makeDateTime,
  addDays, addSeconds, daysBetween, secondsBetween,
  dayOfWeek, toLocal, fromEpochMs, isValidTimezone,
} from './time-date'

// Durations
export type { Duration } from './core'
export { seconds, minutes, hours, ZERO, RESOLUTION, NEVER } from './core'

// Clock
export type { Clock, ClockedKind, EvaluationContext } from './clock'
export { systemClock, fixedClock, createContext, snapshotContext } from './clock'

// Time windows
export type { TimeWindow, WindowParams, WeekTime, Occurrence, StartSearch } from './time-window'
export {
  alwaysWindow, neverWindow, between, timeOfDay, timeOfWeek, timeOfMonth, windowFrom,
  unionWindows, intersectWindows, complementWindow,
  contains, nextBoundary, findNextStart, rollForward, formatWindow, MAX_BOUNDARY_STEPS,
} from './time-window'

// Conditions
export type {
  Condition, TimeCondition, ProbeCondition,
  AnyCondition, AllCondition, NotCondition,
  ProbeCheck, ProbeEstimate,
} from './condition-evaluation'
export {
  alwaysTrue, alwaysFalse, timeCondition, fromWindow, isTimeCondition, probe,
  anyCondition, allCondition, notCondition, and, or, not,
  evaluate, getAttribute, windowOf,
  childrenOf, leavesOf, mapLeaves, formatCondition,
} from './condition-evaluation'
export {
  cycleOf, supportsEstimate, estimateTimeToNextChange, estimateInContext, estimateWindow,
} from './condition-cycle'

// Parser registry
export type { ConditionParser, ConditionParserOptions, ConditionBuilder, ParseRule } from './parser'
export { createConditionParser, defaultRules } from './parser'

// Logging
export type { Logger, LoggerOptions } from './logger'
export { createLogger } from './logger'

// Gate
export type { GateConfig, ResolvedGateConfig } from './config'
export { resolveGateConfig, DEFAULT_MIN_SLEEP, DEFAULT_MAX_SLEEP } from './config'
export type { ConditionGate, GateDecision, GatedTask } from './gate'
export { createConditionGate } from './gate'
