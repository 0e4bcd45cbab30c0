/**
 * Time Windows
 *
 * Pure functions over sets of instants: membership, complement, union,
 * intersection, and rolling a window forward to its next occurrence.
 * Recurring windows are half-open, `[start, end)`, and wrap around the end
 * of their period when start > end.
 */

import {
  type LocalDateTime,
  type LocalTime,
  type Weekday,
  addDays,
  dateOf,
  dayOf,
  dayOfWeek,
  daysInMonth,
  makeDate,
  makeDateTime,
  makeTime,
  monthOf,
  parseDateTime,
  parseTime,
  secondsOfDay,
  startOfMonthOffset,
  timeOf,
  weekdayToIndex,
  yearOf,
} from './time-date'

// ============================================================================
// Types
// ============================================================================

export type WeekTime = { weekday: Weekday; time: LocalTime }

export type TimeWindow =
  | { type: 'always' }
  | { type: 'never' }
  | { type: 'between'; start: LocalDateTime | null; end: LocalDateTime | null }
  | { type: 'timeOfDay'; start: LocalTime; end: LocalTime }
  | { type: 'timeOfWeek'; start: WeekTime; end: WeekTime }
  | { type: 'timeOfMonth'; startDay: number; endDay: number }
  | { type: 'union'; windows: readonly TimeWindow[] }
  | { type: 'intersection'; windows: readonly TimeWindow[] }
  | { type: 'complement'; window: TimeWindow }

/** One concrete stretch of a window. `end` is null when no end was found. */
export type Occurrence = {
  start: LocalDateTime
  end: LocalDateTime | null
}

// ============================================================================
// Errors
// ============================================================================

export { InvalidWindowError } from './errors'
import { InvalidWindowError } from './errors'

// ============================================================================
// Window Constructors
// ============================================================================

const ALWAYS: TimeWindow = Object.freeze({ type: 'always' })
const NEVER: TimeWindow = Object.freeze({ type: 'never' })

/** The unbounded window: valid at any instant. */
export function alwaysWindow(): TimeWindow {
  return ALWAYS
}

export function neverWindow(): TimeWindow {
  return NEVER
}

function requireTime(str: string, label: string): LocalTime {
  const result = parseTime(str)
  if (!result.ok) throw new InvalidWindowError(`${label}: ${result.error.message}`)
  return result.value
}

function requireDateTime(str: string, label: string): LocalDateTime {
  const result = parseDateTime(str)
  if (!result.ok) throw new InvalidWindowError(`${label}: ${result.error.message}`)
  return result.value
}

/** Absolute window `[start, end)`. A null side is open. */
export function between(start: string | null, end: string | null): TimeWindow {
  const s = start === null ? null : requireDateTime(start, 'between start')
  const e = end === null ? null : requireDateTime(end, 'between end')
  if (s !== null && e !== null && s >= e) {
    throw new InvalidWindowError(`between requires start < end, got ${s} and ${e}`)
  }
  if (s === null && e === null) return ALWAYS
  return Object.freeze({ type: 'between', start: s, end: e })
}

export function timeOfDay(start: string, end: string): TimeWindow {
  const s = requireTime(start, 'timeOfDay start')
  const e = requireTime(end, 'timeOfDay end')
  if (s === e) throw new InvalidWindowError(`timeOfDay requires distinct start and end, got ${s}`)
  return Object.freeze({ type: 'timeOfDay', start: s, end: e })
}

export function timeOfWeek(startDay: Weekday, startTime: string, endDay: Weekday, endTime: string): TimeWindow {
  const start = Object.freeze({ weekday: startDay, time: requireTime(startTime, 'timeOfWeek start') })
  const end = Object.freeze({ weekday: endDay, time: requireTime(endTime, 'timeOfWeek end') })
  if (weekSeconds(start) === weekSeconds(end)) {
    throw new InvalidWindowError(`timeOfWeek requires distinct start and end, got ${startDay} ${start.time}`)
  }
  return Object.freeze({ type: 'timeOfWeek', start, end })
}

/** Inclusive day-of-month range; wraps into the next month when startDay > endDay. */
export function timeOfMonth(startDay: number, endDay: number): TimeWindow {
  for (const day of [startDay, endDay]) {
    if (!Number.isInteger(day) || day < 1 || day > 31) {
      throw new InvalidWindowError(`timeOfMonth requires days 1-31, got ${day}`)
    }
  }
  return Object.freeze({ type: 'timeOfMonth', startDay, endDay })
}

/** Parameters of a single leaf window, one variant per constructor. */
export type WindowParams =
  | { type: 'between'; start: string | null; end: string | null }
  | { type: 'timeOfDay'; start: string; end: string }
  | { type: 'timeOfWeek'; startDay: Weekday; startTime: string; endDay: Weekday; endTime: string }
  | { type: 'timeOfMonth'; startDay: number; endDay: number }

export function windowFrom(params: WindowParams): TimeWindow {
  switch (params.type) {
    case 'between':
      return between(params.start, params.end)
    case 'timeOfDay':
      return timeOfDay(params.start, params.end)
    case 'timeOfWeek':
      return timeOfWeek(params.startDay, params.startTime, params.endDay, params.endTime)
    case 'timeOfMonth':
      return timeOfMonth(params.startDay, params.endDay)
  }
}

// ============================================================================
// Algebra
// ============================================================================

export function unionWindows(windows: readonly TimeWindow[]): TimeWindow {
  const parts: TimeWindow[] = []
  for (const w of windows) {
    if (w.type === 'always') return ALWAYS
    if (w.type === 'never') continue
    if (w.type === 'union') parts.push(...w.windows)
    else parts.push(w)
  }
  const [only] = parts
  if (only === undefined) return NEVER
  if (parts.length === 1) return only
  return Object.freeze({ type: 'union', windows: Object.freeze(parts) })
}

export function intersectWindows(windows: readonly TimeWindow[]): TimeWindow {
  const parts: TimeWindow[] = []
  for (const w of windows) {
    if (w.type === 'never') return NEVER
    if (w.type === 'always') continue
    if (w.type === 'intersection') parts.push(...w.windows)
    else parts.push(w)
  }
  const [only] = parts
  if (only === undefined) return ALWAYS
  if (parts.length === 1) return only
  return Object.freeze({ type: 'intersection', windows: Object.freeze(parts) })
}

export function complementWindow(window: TimeWindow): TimeWindow {
  switch (window.type) {
    case 'always':
      return NEVER
    case 'never':
      return ALWAYS
    case 'complement':
      return window.window
    case 'between':
      if (window.start === null) return Object.freeze({ type: 'between', start: window.end, end: null })
      if (window.end === null) return Object.freeze({ type: 'between', start: null, end: window.start })
      return unionWindows([
        Object.freeze({ type: 'between', start: null, end: window.start }),
        Object.freeze({ type: 'between', start: window.end, end: null }),
      ])
    case 'timeOfDay':
      return Object.freeze({ type: 'timeOfDay', start: window.end, end: window.start })
    case 'timeOfWeek':
      return Object.freeze({ type: 'timeOfWeek', start: window.end, end: window.start })
    default:
      return Object.freeze({ type: 'complement', window })
  }
}

// ============================================================================
// Membership
// ============================================================================

function weekSeconds(at: WeekTime): number {
  return weekdayToIndex(at.weekday) * 86400 + secondsOfDay(at.time)
}

function inCyclicRange(x: number, start: number, end: number): boolean {
  return start < end ? x >= start && x < end : x >= start || x < end
}

export function contains(window: TimeWindow, instant: LocalDateTime): boolean {
  switch (window.type) {
    case 'always':
      return true
    case 'never':
      return false
    case 'between':
      return (window.start === null || instant >= window.start) && (window.end === null || instant < window.end)
    case 'timeOfDay':
      return inCyclicRange(secondsOfDay(timeOf(instant)), secondsOfDay(window.start), secondsOfDay(window.end))
    case 'timeOfWeek': {
      const x = weekdayToIndex(dayOfWeek(dateOf(instant))) * 86400 + secondsOfDay(timeOf(instant))
      return inCyclicRange(x, weekSeconds(window.start), weekSeconds(window.end))
    }
    case 'timeOfMonth': {
      const day = dayOf(dateOf(instant))
      return window.startDay <= window.endDay
        ? day >= window.startDay && day <= window.endDay
        : day >= window.startDay || day <= window.endDay
    }
    case 'union':
      return window.windows.some((w) => contains(w, instant))
    case 'intersection':
      return window.windows.every((w) => contains(w, instant))
    case 'complement':
      return !contains(window.window, instant)
  }
}

// ============================================================================
// Boundaries
// ============================================================================

const MIDNIGHT = makeTime(0, 0, 0)

function earliestAfter(instant: LocalDateTime, candidates: readonly (LocalDateTime | null)[]): LocalDateTime | null {
  let best: LocalDateTime | null = null
  for (const c of candidates) {
    if (c !== null && c > instant && (best === null || c < best)) best = c
  }
  return best
}

function nextWeekly(instant: LocalDateTime, at: WeekTime): LocalDateTime {
  const date = dateOf(instant)
  const ahead = (weekdayToIndex(at.weekday) - weekdayToIndex(dayOfWeek(date)) + 7) % 7
  const candidate = makeDateTime(addDays(date, ahead), at.time)
  return candidate > instant ? candidate : makeDateTime(addDays(date, ahead + 7), at.time)
}

function monthlyCandidates(instant: LocalDateTime, startDay: number, endDay: number): LocalDateTime[] {
  const candidates: LocalDateTime[] = []
  // Three months always cover the next start or end, even past short months
  for (let offset = 0; offset < 3; offset++) {
    const first = startOfMonthOffset(dateOf(instant), offset)
    const year = yearOf(first)
    const month = monthOf(first)
    const dim = daysInMonth(year, month)
    candidates.push(makeDateTime(first, MIDNIGHT))
    if (startDay <= dim) candidates.push(makeDateTime(makeDate(year, month, startDay), MIDNIGHT))
    if (endDay + 1 <= dim) candidates.push(makeDateTime(makeDate(year, month, endDay + 1), MIDNIGHT))
  }
  return candidates
}

/**
 * Earliest instant after `instant` at which membership may change.
 * Returns null when the window has no further boundaries.
 */
export function nextBoundary(window: TimeWindow, instant: LocalDateTime): LocalDateTime | null {
  switch (window.type) {
    case 'always':
    case 'never':
      return null
    case 'between':
      return earliestAfter(instant, [window.start, window.end])
    case 'timeOfDay': {
      const today = dateOf(instant)
      const tomorrow = addDays(today, 1)
      return earliestAfter(instant, [
        makeDateTime(today, window.start),
        makeDateTime(today, window.end),
        makeDateTime(tomorrow, window.start),
        makeDateTime(tomorrow, window.end),
      ])
    }
    case 'timeOfWeek':
      return earliestAfter(instant, [nextWeekly(instant, window.start), nextWeekly(instant, window.end)])
    case 'timeOfMonth':
      return earliestAfter(instant, monthlyCandidates(instant, window.startDay, window.endDay))
    case 'union':
    case 'intersection':
      return earliestAfter(instant, window.windows.map((w) => nextBoundary(w, instant)))
    case 'complement':
      return nextBoundary(window.window, instant)
  }
}

// ============================================================================
// Roll Forward
// ============================================================================

/** Upper bound on boundaries visited while searching one occurrence edge. */
export const MAX_BOUNDARY_STEPS = 1000

/**
 * Outcome of searching for the next instant inside a window. When the step
 * budget runs out first, `searchedUntil` is the last boundary visited: the
 * window is known to stay closed up to it.
 */
export type StartSearch =
  | { found: true; start: LocalDateTime }
  | { found: false; searchedUntil: LocalDateTime }

/**
 * First instant at or after `instant` inside `window`. Null only when the
 * window has no further boundaries and is closed, so it never occurs again.
 */
export function findNextStart(window: TimeWindow, instant: LocalDateTime): StartSearch | null {
  if (contains(window, instant)) return { found: true, start: instant }
  let cursor = instant
  for (let step = 0; step < MAX_BOUNDARY_STEPS; step++) {
    const next = nextBoundary(window, cursor)
    if (next === null) return null
    if (contains(window, next)) return { found: true, start: next }
    cursor = next
  }
  return { found: false, searchedUntil: cursor }
}

/**
 * Occurrence of `window` containing `instant` (clipped to start there), or the
 * next one after it. Null when the window does not occur again, or when its
 * next start lies beyond MAX_BOUNDARY_STEPS boundaries; `findNextStart` tells
 * the two apart.
 */
export function rollForward(window: TimeWindow, instant: LocalDateTime): Occurrence | null {
  const search = findNextStart(window, instant)
  if (search === null || !search.found) return null
  return { start: search.start, end: occurrenceEnd(window, search.start) }
}

function occurrenceEnd(window: TimeWindow, start: LocalDateTime): LocalDateTime | null {
  let cursor = start
  for (let step = 0; step < MAX_BOUNDARY_STEPS; step++) {
    const next = nextBoundary(window, cursor)
    if (next === null) return null
    if (!contains(window, next)) return next
    cursor = next
  }
  return null
}

// ============================================================================
// Formatting
// ============================================================================

export function formatWindow(window: TimeWindow): string {
  switch (window.type) {
    case 'always':
      return 'always'
    case 'never':
      return 'never'
    case 'between':
      if (window.start === null) return `until ${window.end}`
      if (window.end === null) return `from ${window.start}`
      return `between ${window.start} and ${window.end}`
    case 'timeOfDay':
      return `daily ${window.start}-${window.end}`
    case 'timeOfWeek':
      return `weekly ${window.start.weekday} ${window.start.time}-${window.end.weekday} ${window.end.time}`
    case 'timeOfMonth':
      return `monthly ${window.startDay}-${window.endDay}`
    case 'union':
      return `(${window.windows.map(formatWindow).join(' | ')})`
    case 'intersection':
      return `(${window.windows.map(formatWindow).join(' & ')})`
    case 'complement':
      return `~${formatWindow(window.window)}`
  }
}
