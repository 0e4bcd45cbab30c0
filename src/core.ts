/**
 * Core Branded Types
 *
 * Re-exports the branded time types and defines Duration, the unit every
 * estimate is reported in.
 */

export type { LocalDate, LocalTime, LocalDateTime, Weekday } from './time-date'

declare const __duration: unique symbol

/** Whole seconds. `Infinity` means the value never changes again. */
export type Duration = number & { readonly [__duration]: true }

export function seconds(n: number): Duration {
  return n as Duration
}

export function minutes(n: number): Duration {
  return seconds(n * 60)
}

export function hours(n: number): Duration {
  return seconds(n * 3600)
}

export const ZERO: Duration = seconds(0)

/** Smallest positive step between two distinct instants. */
export const RESOLUTION: Duration = seconds(1)

export const NEVER: Duration = seconds(Infinity)
