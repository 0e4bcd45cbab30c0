/**
 * Segment 04: Cycle and Estimate Tests
 *
 * Tests the temporal metadata of conditions: the window in which a condition
 * could be true, and the estimate of how long it stays unchanged.
 */

import { describe, it, expect } from 'vitest'
import {
  cycleOf,
  supportsEstimate,
  estimateTimeToNextChange,
  estimateWindow,
  estimateInContext,
} from '../src/condition-cycle'
import {
  alwaysTrue,
  alwaysFalse,
  fromWindow,
  probe,
  anyCondition,
  allCondition,
  and,
  or,
  not,
  ConditionEvaluationError,
} from '../src/condition-evaluation'
import {
  alwaysWindow,
  between,
  timeOfDay,
  unionWindows,
  intersectWindows,
  findNextStart,
} from '../src/time-window'
import { createContext, fixedClock } from '../src/clock'
import { seconds, hours } from '../src/core'
import type { LocalDateTime } from '../src/time-date'

const now = '2024-01-15T06:00:00' as LocalDateTime

const soonWindow = timeOfDay('07:00', '08:00')
const laterWindow = timeOfDay('09:00', '10:00')
const soon = fromWindow(soonWindow)
const later = fromWindow(laterWindow)

// ============================================================================
// 1. ESTIMATES
// ============================================================================

describe('estimateTimeToNextChange', () => {
  describe('Time Conditions', () => {
    it('is the distance to the next occurrence', () => {
      expect(estimateTimeToNextChange(soon, now)).toBe(hours(1))
      expect(estimateTimeToNextChange(later, now)).toBe(hours(3))
    })

    it('is zero inside the window', () => {
      expect(estimateTimeToNextChange(soon, '2024-01-15T07:30:00' as LocalDateTime)).toBe(0)
    })

    it('is infinite when the window never occurs again', () => {
      const past = fromWindow(between(null, '2024-01-01T00:00'))
      expect(estimateTimeToNextChange(past, now)).toBe(Infinity)
    })

    it('is a finite lower bound when the next start is past the search budget', () => {
      // 1000 daily boundaries from 2026-10-18 end on 2028-03-01, well before 2029
      const morningsFrom2029 = intersectWindows([timeOfDay('08:00', '09:00'), between('2029-01-01T00:00', null)])
      const start = '2026-10-18T10:00:00' as LocalDateTime
      expect(findNextStart(morningsFrom2029, start)).toEqual({ found: false, searchedUntil: '2028-03-01T09:00:00' })
      expect(estimateTimeToNextChange(fromWindow(morningsFrom2029), start)).toBe(seconds(43196400))
    })

    it('estimateWindow works on bare windows', () => {
      expect(estimateWindow(laterWindow, '2024-01-15T08:30:00' as LocalDateTime)).toBe(seconds(1800))
    })
  })

  describe('All', () => {
    it('is the maximum of its children', () => {
      expect(estimateTimeToNextChange(and(soon, later), now)).toBe(hours(3))
    })

    it('uses the minimal resolution for children without the capability', () => {
      expect(estimateTimeToNextChange(and(alwaysTrue(), alwaysFalse()), now)).toBe(1)
    })

    it('a constant child does not mask a real constraint', () => {
      expect(estimateTimeToNextChange(allCondition([alwaysTrue(), later]), now)).toBe(hours(3))
    })
  })

  describe('Any', () => {
    it('is the minimum of its children', () => {
      expect(estimateTimeToNextChange(or(soon, later), now)).toBe(hours(1))
    })

    it('children without the capability contribute zero', () => {
      expect(estimateTimeToNextChange(anyCondition([later, alwaysFalse()]), now)).toBe(0)
    })
  })

  describe('Not', () => {
    it('uses the complemented window of a time child', () => {
      // Inside 07:00-08:00 the negation turns true again at 08:00
      expect(estimateTimeToNextChange(not(soon), '2024-01-15T07:30:00' as LocalDateTime)).toBe(seconds(1800))
    })

    it('is zero while the negation already holds', () => {
      expect(estimateTimeToNextChange(not(soon), now)).toBe(0)
    })

    it('delegates to other children', () => {
      const gauge = probe('gauge', () => false, { estimate: () => seconds(42) })
      expect(estimateTimeToNextChange(not(gauge), now)).toBe(42)
    })
  })

  describe('Probes', () => {
    it('report their own estimate', () => {
      const queue = probe('queue', () => false, { estimate: (at) => seconds(at === now ? 120 : 0) })
      expect(estimateTimeToNextChange(queue, now)).toBe(120)
    })

    it('report zero without the capability', () => {
      expect(estimateTimeToNextChange(probe('ram', () => true), now)).toBe(0)
    })

    it('wrap failing estimates', () => {
      const flaky = probe('flaky', () => false, {
        estimate: () => {
          throw new Error('no data')
        },
      })
      expect(() => estimateTimeToNextChange(flaky, now)).toThrow(ConditionEvaluationError)
      expect(() => estimateTimeToNextChange(flaky, now)).toThrow("Probe 'flaky' estimate failed: no data")
    })
  })
})

describe('estimateInContext', () => {
  it('reads each leaf at its own overridden clock', () => {
    const queue = probe('queue', () => false, { estimate: (at) => seconds(at === now ? 120 : 0) })
    const ctx = createContext(fixedClock('2024-01-15T05:00:00'), {
      time: fixedClock('2024-01-15T06:30:00'),
      probe: fixedClock(now),
    })
    expect(estimateInContext(soon, ctx)).toBe(seconds(1800))
    expect(estimateInContext(queue, ctx)).toBe(120)
    expect(estimateInContext(or(soon, queue), ctx)).toBe(120)
  })
})

// ============================================================================
// 2. CAPABILITY
// ============================================================================

describe('supportsEstimate', () => {
  it('constants lack the capability', () => {
    expect(supportsEstimate(alwaysTrue())).toBe(false)
    expect(supportsEstimate(alwaysFalse())).toBe(false)
  })

  it('time conditions and composites have it', () => {
    expect(supportsEstimate(soon)).toBe(true)
    expect(supportsEstimate(or(alwaysTrue(), alwaysFalse()))).toBe(true)
    expect(supportsEstimate(and(alwaysTrue(), alwaysFalse()))).toBe(true)
  })

  it('probes have it only with an estimate', () => {
    expect(supportsEstimate(probe('ram', () => true))).toBe(false)
    expect(supportsEstimate(probe('ram', () => true, { estimate: () => seconds(5) }))).toBe(true)
  })

  it('Not follows its child', () => {
    expect(supportsEstimate(not(soon))).toBe(true)
    expect(supportsEstimate(not(probe('ram', () => true)))).toBe(false)
  })
})

// ============================================================================
// 3. CYCLE
// ============================================================================

describe('cycleOf', () => {
  it('is the window of a time condition', () => {
    expect(cycleOf(soon)).toBe(soonWindow)
  })

  it('is unbounded for non-temporal conditions', () => {
    expect(cycleOf(alwaysTrue())).toBe(alwaysWindow())
    expect(cycleOf(alwaysFalse())).toBe(alwaysWindow())
    expect(cycleOf(probe('ram', () => true))).toBe(alwaysWindow())
  })

  it('Any of time conditions is the union of their windows', () => {
    expect(cycleOf(or(soon, later))).toEqual(unionWindows([soonWindow, laterWindow]))
  })

  it('Any with a non-temporal child is unbounded', () => {
    expect(cycleOf(or(soon, alwaysFalse()))).toBe(alwaysWindow())
  })

  it('All is the intersection of every child cycle', () => {
    expect(cycleOf(and(soon, later))).toEqual(intersectWindows([soonWindow, laterWindow]))
  })

  it('All treats non-temporal children as the identity', () => {
    expect(cycleOf(and(soon, probe('ram', () => true)))).toBe(soonWindow)
  })

  it('Not of a time condition is the complement', () => {
    expect(cycleOf(not(soon))).toEqual(timeOfDay('08:00', '07:00'))
  })

  it('Not of anything else is unbounded', () => {
    expect(cycleOf(not(probe('ram', () => true)))).toBe(alwaysWindow())
    expect(cycleOf(not(or(soon, later)))).toBe(alwaysWindow())
  })
})
