/**
 * Property tests for time windows.
 *
 * Tests the laws of the window algebra and the guarantees of rollForward:
 * - Complement, union and intersection agree with membership
 * - Boundaries always move forward
 * - Occurrences start inside the window and end at the first instant outside it
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import { windowGen, leafWindowGen, boundaryDateTimeGen } from '../generators'
import {
  contains,
  complementWindow,
  unionWindows,
  intersectWindows,
  nextBoundary,
  rollForward,
  formatWindow,
} from '../../../src/time-window'
import { addSeconds } from '../../../src/time-date'

describe('Window Algebra', () => {
  it('complement flips membership', () => {
    fc.assert(
      fc.property(windowGen(), boundaryDateTimeGen(), (window, instant) => {
        expect(contains(complementWindow(window), instant)).toBe(!contains(window, instant))
      })
    )
  })

  it('double complement has the same membership', () => {
    fc.assert(
      fc.property(windowGen(), boundaryDateTimeGen(), (window, instant) => {
        expect(contains(complementWindow(complementWindow(window)), instant)).toBe(contains(window, instant))
      })
    )
  })

  it('union contains what either side contains', () => {
    fc.assert(
      fc.property(windowGen(), windowGen(), boundaryDateTimeGen(), (a, b, instant) => {
        expect(contains(unionWindows([a, b]), instant)).toBe(contains(a, instant) || contains(b, instant))
      })
    )
  })

  it('intersection contains what both sides contain', () => {
    fc.assert(
      fc.property(windowGen(), windowGen(), boundaryDateTimeGen(), (a, b, instant) => {
        expect(contains(intersectWindows([a, b]), instant)).toBe(contains(a, instant) && contains(b, instant))
      })
    )
  })

  it('De Morgan holds for windows', () => {
    fc.assert(
      fc.property(leafWindowGen(), leafWindowGen(), boundaryDateTimeGen(), (a, b, instant) => {
        const lhs = complementWindow(unionWindows([a, b]))
        const rhs = intersectWindows([complementWindow(a), complementWindow(b)])
        expect(contains(lhs, instant)).toBe(contains(rhs, instant))
      })
    )
  })

  it('every window formats to a non-empty string', () => {
    fc.assert(
      fc.property(windowGen(), (window) => {
        expect(formatWindow(window).length).toBeGreaterThan(0)
      })
    )
  })
})

describe('Boundaries', () => {
  it('nextBoundary is strictly after the instant', () => {
    fc.assert(
      fc.property(windowGen(), boundaryDateTimeGen(), (window, instant) => {
        const next = nextBoundary(window, instant)
        if (next !== null) expect(next > instant).toBe(true)
      })
    )
  })

  it('membership is constant up to the next boundary', () => {
    fc.assert(
      fc.property(windowGen(), boundaryDateTimeGen(), (window, instant) => {
        const next = nextBoundary(window, instant)
        if (next === null) return
        expect(contains(window, addSeconds(next, -1))).toBe(contains(window, instant))
      })
    )
  })
})

describe('rollForward', () => {
  it('starts inside the window, no earlier than the instant', () => {
    fc.assert(
      fc.property(windowGen(), boundaryDateTimeGen(), (window, instant) => {
        const occurrence = rollForward(window, instant)
        if (occurrence === null) return
        expect(occurrence.start >= instant).toBe(true)
        expect(contains(window, occurrence.start)).toBe(true)
      })
    )
  })

  it('is clipped to the instant when already inside', () => {
    fc.assert(
      fc.property(windowGen(), boundaryDateTimeGen(), (window, instant) => {
        fc.pre(contains(window, instant))
        expect(rollForward(window, instant)?.start).toBe(instant)
      })
    )
  })

  it('ends at the first instant outside the window', () => {
    fc.assert(
      fc.property(windowGen(), boundaryDateTimeGen(), (window, instant) => {
        const occurrence = rollForward(window, instant)
        if (occurrence === null || occurrence.end === null) return
        expect(occurrence.end > occurrence.start).toBe(true)
        expect(contains(window, occurrence.end)).toBe(false)
      })
    )
  })
})
