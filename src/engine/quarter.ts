/**
 * Cardwise Engine - Quarter Resolver
 * Maps a calendar date onto the four rotating-bonus periods. Time is read
 * through a Clock so quarter boundaries can be pinned in tests.
 *
 * @module quarter
 */

export type Quarter = 'Q1' | 'Q2' | 'Q3' | 'Q4'

export const QUARTERS: readonly Quarter[] = ['Q1', 'Q2', 'Q3', 'Q4']

export interface Clock {
  now(): Date
}

export const systemClock: Clock = {
  now: () => new Date(),
}

/** A clock frozen at one instant. */
export function fixedClock(at: Date | string): Clock {
  const instant = new Date(at)
  return { now: () => new Date(instant) }
}

/** Local calendar month: Jan–Mar Q1, Apr–Jun Q2, Jul–Sep Q3, Oct–Dec Q4 */
export function quarterOf(date: Date): Quarter {
  return QUARTERS[Math.floor(date.getMonth() / 3)]
}

export function currentQuarter(clock: Clock = systemClock): Quarter {
  return quarterOf(clock.now())
}
