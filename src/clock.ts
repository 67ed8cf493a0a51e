/**
 * Clock
 *
 * Source of "now". Every relative operation reads the clock from its
 * context instead of calling Date.now() directly.
 */

import { makeInstant, type Instant } from './core'

export interface Clock {
  now(): Instant
}

export const systemClock: Clock = {
  now: () => makeInstant(Date.now()),
}

/** A clock frozen at `instant` */
export function fixedClock(instant: Instant): Clock {
  return { now: () => instant }
}
