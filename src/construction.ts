/**
 * Instant Construction
 *
 * Both constructors fail empty: `undefined` when the calendar cannot
 * produce an instant.
 */

import type { ComponentSet } from './calendar'
import type { Instant } from './core'
import { now, type DateContext } from './context'
import { unwrapOr } from './result'
import { parseInstant } from './formatting'

export function instantFromString(ctx: DateContext, text: string, pattern: string): Instant | undefined {
  return unwrapOr(parseInstant(ctx.calendar, text, pattern))
}

/** "Now" reduced to `units`, e.g. `['year', 'month', 'day']` for today's midnight */
export function instantFromComponentsOfNow(ctx: DateContext, units: ComponentSet): Instant | undefined {
  const { calendar } = ctx
  return calendar.instant(calendar.components(units, now(ctx)))
}
