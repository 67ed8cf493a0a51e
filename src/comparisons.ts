/**
 * Comparisons
 *
 * Ordering and same-day checks. Both orderings are inclusive, so equal
 * instants (or, when ignoring time, instants on the same day) are before
 * AND after each other.
 */

import { addSeconds, type Instant } from './core'
import { now, reportFallback, type DateContext } from './context'
import { dayInSeconds, weekInSeconds } from './duration'
import { withComponents } from './merges'

const DAY_UNITS = ['year', 'month', 'day'] as const

function dayOf(ctx: DateContext, instant: Instant): Instant {
  return withComponents(ctx, instant, DAY_UNITS)
}

// ============================================================================
// Ordering
// ============================================================================

export function isBefore(
  ctx: DateContext,
  self: Instant,
  other: Instant,
  ignoringTimeComponents = false
): boolean {
  if (ignoringTimeComponents) return dayOf(ctx, self) <= dayOf(ctx, other)
  return self <= other
}

export function isAfter(
  ctx: DateContext,
  self: Instant,
  other: Instant,
  ignoringTimeComponents = false
): boolean {
  if (ignoringTimeComponents) return dayOf(ctx, self) >= dayOf(ctx, other)
  return self >= other
}

// ============================================================================
// Same-day Checks
// ============================================================================

export function isOnSameDay(ctx: DateContext, self: Instant, other: Instant): boolean {
  return dayOf(ctx, self) === dayOf(ctx, other)
}

export function isToday(ctx: DateContext, self: Instant): boolean {
  return isOnSameDay(ctx, self, now(ctx))
}

export function isTomorrow(ctx: DateContext, self: Instant): boolean {
  const current = now(ctx)
  let tomorrow = ctx.calendar.addUnit('day', 1, current)
  if (tomorrow === undefined) {
    reportFallback(ctx, { operation: 'isTomorrow', fallback: 'fixed-interval', reason: 'calendar could not add a day' })
    tomorrow = addSeconds(current, dayInSeconds)
  }
  return isOnSameDay(ctx, self, tomorrow)
}

/**
 * True from today through the same weekday next week, both days included.
 */
export function isWithinWeekIgnoringTimeComponents(ctx: DateContext, self: Instant): boolean {
  const current = now(ctx)
  let nextWeek = ctx.calendar.addUnit('weekday', 7, current)
  if (nextWeek === undefined) {
    reportFallback(ctx, {
      operation: 'isWithinWeekIgnoringTimeComponents',
      fallback: 'fixed-interval',
      reason: 'calendar could not add seven weekdays',
    })
    nextWeek = addSeconds(current, weekInSeconds)
  }
  return isBefore(ctx, self, nextWeek, true) && isAfter(ctx, self, current, true)
}
