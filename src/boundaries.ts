/**
 * Period Boundaries
 *
 * Start and end of the day, week, month and year containing an instant.
 * Ends are inclusive and land on 23:59:59 of the last day.
 *
 * Failure policy differs per boundary and callers depend on each:
 * - startOfYear, endOfYear, endOfMonth, endOfDay return `undefined`
 * - startOfWeek, endOfWeek return "now"
 * - startOfDay, startOfMonth always produce an instant
 */

import type { Instant } from './core'
import { now, reportFallback, type DateContext, type FallbackOperation } from './context'
import { withComponents } from './merges'

// ============================================================================
// Day
// ============================================================================

export function startOfDay(ctx: DateContext, self: Instant): Instant {
  return ctx.calendar.startOfDay(self)
}

export function endOfDay(ctx: DateContext, self: Instant): Instant | undefined {
  const { calendar } = ctx
  const { year, month, day } = calendar.components(['year', 'month', 'day'], self)
  if (year === undefined || month === undefined || day === undefined) return undefined
  return calendar.instant({ year, month, day, hour: 23, minute: 59, second: 59 })
}

// ============================================================================
// Week
// ============================================================================

/** Start of the calendar week holding `self`, from its week-year and week number */
function calendarWeekStart(ctx: DateContext, self: Instant): Instant | undefined {
  const { calendar } = ctx
  return calendar.instant(calendar.components(['yearForWeekOfYear', 'weekOfYear'], self))
}

function fallBackToNow(ctx: DateContext, operation: FallbackOperation): Instant {
  reportFallback(ctx, { operation, fallback: 'now', reason: 'calendar could not resolve the week' })
  return now(ctx)
}

/**
 * The day after the calendar week's first day, at midnight. With the
 * default Sunday-first week this is Monday, so for a Sunday it is the
 * following day.
 */
export function startOfWeek(ctx: DateContext, self: Instant): Instant {
  const weekStart = calendarWeekStart(ctx, self)
  if (weekStart === undefined) return fallBackToNow(ctx, 'startOfWeek')
  const next = ctx.calendar.addUnit('day', 1, weekStart)
  if (next === undefined) return fallBackToNow(ctx, 'startOfWeek')
  return startOfDay(ctx, next)
}

/** Seven days after the calendar week's first day, at 23:59:59 */
export function endOfWeek(ctx: DateContext, self: Instant): Instant {
  const weekStart = calendarWeekStart(ctx, self)
  if (weekStart === undefined) return fallBackToNow(ctx, 'endOfWeek')
  const last = ctx.calendar.addUnit('day', 7, weekStart)
  if (last === undefined) return fallBackToNow(ctx, 'endOfWeek')
  return endOfDay(ctx, last) ?? fallBackToNow(ctx, 'endOfWeek')
}

// ============================================================================
// Month
// ============================================================================

export function startOfMonth(ctx: DateContext, self: Instant): Instant {
  const monthOnly = withComponents(ctx, startOfDay(ctx, self), ['year', 'month'])
  return startOfDay(ctx, monthOnly)
}

export function endOfMonth(ctx: DateContext, self: Instant): Instant | undefined {
  const { calendar } = ctx
  const nextMonth = calendar.addUnit('month', 1, startOfMonth(ctx, self))
  if (nextMonth === undefined) return undefined
  const lastDay = calendar.addUnit('day', -1, nextMonth)
  if (lastDay === undefined) return undefined
  return endOfDay(ctx, lastDay)
}

// ============================================================================
// Year
// ============================================================================

export function startOfYear(ctx: DateContext, self: Instant): Instant | undefined {
  const { calendar } = ctx
  const { year } = calendar.components(['year'], self)
  if (year === undefined) return undefined
  return calendar.instant({ year, month: 1, day: 1 })
}

export function endOfYear(ctx: DateContext, self: Instant): Instant | undefined {
  const { calendar } = ctx
  const { year } = calendar.components(['year'], self)
  if (year === undefined) return undefined
  return calendar.instant({ year, month: 12, day: 31, hour: 23, minute: 59, second: 59 })
}
