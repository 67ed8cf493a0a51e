/**
 * Relative Labels
 *
 * Human-facing day names relative to the context's clock: "Today",
 * "Tomorrow", "Friday", "Monday 16th", or a plain dd/MM/yyyy date.
 */

import type { Instant } from './core'
import { now, type DateContext } from './context'
import { endOfWeek } from './boundaries'
import { isBefore, isToday, isTomorrow, isWithinWeekIgnoringTimeComponents } from './comparisons'
import { formatted } from './formatting'

/** Ordinal suffix of the day of the month: st, nd, rd, th */
export function daySuffix(ctx: DateContext, self: Instant): string {
  const { day } = ctx.calendar.components(['day'], self)
  switch (day) {
    case undefined:
      return ''
    case 1:
    case 21:
    case 31:
      return 'st'
    case 2:
    case 22:
      return 'nd'
    case 3:
    case 23:
      return 'rd'
    default:
      return 'th'
  }
}

/** Today, Tomorrow, else the weekday: Monday, Tuesday, etc. */
export function relativeDayString(ctx: DateContext, self: Instant): string {
  if (isToday(ctx, self)) return 'Today'
  if (isTomorrow(ctx, self)) return 'Tomorrow'
  return formatted(ctx, self, 'EEEE')
}

/**
 * Today, Tomorrow, the weekday for the rest of this week, the weekday with
 * its date ("Monday 16th") up to a week out, and dd/MM/yyyy beyond that or
 * in the past.
 */
export function relativeDateString(ctx: DateContext, self: Instant): string {
  if (!isWithinWeekIgnoringTimeComponents(ctx, self)) return formatted(ctx, self, 'dd/MM/yyyy')
  if (isToday(ctx, self)) return 'Today'
  if (isTomorrow(ctx, self)) return 'Tomorrow'

  const weekday = formatted(ctx, self, 'EEEE')
  if (isBefore(ctx, self, endOfWeek(ctx, now(ctx)), true)) return weekday

  const { day } = ctx.calendar.components(['day'], self)
  return `${weekday} ${day ?? ''}${daySuffix(ctx, self)}`
}
