/**
 * Component Merges
 *
 * Rebuild an instant from a chosen subset of its components, or from the
 * date of one instant and the time of another.
 *
 * Every function here fails soft: when the calendar cannot rebuild the
 * result, the original instant comes back unchanged (and the context's
 * fallback hook hears about it). `timeIntervalSince` is the exception and
 * fails empty.
 */

import type { ComponentSet, DateComponents } from './calendar'
import { durationBetween, type Duration, type Instant } from './core'
import { now, reportFallback, type DateContext, type FallbackOperation } from './context'

const DATE_UNITS = ['year', 'month', 'day'] as const
const TIME_UNITS = ['hour', 'minute', 'second', 'nanosecond'] as const

function rebuildOrSelf(
  ctx: DateContext,
  operation: FallbackOperation,
  self: Instant,
  fields: DateComponents
): Instant {
  const rebuilt = ctx.calendar.instant(fields)
  if (rebuilt !== undefined) return rebuilt
  reportFallback(ctx, { operation, fallback: 'self', reason: 'calendar could not rebuild the instant' })
  return self
}

/**
 * Keeps only `units` of `self`; every other field resets to its default
 * (January, the 1st, midnight).
 */
export function withComponents(ctx: DateContext, self: Instant, units: ComponentSet): Instant {
  return rebuildOrSelf(ctx, 'withComponents', self, ctx.calendar.components(units, self))
}

/** Time of day from `self`, calendar date from `date` (default: now) */
export function updateDateKeepingTime(ctx: DateContext, self: Instant, date: Instant = now(ctx)): Instant {
  const { calendar } = ctx
  return rebuildOrSelf(ctx, 'updateDateKeepingTime', self, {
    ...calendar.components(DATE_UNITS, date),
    ...calendar.components(TIME_UNITS, self),
  })
}

/** Calendar date from `self`, time of day from `time` (default: now) */
export function updateTimeKeepingDate(ctx: DateContext, self: Instant, time: Instant = now(ctx)): Instant {
  const { calendar } = ctx
  return rebuildOrSelf(ctx, 'updateTimeKeepingDate', self, {
    ...calendar.components(DATE_UNITS, self),
    ...calendar.components(TIME_UNITS, time),
  })
}

/**
 * Seconds from `other` to `self` after reducing both to `units`.
 * `undefined` when either side cannot be rebuilt.
 */
export function timeIntervalSince(
  ctx: DateContext,
  self: Instant,
  other: Instant,
  units: ComponentSet
): Duration | undefined {
  const { calendar } = ctx
  const unitList = [...units]
  const since = calendar.instant(calendar.components(unitList, other))
  if (since === undefined) return undefined
  const until = calendar.instant(calendar.components(unitList, self))
  if (until === undefined) return undefined
  return durationBetween(until, since)
}
