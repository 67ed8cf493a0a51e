/**
 * Public API Module
 *
 * Consumer-facing interface that binds every utility to one calendar and
 * clock. Handles configuration, validation and fallback events.
 */

import {
  createCalendar,
  type Calendar,
  type CalendarOptions,
  type ComponentSet,
  type FormatError,
} from './calendar'
import { systemClock, type Clock } from './clock'
import type { Duration, Instant } from './core'
import type { DateContext, FallbackEvent, FallbackHandler } from './context'
import type { ParseError } from './errors'
import type { Result } from './result'
import {
  endOfDay,
  endOfMonth,
  endOfWeek,
  endOfYear,
  startOfDay,
  startOfMonth,
  startOfWeek,
  startOfYear,
} from './boundaries'
import {
  isAfter,
  isBefore,
  isOnSameDay,
  isToday,
  isTomorrow,
  isWithinWeekIgnoringTimeComponents,
} from './comparisons'
import { instantFromComponentsOfNow, instantFromString } from './construction'
import { formatInstant, formatted, parseInstant } from './formatting'
import { daySuffix, relativeDateString, relativeDayString } from './labels'
import { timeIntervalSince, updateDateKeepingTime, updateTimeKeepingDate, withComponents } from './merges'

// ============================================================================
// Types
// ============================================================================

export type DaywiseConfig = CalendarOptions & {
  clock?: Clock
  /** Used as-is; the calendar options above are then ignored */
  calendar?: Calendar
}

export type DaywiseEvent = 'fallback'

export type Daywise = {
  readonly calendar: Calendar
  readonly clock: Clock
  readonly context: DateContext
  now(): Instant

  // Labels
  daySuffix(instant: Instant): string
  relativeDayString(instant: Instant): string
  relativeDateString(instant: Instant): string

  // Boundaries
  startOfYear(instant: Instant): Instant | undefined
  endOfYear(instant: Instant): Instant | undefined
  startOfMonth(instant: Instant): Instant
  endOfMonth(instant: Instant): Instant | undefined
  startOfWeek(instant: Instant): Instant
  endOfWeek(instant: Instant): Instant
  startOfDay(instant: Instant): Instant
  endOfDay(instant: Instant): Instant | undefined

  // Comparisons
  isBefore(instant: Instant, other: Instant, ignoringTimeComponents?: boolean): boolean
  isAfter(instant: Instant, other: Instant, ignoringTimeComponents?: boolean): boolean
  isOnSameDay(instant: Instant, other: Instant): boolean
  isToday(instant: Instant): boolean
  isTomorrow(instant: Instant): boolean
  isWithinWeekIgnoringTimeComponents(instant: Instant): boolean

  // Merges
  updateDateKeepingTime(instant: Instant, date?: Instant): Instant
  updateTimeKeepingDate(instant: Instant, time?: Instant): Instant
  withComponents(instant: Instant, units: ComponentSet): Instant
  timeIntervalSince(instant: Instant, other: Instant, units: ComponentSet): Duration | undefined

  // Formatting & construction
  formatted(instant: Instant, pattern: string, localeIdentifier?: string): string
  formatInstant(instant: Instant, pattern: string, localeIdentifier?: string): Result<string, FormatError>
  parseInstant(text: string, pattern: string): Result<Instant, ParseError>
  instantFromString(text: string, pattern: string): Instant | undefined
  instantFromComponentsOfNow(units: ComponentSet): Instant | undefined

  on(event: DaywiseEvent, handler: FallbackHandler): void
  off(event: DaywiseEvent, handler: FallbackHandler): void
}

// ============================================================================
// Implementation
// ============================================================================

export function createDaywise(config: DaywiseConfig = {}): Daywise {
  const calendar = config.calendar ?? createCalendar(config)
  const clock = config.clock ?? systemClock

  const eventHandlers = new Map<DaywiseEvent, FallbackHandler[]>()

  function emit(event: DaywiseEvent, payload: FallbackEvent): boolean {
    const handlers = eventHandlers.get(event) ?? []
    let hadErrors = false
    for (const handler of handlers) {
      try {
        handler(payload)
      } catch (e) {
        hadErrors = true
        console.error(`Event handler error on '${event}':`, e)
      }
    }
    return !hadErrors
  }

  function on(event: DaywiseEvent, handler: FallbackHandler): void {
    const handlers = eventHandlers.get(event)
    if (handlers) handlers.push(handler)
    else eventHandlers.set(event, [handler])
  }

  function off(event: DaywiseEvent, handler: FallbackHandler): void {
    const handlers = eventHandlers.get(event)
    if (!handlers) return
    const idx = handlers.indexOf(handler)
    if (idx !== -1) handlers.splice(idx, 1)
  }

  const ctx: DateContext = {
    calendar,
    clock,
    onFallback: (event) => {
      emit('fallback', event)
    },
  }

  return {
    calendar,
    clock,
    context: ctx,
    now: () => clock.now(),

    daySuffix: (instant) => daySuffix(ctx, instant),
    relativeDayString: (instant) => relativeDayString(ctx, instant),
    relativeDateString: (instant) => relativeDateString(ctx, instant),

    startOfYear: (instant) => startOfYear(ctx, instant),
    endOfYear: (instant) => endOfYear(ctx, instant),
    startOfMonth: (instant) => startOfMonth(ctx, instant),
    endOfMonth: (instant) => endOfMonth(ctx, instant),
    startOfWeek: (instant) => startOfWeek(ctx, instant),
    endOfWeek: (instant) => endOfWeek(ctx, instant),
    startOfDay: (instant) => startOfDay(ctx, instant),
    endOfDay: (instant) => endOfDay(ctx, instant),

    isBefore: (instant, other, ignoringTimeComponents) => isBefore(ctx, instant, other, ignoringTimeComponents),
    isAfter: (instant, other, ignoringTimeComponents) => isAfter(ctx, instant, other, ignoringTimeComponents),
    isOnSameDay: (instant, other) => isOnSameDay(ctx, instant, other),
    isToday: (instant) => isToday(ctx, instant),
    isTomorrow: (instant) => isTomorrow(ctx, instant),
    isWithinWeekIgnoringTimeComponents: (instant) => isWithinWeekIgnoringTimeComponents(ctx, instant),

    updateDateKeepingTime: (instant, date) => updateDateKeepingTime(ctx, instant, date),
    updateTimeKeepingDate: (instant, time) => updateTimeKeepingDate(ctx, instant, time),
    withComponents: (instant, units) => withComponents(ctx, instant, units),
    timeIntervalSince: (instant, other, units) => timeIntervalSince(ctx, instant, other, units),

    formatted: (instant, pattern, localeIdentifier) => formatted(ctx, instant, pattern, localeIdentifier),
    formatInstant: (instant, pattern, localeIdentifier) => formatInstant(calendar, instant, pattern, localeIdentifier),
    parseInstant: (text, pattern) => parseInstant(calendar, text, pattern),
    instantFromString: (text, pattern) => instantFromString(ctx, text, pattern),
    instantFromComponentsOfNow: (units) => instantFromComponentsOfNow(ctx, units),

    on,
    off,
  }
}
