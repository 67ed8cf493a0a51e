/**
 * Date Context
 *
 * Calendar and clock passed explicitly to every operation, plus an optional
 * hook told about each fails-soft fallback.
 */

import type { Calendar } from './calendar'
import type { Clock } from './clock'
import type { Instant } from './core'

// ============================================================================
// Types
// ============================================================================

export type FallbackOperation =
  | 'startOfWeek'
  | 'endOfWeek'
  | 'isTomorrow'
  | 'isWithinWeekIgnoringTimeComponents'
  | 'withComponents'
  | 'updateDateKeepingTime'
  | 'updateTimeKeepingDate'
  | 'formatted'

export type FallbackEvent = {
  operation: FallbackOperation
  /** What the caller received instead of a computed value */
  fallback: 'now' | 'self' | 'empty-string' | 'fixed-interval'
  reason: string
}

export type FallbackHandler = (event: FallbackEvent) => void

export type DateContext = {
  calendar: Calendar
  clock: Clock
  onFallback?: FallbackHandler
}

// ============================================================================
// Helpers
// ============================================================================

export function now(ctx: DateContext): Instant {
  return ctx.clock.now()
}

export function reportFallback(ctx: DateContext, event: FallbackEvent): void {
  ctx.onFallback?.(event)
}
