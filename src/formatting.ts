/**
 * Formatting & Parsing
 *
 * Unicode date patterns, rendered and read by the context's calendar.
 *
 * "dd/MM/yyyy" → 01/01/2000
 * "HH:mm"      → 13:14
 * "LLLL"       → January
 * "EEEE"       → Monday
 * "E"          → Mon
 */

import type { Calendar, FormatError } from './calendar'
import type { Instant } from './core'
import { reportFallback, type DateContext } from './context'
import type { ParseError } from './errors'
import type { Result } from './result'

export function formatInstant(
  calendar: Calendar,
  instant: Instant,
  pattern: string,
  localeIdentifier?: string
): Result<string, FormatError> {
  return calendar.format(instant, pattern, localeIdentifier)
}

export function parseInstant(calendar: Calendar, text: string, pattern: string): Result<Instant, ParseError> {
  return calendar.parse(text, pattern)
}

/**
 * `instant` rendered with `pattern` in the given locale. A pattern the
 * formatter rejects, or an unknown locale, yields an empty string.
 */
export function formatted(
  ctx: DateContext,
  instant: Instant,
  pattern: string,
  localeIdentifier = 'en'
): string {
  const result = formatInstant(ctx.calendar, instant, pattern, localeIdentifier)
  if (result.ok) return result.value
  reportFallback(ctx, { operation: 'formatted', fallback: 'empty-string', reason: result.error.message })
  return ''
}
