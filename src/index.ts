/**
 * daywise
 *
 * Public API exports
 */

// Error system
export {
  DaywiseError, DaywiseErrorCode,
  ValidationError, InvalidLocaleError,
  ParseError, InvalidPatternError, InvalidInstantError,
} from './errors'
export type { DaywiseErrorCode as DaywiseErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err, unwrapOr } from './result'

// Branded types + instant helpers
export type { Instant, Duration } from './core'
export {
  makeInstant, makeDuration, instantFromDate, toDate, epochMillisOf,
  addSeconds, durationBetween,
} from './core'
export {
  minuteInSeconds, hourInSeconds, dayInSeconds, weekInSeconds, yearInSeconds,
} from './duration'

// Calendar & clock
export type {
  Calendar, CalendarOptions, CalendarUnit, ComponentSet, DateComponents,
  WeekStartsOn, FirstWeekContainsDate, FormatError,
} from './calendar'
export { CALENDAR_UNITS, createCalendar, resolveLocale, isValidTimeZone } from './calendar'
export type { Clock } from './clock'
export { systemClock, fixedClock } from './clock'
export type { DateContext, FallbackEvent, FallbackHandler, FallbackOperation } from './context'

// Utilities (context-first functions)
export { daySuffix, relativeDayString, relativeDateString } from './labels'
export {
  startOfYear, endOfYear, startOfMonth, endOfMonth,
  startOfWeek, endOfWeek, startOfDay, endOfDay,
} from './boundaries'
export {
  isBefore, isAfter, isOnSameDay, isToday, isTomorrow,
  isWithinWeekIgnoringTimeComponents,
} from './comparisons'
export { withComponents, updateDateKeepingTime, updateTimeKeepingDate, timeIntervalSince } from './merges'
export { formatted, formatInstant, parseInstant } from './formatting'
export { instantFromString, instantFromComponentsOfNow } from './construction'

// Bound API
export type { Daywise, DaywiseConfig, DaywiseEvent } from './public-api'
export { createDaywise } from './public-api'
