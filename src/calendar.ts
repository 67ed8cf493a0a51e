/**
 * Calendar
 *
 * The calendar capability every utility delegates to: component extraction,
 * reconstruction from a partial set of components, unit arithmetic, day
 * starts, and pattern-based formatting/parsing.
 *
 * The default implementation reads and writes wall-clock fields through a
 * TZDate in an explicit IANA time zone, so results never depend on the host's
 * zone. Week numbering follows `weekStartsOn` / `firstWeekContainsDate`.
 */

import { TZDate } from '@date-fns/tz'
import {
  addDays,
  addHours,
  addMilliseconds,
  addMinutes,
  addMonths,
  addSeconds,
  addWeeks,
  addYears,
  format,
  getWeek,
  getWeekYear,
  isValid,
  parse,
  startOfDay,
  startOfWeekYear,
} from 'date-fns'
import type { Locale } from 'date-fns'
import * as locales from 'date-fns/locale'
import { makeInstant, type Instant } from './core'
import {
  InvalidInstantError,
  InvalidLocaleError,
  InvalidPatternError,
  ParseError,
  ValidationError,
} from './errors'
import { Err, Ok, type Result } from './result'

// ============================================================================
// Types
// ============================================================================

export const CALENDAR_UNITS = [
  'year',
  'month',
  'day',
  'hour',
  'minute',
  'second',
  'nanosecond',
  'weekday',
  'weekOfYear',
  'yearForWeekOfYear',
] as const

export type CalendarUnit = (typeof CALENDAR_UNITS)[number]

/**
 * Calendar field values. Months are 1-based; `weekday` runs from
 * 1 (Sunday) to 7 (Saturday).
 */
export type DateComponents = { [U in CalendarUnit]?: number }

export type ComponentSet = Iterable<CalendarUnit>

/** 0 = Sunday … 6 = Saturday */
export type WeekStartsOn = 0 | 1 | 2 | 3 | 4 | 5 | 6

export type FirstWeekContainsDate = 1 | 4

export type FormatError = InvalidPatternError | InvalidLocaleError | InvalidInstantError

export type CalendarOptions = {
  /** IANA zone name. Defaults to the host's zone. */
  timeZone?: string
  /** Locale identifier such as `en`, `en-GB` or `fr_CA`. Defaults to `en`. */
  locale?: string
  weekStartsOn?: WeekStartsOn
  firstWeekContainsDate?: FirstWeekContainsDate
}

export interface Calendar {
  readonly timeZone: string
  readonly locale: string
  readonly weekStartsOn: WeekStartsOn
  readonly firstWeekContainsDate: FirstWeekContainsDate

  components(units: ComponentSet, instant: Instant): DateComponents
  /** Missing fields take their period-start default. */
  instant(components: DateComponents): Instant | undefined
  addUnit(unit: CalendarUnit, amount: number, instant: Instant): Instant | undefined
  startOfDay(instant: Instant): Instant
  format(instant: Instant, pattern: string, localeIdentifier?: string): Result<string, FormatError>
  parse(text: string, pattern: string): Result<Instant, ParseError>
}

// ============================================================================
// Locale Resolution
// ============================================================================

const LOCALES: ReadonlyMap<string, Locale> = new Map(Object.entries(locales))

/** Bare languages with no date-fns locale of the same name */
const LANGUAGE_ALIASES: Readonly<Record<string, string>> = {
  en: 'enUS',
  zh: 'zhCN',
  no: 'nb',
}

export function resolveLocale(identifier: string): Result<Locale, InvalidLocaleError> {
  const [language = '', ...rest] = identifier.split(/[-_]/)
  const lang = language.toLowerCase()
  const region = rest.find((part) => /^[A-Za-z]{2}$/.test(part))

  const candidates = [
    region ? lang + region.toUpperCase() : undefined,
    lang,
    LANGUAGE_ALIASES[lang],
  ]
  for (const key of candidates) {
    const locale = key ? LOCALES.get(key) : undefined
    if (locale) return Ok(locale)
  }
  return Err(new InvalidLocaleError(identifier))
}

// ============================================================================
// Validation
// ============================================================================

export function isValidTimeZone(tz: string): boolean {
  try {
    Intl.DateTimeFormat('en-US', { timeZone: tz })
    return true
  } catch {
    return false
  }
}

function hostTimeZone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone
}

function isWeekStartsOn(n: number): n is WeekStartsOn {
  return Number.isInteger(n) && n >= 0 && n <= 6
}

// ============================================================================
// Factory
// ============================================================================

const NANOS_PER_MILLI = 1_000_000

export function createCalendar(options: CalendarOptions = {}): Calendar {
  const timeZone = options.timeZone ?? hostTimeZone()
  if (!isValidTimeZone(timeZone)) {
    throw new ValidationError(`Invalid timezone: ${timeZone}`)
  }

  const weekStartsOn = options.weekStartsOn ?? 0
  if (!isWeekStartsOn(weekStartsOn)) {
    throw new ValidationError(`weekStartsOn must be an integer from 0 to 6, got ${weekStartsOn}`)
  }

  const firstWeekContainsDate = options.firstWeekContainsDate ?? 1
  if (firstWeekContainsDate !== 1 && firstWeekContainsDate !== 4) {
    throw new ValidationError(`firstWeekContainsDate must be 1 or 4, got ${firstWeekContainsDate}`)
  }

  const localeId = options.locale ?? 'en'
  const resolved = resolveLocale(localeId)
  if (!resolved.ok) throw resolved.error
  const defaultLocale: Locale = resolved.value

  const weekOptions = { weekStartsOn, firstWeekContainsDate }

  function inZone(instant: Instant): TZDate {
    return new TZDate(instant, timeZone)
  }

  function toInstant(date: Date): Instant | undefined {
    const time = date.getTime()
    return Number.isNaN(time) ? undefined : makeInstant(time)
  }

  function readUnit(date: TZDate, unit: CalendarUnit): number {
    switch (unit) {
      case 'year':
        return date.getFullYear()
      case 'month':
        return date.getMonth() + 1
      case 'day':
        return date.getDate()
      case 'hour':
        return date.getHours()
      case 'minute':
        return date.getMinutes()
      case 'second':
        return date.getSeconds()
      case 'nanosecond':
        return date.getMilliseconds() * NANOS_PER_MILLI
      case 'weekday':
        return date.getDay() + 1
      case 'weekOfYear':
        return getWeek(date, weekOptions)
      case 'yearForWeekOfYear':
        return getWeekYear(date, weekOptions)
    }
  }

  function components(units: ComponentSet, instant: Instant): DateComponents {
    const date = inZone(instant)
    const result: DateComponents = {}
    for (const unit of units) {
      result[unit] = readUnit(date, unit)
    }
    return result
  }

  /** Start of week `weekOfYear` of `weekYear`, moved on to `weekday` when one is given */
  function weekStart(weekYear: number, weekOfYear: number, weekday: number | undefined): TZDate {
    const midYear = new TZDate(0, timeZone)
    midYear.setFullYear(weekYear, 6, 1)
    midYear.setHours(0, 0, 0, 0)
    const start = addWeeks(startOfWeekYear<TZDate>(midYear, weekOptions), weekOfYear - 1)
    if (weekday === undefined) return start
    return addDays(start, (((weekday - 1 - weekStartsOn) % 7) + 7) % 7)
  }

  function instant(fields: DateComponents): Instant | undefined {
    for (const value of Object.values(fields)) {
      if (value !== undefined && !Number.isSafeInteger(value)) return undefined
    }

    const { year, month, day, hour, minute, second, nanosecond, weekday, weekOfYear, yearForWeekOfYear } = fields

    let date: TZDate
    if (weekOfYear !== undefined && day === undefined) {
      date = weekStart(yearForWeekOfYear ?? year ?? 1, weekOfYear, weekday)
    } else {
      date = new TZDate(0, timeZone)
      date.setFullYear(year ?? 1, (month ?? 1) - 1, day ?? 1)
    }
    date.setHours(hour ?? 0, minute ?? 0, second ?? 0, Math.trunc((nanosecond ?? 0) / NANOS_PER_MILLI))

    return toInstant(date)
  }

  function shift(date: TZDate, unit: CalendarUnit, amount: number): TZDate {
    switch (unit) {
      case 'year':
      case 'yearForWeekOfYear':
        return addYears(date, amount)
      case 'month':
        return addMonths(date, amount)
      case 'weekOfYear':
        return addWeeks(date, amount)
      case 'day':
      case 'weekday':
        return addDays(date, amount)
      case 'hour':
        return addHours(date, amount)
      case 'minute':
        return addMinutes(date, amount)
      case 'second':
        return addSeconds(date, amount)
      case 'nanosecond':
        return addMilliseconds(date, Math.trunc(amount / NANOS_PER_MILLI))
    }
  }

  function addUnit(unit: CalendarUnit, amount: number, instant: Instant): Instant | undefined {
    if (!Number.isSafeInteger(amount) || Number.isNaN(instant)) return undefined
    return toInstant(shift(inZone(instant), unit, amount))
  }

  function dayStart(instant: Instant): Instant {
    return makeInstant(startOfDay(inZone(instant)).getTime())
  }

  function formatInZone(
    instant: Instant,
    pattern: string,
    localeIdentifier: string = localeId
  ): Result<string, FormatError> {
    if (Number.isNaN(instant)) return Err(new InvalidInstantError('Cannot format an invalid instant'))

    const locale = localeIdentifier === localeId ? Ok(defaultLocale) : resolveLocale(localeIdentifier)
    if (!locale.ok) return locale

    try {
      return Ok(
        format(inZone(instant), pattern, {
          locale: locale.value,
          ...weekOptions,
          useAdditionalWeekYearTokens: true,
          useAdditionalDayOfYearTokens: true,
        })
      )
    } catch (e) {
      if (e instanceof RangeError) return Err(new InvalidPatternError(pattern, { cause: e }))
      throw e
    }
  }

  function parseInZone(text: string, pattern: string): Result<Instant, ParseError> {
    // Fields the pattern omits come from 2000-01-01 00:00:00 local.
    const reference = new TZDate(0, timeZone)
    reference.setFullYear(2000, 0, 1)
    reference.setHours(0, 0, 0, 0)

    let parsed: TZDate
    try {
      parsed = parse(text, pattern, reference, {
        locale: defaultLocale,
        ...weekOptions,
        useAdditionalWeekYearTokens: true,
        useAdditionalDayOfYearTokens: true,
      })
    } catch (e) {
      if (e instanceof RangeError) return Err(new ParseError(`Invalid parse pattern: '${pattern}'`, { cause: e }))
      throw e
    }

    if (!isValid(parsed)) {
      return Err(new ParseError(`'${text}' does not match pattern '${pattern}'`))
    }
    return Ok(makeInstant(parsed.getTime()))
  }

  return {
    timeZone,
    locale: localeId,
    weekStartsOn,
    firstWeekContainsDate,
    components,
    instant,
    addUnit,
    startOfDay: dayStart,
    format: formatInZone,
    parse: parseInZone,
  }
}
