/**
 * Segment 02: Calendar
 *
 * Component extraction, reconstruction, unit arithmetic, day starts,
 * formatting and parsing on the date-fns backed calendar.
 */

import { describe, it, expect } from 'vitest'
import { enGB, enUS, frCA, de, zhCN } from 'date-fns/locale'
import {
  createCalendar,
  isValidTimeZone,
  resolveLocale,
  type CalendarOptions,
} from '../src/calendar'
import { makeInstant } from '../src/core'
import {
  DaywiseErrorCode,
  InvalidInstantError,
  InvalidLocaleError,
  InvalidPatternError,
  ParseError,
  ValidationError,
} from '../src/errors'
import { utc } from './helpers/context'

const calendar = createCalendar({ timeZone: 'UTC' })
const london = createCalendar({ timeZone: 'Europe/London' })

// 2023-01-11 is a Wednesday
const wednesday = utc(2023, 1, 11, 15, 30, 45, 250)

// ============================================================================
// 1. CONSTRUCTION
// ============================================================================

describe('createCalendar', () => {
  it('defaults to en, Sunday weeks, week 1 holding Jan 1', () => {
    expect(calendar.locale).toBe('en')
    expect(calendar.weekStartsOn).toBe(0)
    expect(calendar.firstWeekContainsDate).toBe(1)
    expect(calendar.timeZone).toBe('UTC')
  })

  it('falls back to the host zone', () => {
    expect(createCalendar().timeZone).toBe(Intl.DateTimeFormat().resolvedOptions().timeZone)
  })

  it('rejects an unknown time zone', () => {
    expect(() => createCalendar({ timeZone: 'Mars/Olympus_Mons' })).toThrow(ValidationError)
    expect(() => createCalendar({ timeZone: 'Mars/Olympus_Mons' })).toThrow('Invalid timezone: Mars/Olympus_Mons')
  })

  it('rejects an unknown locale', () => {
    expect(() => createCalendar({ locale: 'xx' })).toThrow(InvalidLocaleError)
  })

  it('rejects weekStartsOn outside 0-6', () => {
    const options: CalendarOptions = JSON.parse('{"weekStartsOn": 7}')
    expect(() => createCalendar(options)).toThrow('weekStartsOn must be an integer from 0 to 6, got 7')
  })

  it('rejects firstWeekContainsDate other than 1 or 4', () => {
    const options: CalendarOptions = JSON.parse('{"firstWeekContainsDate": 2}')
    expect(() => createCalendar(options)).toThrow('firstWeekContainsDate must be 1 or 4, got 2')
  })
})

describe('isValidTimeZone', () => {
  it('accepts IANA names', () => {
    expect(isValidTimeZone('Europe/London')).toBe(true)
    expect(isValidTimeZone('UTC')).toBe(true)
  })

  it('rejects garbage', () => {
    expect(isValidTimeZone('not/a_zone')).toBe(false)
  })
})

describe('resolveLocale', () => {
  it('maps bare en to enUS', () => {
    const result = resolveLocale('en')
    expect(result.ok && result.value).toBe(enUS)
  })

  it('accepts dash and underscore region separators', () => {
    const dashed = resolveLocale('en-GB')
    const underscored = resolveLocale('en_GB')
    expect(dashed.ok && dashed.value).toBe(enGB)
    expect(underscored.ok && underscored.value).toBe(enGB)
  })

  it('resolves regional locales', () => {
    const result = resolveLocale('fr-CA')
    expect(result.ok && result.value).toBe(frCA)
  })

  it('falls back to the language when the region is unknown', () => {
    const result = resolveLocale('de-XX')
    expect(result.ok && result.value).toBe(de)
  })

  it('maps bare zh to zhCN', () => {
    const result = resolveLocale('zh')
    expect(result.ok && result.value).toBe(zhCN)
  })

  it('returns InvalidLocaleError for unknown languages', () => {
    const result = resolveLocale('qq')
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(InvalidLocaleError)
      expect(result.error.localeIdentifier).toBe('qq')
    }
  })
})

// ============================================================================
// 2. COMPONENT EXTRACTION
// ============================================================================

describe('components', () => {
  it('reads every unit in UTC', () => {
    expect(
      calendar.components(
        ['year', 'month', 'day', 'hour', 'minute', 'second', 'nanosecond', 'weekday', 'weekOfYear', 'yearForWeekOfYear'],
        wednesday
      )
    ).toEqual({
      year: 2023,
      month: 1,
      day: 11,
      hour: 15,
      minute: 30,
      second: 45,
      nanosecond: 250_000_000,
      weekday: 4,
      weekOfYear: 2,
      yearForWeekOfYear: 2023,
    })
  })

  it('returns only the requested units', () => {
    expect(calendar.components(['year'], wednesday)).toEqual({ year: 2023 })
  })

  it('reads wall-clock fields in the calendar zone', () => {
    const tokyo = createCalendar({ timeZone: 'Asia/Tokyo' })
    expect(tokyo.components(['day', 'hour'], utc(2023, 1, 11, 20))).toEqual({ day: 12, hour: 5 })
  })

  it('places the last days of December in the previous week-year', () => {
    // 2022-12-31 is a Saturday; week 1 of 2023 starts on Sunday 2023-01-01
    expect(calendar.components(['yearForWeekOfYear', 'weekOfYear'], utc(2022, 12, 31))).toEqual({
      yearForWeekOfYear: 2022,
      weekOfYear: 53,
    })
  })

  it('follows ISO week rules when configured', () => {
    const iso = createCalendar({ timeZone: 'UTC', weekStartsOn: 1, firstWeekContainsDate: 4 })
    expect(iso.components(['yearForWeekOfYear', 'weekOfYear'], utc(2023, 1, 1))).toEqual({
      yearForWeekOfYear: 2022,
      weekOfYear: 52,
    })
  })

  it('Sunday is weekday 1 and Saturday 7', () => {
    expect(calendar.components(['weekday'], utc(2023, 1, 1))).toEqual({ weekday: 1 })
    expect(calendar.components(['weekday'], utc(2023, 1, 7))).toEqual({ weekday: 7 })
  })
})

// ============================================================================
// 3. RECONSTRUCTION
// ============================================================================

describe('instant', () => {
  it('builds a date at midnight', () => {
    expect(calendar.instant({ year: 2024, month: 2, day: 29 })).toBe(utc(2024, 2, 29))
  })

  it('builds a full date-time', () => {
    expect(
      calendar.instant({ year: 2023, month: 1, day: 11, hour: 15, minute: 30, second: 45, nanosecond: 250_000_000 })
    ).toBe(wednesday)
  })

  it('defaults missing month and day to the period start', () => {
    expect(calendar.instant({ year: 2023 })).toBe(utc(2023, 1, 1))
    expect(calendar.instant({ year: 2023, month: 6 })).toBe(utc(2023, 6, 1))
  })

  it('rolls an out-of-range day into the next month', () => {
    expect(calendar.instant({ year: 2023, month: 2, day: 29 })).toBe(utc(2023, 3, 1))
  })

  it('truncates nanoseconds to milliseconds', () => {
    expect(calendar.instant({ year: 2023, month: 1, day: 1, nanosecond: 1_999_999 })).toBe(utc(2023, 1, 1, 0, 0, 0, 1))
  })

  it('rejects non-integer fields', () => {
    expect(calendar.instant({ year: 2023, month: 1, day: 1, hour: 1.5 })).toBeUndefined()
  })

  it('rejects NaN fields', () => {
    expect(calendar.instant({ year: NaN, month: 1, day: 1 })).toBeUndefined()
  })

  it('resolves a week number to its first day', () => {
    expect(calendar.instant({ yearForWeekOfYear: 2023, weekOfYear: 2 })).toBe(utc(2023, 1, 8))
  })

  it('resolves a week number plus weekday', () => {
    expect(calendar.instant({ yearForWeekOfYear: 2023, weekOfYear: 2, weekday: 4 })).toBe(utc(2023, 1, 11))
  })

  it('resolves a week that starts in the previous year', () => {
    expect(calendar.instant({ yearForWeekOfYear: 2022, weekOfYear: 53 })).toBe(utc(2022, 12, 25))
  })

  it('builds wall-clock time in the calendar zone', () => {
    // BST (UTC+1) in July
    expect(london.instant({ year: 2023, month: 7, day: 5 })).toBe(utc(2023, 7, 4, 23))
  })
})

// ============================================================================
// 4. ARITHMETIC
// ============================================================================

describe('addUnit', () => {
  it('adds days', () => {
    expect(calendar.addUnit('day', 1, utc(2023, 12, 31, 8))).toBe(utc(2024, 1, 1, 8))
  })

  it('treats weekday as a day count', () => {
    expect(calendar.addUnit('weekday', 7, wednesday)).toBe(utc(2023, 1, 18, 15, 30, 45, 250))
  })

  it('clamps month addition to the shorter month', () => {
    expect(calendar.addUnit('month', 1, utc(2023, 1, 31))).toBe(utc(2023, 2, 28))
  })

  it('subtracts with a negative amount', () => {
    expect(calendar.addUnit('day', -1, utc(2023, 3, 1))).toBe(utc(2023, 2, 28))
  })

  it('adds weeks and years', () => {
    expect(calendar.addUnit('weekOfYear', 2, utc(2023, 1, 1))).toBe(utc(2023, 1, 15))
    expect(calendar.addUnit('year', 1, utc(2024, 2, 29))).toBe(utc(2025, 2, 28))
  })

  it('adds time units exactly', () => {
    expect(calendar.addUnit('hour', 25, utc(2023, 1, 1))).toBe(utc(2023, 1, 2, 1))
    expect(calendar.addUnit('minute', 90, utc(2023, 1, 1))).toBe(utc(2023, 1, 1, 1, 30))
    expect(calendar.addUnit('second', 61, utc(2023, 1, 1))).toBe(utc(2023, 1, 1, 0, 1, 1))
    expect(calendar.addUnit('nanosecond', 2_000_000, utc(2023, 1, 1))).toBe(utc(2023, 1, 1, 0, 0, 0, 2))
  })

  it('keeps the wall-clock time across a DST change', () => {
    // Clocks go forward in London on 2023-03-26
    expect(london.addUnit('day', 1, utc(2023, 3, 25, 12))).toBe(utc(2023, 3, 26, 11))
  })

  it('rejects fractional amounts', () => {
    expect(calendar.addUnit('day', 0.5, wednesday)).toBeUndefined()
  })

  it('rejects an invalid instant', () => {
    expect(calendar.addUnit('day', 1, makeInstant(NaN))).toBeUndefined()
  })
})

describe('startOfDay', () => {
  it('drops the time of day', () => {
    expect(calendar.startOfDay(wednesday)).toBe(utc(2023, 1, 11))
  })

  it('uses the local day in the calendar zone', () => {
    // 23:30 UTC is 00:30 the next day in BST
    expect(london.startOfDay(utc(2023, 7, 4, 23, 30))).toBe(utc(2023, 7, 4, 23))
  })
})

// ============================================================================
// 5. FORMATTING
// ============================================================================

describe('format', () => {
  function formatOk(pattern: string, localeIdentifier?: string): string | undefined {
    const result = calendar.format(wednesday, pattern, localeIdentifier)
    return result.ok ? result.value : undefined
  }

  it('renders day/month/year', () => {
    expect(formatOk('dd/MM/yyyy')).toBe('11/01/2023')
  })

  it('renders 24-hour time', () => {
    expect(formatOk('HH:mm')).toBe('15:30')
  })

  it('renders stand-alone month names', () => {
    expect(formatOk('LLLL')).toBe('January')
  })

  it('renders full and short weekday names', () => {
    expect(formatOk('EEEE')).toBe('Wednesday')
    expect(formatOk('E')).toBe('Wed')
  })

  it('renders in another locale', () => {
    expect(formatOk('EEEE', 'fr')).toBe('mercredi')
  })

  it('renders in the calendar zone', () => {
    const result = london.format(utc(2023, 7, 4, 23, 30), 'dd/MM/yyyy HH:mm')
    expect(result.ok && result.value).toBe('05/07/2023 00:30')
  })

  it('returns InvalidPatternError for unknown tokens', () => {
    const result = calendar.format(wednesday, 'jj')
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(InvalidPatternError)
      expect(result.error.code).toBe(DaywiseErrorCode.INVALID_PATTERN)
    }
  })

  it('returns InvalidLocaleError for unknown locales', () => {
    const result = calendar.format(wednesday, 'EEEE', 'qq')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error).toBeInstanceOf(InvalidLocaleError)
  })

  it('returns InvalidInstantError for NaN', () => {
    const result = calendar.format(makeInstant(NaN), 'dd/MM/yyyy')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error).toBeInstanceOf(InvalidInstantError)
  })
})

// ============================================================================
// 6. PARSING
// ============================================================================

describe('parse', () => {
  it('parses day/month/year to midnight', () => {
    const result = calendar.parse('11/01/2023', 'dd/MM/yyyy')
    expect(result.ok && result.value).toBe(utc(2023, 1, 11))
  })

  it('parses date and time', () => {
    const result = calendar.parse('31/12/2023 23:59:59', 'dd/MM/yyyy HH:mm:ss')
    expect(result.ok && result.value).toBe(utc(2023, 12, 31, 23, 59, 59))
  })

  it('takes missing fields from 2000-01-01', () => {
    const result = calendar.parse('13:14', 'HH:mm')
    expect(result.ok && result.value).toBe(utc(2000, 1, 1, 13, 14))
  })

  it('rejects text that does not match', () => {
    const result = calendar.parse('not a date', 'dd/MM/yyyy')
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ParseError)
      expect(result.error.message).toBe("'not a date' does not match pattern 'dd/MM/yyyy'")
    }
  })

  it('rejects impossible dates', () => {
    expect(calendar.parse('31/02/2023', 'dd/MM/yyyy').ok).toBe(false)
  })
})
