/**
 * Named second-based durations.
 *
 * A "year" here is 52 weeks (364 days), not a calendar year. Callers rely on
 * the exact value, so it stays as defined.
 */

import { makeDuration, type Duration } from './core'

export const minuteInSeconds: Duration = makeDuration(60)
export const hourInSeconds: Duration = makeDuration(3600)
export const dayInSeconds: Duration = makeDuration(hourInSeconds * 24)
export const weekInSeconds: Duration = makeDuration(dayInSeconds * 7)
export const yearInSeconds: Duration = makeDuration(weekInSeconds * 52)
