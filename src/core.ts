/**
 * Core Branded Types
 *
 * Instant and Duration are plain numbers at runtime, branded so the two
 * (milliseconds vs. seconds) cannot be mixed up at compile time.
 */

declare const __instant: unique symbol
declare const __duration: unique symbol

/** A point in time: milliseconds since the Unix epoch */
export type Instant = number & { readonly [__instant]: true }

/** A signed interval in seconds */
export type Duration = number & { readonly [__duration]: true }

// ============================================================================
// Construction
// ============================================================================

export function makeInstant(epochMs: number): Instant {
  return epochMs as Instant
}

export function makeDuration(seconds: number): Duration {
  return seconds as Duration
}

export function instantFromDate(date: Date): Instant {
  return makeInstant(date.getTime())
}

export function toDate(instant: Instant): Date {
  return new Date(instant)
}

export function epochMillisOf(instant: Instant): number {
  return instant
}

// ============================================================================
// Arithmetic
// ============================================================================

export function addSeconds(instant: Instant, seconds: Duration): Instant {
  return makeInstant(instant + seconds * 1000)
}

/** Signed seconds from `since` to `instant` */
export function durationBetween(instant: Instant, since: Instant): Duration {
  return makeDuration((instant - since) / 1000)
}
