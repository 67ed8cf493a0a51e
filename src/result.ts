/**
 * Result Type
 *
 * Success-or-failure value for operations whose failure is part of the
 * contract rather than an exceptional condition.
 */

export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E }

export function Ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function Err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}

/** Returns the success value, or `undefined` for a failure */
export function unwrapOr<T, E>(result: Result<T, E>): T | undefined
export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T
export function unwrapOr<T, E>(result: Result<T, E>, fallback?: T): T | undefined {
  return result.ok ? result.value : fallback
}
