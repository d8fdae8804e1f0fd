/**
 * errors — Typed failures and the Result value returned by fallible operations.
 *
 * Only the layers that can genuinely fail return a Result: input validation,
 * the sun-altitude solver, and anything that needs a Hijri conversion.
 * Ephemeris evaluation, frame transforms and corrections are total.
 */

export type FalakErrorKind =
  | 'InvalidCoordinate'
  | 'InvalidCriteria'
  | 'InvalidPrayerParams'
  | 'InvalidConfig'
  | 'CalendarConversionFailure'
  | 'UnsolvablePrayerAngle'

export class FalakError extends Error {
  readonly kind: FalakErrorKind

  constructor(kind: FalakErrorKind, message: string) {
    super(message)
    this.name = 'FalakError'
    this.kind = kind
  }
}

export type Result<T, E = FalakError> =
  | { ok: true; value: T }
  | { ok: false; error: E }

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function err<E = FalakError>(error: E): Result<never, E> {
  return { ok: false, error }
}

export function fail(kind: FalakErrorKind, message: string): Result<never> {
  return err(new FalakError(kind, message))
}

/** Return the value or throw the error. For callers that prefer exceptions. */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw result.error
  return result.value
}
