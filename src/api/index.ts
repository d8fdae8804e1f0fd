/**
 * api — User-facing functions.
 *
 * This is the only module users need to import directly.
 * Everything else in src/ is internal plumbing.
 *
 * Two independent halves meet here:
 *
 * 1. Astronomy: calculateVisibility(), calculatePrayerTimes(), findSunset()
 *    and checkHilal() take an observer and an instant or day.
 *
 * 2. Fasting: analyzeDate(), analyzeInstant(), daudSchedule() and
 *    upcomingFasts() convert a Gregorian day to Hijri through the context's
 *    calendar and resolve it with the rule engine. analyzeInstant() with an observer consults the
 *    astronomy half once, to learn whether sunset has passed.
 *
 * Every fallible call returns a Result; nothing here throws on bad input.
 */

import type {
  CustomFastingRule,
  DaudStrategy,
  FastingAnalysis,
  FastingStatus,
  GeoCoordinate,
  VisibilityCriteria,
  VisibilityReport,
} from '../types.js'
import { VISIBILITY_CRITERIA } from '../types.js'
import type { Result } from '../errors/index.js'
import { fail, ok } from '../errors/index.js'
import { RuleContextOptionsSchema, parseWith } from '../schemas/index.js'
import type { HijriCalendar } from '../calendar/index.js'
import {
  CivilHijriCalendar,
  UMM_AL_QURA_MAX_YEAR,
  UMM_AL_QURA_MIN_YEAR,
  UmmAlQuraCalendar,
  weekdayOf,
} from '../calendar/index.js'
import { resolve } from '../fiqh/index.js'
import { findSunset as solveSunset } from '../events/index.js'
import { validateCoordinate } from '../observer/index.js'
import { calculateVisibility } from '../visibility/index.js'
import { MS_PER_DAY, addDays, startOfUTCDay } from '../time/index.js'

export { calculateVisibility } from '../visibility/index.js'
export { calculatePrayerTimes, prayerParams, PRAYER_PRESETS } from '../prayer/index.js'

// ─── Rule context ──────────────────────────────────────────────────────────────

/** Hard bounds on the Hijri day adjustment */
export const MAX_ADJUSTMENT = 30
/** Bounds enforced when `strictAdjustment` is set */
export const MAX_STRICT_ADJUSTMENT = 2

export interface RuleContext {
  /** Days added before Hijri conversion, in [-30, 30] */
  adjustment: number
  daudStrategy: DaudStrategy
  /** Reject days outside the calendar's table instead of falling back */
  strict: boolean
  customRules: readonly CustomFastingRule[]
  calendar: HijriCalendar
  /** Used for days the primary calendar cannot convert, unless strict */
  fallbackCalendar: HijriCalendar
}

export interface RuleContextOptions {
  /** Hijri day adjustment; clamped to [-30, 30] (default 0) */
  adjustment?: number
  /** Fail with InvalidConfig when |adjustment| > 2 (default false) */
  strictAdjustment?: boolean
  daudStrategy?: DaudStrategy
  strict?: boolean
  customRules?: readonly CustomFastingRule[]
  calendar?: HijriCalendar
}

const ummAlQura = new UmmAlQuraCalendar()
const civil = new CivilHijriCalendar()

/**
 * Build a validated RuleContext.
 *
 * @example
 * ```ts
 * const ctx = ruleContext({ adjustment: -1, daudStrategy: 'postpone' })
 * if (ctx.ok) analyzeDate(new Date(), ctx.value)
 * ```
 */
export function ruleContext(options: RuleContextOptions = {}): Result<RuleContext> {
  const parsed = parseWith(
    RuleContextOptionsSchema,
    {
      adjustment: options.adjustment,
      strictAdjustment: options.strictAdjustment,
      daudStrategy: options.daudStrategy,
      strict: options.strict,
    },
    'InvalidConfig',
  )
  if (!parsed.ok) return parsed

  const adjustment = parsed.value.adjustment ?? 0
  if (parsed.value.strictAdjustment && Math.abs(adjustment) > MAX_STRICT_ADJUSTMENT) {
    return fail(
      'InvalidConfig',
      `Adjustment ${adjustment} outside strict bounds [-${MAX_STRICT_ADJUSTMENT}, ${MAX_STRICT_ADJUSTMENT}]`,
    )
  }

  return ok({
    adjustment: Math.min(MAX_ADJUSTMENT, Math.max(-MAX_ADJUSTMENT, adjustment)),
    daudStrategy: parsed.value.daudStrategy ?? 'skip',
    strict: parsed.value.strict ?? false,
    customRules: options.customRules ?? [],
    calendar: options.calendar ?? ummAlQura,
    fallbackCalendar: civil,
  })
}

export const DEFAULT_RULE_CONTEXT: Readonly<RuleContext> = Object.freeze({
  adjustment: 0,
  daudStrategy: 'skip',
  strict: false,
  customRules: [],
  calendar: ummAlQura,
  fallbackCalendar: civil,
})

// ─── Fasting analysis ──────────────────────────────────────────────────────────

/**
 * Fasting status of the UTC calendar day of `date`.
 *
 * Fails with CalendarConversionFailure when the day cannot be converted: in
 * strict mode for any day outside 1938–2076, otherwise only when the fallback
 * calendar fails as well.
 */
export function analyzeDate(date: Date, context: RuleContext = DEFAULT_RULE_CONTEXT): Result<FastingAnalysis> {
  const day = startOfUTCDay(date)
  const year = day.getUTCFullYear()

  if (context.strict && (year < UMM_AL_QURA_MIN_YEAR || year > UMM_AL_QURA_MAX_YEAR)) {
    return fail(
      'CalendarConversionFailure',
      `Date ${day.toISOString().slice(0, 10)} outside supported Hijri range (${UMM_AL_QURA_MIN_YEAR}-${UMM_AL_QURA_MAX_YEAR})`,
    )
  }

  let hijri = context.calendar.toHijri(day, context.adjustment)
  if (!hijri.ok && !context.strict) {
    hijri = context.fallbackCalendar.toHijri(day, context.adjustment)
  }
  if (!hijri.ok) return hijri

  return ok(resolve(hijri.value, weekdayOf(day), context.adjustment !== 0, context.customRules))
}

/**
 * Civil day an instant falls on at the observer's longitude (mean solar time).
 */
function localDay(instant: Date, longitude: number): Date {
  return startOfUTCDay(new Date(instant.getTime() + (longitude / 360) * MS_PER_DAY))
}

/**
 * Fasting status of the Islamic day `instant` falls in.
 *
 * Islamic days begin at sunset: with an observer, an instant after that
 * evening's sunset belongs to the next day. Without an observer, or where
 * the Sun does not set, the UTC calendar day is used.
 */
export function analyzeInstant(
  instant: Date,
  context: RuleContext = DEFAULT_RULE_CONTEXT,
  observer?: GeoCoordinate,
): Result<FastingAnalysis> {
  if (!observer) return analyzeDate(instant, context)

  const valid = validateCoordinate(observer)
  if (!valid.ok) return valid

  const day = localDay(instant, observer.longitude)
  const sunset = solveSunset(day, observer)
  const effective = sunset.ok && instant.getTime() > sunset.value.getTime() ? addDays(day, 1) : day
  return analyzeDate(effective, context)
}

// ─── Daud schedule ─────────────────────────────────────────────────────────────

export interface DaudScheduleOptions {
  /** Last day considered, inclusive. Omit for an endless schedule. */
  end?: Date
  context?: RuleContext
}

/**
 * Alternate-day (Daud) fasting days from `start`.
 *
 * Turns alternate fast/rest day by day. A Haram day is never yielded:
 *   skip:     the day still uses up its turn
 *   postpone: the turn moves to the next day
 * A day whose Hijri conversion fails is yielded as an error and uses up its turn.
 *
 * The result is lazy and restartable: each iteration starts again from `start`.
 */
export function daudSchedule(start: Date, options: DaudScheduleOptions = {}): Iterable<Result<Date>> {
  const context = options.context ?? DEFAULT_RULE_CONTEXT
  const first = startOfUTCDay(start)
  const last = options.end ? startOfUTCDay(options.end) : null

  return {
    *[Symbol.iterator]() {
      let shouldFast = true
      for (let day = first; last === null || day.getTime() <= last.getTime(); day = addDays(day, 1)) {
        const analysis = analyzeDate(day, context)

        if (!analysis.ok) {
          yield analysis
          shouldFast = !shouldFast
          continue
        }

        if (analysis.value.primaryStatus === 'Haram') {
          if (context.daudStrategy === 'skip') shouldFast = !shouldFast
          continue
        }

        if (shouldFast) yield ok(day)
        shouldFast = !shouldFast
      }
    },
  }
}

// ─── Upcoming fasts ────────────────────────────────────────────────────────────

/** Statuses for which fasting is obligatory or recommended */
export const RECOMMENDED_STATUSES: readonly FastingStatus[] = ['Wajib', 'SunnahMuakkadah', 'Sunnah']

export interface UpcomingFastsOptions {
  /** Statuses to keep (default: Wajib, SunnahMuakkadah and Sunnah) */
  status?: FastingStatus | readonly FastingStatus[]
  /** Last day considered, inclusive. Omit for an endless sequence. */
  end?: Date
  context?: RuleContext
}

/** A day's analysis together with the Gregorian day it belongs to */
export interface UpcomingFast extends FastingAnalysis {
  date: Date
}

/**
 * Days from `start` whose primary status is one of `options.status`.
 *
 * Lazy and restartable like daudSchedule. Conversion failures are yielded as
 * errors. Without `end` the sequence never finishes on its own, so a status
 * that never occurs must be paired with an end date.
 *
 * @example
 * ```ts
 * for (const fast of upcomingFasts(new Date(), { status: 'Sunnah' })) { ... }
 * ```
 */
export function upcomingFasts(start: Date, options: UpcomingFastsOptions = {}): Iterable<Result<UpcomingFast>> {
  const context = options.context ?? DEFAULT_RULE_CONTEXT
  const wanted: ReadonlySet<FastingStatus> = new Set(
    typeof options.status === 'string' ? [options.status] : options.status ?? RECOMMENDED_STATUSES,
  )
  const first = startOfUTCDay(start)
  const last = options.end ? startOfUTCDay(options.end) : null

  return {
    *[Symbol.iterator]() {
      for (let day = first; last === null || day.getTime() <= last.getTime(); day = addDays(day, 1)) {
        const analysis = analyzeDate(day, context)
        if (!analysis.ok) {
          yield analysis
          continue
        }
        if (wanted.has(analysis.value.primaryStatus)) {
          yield ok(Object.freeze({ ...analysis.value, date: day }))
        }
      }
    },
  }
}

// ─── Astronomy ─────────────────────────────────────────────────────────────────

/**
 * Sunset on the UTC day of `date` at the observer's visible horizon.
 */
export function findSunset(date: Date, observer: GeoCoordinate): Result<Date> {
  const valid = validateCoordinate(observer)
  if (!valid.ok) return valid
  return solveSunset(date, observer)
}

/**
 * Crescent visibility at sunset on the UTC day of `date`.
 *
 * @param criteria - Defaults to MABIMS
 */
export function checkHilal(
  date: Date,
  observer: GeoCoordinate,
  criteria: VisibilityCriteria = VISIBILITY_CRITERIA.MABIMS,
): Result<VisibilityReport> {
  const sunset = findSunset(date, observer)
  if (!sunset.ok) return sunset
  return calculateVisibility(sunset.value, observer, criteria)
}
