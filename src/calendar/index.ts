/**
 * calendar — Gregorian → Hijri conversion through ICU.
 *
 * Node ships full ICU data, which carries the Umm al-Qura table and the
 * arithmetic (tabular) Islamic civil calendar. Both are read through
 * Intl.DateTimeFormat#formatToParts in UTC, so a conversion never depends
 * on the host time zone.
 *
 * A manual adjustment of n days converts the date n days later: +1 means the
 * local month started one day before the table says (crescent seen earlier).
 */

import type { HijriDate, Weekday } from '../types.js'
import { HIJRI_MONTH_NAMES } from '../types.js'
import type { Result } from '../errors/index.js'
import { fail, ok } from '../errors/index.js'
import { addDays } from '../time/index.js'

// ─── Interface ────────────────────────────────────────────────────────────────

export interface HijriCalendar {
  readonly name: string
  /**
   * Hijri date of the UTC calendar day of `date`, shifted by `adjustment` days.
   */
  toHijri(date: Date, adjustment: number): Result<HijriDate>
}

/** Gregorian years covered by the Umm al-Qura table */
export const UMM_AL_QURA_MIN_YEAR = 1938
export const UMM_AL_QURA_MAX_YEAR = 2076

// ─── ICU-backed calendars ─────────────────────────────────────────────────────

interface YearRange {
  min: number
  max: number
}

class IntlHijriCalendar implements HijriCalendar {
  private readonly formatter: Intl.DateTimeFormat

  constructor(
    readonly name: string,
    calendarId: string,
    private readonly range?: YearRange,
  ) {
    this.formatter = new Intl.DateTimeFormat(`en-u-ca-${calendarId}`, {
      timeZone: 'UTC',
      year: 'numeric',
      month: 'numeric',
      day: 'numeric',
    })
  }

  toHijri(date: Date, adjustment: number): Result<HijriDate> {
    const shifted = addDays(date, adjustment)
    const year = shifted.getUTCFullYear()
    if (Number.isNaN(year)) {
      return fail('CalendarConversionFailure', 'Invalid date')
    }
    if (this.range && (year < this.range.min || year > this.range.max)) {
      return fail(
        'CalendarConversionFailure',
        `${shifted.toISOString().slice(0, 10)} is outside the ${this.name} range (${this.range.min}-${this.range.max})`,
      )
    }

    const parts = this.formatter.formatToParts(shifted)
    const field = (type: Intl.DateTimeFormatPartTypes): number =>
      parseInt(parts.find(part => part.type === type)?.value ?? '', 10)

    const hijri = { year: field('year'), month: field('month'), day: field('day') }
    if (![hijri.year, hijri.month, hijri.day].every(Number.isInteger)) {
      return fail('CalendarConversionFailure', `${this.name} conversion failed for ${shifted.toISOString()}`)
    }
    return ok(hijri)
  }
}

/** Umm al-Qura (Saudi official) calendar, 1938–2076 */
export class UmmAlQuraCalendar extends IntlHijriCalendar {
  constructor() {
    super('Umm al-Qura', 'islamic-umalqura', { min: UMM_AL_QURA_MIN_YEAR, max: UMM_AL_QURA_MAX_YEAR })
  }
}

/**
 * Tabular Islamic civil calendar (30-year cycle). Unbounded, but may differ
 * from observed months by a day or two.
 */
export class CivilHijriCalendar extends IntlHijriCalendar {
  constructor() {
    super('Islamic civil', 'islamic-civil')
  }
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

const WEEKDAYS: readonly Weekday[] = [0, 1, 2, 3, 4, 5, 6]

/** Day of week of the UTC calendar day */
export function weekdayOf(date: Date): Weekday {
  return WEEKDAYS[date.getUTCDay()]
}

/** "Ramadhan"; "Unknown" outside 1..12 */
export function hijriMonthName(month: number): string {
  return HIJRI_MONTH_NAMES[month - 1] ?? 'Unknown'
}

/** "15 Ramadhan 1445 AH" */
export function formatHijriDate(hijri: HijriDate): string {
  return `${hijri.day} ${hijriMonthName(hijri.month)} ${hijri.year} AH`
}
