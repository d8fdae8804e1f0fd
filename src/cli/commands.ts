/**
 * CLI command implementations.
 *
 * Each command takes its positional arguments and the current instant and
 * returns the lines to print, or the error to report. Printing and exit
 * codes belong to the entry point.
 */

import type { GeoCoordinate } from '../types.js'
import { VISIBILITY_CRITERIA, WEEKDAY_NAMES, STATUS_LABELS } from '../types.js'
import type { Result } from '../errors/index.js'
import { fail, ok } from '../errors/index.js'
import { PrayerPresetNameSchema, VisibilityCriteriaNameSchema, parseWith } from '../schemas/index.js'
import { analyzeDate, calculatePrayerTimes, checkHilal, daudSchedule, prayerParams, ruleContext } from '../api/index.js'
import { describeVisibility } from '../visibility/index.js'
import { FASTING_TYPE_LABELS } from '../fiqh/index.js'
import { formatHijriDate, weekdayOf } from '../calendar/index.js'
import { startOfUTCDay } from '../time/index.js'

export const USAGE = `falak — Hilal visibility, prayer times and fasting rulings

Commands:
  prayer <lat> <lon> [date] [preset]    Prayer times (preset: MABIMS, MWL, EGYPTIAN, ISNA, UMM_AL_QURA)
  fasting [date] [adjustment]           Fasting ruling for a day (adjustment: Hijri days, default 0)
  hilal <lat> <lon> [date] [criteria]   Crescent visibility at sunset (criteria: MABIMS, MABIMS_LEGACY, TURKEY_2016)
  daud [date] [count]                   Next alternate-day fasting dates (count default 10)

Dates are YYYY-MM-DD in UTC, default today. Times are printed in UTC.

Examples:
  falak prayer -6.2088 106.8456 2024-03-15
  falak prayer 21.4225 39.8262 2024-03-15 UMM_AL_QURA   # Makkah
  falak fasting 2024-03-11
  falak hilal -6.2088 106.8456 2024-03-11`

const DEFAULT_DAUD_COUNT = 10

// ─── Argument parsing ─────────────────────────────────────────────────────────

/** "YYYY-MM-DD" to midnight UTC; the UTC day of `now` when omitted */
export function parseDate(arg: string | undefined, now: Date): Result<Date> {
  if (arg === undefined) return ok(startOfUTCDay(now))
  const date = new Date(`${arg}T00:00:00Z`)
  if (isNaN(date.getTime())) {
    return fail('InvalidConfig', `Invalid date: ${arg}. Use YYYY-MM-DD format.`)
  }
  return ok(date)
}

function parseObserver(args: readonly string[], usage: string): Result<GeoCoordinate> {
  const latitude = parseFloat(args[0] ?? '')
  const longitude = parseFloat(args[1] ?? '')
  if (isNaN(latitude) || isNaN(longitude)) return fail('InvalidConfig', `Usage: ${usage}`)
  return ok({ latitude, longitude })
}

/** Short UTC string: "2024-03-15 05:03 UTC" */
export function fmtDate(d: Date): string {
  return d.toISOString().slice(0, 16).replace('T', ' ') + ' UTC'
}

function fmtPlace(observer: GeoCoordinate): string {
  return `${observer.latitude}°N ${observer.longitude}°E`
}

// ─── Commands ─────────────────────────────────────────────────────────────────

export function prayerCommand(args: readonly string[], now: Date): Result<string[]> {
  const observer = parseObserver(args, 'falak prayer <lat> <lon> [YYYY-MM-DD] [preset]')
  if (!observer.ok) return observer
  const date = parseDate(args[2], now)
  if (!date.ok) return date
  const preset = parseWith(PrayerPresetNameSchema, args[3] ?? 'MABIMS', 'InvalidPrayerParams')
  if (!preset.ok) return preset

  const times = calculatePrayerTimes(date.value, observer.value, prayerParams(preset.value))
  if (!times.ok) return times

  const t = times.value
  return ok([
    `Prayer times for ${fmtPlace(observer.value)} on ${date.value.toISOString().slice(0, 10)} (${preset.value}):`,
    `  Imsak:    ${fmtDate(t.imsak)}`,
    `  Fajr:     ${fmtDate(t.fajr)}`,
    `  Sunrise:  ${fmtDate(t.sunrise)}`,
    `  Dhuhr:    ${fmtDate(t.dhuhr)}`,
    `  Asr:      ${fmtDate(t.asr)}`,
    `  Maghrib:  ${fmtDate(t.maghrib)}`,
    `  Isha:     ${fmtDate(t.isha)}`,
  ])
}

export function fastingCommand(args: readonly string[], now: Date): Result<string[]> {
  const date = parseDate(args[0], now)
  if (!date.ok) return date
  const context = ruleContext({ adjustment: args[1] === undefined ? 0 : Number(args[1]) })
  if (!context.ok) return context

  const analysis = analyzeDate(date.value, context.value)
  if (!analysis.ok) return analysis

  const a = analysis.value
  const reasons = [
    ...a.reasons.map(type => FASTING_TYPE_LABELS[type]),
    ...a.customReasons.map(reason => reason.name),
  ]
  return ok([
    `Fasting ruling for ${date.value.toISOString().slice(0, 10)}:`,
    `  Hijri:    ${formatHijriDate(a.hijri)}`,
    `  Weekday:  ${WEEKDAY_NAMES[a.weekday]}`,
    `  Status:   ${STATUS_LABELS[a.primaryStatus]}`,
    `  Reasons:  ${reasons.length > 0 ? reasons.join(', ') : 'none'}`,
    '',
    a.explanation,
  ])
}

export function hilalCommand(args: readonly string[], now: Date): Result<string[]> {
  const observer = parseObserver(args, 'falak hilal <lat> <lon> [YYYY-MM-DD] [criteria]')
  if (!observer.ok) return observer
  const date = parseDate(args[2], now)
  if (!date.ok) return date
  const name = parseWith(VisibilityCriteriaNameSchema, args[3] ?? 'MABIMS', 'InvalidCriteria')
  if (!name.ok) return name

  const report = checkHilal(date.value, observer.value, VISIBILITY_CRITERIA[name.value])
  if (!report.ok) return report

  const r = report.value
  return ok([
    `Hilal visibility for ${fmtPlace(observer.value)} on ${date.value.toISOString().slice(0, 10)} (${name.value}):`,
    `  Sunset:      ${fmtDate(r.sunset)}`,
    `  Moon alt:    ${r.moonAltitude.toFixed(2)}°`,
    `  Moon az:     ${r.moonAzimuth.toFixed(1)}°`,
    `  Sun alt:     ${r.sunAltitude.toFixed(2)}°`,
    `  Elongation:  ${r.elongation.toFixed(2)}°`,
    `  Criteria:    ${r.meetsCriteria ? 'met' : 'not met'}`,
    '',
    describeVisibility(r),
  ])
}

export function daudCommand(args: readonly string[], now: Date): Result<string[]> {
  const date = parseDate(args[0], now)
  if (!date.ok) return date
  const count = args[1] === undefined ? DEFAULT_DAUD_COUNT : Number(args[1])
  if (!Number.isInteger(count) || count < 1) {
    return fail('InvalidConfig', `Invalid count: ${args[1]}. Use a positive whole number.`)
  }

  const lines = [`Daud fasting days from ${date.value.toISOString().slice(0, 10)}:`]
  let found = 0
  for (const day of daudSchedule(date.value)) {
    if (!day.ok) return day
    lines.push(`  ${day.value.toISOString().slice(0, 10)}  ${WEEKDAY_NAMES[weekdayOf(day.value)]}`)
    if (++found === count) break
  }
  return ok(lines)
}
