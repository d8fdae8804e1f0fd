/**
 * prayer — Daily prayer boundaries from sun-altitude crossings.
 *
 *   imsak    fajr − imsakOffset (after fajr is rounded), rounded again
 *   fajr     Sun at fajrAngle before sunrise
 *   sunrise  Sun at −0.8333° − dip, morning
 *   dhuhr    solar transit
 *   asr      shadow = factor × object + noon shadow: h = acot(factor + tan|φ − δ|)
 *   maghrib  Sun at −0.8333° − dip, evening
 *   isha     Sun at ishaAngle after sunset, or maghrib + ishaInterval minutes
 *
 * Ihtiyat (safety margin) moves the boundaries that open a worship window
 * later and the ones that close the night earlier: fajr and sunrise shift
 * earlier, the others shift later. Each value is then rounded half-up to
 * roundingSeconds.
 *
 * `date` selects the UTC calendar day; the morning boundaries of observers far
 * east of Greenwich fall on the previous UTC date.
 *
 * References:
 *   Kementerian Agama RI, Pedoman Hisab Waktu Salat
 *   Muslim World League / ISNA / Egyptian General Authority of Survey conventions
 */

import type { GeoCoordinate, PrayerName, PrayerParams, PrayerPresetName, PrayerTimes } from '../types.js'
import type { Result } from '../errors/index.js'
import { fail, ok } from '../errors/index.js'
import { PrayerParamsSchema, parseWith } from '../schemas/index.js'
import { RAD2DEG, tanDeg } from '../math/index.js'
import { SUN_ALTITUDE_THRESHOLD, solarTransit, solveSunAltitude, sunStateAt } from '../events/index.js'
import { dipAdjustedThreshold, validateCoordinate } from '../observer/index.js'

// ─── Presets ──────────────────────────────────────────────────────────────────

const MS_PER_MINUTE = 60000

export const PRAYER_PRESETS: Readonly<Record<PrayerPresetName, Readonly<PrayerParams>>> = {
  MABIMS: {
    fajrAngle: -20,
    ishaAngle: -18,
    imsakOffset: 10,
    ihtiyat: 2,
    roundingSeconds: 60,
    asrShadowFactor: 1,
    preset: 'MABIMS',
  },
  MWL: {
    fajrAngle: -18,
    ishaAngle: -17,
    imsakOffset: 10,
    ihtiyat: 0,
    roundingSeconds: 60,
    asrShadowFactor: 1,
    preset: 'MWL',
  },
  EGYPTIAN: {
    fajrAngle: -19.5,
    ishaAngle: -17.5,
    imsakOffset: 10,
    ihtiyat: 0,
    roundingSeconds: 60,
    asrShadowFactor: 1,
    preset: 'EGYPTIAN',
  },
  ISNA: {
    fajrAngle: -15,
    ishaAngle: -15,
    imsakOffset: 10,
    ihtiyat: 0,
    roundingSeconds: 60,
    asrShadowFactor: 1,
    preset: 'ISNA',
  },
  UMM_AL_QURA: {
    fajrAngle: -18.5,
    ishaInterval: 90,
    imsakOffset: 10,
    ihtiyat: 0,
    roundingSeconds: 60,
    asrShadowFactor: 1,
    preset: 'UMM_AL_QURA',
  },
}

/**
 * A preset with selected fields replaced, e.g.
 * `prayerParams('MABIMS', { asrShadowFactor: 2 })`.
 */
export function prayerParams(preset: PrayerPresetName, overrides: Partial<PrayerParams> = {}): PrayerParams {
  return { ...PRAYER_PRESETS[preset], ...overrides }
}

export function validatePrayerParams(params: PrayerParams): Result<PrayerParams> {
  return parseWith(PrayerParamsSchema, params, 'InvalidPrayerParams')
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

/**
 * Sun altitude at the start of Asr, degrees.
 *
 * @param factor - 1 (shadow equals object) or 2 (twice the object)
 * @param declination - Sun declination at transit
 */
export function asrAltitude(factor: number, latitude: number, declination: number): number {
  return Math.atan(1 / (factor + tanDeg(Math.abs(latitude - declination)))) * RAD2DEG
}

/** Round half-up to a multiple of `seconds` */
export function roundToGranularity(instant: Date, seconds: number): Date {
  const g = seconds * 1000
  return new Date(Math.floor(instant.getTime() / g + 0.5) * g)
}

/** Boundaries moved earlier by ihtiyat; every other one moves later */
const EARLIER_BY_IHTIYAT: ReadonlySet<PrayerName> = new Set<PrayerName>(['fajr', 'sunrise'])

// ─── Calculation ──────────────────────────────────────────────────────────────

type RawTimes = Record<Exclude<PrayerName, 'imsak'>, Date>

function solveRaw(date: Date, observer: GeoCoordinate, params: PrayerParams): Result<RawTimes> {
  const horizon = dipAdjustedThreshold(SUN_ALTITUDE_THRESHOLD, observer)

  const fajr = solveSunAltitude(date, observer, params.fajrAngle, 'dawn')
  if (!fajr.ok) return fajr
  const sunrise = solveSunAltitude(date, observer, horizon, 'dawn')
  if (!sunrise.ok) return sunrise

  const dhuhr = solarTransit(date, observer)
  const { declination } = sunStateAt(dhuhr, observer.longitude).equatorial
  const asr = solveSunAltitude(
    date,
    observer,
    asrAltitude(params.asrShadowFactor, observer.latitude, declination),
    'dusk',
  )
  if (!asr.ok) return asr

  const maghrib = solveSunAltitude(date, observer, horizon, 'dusk')
  if (!maghrib.ok) return maghrib

  let isha: Date
  if (params.ishaInterval !== undefined) {
    isha = new Date(maghrib.value.getTime() + params.ishaInterval * MS_PER_MINUTE)
  } else if (params.ishaAngle !== undefined) {
    const solved = solveSunAltitude(date, observer, params.ishaAngle, 'dusk')
    if (!solved.ok) return solved
    isha = solved.value
  } else {
    return fail('InvalidPrayerParams', 'either ishaAngle or ishaInterval is required')
  }

  return ok({
    fajr: fajr.value,
    sunrise: sunrise.value,
    dhuhr,
    asr: asr.value,
    maghrib: maghrib.value,
    isha,
  })
}

/**
 * Prayer times for the UTC day of `date`.
 *
 * Fails with InvalidCoordinate, InvalidPrayerParams, or UnsolvablePrayerAngle
 * when the Sun never reaches one of the required altitudes (high latitudes
 * in summer).
 */
export function calculatePrayerTimes(
  date: Date,
  observer: GeoCoordinate,
  params: PrayerParams,
): Result<PrayerTimes> {
  const validObserver = validateCoordinate(observer)
  if (!validObserver.ok) return validObserver
  const validParams = validatePrayerParams(params)
  if (!validParams.ok) return validParams

  const raw = solveRaw(date, observer, params)
  if (!raw.ok) return raw
  const times = raw.value

  const adjust = (name: Exclude<PrayerName, 'imsak'>): Date => {
    const shift = (EARLIER_BY_IHTIYAT.has(name) ? -1 : 1) * params.ihtiyat * MS_PER_MINUTE
    return roundToGranularity(new Date(times[name].getTime() + shift), params.roundingSeconds)
  }

  const fajr = adjust('fajr')
  return ok(
    Object.freeze({
      imsak: roundToGranularity(new Date(fajr.getTime() - params.imsakOffset * MS_PER_MINUTE), params.roundingSeconds),
      fajr,
      sunrise: adjust('sunrise'),
      dhuhr: adjust('dhuhr'),
      asr: adjust('asr'),
      maghrib: adjust('maghrib'),
      isha: adjust('isha'),
    }),
  )
}
