/**
 * events — Solar transit and sun-altitude crossings (sunrise, sunset, twilight).
 *
 * Finding when the Sun's center reaches altitude h0 on a given day reduces to
 * the hour-angle equation
 *
 *   cos H0 = (sin h0 − sin φ sin δ) / (cos φ cos δ)
 *
 * Because δ and α drift during the day, the solver iterates: start at local
 * transit, evaluate the Sun at the current estimate, recompute H0 and move the
 * estimate by the remaining hour-angle difference. It stops when a step is
 * below 0.01 s or after 12 iterations. |cos H0| > 1 means the Sun never
 * reaches h0 on that day (polar day or night) and is reported as an error.
 *
 * Altitudes here are geocentric and geometric. Sunrise/sunset conventionally use
 * h0 = −0.8333° (34′ refraction + 16′ solar semi-diameter).
 *
 * Reference: Meeus, Astronomical Algorithms (2nd ed.), ch. 15
 */

import type { DaySide, EquatorialPosition, GeoCoordinate } from '../types.js'
import type { Result } from '../errors/index.js'
import { fail, ok } from '../errors/index.js'
import { acosDeg, cosDeg, normalizeDeg180, sinDeg } from '../math/index.js'
import { MS_PER_DAY, dateToJD, instantToJDE, startOfUTCDay } from '../time/index.js'
import { sunPositionAt } from '../ephemeris/index.js'
import { earthOrientation, localApparentSiderealTime, toEquatorial } from '../frames/index.js'
import { dipAdjustedThreshold } from '../observer/index.js'

// ─── Constants ────────────────────────────────────────────────────────────────

/**
 * Standard altitude of the Sun's center at sunrise/sunset.
 * Accounts for: standard refraction at horizon (34') + solar semi-diameter (16')
 * Total: −50' = −0.8333°
 */
export const SUN_ALTITUDE_THRESHOLD = -0.8333

/** Degrees of hour angle per day of UT (sidereal rate) */
const SIDEREAL_DEG_PER_DAY = 360.98564736629

const MAX_ITERATIONS = 12

/** Convergence tolerance: 0.01 s */
const TOLERANCE_MS = 10

// ─── Sun state ────────────────────────────────────────────────────────────────

export interface SunState {
  equatorial: EquatorialPosition
  /** Local hour angle, degrees in [-180, 180): negative before transit */
  hourAngle: number
}

/**
 * Apparent equatorial position and local hour angle of the Sun.
 */
export function sunStateAt(instant: Date, longitude: number): SunState {
  const jde = instantToJDE(instant)
  const orientation = earthOrientation(jde)
  const equatorial = toEquatorial(sunPositionAt(jde), orientation.obliquity)
  const last = localApparentSiderealTime(dateToJD(instant), longitude, orientation)
  return { equatorial, hourAngle: normalizeDeg180(last - equatorial.rightAscension) }
}

/** Convert an hour-angle difference to milliseconds of UT */
function hourAngleToMs(deltaH: number): number {
  return (deltaH / SIDEREAL_DEG_PER_DAY) * MS_PER_DAY
}

// ─── Transit ──────────────────────────────────────────────────────────────────

/**
 * Upper transit of the Sun (solar noon) on the UTC calendar day of `date`
 * for the observer's longitude.
 */
export function solarTransit(date: Date, observer: Pick<GeoCoordinate, 'longitude'>): Date {
  // Mean local noon as the first guess
  let t = startOfUTCDay(date).getTime() + MS_PER_DAY / 2 - (observer.longitude / 360) * MS_PER_DAY

  for (let i = 0; i < MAX_ITERATIONS; i++) {
    const { hourAngle } = sunStateAt(new Date(t), observer.longitude)
    const step = -hourAngleToMs(hourAngle)
    t += step
    if (Math.abs(step) < TOLERANCE_MS) break
  }

  return new Date(t)
}

// ─── Altitude crossing ────────────────────────────────────────────────────────

/**
 * Hour angle at which the Sun's center stands at `altitude`, degrees in [0, 180].
 * Returns null when the Sun never reaches that altitude at this declination.
 */
export function hourAngleForAltitude(altitude: number, latitude: number, declination: number): number | null {
  const cosH0 =
    (sinDeg(altitude) - sinDeg(latitude) * sinDeg(declination)) /
    (cosDeg(latitude) * cosDeg(declination))
  // Also catches NaN/Infinity at the poles
  if (!(Math.abs(cosH0) <= 1)) return null
  return acosDeg(cosH0)
}

/**
 * Find when the Sun's center crosses `altitude` on the morning (`dawn`) or
 * evening (`dusk`) side of the transit on the UTC day of `date`.
 *
 * @param altitude - Geometric altitude of the Sun's center, degrees
 * @returns The crossing instant, or UnsolvablePrayerAngle when the Sun stays
 *   entirely above or below `altitude` that day
 */
export function solveSunAltitude(
  date: Date,
  observer: GeoCoordinate,
  altitude: number,
  side: DaySide,
): Result<Date> {
  const transit = solarTransit(date, observer)
  let t = transit.getTime()

  for (let i = 0; i < MAX_ITERATIONS; i++) {
    const { equatorial, hourAngle } = sunStateAt(new Date(t), observer.longitude)
    const H0 = hourAngleForAltitude(altitude, observer.latitude, equatorial.declination)
    if (H0 === null) {
      return fail(
        'UnsolvablePrayerAngle',
        `Sun does not reach ${altitude}° at latitude ${observer.latitude} on ${transit.toISOString().slice(0, 10)}`,
      )
    }

    const target = side === 'dawn' ? -H0 : H0
    const step = hourAngleToMs(normalizeDeg180(target - hourAngle))
    t += step
    if (Math.abs(step) < TOLERANCE_MS) break
  }

  return ok(new Date(t))
}

/**
 * Sunset: the Sun's upper limb on the observer's visible horizon.
 * An elevated observer's horizon dips, so sunset comes later.
 */
export function findSunset(date: Date, observer: GeoCoordinate): Result<Date> {
  return solveSunAltitude(date, observer, dipAdjustedThreshold(SUN_ALTITUDE_THRESHOLD, observer), 'dusk')
}

/** Sunrise: the mirror of findSunset on the dawn side */
export function findSunrise(date: Date, observer: GeoCoordinate): Result<Date> {
  return solveSunAltitude(date, observer, dipAdjustedThreshold(SUN_ALTITUDE_THRESHOLD, observer), 'dawn')
}
