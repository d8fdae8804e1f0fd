/**
 * visibility — Imkanur-rukyat (crescent visibility possibility) evaluation.
 *
 * At a given sunset instant the crescent is judged against two thresholds:
 *
 *   moon altitude + horizon dip ≥ minAltitude
 *   Sun–Moon elongation        ≥ minElongation
 *
 * Moon altitude is the apparent topocentric value (parallax, then refraction).
 * Elongation is the geocentric separation of the apparent ecliptic positions,
 * the quantity the published criteria are defined on.
 *
 * Thresholds are plain data (VISIBILITY_CRITERIA in types.ts), so adding a
 * national criterion needs no code change.
 *
 * References:
 *   MABIMS (2021), Kriteria Imkanur Rukyat Baru
 *   Istanbul International Hijri Calendar Union Congress (2016)
 */

import type { GeoCoordinate, VisibilityCriteria, VisibilityReport } from '../types.js'
import type { Result } from '../errors/index.js'
import { ok } from '../errors/index.js'
import { VisibilityCriteriaSchema, parseWith } from '../schemas/index.js'
import { AU_KM, moonPositionAt, sunPositionAt } from '../ephemeris/index.js'
import { angularSeparation, earthOrientation, localApparentSiderealTime, toEquatorial, toHorizontal } from '../frames/index.js'
import { applyCorrections, horizonDip, validateCoordinate } from '../observer/index.js'
import { dateToJD, instantToJDE } from '../time/index.js'

// ─── Criteria ─────────────────────────────────────────────────────────────────

export function validateCriteria(criteria: VisibilityCriteria): Result<VisibilityCriteria> {
  return parseWith(VisibilityCriteriaSchema, criteria, 'InvalidCriteria')
}

/**
 * Apply the thresholds. Dip lowers the altitude the Moon has to clear; it is
 * added here rather than subtracted from the reported Moon altitude.
 */
export function evaluateCriteria(
  moonAltitude: number,
  elongation: number,
  dip: number,
  criteria: VisibilityCriteria,
): boolean {
  return moonAltitude + dip >= criteria.minAltitude && elongation >= criteria.minElongation
}

// ─── Report ───────────────────────────────────────────────────────────────────

/**
 * Evaluate crescent visibility at `sunset` for the observer.
 *
 * The instant is taken as given: pass the output of findSunset, or any other
 * evaluation time. Invalid coordinates or criteria come back as errors.
 */
export function calculateVisibility(
  sunset: Date,
  observer: GeoCoordinate,
  criteria: VisibilityCriteria,
): Result<VisibilityReport> {
  const validObserver = validateCoordinate(observer)
  if (!validObserver.ok) return validObserver
  const validCriteria = validateCriteria(criteria)
  if (!validCriteria.ok) return validCriteria

  const jde = instantToJDE(sunset)
  const orientation = earthOrientation(jde)
  const last = localApparentSiderealTime(dateToJD(sunset), observer.longitude, orientation)

  const sun = sunPositionAt(jde)
  const moon = moonPositionAt(jde)

  const moonHorizontal = applyCorrections(
    toHorizontal(toEquatorial(moon, orientation.obliquity), observer, last),
    observer,
    moon.distance,
  )
  const sunHorizontal = applyCorrections(
    toHorizontal(toEquatorial(sun, orientation.obliquity), observer, last),
    observer,
    sun.distance * AU_KM,
  )

  const elongation = angularSeparation(sun, moon)
  const dip = horizonDip(observer.altitude ?? 0)

  return ok(
    Object.freeze({
      sunset: new Date(sunset.getTime()),
      observer: Object.freeze({ ...validObserver.value }),
      moonAltitude: moonHorizontal.altitude,
      moonAzimuth: moonHorizontal.azimuth,
      sunAltitude: sunHorizontal.altitude,
      elongation,
      horizonDip: dip,
      meetsCriteria: evaluateCriteria(moonHorizontal.altitude, elongation, dip, validCriteria.value),
      criteria: Object.freeze({ ...validCriteria.value }),
    }),
  )
}

// ─── Guidance ─────────────────────────────────────────────────────────────────

/**
 * One-paragraph summary of a report for observers.
 */
export function describeVisibility(report: VisibilityReport): string {
  const timeStr = report.sunset.toISOString().replace('T', ' ').replace(/\.\d+Z$/, ' UTC')
  const { minAltitude, minElongation } = report.criteria

  let verdict: string
  if (report.moonAltitude < 0) {
    verdict = 'The Moon has already set; no crescent can be seen.'
  } else if (report.meetsCriteria) {
    verdict = `Look ${azimuthToCardinal(report.moonAzimuth)}, ${report.moonAltitude.toFixed(1)}° above the horizon.`
  } else {
    verdict = 'The crescent is above the horizon but below the visibility thresholds.'
  }

  return (
    `Sunset: ${timeStr}. ` +
    `Moon altitude ${report.moonAltitude.toFixed(2)}° (needs ${minAltitude}°), ` +
    `elongation ${report.elongation.toFixed(2)}° (needs ${minElongation}°). ` +
    `Criteria ${report.meetsCriteria ? 'met' : 'not met'}. ` +
    verdict
  )
}

/** Convert azimuth degrees to a cardinal/intercardinal direction label */
function azimuthToCardinal(az: number): string {
  const dirs = ['North', 'NNE', 'NE', 'ENE', 'East', 'ESE', 'SE', 'SSE',
    'South', 'SSW', 'SW', 'WSW', 'West', 'WNW', 'NW', 'NNW']
  const idx = Math.round(az / 22.5) % 16
  return dirs[(idx + 16) % 16]
}
