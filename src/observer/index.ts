/**
 * observer — Topocentric parallax, atmospheric refraction and horizon dip.
 *
 * Correction chain for a body's geocentric geometric altitude:
 *
 *   geometric h → parallax (observer off the Earth's center) → refraction → apparent h'
 *
 * Parallax uses a spherical Earth of equatorial radius R⊕, with the observer
 * raised to R⊕ + elevation. For the Moon this moves the altitude by up to ~1°;
 * for the Sun by under 9″.
 *
 * Horizon dip is NOT applied to altitudes. An elevated observer sees a horizon
 * below the astronomical one, so dip instead lowers the threshold a body
 * must clear (see dipAdjustedThreshold).
 *
 * References:
 *   Bennett (1982), The Calculation of Astronomical Refraction in Marine Navigation
 *   Meeus, Astronomical Algorithms (2nd ed.), ch. 16 and 40
 */

import type { GeoCoordinate, HorizontalPosition } from '../types.js'
import type { Result } from '../errors/index.js'
import { GeoCoordinateSchema, parseWith } from '../schemas/index.js'
import { atan2Deg, cosDeg, sinDeg } from '../math/index.js'
import { EARTH_RADIUS_KM } from '../ephemeris/index.js'

// ─── Defaults ─────────────────────────────────────────────────────────────────

export const STANDARD_PRESSURE_MBAR = 1013.25
export const STANDARD_TEMPERATURE_C = 15

/** Dip coefficient in degrees per √meter (≈ 1.76′·√h) */
export const DIP_COEFFICIENT = 0.0293

/** Observer with every optional field filled */
export type ResolvedObserver = Required<GeoCoordinate>

export function withObserverDefaults(observer: GeoCoordinate): ResolvedObserver {
  return {
    latitude: observer.latitude,
    longitude: observer.longitude,
    altitude: observer.altitude ?? 0,
    pressure: observer.pressure ?? STANDARD_PRESSURE_MBAR,
    temperature: observer.temperature ?? STANDARD_TEMPERATURE_C,
  }
}

/**
 * Check latitude ∈ [-90, 90], longitude ∈ [-180, 180], altitude ≥ 0
 * and finite atmospheric values.
 */
export function validateCoordinate(observer: GeoCoordinate): Result<GeoCoordinate> {
  return parseWith(GeoCoordinateSchema, observer, 'InvalidCoordinate')
}

// ─── Parallax ─────────────────────────────────────────────────────────────────

/**
 * Shift a geocentric horizontal position to the observer's location.
 * Azimuth is unchanged on a spherical Earth.
 *
 *   tan h' = (Δ sin h − ρ) / (Δ cos h)
 *
 * with Δ the body distance and ρ the observer's distance from the Earth's
 * center, both in Earth radii.
 *
 * @param horizontal - Geocentric geometric horizontal position
 * @param distanceKm - Geocentric distance of the body in km
 */
export function topocentricParallax(
  horizontal: HorizontalPosition,
  observer: GeoCoordinate,
  distanceKm: number,
): HorizontalPosition {
  const rho = 1 + (observer.altitude ?? 0) / 1000 / EARTH_RADIUS_KM
  const delta = distanceKm / EARTH_RADIUS_KM
  const h = horizontal.altitude
  return {
    altitude: atan2Deg(delta * sinDeg(h) - rho, delta * cosDeg(h)),
    azimuth: horizontal.azimuth,
  }
}

// ─── Atmospheric refraction ───────────────────────────────────────────────────

/**
 * Bennett (1982) atmospheric refraction correction.
 * Adds the refraction amount to the geometric (airless) altitude.
 *
 * Accurate to ~0.1 arcmin for altitudes > 5°; degrades below that.
 * At 0° altitude, refraction ≈ 34 arcmin.
 *
 * Formula: R = cot(h + 7.31 / (h + 4.4)) / 60  [degrees]
 *
 * Pressure/temperature correction:
 *   R_adj = R × (P / 1010) × (283 / (273 + T))
 *
 * @param altitudeDeg - Geometric (airless) altitude in degrees
 * @param pressure - Atmospheric pressure in millibars (default 1013.25)
 * @param temperature - Temperature in Celsius (default 15)
 * @returns Refraction to add to the altitude, in degrees
 */
export function bennettRefraction(
  altitudeDeg: number,
  pressure = STANDARD_PRESSURE_MBAR,
  temperature = STANDARD_TEMPERATURE_C,
): number {
  // The formula diverges below the horizon
  if (altitudeDeg < -1) return 0

  const argDeg = altitudeDeg + 7.31 / (altitudeDeg + 4.4)
  const R = 1 / (Math.tan((argDeg * Math.PI) / 180) * 60)

  const corrected = R * (pressure / 1010) * (283 / (273 + temperature))
  return Math.max(0, corrected)
}

// ─── Horizon dip ──────────────────────────────────────────────────────────────

/**
 * Dip of the visible horizon below the astronomical horizon, degrees.
 * 0 at sea level and non-decreasing with elevation.
 */
export function horizonDip(altitudeMeters: number): number {
  if (altitudeMeters <= 0) return 0
  return DIP_COEFFICIENT * Math.sqrt(altitudeMeters)
}

/**
 * The altitude a body must reach above the astronomical horizon to count as
 * clearing `threshold` above the observer's visible horizon.
 */
export function dipAdjustedThreshold(threshold: number, observer: GeoCoordinate): number {
  return threshold - horizonDip(observer.altitude ?? 0)
}

// ─── Full pipeline ────────────────────────────────────────────────────────────

/**
 * Geocentric geometric position → apparent topocentric position:
 * parallax first, then refraction on the topocentric altitude.
 */
export function applyCorrections(
  horizontal: HorizontalPosition,
  observer: GeoCoordinate,
  distanceKm: number,
): HorizontalPosition {
  const { pressure, temperature } = withObserverDefaults(observer)
  const topo = topocentricParallax(horizontal, observer, distanceKm)
  const refraction = bennettRefraction(topo.altitude, pressure, temperature)
  return { altitude: topo.altitude + refraction, azimuth: topo.azimuth }
}
