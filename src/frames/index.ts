/**
 * frames — Obliquity, nutation, sidereal time and coordinate transforms.
 *
 * Transform chain for a body seen by a ground observer:
 *
 *   apparent ecliptic (λ, β) of date
 *     → equatorial (α, δ)            via true obliquity ε = ε0 + Δε
 *     → horizontal (A, h)            via local apparent sidereal time
 *
 * The horizontal result here is geometric and geocentric: parallax and
 * refraction are applied afterwards in observer/.
 *
 * Nutation uses the 63-term IAU 1980 series, stored in data/nutation-iau1980.json
 * as rows of [D, M, M', F, Ω, ψ sin-coefficient, ψ·T, ε cos-coefficient, ε·T]
 * in units of 0.0001″.
 *
 * References:
 *   Meeus, Astronomical Algorithms (2nd ed.), ch. 12, 13, 17, 22
 *   Seidelmann (1982), 1980 IAU Theory of Nutation
 */

import type { EclipticPosition, EquatorialPosition, GeoCoordinate, HorizontalPosition, Nutation } from '../types.js'
import { ARCSEC_PER_DEG, DEG2RAD, acosDeg, asinDeg, atan2Deg, cosDeg, horner, mod360, sinDeg, tanDeg } from '../math/index.js'
import { J2000, julianCenturies } from '../time/index.js'
import nutationTable from './data/nutation-iau1980.json' with { type: 'json' }

// ─── Nutation ─────────────────────────────────────────────────────────────────

const NUTATION_TERMS: readonly (readonly number[])[] = nutationTable

/**
 * Nutation in longitude (Δψ) and in obliquity (Δε), degrees.
 *
 * @param jde - Julian Ephemeris Day
 */
export function nutation(jde: number): Nutation {
  const T = julianCenturies(jde)

  // Fundamental arguments (Meeus 22, degrees)
  const D = 297.85036 + 445267.111480 * T - 0.0019142 * T * T + T ** 3 / 189474
  const M = 357.52772 + 35999.050340 * T - 0.0001603 * T * T - T ** 3 / 300000
  const Mp = 134.96298 + 477198.867398 * T + 0.0086972 * T * T + T ** 3 / 56250
  const F = 93.27191 + 483202.017538 * T - 0.0036825 * T * T + T ** 3 / 327270
  const Om = 125.04452 - 1934.136261 * T + 0.0020708 * T * T + T ** 3 / 450000

  let dPsi = 0
  let dEps = 0
  for (const [d, m, mp, f, om, psiA, psiB, epsC, epsD] of NUTATION_TERMS) {
    const arg = (d * D + m * M + mp * Mp + f * F + om * Om) * DEG2RAD
    dPsi += (psiA + psiB * T) * Math.sin(arg)
    dEps += (epsC + epsD * T) * Math.cos(arg)
  }

  return {
    deltaPsi: (dPsi * 1e-4) / ARCSEC_PER_DEG,
    deltaEpsilon: (dEps * 1e-4) / ARCSEC_PER_DEG,
  }
}

// ─── Obliquity ────────────────────────────────────────────────────────────────

/**
 * Mean obliquity of the ecliptic ε0 in degrees (IAU 1980, Meeus 22.2).
 */
export function meanObliquity(jde: number): number {
  const T = julianCenturies(jde)
  return horner(T, [84381.448, -46.8150, -0.00059, 0.001813]) / ARCSEC_PER_DEG
}

/**
 * True obliquity ε = ε0 + Δε, degrees.
 * Pass a precomputed nutation to avoid evaluating the series twice.
 */
export function trueObliquity(jde: number, nut: Nutation = nutation(jde)): number {
  return meanObliquity(jde) + nut.deltaEpsilon
}

/** Nutation and true obliquity at one instant */
export interface EarthOrientation {
  nutation: Nutation
  obliquity: number
}

export function earthOrientation(jde: number): EarthOrientation {
  const nut = nutation(jde)
  return { nutation: nut, obliquity: trueObliquity(jde, nut) }
}

// ─── Sidereal time ────────────────────────────────────────────────────────────

/**
 * Greenwich mean sidereal time in degrees [0, 360) (Meeus 12.4).
 *
 * @param jdUT - Julian Day in UT (not JDE)
 */
export function greenwichMeanSiderealTime(jdUT: number): number {
  const T = julianCenturies(jdUT)
  const theta =
    280.46061837 +
    360.98564736629 * (jdUT - J2000) +
    0.000387933 * T * T -
    T ** 3 / 38710000
  return mod360(theta)
}

/**
 * Local apparent sidereal time in degrees: GMST + equation of the equinoxes
 * (Δψ·cos ε) + east longitude.
 */
export function localApparentSiderealTime(
  jdUT: number,
  longitude: number,
  orientation: EarthOrientation,
): number {
  const equationOfEquinoxes = orientation.nutation.deltaPsi * cosDeg(orientation.obliquity)
  return mod360(greenwichMeanSiderealTime(jdUT) + equationOfEquinoxes + longitude)
}

// ─── Coordinate transforms ────────────────────────────────────────────────────

/**
 * Ecliptic (λ, β) → equatorial (α, δ) for the given obliquity (Meeus 13.3, 13.4).
 */
export function toEquatorial(
  ecliptic: Pick<EclipticPosition, 'longitude' | 'latitude'>,
  obliquity: number,
): EquatorialPosition {
  const { longitude: lambda, latitude: beta } = ecliptic
  const ra = atan2Deg(
    sinDeg(lambda) * cosDeg(obliquity) - tanDeg(beta) * sinDeg(obliquity),
    cosDeg(lambda),
  )
  const dec = asinDeg(
    sinDeg(beta) * cosDeg(obliquity) + cosDeg(beta) * sinDeg(obliquity) * sinDeg(lambda),
  )
  return { rightAscension: mod360(ra), declination: dec }
}

/**
 * Local hour angle H = LAST − α, degrees in [0, 360).
 */
export function hourAngle(equatorial: EquatorialPosition, siderealTime: number): number {
  return mod360(siderealTime - equatorial.rightAscension)
}

/**
 * Equatorial → horizontal (Meeus 13.5, 13.6) with azimuth measured from North,
 * clockwise. Geometric altitude: no parallax, no refraction.
 *
 * @param siderealTime - Local apparent sidereal time, degrees
 */
export function toHorizontal(
  equatorial: EquatorialPosition,
  observer: Pick<GeoCoordinate, 'latitude'>,
  siderealTime: number,
): HorizontalPosition {
  const H = hourAngle(equatorial, siderealTime)
  const phi = observer.latitude
  const dec = equatorial.declination

  const altitude = asinDeg(sinDeg(phi) * sinDeg(dec) + cosDeg(phi) * cosDeg(dec) * cosDeg(H))
  // Meeus measures A from the South; +180 turns it to a North-based azimuth
  const azimuthFromSouth = atan2Deg(sinDeg(H), cosDeg(H) * sinDeg(phi) - tanDeg(dec) * cosDeg(phi))

  return { altitude, azimuth: mod360(azimuthFromSouth + 180) }
}

/**
 * Angular separation between two points on a sphere, degrees in [0, 180].
 * Works for any (longitude, latitude) pair: ecliptic or equatorial.
 */
export function angularSeparation(
  a: Pick<EclipticPosition, 'longitude' | 'latitude'>,
  b: Pick<EclipticPosition, 'longitude' | 'latitude'>,
): number {
  return acosDeg(
    sinDeg(a.latitude) * sinDeg(b.latitude) +
      cosDeg(a.latitude) * cosDeg(b.latitude) * cosDeg(a.longitude - b.longitude),
  )
}
