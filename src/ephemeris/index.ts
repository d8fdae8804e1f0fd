/**
 * ephemeris — Apparent geocentric positions of the Sun and Moon.
 *
 * Sun: truncated VSOP87 (Earth, heliocentric, mean ecliptic and equinox of date),
 * turned geocentric by adding 180° to L and negating B, then:
 *   FK5 frame correction     Δλ = −0.09033″, Δβ = 0.03916″(cos λ' − sin λ')
 *   nutation in longitude    + Δψ
 *   annual aberration        − 20.4898″ / R
 *
 * Moon: ELP2000-82 as truncated in Meeus ch. 47 (60 terms for longitude and
 * distance, 60 for latitude) plus the A1/A2/A3 additive terms. Terms with
 * the Sun's mean anomaly M are scaled by E^|m| for the decreasing eccentricity
 * of the Earth's orbit. Apparent longitude adds Δψ.
 *
 * Coefficient tables live in data/*.json and are evaluated as folds over
 * those rows. Accuracy: a few arcseconds for the Sun and ~10″ for the Moon
 * near J2000, degrading slowly for dates centuries away.
 *
 * References:
 *   Bretagnon & Francou (1988), VSOP87
 *   Chapront-Touzé & Chapront (1983), ELP 2000-82
 *   Meeus, Astronomical Algorithms (2nd ed.), ch. 25, 32, 47, Appendix III
 */

import type { EclipticPosition } from '../types.js'
import { ARCSEC_PER_DEG, DEG2RAD, RAD2DEG, cosDeg, horner, mod360, sinDeg } from '../math/index.js'
import { instantToJDE, julianCenturies, julianMillennia } from '../time/index.js'
import { nutation } from '../frames/index.js'
import vsop87Earth from './data/vsop87-earth.json' with { type: 'json' }
import elp2000Moon from './data/elp2000-moon.json' with { type: 'json' }

// ─── Constants ────────────────────────────────────────────────────────────────

/** Equatorial radius of the Earth, km */
export const EARTH_RADIUS_KM = 6378.14

/** Astronomical unit, km */
export const AU_KM = 149597870.7

/** Constant of aberration, arcseconds */
const ABERRATION_ARCSEC = 20.4898

/** One VSOP87 term: amplitude A (1e-8 units), phase B (rad), frequency C (rad per millennium) */
type VsopTerm = readonly number[]

/** L0..Ln, each a list of terms multiplied by τ^i */
type VsopSeries = readonly (readonly VsopTerm[])[]

const EARTH_L: VsopSeries = vsop87Earth.L
const EARTH_B: VsopSeries = vsop87Earth.B
const EARTH_R: VsopSeries = vsop87Earth.R

/** [D, M, M', F, Σl coefficient (1e-6°), Σr coefficient (1e-3 km)] */
const MOON_LR: readonly (readonly number[])[] = elp2000Moon.longitudeDistance
/** [D, M, M', F, Σb coefficient (1e-6°)] */
const MOON_B: readonly (readonly number[])[] = elp2000Moon.latitude

// ─── VSOP87 ───────────────────────────────────────────────────────────────────

/**
 * Evaluate one VSOP87 variable: Σ_i τ^i · Σ_k A·cos(B + C·τ), in radians (or AU for R).
 */
function evaluateVsop(series: VsopSeries, tau: number): number {
  let total = 0
  let tauPower = 1
  for (const terms of series) {
    let sum = 0
    for (const [A, B, C] of terms) sum += A * Math.cos(B + C * tau)
    total += sum * tauPower
    tauPower *= tau
  }
  return total * 1e-8
}

/** Heliocentric ecliptic coordinates of the Earth (L, B radians; R AU) */
export interface HeliocentricEarth {
  L: number
  B: number
  R: number
}

export function heliocentricEarth(jde: number): HeliocentricEarth {
  const tau = julianMillennia(jde)
  return {
    L: evaluateVsop(EARTH_L, tau),
    B: evaluateVsop(EARTH_B, tau),
    R: evaluateVsop(EARTH_R, tau),
  }
}

// ─── Sun ──────────────────────────────────────────────────────────────────────

/**
 * Apparent geocentric ecliptic position of the Sun, distance in AU.
 *
 * @param jde - Julian Ephemeris Day (TT)
 */
export function sunPositionAt(jde: number): EclipticPosition {
  const { L, B, R } = heliocentricEarth(jde)
  const T = julianCenturies(jde)

  let lon = mod360(L * RAD2DEG + 180)
  let lat = -B * RAD2DEG

  // FK5 correction
  const lonPrime = lon - 1.397 * T - 0.00031 * T * T
  lon += -0.09033 / ARCSEC_PER_DEG
  lat += (0.03916 * (cosDeg(lonPrime) - sinDeg(lonPrime))) / ARCSEC_PER_DEG

  const { deltaPsi } = nutation(jde)
  const aberration = -ABERRATION_ARCSEC / ARCSEC_PER_DEG / R

  return {
    longitude: mod360(lon + deltaPsi + aberration),
    latitude: lat,
    distance: R,
    unit: 'au',
  }
}

/** Apparent position of the Sun at a UTC instant */
export function sunPosition(instant: Date): EclipticPosition {
  return sunPositionAt(instantToJDE(instant))
}

// ─── Moon ─────────────────────────────────────────────────────────────────────

/** Mean arguments of the lunar theory in degrees (Meeus 47.1–47.5) */
interface LunarArguments {
  Lp: number
  D: number
  M: number
  Mp: number
  F: number
}

function lunarArguments(T: number): LunarArguments {
  return {
    Lp: horner(T, [218.3164477, 481267.88123421, -0.0015786, 1 / 538841, -1 / 65194000]),
    D: horner(T, [297.8501921, 445267.1114034, -0.0018819, 1 / 545868, -1 / 113065000]),
    M: horner(T, [357.5291092, 35999.0502909, -0.0001536, 1 / 24490000]),
    Mp: horner(T, [134.9633964, 477198.8675055, 0.0087414, 1 / 69699, -1 / 14712000]),
    F: horner(T, [93.2720950, 483202.0175233, -0.0036539, -1 / 3526000, 1 / 863310000]),
  }
}

/**
 * Apparent geocentric ecliptic position of the Moon, distance in km.
 *
 * @param jde - Julian Ephemeris Day (TT)
 */
export function moonPositionAt(jde: number): EclipticPosition {
  const T = julianCenturies(jde)
  const { Lp, D, M, Mp, F } = lunarArguments(T)

  const A1 = 119.75 + 131.849 * T
  const A2 = 53.09 + 479264.290 * T
  const A3 = 313.45 + 481266.484 * T
  const E = horner(T, [1, -0.002516, -0.0000074])

  let sumL = 0
  let sumR = 0
  for (const [d, m, mp, f, l, r] of MOON_LR) {
    const arg = (d * D + m * M + mp * Mp + f * F) * DEG2RAD
    const e = E ** Math.abs(m)
    sumL += l * e * Math.sin(arg)
    sumR += r * e * Math.cos(arg)
  }

  let sumB = 0
  for (const [d, m, mp, f, b] of MOON_B) {
    const arg = (d * D + m * M + mp * Mp + f * F) * DEG2RAD
    sumB += b * E ** Math.abs(m) * Math.sin(arg)
  }

  // Venus, Jupiter and Earth-flattening terms
  sumL += 3958 * sinDeg(A1) + 1962 * sinDeg(Lp - F) + 318 * sinDeg(A2)
  sumB +=
    -2235 * sinDeg(Lp) +
    382 * sinDeg(A3) +
    175 * sinDeg(A1 - F) +
    175 * sinDeg(A1 + F) +
    127 * sinDeg(Lp - Mp) -
    115 * sinDeg(Lp + Mp)

  const { deltaPsi } = nutation(jde)

  return {
    longitude: mod360(Lp + sumL / 1e6 + deltaPsi),
    latitude: sumB / 1e6,
    distance: 385000.56 + sumR / 1000,
    unit: 'km',
  }
}

/** Apparent position of the Moon at a UTC instant */
export function moonPosition(instant: Date): EclipticPosition {
  return moonPositionAt(instantToJDE(instant))
}

/**
 * Equatorial horizontal parallax of a body at the given distance, degrees.
 */
export function horizontalParallax(distanceKm: number): number {
  return Math.asin(EARTH_RADIUS_KM / distanceKm) * RAD2DEG
}

/** Distance in Earth equatorial radii */
export function earthRadii(distanceKm: number): number {
  return distanceKm / EARTH_RADIUS_KM
}
