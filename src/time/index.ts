/**
 * time — Julian Date arithmetic and the UT → TT (Dynamical Time) bridge.
 *
 * The series in ephemeris/ and frames/ take a Julian Ephemeris Day (JDE, TT).
 * Earth rotation (sidereal time, hour angles) takes a Julian Day in UT.
 * The two differ by ΔT = TT − UT, about 69 s around 2024:
 *
 *   JDE = JD(UT) + ΔT / 86400
 *
 * UTC is used in place of UT1; the difference stays below 0.9 s.
 *
 * References:
 *   Meeus, Astronomical Algorithms (2nd ed.), ch. 7 and 10
 *   Espenak & Meeus — ΔT polynomial expressions (NASA Five Millennium Canon, 2009)
 */

// ─── Constants ────────────────────────────────────────────────────────────────

/** Julian Date of J2000.0 epoch (2000 Jan 1, 12:00 TT) */
export const J2000 = 2451545.0

/** Julian Date of the Unix epoch (1970 Jan 1, 00:00 UTC) */
export const JD_UNIX_EPOCH = 2440587.5

/** Seconds per day */
export const SECONDS_PER_DAY = 86400.0

export const MS_PER_DAY = 86400000

/** Days per Julian century */
export const DAYS_PER_JULIAN_CENTURY = 36525.0

// ─── Julian Date ─────────────────────────────────────────────────────────────

/**
 * Convert a JavaScript Date (UTC) to Julian Date in UTC.
 * Uses the standard formula; valid for dates after the Gregorian reform.
 */
export function dateToJD(date: Date): number {
  return date.getTime() / MS_PER_DAY + JD_UNIX_EPOCH
}

/**
 * Julian centuries of 36525 days from J2000.0.
 * The standard argument for the nutation, obliquity and lunar polynomials.
 */
export function julianCenturies(jde: number): number {
  return (jde - J2000) / DAYS_PER_JULIAN_CENTURY
}

/** Julian millennia from J2000.0 (the VSOP87 time argument τ) */
export function julianMillennia(jde: number): number {
  return julianCenturies(jde) / 10
}

/**
 * Julian Ephemeris Day for a UTC instant, ΔT from the polynomial below.
 */
export function instantToJDE(instant: Date): number {
  const jd = dateToJD(instant)
  return jd + deltaT(jd) / SECONDS_PER_DAY
}

// ─── Calendar-day helpers ─────────────────────────────────────────────────────

/** 00:00 UTC of the instant's UTC calendar day */
export function startOfUTCDay(instant: Date): Date {
  return new Date(Date.UTC(instant.getUTCFullYear(), instant.getUTCMonth(), instant.getUTCDate()))
}

/** Same wall-clock time, shifted by whole UTC days */
export function addDays(instant: Date, days: number): Date {
  return new Date(instant.getTime() + days * MS_PER_DAY)
}

// ─── ΔT ───────────────────────────────────────────────────────────────────────

/**
 * Delta-T: TT − UT in seconds.
 * Uses Espenak & Meeus expressions, piecewise by year range.
 *
 * @param jd - Julian Date (UT or TT; the minute of difference is far below
 *   the resolution of the fit)
 */
export function deltaT(jd: number): number {
  const y = 2000 + (jd - J2000) / 365.25

  if (y < -500) {
    const u = (y - 1820) / 100
    return -20 + 32 * u * u
  } else if (y < 500) {
    const u = y / 100
    return (
      10583.6 - 1014.41 * u + 33.78311 * u * u - 5.952053 * u * u * u -
      0.1798452 * u ** 4 + 0.022174192 * u ** 5 + 0.0090316521 * u ** 6
    )
  } else if (y < 1600) {
    const u = (y - 1000) / 100
    return (
      1574.2 - 556.01 * u + 71.23472 * u * u + 0.319781 * u ** 3 -
      0.8503463 * u ** 4 - 0.005050998 * u ** 5 + 0.0083572073 * u ** 6
    )
  } else if (y < 1700) {
    const t = y - 1600
    return 120 - 0.9808 * t - 0.01532 * t * t + t ** 3 / 7129
  } else if (y < 1800) {
    const t = y - 1700
    return (
      8.83 + 0.1603 * t - 0.0059285 * t * t + 0.00013336 * t ** 3 - t ** 4 / 1174000
    )
  } else if (y < 1860) {
    const t = y - 1800
    return (
      13.72 - 0.332447 * t + 0.0068612 * t * t + 0.0041116 * t ** 3 -
      0.00037436 * t ** 4 + 0.0000121272 * t ** 5 -
      0.0000001699 * t ** 6 + 0.000000000875 * t ** 7
    )
  } else if (y < 1900) {
    const t = y - 1860
    return (
      7.62 + 0.5737 * t - 0.251754 * t * t + 0.01680668 * t ** 3 -
      0.0004473624 * t ** 4 + t ** 5 / 233174
    )
  } else if (y < 1920) {
    const t = y - 1900
    return (
      -2.79 + 1.494119 * t - 0.0598939 * t * t + 0.0061966 * t ** 3 - 0.000197 * t ** 4
    )
  } else if (y < 1941) {
    const t = y - 1920
    return 21.20 + 0.84493 * t - 0.076100 * t * t + 0.0020936 * t ** 3
  } else if (y < 1961) {
    const t = y - 1950
    return 29.07 + 0.407 * t - t * t / 233 + t ** 3 / 2547
  } else if (y < 1986) {
    const t = y - 1975
    return 45.45 + 1.067 * t - t * t / 260 - t ** 3 / 718
  } else if (y < 2005) {
    const t = y - 2000
    return (
      63.86 + 0.3345 * t - 0.060374 * t * t + 0.0017275 * t ** 3 +
      0.000651814 * t ** 4 + 0.00002373599 * t ** 5
    )
  } else if (y < 2050) {
    const t = y - 2000
    return 62.92 + 0.32217 * t + 0.005589 * t * t
  } else if (y < 2150) {
    return -20 + 32 * ((y - 1820) / 100) ** 2 - 0.5628 * (2150 - y)
  } else {
    const u = (y - 1820) / 100
    return -20 + 32 * u * u
  }
}
