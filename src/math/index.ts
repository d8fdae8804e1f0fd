/**
 * math — Angle utilities shared by the astronomy layers.
 *
 * All computation in this module is pure (no I/O, no state).
 * Every public angle in this package is in degrees; radians appear only
 * inside the trigonometric helpers below.
 */

// ─── Angle constants ─────────────────────────────────────────────────────────

/** Convert degrees to radians */
export const DEG2RAD = Math.PI / 180

/** Convert radians to degrees */
export const RAD2DEG = 180 / Math.PI

/** Arcseconds per degree */
export const ARCSEC_PER_DEG = 3600

// ─── Normalization ───────────────────────────────────────────────────────────

/** Normalize an angle in degrees to [0, 360) */
export function mod360(deg: number): number {
  return ((deg % 360) + 360) % 360
}

/** Normalize an angle in degrees to [-180, 180) */
export function normalizeDeg180(deg: number): number {
  deg = mod360(deg)
  return deg >= 180 ? deg - 360 : deg
}

/** Clamp x into [lo, hi] */
export function clamp(x: number, lo: number, hi: number): number {
  return Math.min(hi, Math.max(lo, x))
}

// ─── Degree trigonometry ─────────────────────────────────────────────────────

export function sinDeg(deg: number): number {
  return Math.sin(deg * DEG2RAD)
}

export function cosDeg(deg: number): number {
  return Math.cos(deg * DEG2RAD)
}

export function tanDeg(deg: number): number {
  return Math.tan(deg * DEG2RAD)
}

/** asin in degrees, argument clamped to [-1, 1] against rounding overshoot */
export function asinDeg(x: number): number {
  return Math.asin(clamp(x, -1, 1)) * RAD2DEG
}

/** acos in degrees, argument clamped to [-1, 1] */
export function acosDeg(x: number): number {
  return Math.acos(clamp(x, -1, 1)) * RAD2DEG
}

export function atan2Deg(y: number, x: number): number {
  return Math.atan2(y, x) * RAD2DEG
}

// ─── Polynomials ─────────────────────────────────────────────────────────────

/**
 * Evaluate c[0] + c[1]·x + c[2]·x² + … by Horner's rule.
 */
export function horner(x: number, coeffs: readonly number[]): number {
  let acc = 0
  for (let i = coeffs.length - 1; i >= 0; i--) {
    acc = acc * x + coeffs[i]
  }
  return acc
}
