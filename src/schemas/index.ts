/**
 * Zod runtime validation schemas for the public entry points.
 *
 * Observer coordinates, visibility criteria, prayer parameters, Hijri dates
 * and rule-context options are checked here before any computation runs.
 * A failed parse becomes a typed FalakError inside a Result, never a throw.
 */

import { z } from 'zod'
import type { FalakErrorKind, Result } from '../errors/index.js'
import { fail, ok } from '../errors/index.js'

// ─── Enum Schemas ───────────────────────────────────────────────────────────

export const PrayerPresetNameSchema = z.enum(['MABIMS', 'MWL', 'EGYPTIAN', 'ISNA', 'UMM_AL_QURA'])

export const VisibilityCriteriaNameSchema = z.enum(['MABIMS', 'MABIMS_LEGACY', 'TURKEY_2016'])

export const DaudStrategySchema = z.enum(['skip', 'postpone'])

// ─── Observer ───────────────────────────────────────────────────────────────

export const GeoCoordinateSchema = z.object({
  latitude: z.number().finite().min(-90).max(90),
  longitude: z.number().finite().min(-180).max(180),
  altitude: z.number().finite().nonnegative().optional(),
  pressure: z.number().finite().positive().optional(),
  temperature: z.number().finite().gt(-273.15).optional(),
})

// ─── Astronomy inputs ───────────────────────────────────────────────────────

export const VisibilityCriteriaSchema = z.object({
  minAltitude: z.number().finite().nonnegative(),
  minElongation: z.number().finite().nonnegative(),
})

export const PrayerParamsSchema = z
  .object({
    fajrAngle: z.number().finite().negative(),
    ishaAngle: z.number().finite().negative().optional(),
    ishaInterval: z.number().finite().nonnegative().optional(),
    imsakOffset: z.number().finite().nonnegative(),
    ihtiyat: z.number().finite().nonnegative(),
    roundingSeconds: z.number().int().positive(),
    asrShadowFactor: z.union([z.literal(1), z.literal(2)]),
    preset: PrayerPresetNameSchema.optional(),
  })
  .refine(params => params.ishaAngle !== undefined || params.ishaInterval !== undefined, {
    message: 'either ishaAngle or ishaInterval is required',
    path: ['ishaAngle'],
  })

// ─── Calendar / fiqh inputs ─────────────────────────────────────────────────

export const HijriDateSchema = z.object({
  year: z.number().int().positive(),
  month: z.number().int().min(1).max(12),
  day: z.number().int().min(1).max(30),
})

export const RuleContextOptionsSchema = z.object({
  adjustment: z.number().int().optional(),
  strictAdjustment: z.boolean().optional(),
  daudStrategy: DaudStrategySchema.optional(),
  strict: z.boolean().optional(),
})

export type RuleContextOptionsInput = z.infer<typeof RuleContextOptionsSchema>

// ─── Parsing ────────────────────────────────────────────────────────────────

/** Join zod issues into one line: "latitude: Number must be less than or equal to 90" */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}

/**
 * Parse `value` with `schema`, mapping a failure to a FalakError of `kind`.
 */
export function parseWith<T>(
  schema: z.ZodType<T>,
  value: unknown,
  kind: FalakErrorKind,
): Result<T> {
  const parsed = schema.safeParse(value)
  if (!parsed.success) return fail(kind, formatIssues(parsed.error))
  return ok(parsed.data)
}
