/**
 * falak — Sun and Moon positions, hilal visibility, prayer times and
 * fasting-day rulings.
 *
 * Positions come from truncated VSOP87 (Sun) and ELP2000-82 (Moon) series as
 * published by Meeus, so no ephemeris files are needed. Hijri dates come from
 * the Umm al-Qura calendar in Node's ICU data.
 *
 * Quick start:
 *   import { analyzeDate, calculatePrayerTimes, prayerParams, unwrap } from 'falak'
 *
 *   const jakarta = { latitude: -6.2088, longitude: 106.8456 }
 *   const times = unwrap(calculatePrayerTimes(new Date('2024-03-15'), jakarta, prayerParams('MABIMS')))
 *   console.log(times.maghrib)
 *
 *   const today = unwrap(analyzeDate(new Date('2024-03-11')))
 *   console.log(today.primaryStatus, today.explanation)
 */

// ─── Primary API ──────────────────────────────────────────────────────────────

export {
  analyzeDate,
  analyzeInstant,
  daudSchedule,
  upcomingFasts,
  RECOMMENDED_STATUSES,
  ruleContext,
  findSunset,
  checkHilal,
  calculateVisibility,
  calculatePrayerTimes,
  prayerParams,
  PRAYER_PRESETS,
  DEFAULT_RULE_CONTEXT,
  MAX_ADJUSTMENT,
  MAX_STRICT_ADJUSTMENT,
} from './api/index.js'

export type {
  RuleContext,
  RuleContextOptions,
  DaudScheduleOptions,
  UpcomingFast,
  UpcomingFastsOptions,
} from './api/index.js'

// ─── Building blocks ──────────────────────────────────────────────────────────

export { describeVisibility, evaluateCriteria } from './visibility/index.js'
export { resolve, compareStatus, maxStatus, RULES, FASTING_TYPE_LABELS } from './fiqh/index.js'
export type { FastingRule, RuleKind } from './fiqh/index.js'
export {
  UmmAlQuraCalendar,
  CivilHijriCalendar,
  UMM_AL_QURA_MIN_YEAR,
  UMM_AL_QURA_MAX_YEAR,
  formatHijriDate,
  hijriMonthName,
  weekdayOf,
} from './calendar/index.js'
export type { HijriCalendar } from './calendar/index.js'
export { sunPosition, moonPosition, earthRadii } from './ephemeris/index.js'
export { horizonDip, bennettRefraction } from './observer/index.js'
export { angularSeparation } from './frames/index.js'

// ─── Errors ───────────────────────────────────────────────────────────────────

export { FalakError, ok, err, fail, unwrap } from './errors/index.js'
export type { FalakErrorKind, Result } from './errors/index.js'

// ─── Types ────────────────────────────────────────────────────────────────────

export type {
  // Geometry
  GeoCoordinate,
  EclipticPosition,
  EquatorialPosition,
  HorizontalPosition,
  Nutation,
  // Visibility
  VisibilityCriteria,
  VisibilityCriteriaName,
  VisibilityReport,
  // Prayer
  PrayerName,
  PrayerPresetName,
  PrayerParams,
  PrayerTimes,
  // Calendar and fasting
  HijriDate,
  Weekday,
  FastingType,
  FastingStatus,
  FastingAnalysis,
  CustomFastingRule,
  CustomReason,
  DaudStrategy,
} from './types.js'

// ─── Constants ────────────────────────────────────────────────────────────────

export {
  VISIBILITY_CRITERIA,
  PRAYER_ORDER,
  HIJRI_MONTH_NAMES,
  WEEKDAY_NAMES,
  STATUS_PRIORITY,
  STATUS_LABELS,
} from './types.js'
