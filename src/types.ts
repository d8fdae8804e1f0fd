// ─── Observer ────────────────────────────────────────────────────────────────

/** Observer location and optional atmospheric conditions */
export interface GeoCoordinate {
  /** Latitude in degrees (north positive), in [-90, 90] */
  latitude: number
  /** Longitude in degrees (east positive), in [-180, 180] */
  longitude: number
  /** Height above sea level in meters (default 0) */
  altitude?: number
  /** Atmospheric pressure in millibars (default 1013.25) */
  pressure?: number
  /** Ambient temperature in Celsius (default 15) */
  temperature?: number
}

// ─── Positions ───────────────────────────────────────────────────────────────

/** Geocentric apparent ecliptic coordinates of date */
export interface EclipticPosition {
  /** Degrees, [0, 360) */
  longitude: number
  /** Degrees, [-90, 90] */
  latitude: number
  /** Distance from the Earth's center, in `unit` */
  distance: number
  unit: 'au' | 'km'
}

export interface EquatorialPosition {
  /** Degrees, [0, 360) */
  rightAscension: number
  /** Degrees */
  declination: number
}

/** Azimuth + altitude in degrees */
export interface HorizontalPosition {
  /** Degrees above the horizon (negative = below) */
  altitude: number
  /** Degrees from North, measured clockwise (0 = N, 90 = E, 180 = S, 270 = W) */
  azimuth: number
}

/** Nutation in longitude and obliquity, degrees */
export interface Nutation {
  deltaPsi: number
  deltaEpsilon: number
}

// ─── Hilal visibility ────────────────────────────────────────────────────────

/**
 * Thresholds a crescent must reach at sunset.
 * Carries no defaults: callers pass a preset from VISIBILITY_CRITERIA or their own values.
 */
export interface VisibilityCriteria {
  /** Minimum apparent Moon altitude above the visible horizon, degrees */
  minAltitude: number
  /** Minimum Sun-Moon elongation, degrees */
  minElongation: number
}

export type VisibilityCriteriaName = 'MABIMS' | 'MABIMS_LEGACY' | 'TURKEY_2016'

/**
 * Published imkanur-rukyat thresholds.
 *   MABIMS        — 2021 revision (Indonesia, Malaysia, Brunei, Singapore)
 *   MABIMS_LEGACY — pre-2021 "2-3-8" rule, altitude and elongation parts
 *   TURKEY_2016   — Istanbul 2016 congress criterion
 */
export const VISIBILITY_CRITERIA: Readonly<Record<VisibilityCriteriaName, Readonly<VisibilityCriteria>>> = {
  MABIMS: { minAltitude: 3, minElongation: 6.4 },
  MABIMS_LEGACY: { minAltitude: 2, minElongation: 3 },
  TURKEY_2016: { minAltitude: 5, minElongation: 8 },
}

export interface VisibilityReport {
  /** Sunset instant the report was evaluated at */
  sunset: Date
  observer: GeoCoordinate
  /** Apparent topocentric Moon altitude (parallax + refraction), not clamped */
  moonAltitude: number
  moonAzimuth: number
  /** Apparent topocentric Sun altitude at the same instant */
  sunAltitude: number
  /** Geocentric Sun-Moon elongation, degrees */
  elongation: number
  /** Dip of the visible horizon for the observer's elevation, degrees */
  horizonDip: number
  meetsCriteria: boolean
  criteria: VisibilityCriteria
}

// ─── Prayer times ────────────────────────────────────────────────────────────

export type PrayerName = 'imsak' | 'fajr' | 'sunrise' | 'dhuhr' | 'asr' | 'maghrib' | 'isha'

/** Chronological order of the computed boundaries */
export const PRAYER_ORDER: readonly PrayerName[] = [
  'imsak', 'fajr', 'sunrise', 'dhuhr', 'asr', 'maghrib', 'isha',
] as const

export type PrayerPresetName = 'MABIMS' | 'MWL' | 'EGYPTIAN' | 'ISNA' | 'UMM_AL_QURA'

export interface PrayerParams {
  /** Sun altitude at Fajr, degrees (negative) */
  fajrAngle: number
  /** Sun altitude at Isha, degrees (negative). One of ishaAngle / ishaInterval is required. */
  ishaAngle?: number
  /** Fixed Isha time in minutes after Maghrib (Umm al-Qura style); wins over ishaAngle */
  ishaInterval?: number
  /** Minutes between Imsak and Fajr */
  imsakOffset: number
  /** Safety margin in minutes */
  ihtiyat: number
  /** Rounding granularity in seconds (60 = nearest minute) */
  roundingSeconds: number
  /** Shadow length factor for Asr: 1 = Shafi'i/Maliki/Hanbali, 2 = Hanafi */
  asrShadowFactor: 1 | 2
  /** Preset the values were taken from, if any */
  preset?: PrayerPresetName
}

export type PrayerTimes = Readonly<Record<PrayerName, Date>>

/** Morning or evening branch of a sun-altitude crossing */
export type DaySide = 'dawn' | 'dusk'

// ─── Hijri calendar ──────────────────────────────────────────────────────────

export interface HijriDate {
  year: number
  /** 1 = Muharram ... 12 = Dhu al-Hijjah */
  month: number
  /** 1..30 */
  day: number
}

export const HIJRI_MONTH_NAMES: readonly string[] = [
  'Muharram',
  'Safar',
  "Rabi' al-Awwal",
  "Rabi' al-Thani",
  'Jumada al-Ula',
  'Jumada al-Akhirah',
  'Rajab',
  "Sha'ban",
  'Ramadhan',
  'Shawwal',
  "Dhu al-Qi'dah",
  'Dhu al-Hijjah',
] as const

/** Day of week, numbered like Date#getUTCDay (0 = Sunday) */
export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6

export const WEEKDAY_NAMES: Readonly<Record<Weekday, string>> = {
  0: 'Sunday',
  1: 'Monday',
  2: 'Tuesday',
  3: 'Wednesday',
  4: 'Thursday',
  5: 'Friday',
  6: 'Saturday',
}

// ─── Fiqh ────────────────────────────────────────────────────────────────────

export type FastingType =
  | 'Ramadhan'
  | 'Arafah'
  | 'Ashura'
  | 'Tasua'
  | 'AyyamulBidh'
  | 'Monday'
  | 'Thursday'
  | 'Shawwal'
  | 'EidAlFitr'
  | 'EidAlAdha'
  | 'Tashriq'
  | 'SingledOutFriday'
  | 'SingledOutSaturday'

export type FastingStatus =
  | 'Haram'
  | 'Wajib'
  | 'SunnahMuakkadah'
  | 'Sunnah'
  | 'Makruh'
  | 'Mubah'

/**
 * Conflict-resolution order, higher wins:
 *   Haram > Wajib > SunnahMuakkadah > Sunnah > Makruh > Mubah
 */
export const STATUS_PRIORITY: Readonly<Record<FastingStatus, number>> = {
  Mubah: 0,
  Makruh: 1,
  Sunnah: 2,
  SunnahMuakkadah: 3,
  Wajib: 4,
  Haram: 5,
}

export const STATUS_LABELS: Readonly<Record<FastingStatus, string>> = {
  Haram: 'Haram (forbidden)',
  Wajib: 'Wajib (obligatory)',
  SunnahMuakkadah: 'Sunnah Muakkadah (strongly recommended)',
  Sunnah: 'Sunnah (recommended)',
  Makruh: 'Makruh (disliked)',
  Mubah: 'Mubah (permissible)',
}

/** A reason contributed by a caller-supplied rule */
export interface CustomReason {
  name: string
  status: FastingStatus
}

/**
 * Caller-supplied fasting rule, evaluated after the built-in table.
 * Return null when the rule does not apply to the date.
 */
export interface CustomFastingRule {
  name: string
  evaluate(hijri: HijriDate, weekday: Weekday): FastingStatus | null
}

export interface FastingAnalysis {
  hijri: HijriDate
  weekday: Weekday
  primaryStatus: FastingStatus
  /** Built-in reasons, in rule-table order */
  reasons: readonly FastingType[]
  customReasons: readonly CustomReason[]
  /** True when the Hijri date came from a manually adjusted conversion */
  hilalAdjusted: boolean
  explanation: string
}

/** What to do with a Daud fasting turn that lands on a Haram day */
export type DaudStrategy = 'skip' | 'postpone'
