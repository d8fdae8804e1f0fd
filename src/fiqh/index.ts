/**
 * fiqh — Fasting status of a day from its Hijri date and weekday.
 *
 * Every rule in RULES is a predicate over (Hijri date, weekday) tagged with a
 * fasting type and the status it implies. Resolution:
 *
 *   1. Collect every matching calendar and weekday rule, in table order.
 *   2. A Haram match is exclusive: only the Haram tags are kept and custom
 *      rules are not consulted.
 *   3. Ramadhan is exclusive among the built-in tags: reasons = [Ramadhan].
 *   4. Singling out Friday or Saturday applies only when no calendar
 *      (non-weekday) rule matched.
 *   5. Primary status = highest status among the reasons and custom reasons,
 *      Mubah when nothing matched.
 *
 * Status order: Haram > Wajib > SunnahMuakkadah > Sunnah > Makruh > Mubah.
 */

import type {
  CustomFastingRule,
  CustomReason,
  FastingAnalysis,
  FastingStatus,
  FastingType,
  HijriDate,
  Weekday,
} from '../types.js'
import { STATUS_LABELS, STATUS_PRIORITY, WEEKDAY_NAMES } from '../types.js'
import { formatHijriDate } from '../calendar/index.js'

// ─── Month and day constants ──────────────────────────────────────────────────

const MUHARRAM = 1
const RAMADHAN = 9
const SHAWWAL = 10
const DHU_AL_HIJJAH = 12

const FRIDAY: Weekday = 5
const SATURDAY: Weekday = 6

// ─── Status ordering ──────────────────────────────────────────────────────────

/** Negative when a ranks below b, 0 when equal, positive above */
export function compareStatus(a: FastingStatus, b: FastingStatus): number {
  return STATUS_PRIORITY[a] - STATUS_PRIORITY[b]
}

/** Highest-priority status in the list; Mubah for an empty list */
export function maxStatus(statuses: Iterable<FastingStatus>): FastingStatus {
  let best: FastingStatus = 'Mubah'
  for (const status of statuses) {
    if (compareStatus(status, best) > 0) best = status
  }
  return best
}

// ─── Rule table ───────────────────────────────────────────────────────────────

/**
 * calendar: depends on the Hijri date
 * weekday:  depends only on the day of week
 * singling: the day is singled out for fasting; suppressed by any calendar match
 */
export type RuleKind = 'calendar' | 'weekday' | 'singling'

export interface FastingRule {
  type: FastingType
  status: FastingStatus
  kind: RuleKind
  matches(hijri: HijriDate, weekday: Weekday): boolean
}

export const RULES: readonly FastingRule[] = [
  {
    type: 'EidAlFitr',
    status: 'Haram',
    kind: 'calendar',
    matches: h => h.month === SHAWWAL && h.day === 1,
  },
  {
    type: 'EidAlAdha',
    status: 'Haram',
    kind: 'calendar',
    matches: h => h.month === DHU_AL_HIJJAH && h.day === 10,
  },
  {
    type: 'Tashriq',
    status: 'Haram',
    kind: 'calendar',
    matches: h => h.month === DHU_AL_HIJJAH && h.day >= 11 && h.day <= 13,
  },
  {
    type: 'Ramadhan',
    status: 'Wajib',
    kind: 'calendar',
    matches: h => h.month === RAMADHAN,
  },
  {
    type: 'Arafah',
    status: 'SunnahMuakkadah',
    kind: 'calendar',
    matches: h => h.month === DHU_AL_HIJJAH && h.day === 9,
  },
  {
    type: 'Ashura',
    status: 'SunnahMuakkadah',
    kind: 'calendar',
    matches: h => h.month === MUHARRAM && h.day === 10,
  },
  {
    type: 'Tasua',
    status: 'Sunnah',
    kind: 'calendar',
    matches: h => h.month === MUHARRAM && h.day === 9,
  },
  {
    type: 'AyyamulBidh',
    status: 'Sunnah',
    kind: 'calendar',
    matches: h => h.day >= 13 && h.day <= 15,
  },
  {
    type: 'Shawwal',
    status: 'Sunnah',
    kind: 'calendar',
    matches: h => h.month === SHAWWAL && h.day >= 2,
  },
  {
    type: 'Monday',
    status: 'Sunnah',
    kind: 'weekday',
    matches: (_h, w) => w === 1,
  },
  {
    type: 'Thursday',
    status: 'Sunnah',
    kind: 'weekday',
    matches: (_h, w) => w === 4,
  },
  {
    type: 'SingledOutFriday',
    status: 'Makruh',
    kind: 'singling',
    matches: (_h, w) => w === FRIDAY,
  },
  {
    type: 'SingledOutSaturday',
    status: 'Makruh',
    kind: 'singling',
    matches: (_h, w) => w === SATURDAY,
  },
]

const STATUS_OF: ReadonlyMap<FastingType, FastingStatus> = new Map(
  RULES.map((rule): [FastingType, FastingStatus] => [rule.type, rule.status]),
)

export function statusOf(type: FastingType): FastingStatus {
  return STATUS_OF.get(type) ?? 'Mubah'
}

// ─── Explanation ──────────────────────────────────────────────────────────────

export const FASTING_TYPE_LABELS: Readonly<Record<FastingType, string>> = {
  Ramadhan: 'Ramadhan',
  Arafah: 'Day of Arafah',
  Ashura: 'Ashura (10 Muharram)',
  Tasua: "Tasu'a (9 Muharram)",
  AyyamulBidh: 'Ayyamul Bidh (13-15 of the month)',
  Monday: 'Monday fast',
  Thursday: 'Thursday fast',
  Shawwal: 'Six days of Shawwal',
  EidAlFitr: 'Eid al-Fitr',
  EidAlAdha: 'Eid al-Adha',
  Tashriq: 'Days of Tashriq',
  SingledOutFriday: 'Singling out Friday',
  SingledOutSaturday: 'Singling out Saturday',
}

/**
 * "15 Ramadhan 1445 AH, Monday: Wajib (obligatory). Reasons: Ramadhan."
 */
export function explain(
  hijri: HijriDate,
  weekday: Weekday,
  status: FastingStatus,
  reasons: readonly FastingType[],
  customReasons: readonly CustomReason[],
  hilalAdjusted: boolean,
): string {
  const labels = [
    ...reasons.map(type => FASTING_TYPE_LABELS[type]),
    ...customReasons.map(reason => `${reason.name} (${reason.status})`),
  ]
  let text = `${formatHijriDate(hijri)}, ${WEEKDAY_NAMES[weekday]}: ${STATUS_LABELS[status]}.`
  text += labels.length > 0 ? ` Reasons: ${labels.join(', ')}.` : ' No specific ruling applies.'
  if (hilalAdjusted) text += ' Hijri date adjusted for local moon sighting.'
  return text
}

// ─── Resolution ───────────────────────────────────────────────────────────────

/**
 * Resolve the fasting status of a day.
 *
 * @param hilalAdjusted - Whether `hijri` came from a manually adjusted conversion
 * @param customRules - Extra rules evaluated after the table, in order
 */
export function resolve(
  hijri: HijriDate,
  weekday: Weekday,
  hilalAdjusted = false,
  customRules: readonly CustomFastingRule[] = [],
): FastingAnalysis {
  const matched = RULES.filter(rule => rule.kind !== 'singling' && rule.matches(hijri, weekday))

  let reasons: FastingType[]
  let customReasons: CustomReason[] = []

  const haram = matched.filter(rule => rule.status === 'Haram')
  if (haram.length > 0) {
    reasons = haram.map(rule => rule.type)
  } else {
    if (matched.some(rule => rule.type === 'Ramadhan')) {
      reasons = ['Ramadhan']
    } else {
      reasons = matched.map(rule => rule.type)
      if (!matched.some(rule => rule.kind === 'calendar')) {
        for (const rule of RULES) {
          if (rule.kind === 'singling' && rule.matches(hijri, weekday)) reasons.push(rule.type)
        }
      }
    }

    customReasons = customRules.flatMap(rule => {
      const status = rule.evaluate(hijri, weekday)
      return status === null ? [] : [{ name: rule.name, status }]
    })
  }

  const primaryStatus = maxStatus([
    ...reasons.map(statusOf),
    ...customReasons.map(reason => reason.status),
  ])

  return Object.freeze({
    hijri,
    weekday,
    primaryStatus,
    reasons: Object.freeze(reasons),
    customReasons: Object.freeze(customReasons),
    hilalAdjusted,
    explanation: explain(hijri, weekday, primaryStatus, reasons, customReasons, hilalAdjusted),
  })
}
