import { describe, expect, it } from 'vitest'
import { RULES, compareStatus, explain, maxStatus, resolve, statusOf } from './index.js'
import type { CustomFastingRule, FastingStatus, HijriDate, Weekday } from '../types.js'
import { STATUS_PRIORITY } from '../types.js'

const SUNDAY: Weekday = 0
const MONDAY: Weekday = 1
const THURSDAY: Weekday = 4
const FRIDAY: Weekday = 5
const SATURDAY: Weekday = 6

const hijri = (month: number, day: number, year = 1445): HijriDate => ({ year, month, day })

describe('status ordering', () => {
  const statuses = Object.keys(STATUS_PRIORITY).filter((s): s is FastingStatus => s in STATUS_PRIORITY)

  it('is a strict total order', () => {
    for (const a of statuses) {
      for (const b of statuses) {
        expect(Math.sign(compareStatus(a, b)) + Math.sign(compareStatus(b, a))).toBe(0)
        if (a === b) expect(compareStatus(a, b)).toBe(0)
        else expect(compareStatus(a, b)).not.toBe(0)
      }
    }
  })

  it('ranks Haram > Wajib > SunnahMuakkadah > Sunnah > Makruh > Mubah', () => {
    const sorted = [...statuses].sort(compareStatus)
    expect(sorted).toEqual(['Mubah', 'Makruh', 'Sunnah', 'SunnahMuakkadah', 'Wajib', 'Haram'])
  })

  it('picks the maximum', () => {
    expect(maxStatus(['Sunnah', 'Haram', 'Makruh'])).toBe('Haram')
    expect(maxStatus([])).toBe('Mubah')
  })
})

describe('resolve: forbidden days', () => {
  it('makes 1 Shawwal Haram with only EidAlFitr', () => {
    const analysis = resolve(hijri(10, 1), MONDAY)
    expect(analysis.primaryStatus).toBe('Haram')
    expect(analysis.reasons).toEqual(['EidAlFitr'])
  })

  it('makes 10 Dhu al-Hijjah Haram', () => {
    expect(resolve(hijri(12, 10), THURSDAY).reasons).toEqual(['EidAlAdha'])
  })

  it('drops Ayyamul Bidh on the 13th of Dhu al-Hijjah', () => {
    const analysis = resolve(hijri(12, 13), MONDAY)
    expect(analysis.primaryStatus).toBe('Haram')
    expect(analysis.reasons).toEqual(['Tashriq'])
  })

  it('ignores custom rules on a Haram day', () => {
    const vow: CustomFastingRule = { name: 'Vow', evaluate: () => 'Wajib' }
    const analysis = resolve(hijri(12, 11), SUNDAY, false, [vow])
    expect(analysis.primaryStatus).toBe('Haram')
    expect(analysis.customReasons).toEqual([])
  })
})

describe('resolve: Ramadhan', () => {
  it('resolves 15 Ramadhan to Wajib with exactly Ramadhan', () => {
    const analysis = resolve(hijri(9, 15), MONDAY)
    expect(analysis.primaryStatus).toBe('Wajib')
    expect(analysis.reasons).toEqual(['Ramadhan'])
  })

  it('drops the singling-out tag on a Ramadhan Friday', () => {
    expect(resolve(hijri(9, 2), FRIDAY).reasons).toEqual(['Ramadhan'])
  })
})

describe('resolve: voluntary fasts', () => {
  it('keeps Arafah on a Friday without the Makruh tag', () => {
    const analysis = resolve(hijri(12, 9, 1443), FRIDAY)
    expect(analysis.primaryStatus).toBe('SunnahMuakkadah')
    expect(analysis.reasons).toEqual(['Arafah'])
  })

  it('keeps Ashura on a Saturday without the Makruh tag', () => {
    expect(resolve(hijri(1, 10), SATURDAY).reasons).toEqual(['Ashura'])
  })

  it("keeps Tasu'a and Shawwal days on Fridays as Sunnah", () => {
    expect(resolve(hijri(1, 9), FRIDAY).primaryStatus).toBe('Sunnah')
    expect(resolve(hijri(10, 2), FRIDAY).reasons).toEqual(['Shawwal'])
  })

  it('lists co-occurring reasons in table order', () => {
    const analysis = resolve(hijri(7, 13), THURSDAY)
    expect(analysis.primaryStatus).toBe('Sunnah')
    expect(analysis.reasons).toEqual(['AyyamulBidh', 'Thursday'])
  })

  it('marks a plain Monday Sunnah', () => {
    expect(resolve(hijri(8, 5), MONDAY).reasons).toEqual(['Monday'])
  })
})

describe('resolve: singling out', () => {
  it('makes a plain Friday Makruh', () => {
    const analysis = resolve(hijri(8, 5), FRIDAY)
    expect(analysis.primaryStatus).toBe('Makruh')
    expect(analysis.reasons).toEqual(['SingledOutFriday'])
  })

  it('makes a plain Saturday Makruh', () => {
    expect(resolve(hijri(8, 6), SATURDAY).reasons).toEqual(['SingledOutSaturday'])
  })

  it('leaves a plain Sunday Mubah', () => {
    const analysis = resolve(hijri(8, 7), SUNDAY)
    expect(analysis.primaryStatus).toBe('Mubah')
    expect(analysis.reasons).toEqual([])
  })
})

describe('resolve: custom rules', () => {
  const birthday: CustomFastingRule = {
    name: 'Birthday',
    evaluate: (h, _w) => (h.month === 3 && h.day === 12 ? 'Sunnah' : null),
  }

  it('adds named reasons', () => {
    const analysis = resolve(hijri(3, 12), SUNDAY, false, [birthday])
    expect(analysis.primaryStatus).toBe('Sunnah')
    expect(analysis.reasons).toEqual([])
    expect(analysis.customReasons).toEqual([{ name: 'Birthday', status: 'Sunnah' }])
  })

  it('never lowers the built-in status', () => {
    const dislike: CustomFastingRule = { name: 'Dislike', evaluate: () => 'Makruh' }
    expect(resolve(hijri(8, 5), MONDAY, false, [dislike]).primaryStatus).toBe('Sunnah')
  })

  it('can raise the status', () => {
    const vow: CustomFastingRule = { name: 'Vow', evaluate: () => 'Wajib' }
    expect(resolve(hijri(8, 5), FRIDAY, false, [vow]).primaryStatus).toBe('Wajib')
  })
})

describe('resolve: properties', () => {
  const weekdays: Weekday[] = [0, 1, 2, 3, 4, 5, 6]

  it('gives every day exactly one status equal to the max of its reasons', () => {
    for (let month = 1; month <= 12; month++) {
      for (let day = 1; day <= 30; day++) {
        for (const weekday of weekdays) {
          const analysis = resolve(hijri(month, day), weekday)
          expect(analysis.primaryStatus).toBe(maxStatus(analysis.reasons.map(statusOf)))
          if (analysis.reasons.some(type => statusOf(type) === 'Haram')) {
            expect(analysis.reasons.every(type => statusOf(type) === 'Haram')).toBe(true)
          }
          if (analysis.reasons.length > 1) {
            expect(analysis.reasons).not.toContain('SingledOutFriday')
            expect(analysis.reasons).not.toContain('SingledOutSaturday')
          }
        }
      }
    }
  })

  it('is deterministic', () => {
    expect(resolve(hijri(1, 10), MONDAY)).toEqual(resolve(hijri(1, 10), MONDAY))
  })

  it('returns a frozen analysis', () => {
    const analysis = resolve(hijri(9, 1), SUNDAY)
    expect(Object.isFrozen(analysis)).toBe(true)
    expect(Object.isFrozen(analysis.reasons)).toBe(true)
  })

  it('maps every rule type to its status', () => {
    for (const rule of RULES) expect(statusOf(rule.type)).toBe(rule.status)
  })
})

describe('explanation', () => {
  it('describes a Ramadhan day', () => {
    expect(resolve(hijri(9, 15), MONDAY).explanation).toBe(
      '15 Ramadhan 1445 AH, Monday: Wajib (obligatory). Reasons: Ramadhan.',
    )
  })

  it('describes an ordinary day', () => {
    expect(resolve(hijri(8, 7), SUNDAY).explanation).toBe(
      "7 Sha'ban 1445 AH, Sunday: Mubah (permissible). No specific ruling applies.",
    )
  })

  it('mentions custom reasons and a hilal adjustment', () => {
    expect(explain(hijri(3, 12), MONDAY, 'Sunnah', ['Monday'], [{ name: 'Birthday', status: 'Sunnah' }], true)).toBe(
      "12 Rabi' al-Awwal 1445 AH, Monday: Sunnah (recommended). Reasons: Monday fast, Birthday (Sunnah). " +
        'Hijri date adjusted for local moon sighting.',
    )
  })
})
