import { describe, expect, it } from 'vitest'
import {
  J2000,
  addDays,
  dateToJD,
  deltaT,
  instantToJDE,
  julianCenturies,
  julianMillennia,
  startOfUTCDay,
} from './index.js'

describe('Julian Date', () => {
  it('maps J2000.0 noon to 2451545.0', () => {
    expect(dateToJD(new Date(Date.UTC(2000, 0, 1, 12)))).toBe(J2000)
  })

  it('maps the Unix epoch to 2440587.5', () => {
    expect(dateToJD(new Date(0))).toBe(2440587.5)
  })

  it('counts centuries and millennia from J2000', () => {
    expect(julianCenturies(J2000 + 36525)).toBe(1)
    expect(julianMillennia(J2000 - 365250)).toBe(-1)
  })
})

describe('deltaT', () => {
  it('uses the 2005–2050 polynomial', () => {
    // y = 2024.0 exactly
    expect(deltaT(J2000 + 24 * 365.25)).toBeCloseTo(73.871344, 5)
  })

  it('uses the 1986–2005 polynomial at J2000', () => {
    expect(deltaT(J2000)).toBeCloseTo(63.86, 10)
  })

  it('shifts UTC to dynamical time by deltaT', () => {
    const jde = instantToJDE(new Date(Date.UTC(2000, 0, 1, 12)))
    expect(jde).toBeCloseTo(J2000 + 63.86 / 86400, 9)
  })
})

describe('calendar-day helpers', () => {
  it('truncates to 00:00 UTC', () => {
    expect(startOfUTCDay(new Date('2024-03-11T17:45:12Z')).toISOString()).toBe('2024-03-11T00:00:00.000Z')
  })

  it('adds whole days', () => {
    expect(addDays(new Date('2024-02-28T10:00:00Z'), 2).toISOString()).toBe('2024-03-01T10:00:00.000Z')
  })
})
