import { describe, expect, it } from 'vitest'
import { calculateVisibility, describeVisibility, evaluateCriteria } from './index.js'
import { findSunset } from '../events/index.js'
import { unwrap } from '../errors/index.js'
import { VISIBILITY_CRITERIA } from '../types.js'
import type { VisibilityReport } from '../types.js'

const JAKARTA = { latitude: -6.2088, longitude: 106.8456 }

function sunsetOn(day: string): Date {
  return unwrap(findSunset(new Date(`${day}T00:00:00Z`), JAKARTA))
}

describe('evaluateCriteria', () => {
  it('requires both thresholds', () => {
    expect(evaluateCriteria(3, 6.4, 0, VISIBILITY_CRITERIA.MABIMS)).toBe(true)
    expect(evaluateCriteria(2.99, 10, 0, VISIBILITY_CRITERIA.MABIMS)).toBe(false)
    expect(evaluateCriteria(10, 6.39, 0, VISIBILITY_CRITERIA.MABIMS)).toBe(false)
  })

  it('credits horizon dip to the altitude', () => {
    expect(evaluateCriteria(2.8, 7, 0.293, VISIBILITY_CRITERIA.MABIMS)).toBe(true)
  })
})

describe('calculateVisibility in Jakarta, March 2024', () => {
  it('fails MABIMS at the 2024-03-10 sunset, the day of conjunction', () => {
    const report = unwrap(calculateVisibility(sunsetOn('2024-03-10'), JAKARTA, VISIBILITY_CRITERIA.MABIMS))
    expect(report.moonAltitude).toBeGreaterThan(0.6)
    expect(report.moonAltitude).toBeLessThan(1.0)
    expect(report.elongation).toBeGreaterThan(2.3)
    expect(report.elongation).toBeLessThan(2.7)
    expect(report.meetsCriteria).toBe(false)
  })

  it('passes MABIMS at the 2024-03-11 sunset', () => {
    const report = unwrap(calculateVisibility(sunsetOn('2024-03-11'), JAKARTA, VISIBILITY_CRITERIA.MABIMS))
    expect(report.moonAltitude).toBeCloseTo(12.07, 1)
    expect(report.elongation).toBeCloseTo(15.48, 1)
    expect(report.meetsCriteria).toBe(true)
    expect(report.criteria).toEqual({ minAltitude: 3, minElongation: 6.4 })
  })

  it('reports a set Moon unclamped before the conjunction', () => {
    const report = unwrap(calculateVisibility(sunsetOn('2024-03-07'), JAKARTA, VISIBILITY_CRITERIA.MABIMS))
    expect(report.moonAltitude).toBeLessThan(-30)
    expect(report.meetsCriteria).toBe(false)
  })

  it('puts the Sun near the horizon at sunset', () => {
    const report = unwrap(calculateVisibility(sunsetOn('2024-03-10'), JAKARTA, VISIBILITY_CRITERIA.MABIMS))
    expect(report.sunAltitude).toBeCloseTo(-0.06, 1)
    expect(report.horizonDip).toBe(0)
  })

  it('takes the thresholds from the caller', () => {
    const sunset = sunsetOn('2024-03-10')
    const loose = unwrap(calculateVisibility(sunset, JAKARTA, { minAltitude: 0.5, minElongation: 2 }))
    expect(loose.meetsCriteria).toBe(true)
    const legacy = unwrap(calculateVisibility(sunset, JAKARTA, VISIBILITY_CRITERIA.MABIMS_LEGACY))
    expect(legacy.meetsCriteria).toBe(false)
  })

  it('lets an elevated observer clear a threshold through dip', () => {
    const sunset = sunsetOn('2024-03-10')
    const criteria = { minAltitude: 1.5, minElongation: 2 }
    const sea = unwrap(calculateVisibility(sunset, JAKARTA, criteria))
    const peak = unwrap(calculateVisibility(sunset, { ...JAKARTA, altitude: 1000 }, criteria))
    expect(sea.meetsCriteria).toBe(false)
    expect(peak.horizonDip).toBeCloseTo(0.92655, 4)
    expect(peak.meetsCriteria).toBe(true)
  })

  it('returns the report frozen', () => {
    const report = unwrap(calculateVisibility(sunsetOn('2024-03-11'), JAKARTA, VISIBILITY_CRITERIA.TURKEY_2016))
    expect(Object.isFrozen(report)).toBe(true)
  })

  it('keeps its own copy of the observer and instant', () => {
    const observer = { ...JAKARTA }
    const sunset = sunsetOn('2024-03-11')
    const report = unwrap(calculateVisibility(sunset, observer, VISIBILITY_CRITERIA.MABIMS))
    observer.latitude = 50
    sunset.setTime(0)
    expect(report.observer).toEqual(JAKARTA)
    expect(Object.isFrozen(report.observer)).toBe(true)
    expect(report.sunset.getTime()).not.toBe(0)
  })

  it('returns the same report for the same inputs', () => {
    const sunset = sunsetOn('2024-03-11')
    const first = calculateVisibility(sunset, JAKARTA, VISIBILITY_CRITERIA.MABIMS)
    const second = calculateVisibility(sunset, JAKARTA, VISIBILITY_CRITERIA.MABIMS)
    expect(second).toEqual(first)
  })
})

describe('calculateVisibility input errors', () => {
  it('returns InvalidCoordinate', () => {
    const result = calculateVisibility(new Date(), { latitude: 100, longitude: 0 }, VISIBILITY_CRITERIA.MABIMS)
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.kind).toBe('InvalidCoordinate')
  })

  it('returns InvalidCriteria for negative or non-finite thresholds', () => {
    for (const criteria of [{ minAltitude: -1, minElongation: 6 }, { minAltitude: 3, minElongation: Number.POSITIVE_INFINITY }]) {
      const result = calculateVisibility(new Date(), JAKARTA, criteria)
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.kind).toBe('InvalidCriteria')
    }
  })
})

describe('describeVisibility', () => {
  it('summarizes a passing report', () => {
    const report: VisibilityReport = {
      sunset: new Date('2024-03-11T11:07:20.000Z'),
      observer: JAKARTA,
      moonAltitude: 12.07,
      moonAzimuth: 273.47,
      sunAltitude: -0.06,
      elongation: 15.48,
      horizonDip: 0,
      meetsCriteria: true,
      criteria: VISIBILITY_CRITERIA.MABIMS,
    }
    expect(describeVisibility(report)).toBe(
      'Sunset: 2024-03-11 11:07:20 UTC. Moon altitude 12.07° (needs 3°), elongation 15.48° (needs 6.4°). ' +
        'Criteria met. Look West, 12.1° above the horizon.',
    )
  })

  it('says when the Moon has set', () => {
    const report: VisibilityReport = {
      sunset: new Date('2024-03-07T11:09:02.000Z'),
      observer: JAKARTA,
      moonAltitude: -33.48,
      moonAzimuth: 237.02,
      sunAltitude: -0.06,
      elongation: 41.22,
      horizonDip: 0,
      meetsCriteria: false,
      criteria: VISIBILITY_CRITERIA.MABIMS,
    }
    expect(describeVisibility(report)).toMatch(/Criteria not met\. The Moon has already set; no crescent can be seen\.$/)
  })
})
