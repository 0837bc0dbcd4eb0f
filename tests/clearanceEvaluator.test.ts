import { describe, it, expect } from 'vitest'
import {
  sideOf,
  classify,
  roundByOutcome,
  roundMargin,
  correctNearestDistance,
  evaluate,
  evaluateBatch,
  clearanceProfile,
} from '../services/clearanceEvaluator'
import { toRailFrame } from '../services/trackGeometry'
import { DataIntegrityError, OutOfRangeError, ValidationError } from '../services/errors'
import { CLEARANCE_CONFIG } from '../constants'
import type { ClearanceConfig, TrackGeometry } from '../types'

const REFERENCE: TrackGeometry = { radius: 160, cantMm: 105, electrification: 'DC', direction: 'cw' }
const STRAIGHT: TrackGeometry = { radius: 'straight', cantMm: 0, electrification: 'DC' }

describe('classify and rounding', () => {
  it('classifies on the raw margin', () => {
    expect(classify(0)).toBe('SAFE')
    expect(classify(0.01)).toBe('SAFE')
    expect(classify(-0.01)).toBe('INTRUSION')
  })

  it('rounds up on intrusion and down when clear', () => {
    expect(roundByOutcome(1842.2, 'INTRUSION')).toBe(1843)
    expect(roundByOutcome(1842.8, 'SAFE')).toBe(1842)
  })

  it('rounds the margin on its magnitude so an intrusion never reads as zero', () => {
    expect(roundMargin(-0.4, 'INTRUSION')).toBe(-1)
    expect(roundMargin(-3.2, 'INTRUSION')).toBe(-4)
    expect(roundMargin(0.4, 'SAFE')).toBe(0)
    expect(Object.is(roundMargin(0.4, 'SAFE'), 0)).toBe(true)
    expect(roundMargin(267.43, 'SAFE')).toBe(267)
  })

  it('corrects the nearest distance by band', () => {
    expect(correctNearestDistance(0)).toBe(0)
    expect(correctNearestDistance(4.99)).toBe(0)
    expect(correctNearestDistance(5)).toBe(0)
    expect(correctNearestDistance(12)).toBeCloseTo(Math.sqrt(119), 12)
    expect(correctNearestDistance(13)).toBe(13)
    expect(correctNearestDistance(20.5)).toBe(20.5)
  })

  it('picks the side from the sign of the distance', () => {
    expect(sideOf(2110)).toBe('right')
    expect(sideOf(0)).toBe('right')
    expect(sideOf(-2110)).toBe('left')
  })
})

describe('evaluate', () => {
  it('reproduces the reference scenario', () => {
    const result = evaluate(REFERENCE, { distanceMm: 2110, heightMm: 3150 })
    expect(result.status).toBe('SAFE')
    expect(result.side).toBe('right')
    expect(result.requiredClearanceMm).toBe(1842)
    expect(result.marginMm).toBe(267)
    expect(result.measuredClearanceMm).toBe(2110)
    expect(result.raw.requiredClearanceMm).toBeCloseTo(1842.5713, 4)
    expect(result.raw.marginMm).toBeCloseTo(267.4287, 4)
    expect(result.calculatedParams).toMatchObject({
      wideningMm: 144.375,
      upperWideningMm: 72.1875,
      slackMm: 20,
      innerSide: 'right',
      electrification: 'DC'
    })
  })

  it('evaluates the outer side of the same curve', () => {
    const result = evaluate(REFERENCE, { distanceMm: -2110, heightMm: 3150 })
    expect(result.side).toBe('left')
    expect(result.status).toBe('SAFE')
    expect(result.raw.requiredClearanceMm).toBeCloseTo(1286.6017, 4)
    expect(result.requiredClearanceMm).toBe(1286)
    expect(result.marginMm).toBe(823)
  })

  it('reports an intrusion with conservative rounding', () => {
    const result = evaluate(REFERENCE, { distanceMm: 1800, heightMm: 3150 })
    expect(result.status).toBe('INTRUSION')
    expect(result.requiredClearanceMm).toBe(1843)
    expect(result.marginMm).toBe(-43)
  })

  it('never lets rounding turn an intrusion into a pass', () => {
    // Straight track at 175 mm needs exactly 1400 mm
    for (const distanceMm of [1399, 1399.6, 1399.99, 1400, 1400.4, 1401]) {
      const result = evaluate(STRAIGHT, { distanceMm, heightMm: 175 })
      if (result.raw.marginMm < 0) {
        expect(result.status).toBe('INTRUSION')
        expect(result.marginMm).toBeLessThan(0)
        expect(result.requiredClearanceMm).toBeGreaterThan(distanceMm)
      } else {
        expect(result.status).toBe('SAFE')
        expect(result.marginMm).toBeGreaterThanOrEqual(0)
        expect(result.requiredClearanceMm).toBeLessThanOrEqual(distanceMm)
      }
    }
    expect(evaluate(STRAIGHT, { distanceMm: 1399.6, heightMm: 175 }).marginMm).toBe(-1)
    expect(evaluate(STRAIGHT, { distanceMm: 1400, heightMm: 175 })).toMatchObject({ status: 'SAFE', marginMm: 0, requiredClearanceMm: 1400 })
    expect(evaluate(STRAIGHT, { distanceMm: 1400.4, heightMm: 175 }).marginMm).toBe(0)
  })

  it('keeps the measurement point where it was entered, whatever the cant', () => {
    for (const cantMm of [0, 50, 105]) {
      const point = { distanceMm: -1950, heightMm: 3560 }
      const result = evaluate({ ...REFERENCE, cantMm }, point)
      expect(result.measurementPoint).toEqual({ distanceMm: -1950, heightMm: 3560 })
      expect(point).toEqual({ distanceMm: -1950, heightMm: 3560 })
    }
  })

  it('agrees on the outcome with the rail-frame reading of the point', () => {
    const point = { distanceMm: 2110, heightMm: 3150 }
    const postFix = evaluate(REFERENCE, point)
    const railPoint = toRailFrame(point, 105, 'cw')
    const preFix = evaluate({ ...REFERENCE, cantMm: 0 }, railPoint)
    expect(preFix.status).toBe(postFix.status)
    expect(preFix.raw.marginMm).toBeCloseTo(267.0724, 4)
    expect(preFix.marginMm).toBe(267)
  })

  it('finds the nearest point on the boundary', () => {
    const result = evaluate(STRAIGHT, { distanceMm: 2000, heightMm: 1000 })
    expect(result.nearest.distanceMm).toBeCloseTo(100, 9)
    expect(result.nearest.point.lateralMm).toBeCloseTo(1900, 9)
  })

  it('reports the corrected nearest distance rounded by outcome', () => {
    // The vertical edge x = 1900 runs from 920 to 1900 mm; 1410 projects onto its midpoint
    const at = (distanceMm: number) => evaluate(STRAIGHT, { distanceMm, heightMm: 1410 })
    expect(at(1903).nearest).toMatchObject({ distanceMm: 3, correctedMm: 0 })
    expect(at(1912).nearest).toMatchObject({ distanceMm: 12, correctedMm: 10 })
    expect(at(1920.5).nearest).toMatchObject({ distanceMm: 20.5, correctedMm: 20 })

    const inside = at(1890)
    expect(inside.status).toBe('INTRUSION')
    expect(inside.nearest).toMatchObject({ distanceMm: 10, correctedMm: 9 })
  })

  it('flags a point under the lowered centre of the canted roof', () => {
    // Only the outer side reaches 5180 mm once the roof is tilted
    const result = evaluate(REFERENCE, { distanceMm: 100, heightMm: 5180 })
    expect(result.side).toBe('right')
    expect(result.status).toBe('INTRUSION')
    expect(result.raw.requiredClearanceMm).toBeCloseTo(362.4959, 4)
    expect(result.requiredClearanceMm).toBe(363)
    expect(result.marginMm).toBe(-263)
  })

  it('reads the floor line below the raised outer base', () => {
    // The outer base sits 134 mm up; at 50 mm the rail-top edge bounds the envelope
    const result = evaluate(REFERENCE, { distanceMm: -1300, heightMm: 50 })
    expect(result.side).toBe('left')
    expect(result.status).toBe('SAFE')
    expect(result.raw.requiredClearanceMm).toBeCloseTo(508.0952, 4)
    expect(result.requiredClearanceMm).toBe(508)
    expect(result.marginMm).toBe(791)
  })

  it('rejects out-of-domain input', () => {
    const point = { distanceMm: 2110, heightMm: 3150 }
    const cases: Array<[TrackGeometry, string]> = [
      [{ ...REFERENCE, radius: 0 }, 'radius'],
      [{ ...REFERENCE, radius: -160 }, 'radius'],
      [{ ...REFERENCE, radius: 50 }, 'radius'],
      [{ ...REFERENCE, radius: Number.NaN }, 'radius'],
      [{ ...REFERENCE, cantMm: -1 }, 'cantMm'],
    ]
    for (const [geometry, field] of cases) {
      try {
        evaluate(geometry, point)
        expect.unreachable()
      } catch (e) {
        expect(e).toBeInstanceOf(ValidationError)
        if (e instanceof ValidationError) expect(e.field).toBe(field)
      }
    }
    expect(() => evaluate(REFERENCE, { distanceMm: 2110, heightMm: -1 })).toThrow(ValidationError)
    expect(() => evaluate(REFERENCE, { distanceMm: Number.NaN, heightMm: 100 })).toThrow(ValidationError)
  })

  it('reports heights outside the envelope', () => {
    expect(() => evaluate(STRAIGHT, { distanceMm: 1000, heightMm: 6000 })).toThrow(OutOfRangeError)
    expect(evaluate({ ...STRAIGHT, electrification: 'AC' }, { distanceMm: 1000, heightMm: 6000 }).status).toBe('INTRUSION')
  })

  it('surfaces a malformed table as a data problem', () => {
    const config: ClearanceConfig = {
      ...CLEARANCE_CONFIG,
      electrification: {
        ...CLEARANCE_CONFIG.electrification,
        DC: {
          ...CLEARANCE_CONFIG.electrification.DC,
          envelope: [{ lateralMm: 1200, heightMm: 100 }, { lateralMm: 1200, heightMm: 50 }]
        }
      }
    }
    expect(() => evaluate(STRAIGHT, { distanceMm: 2000, heightMm: 60 }, config)).toThrow(DataIntegrityError)
  })

  it('gives the same answer on repeated calls', () => {
    const a = evaluate(REFERENCE, { distanceMm: 2110, heightMm: 3150 })
    const b = evaluate(REFERENCE, { distanceMm: 2110, heightMm: 3150 })
    expect(b).toEqual(a)
  })
})

describe('evaluateBatch', () => {
  it('isolates failures to their own entry', () => {
    const outcomes = evaluateBatch(REFERENCE, [
      { distanceMm: 2110, heightMm: 3150 },
      { distanceMm: 2110, heightMm: 9000 },
      { distanceMm: 1800, heightMm: 3150 },
    ])
    expect(outcomes.map(o => o.ok)).toEqual([true, false, true])

    const [first, second, third] = outcomes
    if (first.ok) expect(first.result.status).toBe('SAFE')
    if (!second.ok) expect(second.error).toBeInstanceOf(OutOfRangeError)
    if (third.ok) expect(third.result.status).toBe('INTRUSION')
  })
})

describe('clearanceProfile', () => {
  it('samples the required clearance over the height span', () => {
    const profile = clearanceProfile(STRAIGHT, 'right', 1000)
    expect(profile.heightMm).toEqual([0, 1000, 2000, 3000, 4000, 5000])
    expect(profile.requiredMm[0]).toBe(1225)
    expect(profile.requiredMm[1]).toBe(1900)
    expect(profile.requiredMm[2]).toBe(1900)
    expect(profile.requiredMm[3]).toBeCloseTo(1900 + 850 * (1366.5 - 1900) / 1006, 9)
    expect(profile.requiredMm[4]).toBe(1366.5)
    expect(profile.requiredMm[5]).toBe(1366.5)
  })

  it('starts at rail top even when the boundary dips below it', () => {
    const profile = clearanceProfile(REFERENCE, 'right', 500)
    expect(profile.heightMm[0]).toBe(0)
    expect(profile.heightMm[profile.heightMm.length - 1]).toBe(5000)
  })

  it('needs a positive step', () => {
    expect(() => clearanceProfile(STRAIGHT, 'right', 0)).toThrow(ValidationError)
  })
})
