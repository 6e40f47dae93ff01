import { describe, it, expect } from 'vitest'
import { boltStrength, boltArea, shearCapacity, bearingCapacity } from '../src/model/capacity'
import { BOLT_DIAMETERS, BOLT_GRADES, PLATE_GRADES, lookupPlateGrade, plateGradeNames } from '../src/model/catalog'

describe('boltStrength', () => {
  it('fu from the whole part, fy from the fractional part', () => {
    const cases: [number, number, number][] = [
      [3.6, 300, 180],
      [4.6, 400, 240],
      [5.8, 500, 400],
      [8.8, 800, 640],
      [10.9, 1000, 900],
    ]
    for (const [grade, fu, fy] of cases) {
      const s = boltStrength(grade)
      expect(s.fu).toBe(fu)
      expect(s.fy).toBeCloseTo(fy, 6)
    }
  })

  it('accepts values outside the catalog', () => {
    const s = boltStrength(12.5)
    expect(s.fu).toBe(1200)
    expect(s.fy).toBeCloseTo(600, 6)
  })

  it('integer grade gives zero yield strength', () => {
    expect(boltStrength(4)).toEqual({ fu: 400, fy: 0 })
  })
})

describe('capacity formulas', () => {
  it('bolt area is the full shank circle', () => {
    expect(boltArea(10)).toBeCloseTo(78.539816, 5)
    expect(boltArea(20)).toBeCloseTo(4 * boltArea(10), 9)
  })

  it('shear capacity = 0.6 · fy · A', () => {
    expect(shearCapacity(240, 100)).toBeCloseTo(14400, 9)
    expect(shearCapacity(0, 100)).toBe(0)
  })

  it('bearing capacity = 2.5 · fu · t · d', () => {
    expect(bearingCapacity(550, 20, 10)).toBe(275000)
    expect(bearingCapacity(410, 12, 16)).toBe(196800)
  })
})

describe('catalogs', () => {
  it('bolt catalogs are in ascending order', () => {
    expect(BOLT_DIAMETERS).toEqual([10, 12, 16, 20, 24])
    expect(BOLT_GRADES).toEqual([3.6, 4.6, 4.8, 5.6, 5.8, 6.8, 8.8, 10.9])
  })

  it('eight plate grades, yield below ultimate', () => {
    expect(plateGradeNames()).toEqual(['E250', 'E275', 'E300', 'E350', 'E410', 'E450', 'E500', 'E550'])
    for (const s of Object.values(PLATE_GRADES)) {
      expect(s.fy).toBeLessThan(s.fu)
    }
  })

  it('lookup by name', () => {
    expect(lookupPlateGrade('E350')).toEqual({ fy: 350, fu: 510 })
    expect(lookupPlateGrade('E999')).toBeUndefined()
  })

  it('lookup ignores inherited object keys', () => {
    expect(lookupPlateGrade('toString')).toBeUndefined()
    expect(lookupPlateGrade('constructor')).toBeUndefined()
  })
})
