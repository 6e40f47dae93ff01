/**
 * Pure strength and resistance functions for bolted plate connections.
 * Lengths in mm, stresses in MPa, forces in N.
 */

import type { MaterialStrength } from './types'

/**
 * Bolt strengths from its property class X.Y.
 * fu = X · 100, fy = 0.Y · fu
 *
 * Any number is accepted; catalog membership is the caller's concern.
 */
export function boltStrength(grade: number): MaterialStrength {
  const whole = Math.floor(grade)
  const fu = whole * 100
  const fy = (grade - whole) * fu
  return { fu, fy }
}

/** Shank cross-section, no reduction for the threaded part */
export function boltArea(diameter: number): number {
  return Math.PI * (diameter / 2) ** 2
}

/**
 * Shear resistance of one bolt in single shear.
 * V_b = 0.6 · fy · A
 */
export function shearCapacity(fy: number, area: number): number {
  return 0.6 * fy * area
}

/**
 * Bearing resistance of the plates against one bolt.
 * V_dpb = 2.5 · fu_plate · t · d, with t the combined thickness of both plates
 */
export function bearingCapacity(fuPlate: number, totalThickness: number, diameter: number): number {
  return 2.5 * fuPlate * totalThickness * diameter
}
