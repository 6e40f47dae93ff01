/**
 * Reference data: standard bolt sizes, bolt property classes and structural
 * steel plate grades. Iteration order of the bolt catalogs is the search order.
 */

import type { PlateStrength } from './types'

/** Nominal bolt diameters (mm), smallest first */
export const BOLT_DIAMETERS: readonly number[] = [10, 12, 16, 20, 24]

/** Bolt property classes, weakest first */
export const BOLT_GRADES: readonly number[] = [3.6, 4.6, 4.8, 5.6, 5.8, 6.8, 8.8, 10.9]

// Plate grade → (fy, fu) in MPa
export const PLATE_GRADES: Readonly<Record<string, PlateStrength>> = {
  E250: { fy: 250, fu: 410 },
  E275: { fy: 275, fu: 440 },
  E300: { fy: 300, fu: 470 },
  E350: { fy: 350, fu: 510 },
  E410: { fy: 410, fu: 550 },
  E450: { fy: 450, fu: 590 },
  E500: { fy: 500, fu: 650 },
  E550: { fy: 550, fu: 700 },
}

export const DEFAULT_PLATE_GRADE = 'E410'

/** Nominal / design resistance ratio for bolt shear (≈ 1 / 0.75) */
export const SAFETY_FACTOR = 1.33

/** A lap joint needs at least two bolts to resist rotation */
export const MIN_BOLTS = 2

export function plateGradeNames(grades: Readonly<Record<string, PlateStrength>> = PLATE_GRADES): string[] {
  return Object.keys(grades)
}

export function lookupPlateGrade(
  name: string,
  grades: Readonly<Record<string, PlateStrength>> = PLATE_GRADES,
): PlateStrength | undefined {
  return Object.prototype.hasOwnProperty.call(grades, name) ? grades[name] : undefined
}
