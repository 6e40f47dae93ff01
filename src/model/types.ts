// All lengths in mm, stresses in MPa, forces in N unless stated otherwise.

export interface LapJointInput {
  /** Applied axial tension (kN) */
  load: number
  /** Plate width, across the load axis (mm) */
  width: number
  /** Thickness of the lower plate (mm) */
  thickness1: number
  /** Thickness of the upper plate (mm) */
  thickness2: number
  /** Plate steel grade name, e.g. "E410". Default: E410 */
  plateGrade?: string
}

export interface BoltSpec {
  /** Nominal shank diameter (mm) */
  diameter: number
  /** Property class X.Y: fu = X·100 MPa, fy = 0.Y·fu */
  grade: number
}

export interface MaterialStrength {
  /** Ultimate tensile strength (MPa) */
  fu: number
  /** Yield strength (MPa) */
  fy: number
}

export interface PlateStrength {
  fy: number
  fu: number
}

export interface Point2D {
  /** Along the load axis */
  x: number
  /** Across the plate width */
  z: number
}

export interface LapJointDesign {
  boltDiameter: number
  boltGrade: number
  numberOfBolts: number
  /** Centre-to-centre spacing along the load axis */
  pitch: number
  /** Distance from the plate edge to the bolt line */
  gauge: number
  endDistance: number
  edgeDistance: number
  holeDiameter: number
  /** Single-row layout: always 1 */
  numberOfRows: number
  numberOfColumns: number
  /** Design shear resistance of the bolt group (N) */
  connectionStrength: number
  /** Bearing resistance per bolt over both plates (N). Reported, never checked */
  bearingCapacity: number
  /** Demand over total bearing resistance. Reported, never checked */
  bearingUtilization: number
  yieldStrengthPlate1: number
  yieldStrengthPlate2: number
  connectionLength: number
  /** Demand over design shear resistance, <= 1 for any returned design */
  utilization: number
}

export type BelowMinimumBoltsPolicy = 'round-up' | 'reject'

export interface DesignerConfig {
  boltDiameters: readonly number[]
  boltGrades: readonly number[]
  plateGrades: Readonly<Record<string, PlateStrength>>
  safetyFactor: number
  defaultPlateGrade: string
  minBolts: number
  /** What to do with a candidate whose demand needs fewer than minBolts */
  belowMinimumBolts: BelowMinimumBoltsPolicy
}

export type CandidateStatus = 'feasible' | 'below-minimum-bolts' | 'overutilized'

export interface CandidateEvaluation {
  bolt: BoltSpec
  strength: MaterialStrength
  /** Nominal shear capacity of one bolt (N) */
  shearCapacity: number
  /** shearCapacity / safety factor (N) */
  designCapacity: number
  /** ceil(demand / designCapacity), before the minimum-bolt rule */
  requiredBolts: number
  /** Bolt count after the minimum-bolt rule; null when the candidate was screened out */
  adoptedBolts: number | null
  status: CandidateStatus
  /** Detailed record; null when the candidate was screened out before detailing */
  design: LapJointDesign | null
}
