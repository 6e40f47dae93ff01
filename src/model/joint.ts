/**
 * Bolted lap joint between two plates in axial tension.
 *
 * Search:
 *   Every bolt diameter × bolt grade of the catalog is evaluated in catalog
 *   order. The bolt count per candidate is the design shear demand rounded up:
 *     N = ceil(P / (V_b / SAFETY_FACTOR)),  V_b = 0.6 · fy_bolt · A_bolt
 *   A candidate is feasible when P / (N · V_b / SAFETY_FACTOR) <= 1.
 *   Among feasible candidates the one with the shortest connection wins;
 *   the comparison is strict, so the first one seen keeps a tie.
 *
 * Detailing (single bolt row along the load axis):
 *   end / edge distance  e = d + END_DISTANCE_ALLOWANCE
 *   pitch                p = d + PITCH_ALLOWANCE
 *   gauge                g = width / 2
 *   hole                 d + HOLE_CLEARANCE
 *   connection length    width + 2e
 *
 * Bearing resistance is computed and reported for every detailed candidate
 * but does not take part in the feasibility check.
 */

import type {
  LapJointInput,
  LapJointDesign,
  BoltSpec,
  PlateStrength,
  CandidateEvaluation,
  DesignerConfig,
  Point2D,
} from './types'
import {
  BOLT_DIAMETERS,
  BOLT_GRADES,
  PLATE_GRADES,
  DEFAULT_PLATE_GRADE,
  SAFETY_FACTOR,
  MIN_BOLTS,
  lookupPlateGrade,
  plateGradeNames,
} from './catalog'
import { boltStrength, boltArea, shearCapacity, bearingCapacity } from './capacity'
import { parseInput, configIssues } from './input'
import {
  InvalidInputError,
  InvalidPlateGradeError,
  NoFeasibleDesignError,
  InvalidConfigError,
  type LapJointError,
} from './errors'

// Detailing allowances (mm)
export const END_DISTANCE_ALLOWANCE = 5
export const PITCH_ALLOWANCE        = 10
export const HOLE_CLEARANCE         = 2

export const DEFAULT_CONFIG: Readonly<DesignerConfig> = Object.freeze({
  boltDiameters: BOLT_DIAMETERS,
  boltGrades: BOLT_GRADES,
  plateGrades: PLATE_GRADES,
  safetyFactor: SAFETY_FACTOR,
  defaultPlateGrade: DEFAULT_PLATE_GRADE,
  minBolts: MIN_BOLTS,
  belowMinimumBolts: 'round-up',
})

export type DesignOutcome =
  | { ok: true, design: LapJointDesign }
  | { ok: false, error: LapJointError }

export type EvaluationOutcome =
  | { ok: true, candidates: CandidateEvaluation[] }
  | { ok: false, error: InvalidInputError | InvalidPlateGradeError }

export interface LapJointDesigner {
  readonly config: Readonly<DesignerConfig>
  /** Every catalog combination, in search order */
  evaluateCandidates(input: LapJointInput): EvaluationOutcome
  design(input: LapJointInput): DesignOutcome
}

/**
 * Merges overrides over DEFAULT_CONFIG. A key given as undefined keeps its
 * default. Throws InvalidConfigError when the merged config fails validation.
 */
export function createDesigner(overrides: Partial<DesignerConfig> = {}): LapJointDesigner {
  const merged: DesignerConfig = {
    boltDiameters:     overrides.boltDiameters     ?? DEFAULT_CONFIG.boltDiameters,
    boltGrades:        overrides.boltGrades        ?? DEFAULT_CONFIG.boltGrades,
    plateGrades:       overrides.plateGrades       ?? DEFAULT_CONFIG.plateGrades,
    safetyFactor:      overrides.safetyFactor      ?? DEFAULT_CONFIG.safetyFactor,
    defaultPlateGrade: overrides.defaultPlateGrade ?? DEFAULT_CONFIG.defaultPlateGrade,
    minBolts:          overrides.minBolts          ?? DEFAULT_CONFIG.minBolts,
    belowMinimumBolts: overrides.belowMinimumBolts ?? DEFAULT_CONFIG.belowMinimumBolts,
  }
  const issues = configIssues(merged)
  if (issues.length > 0) throw new InvalidConfigError(issues)
  const config: Readonly<DesignerConfig> = Object.freeze(merged)

  function evaluateCandidates(input: LapJointInput): EvaluationOutcome {
    const parsed = parseInput(input)
    if (!parsed.ok) return { ok: false, error: new InvalidInputError(parsed.issues) }

    const gradeName = parsed.input.plateGrade ?? config.defaultPlateGrade
    const plate = lookupPlateGrade(gradeName, config.plateGrades)
    if (!plate) {
      return { ok: false, error: new InvalidPlateGradeError(gradeName, plateGradeNames(config.plateGrades)) }
    }

    const candidates: CandidateEvaluation[] = []
    for (const diameter of config.boltDiameters) {
      for (const grade of config.boltGrades) {
        candidates.push(evaluateCandidate({ diameter, grade }, parsed.input, plate, config))
      }
    }
    return { ok: true, candidates }
  }

  function design(input: LapJointInput): DesignOutcome {
    const evaluation = evaluateCandidates(input)
    if (!evaluation.ok) return evaluation

    let best: LapJointDesign | null = null
    let minLength = Infinity
    for (const candidate of evaluation.candidates) {
      if (candidate.status !== 'feasible' || !candidate.design) continue
      if (candidate.design.connectionLength < minLength) {
        minLength = candidate.design.connectionLength
        best = candidate.design
      }
    }

    if (!best) return { ok: false, error: new NoFeasibleDesignError(input.load) }
    return { ok: true, design: best }
  }

  return { config, evaluateCandidates, design }
}

const defaultDesigner = createDesigner()

/** Designs with the standard catalogs */
export function designLapJoint(input: LapJointInput): DesignOutcome {
  return defaultDesigner.design(input)
}

/** Unwraps an outcome, throwing the carried error on failure */
export function requireDesign(outcome: DesignOutcome): LapJointDesign {
  if (!outcome.ok) throw outcome.error
  return outcome.design
}

// ── Candidate evaluation ─────────────────────────────────────────────────────

export function evaluateCandidate(
  bolt: BoltSpec,
  input: LapJointInput,
  plate: PlateStrength,
  config: Readonly<DesignerConfig> = DEFAULT_CONFIG,
): CandidateEvaluation {
  const { diameter: d } = bolt
  const demand = input.load * 1000  // kN → N

  const strength = boltStrength(bolt.grade)
  const Vb       = shearCapacity(strength.fy, boltArea(d))
  const Vd       = Vb / config.safetyFactor

  // Integer grades give fy = 0: the count is then non-finite and the
  // utilization NaN, so such a candidate never passes the check below.
  const requiredBolts = Math.ceil(demand / Vd)

  if (requiredBolts < config.minBolts && config.belowMinimumBolts === 'reject') {
    return {
      bolt,
      strength,
      shearCapacity: Vb,
      designCapacity: Vd,
      requiredBolts,
      adoptedBolts: null,
      status: 'below-minimum-bolts',
      design: null,
    }
  }
  const nBolts = Math.max(requiredBolts, config.minBolts)

  const e = d + END_DISTANCE_ALLOWANCE
  const p = d + PITCH_ALLOWANCE
  const g = input.width / 2
  const connectionLength = input.width + 2 * e

  const Vdpb = bearingCapacity(plate.fu, input.thickness1 + input.thickness2, d)

  const connectionStrength = nBolts * Vb / config.safetyFactor
  const utilization = demand / connectionStrength

  const design: LapJointDesign = Object.freeze({
    boltDiameter: d,
    boltGrade: bolt.grade,
    numberOfBolts: nBolts,
    pitch: p,
    gauge: g,
    endDistance: e,
    edgeDistance: e,
    holeDiameter: d + HOLE_CLEARANCE,
    numberOfRows: 1,
    numberOfColumns: nBolts,
    connectionStrength,
    bearingCapacity: Vdpb,
    bearingUtilization: demand / (nBolts * Vdpb),
    yieldStrengthPlate1: plate.fy,
    yieldStrengthPlate2: plate.fy,
    connectionLength,
    utilization,
  })

  return {
    bolt,
    strength,
    shearCapacity: Vb,
    designCapacity: Vd,
    requiredBolts,
    adoptedBolts: nBolts,
    status: utilization <= 1 ? 'feasible' : 'overutilized',
    design,
  }
}

// ── Layout ───────────────────────────────────────────────────────────────────

/**
 * Bolt centres in plan. Origin at the centre of the overlap, x along the load
 * axis, z across the width. One row on the gauge line, columns at pitch.
 */
export function boltLayout(design: LapJointDesign, width: number): Point2D[] {
  const z = design.gauge - width / 2
  const n = design.numberOfColumns
  const positions: Point2D[] = []
  for (let i = 0; i < n; i++) {
    positions.push({ x: (i - (n - 1) / 2) * design.pitch, z })
  }
  return positions
}
