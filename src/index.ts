export type {
  LapJointInput,
  LapJointDesign,
  BoltSpec,
  MaterialStrength,
  PlateStrength,
  Point2D,
  CandidateEvaluation,
  CandidateStatus,
  BelowMinimumBoltsPolicy,
  DesignerConfig,
} from './model/types'
export {
  BOLT_DIAMETERS,
  BOLT_GRADES,
  PLATE_GRADES,
  DEFAULT_PLATE_GRADE,
  SAFETY_FACTOR,
  MIN_BOLTS,
  plateGradeNames,
  lookupPlateGrade,
} from './model/catalog'
export { boltStrength, boltArea, shearCapacity, bearingCapacity } from './model/capacity'
export {
  lapJointInputSchema,
  designerConfigSchema,
  parseInput,
  configIssues,
  type ParsedInput,
} from './model/input'
export {
  InvalidInputError,
  InvalidPlateGradeError,
  NoFeasibleDesignError,
  InvalidConfigError,
  type LapJointError,
  type LapJointErrorKind,
} from './model/errors'
export {
  createDesigner,
  designLapJoint,
  requireDesign,
  evaluateCandidate,
  boltLayout,
  DEFAULT_CONFIG,
  END_DISTANCE_ALLOWANCE,
  PITCH_ALLOWANCE,
  HOLE_CLEARANCE,
  type DesignOutcome,
  type EvaluationOutcome,
  type LapJointDesigner,
} from './model/joint'
export { buildJointMeshes, disposeMaterials, PLATE_TAIL } from './renderer/joint'
