export type LapJointErrorKind = 'invalid-input' | 'invalid-plate-grade' | 'no-feasible-design'

export class InvalidInputError extends Error {
  readonly kind = 'invalid-input' satisfies LapJointErrorKind

  constructor(readonly issues: string[]) {
    super(`Invalid design input: ${issues.join('; ')}`)
    this.name = 'InvalidInputError'
  }
}

export class InvalidPlateGradeError extends Error {
  readonly kind = 'invalid-plate-grade' satisfies LapJointErrorKind

  constructor(readonly grade: string, readonly validGrades: string[]) {
    super(`Invalid plate grade: ${grade}. Available grades are ${validGrades.join(', ')}`)
    this.name = 'InvalidPlateGradeError'
  }
}

export class NoFeasibleDesignError extends Error {
  readonly kind = 'no-feasible-design' satisfies LapJointErrorKind

  constructor(readonly load: number) {
    super(`No suitable design found for ${load} kN`)
    this.name = 'NoFeasibleDesignError'
  }
}

export type LapJointError = InvalidInputError | InvalidPlateGradeError | NoFeasibleDesignError

// Thrown by createDesigner, never carried in an outcome
export class InvalidConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid designer config: ${issues.join('; ')}`)
    this.name = 'InvalidConfigError'
  }
}
