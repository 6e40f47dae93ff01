import { z } from 'zod'
import type { LapJointInput, DesignerConfig } from './types'

export const lapJointInputSchema = z.object({
  load:       z.number().finite().nonnegative(),
  width:      z.number().finite().positive(),
  thickness1: z.number().finite().positive(),
  thickness2: z.number().finite().positive(),
  // Membership is checked against the designer's catalog, not here
  plateGrade: z.string().min(1).optional(),
})

const strengthSchema = z.object({
  fy: z.number().finite().positive(),
  fu: z.number().finite().positive(),
})

export const designerConfigSchema = z.object({
  boltDiameters:     z.array(z.number().finite().positive()).nonempty(),
  boltGrades:        z.array(z.number().finite().positive()).nonempty(),
  plateGrades:       z.record(strengthSchema).refine(grades => Object.keys(grades).length > 0, 'Expected at least one plate grade'),
  safetyFactor:      z.number().finite().positive(),
  defaultPlateGrade: z.string().min(1),
  minBolts:          z.number().int().positive(),
  belowMinimumBolts: z.enum(['round-up', 'reject']),
})

export type ParsedInput =
  | { ok: true, input: LapJointInput }
  | { ok: false, issues: string[] }

export function parseInput(raw: unknown): ParsedInput {
  const result = lapJointInputSchema.safeParse(raw)
  if (result.success) return { ok: true, input: result.data }
  return { ok: false, issues: formatIssues(result.error) }
}

/** Issue messages for a config; empty when it is valid */
export function configIssues(config: DesignerConfig): string[] {
  const result = designerConfigSchema.safeParse(config)
  return result.success ? [] : formatIssues(result.error)
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  )
}
