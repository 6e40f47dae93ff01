import { describe, it, expect } from 'vitest'
import { parseInput } from '../src/model/input'
import { designLapJoint } from '../src/model/joint'
import { InvalidInputError } from '../src/model/errors'

const valid = { load: 50, width: 120, thickness1: 8, thickness2: 10, plateGrade: 'E350' }

function issuesOf(raw: unknown): string[] {
  const parsed = parseInput(raw)
  return parsed.ok ? [] : parsed.issues
}

describe('parseInput', () => {
  it('accepts a complete request', () => {
    expect(parseInput(valid)).toEqual({ ok: true, input: valid })
  })

  it('plate grade is optional', () => {
    const { load, width, thickness1, thickness2 } = valid
    const parsed = parseInput({ load, width, thickness1, thickness2 })
    expect(parsed.ok).toBe(true)
    if (parsed.ok) expect(parsed.input.plateGrade).toBeUndefined()
  })

  it('zero load is allowed, negative load is not', () => {
    expect(issuesOf({ ...valid, load: 0 })).toEqual([])
    const issues = issuesOf({ ...valid, load: -1 })
    expect(issues.length).toBe(1)
    expect(issues[0].startsWith('load: ')).toBe(true)
  })

  it('geometry must be positive', () => {
    const issues = issuesOf({ ...valid, width: 0, thickness2: -4 })
    expect(issues.map(i => i.split(':')[0])).toEqual(['width', 'thickness2'])
  })

  it('non-finite numbers are rejected', () => {
    expect(issuesOf({ ...valid, load: Infinity }).length).toBe(1)
    expect(issuesOf({ ...valid, thickness1: NaN }).length).toBe(1)
  })

  it('missing fields are reported by name', () => {
    const issues = issuesOf({ load: 10 })
    expect(issues.map(i => i.split(':')[0])).toEqual(['width', 'thickness1', 'thickness2'])
  })

  it('an empty grade name is malformed input', () => {
    expect(issuesOf({ ...valid, plateGrade: '' })[0].startsWith('plateGrade: ')).toBe(true)
  })
})

describe('designLapJoint boundary', () => {
  it('reports every issue at once', () => {
    const outcome = designLapJoint({ load: -5, width: 150, thickness1: 0, thickness2: 10 })
    expect(outcome.ok).toBe(false)
    if (outcome.ok) return
    expect(outcome.error).toBeInstanceOf(InvalidInputError)
    expect(outcome.error.kind).toBe('invalid-input')
    if (outcome.error instanceof InvalidInputError) {
      expect(outcome.error.issues.length).toBe(2)
      expect(outcome.error.message.startsWith('Invalid design input: load: ')).toBe(true)
    }
  })
})
