import { describe, it, expect } from 'vitest'
import {
  EnvironmentError,
  InterruptedError,
  InvalidReferenceError,
  PerFileReadError,
  toEvolveError,
} from './EvolveError'

describe('toEvolveError', () => {
  it('should keep fatal errors and their exit codes', () => {
    const invalid = new InvalidReferenceError('v9', 'unknown revision')

    expect(toEvolveError(invalid)).toBe(invalid)
    expect(invalid.exitCode).toBe(1)
    expect(new EnvironmentError('no git').exitCode).toBe(1)
    expect(new InterruptedError().exitCode).toBe(130)
  })

  it('should turn a per-file read failure into a fatal environment error', () => {
    const mapped = toEvolveError(new PerFileReadError('a.ts', 'binary'))

    expect(mapped).toBeInstanceOf(EnvironmentError)
    expect(mapped.message).toBe('Unexpected failure: Failed to analyze a.ts: binary')
    expect(mapped.exitCode).toBe(1)
  })

  it('should wrap unknown values', () => {
    expect(toEvolveError('boom').message).toBe('Unexpected failure: boom')
  })
})
