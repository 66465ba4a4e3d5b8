export type EvolveErrorCode =
  | 'ENVIRONMENT'
  | 'INVALID_REFERENCE'
  | 'PER_FILE_READ'
  | 'INTERRUPTED'

/** Codes that end the run. A per-file read failure is only ever a warning. */
export type FatalErrorCode = Exclude<EvolveErrorCode, 'PER_FILE_READ'>

export const EXIT_CODE_BY_ERROR: Record<FatalErrorCode, number> = {
  ENVIRONMENT: 1,
  INVALID_REFERENCE: 1,
  INTERRUPTED: 130,
}

export abstract class EvolveError extends Error {
  abstract readonly code: EvolveErrorCode
}

export abstract class FatalEvolveError extends EvolveError {
  abstract readonly code: FatalErrorCode

  get exitCode(): number {
    return EXIT_CODE_BY_ERROR[this.code]
  }
}

/**
 * Not inside a repository, or git itself cannot be run.
 */
export class EnvironmentError extends FatalEvolveError {
  readonly code = 'ENVIRONMENT'
  readonly name = 'EnvironmentError'
}

export class InvalidReferenceError extends FatalEvolveError {
  readonly code = 'INVALID_REFERENCE'
  readonly name = 'InvalidReferenceError'

  constructor(readonly reference: string, detail?: string) {
    super(
      detail
        ? `Cannot resolve base reference "${reference}": ${detail}`
        : `Cannot resolve base reference "${reference}"`
    )
  }
}

/**
 * A single file's attribution could not be read. Never fatal: the file
 * contributes zero lines and the scan goes on.
 */
export class PerFileReadError extends EvolveError {
  readonly code = 'PER_FILE_READ'
  readonly name = 'PerFileReadError'

  constructor(readonly path: string, readonly reason: string) {
    super(`Failed to analyze ${path}: ${reason}`)
  }
}

export class InterruptedError extends FatalEvolveError {
  readonly code = 'INTERRUPTED'
  readonly name = 'InterruptedError'

  constructor(message: string = 'Interrupted') {
    super(message)
  }
}

export function isEvolveError(value: unknown): value is EvolveError {
  return value instanceof EvolveError
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Map anything thrown out of an analysis onto a fatal error, so the CLI
 * never has to print a raw stack trace.
 */
export function toEvolveError(value: unknown): FatalEvolveError {
  if (value instanceof FatalEvolveError) {
    return value
  }
  return new EnvironmentError(`Unexpected failure: ${errorMessage(value)}`)
}
