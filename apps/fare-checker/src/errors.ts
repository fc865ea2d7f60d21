/**
 * Error types for the fare checker.
 *
 * Only ConfigError and RefreshRunError end a run. InvalidSubjectError is
 * caught per subject and recorded in the run summary.
 */

export class ConfigError extends Error {
  readonly code = 'CONFIG_INVALID'

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`)
    this.name = 'ConfigError'
  }
}

export type RefreshRunErrorCode = 'LISTING_FAILED'

export class RefreshRunError extends Error {
  constructor(
    readonly code: RefreshRunErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'RefreshRunError'
  }
}

export class InvalidSubjectError extends Error {
  readonly code = 'INVALID_SUBJECT'

  constructor(
    readonly subjectId: string,
    message: string
  ) {
    super(message)
    this.name = 'InvalidSubjectError'
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message || error.name
  return String(error)
}
