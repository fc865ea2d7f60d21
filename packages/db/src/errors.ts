/**
 * Raised when a database row cannot be converted into a domain model.
 */
export class RowConversionError extends Error {
  readonly code = 'ROW_CONVERSION_FAILED'

  constructor(
    readonly table: string,
    readonly issues: string[]
  ) {
    super(`Invalid ${table} row: ${issues.join('; ')}`)
    this.name = 'RowConversionError'
  }
}
