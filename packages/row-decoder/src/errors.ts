import type { ColumnName } from './types.js'

/**
 * Raised when a row lacks one of its fixed columns.
 *
 * Fatal for that row only. Batch callers skip the row and keep going.
 */
export class MissingCellError extends Error {
  readonly errorCode = 'MISSING_CELL'
  readonly position: number
  readonly field: ColumnName

  constructor(position: number, field: ColumnName) {
    super(`row has no cell at position ${position} (${field})`)
    this.name = 'MissingCellError'
    this.position = position
    this.field = field
  }
}
