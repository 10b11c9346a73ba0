import { createLogger, type ILogger } from '@proxylist/logger'
import type { Row } from './cells.js'
import { MissingCellError } from './errors.js'
import { ProxyRow } from './proxy.js'
import type { DecodeRowsResult, ProxyRecord, SkippedRow } from './types.js'

const defaultLogger = createLogger('row-decoder')

export interface DecodeRowsOptions {
  /** Skip rows whose IP is not four dot-separated segments */
  requireValidIp?: boolean
  logger?: ILogger
}

/**
 * Decode every field of a row. Throws MissingCellError rather than
 * returning a partial record.
 */
export function decodeRow(row: Row): Readonly<ProxyRecord> {
  return new ProxyRow(row).toRecord()
}

export function decodeRows(rows: Iterable<Row>, options: DecodeRowsOptions = {}): DecodeRowsResult {
  const log = (options.logger ?? defaultLogger).child('batch')
  const records: ProxyRecord[] = []
  const skipped: SkippedRow[] = []

  let index = 0
  for (const row of rows) {
    const rowIndex = index++
    let record: Readonly<ProxyRecord>
    try {
      record = decodeRow(row)
    } catch (error) {
      if (!(error instanceof MissingCellError)) throw error
      skipped.push({ index: rowIndex, reason: 'MISSING_CELL', details: error.message })
      log.warn('Row skipped', { index: rowIndex, reason: 'MISSING_CELL', field: error.field })
      continue
    }

    if (options.requireValidIp && !record.valid) {
      skipped.push({ index: rowIndex, reason: 'MALFORMED_IP', details: `ip "${record.ip}"` })
      log.warn('Row skipped', { index: rowIndex, reason: 'MALFORMED_IP' })
      continue
    }

    records.push(record)
  }

  log.debug('Rows decoded', { decoded: records.length, skipped: skipped.length })
  return { records, skipped }
}
