export { Row, loadRow } from './cells.js'
export { decodeRow, decodeRows, type DecodeRowsOptions } from './decode.js'
export { MissingCellError } from './errors.js'
export { loadHtml, loadRowHtml } from './html.js'
export { deobfuscateIp, isGenuineFragment, isValidIp, parseDecoderTable } from './ip.js'
export { parseDuration, readValueAttribute, toInteger } from './normalize.js'
export { ProxyRow } from './proxy.js'
export {
  COLUMNS,
  type ColumnName,
  type DecodeRowsResult,
  type ProxyRecord,
  type SkipReason,
  type SkippedRow,
} from './types.js'
