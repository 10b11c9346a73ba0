/** 1-based column positions of a proxy-list row */
export const COLUMNS = {
  lastSeen: 1,
  ip: 2,
  port: 3,
  country: 4,
  speed: 5,
  connectionTime: 6,
  protocol: 7,
  anonymity: 8,
} as const

export type ColumnName = keyof typeof COLUMNS

export interface ProxyRecord {
  lastSeenSeconds: number
  ip: string
  port: number
  country: string
  speedMs: number
  connectionTimeMs: number
  protocol: string
  anonymity: string
  url: string
  valid: boolean
  isHttp: boolean
  isHttps: boolean
  isSocks: boolean
  supportsSsl: boolean
  isAnonymous: boolean
  isSecure: boolean
}

export type SkipReason = 'MISSING_CELL' | 'MALFORMED_IP'

export interface SkippedRow {
  index: number
  reason: SkipReason
  details: string
}

export interface DecodeRowsResult {
  records: ProxyRecord[]
  skipped: SkippedRow[]
}
