import { Row, loadRow } from './cells.js'
import { deobfuscateIp, isValidIp } from './ip.js'
import {
  cellText,
  lowerText,
  parseDuration,
  protocolText,
  readValueAttribute,
  toInteger,
} from './normalize.js'
import type { ProxyRecord } from './types.js'

/**
 * Attributes of one proxy server, read from a single listing row.
 *
 * Fields are computed on first access and cached. Accessing a field whose
 * column is missing throws MissingCellError.
 *
 * @example
 * ```ts
 * const proxy = ProxyRow.fromHtml(rowHtml)
 * proxy.ip       // '178.22.148.122'
 * proxy.port     // 3129
 * proxy.protocol // 'https'
 * proxy.url      // 'https://178.22.148.122:3129'
 * ```
 */
export class ProxyRow {
  readonly row: Row

  private cachedLastSeen?: number
  private cachedIp?: string
  private cachedPort?: number
  private cachedCountry?: string
  private cachedSpeed?: number
  private cachedConnectionTime?: number
  private cachedProtocol?: string
  private cachedAnonymity?: string

  constructor(row: Row) {
    this.row = row
  }

  static fromHtml(fragment: string): ProxyRow {
    return new ProxyRow(loadRow(fragment))
  }

  /** Seconds since the listing last checked the proxy */
  get lastSeenSeconds(): number {
    return (this.cachedLastSeen ??= parseDuration(cellText(this.row.cell('lastSeen'))))
  }

  get lastTest(): number {
    return this.lastSeenSeconds
  }

  get ip(): string {
    return (this.cachedIp ??= deobfuscateIp(this.row.$, this.row.cell('ip')))
  }

  get port(): number {
    return (this.cachedPort ??= toInteger(cellText(this.row.cell('port'))))
  }

  get country(): string {
    return (this.cachedCountry ??= lowerText(this.row.cell('country')))
  }

  /** Average response time in milliseconds */
  get speedMs(): number {
    return (this.cachedSpeed ??= readValueAttribute(this.row.cell('speed')))
  }

  get responseTime(): number {
    return this.speedMs
  }

  get connectionTimeMs(): number {
    return (this.cachedConnectionTime ??= readValueAttribute(this.row.cell('connectionTime')))
  }

  /** http, https or socks */
  get protocol(): string {
    return (this.cachedProtocol ??= protocolText(this.row.cell('protocol')))
  }

  get type(): string {
    return this.protocol
  }

  /** low, medium, high, high +ka ... */
  get anonymity(): string {
    return (this.cachedAnonymity ??= lowerText(this.row.cell('anonymity')))
  }

  get url(): string {
    return `${this.protocol}://${this.ip}:${this.port}`
  }

  get valid(): boolean {
    return isValidIp(this.ip)
  }

  get isHttp(): boolean {
    return this.protocol === 'http'
  }

  get isHttps(): boolean {
    return this.protocol === 'https'
  }

  get isSocks(): boolean {
    return this.protocol.startsWith('socks')
  }

  get supportsSsl(): boolean {
    return this.isHttps || this.isSocks
  }

  /** High anonymity or better */
  get isAnonymous(): boolean {
    return this.anonymity.startsWith('high')
  }

  get isSecure(): boolean {
    return this.isAnonymous && this.supportsSsl
  }

  /**
   * Read every field and return a frozen plain record.
   */
  toRecord(): Readonly<ProxyRecord> {
    return Object.freeze({
      lastSeenSeconds: this.lastSeenSeconds,
      ip: this.ip,
      port: this.port,
      country: this.country,
      speedMs: this.speedMs,
      connectionTimeMs: this.connectionTimeMs,
      protocol: this.protocol,
      anonymity: this.anonymity,
      url: this.url,
      valid: this.valid,
      isHttp: this.isHttp,
      isHttps: this.isHttps,
      isSocks: this.isSocks,
      supportsSsl: this.supportsSsl,
      isAnonymous: this.isAnonymous,
      isSecure: this.isSecure,
    })
  }

  toString(): string {
    return `<Proxy ${this.url}>`
  }
}
