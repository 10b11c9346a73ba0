import { describe, expect, it } from 'vitest'
import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { loadRow } from '../cells.js'
import { decodeRow } from '../decode.js'
import { MissingCellError } from '../errors.js'
import { ProxyRow } from '../proxy.js'

function readFixture(name: string): string {
  return readFileSync(fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url)), 'utf8')
}

function rowWithCells(cells: string[]): string {
  return `<tr>${cells.map(cell => `<td>${cell}</td>`).join('')}</tr>`
}

describe('ProxyRow', () => {
  it('decodes an obfuscated https row', () => {
    const proxy = ProxyRow.fromHtml(readFixture('row-https.html'))

    expect(proxy.lastSeenSeconds).toBe(90)
    expect(proxy.ip).toBe('10.8.0.4')
    expect(proxy.port).toBe(8080)
    expect(proxy.country).toBe('germany')
    expect(proxy.speedMs).toBe(350)
    expect(proxy.connectionTimeMs).toBe(120)
    expect(proxy.protocol).toBe('https')
    expect(proxy.anonymity).toBe('high +ka')
    expect(proxy.url).toBe('https://10.8.0.4:8080')
    expect(proxy.valid).toBe(true)
  })

  it('classifies an https row with high anonymity as secure', () => {
    const proxy = ProxyRow.fromHtml(readFixture('row-https.html'))

    expect(proxy.isHttps).toBe(true)
    expect(proxy.isHttp).toBe(false)
    expect(proxy.isSocks).toBe(false)
    expect(proxy.supportsSsl).toBe(true)
    expect(proxy.isAnonymous).toBe(true)
    expect(proxy.isSecure).toBe(true)
  })

  it('decodes a socks row without a decoder table', () => {
    const proxy = ProxyRow.fromHtml(readFixture('row-socks.html'))

    expect(proxy.lastSeenSeconds).toBe(7_500)
    expect(proxy.ip).toBe('192.168.1.25')
    expect(proxy.port).toBe(1080)
    expect(proxy.protocol).toBe('socks')
    expect(proxy.isSocks).toBe(true)
    expect(proxy.supportsSsl).toBe(true)
    expect(proxy.isAnonymous).toBe(false)
    expect(proxy.isSecure).toBe(false)
    expect(proxy.url).toBe('socks://192.168.1.25:1080')
  })

  it('degrades non-numeric speed and missing connection time to 0', () => {
    const proxy = ProxyRow.fromHtml(readFixture('row-socks.html'))

    expect(proxy.speedMs).toBe(0)
    expect(proxy.connectionTimeMs).toBe(0)
  })

  it('is not secure over https without high anonymity', () => {
    const proxy = ProxyRow.fromHtml(
      rowWithCells(['5 sec', '1.2.3.4', '443', 'us', '', '', 'HTTPS', 'Low'])
    )

    expect(proxy.isHttps).toBe(true)
    expect(proxy.isSecure).toBe(false)
  })

  it('keeps the alias accessors in step', () => {
    const proxy = ProxyRow.fromHtml(readFixture('row-https.html'))

    expect(proxy.lastTest).toBe(proxy.lastSeenSeconds)
    expect(proxy.responseTime).toBe(proxy.speedMs)
    expect(proxy.type).toBe(proxy.protocol)
  })

  it('caches fields after first access', () => {
    const proxy = ProxyRow.fromHtml(readFixture('row-https.html'))

    expect(proxy.port).toBe(8080)
    proxy.row.cell('port').text('3128')

    expect(proxy.port).toBe(8080)
    expect(new ProxyRow(proxy.row).port).toBe(3128)
  })

  it('renders its url in toString', () => {
    const proxy = ProxyRow.fromHtml(readFixture('row-https.html'))

    expect(String(proxy)).toBe('<Proxy https://10.8.0.4:8080>')
  })

  it('reports a malformed ip through valid', () => {
    const proxy = ProxyRow.fromHtml(
      rowWithCells(['5 sec', '1.2.3', '80', 'us', '', '', 'HTTP', 'High'])
    )

    expect(proxy.ip).toBe('1.2.3')
    expect(proxy.valid).toBe(false)
    expect(proxy.url).toBe('http://1.2.3:80')
  })

  it('throws MissingCellError when a field column is absent', () => {
    const proxy = ProxyRow.fromHtml(rowWithCells(['5 sec', '1.2.3.4']))

    expect(proxy.ip).toBe('1.2.3.4')
    expect(() => proxy.port).toThrow(MissingCellError)
  })
})

describe('decodeRow', () => {
  it('returns a frozen record matching the facade', () => {
    const record = decodeRow(loadRow(readFixture('row-https.html')))

    expect(Object.isFrozen(record)).toBe(true)
    expect(record).toEqual({
      lastSeenSeconds: 90,
      ip: '10.8.0.4',
      port: 8080,
      country: 'germany',
      speedMs: 350,
      connectionTimeMs: 120,
      protocol: 'https',
      anonymity: 'high +ka',
      url: 'https://10.8.0.4:8080',
      valid: true,
      isHttp: false,
      isHttps: true,
      isSocks: false,
      supportsSsl: true,
      isAnonymous: true,
      isSecure: true,
    })
  })

  it('formats url as protocol://ip:port', () => {
    const record = decodeRow(loadRow(readFixture('row-socks.html')))

    expect(record.url).toBe(`${record.protocol}://${record.ip}:${record.port}`)
  })

  it('is idempotent and leaves the row untouched', () => {
    const row = loadRow(readFixture('row-https.html'))
    const before = row.$.html()

    const first = decodeRow(row)
    const second = decodeRow(row)

    expect(second).toEqual(first)
    expect(row.$.html()).toBe(before)
  })

  it('throws for a row missing the country column', () => {
    const row = loadRow(rowWithCells(['5 sec', '1.2.3.4', '80']))

    expect(() => decodeRow(row)).toThrow(MissingCellError)
    try {
      decodeRow(row)
    } catch (error) {
      expect(error).toBeInstanceOf(MissingCellError)
      if (!(error instanceof MissingCellError)) return
      expect(error.position).toBe(4)
      expect(error.field).toBe('country')
      expect(error.errorCode).toBe('MISSING_CELL')
    }
  })

  it('throws for a row missing the port column', () => {
    const row = loadRow(rowWithCells(['5 sec', '1.2.3.4']))

    expect(() => decodeRow(row)).toThrow('row has no cell at position 3 (port)')
  })

  it('treats a fragment without a row as having no cells', () => {
    expect(() => decodeRow(loadRow('<p>no table here</p>'))).toThrow(MissingCellError)
  })
})
