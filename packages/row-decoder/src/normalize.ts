import type { Cheerio } from 'cheerio'
import type { Element } from 'domhandler'

/** Unit markers in match order. `sec` precedes `d` so "seconds" is not read as days. */
const DURATION_UNITS: ReadonlyArray<readonly [marker: string, seconds: number]> = [
  ['sec', 1],
  ['min', 60],
  ['h', 3_600],
  ['d', 86_400],
]

const LEADING_INTEGER = /^\s*(\d+)/
const DIGITS = /\d+/
const BARE_NUMBER = /^\d+$/

/**
 * Read a leading integer the lenient way: "350ms" is 350, "fast" and "" are 0.
 */
export function toInteger(value: string | undefined): number {
  if (!value) return 0
  const match = LEADING_INTEGER.exec(value)
  return match ? Number.parseInt(match[1], 10) : 0
}

/**
 * Convert "1 min 30 sec", "2h 5min" or "3 days" to seconds.
 *
 * Units are matched by substring. A unit token without digits borrows the bare
 * number right before it. Text without any unit totals 0.
 */
export function parseDuration(text: string): number {
  let total = 0
  let pending: number | undefined

  for (const token of text.trim().split(/\s+/)) {
    if (BARE_NUMBER.test(token)) {
      pending = Number.parseInt(token, 10)
      continue
    }

    const unit = DURATION_UNITS.find(([marker]) => token.includes(marker))
    if (!unit) continue

    const digits = DIGITS.exec(token)
    const magnitude = digits ? Number.parseInt(digits[0], 10) : pending ?? 0
    total += magnitude * unit[1]
    pending = undefined
  }

  return total
}

/**
 * Integer `value` attribute of the first nested div. Missing element,
 * missing attribute or junk all read as 0.
 */
export function readValueAttribute(cell: Cheerio<Element>, attribute = 'value'): number {
  return toInteger(cell.find('div').first().attr(attribute))
}

export function cellText(cell: Cheerio<Element>): string {
  return cell.text().trim()
}

export function lowerText(cell: Cheerio<Element>): string {
  return cellText(cell).toLowerCase()
}

/** "SOCKS4/5" and "socks5 proxy" both become "socks" */
export function protocolText(cell: Cheerio<Element>): string {
  return lowerText(cell).slice(0, 5)
}
