import type { Cheerio, CheerioAPI } from 'cheerio'
import { isTag, isText, type AnyNode, type Element } from 'domhandler'

const NUMERAL_CLASS = /^\d+$/

/**
 * Parse the in-cell `<style>` block into the set of class names that mark
 * genuine fragments. Selectors hiding their class mention `none`; the class
 * name of the rest sits at characters 2..5 of the token, e.g. `.Xk3p{display:inline}`.
 */
export function parseDecoderTable(styleText: string): Set<string> {
  const classes = new Set<string>()
  for (const token of styleText.split(/\s+/)) {
    if (!token || token.includes('none')) continue
    const name = token.slice(1, 5)
    // A stray one-character token would otherwise admit every unclassed node
    if (name) classes.add(name)
  }
  return classes
}

/**
 * Decide whether a child node of the IP cell carries real address text.
 *
 * Order matters: an inline style settles it, then the decoder table, then a
 * numeral class, and finally bare text nodes are always genuine.
 */
export function isGenuineFragment(node: AnyNode, decoderTable: () => ReadonlySet<string>): boolean {
  if (isTag(node)) {
    const style = node.attribs.style
    if (style !== undefined) {
      // "display:inline" passes, "display:none" does not
      return style.includes('in')
    }

    const cls = node.attribs.class ?? ''
    return decoderTable().has(cls) || NUMERAL_CLASS.test(cls)
  }

  return isText(node)
}

/**
 * Rebuild the IP address from column 2. Never throws; the result may be
 * malformed and is checked by `isValidIp`.
 */
export function deobfuscateIp($: CheerioAPI, cell: Cheerio<Element>): string {
  const wrapper = cell.children('span').first()
  const container = wrapper.length > 0 ? wrapper : cell

  let table: ReadonlySet<string> | undefined
  const decoderTable = (): ReadonlySet<string> =>
    (table ??= parseDecoderTable(container.children('style').first().text()))

  return container
    .contents()
    .toArray()
    .filter(node => isGenuineFragment(node, decoderTable))
    .map(node => $(node).text().trim())
    .join('')
}

/**
 * Four non-empty dot-separated segments. Octet ranges are not checked.
 */
export function isValidIp(ip: string): boolean {
  const segments = ip.split('.')
  return segments.length === 4 && segments.every(segment => segment.length > 0)
}
