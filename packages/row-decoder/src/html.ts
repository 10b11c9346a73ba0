import * as cheerio from 'cheerio'

export function loadHtml(payload: string): cheerio.CheerioAPI {
  return cheerio.load(payload)
}

/**
 * Parse a `<tr>` fragment. The HTML parser discards rows outside a table,
 * so the fragment is wrapped in one first.
 */
export function loadRowHtml(fragment: string): cheerio.CheerioAPI {
  return loadHtml(`<table>${fragment}</table>`)
}
