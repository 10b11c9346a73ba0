import type { Cheerio, CheerioAPI } from 'cheerio'
import type { Element } from 'domhandler'
import { MissingCellError } from './errors.js'
import { loadRowHtml } from './html.js'
import { COLUMNS, type ColumnName } from './types.js'

/**
 * One table row of a proxy listing, addressed by its fixed columns.
 */
export class Row {
  readonly $: CheerioAPI
  readonly element: Cheerio<Element>

  constructor($: CheerioAPI, element: Cheerio<Element>) {
    this.$ = $
    this.element = element
  }

  /**
   * Throws MissingCellError when the column is absent.
   */
  cell(column: ColumnName): Cheerio<Element> {
    const position = COLUMNS[column]
    const cell = this.element.children('td').eq(position - 1)
    if (cell.length === 0) {
      throw new MissingCellError(position, column)
    }
    return cell
  }
}

/**
 * Build a Row from the first `<tr>` of an HTML fragment. A fragment
 * without a row yields a Row with no cells.
 */
export function loadRow(fragment: string): Row {
  const $ = loadRowHtml(fragment)
  return new Row($, $('tr').first())
}
