/**
 * One-call conversion of a TEI edition to D5 text
 */

import { Formatter, type FormatResult } from './formatter.js'
import { silentLogger } from './logger.js'
import { defaultSymbolTables, type SymbolTables } from './symbol-tables.js'
import { TEIParser, type ParseOptions } from './tei-parser.js'
import { DEFAULT_CONFIG } from './types.js'
import { TeiReader } from './xml-reader.js'

export interface ConvertOptions extends ParseOptions {
  /** Defaults to the bundled tables */
  tables?: SymbolTables
}

/**
 * Read, parse and format one TEI document
 */
export const convertXml = (xml: string, options: ConvertOptions = {}): FormatResult => {
  const tables = options.tables ?? defaultSymbolTables()
  const config = options.config ?? DEFAULT_CONFIG
  const logger = options.logger ?? silentLogger

  const tree = new TeiReader().read(xml)
  const document = new TEIParser(tables).parse(tree, { id: options.id, config, logger })
  return new Formatter(tables).format(document, { config, logger })
}

/**
 * D5 text of a conversion result: text parts separated by a blank line
 */
export const toPlainText = (result: FormatResult): string =>
  result.textParts.map(part => part.lines.join('\n')).join('\n\n')
