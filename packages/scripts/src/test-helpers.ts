/**
 * Temporary papyri data checkouts for the tests
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { dirname, join } from 'path'

export interface PapyrusFixture {
  tm: string
  title?: string
  place?: string
  dclpHybrid?: string
  /** Content of the edition ab */
  text?: string
}

export const papyrusXml = ({ tm, title = '', place = '', dclpHybrid, text = '<lb n="1"/>αβγ' }: PapyrusFixture): string =>
  '<?xml version="1.0" encoding="UTF-8"?>\n' +
  '<TEI xmlns="http://www.tei-c.org/ns/1.0"><teiHeader><fileDesc>' +
  `<titleStmt><title>${title}</title></titleStmt>` +
  `<publicationStmt><idno type="TM">${tm}</idno>` +
  (dclpHybrid ? `<idno type="dclp-hybrid">${dclpHybrid}</idno>` : '') +
  '</publicationStmt></fileDesc>' +
  `<sourceDesc><history><origin><origPlace>${place}</origPlace></origin></history></sourceDesc>` +
  '</teiHeader><text><body>' +
  `<div type="edition" xml:lang="grc"><ab>${text}</ab></div>` +
  '</body></text></TEI>'

export const createTempDir = (prefix: string): string => mkdtempSync(join(tmpdir(), `papyrus-${prefix}-`))

export const removeTempDir = (dir: string): void => rmSync(dir, { recursive: true, force: true })

/**
 * Write a papyrus below the data directory and return its path
 */
export const writePapyrus = (root: string, relativePath: string, fixture: PapyrusFixture): string => {
  const path = join(root, relativePath)
  mkdirSync(dirname(path), { recursive: true })
  writeFileSync(path, papyrusXml(fixture), 'utf-8')
  return path
}
