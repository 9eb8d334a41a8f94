/**
 * Selects papyri by title, place of origin or DCLP hybrid id
 */

import { readFileSync } from 'fs'
import { join } from 'path'

import {
  findFirst,
  idnoValues,
  ParseError,
  silentLogger,
  TeiReader,
  textOf,
  type LoggerMethods
} from '@papyrus-d5/core'

import type { FilterSource } from './config.js'
import { extractTmNumbers, findXmlFiles } from './tm-index.js'

export interface PapyrusFilterOptions {
  idpDataDir: string
  source: FilterSource
  title?: string
  place?: string
  /** Only read for DCLP files */
  dclpHybrid?: string
  /** Any one criterion matching is enough, otherwise all set criteria must match */
  singleMatchSuffices?: boolean
  /** Export directory name */
  name?: string
}

export class FilterError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'FilterError'
  }
}

const contains = (haystack: string, needle: string): boolean =>
  haystack.toLowerCase().includes(needle.toLowerCase())

export class PapyrusFilter {
  readonly name: string
  private readonly reader = new TeiReader()
  private readonly criteria: { title?: string; place?: string; dclpHybrid?: string }

  constructor(
    private readonly options: PapyrusFilterOptions,
    private readonly logger: LoggerMethods = silentLogger
  ) {
    const dclpHybrid = options.source === 'ddb' ? undefined : options.dclpHybrid || undefined
    this.criteria = {
      title: options.title || undefined,
      place: options.place || undefined,
      dclpHybrid
    }
    if (!this.criteria.title && !this.criteria.place && !this.criteria.dclpHybrid) {
      throw new FilterError('title, place, or dclpHybrid must be set')
    }
    this.name =
      options.name ||
      [
        'filter',
        options.source,
        this.criteria.title ?? '',
        this.criteria.place ?? '',
        this.criteria.dclpHybrid ?? '',
        String(options.singleMatchSuffices ?? true)
      ].join('-')
  }

  /**
   * Whether one document matches the criteria
   */
  matches(xml: string): boolean {
    const { root } = this.reader.read(xml)
    const results: boolean[] = []

    if (this.criteria.title) {
      const titleStmt = findFirst(root, 'titleStmt')
      const title = titleStmt ? textOf(titleStmt, 'title') : ''
      results.push(title !== '' && contains(title, this.criteria.title))
    }
    if (this.criteria.place) {
      const origin = findFirst(root, 'origin')
      const place = origin ? textOf(origin, 'origPlace') : ''
      results.push(place !== '' && contains(place, this.criteria.place))
    }
    if (this.criteria.dclpHybrid) {
      const hybrid = idnoValues(root, 'dclp-hybrid')[0] ?? ''
      results.push(hybrid !== '' && contains(hybrid, this.criteria.dclpHybrid))
    }

    return (this.options.singleMatchSuffices ?? true) ? results.some(Boolean) : results.every(Boolean)
  }

  /**
   * TM numbers of every matching document
   */
  filter(): number[] {
    const tms: number[] = []
    for (const file of this.files()) {
      try {
        const xml = readFileSync(file, 'utf-8')
        if (this.matches(xml)) {
          tms.push(...extractTmNumbers(xml, this.reader))
        }
      } catch (e) {
        if (!(e instanceof ParseError)) throw e
        this.logger.warn(`Skipped ${file}: ${e.message}`)
      }
    }
    this.logger.info(`Filter ${this.name} matched ${tms.length} TM number(s)`)
    return [...new Set(tms)]
  }

  private files(): string[] {
    const { idpDataDir, source } = this.options
    if (source === 'dclp') return findXmlFiles(join(idpDataDir, 'DCLP'))
    if (source === 'ddb') return findXmlFiles(join(idpDataDir, 'DDB_EpiDoc_XML'))
    return findXmlFiles(idpDataDir)
  }
}
