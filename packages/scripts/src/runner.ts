/**
 * Conversion runs over TM numbers, collections or filters
 */

import { existsSync, readdirSync, readFileSync } from 'fs'
import { basename, join } from 'path'

import {
  convertXml,
  FormattingError,
  ParseError,
  UnsupportedSymbolError,
  type FormatResult,
  type LoggerMethods
} from '@papyrus-d5/core'

import type { Settings } from './config.js'
import { PapyriDownloader } from './downloader.js'
import { IOHandler, type ConversionFailure } from './io-handler.js'
import { PapyrusFilter } from './papyrus-filter.js'
import { buildIndex, extractTmNumbers, findXmlFiles, TmIndex } from './tm-index.js'

export type Target = number | number[] | string | string[] | PapyrusFilter

export interface RunSummary {
  exportDirectory: string
  converted: number
  skipped: { tm: number; reason: string }[]
}

export class TargetError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'TargetError'
  }
}

const COLLECTION_DIR = 'DDB_EpiDoc_XML'

const isNumberList = (list: number[] | string[]): list is number[] =>
  list.every(item => typeof item === 'number')

export class ConversionRunner {
  readonly io: IOHandler
  private readonly downloader: PapyriDownloader
  private index: TmIndex | null = null

  constructor(
    private readonly settings: Settings,
    private readonly logger: LoggerMethods,
    downloader?: PapyriDownloader
  ) {
    this.io = new IOHandler(settings.exportDir, logger)
    this.downloader = downloader ?? new PapyriDownloader(settings, logger)
  }

  /**
   * Fetch the data and build the TM index where missing or asked for
   */
  prepare(): TmIndex {
    const { idpDataDir, indexFile, alwaysUpdate, alwaysIndex } = this.settings
    if (!this.downloader.isAvailable() || alwaysUpdate) {
      this.downloader.sync()
    }
    if (!existsSync(indexFile) || alwaysIndex) {
      buildIndex(idpDataDir, indexFile, this.logger)
    }
    this.index = TmIndex.load(indexFile)
    return this.index
  }

  /**
   * Convert every file of one TM number. Returns why it was skipped, or
   * null when everything was written.
   */
  convertTm(tm: number): string | null {
    const index = this.index ?? this.prepare()
    const files = index.pathsForTm(tm)
    if (files.length === 0) {
      return `Could not find any XML file(s) associated with TM number ${tm}`
    }

    for (const file of files) {
      if (!existsSync(file)) {
        return `TM ${tm} skipped: ${file} no longer exists, rebuild the index with --reindex`
      }
      this.logger.debug(`Processing ${file} (TM ${tm})`)

      let result: FormatResult
      try {
        result = convertXml(readFileSync(file, 'utf-8'), {
          id: String(tm),
          config: {
            ignoreFormattingIssues: this.settings.ignoreFormattingIssues,
            debugMode: this.settings.debug
          },
          logger: this.logger
        })
      } catch (e) {
        if (e instanceof UnsupportedSymbolError || e instanceof FormattingError) {
          return `TM ${tm} skipped due to formatting errors: ${e.message}`
        }
        if (e instanceof ParseError) {
          return `TM ${tm} skipped: ${e.message}`
        }
        throw e
      }

      if (result.textParts.length === 0) {
        this.logger.debug(`${file} has no edition text`)
        continue
      }

      const name = basename(file, '.xml')
      if (this.settings.writeJson) this.io.writeJson(tm, name, result)
      if (this.settings.writeTxt) this.io.writeTxt(tm, name, result)
    }
    return null
  }

  /**
   * Convert a target and log what was skipped
   */
  runTargets(target: Target): RunSummary {
    this.prepare()
    const tms = [...new Set(this.resolveTarget(target))]

    let converted = 0
    const skipped: RunSummary['skipped'] = []
    for (let i = 0; i < tms.length; i++) {
      const tm = tms[i]
      if (!this.settings.debug) {
        process.stdout.write(`\rParsing: ${i + 1}/${tms.length} (${Math.round(((i + 1) / tms.length) * 100)}%)`)
      }
      const reason = this.convertTm(tm)
      if (reason) {
        skipped.push({ tm, reason })
        this.logger.warn(reason)
      } else {
        converted++
      }
    }
    if (tms.length > 0 && !this.settings.debug) {
      process.stdout.write('\n')
    }

    if (skipped.length > 0) {
      const failures: ConversionFailure[] = skipped.map(({ tm, reason }) => ({ file: String(tm), error: reason }))
      const path = this.io.writeErrorLog(failures)
      this.logger.info(`Skipped documents listed in ${path}`)
    }

    return { exportDirectory: this.io.targetDirectory, converted, skipped }
  }

  /**
   * TM numbers of a target, setting the export directory on the way
   */
  resolveTarget(target: Target): number[] {
    if (target instanceof PapyrusFilter) {
      this.io.setExportDirectory(target.name)
      return target.filter()
    }
    if (typeof target === 'number') {
      this.io.setExportDirectory(String(target))
      return [target]
    }
    if (typeof target === 'string') {
      this.io.setExportDirectory(target)
      if (!this.collections().includes(target.toLowerCase())) {
        throw new TargetError(`Collection ${target} not found in ${COLLECTION_DIR}`)
      }
      return this.collectionTms([target])
    }
    if (target.length === 0) {
      throw new TargetError('Empty target list')
    }
    if (isNumberList(target)) {
      const sorted = [...target].sort((a, b) => a - b)
      this.io.setExportDirectory(`${sorted[0]}-${sorted[sorted.length - 1]}`)
      return sorted
    }

    this.io.setExportDirectory(target.map(name => name.toLowerCase()).join('+'))
    const known = this.collections()
    const found = target.filter(name => {
      if (known.includes(name.toLowerCase())) return true
      this.logger.error(`Collection ${name} not found in ${COLLECTION_DIR}`)
      return false
    })
    return this.collectionTms(found)
  }

  private collections(): string[] {
    const dir = join(this.settings.idpDataDir, COLLECTION_DIR)
    return existsSync(dir) ? readdirSync(dir) : []
  }

  private collectionTms(names: string[]): number[] {
    const tms: number[] = []
    for (const name of names) {
      for (const file of findXmlFiles(join(this.settings.idpDataDir, COLLECTION_DIR, name.toLowerCase()))) {
        try {
          tms.push(...extractTmNumbers(readFileSync(file, 'utf-8')))
        } catch (e) {
          if (!(e instanceof ParseError)) throw e
          this.logger.warn(`Skipped ${file}: ${e.message}`)
        }
      }
    }
    return tms
  }
}
