/**
 * Export writer
 * - txt: one D5 line per row, text parts run on
 * - json: text blocks with their div metadata and numbered lines
 */

import { existsSync, mkdirSync, writeFileSync } from 'fs'
import { join } from 'path'

import { silentLogger, type LineOrigin, type LoggerMethods, type SerializedDocument } from '@papyrus-d5/core'

export interface ExportLine {
  n: string
  origin: LineOrigin
  text: string
}

export interface ExportTextBlock {
  n: string | null
  subtype: string | null
  lang: string | null
  text: string[]
  lines: ExportLine[]
}

export interface ExportDocument {
  tm: string
  version: 'D5'
  textBlocks: ExportTextBlock[]
}

export interface ConversionFailure {
  file: string
  error: string
}

export class IOHandler {
  private exportDirectory = ''

  constructor(
    private readonly exportRoot: string,
    private readonly logger: LoggerMethods = silentLogger
  ) {}

  setExportDirectory(name: string): void {
    this.exportDirectory = name
    this.logger.debug(`Set export directory to ${name}`)
  }

  get hasExportDirectory(): boolean {
    return this.exportDirectory !== ''
  }

  /**
   * Directory the current target writes to
   */
  get targetDirectory(): string {
    return join(this.exportRoot, this.exportDirectory)
  }

  writeTxt(tm: number | string, name: string, result: SerializedDocument): string {
    const path = join(this.ensureDirectory('txt'), `${tm}_${name}.txt`)
    const text = result.textParts.flatMap(part => part.lines).join('\n')
    writeFileSync(path, text, 'utf-8')
    this.logger.debug(`Wrote ${path}`)
    return path
  }

  writeJson(tm: number | string, name: string, result: SerializedDocument): string {
    const path = join(this.ensureDirectory('json'), `${tm}_${name}.json`)
    const content: ExportDocument = {
      tm: String(tm),
      version: 'D5',
      textBlocks: result.textParts.map(part => ({
        n: part.n ?? null,
        subtype: part.subtype ?? null,
        lang: part.lang ?? null,
        text: part.lines,
        lines: part.records.map(record => ({ n: record.number, origin: record.origin, text: record.text }))
      }))
    }
    writeFileSync(path, JSON.stringify(content, null, 2), 'utf-8')
    this.logger.debug(`Wrote ${path}`)
    return path
  }

  /**
   * Save failed documents next to the export
   */
  writeErrorLog(failures: ConversionFailure[]): string {
    const path = join(this.ensureDirectory(), '.conversion-errors.json')
    writeFileSync(path, JSON.stringify(failures, null, 2), 'utf-8')
    return path
  }

  private ensureDirectory(sub = ''): string {
    const dir = join(this.targetDirectory, sub)
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true })
    }
    return dir
  }
}
