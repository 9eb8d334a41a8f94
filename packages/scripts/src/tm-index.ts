/**
 * TM number index
 * Maps Trismegistos numbers to the XML files of the papyri data that carry them
 */

import { existsSync, mkdirSync, readdirSync, readFileSync, statSync, writeFileSync } from 'fs'
import { dirname, join } from 'path'
import { z } from 'zod'

import { idnoValues, ParseError, silentLogger, TeiReader, type LoggerMethods } from '@papyrus-d5/core'

/** Subdirectories of the papyri data that hold editions */
export const SOURCE_DIRS = ['DCLP', 'DDB_EpiDoc_XML'] as const

const IndexSchema = z.array(
  z.object({
    tm: z.number().int(),
    path: z.string()
  })
)

export type TmIndexEntry = z.infer<typeof IndexSchema>[number]

export class IndexError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'IndexError'
  }
}

/**
 * Every XML file under a directory, hidden entries skipped
 */
export function findXmlFiles(dir: string, files: string[] = []): string[] {
  const entries = readdirSync(dir).sort()

  for (const entry of entries) {
    if (entry.startsWith('.')) continue

    const fullPath = join(dir, entry)
    const stat = statSync(fullPath)

    if (stat.isDirectory()) {
      findXmlFiles(fullPath, files)
    } else if (entry.endsWith('.xml')) {
      files.push(fullPath)
    }
  }

  return files
}

/**
 * Unique TM numbers of a document, from every idno type="TM"
 */
export function extractTmNumbers(xml: string, reader: TeiReader = new TeiReader()): number[] {
  const { root } = reader.read(xml)
  const numbers = idnoValues(root, 'TM')
    .flatMap(value => value.split(/\s+/))
    .filter(value => /^\d+$/.test(value))
    .map(value => Number.parseInt(value, 10))
  return [...new Set(numbers)]
}

/**
 * Scan DCLP and DDB_EpiDoc_XML and write the index file
 */
export function buildIndex(
  idpDataDir: string,
  indexFile: string,
  logger: LoggerMethods = silentLogger
): TmIndexEntry[] {
  const files: string[] = []
  for (const sub of SOURCE_DIRS) {
    const dir = join(idpDataDir, sub)
    if (existsSync(dir)) {
      findXmlFiles(dir, files)
    } else {
      logger.error(`Could not find ${dir}`)
    }
  }

  if (files.length === 0) {
    throw new IndexError(
      `Indexing failed: no XML files found, ${idpDataDir} must contain DCLP and DDB_EpiDoc_XML`
    )
  }

  const reader = new TeiReader()
  const entries: TmIndexEntry[] = []
  for (let i = 0; i < files.length; i++) {
    const path = files[i]
    if ((i + 1) % 1000 === 0) {
      process.stdout.write(`\rIndexing: ${i + 1}/${files.length}`)
    }
    try {
      for (const tm of extractTmNumbers(readFileSync(path, 'utf-8'), reader)) {
        entries.push({ tm, path })
      }
    } catch (e) {
      if (!(e instanceof ParseError)) throw e
      logger.warn(`Skipped ${path}: ${e.message}`)
    }
  }

  const dir = dirname(indexFile)
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true })
  }
  writeFileSync(indexFile, JSON.stringify(entries), 'utf-8')
  logger.info(`Indexed ${entries.length} TM references from ${files.length} files`)
  return entries
}

export class TmIndex {
  private readonly byTm = new Map<number, string[]>()

  constructor(entries: TmIndexEntry[]) {
    for (const { tm, path } of entries) {
      const paths = this.byTm.get(tm) ?? []
      if (!paths.includes(path)) paths.push(path)
      this.byTm.set(tm, paths)
    }
  }

  static load(indexFile: string): TmIndex {
    let raw: unknown
    try {
      raw = JSON.parse(readFileSync(indexFile, 'utf-8'))
    } catch (e) {
      throw new IndexError(`Cannot read TM index ${indexFile}`, { cause: e })
    }
    const result = IndexSchema.safeParse(raw)
    if (!result.success) {
      throw new IndexError(`Invalid TM index ${indexFile}: ${result.error.message}`, { cause: result.error })
    }
    return new TmIndex(result.data)
  }

  get size(): number {
    return this.byTm.size
  }

  pathsForTm(tm: number): string[] {
    return [...(this.byTm.get(tm) ?? [])]
  }
}
