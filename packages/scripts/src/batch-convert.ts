/**
 * Batch conversion of the whole papyri data checkout
 * - Output mirrors the TM numbers and file names of the sources
 * - Each file's git commit is recorded, only changed files are converted again
 *
 * Usage: tsx src/batch-convert.ts [collection subdirectory] [limit]
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs'
import { basename, join, relative } from 'path'
import { z } from 'zod'

import { convertXml, ParseError, UnsupportedSymbolError, FormattingError } from '@papyrus-d5/core'

import { loadSettings, type Settings } from './config.js'
import { PapyriDownloader } from './downloader.js'
import { IOHandler, type ConversionFailure } from './io-handler.js'
import { createConsoleLogger } from './logger.js'
import { findXmlFiles } from './tm-index.js'

const settings = loadSettings(process.env, process.argv.slice(2))
const logger = createConsoleLogger('batch', { debug: settings.debug })
const OUTPUT_DIR = join(settings.exportDir, 'batch')
const COMMIT_RECORD_FILE = join(OUTPUT_DIR, '.file-commits.json')

const CommitRecordSchema = z.record(
  z.string(),
  z.object({
    commit: z.string(),
    processedAt: z.string()
  })
)

type FileCommitRecord = z.infer<typeof CommitRecordSchema>

/**
 * Read the processed commit record
 */
function getProcessedRecords(): FileCommitRecord {
  if (!existsSync(COMMIT_RECORD_FILE)) {
    return {}
  }
  try {
    const result = CommitRecordSchema.safeParse(JSON.parse(readFileSync(COMMIT_RECORD_FILE, 'utf-8')))
    if (result.success) return result.data
    logger.warn(`Ignoring malformed ${COMMIT_RECORD_FILE}`)
  } catch (e) {
    logger.warn(`Ignoring unreadable ${COMMIT_RECORD_FILE}: ${e instanceof Error ? e.message : String(e)}`)
  }
  return {}
}

function saveProcessedRecords(records: FileCommitRecord): void {
  writeFileSync(COMMIT_RECORD_FILE, JSON.stringify(records, null, 2), 'utf-8')
}

/**
 * Convert one XML file and write its exports
 */
function convertFile(io: IOHandler, xmlPath: string, config: Settings): { success: boolean; error?: string } {
  try {
    const result = convertXml(readFileSync(xmlPath, 'utf-8'), {
      config: { ignoreFormattingIssues: config.ignoreFormattingIssues, debugMode: config.debug },
      logger
    })
    if (result.textParts.length === 0) {
      return { success: true }
    }
    const name = basename(xmlPath, '.xml')
    if (config.writeJson) io.writeJson(result.id, name, result)
    if (config.writeTxt) io.writeTxt(result.id, name, result)
    return { success: true }
  } catch (e) {
    if (e instanceof ParseError || e instanceof UnsupportedSymbolError || e instanceof FormattingError) {
      return { success: false, error: e.message }
    }
    throw e
  }
}

async function main() {
  const positional = process.argv.slice(2).filter(arg => !arg.startsWith('--'))
  const subdir = positional.find(arg => !/^\d+$/.test(arg)) ?? ''
  const limitArg = positional.find(arg => /^\d+$/.test(arg))
  const limit = limitArg ? parseInt(limitArg, 10) : 0

  console.log('=== Papyri TEI to D5 batch conversion ===\n')
  if (limit > 0) {
    console.log(`Limit: ${limit} files\n`)
  }

  const downloader = new PapyriDownloader(settings, logger)
  if (!downloader.isAvailable() || settings.alwaysUpdate) {
    downloader.sync()
  }

  const sourceDir = join(settings.idpDataDir, subdir)
  if (!existsSync(sourceDir)) {
    console.error(`Error: source directory does not exist ${sourceDir}`)
    process.exit(1)
  }

  if (!existsSync(OUTPUT_DIR)) {
    mkdirSync(OUTPUT_DIR, { recursive: true })
  }

  const processedRecords = getProcessedRecords()
  console.log(`Processed before: ${Object.keys(processedRecords).length} files\n`)

  console.log('Scanning XML files...')
  const xmlFiles = findXmlFiles(sourceDir)
  console.log(`Found ${xmlFiles.length} XML files\n`)

  console.log('Checking for updates...')
  const filesToProcess: { path: string; relativePath: string; commit: string }[] = []

  for (let i = 0; i < xmlFiles.length; i++) {
    const xmlPath = xmlFiles[i]
    const relativePath = relative(settings.idpDataDir, xmlPath)

    if ((i + 1) % 500 === 0) {
      process.stdout.write(`\rChecked: ${i + 1}/${xmlFiles.length}`)
    }

    const currentCommit = downloader.fileCommit(relativePath)
    if (!currentCommit) continue

    const record = processedRecords[relativePath]
    if (!record || record.commit !== currentCommit) {
      filesToProcess.push({ path: xmlPath, relativePath, commit: currentCommit })
    }
  }

  console.log(`\n\nTo convert: ${filesToProcess.length} files`)
  console.log(`Up to date: ${xmlFiles.length - filesToProcess.length} files\n`)

  if (filesToProcess.length === 0) {
    console.log('Everything is up to date.')
    return
  }

  const actualFiles = limit > 0 ? filesToProcess.slice(0, limit) : filesToProcess
  if (limit > 0 && filesToProcess.length > limit) {
    console.log(`Converting the first ${limit} files only\n`)
  }

  const io = new IOHandler(OUTPUT_DIR, logger)
  let successCount = 0
  let errorCount = 0
  const errors: ConversionFailure[] = []

  for (let i = 0; i < actualFiles.length; i++) {
    const { path: xmlPath, relativePath, commit } = actualFiles[i]

    if ((i + 1) % 100 === 0 || i === actualFiles.length - 1) {
      process.stdout.write(`\rConverting: ${i + 1}/${actualFiles.length} (${Math.round(((i + 1) / actualFiles.length) * 100)}%)`)
    }

    const result = convertFile(io, xmlPath, settings)
    if (result.success) {
      successCount++
      processedRecords[relativePath] = {
        commit,
        processedAt: new Date().toISOString()
      }
    } else {
      errorCount++
      errors.push({ file: relativePath, error: result.error || 'unknown error' })
    }
  }

  console.log('\n\n=== Done ===')
  console.log(`Converted: ${successCount}`)
  console.log(`Failed: ${errorCount}`)

  if (errors.length > 0) {
    const errorLogPath = io.writeErrorLog(errors)
    console.log(`\nFailures saved to: ${errorLogPath}`)
  }

  saveProcessedRecords(processedRecords)
  console.log(`\nCommit record updated, ${Object.keys(processedRecords).length} files`)
}

main().catch(e => {
  console.error('Batch conversion failed:', e)
  process.exit(1)
})
