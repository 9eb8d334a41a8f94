import { existsSync, readFileSync } from 'fs'
import { join } from 'path'
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest'

import type { Settings } from './config.js'
import { PapyriDownloader } from './downloader.js'
import { PapyrusFilter } from './papyrus-filter.js'
import { ConversionRunner, TargetError } from './runner.js'
import { createTempDir, removeTempDir, writePapyrus } from './test-helpers.js'

const createLogger = () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() })

describe('ConversionRunner', () => {
  let root: string
  let settings: Settings
  let downloader: PapyriDownloader

  beforeEach(() => {
    root = createTempDir('runner')
    const idpDataDir = join(root, 'idp.data')
    settings = {
      debug: false,
      ignoreFormattingIssues: false,
      writeJson: true,
      writeTxt: true,
      dataDir: root,
      idpDataDir,
      indexFile: join(root, 'tm_index.json'),
      exportDir: join(root, 'export'),
      alwaysUpdate: false,
      alwaysIndex: false,
      repoUrl: 'https://example.com/idp.data.git'
    }
    writePapyrus(idpDataDir, 'DDB_EpiDoc_XML/cpr/cpr.1/cpr.1.1.xml', { tm: '100', place: 'Arsinoe' })
    writePapyrus(idpDataDir, 'DDB_EpiDoc_XML/cpr/cpr.1/cpr.1.2.xml', {
      tm: '101',
      text: '<lb n="12"/>α<g type="chi"/>β'
    })
    writePapyrus(idpDataDir, 'DDB_EpiDoc_XML/bgu/bgu.1/bgu.1.1.xml', { tm: '200', text: '<lb n="1"/>δε' })
    downloader = new PapyriDownloader(settings)
    vi.spyOn(downloader, 'sync').mockImplementation(() => {})
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
  })

  afterEach(() => {
    removeTempDir(root)
  })

  test('should build the index without fetching available data', () => {
    const runner = new ConversionRunner(settings, createLogger(), downloader)

    const index = runner.prepare()

    expect(downloader.sync).not.toHaveBeenCalled()
    expect(existsSync(settings.indexFile)).toBe(true)
    expect(index.size).toBe(3)
  })

  test('should fetch the data when asked to update', () => {
    const runner = new ConversionRunner({ ...settings, alwaysUpdate: true }, createLogger(), downloader)

    runner.prepare()

    expect(downloader.sync).toHaveBeenCalledTimes(1)
  })

  test('should write txt and json for one TM number', () => {
    const runner = new ConversionRunner(settings, createLogger(), downloader)

    const summary = runner.runTargets(100)

    expect(summary).toEqual({ exportDirectory: join(root, 'export', '100'), converted: 1, skipped: [] })
    expect(readFileSync(join(root, 'export', '100', 'txt', '100_cpr.1.1.txt'), 'utf-8')).toBe('ΑΒΓ')
    const json = JSON.parse(readFileSync(join(root, 'export', '100', 'json', '100_cpr.1.1.json'), 'utf-8'))
    expect(json.tm).toBe('100')
    expect(json.version).toBe('D5')
    expect(json.textBlocks[0].text).toEqual(['ΑΒΓ'])
  })

  test('should only write txt without json', () => {
    const runner = new ConversionRunner({ ...settings, writeJson: false }, createLogger(), downloader)

    runner.runTargets(100)

    expect(existsSync(join(root, 'export', '100', 'txt', '100_cpr.1.1.txt'))).toBe(true)
    expect(existsSync(join(root, 'export', '100', 'json'))).toBe(false)
  })

  test('should skip an unknown TM number', () => {
    const logger = createLogger()
    const runner = new ConversionRunner(settings, logger, downloader)

    const summary = runner.runTargets(999)

    const reason = 'Could not find any XML file(s) associated with TM number 999'
    expect(summary.skipped).toEqual([{ tm: 999, reason }])
    expect(logger.warn).toHaveBeenCalledWith(reason)
    expect(JSON.parse(readFileSync(join(root, 'export', '999', '.conversion-errors.json'), 'utf-8'))).toEqual([
      { file: '999', error: reason }
    ])
  })

  test('should convert a collection and log documents with formatting errors', () => {
    const runner = new ConversionRunner(settings, createLogger(), downloader)

    const summary = runner.runTargets('CPR')

    expect(summary.exportDirectory).toBe(join(root, 'export', 'CPR'))
    expect(summary.converted).toBe(1)
    expect(summary.skipped.map(entry => entry.tm)).toEqual([101])
    expect(summary.skipped[0].reason).toMatch(/^TM 101 skipped due to formatting errors: /)
    expect(existsSync(join(root, 'export', 'CPR', '.conversion-errors.json'))).toBe(true)
  })

  test('should convert every document when formatting issues are ignored', () => {
    const runner = new ConversionRunner({ ...settings, ignoreFormattingIssues: true }, createLogger(), downloader)

    const summary = runner.runTargets('cpr')

    expect(summary.converted).toBe(2)
    expect(readFileSync(join(root, 'export', 'cpr', 'txt', '101_cpr.1.2.txt'), 'utf-8')).toBe('ΑΒ')
  })

  test('should reject an unknown collection', () => {
    const runner = new ConversionRunner(settings, createLogger(), downloader)

    expect(() => runner.runTargets('p.oxy')).toThrow(TargetError)
  })

  test('should join collection names and report missing ones', () => {
    const logger = createLogger()
    const runner = new ConversionRunner(settings, logger, downloader)
    runner.prepare()

    const tms = runner.resolveTarget(['BGU', 'missing'])

    expect(tms).toEqual([200])
    expect(runner.io.targetDirectory).toBe(join(root, 'export', 'bgu+missing'))
    expect(logger.error).toHaveBeenCalledWith('Collection missing not found in DDB_EpiDoc_XML')
  })

  test('should name a TM list after its range', () => {
    const runner = new ConversionRunner(settings, createLogger(), downloader)

    const tms = runner.resolveTarget([200, 100, 101])

    expect(tms).toEqual([100, 101, 200])
    expect(runner.io.targetDirectory).toBe(join(root, 'export', '100-200'))
  })

  test('should convert the matches of a filter', () => {
    const runner = new ConversionRunner(settings, createLogger(), downloader)
    const filter = new PapyrusFilter({ idpDataDir: settings.idpDataDir, source: 'ddb', place: 'arsinoe' })

    const summary = runner.runTargets(filter)

    expect(summary.exportDirectory).toBe(join(root, 'export', 'filter-ddb--arsinoe--true'))
    expect(summary.converted).toBe(1)
  })
})
