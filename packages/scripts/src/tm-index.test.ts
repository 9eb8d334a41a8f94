import { existsSync, readFileSync, writeFileSync } from 'fs'
import { join } from 'path'
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest'

import { ParseError } from '@papyrus-d5/core'

import { createTempDir, papyrusXml, removeTempDir, writePapyrus } from './test-helpers.js'
import { buildIndex, extractTmNumbers, findXmlFiles, IndexError, TmIndex } from './tm-index.js'

const silent = () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() })

describe('extractTmNumbers', () => {
  test('should split and deduplicate TM numbers', () => {
    expect(extractTmNumbers(papyrusXml({ tm: '5015 5016 5015' }))).toEqual([5015, 5016])
  })

  test('should ignore values that are not numbers', () => {
    expect(extractTmNumbers(papyrusXml({ tm: 'n/a 17' }))).toEqual([17])
  })

  test('should throw ParseError for malformed XML', () => {
    expect(() => extractTmNumbers('<TEI>')).toThrow(ParseError)
  })
})

describe('buildIndex', () => {
  let root: string

  beforeEach(() => {
    root = createTempDir('idp')
  })

  afterEach(() => {
    removeTempDir(root)
  })

  test('should index DCLP and DDB files', () => {
    const dclp = writePapyrus(root, 'DCLP/1/100.xml', { tm: '100' })
    const ddb = writePapyrus(root, 'DDB_EpiDoc_XML/cpr/cpr.1/cpr.1.1.xml', { tm: '200 201' })
    const indexFile = join(root, 'index', 'tm_index.json')

    const entries = buildIndex(root, indexFile, silent())

    expect(entries).toEqual([
      { tm: 100, path: dclp },
      { tm: 200, path: ddb },
      { tm: 201, path: ddb }
    ])
    expect(JSON.parse(readFileSync(indexFile, 'utf-8'))).toEqual(entries)
  })

  test('should skip malformed files with a warning', () => {
    writePapyrus(root, 'DCLP/1/100.xml', { tm: '100' })
    const broken = join(root, 'DCLP', '1', '101.xml')
    writeFileSync(broken, '<TEI><text>', 'utf-8')
    const logger = silent()

    const entries = buildIndex(root, join(root, 'tm_index.json'), logger)

    expect(entries.map(entry => entry.tm)).toEqual([100])
    expect(logger.warn).toHaveBeenCalledTimes(1)
    expect(logger.error).toHaveBeenCalledWith(`Could not find ${join(root, 'DDB_EpiDoc_XML')}`)
  })

  test('should throw IndexError without any XML file', () => {
    const indexFile = join(root, 'tm_index.json')

    expect(() => buildIndex(root, indexFile, silent())).toThrow(IndexError)
    expect(existsSync(indexFile)).toBe(false)
  })
})

describe('findXmlFiles', () => {
  let root: string

  beforeEach(() => {
    root = createTempDir('files')
  })

  afterEach(() => {
    removeTempDir(root)
  })

  test('should find XML files recursively and skip hidden entries', () => {
    const a = writePapyrus(root, 'a/1.xml', { tm: '1' })
    const b = writePapyrus(root, 'b/c/2.xml', { tm: '2' })
    writePapyrus(root, '.git/3.xml', { tm: '3' })
    writeFileSync(join(root, 'a', 'notes.txt'), 'x', 'utf-8')

    expect(findXmlFiles(root)).toEqual([a, b])
  })
})

describe('TmIndex', () => {
  test('should return unique paths per TM number', () => {
    const index = new TmIndex([
      { tm: 1, path: '/a.xml' },
      { tm: 1, path: '/b.xml' },
      { tm: 1, path: '/a.xml' },
      { tm: 2, path: '/c.xml' }
    ])

    expect(index.size).toBe(2)
    expect(index.pathsForTm(1)).toEqual(['/a.xml', '/b.xml'])
    expect(index.pathsForTm(3)).toEqual([])
  })

  describe('load', () => {
    let root: string

    beforeEach(() => {
      root = createTempDir('index')
    })

    afterEach(() => {
      removeTempDir(root)
    })

    test('should read an index file', () => {
      const file = join(root, 'tm_index.json')
      writeFileSync(file, JSON.stringify([{ tm: 7, path: '/p.xml' }]), 'utf-8')

      expect(TmIndex.load(file).pathsForTm(7)).toEqual(['/p.xml'])
    })

    test('should reject a malformed index', () => {
      const file = join(root, 'tm_index.json')
      writeFileSync(file, JSON.stringify([{ tm: '7' }]), 'utf-8')

      expect(() => TmIndex.load(file)).toThrow(IndexError)
    })

    test('should reject a missing index', () => {
      expect(() => TmIndex.load(join(root, 'missing.json'))).toThrow(`Cannot read TM index ${join(root, 'missing.json')}`)
    })
  })
})
