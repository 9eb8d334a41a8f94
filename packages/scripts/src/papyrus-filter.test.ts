import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import { FilterError, PapyrusFilter } from './papyrus-filter.js'
import { createTempDir, papyrusXml, removeTempDir, writePapyrus } from './test-helpers.js'

describe('PapyrusFilter', () => {
  test('should need at least one criterion', () => {
    expect(() => new PapyrusFilter({ idpDataDir: '/data', source: 'all' })).toThrow(FilterError)
  })

  test('should ignore the DCLP hybrid id for DDB files', () => {
    expect(() => new PapyrusFilter({ idpDataDir: '/data', source: 'ddb', dclpHybrid: 'tm;1' })).toThrow(
      'title, place, or dclpHybrid must be set'
    )
  })

  test('should name itself after its criteria', () => {
    const filter = new PapyrusFilter({ idpDataDir: '/data', source: 'dclp', title: 'Iliad' })

    expect(filter.name).toBe('filter-dclp-Iliad---true')
  })

  describe('matches', () => {
    const xml = papyrusXml({ tm: '1', title: 'Homer, Iliad 2', place: 'Oxyrhynchos', dclpHybrid: 'p.oxy;2;223' })

    test('should match substrings case-insensitively', () => {
      const filter = new PapyrusFilter({ idpDataDir: '/data', source: 'all', title: 'iliad' })

      expect(filter.matches(xml)).toBe(true)
    })

    test('should accept any single match by default', () => {
      const filter = new PapyrusFilter({ idpDataDir: '/data', source: 'all', title: 'odyssey', place: 'oxyrhynchos' })

      expect(filter.matches(xml)).toBe(true)
    })

    test('should need every criterion with singleMatchSuffices off', () => {
      const both = new PapyrusFilter({
        idpDataDir: '/data',
        source: 'dclp',
        title: 'iliad',
        dclpHybrid: 'p.oxy',
        singleMatchSuffices: false
      })
      const one = new PapyrusFilter({
        idpDataDir: '/data',
        source: 'dclp',
        title: 'odyssey',
        dclpHybrid: 'p.oxy',
        singleMatchSuffices: false
      })

      expect(both.matches(xml)).toBe(true)
      expect(one.matches(xml)).toBe(false)
    })

    test('should not match an empty field', () => {
      const filter = new PapyrusFilter({ idpDataDir: '/data', source: 'all', place: 'Oxy' })

      expect(filter.matches(papyrusXml({ tm: '1', title: 'Iliad' }))).toBe(false)
    })
  })

  describe('filter', () => {
    let root: string

    beforeEach(() => {
      root = createTempDir('filter')
      writePapyrus(root, 'DCLP/1/1.xml', { tm: '1', title: 'Iliad 1', place: 'Oxyrhynchos' })
      writePapyrus(root, 'DCLP/1/2.xml', { tm: '2', title: 'Odyssey', place: 'Arsinoe' })
      writePapyrus(root, 'DDB_EpiDoc_XML/bgu/bgu.1/bgu.1.1.xml', { tm: '3 1', title: 'Letter', place: 'Oxyrhynchos' })
    })

    afterEach(() => {
      removeTempDir(root)
    })

    test('should return the TM numbers of matching files in one source', () => {
      const filter = new PapyrusFilter({ idpDataDir: root, source: 'dclp', place: 'oxyrhynchos' })

      expect(filter.filter()).toEqual([1])
    })

    test('should search both sources and deduplicate', () => {
      const filter = new PapyrusFilter({ idpDataDir: root, source: 'all', place: 'oxyrhynchos' })

      expect(filter.filter()).toEqual([1, 3])
    })
  })
})
