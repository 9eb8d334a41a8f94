/**
 * Symbol and character tables
 *
 * Every mapping lives in a JSON file under data/. Adding a symbol is an
 * edit there, the traversal code never changes.
 */

import { readFileSync } from 'fs'
import { join } from 'path'
import { fileURLToPath } from 'url'
import { z } from 'zod'

import { SymbolTableError } from './errors.js'
import type { AddTarget } from './types.js'

const DEFAULT_DATA_DIR = fileURLToPath(new URL('../data/', import.meta.url))

// ============ Schemas ============

const StringMapSchema = z.record(z.string(), z.string())

const RenditionSchema = z.record(
  z.string(),
  z.object({
    mark: z.string().min(1),
    mode: z.enum(['append', 'each'])
  })
)

const PlacementSchema = z.record(
  z.string(),
  z.object({
    marker: z.string(),
    target: z.enum(['previous', 'next', 'inline', 'none'])
  })
)

const CharacterSchema = z.object({
  majuscule: StringMapSchema,
  ignorable: z.array(z.string()),
  latinLookalikes: StringMapSchema,
  extraValid: z.array(z.string())
})

export type RenditionMode = 'append' | 'each'

export interface RenditionEntry {
  readonly mark: string
  readonly mode: RenditionMode
}

export interface PlacementEntry {
  readonly marker: string
  readonly target: AddTarget
}

export interface CharacterTable {
  readonly majuscule: ReadonlyMap<string, string>
  readonly ignorable: ReadonlySet<string>
  readonly latinLookalikes: ReadonlyMap<string, string>
  readonly extraValid: readonly string[]
}

/** Combining dot below, appended to letters read with uncertainty */
export const COMBINING_DOT_BELOW = '̣'

/** Generic abbreviation sign, emitted for expansions missing from the table */
export const ABBREVIATION_FALLBACK = '℅'

/** Expansions are looked up by their first letters */
export const ABBREVIATION_KEY_LENGTH = 5

// ============ Loading ============

const readTable = <T>(dir: string, file: string, schema: z.ZodType<T>): T => {
  const path = join(dir, file)
  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'))
  } catch (e) {
    throw new SymbolTableError(`Cannot read symbol table ${path}`, { cause: e })
  }
  const result = schema.safeParse(raw)
  if (!result.success) {
    throw new SymbolTableError(`Invalid symbol table ${path}: ${result.error.message}`, {
      cause: result.error
    })
  }
  return result.data
}

const toMap = <V>(record: Record<string, V>): ReadonlyMap<string, V> =>
  new Map(Object.entries(record).map(([key, value]) => [key, Object.freeze(value)]))

/**
 * Read-only symbol vocabulary, shared between parser and formatter
 */
export class SymbolTables {
  readonly abbreviations: ReadonlyMap<string, string>
  readonly glyphTypes: ReadonlyMap<string, string>
  readonly milestones: ReadonlyMap<string, string>
  readonly renditions: ReadonlyMap<string, RenditionEntry>
  readonly placements: ReadonlyMap<string, PlacementEntry>
  readonly characters: CharacterTable
  private readonly validChars: ReadonlySet<string>

  private constructor(dataDir: string) {
    this.abbreviations = toMap(readTable(dataDir, 'abbreviations.json', StringMapSchema))
    this.glyphTypes = toMap(readTable(dataDir, 'glyph-types.json', StringMapSchema))
    this.milestones = toMap(readTable(dataDir, 'milestones.json', StringMapSchema))
    this.renditions = toMap(readTable(dataDir, 'renditions.json', RenditionSchema))
    this.placements = toMap(readTable(dataDir, 'placements.json', PlacementSchema))

    const characters = readTable(dataDir, 'characters.json', CharacterSchema)
    this.characters = Object.freeze({
      majuscule: toMap(characters.majuscule),
      ignorable: new Set(characters.ignorable),
      latinLookalikes: toMap(characters.latinLookalikes),
      extraValid: Object.freeze([...characters.extraValid])
    })

    this.validChars = this.buildVocabulary()
    Object.freeze(this)
  }

  /**
   * Load every table from a data directory, the bundled one by default
   */
  static load(dataDir: string = DEFAULT_DATA_DIR): SymbolTables {
    return new SymbolTables(dataDir)
  }

  /**
   * Every code point allowed in a D5 line
   */
  vocabulary(): ReadonlySet<string> {
    return this.validChars
  }

  isValidChar(char: string): boolean {
    return this.validChars.has(char)
  }

  /**
   * Abbreviation table key for a normalized expansion text
   */
  static abbreviationKey(expansion: string): string {
    return Array.from(expansion).slice(0, ABBREVIATION_KEY_LENGTH).join('')
  }

  private buildVocabulary(): ReadonlySet<string> {
    const chars = new Set<string>()
    const addAll = (value: string) => {
      for (const char of value) {
        chars.add(char)
      }
    }

    for (const upper of this.characters.majuscule.values()) addAll(upper)
    for (const symbol of this.abbreviations.values()) addAll(symbol)
    for (const symbol of this.glyphTypes.values()) addAll(symbol)
    for (const symbol of this.milestones.values()) addAll(symbol)
    for (const entry of this.renditions.values()) addAll(entry.mark)
    for (const entry of this.placements.values()) addAll(entry.marker)
    this.characters.extraValid.forEach(addAll)
    addAll(COMBINING_DOT_BELOW)
    addAll(ABBREVIATION_FALLBACK)

    return chars
  }
}

let defaultTables: SymbolTables | null = null

/**
 * The bundled tables, loaded once per process
 */
export const defaultSymbolTables = (): SymbolTables => {
  if (!defaultTables) {
    defaultTables = SymbolTables.load()
  }
  return defaultTables
}
