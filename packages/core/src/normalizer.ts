/**
 * Greek character normalization
 */

import { COMBINING_DOT_BELOW, defaultSymbolTables, type SymbolTables } from './symbol-tables.js'

const COMBINING_MARK = /\p{M}/u
const WHITESPACE = /\s/u

export class CharacterNormalizer {
  constructor(private readonly tables: SymbolTables = defaultSymbolTables()) {}

  /**
   * Reduce one character to its majuscule base letter.
   * Returns '' for whitespace, combining marks and ignorable punctuation.
   */
  normalize(raw: string): string {
    let result = ''
    for (const char of raw.normalize('NFD')) {
      if (COMBINING_MARK.test(char) || WHITESPACE.test(char)) {
        continue
      }
      if (this.tables.characters.ignorable.has(char)) {
        continue
      }
      result += this.tables.characters.majuscule.get(char) ?? char.toUpperCase()
    }
    return result
  }

  /**
   * Normalize a text node into its base letters, one entry per letter
   */
  normalizeText(text: string): string[] {
    const letters: string[] = []
    for (const char of text) {
      const base = this.normalize(char)
      for (const letter of base) {
        letters.push(letter)
      }
    }
    return letters
  }

  markUncertain(base: string): string {
    return `${base}${COMBINING_DOT_BELOW}`
  }
}
