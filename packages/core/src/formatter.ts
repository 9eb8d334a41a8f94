/**
 * D5 formatter
 *
 * Renders the line model to text and checks every line against the symbol
 * vocabulary and the bracket conventions.
 */

import { FormattingError, UnsupportedSymbolError } from './errors.js'
import { finalizeTokens, isBracketClass, isTransparent } from './line-model.js'
import { silentLogger, type LoggerMethods } from './logger.js'
import { CharacterNormalizer } from './normalizer.js'
import {
  ABBREVIATION_FALLBACK,
  defaultSymbolTables,
  type SymbolTables
} from './symbol-tables.js'
import {
  DEFAULT_CONFIG,
  type ConverterConfig,
  type Document,
  type GapToken,
  type Line,
  type LineOrigin,
  type Position,
  type SuppliedToken,
  type TextPart,
  type Token
} from './types.js'

// ============ Report types ============

export type IssueCode =
  | 'UNSUPPORTED_SYMBOL'
  | 'FORBIDDEN_CHARACTER'
  | 'MALFORMED_BRACKETS'
  | 'MISSING_TARGET_LINE'
  | 'UNKNOWN_RENDITION'

export type IssueSeverity = 'error' | 'warning'

/**
 * One validation finding. Errors become warnings when formatting issues
 * are ignored.
 */
export interface ValidationIssue {
  severity: IssueSeverity
  code: IssueCode
  message: string
  textPart: number
  lineNumber: string
  /** Rendered line text, when the issue concerns it */
  text?: string
  /** Set for UNSUPPORTED_SYMBOL */
  error?: UnsupportedSymbolError
}

export interface ValidationReport {
  issues: ValidationIssue[]
  /** Latin look-alike letters replaced by their Greek counterparts */
  corrections: string[]
  errorCount: number
  warningCount: number
  ok: boolean
}

export interface LineRecord {
  number: string
  origin: LineOrigin
  text: string
  tokens: Token[]
}

export interface SerializedTextPart {
  index: number
  n?: string
  subtype?: string
  lang?: string
  lines: string[]
  records: LineRecord[]
}

export interface SerializedDocument {
  id: string
  textParts: SerializedTextPart[]
}

export interface FormatResult extends SerializedDocument {
  report: ValidationReport
}

export interface FormatOptions {
  config?: ConverterConfig
  logger?: LoggerMethods
}

const FALLBACK_RUN = /℅+/gu

// ============ Gap rendering ============

/**
 * D5 form of a single gap or supplied token. Depends on nothing but the
 * token's variant, reason, position and length.
 */
export const renderGap = (token: GapToken | SuppliedToken): string => {
  if (token.position === 'line_start') return ']'
  if (token.position === 'line_end') return '['
  if (token.extent.kind === 'unknown') return '[?]'

  const dashes = '-'.repeat(token.extent.n)
  if (token.type === 'gap' && token.reason === 'illegible') return dashes
  return dashes ? `[${dashes}]` : ''
}

/**
 * Adjacent bracketed tokens share one pair of brackets
 */
const renderRun = (run: (GapToken | SuppliedToken)[], position: Position): string => {
  if (run.length === 1) return renderGap(run[0])
  if (position === 'line_start') return ']'
  if (position === 'line_end') return '['
  if (run.some(token => token.extent.kind === 'unknown')) return '[?]'
  const total = run.reduce((sum, token) => sum + (token.extent.kind === 'known' ? token.extent.n : 0), 0)
  return total > 0 ? `[${'-'.repeat(total)}]` : ''
}

export class Formatter {
  private readonly normalizer: CharacterNormalizer

  constructor(private readonly tables: SymbolTables = defaultSymbolTables()) {
    this.normalizer = new CharacterNormalizer(tables)
  }

  // ============ Serialization ============

  /**
   * Render every line. Lines that render empty are left out.
   */
  serialize(document: Document): SerializedDocument {
    const corrector = this.createCorrector(document)
    return {
      id: document.id,
      textParts: document.textParts.map(part => {
        const records: LineRecord[] = []
        for (const line of part.lines) {
          const text = corrector(this.renderLine(line)).text
          if (text) {
            records.push({ number: line.number, origin: line.origin, text, tokens: line.tokens })
          }
        }
        return {
          index: part.index,
          n: part.n,
          subtype: part.subtype,
          lang: part.lang,
          lines: records.map(record => record.text),
          records
        }
      })
    }
  }

  renderLine(line: Line): string {
    return this.renderTokens(line.tokens).replace(FALLBACK_RUN, ABBREVIATION_FALLBACK)
  }

  private renderTokens(tokens: Token[]): string {
    let out = ''
    let i = 0
    while (i < tokens.length) {
      const token = tokens[i]
      if (!isBracketClass(token)) {
        out += this.renderToken(token)
        i++
        continue
      }

      const run: (GapToken | SuppliedToken)[] = []
      let j = i
      while (j < tokens.length) {
        const next = tokens[j]
        if (isBracketClass(next) && next.position === token.position) {
          run.push(next)
        } else if (!isTransparent(next)) {
          break
        }
        j++
      }
      out += renderRun(run, token.position)
      i = j
    }
    return out
  }

  private renderToken(token: Token): string {
    switch (token.type) {
      case 'glyph':
        return token.certainty === 'uncertain' ? this.normalizer.markUncertain(token.char) : token.char
      case 'gap':
      case 'supplied':
        return renderGap(token)
      case 'space':
        return token.extent.kind === 'known' ? ' '.repeat(token.extent.n) : ' ? '
      case 'milestone':
        return this.tables.milestones.get(token.rendition) ?? ''
      case 'abbreviation':
        if (token.expansionTextPresent) return ''
        return this.tables.abbreviations.get(token.key) ?? ABBREVIATION_FALLBACK
      case 'glyphType':
        return this.tables.glyphTypes.get(token.glyphType) ?? ''
      case 'mark':
        return token.char
      case 'rendition':
        return this.renderRendition(token.rend, token.inner)
      case 'added':
        return token.target === 'inline' ? this.renderTokens(token.inner) : token.marker
    }
  }

  /**
   * Diacritic renditions go after the content, outer mark first; line
   * renditions go under or over every letter
   */
  private renderRendition(rend: string, inner: Token[]): string {
    const entry = this.tables.renditions.get(rend)
    if (!entry) return this.renderTokens(inner)

    if (entry.mode === 'each') {
      return inner
        .map(token => (token.type === 'glyph' ? `${this.renderToken(token)}${entry.mark}` : this.renderToken(token)))
        .join('')
    }

    const marks = [entry.mark]
    let content = inner
    while (content.length === 1 && content[0].type === 'rendition') {
      const nested = this.tables.renditions.get(content[0].rend)
      if (!nested || nested.mode !== 'append') break
      marks.push(nested.mark)
      content = content[0].inner
    }
    return `${this.renderTokens(content)}${marks.join('')}`
  }

  // ============ Validation ============

  /**
   * Check every line; issues are collected, never thrown
   */
  validate(document: Document, config: ConverterConfig = DEFAULT_CONFIG): ValidationReport {
    const issues: ValidationIssue[] = []
    const corrections: string[] = []
    const corrector = this.createCorrector(document)
    const severity = (base: IssueSeverity): IssueSeverity => (config.ignoreFormattingIssues ? 'warning' : base)

    for (const part of document.textParts) {
      for (const line of part.lines) {
        const context = { textPart: part.index, lineNumber: line.number }

        for (const issue of this.checkSymbols(line.tokens, line.number)) {
          issues.push({ ...issue, ...context, severity: severity(issue.severity) })
        }

        const corrected = corrector(this.renderLine(line))
        corrections.push(...corrected.changes)
        const text = corrected.text
        if (!text) continue

        const forbidden = [...new Set(Array.from(text).filter(char => !this.tables.isValidChar(char)))]
        if (forbidden.length > 0) {
          issues.push({
            ...context,
            severity: severity('error'),
            code: 'FORBIDDEN_CHARACTER',
            message: `Forbidden character(s) ${forbidden.map(char => `"${char}"`).join(', ')} found in "${text}"`,
            text
          })
        }

        const bracketProblem = checkBrackets(text)
        if (bracketProblem) {
          issues.push({
            ...context,
            severity: severity('error'),
            code: 'MALFORMED_BRACKETS',
            message: `${bracketProblem}: "${text}"`,
            text
          })
        }
      }

      issues.push(
        ...this.checkRelocations(part).map(issue => ({ ...issue, severity: severity(issue.severity) }))
      )
    }

    const errorCount = issues.filter(issue => issue.severity === 'error').length
    return {
      issues,
      corrections,
      errorCount,
      warningCount: issues.length - errorCount,
      ok: errorCount === 0
    }
  }

  /**
   * Validate, then serialize. Without ignoreFormattingIssues the first
   * error is thrown.
   */
  format(document: Document, options: FormatOptions = {}): FormatResult {
    const config = options.config ?? DEFAULT_CONFIG
    const logger = options.logger ?? silentLogger

    const report = this.validate(document, config)
    for (const issue of report.issues) {
      if (config.debugMode || issue.severity === 'warning') {
        logger.warn(`[${issue.code}] TM ${document.id} line ${issue.lineNumber}: ${issue.message}`)
      }
    }
    for (const change of report.corrections) {
      logger.info(change)
    }

    const firstError = report.issues.find(issue => issue.severity === 'error')
    if (firstError) {
      throw firstError.error ?? new FormattingError(firstError.message, report)
    }

    return { ...this.serialize(document), report }
  }

  private checkSymbols(
    tokens: Token[],
    lineNumber: string
  ): Pick<ValidationIssue, 'severity' | 'code' | 'message' | 'error'>[] {
    const found: Pick<ValidationIssue, 'severity' | 'code' | 'message' | 'error'>[] = []
    const unsupported = (error: UnsupportedSymbolError) =>
      found.push({ severity: 'error', code: 'UNSUPPORTED_SYMBOL', message: error.message, error })

    for (const token of tokens) {
      switch (token.type) {
        case 'abbreviation':
          if (!token.expansionTextPresent && !this.tables.abbreviations.has(token.key)) {
            unsupported(new UnsupportedSymbolError('abbreviations', token.key, 'ex', lineNumber))
          }
          break
        case 'glyphType':
          if (!this.tables.glyphTypes.has(token.glyphType)) {
            unsupported(new UnsupportedSymbolError('glyphTypes', token.glyphType, 'g', lineNumber))
          }
          break
        case 'milestone':
          if (!this.tables.milestones.has(token.rendition)) {
            unsupported(new UnsupportedSymbolError('milestones', token.rendition, 'milestone', lineNumber))
          }
          break
        case 'rendition':
          if (!this.tables.renditions.has(token.rend)) {
            found.push({
              severity: 'warning',
              code: 'UNKNOWN_RENDITION',
              message: `hi rend="${token.rend}" has no rendition entry, text kept unmarked`
            })
          }
          found.push(...this.checkSymbols(token.inner, lineNumber))
          break
        case 'added':
          found.push(...this.checkSymbols(token.inner, lineNumber))
          break
      }
    }
    return found
  }

  /**
   * Every relocating add with legible content needs its own line directly
   * above or below. Adds holding only lost text are dropped with their line.
   */
  private checkRelocations(part: TextPart): ValidationIssue[] {
    const issues: ValidationIssue[] = []
    const { lines } = part

    lines.forEach((line, index) => {
      if (line.origin === 'relocated') return
      const adds = collectAdds(line.tokens)
      const expected = {
        previous: adds.filter(add => add === 'previous').length,
        next: adds.filter(add => add === 'next').length
      }
      const actual = {
        previous: countRelocated(lines, index, -1),
        next: countRelocated(lines, index, 1)
      }
      for (const target of ['previous', 'next'] as const) {
        if (actual[target] < expected[target]) {
          issues.push({
            severity: 'error',
            code: 'MISSING_TARGET_LINE',
            message: `${expected[target] - actual[target]} added text(s) for the ${target} line left nothing to insert`,
            textPart: part.index,
            lineNumber: line.number
          })
        }
      }
    })
    return issues
  }

  /**
   * Latin capitals typed for Greek ones are replaced when the whole
   * document is in Greek
   */
  private createCorrector(document: Document): (text: string) => { text: string; changes: string[] } {
    const greekOnly = document.languages.length === 1 && document.languages[0] === 'grc'
    const lookalikes = this.tables.characters.latinLookalikes

    return (text: string) => {
      if (!greekOnly) return { text, changes: [] }
      const changes: string[] = []
      let corrected = ''
      for (const char of text) {
        const greek = !this.tables.isValidChar(char) ? lookalikes.get(char) : undefined
        if (greek) {
          changes.push(`Changed "${char}" to "${greek}"`)
          corrected += greek
        } else {
          corrected += char
        }
      }
      return {
        text: corrected,
        changes: changes.map(change => `${change} in "${corrected}"`)
      }
    }
  }
}

// ============ Helpers ============

const collectAdds = (tokens: Token[]): ('previous' | 'next')[] =>
  tokens.flatMap(token => {
    if (token.type === 'added') {
      const nested = collectAdds(token.inner)
      if ((token.target === 'previous' || token.target === 'next') && finalizeTokens(token.inner) !== null) {
        return [token.target, ...nested]
      }
      return nested
    }
    if (token.type === 'rendition') return collectAdds(token.inner)
    return []
  })

const countRelocated = (lines: Line[], index: number, step: 1 | -1): number => {
  const source = lines[index]
  let count = 0
  for (let i = index + step; i >= 0 && i < lines.length; i += step) {
    const line = lines[i]
    if (line.origin !== 'relocated' || line.number !== source.number) break
    count++
  }
  return count
}

/**
 * Describe what is wrong with the brackets of a rendered line, or null.
 * A leading ] and a trailing [ mark text cut off at the line edges.
 */
export const checkBrackets = (text: string): string | null => {
  if (text.includes('[]')) return 'Empty brackets'

  let body = text
  if (body.startsWith(']')) body = body.slice(1)
  if (body.endsWith('[')) body = body.slice(0, -1)

  let open = false
  for (const char of body) {
    if (char === '[') {
      if (open) return 'Nested brackets'
      open = true
    } else if (char === ']') {
      if (!open) return 'Unbalanced brackets'
      open = false
    }
  }
  if (open) return 'Unbalanced brackets'

  if (text.replace(/[[\]?\s]/gu, '') === '') return 'No legible content'
  return null
}
