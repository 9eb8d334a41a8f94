import type { ValidationReport } from './formatter.js'

/**
 * ParseError
 *
 * Markup whose structure leaves no coherent line context, e.g. text before
 * the first lb of a block or a line break inside an add. Fatal for the
 * document being parsed.
 */
export class ParseError extends Error {
  readonly element: string
  readonly lineNumber?: string

  constructor(
    message: string,
    context: { element: string; lineNumber?: string },
    options?: ErrorOptions
  ) {
    super(message, options)
    this.name = 'ParseError'
    this.element = context.element
    this.lineNumber = context.lineNumber
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error)
  }

  /**
   * Create ParseError from unknown error with context
   */
  static fromError(context: string, error: unknown): ParseError {
    return new ParseError(
      `${context}: ${ParseError.getErrorMessage(error)}`,
      { element: context },
      { cause: error }
    )
  }
}

export type SymbolTableName = 'abbreviations' | 'glyphTypes' | 'milestones'

/**
 * UnsupportedSymbolError
 *
 * A markup value with no entry in its symbol table. Carries enough context
 * to add the missing entry.
 */
export class UnsupportedSymbolError extends Error {
  readonly table: SymbolTableName
  readonly value: string
  readonly element: string
  readonly lineNumber: string

  constructor(table: SymbolTableName, value: string, element: string, lineNumber: string) {
    super(`Unsupported ${element} value "${value}" in line ${lineNumber} (no ${table} entry)`)
    this.name = 'UnsupportedSymbolError'
    this.table = table
    this.value = value
    this.element = element
    this.lineNumber = lineNumber
  }
}

/**
 * FormattingError
 *
 * Thrown in strict mode when validation found errors other than
 * unsupported symbols.
 */
export class FormattingError extends Error {
  readonly report: ValidationReport

  constructor(message: string, report: ValidationReport) {
    super(message)
    this.name = 'FormattingError'
    this.report = report
  }

  /**
   * Get formatted error summary
   */
  getSummary(): string {
    const lines = [`Formatting failed: ${this.report.issues.length} issue(s)`]
    for (const issue of this.report.issues) {
      lines.push(`  [${issue.code}] line ${issue.lineNumber}: ${issue.message}`)
    }
    return lines.join('\n')
  }
}

/**
 * SymbolTableError
 *
 * A symbol or character table file that does not have the expected shape.
 */
export class SymbolTableError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'SymbolTableError'
  }
}
