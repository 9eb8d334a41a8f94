/**
 * Line buffer for one text block
 *
 * Tokens are appended to a pending line. Gap and supplied positions are only
 * decided when the line closes, and added text is relocated in a second pass
 * once the whole block is buffered.
 */

import type {
  AddedToken,
  Document,
  GapToken,
  Line,
  LineOrigin,
  Position,
  SuppliedToken,
  Token
} from './types.js'

// ============ Token classes ============

/**
 * Tokens rendered with square brackets, which collapse at line edges
 */
export const isBracketClass = (token: Token): token is GapToken | SuppliedToken =>
  token.type === 'supplied' ||
  (token.type === 'gap' && (token.reason === 'lost' || token.extent.kind === 'unknown'))

/**
 * Tokens that render nothing and never break a run
 */
export const isTransparent = (token: Token): boolean =>
  token.type === 'abbreviation' && token.expansionTextPresent

const isEmptySupplied = (token: Token): boolean =>
  token.type === 'supplied' && token.extent.kind === 'known' && token.extent.n === 0

const isEdgeFiller = (token: Token): boolean => token.type === 'space' || isTransparent(token)

const withPosition = (token: Token, position: Position): Token =>
  token.type === 'gap' || token.type === 'supplied' ? { ...token, position } : token

/**
 * Close a pending line: trim edge spaces, drop empty supplied text and
 * assign gap positions. Returns null when nothing legible is left.
 */
export const finalizeTokens = (pending: Token[]): Token[] | null => {
  const tokens = pending.filter(token => !isEmptySupplied(token))

  let start = 0
  while (start < tokens.length && isEdgeFiller(tokens[start])) start++
  let end = tokens.length
  while (end > start && isEdgeFiller(tokens[end - 1])) end--
  const trimmed = tokens.filter((token, i) => (i >= start && i < end) || token.type !== 'space')

  const visible = trimmed.filter(token => !isTransparent(token))
  if (visible.length === 0 || visible.every(isBracketClass)) {
    return null
  }

  const positioned = trimmed.map(token => withPosition(token, 'mid_line'))
  for (let i = 0; i < positioned.length; i++) {
    const token = positioned[i]
    if (isTransparent(token)) continue
    if (!isBracketClass(token)) break
    positioned[i] = withPosition(token, 'line_start')
  }
  for (let i = positioned.length - 1; i >= 0; i--) {
    const token = positioned[i]
    if (isTransparent(token)) continue
    if (!isBracketClass(token)) break
    positioned[i] = withPosition(token, 'line_end')
  }
  return positioned
}

/**
 * Every line of a document, text parts in order
 */
export const documentLines = (document: Document): Line[] =>
  document.textParts.flatMap(part => part.lines)

// ============ Builder ============

interface PendingLine {
  number: string
  origin: LineOrigin
  tokens: Token[]
}

interface Relocation {
  source: PendingLine
  target: 'previous' | 'next'
  tokens: Token[]
}

const LEADING_DIGITS = /^\d+/

export class TextPartBuilder {
  private closed: { pending: PendingLine; line: Line }[] = []
  private current: PendingLine | null = null
  private relocations: Relocation[] = []
  private lastNumber: string | null = null
  private ordinal = 0

  /**
   * Number of the pending line, or of the last one if none is open
   */
  get currentNumber(): string {
    return this.current?.number ?? this.lastNumber ?? '?'
  }

  /**
   * Close the pending line and open a text line, numbered from lb@n
   */
  openLine(explicitNumber?: string): void {
    this.closeLine()
    this.ordinal++
    const number = explicitNumber?.trim() || this.nextNumber()
    this.current = { number, origin: 'text', tokens: [] }
    this.lastNumber = number
  }

  /**
   * Close the pending line and open a milestone line under the same number
   */
  openMilestoneLine(): void {
    const number = this.currentNumber
    this.closeLine()
    this.current = { number, origin: 'milestone', tokens: [] }
  }

  append(token: Token): void {
    if (!this.current) {
      throw new Error('No open line to append to')
    }
    this.current.tokens.push(token)
  }

  /**
   * Record added text to be moved next to the pending line
   */
  relocate(added: AddedToken): void {
    if (!this.current || (added.target !== 'previous' && added.target !== 'next')) {
      return
    }
    this.relocations.push({ source: this.current, target: added.target, tokens: added.inner })
  }

  closeLine(): void {
    if (!this.current) return
    const pending = this.current
    this.current = null
    const tokens = finalizeTokens(pending.tokens)
    if (tokens) {
      this.closed.push({ pending, line: { number: pending.number, origin: pending.origin, tokens } })
    }
  }

  /**
   * Close the block and resolve relocations. The first add of a line ends
   * up nearest to it, above as well as below.
   */
  finish(): Line[] {
    this.closeLine()

    const before = new Map<PendingLine, Line[]>()
    const after = new Map<PendingLine, Line[]>()
    for (const relocation of this.relocations) {
      const tokens = finalizeTokens(relocation.tokens)
      if (!tokens) continue
      const bucket = relocation.target === 'previous' ? before : after
      const lines = bucket.get(relocation.source) ?? []
      const line: Line = { number: relocation.source.number, origin: 'relocated', tokens }
      if (relocation.target === 'previous') lines.unshift(line)
      else lines.push(line)
      bucket.set(relocation.source, lines)
    }

    return this.closed.flatMap(({ pending, line }) => [
      ...(before.get(pending) ?? []),
      line,
      ...(after.get(pending) ?? [])
    ])
  }

  private nextNumber(): string {
    const match = this.lastNumber ? LEADING_DIGITS.exec(this.lastNumber) : null
    return match ? String(Number(match[0]) + 1) : String(this.ordinal)
  }
}
