/**
 * TEI edition walker
 *
 * Walks every ab block of the edition depth-first and turns the markup into
 * lines of tokens.
 */

import { ParseError } from './errors.js'
import { TextPartBuilder } from './line-model.js'
import { silentLogger, type LoggerMethods } from './logger.js'
import { CharacterNormalizer } from './normalizer.js'
import { defaultSymbolTables, SymbolTables } from './symbol-tables.js'
import { extractPlainText, findElements, findFirst, hasTextContent, idnoValues, isElement } from './tei-utils.js'
import {
  DEFAULT_CONFIG,
  type AddedToken,
  type ConverterConfig,
  type Document,
  type Extent,
  type SuppliedToken,
  type TeiElement,
  type TeiNode,
  type TeiTree,
  type TextPart,
  type Token
} from './types.js'

// ============ Element classes ============

/** Elements whose content is read as ordinary text */
const PASS_THROUGH = new Set([
  'choice', 'app', 'lem', 'orig', 'sic', 'surplus', 'abbr', 'q', 'foreign',
  'w', 'seg', 'div', 'name', 'persName', 'placeName', 'date', 'term'
])

/** Editorial alternatives and apparatus left out of the D5 line */
const SKIPPED = new Set([
  '#comment', 'reg', 'corr', 'rdg', 'del', 'note', 'handShift', 'certainty',
  'desc', 'figure', 'ref', 'ex', 'cb', 'pb', 'head'
])

export interface ParseOptions {
  /** Catalog identifier, read from idno[@type="TM"] when absent */
  id?: string
  config?: ConverterConfig
  logger?: LoggerMethods
}

interface Sink {
  /** Tag of the element being collected */
  owner: string
  tokens: Token[]
}

interface WalkContext {
  uncertain: boolean
  /** Collector for hi and add content, null while writing to the line */
  sink: Sink | null
  /** Tokens dropped on emit, used for deleted text */
  omit: ((token: Token) => boolean) | null
}

interface SuppliedRun {
  token: SuppliedToken
  count: number
  unknown: boolean
}

interface ParseState {
  builder: TextPartBuilder
  started: boolean
  supplied: SuppliedRun | null
  emitted: number
  config: ConverterConfig
  logger: LoggerMethods
}

const ROOT_CONTEXT: WalkContext = { uncertain: false, sink: null, omit: null }

const isGapOrSupplied = (token: Token): boolean => token.type === 'gap' || token.type === 'supplied'
const omitAll = (): boolean => true

/**
 * Round to the nearest integer, halves to the even neighbour
 */
const roundHalfEven = (value: number): number => {
  const floor = Math.floor(value)
  const fraction = value - floor
  if (fraction > 0.5) return floor + 1
  if (fraction < 0.5) return floor
  return floor % 2 === 0 ? floor : floor + 1
}

const toInt = (value: string | undefined): number | null => {
  if (value === undefined) return null
  const n = Number.parseInt(value, 10)
  return Number.isNaN(n) ? null : n
}

/**
 * Length from quantity, or the rounded mean of atLeast and atMost
 */
const measuredLength = (attrs: Record<string, string>): number | null => {
  const quantity = toInt(attrs.quantity)
  if (quantity !== null) return quantity
  const atLeast = toInt(attrs.atLeast)
  const atMost = toInt(attrs.atMost)
  if (atLeast !== null && atMost !== null) return roundHalfEven((atLeast + atMost) / 2)
  return null
}

export class TEIParser {
  private readonly normalizer: CharacterNormalizer

  constructor(private readonly tables: SymbolTables = defaultSymbolTables()) {
    this.normalizer = new CharacterNormalizer(tables)
  }

  /**
   * Build the line model of one edition
   */
  parse(tree: TeiTree, options: ParseOptions = {}): Document {
    const config = options.config ?? DEFAULT_CONFIG
    const logger = options.logger ?? silentLogger
    const { root } = tree

    const edition = findElements(root, 'div').find(div => div.attrs.type === 'edition')
    const scope = edition ?? findFirst(root, 'body') ?? root

    const textParts: TextPart[] = []
    for (const block of this.collectBlocks(scope, null)) {
      const lines = this.parseBlock(block.ab, config, logger)
      if (lines.length === 0) continue
      textParts.push({
        index: textParts.length,
        n: block.div?.attrs.n,
        subtype: block.div?.attrs.subtype,
        lang: block.div?.attrs.lang ?? block.ab.attrs.lang,
        lines
      })
    }

    return {
      id: options.id ?? this.extractId(root),
      languages: this.extractLanguages(root),
      textParts
    }
  }

  // ============ Document level ============

  private collectBlocks(
    node: TeiElement,
    div: TeiElement | null
  ): { ab: TeiElement; div: TeiElement | null }[] {
    if (node.tag === 'ab') {
      return [{ ab: node, div }]
    }
    const enclosing = node.tag === 'div' ? node : div
    return node.children
      .filter(isElement)
      .flatMap(child => this.collectBlocks(child, enclosing))
  }

  private extractId(root: TeiElement): string {
    const tm = idnoValues(root, 'TM')[0]?.split(/\s+/)[0]
    return tm || root.attrs.id || 'unknown'
  }

  private extractLanguages(root: TeiElement): string[] {
    const langs = new Set<string>()
    const walk = (node: TeiNode) => {
      if (!isElement(node)) return
      const lang = node.attrs.lang
      if (lang && lang !== 'en') langs.add(lang)
      node.children.forEach(walk)
    }
    walk(root)
    return [...langs]
  }

  private parseBlock(ab: TeiElement, config: ConverterConfig, logger: LoggerMethods) {
    if (!findFirst(ab, 'lb')) {
      if (hasTextContent(ab)) {
        logger.warn(`ab${ab.attrs.n ? ` n="${ab.attrs.n}"` : ''} has text but no lb, skipped`)
      }
      return []
    }

    const state: ParseState = {
      builder: new TextPartBuilder(),
      started: false,
      supplied: null,
      emitted: 0,
      config,
      logger
    }
    for (const child of ab.children) {
      this.walk(child, ROOT_CONTEXT, state)
    }
    return state.builder.finish()
  }

  // ============ Walker ============

  private walk(node: TeiNode, ctx: WalkContext, state: ParseState): void {
    if (typeof node === 'string') {
      this.handleText(node, ctx, state)
      return
    }

    if (state.config.debugMode) {
      state.logger.debug(`<${node.tag}> line ${state.builder.currentNumber}`, node.attrs)
    }

    switch (node.tag) {
      case 'lb':
        this.handleLineBreak(node, ctx, state)
        return
      case 'milestone':
        this.handleMilestone(node, ctx, state)
        return
      case 'gap':
        this.handleGap(node, ctx, state)
        return
      case 'supplied':
        this.handleSupplied(node, ctx, state)
        return
      case 'unclear':
        this.walkChildren(node, { ...ctx, uncertain: true }, state)
        return
      case 'expan':
        this.handleExpansion(node, ctx, state)
        return
      case 'g':
        this.handleGlyph(node, ctx, state)
        return
      case 'hi':
        this.handleRendition(node, ctx, state)
        return
      case 'add':
        this.handleAdd(node, ctx, state)
        return
      case 'space':
        this.handleSpace(node, ctx, state)
        return
      case 'num':
        this.walkChildren(node, ctx, state)
        if ('tick' in node.attrs) {
          this.emit({ type: 'mark', char: "'" }, ctx, state)
        }
        return
      case 'subst':
        this.handleSubstitution(node, ctx, state)
        return
    }

    if (SKIPPED.has(node.tag)) {
      if (state.config.debugMode) {
        state.logger.debug(`skipped <${node.tag}>`)
      }
      return
    }
    if (PASS_THROUGH.has(node.tag)) {
      this.walkChildren(node, ctx, state)
      return
    }
    if (hasTextContent(node)) {
      throw new ParseError(`Unsupported element <${node.tag}> with text content`, {
        element: node.tag,
        lineNumber: state.builder.currentNumber
      })
    }
    if (state.config.debugMode) {
      state.logger.debug(`skipped empty unsupported <${node.tag}>`)
    }
  }

  private walkChildren(node: TeiElement, ctx: WalkContext, state: ParseState): void {
    for (const child of node.children) {
      this.walk(child, ctx, state)
    }
  }

  /**
   * Collect the tokens of a subtree instead of writing them to the line
   */
  private collect(owner: TeiElement, ctx: WalkContext, state: ParseState): Token[] {
    const sink: Sink = { owner: owner.tag, tokens: [] }
    for (const child of owner.children) {
      this.walk(child, { ...ctx, sink }, state)
    }
    return sink.tokens
  }

  private emit(token: Token, ctx: WalkContext, state: ParseState): void {
    if (!state.started) {
      throw new ParseError(`<${this.describe(token)}> found before the first line break`, {
        element: this.describe(token)
      })
    }
    state.emitted++

    const run = state.supplied
    if (run && token.type !== 'supplied' && token.type !== 'space' && token.type !== 'milestone') {
      if (token.type === 'gap') {
        if (token.extent.kind === 'unknown') run.unknown = true
        else run.count += token.extent.n
        return
      }
      if (token.type !== 'added' && !(token.type === 'abbreviation' && token.expansionTextPresent)) {
        run.count++
        return
      }
    }

    if (ctx.omit?.(token)) return
    if (ctx.sink) {
      ctx.sink.tokens.push(token)
    } else {
      state.builder.append(token)
    }
  }

  private describe(token: Token): string {
    switch (token.type) {
      case 'glyph':
        return 'text'
      case 'glyphType':
        return 'g'
      case 'rendition':
        return 'hi'
      case 'abbreviation':
        return 'ex'
      default:
        return token.type
    }
  }

  // ============ Handlers ============

  private handleText(text: string, ctx: WalkContext, state: ParseState): void {
    const certainty = ctx.uncertain ? 'uncertain' : 'certain'
    for (const char of this.normalizer.normalizeText(text)) {
      this.emit({ type: 'glyph', char, certainty }, ctx, state)
    }
  }

  /**
   * Close the line, keeping any open supplied run alive on the next one
   */
  private breakLine(open: () => void, state: ParseState): void {
    const run = state.supplied
    if (run) this.closeRun(run)
    open()
    if (run) {
      run.token = { type: 'supplied', extent: { kind: 'known', n: 0 }, position: 'mid_line' }
      run.count = 0
      run.unknown = false
      state.builder.append(run.token)
    }
  }

  private handleLineBreak(node: TeiElement, ctx: WalkContext, state: ParseState): void {
    if (ctx.sink) {
      throw new ParseError(`Line break inside ${ctx.sink.owner} cannot be resolved`, {
        element: 'lb',
        lineNumber: state.builder.currentNumber
      })
    }
    this.breakLine(() => state.builder.openLine(node.attrs.n), state)
    state.started = true
  }

  private handleMilestone(node: TeiElement, ctx: WalkContext, state: ParseState): void {
    const rendition = node.attrs.rend
    if (!rendition) return
    // Unknown renditions stay on the line so that validation reports them
    if (!this.tables.milestones.has(rendition)) {
      this.emit({ type: 'milestone', rendition }, ctx, state)
      return
    }
    if (!state.started || ctx.sink) {
      throw new ParseError('Milestone without an enclosing line', {
        element: 'milestone',
        lineNumber: state.builder.currentNumber
      })
    }
    this.breakLine(() => state.builder.openMilestoneLine(), state)
    this.emit({ type: 'milestone', rendition }, ctx, state)
  }

  private handleGap(node: TeiElement, ctx: WalkContext, state: ParseState): void {
    const { attrs } = node
    if (attrs.unit === 'line') return

    const reason = attrs.reason === 'illegible' ? 'illegible' : 'lost'
    const length = attrs.unit === undefined ? null : measuredLength(attrs)
    let extent: Extent
    if (length !== null) {
      extent = { kind: 'known', n: length }
    } else if (attrs.unit === undefined || attrs.extent === 'unknown' || reason === 'illegible' || !attrs.extent) {
      extent = { kind: 'unknown' }
    } else {
      // A lost gap measured in anything but characters has no D5 form
      return
    }
    this.emit({ type: 'gap', extent, reason, position: 'mid_line' }, ctx, state)
  }

  private handleSupplied(node: TeiElement, ctx: WalkContext, state: ParseState): void {
    if (node.attrs.reason === 'omitted') return
    if (ctx.omit) {
      this.walkChildren(node, { ...ctx, omit: omitAll }, state)
      return
    }
    if (state.supplied) {
      this.walkChildren(node, ctx, state)
      return
    }

    const token: SuppliedToken = { type: 'supplied', extent: { kind: 'known', n: 0 }, position: 'mid_line' }
    this.emit(token, ctx, state)
    const run: SuppliedRun = { token, count: 0, unknown: false }
    state.supplied = run
    try {
      this.walkChildren(node, ctx, state)
    } finally {
      state.supplied = null
    }

    const quantity = node.attrs.unit === 'character' ? toInt(node.attrs.quantity) : null
    if (run.token === token && run.count === 0 && !run.unknown && quantity !== null) {
      run.count = quantity
    }
    this.closeRun(run)
  }

  private closeRun(run: SuppliedRun): void {
    run.token.extent = run.unknown ? { kind: 'unknown' } : { kind: 'known', n: run.count }
  }

  /**
   * expan: literal text wins, the ex content is only rendered as a symbol
   * when nothing else in the expansion carries text
   */
  private handleExpansion(node: TeiElement, ctx: WalkContext, state: ParseState): void {
    const before = state.emitted
    const expansions: TeiElement[] = []
    for (const child of node.children) {
      if (isElement(child) && child.tag === 'ex') {
        expansions.push(child)
      } else {
        this.walk(child, ctx, state)
      }
    }
    const expansionTextPresent = state.emitted > before

    for (const ex of expansions) {
      const letters = this.normalizer.normalizeText(extractPlainText(ex)).join('')
      if (!letters) continue
      this.emit(
        { type: 'abbreviation', expansionTextPresent, key: SymbolTables.abbreviationKey(letters) },
        ctx,
        state
      )
    }
  }

  private handleGlyph(node: TeiElement, ctx: WalkContext, state: ParseState): void {
    const glyphType = node.attrs.type
    if (!glyphType) return
    this.emit({ type: 'glyphType', glyphType }, ctx, state)
  }

  private handleRendition(node: TeiElement, ctx: WalkContext, state: ParseState): void {
    const rend = node.attrs.rend
    if (!rend) {
      this.walkChildren(node, ctx, state)
      return
    }
    const inner = this.collect(node, ctx, state)
    if (inner.length > 0) {
      this.emit({ type: 'rendition', rend, inner }, ctx, state)
    }
  }

  private handleAdd(node: TeiElement, ctx: WalkContext, state: ParseState): void {
    const place = node.attrs.place ?? 'inline'
    const placement = this.tables.placements.get(place)
    if (!placement && state.config.debugMode) {
      state.logger.debug(`add place="${place}" has no placement entry, kept inline`)
    }

    const inner = this.collect(node, ctx, state)
    const singleLetterAbove = place === 'above' && inner.length === 1 && inner[0].type === 'glyph'
    if (!placement || placement.target === 'inline' || singleLetterAbove) {
      for (const token of inner) {
        this.emit(token, ctx, state)
      }
      return
    }

    if (inner.length === 0 && placement.target !== 'none') return

    const added: AddedToken = { type: 'added', place, marker: placement.marker, target: placement.target, inner }
    this.emit(added, ctx, state)
    state.builder.relocate(added)
  }

  private handleSpace(node: TeiElement, ctx: WalkContext, state: ParseState): void {
    const { attrs } = node
    if (attrs.unit === 'line') return
    const length = attrs.unit === undefined ? null : measuredLength(attrs)
    if (length === null && attrs.unit !== undefined && !attrs.extent) return
    const extent: Extent = length === null ? { kind: 'unknown' } : { kind: 'known', n: length }
    this.emit({ type: 'space', extent }, ctx, state)
  }

  /**
   * subst: the inline addition replaces the deletion; without one the
   * deleted text stands, minus its gaps
   */
  private handleSubstitution(node: TeiElement, ctx: WalkContext, state: ParseState): void {
    const children = node.children.filter(isElement)
    const inlineAdd = children.find(child => child.tag === 'add' && child.attrs.place === 'inline')
    if (inlineAdd) {
      this.walkChildren(inlineAdd, ctx, state)
      return
    }
    for (const del of children.filter(child => child.tag === 'del')) {
      this.walkChildren(del, { ...ctx, omit: isGapOrSupplied }, state)
    }
  }
}
