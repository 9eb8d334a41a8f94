/**
 * TEI element tree and D5 line model types
 */

// ============ TEI tree ============

export interface TeiElement {
  /** Local tag name (lb, gap, supplied, ...) */
  tag: string
  /** Namespace prefix, tei unless the source says otherwise */
  ns?: string
  /** Attributes, xml:id and xml:lang simplified to id and lang */
  attrs: Record<string, string>
  /** Child elements or text */
  children: TeiNode[]
}

export type TeiNode = string | TeiElement

export interface TeiTree {
  /** The TEI root element */
  root: TeiElement
}

// ============ Tokens ============

export type Certainty = 'certain' | 'uncertain'

export type Position = 'line_start' | 'line_end' | 'mid_line'

export type Extent = { kind: 'known'; n: number } | { kind: 'unknown' }

export type GapReason = 'lost' | 'illegible'

export type AddTarget = 'previous' | 'next' | 'inline' | 'none'

export interface GlyphToken {
  type: 'glyph'
  /** Majuscule base letter, diacritics stripped */
  char: string
  certainty: Certainty
}

export interface GapToken {
  type: 'gap'
  extent: Extent
  reason: GapReason
  position: Position
}

export interface SuppliedToken {
  type: 'supplied'
  extent: Extent
  position: Position
}

export interface SpaceToken {
  type: 'space'
  extent: Extent
}

export interface MilestoneToken {
  type: 'milestone'
  rendition: string
}

export interface AbbreviationToken {
  type: 'abbreviation'
  /** True when the expansion carried literal text, which was emitted as glyphs instead */
  expansionTextPresent: boolean
  /** First letters of the normalized expansion, the abbreviation table key */
  key: string
}

export interface GlyphTypeToken {
  type: 'glyphType'
  glyphType: string
}

export interface MarkToken {
  type: 'mark'
  char: string
}

export interface RenditionToken {
  type: 'rendition'
  rend: string
  inner: Token[]
}

export interface AddedToken {
  type: 'added'
  place: string
  marker: string
  target: AddTarget
  inner: Token[]
}

export type Token =
  | GlyphToken
  | GapToken
  | SuppliedToken
  | SpaceToken
  | MilestoneToken
  | AbbreviationToken
  | GlyphTypeToken
  | MarkToken
  | RenditionToken
  | AddedToken

// ============ Document ============

export type LineOrigin = 'text' | 'milestone' | 'relocated'

export interface Line {
  /** lb@n, or derived from the previous line */
  number: string
  origin: LineOrigin
  tokens: Token[]
}

export interface TextPart {
  /** Position of the ab block in the edition */
  index: number
  n?: string
  subtype?: string
  lang?: string
  lines: Line[]
}

export interface Document {
  /** TM number or other catalog identifier */
  id: string
  /** xml:lang values found in the source, except en */
  languages: string[]
  textParts: TextPart[]
}

// ============ Configuration ============

export interface ConverterConfig {
  /** Downgrade validation errors to warnings and still return output */
  readonly ignoreFormattingIssues: boolean
  /** Trace every element through the logger */
  readonly debugMode: boolean
}

export const DEFAULT_CONFIG: ConverterConfig = Object.freeze({
  ignoreFormattingIssues: false,
  debugMode: false
})
