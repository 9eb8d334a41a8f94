// Types
export type {
  TeiElement,
  TeiNode,
  TeiTree,
  Certainty,
  Position,
  Extent,
  GapReason,
  AddTarget,
  GlyphToken,
  GapToken,
  SuppliedToken,
  SpaceToken,
  MilestoneToken,
  AbbreviationToken,
  GlyphTypeToken,
  MarkToken,
  RenditionToken,
  AddedToken,
  Token,
  LineOrigin,
  Line,
  TextPart,
  Document,
  ConverterConfig
} from './types.js'
export { DEFAULT_CONFIG } from './types.js'

// Logging and errors
export { silentLogger } from './logger.js'
export type { LoggerMethods, LogFn } from './logger.js'
export { ParseError, UnsupportedSymbolError, FormattingError, SymbolTableError } from './errors.js'
export type { SymbolTableName } from './errors.js'

// Symbol tables and normalization
export {
  SymbolTables,
  defaultSymbolTables,
  COMBINING_DOT_BELOW,
  ABBREVIATION_FALLBACK,
  ABBREVIATION_KEY_LENGTH
} from './symbol-tables.js'
export type { RenditionEntry, RenditionMode, PlacementEntry, CharacterTable } from './symbol-tables.js'
export { CharacterNormalizer } from './normalizer.js'

// Pipeline
export { TeiReader } from './xml-reader.js'
export { TEIParser } from './tei-parser.js'
export type { ParseOptions } from './tei-parser.js'
export { TextPartBuilder, documentLines, finalizeTokens, isBracketClass } from './line-model.js'
export { Formatter, renderGap, checkBrackets } from './formatter.js'
export type {
  IssueCode,
  IssueSeverity,
  ValidationIssue,
  ValidationReport,
  LineRecord,
  SerializedTextPart,
  SerializedDocument,
  FormatResult,
  FormatOptions
} from './formatter.js'
export { convertXml, toPlainText } from './convert.js'
export type { ConvertOptions } from './convert.js'

// TEI helpers
export { findElements, findFirst, extractPlainText, textOf, idnoValues } from './tei-utils.js'
