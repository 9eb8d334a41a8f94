import { describe, expect, test } from 'vitest'

import { documentLines, finalizeTokens, isBracketClass, TextPartBuilder } from './line-model.js'
import type { GapToken, GlyphToken, Line, SpaceToken, SuppliedToken, Token } from './types.js'

const glyph = (char: string): GlyphToken => ({ type: 'glyph', char, certainty: 'certain' })
const lost = (n?: number): GapToken => ({
  type: 'gap',
  extent: n === undefined ? { kind: 'unknown' } : { kind: 'known', n },
  reason: 'lost',
  position: 'mid_line'
})
const supplied = (n: number): SuppliedToken => ({ type: 'supplied', extent: { kind: 'known', n }, position: 'mid_line' })
const space = (): SpaceToken => ({ type: 'space', extent: { kind: 'unknown' } })

const positions = (tokens: Token[] | null): string[] =>
  (tokens ?? []).map(token => (token.type === 'gap' || token.type === 'supplied' ? token.position : token.type))

describe('isBracketClass', () => {
  test('should include lost gaps, supplied text and unknown gaps', () => {
    expect(isBracketClass(lost(2))).toBe(true)
    expect(isBracketClass(supplied(1))).toBe(true)
    expect(
      isBracketClass({ type: 'gap', extent: { kind: 'unknown' }, reason: 'illegible', position: 'mid_line' })
    ).toBe(true)
  })

  test('should exclude illegible gaps of known length', () => {
    expect(
      isBracketClass({ type: 'gap', extent: { kind: 'known', n: 3 }, reason: 'illegible', position: 'mid_line' })
    ).toBe(false)
  })
})

describe('finalizeTokens', () => {
  test('should mark leading and trailing runs', () => {
    const tokens = finalizeTokens([lost(), supplied(4), glyph('Α'), lost(), supplied(2)])

    expect(positions(tokens)).toEqual(['line_start', 'line_start', 'glyph', 'line_end', 'line_end'])
  })

  test('should leave gaps between letters mid-line', () => {
    const tokens = finalizeTokens([glyph('Α'), lost(3), glyph('Β')])

    expect(positions(tokens)).toEqual(['glyph', 'mid_line', 'glyph'])
  })

  test('should trim spaces at both edges', () => {
    const tokens = finalizeTokens([space(), glyph('Α'), space(), glyph('Β'), space()])

    expect(tokens?.map(token => token.type)).toEqual(['glyph', 'space', 'glyph'])
  })

  test('should drop a line of bracketed tokens only', () => {
    expect(finalizeTokens([supplied(6)])).toBeNull()
    expect(finalizeTokens([lost(), supplied(2)])).toBeNull()
  })

  test('should drop an empty line', () => {
    expect(finalizeTokens([])).toBeNull()
    expect(finalizeTokens([space()])).toBeNull()
  })

  test('should remove supplied text that ended up empty', () => {
    const tokens = finalizeTokens([supplied(0), glyph('Α')])

    expect(tokens).toEqual([glyph('Α')])
  })

  test('should look through transparent abbreviations', () => {
    const tokens = finalizeTokens([
      glyph('Α'),
      lost(2),
      { type: 'abbreviation', expansionTextPresent: true, key: 'ΕΤΟΥΣ' }
    ])

    expect(positions(tokens)).toEqual(['glyph', 'line_end', 'abbreviation'])
  })
})

describe('TextPartBuilder', () => {
  test('should number lines from lb@n', () => {
    const builder = new TextPartBuilder()
    builder.openLine('3')
    builder.append(glyph('Α'))
    builder.openLine('4a')
    builder.append(glyph('Β'))

    expect(builder.finish().map(line => line.number)).toEqual(['3', '4a'])
  })

  test('should continue from the previous number when lb@n is missing', () => {
    const builder = new TextPartBuilder()
    builder.openLine('7a')
    builder.append(glyph('Α'))
    builder.openLine()
    builder.append(glyph('Β'))

    expect(builder.finish().map(line => line.number)).toEqual(['7a', '8'])
  })

  test('should fall back to the ordinal without any number', () => {
    const builder = new TextPartBuilder()
    builder.openLine()
    builder.append(glyph('Α'))
    builder.openLine()
    builder.append(glyph('Β'))

    expect(builder.finish().map(line => line.number)).toEqual(['1', '2'])
  })

  test('should open milestone lines under the current number', () => {
    const builder = new TextPartBuilder()
    builder.openLine('1')
    builder.append(glyph('Α'))
    builder.openMilestoneLine()
    builder.append({ type: 'milestone', rendition: 'paragraphos' })
    builder.openLine('2')
    builder.append(glyph('Β'))

    expect(builder.finish().map(line => [line.number, line.origin])).toEqual([
      ['1', 'text'],
      ['1', 'milestone'],
      ['2', 'text']
    ])
  })

  test('should throw when appending without an open line', () => {
    expect(() => new TextPartBuilder().append(glyph('Α'))).toThrow('No open line to append to')
  })

  test('should place relocated text around its source line, first add nearest', () => {
    const builder = new TextPartBuilder()
    builder.openLine('1')
    builder.append(glyph('Α'))
    builder.relocate({ type: 'added', place: 'above', marker: '↑', target: 'previous', inner: [glyph('Γ'), glyph('Δ')] })
    builder.relocate({ type: 'added', place: 'below', marker: '↓', target: 'next', inner: [glyph('Ε')] })
    builder.relocate({ type: 'added', place: 'above', marker: '↑', target: 'previous', inner: [glyph('Ζ'), glyph('Η')] })
    builder.relocate({ type: 'added', place: 'below', marker: '↓', target: 'next', inner: [glyph('Θ')] })
    builder.openLine('2')
    builder.append(glyph('Β'))

    const lines = builder.finish()

    expect(lines.map(line => [line.number, line.origin, line.tokens.length])).toEqual([
      ['1', 'relocated', 2],
      ['1', 'relocated', 2],
      ['1', 'text', 1],
      ['1', 'relocated', 1],
      ['1', 'relocated', 1],
      ['2', 'text', 1]
    ])
    expect(lines[0].tokens).toEqual([glyph('Ζ'), glyph('Η')])
    expect(lines[1].tokens).toEqual([glyph('Γ'), glyph('Δ')])
    expect(lines[3].tokens).toEqual([glyph('Ε')])
    expect(lines[4].tokens).toEqual([glyph('Θ')])
  })

  test('should drop added text with nothing legible', () => {
    const builder = new TextPartBuilder()
    builder.openLine('1')
    builder.append(glyph('Α'))
    builder.relocate({ type: 'added', place: 'above', marker: '↑', target: 'previous', inner: [lost(3)] })

    expect(builder.finish().map(line => line.origin)).toEqual(['text'])
  })

  test('should ignore adds that stay on their line', () => {
    const builder = new TextPartBuilder()
    builder.openLine('1')
    builder.append(glyph('Α'))
    builder.relocate({ type: 'added', place: 'margin', marker: '↔', target: 'none', inner: [glyph('Γ')] })

    expect(builder.finish()).toHaveLength(1)
  })
})

describe('documentLines', () => {
  test('should list the lines of every text part in order', () => {
    const first: Line = { number: '1', origin: 'text', tokens: [glyph('Α')] }
    const second: Line = { number: '2', origin: 'text', tokens: [glyph('Β')] }
    const third: Line = { number: '1', origin: 'text', tokens: [glyph('Γ')] }

    const lines = documentLines({
      id: 'test',
      languages: ['grc'],
      textParts: [
        { index: 0, lines: [first, second] },
        { index: 1, lines: [third] }
      ]
    })

    expect(lines).toEqual([first, second, third])
  })

  test('should return nothing for a document without text parts', () => {
    expect(documentLines({ id: 'test', languages: [], textParts: [] })).toEqual([])
  })
})
