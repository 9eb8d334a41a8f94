/**
 * Shared helpers for walking TEI element trees
 */

import type { TeiElement, TeiNode } from './types.js'

export const isElement = (node: TeiNode): node is TeiElement =>
  typeof node === 'object' && node !== null

/**
 * Depth-first search for every element with the given tag, in document order
 */
export const findElements = (node: TeiNode | TeiNode[], tag: string): TeiElement[] => {
  const results: TeiElement[] = []
  const walk = (current: TeiNode | TeiNode[]) => {
    if (Array.isArray(current)) {
      current.forEach(walk)
      return
    }
    if (!isElement(current)) {
      return
    }
    if (current.tag === tag) {
      results.push(current)
    }
    current.children.forEach(walk)
  }
  walk(node)
  return results
}

export const findFirst = (node: TeiNode | TeiNode[], tag: string): TeiElement | null =>
  findElements(node, tag)[0] ?? null

/**
 * Concatenated text of a node, comments excluded
 */
export const extractPlainText = (node: TeiNode): string => {
  if (typeof node === 'string') {
    return node
  }
  if (node.tag === '#comment') {
    return ''
  }
  return node.children.map(extractPlainText).join('')
}

export const hasTextContent = (node: TeiNode): boolean => extractPlainText(node).trim() !== ''

/**
 * Text of the first matching element, whitespace collapsed
 */
export const textOf = (node: TeiNode | TeiNode[], tag: string): string => {
  const element = findFirst(node, tag)
  return element ? extractPlainText(element).replace(/\s+/g, ' ').trim() : ''
}

/**
 * Text of every idno element with the given type
 */
export const idnoValues = (node: TeiNode | TeiNode[], type: string): string[] =>
  findElements(node, 'idno')
    .filter(element => element.attrs.type === type)
    .map(element => extractPlainText(element).trim())
    .filter(Boolean)
