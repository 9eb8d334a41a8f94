/**
 * TEI XML reader
 * Uses fast-xml-parser in preserveOrder mode so that mixed content keeps
 * its document order
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser'

import { ParseError } from './errors.js'
import type { TeiElement, TeiNode, TeiTree } from './types.js'

type RawNode = Record<string, unknown>

const isRawNode = (value: unknown): value is RawNode =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

export class TeiReader {
  private parser: XMLParser

  constructor() {
    this.parser = new XMLParser({
      ignoreAttributes: false,
      attributeNamePrefix: '@_',
      preserveOrder: true,
      commentPropName: '#comment',
      textNodeName: '#text',
      trimValues: false,
      parseTagValue: false,
      parseAttributeValue: false,
      ignoreDeclaration: true,
      ignorePiTags: true
    })
  }

  /**
   * Parse an XML string into a TEI element tree
   */
  read(xml: string): TeiTree {
    const validation = XMLValidator.validate(xml)
    if (validation !== true) {
      const { msg, line } = validation.err
      throw new ParseError(`Malformed XML at line ${line}: ${msg}`, { element: '#document' })
    }

    let parsed: unknown
    try {
      parsed = this.parser.parse(xml)
    } catch (e) {
      throw ParseError.fromError('#document', e)
    }

    const nodes = Array.isArray(parsed) ? this.convertNodes(parsed) : []
    const root = nodes.find((node): node is TeiElement => typeof node !== 'string')
    if (!root) {
      throw new ParseError('Invalid TEI XML: missing root element', { element: '#document' })
    }
    return { root }
  }

  /**
   * Convert fast-xml-parser nodes into TeiNode
   */
  private convertNodes(nodes: unknown[]): TeiNode[] {
    const result: TeiNode[] = []

    for (const node of nodes) {
      if (typeof node === 'string') {
        result.push(node)
        continue
      }
      if (!isRawNode(node)) {
        continue
      }

      // Text node
      if ('#text' in node) {
        const text = node['#text']
        if (text !== undefined && text !== null) {
          result.push(String(text))
        }
        continue
      }

      // Element node
      const tagKeys = Object.keys(node).filter(k => !k.startsWith(':@'))
      for (const tagKey of tagKeys) {
        const { ns, tag } = this.parseTagName(tagKey)
        const rawAttrs = node[':@']
        const attrs = this.extractAttrs(isRawNode(rawAttrs) ? rawAttrs : {})
        const rawChildren = node[tagKey]
        const children = Array.isArray(rawChildren) ? this.convertNodes(rawChildren) : []

        result.push({ tag, ns, attrs, children })
      }
    }

    return result
  }

  /**
   * Split a tag name into namespace prefix and local name
   */
  private parseTagName(tagKey: string): { ns?: string; tag: string } {
    if (tagKey === '#comment') {
      return { tag: tagKey }
    }
    const colon = tagKey.indexOf(':')
    if (colon > 0) {
      return { ns: tagKey.slice(0, colon), tag: tagKey.slice(colon + 1) }
    }
    // Default TEI namespace
    return { ns: 'tei', tag: tagKey }
  }

  /**
   * Extract attributes, simplifying the xml: prefixed ones
   */
  private extractAttrs(rawAttrs: RawNode): Record<string, string> {
    const attrs: Record<string, string> = {}

    for (const [key, value] of Object.entries(rawAttrs)) {
      if (!key.startsWith('@_') || typeof value !== 'string') continue

      const attrName = key.slice(2)

      if (attrName === 'xml:id') {
        attrs['id'] = value
      } else if (attrName === 'xml:lang') {
        attrs['lang'] = value
      } else {
        attrs[attrName] = value
      }
    }

    return attrs
  }
}
