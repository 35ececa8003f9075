/**
 * XML Payload Reading
 *
 * Tag extraction reads only the prolog and the root element's name.
 * Full parsing is left to fast-xml-parser once the tag has resolved.
 */

import { XMLParser } from 'fast-xml-parser'

// XML declaration, processing instructions, comments, doctype and whitespace before the root
const PROLOG = /^(?:\s+|<\?[\s\S]*?\?>|<!--[\s\S]*?-->|<!DOCTYPE[^>[]*(?:\[[\s\S]*?\])?\s*>)*/i
const ROOT_NAME = /^<([A-Za-z_][\w.:-]*)(?=[\s/>])/

/**
 * Read the root element name, lower-cased. Returns undefined when the text
 * does not start with an element after its prolog.
 */
export function readRootTag(text: string): string | undefined {
  const body = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text
  const prolog = PROLOG.exec(body)
  const rest = prolog ? body.slice(prolog[0].length) : body
  const match = ROOT_NAME.exec(rest)
  return match ? match[1].toLowerCase() : undefined
}

/**
 * XML document parser configuration
 */
export interface XmlDocumentOptions {
  /**
   * Element paths that always decode to arrays, lower-cased and dot-separated
   * from the root (e.g. 'dynamicresults.breakdown.qso')
   */
  arrayPaths?: readonly string[]
}

export type XmlElement = Record<string, unknown>

function isRecord(value: unknown): value is XmlElement {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export interface XmlDocumentParser {
  /**
   * Parse the document and return the content of the root element named
   * `tag` (compared case-insensitively).
   *
   * @throws Error when the document is not well-formed or has no such root
   */
  parseRoot(text: string, tag: string): XmlElement
}

export function createXmlDocumentParser(options: XmlDocumentOptions = {}): XmlDocumentParser {
  const arrayPaths = new Set((options.arrayPaths ?? []).map((path) => path.toLowerCase()))

  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '',
    textNodeName: '#text',
    ignoreDeclaration: true,
    ignorePiTags: true,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
    isArray: (_name, jpath) => arrayPaths.has(String(jpath).toLowerCase()),
  })

  return {
    parseRoot(text: string, tag: string): XmlElement {
      const document: unknown = parser.parse(text, true)
      if (!isRecord(document)) {
        throw new Error('Document did not parse to an element tree')
      }

      const rootKey = Object.keys(document).find((key) => key.toLowerCase() === tag)
      if (rootKey === undefined) {
        throw new Error(`Root element '${tag}' not found`)
      }

      const root = document[rootKey]
      // <AppInfo/> and <AppInfo></AppInfo> parse to ''
      if (root === '' || root === undefined || root === null) return {}
      if (!isRecord(root)) {
        throw new Error(`Root element '${tag}' has no child elements`)
      }
      return root
    },
  }
}
