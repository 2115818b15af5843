import { DOMParser, XMLSerializer } from '@xmldom/xmldom'

export const NS_A = 'http://schemas.openxmlformats.org/drawingml/2006/main'
export const NS_P = 'http://schemas.openxmlformats.org/presentationml/2006/main'
export const NS_R = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships'

const ELEMENT_NODE = 1

function failOnParseError(message: string): never {
  throw new Error(`Malformed XML: ${message}`)
}

/**
 * Parse an XML part into a DOM document. Parser warnings are ignored,
 * errors throw.
 */
export function parseXml(xml: string): Document {
  const parser = new DOMParser({
    errorHandler: {
      warning: () => undefined,
      error: failOnParseError,
      fatalError: failOnParseError,
    },
  })
  return parser.parseFromString(xml, 'text/xml')
}

export function serializeXml(doc: Document): string {
  return new XMLSerializer().serializeToString(doc)
}

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE
}

export function cloneElement(el: Element): Element {
  const clone = el.cloneNode(true)
  if (!isElement(clone)) throw new Error(`Could not clone <${el.nodeName}>`)
  return clone
}

/**
 * Direct element children, optionally filtered by qualified name (e.g. "a:r")
 */
export function childElements(parent: Element, ...names: string[]): Element[] {
  const out: Element[] = []
  for (let node: ChildNode | null = parent.firstChild; node; node = node.nextSibling) {
    if (isElement(node) && (names.length === 0 || names.includes(node.nodeName))) {
      out.push(node)
    }
  }
  return out
}

export function firstChild(parent: Element, name: string): Element | null {
  return childElements(parent, name)[0] ?? null
}

/**
 * Walk a chain of direct children, e.g. `findPath(sp, 'p:spPr', 'a:xfrm', 'a:off')`
 */
export function findPath(parent: Element, ...names: string[]): Element | null {
  let current: Element | null = parent
  for (const name of names) {
    if (!current) return null
    current = firstChild(current, name)
  }
  return current
}

export function intAttr(el: Element | null, name: string): number | null {
  const raw = el?.getAttribute(name)
  if (raw === null || raw === undefined || raw === '') return null
  const value = Number.parseInt(raw, 10)
  return Number.isFinite(value) ? value : null
}

/**
 * Concatenated text of every descendant `a:t` element
 */
export function textOf(el: Element): string {
  const texts: string[] = []
  const nodes = el.getElementsByTagName('a:t')
  for (let i = 0; i < nodes.length; i++) {
    texts.push(nodes.item(i)?.textContent ?? '')
  }
  return texts.join('')
}

export function removeChildren(parent: Element, names: string[]): void {
  for (const child of childElements(parent, ...names)) {
    parent.removeChild(child)
  }
}

/**
 * Escape special XML characters
 */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;')
}

function fromCodePoint(code: number, fallback: string): string {
  return code <= 0x10FFFF ? String.fromCodePoint(code) : fallback
}

/**
 * Unescape XML entities back to normal characters. Numeric references are
 * decoded too, since models sometimes emit them for quotes.
 */
export function unescapeXml(text: string): string {
  return text
    .replace(/&#x([0-9a-f]+);/gi, (ref: string, hex: string) => fromCodePoint(Number.parseInt(hex, 16), ref))
    .replace(/&#(\d+);/g, (ref: string, dec: string) => fromCodePoint(Number.parseInt(dec, 10), ref))
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, '\'')
    .replace(/&amp;/g, '&')
}
