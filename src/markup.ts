import type { RunColor, RunStyle, StyledRun } from './types'
import { escapeXml, unescapeXml } from './xml-utils'

/**
 * Text of a run that stands for a hard line break (`a:br`)
 */
export const LINE_BREAK = '\v'

export const PLAIN_STYLE: RunStyle = {
  bold: false,
  italic: false,
  underline: false,
  strike: false,
  fontSizePt: null,
  color: null,
}

// Any `<tag attr="...">`, `</tag>` or `<tag/>`; a bare "<" that is not a tag stays text
const TAG_REGEX = /<(\/?)([a-z][\w:-]*)((?:\s+[^<>]*?)?)\s*(\/?)>/gi

const ATTR_REGEX = /([\w:-]+)\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>]+))/g

const LINE_BREAK_REGEX = /\r\n|[\n\r\v]/

export function formatColor(color: RunColor): string {
  if (color.kind === 'rgb') return `#${color.hex}`
  return color.brightness === null
    ? `theme:${color.themeId}`
    : `theme:${color.themeId}:${color.brightness}`
}

export function parseColor(value: string): RunColor | null {
  const v = value.trim()
  const rgb = v.match(/^#([0-9a-f]{6})$/i)
  if (rgb?.[1]) return { kind: 'rgb', hex: rgb[1].toUpperCase() }

  const theme = v.match(/^theme:(\d+)(?::(-?\d*\.?\d+))?$/i)
  if (theme?.[1]) {
    const brightness = theme[2] === undefined ? null : Number.parseFloat(theme[2])
    return {
      kind: 'theme',
      themeId: Number.parseInt(theme[1], 10),
      brightness: brightness !== null && Number.isFinite(brightness) ? brightness : null,
    }
  }
  return null
}

function formatSize(pt: number): string {
  return String(Math.round(pt * 100) / 100)
}

function parseSize(value: string): number | null {
  const pt = Number.parseFloat(value)
  return Number.isFinite(pt) && pt > 0 ? pt : null
}

function spaceToken(count: number): string {
  return count === 1 ? '<sp/>' : `<sp n="${count}"/>`
}

/**
 * Escape one line of run text. Leading and trailing spaces become explicit
 * `<sp/>` tokens because models trim them.
 */
function encodeLine(line: string): string {
  if (line.length === 0) return ''
  if (/^ +$/.test(line)) return spaceToken(line.length)

  const leading = line.match(/^ +/)?.[0].length ?? 0
  const trailing = line.match(/ +$/)?.[0].length ?? 0
  const core = line.slice(leading, line.length - trailing)

  return (leading ? spaceToken(leading) : '')
    + escapeXml(core)
    + (trailing ? spaceToken(trailing) : '')
}

function encodeText(text: string): string {
  return text.split(LINE_BREAK_REGEX).map(encodeLine).join('<br/>')
}

/**
 * Serialize one run: size outermost, then color, then b/i/u/s closest to the text
 */
export function encodeRun(run: StyledRun): string {
  if (run.text.length === 0) return ''

  let body = encodeText(run.text)
  if (run.strike) body = `<s>${body}</s>`
  if (run.underline) body = `<u>${body}</u>`
  if (run.italic) body = `<i>${body}</i>`
  if (run.bold) body = `<b>${body}</b>`
  if (run.color) body = `<c v="${formatColor(run.color)}">${body}</c>`
  if (run.fontSizePt !== null) body = `<sz v="${formatSize(run.fontSizePt)}">${body}</sz>`
  return body
}

/**
 * Serialize a paragraph's runs into the tagged markup sent to the model
 */
export function encodeRuns(runs: StyledRun[]): string {
  return runs.map(encodeRun).join('')
}

function parseAttributes(raw: string): Map<string, string> {
  const attrs = new Map<string, string>()
  let match: RegExpExecArray | null
  ATTR_REGEX.lastIndex = 0

  // eslint-disable-next-line no-cond-assign
  while ((match = ATTR_REGEX.exec(raw)) !== null) {
    const name = match[1]
    if (name) attrs.set(name.toLowerCase(), match[2] ?? match[3] ?? match[4] ?? '')
  }
  return attrs
}

/**
 * Inline CSS from `<span style="...">`, which models produce when they
 * "helpfully" rewrite the markup as HTML
 */
function applyCss(style: RunStyle, css: string): void {
  for (const declaration of css.split(';')) {
    const [key, value] = declaration.split(':').map(part => part.trim().toLowerCase())
    if (!key || !value) continue
    if (key === 'font-size' && value.endsWith('pt')) {
      style.fontSizePt = parseSize(value.slice(0, -2)) ?? style.fontSizePt
    }
    else if (key === 'color') {
      style.color = parseColor(value) ?? style.color
    }
  }
}

function applyTag(style: RunStyle, tag: string, attrs: Map<string, string>): void {
  switch (tag) {
    case 'b':
    case 'strong':
      style.bold = true
      break
    case 'i':
    case 'em':
      style.italic = true
      break
    case 'u':
    case 'ins':
      style.underline = true
      break
    case 's':
    case 'strike':
    case 'del':
      style.strike = true
      break
    case 'sz':
      style.fontSizePt = parseSize(attrs.get('v') ?? '') ?? style.fontSizePt
      break
    case 'c':
      style.color = parseColor(attrs.get('v') ?? '') ?? style.color
      break
    case 'span':
    case 'font':
      applyCss(style, attrs.get('style') ?? '')
      style.color = parseColor(attrs.get('color') ?? '') ?? style.color
      break
    default:
      // Unknown tags still open a scope so their close tag balances
      break
  }
}

interface OpenTag {
  tag: string
  saved: RunStyle
}

/**
 * Parse (possibly model-mangled) markup back into styled runs. Never throws:
 * unclosed tags close at end of input and stray close tags are ignored.
 */
export function decodeMarkup(markup: string): StyledRun[] {
  const runs: StyledRun[] = []
  const stack: OpenTag[] = []
  let style: RunStyle = { ...PLAIN_STYLE }
  let cursor = 0

  const emit = (text: string) => {
    if (text.length > 0) runs.push({ text, ...style })
  }

  let match: RegExpExecArray | null
  TAG_REGEX.lastIndex = 0

  // eslint-disable-next-line no-cond-assign
  while ((match = TAG_REGEX.exec(markup)) !== null) {
    emit(unescapeXml(markup.slice(cursor, match.index)))
    cursor = match.index + match[0].length

    const closing = match[1] === '/'
    const tag = (match[2] ?? '').toLowerCase()
    const selfClosing = match[4] === '/'
    const attrs = parseAttributes(match[3] ?? '')

    if (tag === 'br') {
      if (!closing) emit(LINE_BREAK)
      continue
    }
    if (tag === 'sp') {
      if (!closing) {
        const count = Number.parseInt(attrs.get('n') ?? '1', 10)
        emit(' '.repeat(Number.isFinite(count) && count > 0 ? count : 1))
      }
      continue
    }

    if (closing) {
      const depth = stack.map(open => open.tag).lastIndexOf(tag)
      if (depth === -1) continue
      // Closing an outer tag implicitly closes everything opened inside it
      const [closed] = stack.splice(depth)
      if (closed) style = closed.saved
      continue
    }
    if (selfClosing) continue

    stack.push({ tag, saved: style })
    style = { ...style }
    applyTag(style, tag, attrs)
  }

  emit(unescapeXml(markup.slice(cursor)))
  return runs
}

export function sameStyle(a: RunStyle, b: RunStyle): boolean {
  return a.bold === b.bold
    && a.italic === b.italic
    && a.underline === b.underline
    && a.strike === b.strike
    && a.fontSizePt === b.fontSizePt
    && sameColor(a.color, b.color)
}

function sameColor(a: RunColor | null, b: RunColor | null): boolean {
  if (a === null || b === null) return a === b
  if (a.kind === 'rgb') return b.kind === 'rgb' && a.hex === b.hex
  return b.kind === 'theme' && a.themeId === b.themeId && a.brightness === b.brightness
}

/**
 * Join adjacent runs that share a style
 */
export function mergeRuns(runs: StyledRun[]): StyledRun[] {
  const out: StyledRun[] = []
  for (const run of runs) {
    const last = out[out.length - 1]
    if (last && sameStyle(last, run)) {
      last.text += run.text
    }
    else {
      out.push({ ...run })
    }
  }
  return out
}

export function plainText(runs: StyledRun[]): string {
  return runs.map(run => run.text).join('')
}
