import type { ChatRequest, TranslationBackend } from './backend'
import type { Glossary } from './glossary'
import type { Logger } from './logger'
import type { BatchItem, BatchResult } from './types'
import { formatGlossary } from './glossary'

export const DELIMITER = ':::'

export const DEFAULT_BODY_PROMPT = [
  'You are a professional translator working on presentation slides.',
  'Translate the {source_language} slide text into natural, concise {target_language}.',
  'Aim to keep every item within {max_chars} characters.',
].join(' ')

export const DEFAULT_CONSTRAINED_PROMPT = [
  'You are translating text that sits inside table cells and grouped diagram shapes.',
  'These boxes cannot grow, so the {target_language} translation must be as short as the meaning allows:',
  'prefer terse phrasing and common abbreviations, never add words,',
  'and never exceed {max_chars} characters per item.',
].join(' ')

const FORMAT_RULES = `Input: one item per line, formatted as "<id> ${DELIMITER} <max_chars> ${DELIMITER} <text>".
Output: exactly one line per item, formatted as "<id> ${DELIMITER} <translation>", reusing the same ids. Output nothing else.

The text carries inline formatting tags. Keep every tag and translate only the text between them:
<b>, <i>, <u>, <s> mark bold, italic, underline and strikethrough; <sz v="..."> sets the font size; <c v="..."> sets the color.
<sp/> is a significant space and <br/> is a line break: keep them at the matching place in the translation.
Keep escaped characters (&amp; &lt; &gt; &quot; &apos;) escaped. Never put a literal line break inside a translation.`

export interface PromptOptions {
  sourceLanguage: string
  targetLanguage: string
  glossary: Glossary
}

/**
 * Replace `{name}` placeholders; unknown placeholders are left alone
 */
export function fillTemplate(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, name: string) => {
    const value = values[name]
    return value === undefined ? placeholder : String(value)
  })
}

/**
 * System instruction for one batch: the context template, the language pair,
 * the wire format, the glossary and the length policy
 */
export function buildSystemPrompt(template: string, items: BatchItem[], options: PromptOptions): string {
  const maxChars = items.reduce((max, item) => Math.max(max, item.limit), 0)
  const values = {
    max_chars: maxChars,
    source_language: options.sourceLanguage,
    target_language: options.targetLanguage,
  }

  const sections = [
    fillTemplate(template, values),
    `Translate from ${options.sourceLanguage} to ${options.targetLanguage}.`,
    FORMAT_RULES,
  ]

  const glossary = formatGlossary(options.glossary)
  if (glossary) {
    sections.push(`Glossary (always use these translations):\n${glossary}`)
  }

  sections.push(
    `Length: <max_chars> is the character budget of each item's translated text, not counting tags `
    + `(at most ${maxChars} in this batch). Shorten the wording rather than exceed it.`,
  )
  return sections.join('\n\n')
}

/**
 * One `<id> ::: <limit> ::: <markup>` line per item
 */
export function serializeBatch(items: BatchItem[]): string {
  return items
    .map(item => `${item.id} ${DELIMITER} ${item.limit} ${DELIMITER} ${item.text}`)
    .join('\n')
}

/**
 * Parse `<id> ::: <translation>` lines. Lines without the delimiter or with a
 * non-numeric id are ignored; the first line for an id wins.
 */
export function parseBatchResponse(response: string): BatchResult[] {
  const results: BatchResult[] = []
  const seen = new Set<number>()

  for (const line of response.split(/\r?\n/)) {
    const at = line.indexOf(DELIMITER)
    if (at === -1) continue

    const idText = line.slice(0, at).trim()
    if (!/^\d+$/.test(idText)) continue
    const id = Number.parseInt(idText, 10)
    if (seen.has(id)) continue

    // Models sometimes echo the limit column back
    const translation = line
      .slice(at + DELIMITER.length)
      .replace(new RegExp(`^\\s*\\d+\\s*${DELIMITER}`), '')
      .trim()

    seen.add(id)
    results.push({ id, translation })
  }
  return results
}

/**
 * Sends batches to the backend and parses the replies. Never throws: a failed
 * call yields no results, and the caller treats every id as missing.
 */
export class TranslationGateway {
  constructor(
    private readonly backend: TranslationBackend,
    private readonly options: PromptOptions,
    private readonly logger?: Logger,
  ) {}

  buildRequest(items: BatchItem[], template: string): ChatRequest {
    return {
      system: buildSystemPrompt(template, items, this.options),
      user: serializeBatch(items),
    }
  }

  async translateBatch(items: BatchItem[], template: string): Promise<BatchResult[]> {
    if (items.length === 0) return []

    let response: string
    try {
      response = await this.backend.complete(this.buildRequest(items, template))
    }
    catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      this.logger?.log(`Translation request for ${items.length} item(s) failed: ${reason}`, 'error')
      return []
    }

    const results = parseBatchResponse(response)
    if (results.length === 0) {
      this.logger?.log(`No parsable lines in the response to a batch of ${items.length} item(s)`, 'warn')
    }
    return results
  }
}
