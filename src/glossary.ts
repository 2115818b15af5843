import type { Logger } from './logger'
import { readFile } from 'node:fs/promises'

export type Glossary = Record<string, string>

/**
 * Keep only string -> string entries of a parsed glossary file
 */
export function parseGlossary(raw: unknown, logger?: Logger): Glossary {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    logger?.log('Glossary must be a JSON object of "term": "translation". Skipping.', 'warn')
    return {}
  }

  const glossary: Glossary = {}
  for (const [term, translation] of Object.entries(raw)) {
    if (typeof translation === 'string' && term.trim() && translation.trim()) {
      glossary[term.trim()] = translation.trim()
    }
    else {
      logger?.log(`Glossary entry "${term}" is not a string translation. Skipping it.`, 'warn')
    }
  }
  return glossary
}

/**
 * Load the glossary JSON. Any problem is logged and yields an empty glossary.
 */
export async function loadGlossary(path: string, logger?: Logger): Promise<Glossary> {
  let source: string
  try {
    source = await readFile(path, 'utf8')
  }
  catch {
    logger?.log(`Glossary file '${path}' not found. Skipping.`, 'warn')
    return {}
  }

  try {
    return parseGlossary(JSON.parse(source), logger)
  }
  catch (err) {
    logger?.log(`Error loading glossary: ${err instanceof Error ? err.message : String(err)}. Skipping.`, 'warn')
    return {}
  }
}

/**
 * Glossary block appended to every system prompt, one `term: translation` per line
 */
export function formatGlossary(glossary: Glossary): string {
  return Object.entries(glossary)
    .map(([term, translation]) => `${term}: ${translation}`)
    .join('\n')
}
