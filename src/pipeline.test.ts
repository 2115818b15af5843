import type { TranslationConfig } from './config'
import type { Presentation, TextShape } from './types'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { zipSync } from 'fflate'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { createMockBackend } from './backend'
import { MemoryLogger } from './logger'
import { plainText } from './markup'
import { adjustDeck, siblingPath, translateDeck } from './pipeline'
import { PptxDocument } from './pptx-document'
import { buildPackage, paragraphXml, runXml, slideXml, textShapeXml } from './test-utils'

const config: TranslationConfig = {
  sourceLanguage: 'Japanese',
  targetLanguage: 'English',
  expansionRatio: 1.7,
  batchSize: 10,
  maxParallelRequests: 2,
  glossaryPath: 'glossary.json',
  presentationBodyPromptTemplate: '',
  constrainedTextPromptTemplate: '',
}

function firstTextShape(presentation: Presentation): TextShape {
  const shape = presentation.slides[0]?.shapes[0]
  if (shape?.kind !== 'text') throw new Error('expected a text shape')
  return shape
}

describe('siblingPath', () => {
  it('adds a suffix before the extension', () => {
    expect(siblingPath(join('decks', 'q3.pptx'), '_translated')).toBe(join('decks', 'q3_translated.pptx'))
    expect(siblingPath('notes', '_raw')).toBe('notes_raw.pptx')
  })
})

describe('translateDeck', () => {
  let dir: string
  let inputPath: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pptx-translate-'))
    inputPath = join(dir, 'deck.pptx')
    const files = buildPackage([slideXml([
      textShapeXml({
        id: 2,
        name: 'TextBox 1',
        box: { left: 0, top: 0, width: 1000000, height: 500000 },
        paragraphs: [paragraphXml(runXml('Hello'))],
      }),
    ])])
    await writeFile(inputPath, zipSync(files))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('translates, checkpoints the raw deck, then reflows into the output', async () => {
    const outputPath = join(dir, 'deck_translated.pptx')
    const rawPath = join(dir, 'deck_raw.pptx')

    const { translation, reflow } = await translateDeck({
      inputPath,
      outputPath,
      rawPath,
      config,
      glossary: {},
      backend: createMockBackend(),
      logger: new MemoryLogger(),
    })

    expect(translation).toEqual({ translated: 1, skipped: 0, batches: 1, failedBatches: 0 })
    expect(reflow).toEqual({ widened: 1, shrunk: 0, skipped: 0 })

    const raw = firstTextShape((await PptxDocument.open(rawPath)).presentation)
    expect(plainText(raw.text.paragraphs[0]?.runs ?? [])).toBe('[MOCK] Hello')
    expect(raw.width).toBe(1000000)

    const output = firstTextShape((await PptxDocument.open(outputPath)).presentation)
    expect(plainText(output.text.paragraphs[0]?.runs ?? [])).toBe('[MOCK] Hello')
    expect(output.width).toBe(9144000 - 91440)
  })
})

describe('adjustDeck', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pptx-adjust-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('widens up to the neighbour, then shrinks what still overflows', async () => {
    const inputPath = join(dir, 'deck.pptx')
    const outputPath = join(dir, 'deck_adjusted.pptx')
    const files = buildPackage([slideXml([
      textShapeXml({
        id: 2,
        name: 'Narrow',
        box: { left: 0, top: 0, width: 1000000, height: 300000 },
        paragraphs: [paragraphXml(runXml('A'.repeat(200), 'sz="2000"'))],
      }),
      textShapeXml({
        id: 3,
        name: 'Blocker',
        box: { left: 1100000, top: 0, width: 1000000, height: 300000 },
        paragraphs: [],
      }),
    ])])
    await writeFile(inputPath, zipSync(files))

    const stats = await adjustDeck(inputPath, outputPath)

    expect(stats).toEqual({ widened: 1, shrunk: 1, skipped: 0 })
    const shape = firstTextShape((await PptxDocument.open(outputPath)).presentation)
    expect(shape.width).toBe(1100000 - 91440)
    expect(shape.text.paragraphs[0]?.runs[0]?.fontSizePt).toBe(6)
  })
})
