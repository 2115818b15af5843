import type { TranslationBackend } from './backend'
import type { TranslationConfig } from './config'
import type { Glossary } from './glossary'
import type { ReflowStats } from './layout'
import type { Logger } from './logger'
import type { TranslationStats } from './orchestrator'
import { basename, dirname, extname, join } from 'node:path'
import { TranslationGateway } from './gateway'
import { LayoutReflow } from './layout'
import { TranslationOrchestrator } from './orchestrator'
import { PptxDocument } from './pptx-document'

/**
 * `deck.pptx` + `_translated` -> `deck_translated.pptx`, in the same directory
 */
export function siblingPath(path: string, suffix: string): string {
  const ext = extname(path) || '.pptx'
  return join(dirname(path), `${basename(path, extname(path))}${suffix}${ext}`)
}

export interface TranslateDeckOptions {
  inputPath: string
  outputPath: string
  /** Checkpoint written between the translation and the reflow pass */
  rawPath: string
  config: TranslationConfig
  glossary: Glossary
  backend: TranslationBackend
  logger?: Logger
}

/**
 * Translate a deck, save the raw checkpoint, then reflow it into `outputPath`
 */
export async function translateDeck(options: TranslateDeckOptions): Promise<{
  translation: TranslationStats
  reflow: ReflowStats
}> {
  const { config, logger } = options

  const document = await PptxDocument.open(options.inputPath)
  const gateway = new TranslationGateway(options.backend, {
    sourceLanguage: config.sourceLanguage,
    targetLanguage: config.targetLanguage,
    glossary: options.glossary,
  }, logger)
  const orchestrator = new TranslationOrchestrator(gateway, {
    sourceLanguage: config.sourceLanguage,
    targetLanguage: config.targetLanguage,
    expansionRatio: config.expansionRatio,
    batchSize: config.batchSize,
    maxParallelRequests: config.maxParallelRequests,
    bodyPrompt: config.presentationBodyPromptTemplate,
    constrainedPrompt: config.constrainedTextPromptTemplate,
  }, logger)

  const translation = await orchestrator.translatePresentation(document.presentation)
  await document.save(options.rawPath)
  logger?.log(`Raw translation saved to ${options.rawPath}`, 'dim')

  const reflow = await adjustDeck(options.rawPath, options.outputPath, logger)
  return { translation, reflow }
}

/**
 * Reflow pass on its own: widen boxes and shrink fonts of a saved deck
 */
export async function adjustDeck(inputPath: string, outputPath: string, logger?: Logger): Promise<ReflowStats> {
  const document = await PptxDocument.open(inputPath)
  const stats = new LayoutReflow(document.presentation, logger).adjust()
  await document.save(outputPath)
  return stats
}
