#!/usr/bin/env tsx
import type { TranslationBackend } from './backend'
import { existsSync } from 'node:fs'
import { dirname, join } from 'node:path'
import process from 'node:process'
import { parseArgs } from 'node:util'
import { createAzureOpenAIBackend, createMockBackend, withDebugLog } from './backend'
import { ConfigError, loadConfig } from './config'
import { loadGlossary } from './glossary'
import { ConsoleLogger } from './logger'
import { siblingPath, translateDeck } from './pipeline'

const USAGE = 'Usage: npm run translate -- <input.pptx> [--config path] [--output path] [--mock] [--debug-llm]'

async function main() {
  const { values, positionals } = parseArgs({
    args: process.argv.slice(2),
    allowPositionals: true,
    options: {
      'config': { type: 'string', default: 'config.yaml' },
      'output': { type: 'string' },
      'mock': { type: 'boolean', default: false },
      'debug-llm': { type: 'boolean', default: false },
      'verbose': { type: 'boolean', default: false },
    },
  })

  const inputPath = positionals[0]
  if (!inputPath) {
    throw new Error(USAGE)
  }
  if (!existsSync(inputPath)) {
    throw new Error(`Input file '${inputPath}' not found.`)
  }

  const outputPath = values.output ?? siblingPath(inputPath, '_translated')
  const rawPath = siblingPath(inputPath, '_raw')
  const configPath = values.config ?? 'config.yaml'
  const logger = new ConsoleLogger(values.verbose)

  console.log(`⚙️  Loading configuration: ${configPath}`)
  const config = await loadConfig(configPath)
  const glossary = await loadGlossary(config.translation.glossaryPath, logger)

  let backend: TranslationBackend
  if (values.mock) {
    console.log('🧪 Using the mock translator')
    backend = createMockBackend()
  }
  else {
    if (!config.azure) {
      throw new ConfigError('The azure_openai section is required unless --mock is given.')
    }
    if (!config.azure.apiKey) {
      throw new ConfigError('No Azure OpenAI API key: set azure_openai.api_key or AZURE_OPENAI_API_KEY.')
    }
    backend = createAzureOpenAIBackend(config.azure)
  }

  if (values['debug-llm']) {
    const logPath = join(dirname(outputPath), 'llm_debug.log')
    console.log(`🐞 Logging model traffic to: ${logPath}`)
    backend = withDebugLog(backend, logPath, logger)
  }

  console.log(`📄 Translating: ${inputPath}`)
  console.log(`🌐 ${config.translation.sourceLanguage} → ${config.translation.targetLanguage}`)

  const { translation, reflow } = await translateDeck({
    inputPath,
    outputPath,
    rawPath,
    config: config.translation,
    glossary,
    backend,
    logger,
  })

  console.log(
    `📊 ${translation.translated} paragraph(s) translated, ${translation.skipped} left as is `
    + `(${translation.failedBatches}/${translation.batches} batch(es) failed)`,
  )
  console.log(`📐 Layout: ${reflow.widened} box(es) widened, ${reflow.shrunk} text frame(s) shrunk`)
  console.log(`📁 Raw translation: ${rawPath}`)
  console.log(`\n✅ Done! Saved translated file to: ${outputPath}`)
}

main().catch((err) => {
  console.log(`❌ ${err instanceof Error ? err.message : String(err)}`)
  process.exit(1)
})
