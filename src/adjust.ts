import { existsSync } from 'node:fs'
import process from 'node:process'
import { parseArgs } from 'node:util'
import { ConsoleLogger } from './logger'
import { adjustDeck, siblingPath } from './pipeline'

async function main() {
  const { values, positionals } = parseArgs({
    args: process.argv.slice(2),
    allowPositionals: true,
    options: {
      output: { type: 'string' },
      verbose: { type: 'boolean', default: false },
    },
  })

  const inputPath = positionals[0]
  if (!inputPath) {
    throw new Error('Usage: npm run adjust -- <input.pptx> [--output path]')
  }
  if (!existsSync(inputPath)) {
    throw new Error(`Input file '${inputPath}' not found.`)
  }

  const outputPath = values.output ?? siblingPath(inputPath, '_adjusted')
  console.log(`📐 Adjusting layout of: ${inputPath}`)

  const stats = await adjustDeck(inputPath, outputPath, new ConsoleLogger(values.verbose))

  console.log(`  - ${stats.widened} box(es) widened`)
  console.log(`  - ${stats.shrunk} text frame(s) shrunk`)
  console.log(`  - ${stats.skipped} text frame(s) without usable size`)
  console.log(`\n✅ Saved to: ${outputPath}`)
}

main().catch((err) => {
  console.log(`❌ ${err instanceof Error ? err.message : String(err)}`)
  process.exit(1)
})
