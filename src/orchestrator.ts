import type { TranslationGateway } from './gateway'
import type { Logger } from './logger'
import type { BatchItem, Presentation, TaskSeed, TextContext, TranslationTask } from './types'
import { DEFAULT_BODY_PROMPT, DEFAULT_CONSTRAINED_PROMPT } from './gateway'
import { decodeMarkup } from './markup'
import { reconstructParagraph } from './reconstruct'
import { walkShapes } from './walker'

export interface OrchestratorOptions {
  sourceLanguage: string
  targetLanguage: string
  expansionRatio: number
  batchSize: number
  maxParallelRequests: number
  /** Prompt template for free-standing text; empty selects the default */
  bodyPrompt: string
  /** Stricter template for table and group text; empty selects the default */
  constrainedPrompt: string
}

export interface TranslationStats {
  translated: number
  skipped: number
  batches: number
  failedBatches: number
}

export interface BatchJob {
  slideIndex: number
  context: TextContext
  tasks: TranslationTask[]
}

/**
 * Length multiplier for a language pair. Only Japanese <-> English is
 * adjusted; names match case-insensitively as substrings.
 */
export function languageRatio(sourceLanguage: string, targetLanguage: string, expansionRatio: number): number {
  const source = sourceLanguage.toLowerCase()
  const target = targetLanguage.toLowerCase()

  if (source.includes('japanese') && target.includes('english')) return expansionRatio
  if (source.includes('english') && target.includes('japanese')) {
    return expansionRatio !== 0 ? 1 / expansionRatio : 1
  }
  return 1
}

export function computeMaxChars(rawLength: number, ratio: number): number {
  return Math.floor(rawLength * ratio)
}

export function buildTasks(seeds: TaskSeed[], ratio: number): TranslationTask[] {
  return seeds.map(seed => ({
    paragraph: seed.paragraph,
    encodedMarkup: seed.markup,
    maxChars: computeMaxChars(seed.rawLength, ratio),
    context: seed.context,
  }))
}

export function chunk<T>(items: T[], size: number): T[][] {
  const step = Math.max(1, Math.floor(size))
  const chunks: T[][] = []
  for (let i = 0; i < items.length; i += step) {
    chunks.push(items.slice(i, i + step))
  }
  return chunks
}

/**
 * Run async jobs with at most `limit` in flight, keeping result order
 */
export async function runWithConcurrency<T>(jobs: (() => Promise<T>)[], limit: number): Promise<T[]> {
  const results: T[] = []
  let next = 0

  const worker = async () => {
    while (next < jobs.length) {
      const index = next++
      const job = jobs[index]
      if (job) results[index] = await job()
    }
  }

  const workers = Array.from({ length: Math.min(Math.max(1, limit), jobs.length) }, worker)
  await Promise.all(workers)
  return results
}

/**
 * Walks slides into translation tasks, sends them in batches and writes the
 * translations back into the paragraphs.
 *
 * Network calls may overlap up to `maxParallelRequests`, but each batch is
 * reconciled synchronously once its reply arrives, so the document is only
 * ever mutated from one place at a time.
 */
export class TranslationOrchestrator {
  private readonly ratio: number

  constructor(
    private readonly gateway: TranslationGateway,
    private readonly options: OrchestratorOptions,
    private readonly logger?: Logger,
  ) {
    this.ratio = languageRatio(options.sourceLanguage, options.targetLanguage, options.expansionRatio)
  }

  promptFor(context: TextContext): string {
    return context === 'constrained'
      ? this.options.constrainedPrompt || DEFAULT_CONSTRAINED_PROMPT
      : this.options.bodyPrompt || DEFAULT_BODY_PROMPT
  }

  /**
   * Split a slide's tasks by context, then into fixed-size batches
   */
  planSlide(tasks: TranslationTask[], slideIndex: number): BatchJob[] {
    const jobs: BatchJob[] = []
    for (const context of ['standard', 'constrained'] as const) {
      const group = tasks.filter(task => task.context === context)
      for (const batch of chunk(group, this.options.batchSize)) {
        jobs.push({ slideIndex, context, tasks: batch })
      }
    }
    return jobs
  }

  async translatePresentation(presentation: Presentation): Promise<TranslationStats> {
    const total = presentation.slides.length
    const jobs: BatchJob[] = []

    presentation.slides.forEach((slide, index) => {
      const tasks = buildTasks(walkShapes(slide.shapes), this.ratio)
      this.logger?.log(`Slide ${index + 1}/${total}: ${tasks.length} paragraph(s)`)
      jobs.push(...this.planSlide(tasks, index))
    })

    const outcomes = await runWithConcurrency(
      jobs.map(job => () => this.runBatch(job)),
      this.options.maxParallelRequests,
    )

    const stats: TranslationStats = { translated: 0, skipped: 0, batches: jobs.length, failedBatches: 0 }
    for (const outcome of outcomes) {
      stats.translated += outcome.translated
      stats.skipped += outcome.skipped
      if (outcome.failed) stats.failedBatches++
    }
    return stats
  }

  /**
   * Translate one batch and apply it. A reply that lacks an id leaves that
   * paragraph untranslated; ids the batch never sent are ignored.
   */
  async runBatch(job: BatchJob): Promise<{ translated: number, skipped: number, failed: boolean }> {
    const items: BatchItem[] = job.tasks.map((task, id) => ({
      id,
      text: task.encodedMarkup,
      limit: task.maxChars,
    }))

    const results = await this.gateway.translateBatch(items, this.promptFor(job.context))
    const translations = new Map(results.map(result => [result.id, result.translation]))
    const where = `slide ${job.slideIndex + 1} (${job.context})`

    const extra = results.filter(result => result.id >= items.length).length
    if (extra > 0) this.logger?.log(`Ignoring ${extra} unknown id(s) in the reply for ${where}`, 'dim')

    let translated = 0
    job.tasks.forEach((task, id) => {
      const translation = translations.get(id)
      if (translation === undefined) {
        this.logger?.log(`No translation for item ${id} on ${where}; left as is`, 'warn')
        return
      }
      if (reconstructParagraph(task.paragraph, decodeMarkup(translation), task.context)) {
        translated++
      }
      else {
        this.logger?.log(`Empty translation for item ${id} on ${where}; original kept`, 'warn')
      }
    })

    return {
      translated,
      skipped: job.tasks.length - translated,
      failed: results.length === 0,
    }
  }
}
