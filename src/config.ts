import { readFile } from 'node:fs/promises'
import process from 'node:process'
import yaml from 'js-yaml'
import { z } from 'zod'

export class ConfigError extends Error {
  constructor(message: string, public detail?: unknown) {
    super(message)
    this.name = 'ConfigError'
  }
}

const azureSchema = z.object({
  api_key: z.string().default(''),
  endpoint: z.string().url(),
  api_version: z.string().min(1).default('2024-06-01'),
  deployment_name: z.string().min(1),
  timeout_ms: z.number().int().positive().default(120_000),
})

const translationSchema = z.object({
  source_language: z.string().min(1).default('Japanese'),
  target_language: z.string().min(1).default('English'),
  expansion_ratio: z.number().nonnegative().default(1.0),
  batch_size: z.number().int().positive().default(10),
  max_parallel_requests: z.number().int().positive().default(5),
  glossary_path: z.string().default('glossary.json'),
  presentation_body_prompt: z.string().default(''),
  constrained_text_prompt: z.string().default(''),
})

const configSchema = z.object({
  azure_openai: azureSchema.optional(),
  translation: translationSchema.default({}),
})

export interface AzureOpenAISettings {
  apiKey: string
  endpoint: string
  apiVersion: string
  deploymentName: string
  timeoutMs: number
}

export interface TranslationConfig {
  sourceLanguage: string
  targetLanguage: string
  expansionRatio: number
  batchSize: number
  maxParallelRequests: number
  glossaryPath: string
  /** Empty means the built-in template */
  presentationBodyPromptTemplate: string
  constrainedTextPromptTemplate: string
}

export interface AppConfig {
  translation: TranslationConfig
  /** Absent when the deck is only ever run against the mock backend */
  azure: AzureOpenAISettings | null
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ')
}

/**
 * Validate a YAML config document. `AZURE_OPENAI_API_KEY` overrides the
 * key from the file.
 */
export function parseConfig(source: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  let raw: unknown
  try {
    raw = yaml.load(source) ?? {}
  }
  catch (err) {
    throw new ConfigError(`Invalid YAML: ${err instanceof Error ? err.message : String(err)}`, err)
  }

  const parsed = configSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${describeIssues(parsed.error)}`, parsed.error.issues)
  }

  const { azure_openai: azure, translation } = parsed.data
  return {
    translation: {
      sourceLanguage: translation.source_language,
      targetLanguage: translation.target_language,
      expansionRatio: translation.expansion_ratio,
      batchSize: translation.batch_size,
      maxParallelRequests: translation.max_parallel_requests,
      glossaryPath: translation.glossary_path,
      presentationBodyPromptTemplate: translation.presentation_body_prompt,
      constrainedTextPromptTemplate: translation.constrained_text_prompt,
    },
    azure: azure
      ? {
          apiKey: env.AZURE_OPENAI_API_KEY || azure.api_key,
          endpoint: azure.endpoint.replace(/\/+$/, ''),
          apiVersion: azure.api_version,
          deploymentName: azure.deployment_name,
          timeoutMs: azure.timeout_ms,
        }
      : null,
  }
}

/**
 * Load and validate the YAML config file. A missing file is fatal.
 */
export async function loadConfig(path: string, env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  let source: string
  try {
    source = await readFile(path, 'utf8')
  }
  catch (err) {
    throw new ConfigError(`Config file not found: ${path}`, err)
  }
  return parseConfig(source, env)
}
