import type { AzureOpenAISettings } from './config'
import type { Logger } from './logger'
import { appendFile } from 'node:fs/promises'
import { z } from 'zod'

export class BackendError extends Error {
  constructor(
    message: string,
    public status?: number,
    public detail?: unknown,
  ) {
    super(message)
    this.name = 'BackendError'
  }
}

export interface ChatRequest {
  system: string
  user: string
}

/**
 * A chat-style model call: one system instruction, one user message, one reply
 */
export interface TranslationBackend {
  complete: (request: ChatRequest) => Promise<string>
}

const completionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullish(),
    }),
  })),
})

const errorSchema = z.object({
  error: z.object({
    message: z.string(),
    code: z.string().nullish(),
  }),
})

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Azure OpenAI chat completions over fetch, with a per-request timeout
 */
export function createAzureOpenAIBackend(settings: AzureOpenAISettings): TranslationBackend {
  const url = `${settings.endpoint}/openai/deployments/${encodeURIComponent(settings.deploymentName)}`
    + `/chat/completions?api-version=${encodeURIComponent(settings.apiVersion)}`

  return {
    async complete({ system, user }) {
      let res: Response
      try {
        res = await fetch(url, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            'api-key': settings.apiKey,
          },
          body: JSON.stringify({
            messages: [
              { role: 'system', content: system },
              { role: 'user', content: user },
            ],
            temperature: 0,
          }),
          signal: AbortSignal.timeout(settings.timeoutMs),
        })
      }
      catch (err) {
        throw new BackendError(`Azure OpenAI request failed: ${errorMessage(err)}`, undefined, err)
      }

      const json: unknown = await res.json().catch(() => ({}))
      if (!res.ok) {
        const body = errorSchema.safeParse(json)
        throw new BackendError(
          body.success ? body.data.error.message : `Azure OpenAI returned HTTP ${res.status}`,
          res.status,
          json,
        )
      }

      const completion = completionSchema.safeParse(json)
      const content = completion.success ? completion.data.choices[0]?.message.content : null
      if (!content) throw new BackendError('Empty response from the model.', res.status, json)
      return content
    },
  }
}

export const MOCK_PREFIX = '[MOCK] '

/**
 * Deterministic stand-in for the model: echoes every `<id> ::: <limit> ::: <text>`
 * request line back as `<id> ::: [MOCK] <text>`
 */
export function createMockBackend(): TranslationBackend {
  return {
    async complete({ user }) {
      return user
        .split('\n')
        .map((line) => {
          const [id, , ...text] = line.split(':::')
          if (id === undefined || text.length === 0) return null
          return `${id.trim()} ::: ${MOCK_PREFIX}${text.join(':::').trim()}`
        })
        .filter((line): line is string => line !== null)
        .join('\n')
    },
  }
}

function formatEntry(request: ChatRequest, outcome: string): string {
  return [
    `===== ${new Date().toISOString()} =====`,
    '--- SYSTEM ---',
    request.system,
    '--- USER ---',
    request.user,
    outcome,
    '',
  ].join('\n')
}

/**
 * Append every request/response pair (or the error) to a log file
 */
export function withDebugLog(backend: TranslationBackend, logPath: string, logger?: Logger): TranslationBackend {
  const append = async (entry: string) => {
    try {
      await appendFile(logPath, `${entry}\n`, 'utf8')
    }
    catch (err) {
      logger?.log(`Could not write LLM debug log ${logPath}: ${errorMessage(err)}`, 'warn')
    }
  }

  return {
    async complete(request) {
      try {
        const response = await backend.complete(request)
        await append(formatEntry(request, `--- RESPONSE ---\n${response}`))
        return response
      }
      catch (err) {
        await append(formatEntry(request, `--- ERROR ---\n${errorMessage(err)}`))
        throw err
      }
    },
  }
}
