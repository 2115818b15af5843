import { describe, expect, it, vi } from 'vitest'
import {
  buildSystemPrompt,
  fillTemplate,
  parseBatchResponse,
  serializeBatch,
  TranslationGateway,
} from './gateway'
import { MemoryLogger } from './logger'

const promptOptions = { sourceLanguage: 'Japanese', targetLanguage: 'English', glossary: {} }

describe('serializeBatch', () => {
  it('writes one id ::: limit ::: markup line per item', () => {
    expect(serializeBatch([
      { id: 0, text: '<b>Hi</b>', limit: 5 },
      { id: 1, text: 'Yo', limit: 3 },
    ])).toBe('0 ::: 5 ::: <b>Hi</b>\n1 ::: 3 ::: Yo')
  })
})

describe('parseBatchResponse', () => {
  it('keeps well-formed lines and the first answer per id', () => {
    const response = [
      '0 ::: Hello',
      'Sure, here are the translations:',
      'x ::: not an id',
      '1 :::   World  ',
      '2 ::: 7 ::: Echoed limit',
      '0 ::: duplicate',
      '3 ::: a ::: b',
    ].join('\n')

    expect(parseBatchResponse(response)).toEqual([
      { id: 0, translation: 'Hello' },
      { id: 1, translation: 'World' },
      { id: 2, translation: 'Echoed limit' },
      { id: 3, translation: 'a ::: b' },
    ])
  })

  it('accepts CRLF line endings', () => {
    expect(parseBatchResponse('0 ::: A\r\n1 ::: B\r\n')).toEqual([
      { id: 0, translation: 'A' },
      { id: 1, translation: 'B' },
    ])
  })
})

describe('prompts', () => {
  it('fills known placeholders and leaves unknown ones', () => {
    expect(fillTemplate('{target_language} in {max_chars} {other}', { target_language: 'English', max_chars: 9 }))
      .toBe('English in 9 {other}')
  })

  it('uses the largest limit of the batch and states the language pair', () => {
    const prompt = buildSystemPrompt('Max {max_chars} to {target_language}.', [
      { id: 0, text: 'a', limit: 5 },
      { id: 1, text: 'b', limit: 12 },
    ], promptOptions)

    expect(prompt.split('\n\n')[0]).toBe('Max 12 to English.')
    expect(prompt).toContain('Translate from Japanese to English.')
    expect(prompt).toContain('(at most 12 in this batch)')
    expect(prompt).not.toContain('Glossary')
  })

  it('adds the glossary when there is one', () => {
    const prompt = buildSystemPrompt('T', [{ id: 0, text: 'a', limit: 1 }], {
      ...promptOptions,
      glossary: { 売上: 'Revenue', 利益: 'Profit' },
    })
    expect(prompt).toContain('Glossary (always use these translations):\n売上: Revenue\n利益: Profit')
  })
})

describe('TranslationGateway', () => {
  it('sends the system prompt and serialized batch, then parses the reply', async () => {
    const backend = { complete: vi.fn(async () => '0 ::: Hola') }
    const gateway = new TranslationGateway(backend, promptOptions)

    const results = await gateway.translateBatch([{ id: 0, text: 'Hello', limit: 8 }], 'Template')

    expect(results).toEqual([{ id: 0, translation: 'Hola' }])
    expect(backend.complete).toHaveBeenCalledWith({
      system: buildSystemPrompt('Template', [{ id: 0, text: 'Hello', limit: 8 }], promptOptions),
      user: '0 ::: 8 ::: Hello',
    })
  })

  it('returns no results instead of throwing when the backend fails', async () => {
    const logger = new MemoryLogger()
    const gateway = new TranslationGateway({
      complete: async () => {
        throw new Error('HTTP 500')
      },
    }, promptOptions, logger)

    await expect(gateway.translateBatch([{ id: 0, text: 'Hello', limit: 8 }], 'T')).resolves.toEqual([])
    expect(logger.messages('error')).toEqual(['Translation request for 1 item(s) failed: HTTP 500'])
  })

  it('warns when nothing in the reply parses', async () => {
    const logger = new MemoryLogger()
    const gateway = new TranslationGateway({ complete: async () => 'I cannot help with that.' }, promptOptions, logger)

    expect(await gateway.translateBatch([{ id: 0, text: 'Hello', limit: 8 }], 'T')).toEqual([])
    expect(logger.messages('warn')).toEqual(['No parsable lines in the response to a batch of 1 item(s)'])
  })

  it('does not call the backend for an empty batch', async () => {
    const backend = { complete: vi.fn(async () => '') }
    expect(await new TranslationGateway(backend, promptOptions).translateBatch([], 'T')).toEqual([])
    expect(backend.complete).not.toHaveBeenCalled()
  })
})
