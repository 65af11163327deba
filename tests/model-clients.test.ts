import { describe, expect, it, vi } from 'vitest'

import { loadConfig } from '../src/config/load.js'
import { createModelClient, excludedTools, resolveProvider } from '../src/core/client-factory.js'
import { ChatbotError } from '../src/core/errors.js'
import { CapabilityInvoker } from '../src/core/invoker.js'
import {
  type FetchLike,
  type HttpResponseLike,
  OpenAiCompatibleClient,
  requestChatCompletion
} from '../src/core/openai-compatible-client.js'
import { renderSystemPrompt, renderTranscript } from '../src/core/prompt-template.js'
import { CapabilityRegistry } from '../src/core/registry.js'
import { ServerToolClient } from '../src/core/server-tool-client.js'
import type { ConversationTurn } from '../src/core/types.js'
import { FakeSession, arg, makeLogger, tool } from './helpers/fakes.js'

function respond(status: number, body: unknown): HttpResponseLike {
  return {
    ok: status >= 200 && status < 300,
    status,
    text: async () => (typeof body === 'string' ? body : JSON.stringify(body))
  }
}

function completion(content: string | null): unknown {
  return { choices: [{ message: { role: 'assistant', content } }] }
}

const options = {
  baseUrl: 'http://127.0.0.1:1234/v1/',
  model: 'local-model',
  apiKey: 'test-key',
  temperature: 0.2,
  timeoutMs: 1_000
}

const question: ConversationTurn[] = [{ role: 'user', content: 'What is A?' }]

describe('requestChatCompletion', () => {
  it('posts the conversation and returns the first choice', async () => {
    const fetch = vi.fn<FetchLike>(async () => respond(200, completion('Hello')))

    const text = await requestChatCompletion({ ...options, fetch }, [{ role: 'user', content: 'hi' }])

    expect(text).toBe('Hello')
    const [url, init] = fetch.mock.calls[0] ?? []
    expect(url).toBe('http://127.0.0.1:1234/v1/chat/completions')
    expect(init?.method).toBe('POST')
    expect(init?.headers.Authorization).toBe('Bearer test-key')
    expect(JSON.parse(init?.body ?? '')).toEqual({
      model: 'local-model',
      messages: [{ role: 'user', content: 'hi' }],
      temperature: 0.2,
      stream: false
    })
  })

  it('reports HTTP failures as TransportError', async () => {
    const fetch = vi.fn<FetchLike>(async () => respond(500, 'model crashed'))

    const error = await requestChatCompletion({ ...options, fetch }, []).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ChatbotError)
    expect(error).toMatchObject({
      code: 'TransportError',
      message: 'Model endpoint returned HTTP 500',
      details: { status: 500, body: 'model crashed' }
    })
  })

  it('rejects a response without message content', async () => {
    const fetch = vi.fn<FetchLike>(async () => respond(200, completion(null)))

    await expect(requestChatCompletion({ ...options, fetch }, [])).rejects.toThrow(
      'Model response missing choices[0].message.content'
    )
  })

  it('times out a request that never answers', async () => {
    const fetch: FetchLike = (_url, init) =>
      new Promise((_resolve, reject) => {
        init.signal.addEventListener('abort', () => {
          const error = new Error('This operation was aborted')
          error.name = 'AbortError'
          reject(error)
        })
      })

    await expect(
      requestChatCompletion({ ...options, timeoutMs: 10, fetch }, [])
    ).rejects.toThrow('Model request timed out after 10ms')
  })

  it('wraps network errors', async () => {
    const fetch = vi.fn<FetchLike>(async () => {
      throw new TypeError('fetch failed')
    })

    await expect(requestChatCompletion({ ...options, fetch }, [])).rejects.toThrow(
      'Model endpoint unreachable: fetch failed'
    )
  })
})

describe('OpenAiCompatibleClient', () => {
  function client(fetch: FetchLike, logger = makeLogger()) {
    return new OpenAiCompatibleClient(
      { ...options, fetch, systemPromptTemplate: 'Tools:\n{{tools}}', retry: { attempts: 3, backoffMs: 0 } },
      logger
    )
  }

  it('sends the tool catalog and classifies a tool call', async () => {
    const fetch = vi.fn<FetchLike>(async () =>
      respond(200, completion('{"tool": "get_data_field", "arguments": {"key": "A"}}'))
    )

    const response = await client(fetch).complete(question, [tool('get_data_field', [arg('key')])])

    expect(response).toEqual({
      type: 'tool_call',
      toolName: 'get_data_field',
      arguments: { key: 'A' },
      raw: '{"tool": "get_data_field", "arguments": {"key": "A"}}'
    })
    const body = JSON.parse(fetch.mock.calls[0]?.[1].body ?? '')
    expect(body.messages).toEqual([
      { role: 'system', content: 'Tools:\n- get_data_field(key: string): get_data_field tool' },
      { role: 'user', content: 'What is A?' }
    ])
  })

  it('retries server errors', async () => {
    const logger = makeLogger()
    const fetch = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(respond(503, 'loading model'))
      .mockResolvedValueOnce(respond(200, completion('A is Data 1.')))

    const response = await client(fetch, logger).complete(question, [])

    expect(response).toEqual({ type: 'final', text: 'A is Data 1.' })
    expect(fetch).toHaveBeenCalledTimes(2)
    expect(logger.warn).toHaveBeenCalledWith('model.retry', {
      attempt: 1,
      error: 'Model endpoint returned HTTP 503'
    })
  })

  it('does not retry client errors', async () => {
    const fetch = vi.fn<FetchLike>(async () => respond(400, 'bad model name'))

    await expect(client(fetch).complete(question, [])).rejects.toThrow('Model endpoint returned HTTP 400')
    expect(fetch).toHaveBeenCalledTimes(1)
  })
})

describe('ServerToolClient', () => {
  function setup(reply: { texts: string[]; isError: boolean }) {
    const session = new FakeSession('test', { callTool: async () => reply })
    const registry = new CapabilityRegistry([tool('generate_text', [arg('prompt')]), tool('get_data')])
    const logger = makeLogger()
    const invoker = new CapabilityInvoker(registry, new Map([['test', session]]), logger)
    const model = new ServerToolClient(
      invoker,
      { systemPromptTemplate: 'Tools:\n{{tools}}', toolName: 'generate_text', argumentName: 'prompt' },
      logger
    )
    return { session, model }
  }

  it('sends the rendered transcript as the prompt argument', async () => {
    const { session, model } = setup({ texts: ['A is Data 1.'], isError: false })
    const tools = [tool('get_data')]

    const response = await model.complete(question, tools)

    expect(response).toEqual({ type: 'final', text: 'A is Data 1.' })
    expect(session.callTool).toHaveBeenCalledWith('generate_text', {
      prompt: renderTranscript(renderSystemPrompt('Tools:\n{{tools}}', tools), question)
    })
  })

  it('turns a failing model tool into a TransportError', async () => {
    const { model } = setup({ texts: ['model not loaded'], isError: true })

    const error = await model.complete(question, []).catch((e: unknown) => e)

    expect(error).toMatchObject({
      code: 'TransportError',
      message: "Model tool 'generate_text' failed: model not loaded"
    })
  })
})

describe('client factory', () => {
  const invoker = new CapabilityInvoker(new CapabilityRegistry([]), new Map(), makeLogger())

  it('defaults to the OpenAI-compatible provider', () => {
    const config = loadConfig({})

    expect(resolveProvider(undefined)).toBe('openai')
    expect(createModelClient(config, invoker, makeLogger())).toBeInstanceOf(OpenAiCompatibleClient)
    expect(excludedTools(config)).toEqual([])
  })

  it('hides the model tool from the catalog under the server-tool provider', () => {
    const config = loadConfig({ MCPCHAT_MODEL_PROVIDER: 'server-tool' })

    expect(createModelClient(config, invoker, makeLogger())).toBeInstanceOf(ServerToolClient)
    expect(excludedTools(config)).toEqual(['generate_text'])
  })
})
