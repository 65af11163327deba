import { z } from 'zod'

import { ChatbotError, errorMessage } from './errors.js'
import { tryParseJson } from './json.js'
import { type ChatMessage, TextCompletionClient, toChatMessages } from './model-client.js'
import { retry, type RetryOptions } from './retry.js'
import type { ConversationTurn, Logger } from './types.js'

export interface HttpResponseLike {
  ok: boolean
  status: number
  text(): Promise<string>
}

export type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string; signal: AbortSignal }
) => Promise<HttpResponseLike>

export interface ChatCompletionOptions {
  baseUrl: string
  model: string
  apiKey?: string
  temperature: number
  timeoutMs: number
  fetch?: FetchLike
}

const completionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1)
})

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError'
}

/**
 * POSTs to an OpenAI-compatible `/chat/completions` endpoint (LM Studio,
 * Ollama, llama.cpp server) and returns the first choice's text.
 */
export async function requestChatCompletion(
  options: ChatCompletionOptions,
  messages: ChatMessage[]
): Promise<string> {
  const fetchImpl: FetchLike = options.fetch ?? fetch
  const endpoint = `${options.baseUrl.replace(/\/+$/, '')}/chat/completions`
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    Accept: 'application/json'
  }
  if (options.apiKey) headers.Authorization = `Bearer ${options.apiKey}`

  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), options.timeoutMs)

  try {
    const res = await fetchImpl(endpoint, {
      method: 'POST',
      headers,
      body: JSON.stringify({
        model: options.model,
        messages,
        temperature: options.temperature,
        stream: false
      }),
      signal: controller.signal
    })
    const body = await res.text()

    if (!res.ok) {
      throw new ChatbotError('TransportError', `Model endpoint returned HTTP ${res.status}`, {
        status: res.status,
        body: body.slice(0, 500)
      })
    }

    const parsed = completionSchema.safeParse(tryParseJson(body))
    const content = parsed.success ? parsed.data.choices[0]?.message.content : undefined
    if (typeof content !== 'string') {
      throw new ChatbotError('TransportError', 'Model response missing choices[0].message.content')
    }
    return content
  } catch (error) {
    if (error instanceof ChatbotError) throw error
    if (isAbortError(error)) {
      throw new ChatbotError('TransportError', `Model request timed out after ${options.timeoutMs}ms`)
    }
    throw new ChatbotError('TransportError', `Model endpoint unreachable: ${errorMessage(error)}`)
  } finally {
    clearTimeout(timer)
  }
}

/** Client errors (4xx) will not improve on retry. */
function isRetryable(error: unknown): boolean {
  if (!(error instanceof ChatbotError)) return true
  const status = error.details.status
  return typeof status !== 'number' || status >= 500 || status === 429
}

export interface OpenAiCompatibleClientOptions extends ChatCompletionOptions {
  systemPromptTemplate: string
  retry: Pick<RetryOptions, 'attempts' | 'backoffMs'>
}

/** Model provider speaking the OpenAI chat completions dialect. */
export class OpenAiCompatibleClient extends TextCompletionClient {
  constructor(
    private readonly options: OpenAiCompatibleClientOptions,
    private readonly logger: Logger
  ) {
    super(options.systemPromptTemplate)
  }

  protected async generate(
    systemPrompt: string,
    conversation: readonly ConversationTurn[]
  ): Promise<string> {
    const messages = toChatMessages(systemPrompt, conversation)
    const started = Date.now()
    const text = await retry(() => requestChatCompletion(this.options, messages), {
      ...this.options.retry,
      retryable: isRetryable,
      onRetry: (attempt, error) => {
        this.logger.warn('model.retry', { attempt, error: errorMessage(error) })
      }
    })
    this.logger.info('model.completed', {
      provider: 'openai',
      model: this.options.model,
      turns: conversation.length,
      ms: Date.now() - started
    })
    return text
  }
}
