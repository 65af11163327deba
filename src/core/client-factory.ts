import type { ChatbotConfig, ModelProvider } from '../config/schema.js'
import type { CapabilityInvoker } from './invoker.js'
import type { ModelClient } from './model-client.js'
import { OpenAiCompatibleClient } from './openai-compatible-client.js'
import { ServerToolClient } from './server-tool-client.js'
import type { Logger } from './types.js'

export function resolveProvider(value: string | undefined): ModelProvider {
  const provider = value?.trim().toLowerCase()
  return provider === 'server-tool' ? 'server-tool' : 'openai'
}

/** Tools hidden from the model's catalog: the model never calls itself. */
export function excludedTools(config: ChatbotConfig): string[] {
  return config.model.provider === 'server-tool' ? [config.model.toolName] : []
}

export function createModelClient(
  config: ChatbotConfig,
  invoker: CapabilityInvoker,
  logger: Logger
): ModelClient {
  if (config.model.provider === 'server-tool') {
    return new ServerToolClient(
      invoker,
      {
        systemPromptTemplate: config.systemPrompt,
        toolName: config.model.toolName,
        argumentName: config.model.toolArgument
      },
      logger
    )
  }
  return new OpenAiCompatibleClient(
    {
      baseUrl: config.model.baseUrl,
      model: config.model.name,
      apiKey: config.model.apiKey,
      temperature: config.model.temperature,
      timeoutMs: config.model.timeoutMs,
      systemPromptTemplate: config.systemPrompt,
      retry: config.retry
    },
    logger
  )
}
