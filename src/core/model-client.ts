import { classifyModelOutput } from './model-output.js'
import { renderSystemPrompt, renderToolTurn } from './prompt-template.js'
import type { CapabilityDescriptor, ConversationTurn, ModelResponse } from './types.js'

/**
 * Completion contract used by the agent loop.
 */
export interface ModelClient {
  complete(
    conversation: readonly ConversationTurn[],
    tools: readonly CapabilityDescriptor[]
  ): Promise<ModelResponse>
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant'
  content: string
}

export function toChatMessages(
  systemPrompt: string,
  conversation: readonly ConversationTurn[]
): ChatMessage[] {
  const messages: ChatMessage[] = [{ role: 'system', content: systemPrompt }]
  for (const turn of conversation) {
    if (turn.role === 'user') messages.push({ role: 'user', content: turn.content })
    else if (turn.role === 'model') messages.push({ role: 'assistant', content: turn.content })
    else messages.push({ role: 'user', content: renderToolTurn(turn) })
  }
  return messages
}

/**
 * Base for providers that produce plain text. The raw reply is classified
 * right after each completion.
 */
export abstract class TextCompletionClient implements ModelClient {
  constructor(protected readonly systemPromptTemplate: string) {}

  async complete(
    conversation: readonly ConversationTurn[],
    tools: readonly CapabilityDescriptor[]
  ): Promise<ModelResponse> {
    const systemPrompt = renderSystemPrompt(this.systemPromptTemplate, tools)
    const raw = await this.generate(systemPrompt, conversation)
    return classifyModelOutput(raw)
  }

  protected abstract generate(
    systemPrompt: string,
    conversation: readonly ConversationTurn[]
  ): Promise<string>
}
