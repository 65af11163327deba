import { ChatbotError } from './errors.js'
import type { CapabilityInvoker } from './invoker.js'
import { formatPayload } from './json.js'
import { TextCompletionClient } from './model-client.js'
import { renderTranscript } from './prompt-template.js'
import type { ConversationTurn, Logger } from './types.js'

export interface ServerToolClientOptions {
  systemPromptTemplate: string
  toolName: string
  argumentName: string
}

/**
 * Model provider for a language model that a capability server exposes as a
 * tool taking a single prompt string.
 */
export class ServerToolClient extends TextCompletionClient {
  constructor(
    private readonly invoker: CapabilityInvoker,
    private readonly options: ServerToolClientOptions,
    private readonly logger: Logger
  ) {
    super(options.systemPromptTemplate)
  }

  protected async generate(
    systemPrompt: string,
    conversation: readonly ConversationTurn[]
  ): Promise<string> {
    const prompt = renderTranscript(systemPrompt, conversation)
    const result = await this.invoker.invoke('tool', this.options.toolName, {
      [this.options.argumentName]: prompt
    })
    if (!result.ok) {
      throw new ChatbotError(
        'TransportError',
        `Model tool '${this.options.toolName}' failed: ${result.error.message}`,
        { tool: this.options.toolName, cause: result.error.code }
      )
    }
    this.logger.info('model.completed', { provider: 'server-tool', tool: this.options.toolName })
    return formatPayload(result.value)
  }
}
