import { bindArguments } from './binder.js'
import { chatError, fail, formatError, ok, toChatError } from './errors.js'
import type { CapabilityInvoker } from './invoker.js'
import { formatPayload } from './json.js'
import type { ModelClient } from './model-client.js'
import type { CapabilityRegistry } from './registry.js'
import type {
  CapabilityDescriptor,
  ConversationTurn,
  InvocationResult,
  Logger,
  ModelResponse,
  Result
} from './types.js'

export interface AgentLoopOptions {
  /** Tool rounds allowed per query before it fails with LoopExceeded. */
  maxToolRounds: number
  /** Registered tools the model must not see or call. */
  excludedTools?: readonly string[]
}

type ToolCall = Extract<ModelResponse, { type: 'tool_call' }>

/**
 * Resolves one free-text query: alternates model completions and tool
 * invocations until the model answers in plain text. Tool failures are fed
 * back to the model as tool turns; only model failures and the round limit
 * end a query early.
 */
export class AgentLoop {
  private readonly catalog: readonly CapabilityDescriptor[]

  constructor(
    private readonly model: ModelClient,
    registry: CapabilityRegistry,
    private readonly invoker: CapabilityInvoker,
    private readonly options: AgentLoopOptions,
    private readonly logger: Logger
  ) {
    const excluded = new Set(options.excludedTools ?? [])
    this.catalog = registry.list('tool').filter((tool) => !excluded.has(tool.name))
  }

  get tools(): readonly CapabilityDescriptor[] {
    return this.catalog
  }

  async resolve(query: string): Promise<Result<string>> {
    const turns: ConversationTurn[] = [{ role: 'user', content: query }]
    let rounds = 0

    for (;;) {
      let response: ModelResponse
      try {
        response = await this.model.complete(turns, this.catalog)
      } catch (error) {
        const failure = toChatError(error)
        this.logger.error('agent.model_failed', { code: failure.code, message: failure.message, rounds })
        return fail(failure)
      }

      if (response.type === 'final') {
        this.logger.info('agent.answered', { rounds })
        return ok(response.text)
      }

      if (rounds >= this.options.maxToolRounds) {
        this.logger.warn('agent.loop_exceeded', { rounds, tool: response.toolName })
        return fail(
          chatError(
            'LoopExceeded',
            `No final answer after ${rounds} tool round${rounds === 1 ? '' : 's'}`,
            { rounds, maxToolRounds: this.options.maxToolRounds }
          )
        )
      }

      rounds += 1
      turns.push({ role: 'model', content: response.raw })
      const outcome = await this.runTool(response)
      turns.push({
        role: 'tool',
        toolName: response.toolName,
        content: outcome.ok ? formatPayload(outcome.value) : formatError(outcome.error),
        outcome
      })
      this.logger.info('agent.tool_round', {
        round: rounds,
        tool: response.toolName,
        ok: outcome.ok,
        ...(outcome.ok ? {} : { code: outcome.error.code })
      })
    }
  }

  private async runTool(call: ToolCall): Promise<InvocationResult> {
    const tool = this.catalog.find((candidate) => candidate.name === call.toolName)
    if (!tool) {
      return fail(
        chatError('NotFound', `Tool '${call.toolName}' is not in the tool catalog`, {
          kind: 'tool',
          name: call.toolName
        })
      )
    }

    const bound = bindArguments(tool, call.arguments)
    if (!bound.ok) return bound

    return this.invoker.invoke('tool', tool.name, bound.value)
  }
}
