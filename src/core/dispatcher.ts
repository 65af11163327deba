import type { AgentLoop } from './agent-loop.js'
import { bind } from './binder.js'
import { splitCommandLine } from './command-line.js'
import { formatError } from './errors.js'
import type { CapabilityInvoker } from './invoker.js'
import { formatPayload } from './json.js'
import { describeArguments } from './prompt-template.js'
import type { CapabilityRegistry } from './registry.js'
import type { CapabilityKind, Logger, Result } from './types.js'

export type DispatchOutcome = 'continue' | 'quit'

export interface Output {
  print(text: string): void
}

export interface CommandHandler {
  handle(line: string): Promise<DispatchOutcome>
}

export const COMMAND_HELP = [
  'Commands:',
  '  quit                           - Exit the chatbot',
  '  @resources                     - List available resources',
  '  @resource <name> <arg1=value1> - Get a resource with arguments',
  '  /prompts                       - List available prompts',
  '  /prompt <name> <arg1=value1>   - Execute a prompt with arguments',
  '  anything else                  - Ask the model'
]

/**
 * Classifies one line of user input and routes it to the registry, the
 * invoker or the agent loop. Errors are printed; only `quit` ends a session.
 */
export class SessionDispatcher implements CommandHandler {
  constructor(
    private readonly registry: CapabilityRegistry,
    private readonly invoker: CapabilityInvoker,
    private readonly loop: AgentLoop,
    private readonly output: Output,
    private readonly logger: Logger
  ) {}

  async handle(line: string): Promise<DispatchOutcome> {
    const input = line.trim()
    if (!input) return 'continue'
    if (input.toLowerCase() === 'quit') return 'quit'

    if (input === '@resources') {
      this.list('resource')
      return 'continue'
    }
    if (input === '/prompts') {
      this.list('prompt')
      return 'continue'
    }

    const command = input.split(/\s/, 1)[0]
    if (command === '@resource') {
      await this.readResource(input)
      return 'continue'
    }
    if (command === '/prompt') {
      await this.runPrompt(input)
      return 'continue'
    }

    this.logger.info('dispatcher.query', { length: input.length })
    this.printAnswer(await this.loop.resolve(input))
    return 'continue'
  }

  private list(kind: CapabilityKind): void {
    const descriptors = this.registry.list(kind)
    if (descriptors.length === 0) {
      this.output.print(`No ${kind}s available.`)
      return
    }
    this.output.print(`\nAvailable ${kind}s:`)
    for (const descriptor of descriptors) {
      const args = descriptor.argumentSchema.length
        ? ` [${describeArguments(descriptor.argumentSchema)}]`
        : ''
      const description = descriptor.description ? `: ${descriptor.description}` : ''
      this.output.print(`- ${descriptor.name}${args}${description}`)
    }
  }

  private async readResource(input: string): Promise<void> {
    const parts = this.parse(input, 'Usage: @resource <name> <arg1=value1> <arg2=value2> ...')
    if (!parts) return
    const [name, ...tokens] = parts

    const found = this.registry.lookup('resource', name)
    if (!found.ok) return this.printError(found)
    const bound = bind(found.value, tokens)
    if (!bound.ok) return this.printError(bound)

    const result = await this.invoker.invoke('resource', name, bound.value)
    if (!result.ok) return this.printError(result)
    this.output.print('Response:')
    this.output.print(formatPayload(result.value))
  }

  private async runPrompt(input: string): Promise<void> {
    const parts = this.parse(input, 'Usage: /prompt <name> <arg1=value1> <arg2=value2> ...')
    if (!parts) return
    const [name, ...tokens] = parts

    const found = this.registry.lookup('prompt', name)
    if (!found.ok) return this.printError(found)
    const bound = bind(found.value, tokens)
    if (!bound.ok) return this.printError(bound)

    const rendered = await this.invoker.invoke('prompt', name, bound.value)
    if (!rendered.ok) return this.printError(rendered)

    this.logger.info('dispatcher.prompt', { name })
    this.printAnswer(await this.loop.resolve(formatPayload(rendered.value)))
  }

  /** Splits a command into `[name, ...tokens]`, printing usage when the name is missing. */
  private parse(input: string, usage: string): [string, ...string[]] | null {
    const split = splitCommandLine(input)
    if (!split.ok) {
      this.printError(split)
      return null
    }
    const [, name, ...tokens] = split.value
    if (!name) {
      this.output.print(usage)
      return null
    }
    return [name, ...tokens]
  }

  private printAnswer(result: Result<string>): void {
    if (!result.ok) return this.printError(result)
    this.output.print('Response:')
    this.output.print(result.value)
  }

  private printError(result: Extract<Result<unknown>, { ok: false }>): void {
    this.output.print(formatError(result.error))
  }
}
