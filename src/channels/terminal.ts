import { createInterface, type Interface } from 'node:readline'
import type { Readable, Writable } from 'node:stream'

import { COMMAND_HELP, type CommandHandler, type DispatchOutcome, type Output } from '../core/dispatcher.js'
import { errorMessage } from '../core/errors.js'
import type { Logger } from '../core/types.js'

export interface TerminalIo {
  input: Readable
  output: Writable
}

/** Writes dispatcher output to a stream, one line per print. */
export class StreamOutput implements Output {
  constructor(private readonly stream: Writable) {}

  print(text: string): void {
    this.stream.write(`${text}\n`)
  }
}

/**
 * Interactive line-oriented session over stdin/stdout. Each line is handled
 * to completion before the next prompt is shown.
 */
export class TerminalChannel {
  private rl: Interface | null = null

  constructor(
    private readonly dispatcher: CommandHandler,
    private readonly output: Output,
    private readonly logger: Logger,
    private readonly io: TerminalIo = { input: process.stdin, output: process.stdout }
  ) {}

  /** Resolves when the user quits or input ends. */
  async start(): Promise<void> {
    this.output.print('\nChatbot Started!')
    for (const line of COMMAND_HELP) this.output.print(line)

    const rl = createInterface({ input: this.io.input, output: this.io.output, terminal: false })
    this.rl = rl
    rl.once('close', () => {
      this.rl = null
    })
    rl.setPrompt('\nQuery: ')
    rl.prompt()

    try {
      for await (const line of rl) {
        let outcome: DispatchOutcome = 'continue'
        try {
          outcome = await this.dispatcher.handle(line)
        } catch (error) {
          this.logger.error('terminal.command_failed', { error: errorMessage(error) })
          this.output.print(`\nError in chat loop: ${errorMessage(error)}`)
        }
        if (outcome === 'quit') break
        rl.prompt()
      }
    } finally {
      this.stop()
    }
  }

  stop(): void {
    const rl = this.rl
    this.rl = null
    rl?.close()
  }
}
