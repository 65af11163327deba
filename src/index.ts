#!/usr/bin/env node
import { TerminalChannel, StreamOutput } from './channels/terminal.js'
import { loadConfig } from './config/load.js'
import { AgentLoop } from './core/agent-loop.js'
import { closeSessions, connectServers } from './core/capability-session.js'
import { createModelClient, excludedTools } from './core/client-factory.js'
import { SessionDispatcher } from './core/dispatcher.js'
import { errorMessage } from './core/errors.js'
import { CapabilityInvoker } from './core/invoker.js'
import { logger, setLogLevel, setLoggerMuted } from './core/logger.js'
import { CapabilityRegistry } from './core/registry.js'

async function main(): Promise<void> {
  const config = loadConfig()
  setLoggerMuted(config.log.muted)
  setLogLevel(config.log.level)

  const sessions = await connectServers(config.servers, logger)
  try {
    const registry = await CapabilityRegistry.populate(sessions, logger)
    const invoker = new CapabilityInvoker(registry, sessions, logger)
    const model = createModelClient(config, invoker, logger)
    const loop = new AgentLoop(
      model,
      registry,
      invoker,
      { maxToolRounds: config.maxToolRounds, excludedTools: excludedTools(config) },
      logger
    )
    const output = new StreamOutput(process.stdout)
    const dispatcher = new SessionDispatcher(registry, invoker, loop, output, logger)

    await new TerminalChannel(dispatcher, output, logger).start()
  } finally {
    await closeSessions(sessions, logger)
  }
}

main().catch((error: unknown) => {
  logger.error('chatbot.failed', { error: errorMessage(error) })
  process.exitCode = 1
})
