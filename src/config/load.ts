import { readFileSync } from 'node:fs'

import { config as loadEnv } from 'dotenv'

import { resolveProvider } from '../core/client-factory.js'
import { DEFAULT_SYSTEM_PROMPT } from '../core/prompt-template.js'
import { configSchema, serversFileSchema, type ChatbotConfig, type ServerConfig } from './schema.js'

/** Parses comma-separated env values. */
export function parseCsv(input: string | undefined): string[] {
  if (!input) return []
  return input
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean)
}

function numberOr(value: string | undefined, fallback: number): number {
  return value === undefined || value.trim() === '' ? fallback : Number(value)
}

/**
 * Reads servers from a `{ "mcpServers": { ... } }` file when one is named,
 * otherwise builds a single server entry from the command variables.
 */
function loadServers(env: NodeJS.ProcessEnv): Record<string, ServerConfig> {
  const file = env.MCPCHAT_SERVERS_FILE
  if (file) {
    return serversFileSchema.parse(JSON.parse(readFileSync(file, 'utf8'))).mcpServers
  }
  return {
    [env.MCPCHAT_SERVER_NAME ?? 'default']: {
      command: env.MCPCHAT_SERVER_COMMAND ?? 'node',
      args: env.MCPCHAT_SERVER_ARGS ? parseCsv(env.MCPCHAT_SERVER_ARGS) : ['dist/server/main.js'],
      cwd: env.MCPCHAT_SERVER_CWD
    }
  }
}

/**
 * Loads runtime configuration from environment and validates shape/types.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ChatbotConfig {
  loadEnv()

  return configSchema.parse({
    servers: loadServers(env),
    model: {
      provider: resolveProvider(env.MCPCHAT_MODEL_PROVIDER),
      baseUrl: env.MCPCHAT_MODEL_BASE_URL ?? 'http://127.0.0.1:1234/v1',
      name: env.MCPCHAT_MODEL_NAME ?? 'local-model',
      apiKey: env.MCPCHAT_MODEL_API_KEY || undefined,
      temperature: numberOr(env.MCPCHAT_MODEL_TEMPERATURE, 0.2),
      timeoutMs: numberOr(env.MCPCHAT_MODEL_TIMEOUT_MS, 60_000),
      toolName: env.MCPCHAT_MODEL_TOOL ?? 'generate_text',
      toolArgument: env.MCPCHAT_MODEL_TOOL_ARGUMENT ?? 'prompt'
    },
    systemPrompt: env.MCPCHAT_SYSTEM_PROMPT ?? DEFAULT_SYSTEM_PROMPT,
    maxToolRounds: numberOr(env.MCPCHAT_MAX_TOOL_ROUNDS, 5),
    retry: {
      attempts: numberOr(env.MCPCHAT_RETRY_ATTEMPTS, 2),
      backoffMs: numberOr(env.MCPCHAT_RETRY_BACKOFF_MS, 500)
    },
    log: {
      muted: env.MCPCHAT_LOG_MUTED === 'true',
      level: env.MCPCHAT_LOG_LEVEL?.toLowerCase() ?? 'info'
    }
  })
}
