import { Client } from '@modelcontextprotocol/sdk/client/index.js'
import { getDefaultEnvironment, StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js'
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js'
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js'
import { z } from 'zod'

import type { ServerConfig } from '../config/schema.js'
import { ChatbotError, errorMessage } from './errors.js'
import type { Logger } from './types.js'

export const CLIENT_INFO = { name: 'mcp-chatbot', version: '0.1.0' }

export interface ServerCapabilityFlags {
  resources: boolean
  prompts: boolean
  tools: boolean
}

export interface ResourceContent {
  uri: string
  mimeType?: string
  text?: string
  blob?: string
}

export interface PromptMessage {
  role: string
  text: string
}

export interface ToolOutcome {
  texts: string[]
  structured?: Record<string, unknown>
  isError: boolean
}

/**
 * Client side of the capability server protocol: three discovery calls and
 * three invocation calls. Listings are returned unvalidated; the registry
 * normalizes them.
 */
export interface CapabilitySession {
  readonly name: string
  capabilities(): ServerCapabilityFlags
  listResources(): Promise<unknown[]>
  listResourceTemplates(): Promise<unknown[]>
  listPrompts(): Promise<unknown[]>
  listTools(): Promise<unknown[]>
  readResource(uri: string): Promise<ResourceContent[]>
  getPrompt(name: string, args: Record<string, string>): Promise<PromptMessage[]>
  callTool(name: string, args: Record<string, unknown>): Promise<ToolOutcome>
  close(): Promise<void>
}

const contentSchema = z.object({ type: z.string(), text: z.string().optional() }).passthrough()

const readResourceSchema = z.object({
  contents: z.array(
    z.object({
      uri: z.string(),
      mimeType: z.string().optional(),
      text: z.string().optional(),
      blob: z.string().optional()
    })
  )
})

const getPromptSchema = z.object({
  messages: z.array(z.object({ role: z.string(), content: contentSchema }))
})

const callToolSchema = z.object({
  content: z.array(contentSchema).default([]),
  structuredContent: z.record(z.unknown()).optional(),
  isError: z.boolean().optional()
})

function contentText(content: z.infer<typeof contentSchema>): string {
  return content.text ?? `[${content.type} content]`
}

/**
 * Maps a thrown protocol error to the chatbot's taxonomy. Lost connections and
 * timeouts are transport failures; anything the server answered is `fallback`.
 */
function wrapError(
  error: unknown,
  fallback: 'RemoteError' | 'ToolError',
  details: Record<string, unknown>
): ChatbotError {
  if (error instanceof ChatbotError) return error
  if (error instanceof McpError) {
    const lost = error.code === ErrorCode.ConnectionClosed || error.code === ErrorCode.RequestTimeout
    return new ChatbotError(lost ? 'TransportError' : fallback, error.message, {
      ...details,
      protocolCode: error.code
    })
  }
  return new ChatbotError('TransportError', errorMessage(error), details)
}

function parseResult<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.infer<S> {
  const parsed = schema.safeParse(value)
  if (!parsed.success) {
    throw new ChatbotError('RemoteError', `Malformed ${what} response: ${parsed.error.message}`)
  }
  return parsed.data
}

/** CapabilitySession backed by an MCP SDK client. */
export class McpCapabilitySession implements CapabilitySession {
  constructor(
    readonly name: string,
    private readonly client: Client
  ) {}

  capabilities(): ServerCapabilityFlags {
    const caps = this.client.getServerCapabilities()
    return {
      resources: Boolean(caps?.resources),
      prompts: Boolean(caps?.prompts),
      tools: Boolean(caps?.tools)
    }
  }

  async listResources(): Promise<unknown[]> {
    const items: unknown[] = []
    let cursor: string | undefined
    do {
      const page = await this.client.listResources(cursor ? { cursor } : undefined)
      items.push(...page.resources)
      cursor = page.nextCursor
    } while (cursor)
    return items
  }

  async listResourceTemplates(): Promise<unknown[]> {
    const items: unknown[] = []
    let cursor: string | undefined
    do {
      const page = await this.client.listResourceTemplates(cursor ? { cursor } : undefined)
      items.push(...page.resourceTemplates)
      cursor = page.nextCursor
    } while (cursor)
    return items
  }

  async listPrompts(): Promise<unknown[]> {
    const items: unknown[] = []
    let cursor: string | undefined
    do {
      const page = await this.client.listPrompts(cursor ? { cursor } : undefined)
      items.push(...page.prompts)
      cursor = page.nextCursor
    } while (cursor)
    return items
  }

  async listTools(): Promise<unknown[]> {
    const items: unknown[] = []
    let cursor: string | undefined
    do {
      const page = await this.client.listTools(cursor ? { cursor } : undefined)
      items.push(...page.tools)
      cursor = page.nextCursor
    } while (cursor)
    return items
  }

  async readResource(uri: string): Promise<ResourceContent[]> {
    let result: unknown
    try {
      result = await this.client.readResource({ uri })
    } catch (error) {
      throw wrapError(error, 'RemoteError', { server: this.name, uri })
    }
    return parseResult(readResourceSchema, result, 'resource').contents
  }

  async getPrompt(name: string, args: Record<string, string>): Promise<PromptMessage[]> {
    let result: unknown
    try {
      result = await this.client.getPrompt({ name, arguments: args })
    } catch (error) {
      throw wrapError(error, 'RemoteError', { server: this.name, prompt: name })
    }
    return parseResult(getPromptSchema, result, 'prompt').messages.map((message) => ({
      role: message.role,
      text: contentText(message.content)
    }))
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<ToolOutcome> {
    let result: unknown
    try {
      result = await this.client.callTool({ name, arguments: args })
    } catch (error) {
      throw wrapError(error, 'ToolError', { server: this.name, tool: name })
    }
    const parsed = parseResult(callToolSchema, result, 'tool')
    return {
      texts: parsed.content.map(contentText),
      structured: parsed.structuredContent,
      isError: parsed.isError ?? false
    }
  }

  async close(): Promise<void> {
    await this.client.close()
  }
}

/** Performs the MCP initialize handshake over an already constructed transport. */
export async function connectTransport(
  name: string,
  transport: Transport,
  logger: Logger
): Promise<McpCapabilitySession> {
  const client = new Client(CLIENT_INFO)
  try {
    await client.connect(transport)
  } catch (error) {
    throw new ChatbotError(
      'TransportError',
      `Could not connect to server '${name}': ${errorMessage(error)}`,
      { server: name }
    )
  }
  const session = new McpCapabilitySession(name, client)
  logger.info('session.connected', { server: name, ...session.capabilities() })
  return session
}

/** Spawns a capability server as a child process and connects to it over stdio. */
export async function connectServer(
  name: string,
  config: ServerConfig,
  logger: Logger
): Promise<McpCapabilitySession> {
  const transport = new StdioClientTransport({
    command: config.command,
    args: config.args,
    cwd: config.cwd,
    env: config.env ? { ...getDefaultEnvironment(), ...config.env } : undefined,
    stderr: 'inherit'
  })
  return connectTransport(name, transport, logger)
}

/**
 * Connects every configured server in order. If one fails, the ones already
 * connected are closed and the error is rethrown.
 */
export async function connectServers(
  servers: Readonly<Record<string, ServerConfig>>,
  logger: Logger
): Promise<Map<string, CapabilitySession>> {
  const sessions = new Map<string, CapabilitySession>()
  try {
    for (const [name, config] of Object.entries(servers)) {
      sessions.set(name, await connectServer(name, config, logger))
    }
  } catch (error) {
    await closeSessions(sessions, logger)
    throw error
  }
  return sessions
}

export async function closeSessions(
  sessions: ReadonlyMap<string, CapabilitySession>,
  logger: Logger
): Promise<void> {
  for (const session of sessions.values()) {
    try {
      await session.close()
    } catch (error) {
      logger.warn('session.close_failed', { server: session.name, error: errorMessage(error) })
    }
  }
}
