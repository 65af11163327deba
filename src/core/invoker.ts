import { UriTemplate } from '@modelcontextprotocol/sdk/shared/uriTemplate.js'

import type { CapabilitySession, ResourceContent, ToolOutcome } from './capability-session.js'
import { ChatbotError, chatError, fail, ok, toChatError } from './errors.js'
import { decodeText, jsonValueSchema, tryParseJson } from './json.js'
import type { CapabilityRegistry } from './registry.js'
import type {
  ArgumentMapping,
  ArgumentSpec,
  CapabilityDescriptor,
  CapabilityKind,
  InvocationResult,
  JsonValue,
  Logger,
  Payload
} from './types.js'

/** Decoded size of a base64 string, not counting `=` padding. */
export function base64Size(blob: string): number {
  const padding = blob.endsWith('==') ? 2 : blob.endsWith('=') ? 1 : 0
  return Math.floor((blob.length * 3) / 4) - padding
}

function decodeContent(content: ResourceContent): JsonValue {
  if (content.text !== undefined) return decodeText(content.text)
  if (content.blob !== undefined) {
    return `[binary ${content.mimeType ?? 'data'}, ${base64Size(content.blob)} bytes]`
  }
  return ''
}

function decodeContents(contents: ResourceContent[]): Payload {
  if (contents.length === 1 && contents[0]) return decodeContent(contents[0])
  return contents.map(decodeContent)
}

function decodeToolOutcome(outcome: ToolOutcome): Payload {
  if (outcome.structured) {
    const structured = jsonValueSchema.safeParse(outcome.structured)
    if (structured.success) return structured.data
  }
  return decodeText(outcome.texts.join('\n'))
}

/**
 * Converts bound string arguments to the JSON types a tool's input schema
 * declares. Unknown or string type hints pass through unchanged.
 */
export function coerceToolArguments(
  schema: readonly ArgumentSpec[],
  args: ArgumentMapping
): Record<string, unknown> {
  const coerced: Record<string, unknown> = Object.create(null)
  for (const [name, value] of Object.entries(args)) {
    const hint = schema.find((param) => param.name === name)?.typeHint ?? 'string'
    coerced[name] = coerceValue(name, hint, value)
  }
  return coerced
}

function coerceValue(name: string, hint: string, value: string): unknown {
  const types = hint.split('|')
  if (types.includes('string')) return value

  if (types.includes('number') || types.includes('integer')) {
    const number = Number(value)
    const valid = value.trim() !== '' && Number.isFinite(number)
    if (valid && (!types.includes('integer') || types.includes('number') || Number.isInteger(number))) {
      return number
    }
  }

  if (types.includes('boolean')) {
    if (value === 'true') return true
    if (value === 'false') return false
  }

  if (types.includes('array') || types.includes('object')) {
    const parsed = tryParseJson(value)
    const isArray = Array.isArray(parsed)
    const isObject = typeof parsed === 'object' && parsed !== null && !isArray
    if ((isArray && types.includes('array')) || (isObject && types.includes('object'))) return parsed
  }

  if (types.includes('null') && value === 'null') return null

  throw new ChatbotError('ToolError', `Argument '${name}' must be ${hint}, got '${value}'`, {
    param: name,
    typeHint: hint
  })
}

/**
 * Performs resource reads, prompt renders and tool calls against the server
 * that advertised each capability. Holds no state between calls.
 */
export class CapabilityInvoker {
  constructor(
    private readonly registry: CapabilityRegistry,
    private readonly sessions: ReadonlyMap<string, CapabilitySession>,
    private readonly logger: Logger
  ) {}

  async invoke(kind: CapabilityKind, name: string, args: ArgumentMapping): Promise<InvocationResult> {
    const found = this.registry.lookup(kind, name)
    if (!found.ok) return found
    const descriptor = found.value

    const session = this.sessions.get(descriptor.server)
    if (!session) {
      return fail(
        chatError('TransportError', `No session for server '${descriptor.server}'`, {
          server: descriptor.server
        })
      )
    }

    const started = Date.now()
    try {
      const payload = await this.dispatch(session, descriptor, args)
      this.logger.info('invoker.completed', { kind, name, ms: Date.now() - started })
      return ok(payload)
    } catch (error) {
      const failure = toChatError(error)
      this.logger.warn('invoker.failed', { kind, name, code: failure.code, message: failure.message })
      return fail(failure)
    }
  }

  private async dispatch(
    session: CapabilitySession,
    descriptor: CapabilityDescriptor,
    args: ArgumentMapping
  ): Promise<Payload> {
    switch (descriptor.kind) {
      case 'resource':
        return decodeContents(await session.readResource(resourceUri(descriptor, args)))
      case 'prompt': {
        const messages = await session.getPrompt(descriptor.name, { ...args })
        return messages.map((message) => message.text).join('\n\n')
      }
      case 'tool': {
        const outcome = await session.callTool(
          descriptor.name,
          coerceToolArguments(descriptor.argumentSchema, args)
        )
        if (outcome.isError) {
          throw new ChatbotError('ToolError', outcome.texts.join('\n') || `Tool '${descriptor.name}' failed`, {
            tool: descriptor.name
          })
        }
        return decodeToolOutcome(outcome)
      }
    }
  }
}

function resourceUri(descriptor: CapabilityDescriptor, args: ArgumentMapping): string {
  const location = descriptor.resource
  if (!location) {
    throw new ChatbotError('RemoteError', `Resource '${descriptor.name}' has no URI`)
  }
  if (location.kind === 'static') return location.uri
  return new UriTemplate(location.uriTemplate).expand({ ...args })
}
