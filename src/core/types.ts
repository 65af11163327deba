import type { ChatError } from './errors.js'

export interface Logger {
  info(event: string, data?: Record<string, unknown>): void
  warn(event: string, data?: Record<string, unknown>): void
  error(event: string, data?: Record<string, unknown>): void
}

export type CapabilityKind = 'resource' | 'prompt' | 'tool'

export interface ArgumentSpec {
  readonly name: string
  readonly typeHint: string
  readonly required: boolean
  readonly description?: string
}

export type ResourceLocation =
  | { readonly kind: 'static'; readonly uri: string }
  | { readonly kind: 'template'; readonly uriTemplate: string }

/**
 * One advertised resource, prompt or tool, normalized at registry population.
 */
export interface CapabilityDescriptor {
  readonly name: string
  readonly kind: CapabilityKind
  readonly description: string
  readonly argumentSchema: readonly ArgumentSpec[]
  /** Name of the configured server that advertised it. */
  readonly server: string
  readonly resource?: ResourceLocation
}

export type ArgumentMapping = Readonly<Record<string, string>>

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue }

export type Payload = JsonValue

export type Result<T> = { ok: true; value: T } | { ok: false; error: ChatError }

export type InvocationResult = Result<Payload>

export type ConversationTurn =
  | { role: 'user'; content: string }
  | { role: 'model'; content: string }
  | { role: 'tool'; toolName: string; content: string; outcome: InvocationResult }

export type ModelResponse =
  | { type: 'final'; text: string }
  | { type: 'tool_call'; toolName: string; arguments: Record<string, string>; raw: string }
