import { z } from 'zod'

import { emptyArguments } from './binder.js'
import { tryParseJson } from './json.js'
import type { ModelResponse } from './types.js'

/**
 * Tool-call wire format. The whole reply, optionally wrapped in one
 * ```json fence, must be a single JSON object:
 *
 *   {"tool": "get_data_field", "arguments": {"key": "A"}}
 *
 * Anything else is a final answer.
 */
const toolCallSchema = z.object({
  tool: z.string().min(1),
  arguments: z.record(z.unknown()).default({})
})

const FENCE = /^```(?:json)?\s*\n?([\s\S]*?)\n?```$/i

function stringifyArgument(value: unknown): string | undefined {
  if (value === null || value === undefined) return undefined
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean') return String(value)
  return JSON.stringify(value)
}

function rawArguments(json: unknown): object {
  if (typeof json !== 'object' || json === null || !('arguments' in json)) return {}
  const args = json.arguments
  return typeof args === 'object' && args !== null ? args : {}
}

/** Classifies raw model text as a final answer or a tool call request. */
export function classifyModelOutput(raw: string): ModelResponse {
  const trimmed = raw.trim()
  const fenced = FENCE.exec(trimmed)
  const body = (fenced?.[1] ?? trimmed).trim()

  if (!body.startsWith('{')) return { type: 'final', text: trimmed }

  const json = tryParseJson(body)
  const parsed = toolCallSchema.safeParse(json)
  if (!parsed.success) return { type: 'final', text: trimmed }

  // zod rebuilds records on a plain object and loses a `__proto__` key; read the parsed JSON instead
  const args = emptyArguments()
  for (const [key, value] of Object.entries(rawArguments(json))) {
    const text = stringifyArgument(value)
    if (text !== undefined) args[key] = text
  }
  return { type: 'tool_call', toolName: parsed.data.tool, arguments: args, raw: trimmed }
}
