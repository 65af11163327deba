import { z } from 'zod'

import type { JsonValue } from './types.js'

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
)

/**
 * Turns text that holds a JSON object or array into structured data; any other text stays a string.
 */
export function decodeText(text: string): JsonValue {
  const trimmed = text.trim()
  if (!trimmed.startsWith('{') && !trimmed.startsWith('[')) return text
  const parsed = jsonValueSchema.safeParse(tryParseJson(trimmed))
  return parsed.success ? parsed.data : text
}

/** JSON.parse that yields undefined for invalid input. */
export function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

/** Renders a payload for the terminal or for the model: text as is, structures as compact JSON. */
export function formatPayload(payload: JsonValue): string {
  return typeof payload === 'string' ? payload : JSON.stringify(payload)
}
