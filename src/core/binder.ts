import { chatError, fail, ok } from './errors.js'
import type { ArgumentMapping, CapabilityDescriptor, Result } from './types.js'

/** An empty string map with no prototype, so keys like `__proto__` stay plain data. */
export function emptyArguments(): Record<string, string> {
  return Object.create(null)
}

/** Splits `key=value` tokens on their first `=`. */
export function parseTokens(tokens: readonly string[]): Result<Record<string, string>> {
  const raw = emptyArguments()
  for (const token of tokens) {
    const index = token.indexOf('=')
    if (index <= 0) {
      return fail(
        chatError('MalformedToken', `Expected key=value but got '${token}'`, { token })
      )
    }
    raw[token.slice(0, index)] = token.slice(index + 1)
  }
  return ok(raw)
}

/**
 * Validates a raw argument mapping against a descriptor's schema.
 * The returned mapping holds the supplied keys in schema order.
 */
export function bindArguments(
  descriptor: CapabilityDescriptor,
  raw: Readonly<Record<string, string>>
): Result<ArgumentMapping> {
  for (const param of descriptor.argumentSchema) {
    if (param.required && !Object.hasOwn(raw, param.name)) {
      return fail(
        chatError(
          'MissingArgument',
          `Missing required argument '${param.name}' for ${descriptor.kind} '${descriptor.name}'`,
          { param: param.name, kind: descriptor.kind, name: descriptor.name }
        )
      )
    }
  }

  const known = new Set(descriptor.argumentSchema.map((param) => param.name))
  for (const key of Object.keys(raw)) {
    if (!known.has(key)) {
      return fail(
        chatError(
          'UnknownArgument',
          `Unknown argument '${key}' for ${descriptor.kind} '${descriptor.name}'`,
          { key, kind: descriptor.kind, name: descriptor.name }
        )
      )
    }
  }

  const mapping = emptyArguments()
  for (const param of descriptor.argumentSchema) {
    if (!Object.hasOwn(raw, param.name)) continue
    const value = raw[param.name]
    if (value !== undefined) mapping[param.name] = value
  }
  return ok(Object.freeze(mapping))
}

/** Binds `key=value` tokens typed by a user against a descriptor's schema. */
export function bind(
  descriptor: CapabilityDescriptor,
  tokens: readonly string[]
): Result<ArgumentMapping> {
  const parsed = parseTokens(tokens)
  if (!parsed.ok) return parsed
  return bindArguments(descriptor, parsed.value)
}
