import type { Result } from './types.js'

export type ChatErrorCode =
  | 'MalformedToken'
  | 'MissingArgument'
  | 'UnknownArgument'
  | 'NotFound'
  | 'RemoteError'
  | 'ToolError'
  | 'LoopExceeded'
  | 'TransportError'

export interface ChatError {
  code: ChatErrorCode
  message: string
  details: Record<string, unknown>
}

export function chatError(
  code: ChatErrorCode,
  message: string,
  details: Record<string, unknown> = {}
): ChatError {
  return { code, message, details }
}

/** Thrown form of a ChatError, for failures that cross an async boundary. */
export class ChatbotError extends Error {
  readonly code: ChatErrorCode
  readonly details: Record<string, unknown>

  constructor(code: ChatErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message)
    this.name = 'ChatbotError'
    this.code = code
    this.details = details
  }

  toChatError(): ChatError {
    return chatError(this.code, this.message, this.details)
  }
}

export function ok<T>(value: T): Result<T> {
  return { ok: true, value }
}

export function fail<T>(error: ChatError): Result<T> {
  return { ok: false, error }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Converts anything caught into a ChatError; unknown throwables count as transport failures.
 */
export function toChatError(error: unknown, fallback: ChatErrorCode = 'TransportError'): ChatError {
  if (error instanceof ChatbotError) return error.toChatError()
  return chatError(fallback, errorMessage(error))
}

export function formatError(error: ChatError): string {
  return `Error [${error.code}]: ${error.message}`
}
