import type { Logger } from './types.js'

export type LogLevel = 'info' | 'warn' | 'error'

const RANK: Record<LogLevel, number> = { info: 0, warn: 1, error: 2 }

let muted = false
let threshold: LogLevel = 'info'

export function setLoggerMuted(value: boolean): void {
  muted = value
}

/** Drops events below `level`. */
export function setLogLevel(level: LogLevel): void {
  threshold = level
}

function emit(level: LogLevel, event: string, data?: Record<string, unknown>): void {
  if (muted || RANK[level] < RANK[threshold]) return
  const payload = {
    ts: new Date().toISOString(),
    level: level.toUpperCase(),
    event,
    ...(data ?? {})
  }
  // stdout carries the REPL and the stdio transport
  // eslint-disable-next-line no-console
  console.error(JSON.stringify(payload))
}

/** JSON-lines logger on stderr, shared by the chatbot and the sample server. */
export const logger: Logger = {
  info(event, data) {
    emit('info', event, data)
  },
  warn(event, data) {
    emit('warn', event, data)
  },
  error(event, data) {
    emit('error', event, data)
  }
}

/** Wraps a logger so every event carries `fields`. */
export function withFields(base: Logger, fields: Record<string, unknown>): Logger {
  return {
    info: (event, data) => base.info(event, { ...fields, ...data }),
    warn: (event, data) => base.warn(event, { ...fields, ...data }),
    error: (event, data) => base.error(event, { ...fields, ...data })
  }
}
