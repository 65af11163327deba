import { chatError, fail, ok } from './errors.js'
import type { Result } from './types.js'

const WHITESPACE = /\s/

/**
 * Splits a command line into words using POSIX shell quoting rules.
 */
export function splitCommandLine(line: string): Result<string[]> {
  const words: string[] = []
  let current = ''
  let inWord = false
  let quote: "'" | '"' | null = null

  for (let i = 0; i < line.length; i += 1) {
    const ch = line.charAt(i)

    if (quote === "'") {
      if (ch === "'") quote = null
      else current += ch
      continue
    }

    if (quote === '"') {
      if (ch === '"') {
        quote = null
      } else if (ch === '\\' && (line.charAt(i + 1) === '"' || line.charAt(i + 1) === '\\')) {
        current += line.charAt(i + 1)
        i += 1
      } else {
        current += ch
      }
      continue
    }

    if (WHITESPACE.test(ch)) {
      if (inWord) {
        words.push(current)
        current = ''
        inWord = false
      }
      continue
    }

    inWord = true
    if (ch === "'" || ch === '"') {
      quote = ch
    } else if (ch === '\\' && i + 1 < line.length) {
      current += line.charAt(i + 1)
      i += 1
    } else {
      current += ch
    }
  }

  if (quote) {
    return fail(chatError('MalformedToken', 'Error parsing command. Check your quotes.', { line }))
  }
  if (inWord) words.push(current)
  return ok(words)
}
