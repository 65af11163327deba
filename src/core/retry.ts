export interface RetryOptions {
  /** Total tries, including the first. */
  attempts: number
  /** Delay before the first retry; later retries wait `backoffMs * attempt`. */
  backoffMs: number
  /** Return false to rethrow immediately instead of retrying. */
  retryable?: (error: unknown) => boolean
  onRetry?: (attempt: number, error: unknown) => void
}

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms))

/**
 * Runs `fn` until it resolves or the attempts run out, then rethrows the
 * last failure.
 */
export async function retry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { attempts, backoffMs, retryable = () => true, onRetry } = options

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn()
    } catch (error) {
      if (attempt >= attempts || !retryable(error)) throw error
      onRetry?.(attempt, error)
      await sleep(backoffMs * attempt)
    }
  }
}
