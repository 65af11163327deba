import { describe, expect, it, vi } from 'vitest'

import { retry } from '../src/core/retry.js'

describe('retry', () => {
  it('returns the first successful attempt', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce('ok')
    const onRetry = vi.fn()

    await expect(retry(fn, { attempts: 3, backoffMs: 0, onRetry })).resolves.toBe('ok')
    expect(fn).toHaveBeenCalledTimes(2)
    expect(onRetry).toHaveBeenCalledTimes(1)
  })

  it('rethrows the last error after all attempts', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('down'))

    await expect(retry(fn, { attempts: 2, backoffMs: 0 })).rejects.toThrow('down')
    expect(fn).toHaveBeenCalledTimes(2)
  })

  it('stops early on a non-retryable error', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('bad request'))

    await expect(
      retry(fn, { attempts: 5, backoffMs: 0, retryable: () => false })
    ).rejects.toThrow('bad request')
    expect(fn).toHaveBeenCalledTimes(1)
  })

  it('waits longer before each retry', async () => {
    vi.useFakeTimers()
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('down'))
    const settled = retry(fn, { attempts: 3, backoffMs: 100 }).catch((error: unknown) => error)

    await vi.advanceTimersByTimeAsync(100)
    expect(fn).toHaveBeenCalledTimes(2)
    await vi.advanceTimersByTimeAsync(199)
    expect(fn).toHaveBeenCalledTimes(2)
    await vi.advanceTimersByTimeAsync(1)
    expect(fn).toHaveBeenCalledTimes(3)
    await expect(settled).resolves.toEqual(new Error('down'))
    vi.useRealTimers()
  })
})
