/**
 * @fileoverview Retry and Timeout Utilities
 *
 * Retry with exponential backoff for transient upstream failures, and a
 * timeout wrapper so no external call can hang a validation run.
 *
 * @module lib/retry
 */

import { UpstreamTimeoutError, type UpstreamService } from "./errors"

/**
 * Check if an error should be retried.
 * Errors carrying a `retriable` flag decide for themselves; anything else
 * (network resets, plain `Error`s from fetch) is treated as transient.
 */
export function isRetriable(error: unknown): boolean {
  if (error instanceof Error && "retriable" in error) {
    return error.retriable !== false
  }
  return true
}

/**
 * Sleep for a specified duration.
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Retry options.
 */
export interface RetryOptions {
  /** Maximum number of attempts (default: 3) */
  maxAttempts?: number
  /** Backoff delays in ms for each retry (default: [1000, 2000, 4000]) */
  backoff?: number[]
  /** Optional callback on each retry */
  onRetry?: (error: Error, attempt: number) => void
}

/**
 * Build an exponential backoff schedule: base, 2*base, 4*base... capped.
 *
 * @example
 * exponentialBackoff(3, 500, 8000) // [500, 1000]
 */
export function exponentialBackoff(
  maxAttempts: number,
  baseDelayMs: number,
  maxDelayMs: number = Number.POSITIVE_INFINITY
): number[] {
  const delays: number[] = []
  for (let retry = 0; retry < maxAttempts - 1; retry++) {
    delays.push(Math.min(maxDelayMs, baseDelayMs * 2 ** retry))
  }
  return delays
}

/**
 * Execute a function with retry on failure.
 *
 * @example
 * const vectors = await withRetry(
 *   () => provider.embed(texts, { signal }),
 *   { maxAttempts: 3, backoff: exponentialBackoff(3, 500) }
 * )
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const { maxAttempts = 3, backoff = [1000, 2000, 4000], onRetry } = options

  let lastError: Error | undefined

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn()
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error))

      if (!isRetriable(error) || attempt >= maxAttempts) {
        throw lastError
      }

      onRetry?.(lastError, attempt)

      const delay = backoff[attempt - 1] ?? backoff[backoff.length - 1] ?? 0
      await sleep(delay)
    }
  }

  // Only reachable with maxAttempts < 1
  throw lastError ?? new Error("Retry failed: no attempts made")
}

/**
 * Run `fn` with an abort signal and fail with `UpstreamTimeoutError` if it
 * has not settled within `timeoutMs`. The signal is aborted on timeout so
 * well-behaved callees (fetch) stop their work.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  service: UpstreamService
): Promise<T> {
  const controller = new AbortController()
  let timer: NodeJS.Timeout | undefined

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort()
      reject(new UpstreamTimeoutError(service, timeoutMs))
    }, timeoutMs)
  })

  try {
    return await Promise.race([fn(controller.signal), timeout])
  } finally {
    clearTimeout(timer)
  }
}
