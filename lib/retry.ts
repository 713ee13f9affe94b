/**
 * Timeouts, bounded retries and cancellation for calls to external collaborators.
 *
 * Cancellation never force-aborts a call that has no cancel primitive: the
 * caller stops waiting and the late result is discarded.
 */

import { QueryCancelledError, errorMessage } from "@/lib/errors"
import { debugLog } from "@/lib/log"

/** Let a call we no longer wait for settle in the background. */
function discard(promise: Promise<unknown>): void {
  promise.catch((err: unknown) => debugLog("retry", "discarded late failure:", errorMessage(err)))
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) return reject(new QueryCancelledError())
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort)
      resolve()
    }, ms)
    const onAbort = () => {
      clearTimeout(timer)
      reject(new QueryCancelledError())
    }
    signal?.addEventListener("abort", onAbort, { once: true })
  })
}

/** Resolve with the promise, or reject with QueryCancelledError as soon as the signal fires. */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise
  if (signal.aborted) {
    discard(promise)
    return Promise.reject(new QueryCancelledError())
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new QueryCancelledError())
    signal.addEventListener("abort", onAbort, { once: true })
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort)
        resolve(value)
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort)
        reject(err)
      }
    )
  })
}

/**
 * Run task with a deadline. The task gets its own AbortSignal that fires on
 * timeout or when the parent signal aborts; collaborators that honour it stop
 * early, the rest finish in the background and are ignored.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) throw new QueryCancelledError()
  const controller = new AbortController()
  const forwardAbort = () => controller.abort()
  parent?.addEventListener("abort", forwardAbort, { once: true })
  let timer: NodeJS.Timeout | undefined
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort()
      reject(onTimeout())
    }, timeoutMs)
  })
  const running = task(controller.signal)
  try {
    return await raceAbort(Promise.race([running, deadline]), parent)
  } finally {
    clearTimeout(timer)
    parent?.removeEventListener("abort", forwardAbort)
  }
}

export type RetryOptions = {
  attempts: number
  /** Delay before the second attempt; doubles after each further failure. */
  baseDelayMs: number
  maxDelayMs?: number
  shouldRetry?: (err: unknown) => boolean
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void
  signal?: AbortSignal
}

export async function retryWithBackoff<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const { attempts, baseDelayMs, maxDelayMs = 10_000, shouldRetry = () => true, onRetry, signal } = options
  let lastError: unknown
  for (let attempt = 1; attempt <= attempts; attempt++) {
    if (signal?.aborted) throw new QueryCancelledError()
    try {
      return await fn(attempt)
    } catch (err) {
      lastError = err
      if (err instanceof QueryCancelledError || attempt === attempts || !shouldRetry(err)) throw err
      const delay = Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1))
      onRetry?.(err, attempt, delay)
      if (delay > 0) await sleep(delay, signal)
    }
  }
  throw lastError
}
