import {setTimeout} from 'node:timers/promises'
import {BackoffTimeoutError} from '../errors.js'

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`
  }

  const seconds = ms / 1000
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`
  }

  const minutes = Math.floor(seconds / 60)
  const remainingSeconds = Math.round(seconds % 60)
  return `${minutes}m ${remainingSeconds}s`
}

/**
 * Sleep for `ms`, rejecting with the signal's own reason when aborted.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  signal?.throwIfAborted()
  try {
    await setTimeout(ms, undefined, {signal})
  } catch (error) {
    signal?.throwIfAborted()
    throw error
  }
}

export type Backoff = {
  /** Delay before the second attempt, in milliseconds. */
  durationMs: number;
  factor: number;
  /** Maximum number of condition checks. */
  steps: number;
}

/**
 * Check `condition` until it returns true, sleeping between checks with an
 * exponentially growing delay. A condition error stops the wait immediately.
 *
 * @throws BackoffTimeoutError when `steps` checks all returned false
 */
export async function exponentialBackoff(
  backoff: Backoff,
  condition: () => Promise<boolean>,
  signal?: AbortSignal
): Promise<void> {
  let delay = backoff.durationMs
  for (let step = backoff.steps; step > 0; step--) {
    if (await condition()) {
      return
    }

    if (step === 1) {
      break
    }

    await sleep(delay, signal)
    delay *= backoff.factor
  }

  throw new BackoffTimeoutError()
}

/**
 * Settles with `task`, or rejects with the signal's reason as soon as the
 * signal aborts, whichever comes first.
 */
export async function raceAbort<T>(task: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return task
  }

  signal.throwIfAborted()
  let onAbort: (() => void) | undefined
  const aborted = new Promise<never>((_resolve, reject) => {
    onAbort = () => {
      reject(signal.reason)
    }

    signal.addEventListener('abort', onAbort, {once: true})
  })

  try {
    return await Promise.race([task, aborted])
  } finally {
    if (onAbort) {
      signal.removeEventListener('abort', onAbort)
    }
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
