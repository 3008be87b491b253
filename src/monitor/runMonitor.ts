import type { CycleOutcome } from '../contracts'
import { debugLog, errorMessage } from '../debug/debugLog'

export type RunPolicy =
  | { mode: 'once'; failOnFetchError?: boolean }
  | { mode: 'forever'; intervalMs: number }

export interface CheckCycle {
  checkInventory(): Promise<CycleOutcome>
}

export interface RunOptions {
  signal?: AbortSignal
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
}

export const EXIT_OK = 0
export const EXIT_ERROR = 1
export const EXIT_FETCH_FAILED = 2

/** Resolves after `ms`, or as soon as the signal aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve()
      return
    }

    const onAbort = () => {
      clearTimeout(timer)
      resolve()
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

/**
 * Run the check cycle once, or forever on a fixed interval.
 * Cycles never overlap: the wait starts after a cycle has finished.
 * @returns Process exit code
 */
export async function runMonitor(
  monitor: CheckCycle,
  policy: RunPolicy,
  options: RunOptions = {}
): Promise<number> {
  const wait = options.sleep ?? sleep
  const { signal } = options

  if (policy.mode === 'once') {
    try {
      const outcome = await monitor.checkInventory()
      debugLog({ event: 'run_once_complete', status: outcome.status })
      if (outcome.status === 'fetch-failed' && policy.failOnFetchError) {
        return EXIT_FETCH_FAILED
      }
      return EXIT_OK
    } catch (error) {
      console.error(`Inventory check failed: ${errorMessage(error)}`)
      debugLog({ event: 'run_once_error', error: errorMessage(error) })
      return EXIT_ERROR
    }
  }

  while (!signal?.aborted) {
    try {
      await monitor.checkInventory()
    } catch (error) {
      // The next scheduled cycle is the retry
      console.error(`Inventory check failed: ${errorMessage(error)}`)
      debugLog({ event: 'run_cycle_error', error: errorMessage(error) })
    }

    if (signal?.aborted) break
    await wait(policy.intervalMs, signal)
  }

  debugLog({ event: 'run_stopped' })
  return EXIT_OK
}
