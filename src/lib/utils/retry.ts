export interface RetryOptions {
  /** Total attempts including the first */
  maxAttempts?: number
  /** Pause between attempts; the same every time */
  delayMs?: number
  /** Return false to give up at once (e.g. a 4xx the next attempt would repeat) */
  shouldRetry?: (error: unknown) => boolean
}

const DEFAULT_MAX_ATTEMPTS = 2
const DEFAULT_DELAY_MS = 1000

/** Run `fn`, trying again after a fixed pause while attempts remain and the error is worth retrying. */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxAttempts = DEFAULT_MAX_ATTEMPTS, delayMs = DEFAULT_DELAY_MS, shouldRetry = () => true } = options
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn()
    } catch (e) {
      if (attempt >= maxAttempts || !shouldRetry(e)) throw e
      await new Promise<void>((resolve) => setTimeout(resolve, delayMs))
    }
  }
}
