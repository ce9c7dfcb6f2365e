const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))

export type RetryOptions = {
  maxRetries?: number
  baseDelayMs?: number
  retryOn: (error: unknown) => boolean
  onRetry?: (error: unknown, attempt: number) => void
}

export const withRetry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const maxRetries = opts.maxRetries ?? 1
  const baseDelay = opts.baseDelayMs ?? 1000

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn()
    } catch (error) {
      if (attempt >= maxRetries || !opts.retryOn(error)) throw error
      opts.onRetry?.(error, attempt + 1)
      // Exponential backoff with jitter
      const delay = baseDelay * 2 ** attempt
      await sleep(delay + delay * 0.1 * Math.random())
    }
  }
}
