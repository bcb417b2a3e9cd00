export interface RetryOptions {
  maxRetries?: number
  baseDelayMs?: number
  /** Only errors matching this predicate are retried; everything else is rethrown at once. */
  shouldRetry?: (error: unknown) => boolean
}

/**
 * Execute a function with exponential backoff retry
 */
export async function fetchWithRetry<T>(fetchFn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxRetries = 3, baseDelayMs = 1000, shouldRetry = () => true } = options
  let lastError: unknown

  for (let attempt = 0; attempt < maxRetries; attempt++) {
    try {
      return await fetchFn()
    } catch (error) {
      lastError = error
      if (!shouldRetry(error)) throw error
      if (attempt < maxRetries - 1) {
        const delay = baseDelayMs * Math.pow(2, attempt)
        console.warn(`Attempt ${attempt + 1}/${maxRetries} failed, retrying in ${delay}ms...`, error)
        await sleep(delay)
      }
    }
  }

  throw lastError ?? new Error('All retry attempts failed')
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
