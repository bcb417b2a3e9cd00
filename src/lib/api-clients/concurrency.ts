/**
 * Concurrency Limiter for outbound API calls
 *
 * Caps the number of simultaneous requests to the upstream. Callers beyond
 * the cap queue in FIFO order until a slot frees up.
 */

export class ConcurrencyLimiter {
  private active = 0
  private readonly waiting: Array<() => void> = []
  private readonly maxConcurrent: number

  constructor(maxConcurrent: number = 4) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`)
    }
    this.maxConcurrent = maxConcurrent
  }

  /**
   * Run `task` once a slot is available
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire()
    try {
      return await task()
    } finally {
      this.release()
    }
  }

  get activeCount(): number {
    return this.active
  }

  get pendingCount(): number {
    return this.waiting.length
  }

  private acquire(): Promise<void> {
    if (this.active < this.maxConcurrent) {
      this.active++
      return Promise.resolve()
    }
    return new Promise((resolve) => {
      // slot is handed over directly by release(), so `active` stays unchanged
      this.waiting.push(resolve)
    })
  }

  private release(): void {
    const next = this.waiting.shift()
    if (next) {
      next()
      return
    }
    this.active--
  }
}
