import { clearInterval, setInterval } from 'node:timers'
import { CONFIG, type RefreshInterval } from '@/lib/config'
import { systemClock, type Clock } from '@/lib/cache/memory'
import { getErrorMessage } from '@/lib/utils/errors'

/**
 * Periodic callback source. Returns a function that cancels the schedule.
 */
export interface Timer {
  every(ms: number, callback: () => void): () => void
}

export const systemTimer: Timer = {
  every(ms, callback) {
    const handle = setInterval(callback, ms)
    // never keep the process alive just for polling
    handle.unref()
    return () => clearInterval(handle)
  },
}

export type RefreshReason = 'timer' | 'manual'

export interface RefreshEvent<R> {
  reason: RefreshReason
  startedAt: string
  completedAt: string
  ok: boolean
  result?: R
  error?: string
  /** `name` of the thrown error, e.g. `AuthError`. */
  errorName?: string
}

export interface RefreshSchedulerState<R> {
  interval: RefreshInterval
  active: boolean
  inFlight: boolean
  ticks: number
  refreshCount: number
  lastRefresh: RefreshEvent<R> | null
}

export interface RefreshSchedulerOptions<R> {
  refresh: () => Promise<R>
  interval?: RefreshInterval
  timer?: Timer
  clock?: Clock
}

type Listener<R> = (event: RefreshEvent<R>) => void

/**
 * Drives forced refreshes of market data, either on a fixed interval
 * (off / 1 / 5 / 15 minutes) or on demand. Only one refresh cycle runs at a
 * time: a manual refresh during a tick joins the tick's cycle.
 */
export class RefreshScheduler<R> {
  private readonly refresh: () => Promise<R>
  private readonly timer: Timer
  private readonly clock: Clock
  private readonly listeners = new Set<Listener<R>>()

  private interval: RefreshInterval = 0
  private cancel: (() => void) | null = null
  private current: Promise<RefreshEvent<R>> | null = null
  private ticks = 0
  private refreshCount = 0
  private lastRefresh: RefreshEvent<R> | null = null

  constructor(options: RefreshSchedulerOptions<R>) {
    this.refresh = options.refresh
    this.timer = options.timer ?? systemTimer
    this.clock = options.clock ?? systemClock
    this.setInterval(options.interval ?? CONFIG.refresh.defaultInterval)
  }

  /**
   * Switch to a new interval in seconds; 0 turns polling off. Restarts the
   * countdown even when the interval is unchanged.
   */
  setInterval(interval: RefreshInterval): void {
    this.cancel?.()
    this.cancel = null
    this.interval = interval
    if (interval > 0) {
      this.cancel = this.timer.every(interval * 1000, () => this.onTick())
    }
    console.log(`[refresh] interval set to ${interval === 0 ? 'off' : `${interval}s`}`)
  }

  refreshNow(): Promise<RefreshEvent<R>> {
    return this.run('manual')
  }

  /** Notified after every completed refresh cycle. Returns an unsubscribe function. */
  subscribe(listener: Listener<R>): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  stop(): void {
    this.setInterval(0)
  }

  state(): RefreshSchedulerState<R> {
    return {
      interval: this.interval,
      active: this.cancel !== null,
      inFlight: this.current !== null,
      ticks: this.ticks,
      refreshCount: this.refreshCount,
      lastRefresh: this.lastRefresh,
    }
  }

  private onTick(): void {
    this.ticks++
    this.run('timer').catch((error: unknown) => {
      console.error('[refresh] tick failed:', error)
    })
  }

  private run(reason: RefreshReason): Promise<RefreshEvent<R>> {
    if (this.current) {
      console.log(`[refresh] ${reason} refresh joined cycle in flight`)
      return this.current
    }
    const cycle = this.execute(reason).finally(() => {
      this.current = null
    })
    this.current = cycle
    return cycle
  }

  private async execute(reason: RefreshReason): Promise<RefreshEvent<R>> {
    const startedAt = new Date(this.clock.now()).toISOString()
    this.refreshCount++
    let event: RefreshEvent<R>
    try {
      const result = await this.refresh()
      event = { reason, startedAt, completedAt: new Date(this.clock.now()).toISOString(), ok: true, result }
    } catch (error) {
      console.error(`[refresh] ${reason} refresh failed:`, error)
      event = {
        reason,
        startedAt,
        completedAt: new Date(this.clock.now()).toISOString(),
        ok: false,
        error: getErrorMessage(error),
        ...(error instanceof Error ? { errorName: error.name } : {}),
      }
    }
    this.lastRefresh = event
    this.notify(event)
    return event
  }

  private notify(event: RefreshEvent<R>): void {
    for (const listener of this.listeners) {
      try {
        listener(event)
      } catch (error) {
        console.warn('[refresh] listener threw:', error)
      }
    }
  }
}
