import { getErrorMessage, isRecoverableError } from '@/lib/utils/errors'

export type CacheTier = 'market' | 'indicator' | 'historical'

export const CACHE_TTL = {
  market: 60, // 1 minute - ticker and market tables
  indicator: 900, // 15 minutes - country snapshot, forecasts, calendar
  historical: 3600, // 1 hour - time series, OHLC, news
} as const satisfies Record<CacheTier, number>

// Adapter identities; the fingerprint prefix of every entry
export const CACHE_KEYS = {
  SNAPSHOT: 'te:snapshot',
  HISTORICAL: 'te:historical',
  FORECAST: 'te:forecast',
  MARKETS: 'te:markets',
  MARKET_HISTORICAL: 'te:market-historical',
  NEWS: 'te:news',
  CALENDAR: 'te:calendar',
} as const

export interface Clock {
  now(): number
}

export const systemClock: Clock = { now: () => Date.now() }

export type FingerprintParams = Record<string, string | number | undefined>

/**
 * Deterministic request identity: adapter name plus parameters with keys
 * sorted, values trimmed and lower-cased, empty values dropped.
 */
export function createFingerprint(name: string, params: FingerprintParams = {}): string {
  const parts: string[] = []
  for (const key of Object.keys(params).sort()) {
    const value = params[key]
    if (value === undefined) continue
    const normalized = String(value).trim().toLowerCase()
    if (normalized === '') continue
    parts.push(`${key}=${normalized}`)
  }
  return parts.length ? `${name}:${parts.join('&')}` : name
}

export interface CacheEntry<T> {
  fingerprint: string
  payload: T
  fetchedAt: number
  tier: CacheTier
  /** Set by invalidate(); the entry is refetched on next read but kept for stale fallback. */
  invalidated: boolean
}

export interface CachedResult<T> {
  data: T
  fingerprint: string
  tier: CacheTier
  fetchedAt: number
  /** Served from the store without a network call */
  cached: boolean
  /** Served from an expired entry because the refresh failed */
  stale: boolean
  staleReason?: string
}

export interface GetOptions {
  /** Skip the TTL check and always invoke the fetch */
  force?: boolean
}

interface RegionHandle {
  readonly name: string
  readonly tier: CacheTier
  readonly size: number
  readonly inFlightCount: number
  invalidate(): number
}

/**
 * Entries of one adapter. Payloads are shared with callers, who must treat
 * them as read-only.
 */
export class CacheRegion<T> implements RegionHandle {
  private readonly entries = new Map<string, CacheEntry<T>>()
  private readonly inFlight = new Map<string, Promise<CachedResult<T>>>()

  constructor(
    readonly name: string,
    readonly tier: CacheTier,
    private readonly ttlMs: number,
    private readonly clock: Clock
  ) {}

  get size(): number {
    return this.entries.size
  }

  get inFlightCount(): number {
    return this.inFlight.size
  }

  async get(params: FingerprintParams, fetchFn: () => Promise<T>, options: GetOptions = {}): Promise<CachedResult<T>> {
    const fingerprint = createFingerprint(this.name, params)
    const entry = this.entries.get(fingerprint)
    if (entry && !options.force && this.isFresh(entry)) {
      console.log(`[cache] hit for ${fingerprint}`)
      return this.toResult(entry, true)
    }

    // at most one fetch per fingerprint; later callers share its outcome
    const pending = this.inFlight.get(fingerprint)
    if (pending) {
      console.log(`[cache] joining in-flight fetch for ${fingerprint}`)
      return pending
    }

    console.log(`[cache] ${!entry ? 'miss' : options.force ? 'forced refresh' : 'expired'} for ${fingerprint}`)
    const promise = this.load(fingerprint, fetchFn).finally(() => {
      this.inFlight.delete(fingerprint)
    })
    this.inFlight.set(fingerprint, promise)
    return promise
  }

  peek(params: FingerprintParams = {}): CacheEntry<T> | undefined {
    return this.entries.get(createFingerprint(this.name, params))
  }

  invalidate(): number {
    for (const entry of this.entries.values()) entry.invalidated = true
    return this.entries.size
  }

  private isFresh(entry: CacheEntry<T>): boolean {
    return !entry.invalidated && this.clock.now() - entry.fetchedAt < this.ttlMs
  }

  private async load(fingerprint: string, fetchFn: () => Promise<T>): Promise<CachedResult<T>> {
    try {
      const payload = await fetchFn()
      const entry: CacheEntry<T> = { fingerprint, payload, fetchedAt: this.clock.now(), tier: this.tier, invalidated: false }
      this.entries.set(fingerprint, entry)
      return this.toResult(entry, false)
    } catch (error) {
      const prior = this.entries.get(fingerprint)
      if (prior && isRecoverableError(error)) {
        console.warn(`[cache] serving stale ${fingerprint} after ${error.name}: ${error.message}`)
        return { ...this.toResult(prior, true), stale: true, staleReason: getErrorMessage(error) }
      }
      // auth and decode failures are never masked; the prior entry stays untouched
      throw error
    }
  }

  private toResult(entry: CacheEntry<T>, cached: boolean): CachedResult<T> {
    return { data: entry.payload, fingerprint: entry.fingerprint, tier: entry.tier, fetchedAt: entry.fetchedAt, cached, stale: false }
  }
}

export interface CacheStats {
  entries: number
  inFlight: number
  byTier: Record<CacheTier, number>
}

export interface ResponseCacheOptions {
  clock?: Clock
  ttlSeconds?: Partial<Record<CacheTier, number>>
}

/**
 * In-process response cache. Nothing is evicted: the key space is bounded by
 * the fixed endpoint and parameter set, and entries past their TTL are kept
 * for stale fallback until a refresh succeeds.
 */
export class ResponseCache {
  private readonly regions = new Map<string, RegionHandle>()
  private readonly ttl: Record<CacheTier, number>
  readonly clock: Clock

  constructor(options: ResponseCacheOptions = {}) {
    this.clock = options.clock ?? systemClock
    this.ttl = { ...CACHE_TTL, ...options.ttlSeconds }
  }

  region<T>(name: string, tier: CacheTier): CacheRegion<T> {
    if (this.regions.has(name)) {
      throw new Error(`Cache region ${name} already exists`)
    }
    const region = new CacheRegion<T>(name, tier, this.ttl[tier] * 1000, this.clock)
    this.regions.set(name, region)
    return region
  }

  ttlSeconds(tier: CacheTier): number {
    return this.ttl[tier]
  }

  /**
   * Mark entries of one tier (or all) as expired. Returns the number of entries touched.
   */
  invalidate(tier?: CacheTier): number {
    let touched = 0
    for (const region of this.regions.values()) {
      if (!tier || region.tier === tier) touched += region.invalidate()
    }
    console.log(`[cache] invalidated ${touched} entries${tier ? ` in ${tier} tier` : ''}`)
    return touched
  }

  stats(): CacheStats {
    const byTier: Record<CacheTier, number> = { market: 0, indicator: 0, historical: 0 }
    let entries = 0
    let inFlight = 0
    for (const region of this.regions.values()) {
      byTier[region.tier] += region.size
      entries += region.size
      inFlight += region.inFlightCount
    }
    return { entries, inFlight, byTier }
  }
}
