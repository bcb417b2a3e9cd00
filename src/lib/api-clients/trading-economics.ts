import { CONFIG } from '@/lib/config'
import { toQueryValue, type CredentialHolder } from '@/lib/credentials'
import { fetchWithRetry } from '@/lib/utils/retry'
import { APIError, AuthError, DecodeError, RateLimitError, TransportError, getErrorMessage, isTransportError } from '@/lib/utils/errors'
import { ConcurrencyLimiter } from './concurrency'

export const PROVIDER = 'TradingEconomics'

export type QueryParams = Record<string, string | number | undefined>

/**
 * What the endpoint adapters depend on. One call, one parsed JSON body.
 */
export interface Transport {
  execute(path: string, query?: QueryParams): Promise<unknown>
}

export interface TransportOptions {
  credentials: CredentialHolder
  baseUrl?: string
  timeoutMs?: number
  limiter?: ConcurrencyLimiter
  retry?: { maxAttempts: number; baseDelayMs: number }
  fetchImpl?: typeof fetch
  now?: () => number
}

/**
 * Parse a Retry-After header given either as delta-seconds or as an HTTP date.
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (!header) return undefined
  const trimmed = header.trim()
  if (/^\d+$/.test(trimmed)) return parseInt(trimmed, 10)
  const at = Date.parse(trimmed)
  if (Number.isNaN(at)) return undefined
  return Math.max(0, Math.ceil((at - now) / 1000))
}

export class TradingEconomicsClient implements Transport {
  private readonly credentials: CredentialHolder
  private readonly baseUrl: string
  private readonly timeoutMs: number
  private readonly limiter: ConcurrencyLimiter
  private readonly retry: { maxAttempts: number; baseDelayMs: number }
  private readonly fetchImpl: typeof fetch
  private readonly now: () => number

  constructor(options: TransportOptions) {
    const te = CONFIG.api.tradingEconomics
    this.credentials = options.credentials
    this.baseUrl = (options.baseUrl ?? te.baseUrl).replace(/\/+$/, '')
    this.timeoutMs = options.timeoutMs ?? te.timeoutMs
    this.limiter = options.limiter ?? new ConcurrencyLimiter(te.maxConcurrent)
    this.retry = options.retry ?? te.retry
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init))
    this.now = options.now ?? Date.now
  }

  /**
   * GET `path` with credentials attached. Transport failures are retried once;
   * auth, rate-limit and decode failures surface immediately.
   */
  async execute(path: string, query: QueryParams = {}): Promise<unknown> {
    const url = this.buildUrl(path, query)
    return fetchWithRetry(() => this.limiter.run(() => this.request(url, path)), {
      maxRetries: this.retry.maxAttempts,
      baseDelayMs: this.retry.baseDelayMs,
      shouldRetry: isTransportError,
    })
  }

  private buildUrl(path: string, query: QueryParams): URL {
    const url = new URL(`${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}`)
    for (const [k, v] of Object.entries(query)) {
      if (v !== undefined) url.searchParams.set(k, String(v))
    }
    url.searchParams.set('c', toQueryValue(this.credentials.current()))
    url.searchParams.set('f', 'json')
    return url
  }

  private async request(url: URL, label: string): Promise<unknown> {
    const started = this.now()
    let res: Response
    try {
      res = await this.fetchImpl(url.toString(), {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      })
    } catch (error) {
      const timedOut = error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')
      const msg = timedOut ? `Request to ${label} timed out after ${this.timeoutMs}ms` : `Network error for ${label}: ${getErrorMessage(error)}`
      console.warn(`[te] ${msg}`)
      throw new TransportError(msg, PROVIDER)
    }

    if (!res.ok) {
      const text = await res.text().catch(() => '')
      const msg = `Trading Economics returned HTTP ${res.status} for ${label}${text ? `: ${text.slice(0, 200)}` : ''}`
      console.warn(`[te] ${msg}`)
      if (res.status === 401 || res.status === 403) throw new AuthError(msg, res.status, PROVIDER)
      if (res.status === 429) throw new RateLimitError(msg, PROVIDER, parseRetryAfter(res.headers.get('retry-after'), this.now()))
      if (res.status >= 500) throw new TransportError(msg, PROVIDER, res.status)
      throw new APIError(msg, res.status, PROVIDER)
    }

    let body: string
    try {
      body = await res.text()
    } catch (error) {
      throw new TransportError(`Failed reading body for ${label}: ${getErrorMessage(error)}`, PROVIDER, res.status)
    }

    try {
      const json: unknown = JSON.parse(body)
      console.log(`[te] GET ${label} ${res.status} in ${this.now() - started}ms`)
      return json
    } catch {
      console.error(`[te] malformed JSON from ${label}`)
      throw new DecodeError(`Malformed JSON from ${label}`, PROVIDER)
    }
  }
}
