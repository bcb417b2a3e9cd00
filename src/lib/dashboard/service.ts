import {
  MARKET_CATEGORIES,
  fetchCalendar,
  fetchCountrySnapshot,
  fetchForecasts,
  fetchHistorical,
  fetchMarketHistorical,
  fetchMarkets,
  fetchNews,
  type AdapterContext,
  type CalendarEvent,
  type DateRange,
  type EconomyGroup,
  type ForecastPoint,
  type HistoricalPoint,
  type IndicatorRecord,
  type MarketCategory,
  type MarketQuote,
  type NewsItem,
  type OHLCBar,
} from '@/lib/adapters'
import { CACHE_KEYS, type CacheRegion, type CachedResult, type ResponseCache } from '@/lib/cache/memory'
import { CONFIG } from '@/lib/config'
import { calculateDataFreshness, type DataFreshnessInfo } from '@/lib/utils/data-validation'
import { AuthError, getErrorMessage } from '@/lib/utils/errors'
import { getGroupHighlights, selectHighlightRecords } from './highlights'
import { overlayForecast, recentValues, type SeriesPoint } from './overlay'
import { buildTicker, type TickerItem } from './ticker'

export interface DashboardResult<T> {
  data: T
  stale: boolean
  asOf: string
  freshness: DataFreshnessInfo
  staleReason?: string
}

export interface IndicatorDetail {
  indicator: string
  history: HistoricalPoint[]
  forecast: ForecastPoint[]
  series: SeriesPoint[]
  recent: HistoricalPoint[]
}

export interface HighlightsData {
  stats: IndicatorRecord[]
  charts: string[]
}

export interface MarketRefreshSummary {
  results: Record<MarketCategory, 'success' | 'failed'>
  errors: Partial<Record<MarketCategory, string>>
}

export interface DashboardServiceOptions {
  adapters: AdapterContext
  cache: ResponseCache
  newsLimit?: number
}

// Market symbols carry an exchange suffix ("USGG10YR:IND"); indicator names never do
const MARKET_SYMBOL = /^[A-Z0-9.^_-]+:[A-Z]+$/i

/**
 * Read API for the presentation layer. Every call goes through the cache and
 * returns the records with their "as of" time and staleness flag.
 */
export class DashboardService {
  private readonly adapters: AdapterContext
  private readonly cache: ResponseCache
  private readonly newsLimit: number

  private readonly snapshot: CacheRegion<IndicatorRecord[]>
  private readonly historical: CacheRegion<HistoricalPoint[]>
  private readonly forecasts: CacheRegion<ForecastPoint[]>
  private readonly markets: CacheRegion<MarketQuote[]>
  private readonly marketHistorical: CacheRegion<OHLCBar[]>
  private readonly news: CacheRegion<NewsItem[]>
  private readonly calendar: CacheRegion<CalendarEvent[]>

  constructor(options: DashboardServiceOptions) {
    this.adapters = options.adapters
    this.cache = options.cache
    this.newsLimit = options.newsLimit ?? CONFIG.news.limit

    this.snapshot = this.cache.region(CACHE_KEYS.SNAPSHOT, 'indicator')
    this.forecasts = this.cache.region(CACHE_KEYS.FORECAST, 'indicator')
    this.calendar = this.cache.region(CACHE_KEYS.CALENDAR, 'indicator')
    this.markets = this.cache.region(CACHE_KEYS.MARKETS, 'market')
    this.historical = this.cache.region(CACHE_KEYS.HISTORICAL, 'historical')
    this.marketHistorical = this.cache.region(CACHE_KEYS.MARKET_HISTORICAL, 'historical')
    this.news = this.cache.region(CACHE_KEYS.NEWS, 'historical')
  }

  async getIndicators(category: EconomyGroup): Promise<DashboardResult<IndicatorRecord[]>> {
    const result = await this.loadSnapshot()
    return this.toResult(result, result.data.filter((r) => r.category === category))
  }

  async getHighlights(category: EconomyGroup): Promise<DashboardResult<HighlightsData>> {
    const result = await this.loadSnapshot()
    return this.toResult(result, {
      stats: selectHighlightRecords(category, result.data),
      charts: getGroupHighlights(category).charts,
    })
  }

  /**
   * Time series for an indicator name, or the closing prices of a market
   * symbol when given one ("USGG10YR:IND").
   */
  async getHistorical(indicatorOrSymbol: string, range: DateRange = {}): Promise<DashboardResult<HistoricalPoint[]>> {
    if (MARKET_SYMBOL.test(indicatorOrSymbol.trim())) {
      const result = await this.loadOHLC(indicatorOrSymbol, range)
      return this.toResult(
        result,
        result.data.map((bar) => ({ id: bar.symbol, timestamp: bar.timestamp, value: bar.close }))
      )
    }
    const result = await this.loadHistorical(indicatorOrSymbol, range)
    return this.toResult(result, result.data)
  }

  async getForecast(indicator: string): Promise<DashboardResult<ForecastPoint[]>> {
    const result = await this.loadForecasts()
    const wanted = indicator.trim().toLowerCase()
    return this.toResult(
      result,
      result.data.filter((f) => f.indicator.toLowerCase() === wanted)
    )
  }

  /**
   * History, forecast overlay and the most recent observations of one indicator.
   */
  async getIndicatorDetail(indicator: string, range: DateRange = {}): Promise<DashboardResult<IndicatorDetail>> {
    const [history, forecasts] = await Promise.all([this.loadHistorical(indicator, range), this.loadForecasts()])
    const wanted = indicator.trim().toLowerCase()
    const forecast = forecasts.data.filter((f) => f.indicator.toLowerCase() === wanted)
    return this.combine([history, forecasts], {
      indicator,
      history: history.data,
      forecast,
      series: overlayForecast(history.data, forecast, indicator),
      recent: recentValues(history.data, CONFIG.tables.recentValues),
    })
  }

  async getMarketQuotes(category: MarketCategory, options: { force?: boolean } = {}): Promise<DashboardResult<MarketQuote[]>> {
    const result = await this.loadMarkets(category, options.force)
    return this.toResult(result, result.data)
  }

  async getOHLC(symbol: string, range: DateRange = {}): Promise<DashboardResult<OHLCBar[]>> {
    const result = await this.loadOHLC(symbol, range)
    return this.toResult(result, result.data)
  }

  async getNews(limit: number = this.newsLimit): Promise<DashboardResult<NewsItem[]>> {
    const result = await this.news.get({ country: this.adapters.country, limit }, () => fetchNews(this.adapters, limit))
    return this.toResult(result, result.data)
  }

  async getCalendar(): Promise<DashboardResult<CalendarEvent[]>> {
    const result = await this.calendar.get({ country: this.adapters.country }, () => fetchCalendar(this.adapters))
    return this.toResult(result, result.data)
  }

  /**
   * Ticker bar from all four market categories. A category that fails is left
   * out and the ticker is flagged stale; an auth failure is always rethrown.
   */
  async getTicker(): Promise<DashboardResult<TickerItem[]>> {
    const settled = await Promise.allSettled(MARKET_CATEGORIES.map((category) => this.loadMarkets(category)))

    const quotes: Partial<Record<MarketCategory, MarketQuote[]>> = {}
    const loaded: Array<CachedResult<MarketQuote[]>> = []
    const failures: string[] = []
    let firstError: unknown

    settled.forEach((outcome, index) => {
      const category = MARKET_CATEGORIES[index]
      if (outcome.status === 'fulfilled') {
        quotes[category] = outcome.value.data
        loaded.push(outcome.value)
        return
      }
      if (outcome.reason instanceof AuthError || firstError === undefined) firstError = outcome.reason
      console.warn(`[dashboard] ticker: ${category} unavailable:`, outcome.reason)
      failures.push(`${category}: ${getErrorMessage(outcome.reason)}`)
    })

    if (firstError instanceof AuthError || (loaded.length === 0 && firstError !== undefined)) throw firstError
    return this.combine(loaded, buildTicker(quotes), failures)
  }

  /**
   * Forced re-fetch of every market category, bypassing the TTL.
   * Rejects when the credentials were refused or no category refreshed.
   */
  async refreshMarkets(): Promise<MarketRefreshSummary> {
    const settled = await Promise.allSettled(MARKET_CATEGORIES.map((category) => this.getMarketQuotes(category, { force: true })))
    const summary: MarketRefreshSummary = {
      results: { index: 'failed', bond: 'failed', currency: 'failed', commodity: 'failed' },
      errors: {},
    }
    let authError: AuthError | undefined
    settled.forEach((outcome, index) => {
      const category = MARKET_CATEGORIES[index]
      // a stale fallback means the upstream call itself failed
      if (outcome.status === 'fulfilled' && !outcome.value.stale) {
        summary.results[category] = 'success'
        return
      }
      if (outcome.status === 'rejected' && outcome.reason instanceof AuthError && !authError) authError = outcome.reason
      const reason = outcome.status === 'rejected' ? getErrorMessage(outcome.reason) : outcome.value.staleReason ?? 'served stale'
      summary.errors[category] = reason
      console.error(`[dashboard] failed to refresh ${category}: ${reason}`)
    })

    if (authError) throw authError
    if (MARKET_CATEGORIES.every((category) => summary.results[category] === 'failed')) {
      const reasons = MARKET_CATEGORIES.map((category) => `${category}: ${summary.errors[category] ?? 'failed'}`)
      throw new Error(`No market category refreshed (${reasons.join('; ')})`)
    }
    return summary
  }

  /** Expire every cached dataset; entries stay available as stale fallback. */
  invalidateAll(): number {
    return this.cache.invalidate()
  }

  private loadSnapshot(): Promise<CachedResult<IndicatorRecord[]>> {
    return this.snapshot.get({ country: this.adapters.country }, () => fetchCountrySnapshot(this.adapters))
  }

  private loadForecasts(): Promise<CachedResult<ForecastPoint[]>> {
    return this.forecasts.get({ country: this.adapters.country }, () => fetchForecasts(this.adapters))
  }

  private loadHistorical(indicator: string, range: DateRange): Promise<CachedResult<HistoricalPoint[]>> {
    return this.historical.get({ country: this.adapters.country, indicator, start: range.start, end: range.end }, () =>
      fetchHistorical(this.adapters, indicator, range)
    )
  }

  private loadMarkets(category: MarketCategory, force = false): Promise<CachedResult<MarketQuote[]>> {
    return this.markets.get({ category }, () => fetchMarkets(this.adapters, category), { force })
  }

  private loadOHLC(symbol: string, range: DateRange): Promise<CachedResult<OHLCBar[]>> {
    return this.marketHistorical.get({ symbol, start: range.start, end: range.end }, () => fetchMarketHistorical(this.adapters, symbol, range))
  }

  private toResult<T>(result: CachedResult<unknown>, data: T): DashboardResult<T> {
    return this.combine([result], data)
  }

  /**
   * Merge cache metadata of the results a view was built from: stale if any
   * is stale or any part failed, "as of" the oldest fetch, TTL of the
   * shortest tier. `results` must not be empty.
   */
  private combine<T>(results: Array<CachedResult<unknown>>, data: T, failures: string[] = []): DashboardResult<T> {
    const fetchedAt = Math.min(...results.map((r) => r.fetchedAt))
    const ttlSeconds = Math.min(...results.map((r) => this.cache.ttlSeconds(r.tier)))
    const stale = failures.length > 0 || results.some((r) => r.stale)
    const reasons = [...results.flatMap((r) => (r.staleReason ? [r.staleReason] : [])), ...failures]
    const staleReason = reasons.length ? reasons.join('; ') : undefined
    const freshness = calculateDataFreshness({ fetchedAt, ttlSeconds, servedStale: stale, staleReason }, this.cache.clock.now())
    return { data, stale, asOf: freshness.asOf, freshness, ...(staleReason ? { staleReason } : {}) }
  }
}
