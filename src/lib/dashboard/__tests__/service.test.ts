import type { QueryParams, Transport } from '@/lib/api-clients/trading-economics'
import { ResponseCache, type Clock } from '@/lib/cache/memory'
import { APIError, AuthError, DecodeError, RateLimitError, TransportError } from '@/lib/utils/errors'
import { DashboardService } from '../service'

// =============================================================================
// Fakes
// =============================================================================

class FakeClock implements Clock {
  constructor(public t: number) {}

  now(): number {
    return this.t
  }
}

class FakeTransport implements Transport {
  readonly calls: Array<{ path: string; query?: QueryParams }> = []
  private readonly routes = new Map<string, () => unknown>()

  on(path: string, body: unknown): this {
    this.routes.set(path, () => body)
    return this
  }

  fail(path: string, error: Error): this {
    this.routes.set(path, () => {
      throw error
    })
    return this
  }

  count(path: string): number {
    return this.calls.filter((c) => c.path === path).length
  }

  async execute(path: string, query?: QueryParams): Promise<unknown> {
    this.calls.push({ path, query })
    const route = this.routes.get(path)
    if (!route) throw new Error(`unexpected path ${path}`)
    return route()
  }
}

const NOW = Date.parse('2024-01-15T12:00:00Z')

const SNAPSHOT = '/country/united%20states'
const FORECAST = '/forecast/country/united%20states'
const GDP_HISTORY = '/historical/country/united%20states/indicator/GDP%20Growth%20Rate'

const snapshotRows = [
  { Category: 'GDP Growth Rate', CategoryGroup: 'GDP', LatestValue: 3.3, PreviousValue: 4.9 },
  { Category: 'GDP', CategoryGroup: 'GDP', LatestValue: 27360, PreviousValue: 25744 },
  { Category: 'Unemployment Rate', CategoryGroup: 'Labour', LatestValue: 3.7, PreviousValue: 3.7 },
]

const marketRows = {
  index: [{ Symbol: 'US500', Name: 'S&P 500', Last: 4783.83, DailyPercentualChange: 0.25 }],
  bond: [{ Symbol: 'USGG10YR:IND', Name: 'US 10Y', Last: 4.06, DailyPercentualChange: -1.1 }],
  currency: [{ Symbol: 'DXY', Name: 'US Dollar Index', Last: 103.4, DailyPercentualChange: 0.1 }],
  commodities: [{ Symbol: 'CL1:COM', Name: 'Crude Oil', Last: 72.68, DailyPercentualChange: 0.92 }],
}

function setup() {
  const clock = new FakeClock(NOW)
  const transport = new FakeTransport()
    .on(SNAPSHOT, snapshotRows)
    .on(FORECAST, [{ Category: 'GDP Growth Rate', q1: 2, q1_date: '2024-03-31T00:00:00' }])
    .on(GDP_HISTORY, [
      { Category: 'GDP Growth Rate', DateTime: '2023-09-30T00:00:00', Value: 4.9 },
      { Category: 'GDP Growth Rate', DateTime: '2023-12-31T00:00:00', Value: 3.3 },
    ])
    .on('/markets/index', marketRows.index)
    .on('/markets/bond', marketRows.bond)
    .on('/markets/currency', marketRows.currency)
    .on('/markets/commodities', marketRows.commodities)
  const cache = new ResponseCache({ clock })
  const dashboard = new DashboardService({ adapters: { transport, country: 'united states' }, cache, newsLimit: 25 })
  return { clock, transport, cache, dashboard }
}

// =============================================================================
// Tests
// =============================================================================

describe('DashboardService', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {})
    jest.spyOn(console, 'warn').mockImplementation(() => {})
    jest.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    jest.restoreAllMocks()
  })

  describe('getIndicators', () => {
    it('filters the cached country snapshot by group', async () => {
      const { transport, dashboard } = setup()

      const gdp = await dashboard.getIndicators('GDP')
      const labour = await dashboard.getIndicators('Labour')

      expect(gdp.data.map((r) => r.name)).toEqual(['GDP Growth Rate', 'GDP'])
      expect(labour.data.map((r) => r.name)).toEqual(['Unemployment Rate'])
      expect(transport.count(SNAPSHOT)).toBe(1)
      expect(gdp).toMatchObject({ stale: false, asOf: '2024-01-15T12:00:00.000Z' })
      expect(gdp.freshness.status).toBe('live')
      expect(gdp.staleReason).toBeUndefined()
    })

    it('refetches after invalidateAll', async () => {
      const { transport, dashboard } = setup()
      await dashboard.getIndicators('GDP')
      expect(dashboard.invalidateAll()).toBe(1)
      await dashboard.getIndicators('GDP')
      expect(transport.count(SNAPSHOT)).toBe(2)
    })
  })

  describe('getHighlights', () => {
    it('returns configured stat records and charts', async () => {
      const { dashboard } = setup()
      const result = await dashboard.getHighlights('GDP')
      expect(result.data.stats.map((r) => r.name)).toEqual(['GDP', 'GDP Growth Rate'])
      expect(result.data.charts).toContain('GDP Growth Rate')
    })
  })

  describe('getHistorical', () => {
    it('returns an indicator series', async () => {
      const { dashboard } = setup()
      const result = await dashboard.getHistorical('GDP Growth Rate')
      expect(result.data.map((p) => p.value)).toEqual([4.9, 3.3])
    })

    it('leaves the cached series untouched when a refresh is malformed', async () => {
      const { clock, transport, dashboard } = setup()
      const first = await dashboard.getHistorical('GDP Growth Rate')

      clock.t += 3_600_000
      transport.on(GDP_HISTORY, { Message: 'not a series' })
      await expect(dashboard.getHistorical('GDP Growth Rate')).rejects.toBeInstanceOf(DecodeError)

      transport.fail(GDP_HISTORY, new TransportError('timed out', 'TradingEconomics'))
      const fallback = await dashboard.getHistorical('GDP Growth Rate')
      expect(fallback.stale).toBe(true)
      expect(fallback.data).toEqual(first.data)
      expect(fallback.asOf).toBe('2024-01-15T12:00:00.000Z')
    })

    it('routes market symbols to OHLC closes', async () => {
      const { transport, dashboard } = setup()
      transport.on('/markets/historical/USGG10YR:IND', [
        { Symbol: 'USGG10YR:IND', Date: '12/01/2024', Open: 3.97, High: 4.0, Low: 3.93, Close: 3.94 },
      ])

      const result = await dashboard.getHistorical('USGG10YR:IND', { start: '2024-01-01' })

      expect(result.data).toEqual([{ id: 'USGG10YR:IND', timestamp: '2024-01-12T00:00:00.000Z', value: 3.94 }])
      expect(transport.calls.at(-1)).toEqual({ path: '/markets/historical/USGG10YR:IND', query: { d1: '2024-01-01', d2: undefined } })
    })
  })

  describe('getForecast', () => {
    it('matches the indicator ignoring case', async () => {
      const { dashboard } = setup()
      const result = await dashboard.getForecast('gdp growth rate')
      expect(result.data).toEqual([{ indicator: 'GDP Growth Rate', horizon: 'q1', targetPeriod: '2024-03-31T00:00:00.000Z', value: 2 }])
    })
  })

  describe('getIndicatorDetail', () => {
    it('combines history, forecast overlay and recent values', async () => {
      const { dashboard } = setup()
      const result = await dashboard.getIndicatorDetail('GDP Growth Rate')

      expect(result.data.series.map((p) => [p.timestamp.slice(0, 10), p.actual, p.forecast])).toEqual([
        ['2023-09-30', 4.9, null],
        ['2023-12-31', 3.3, null],
        ['2024-03-31', null, 2],
      ])
      expect(result.data.recent.map((p) => p.value)).toEqual([3.3, 4.9])
      expect(result.stale).toBe(false)
    })
  })

  describe('getMarketQuotes', () => {
    it('caches each category for the market TTL', async () => {
      const { clock, transport, dashboard } = setup()
      await dashboard.getMarketQuotes('index')
      clock.t += 30_000
      const cached = await dashboard.getMarketQuotes('index')
      expect(transport.count('/markets/index')).toBe(1)
      expect(cached.asOf).toBe('2024-01-15T12:00:00.000Z')

      clock.t += 31_000
      await dashboard.getMarketQuotes('index')
      expect(transport.count('/markets/index')).toBe(2)
    })

    it('serves stale quotes when the upstream rate limits', async () => {
      const { clock, transport, dashboard } = setup()
      await dashboard.getMarketQuotes('index')
      transport.fail('/markets/index', new RateLimitError('HTTP 429', 'TradingEconomics', 30))
      clock.t += 61_000

      const result = await dashboard.getMarketQuotes('index')

      expect(result).toMatchObject({ stale: true, staleReason: 'HTTP 429', asOf: '2024-01-15T12:00:00.000Z' })
      expect(result.freshness.status).toBe('stale')
      expect(result.data[0].symbol).toBe('US500')
    })
  })

  describe('getNews', () => {
    it('requests the configured limit by default', async () => {
      const { transport, dashboard } = setup()
      transport.on('/news/country/united%20states', [{ id: 7, title: 'Retail sales beat', date: '2024-01-15T10:00:00' }])
      const result = await dashboard.getNews()
      expect(result.data.map((n) => n.headline)).toEqual(['Retail sales beat'])
      expect(transport.calls.at(-1)?.query).toEqual({ limit: 25 })
    })
  })

  describe('getCalendar', () => {
    it('returns calendar events', async () => {
      const { transport, dashboard } = setup()
      transport.on('/calendar/country/united%20states', [{ Date: '2024-01-16T13:30:00', Event: 'Retail Sales MoM', Actual: '0.6%' }])
      const result = await dashboard.getCalendar()
      expect(result.data[0]).toMatchObject({ event: 'Retail Sales MoM', actual: '0.6%' })
    })
  })

  describe('getTicker', () => {
    it('builds the ticker from every market category', async () => {
      const { dashboard } = setup()
      const result = await dashboard.getTicker()
      expect(result.data.map((i) => i.label)).toEqual(['S&P 500', '10Y Yield', 'DXY', 'WTI'])
      expect(result.stale).toBe(false)
    })

    it('leaves out a failed category and flags the ticker stale', async () => {
      const { transport, dashboard } = setup()
      transport.fail('/markets/bond', new TransportError('timed out', 'TradingEconomics'))

      const result = await dashboard.getTicker()

      expect(result.data.map((i) => i.label)).toEqual(['S&P 500', 'DXY', 'WTI'])
      expect(result.stale).toBe(true)
      expect(result.staleReason).toBe('bond: timed out')
    })

    it('rethrows auth failures even when other categories load', async () => {
      const { transport, dashboard } = setup()
      transport.fail('/markets/currency', new AuthError('HTTP 401', 401, 'TradingEconomics'))
      await expect(dashboard.getTicker()).rejects.toBeInstanceOf(AuthError)
    })

    it('throws when no category loads', async () => {
      const { transport, dashboard } = setup()
      for (const path of ['/markets/index', '/markets/bond', '/markets/currency', '/markets/commodities']) {
        transport.fail(path, new TransportError('down', 'TradingEconomics'))
      }
      await expect(dashboard.getTicker()).rejects.toThrow('down')
    })
  })

  describe('refreshMarkets', () => {
    it('forces a refetch of every category and reports failures', async () => {
      const { transport, dashboard } = setup()
      await dashboard.getTicker()

      transport.fail('/markets/index', new RateLimitError('HTTP 429', 'TradingEconomics'))
      transport.fail('/markets/currency', new APIError('HTTP 404', 404, 'TradingEconomics'))

      const summary = await dashboard.refreshMarkets()

      expect(summary).toEqual({
        results: { index: 'failed', bond: 'success', currency: 'failed', commodity: 'success' },
        errors: { index: 'HTTP 429', currency: 'HTTP 404' },
      })
      expect(transport.count('/markets/bond')).toBe(2)
    })

    it('rejects with the AuthError when the credentials are refused', async () => {
      const { transport, dashboard } = setup()
      const refused = new AuthError('HTTP 401', 401, 'TradingEconomics')
      for (const path of ['/markets/index', '/markets/bond', '/markets/currency', '/markets/commodities']) {
        transport.fail(path, refused)
      }

      await expect(dashboard.refreshMarkets()).rejects.toBe(refused)
    })

    it('rejects on an AuthError even when other categories refreshed', async () => {
      const { transport, dashboard } = setup()
      transport.fail('/markets/bond', new AuthError('HTTP 403', 403, 'TradingEconomics'))

      await expect(dashboard.refreshMarkets()).rejects.toBeInstanceOf(AuthError)
      expect(transport.count('/markets/index')).toBe(1)
    })

    it('rejects when no category refreshed', async () => {
      const { transport, dashboard } = setup()
      await dashboard.getTicker()
      for (const path of ['/markets/index', '/markets/bond', '/markets/currency', '/markets/commodities']) {
        transport.fail(path, new TransportError('connection reset', 'TradingEconomics'))
      }

      await expect(dashboard.refreshMarkets()).rejects.toThrow(
        'No market category refreshed (index: connection reset; bond: connection reset; currency: connection reset; commodity: connection reset)'
      )
    })
  })
})
